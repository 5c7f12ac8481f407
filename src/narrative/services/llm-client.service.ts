import { Injectable, Logger } from '@nestjs/common';
import { AI_PROVIDER } from '../config/narrative.constants';
import { cleanText } from '../utils/text.util';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

interface FetchJsonResult {
  ok: boolean;
  status: number;
  raw: string;
  json: Record<string, unknown> | null;
}

interface ProviderCall {
  provider: 'gemini' | 'openai';
  url: string;
  headers: Record<string, string>;
  body: string;
  retries: number;
  backoffMs: number;
  timeoutMs: number;
  readText: (json: Record<string, unknown> | null) => string;
}

export function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

/**
 * JSON-mode completion against Gemini or OpenAI. Returns null whenever the
 * provider is unconfigured, keeps failing, or answers with something that is
 * not a JSON object; callers own their fallback.
 */
@Injectable()
export class LlmClientService {
  private readonly logger = new Logger(LlmClientService.name);
  private readonly unavailableLogged = new Set<string>();

  async generateJson(
    systemPrompt: string,
    userPrompt: string,
  ): Promise<Record<string, unknown> | null> {
    const call =
      AI_PROVIDER === 'openai'
        ? this.openaiCall(systemPrompt, userPrompt)
        : this.geminiCall(systemPrompt, userPrompt);
    if (!call) {
      return null;
    }
    return this.requestJson(call);
  }

  private geminiCall(
    systemPrompt: string,
    userPrompt: string,
  ): ProviderCall | null {
    const apiKey = (process.env.GEMINI_API_KEY ?? '').trim();
    if (!apiKey) {
      this.logUnavailable('GEMINI_API_KEY 미설정');
      return null;
    }

    const base =
      process.env.GEMINI_API_BASE ??
      'https://generativelanguage.googleapis.com/v1beta';
    const model = process.env.GEMINI_MODEL ?? 'gemini-2.0-flash';
    const maxOutputTokens = Number(
      process.env.GEMINI_MAX_OUTPUT_TOKENS ?? 1000,
    );

    return {
      provider: 'gemini',
      url: `${base}/models/${model}:generateContent`,
      headers: {
        'x-goog-api-key': apiKey,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        contents: [{ role: 'user', parts: [{ text: userPrompt }] }],
        systemInstruction: { parts: [{ text: systemPrompt }] },
        generationConfig: {
          temperature: 0.2,
          maxOutputTokens,
          responseMimeType: 'application/json',
        },
      }),
      retries: Number(process.env.GEMINI_MAX_RETRIES ?? 2),
      backoffMs: Number(process.env.GEMINI_RETRY_BACKOFF_SEC ?? 1.5) * 1000,
      timeoutMs: Number(process.env.GEMINI_TIMEOUT_SEC ?? 60) * 1000,
      readText: (json) => this.extractGeminiText(json),
    };
  }

  private openaiCall(
    systemPrompt: string,
    userPrompt: string,
  ): ProviderCall | null {
    const apiKey = (process.env.OPENAI_API_KEY ?? '').trim();
    if (!apiKey) {
      this.logUnavailable('OPENAI_API_KEY 미설정');
      return null;
    }

    const base = process.env.OPENAI_API_BASE ?? 'https://api.openai.com/v1';
    const model = process.env.OPENAI_MODEL ?? 'gpt-4o-mini';

    return {
      provider: 'openai',
      url: `${base}/chat/completions`,
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: 0.2,
      }),
      retries: Number(process.env.OPENAI_MAX_RETRIES ?? 2),
      backoffMs: 1200,
      timeoutMs: Number(process.env.OPENAI_TIMEOUT_SEC ?? 60) * 1000,
      readText: (json) => this.extractOpenaiText(json),
    };
  }

  private async requestJson(
    call: ProviderCall,
  ): Promise<Record<string, unknown> | null> {
    for (let attempt = 1; attempt <= call.retries + 1; attempt += 1) {
      const response = await this.safeFetchJson(call.url, {
        method: 'POST',
        headers: call.headers,
        body: call.body,
        timeoutMs: call.timeoutMs,
      });

      if (!response.ok) {
        if (RETRYABLE_STATUS.has(response.status) && attempt <= call.retries) {
          await this.sleep(call.backoffMs * 2 ** (attempt - 1));
          continue;
        }
        this.logUnavailable(
          `${call.provider}_generate_failed`,
          `${response.status} ${response.raw.slice(0, 180)}`,
        );
        return null;
      }

      const parsed = this.parseJsonObject(call.readText(response.json));
      if (parsed) {
        return parsed;
      }

      if (attempt <= call.retries) {
        await this.sleep(call.backoffMs * 2 ** (attempt - 1));
      }
    }

    this.logUnavailable(`${call.provider} 응답 JSON 파싱 실패`);
    return null;
  }

  private extractGeminiText(json: Record<string, unknown> | null): string {
    const candidates = Array.isArray(json?.candidates) ? json.candidates : [];
    const firstCandidate = asRecord(candidates[0]);
    const content = asRecord(firstCandidate?.content);
    const parts = Array.isArray(content?.parts) ? content.parts : [];
    const firstPart = asRecord(parts[0]);
    return typeof firstPart?.text === 'string' ? firstPart.text : '';
  }

  private extractOpenaiText(json: Record<string, unknown> | null): string {
    const choices = Array.isArray(json?.choices) ? json.choices : [];
    const first = asRecord(choices[0]);
    const message = asRecord(first?.message);
    return typeof message?.content === 'string' ? message.content : '';
  }

  private parseJsonObject(text: string): Record<string, unknown> | null {
    if (!text) {
      return null;
    }
    const trimmed = text
      .trim()
      .replace(/```json/gi, '')
      .replace(/```/g, '')
      .trim();

    const direct = this.tryJsonParse(trimmed);
    if (direct) {
      return direct;
    }

    const block = this.extractJsonBlock(trimmed);
    if (!block) {
      return null;
    }

    return (
      this.tryJsonParse(block) ??
      this.tryJsonParse(block.replace(/,\s*([}\]])/g, '$1'))
    );
  }

  private tryJsonParse(value: string): Record<string, unknown> | null {
    try {
      const parsed: unknown = JSON.parse(value);
      return asRecord(parsed);
    } catch {
      return null;
    }
  }

  private extractJsonBlock(value: string): string | null {
    const start = value.indexOf('{');
    if (start === -1) {
      return null;
    }

    let depth = 0;
    for (let i = start; i < value.length; i += 1) {
      const ch = value[i];
      if (ch === '{') {
        depth += 1;
      } else if (ch === '}') {
        depth -= 1;
        if (depth === 0) {
          return value.slice(start, i + 1);
        }
      }
    }
    return null;
  }

  private async safeFetchJson(
    url: string,
    params: {
      method: 'POST' | 'GET';
      headers: Record<string, string>;
      body?: string;
      timeoutMs: number;
    },
  ): Promise<FetchJsonResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), params.timeoutMs);

    try {
      const res = await fetch(url, {
        method: params.method,
        headers: params.headers,
        body: params.body,
        signal: controller.signal,
      });
      const raw = await res.text();
      return {
        ok: res.ok,
        status: res.status,
        raw,
        json: this.tryJsonParse(raw),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, status: 0, raw: message, json: null };
    } finally {
      clearTimeout(timeout);
    }
  }

  private logUnavailable(reason: string, detail?: string): void {
    if (this.unavailableLogged.has(reason)) {
      return;
    }
    this.unavailableLogged.add(reason);
    const detailText = cleanText(detail || '');
    if (detailText) {
      this.logger.warn(`AI unavailable: ${reason} (${detailText})`);
      return;
    }
    this.logger.warn(`AI unavailable: ${reason}`);
  }

  private async sleep(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
