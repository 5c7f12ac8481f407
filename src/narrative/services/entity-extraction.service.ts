import { Inject, Injectable, Logger } from '@nestjs/common';
import { EXTRACTION_INPUT_MAX_CHARS } from '../config/narrative.constants';
import { NARRATIVE_CONFIG, NarrativeConfig } from '../config/narrative.config';
import { EXTRACTION_SYSTEM_PROMPT } from '../prompts/narrative.prompt';
import {
  Article,
  ArticleExtraction,
  ExtractedArticle,
} from '../types/narrative.types';
import { normalizeEntityName } from '../utils/entity.util';
import { cleanText, uniquePhrases } from '../utils/text.util';
import { asRecord, LlmClientService } from './llm-client.service';

const DEFAULT_SALIENCE = 3;

export interface ExtractionBatchResult {
  articles: ExtractedArticle[];
  failedIds: string[];
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function asStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return uniquePhrases(
    value.filter((item): item is string => typeof item === 'string'),
  );
}

export function clampSalience(value: unknown): number {
  const numeric = typeof value === 'string' ? Number(value) : value;
  if (typeof numeric !== 'number' || !Number.isFinite(numeric)) {
    return DEFAULT_SALIENCE;
  }
  return Math.max(1, Math.min(5, Math.round(numeric)));
}

function addActor(
  actors: Record<string, number>,
  rawName: unknown,
  salience: unknown,
): void {
  const name = normalizeEntityName(asString(rawName));
  if (!name) {
    return;
  }
  actors[name] = Math.max(actors[name] ?? 0, clampSalience(salience));
}

function normalizeActors(
  raw: unknown,
  salienceHints: Record<string, unknown> | null,
): Record<string, number> {
  const actors: Record<string, number> = {};
  if (Array.isArray(raw)) {
    for (const item of raw) {
      if (typeof item === 'string') {
        addActor(actors, item, salienceHints?.[item]);
        continue;
      }
      const record = asRecord(item);
      if (record) {
        addActor(actors, record.name, record.salience);
      }
    }
    return actors;
  }

  const record = asRecord(raw);
  if (record) {
    for (const [name, salience] of Object.entries(record)) {
      addActor(actors, name, salience);
    }
  }
  return actors;
}

/**
 * Turns a collaborator payload into an extraction. Every field may be missing
 * or malformed; `actors` is accepted as `[{name, salience}]`, as `{name:
 * salience}` or as a name list with a separate `actor_salience` map.
 */
export function normalizeExtractionPayload(
  payload: Record<string, unknown>,
): ArticleExtraction {
  return {
    nucleusEntity: normalizeEntityName(
      asString(payload.nucleus_entity ?? payload.nucleusEntity),
    ),
    actors: normalizeActors(
      payload.actors,
      asRecord(payload.actor_salience),
    ),
    actions: asStringList(payload.actions),
    tensions: asStringList(payload.tensions),
    summary: cleanText(asString(payload.summary)),
  };
}

/** Re-applies alias normalization to an extraction that came with the article. */
export function normalizeExtraction(
  extraction: ArticleExtraction,
): ArticleExtraction {
  const actors: Record<string, number> = {};
  for (const [name, salience] of Object.entries(extraction.actors)) {
    addActor(actors, name, salience);
  }
  return {
    nucleusEntity: normalizeEntityName(extraction.nucleusEntity),
    actors,
    actions: uniquePhrases(extraction.actions),
    tensions: uniquePhrases(extraction.tensions),
    summary: cleanText(extraction.summary),
  };
}

@Injectable()
export class EntityExtractionService {
  private readonly logger = new Logger(EntityExtractionService.name);

  constructor(
    private readonly llmClient: LlmClientService,
    @Inject(NARRATIVE_CONFIG) private readonly config: NarrativeConfig,
  ) {}

  async extractBatch(articles: Article[]): Promise<ExtractionBatchResult> {
    const startedAt = Date.now();
    const extracted: ExtractedArticle[] = [];
    const failedIds: string[] = [];
    const pending: Article[] = [];

    for (const article of articles) {
      if (article.extraction) {
        extracted.push({
          ...article,
          extraction: normalizeExtraction(article.extraction),
        });
      } else {
        pending.push(article);
      }
    }

    const chunkSize = Math.max(1, this.config.extractionConcurrency);
    for (let i = 0; i < pending.length; i += chunkSize) {
      const chunk = pending.slice(i, i + chunkSize);
      const results = await Promise.all(
        chunk.map((article) => this.extractOne(article)),
      );
      results.forEach((extraction, index) => {
        const article = chunk[index];
        if (extraction) {
          extracted.push({ ...article, extraction });
        } else {
          failedIds.push(article.id);
        }
      });
    }

    this.logger.log(
      `stage extraction done: given=${articles.length - pending.length} extracted=${pending.length - failedIds.length} failed=${failedIds.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return { articles: extracted, failedIds };
  }

  private async extractOne(article: Article): Promise<ArticleExtraction | null> {
    const title = cleanText(article.title ?? '');
    const text = cleanText(article.text ?? '');
    if (!title && !text) {
      this.logger.warn(`extraction skipped: article=${article.id} has no text`);
      return null;
    }

    const userPrompt = [
      `Title: ${title}`,
      `Text: ${text.slice(0, EXTRACTION_INPUT_MAX_CHARS)}`,
      'Return only JSON.',
    ].join('\n');

    try {
      const payload = await this.llmClient.generateJson(
        EXTRACTION_SYSTEM_PROMPT,
        userPrompt,
      );
      if (!payload) {
        this.logger.warn(`extraction failed: article=${article.id}`);
        return null;
      }
      return normalizeExtractionPayload(payload);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `extraction failed: article=${article.id} error=${message}`,
      );
      return null;
    }
  }
}
