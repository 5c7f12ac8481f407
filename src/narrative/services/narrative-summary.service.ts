import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  SUMMARY_BATCH_LIMIT,
  SUMMARY_RECENT_ARTICLES,
} from '../config/narrative.constants';
import { NARRATIVE_CONFIG, NarrativeConfig } from '../config/narrative.config';
import {
  describeError,
  NarrativeConflictError,
} from '../errors/narrative.errors';
import { SUMMARY_SYSTEM_PROMPT } from '../prompts/narrative.prompt';
import { NarrativeStore } from '../store/narrative.store';
import {
  ArticleCluster,
  Fingerprint,
  Narrative,
  SummaryRunReport,
  SummaryTask,
} from '../types/narrative.types';
import { toTime } from '../utils/date.util';
import { cleanText, truncate } from '../utils/text.util';
import { LlmClientService } from './llm-client.service';
import { NarrativeText } from './narrative-merge.service';

const TITLE_MAX_CHARS = 80;
const SUMMARY_MAX_CHARS = 600;

export interface SummaryInput {
  fingerprint: Fingerprint;
  /** Most recent first. */
  articleSummaries: string[];
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/** Deterministic text used when the model is unavailable. */
export function fallbackText(input: SummaryInput): NarrativeText {
  const { nucleusEntity, topActors, keyActions } = input.fingerprint;
  const others = Object.keys(topActors).filter(
    (name) => name.toLowerCase() !== nucleusEntity.toLowerCase(),
  );
  const title = keyActions[0]
    ? `${nucleusEntity}: ${keyActions[0]}`
    : `${nucleusEntity} developments`;

  const parts = [
    others.length > 0
      ? `Developing story around ${nucleusEntity} involving ${others.slice(0, 3).join(', ')}.`
      : `Developing story around ${nucleusEntity}.`,
  ];
  if (keyActions.length > 0) {
    parts.push(`Key developments: ${keyActions.join(', ')}.`);
  }
  const latest = input.articleSummaries.find((summary) => summary.trim());
  if (latest) {
    parts.push(`Latest: ${cleanText(latest)}`);
  }

  return {
    title: truncate(title, TITLE_MAX_CHARS),
    summary: truncate(parts.join(' '), SUMMARY_MAX_CHARS),
  };
}

export function summaryInputForNarrative(narrative: Narrative): SummaryInput {
  return {
    fingerprint: narrative.fingerprint,
    articleSummaries: [...narrative.articles]
      .sort((a, b) => toTime(b.publishedAt) - toTime(a.publishedAt))
      .slice(0, SUMMARY_RECENT_ARTICLES)
      .map((article) => article.summary)
      .filter((summary) => summary.trim() !== ''),
  };
}

export function summaryInputForCluster(
  cluster: ArticleCluster,
  fingerprint: Fingerprint,
): SummaryInput {
  return {
    fingerprint,
    articleSummaries: [...cluster.articles]
      .reverse()
      .slice(0, SUMMARY_RECENT_ARTICLES)
      .map((article) => article.extraction.summary)
      .filter((summary) => summary.trim() !== ''),
  };
}

@Injectable()
export class NarrativeSummaryService {
  private readonly logger = new Logger(NarrativeSummaryService.name);

  constructor(
    private readonly llmClient: LlmClientService,
    private readonly store: NarrativeStore,
    @Inject(NARRATIVE_CONFIG) private readonly config: NarrativeConfig,
  ) {}

  async generateText(input: SummaryInput): Promise<NarrativeText | null> {
    const { nucleusEntity, topActors, keyActions } = input.fingerprint;
    const userPrompt = [
      `Nucleus: ${nucleusEntity}`,
      `Key actors: ${Object.keys(topActors).join(', ')}`,
      `Key actions: ${keyActions.join(', ')}`,
      'Recent article summaries:',
      ...input.articleSummaries.map((summary) => `- ${cleanText(summary)}`),
      'Return only JSON.',
    ].join('\n');

    const payload = await this.llmClient.generateJson(
      SUMMARY_SYSTEM_PROMPT,
      userPrompt,
    );
    if (!payload) {
      return null;
    }

    const title = cleanText(asString(payload.title));
    const summary = cleanText(asString(payload.summary));
    if (!title || !summary) {
      return null;
    }
    return {
      title: truncate(title, TITLE_MAX_CHARS),
      summary: truncate(summary, SUMMARY_MAX_CHARS),
    };
  }

  /** Text for a narrative being created; never waits on the outbox. */
  async textForCluster(
    cluster: ArticleCluster,
    fingerprint: Fingerprint,
  ): Promise<NarrativeText> {
    const input = summaryInputForCluster(cluster, fingerprint);
    return (await this.generateText(input)) ?? fallbackText(input);
  }

  async processOutbox(limit = SUMMARY_BATCH_LIMIT): Promise<SummaryRunReport> {
    const startedAt = Date.now();
    const tasks = await this.store.listSummaryTasks(limit);
    const report: SummaryRunReport = {
      claimed: tasks.length,
      regenerated: 0,
      fallback: 0,
      retried: 0,
      orphaned: 0,
    };

    let failed = 0;
    for (const task of tasks) {
      try {
        await this.processTask(task, report);
      } catch (error) {
        if (error instanceof NarrativeConflictError) {
          // 다음 실행에서 최신 리비전으로 재시도
          this.logger.warn(`summary deferred: ${error.message}`);
          continue;
        }
        failed += 1;
        this.logger.warn(
          `summary failed: narrative=${task.narrativeId} error=${describeError(error)}`,
        );
      }
    }

    this.logger.log(
      `stage summaries done: claimed=${report.claimed} regenerated=${report.regenerated} fallback=${report.fallback} retried=${report.retried} orphaned=${report.orphaned} failed=${failed} elapsedMs=${Date.now() - startedAt}`,
    );
    return report;
  }

  private async processTask(
    task: SummaryTask,
    report: SummaryRunReport,
  ): Promise<void> {
    const narrative = await this.store.findById(task.narrativeId);
    if (!narrative) {
      await this.store.completeSummaryTask(task.narrativeId);
      report.orphaned += 1;
      return;
    }

    const input = summaryInputForNarrative(narrative);
    const generated = await this.generateText(input);
    if (generated) {
      await this.applyText(narrative, generated);
      await this.store.completeSummaryTask(task.narrativeId);
      report.regenerated += 1;
      return;
    }

    const retried = await this.store.retrySummaryTask(task.narrativeId);
    const attempts = retried?.attempts ?? task.attempts + 1;
    if (attempts < this.config.summaryMaxAttempts) {
      report.retried += 1;
      return;
    }

    this.logger.warn(
      `summary fallback: narrative=${narrative.id} reason=${task.reason} attempts=${attempts}`,
    );
    await this.applyText(narrative, fallbackText(input));
    await this.store.completeSummaryTask(task.narrativeId);
    report.fallback += 1;
  }

  private async applyText(
    narrative: Narrative,
    text: NarrativeText,
  ): Promise<void> {
    await this.store.save(
      {
        ...narrative,
        title: text.title,
        summary: text.summary,
        needsSummaryUpdate: false,
      },
      { expectedRevision: narrative.revision },
    );
  }
}
