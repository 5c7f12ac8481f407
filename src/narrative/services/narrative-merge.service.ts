import { Inject, Injectable } from '@nestjs/common';
import crypto from 'node:crypto';
import { NARRATIVE_CONFIG, NarrativeConfig } from '../config/narrative.config';
import { NarrativeValidationError } from '../errors/narrative.errors';
import { NarrativeStore } from '../store/narrative.store';
import {
  ArticleCluster,
  ExtractedArticle,
  Fingerprint,
  Narrative,
  NarrativeArticle,
  SummaryTask,
  SummaryTaskReason,
  TimelineSnapshot,
} from '../types/narrative.types';
import {
  endOfUtcDay,
  formatDateYYYYMMDD,
  maxIso,
  minIso,
  toTime,
} from '../utils/date.util';
import { roundTo } from '../utils/similarity.util';
import { FingerprintService } from './fingerprint.service';
import {
  calculateRecentVelocity,
  lifecycleFields,
  NarrativeLifecycleService,
} from './narrative-lifecycle.service';

const TIMELINE_TOP_ENTITIES = 5;

export interface NarrativeText {
  title: string;
  summary: string;
}

export function toNarrativeArticle(article: ExtractedArticle): NarrativeArticle {
  return {
    id: article.id,
    publishedAt: article.publishedAt,
    source: article.source,
    nucleusEntity: article.extraction.nucleusEntity,
    actors: { ...article.extraction.actors },
    actions: [...article.extraction.actions],
    summary: article.extraction.summary,
  };
}

/** Shared entities take the average of both sides; one-sided ones keep their score. */
export function mergeSalience(
  a: Record<string, number>,
  b: Record<string, number>,
): Record<string, number> {
  const out: Record<string, number> = { ...a };
  for (const [name, score] of Object.entries(b)) {
    const existing = out[name];
    out[name] = existing == null ? score : roundTo((existing + score) / 2);
  }
  return out;
}

/** Union by id; the record already held wins. */
export function unionArticles(
  held: NarrativeArticle[],
  incoming: NarrativeArticle[],
): NarrativeArticle[] {
  const byId = new Map<string, NarrativeArticle>();
  for (const article of [...held, ...incoming]) {
    if (!byId.has(article.id)) {
      byId.set(article.id, article);
    }
  }
  return [...byId.values()].sort(
    (a, b) =>
      toTime(a.publishedAt) - toTime(b.publishedAt) || a.id.localeCompare(b.id),
  );
}

export function buildTimeline(
  articles: NarrativeArticle[],
  windowDays: number,
): TimelineSnapshot[] {
  const byDay = new Map<string, NarrativeArticle[]>();
  for (const article of articles) {
    const key = formatDateYYYYMMDD(new Date(article.publishedAt));
    const bucket = byDay.get(key) ?? [];
    bucket.push(article);
    byDay.set(key, bucket);
  }

  const allDates = articles.map((article) => article.publishedAt);
  return [...byDay.keys()].sort().map((date) => {
    const dayArticles = byDay.get(date) ?? [];
    const mentions = new Map<string, number>();
    for (const article of dayArticles) {
      for (const name of Object.keys(article.actors)) {
        mentions.set(name, (mentions.get(name) ?? 0) + 1);
      }
    }
    const entities = [...mentions.entries()]
      .sort(([nameA, a], [nameB, b]) => b - a || nameA.localeCompare(nameB))
      .slice(0, TIMELINE_TOP_ENTITIES)
      .map(([name]) => name);

    return {
      date,
      articleCount: dayArticles.length,
      entities,
      velocity: calculateRecentVelocity(allDates, endOfUtcDay(date), windowDays),
    };
  });
}

/** Busiest day; the later one wins a tie. */
export function findPeakActivity(
  timeline: TimelineSnapshot[],
): TimelineSnapshot | null {
  let peak: TimelineSnapshot | null = null;
  for (const snapshot of timeline) {
    if (!peak || snapshot.articleCount >= peak.articleCount) {
      peak = snapshot;
    }
  }
  return peak;
}

export function buildCreationKey(
  nucleusEntity: string,
  articleIds: string[],
): string {
  const seed = [...articleIds].sort()[0] ?? '';
  return `${nucleusEntity.trim().toLowerCase()}:${seed}`;
}

export function assertNarrativeInvariants(narrative: Narrative): void {
  if (!narrative.fingerprint.nucleusEntity.trim()) {
    throw new NarrativeValidationError(
      'fingerprint.nucleusEntity must not be empty',
      narrative.id,
    );
  }
  if (toTime(narrative.firstSeen) > toTime(narrative.lastUpdated)) {
    throw new NarrativeValidationError(
      `firstSeen (${narrative.firstSeen}) is after lastUpdated (${narrative.lastUpdated})`,
      narrative.id,
    );
  }
  const ids = new Set(narrative.articleIds);
  if (ids.size !== narrative.articleIds.length) {
    throw new NarrativeValidationError(
      'articleIds must not contain duplicates',
      narrative.id,
    );
  }
  if (
    narrative.articles.length !== ids.size ||
    narrative.articles.some((article) => !ids.has(article.id))
  ) {
    throw new NarrativeValidationError(
      'articles must hold exactly one record per article id',
      narrative.id,
    );
  }
}

@Injectable()
export class NarrativeMergeService {
  constructor(
    private readonly store: NarrativeStore,
    private readonly fingerprintService: FingerprintService,
    private readonly lifecycleService: NarrativeLifecycleService,
    @Inject(NARRATIVE_CONFIG) private readonly config: NarrativeConfig,
  ) {}

  /** Builds a narrative from an unmatched cluster. Nothing is written. */
  buildNarrative(
    cluster: ArticleCluster,
    fingerprint: Fingerprint,
    text: NarrativeText,
    now: Date,
  ): Narrative {
    const articles = unionArticles([], cluster.articles.map(toNarrativeArticle));
    const publishedAt = articles.map((article) => article.publishedAt);
    const draft: Narrative = {
      kind: 'narrative',
      id: crypto.randomUUID(),
      title: text.title,
      summary: text.summary,
      fingerprint,
      articleIds: articles.map((article) => article.id),
      articles,
      entitySalience: { ...cluster.actorSalience },
      lifecycleState: 'emerging',
      lifecycleHistory: [],
      firstSeen: minIso(publishedAt),
      lastUpdated: maxIso(publishedAt),
      createdAt: now.toISOString(),
      mentionVelocity: 0,
      momentum: 'unknown',
      reawakeningCount: 0,
      resurrectionVelocity: 0,
      reawakenedFrom: null,
      needsSummaryUpdate: false,
      mergedFrom: [],
      mergedAt: null,
      timeline: [],
      peakActivity: null,
      creationKey: buildCreationKey(
        fingerprint.nucleusEntity,
        articles.map((article) => article.id),
      ),
      revision: 0,
    };

    const evaluation = this.lifecycleService.evaluate(draft, now, null);
    const timeline = buildTimeline(articles, this.config.velocityWindowDays);
    const narrative: Narrative = {
      ...draft,
      ...lifecycleFields(evaluation),
      timeline,
      peakActivity: findPeakActivity(timeline),
    };
    assertNarrativeInvariants(narrative);
    return narrative;
  }

  async createNarrative(
    cluster: ArticleCluster,
    fingerprint: Fingerprint,
    text: NarrativeText,
    now: Date,
  ): Promise<Narrative> {
    return this.store.create(this.buildNarrative(cluster, fingerprint, text, now));
  }

  /**
   * Folds a matched cluster into `narrative`. Returns null when the cluster
   * brings no article the narrative does not already hold.
   */
  applyCluster(
    narrative: Narrative,
    cluster: ArticleCluster,
    now: Date,
  ): { narrative: Narrative; reason: SummaryTaskReason } | null {
    const held = new Set(narrative.articleIds);
    const incoming = cluster.articles
      .filter((article) => !held.has(article.id))
      .map(toNarrativeArticle);
    if (incoming.length === 0) {
      return null;
    }

    const { narrative: updated, reactivated } = this.recompute(
      narrative,
      unionArticles(narrative.articles, incoming),
      mergeSalience(narrative.entitySalience, cluster.actorSalience),
      now,
    );
    return {
      narrative: updated,
      reason: reactivated ? 'reactivated' : 'articles_added',
    };
  }

  /** Applies a cluster and persists it together with its summary task. */
  async mergeCluster(
    narrative: Narrative,
    cluster: ArticleCluster,
    now: Date,
  ): Promise<Narrative | null> {
    const applied = this.applyCluster(narrative, cluster, now);
    if (!applied) {
      return null;
    }
    return this.store.save(applied.narrative, {
      expectedRevision: narrative.revision,
      outbox: this.summaryTask(narrative.id, applied.reason, now),
    });
  }

  /** Union of two stored narratives; `primary` keeps its identity. Nothing is written. */
  mergeNarratives(primary: Narrative, loser: Narrative, now: Date): Narrative {
    const { narrative } = this.recompute(
      primary,
      unionArticles(primary.articles, loser.articles),
      mergeSalience(primary.entitySalience, loser.entitySalience),
      now,
    );
    return {
      ...narrative,
      reawakeningCount: Math.max(
        narrative.reawakeningCount,
        loser.reawakeningCount,
      ),
      mergedFrom: [...new Set([...primary.mergedFrom, loser.id, ...loser.mergedFrom])],
      mergedAt: now.toISOString(),
    };
  }

  summaryTask(
    narrativeId: string,
    reason: SummaryTaskReason,
    now: Date,
  ): SummaryTask {
    return {
      narrativeId,
      reason,
      enqueuedAt: now.toISOString(),
      attempts: 0,
    };
  }

  private recompute(
    base: Narrative,
    articles: NarrativeArticle[],
    entitySalience: Record<string, number>,
    now: Date,
  ): { narrative: Narrative; reactivated: boolean } {
    const result = this.fingerprintService.compute(
      base.fingerprint.nucleusEntity,
      entitySalience,
      articles.flatMap((article) => article.actions),
      now,
    );
    if (!result.ok) {
      throw new NarrativeValidationError(
        `cannot recompute fingerprint: ${result.reason} (${result.nucleusEntity || 'empty'})`,
        base.id,
      );
    }

    const publishedAt = articles.map((article) => article.publishedAt);
    const firstSeen = minIso([base.firstSeen, ...publishedAt]);
    const draft: Narrative = {
      ...base,
      fingerprint: result.fingerprint,
      articleIds: articles.map((article) => article.id),
      articles,
      entitySalience,
      firstSeen,
      lastUpdated: maxIso(publishedAt),
      needsSummaryUpdate: true,
    };
    const evaluation = this.lifecycleService.evaluate(draft, now);
    const timeline = buildTimeline(articles, this.config.velocityWindowDays);
    const narrative: Narrative = {
      ...draft,
      ...lifecycleFields(evaluation),
      timeline,
      peakActivity: findPeakActivity(timeline),
    };
    assertNarrativeInvariants(narrative);
    return { narrative, reactivated: evaluation.reactivated };
  }
}
