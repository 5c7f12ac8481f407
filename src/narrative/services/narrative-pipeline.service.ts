import { Injectable, Logger } from '@nestjs/common';
import {
  describeError,
  DuplicateNarrativeError,
  NarrativeConflictError,
} from '../errors/narrative.errors';
import { NarrativeStore } from '../store/narrative.store';
import {
  Article,
  ArticleCluster,
  CycleReport,
  Fingerprint,
  Narrative,
} from '../types/narrative.types';
import { ClusterBuilderService } from './cluster-builder.service';
import { EntityExtractionService } from './entity-extraction.service';
import { FingerprintService } from './fingerprint.service';
import { NarrativeLifecycleService } from './narrative-lifecycle.service';
import { NarrativeMatcherService } from './narrative-matcher.service';
import { NarrativeMergeService } from './narrative-merge.service';
import { NarrativeSummaryService } from './narrative-summary.service';

/** Candidate narratives for one cycle, refreshed as clusters land. */
type CandidateSnapshot = Map<string, Narrative>;

function uniqueById(articles: Article[]): Article[] {
  const seen = new Set<string>();
  return articles.filter((article) => {
    if (seen.has(article.id)) {
      return false;
    }
    seen.add(article.id);
    return true;
  });
}

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) {
    list.push(value);
  }
}

@Injectable()
export class NarrativePipelineService {
  private readonly logger = new Logger(NarrativePipelineService.name);
  private readonly inFlightCycles = new Map<string, Promise<CycleReport>>();

  constructor(
    private readonly store: NarrativeStore,
    private readonly extractionService: EntityExtractionService,
    private readonly clusterBuilder: ClusterBuilderService,
    private readonly fingerprintService: FingerprintService,
    private readonly matcher: NarrativeMatcherService,
    private readonly mergeService: NarrativeMergeService,
    private readonly lifecycleService: NarrativeLifecycleService,
    private readonly summaryService: NarrativeSummaryService,
  ) {}

  async runCycle(
    articles: Article[],
    now: Date = new Date(),
  ): Promise<CycleReport> {
    const lockKey = [...new Set(articles.map((article) => article.id))]
      .sort()
      .join('|');

    const inFlight = this.inFlightCycles.get(lockKey);
    if (inFlight) {
      return inFlight;
    }

    const task = this.runCycleCore(articles, now);
    this.inFlightCycles.set(lockKey, task);
    try {
      return await task;
    } finally {
      if (this.inFlightCycles.get(lockKey) === task) {
        this.inFlightCycles.delete(lockKey);
      }
    }
  }

  private async runCycleCore(
    articles: Article[],
    now: Date,
  ): Promise<CycleReport> {
    const startedAt = Date.now();
    const report: CycleReport = {
      received: articles.length,
      extracted: 0,
      extractionFailed: 0,
      skippedAssigned: 0,
      clusters: 0,
      rejected: {},
      created: [],
      merged: [],
      failed: [],
      lifecycleUpdated: 0,
    };

    // 이미 내러티브에 속한 기사는 추출 전에 제외 (재실행 멱등성)
    const unique = uniqueById(articles);
    const assigned = await this.store.findAssignedArticleIds(
      unique.map((article) => article.id),
    );
    const fresh = unique.filter((article) => !assigned.has(article.id));
    report.skippedAssigned = unique.length - fresh.length;

    const extraction = await this.extractionService.extractBatch(fresh);
    report.extracted = extraction.articles.length;
    report.extractionFailed = extraction.failedIds.length;

    const clusters = this.clusterBuilder.build(extraction.articles);
    report.clusters = clusters.length;

    const snapshot: CandidateSnapshot = new Map(
      (await this.matcher.loadCandidates(now)).map((narrative) => [
        narrative.id,
        narrative,
      ]),
    );

    for (const cluster of clusters) {
      try {
        await this.processCluster(cluster, snapshot, report, now);
      } catch (error) {
        const firstId = cluster.articles[0]?.id ?? 'unknown';
        report.failed.push(firstId);
        this.logger.warn(
          `cluster failed: article=${firstId} nucleus=${cluster.nucleusEntity} error=${describeError(error)}`,
        );
      }
    }
    this.logger.log(
      `stage assignment done: clusters=${clusters.length} created=${report.created.length} merged=${report.merged.length} failed=${report.failed.length}`,
    );

    report.lifecycleUpdated = await this.lifecycleService.refreshAll(now);

    this.logger.log(
      `stage cycle done: received=${report.received} skipped=${report.skippedAssigned} extracted=${report.extracted} elapsedMs=${Date.now() - startedAt}`,
    );
    return report;
  }

  private async processCluster(
    cluster: ArticleCluster,
    snapshot: CandidateSnapshot,
    report: CycleReport,
    now: Date,
  ): Promise<void> {
    const result = this.fingerprintService.computeForCluster(cluster, now);
    if (!result.ok) {
      report.rejected[result.reason] = (report.rejected[result.reason] ?? 0) + 1;
      this.logger.warn(
        `cluster rejected: reason=${result.reason} nucleus=${result.nucleusEntity || '(empty)'} articles=${cluster.articles.length}`,
      );
      return;
    }

    const match = this.matcher.selectMatch(
      result.fingerprint,
      [...snapshot.values()],
      now,
    );
    if (match) {
      await this.mergeInto(match.narrative, cluster, snapshot, report, now);
      return;
    }

    await this.createOrMergeTwin(
      cluster,
      result.fingerprint,
      snapshot,
      report,
      now,
    );
  }

  private async createOrMergeTwin(
    cluster: ArticleCluster,
    fingerprint: Fingerprint,
    snapshot: CandidateSnapshot,
    report: CycleReport,
    now: Date,
  ): Promise<void> {
    const text = await this.summaryService.textForCluster(cluster, fingerprint);
    try {
      const created = await this.mergeService.createNarrative(
        cluster,
        fingerprint,
        text,
        now,
      );
      snapshot.set(created.id, created);
      report.created.push(created.id);
    } catch (error) {
      if (!(error instanceof DuplicateNarrativeError)) {
        throw error;
      }
      const twin = await this.store.findById(error.existingId);
      if (!twin) {
        throw error;
      }
      this.logger.log(
        `create raced: creationKey=${error.creationKey} merging into=${twin.id}`,
      );
      await this.mergeInto(twin, cluster, snapshot, report, now);
    }
  }

  /** Merges with one retry against the stored record when the revision moved. */
  private async mergeInto(
    narrative: Narrative,
    cluster: ArticleCluster,
    snapshot: CandidateSnapshot,
    report: CycleReport,
    now: Date,
  ): Promise<void> {
    let saved: Narrative | null;
    try {
      saved = await this.mergeService.mergeCluster(narrative, cluster, now);
    } catch (error) {
      if (!(error instanceof NarrativeConflictError)) {
        throw error;
      }
      const current = await this.store.findById(narrative.id);
      if (!current) {
        throw error;
      }
      this.logger.warn(`merge retry: ${error.message}`);
      saved = await this.mergeService.mergeCluster(current, cluster, now);
    }

    if (!saved) {
      return;
    }
    snapshot.set(saved.id, saved);
    pushUnique(report.merged, saved.id);
  }
}
