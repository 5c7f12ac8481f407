import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  SHALLOW_ABSORB_JACCARD,
  SHALLOW_MIN_ACTORS,
  SHALLOW_MIN_ARTICLES,
} from '../config/narrative.constants';
import { NARRATIVE_CONFIG, NarrativeConfig } from '../config/narrative.config';
import { describeError } from '../errors/narrative.errors';
import { NarrativeStore } from '../store/narrative.store';
import {
  DedupeMergeKind,
  DedupeReport,
  Narrative,
} from '../types/narrative.types';
import { hoursBetween, maxIso, toTime } from '../utils/date.util';
import { isListedEntity } from '../utils/entity.util';
import { jaccard, roundTo } from '../utils/similarity.util';
import { NarrativeMergeService } from './narrative-merge.service';
import {
  computeSimilarity,
  resolveMatchThreshold,
} from './narrative-matcher.service';
import { hasValidFingerprint } from './narrative-query.service';

interface DuplicatePair {
  a: Narrative;
  b: Narrative;
  similarity: number;
}

/** Larger first, then more recent, then older. */
export function comparePrimary(a: Narrative, b: Narrative): number {
  return (
    b.articleIds.length - a.articleIds.length ||
    toTime(b.lastUpdated) - toTime(a.lastUpdated) ||
    toTime(a.createdAt) - toTime(b.createdAt) ||
    a.id.localeCompare(b.id)
  );
}

export function isShallowNarrative(
  narrative: Narrative,
  ubiquitousEntities: string[],
): boolean {
  const articleCount = narrative.articleIds.length;
  if (
    articleCount === 1 &&
    Object.keys(narrative.fingerprint.topActors).length < SHALLOW_MIN_ACTORS
  ) {
    return true;
  }
  return (
    articleCount < SHALLOW_MIN_ARTICLES &&
    isListedEntity(narrative.fingerprint.nucleusEntity, ubiquitousEntities)
  );
}

function topActorJaccard(a: Narrative, b: Narrative): number {
  return jaccard(
    new Set(Object.keys(a.fingerprint.topActors)),
    new Set(Object.keys(b.fingerprint.topActors)),
  );
}

@Injectable()
export class NarrativeDedupeService {
  private readonly logger = new Logger(NarrativeDedupeService.name);

  constructor(
    private readonly store: NarrativeStore,
    private readonly mergeService: NarrativeMergeService,
    @Inject(NARRATIVE_CONFIG) private readonly config: NarrativeConfig,
  ) {}

  async run(now: Date = new Date()): Promise<DedupeReport> {
    const startedAt = Date.now();
    const report: DedupeReport = {
      groupsScanned: 0,
      merges: [],
      deferred: 0,
      errors: [],
    };
    const consumed = new Set<string>();
    const primaries = new Set<string>();

    const narratives = (await this.store.findAll()).filter(hasValidFingerprint);
    const groups = this.groupByNucleus(narratives);
    const pairs: DuplicatePair[] = [];
    for (const group of groups) {
      report.groupsScanned += 1;
      pairs.push(...this.findDuplicatePairs(group, now));
    }
    pairs.sort(
      (x, y) =>
        y.similarity - x.similarity ||
        `${x.a.id}:${x.b.id}`.localeCompare(`${y.a.id}:${y.b.id}`),
    );

    for (const pair of pairs) {
      if (consumed.has(pair.a.id) || consumed.has(pair.b.id)) {
        continue;
      }
      // 연쇄 병합은 다음 실행으로
      if (primaries.has(pair.a.id) || primaries.has(pair.b.id)) {
        report.deferred += 1;
        continue;
      }
      const [primary, loser] = [pair.a, pair.b].sort(comparePrimary);
      await this.tryMerge(primary, loser, pair.similarity, 'duplicate', now, {
        report,
        consumed,
        primaries,
      });
    }

    await this.absorbShallow(now, { report, consumed, primaries });

    this.logger.log(
      `stage dedupe done: groups=${report.groupsScanned} merges=${report.merges.length} deferred=${report.deferred} errors=${report.errors.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return report;
  }

  private groupByNucleus(narratives: Narrative[]): Narrative[][] {
    const groups = new Map<string, Narrative[]>();
    for (const narrative of narratives) {
      const key = narrative.fingerprint.nucleusEntity.trim().toLowerCase();
      const group = groups.get(key) ?? [];
      group.push(narrative);
      groups.set(key, group);
    }
    return [...groups.values()].filter((group) => group.length >= 2);
  }

  private findDuplicatePairs(group: Narrative[], now: Date): DuplicatePair[] {
    const pairs: DuplicatePair[] = [];
    for (let i = 0; i < group.length; i += 1) {
      for (let j = i + 1; j < group.length; j += 1) {
        const a = group[i];
        const b = group[j];
        const similarity = computeSimilarity(a.fingerprint, b.fingerprint);
        const threshold = resolveMatchThreshold(
          hoursBetween(maxIso([a.lastUpdated, b.lastUpdated]), now),
          this.config,
        );
        if (similarity >= threshold) {
          pairs.push({ a, b, similarity });
        }
      }
    }
    return pairs;
  }

  private async absorbShallow(
    now: Date,
    state: {
      report: DedupeReport;
      consumed: Set<string>;
      primaries: Set<string>;
    },
  ): Promise<void> {
    const narratives = (await this.store.findAll()).filter(hasValidFingerprint);
    const substantial = narratives.filter(
      (narrative) => narrative.articleIds.length >= SHALLOW_MIN_ARTICLES,
    );
    const shallow = narratives.filter(
      (narrative) =>
        !state.primaries.has(narrative.id) &&
        isShallowNarrative(narrative, this.config.ubiquitousEntities),
    );

    for (const candidate of shallow) {
      if (state.consumed.has(candidate.id)) {
        continue;
      }
      const best = substantial
        .filter((target) => !state.consumed.has(target.id))
        .map((target) => ({ target, score: topActorJaccard(candidate, target) }))
        .filter(({ score }) => score > SHALLOW_ABSORB_JACCARD)
        .sort(
          (x, y) => y.score - x.score || comparePrimary(x.target, y.target),
        )[0];
      if (!best) {
        continue;
      }
      if (state.primaries.has(best.target.id)) {
        state.report.deferred += 1;
        continue;
      }
      await this.tryMerge(
        best.target,
        candidate,
        roundTo(best.score),
        'shallow',
        now,
        state,
      );
    }
  }

  private async tryMerge(
    primary: Narrative,
    loser: Narrative,
    similarity: number,
    kind: DedupeMergeKind,
    now: Date,
    state: {
      report: DedupeReport;
      consumed: Set<string>;
      primaries: Set<string>;
    },
  ): Promise<void> {
    const label = `${kind} ${primary.id}<-${loser.id}`;
    try {
      const [freshPrimary, freshLoser] = await Promise.all([
        this.store.findById(primary.id),
        this.store.findById(loser.id),
      ]);
      if (
        !freshPrimary ||
        !freshLoser ||
        freshPrimary.revision !== primary.revision ||
        freshLoser.revision !== loser.revision
      ) {
        this.logger.warn(`dedupe skipped: ${label} changed since scan`);
        state.report.deferred += 1;
        return;
      }

      const merged = this.mergeService.mergeNarratives(
        freshPrimary,
        freshLoser,
        now,
      );
      await this.store.commitMerge({
        primary: merged,
        primaryRevision: freshPrimary.revision,
        loserId: freshLoser.id,
        loserRevision: freshLoser.revision,
        outbox: this.mergeService.summaryTask(
          merged.id,
          kind === 'shallow' ? 'absorbed' : 'merged',
          now,
        ),
      });

      state.consumed.add(loser.id);
      state.primaries.add(primary.id);
      state.report.merges.push({
        survivorId: primary.id,
        mergedId: loser.id,
        similarity,
        kind,
      });
    } catch (error) {
      const message = describeError(error);
      this.logger.warn(`dedupe failed: ${label} error=${message}`);
      state.report.errors.push(`${label}: ${message}`);
    }
  }
}
