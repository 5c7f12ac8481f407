import { Inject, Injectable } from '@nestjs/common';
import { SIMILARITY_WEIGHTS } from '../config/narrative.constants';
import { NARRATIVE_CONFIG, NarrativeConfig } from '../config/narrative.config';
import { NarrativeStore } from '../store/narrative.store';
import {
  Fingerprint,
  MatchCandidateScore,
  Narrative,
} from '../types/narrative.types';
import { hoursBetween, shiftDays, toTime } from '../utils/date.util';
import { jaccard, phraseSet, roundTo } from '../utils/similarity.util';

export function computeSimilarity(a: Fingerprint, b: Fingerprint): number {
  const nucleusA = a.nucleusEntity.trim();
  const nucleusB = b.nucleusEntity.trim();
  const exact = nucleusA !== '' && nucleusA === nucleusB ? 1 : 0;
  const sameIgnoringCase =
    nucleusA !== '' && nucleusA.toLowerCase() === nucleusB.toLowerCase();

  const score =
    SIMILARITY_WEIGHTS.nucleus * exact +
    SIMILARITY_WEIGHTS.actors *
      jaccard(new Set(Object.keys(a.topActors)), new Set(Object.keys(b.topActors))) +
    SIMILARITY_WEIGHTS.actions *
      jaccard(phraseSet(a.keyActions), phraseSet(b.keyActions)) +
    (sameIgnoringCase ? SIMILARITY_WEIGHTS.nucleusBonus : 0);

  return roundTo(Math.max(0, Math.min(1, score)));
}

/** Recently active narratives are easier to join. */
export function resolveMatchThreshold(
  hoursSinceUpdate: number,
  config: Pick<
    NarrativeConfig,
    'recentWindowHours' | 'recentMatchThreshold' | 'matchThreshold'
  >,
): number {
  return hoursSinceUpdate <= config.recentWindowHours
    ? config.recentMatchThreshold
    : config.matchThreshold;
}

/** Similarity, then article count, then recency, then age. */
export function compareCandidates(
  a: MatchCandidateScore,
  b: MatchCandidateScore,
): number {
  return (
    b.similarity - a.similarity ||
    b.narrative.articleIds.length - a.narrative.articleIds.length ||
    toTime(b.narrative.lastUpdated) - toTime(a.narrative.lastUpdated) ||
    toTime(a.narrative.createdAt) - toTime(b.narrative.createdAt)
  );
}

@Injectable()
export class NarrativeMatcherService {
  constructor(
    private readonly store: NarrativeStore,
    @Inject(NARRATIVE_CONFIG) private readonly config: NarrativeConfig,
  ) {}

  async loadCandidates(now: Date): Promise<Narrative[]> {
    return this.store.findCandidates({
      updatedSince: shiftDays(now, this.config.matchWindowDays),
      dormantUpdatedSince: shiftDays(now, this.config.reactivationWindowDays),
    });
  }

  scoreCandidates(
    fingerprint: Fingerprint,
    candidates: Narrative[],
    now: Date,
  ): MatchCandidateScore[] {
    return candidates
      .filter((narrative) => narrative.fingerprint.nucleusEntity.trim() !== '')
      .map((narrative) => ({
        narrative,
        similarity: computeSimilarity(fingerprint, narrative.fingerprint),
        threshold: resolveMatchThreshold(
          hoursBetween(narrative.lastUpdated, now),
          this.config,
        ),
      }));
  }

  selectMatch(
    fingerprint: Fingerprint,
    candidates: Narrative[],
    now: Date,
  ): MatchCandidateScore | null {
    const qualifying = this.scoreCandidates(fingerprint, candidates, now)
      .filter((score) => score.similarity >= score.threshold)
      .sort(compareCandidates);
    return qualifying[0] ?? null;
  }
}
