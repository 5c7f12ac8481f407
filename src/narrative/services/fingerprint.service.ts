import { Inject, Injectable } from '@nestjs/common';
import {
  FINGERPRINT_KEY_ACTIONS,
  FINGERPRINT_TOP_ACTORS,
} from '../config/narrative.constants';
import { NARRATIVE_CONFIG, NarrativeConfig } from '../config/narrative.config';
import { ArticleCluster, FingerprintResult } from '../types/narrative.types';
import { isListedEntity } from '../utils/entity.util';
import { normalizePhraseKey } from '../utils/similarity.util';
import { cleanText } from '../utils/text.util';

export function selectTopActors(
  actorSalience: Record<string, number>,
  limit = FINGERPRINT_TOP_ACTORS,
): Record<string, number> {
  const ranked = Object.entries(actorSalience).sort(
    ([nameA, a], [nameB, b]) => b - a || nameA.localeCompare(nameB),
  );
  return Object.fromEntries(ranked.slice(0, limit));
}

/** Most frequent distinct actions; ties keep the order of first appearance. */
export function selectKeyActions(
  actions: string[],
  limit = FINGERPRINT_KEY_ACTIONS,
): string[] {
  const stats = new Map<string, { label: string; count: number; first: number }>();
  actions.forEach((action, index) => {
    const label = cleanText(action);
    const key = normalizePhraseKey(label);
    if (!key) {
      return;
    }
    const entry = stats.get(key);
    if (entry) {
      entry.count += 1;
    } else {
      stats.set(key, { label, count: 1, first: index });
    }
  });
  return [...stats.values()]
    .sort((a, b) => b.count - a.count || a.first - b.first)
    .slice(0, limit)
    .map((entry) => entry.label);
}

@Injectable()
export class FingerprintService {
  constructor(
    @Inject(NARRATIVE_CONFIG) private readonly config: NarrativeConfig,
  ) {}

  compute(
    nucleusEntity: string,
    actorSalience: Record<string, number>,
    actions: string[],
    now: Date,
  ): FingerprintResult {
    const nucleus = cleanText(nucleusEntity);
    if (!nucleus) {
      return { ok: false, reason: 'empty_nucleus', nucleusEntity: nucleus };
    }
    if (isListedEntity(nucleus, this.config.denyEntities)) {
      return { ok: false, reason: 'denied_entity', nucleusEntity: nucleus };
    }
    return {
      ok: true,
      fingerprint: {
        nucleusEntity: nucleus,
        topActors: selectTopActors(actorSalience),
        keyActions: selectKeyActions(actions),
        computedAt: now.toISOString(),
      },
    };
  }

  computeForCluster(cluster: ArticleCluster, now: Date): FingerprintResult {
    return this.compute(
      cluster.nucleusEntity,
      cluster.actorSalience,
      cluster.articles.flatMap((article) => article.extraction.actions),
      now,
    );
  }
}
