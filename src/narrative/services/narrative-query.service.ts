import { Inject, Injectable } from '@nestjs/common';
import { LIST_DEFAULT_LIMIT } from '../config/narrative.constants';
import { NARRATIVE_CONFIG, NarrativeConfig } from '../config/narrative.config';
import { NarrativeNotFoundError } from '../errors/narrative.errors';
import { NarrativeStore } from '../store/narrative.store';
import {
  LifecycleState,
  Narrative,
  NarrativeDetail,
  NarrativeListItem,
  ResurrectionListItem,
} from '../types/narrative.types';
import { DAY_MS, shiftDays, toTime } from '../utils/date.util';

export const ACTIVE_STATES: LifecycleState[] = [
  'emerging',
  'rising',
  'hot',
  'cooling',
  'reactivated',
];

export function hasValidFingerprint(narrative: Narrative): boolean {
  return Boolean(narrative.fingerprint?.nucleusEntity?.trim());
}

export function toListItem(narrative: Narrative): NarrativeListItem {
  return {
    id: narrative.id,
    title: narrative.title,
    summary: narrative.summary,
    lifecycleState: narrative.lifecycleState,
    articleCount: narrative.articleIds.length,
    mentionVelocity: narrative.mentionVelocity,
    momentum: narrative.momentum,
    firstSeen: narrative.firstSeen,
    lastUpdated: narrative.lastUpdated,
  };
}

export function daysActive(narrative: Narrative): number {
  const span = toTime(narrative.lastUpdated) - toTime(narrative.firstSeen);
  return Math.max(1, Math.floor(span / DAY_MS) + 1);
}

@Injectable()
export class NarrativeQueryService {
  constructor(
    private readonly store: NarrativeStore,
    @Inject(NARRATIVE_CONFIG) private readonly config: NarrativeConfig,
  ) {}

  async listActive(
    options: { state?: LifecycleState; limit?: number } = {},
  ): Promise<NarrativeListItem[]> {
    const narratives = await this.store.findByStates({
      states: options.state ? [options.state] : ACTIVE_STATES,
    });
    return this.visible(narratives, options.limit).map(toListItem);
  }

  async listArchived(
    options: { days?: number; limit?: number; now?: Date } = {},
  ): Promise<NarrativeListItem[]> {
    const narratives = await this.store.findByStates({
      states: ['dormant'],
      updatedSince: shiftDays(
        options.now ?? new Date(),
        options.days ?? this.config.archiveWindowDays,
      ),
    });
    return this.visible(narratives, options.limit).map(toListItem);
  }

  async listResurrections(
    options: { days?: number; limit?: number; now?: Date } = {},
  ): Promise<ResurrectionListItem[]> {
    const narratives = await this.store.findResurrected({
      updatedSince:
        options.days != null
          ? shiftDays(options.now ?? new Date(), options.days)
          : undefined,
    });
    return this.visible(narratives, options.limit).map((narrative) => ({
      ...toListItem(narrative),
      reawakeningCount: narrative.reawakeningCount,
      resurrectionVelocity: narrative.resurrectionVelocity,
      reawakenedFrom: narrative.reawakenedFrom,
    }));
  }

  async getDetail(id: string): Promise<NarrativeDetail> {
    const narrative = await this.store.findById(id);
    if (!narrative || !hasValidFingerprint(narrative)) {
      throw new NarrativeNotFoundError(id);
    }
    return {
      ...toListItem(narrative),
      fingerprint: narrative.fingerprint,
      entitySalience: narrative.entitySalience,
      articleIds: narrative.articleIds,
      lifecycleHistory: narrative.lifecycleHistory,
      timeline: narrative.timeline,
      peakActivity: narrative.peakActivity,
      daysActive: daysActive(narrative),
      reawakeningCount: narrative.reawakeningCount,
      resurrectionVelocity: narrative.resurrectionVelocity,
      reawakenedFrom: narrative.reawakenedFrom,
      needsSummaryUpdate: narrative.needsSummaryUpdate,
      mergedFrom: narrative.mergedFrom,
      mergedAt: narrative.mergedAt,
    };
  }

  // limit 은 invalid record 를 걸러낸 뒤에 적용
  private visible(narratives: Narrative[], limit = LIST_DEFAULT_LIMIT): Narrative[] {
    return narratives.filter(hasValidFingerprint).slice(0, limit);
  }
}
