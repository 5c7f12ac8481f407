import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  LIFECYCLE_BURST_WINDOW_HOURS,
  LIFECYCLE_COOLING_DAYS,
  LIFECYCLE_DORMANT_DAYS,
  LIFECYCLE_ECHO_MAX_ARTICLES,
  LIFECYCLE_HOT_ARTICLES,
  LIFECYCLE_HOT_VELOCITY,
  LIFECYCLE_REACTIVATION_ARTICLES,
  LIFECYCLE_RISING_VELOCITY,
  MOMENTUM_DECLINING_RATIO,
  MOMENTUM_GROWING_RATIO,
  MOMENTUM_MIN_ARTICLES,
} from '../config/narrative.constants';
import { NARRATIVE_CONFIG, NarrativeConfig } from '../config/narrative.config';
import {
  describeError,
  NarrativeConflictError,
} from '../errors/narrative.errors';
import { NarrativeStore } from '../store/narrative.store';
import {
  LifecycleDecision,
  LifecycleEvaluation,
  LifecycleHistoryEntry,
  LifecycleSignals,
  LifecycleState,
  Momentum,
  Narrative,
} from '../types/narrative.types';
import { DAY_MS, daysBetween, HOUR_MS, maxIso, toTime } from '../utils/date.util';
import { roundTo } from '../utils/similarity.util';

export type LifecycleSubject = Pick<
  Narrative,
  | 'articles'
  | 'lifecycleState'
  | 'lifecycleHistory'
  | 'reawakeningCount'
  | 'resurrectionVelocity'
  | 'reawakenedFrom'
>;

const QUIET_STATES: ReadonlySet<LifecycleState> = new Set(['dormant', 'echo']);

/** Articles inside [now - windowDays, now], divided by the window length. */
export function calculateRecentVelocity(
  publishedAt: string[],
  now: Date,
  windowDays: number,
): number {
  const end = now.getTime();
  const start = end - windowDays * DAY_MS;
  const count = publishedAt.filter((iso) => {
    const time = toTime(iso);
    return time >= start && time <= end;
  }).length;
  return roundTo(count / windowDays);
}

export function calculateMomentum(
  publishedAt: string[],
  now: Date,
  windowDays: number,
): Momentum {
  const end = now.getTime();
  const start = end - windowDays * DAY_MS;
  const inWindow = publishedAt
    .map(toTime)
    .filter((time) => time >= start && time <= end);
  if (inWindow.length < MOMENTUM_MIN_ARTICLES) {
    return 'unknown';
  }

  const halfDays = windowDays / 2;
  const mid = end - halfDays * DAY_MS;
  const later = inWindow.filter((time) => time >= mid).length / halfDays;
  const earlier = inWindow.filter((time) => time < mid).length / halfDays;

  if (earlier === 0) {
    return 'growing';
  }
  if (later >= earlier * MOMENTUM_GROWING_RATIO) {
    return 'growing';
  }
  if (later <= earlier * MOMENTUM_DECLINING_RATIO) {
    return 'declining';
  }
  return 'stable';
}

/**
 * A narrative is quiet when it is stored as dormant/echo, or when its stored
 * state predates a week-long gap that nobody re-evaluated. A narrative being
 * created has no earlier state and is never quiet.
 */
function isQuiet(signals: LifecycleSignals): boolean {
  if (signals.previousState === null) {
    return false;
  }
  if (QUIET_STATES.has(signals.previousState)) {
    return true;
  }
  const stateIsStale =
    signals.daysSinceStateChange == null ||
    signals.daysSinceStateChange * 24 >= LIFECYCLE_BURST_WINDOW_HOURS;
  return (
    stateIsStale &&
    signals.daysSincePriorActivity != null &&
    signals.daysSincePriorActivity >= LIFECYCLE_DORMANT_DAYS
  );
}

/**
 * Deterministic state policy. Rules are checked in order and the first one
 * that fires wins.
 */
export function determineLifecycleState(
  signals: LifecycleSignals,
): LifecycleDecision {
  if (signals.daysSinceLastUpdate >= LIFECYCLE_DORMANT_DAYS) {
    return { state: 'dormant', reactivated: false };
  }

  const quiet = isQuiet(signals);
  if (quiet && signals.articlesLast48h >= LIFECYCLE_REACTIVATION_ARTICLES) {
    return {
      state: 'reactivated',
      reactivated: signals.previousState !== 'reactivated',
    };
  }

  const lightPulse =
    signals.articlesLast24h >= 1 &&
    signals.articlesLast24h <= LIFECYCLE_ECHO_MAX_ARTICLES &&
    signals.articlesLast48h < LIFECYCLE_REACTIVATION_ARTICLES;
  const lingeringEcho =
    signals.previousState === 'echo' &&
    signals.articlesLast48h < LIFECYCLE_REACTIVATION_ARTICLES;
  if ((quiet && lightPulse) || lingeringEcho) {
    return { state: 'echo', reactivated: false };
  }

  if (signals.daysSinceLastUpdate >= LIFECYCLE_COOLING_DAYS) {
    return { state: 'cooling', reactivated: false };
  }
  if (
    signals.articleCount >= LIFECYCLE_HOT_ARTICLES ||
    signals.mentionVelocity >= LIFECYCLE_HOT_VELOCITY
  ) {
    return { state: 'hot', reactivated: false };
  }
  if (signals.mentionVelocity >= LIFECYCLE_RISING_VELOCITY) {
    return { state: 'rising', reactivated: false };
  }
  return { state: 'emerging', reactivated: false };
}

export function lifecycleFields(
  evaluation: LifecycleEvaluation,
): Omit<LifecycleEvaluation, 'reactivated'> {
  return {
    lifecycleState: evaluation.lifecycleState,
    lifecycleHistory: evaluation.lifecycleHistory,
    mentionVelocity: evaluation.mentionVelocity,
    momentum: evaluation.momentum,
    reawakeningCount: evaluation.reawakeningCount,
    resurrectionVelocity: evaluation.resurrectionVelocity,
    reawakenedFrom: evaluation.reawakenedFrom,
  };
}

/** Appends only when the state changes, or when there is no history yet. */
export function appendHistory(
  history: LifecycleHistoryEntry[],
  entry: LifecycleHistoryEntry,
): LifecycleHistoryEntry[] {
  const last = history[history.length - 1];
  if (last && last.state === entry.state) {
    return history;
  }
  return [...history, entry];
}

@Injectable()
export class NarrativeLifecycleService {
  private readonly logger = new Logger(NarrativeLifecycleService.name);

  constructor(
    private readonly store: NarrativeStore,
    @Inject(NARRATIVE_CONFIG) private readonly config: NarrativeConfig,
  ) {}

  computeSignals(
    publishedAt: string[],
    previousState: LifecycleState | null,
    now: Date,
    stateChangedAt: string | null = null,
  ): LifecycleSignals {
    const nowMs = now.getTime();
    const times = publishedAt.map(toTime);
    const within = (hours: number) =>
      times.filter((time) => time >= nowMs - hours * HOUR_MS).length;
    const prior = publishedAt.filter(
      (iso) => toTime(iso) < nowMs - LIFECYCLE_BURST_WINDOW_HOURS * HOUR_MS,
    );
    const priorActivityAt = prior.length > 0 ? maxIso(prior) : null;
    const lastUpdated = publishedAt.length > 0 ? maxIso(publishedAt) : null;

    return {
      articleCount: publishedAt.length,
      mentionVelocity: calculateRecentVelocity(
        publishedAt,
        now,
        this.config.velocityWindowDays,
      ),
      momentum: calculateMomentum(
        publishedAt,
        now,
        this.config.velocityWindowDays,
      ),
      daysSinceLastUpdate: lastUpdated ? daysBetween(lastUpdated, now) : 0,
      articlesLast24h: within(24),
      articlesLast48h: within(LIFECYCLE_BURST_WINDOW_HOURS),
      daysSincePriorActivity: priorActivityAt
        ? daysBetween(priorActivityAt, now)
        : null,
      priorActivityAt,
      previousState,
      daysSinceStateChange:
        previousState !== null && stateChangedAt
          ? daysBetween(stateChangedAt, now)
          : null,
    };
  }

  /**
   * Evaluates a narrative's article set at `now`. Pass `previousState = null`
   * for a narrative that is being created.
   */
  evaluate(
    subject: LifecycleSubject,
    now: Date,
    previousState: LifecycleState | null = subject.lifecycleState,
  ): LifecycleEvaluation {
    const publishedAt = subject.articles.map((article) => article.publishedAt);
    const lastChange = subject.lifecycleHistory.at(-1);
    const signals = this.computeSignals(
      publishedAt,
      previousState,
      now,
      lastChange?.timestamp ?? null,
    );
    const decision = determineLifecycleState(signals);

    let reawakeningCount = subject.reawakeningCount;
    let resurrectionVelocity = subject.resurrectionVelocity;
    let reawakenedFrom = subject.reawakenedFrom;
    if (decision.reactivated) {
      reawakeningCount += 1;
      resurrectionVelocity = roundTo(signals.articlesLast48h / 2);
      reawakenedFrom = signals.priorActivityAt;
    }

    return {
      lifecycleState: decision.state,
      lifecycleHistory: appendHistory(subject.lifecycleHistory, {
        state: decision.state,
        timestamp: now.toISOString(),
        articleCount: signals.articleCount,
        mentionVelocity: signals.mentionVelocity,
      }),
      mentionVelocity: signals.mentionVelocity,
      momentum: signals.momentum,
      reawakeningCount,
      resurrectionVelocity,
      reawakenedFrom,
      reactivated: decision.reactivated,
    };
  }

  /** Re-evaluates every stored narrative so quiet ones decay without new articles. */
  async refreshAll(now: Date): Promise<number> {
    const startedAt = Date.now();
    const narratives = await this.store.findAll();
    let updated = 0;
    let conflicts = 0;
    let failed = 0;

    for (const narrative of narratives) {
      const evaluation = this.evaluate(narrative, now);
      if (
        evaluation.lifecycleState === narrative.lifecycleState &&
        evaluation.mentionVelocity === narrative.mentionVelocity &&
        evaluation.momentum === narrative.momentum
      ) {
        continue;
      }

      const { reactivated } = evaluation;
      try {
        await this.store.save(
          {
            ...narrative,
            ...lifecycleFields(evaluation),
            needsSummaryUpdate: narrative.needsSummaryUpdate || reactivated,
          },
          {
            expectedRevision: narrative.revision,
            outbox: reactivated
              ? {
                  narrativeId: narrative.id,
                  reason: 'reactivated',
                  enqueuedAt: now.toISOString(),
                  attempts: 0,
                }
              : undefined,
          },
        );
        updated += 1;
      } catch (error) {
        // 다음 사이클에서 다시 평가
        if (error instanceof NarrativeConflictError) {
          conflicts += 1;
          this.logger.warn(`lifecycle refresh skipped: ${error.message}`);
          continue;
        }
        failed += 1;
        this.logger.warn(
          `lifecycle refresh failed: narrative=${narrative.id} error=${describeError(error)}`,
        );
      }
    }

    this.logger.log(
      `stage lifecycle done: scanned=${narratives.length} updated=${updated} conflicts=${conflicts} failed=${failed} elapsedMs=${Date.now() - startedAt}`,
    );
    return updated;
  }
}
