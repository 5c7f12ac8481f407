import {
  ARCHIVE_WINDOW_DAYS,
  CLUSTER_GROUPING_THRESHOLD,
  DEFAULT_DENY_ENTITIES,
  DEFAULT_UBIQUITOUS_ENTITIES,
  EXTRACTION_CONCURRENCY,
  MATCH_THRESHOLD,
  MATCH_WINDOW_DAYS,
  REACTIVATION_WINDOW_DAYS,
  RECENT_MATCH_THRESHOLD,
  RECENT_WINDOW_HOURS,
  SUMMARY_MAX_ATTEMPTS,
  VELOCITY_WINDOW_DAYS,
} from './narrative.constants';

export const NARRATIVE_CONFIG = Symbol('NARRATIVE_CONFIG');

export interface NarrativeConfig {
  /** Nucleus entities that never form a narrative, compared case-insensitively. */
  denyEntities: string[];
  /** Nuclei too broad to stand alone while a narrative is still thin. */
  ubiquitousEntities: string[];
  matchWindowDays: number;
  reactivationWindowDays: number;
  matchThreshold: number;
  recentMatchThreshold: number;
  recentWindowHours: number;
  clusterGroupingThreshold: number;
  velocityWindowDays: number;
  archiveWindowDays: number;
  extractionConcurrency: number;
  summaryMaxAttempts: number;
}

export function buildNarrativeConfig(
  overrides: Partial<NarrativeConfig> = {},
): NarrativeConfig {
  return {
    denyEntities: DEFAULT_DENY_ENTITIES,
    ubiquitousEntities: DEFAULT_UBIQUITOUS_ENTITIES,
    matchWindowDays: MATCH_WINDOW_DAYS,
    reactivationWindowDays: REACTIVATION_WINDOW_DAYS,
    matchThreshold: MATCH_THRESHOLD,
    recentMatchThreshold: RECENT_MATCH_THRESHOLD,
    recentWindowHours: RECENT_WINDOW_HOURS,
    clusterGroupingThreshold: CLUSTER_GROUPING_THRESHOLD,
    velocityWindowDays: VELOCITY_WINDOW_DAYS,
    archiveWindowDays: ARCHIVE_WINDOW_DAYS,
    extractionConcurrency: EXTRACTION_CONCURRENCY,
    summaryMaxAttempts: SUMMARY_MAX_ATTEMPTS,
    ...overrides,
  };
}
