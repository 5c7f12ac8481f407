import path from 'node:path';

function envNumber(
  name: string,
  fallback: number,
  bounds: { min?: number; max?: number } = {},
): number {
  const raw = Number(process.env[name] ?? fallback);
  if (!Number.isFinite(raw)) {
    return fallback;
  }
  const lower = bounds.min ?? Number.NEGATIVE_INFINITY;
  const upper = bounds.max ?? Number.POSITIVE_INFINITY;
  return Math.max(lower, Math.min(upper, raw));
}

function envList(name: string, fallback: string[]): string[] {
  const raw = process.env[name];
  if (raw == null) {
    return fallback;
  }
  return raw
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

export const SERVICE_NAME = 'news-narrative-engine';

// 매칭 후보 윈도우 / 임계값
export const MATCH_WINDOW_DAYS = envNumber('MATCH_WINDOW_DAYS', 14, { min: 1 });
export const REACTIVATION_WINDOW_DAYS = envNumber(
  'REACTIVATION_WINDOW_DAYS',
  30,
  { min: 1 },
);
export const MATCH_THRESHOLD = envNumber('MATCH_THRESHOLD', 0.6, {
  min: 0,
  max: 1,
});
export const RECENT_MATCH_THRESHOLD = envNumber(
  'RECENT_MATCH_THRESHOLD',
  0.5,
  { min: 0, max: 1 },
);
export const RECENT_WINDOW_HOURS = envNumber('RECENT_WINDOW_HOURS', 48, {
  min: 0,
});
export const CLUSTER_GROUPING_THRESHOLD = envNumber(
  'CLUSTER_GROUPING_THRESHOLD',
  0.3,
  { min: 0, max: 1 },
);

export const SIMILARITY_WEIGHTS = {
  nucleus: 0.45,
  actors: 0.35,
  actions: 0.2,
  nucleusBonus: 0.1,
} as const;

export const CLUSTER_ACTOR_WEIGHT = 0.7;
export const CLUSTER_TENSION_WEIGHT = 0.3;

export const FINGERPRINT_TOP_ACTORS = 5;
export const FINGERPRINT_KEY_ACTIONS = 3;

export const VELOCITY_WINDOW_DAYS = envNumber('VELOCITY_WINDOW_DAYS', 7, {
  min: 1,
});
export const MOMENTUM_GROWING_RATIO = 1.3;
export const MOMENTUM_DECLINING_RATIO = 0.7;
export const MOMENTUM_MIN_ARTICLES = 3;

export const LIFECYCLE_DORMANT_DAYS = 7;
export const LIFECYCLE_COOLING_DAYS = 3;
export const LIFECYCLE_HOT_ARTICLES = 7;
export const LIFECYCLE_HOT_VELOCITY = 3.0;
export const LIFECYCLE_RISING_VELOCITY = 1.5;
export const LIFECYCLE_REACTIVATION_ARTICLES = 4;
export const LIFECYCLE_ECHO_MAX_ARTICLES = 3;
export const LIFECYCLE_BURST_WINDOW_HOURS = 48;

export const SHALLOW_MIN_ARTICLES = 3;
export const SHALLOW_MIN_ACTORS = 3;
export const SHALLOW_ABSORB_JACCARD = 0.5;

export const ARCHIVE_WINDOW_DAYS = envNumber('ARCHIVE_WINDOW_DAYS', 30, {
  min: 1,
});
export const LIST_DEFAULT_LIMIT = 50;
export const LIST_MAX_LIMIT = 200;

export const EXTRACTION_CONCURRENCY = Math.floor(
  envNumber('EXTRACTION_CONCURRENCY', 4, { min: 1, max: 32 }),
);
export const EXTRACTION_INPUT_MAX_CHARS = envNumber(
  'EXTRACTION_INPUT_MAX_CHARS',
  4000,
  { min: 200 },
);

export const SUMMARY_MAX_ATTEMPTS = Math.floor(
  envNumber('SUMMARY_MAX_ATTEMPTS', 3, { min: 1 }),
);
export const SUMMARY_BATCH_LIMIT = Math.floor(
  envNumber('SUMMARY_BATCH_LIMIT', 20, { min: 1 }),
);
export const SUMMARY_RECENT_ARTICLES = 5;

export const AI_PROVIDER = (process.env.AI_PROVIDER ?? 'gemini')
  .trim()
  .toLowerCase();

// 광고/보도자료 aggregator 등 노이즈 엔티티
export const DEFAULT_DENY_ENTITIES = envList('NARRATIVE_DENY_ENTITIES', [
  'Benzinga',
  'PR Newswire',
  'GlobeNewswire',
  'Business Wire',
]);
export const DEFAULT_UBIQUITOUS_ENTITIES = envList(
  'NARRATIVE_UBIQUITOUS_ENTITIES',
  ['Bitcoin', 'Ethereum', 'crypto', 'blockchain', 'cryptocurrency'],
);

export const NARRATIVE_STORE_DRIVER =
  (process.env.NARRATIVE_STORE ?? 'file').trim().toLowerCase() === 'memory'
    ? 'memory'
    : 'file';

const dataDir = process.env.DATA_DIR ?? path.join(process.cwd(), 'data');
export const NARRATIVES_JSON =
  process.env.NARRATIVES_JSON ?? path.join(dataDir, 'narratives.json');
