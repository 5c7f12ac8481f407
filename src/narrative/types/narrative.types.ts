export const LIFECYCLE_STATES = [
  'emerging',
  'rising',
  'hot',
  'cooling',
  'dormant',
  'echo',
  'reactivated',
] as const;

export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

export type Momentum = 'growing' | 'declining' | 'stable' | 'unknown';

export interface ArticleExtraction {
  nucleusEntity: string;
  actors: Record<string, number>;
  actions: string[];
  tensions: string[];
  summary: string;
}

export interface Article {
  id: string;
  publishedAt: string;
  source: string;
  title?: string;
  text?: string;
  extraction?: ArticleExtraction;
}

export interface ExtractedArticle extends Article {
  extraction: ArticleExtraction;
}

export interface ArticleCluster {
  nucleusEntity: string;
  articles: ExtractedArticle[];
  actorSalience: Record<string, number>;
  actions: string[];
  tensions: string[];
  firstPublishedAt: string;
  lastPublishedAt: string;
}

export interface Fingerprint {
  nucleusEntity: string;
  topActors: Record<string, number>;
  keyActions: string[];
  computedAt: string;
}

export type FingerprintRejectReason = 'empty_nucleus' | 'denied_entity';

export type FingerprintResult =
  | { ok: true; fingerprint: Fingerprint }
  | { ok: false; reason: FingerprintRejectReason; nucleusEntity: string };

export interface NarrativeArticle {
  id: string;
  publishedAt: string;
  source: string;
  nucleusEntity: string;
  actors: Record<string, number>;
  actions: string[];
  summary: string;
}

export interface LifecycleHistoryEntry {
  state: LifecycleState;
  timestamp: string;
  articleCount: number;
  mentionVelocity: number;
}

export interface TimelineSnapshot {
  date: string;
  articleCount: number;
  entities: string[];
  velocity: number;
}

export interface Narrative {
  kind: 'narrative';
  id: string;
  title: string;
  summary: string;
  fingerprint: Fingerprint;
  articleIds: string[];
  articles: NarrativeArticle[];
  entitySalience: Record<string, number>;
  lifecycleState: LifecycleState;
  lifecycleHistory: LifecycleHistoryEntry[];
  firstSeen: string;
  lastUpdated: string;
  createdAt: string;
  mentionVelocity: number;
  momentum: Momentum;
  reawakeningCount: number;
  resurrectionVelocity: number;
  reawakenedFrom: string | null;
  needsSummaryUpdate: boolean;
  mergedFrom: string[];
  mergedAt: string | null;
  timeline: TimelineSnapshot[];
  peakActivity: TimelineSnapshot | null;
  creationKey: string;
  revision: number;
}

export type SummaryTaskReason =
  | 'merged'
  | 'articles_added'
  | 'absorbed'
  | 'reactivated';

export interface SummaryTask {
  narrativeId: string;
  reason: SummaryTaskReason;
  enqueuedAt: string;
  attempts: number;
}

export interface LifecycleSignals {
  articleCount: number;
  mentionVelocity: number;
  momentum: Momentum;
  daysSinceLastUpdate: number;
  articlesLast24h: number;
  articlesLast48h: number;
  daysSincePriorActivity: number | null;
  priorActivityAt: string | null;
  previousState: LifecycleState | null;
  /** Days since `previousState` was entered; null when unknown or new. */
  daysSinceStateChange: number | null;
}

export interface LifecycleDecision {
  state: LifecycleState;
  reactivated: boolean;
}

export interface LifecycleEvaluation {
  lifecycleState: LifecycleState;
  lifecycleHistory: LifecycleHistoryEntry[];
  mentionVelocity: number;
  momentum: Momentum;
  reawakeningCount: number;
  resurrectionVelocity: number;
  reawakenedFrom: string | null;
  reactivated: boolean;
}

export interface MatchCandidateScore {
  narrative: Narrative;
  similarity: number;
  threshold: number;
}

export interface CycleReport {
  received: number;
  extracted: number;
  extractionFailed: number;
  skippedAssigned: number;
  clusters: number;
  rejected: Record<string, number>;
  created: string[];
  merged: string[];
  failed: string[];
  lifecycleUpdated: number;
}

export type DedupeMergeKind = 'duplicate' | 'shallow';

export interface DedupeMerge {
  survivorId: string;
  mergedId: string;
  similarity: number;
  kind: DedupeMergeKind;
}

export interface DedupeReport {
  groupsScanned: number;
  merges: DedupeMerge[];
  deferred: number;
  errors: string[];
}

export interface SummaryRunReport {
  claimed: number;
  regenerated: number;
  fallback: number;
  retried: number;
  orphaned: number;
}

export interface NarrativeListItem {
  id: string;
  title: string;
  summary: string;
  lifecycleState: LifecycleState;
  articleCount: number;
  mentionVelocity: number;
  momentum: Momentum;
  firstSeen: string;
  lastUpdated: string;
}

export interface ResurrectionListItem extends NarrativeListItem {
  reawakeningCount: number;
  resurrectionVelocity: number;
  reawakenedFrom: string | null;
}

export interface NarrativeDetail extends NarrativeListItem {
  fingerprint: Fingerprint;
  entitySalience: Record<string, number>;
  articleIds: string[];
  lifecycleHistory: LifecycleHistoryEntry[];
  timeline: TimelineSnapshot[];
  peakActivity: TimelineSnapshot | null;
  daysActive: number;
  reawakeningCount: number;
  resurrectionVelocity: number;
  reawakenedFrom: string | null;
  needsSummaryUpdate: boolean;
  mergedFrom: string[];
  mergedAt: string | null;
}
