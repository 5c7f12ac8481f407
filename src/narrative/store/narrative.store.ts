import {
  LifecycleState,
  Narrative,
  SummaryTask,
} from '../types/narrative.types';

export interface CandidateQuery {
  updatedSince: Date;
  /** Dormant/echo narratives updated after this instant are also candidates. */
  dormantUpdatedSince?: Date;
}

export interface StateQuery {
  states: LifecycleState[];
  updatedSince?: Date;
  limit?: number;
}

export interface SaveOptions {
  expectedRevision: number;
  outbox?: SummaryTask;
}

export interface MergeCommit {
  primary: Narrative;
  primaryRevision: number;
  loserId: string;
  loserRevision: number;
  outbox?: SummaryTask;
}

/**
 * Persistence contract for narratives and the summary outbox.
 *
 * Every write is checked against the caller's `revision` and applied
 * all-or-nothing. `commitMerge` writes the primary and deletes the loser in
 * one step, so a failed merge leaves both records as they were.
 */
export abstract class NarrativeStore {
  abstract findById(id: string): Promise<Narrative | null>;

  abstract findAll(): Promise<Narrative[]>;

  abstract findCandidates(query: CandidateQuery): Promise<Narrative[]>;

  abstract findByStates(query: StateQuery): Promise<Narrative[]>;

  abstract findResurrected(query: {
    updatedSince?: Date;
    limit?: number;
  }): Promise<Narrative[]>;

  /** Returns the subset of `articleIds` already owned by some narrative. */
  abstract findAssignedArticleIds(articleIds: string[]): Promise<Set<string>>;

  /** Throws DuplicateNarrativeError when `creationKey` is taken. */
  abstract create(narrative: Narrative): Promise<Narrative>;

  /** Throws NarrativeConflictError when the stored revision differs. */
  abstract save(narrative: Narrative, options: SaveOptions): Promise<Narrative>;

  abstract commitMerge(commit: MergeCommit): Promise<Narrative>;

  abstract enqueueSummaryTask(task: SummaryTask): Promise<void>;

  abstract listSummaryTasks(limit: number): Promise<SummaryTask[]>;

  abstract completeSummaryTask(narrativeId: string): Promise<void>;

  abstract retrySummaryTask(narrativeId: string): Promise<SummaryTask | null>;
}
