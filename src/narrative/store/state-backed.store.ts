import {
  DuplicateNarrativeError,
  NarrativeConflictError,
  NarrativeValidationError,
} from '../errors/narrative.errors';
import { Narrative, SummaryTask } from '../types/narrative.types';
import { toTime } from '../utils/date.util';
import {
  CandidateQuery,
  MergeCommit,
  NarrativeStore,
  SaveOptions,
  StateQuery,
} from './narrative.store';

export interface NarrativeStoreState {
  narratives: Record<string, Narrative>;
  outbox: Record<string, SummaryTask>;
}

export function emptyStoreState(): NarrativeStoreState {
  return { narratives: {}, outbox: {} };
}

/**
 * Shared query and mutation rules for stores that keep the whole state as one
 * document. Subclasses decide where the document lives and how a mutation is
 * persisted; a mutation that throws must leave the persisted state untouched.
 */
export abstract class StateBackedNarrativeStore extends NarrativeStore {
  protected abstract readState(): Promise<NarrativeStoreState>;

  protected abstract mutate<T>(
    mutation: (draft: NarrativeStoreState) => T,
  ): Promise<T>;

  async findById(id: string): Promise<Narrative | null> {
    const state = await this.readState();
    const found = state.narratives[id];
    return found ? structuredClone(found) : null;
  }

  async findAll(): Promise<Narrative[]> {
    const state = await this.readState();
    return this.sortByRecency(Object.values(state.narratives)).map((item) =>
      structuredClone(item),
    );
  }

  async findCandidates(query: CandidateQuery): Promise<Narrative[]> {
    const state = await this.readState();
    const updatedSince = query.updatedSince.getTime();
    const dormantSince = query.dormantUpdatedSince?.getTime();

    const matches = Object.values(state.narratives).filter((narrative) => {
      const updatedAt = toTime(narrative.lastUpdated);
      if (updatedAt >= updatedSince) {
        return true;
      }
      const isQuiet =
        narrative.lifecycleState === 'dormant' ||
        narrative.lifecycleState === 'echo';
      return isQuiet && dormantSince != null && updatedAt >= dormantSince;
    });
    return this.sortByRecency(matches).map((item) => structuredClone(item));
  }

  async findByStates(query: StateQuery): Promise<Narrative[]> {
    const state = await this.readState();
    const states = new Set(query.states);
    const updatedSince = query.updatedSince?.getTime();
    const matches = Object.values(state.narratives).filter(
      (narrative) =>
        states.has(narrative.lifecycleState) &&
        (updatedSince == null ||
          toTime(narrative.lastUpdated) >= updatedSince),
    );
    return this.limit(this.sortByRecency(matches), query.limit);
  }

  async findResurrected(query: {
    updatedSince?: Date;
    limit?: number;
  }): Promise<Narrative[]> {
    const state = await this.readState();
    const updatedSince = query.updatedSince?.getTime();
    const matches = Object.values(state.narratives).filter(
      (narrative) =>
        narrative.reawakeningCount > 0 &&
        (updatedSince == null ||
          toTime(narrative.lastUpdated) >= updatedSince),
    );
    return this.limit(this.sortByRecency(matches), query.limit);
  }

  async findAssignedArticleIds(articleIds: string[]): Promise<Set<string>> {
    const state = await this.readState();
    const wanted = new Set(articleIds);
    const assigned = new Set<string>();
    for (const narrative of Object.values(state.narratives)) {
      for (const articleId of narrative.articleIds) {
        if (wanted.has(articleId)) {
          assigned.add(articleId);
        }
      }
    }
    return assigned;
  }

  async create(narrative: Narrative): Promise<Narrative> {
    this.assertStorable(narrative);
    return this.mutate((draft) => {
      if (draft.narratives[narrative.id]) {
        throw new DuplicateNarrativeError(narrative.creationKey, narrative.id);
      }
      const twin = Object.values(draft.narratives).find(
        (existing) => existing.creationKey === narrative.creationKey,
      );
      if (twin) {
        throw new DuplicateNarrativeError(narrative.creationKey, twin.id);
      }
      const stored: Narrative = { ...structuredClone(narrative), revision: 1 };
      draft.narratives[stored.id] = stored;
      return structuredClone(stored);
    });
  }

  async save(narrative: Narrative, options: SaveOptions): Promise<Narrative> {
    this.assertStorable(narrative);
    return this.mutate((draft) => {
      const stored = this.writeChecked(
        draft,
        narrative,
        options.expectedRevision,
      );
      if (options.outbox) {
        this.putTask(draft, options.outbox);
      }
      return structuredClone(stored);
    });
  }

  async commitMerge(commit: MergeCommit): Promise<Narrative> {
    this.assertStorable(commit.primary);
    return this.mutate((draft) => {
      const loser = draft.narratives[commit.loserId];
      if (!loser || loser.revision !== commit.loserRevision) {
        throw new NarrativeConflictError(
          commit.loserId,
          commit.loserRevision,
          loser?.revision ?? null,
        );
      }
      const stored = this.writeChecked(
        draft,
        commit.primary,
        commit.primaryRevision,
      );
      delete draft.narratives[commit.loserId];
      delete draft.outbox[commit.loserId];
      if (commit.outbox) {
        this.putTask(draft, commit.outbox);
      }
      return structuredClone(stored);
    });
  }

  async enqueueSummaryTask(task: SummaryTask): Promise<void> {
    await this.mutate((draft) => {
      this.putTask(draft, task);
    });
  }

  async listSummaryTasks(limit: number): Promise<SummaryTask[]> {
    const state = await this.readState();
    return Object.values(state.outbox)
      .sort((a, b) => toTime(a.enqueuedAt) - toTime(b.enqueuedAt))
      .slice(0, Math.max(0, limit))
      .map((task) => ({ ...task }));
  }

  async completeSummaryTask(narrativeId: string): Promise<void> {
    await this.mutate((draft) => {
      delete draft.outbox[narrativeId];
    });
  }

  async retrySummaryTask(narrativeId: string): Promise<SummaryTask | null> {
    return this.mutate((draft) => {
      const task = draft.outbox[narrativeId];
      if (!task) {
        return null;
      }
      task.attempts += 1;
      return { ...task };
    });
  }

  private writeChecked(
    draft: NarrativeStoreState,
    narrative: Narrative,
    expectedRevision: number,
  ): Narrative {
    const current = draft.narratives[narrative.id];
    if (!current || current.revision !== expectedRevision) {
      throw new NarrativeConflictError(
        narrative.id,
        expectedRevision,
        current?.revision ?? null,
      );
    }
    const stored: Narrative = {
      ...structuredClone(narrative),
      creationKey: current.creationKey,
      revision: current.revision + 1,
    };
    draft.narratives[stored.id] = stored;
    return stored;
  }

  private putTask(draft: NarrativeStoreState, task: SummaryTask): void {
    const existing = draft.outbox[task.narrativeId];
    draft.outbox[task.narrativeId] = existing
      ? { ...existing, reason: task.reason }
      : { ...task };
  }

  // 저장 직전 최종 방어선
  private assertStorable(narrative: Narrative): void {
    if (!narrative.fingerprint.nucleusEntity.trim()) {
      throw new NarrativeValidationError(
        'fingerprint.nucleusEntity must not be empty',
        narrative.id,
      );
    }
    if (toTime(narrative.firstSeen) > toTime(narrative.lastUpdated)) {
      throw new NarrativeValidationError(
        `firstSeen (${narrative.firstSeen}) is after lastUpdated (${narrative.lastUpdated})`,
        narrative.id,
      );
    }
    if (new Set(narrative.articleIds).size !== narrative.articleIds.length) {
      throw new NarrativeValidationError(
        'articleIds must not contain duplicates',
        narrative.id,
      );
    }
  }

  private sortByRecency(narratives: Narrative[]): Narrative[] {
    return [...narratives].sort(
      (a, b) =>
        toTime(b.lastUpdated) - toTime(a.lastUpdated) ||
        a.id.localeCompare(b.id),
    );
  }

  private limit(narratives: Narrative[], limit?: number): Narrative[] {
    const sliced = limit == null ? narratives : narratives.slice(0, limit);
    return sliced.map((item) => structuredClone(item));
  }
}
