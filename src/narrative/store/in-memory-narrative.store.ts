import {
  emptyStoreState,
  NarrativeStoreState,
  StateBackedNarrativeStore,
} from './state-backed.store';

/** Process-local store. Used by tests and when NARRATIVE_STORE_DRIVER=memory. */
export class InMemoryNarrativeStore extends StateBackedNarrativeStore {
  private state: NarrativeStoreState;

  constructor(initial: NarrativeStoreState = emptyStoreState()) {
    super();
    this.state = structuredClone(initial);
  }

  protected async readState(): Promise<NarrativeStoreState> {
    return this.state;
  }

  protected async mutate<T>(
    mutation: (draft: NarrativeStoreState) => T,
  ): Promise<T> {
    const draft = structuredClone(this.state);
    const result = mutation(draft);
    this.state = draft;
    return result;
  }
}
