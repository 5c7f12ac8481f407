import { Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  emptyStoreState,
  NarrativeStoreState,
  StateBackedNarrativeStore,
} from './state-backed.store';

function isStoreState(value: unknown): value is NarrativeStoreState {
  if (!value || typeof value !== 'object') {
    return false;
  }
  if (!('narratives' in value) || !('outbox' in value)) {
    return false;
  }
  return (
    typeof value.narratives === 'object' &&
    value.narratives !== null &&
    typeof value.outbox === 'object' &&
    value.outbox !== null
  );
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Keeps the whole store in one JSON document. Writes go through a temp file
 * and a rename, and are serialized so two mutations never interleave.
 */
export class JsonFileNarrativeStore extends StateBackedNarrativeStore {
  private readonly logger = new Logger(JsonFileNarrativeStore.name);
  private cache: NarrativeStoreState | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly filePath: string) {
    super();
  }

  protected async readState(): Promise<NarrativeStoreState> {
    await this.queue.catch(() => undefined);
    return this.load();
  }

  protected mutate<T>(
    mutation: (draft: NarrativeStoreState) => T,
  ): Promise<T> {
    const run = this.queue
      .catch(() => undefined)
      .then(async () => {
        const current = await this.load();
        const draft = structuredClone(current);
        const result = mutation(draft);
        await this.safeWriteJson(draft);
        this.cache = draft;
        return result;
      });
    this.queue = run;
    return run;
  }

  private async load(): Promise<NarrativeStoreState> {
    if (this.cache) {
      return this.cache;
    }
    const loaded = await this.safeReadJson();
    this.cache = loaded;
    return loaded;
  }

  private async safeReadJson(): Promise<NarrativeStoreState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return emptyStoreState();
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isStoreState(parsed)) {
      throw new Error(`narrative store file is malformed: ${this.filePath}`);
    }
    this.logger.log(
      `store loaded: narratives=${Object.keys(parsed.narratives).length} outbox=${Object.keys(parsed.outbox).length}`,
    );
    return parsed;
  }

  private async safeWriteJson(payload: NarrativeStoreState): Promise<void> {
    const dir = path.dirname(this.filePath);
    const base = path.basename(this.filePath);
    const tmpPath = path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);

    await fs.mkdir(dir, { recursive: true });
    try {
      await fs.writeFile(
        tmpPath,
        `${JSON.stringify(payload, null, 2)}\n`,
        'utf-8',
      );
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.unlink(tmpPath).catch(() => undefined);
      throw error;
    }
  }
}
