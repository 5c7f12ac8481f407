export class NarrativeValidationError extends Error {
  constructor(
    message: string,
    readonly narrativeId?: string,
  ) {
    super(message);
    this.name = 'NarrativeValidationError';
  }
}

export class DuplicateNarrativeError extends Error {
  constructor(
    readonly creationKey: string,
    readonly existingId: string,
  ) {
    super(`narrative already exists for creationKey=${creationKey}`);
    this.name = 'DuplicateNarrativeError';
  }
}

export class NarrativeConflictError extends Error {
  constructor(
    readonly narrativeId: string,
    readonly expectedRevision: number,
    readonly actualRevision: number | null,
  ) {
    super(
      `narrative ${narrativeId} changed concurrently (expected revision=${expectedRevision}, actual=${actualRevision ?? 'deleted'})`,
    );
    this.name = 'NarrativeConflictError';
  }
}

export class NarrativeNotFoundError extends Error {
  constructor(readonly narrativeId: string) {
    super(`narrative ${narrativeId} not found`);
    this.name = 'NarrativeNotFoundError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
