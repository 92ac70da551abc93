export type VocabErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'CORRUPT_DATA'
  | 'PERSISTENCE_WRITE'
  | 'STORAGE_LOCATION';

export abstract class VocabError extends Error {
  abstract readonly code: VocabErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** An input was empty or out of range. The operation did not change anything. */
export class ValidationError extends VocabError {
  readonly code = 'VALIDATION';

  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
  }
}

export class NotFoundError extends VocabError {
  readonly code = 'NOT_FOUND';

  constructor(
    readonly entity: 'deck' | 'card',
    readonly id: string,
  ) {
    super(`${entity === 'deck' ? 'Deck' : 'Card'} not found: ${id}`);
  }
}

/** The persisted document exists but does not match the deck schema. */
export class CorruptDataError extends VocabError {
  readonly code = 'CORRUPT_DATA';

  constructor(
    message: string,
    readonly filePath: string,
    readonly fieldPath?: string,
    options?: { cause?: unknown },
  ) {
    super(fieldPath ? `${message} at ${fieldPath}` : message, options);
  }
}

export class PersistenceWriteError extends VocabError {
  readonly code = 'PERSISTENCE_WRITE';

  constructor(
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not save decks to ${filePath}`, options);
  }
}

export class StorageLocationError extends VocabError {
  readonly code = 'STORAGE_LOCATION';
}

export function isVocabError(error: unknown): error is VocabError {
  return error instanceof VocabError;
}

function messageOf(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string') {
    return value.message;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  const message = messageOf(error);
  if (message === undefined) {
    return String(error);
  }
  const cause = typeof error === 'object' && error !== null && 'cause' in error ? messageOf(error.cause) : undefined;
  return cause === undefined ? message : `${message}: ${cause}`;
}
