export class NotesError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotesError';
  }
}

/**
 * The AI service could not produce a result for one note: timeout, bad
 * response or service unavailable. `retryable` marks the transient cases.
 */
export class EnrichmentError extends NotesError {
  readonly retryable: boolean;

  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'EnrichmentError';
    this.retryable = options.retryable ?? false;
  }
}

export class PersistenceError extends NotesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export class InvalidRequestError extends NotesError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

export class NotFoundError extends NotesError {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
