/**
 * Error types for indexing and retrieval operations.
 */
export enum NotebookIndexErrorType {
  /** A backup file or remote unit cannot be read */
  SOURCE_UNREADABLE = 'SOURCE_UNREADABLE',
  /** Text or images of a page/section could not be extracted */
  EXTRACTION_FAILURE = 'EXTRACTION_FAILURE',
  /** The embedding producer failed or returned an unusable vector */
  EMBEDDING_UNAVAILABLE = 'EMBEDDING_UNAVAILABLE',
  /** The persisted index cannot be read or has an incompatible version */
  INDEX_CORRUPT = 'INDEX_CORRUPT',
  OCR_UNAVAILABLE = 'OCR_UNAVAILABLE',
  /** The index lock could not be acquired in time */
  INDEX_BUSY = 'INDEX_BUSY',
  INDEX_PERSIST_FAILED = 'INDEX_PERSIST_FAILED',
  REMOTE_API = 'REMOTE_API',
  NOT_FOUND = 'NOT_FOUND',
  CONFIGURATION = 'CONFIGURATION',
}

/**
 * Error raised by the notebook index.
 */
export class NotebookIndexError extends Error {
  constructor(
    message: string,
    public readonly type: NotebookIndexErrorType,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'NotebookIndexError';
  }

  /**
   * Whether the same call may succeed if repeated later.
   */
  get retryable(): boolean {
    switch (this.type) {
      case NotebookIndexErrorType.INDEX_BUSY:
      case NotebookIndexErrorType.INDEX_PERSIST_FAILED:
        return true;
      case NotebookIndexErrorType.REMOTE_API: {
        const status = this.context?.['status'];
        return typeof status === 'number' && (status === 429 || status >= 500);
      }
      default:
        return false;
    }
  }

  /**
   * Format the error for an agent reading a tool result.
   */
  toToolMessage(): string {
    const hint = this.retryable ? ' This is temporary; retry shortly.' : '';
    return `${this.message}${hint}`;
  }
}

export function isNotebookIndexError(
  error: unknown,
  type?: NotebookIndexErrorType,
): error is NotebookIndexError {
  return (
    error instanceof NotebookIndexError &&
    (type === undefined || error.type === type)
  );
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
