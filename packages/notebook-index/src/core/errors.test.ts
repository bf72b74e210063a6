import { describe, it, expect } from 'vitest';
import {
  NotebookIndexError,
  NotebookIndexErrorType,
  errorMessage,
  isNotebookIndexError,
} from './errors.js';

describe('NotebookIndexError', () => {
  it('should mark lock and persist failures as retryable', () => {
    const busy = new NotebookIndexError(
      'Index is busy',
      NotebookIndexErrorType.INDEX_BUSY,
    );
    const corrupt = new NotebookIndexError(
      'Bad index',
      NotebookIndexErrorType.INDEX_CORRUPT,
    );

    expect(busy.retryable).toBe(true);
    expect(corrupt.retryable).toBe(false);
    expect(busy.name).toBe('NotebookIndexError');
  });

  it('should treat rate limits and server errors as retryable', () => {
    const rateLimited = new NotebookIndexError(
      'Rate limited',
      NotebookIndexErrorType.REMOTE_API,
      { status: 429 },
    );
    const unauthorized = new NotebookIndexError(
      'Authentication expired',
      NotebookIndexErrorType.REMOTE_API,
      { status: 401 },
    );

    expect(rateLimited.retryable).toBe(true);
    expect(unauthorized.retryable).toBe(false);
  });

  it('should format tool messages with a retry hint', () => {
    const error = new NotebookIndexError(
      'Index is busy.',
      NotebookIndexErrorType.INDEX_BUSY,
    );

    expect(error.toToolMessage()).toBe(
      'Index is busy. This is temporary; retry shortly.',
    );
  });

  it('should narrow by type', () => {
    const error: unknown = new NotebookIndexError(
      'Missing',
      NotebookIndexErrorType.NOT_FOUND,
    );

    expect(isNotebookIndexError(error)).toBe(true);
    expect(isNotebookIndexError(error, NotebookIndexErrorType.NOT_FOUND)).toBe(
      true,
    );
    expect(isNotebookIndexError(error, NotebookIndexErrorType.INDEX_BUSY)).toBe(
      false,
    );
    expect(errorMessage('plain')).toBe('plain');
  });
});
