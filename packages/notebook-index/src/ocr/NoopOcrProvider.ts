import type { OcrProvider } from './types.js';
import { NotebookIndexError, NotebookIndexErrorType } from '../core/errors.js';

/**
 * Provider for machines without OCR, or when OCR is disabled.
 * Images then contribute cached text only.
 */
export class NoopOcrProvider implements OcrProvider {
  readonly name = 'none';

  async isAvailable(): Promise<boolean> {
    return false;
  }

  async recognize(): Promise<string> {
    throw new NotebookIndexError(
      'OCR is not available',
      NotebookIndexErrorType.OCR_UNAVAILABLE,
    );
  }

  async dispose(): Promise<void> {}
}
