/**
 * TesseractJsProvider - OCR provider using tesseract.js.
 * Runs locally; language data is downloaded on first use and cached.
 */

import { mkdir } from 'node:fs/promises';
import type { Worker as TesseractWorker } from 'tesseract.js';
import type { OcrProvider } from './types.js';
import { createModuleLogger } from '../core/Logger.js';
import {
  NotebookIndexError,
  NotebookIndexErrorType,
  errorMessage,
} from '../core/errors.js';

const log = createModuleLogger('TesseractJsProvider');

// ============================================================================
// Configuration
// ============================================================================

export interface TesseractJsProviderConfig {
  /** Tesseract language codes (ISO 639-3, e.g. 'eng', 'deu') */
  languages?: string[];
  /** Directory for downloaded language data */
  cachePath?: string;
}

/**
 * Map ISO 639-1 (2-letter) to the 3-letter codes Tesseract uses.
 */
const LANG_MAP: Record<string, string> = {
  en: 'eng',
  de: 'deu',
  fr: 'fra',
  es: 'spa',
  it: 'ita',
  pt: 'por',
  nl: 'nld',
  ru: 'rus',
  zh: 'chi_sim',
  ja: 'jpn',
  ko: 'kor',
};

function toTesseractLang(lang: string): string {
  if (lang.length >= 3) {
    return lang;
  }
  return LANG_MAP[lang.toLowerCase()] ?? lang;
}

// ============================================================================
// TesseractJsProvider Implementation
// ============================================================================

export class TesseractJsProvider implements OcrProvider {
  readonly name = 'tesseract-js';

  private readonly languages: string[];
  private readonly cachePath?: string;
  private worker: TesseractWorker | null = null;
  private initializing: Promise<boolean> | null = null;

  constructor(config: TesseractJsProviderConfig = {}) {
    this.languages = (config.languages ?? ['eng']).map(toTesseractLang);
    this.cachePath = config.cachePath;
  }

  async isAvailable(): Promise<boolean> {
    if (this.worker) return true;
    this.initializing ??= this.initialize();
    return this.initializing;
  }

  private async initialize(): Promise<boolean> {
    try {
      if (this.cachePath) {
        await mkdir(this.cachePath, { recursive: true });
      }

      const { createWorker } = await import('tesseract.js');

      // tesseract.js 5.x API: createWorker(langs, oem, options)
      this.worker = await createWorker(
        this.languages.join('+'),
        1, // OEM_LSTM_ONLY
        this.cachePath ? { cachePath: this.cachePath } : {},
      );
      log.info('Tesseract worker ready', { languages: this.languages });
      return true;
    } catch (error) {
      log.warn('OCR unavailable, images will contribute no text', {
        error: errorMessage(error),
      });
      return false;
    }
  }

  async recognize(image: Uint8Array): Promise<string> {
    const worker = (await this.isAvailable()) ? this.worker : null;
    if (!worker) {
      throw new NotebookIndexError(
        'Tesseract.js could not be initialized',
        NotebookIndexErrorType.OCR_UNAVAILABLE,
      );
    }

    try {
      const result = await worker.recognize(Buffer.from(image));
      return result.data.text.trim();
    } catch (error) {
      throw new Error(`OCR recognition failed: ${errorMessage(error)}`);
    }
  }

  async dispose(): Promise<void> {
    const worker = this.worker;
    this.worker = null;
    this.initializing = null;
    if (worker) {
      await worker.terminate();
    }
  }
}
