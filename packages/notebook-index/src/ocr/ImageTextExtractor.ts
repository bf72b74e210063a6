/**
 * ImageTextExtractor - text for embedded images, cache first.
 *
 * Lookup order: OCR cache, then the OCR provider (if available). New results
 * are written back to the cache. Every failure degrades to empty text.
 */

import type { ImageRef } from '../types.js';
import type { OcrProvider } from './types.js';
import { OCR_IMAGE_EXTENSIONS, normalizeImageExtension } from './types.js';
import type { OcrCache } from './OcrCache.js';
import { computeImageFingerprint } from '../hashing/ContentHasher.js';
import { createModuleLogger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';

const log = createModuleLogger('ImageTextExtractor');

/** An image as delivered by a backend. */
export interface ImageBlob {
  bytes?: Uint8Array;
  /** File extension, with or without the dot */
  extension?: string;
  /** MIME type, used when there is no extension */
  contentType?: string;
}

export class ImageTextExtractor {
  constructor(
    private readonly cache: OcrCache,
    private readonly provider: OcrProvider,
  ) {}

  get providerName(): string {
    return this.provider.name;
  }

  async extract(image: ImageBlob): Promise<ImageRef> {
    const extension = normalizeImageExtension(image.extension, image.contentType);

    if (!image.bytes || image.bytes.length === 0) {
      return { fingerprint: '', extension, ocrText: '' };
    }

    const fingerprint = computeImageFingerprint(image.bytes);
    if (!OCR_IMAGE_EXTENSIONS.has(extension)) {
      return { fingerprint, extension, ocrText: '' };
    }

    return { fingerprint, extension, ocrText: await this.textFor(fingerprint, image.bytes) };
  }

  private async textFor(fingerprint: string, bytes: Uint8Array): Promise<string> {
    const cached = await this.cache.lookup(fingerprint);
    if (cached !== undefined) {
      return cached;
    }

    if (!(await this.provider.isAvailable())) {
      return '';
    }

    let text: string;
    try {
      text = (await this.provider.recognize(bytes)).trim();
    } catch (error) {
      log.debug('OCR failed for image', {
        fingerprint,
        error: errorMessage(error),
      });
      return '';
    }

    try {
      await this.cache.store(fingerprint, text);
    } catch (error) {
      log.warn('Could not cache OCR result', { error: errorMessage(error) });
    }
    return text;
  }
}
