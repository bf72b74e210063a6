/**
 * OCR module: provider selection, cache and image text extraction.
 */

import type { OcrConfig } from '../config.js';
import type { OcrProvider } from './types.js';
import { NoopOcrProvider } from './NoopOcrProvider.js';
import { TesseractJsProvider } from './TesseractJsProvider.js';

export type { OcrProvider } from './types.js';
export { OCR_IMAGE_EXTENSIONS, normalizeImageExtension } from './types.js';
export { NoopOcrProvider } from './NoopOcrProvider.js';
export {
  TesseractJsProvider,
  type TesseractJsProviderConfig,
} from './TesseractJsProvider.js';
export { OcrCache, type OcrCacheEntry } from './OcrCache.js';
export { ImageTextExtractor, type ImageBlob } from './ImageTextExtractor.js';

/**
 * Pick the OCR provider once, at configuration time.
 */
export function createOcrProvider(
  config: OcrConfig,
  languageDataDir?: string,
): OcrProvider {
  if (!config.enabled) {
    return new NoopOcrProvider();
  }
  return new TesseractJsProvider({
    languages: config.languages,
    cachePath: languageDataDir,
  });
}
