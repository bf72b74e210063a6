/**
 * Content fingerprints.
 *
 * Page identity (the page id) and change detection (the fingerprint) are kept
 * apart: a rotated backup file gets a new name but the same fingerprints, so
 * its pages are not embedded again.
 */

import { createHash } from 'node:crypto';
import type { Page } from '../types.js';

const FIELD_SEPARATOR = '\u0000';

/**
 * SHA-256 over everything that feeds the page's embedding: title, text runs
 * and OCR text of each image, in order.
 */
export function computePageFingerprint(
  page: Pick<Page, 'title' | 'texts' | 'images'>,
): string {
  const hash = createHash('sha256');
  hash.update(page.title);
  hash.update(FIELD_SEPARATOR);
  for (const text of page.texts) {
    hash.update(text);
    hash.update(FIELD_SEPARATOR);
  }
  hash.update(FIELD_SEPARATOR);
  for (const image of page.images) {
    hash.update(image.ocrText);
    hash.update(FIELD_SEPARATOR);
  }
  return hash.digest('hex');
}

/**
 * SHA-256 of raw image bytes; the OCR cache key.
 */
export function computeImageFingerprint(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}
