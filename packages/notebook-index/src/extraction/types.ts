/**
 * Page backend contract shared by the local and remote sources.
 */

import type { EnumerationResult, Page, Provenance, SourceUnit } from '../types.js';

/** A page left out of an otherwise readable unit. */
export interface SkippedPage {
  pageId: string;
  title: string;
  message: string;
}

export interface PageBackend {
  readonly provenance: Provenance;

  /**
   * List notebooks and indexable units. Unreadable entries become warnings.
   */
  enumerate(): Promise<EnumerationResult>;

  /**
   * Materialize every page of one unit, OCR text included. A single page
   * that cannot be read is left out and reported through `onSkipped`.
   * @throws NotebookIndexError (SOURCE_UNREADABLE or EXTRACTION_FAILURE)
   */
  extractPages(unit: SourceUnit, onSkipped?: (page: SkippedPage) => void): Promise<Page[]>;

  /** Drop memoized pages and cached listings. */
  invalidate(): void;
}

/**
 * Page id suffix for the n-th page with the same title in a unit.
 */
export function disambiguateTitle(
  seen: Map<string, number>,
  title: string,
): string {
  const count = (seen.get(title) ?? 0) + 1;
  seen.set(title, count);
  return count === 1 ? title : `${title}#${count}`;
}
