import type { Page } from '../types.js';

export const OCR_TEXT_PREFIX = '[OCR from image]: ';

/**
 * Plain text of a page: text runs, then one line per image with OCR text.
 */
export function composePageText(page: Pick<Page, 'texts' | 'images'>): string {
  const lines = [...page.texts];
  for (const image of page.images) {
    if (image.ocrText.length > 0) {
      lines.push(`${OCR_TEXT_PREFIX}${image.ocrText}`);
    }
  }
  return lines.join('\n');
}

/**
 * Text sent to the embedding producer for a page.
 */
export function composeEmbeddingInput(
  page: Pick<Page, 'title' | 'texts' | 'images'>,
): string {
  return `${page.title}\n${composePageText(page)}`;
}

export function hasIndexableText(page: Pick<Page, 'texts' | 'images'>): boolean {
  return composePageText(page).trim().length > 0;
}

/**
 * Leading slice of the page text, with '...' when cut.
 */
export function leadingSnippet(text: string, length: number): string {
  const trimmed = text.trim();
  return trimmed.length > length ? `${trimmed.slice(0, length)}...` : trimmed;
}

/**
 * First case-insensitive occurrence of `query` in `text`, as offsets into
 * `text`. Characters whose lowercase form has a different length (such as
 * 'İ') are mapped back to their original span.
 */
export function findCaseInsensitive(
  text: string,
  query: string,
): { index: number; length: number } | null {
  const needle = Array.from(query, (char) => char.toLowerCase()).join('');
  if (needle.length === 0) return null;

  let folded = '';
  // Original span of each folded code unit
  const starts: number[] = [];
  const ends: number[] = [];
  let offset = 0;
  for (const char of text) {
    const lower = char.toLowerCase();
    for (let i = 0; i < lower.length; i++) {
      starts.push(offset);
      ends.push(offset + char.length);
    }
    folded += lower;
    offset += char.length;
  }

  const position = folded.indexOf(needle);
  if (position < 0) return null;
  const start = starts[position] ?? 0;
  const end = ends[position + needle.length - 1] ?? text.length;
  return { index: start, length: end - start };
}

/**
 * Window around a match at `index`, with '...' on each cut side.
 */
export function matchSnippet(
  text: string,
  index: number,
  matchLength: number,
  context: number,
): string {
  const start = Math.max(0, index - context);
  const end = Math.min(text.length, index + matchLength + context);
  let snippet = text.slice(start, end).trim();
  if (start > 0) snippet = `...${snippet}`;
  if (end < text.length) snippet = `${snippet}...`;
  return snippet;
}
