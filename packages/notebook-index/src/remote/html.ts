/**
 * Plain text and image references from page HTML.
 */

const SCRIPT_OR_STYLE = /<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const BLOCK_CLOSER = /<\/(?:p|div|h[1-6]|li|tr|br|hr)\b[^>]*>/gi;
const LINE_BREAK = /<br\s*\/?>/gi;
const ANY_TAG = /<[^>]+>/g;
const IMG_TAG = /<img\b[^>]*>/gi;

const MAX_CODE_POINT = 0x10ffff;

const NAMED_ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  amp: '&',
};

/**
 * Decode named and numeric character references.
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body.startsWith('#')) {
      const hex = body[1] === 'x' || body[1] === 'X';
      const code = Number.parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
      return code <= MAX_CODE_POINT ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

/**
 * Readable text of a page: scripts and styles dropped, block ends and <br>
 * turned into line breaks, tags stripped, blank lines removed.
 */
export function htmlToText(html: string): string {
  const text = decodeEntities(
    html
      .replace(SCRIPT_OR_STYLE, '')
      .replace(BLOCK_CLOSER, '\n')
      .replace(LINE_BREAK, '\n')
      .replace(ANY_TAG, ''),
  );

  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

function attribute(tag: string, name: string): string | undefined {
  const match = new RegExp(`\\s${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, 'i').exec(tag);
  if (!match) return undefined;
  return decodeEntities(match[1] ?? match[2] ?? '');
}

export interface HtmlImage {
  src: string;
  /** MIME type announced by the markup, when any */
  contentType?: string;
}

/**
 * Images in document order. The full-resolution source is preferred.
 */
export function extractImages(html: string): HtmlImage[] {
  const images: HtmlImage[] = [];
  for (const [tag] of html.matchAll(IMG_TAG)) {
    const src = attribute(tag, 'data-fullres-src') ?? attribute(tag, 'src');
    if (!src) continue;
    images.push({
      src,
      contentType:
        attribute(tag, 'data-fullres-src-type') ?? attribute(tag, 'data-src-type'),
    });
  }
  return images;
}
