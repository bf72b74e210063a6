/**
 * OCR capability interface.
 * Providers turn image bytes into text; the rest of the index never talks to
 * an OCR engine directly.
 */
export interface OcrProvider {
  readonly name: string;

  /**
   * Whether recognition can run on this machine.
   * Resolved once; later calls return the cached answer.
   */
  isAvailable(): Promise<boolean>;

  /**
   * Recognize text in an encoded image (PNG, JPEG, ...).
   * @returns Recognized text, trimmed; '' when nothing was found
   */
  recognize(image: Uint8Array): Promise<string>;

  /** Release workers and other resources. */
  dispose(): Promise<void>;
}

/** Image formats sent to OCR, by lowercase extension. */
export const OCR_IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png',
  '.jpg',
  '.jpeg',
  '.gif',
  '.bmp',
  '.tiff',
  '.tif',
]);

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  'image/png': '.png',
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg',
  'image/gif': '.gif',
  'image/bmp': '.bmp',
  'image/tiff': '.tiff',
  'image/webp': '.webp',
  'image/svg+xml': '.svg',
};

/**
 * Normalize an extension ('PNG', 'png', '.png') or a content type
 * ('image/png; charset=binary') to a lowercase dotted extension.
 */
export function normalizeImageExtension(
  extension?: string,
  contentType?: string,
): string {
  if (extension && extension.trim().length > 0) {
    const ext = extension.trim().toLowerCase();
    return ext.startsWith('.') ? ext : `.${ext}`;
  }
  if (contentType) {
    const mime = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
    return CONTENT_TYPE_EXTENSIONS[mime] ?? '';
  }
  return '';
}
