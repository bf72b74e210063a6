import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { ImageTextExtractor } from './ImageTextExtractor.js';
import { OcrCache } from './OcrCache.js';
import { NoopOcrProvider } from './NoopOcrProvider.js';
import type { OcrProvider } from './types.js';
import { normalizeImageExtension } from './types.js';
import { computeImageFingerprint } from '../hashing/ContentHasher.js';
import { globalLogger, LogLevel } from '../core/Logger.js';

interface FakeOcrProvider extends OcrProvider {
  recognize: Mock<(image: Uint8Array) => Promise<string>>;
}

function createFakeProvider(text = 'recognized'): FakeOcrProvider {
  return {
    name: 'fake',
    isAvailable: vi.fn(async () => true),
    recognize: vi.fn(async (_image: Uint8Array) => `  ${text}  `),
    dispose: vi.fn(async () => {}),
  };
}

describe('ImageTextExtractor', () => {
  let dir: string;
  let cache: OcrCache;
  const bytes = new TextEncoder().encode('fake-png-bytes');

  beforeEach(() => {
    globalLogger.setLevel(LogLevel.SILENT);
    dir = join(tmpdir(), `ocr-extract-test-${randomUUID()}`);
    cache = new OcrCache(dir);
  });

  afterEach(() => {
    globalLogger.setLevel(LogLevel.INFO);
    rmSync(dir, { recursive: true, force: true });
  });

  it('should OCR once and serve repeats from the cache', async () => {
    const provider = createFakeProvider();
    const extractor = new ImageTextExtractor(cache, provider);

    const first = await extractor.extract({ bytes, extension: 'PNG' });
    const second = await extractor.extract({ bytes, extension: '.png' });

    expect(first).toEqual({
      fingerprint: computeImageFingerprint(bytes),
      extension: '.png',
      ocrText: 'recognized',
    });
    expect(second.ocrText).toBe('recognized');
    expect(provider.recognize).toHaveBeenCalledTimes(1);
    expect(await cache.lookup(computeImageFingerprint(bytes))).toBe(
      'recognized',
    );
  });

  it('should use cached text even when OCR is unavailable', async () => {
    await cache.store(computeImageFingerprint(bytes), 'from cache');
    const extractor = new ImageTextExtractor(cache, new NoopOcrProvider());

    const result = await extractor.extract({ bytes, contentType: 'image/jpeg' });

    expect(result.ocrText).toBe('from cache');
    expect(result.extension).toBe('.jpg');
  });

  it('should return empty text when OCR is unavailable and nothing is cached', async () => {
    const extractor = new ImageTextExtractor(cache, new NoopOcrProvider());

    expect((await extractor.extract({ bytes, extension: 'png' })).ocrText).toBe(
      '',
    );
    expect(await cache.size()).toBe(0);
  });

  it('should skip unsupported formats', async () => {
    const provider = createFakeProvider();
    const extractor = new ImageTextExtractor(cache, provider);

    const result = await extractor.extract({ bytes, extension: 'svg' });

    expect(result.ocrText).toBe('');
    expect(provider.recognize).not.toHaveBeenCalled();
  });

  it('should degrade to empty text when recognition fails', async () => {
    const provider = createFakeProvider();
    provider.recognize.mockRejectedValueOnce(new Error('engine crashed'));
    const extractor = new ImageTextExtractor(cache, provider);

    const failed = await extractor.extract({ bytes, extension: 'png' });
    const retried = await extractor.extract({ bytes, extension: 'png' });

    expect(failed.ocrText).toBe('');
    expect(retried.ocrText).toBe('recognized');
  });

  it('should handle images without bytes', async () => {
    const extractor = new ImageTextExtractor(cache, createFakeProvider());

    expect(await extractor.extract({ extension: 'png' })).toEqual({
      fingerprint: '',
      extension: '.png',
      ocrText: '',
    });
  });
});

describe('normalizeImageExtension', () => {
  it('should prefer the extension over the content type', () => {
    expect(normalizeImageExtension('TIF', 'image/png')).toBe('.tif');
    expect(normalizeImageExtension(undefined, 'image/png; q=1')).toBe('.png');
    expect(normalizeImageExtension(undefined, 'application/pdf')).toBe('');
  });
});
