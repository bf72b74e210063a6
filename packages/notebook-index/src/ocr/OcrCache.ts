/**
 * OcrCache - persistent map from image fingerprint to recognized text.
 *
 * One JSON file per entry under the cache directory. Entries are written to a
 * unique temporary file and renamed into place, so concurrent writers never
 * leave a torn entry behind. Entries never expire; `clear()` is the only
 * invalidation.
 */

import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { createModuleLogger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';

const log = createModuleLogger('OcrCache');

const ENTRY_SUFFIX = '.json';
const FINGERPRINT_PATTERN = /^[A-Za-z0-9_-]+$/;

const cacheEntrySchema = z.object({
  text: z.string(),
  createdAt: z.string().optional(),
});

export type OcrCacheEntry = z.infer<typeof cacheEntrySchema>;

export class OcrCache {
  private readonly memo = new Map<string, string>();

  constructor(readonly directory: string) {}

  private entryPath(fingerprint: string): string {
    if (!FINGERPRINT_PATTERN.test(fingerprint)) {
      throw new Error(`Invalid OCR cache key: ${fingerprint}`);
    }
    return join(this.directory, `${fingerprint}${ENTRY_SUFFIX}`);
  }

  /**
   * Cached text for an image, or undefined on a miss.
   * A malformed entry file counts as a miss.
   */
  async lookup(fingerprint: string): Promise<string | undefined> {
    const memoized = this.memo.get(fingerprint);
    if (memoized !== undefined) return memoized;

    let content: string;
    try {
      content = await readFile(this.entryPath(fingerprint), 'utf-8');
    } catch {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      log.debug('Ignoring unreadable OCR cache entry', { fingerprint });
      return undefined;
    }

    const entry = cacheEntrySchema.safeParse(parsed);
    if (!entry.success) {
      log.debug('Ignoring malformed OCR cache entry', { fingerprint });
      return undefined;
    }

    this.memo.set(fingerprint, entry.data.text);
    return entry.data.text;
  }

  async store(fingerprint: string, text: string): Promise<void> {
    const target = this.entryPath(fingerprint);
    const entry: OcrCacheEntry = { text, createdAt: new Date().toISOString() };
    const temp = `${target}.${process.pid}.${randomUUID()}.tmp`;

    await mkdir(this.directory, { recursive: true });
    try {
      await writeFile(temp, JSON.stringify(entry), 'utf-8');
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw new Error(`Failed to write OCR cache entry: ${errorMessage(error)}`);
    }
    this.memo.set(fingerprint, text);
  }

  /**
   * Number of entries on disk.
   */
  async size(): Promise<number> {
    try {
      const names = await readdir(this.directory);
      return names.filter((name) => name.endsWith(ENTRY_SUFFIX)).length;
    } catch {
      return 0;
    }
  }

  async clear(): Promise<void> {
    this.memo.clear();
    await rm(this.directory, { recursive: true, force: true });
    log.info('OCR cache cleared', { directory: this.directory });
  }
}
