/**
 * Index file persistence.
 *
 * The whole index lives in one JSON file inside the storage directory:
 * a header naming the format version and the embedding model, then every
 * record with its vector. Writes go to a temporary file that is renamed over
 * the previous one, so a crash never leaves a half-written index.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { EmbeddingRecord } from '../types.js';
import {
  NotebookIndexError,
  NotebookIndexErrorType,
  errorMessage,
} from '../core/errors.js';

// ============================================================================
// Constants
// ============================================================================

/** Current index file format version */
export const INDEX_FORMAT_VERSION = 1;

/** Index filename inside the storage directory */
export const INDEX_FILENAME = 'index.json';

// ============================================================================
// Schema
// ============================================================================

const embeddingRecordSchema = z.object({
  pageId: z.string(),
  fingerprint: z.string(),
  vector: z.array(z.number()),
  notebookId: z.string(),
  sectionId: z.string(),
  title: z.string(),
  provenance: z.enum(['local', 'remote']),
  lastModified: z.number().optional(),
});

const indexFileSchema = z.object({
  formatVersion: z.number(),
  model: z.string(),
  dimensions: z.number().int().positive(),
  updatedAt: z.string(),
  records: z.array(embeddingRecordSchema),
});

export type IndexFile = z.infer<typeof indexFileSchema>;

/** What the stored vectors must have been produced with. */
export interface IndexFileHeader {
  model: string;
  dimensions: number;
}

// ============================================================================
// FileIndexStore Class
// ============================================================================

export class FileIndexStore {
  readonly path: string;

  constructor(
    readonly directory: string,
    private readonly header: IndexFileHeader,
  ) {
    this.path = join(directory, INDEX_FILENAME);
  }

  private corrupt(reason: string): NotebookIndexError {
    return new NotebookIndexError(
      `Index file ${this.path} is unusable: ${reason}`,
      NotebookIndexErrorType.INDEX_CORRUPT,
      { path: this.path },
    );
  }

  /**
   * Read all records.
   *
   * @returns Records, or null when no index file exists yet
   * @throws NotebookIndexError (INDEX_CORRUPT) when the file cannot be used
   */
  async read(): Promise<EmbeddingRecord[] | null> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw this.corrupt(errorMessage(error));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw this.corrupt(`invalid JSON (${errorMessage(error)})`);
    }

    const versioned = z.object({ formatVersion: z.number() }).safeParse(raw);
    if (!versioned.success) {
      throw this.corrupt('missing format version');
    }
    if (versioned.data.formatVersion !== INDEX_FORMAT_VERSION) {
      throw this.corrupt(
        `unsupported format version ${versioned.data.formatVersion}`,
      );
    }

    const parsed = indexFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw this.corrupt(
        `schema mismatch at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? ''}`,
      );
    }

    const file = parsed.data;
    if (file.model !== this.header.model) {
      throw this.corrupt(
        `built with model ${file.model}, configured model is ${this.header.model}`,
      );
    }
    if (file.dimensions !== this.header.dimensions) {
      throw this.corrupt(
        `built with ${file.dimensions} dimensions, expected ${this.header.dimensions}`,
      );
    }
    return file.records;
  }

  /**
   * Replace the index file with the given records.
   *
   * @throws NotebookIndexError (INDEX_PERSIST_FAILED)
   */
  async write(records: Iterable<EmbeddingRecord>): Promise<void> {
    const file: IndexFile = {
      formatVersion: INDEX_FORMAT_VERSION,
      model: this.header.model,
      dimensions: this.header.dimensions,
      updatedAt: new Date().toISOString(),
      records: [...records],
    };
    const temp = `${this.path}.${process.pid}.${randomUUID()}.tmp`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(temp, JSON.stringify(file), 'utf-8');
      await rename(temp, this.path);
    } catch (error) {
      await rm(temp, { force: true }).catch(() => undefined);
      throw new NotebookIndexError(
        `Failed to persist index: ${errorMessage(error)}`,
        NotebookIndexErrorType.INDEX_PERSIST_FAILED,
        { path: this.path },
      );
    }
  }

  async remove(): Promise<void> {
    await rm(this.path, { force: true });
  }
}
