import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { EmbeddingIndex, cosineSimilarity } from './EmbeddingIndex.js';
import { FileIndexStore, INDEX_FILENAME } from '../storage/FileIndexStore.js';
import type { EmbeddingRecord } from '../types.js';
import { NotebookIndexErrorType, isNotebookIndexError } from '../core/errors.js';
import { globalLogger, LogLevel } from '../core/Logger.js';

const MODEL = 'test-model';

function record(
  pageId: string,
  vector: number[],
  overrides: Partial<EmbeddingRecord> = {},
): EmbeddingRecord {
  return {
    pageId,
    fingerprint: `fp-${pageId}`,
    vector,
    notebookId: 'local:Work',
    sectionId: 'local:Work/Notes',
    title: pageId,
    provenance: 'local',
    ...overrides,
  };
}

describe('cosineSimilarity', () => {
  it('should score direction, not magnitude', () => {
    expect(cosineSimilarity([1, 0, 0], [5, 0, 0])).toBe(1);
    expect(cosineSimilarity([1, 0, 0], [0, 1, 0])).toBe(0);
    expect(cosineSimilarity([0, 0, 0], [1, 0, 0])).toBe(0);
  });
});

describe('EmbeddingIndex', () => {
  let dir: string;

  beforeAll(() => {
    globalLogger.setLevel(LogLevel.SILENT);
  });

  beforeEach(async () => {
    dir = join(tmpdir(), `embedding-index-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createIndex(model = MODEL, dimensions = 3): EmbeddingIndex {
    return new EmbeddingIndex({
      dimensions,
      store: new FileIndexStore(dir, { model, dimensions }),
    });
  }

  it('should rank by cosine similarity', () => {
    const index = createIndex();
    index.upsert([
      record('a', [1, 0, 0]),
      record('b', [3, 4, 0]),
      record('c', [0, 0, 1]),
    ]);

    expect(index.search([1, 0, 0], 2)).toEqual([
      { pageId: 'a', score: 1 },
      { pageId: 'b', score: 0.6 },
    ]);
  });

  it('should break score ties by recency, then title, then page id', () => {
    const index = createIndex();
    index.upsert([
      record('undated', [1, 0, 0], { title: 'A' }),
      record('older', [1, 0, 0], { title: 'A', lastModified: 1000 }),
      record('newer', [1, 0, 0], { title: 'Z', lastModified: 2000 }),
      record('z-id', [1, 0, 0], { title: 'B', lastModified: 1000 }),
      record('y-id', [1, 0, 0], { title: 'B', lastModified: 1000 }),
    ]);

    expect(index.search([1, 0, 0], 10).map((hit) => hit.pageId)).toEqual([
      'newer',
      'older',
      'y-id',
      'z-id',
      'undated',
    ]);
  });

  it('should restrict candidates to the scope', () => {
    const index = createIndex();
    index.upsert([
      record('work-1', [1, 0, 0]),
      record('work-2', [1, 0, 0], { sectionId: 'local:Work/Ideas' }),
      record('home-1', [1, 0, 0], {
        notebookId: 'local:Home',
        sectionId: 'local:Home/Todo',
      }),
      record('remote-1', [1, 0, 0], {
        notebookId: 'remote:nb',
        sectionId: 'remote:sec',
        provenance: 'remote',
      }),
    ]);

    const ids = (scope: Parameters<EmbeddingIndex['search']>[2]): string[] =>
      index
        .search([1, 0, 0], 10, scope)
        .map((hit) => hit.pageId)
        .sort();

    expect(ids({ sectionId: 'local:Work/Ideas' })).toEqual(['work-2']);
    expect(ids({ notebookId: 'local:Work' })).toEqual(['work-1', 'work-2']);
    expect(ids({ provenance: 'local' })).toEqual(['home-1', 'work-1', 'work-2']);
    expect(ids({ provenance: 'local', notebookId: 'remote:nb' })).toEqual([]);
  });

  it('should reject vectors with the wrong dimensions without partial writes', () => {
    const index = createIndex();

    let caught: unknown;
    try {
      index.upsert([record('ok', [1, 0, 0]), record('bad', [1, 0])]);
    } catch (error) {
      caught = error;
    }

    expect(
      isNotebookIndexError(caught, NotebookIndexErrorType.EMBEDDING_UNAVAILABLE),
    ).toBe(true);
    expect(index.size).toBe(0);
  });

  it('should track fingerprints per provenance and remove records', () => {
    const index = createIndex();
    index.upsert([
      record('a', [1, 0, 0]),
      record('r', [0, 1, 0], { provenance: 'remote', notebookId: 'remote:nb', sectionId: 'remote:s' }),
    ]);

    expect([...index.currentFingerprints('local')]).toEqual([['a', 'fp-a']]);
    expect(index.currentFingerprints().size).toBe(2);

    expect(index.remove(['a', 'missing'])).toBe(1);
    expect(index.search([1, 0, 0], 5, { notebookId: 'local:Work' })).toEqual([]);
    expect(index.size).toBe(1);
  });

  it('should return identical results after persist and load', async () => {
    const index = createIndex();
    index.upsert([
      record('a', [1, 0, 0], { lastModified: 5 }),
      record('b', [3, 4, 0]),
      record('c', [3, 4, 0], { title: 'c', sectionId: 'local:Work/Ideas' }),
    ]);
    await index.persist();

    const reloaded = createIndex();
    const result = await reloaded.load();

    expect(result).toEqual({ records: 3, rebuildRequired: false });
    expect(reloaded.search([0.5, 0.5, 0], 3)).toEqual(index.search([0.5, 0.5, 0], 3));
    expect(reloaded.get('a')).toEqual(index.get('a'));
    expect(
      reloaded.search([0, 1, 0], 3, { sectionId: 'local:Work/Ideas' }),
    ).toEqual([{ pageId: 'c', score: 0.8 }]);
  });

  it('should write the documented file layout', async () => {
    const index = createIndex();
    index.upsert([record('a', [1, 0, 0])]);
    await index.persist();

    const raw: unknown = JSON.parse(await readFile(join(dir, INDEX_FILENAME), 'utf-8'));

    expect(raw).toMatchObject({
      formatVersion: 1,
      model: MODEL,
      dimensions: 3,
      records: [record('a', [1, 0, 0])],
    });
  });

  it('should fail persist as retryable and leave no temporary file', async () => {
    // A non-empty directory where the index file belongs makes the rename fail
    await mkdir(join(dir, INDEX_FILENAME));
    await writeFile(join(dir, INDEX_FILENAME, 'occupied'), '');
    const index = createIndex();
    index.upsert([record('a', [1, 0, 0])]);

    let caught: unknown;
    try {
      await index.persist();
    } catch (error) {
      caught = error;
    }

    expect(isNotebookIndexError(caught, NotebookIndexErrorType.INDEX_PERSIST_FAILED)).toBe(true);
    expect(isNotebookIndexError(caught) && caught.retryable).toBe(true);
    expect(await readdir(dir)).toEqual([INDEX_FILENAME]);
  });

  it('should start empty when no index file exists', async () => {
    const index = createIndex();

    expect(await index.load()).toEqual({ records: 0, rebuildRequired: false });
    expect(index.rebuildRequired).toBe(false);
  });

  it('should require a rebuild for an unknown format version', async () => {
    await writeFile(
      join(dir, INDEX_FILENAME),
      JSON.stringify({
        formatVersion: 99,
        model: MODEL,
        dimensions: 3,
        updatedAt: new Date().toISOString(),
        records: [],
      }),
    );
    const index = createIndex();

    const result = await index.load();

    expect(result.rebuildRequired).toBe(true);
    expect(result.reason).toContain('unsupported format version 99');
    expect(index.rebuildRequired).toBe(true);
    expect(index.size).toBe(0);

    index.markRebuilt();
    expect(index.rebuildRequired).toBe(false);
  });

  it('should require a rebuild when the model or the JSON changes', async () => {
    const original = createIndex();
    original.upsert([record('a', [1, 0, 0])]);
    await original.persist();

    const otherModel = await createIndex('other-model').load();
    expect(otherModel.rebuildRequired).toBe(true);

    await writeFile(join(dir, INDEX_FILENAME), '{ not json');
    const broken = await createIndex().load();
    expect(broken.rebuildRequired).toBe(true);
  });
});
