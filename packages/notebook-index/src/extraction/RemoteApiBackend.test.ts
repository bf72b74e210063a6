import { describe, it, expect, beforeAll, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { RemoteApiBackend } from './RemoteApiBackend.js';
import type {
  NotebookApiClient,
  RemoteNotebook,
  RemotePageSummary,
  RemoteResource,
} from '../remote/types.js';
import { ImageTextExtractor } from '../ocr/ImageTextExtractor.js';
import { OcrCache } from '../ocr/OcrCache.js';
import { EchoOcrProvider } from '../testing/fixtures.js';
import { MockEmbedder } from '../embedders/MockEmbedder.js';
import { EmbeddingIndex } from '../indexing/EmbeddingIndex.js';
import { SearchCoordinator } from '../search/SearchCoordinator.js';
import { DEFAULT_SEARCH_CONFIG } from '../config.js';
import type { SkippedPage } from './types.js';
import { globalLogger, LogLevel } from '../core/Logger.js';

class FakeNotebookApi implements NotebookApiClient {
  pages: RemotePageSummary[] = [
    {
      id: 'p-1',
      title: 'Roadmap',
      lastModifiedDateTime: '2024-03-01T10:00:00Z',
    },
  ];
  html = new Map<string, string>([
    [
      'p-1',
      '<h1>Q2</h1><p>Ship search</p><img src="https://api.example.test/img/1" data-src-type="image/png">',
    ],
  ]);

  listNotebooks: Mock<() => Promise<RemoteNotebook[]>> = vi.fn(async () => [
    {
      id: 'nb-1',
      displayName: 'Work',
      sections: [{ id: 'sec-1', displayName: 'Plans' }],
    },
  ]);
  listPages: Mock<(sectionId: string) => Promise<RemotePageSummary[]>> = vi.fn(
    async () => this.pages,
  );
  getPageContent: Mock<(pageId: string) => Promise<string>> = vi.fn(
    async (pageId: string) => this.html.get(pageId) ?? '',
  );
  getResource: Mock<(url: string) => Promise<RemoteResource>> = vi.fn(
    async () => ({ bytes: new TextEncoder().encode('diagram text') }),
  );
  invalidate: Mock<() => void> = vi.fn();
}

describe('RemoteApiBackend', () => {
  let dir: string;
  let api: FakeNotebookApi;
  let backend: RemoteApiBackend;

  beforeAll(() => {
    globalLogger.setLevel(LogLevel.SILENT);
  });

  beforeEach(() => {
    dir = join(tmpdir(), `remote-backend-test-${randomUUID()}`);
    api = new FakeNotebookApi();
    backend = new RemoteApiBackend({
      client: api,
      images: new ImageTextExtractor(new OcrCache(dir), new EchoOcrProvider()),
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should enumerate notebooks and sections with remote ids', async () => {
    const result = await backend.enumerate();

    expect(result.notebooks).toEqual([
      { id: 'remote:nb-1', name: 'Work', provenance: 'remote', sectionCount: 1 },
    ]);
    expect(result.units).toEqual([
      {
        section: {
          id: 'remote:sec-1',
          name: 'Plans',
          notebookId: 'remote:nb-1',
          notebookName: 'Work',
          provenance: 'remote',
        },
        source: { kind: 'remote-section', sectionId: 'sec-1' },
      },
    ]);
  });

  it('should turn page HTML and images into text', async () => {
    const { units } = await backend.enumerate();
    const [unit] = units;
    if (!unit) throw new Error('expected one unit');

    const [page] = await backend.extractPages(unit);

    expect(page?.id).toBe('remote:p-1');
    expect(page?.title).toBe('Roadmap');
    expect(page?.texts).toEqual(['Q2', 'Ship search']);
    expect(page?.images.map((i) => [i.extension, i.ocrText])).toEqual([
      ['.png', 'diagram text'],
    ]);
    expect(page?.lastModified).toBe(Date.parse('2024-03-01T10:00:00Z'));
    expect(api.getResource).toHaveBeenCalledWith('https://api.example.test/img/1');
  });

  it('should refetch only pages whose modification time changed', async () => {
    const { units } = await backend.enumerate();
    const [unit] = units;
    if (!unit) throw new Error('expected one unit');

    await backend.extractPages(unit);
    await backend.extractPages(unit);
    expect(api.getPageContent).toHaveBeenCalledTimes(1);

    api.pages = [{ id: 'p-1', title: 'Roadmap', lastModifiedDateTime: '2024-03-02T08:00:00Z' }];
    api.html.set('p-1', '<p>Ship search v2</p>');
    const [page] = await backend.extractPages(unit);

    expect(api.getPageContent).toHaveBeenCalledTimes(2);
    expect(page?.texts).toEqual(['Ship search v2']);
    expect(page?.images).toEqual([]);
  });

  it('should keep a page whose image cannot be fetched', async () => {
    api.getResource.mockRejectedValueOnce(new Error('gone'));
    const { units } = await backend.enumerate();
    const [unit] = units;
    if (!unit) throw new Error('expected one unit');

    const [page] = await backend.extractPages(unit);

    expect(page?.texts).toEqual(['Q2', 'Ship search']);
    expect(page?.images).toEqual([]);
  });

  it('should skip a page whose body cannot be fetched and keep its siblings', async () => {
    api.pages = [
      { id: 'p-1', title: 'Roadmap', lastModifiedDateTime: '2024-03-01T10:00:00Z' },
      { id: 'p-2', title: 'Risks', lastModifiedDateTime: '2024-03-01T10:00:00Z' },
    ];
    api.getPageContent.mockImplementation(async (pageId: string) => {
      if (pageId === 'p-2') throw new Error('timeout');
      return '<p>Ship search</p>';
    });
    const { units } = await backend.enumerate();
    const [unit] = units;
    if (!unit) throw new Error('expected one unit');

    const skipped: SkippedPage[] = [];
    const pages = await backend.extractPages(unit, (page) => skipped.push(page));

    expect(pages.map((p) => p.id)).toEqual(['remote:p-1']);
    expect(skipped).toEqual([{ pageId: 'remote:p-2', title: 'Risks', message: 'timeout' }]);
  });

  it('should forget pages that are no longer listed', async () => {
    const { units } = await backend.enumerate();
    const [unit] = units;
    if (!unit) throw new Error('expected one unit');
    const listed = api.pages;

    await backend.extractPages(unit);
    api.pages = [];
    expect(await backend.extractPages(unit)).toEqual([]);
    api.pages = listed;
    await backend.extractPages(unit);

    expect(api.getPageContent).toHaveBeenCalledTimes(2);
  });

  it('should keep the record of a page that fails while its section is updated', async () => {
    const coordinator = new SearchCoordinator({
      index: new EmbeddingIndex({ dimensions: 64 }),
      embedder: new MockEmbedder(),
      batchSize: 16,
      lockTimeoutMs: 5_000,
      search: DEFAULT_SEARCH_CONFIG,
    });
    api.pages = [
      { id: 'p-1', title: 'Roadmap', lastModifiedDateTime: '2024-03-01T10:00:00Z' },
      { id: 'p-2', title: 'Risks', lastModifiedDateTime: '2024-03-01T10:00:00Z' },
    ];
    api.html.set('p-2', '<p>Scope creep</p>');
    const first = await coordinator.refresh(backend);
    expect(first).toMatchObject({ added: 2, indexSize: 2 });

    api.pages = [
      { id: 'p-1', title: 'Roadmap', lastModifiedDateTime: '2024-03-02T10:00:00Z' },
      { id: 'p-2', title: 'Risks', lastModifiedDateTime: '2024-03-02T10:00:00Z' },
    ];
    api.html.set('p-1', '<p>Ship search v2</p>');
    api.getPageContent.mockImplementation(async (pageId: string) => {
      if (pageId === 'p-2') throw new Error('timeout');
      return api.html.get(pageId) ?? '';
    });
    const second = await coordinator.refresh(backend);

    expect(second).toMatchObject({ updated: 1, removed: 0, failedUnits: [], indexSize: 2 });
    expect(second.warnings).toEqual([
      {
        message: "Page 'Risks' in 'Work / Plans' could not be read: timeout",
        sectionId: 'remote:sec-1',
      },
    ]);
  });

  it('should invalidate cached hierarchy and pages', () => {
    backend.invalidate();

    expect(api.invalidate).toHaveBeenCalledTimes(1);
  });
});
