import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { NotebookSearchSystem } from './NotebookSearchSystem.js';
import { MockEmbedder } from '../embedders/MockEmbedder.js';
import {
  EchoOcrProvider,
  JsonFixtureDecoder,
  writeFixtureSection,
  type FixturePage,
} from '../testing/fixtures.js';
import type { NotebookApiClient } from '../remote/types.js';
import { NotebookIndexErrorType, isNotebookIndexError } from './errors.js';
import { globalLogger, LogLevel } from './Logger.js';

const PLANS: FixturePage[] = [
  { title: 'Roadmap', texts: ['Ship search', 'Write docs'] },
  { title: 'Risks', texts: ['Scope creep'], images: [{ text: 'whiteboard notes', extension: 'png' }] },
];

async function caught(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('NotebookSearchSystem', () => {
  let testDir: string;
  let root: string;
  let system: NotebookSearchSystem;
  let embedder: MockEmbedder;

  beforeAll(() => {
    globalLogger.setLevel(LogLevel.SILENT);
  });

  beforeEach(async () => {
    testDir = join(tmpdir(), `system-test-${randomUUID()}`);
    root = join(testDir, 'Backup');
    await mkdir(root, { recursive: true });
    await writeFixtureSection(root, 'Work', 'Plans_2024-01-01.one', PLANS, 1_700_000_000);
    await writeFixtureSection(root, 'Work', 'Plans_2024-02-01.one', PLANS, 1_700_100_000);
    await writeFixtureSection(root, 'Work', 'Meetings.one', [{ title: 'Standup', texts: ['Daily sync'] }]);
    await writeFixtureSection(root, 'Home', 'Garden.one', [{ title: 'Tomatoes', texts: ['Water daily'] }]);

    embedder = new MockEmbedder();
    system = await NotebookSearchSystem.initialize({
      config: {
        sources: { backupRoots: [root] },
        index: { storageDir: join(testDir, 'storage') },
      },
      configureLogging: false,
      embedder,
      decoder: new JsonFixtureDecoder(),
      ocrProvider: new EchoOcrProvider(),
    });
  });

  afterEach(async () => {
    await system.close();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should list notebooks and their sections', async () => {
    expect(await system.listNotebooks()).toEqual([
      { id: 'local:Home', name: 'Home', sectionCount: 1 },
      { id: 'local:Work', name: 'Work', sectionCount: 2 },
    ]);

    const sections = await system.listSections('work');
    expect(sections).toEqual([
      {
        id: 'local:Work/Meetings',
        name: 'Meetings',
        sizeBytes: Buffer.byteLength(JSON.stringify([{ title: 'Standup', texts: ['Daily sync'] }])),
        versionCount: 1,
      },
      {
        id: 'local:Work/Plans',
        name: 'Plans',
        sizeBytes: Buffer.byteLength(JSON.stringify(PLANS)),
        versionCount: 2,
      },
    ]);

    const all = await system.listAllSections();
    expect(all.map((n) => [n.notebook, n.sections.map((s) => s.name)])).toEqual([
      ['Home', ['Garden']],
      ['Work', ['Meetings', 'Plans']],
    ]);
  });

  it('should list and read pages by name', async () => {
    expect(await system.listPages('Work', 'plans')).toEqual([
      { id: 'local:Work/Plans/Roadmap', title: 'Roadmap' },
      { id: 'local:Work/Plans/Risks', title: 'Risks' },
    ]);

    const page = await system.readPage('Work', 'Plans', 'risks');
    expect(page.texts).toEqual(['Scope creep']);
    expect(page.images.map((i) => i.ocrText)).toEqual(['whiteboard notes']);
  });

  it('should name the available pages when a page is missing', async () => {
    const error = await caught(system.readPage('Work', 'Plans', 'Budget'));

    expect(isNotebookIndexError(error, NotebookIndexErrorType.NOT_FOUND)).toBe(true);
    expect(error instanceof Error && error.message).toBe(
      "Page 'Budget' not found in section 'Plans'. Available pages: Roadmap, Risks",
    );
  });

  it('should summarize each section of a notebook', async () => {
    const summary = await system.getNotebookSummary('Work');

    expect(summary.notebook.name).toBe('Work');
    expect(summary.sections).toEqual([
      { name: 'Meetings', pageCount: 1, preview: 'Daily sync' },
      { name: 'Plans', pageCount: 2, preview: 'Ship search | Write docs | Scope creep' },
    ]);
  });

  it('should search and report status', async () => {
    const exact = await system.search({ query: 'whiteboard', exactMatch: true });
    expect(exact.hits.map((h) => h.page.id)).toEqual(['local:Work/Plans/Risks']);

    await system.refresh();
    const status = await system.status();

    expect(status).toMatchObject({
      activeSource: 'local',
      indexSize: 4,
      model: 'mock-bag-of-words',
      ocrProvider: 'echo',
      ocrAvailable: true,
      ocrCacheEntries: 1,
      backupRoots: [root],
      decoderConfigured: true,
      remoteConfigured: false,
      updating: false,
    });
    expect(status.lastUpdate).toMatchObject({ added: 4 });
  });

  it('should re-embed everything on rebuild', async () => {
    await system.refresh();
    embedder.resetCounters();

    const summary = await system.rebuildIndex();

    expect(summary).toMatchObject({ forced: true, updated: 4, added: 0 });
    expect(embedder.embeddedCount).toBe(4);
  });

  it('should refuse the remote source without a token', async () => {
    let error: unknown;
    try {
      system.setDataSource('remote');
    } catch (e) {
      error = e;
    }

    expect(isNotebookIndexError(error, NotebookIndexErrorType.CONFIGURATION)).toBe(true);
    expect(system.dataSource).toBe('local');
  });

  it('should forward coordinator events', async () => {
    const completed = vi.fn();
    system.on('update:complete', completed);

    await system.refresh();

    expect(completed).toHaveBeenCalledWith(expect.objectContaining({ provenance: 'local', added: 4 }));
  });
});

describe('NotebookSearchSystem with the remote source', () => {
  let testDir: string;

  beforeAll(() => {
    globalLogger.setLevel(LogLevel.SILENT);
  });

  beforeEach(() => {
    testDir = join(tmpdir(), `system-remote-test-${randomUUID()}`);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should browse through the API client once selected', async () => {
    const client: NotebookApiClient = {
      listNotebooks: async () => [
        { id: 'nb', displayName: 'Shared', sections: [{ id: 's1', displayName: 'Team' }] },
      ],
      listPages: async () => [{ id: 'p1', title: 'Kickoff' }],
      getPageContent: async () => '<p>Agenda</p>',
      getResource: async () => ({ bytes: new Uint8Array() }),
      invalidate: () => {},
    };
    const system = await NotebookSearchSystem.initialize({
      config: {
        sources: { backupRoots: [] },
        index: { storageDir: testDir },
        ocr: { enabled: false },
      },
      configureLogging: false,
      embedder: new MockEmbedder(),
      apiClient: client,
    });

    system.setDataSource('remote');
    const notebooks = await system.listNotebooks();
    const page = await system.readPage('shared', 'team', 'kickoff');
    await system.close();

    expect(notebooks).toEqual([{ id: 'remote:nb', name: 'Shared', sectionCount: 1 }]);
    expect(page.texts).toEqual(['Agenda']);
    expect(page.provenance).toBe('remote');
  });
});
