/**
 * SearchCoordinator - serializes freshness passes and searches over one index.
 *
 * Two locks:
 * - the update mutex orders passes and searches, so a search issued during a
 *   pass waits for it and sees the complete new state;
 * - the index mutex guards record installation, persistence and load, and
 *   gives up after `lockTimeoutMs` with INDEX_BUSY.
 */

import { Mutex, withTimeout, type MutexInterface } from 'async-mutex';
import type {
  IndexUpdateSummary,
  Page,
  Provenance,
  SearchHit,
  SearchRequest,
  SearchResponse,
  UnitFailure,
} from '../types.js';
import type { SearchConfig } from '../config.js';
import type { PageBackend } from '../extraction/types.js';
import type { TextEmbedder } from '../embedders/types.js';
import type { EmbeddingIndex, IndexLoadResult } from '../indexing/EmbeddingIndex.js';
import { IncrementalIndexer, type PassResult } from '../indexing/IncrementalIndexer.js';
import {
  composePageText,
  findCaseInsensitive,
  leadingSnippet,
  matchSnippet,
} from '../extraction/page-text.js';
import { resolveScope } from './scope.js';
import { EventEmitter } from '../core/EventEmitter.js';
import {
  NotebookIndexError,
  NotebookIndexErrorType,
  errorMessage,
} from '../core/errors.js';
import { createModuleLogger } from '../core/Logger.js';

const log = createModuleLogger('SearchCoordinator');

// ============================================================================
// Types
// ============================================================================

export interface SearchCoordinatorOptions {
  index: EmbeddingIndex;
  embedder: TextEmbedder;
  /** Pages per embedding call */
  batchSize: number;
  lockTimeoutMs: number;
  search: SearchConfig;
}

export interface SearchCoordinatorEvents {
  [key: string]: unknown;
  'update:start': { provenance: Provenance; forced: boolean };
  'update:complete': IndexUpdateSummary;
  'update:unit-failed': UnitFailure;
  'search:complete': {
    query: string;
    mode: SearchResponse['mode'];
    hits: number;
    took: number;
  };
}

// ============================================================================
// SearchCoordinator Class
// ============================================================================

export class SearchCoordinator extends EventEmitter<SearchCoordinatorEvents> {
  private readonly index: EmbeddingIndex;
  private readonly embedder: TextEmbedder;
  private readonly searchConfig: SearchConfig;
  private readonly indexer: IncrementalIndexer;
  private readonly updateMutex = new Mutex();
  private readonly indexMutex: MutexInterface;

  /** Pages of the last pass per backend, for resolving semantic hits */
  private readonly pageCache = new Map<Provenance, Map<string, Page>>();
  private readonly lastSummaries = new Map<Provenance, IndexUpdateSummary>();
  private loadPromise: Promise<IndexLoadResult> | null = null;

  constructor(options: SearchCoordinatorOptions) {
    super();
    this.index = options.index;
    this.embedder = options.embedder;
    this.searchConfig = options.search;
    this.indexMutex = withTimeout(
      new Mutex(),
      options.lockTimeoutMs,
      new NotebookIndexError(
        `Timed out after ${options.lockTimeoutMs}ms waiting for the index lock`,
        NotebookIndexErrorType.INDEX_BUSY,
      ),
    );
    this.indexer = new IncrementalIndexer({
      index: options.index,
      embedder: options.embedder,
      batchSize: options.batchSize,
      withIndexLock: (fn) => this.indexMutex.runExclusive(fn),
      onUnitFailed: (failure) => {
        void this.emit('update:unit-failed', failure);
      },
    });
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Load the stored index. Later calls return the first result.
   */
  initialize(): Promise<IndexLoadResult> {
    if (!this.loadPromise) {
      const pending = this.indexMutex.runExclusive(() => this.index.load());
      this.loadPromise = pending;
      // A failed load may be retried
      void pending.catch(() => {
        this.loadPromise = null;
      });
    }
    return this.loadPromise;
  }

  /**
   * Number of indexed pages, read under the index lock so a pass that is
   * installing records is never observed halfway.
   * @throws NotebookIndexError (INDEX_BUSY) when the lock is not free in time
   */
  indexSize(): Promise<number> {
    return this.indexMutex.runExclusive(async () => this.index.size);
  }

  lastUpdate(provenance: Provenance): IndexUpdateSummary | undefined {
    return this.lastSummaries.get(provenance);
  }

  /** True while a pass or search holds the update lock. */
  get busy(): boolean {
    return this.updateMutex.isLocked();
  }

  // --------------------------------------------------------------------------
  // Freshness passes
  // --------------------------------------------------------------------------

  /**
   * Run one freshness pass. With `invalidate`, the backend's memoized pages
   * are dropped once the update lock is held, so no running pass loses them.
   */
  async refresh(
    backend: PageBackend,
    options: { force?: boolean; invalidate?: boolean } = {},
  ): Promise<IndexUpdateSummary> {
    await this.initialize();
    const result = await this.updateMutex.runExclusive(() => {
      if (options.invalidate) backend.invalidate();
      return this.runPass(backend, options.force ?? false);
    });
    return result.summary;
  }

  /**
   * Re-read and re-embed every page of the backend.
   */
  rebuild(backend: PageBackend): Promise<IndexUpdateSummary> {
    return this.refresh(backend, { force: true, invalidate: true });
  }

  private async runPass(backend: PageBackend, force: boolean): Promise<PassResult> {
    const provenance = backend.provenance;
    void this.emit('update:start', {
      provenance,
      forced: force || this.index.rebuildRequired,
    });

    const result = await this.indexer.run(backend, force);

    const previous = this.pageCache.get(provenance) ?? new Map<string, Page>();
    const pages = new Map<string, Page>();
    for (const [pageId, page] of previous) {
      const kept =
        result.failedSectionIds.has(page.section.id) || result.skippedPageIds.has(pageId);
      if (kept && this.index.get(pageId)) {
        pages.set(pageId, page);
      }
    }
    for (const page of result.pages) {
      pages.set(page.id, page);
    }
    this.pageCache.set(provenance, pages);
    this.lastSummaries.set(provenance, result.summary);

    void this.emit('update:complete', result.summary);
    return result;
  }

  // --------------------------------------------------------------------------
  // Search
  // --------------------------------------------------------------------------

  async search(backend: PageBackend, request: SearchRequest): Promise<SearchResponse> {
    const query = request.query.trim();
    if (query.length === 0) {
      throw new NotebookIndexError(
        'Search query must not be empty',
        NotebookIndexErrorType.CONFIGURATION,
      );
    }
    await this.initialize();

    const response = await this.updateMutex.runExclusive(() =>
      request.exactMatch
        ? this.exactSearch(backend, { ...request, query })
        : this.semanticSearch(backend, { ...request, query }),
    );

    void this.emit('search:complete', {
      query,
      mode: response.mode,
      hits: response.hits.length,
      took: response.took,
    });
    return response;
  }

  /**
   * Case-insensitive substring match over text runs and OCR lines.
   * One hit per page, in enumeration order. The index is not touched.
   */
  private async exactSearch(
    backend: PageBackend,
    request: SearchRequest,
  ): Promise<SearchResponse> {
    const start = Date.now();
    const limit = request.k ?? this.searchConfig.maxExactResults;

    const enumeration = await backend.enumerate();
    const scope = resolveScope(enumeration, backend.provenance, request.scope);

    const hits: SearchHit[] = [];
    for (const unit of scope.units) {
      if (hits.length >= limit) break;

      let pages: Page[];
      try {
        pages = await backend.extractPages(unit);
      } catch (error) {
        log.warn(`Skipping section '${unit.section.name}' in exact search`, {
          error: errorMessage(error),
        });
        continue;
      }

      for (const page of pages) {
        const text = composePageText(page);
        const match = findCaseInsensitive(text, request.query);
        if (!match) continue;
        hits.push({
          page,
          snippet: matchSnippet(
            text,
            match.index,
            match.length,
            this.searchConfig.exactContextChars,
          ),
          score: 1,
          matchType: 'exact',
        });
        if (hits.length >= limit) break;
      }
    }

    return {
      query: request.query,
      mode: 'exact',
      provenance: backend.provenance,
      hits,
      took: Date.now() - start,
    };
  }

  private async semanticSearch(
    backend: PageBackend,
    request: SearchRequest,
  ): Promise<SearchResponse> {
    const start = Date.now();
    const limit = request.k ?? this.searchConfig.defaultLimit;

    const pass = await this.runPass(backend, false);
    const scope = resolveScope(pass.enumeration, backend.provenance, request.scope);

    await this.embedder.initialize();
    const queryVector = await this.embedder.embedQuery(request.query);
    const scored = await this.indexMutex.runExclusive(async () =>
      this.index.search(queryVector, limit, scope.index),
    );

    const pages = this.pageCache.get(backend.provenance);
    const hits: SearchHit[] = [];
    for (const { pageId, score } of scored) {
      if (score < this.searchConfig.minScore) continue;
      const page = pages?.get(pageId);
      if (!page) {
        log.debug(`Indexed page ${pageId} is not readable in this pass; skipping`);
        continue;
      }
      hits.push({
        page,
        snippet: leadingSnippet(composePageText(page), this.searchConfig.snippetLength),
        score,
        matchType: 'semantic',
      });
    }

    return {
      query: request.query,
      mode: 'semantic',
      provenance: backend.provenance,
      hits,
      took: Date.now() - start,
      update: pass.summary,
    };
  }
}
