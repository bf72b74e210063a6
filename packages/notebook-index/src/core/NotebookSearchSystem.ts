/**
 * NotebookSearchSystem - main orchestrator for notebook indexing and search.
 * Wires configuration, capability providers, backends, the index and the
 * coordinator, and provides the browsing and search API the tools call.
 */

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { EventEmitter } from './EventEmitter.js';
import { globalLogger, createModuleLogger, parseLogLevel } from './Logger.js';
import { NotebookIndexError, NotebookIndexErrorType, errorMessage } from './errors.js';
import type { DeepPartial, NotebookSearchConfig } from '../config.js';
import { createConfig, validateConfig } from '../config.js';
import type {
  IndexUpdateSummary,
  NotebookRef,
  Page,
  Provenance,
  SearchRequest,
  SearchResponse,
  SectionRef,
  SourceUnit,
} from '../types.js';
import { BackupDiscovery } from '../discovery/BackupDiscovery.js';
import type { NoteDecoder } from '../decoder/types.js';
import { loadNoteDecoder } from '../decoder/loadNoteDecoder.js';
import type { PageBackend } from '../extraction/types.js';
import { LocalBackupBackend } from '../extraction/LocalBackupBackend.js';
import { RemoteApiBackend } from '../extraction/RemoteApiBackend.js';
import { leadingSnippet } from '../extraction/page-text.js';
import type { NotebookApiClient } from '../remote/types.js';
import { GraphNotebookClient } from '../remote/GraphNotebookClient.js';
import type { OcrProvider } from '../ocr/types.js';
import { OcrCache } from '../ocr/OcrCache.js';
import { ImageTextExtractor } from '../ocr/ImageTextExtractor.js';
import { createOcrProvider } from '../ocr/index.js';
import type { TextEmbedder } from '../embedders/types.js';
import { createEmbedder } from '../embedders/index.js';
import { EmbeddingIndex } from '../indexing/EmbeddingIndex.js';
import { FileIndexStore } from '../storage/FileIndexStore.js';
import {
  SearchCoordinator,
  type SearchCoordinatorEvents,
} from '../search/SearchCoordinator.js';
import { findNotebook, findSection, unitsOf } from '../search/scope.js';

const log = createModuleLogger('NotebookSearchSystem');

// ============================================================================
// Constants
// ============================================================================

/** Characters of section text shown in a notebook summary */
const SUMMARY_PREVIEW_LENGTH = 200;

const OCR_CACHE_DIRNAME = 'ocr-cache';
const TESSDATA_DIRNAME = 'tessdata';

// ============================================================================
// Types
// ============================================================================

export interface NotebookSearchSystemOptions {
  /** Configuration overrides on top of the defaults */
  config?: DeepPartial<NotebookSearchConfig>;
  /** Apply `config.logging` to the global logger. Default: true */
  configureLogging?: boolean;
  /** Capability overrides, mainly for tests */
  embedder?: TextEmbedder;
  ocrProvider?: OcrProvider;
  decoder?: NoteDecoder;
  apiClient?: NotebookApiClient;
  fetchImpl?: typeof fetch;
}

export interface NotebookListing {
  id: string;
  name: string;
  sectionCount: number;
}

export interface SectionListing {
  id: string;
  name: string;
  /** Size of the authoritative backup file; local sections only */
  sizeBytes?: number;
  /** On-disk copies of the section; 1 for remote sections */
  versionCount: number;
}

export interface NotebookSections {
  notebook: string;
  sections: SectionListing[];
}

export interface PageListing {
  id: string;
  title: string;
}

export interface SectionContent {
  section: SectionRef;
  pages: Page[];
}

export type SectionSummary =
  | { name: string; pageCount: number; preview: string }
  | { name: string; error: string };

export interface NotebookSummary {
  notebook: NotebookRef;
  sections: SectionSummary[];
}

export interface SystemStatus {
  activeSource: Provenance;
  indexSize: number;
  model: string;
  dimensions: number;
  ocrProvider: string;
  ocrAvailable: boolean;
  ocrCacheEntries: number;
  backupRoots: readonly string[];
  decoderConfigured: boolean;
  remoteConfigured: boolean;
  storageDir: string;
  updating: boolean;
  lastUpdate?: IndexUpdateSummary;
}

export type NotebookSearchSystemEvents = SearchCoordinatorEvents;

// ============================================================================
// NotebookSearchSystem Class
// ============================================================================

export class NotebookSearchSystem extends EventEmitter<NotebookSearchSystemEvents> {
  private activeSource: Provenance;
  private readonly unsubscribers: Array<() => void> = [];

  private constructor(
    readonly config: NotebookSearchConfig,
    private readonly local: LocalBackupBackend,
    private readonly remote: RemoteApiBackend | null,
    private readonly embedder: TextEmbedder,
    private readonly ocrProvider: OcrProvider,
    private readonly ocrCache: OcrCache,
    private readonly coordinator: SearchCoordinator,
  ) {
    super();
    this.activeSource = config.sources.backend;

    const forward = <K extends keyof SearchCoordinatorEvents>(event: K): void => {
      this.unsubscribers.push(
        coordinator.on(event, (data) => this.emit(event, data)),
      );
    };
    forward('update:start');
    forward('update:complete');
    forward('update:unit-failed');
    forward('search:complete');
  }

  // -------------------------------------------------------------------------
  // Static Factory Methods
  // -------------------------------------------------------------------------

  /**
   * Build every component and load the stored index.
   */
  static async initialize(
    options: NotebookSearchSystemOptions = {},
  ): Promise<NotebookSearchSystem> {
    const config = createConfig(options.config);
    validateConfig(config);

    if (options.configureLogging ?? true) {
      globalLogger.configure({
        level: parseLogLevel(config.logging.level),
        filePath: config.logging.filePath,
        json: config.logging.json,
      });
    }

    const storageDir = config.index.storageDir;
    await mkdir(storageDir, { recursive: true });

    // OCR
    const ocrProvider =
      options.ocrProvider ?? createOcrProvider(config.ocr, join(storageDir, TESSDATA_DIRNAME));
    const ocrCache = new OcrCache(join(storageDir, OCR_CACHE_DIRNAME));
    const images = new ImageTextExtractor(ocrCache, ocrProvider);

    // Local backend
    let decoder = options.decoder;
    if (!decoder && config.decoder.module) {
      decoder = await loadNoteDecoder(config.decoder.module);
    }
    if (!decoder) {
      log.warn('No section decoder configured; local sections can be listed but not read');
    }
    const local = new LocalBackupBackend({
      discovery: new BackupDiscovery({
        backupRoots: config.sources.backupRoots,
        ignoreSegments: config.sources.ignoreSegments,
      }),
      decoder,
      images,
    });

    // Remote backend, only with credentials
    let apiClient = options.apiClient;
    if (!apiClient && config.remote.accessToken) {
      apiClient = new GraphNotebookClient({
        baseUrl: config.remote.baseUrl,
        accessToken: config.remote.accessToken,
        requestTimeoutMs: config.remote.requestTimeoutMs,
        fetchImpl: options.fetchImpl,
      });
    }
    const remote = apiClient ? new RemoteApiBackend({ client: apiClient, images }) : null;

    // Index
    const embedder = options.embedder ?? createEmbedder(config.embeddings);
    const index = new EmbeddingIndex({
      dimensions: embedder.dimensions,
      store: new FileIndexStore(storageDir, {
        model: embedder.modelId,
        dimensions: embedder.dimensions,
      }),
    });
    const coordinator = new SearchCoordinator({
      index,
      embedder,
      batchSize: config.embeddings.batchSize,
      lockTimeoutMs: config.index.lockTimeoutMs,
      search: config.search,
    });

    const system = new NotebookSearchSystem(
      config,
      local,
      remote,
      embedder,
      ocrProvider,
      ocrCache,
      coordinator,
    );
    if (config.sources.backend === 'remote') {
      system.backendFor('remote');
    }

    const load = await coordinator.initialize();
    log.info(
      `Notebook search ready: ${load.records} indexed pages, source ${system.activeSource}`,
      load.reason ? { rebuildReason: load.reason } : undefined,
    );
    return system;
  }

  // -------------------------------------------------------------------------
  // Sources
  // -------------------------------------------------------------------------

  get dataSource(): Provenance {
    return this.activeSource;
  }

  setDataSource(source: Provenance): void {
    this.backendFor(source);
    this.activeSource = source;
    log.info(`Data source set to ${source}`);
  }

  private backendFor(source: Provenance = this.activeSource): PageBackend {
    if (source === 'local') return this.local;
    if (!this.remote) {
      throw new NotebookIndexError(
        'Remote API access requires an access token; set NOTEBOOK_SEARCH_API_TOKEN',
        NotebookIndexErrorType.CONFIGURATION,
      );
    }
    return this.remote;
  }

  // -------------------------------------------------------------------------
  // Browsing
  // -------------------------------------------------------------------------

  async listNotebooks(source?: Provenance): Promise<NotebookListing[]> {
    const enumeration = await this.backendFor(source).enumerate();
    return enumeration.notebooks.map(({ id, name, sectionCount }) => ({
      id,
      name,
      sectionCount,
    }));
  }

  async listSections(notebook: string, source?: Provenance): Promise<SectionListing[]> {
    const enumeration = await this.backendFor(source).enumerate();
    return unitsOf(enumeration, findNotebook(enumeration, notebook)).map(toSectionListing);
  }

  async listAllSections(source?: Provenance): Promise<NotebookSections[]> {
    const enumeration = await this.backendFor(source).enumerate();
    return enumeration.notebooks.map((notebook) => ({
      notebook: notebook.name,
      sections: unitsOf(enumeration, notebook).map(toSectionListing),
    }));
  }

  async listPages(
    notebook: string,
    section: string,
    source?: Provenance,
  ): Promise<PageListing[]> {
    const { pages } = await this.readSection(notebook, section, source);
    return pages.map(({ id, title }) => ({ id, title }));
  }

  async readSection(
    notebook: string,
    section: string,
    source?: Provenance,
  ): Promise<SectionContent> {
    const backend = this.backendFor(source);
    const enumeration = await backend.enumerate();
    const unit = findSection(enumeration, findNotebook(enumeration, notebook), section);
    return { section: unit.section, pages: await backend.extractPages(unit) };
  }

  async readPage(
    notebook: string,
    section: string,
    title: string,
    source?: Provenance,
  ): Promise<Page> {
    const { section: ref, pages } = await this.readSection(notebook, section, source);
    const wanted = title.toLowerCase();
    const page = pages.find((p) => p.title.toLowerCase() === wanted);
    if (!page) {
      throw new NotebookIndexError(
        `Page '${title}' not found in section '${ref.name}'. Available pages: ${
          pages.map((p) => p.title).join(', ') || '(none)'
        }`,
        NotebookIndexErrorType.NOT_FOUND,
        { notebook, section, title },
      );
    }
    return page;
  }

  /**
   * Per section, a preview of its text runs; unreadable sections carry the error.
   */
  async getNotebookSummary(notebook: string, source?: Provenance): Promise<NotebookSummary> {
    const backend = this.backendFor(source);
    const enumeration = await backend.enumerate();
    const ref = findNotebook(enumeration, notebook);

    const sections: SectionSummary[] = [];
    for (const unit of unitsOf(enumeration, ref)) {
      try {
        const pages = await backend.extractPages(unit);
        const runs = pages.flatMap((page) => page.texts);
        sections.push({
          name: unit.section.name,
          pageCount: pages.length,
          preview: leadingSnippet(runs.join(' | '), SUMMARY_PREVIEW_LENGTH),
        });
      } catch (error) {
        sections.push({ name: unit.section.name, error: errorMessage(error) });
      }
    }
    return { notebook: ref, sections };
  }

  // -------------------------------------------------------------------------
  // Index & Search
  // -------------------------------------------------------------------------

  async search(request: SearchRequest & { source?: Provenance }): Promise<SearchResponse> {
    const { source, ...rest } = request;
    return this.coordinator.search(this.backendFor(source), rest);
  }

  /**
   * Run one freshness pass.
   */
  async refresh(source?: Provenance): Promise<IndexUpdateSummary> {
    return this.coordinator.refresh(this.backendFor(source));
  }

  /**
   * Re-read every source and re-embed every page.
   */
  async rebuildIndex(source?: Provenance): Promise<IndexUpdateSummary> {
    return this.coordinator.rebuild(this.backendFor(source));
  }

  async status(): Promise<SystemStatus> {
    return {
      activeSource: this.activeSource,
      indexSize: await this.coordinator.indexSize(),
      model: this.embedder.modelId,
      dimensions: this.embedder.dimensions,
      ocrProvider: this.ocrProvider.name,
      ocrAvailable: await this.ocrProvider.isAvailable(),
      ocrCacheEntries: await this.ocrCache.size(),
      backupRoots: this.local.backupRoots,
      decoderConfigured: this.local.hasDecoder,
      remoteConfigured: this.remote !== null,
      storageDir: this.config.index.storageDir,
      updating: this.coordinator.busy,
      lastUpdate: this.coordinator.lastUpdate(this.activeSource),
    };
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Release models and OCR workers, and flush pending log writes.
   */
  async close(): Promise<void> {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    this.removeAllListeners();
    await this.embedder.dispose();
    await this.ocrProvider.dispose();
    await globalLogger.flush();
  }
}

// ============================================================================
// Helpers
// ============================================================================

function toSectionListing(unit: SourceUnit): SectionListing {
  if (unit.source.kind === 'backup-file') {
    return {
      id: unit.section.id,
      name: unit.section.name,
      sizeBytes: unit.source.group.authoritative.size,
      versionCount: unit.source.group.files.length,
    };
  }
  return { id: unit.section.id, name: unit.section.name, versionCount: 1 };
}

// ============================================================================
// Factory Functions
// ============================================================================

export function initializeNotebookSearchSystem(
  options?: NotebookSearchSystemOptions,
): Promise<NotebookSearchSystem> {
  return NotebookSearchSystem.initialize(options);
}
