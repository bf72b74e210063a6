/**
 * EmbeddingIndex - in-memory vector index with file persistence.
 *
 * Records are keyed by page id. Secondary maps from notebook and section to
 * page ids let a scoped search rank only the pages in scope.
 */

import type {
  EmbeddingRecord,
  IndexScope,
  Provenance,
  ScoredPage,
} from '../types.js';
import type { FileIndexStore } from '../storage/FileIndexStore.js';
import {
  NotebookIndexError,
  NotebookIndexErrorType,
  isNotebookIndexError,
} from '../core/errors.js';
import { createModuleLogger } from '../core/Logger.js';

const log = createModuleLogger('EmbeddingIndex');

// ============================================================================
// Types
// ============================================================================

export interface EmbeddingIndexOptions {
  dimensions: number;
  /** Without a store the index is memory-only */
  store?: FileIndexStore;
}

export interface IndexLoadResult {
  records: number;
  /** The stored index was discarded; every page must be embedded again */
  rebuildRequired: boolean;
  reason?: string;
}

// ============================================================================
// Ranking
// ============================================================================

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

interface Candidate {
  record: EmbeddingRecord;
  score: number;
}

/**
 * Higher score first; ties go to the newer page, then title, then page id.
 */
function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.score !== b.score) return b.score - a.score;

  const aTime = a.record.lastModified;
  const bTime = b.record.lastModified;
  if (aTime !== bTime) {
    if (aTime === undefined) return 1;
    if (bTime === undefined) return -1;
    return bTime - aTime;
  }

  if (a.record.title !== b.record.title) {
    return a.record.title < b.record.title ? -1 : 1;
  }
  if (a.record.pageId === b.record.pageId) return 0;
  return a.record.pageId < b.record.pageId ? -1 : 1;
}

// ============================================================================
// EmbeddingIndex Class
// ============================================================================

export class EmbeddingIndex {
  readonly dimensions: number;
  private readonly store: FileIndexStore | undefined;
  private readonly records = new Map<string, EmbeddingRecord>();
  private readonly byNotebook = new Map<string, Set<string>>();
  private readonly bySection = new Map<string, Set<string>>();
  private rebuildPending = false;

  constructor(options: EmbeddingIndexOptions) {
    this.dimensions = options.dimensions;
    this.store = options.store;
  }

  get size(): number {
    return this.records.size;
  }

  /** True after a load discarded the stored index, until the next full pass. */
  get rebuildRequired(): boolean {
    return this.rebuildPending;
  }

  markRebuilt(): void {
    this.rebuildPending = false;
  }

  get(pageId: string): EmbeddingRecord | undefined {
    return this.records.get(pageId);
  }

  // --------------------------------------------------------------------------
  // Secondary maps
  // --------------------------------------------------------------------------

  private link(map: Map<string, Set<string>>, key: string, pageId: string): void {
    let ids = map.get(key);
    if (!ids) {
      ids = new Set();
      map.set(key, ids);
    }
    ids.add(pageId);
  }

  private unlink(map: Map<string, Set<string>>, key: string, pageId: string): void {
    const ids = map.get(key);
    if (!ids) return;
    ids.delete(pageId);
    if (ids.size === 0) map.delete(key);
  }

  private install(record: EmbeddingRecord): void {
    this.uninstall(record.pageId);
    this.records.set(record.pageId, record);
    this.link(this.byNotebook, record.notebookId, record.pageId);
    this.link(this.bySection, record.sectionId, record.pageId);
  }

  private uninstall(pageId: string): boolean {
    const existing = this.records.get(pageId);
    if (!existing) return false;
    this.records.delete(pageId);
    this.unlink(this.byNotebook, existing.notebookId, pageId);
    this.unlink(this.bySection, existing.sectionId, pageId);
    return true;
  }

  private checkVector(vector: readonly number[], label: string): void {
    if (vector.length !== this.dimensions) {
      throw new NotebookIndexError(
        `Vector for ${label} has ${vector.length} dimensions, expected ${this.dimensions}`,
        NotebookIndexErrorType.EMBEDDING_UNAVAILABLE,
        { label, dimensions: vector.length },
      );
    }
    if (!vector.every(Number.isFinite)) {
      throw new NotebookIndexError(
        `Vector for ${label} contains non-finite values`,
        NotebookIndexErrorType.EMBEDDING_UNAVAILABLE,
        { label },
      );
    }
  }

  // --------------------------------------------------------------------------
  // Mutation
  // --------------------------------------------------------------------------

  /**
   * Page id to fingerprint, optionally limited to one provenance.
   */
  currentFingerprints(provenance?: Provenance): Map<string, string> {
    const result = new Map<string, string>();
    for (const record of this.records.values()) {
      if (provenance === undefined || record.provenance === provenance) {
        result.set(record.pageId, record.fingerprint);
      }
    }
    return result;
  }

  /**
   * Insert or replace records. Either every record is installed or none is.
   */
  upsert(records: readonly EmbeddingRecord[]): void {
    for (const record of records) {
      this.checkVector(record.vector, record.pageId);
    }
    for (const record of records) {
      this.install(record);
    }
  }

  /**
   * @returns Number of records actually removed
   */
  remove(pageIds: Iterable<string>): number {
    let removed = 0;
    for (const pageId of pageIds) {
      if (this.uninstall(pageId)) removed++;
    }
    return removed;
  }

  clear(): void {
    this.records.clear();
    this.byNotebook.clear();
    this.bySection.clear();
  }

  // --------------------------------------------------------------------------
  // Search
  // --------------------------------------------------------------------------

  private candidateIds(scope: IndexScope | undefined): Iterable<string> {
    if (scope?.sectionId !== undefined) {
      return this.bySection.get(scope.sectionId) ?? [];
    }
    if (scope?.notebookId !== undefined) {
      return this.byNotebook.get(scope.notebookId) ?? [];
    }
    return this.records.keys();
  }

  /**
   * Top-k records by cosine similarity within the scope.
   */
  search(queryVector: readonly number[], k: number, scope?: IndexScope): ScoredPage[] {
    this.checkVector(queryVector, 'query');
    if (k <= 0) return [];

    const candidates: Candidate[] = [];
    for (const pageId of this.candidateIds(scope)) {
      const record = this.records.get(pageId);
      if (!record) continue;
      if (scope?.provenance !== undefined && record.provenance !== scope.provenance) continue;
      if (scope?.notebookId !== undefined && record.notebookId !== scope.notebookId) continue;
      candidates.push({ record, score: cosineSimilarity(queryVector, record.vector) });
    }

    candidates.sort(compareCandidates);
    return candidates
      .slice(0, k)
      .map(({ record, score }) => ({ pageId: record.pageId, score }));
  }

  // --------------------------------------------------------------------------
  // Persistence
  // --------------------------------------------------------------------------

  /**
   * Replace the in-memory state with the stored index.
   * An unusable file is discarded and reported, never thrown.
   */
  async load(): Promise<IndexLoadResult> {
    this.clear();
    if (!this.store) {
      return { records: 0, rebuildRequired: false };
    }

    let stored;
    try {
      stored = await this.store.read();
    } catch (error) {
      if (!isNotebookIndexError(error, NotebookIndexErrorType.INDEX_CORRUPT)) {
        throw error;
      }
      log.warn(`${error.message}; starting a fresh index`);
      this.rebuildPending = true;
      return { records: 0, rebuildRequired: true, reason: error.message };
    }

    if (stored === null) {
      log.info('No stored index; starting empty');
      return { records: 0, rebuildRequired: false };
    }

    let skipped = 0;
    for (const record of stored) {
      if (record.vector.length !== this.dimensions) {
        skipped++;
        continue;
      }
      this.install(record);
    }
    if (skipped > 0) {
      log.warn(`Dropped ${skipped} stored records with wrong dimensions`);
    }
    log.info(`Loaded ${this.records.size} index records`);
    return { records: this.records.size, rebuildRequired: false };
  }

  async persist(): Promise<void> {
    if (!this.store) return;
    await this.store.write(this.records.values());
    log.debug(`Persisted ${this.records.size} index records`);
  }
}
