/**
 * IncrementalIndexer - one freshness pass over a backend.
 *
 * Enumerate → extract → fingerprint → diff → embed → install. Only pages whose
 * fingerprint differs from the stored record are embedded, and embedding runs
 * outside the index lock so searches are not blocked by the model.
 */

import type {
  EmbeddingRecord,
  EnumerationResult,
  IndexUpdateSummary,
  Page,
  SourceWarning,
  UnitFailure,
} from '../types.js';
import type { PageBackend } from '../extraction/types.js';
import type { TextEmbedder } from '../embedders/types.js';
import type { EmbeddingIndex } from './EmbeddingIndex.js';
import { computePageFingerprint } from '../hashing/ContentHasher.js';
import { composeEmbeddingInput, hasIndexableText } from '../extraction/page-text.js';
import { errorMessage } from '../core/errors.js';
import { createModuleLogger } from '../core/Logger.js';

const log = createModuleLogger('IncrementalIndexer');

// ============================================================================
// Types
// ============================================================================

/** Runs `fn` while holding the index lock. */
export type IndexLock = <T>(fn: () => Promise<T>) => Promise<T>;

export interface IncrementalIndexerOptions {
  index: EmbeddingIndex;
  embedder: TextEmbedder;
  /** Pages per embedding call */
  batchSize: number;
  withIndexLock: IndexLock;
  onUnitFailed?: (failure: UnitFailure) => void;
}

export interface PassResult {
  summary: IndexUpdateSummary;
  enumeration: EnumerationResult;
  /** Every page extracted in this pass, indexable or not */
  pages: Page[];
  /** Sections whose pages could not be read in this pass */
  failedSectionIds: Set<string>;
  /** Single pages left out of otherwise readable sections */
  skippedPageIds: Set<string>;
}

interface PendingPage {
  page: Page;
  fingerprint: string;
  isNew: boolean;
}

// ============================================================================
// IncrementalIndexer Class
// ============================================================================

export class IncrementalIndexer {
  private readonly index: EmbeddingIndex;
  private readonly embedder: TextEmbedder;
  private readonly batchSize: number;
  private readonly withIndexLock: IndexLock;
  private readonly onUnitFailed: ((failure: UnitFailure) => void) | undefined;

  constructor(options: IncrementalIndexerOptions) {
    this.index = options.index;
    this.embedder = options.embedder;
    this.batchSize = options.batchSize;
    this.withIndexLock = options.withIndexLock;
    this.onUnitFailed = options.onUnitFailed;
  }

  /**
   * Bring the index up to date with the backend.
   * A pass after a discarded index file always runs forced.
   */
  async run(backend: PageBackend, force = false): Promise<PassResult> {
    const start = Date.now();
    const provenance = backend.provenance;
    const forced = force || this.index.rebuildRequired;

    const enumeration = await backend.enumerate();
    const protectedSections = new Set<string>();
    for (const warning of enumeration.warnings) {
      if (warning.sectionId !== undefined) protectedSections.add(warning.sectionId);
    }

    // Extraction; a failing unit is isolated
    const pages: Page[] = [];
    const failedUnits: UnitFailure[] = [];
    const skippedPageIds = new Set<string>();
    const pageWarnings: SourceWarning[] = [];
    for (const unit of enumeration.units) {
      try {
        const extracted = await backend.extractPages(unit, (skipped) => {
          skippedPageIds.add(skipped.pageId);
          pageWarnings.push({
            message: `Page '${skipped.title}' in '${unit.section.notebookName} / ${unit.section.name}' could not be read: ${skipped.message}`,
            sectionId: unit.section.id,
          });
        });
        pages.push(...extracted);
      } catch (error) {
        const failure: UnitFailure = {
          sectionId: unit.section.id,
          sectionName: unit.section.name,
          notebookName: unit.section.notebookName,
          message: errorMessage(error),
        };
        log.warn(
          `Skipping section '${unit.section.notebookName} / ${unit.section.name}': ${failure.message}`,
        );
        failedUnits.push(failure);
        protectedSections.add(unit.section.id);
        this.onUnitFailed?.(failure);
      }
    }

    // Diff against stored fingerprints
    const stored = this.index.currentFingerprints(provenance);
    const seen = new Set<string>();
    const pending: PendingPage[] = [];
    const refreshed: EmbeddingRecord[] = [];
    let unchanged = 0;

    for (const page of pages) {
      if (!hasIndexableText(page)) continue;
      seen.add(page.id);
      const fingerprint = computePageFingerprint(page);
      const previous = stored.get(page.id);

      if (!forced && previous === fingerprint) {
        unchanged++;
        const record = this.index.get(page.id);
        if (record && metadataChanged(record, page)) {
          refreshed.push(toRecord(page, fingerprint, record.vector));
        }
        continue;
      }
      pending.push({ page, fingerprint, isNew: previous === undefined });
    }

    const staleIds: string[] = [];
    for (const pageId of stored.keys()) {
      if (seen.has(pageId) || skippedPageIds.has(pageId)) continue;
      const record = this.index.get(pageId);
      if (record && protectedSections.has(record.sectionId)) continue;
      staleIds.push(pageId);
    }

    // Embedding, outside the index lock
    const embedded = await this.embedPending(pending);
    const embedFailures = pending.length - embedded.length;
    const added = embedded.filter((e) => e.isNew).length;

    const removed = await this.withIndexLock(async () => {
      this.index.upsert([...refreshed, ...embedded.map((e) => e.record)]);
      const count = this.index.remove(staleIds);
      if (embedded.length > 0 || refreshed.length > 0 || count > 0 || forced) {
        await this.index.persist();
      }
      if (forced && embedFailures === 0) this.index.markRebuilt();
      return count;
    });

    const summary: IndexUpdateSummary = {
      provenance,
      forced,
      added,
      updated: embedded.length - added,
      unchanged,
      removed,
      embedFailures,
      failedUnits,
      warnings: [...enumeration.warnings, ...pageWarnings],
      indexSize: this.index.size,
      durationMs: Date.now() - start,
    };
    log.info(
      `Index pass (${provenance}${forced ? ', forced' : ''}): ${summary.added} added, ` +
        `${summary.updated} updated, ${summary.unchanged} unchanged, ${summary.removed} removed, ` +
        `${embedFailures} embed failures, ${failedUnits.length} failed sections`,
    );

    return {
      summary,
      enumeration,
      pages,
      failedSectionIds: new Set(failedUnits.map((f) => f.sectionId)),
      skippedPageIds,
    };
  }

  // --------------------------------------------------------------------------
  // Embedding
  // --------------------------------------------------------------------------

  private async embedPending(
    pending: PendingPage[],
  ): Promise<Array<{ record: EmbeddingRecord; isNew: boolean }>> {
    if (pending.length === 0) return [];
    try {
      await this.embedder.initialize();
    } catch (error) {
      log.warn(
        `Embedding model unavailable; ${pending.length} pages keep their previous entries`,
        { error: errorMessage(error) },
      );
      return [];
    }

    const results: Array<{ record: EmbeddingRecord; isNew: boolean }> = [];
    for (let i = 0; i < pending.length; i += this.batchSize) {
      const batch = pending.slice(i, i + this.batchSize);
      let vectors: number[][] | null = null;
      try {
        vectors = await this.embedder.embedDocuments(
          batch.map((p) => composeEmbeddingInput(p.page)),
        );
        if (vectors.length !== batch.length) {
          throw new Error(`expected ${batch.length} vectors, got ${vectors.length}`);
        }
      } catch (error) {
        log.warn(`Embedding batch of ${batch.length} failed; retrying page by page`, {
          error: errorMessage(error),
        });
        vectors = null;
      }

      for (let j = 0; j < batch.length; j++) {
        const item = batch[j];
        if (!item) continue;
        const vector = vectors ? vectors[j] : await this.embedOne(item.page);
        if (!vector || !this.isUsable(vector)) {
          log.warn(`Keeping previous index entry for page '${item.page.title}'`);
          continue;
        }
        results.push({
          record: toRecord(item.page, item.fingerprint, vector),
          isNew: item.isNew,
        });
      }
    }
    return results;
  }

  private async embedOne(page: Page): Promise<number[] | undefined> {
    try {
      const [vector] = await this.embedder.embedDocuments([composeEmbeddingInput(page)]);
      return vector;
    } catch (error) {
      log.warn(`Failed to embed page '${page.title}'`, { error: errorMessage(error) });
      return undefined;
    }
  }

  private isUsable(vector: number[]): boolean {
    return vector.length === this.index.dimensions && vector.every(Number.isFinite);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function toRecord(page: Page, fingerprint: string, vector: number[]): EmbeddingRecord {
  return {
    pageId: page.id,
    fingerprint,
    vector,
    notebookId: page.section.notebookId,
    sectionId: page.section.id,
    title: page.title,
    provenance: page.provenance,
    lastModified: page.lastModified,
  };
}

function metadataChanged(record: EmbeddingRecord, page: Page): boolean {
  return (
    record.lastModified !== page.lastModified ||
    record.notebookId !== page.section.notebookId ||
    record.sectionId !== page.section.id ||
    record.title !== page.title
  );
}
