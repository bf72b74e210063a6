/**
 * Deterministic bag-of-words embedder for tests and offline use.
 *
 * Each lowercased word adds 1 to the dimension its FNV-1a hash selects; the
 * vector is then L2-normalized. Texts sharing words score above zero, which
 * is enough to exercise ranking without a model.
 */

import type { TextEmbedder } from './types.js';
import { NotebookIndexError, NotebookIndexErrorType } from '../core/errors.js';

export interface MockEmbedderConfig {
  /** Embedding dimensions. Default: 64 */
  dimensions?: number;
  /** Makes embedDocuments throw for the batches it returns true for */
  failWhen?: (texts: string[]) => boolean;
}

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

function fnv1a(word: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < word.length; i++) {
    hash ^= word.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export class MockEmbedder implements TextEmbedder {
  readonly name = 'mock';
  readonly modelId = 'mock-bag-of-words';
  readonly dimensions: number;

  /** Number of embedDocuments calls */
  documentCalls = 0;
  /** Every text passed to embedDocuments, in order */
  readonly embeddedTexts: string[] = [];
  queryCalls = 0;

  private ready = false;
  private readonly failWhen: ((texts: string[]) => boolean) | undefined;

  constructor(config: MockEmbedderConfig = {}) {
    this.dimensions = config.dimensions ?? 64;
    this.failWhen = config.failWhen;
  }

  async initialize(): Promise<void> {
    this.ready = true;
  }

  isReady(): boolean {
    return this.ready;
  }

  async dispose(): Promise<void> {
    this.ready = false;
  }

  async embedQuery(query: string): Promise<number[]> {
    this.queryCalls++;
    return this.vectorFor(query);
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    this.documentCalls++;
    if (this.failWhen?.(texts)) {
      throw new NotebookIndexError(
        `Mock embedding failed for a batch of ${texts.length}`,
        NotebookIndexErrorType.EMBEDDING_UNAVAILABLE,
      );
    }
    this.embeddedTexts.push(...texts);
    return texts.map((text) => this.vectorFor(text));
  }

  /** Total number of texts embedded so far. */
  get embeddedCount(): number {
    return this.embeddedTexts.length;
  }

  resetCounters(): void {
    this.documentCalls = 0;
    this.queryCalls = 0;
    this.embeddedTexts.length = 0;
  }

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of text.toLowerCase().match(WORD_PATTERN) ?? []) {
      const slot = fnv1a(word) % this.dimensions;
      vector[slot] = (vector[slot] ?? 0) + 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
    return norm === 0 ? vector : vector.map((x) => x / norm);
  }
}
