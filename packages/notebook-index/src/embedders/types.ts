/**
 * Types for text embedders.
 * Embedders turn page text and queries into vectors for semantic search.
 */

// ============================================================================
// Embedder Interface
// ============================================================================

export interface TextEmbedder {
  /** Unique name for this embedder */
  readonly name: string;
  /** Model identifier, stored in the index header */
  readonly modelId: string;
  /** Embedding dimension size */
  readonly dimensions: number;

  /**
   * Initialize the embedder (load model, etc.).
   * @param onProgress - Optional callback for download/load progress
   */
  initialize(onProgress?: ProgressCallback): Promise<void>;

  isReady(): boolean;

  /**
   * Generate embedding for a search query.
   */
  embedQuery(query: string): Promise<number[]>;

  /**
   * Generate embeddings for page texts, one vector per input in order.
   */
  embedDocuments(texts: string[]): Promise<number[][]>;

  /**
   * Release resources (unload model, etc.).
   */
  dispose(): Promise<void>;
}

// ============================================================================
// Progress Callback
// ============================================================================

export type ProgressCallback = (progress: ProgressInfo) => void;

export interface ProgressInfo {
  stage: 'download' | 'load' | 'ready';
  /** Progress percentage (0-100) */
  progress: number;
  /** Current file being downloaded (if applicable) */
  file?: string;
  message?: string;
}
