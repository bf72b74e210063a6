/**
 * Text embedder using Transformers.js.
 * Runs sentence-transformer models locally on the ONNX runtime.
 *
 * Batch size fallback: when a batch fails, the batch size is halved until a
 * single text is embedded on its own. A failure at batch size 1 is thrown.
 */

import { z } from 'zod';
import type { TextEmbedder, ProgressCallback } from './types.js';
import type { EmbeddingsConfig } from '../config.js';
import {
  NotebookIndexError,
  NotebookIndexErrorType,
  errorMessage,
} from '../core/errors.js';
import { createModuleLogger } from '../core/Logger.js';

const log = createModuleLogger('TransformersJsEmbedder');

// ============================================================================
// Constants
// ============================================================================

/** Package name; kept in a variable so the optional dependency loads lazily */
const TRANSFORMERS_MODULE = '@huggingface/transformers';

/** Minimum batch size before failing */
const MIN_BATCH_SIZE = 1;

// ============================================================================
// Runtime shapes
// ============================================================================

interface PoolingOptions {
  pooling: 'mean';
  normalize: boolean;
}

type FeatureExtractor = (
  texts: string[],
  options: PoolingOptions,
) => Promise<{ tolist(): unknown }>;

interface TransformersModule {
  env: { cacheDir: string | null; allowRemoteModels: boolean };
  pipeline(task: 'feature-extraction', model: string, options: object): Promise<unknown>;
}

function isTransformersModule(value: unknown): value is TransformersModule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pipeline' in value &&
    typeof value.pipeline === 'function' &&
    'env' in value &&
    typeof value.env === 'object' &&
    value.env !== null
  );
}

function isFeatureExtractor(value: unknown): value is FeatureExtractor {
  return typeof value === 'function';
}

const vectorsSchema = z.array(z.array(z.number()));

const progressSchema = z.object({
  status: z.string(),
  file: z.string().optional(),
  progress: z.number().optional(),
});

/** Imports the Transformers.js module; replaced in tests */
export type ModuleLoader = () => Promise<unknown>;

const importTransformers: ModuleLoader = () => import(TRANSFORMERS_MODULE);

function notInitialized(): NotebookIndexError {
  return new NotebookIndexError(
    'TransformersJsEmbedder not initialized. Call initialize() first.',
    NotebookIndexErrorType.EMBEDDING_UNAVAILABLE,
  );
}

// ============================================================================
// TransformersJsEmbedder
// ============================================================================

export type TransformersJsEmbedderConfig = Pick<
  EmbeddingsConfig,
  'model' | 'dimensions' | 'batchSize' | 'quantization' | 'cacheDir'
>;

export class TransformersJsEmbedder implements TextEmbedder {
  readonly name = 'transformers-js';
  readonly modelId: string;
  readonly dimensions: number;

  private readonly config: TransformersJsEmbedderConfig;
  private extractor: FeatureExtractor | null = null;
  private initializingPromise: Promise<void> | null = null;
  private currentBatchSize: number;

  constructor(
    config: TransformersJsEmbedderConfig,
    private readonly loadModule: ModuleLoader = importTransformers,
  ) {
    this.config = config;
    this.modelId = config.model;
    this.dimensions = config.dimensions;
    this.currentBatchSize = config.batchSize;
  }

  /**
   * Get the current effective batch size.
   */
  getCurrentBatchSize(): number {
    return this.currentBatchSize;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async initialize(onProgress?: ProgressCallback): Promise<void> {
    if (this.extractor) return;

    // Prevent concurrent initialization
    if (this.initializingPromise) {
      await this.initializingPromise;
      return;
    }

    this.initializingPromise = this.doInitialize(onProgress);
    try {
      await this.initializingPromise;
    } finally {
      this.initializingPromise = null;
    }
  }

  private async doInitialize(onProgress?: ProgressCallback): Promise<void> {
    log.startTimer('load');
    try {
      onProgress?.({
        stage: 'download',
        progress: 0,
        message: `Loading model ${this.modelId}...`,
      });

      const transformers: unknown = await this.loadModule();
      if (!isTransformersModule(transformers)) {
        throw new Error(`${TRANSFORMERS_MODULE} does not export a pipeline`);
      }
      if (this.config.cacheDir) {
        transformers.env.cacheDir = this.config.cacheDir;
      }
      transformers.env.allowRemoteModels = true;

      log.debug(
        `Creating pipeline: model=${this.modelId}, dtype=${this.config.quantization}`,
      );

      const extractor = await transformers.pipeline('feature-extraction', this.modelId, {
        dtype: this.config.quantization,
        progress_callback: (data: unknown) => {
          const parsed = progressSchema.safeParse(data);
          if (!parsed.success || parsed.data.status !== 'progress') return;
          onProgress?.({
            stage: 'download',
            progress: Math.round((parsed.data.progress ?? 0) * 0.8) + 20,
            file: parsed.data.file,
            message: `Downloading ${parsed.data.file ?? 'model files'}...`,
          });
        },
      });
      if (!isFeatureExtractor(extractor)) {
        throw new Error('feature-extraction pipeline is not callable');
      }
      this.extractor = extractor;

      const loadMs = log.endTimer('load', 'Pipeline created');
      log.info(`Embedding model ${this.modelId} loaded in ${Math.round(loadMs)}ms`);
      onProgress?.({ stage: 'ready', progress: 100, message: 'Model loaded successfully' });
    } catch (error) {
      this.extractor = null;
      throw new NotebookIndexError(
        `Failed to initialize embedding model ${this.modelId}: ${errorMessage(error)}`,
        NotebookIndexErrorType.EMBEDDING_UNAVAILABLE,
        { model: this.modelId },
      );
    }
  }

  isReady(): boolean {
    return this.extractor !== null;
  }

  async dispose(): Promise<void> {
    this.extractor = null;
  }

  // -------------------------------------------------------------------------
  // Embedding Methods
  // -------------------------------------------------------------------------

  async embedQuery(query: string): Promise<number[]> {
    const [vector] = await this.run([query]);
    if (!vector) {
      throw new NotebookIndexError(
        'Embedding model returned no vector for the query',
        NotebookIndexErrorType.EMBEDDING_UNAVAILABLE,
      );
    }
    return vector;
  }

  /**
   * Embed texts in batches, halving the batch size on failure.
   */
  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    if (!this.extractor) throw notInitialized();

    const results: number[][] = [];
    let offset = 0;
    while (offset < texts.length) {
      const batch = texts.slice(offset, offset + this.currentBatchSize);
      results.push(...(await this.processBatchWithFallback(batch)));
      offset += batch.length;
    }
    return results;
  }

  // -------------------------------------------------------------------------
  // Private Methods
  // -------------------------------------------------------------------------

  private async processBatchWithFallback(texts: string[]): Promise<number[][]> {
    try {
      return await this.run(texts);
    } catch (error) {
      if (this.currentBatchSize <= MIN_BATCH_SIZE || texts.length <= MIN_BATCH_SIZE) {
        throw new NotebookIndexError(
          `Embedding failed even with batch size 1: ${errorMessage(error)}`,
          NotebookIndexErrorType.EMBEDDING_UNAVAILABLE,
          { model: this.modelId },
        );
      }

      const newBatchSize = Math.max(MIN_BATCH_SIZE, Math.floor(this.currentBatchSize / 2));
      log.warn(
        `Embedding batch failed, reducing batch size from ${this.currentBatchSize} to ${newBatchSize}`,
        { error: errorMessage(error) },
      );
      // Later calls keep the smaller size
      this.currentBatchSize = newBatchSize;

      const results: number[][] = [];
      for (let i = 0; i < texts.length; i += newBatchSize) {
        results.push(...(await this.processBatchWithFallback(texts.slice(i, i + newBatchSize))));
      }
      return results;
    }
  }

  private async run(texts: string[]): Promise<number[][]> {
    if (!this.extractor) throw notInitialized();
    const output = await this.extractor(texts, { pooling: 'mean', normalize: true });
    const vectors = vectorsSchema.parse(output.tolist());
    if (vectors.length !== texts.length) {
      throw new Error(`expected ${texts.length} vectors, got ${vectors.length}`);
    }
    return vectors;
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createTransformersJsEmbedder(
  config: TransformersJsEmbedderConfig,
  loadModule?: ModuleLoader,
): TransformersJsEmbedder {
  return new TransformersJsEmbedder(config, loadModule);
}
