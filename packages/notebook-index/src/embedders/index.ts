/**
 * Embedders module.
 * Provides text embedding capabilities for semantic search.
 */

import type { EmbeddingsConfig } from '../config.js';
import type { TextEmbedder } from './types.js';
import { TransformersJsEmbedder } from './TransformersJsEmbedder.js';

export type { TextEmbedder, ProgressCallback, ProgressInfo } from './types.js';

export {
  TransformersJsEmbedder,
  createTransformersJsEmbedder,
} from './TransformersJsEmbedder.js';
export type {
  TransformersJsEmbedderConfig,
  ModuleLoader,
} from './TransformersJsEmbedder.js';

export { MockEmbedder } from './MockEmbedder.js';
export type { MockEmbedderConfig } from './MockEmbedder.js';

/**
 * Create the embedder for the configured model. The model loads on initialize().
 */
export function createEmbedder(config: EmbeddingsConfig): TextEmbedder {
  return new TransformersJsEmbedder(config);
}
