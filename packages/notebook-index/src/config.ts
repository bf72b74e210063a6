/**
 * Configuration types and defaults for the notebook index.
 */

import { homedir, tmpdir } from 'node:os';
import { join, dirname } from 'node:path';
import type { Provenance } from './types.js';
import { NotebookIndexError, NotebookIndexErrorType } from './core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface SourcesConfig {
  /** Backend used when a call does not name one. Default: 'local' */
  backend: Provenance;
  /** Directories holding notebook backups. Default: platform backup dirs that exist */
  backupRoots: string[];
  /** Path segments whose files are never enumerated. Default: ['RecycleBin'] */
  ignoreSegments: string[];
}

export interface DecoderConfig {
  /**
   * Module specifier of the section file decoder, imported at startup.
   * It must export `decode(bytes)` or a default object with `decode`.
   */
  module?: string;
}

export interface RemoteConfig {
  /** Default: 'https://graph.microsoft.com/v1.0' */
  baseUrl: string;
  /** Bearer token for the notebook API */
  accessToken?: string;
  /** Per-request timeout. Default: 60000 */
  requestTimeoutMs: number;
}

export interface EmbeddingsConfig {
  /** Model identifier for Transformers.js. Default: 'Xenova/paraphrase-multilingual-MiniLM-L12-v2' */
  model: string;
  /** Embedding dimensions (must match model). Default: 384 */
  dimensions: number;
  /** Pages per embedding call. Default: 16 */
  batchSize: number;
  /** Model precision. Default: 'q8' */
  quantization: 'fp32' | 'fp16' | 'q8' | 'q4';
  /** Where downloaded models are cached. Default: Transformers.js default */
  cacheDir?: string;
}

export interface IndexConfig {
  /** Directory for index.json, the OCR cache and config.json. Default: ~/.cache/notebook-search */
  storageDir: string;
  /** Longest wait for the index lock before failing with INDEX_BUSY. Default: 300000 */
  lockTimeoutMs: number;
}

export interface SearchConfig {
  /** Default number of semantic results. Default: 20 */
  defaultLimit: number;
  /** Semantic hits scoring below this are dropped. Default: 0.1 */
  minScore: number;
  /** Semantic snippet length in characters. Default: 200 */
  snippetLength: number;
  /** Characters kept on each side of an exact match. Default: 80 */
  exactContextChars: number;
  /** Default cap on exact-match results. Default: 30 */
  maxExactResults: number;
}

export interface OcrConfig {
  /** Enable OCR of embedded images. Default: true */
  enabled: boolean;
  /** Tesseract language codes. Default: ['eng'] */
  languages: string[];
}

export interface LoggingConfig {
  /** debug | info | warn | error | silent. Default: 'info' */
  level: string;
  /** JSON-lines log file. Default: <tmpdir>/notebook-search.log */
  filePath?: string;
  /** JSON console output. Default: false */
  json: boolean;
}

export interface NotebookSearchConfig {
  sources: SourcesConfig;
  decoder: DecoderConfig;
  remote: RemoteConfig;
  embeddings: EmbeddingsConfig;
  index: IndexConfig;
  search: SearchConfig;
  ocr: OcrConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration: every section optional, every field optional.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object
    ? T[P] extends unknown[]
      ? T[P]
      : DeepPartial<T[P]>
    : T[P];
};

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Backup directories the desktop notebook app writes to on this platform.
 * The German-locale app names the folder "Sicherung".
 */
export function defaultBackupRoots(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): string[] {
  if (platform === 'darwin') {
    const base = join(
      home,
      'Library',
      'Containers',
      'com.microsoft.onenote.mac',
      'Data',
      'Library',
      'Application Support',
      'Microsoft User Data',
      'OneNote',
      '15.0',
    );
    return [join(base, 'Sicherung'), join(base, 'Backup')];
  }
  if (platform === 'win32') {
    const localAppData =
      env['LOCALAPPDATA'] ??
      (env['APPDATA'] ? join(dirname(env['APPDATA']), 'Local') : undefined);
    return localAppData
      ? [join(localAppData, 'Microsoft', 'OneNote', '16.0', 'Backup')]
      : [];
  }
  return [];
}

export const DEFAULT_SOURCES_CONFIG: SourcesConfig = {
  backend: 'local',
  backupRoots: defaultBackupRoots(),
  ignoreSegments: ['RecycleBin'],
};

export const DEFAULT_DECODER_CONFIG: DecoderConfig = {
  module: undefined,
};

export const DEFAULT_REMOTE_CONFIG: RemoteConfig = {
  baseUrl: 'https://graph.microsoft.com/v1.0',
  accessToken: undefined,
  requestTimeoutMs: 60_000,
};

export const DEFAULT_EMBEDDINGS_CONFIG: EmbeddingsConfig = {
  model: 'Xenova/paraphrase-multilingual-MiniLM-L12-v2',
  dimensions: 384,
  batchSize: 16,
  quantization: 'q8',
  cacheDir: undefined,
};

export const DEFAULT_INDEX_CONFIG: IndexConfig = {
  storageDir: join(homedir(), '.cache', 'notebook-search'),
  lockTimeoutMs: 300_000,
};

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  defaultLimit: 20,
  minScore: 0.1,
  snippetLength: 200,
  exactContextChars: 80,
  maxExactResults: 30,
};

export const DEFAULT_OCR_CONFIG: OcrConfig = {
  enabled: true,
  languages: ['eng'],
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: 'info',
  filePath: join(tmpdir(), 'notebook-search.log'),
  json: false,
};

export const DEFAULT_CONFIG: NotebookSearchConfig = {
  sources: DEFAULT_SOURCES_CONFIG,
  decoder: DEFAULT_DECODER_CONFIG,
  remote: DEFAULT_REMOTE_CONFIG,
  embeddings: DEFAULT_EMBEDDINGS_CONFIG,
  index: DEFAULT_INDEX_CONFIG,
  search: DEFAULT_SEARCH_CONFIG,
  ocr: DEFAULT_OCR_CONFIG,
  logging: DEFAULT_LOGGING_CONFIG,
};

// ============================================================================
// Configuration Utilities
// ============================================================================

/**
 * Merge one flat section, ignoring undefined overrides.
 */
function mergeSection<T extends object>(defaults: T, overrides?: Partial<T>): T {
  const result = { ...defaults };
  if (!overrides) return result;

  for (const key in overrides) {
    if (!Object.prototype.hasOwnProperty.call(overrides, key)) continue;
    const value = overrides[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Create a complete configuration by merging partial config with defaults.
 */
export function createConfig(
  partial?: DeepPartial<NotebookSearchConfig>,
): NotebookSearchConfig {
  return {
    sources: mergeSection(DEFAULT_SOURCES_CONFIG, partial?.sources),
    decoder: mergeSection(DEFAULT_DECODER_CONFIG, partial?.decoder),
    remote: mergeSection(DEFAULT_REMOTE_CONFIG, partial?.remote),
    embeddings: mergeSection(DEFAULT_EMBEDDINGS_CONFIG, partial?.embeddings),
    index: mergeSection(DEFAULT_INDEX_CONFIG, partial?.index),
    search: mergeSection(DEFAULT_SEARCH_CONFIG, partial?.search),
    ocr: mergeSection(DEFAULT_OCR_CONFIG, partial?.ocr),
    logging: mergeSection(DEFAULT_LOGGING_CONFIG, partial?.logging),
  };
}

/**
 * Layer several partial configurations; later layers win.
 */
export function mergeConfigLayers(
  ...layers: Array<DeepPartial<NotebookSearchConfig> | undefined>
): DeepPartial<NotebookSearchConfig> {
  const merged: DeepPartial<NotebookSearchConfig> = {};
  for (const next of layers) {
    if (!next) continue;
    merged.sources = layer<SourcesConfig>(merged.sources, next.sources);
    merged.decoder = layer<DecoderConfig>(merged.decoder, next.decoder);
    merged.remote = layer<RemoteConfig>(merged.remote, next.remote);
    merged.embeddings = layer<EmbeddingsConfig>(merged.embeddings, next.embeddings);
    merged.index = layer<IndexConfig>(merged.index, next.index);
    merged.search = layer<SearchConfig>(merged.search, next.search);
    merged.ocr = layer<OcrConfig>(merged.ocr, next.ocr);
    merged.logging = layer<LoggingConfig>(merged.logging, next.logging);
  }
  return merged;
}

function layer<T extends object>(
  base: Partial<T> | undefined,
  next: Partial<T> | undefined,
): Partial<T> {
  return mergeSection<Partial<T>>(base ?? {}, next);
}

function invalid(message: string): NotebookIndexError {
  return new NotebookIndexError(message, NotebookIndexErrorType.CONFIGURATION);
}

/**
 * Validate configuration values.
 * Throws a CONFIGURATION error if configuration is invalid.
 */
export function validateConfig(config: NotebookSearchConfig): void {
  if (config.sources.backend !== 'local' && config.sources.backend !== 'remote') {
    throw invalid(`Unknown source backend: ${String(config.sources.backend)}`);
  }

  if (!config.remote.baseUrl) {
    throw invalid('remote.baseUrl is required');
  }
  if (config.remote.requestTimeoutMs <= 0) {
    throw invalid('remote.requestTimeoutMs must be positive');
  }

  if (!config.embeddings.model) {
    throw invalid('embeddings.model is required');
  }
  if (!Number.isInteger(config.embeddings.dimensions) || config.embeddings.dimensions <= 0) {
    throw invalid('embeddings.dimensions must be a positive integer');
  }
  if (!Number.isInteger(config.embeddings.batchSize) || config.embeddings.batchSize <= 0) {
    throw invalid('embeddings.batchSize must be a positive integer');
  }

  if (!config.index.storageDir) {
    throw invalid('index.storageDir is required');
  }
  if (config.index.lockTimeoutMs <= 0) {
    throw invalid('index.lockTimeoutMs must be positive');
  }

  if (config.search.defaultLimit <= 0) {
    throw invalid('search.defaultLimit must be positive');
  }
  if (config.search.minScore < -1 || config.search.minScore > 1) {
    throw invalid('search.minScore must be between -1 and 1');
  }
  if (config.search.snippetLength <= 0) {
    throw invalid('search.snippetLength must be positive');
  }
  if (config.search.exactContextChars < 0) {
    throw invalid('search.exactContextChars cannot be negative');
  }
  if (config.search.maxExactResults <= 0) {
    throw invalid('search.maxExactResults must be positive');
  }

  if (config.ocr.enabled && config.ocr.languages.length === 0) {
    throw invalid('ocr.languages must name at least one language');
  }
}
