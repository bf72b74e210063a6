/**
 * Notebook Index Package
 *
 * Incremental indexing and retrieval over notebook section backups
 * and remote notebook pages.
 */

// ============================================================================
// Main Entry Point - NotebookSearchSystem
// ============================================================================

export {
  NotebookSearchSystem,
  initializeNotebookSearchSystem,
  type NotebookSearchSystemOptions,
  type NotebookSearchSystemEvents,
  type NotebookListing,
  type SectionListing,
  type NotebookSections,
  type PageListing,
  type SectionContent,
  type SectionSummary,
  type NotebookSummary,
  type SystemStatus,
} from './core/NotebookSearchSystem.js';

// ============================================================================
// Core Types
// ============================================================================

export type {
  Provenance,
  NotebookRef,
  SectionRef,
  BackupFile,
  BackupVersionGroup,
  SourceHandle,
  SourceUnit,
  SourceWarning,
  EnumerationResult,
  ImageRef,
  Page,
  EmbeddingRecord,
  IndexScope,
  ScoredPage,
  UnitFailure,
  IndexUpdateSummary,
  MatchType,
  SearchScope,
  SearchRequest,
  SearchHit,
  SearchResponse,
} from './types.js';

// ============================================================================
// Configuration
// ============================================================================

export type {
  NotebookSearchConfig,
  SourcesConfig,
  DecoderConfig,
  RemoteConfig,
  EmbeddingsConfig,
  IndexConfig,
  SearchConfig,
  OcrConfig,
  LoggingConfig,
  DeepPartial,
} from './config.js';

export {
  DEFAULT_CONFIG,
  createConfig,
  mergeConfigLayers,
  validateConfig,
  defaultBackupRoots,
} from './config.js';

export {
  USER_CONFIG_FILENAME,
  ENV_PREFIX,
  type UserConfigFile,
  type ResolveConfigOptions,
  getUserConfigPath,
  loadUserConfig,
  readEnvOverrides,
  resolveConfig,
} from './config/user-config.js';

// ============================================================================
// Errors, Logging & Events
// ============================================================================

export {
  NotebookIndexError,
  NotebookIndexErrorType,
  isNotebookIndexError,
  errorMessage,
} from './core/errors.js';

export {
  Logger,
  ModuleLogger,
  LogLevel,
  globalLogger,
  createModuleLogger,
  parseLogLevel,
  type LogEntry,
  type LoggerConfig,
} from './core/Logger.js';

export { EventEmitter, type EventHandler } from './core/EventEmitter.js';

// ============================================================================
// Sources
// ============================================================================

export {
  BackupDiscovery,
  normalizeSectionName,
  sectionKeyFor,
  type BackupDiscoveryOptions,
  type BackupDiscoveryResult,
} from './discovery/BackupDiscovery.js';

export type { NoteDecoder, DecodedNode } from './decoder/types.js';
export { loadNoteDecoder } from './decoder/loadNoteDecoder.js';

export type { PageBackend } from './extraction/types.js';
export {
  LocalBackupBackend,
  type LocalBackupBackendOptions,
} from './extraction/LocalBackupBackend.js';
export {
  RemoteApiBackend,
  type RemoteApiBackendOptions,
} from './extraction/RemoteApiBackend.js';
export { composePageText } from './extraction/page-text.js';

export type {
  NotebookApiClient,
  RemoteNotebook,
  RemoteSection,
  RemotePageSummary,
  RemoteResource,
} from './remote/types.js';
export {
  GraphNotebookClient,
  type GraphNotebookClientOptions,
} from './remote/GraphNotebookClient.js';

// ============================================================================
// OCR & Embeddings
// ============================================================================

export {
  type OcrProvider,
  NoopOcrProvider,
  TesseractJsProvider,
  OcrCache,
  ImageTextExtractor,
  createOcrProvider,
} from './ocr/index.js';

export {
  type TextEmbedder,
  type ProgressCallback,
  type ProgressInfo,
  TransformersJsEmbedder,
  MockEmbedder,
  createEmbedder,
} from './embedders/index.js';

// ============================================================================
// Index & Search
// ============================================================================

export { EmbeddingIndex, cosineSimilarity } from './indexing/EmbeddingIndex.js';
export { IncrementalIndexer, type PassResult } from './indexing/IncrementalIndexer.js';
export { FileIndexStore, INDEX_FORMAT_VERSION } from './storage/FileIndexStore.js';
export {
  SearchCoordinator,
  type SearchCoordinatorEvents,
} from './search/SearchCoordinator.js';
