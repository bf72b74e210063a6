/**
 * Core types for the notebook index.
 */

// ============================================================================
// Sources
// ============================================================================

/** Which backend produced a page. */
export type Provenance = 'local' | 'remote';

export interface NotebookRef {
  /** Stable identifier (`local:<name>` or `remote:<api id>`) */
  id: string;
  name: string;
  provenance: Provenance;
  sectionCount: number;
}

export interface SectionRef {
  /** Stable identifier (`local:<notebook>/<section key>` or `remote:<api id>`) */
  id: string;
  /** Display name; for local sections the subfolder-qualified section key */
  name: string;
  notebookId: string;
  notebookName: string;
  provenance: Provenance;
}

/** One section backup file on disk. */
export interface BackupFile {
  path: string;
  fileName: string;
  mtimeMs: number;
  size: number;
}

/**
 * All on-disk copies of one logical section.
 * `files[0]` is the authoritative copy; the rest are kept for recovery only.
 */
export interface BackupVersionGroup {
  notebook: string;
  sectionKey: string;
  authoritative: BackupFile;
  files: BackupFile[];
}

export type SourceHandle =
  | { kind: 'backup-file'; group: BackupVersionGroup }
  | { kind: 'remote-section'; sectionId: string };

/** A section together with the handle its pages are read from. */
export interface SourceUnit {
  section: SectionRef;
  source: SourceHandle;
}

export interface SourceWarning {
  message: string;
  path?: string;
  sectionId?: string;
}

export interface EnumerationResult {
  notebooks: NotebookRef[];
  units: SourceUnit[];
  warnings: SourceWarning[];
}

// ============================================================================
// Pages
// ============================================================================

/** An image embedded in a page, after OCR. */
export interface ImageRef {
  /** SHA-256 of the image bytes */
  fingerprint: string;
  /** Lowercase extension with leading dot, or '' when unknown */
  extension: string;
  /** Recognized text; '' when OCR is unavailable or found nothing */
  ocrText: string;
}

/**
 * Canonical page record produced by either backend.
 * Immutable once materialized for an indexing pass.
 */
export interface Page {
  id: string;
  title: string;
  section: SectionRef;
  /** Text runs in authoring order */
  texts: string[];
  images: ImageRef[];
  provenance: Provenance;
  /** Last-modified time in epoch milliseconds, when the backend provides one */
  lastModified?: number;
}

// ============================================================================
// Index
// ============================================================================

export interface EmbeddingRecord {
  pageId: string;
  /** Content fingerprint of the text the vector was computed from */
  fingerprint: string;
  vector: number[];
  notebookId: string;
  sectionId: string;
  title: string;
  provenance: Provenance;
  lastModified?: number;
}

/** Candidate restriction applied before ranking. */
export interface IndexScope {
  provenance?: Provenance;
  notebookId?: string;
  sectionId?: string;
}

export interface ScoredPage {
  pageId: string;
  score: number;
}

export interface UnitFailure {
  sectionId: string;
  sectionName: string;
  notebookName: string;
  message: string;
}

/** Outcome of one freshness pass. */
export interface IndexUpdateSummary {
  provenance: Provenance;
  forced: boolean;
  /** Pages embedded for the first time */
  added: number;
  /** Pages re-embedded because their fingerprint changed (or forced) */
  updated: number;
  /** Pages whose stored vector was reused */
  unchanged: number;
  removed: number;
  /** Pages whose embedding failed; previous vectors were kept */
  embedFailures: number;
  failedUnits: UnitFailure[];
  warnings: SourceWarning[];
  /** Records in the index after the pass */
  indexSize: number;
  durationMs: number;
}

// ============================================================================
// Search
// ============================================================================

export type MatchType = 'semantic' | 'exact';

/** Scope given by display names, resolved against the current enumeration. */
export interface SearchScope {
  notebook?: string;
  section?: string;
}

export interface SearchRequest {
  query: string;
  /** Maximum number of results */
  k?: number;
  exactMatch?: boolean;
  scope?: SearchScope;
}

export interface SearchHit {
  page: Page;
  snippet: string;
  score: number;
  matchType: MatchType;
}

export interface SearchResponse {
  query: string;
  mode: MatchType;
  provenance: Provenance;
  hits: SearchHit[];
  /** Milliseconds spent, including any freshness pass */
  took: number;
  /** Freshness pass that ran before a semantic query */
  update?: IndexUpdateSummary;
}
