/**
 * Notebook REST API contract used by the remote backend.
 */

export interface RemoteSection {
  id: string;
  displayName: string;
}

export interface RemoteNotebook {
  id: string;
  displayName: string;
  sections: RemoteSection[];
}

export interface RemotePageSummary {
  id: string;
  title: string;
  createdDateTime?: string;
  lastModifiedDateTime?: string;
}

export interface RemoteResource {
  bytes: Uint8Array;
  contentType?: string;
}

export interface NotebookApiClient {
  /** Notebooks with their sections; cached until `invalidate()` */
  listNotebooks(): Promise<RemoteNotebook[]>;
  /** Pages of a section, oldest first, across every result page */
  listPages(sectionId: string): Promise<RemotePageSummary[]>;
  /** Page body as HTML */
  getPageContent(pageId: string): Promise<string>;
  /** Binary resource referenced from page HTML (images) */
  getResource(url: string): Promise<RemoteResource>;
  invalidate(): void;
}
