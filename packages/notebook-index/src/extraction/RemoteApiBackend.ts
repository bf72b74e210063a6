/**
 * RemoteApiBackend - pages from the notebook REST API.
 *
 * Page bodies are fetched as HTML and reduced to text. Pages are memoized by
 * (id, lastModified), so only pages edited since the last pass are fetched;
 * entries of pages no longer listed in their section are dropped. A page whose
 * body cannot be fetched is skipped and the rest of its section is kept.
 */

import type {
  EnumerationResult,
  ImageRef,
  NotebookRef,
  Page,
  SourceUnit,
} from '../types.js';
import type { PageBackend, SkippedPage } from './types.js';
import type { NotebookApiClient, RemotePageSummary } from '../remote/types.js';
import { extractImages, htmlToText } from '../remote/html.js';
import type { ImageTextExtractor } from '../ocr/ImageTextExtractor.js';
import {
  NotebookIndexError,
  NotebookIndexErrorType,
  errorMessage,
  isNotebookIndexError,
} from '../core/errors.js';
import { createModuleLogger } from '../core/Logger.js';

const log = createModuleLogger('RemoteApiBackend');

export interface RemoteApiBackendOptions {
  client: NotebookApiClient;
  images: ImageTextExtractor;
}

interface MemoEntry {
  sectionId: string;
  lastModified: string | undefined;
  texts: string[];
  images: ImageRef[];
}

export function remoteId(apiId: string): string {
  return `remote:${apiId}`;
}

function parseTimestamp(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : ms;
}

export class RemoteApiBackend implements PageBackend {
  readonly provenance = 'remote' as const;

  private readonly client: NotebookApiClient;
  private readonly images: ImageTextExtractor;
  private readonly memo = new Map<string, MemoEntry>();

  constructor(options: RemoteApiBackendOptions) {
    this.client = options.client;
    this.images = options.images;
  }

  async enumerate(): Promise<EnumerationResult> {
    const remoteNotebooks = await this.client.listNotebooks();
    const notebooks: NotebookRef[] = [];
    const units: SourceUnit[] = [];

    for (const notebook of remoteNotebooks) {
      const notebookId = remoteId(notebook.id);
      notebooks.push({
        id: notebookId,
        name: notebook.displayName,
        provenance: 'remote',
        sectionCount: notebook.sections.length,
      });
      for (const section of notebook.sections) {
        units.push({
          section: {
            id: remoteId(section.id),
            name: section.displayName,
            notebookId,
            notebookName: notebook.displayName,
            provenance: 'remote',
          },
          source: { kind: 'remote-section', sectionId: section.id },
        });
      }
    }

    return { notebooks, units, warnings: [] };
  }

  async extractPages(
    unit: SourceUnit,
    onSkipped?: (page: SkippedPage) => void,
  ): Promise<Page[]> {
    if (unit.source.kind !== 'remote-section') {
      throw new NotebookIndexError(
        `Unit ${unit.section.id} is not a remote section`,
        NotebookIndexErrorType.EXTRACTION_FAILURE,
        { sectionId: unit.section.id },
      );
    }

    let summaries: RemotePageSummary[];
    try {
      summaries = await this.client.listPages(unit.source.sectionId);
    } catch (error) {
      throw this.unitError(unit, 'list pages of', error);
    }

    const listed = new Set(summaries.map((summary) => summary.id));
    for (const [pageId, entry] of this.memo) {
      if (entry.sectionId === unit.source.sectionId && !listed.has(pageId)) {
        this.memo.delete(pageId);
      }
    }

    const pages: Page[] = [];
    for (const summary of summaries) {
      let content: MemoEntry;
      try {
        content = await this.pageContent(unit.source.sectionId, summary);
      } catch (error) {
        const message = errorMessage(error);
        log.warn(`Skipping page '${summary.title}' in section '${unit.section.name}'`, {
          error: message,
        });
        onSkipped?.({ pageId: remoteId(summary.id), title: summary.title, message });
        continue;
      }
      pages.push({
        id: remoteId(summary.id),
        title: summary.title,
        section: unit.section,
        texts: content.texts,
        images: content.images,
        provenance: 'remote',
        lastModified: parseTimestamp(summary.lastModifiedDateTime),
      });
    }
    return pages;
  }

  private async pageContent(
    sectionId: string,
    summary: RemotePageSummary,
  ): Promise<MemoEntry> {
    const cached = this.memo.get(summary.id);
    if (
      cached &&
      cached.lastModified !== undefined &&
      cached.lastModified === summary.lastModifiedDateTime
    ) {
      // Pages moved between sections keep their id
      cached.sectionId = sectionId;
      return cached;
    }

    const html = await this.client.getPageContent(summary.id);
    const text = htmlToText(html);
    const images: ImageRef[] = [];
    for (const image of extractImages(html)) {
      try {
        const resource = await this.client.getResource(image.src);
        images.push(
          await this.images.extract({
            bytes: resource.bytes,
            contentType: image.contentType ?? resource.contentType,
          }),
        );
      } catch (error) {
        log.warn(`Could not fetch image for page '${summary.title}'`, {
          error: errorMessage(error),
        });
      }
    }

    const entry: MemoEntry = {
      sectionId,
      lastModified: summary.lastModifiedDateTime,
      texts: text.length > 0 ? text.split('\n') : [],
      images,
    };
    this.memo.set(summary.id, entry);
    return entry;
  }

  private unitError(unit: SourceUnit, action: string, error: unknown): NotebookIndexError {
    if (isNotebookIndexError(error)) {
      return error;
    }
    return new NotebookIndexError(
      `Failed to ${action} section '${unit.section.name}': ${errorMessage(error)}`,
      NotebookIndexErrorType.EXTRACTION_FAILURE,
      { sectionId: unit.section.id },
    );
  }

  invalidate(): void {
    this.memo.clear();
    this.client.invalidate();
  }
}
