/**
 * LocalBackupBackend - pages from section backup files on disk.
 *
 * Only the authoritative file of each version group is decoded. Decoded pages
 * are memoized by (path, mtime, size), so a pass over unchanged backups reads
 * nothing but directory listings.
 */

import { readFile } from 'node:fs/promises';
import type { EnumerationResult, ImageRef, Page, SourceUnit } from '../types.js';
import type { PageBackend } from './types.js';
import { disambiguateTitle } from './types.js';
import type { BackupDiscovery } from '../discovery/BackupDiscovery.js';
import { toSourceUnits } from '../discovery/BackupDiscovery.js';
import type { DecodedNode, NoteDecoder } from '../decoder/types.js';
import type { ImageBlob, ImageTextExtractor } from '../ocr/ImageTextExtractor.js';
import {
  NotebookIndexError,
  NotebookIndexErrorType,
  errorMessage,
} from '../core/errors.js';
import { createModuleLogger } from '../core/Logger.js';

const log = createModuleLogger('LocalBackupBackend');

// ============================================================================
// Types
// ============================================================================

export interface LocalBackupBackendOptions {
  discovery: BackupDiscovery;
  /** Without a decoder, units enumerate but fail to extract */
  decoder?: NoteDecoder;
  images: ImageTextExtractor;
}

/** A page under construction while walking the content tree. */
export interface DraftPage {
  title: string;
  texts: string[];
  images: ImageBlob[];
}

interface MemoEntry {
  key: string;
  pages: Page[];
}

// ============================================================================
// Content Tree Walk
// ============================================================================

function cleanTitle(title: string): string {
  return title.replace(/\u0000/g, '').trim();
}

/**
 * Split a decoded section into pages, in document order.
 *
 * A page node with a new title starts a page; one repeating the current title
 * continues it. Content before the first titled page is dropped.
 */
export function collectDraftPages(root: DecodedNode): DraftPage[] {
  const pages: DraftPage[] = [];
  let current: DraftPage | null = null;

  const visit = (node: DecodedNode): void => {
    switch (node.kind) {
      case 'page': {
        const title = cleanTitle(node.title);
        if (title.length > 0 && title !== current?.title) {
          current = { title, texts: [], images: [] };
          pages.push(current);
        }
        node.children?.forEach(visit);
        break;
      }
      case 'text': {
        const text = node.text.replace(/\u0000/g, '').trim();
        if (current && text.length > 0) {
          current.texts.push(text);
        }
        break;
      }
      case 'image':
        current?.images.push({ bytes: node.bytes, extension: node.extension });
        break;
      case 'container':
        node.children.forEach(visit);
        break;
    }
  };

  visit(root);
  return pages;
}

// ============================================================================
// LocalBackupBackend Class
// ============================================================================

export class LocalBackupBackend implements PageBackend {
  readonly provenance = 'local' as const;

  private readonly discovery: BackupDiscovery;
  private readonly decoder: NoteDecoder | undefined;
  private readonly images: ImageTextExtractor;
  /** Keyed by section id; one entry per section */
  private readonly memo = new Map<string, MemoEntry>();

  constructor(options: LocalBackupBackendOptions) {
    this.discovery = options.discovery;
    this.decoder = options.decoder;
    this.images = options.images;
  }

  get hasDecoder(): boolean {
    return this.decoder !== undefined;
  }

  get backupRoots(): readonly string[] {
    return this.discovery.roots;
  }

  async enumerate(): Promise<EnumerationResult> {
    const result = await this.discovery.discover();
    const { notebooks, units } = toSourceUnits(result);
    return { notebooks, units, warnings: result.warnings };
  }

  async extractPages(unit: SourceUnit): Promise<Page[]> {
    if (unit.source.kind !== 'backup-file') {
      throw new NotebookIndexError(
        `Unit ${unit.section.id} is not a backup file`,
        NotebookIndexErrorType.EXTRACTION_FAILURE,
        { sectionId: unit.section.id },
      );
    }

    const file = unit.source.group.authoritative;
    const key = `${file.path}:${file.mtimeMs}:${file.size}`;
    const cached = this.memo.get(unit.section.id);
    if (cached && cached.key === key) {
      return cached.pages;
    }

    if (!this.decoder) {
      throw new NotebookIndexError(
        'No section decoder configured; set NOTEBOOK_SEARCH_DECODER to a decoder module',
        NotebookIndexErrorType.EXTRACTION_FAILURE,
        { sectionId: unit.section.id, path: file.path },
      );
    }

    let bytes: Uint8Array;
    try {
      bytes = await readFile(file.path);
    } catch (error) {
      throw new NotebookIndexError(
        `Failed to read backup file ${file.fileName}: ${errorMessage(error)}`,
        NotebookIndexErrorType.SOURCE_UNREADABLE,
        { sectionId: unit.section.id, path: file.path },
      );
    }

    let root: DecodedNode;
    try {
      root = await this.decoder.decode(bytes);
    } catch (error) {
      throw new NotebookIndexError(
        `Failed to decode ${file.fileName}: ${errorMessage(error)}`,
        NotebookIndexErrorType.EXTRACTION_FAILURE,
        { sectionId: unit.section.id, path: file.path },
      );
    }

    const drafts = collectDraftPages(root);
    const seen = new Map<string, number>();
    const pages: Page[] = [];
    for (const draft of drafts) {
      const images: ImageRef[] = [];
      for (const image of draft.images) {
        images.push(await this.images.extract(image));
      }
      pages.push({
        id: `${unit.section.id}/${disambiguateTitle(seen, draft.title)}`,
        title: draft.title,
        section: unit.section,
        texts: draft.texts,
        images,
        provenance: 'local',
        lastModified: file.mtimeMs,
      });
    }

    log.debug(`Extracted ${pages.length} pages from ${file.fileName}`, {
      section: unit.section.id,
    });
    this.memo.set(unit.section.id, { key, pages });
    return pages;
  }

  invalidate(): void {
    this.memo.clear();
  }
}
