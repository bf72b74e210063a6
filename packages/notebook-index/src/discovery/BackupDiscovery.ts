/**
 * Backup discovery.
 *
 * Scans backup roots for section files, groups the dated copies the desktop
 * app leaves behind into one logical section, and picks the copy to index.
 */

import fg from 'fast-glob';
import { readdir, stat } from 'node:fs/promises';
import { basename, dirname, join, relative } from 'node:path';
import type {
  BackupFile,
  BackupVersionGroup,
  NotebookRef,
  SourceUnit,
  SourceWarning,
} from '../types.js';
import { createModuleLogger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';

const log = createModuleLogger('BackupDiscovery');

// ============================================================================
// Types
// ============================================================================

export interface BackupDiscoveryOptions {
  /** Directories whose immediate subdirectories are notebooks */
  backupRoots: string[];
  /** Path segments to skip (matched case-insensitively as substrings) */
  ignoreSegments?: string[];
}

export interface DiscoveredNotebook {
  name: string;
  /** Every directory the notebook was found in, one per root */
  directories: string[];
  groups: BackupVersionGroup[];
}

export interface BackupDiscoveryResult {
  notebooks: DiscoveredNotebook[];
  warnings: SourceWarning[];
}

// ============================================================================
// Section Name Normalization
// ============================================================================

const SECTION_EXTENSION = /\.one$/i;

const SUFFIX_PATTERNS: RegExp[] = [
  // " (On 1-4-2026)", " (On 02.02.26)"
  /\s*\(On [^)]*\)$/i,
  // "_2024-01-01", ".2024-03-15", "-2024.03.15", " 2024_03_15"
  /[\s_.-]+\d{4}[-_.]\d{1,2}[-_.]\d{1,2}$/,
  // "_15-03-2024", " 1.4.26"
  /[\s_.-]+\d{1,2}[-_.]\d{1,2}[-_.]\d{2,4}$/,
  // "_v3", ".v3"
  /[_.]v\d+$/i,
  // " (1)"
  /\s*\(\d+\)$/,
];

const TRAILING_SEPARATORS = /[\s_.-]+$/;
const LEADING_SEPARATORS = /^[\s_.-]+/;

export const UNNAMED_SECTION = '(unnamed)';

const BACKUP_FOLDER_SYNONYMS = new Set([
  'backup',
  'backups',
  'sicherung',
  'sicherungen',
  'sauvegarde',
  'copia de seguridad',
  'respaldo',
  'reservekopie',
  'backup-kopie',
]);

/**
 * Reduce a section file name to the name of the section it backs up.
 *
 * @example normalizeSectionName('Algorithm (On 1-4-2026).one') // 'Algorithm'
 */
export function normalizeSectionName(fileName: string): string {
  let name = fileName.replace(SECTION_EXTENSION, '').replace(SECTION_EXTENSION, '');

  let previous: string;
  do {
    previous = name;
    for (const pattern of SUFFIX_PATTERNS) {
      name = name.replace(pattern, '');
    }
    name = name.replace(TRAILING_SEPARATORS, '');
  } while (name !== previous);

  name = name.replace(LEADING_SEPARATORS, '').trim();
  return name.length > 0 ? name : UNNAMED_SECTION;
}

/**
 * Map localized backup folder names to "Backup".
 */
export function normalizeFolderSegment(segment: string): string {
  return BACKUP_FOLDER_SYNONYMS.has(segment.trim().toLowerCase())
    ? 'Backup'
    : segment;
}

/**
 * Section key of a file relative to its notebook directory:
 * the subfolder path followed by the normalized section name.
 */
export function sectionKeyFor(relativePath: string): string {
  const segments = relativePath.split(/[\\/]/).filter((s) => s.length > 0);
  const fileName = segments.pop() ?? '';
  const folders = segments.map(normalizeFolderSegment);
  return [...folders, normalizeSectionName(fileName)].join('/');
}

/**
 * Newest first: later mtime wins, ties go to the greater file name.
 */
export function compareBackupFiles(a: BackupFile, b: BackupFile): number {
  if (a.mtimeMs !== b.mtimeMs) {
    return b.mtimeMs - a.mtimeMs;
  }
  if (a.fileName === b.fileName) return 0;
  return a.fileName < b.fileName ? 1 : -1;
}

function compareNames(a: string, b: string): number {
  return a.localeCompare(b, undefined, { sensitivity: 'base' });
}

// ============================================================================
// Identifiers
// ============================================================================

export function localNotebookId(notebook: string): string {
  return `local:${notebook}`;
}

export function localSectionId(notebook: string, sectionKey: string): string {
  return `local:${notebook}/${sectionKey}`;
}

// ============================================================================
// BackupDiscovery Class
// ============================================================================

export class BackupDiscovery {
  private readonly backupRoots: string[];
  private readonly ignoreSegments: string[];

  constructor(options: BackupDiscoveryOptions) {
    this.backupRoots = [...options.backupRoots];
    this.ignoreSegments = (options.ignoreSegments ?? ['RecycleBin']).map((s) =>
      s.toLowerCase(),
    );
  }

  get roots(): readonly string[] {
    return this.backupRoots;
  }

  private isIgnored(relativePath: string): boolean {
    if (this.ignoreSegments.length === 0) return false;
    const segments = relativePath.toLowerCase().split(/[\\/]/);
    return segments.some((segment) =>
      this.ignoreSegments.some((ignored) => segment.includes(ignored)),
    );
  }

  /**
   * Scan every root. Never throws for a single unreadable entry.
   */
  async discover(): Promise<BackupDiscoveryResult> {
    const warnings: SourceWarning[] = [];
    const byNotebook = new Map<
      string,
      { directories: string[]; files: Map<string, BackupFile[]> }
    >();

    if (this.backupRoots.length === 0) {
      warnings.push({ message: 'No backup directories configured' });
    }

    for (const root of this.backupRoots) {
      let entries;
      try {
        entries = await readdir(root, { withFileTypes: true });
      } catch (error) {
        log.warn(`Backup root unavailable: ${root}`, { error: errorMessage(error) });
        warnings.push({
          message: `Backup directory not readable: ${errorMessage(error)}`,
          path: root,
        });
        continue;
      }

      for (const entry of entries) {
        if (!entry.isDirectory() || this.isIgnored(entry.name)) continue;

        const notebookDir = join(root, entry.name);
        let notebook = byNotebook.get(entry.name);
        if (!notebook) {
          notebook = { directories: [], files: new Map() };
          byNotebook.set(entry.name, notebook);
        }
        notebook.directories.push(notebookDir);

        await this.collectSectionFiles(notebookDir, notebook.files, warnings);
      }
    }

    const notebooks: DiscoveredNotebook[] = [];
    for (const [name, notebook] of byNotebook) {
      const groups: BackupVersionGroup[] = [];
      for (const [sectionKey, files] of notebook.files) {
        files.sort(compareBackupFiles);
        const [authoritative] = files;
        if (!authoritative) continue;
        groups.push({ notebook: name, sectionKey, authoritative, files });
      }
      groups.sort((a, b) => compareNames(a.sectionKey, b.sectionKey));
      notebooks.push({ name, directories: notebook.directories, groups });
    }
    notebooks.sort((a, b) => compareNames(a.name, b.name));

    log.debug('Discovery complete', {
      notebooks: notebooks.length,
      sections: notebooks.reduce((sum, nb) => sum + nb.groups.length, 0),
      warnings: warnings.length,
    });

    return { notebooks, warnings };
  }

  private async collectSectionFiles(
    notebookDir: string,
    into: Map<string, BackupFile[]>,
    warnings: SourceWarning[],
  ): Promise<void> {
    let entries: string[];
    try {
      entries = await fg('**/*.one', {
        cwd: notebookDir,
        absolute: true,
        onlyFiles: true,
        dot: false,
        caseSensitiveMatch: false,
        followSymbolicLinks: false,
        suppressErrors: true,
      });
    } catch (error) {
      warnings.push({
        message: `Notebook directory not readable: ${errorMessage(error)}`,
        path: notebookDir,
      });
      return;
    }

    for (const absolutePath of entries) {
      const relativePath = relative(notebookDir, absolutePath);
      if (this.isIgnored(dirname(relativePath))) continue;

      let fileStats;
      try {
        fileStats = await stat(absolutePath);
      } catch (error) {
        log.warn(`Skipping unreadable backup file: ${absolutePath}`);
        warnings.push({
          message: `Backup file not readable: ${errorMessage(error)}`,
          path: absolutePath,
        });
        continue;
      }

      const sectionKey = sectionKeyFor(relativePath);
      const files = into.get(sectionKey) ?? [];
      files.push({
        path: absolutePath,
        fileName: basename(absolutePath),
        mtimeMs: fileStats.mtimeMs,
        size: fileStats.size,
      });
      into.set(sectionKey, files);
    }
  }
}

// ============================================================================
// Conversion Helpers
// ============================================================================

/**
 * Turn a discovery result into notebook references and indexable units.
 */
export function toSourceUnits(result: BackupDiscoveryResult): {
  notebooks: NotebookRef[];
  units: SourceUnit[];
} {
  const notebooks: NotebookRef[] = [];
  const units: SourceUnit[] = [];

  for (const notebook of result.notebooks) {
    const notebookId = localNotebookId(notebook.name);
    notebooks.push({
      id: notebookId,
      name: notebook.name,
      provenance: 'local',
      sectionCount: notebook.groups.length,
    });
    for (const group of notebook.groups) {
      units.push({
        section: {
          id: localSectionId(notebook.name, group.sectionKey),
          name: group.sectionKey,
          notebookId,
          notebookName: notebook.name,
          provenance: 'local',
        },
        source: { kind: 'backup-file', group },
      });
    }
  }

  return { notebooks, units };
}
