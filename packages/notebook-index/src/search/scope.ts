/**
 * Name lookups against an enumeration. Names match case-insensitively; a
 * miss raises NOT_FOUND listing what is available.
 */

import type {
  EnumerationResult,
  IndexScope,
  NotebookRef,
  Provenance,
  SearchScope,
  SourceUnit,
} from '../types.js';
import { NotebookIndexError, NotebookIndexErrorType } from '../core/errors.js';

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function listNames(names: string[]): string {
  return names.length > 0 ? names.join(', ') : '(none)';
}

export function findNotebook(
  enumeration: EnumerationResult,
  name: string,
): NotebookRef {
  const notebook = enumeration.notebooks.find((n) => sameName(n.name, name));
  if (!notebook) {
    throw new NotebookIndexError(
      `Notebook '${name}' not found. Available notebooks: ${listNames(
        enumeration.notebooks.map((n) => n.name),
      )}`,
      NotebookIndexErrorType.NOT_FOUND,
      { notebook: name },
    );
  }
  return notebook;
}

export function unitsOf(
  enumeration: EnumerationResult,
  notebook: NotebookRef,
): SourceUnit[] {
  return enumeration.units.filter((u) => u.section.notebookId === notebook.id);
}

export function findSection(
  enumeration: EnumerationResult,
  notebook: NotebookRef,
  name: string,
): SourceUnit {
  const units = unitsOf(enumeration, notebook);
  const unit = units.find((u) => sameName(u.section.name, name));
  if (!unit) {
    throw new NotebookIndexError(
      `Section '${name}' not found in notebook '${notebook.name}'. Available sections: ${listNames(
        units.map((u) => u.section.name),
      )}`,
      NotebookIndexErrorType.NOT_FOUND,
      { notebook: notebook.name, section: name },
    );
  }
  return unit;
}

/**
 * A section named without its notebook must be unique across notebooks.
 */
function findSectionAnywhere(
  enumeration: EnumerationResult,
  name: string,
): SourceUnit {
  const matches = enumeration.units.filter((u) => sameName(u.section.name, name));
  const [first] = matches;
  if (!first) {
    throw new NotebookIndexError(
      `Section '${name}' not found. Available sections: ${listNames(
        enumeration.units.map((u) => u.section.name),
      )}`,
      NotebookIndexErrorType.NOT_FOUND,
      { section: name },
    );
  }
  if (matches.length > 1) {
    throw new NotebookIndexError(
      `Section '${name}' exists in several notebooks (${listNames(
        matches.map((u) => u.section.notebookName),
      )}); name the notebook as well`,
      NotebookIndexErrorType.NOT_FOUND,
      { section: name },
    );
  }
  return first;
}

export interface ResolvedScope {
  index: IndexScope;
  /** Units inside the scope, in enumeration order */
  units: SourceUnit[];
}

/**
 * Turn display names into ids and the units they cover.
 */
export function resolveScope(
  enumeration: EnumerationResult,
  provenance: Provenance,
  scope: SearchScope | undefined,
): ResolvedScope {
  if (scope?.notebook !== undefined) {
    const notebook = findNotebook(enumeration, scope.notebook);
    if (scope.section !== undefined) {
      const unit = findSection(enumeration, notebook, scope.section);
      return {
        index: { provenance, notebookId: notebook.id, sectionId: unit.section.id },
        units: [unit],
      };
    }
    return {
      index: { provenance, notebookId: notebook.id },
      units: unitsOf(enumeration, notebook),
    };
  }

  if (scope?.section !== undefined) {
    const unit = findSectionAnywhere(enumeration, scope.section);
    return {
      index: { provenance, sectionId: unit.section.id },
      units: [unit],
    };
  }

  return { index: { provenance }, units: enumeration.units };
}
