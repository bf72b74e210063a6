/**
 * Plain-text rendering of tool results.
 */

import {
  composePageText,
  type IndexUpdateSummary,
  type NotebookListing,
  type NotebookSections,
  type NotebookSummary,
  type Page,
  type PageListing,
  type Provenance,
  type SearchResponse,
  type SectionContent,
  type SectionListing,
  type SystemStatus,
} from '@notebook-search/index';

const NO_TEXT = '(no text content)';

/** Name of a source as tools accept it. */
export function sourceLabel(source: Provenance): 'local' | 'api' {
  return source === 'remote' ? 'api' : 'local';
}

export function formatSize(bytes: number): string {
  return `${Math.round(bytes / 1024)} KB`;
}

function sectionDetails(section: SectionListing): string {
  const details: string[] = [];
  if (section.sizeBytes !== undefined) details.push(formatSize(section.sizeBytes));
  if (section.versionCount > 1) details.push(`${section.versionCount} versions`);
  return details.length > 0 ? `${section.name}  (${details.join(', ')})` : section.name;
}

// ============================================================================
// Browsing
// ============================================================================

export function formatNotebooks(notebooks: NotebookListing[]): string {
  if (notebooks.length === 0) return 'No notebooks found.';
  return notebooks
    .map((nb) => `- ${nb.name}  (${nb.sectionCount} section${nb.sectionCount === 1 ? '' : 's'})`)
    .join('\n');
}

export function formatSections(notebook: string, sections: SectionListing[]): string {
  if (sections.length === 0) return `No sections found in '${notebook}'.`;
  return sections.map((s) => `- ${sectionDetails(s)}`).join('\n');
}

export function formatAllSections(notebooks: NotebookSections[]): string {
  if (notebooks.length === 0) return 'No notebooks found.';
  return notebooks
    .map((nb) =>
      [`## ${nb.notebook}`, ...nb.sections.map((s) => `  - ${sectionDetails(s)}`)].join('\n'),
    )
    .join('\n\n');
}

export function formatPages(section: string, pages: PageListing[]): string {
  if (pages.length === 0) return `No pages found in section '${section}'.`;
  return pages.map((p) => `- ${p.title}  (id: ${p.id})`).join('\n');
}

export function formatSection(content: SectionContent): string {
  if (content.pages.length === 0) {
    return `No pages found in section '${content.section.name}'.`;
  }
  return content.pages
    .map((page) => `## ${page.title}\n\n${composePageText(page) || NO_TEXT}`)
    .join('\n\n');
}

export function formatPage(page: Page): string {
  const text = composePageText(page);
  if (text.length === 0) {
    return `Page '${page.title}' exists but has no text content.`;
  }
  return `# ${page.title}\n\n${text}`;
}

export function formatNotebookSummary(summary: NotebookSummary): string {
  const lines = [`# ${summary.notebook.name}`];
  for (const section of summary.sections) {
    lines.push('', `## ${section.name}`);
    if ('error' in section) {
      lines.push(`  (unreadable: ${section.error})`);
    } else if (section.preview.length === 0) {
      lines.push(`  ${NO_TEXT}`);
    } else {
      lines.push(`  Preview: ${section.preview}`);
    }
  }
  return lines.join('\n');
}

// ============================================================================
// Search & Index
// ============================================================================

export function formatSearchResponse(response: SearchResponse): string {
  if (response.hits.length === 0) {
    return `No results found for '${response.query}'.` + failureNote(response.update);
  }

  const mode = response.mode === 'exact' ? 'exact match' : 'semantic search';
  const header = `Found ${response.hits.length} match(es) for '${response.query}' (${mode}):`;
  const hits = response.hits.map((hit) => {
    const location = `[${hit.page.section.notebookName} / ${hit.page.section.name} / "${hit.page.title}"]`;
    const score = hit.matchType === 'semantic' ? `  (score: ${hit.score.toFixed(2)})` : '';
    return `${location}${score}\n  ${hit.snippet}`;
  });
  return [header, ...hits].join('\n\n') + failureNote(response.update);
}

function failureNote(update: IndexUpdateSummary | undefined): string {
  if (!update || update.failedUnits.length === 0) return '';
  const names = update.failedUnits.map((f) => `${f.notebookName} / ${f.sectionName}`);
  return `\n\nNote: ${names.length} section(s) could not be read: ${names.join(', ')}`;
}

export function formatRebuild(summary: IndexUpdateSummary): string {
  return (
    `Search index rebuilt (${sourceLabel(summary.provenance)}): ${summary.indexSize} pages indexed, ` +
    `${summary.added + summary.updated} embedded, ${summary.removed} removed.` +
    (summary.embedFailures > 0 ? ` ${summary.embedFailures} page(s) failed to embed.` : '') +
    failureNote(summary)
  );
}

export function formatStatus(status: SystemStatus): string {
  const lines = [
    `Data source: ${sourceLabel(status.activeSource)}`,
    `Indexed pages: ${status.indexSize}`,
    `Embedding model: ${status.model} (${status.dimensions} dimensions)`,
    `OCR: ${status.ocrProvider} (${status.ocrAvailable ? 'available' : 'unavailable'}), ` +
      `${status.ocrCacheEntries} cached image(s)`,
    `Backup roots: ${status.backupRoots.length > 0 ? status.backupRoots.join(', ') : '(none)'}`,
    `Section decoder: ${status.decoderConfigured ? 'configured' : 'not configured'}`,
    `Remote API: ${status.remoteConfigured ? 'configured' : 'not configured'}`,
    `Index directory: ${status.storageDir}`,
  ];
  if (status.updating) lines.push('An index update is in progress.');
  if (status.lastUpdate) {
    const u = status.lastUpdate;
    lines.push(
      `Last update: ${u.added} added, ${u.updated} updated, ${u.unchanged} unchanged, ` +
        `${u.removed} removed in ${u.durationMs}ms`,
    );
  }
  return lines.join('\n');
}
