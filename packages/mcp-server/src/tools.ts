/**
 * Tool catalogue: JSON input schemas for ListTools, zod schemas for CallTool.
 */

import { z } from 'zod';
import {
  NotebookIndexError,
  NotebookIndexErrorType,
  type NotebookSearchSystem,
  type Provenance,
} from '@notebook-search/index';
import {
  formatAllSections,
  formatNotebookSummary,
  formatNotebooks,
  formatPage,
  formatPages,
  formatRebuild,
  formatSearchResponse,
  formatSection,
  formatSections,
  formatStatus,
  sourceLabel,
} from './format.js';

// ============================================================================
// Types
// ============================================================================

export type JsonSchemaProperty = {
  type: 'string' | 'boolean' | 'integer';
  description: string;
  enum?: string[];
  minimum?: number;
};

export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
};

export interface NotebookTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  /** Validate raw arguments and run the tool; resolves to the result text */
  execute(system: NotebookSearchSystem, args: unknown): Promise<string>;
}

interface ToolSpec<T> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  args: z.ZodType<T, z.ZodTypeDef, unknown>;
  run(system: NotebookSearchSystem, args: T): Promise<string>;
}

function defineTool<T>(definition: ToolSpec<T>): NotebookTool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    async execute(system, raw) {
      const parsed = definition.args.safeParse(raw ?? {});
      if (!parsed.success) {
        throw new NotebookIndexError(
          `Invalid arguments for ${definition.name}: ${describeIssues(parsed.error)}`,
          NotebookIndexErrorType.CONFIGURATION,
        );
      }
      return definition.run(system, parsed.data);
    },
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    )
    .join('; ');
}

// ============================================================================
// Shared arguments
// ============================================================================

const useApi = z.boolean().optional();

const USE_API_PROPERTY: JsonSchemaProperty = {
  type: 'boolean',
  description: 'Read live data through the remote API instead of local backup files',
};

const NOTEBOOK_PROPERTY: JsonSchemaProperty = {
  type: 'string',
  description: 'Notebook name (from list_notebooks)',
};

const SECTION_PROPERTY: JsonSchemaProperty = {
  type: 'string',
  description: 'Section name (from list_sections)',
};

/** Per-call source override; undefined keeps the active source. */
function sourceOf(args: { use_api?: boolean }): Provenance | undefined {
  return args.use_api ? 'remote' : undefined;
}

const nonEmpty = z.string().trim().min(1);

// ============================================================================
// Tools
// ============================================================================

export const NOTEBOOK_TOOLS: readonly NotebookTool[] = [
  defineTool({
    name: 'list_notebooks',
    description: 'List all available notebooks with their section counts.',
    inputSchema: {
      type: 'object',
      properties: { use_api: USE_API_PROPERTY },
    },
    args: z.object({ use_api: useApi }),
    run: async (system, args) => formatNotebooks(await system.listNotebooks(sourceOf(args))),
  }),

  defineTool({
    name: 'list_sections',
    description: 'List the sections of one notebook.',
    inputSchema: {
      type: 'object',
      properties: { notebook_name: NOTEBOOK_PROPERTY, use_api: USE_API_PROPERTY },
      required: ['notebook_name'],
    },
    args: z.object({ notebook_name: nonEmpty, use_api: useApi }),
    run: async (system, args) =>
      formatSections(
        args.notebook_name,
        await system.listSections(args.notebook_name, sourceOf(args)),
      ),
  }),

  defineTool({
    name: 'list_all_sections',
    description: 'List every section across every notebook.',
    inputSchema: {
      type: 'object',
      properties: { use_api: USE_API_PROPERTY },
    },
    args: z.object({ use_api: useApi }),
    run: async (system, args) => formatAllSections(await system.listAllSections(sourceOf(args))),
  }),

  defineTool({
    name: 'list_pages',
    description: 'List the page titles and ids of a section.',
    inputSchema: {
      type: 'object',
      properties: {
        notebook_name: NOTEBOOK_PROPERTY,
        section_name: SECTION_PROPERTY,
        use_api: USE_API_PROPERTY,
      },
      required: ['notebook_name', 'section_name'],
    },
    args: z.object({ notebook_name: nonEmpty, section_name: nonEmpty, use_api: useApi }),
    run: async (system, args) =>
      formatPages(
        args.section_name,
        await system.listPages(args.notebook_name, args.section_name, sourceOf(args)),
      ),
  }),

  defineTool({
    name: 'read_section',
    description: 'Read the text of every page in a section, including text recognized in images.',
    inputSchema: {
      type: 'object',
      properties: {
        notebook_name: NOTEBOOK_PROPERTY,
        section_name: SECTION_PROPERTY,
        use_api: USE_API_PROPERTY,
      },
      required: ['notebook_name', 'section_name'],
    },
    args: z.object({ notebook_name: nonEmpty, section_name: nonEmpty, use_api: useApi }),
    run: async (system, args) =>
      formatSection(
        await system.readSection(args.notebook_name, args.section_name, sourceOf(args)),
      ),
  }),

  defineTool({
    name: 'read_page',
    description: 'Read one page of a section by its title.',
    inputSchema: {
      type: 'object',
      properties: {
        notebook_name: NOTEBOOK_PROPERTY,
        section_name: SECTION_PROPERTY,
        page_title: { type: 'string', description: 'Page title (from list_pages)' },
        use_api: USE_API_PROPERTY,
      },
      required: ['notebook_name', 'section_name', 'page_title'],
    },
    args: z.object({
      notebook_name: nonEmpty,
      section_name: nonEmpty,
      page_title: nonEmpty,
      use_api: useApi,
    }),
    run: async (system, args) =>
      formatPage(
        await system.readPage(
          args.notebook_name,
          args.section_name,
          args.page_title,
          sourceOf(args),
        ),
      ),
  }),

  defineTool({
    name: 'get_notebook_summary',
    description: "Summarize a notebook: its sections and a preview of each section's text.",
    inputSchema: {
      type: 'object',
      properties: { notebook_name: NOTEBOOK_PROPERTY, use_api: USE_API_PROPERTY },
      required: ['notebook_name'],
    },
    args: z.object({ notebook_name: nonEmpty, use_api: useApi }),
    run: async (system, args) =>
      formatNotebookSummary(await system.getNotebookSummary(args.notebook_name, sourceOf(args))),
  }),

  defineTool({
    name: 'search_notes',
    description:
      'Search across all notebooks. Semantic by default (finds related content); ' +
      'set exact_match for a case-insensitive literal match.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Text to search for' },
        exact_match: { type: 'boolean', description: 'Literal substring matching instead of semantic search' },
        limit: { type: 'integer', minimum: 1, description: 'Maximum number of results' },
        notebook_name: { type: 'string', description: 'Only search this notebook' },
        section_name: { type: 'string', description: 'Only search this section' },
        use_api: USE_API_PROPERTY,
      },
      required: ['query'],
    },
    args: z.object({
      query: nonEmpty,
      exact_match: z.boolean().optional(),
      limit: z.number().int().positive().optional(),
      notebook_name: nonEmpty.optional(),
      section_name: nonEmpty.optional(),
      use_api: useApi,
    }),
    run: async (system, args) => {
      const scoped = args.notebook_name !== undefined || args.section_name !== undefined;
      const response = await system.search({
        query: args.query,
        exactMatch: args.exact_match ?? false,
        k: args.limit,
        scope: scoped ? { notebook: args.notebook_name, section: args.section_name } : undefined,
        source: sourceOf(args),
      });
      return formatSearchResponse(response);
    },
  }),

  defineTool({
    name: 'rebuild_search_index',
    description: 'Re-read every section and re-embed every page of the search index.',
    inputSchema: {
      type: 'object',
      properties: { use_api: USE_API_PROPERTY },
    },
    args: z.object({ use_api: useApi }),
    run: async (system, args) => formatRebuild(await system.rebuildIndex(sourceOf(args))),
  }),

  defineTool({
    name: 'set_data_source',
    description: "Set the default data source: 'local' backup files or the live 'api'.",
    inputSchema: {
      type: 'object',
      properties: {
        source: { type: 'string', enum: ['local', 'api'], description: 'Data source' },
      },
      required: ['source'],
    },
    args: z.object({ source: z.enum(['local', 'api']) }),
    run: async (system, args) => {
      system.setDataSource(args.source === 'api' ? 'remote' : 'local');
      return (
        `Default data source set to '${sourceLabel(system.dataSource)}'. ` +
        "You can override it per request with the 'use_api' parameter."
      );
    },
  }),

  defineTool({
    name: 'index_status',
    description: 'Show the data source, index size, model, OCR state and the last index update.',
    inputSchema: { type: 'object', properties: {} },
    args: z.object({}),
    run: async (system) => formatStatus(await system.status()),
  }),
];

export function findTool(name: string): NotebookTool | undefined {
  return NOTEBOOK_TOOLS.find((tool) => tool.name === name);
}
