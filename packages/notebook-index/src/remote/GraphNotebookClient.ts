/**
 * GraphNotebookClient - read-only notebook access over the Graph REST API.
 */

import { z } from 'zod';
import type {
  NotebookApiClient,
  RemoteNotebook,
  RemotePageSummary,
  RemoteResource,
} from './types.js';
import {
  NotebookIndexError,
  NotebookIndexErrorType,
  errorMessage,
} from '../core/errors.js';
import { createModuleLogger } from '../core/Logger.js';

const log = createModuleLogger('GraphNotebookClient');

// ============================================================================
// Types
// ============================================================================

export interface GraphNotebookClientOptions {
  baseUrl: string;
  accessToken: string;
  requestTimeoutMs: number;
  /** Replaces the global fetch, e.g. in tests */
  fetchImpl?: typeof fetch;
}

const HIERARCHY_PATH =
  '/me/onenote/notebooks?$expand=sections($select=id,displayName)&$select=id,displayName';

const PAGE_FIELDS = 'id,title,createdDateTime,lastModifiedDateTime';

const hierarchySchema = z.object({
  value: z.array(
    z.object({
      id: z.string(),
      displayName: z.string().default(''),
      sections: z
        .array(z.object({ id: z.string(), displayName: z.string().default('') }))
        .default([]),
    }),
  ),
});

const pageListSchema = z.object({
  value: z.array(
    z.object({
      id: z.string(),
      title: z.string().nullish(),
      createdDateTime: z.string().optional(),
      lastModifiedDateTime: z.string().optional(),
    }),
  ),
  '@odata.nextLink': z.string().optional(),
});

const errorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

export const UNTITLED_PAGE = '(untitled)';

// ============================================================================
// GraphNotebookClient Class
// ============================================================================

export class GraphNotebookClient implements NotebookApiClient {
  private readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private hierarchy: Promise<RemoteNotebook[]> | null = null;

  constructor(options: GraphNotebookClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.accessToken = options.accessToken;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  // --------------------------------------------------------------------------
  // HTTP
  // --------------------------------------------------------------------------

  private resolveUrl(pathOrUrl: string): string {
    return /^https?:\/\//i.test(pathOrUrl) ? pathOrUrl : `${this.baseUrl}${pathOrUrl}`;
  }

  private async get(pathOrUrl: string): Promise<Response> {
    const url = this.resolveUrl(pathOrUrl);
    log.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Authorization: `Bearer ${this.accessToken}` },
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      throw new NotebookIndexError(
        `Notebook API request failed: ${errorMessage(error)}`,
        NotebookIndexErrorType.REMOTE_API,
        { url },
      );
    }

    if (!response.ok) {
      throw await this.toApiError(response, url);
    }
    return response;
  }

  private async toApiError(
    response: Response,
    url: string,
  ): Promise<NotebookIndexError> {
    const body = await response.text().catch(() => '');
    let detail = body.slice(0, 300);
    try {
      const parsed = errorBodySchema.safeParse(JSON.parse(body));
      if (parsed.success) detail = parsed.data.error.message;
    } catch {
      // not JSON; keep the raw text
    }

    const status = response.status;
    let message: string;
    switch (status) {
      case 401:
        message = `Authentication expired or invalid; provide a new access token (${detail})`;
        break;
      case 404:
        message = `Resource not found: ${detail}`;
        break;
      case 429:
        message = `Rate limited by the notebook API (${detail})`;
        break;
      default:
        message = `API error ${status}: ${detail}`;
    }
    return new NotebookIndexError(message, NotebookIndexErrorType.REMOTE_API, {
      status,
      url,
    });
  }

  private async getJson<T>(
    pathOrUrl: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const response = await this.get(pathOrUrl);
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new NotebookIndexError(
        `Notebook API returned invalid JSON: ${errorMessage(error)}`,
        NotebookIndexErrorType.REMOTE_API,
        { url: this.resolveUrl(pathOrUrl) },
      );
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new NotebookIndexError(
        `Unexpected notebook API response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        NotebookIndexErrorType.REMOTE_API,
        { url: this.resolveUrl(pathOrUrl) },
      );
    }
    return parsed.data;
  }

  // --------------------------------------------------------------------------
  // NotebookApiClient
  // --------------------------------------------------------------------------

  listNotebooks(): Promise<RemoteNotebook[]> {
    if (!this.hierarchy) {
      const pending = this.getJson(HIERARCHY_PATH, hierarchySchema).then(
        (data) => {
          log.debug(`Hierarchy loaded: ${data.value.length} notebooks`);
          return data.value;
        },
      );
      // A failed load is not cached.
      void pending.catch(() => {
        if (this.hierarchy === pending) this.hierarchy = null;
      });
      this.hierarchy = pending;
    }
    return this.hierarchy;
  }

  async listPages(sectionId: string): Promise<RemotePageSummary[]> {
    const pages: RemotePageSummary[] = [];
    let next: string | undefined =
      `/me/onenote/sections/${encodeURIComponent(sectionId)}/pages` +
      `?$select=${PAGE_FIELDS}&$orderby=createdDateTime`;

    while (next) {
      const data: z.infer<typeof pageListSchema> = await this.getJson(
        next,
        pageListSchema,
      );
      for (const page of data.value) {
        pages.push({
          id: page.id,
          title: page.title && page.title.trim().length > 0 ? page.title : UNTITLED_PAGE,
          createdDateTime: page.createdDateTime,
          lastModifiedDateTime: page.lastModifiedDateTime,
        });
      }
      next = data['@odata.nextLink'];
    }
    return pages;
  }

  async getPageContent(pageId: string): Promise<string> {
    const response = await this.get(
      `/me/onenote/pages/${encodeURIComponent(pageId)}/content`,
    );
    return response.text();
  }

  async getResource(url: string): Promise<RemoteResource> {
    const response = await this.get(url);
    const bytes = new Uint8Array(await response.arrayBuffer());
    return {
      bytes,
      contentType: response.headers.get('content-type') ?? undefined,
    };
  }

  invalidate(): void {
    this.hierarchy = null;
  }
}
