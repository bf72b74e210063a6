/**
 * Stdio tool server. Tool calls run against one NotebookSearchSystem;
 * stdout carries the protocol, so every log line goes to stderr.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import {
  NotebookSearchSystem,
  createModuleLogger,
  errorMessage,
  isNotebookIndexError,
  resolveConfig,
  type NotebookSearchSystemOptions,
} from '@notebook-search/index';
import { NOTEBOOK_TOOLS, type NotebookTool } from './tools.js';

const log = createModuleLogger('ToolServer');

export const SERVER_NAME = 'notebook-search';
export const SERVER_VERSION = '0.1.0';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function textResult(text: string, isError = false): ToolResult {
  return { content: [{ type: 'text', text }], isError };
}

/**
 * Run one tool call. Failures become error results; nothing is thrown.
 */
export async function handleToolCall(
  system: NotebookSearchSystem,
  name: string,
  args: unknown,
  tools: readonly NotebookTool[] = NOTEBOOK_TOOLS,
): Promise<ToolResult> {
  const tool = tools.find((t) => t.name === name);
  if (!tool) {
    return textResult(`Unknown tool: ${name}`, true);
  }

  const start = Date.now();
  try {
    const text = await tool.execute(system, args);
    log.debug(`${name} completed in ${Date.now() - start}ms`);
    return textResult(text);
  } catch (error) {
    if (isNotebookIndexError(error)) {
      log.info(`${name} failed: ${error.message}`, { type: error.type });
      return textResult(error.toToolMessage(), true);
    }
    log.error(`${name} failed unexpectedly`, { error: errorMessage(error) });
    return textResult(`Error: ${errorMessage(error)}`, true);
  }
}

export function createToolServer(
  system: NotebookSearchSystem,
  tools: readonly NotebookTool[] = NOTEBOOK_TOOLS,
): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(system, name, args, tools);
  });

  return server;
}

/**
 * Start the server on stdio: load the index, refresh it in the background
 * and serve until SIGINT or SIGTERM.
 */
export async function main(options: NotebookSearchSystemOptions = {}): Promise<void> {
  const config = resolveConfig({ overrides: options.config });
  const system = await NotebookSearchSystem.initialize({ ...options, config });

  // The first pass may take minutes on a cold cache; tools are served meanwhile.
  void system.refresh().then(
    (summary) => log.info(`Startup index pass finished: ${summary.indexSize} pages indexed`),
    (error: unknown) =>
      log.warn('Startup index pass failed; semantic search will retry on the next query', {
        error: errorMessage(error),
      }),
  );

  const server = createToolServer(system);
  const transport = new StdioServerTransport();

  let closing = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (closing) return;
    closing = true;
    log.info(`Received ${signal}, shutting down`);
    try {
      await server.close();
      await system.close();
    } catch (error) {
      log.error('Error during shutdown', { error: errorMessage(error) });
    }
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.connect(transport);
  log.info(`Tool server ready with ${NOTEBOOK_TOOLS.length} tools`);
}
