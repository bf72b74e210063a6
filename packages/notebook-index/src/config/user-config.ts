/**
 * User configuration management.
 *
 * The runtime configuration is layered, lowest priority first:
 *
 * 1. Code defaults
 * 2. config.json in the storage directory (user preferences)
 * 3. Programmatic overrides
 * 4. NOTEBOOK_SEARCH_* environment variables
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import {
  type DeepPartial,
  type NotebookSearchConfig,
  type SourcesConfig,
  DEFAULT_INDEX_CONFIG,
  createConfig,
  defaultBackupRoots,
  mergeConfigLayers,
  validateConfig,
} from '../config.js';
import type { Provenance } from '../types.js';
import { createModuleLogger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';

const log = createModuleLogger('UserConfig');

// ============================================================================
// Constants
// ============================================================================

/** Name of the user configuration file inside the storage directory */
export const USER_CONFIG_FILENAME = 'config.json';

export const ENV_PREFIX = 'NOTEBOOK_SEARCH_';

// ============================================================================
// Schema
// ============================================================================

const userConfigSchema = z.object({
  sources: z
    .object({
      backend: z.enum(['local', 'remote']).optional(),
      backupRoots: z.array(z.string()).optional(),
      ignoreSegments: z.array(z.string()).optional(),
    })
    .optional(),
  decoder: z.object({ module: z.string().optional() }).optional(),
  remote: z
    .object({
      baseUrl: z.string().url().optional(),
      accessToken: z.string().optional(),
      requestTimeoutMs: z.number().positive().optional(),
    })
    .optional(),
  embeddings: z
    .object({
      model: z.string().optional(),
      dimensions: z.number().int().positive().optional(),
      batchSize: z.number().int().positive().optional(),
      quantization: z.enum(['fp32', 'fp16', 'q8', 'q4']).optional(),
      cacheDir: z.string().optional(),
    })
    .optional(),
  index: z
    .object({
      storageDir: z.string().optional(),
      lockTimeoutMs: z.number().positive().optional(),
    })
    .optional(),
  search: z
    .object({
      defaultLimit: z.number().int().positive().optional(),
      minScore: z.number().optional(),
      snippetLength: z.number().int().positive().optional(),
      exactContextChars: z.number().int().nonnegative().optional(),
      maxExactResults: z.number().int().positive().optional(),
    })
    .optional(),
  ocr: z
    .object({
      enabled: z.boolean().optional(),
      languages: z.array(z.string()).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.string().optional(),
      filePath: z.string().optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

export type UserConfigFile = z.infer<typeof userConfigSchema>;

// ============================================================================
// Load Functions
// ============================================================================

export function getUserConfigPath(storageDir: string): string {
  return path.join(storageDir, USER_CONFIG_FILENAME);
}

/**
 * Remove documentation keys from parsed JSON.
 * Keys starting with '_' or '$' are metadata, e.g. "_docs" or "$schema".
 */
function stripMetadataKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stripMetadataKeys);
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    if (key.startsWith('_') || key.startsWith('$')) {
      continue;
    }
    result[key] = stripMetadataKeys(nested);
  }
  return result;
}

/**
 * Load the user configuration file.
 *
 * @returns Parsed overrides, or null if the file is missing or invalid
 */
export function loadUserConfig(storageDir: string): UserConfigFile | null {
  const configPath = getUserConfigPath(storageDir);

  if (!fs.existsSync(configPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    log.warn(
      error instanceof SyntaxError
        ? `Invalid JSON in user config: ${configPath}`
        : `Failed to load user config: ${errorMessage(error)}`,
    );
    return null;
  }

  const parsed = userConfigSchema.safeParse(stripMetadataKeys(raw));
  if (!parsed.success) {
    log.warn(`Ignoring invalid user config: ${configPath}`, {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    });
    return null;
  }
  return parsed.data;
}

// ============================================================================
// Environment
// ============================================================================

function parseSource(value: string): Provenance | undefined {
  switch (value.trim().toLowerCase()) {
    case 'local':
      return 'local';
    case 'api':
    case 'remote':
      return 'remote';
    default:
      return undefined;
  }
}

function parseFlag(value: string): boolean {
  return !['0', 'false', 'off', 'no'].includes(value.trim().toLowerCase());
}

/**
 * Read NOTEBOOK_SEARCH_* overrides from the environment.
 * Only variables that are set produce keys.
 */
export function readEnvOverrides(
  env: NodeJS.ProcessEnv = process.env,
): DeepPartial<NotebookSearchConfig> {
  const overrides: DeepPartial<NotebookSearchConfig> = {};
  const get = (name: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value !== undefined && value.trim() !== '' ? value : undefined;
  };

  const backupDir = get('BACKUP_DIR');
  const source = get('SOURCE');
  const backend = source !== undefined ? parseSource(source) : undefined;
  if (source !== undefined && backend === undefined) {
    log.warn(`Ignoring ${ENV_PREFIX}SOURCE=${source}; expected local or api`);
  }
  if (backupDir !== undefined || backend !== undefined) {
    const sources: DeepPartial<SourcesConfig> = {};
    if (backupDir !== undefined) {
      sources.backupRoots = backupDir
        .split(path.delimiter)
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
    }
    if (backend !== undefined) {
      sources.backend = backend;
    }
    overrides.sources = sources;
  }

  const indexDir = get('INDEX_DIR');
  if (indexDir !== undefined) {
    overrides.index = { storageDir: indexDir };
  }

  const model = get('MODEL');
  if (model !== undefined) {
    overrides.embeddings = { model };
  }

  const ocr = get('OCR');
  if (ocr !== undefined) {
    overrides.ocr = { enabled: parseFlag(ocr) };
  }

  const decoder = get('DECODER');
  if (decoder !== undefined) {
    overrides.decoder = { module: decoder };
  }

  const token = get('API_TOKEN');
  if (token !== undefined) {
    overrides.remote = { accessToken: token };
  }

  const level = get('LOG_LEVEL');
  if (level !== undefined) {
    overrides.logging = { level };
  }

  return overrides;
}

// ============================================================================
// Merge
// ============================================================================

export interface ResolveConfigOptions {
  /** Programmatic overrides, applied above the user config file */
  overrides?: DeepPartial<NotebookSearchConfig>;
  /** Environment to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Skip reading config.json */
  ignoreUserConfig?: boolean;
}

/**
 * Load and merge all configuration layers, then validate.
 */
export function resolveConfig(
  options: ResolveConfigOptions = {},
): NotebookSearchConfig {
  const envOverrides = readEnvOverrides(options.env ?? process.env);

  // The config file lives in the storage dir, which itself may be overridden.
  const storageDir =
    envOverrides.index?.storageDir ??
    options.overrides?.index?.storageDir ??
    DEFAULT_INDEX_CONFIG.storageDir;

  const userConfig = options.ignoreUserConfig
    ? null
    : loadUserConfig(storageDir);

  const merged = mergeConfigLayers(
    userConfig ?? undefined,
    options.overrides,
    envOverrides,
  );

  if (merged.sources?.backupRoots === undefined) {
    merged.sources = {
      ...merged.sources,
      backupRoots: defaultBackupRoots().filter((dir) => fs.existsSync(dir)),
    };
  }

  const config = createConfig(merged);
  validateConfig(config);
  return config;
}
