/**
 * Load a NoteDecoder from a module specifier.
 */

import { isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { DecodedNode, NoteDecoder } from './types.js';
import { decodedNodeSchema } from './types.js';
import {
  NotebookIndexError,
  NotebookIndexErrorType,
  errorMessage,
} from '../core/errors.js';
import { createModuleLogger } from '../core/Logger.js';

const log = createModuleLogger('NoteDecoder');

interface DecodeFunctionHolder {
  decode: (bytes: Uint8Array) => unknown;
}

function hasDecode(value: unknown): value is DecodeFunctionHolder {
  return (
    typeof value === 'object' &&
    value !== null &&
    'decode' in value &&
    typeof value.decode === 'function'
  );
}

/**
 * Path-like specifiers are resolved against the working directory;
 * anything else is imported as a package name.
 */
function toImportSpecifier(specifier: string): string {
  if (specifier.startsWith('.') || isAbsolute(specifier)) {
    return pathToFileURL(resolve(specifier)).href;
  }
  return specifier;
}

/**
 * Wrap a raw decode function so its output is validated.
 */
export function wrapDecoder(name: string, holder: DecodeFunctionHolder): NoteDecoder {
  return {
    name,
    async decode(bytes: Uint8Array): Promise<DecodedNode> {
      const output: unknown = await holder.decode(bytes);
      const parsed = decodedNodeSchema.safeParse(output);
      if (!parsed.success) {
        throw new Error(
          `Decoder ${name} returned an invalid content tree: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
        );
      }
      return parsed.data;
    },
  };
}

/**
 * Import a module that exports `decode(bytes)`, either directly or on its
 * default export.
 */
export async function loadNoteDecoder(specifier: string): Promise<NoteDecoder> {
  let mod: unknown;
  try {
    mod = await import(toImportSpecifier(specifier));
  } catch (error) {
    throw new NotebookIndexError(
      `Failed to load section decoder '${specifier}': ${errorMessage(error)}`,
      NotebookIndexErrorType.CONFIGURATION,
      { specifier },
    );
  }

  if (hasDecode(mod)) {
    log.info(`Loaded section decoder: ${specifier}`);
    return wrapDecoder(specifier, mod);
  }
  if (typeof mod === 'object' && mod !== null && 'default' in mod && hasDecode(mod.default)) {
    log.info(`Loaded section decoder: ${specifier}`);
    return wrapDecoder(specifier, mod.default);
  }

  throw new NotebookIndexError(
    `Section decoder '${specifier}' does not export a decode function`,
    NotebookIndexErrorType.CONFIGURATION,
    { specifier },
  );
}
