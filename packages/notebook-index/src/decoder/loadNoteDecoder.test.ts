import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { loadNoteDecoder, wrapDecoder } from './loadNoteDecoder.js';
import { NotebookIndexErrorType, isNotebookIndexError } from '../core/errors.js';
import { globalLogger, LogLevel } from '../core/Logger.js';

describe('loadNoteDecoder', () => {
  let testDir: string;

  beforeAll(() => {
    globalLogger.setLevel(LogLevel.SILENT);
  });

  beforeEach(async () => {
    testDir = join(tmpdir(), `decoder-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should load a module exporting decode', async () => {
    const modulePath = join(testDir, 'named.mjs');
    await writeFile(
      modulePath,
      `export function decode(bytes) {
        return { kind: 'container', children: [
          { kind: 'page', title: 'Size' },
          { kind: 'text', text: String(bytes.length) },
        ] };
      }`,
    );

    const decoder = await loadNoteDecoder(modulePath);
    const tree = await decoder.decode(new Uint8Array([1, 2, 3]));

    expect(tree).toEqual({
      kind: 'container',
      children: [
        { kind: 'page', title: 'Size' },
        { kind: 'text', text: '3' },
      ],
    });
  });

  it('should load decode from a default export', async () => {
    const modulePath = join(testDir, 'default.mjs');
    await writeFile(
      modulePath,
      `export default { decode: async () => ({ kind: 'text', text: 'ok' }) };`,
    );

    const decoder = await loadNoteDecoder(modulePath);

    await expect(decoder.decode(new Uint8Array())).resolves.toEqual({
      kind: 'text',
      text: 'ok',
    });
  });

  it('should reject modules without decode', async () => {
    const modulePath = join(testDir, 'empty.mjs');
    await writeFile(modulePath, 'export const nothing = 1;');

    const error: unknown = await loadNoteDecoder(modulePath).catch((e: unknown) => e);

    expect(isNotebookIndexError(error, NotebookIndexErrorType.CONFIGURATION)).toBe(true);
  });

  it('should report modules that cannot be imported', async () => {
    const error: unknown = await loadNoteDecoder(join(testDir, 'missing.mjs')).catch(
      (e: unknown) => e,
    );

    expect(isNotebookIndexError(error, NotebookIndexErrorType.CONFIGURATION)).toBe(true);
  });
});

describe('wrapDecoder', () => {
  it('should reject malformed content trees', async () => {
    const decoder = wrapDecoder('fake', { decode: () => ({ kind: 'page' }) });

    await expect(decoder.decode(new Uint8Array())).rejects.toThrow(
      'Decoder fake returned an invalid content tree',
    );
  });
});
