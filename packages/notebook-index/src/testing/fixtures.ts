/**
 * Test fixtures: section files written as JSON and a decoder that reads them.
 */

import { mkdir, utimes, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { DecodedNode, NoteDecoder } from '../decoder/types.js';
import type { OcrProvider } from '../ocr/types.js';

const fixturePageSchema = z.object({
  title: z.string(),
  texts: z.array(z.string()).default([]),
  images: z
    .array(z.object({ text: z.string(), extension: z.string() }))
    .default([]),
});

export type FixturePage = z.input<typeof fixturePageSchema>;

/**
 * Decodes fixture sections. Image "bytes" are the UTF-8 of the fixture's
 * image text, so a fake OCR provider can read them back.
 */
export class JsonFixtureDecoder implements NoteDecoder {
  readonly name = 'json-fixture';
  decodeCalls = 0;

  async decode(bytes: Uint8Array): Promise<DecodedNode> {
    this.decodeCalls++;
    const raw: unknown = JSON.parse(new TextDecoder().decode(bytes));
    const pages = z.array(fixturePageSchema).parse(raw);
    const encoder = new TextEncoder();

    const children: DecodedNode[] = [];
    for (const page of pages) {
      children.push({ kind: 'page', title: page.title });
      for (const text of page.texts) {
        children.push({ kind: 'text', text });
      }
      for (const image of page.images) {
        children.push({
          kind: 'image',
          bytes: encoder.encode(image.text),
          extension: image.extension,
        });
      }
    }
    return { kind: 'container', children };
  }
}

/**
 * Write a fixture section file, optionally with a fixed mtime (seconds).
 */
export async function writeFixtureSection(
  root: string,
  notebook: string,
  fileName: string,
  pages: FixturePage[],
  mtimeSeconds?: number,
): Promise<string> {
  const path = join(root, notebook, fileName);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(pages));
  if (mtimeSeconds !== undefined) {
    await utimes(path, mtimeSeconds, mtimeSeconds);
  }
  return path;
}

/**
 * OCR provider that "recognizes" image bytes as UTF-8 text.
 */
export class EchoOcrProvider implements OcrProvider {
  readonly name = 'echo';
  recognizeCalls = 0;

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async recognize(image: Uint8Array): Promise<string> {
    this.recognizeCalls++;
    return new TextDecoder().decode(image);
  }

  async dispose(): Promise<void> {}
}
