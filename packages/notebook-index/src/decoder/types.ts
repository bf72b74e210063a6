/**
 * Section file decoder contract.
 *
 * Decoding the binary section format is delegated to a pluggable module. The
 * decoder returns a content tree in document order; the local backend walks
 * it to build pages.
 */

import { z } from 'zod';

// ============================================================================
// Content Tree
// ============================================================================

/** Starts a new page; later siblings belong to it until the next page node. */
export interface DecodedPageNode {
  kind: 'page';
  title: string;
  children?: DecodedNode[];
}

export interface DecodedTextNode {
  kind: 'text';
  text: string;
}

export interface DecodedImageNode {
  kind: 'image';
  bytes?: Uint8Array;
  /** File extension as stored in the section, with or without the dot */
  extension?: string;
}

/** Outline, paragraph group or any other node that only holds children. */
export interface DecodedContainerNode {
  kind: 'container';
  children: DecodedNode[];
}

export type DecodedNode =
  | DecodedPageNode
  | DecodedTextNode
  | DecodedImageNode
  | DecodedContainerNode;

export const decodedNodeSchema: z.ZodType<DecodedNode> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({
      kind: z.literal('page'),
      title: z.string(),
      children: z.array(decodedNodeSchema).optional(),
    }),
    z.object({ kind: z.literal('text'), text: z.string() }),
    z.object({
      kind: z.literal('image'),
      bytes: z.instanceof(Uint8Array).optional(),
      extension: z.string().optional(),
    }),
    z.object({
      kind: z.literal('container'),
      children: z.array(decodedNodeSchema),
    }),
  ]),
);

// ============================================================================
// Decoder Interface
// ============================================================================

export interface NoteDecoder {
  readonly name: string;

  /**
   * Decode one section file.
   * @throws when the bytes are not a readable section
   */
  decode(bytes: Uint8Array): Promise<DecodedNode>;
}
