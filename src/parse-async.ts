/**
 * Promise-based decoding from streams and files. The input is collected in
 * memory and decoded with the slice reader.
 */

import { readFile } from 'node:fs/promises';
import type { EdnValue } from './ast.js';
import { EdnError } from './errors.js';
import { parse, type ParseOptions } from './parser.js';

function concat(parts: Uint8Array[], total: number): Uint8Array {
  if (parts.length === 1 && parts[0]) return parts[0];
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Decodes one document from an async sequence of chunks, such as a Node.js
 * `Readable`. Failures while iterating are I/O errors.
 */
export async function parseStream(
  chunks: AsyncIterable<Uint8Array | string>,
  options: ParseOptions = {}
): Promise<EdnValue> {
  const encoder = new TextEncoder();
  const parts: Uint8Array[] = [];
  let total = 0;
  try {
    for await (const chunk of chunks) {
      const bytes = typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
      parts.push(bytes);
      total += bytes.length;
    }
  } catch (err) {
    throw EdnError.io(err);
  }
  if (options.debug) console.log(`[parseStream] collected ${parts.length} chunks, ${total} bytes`);
  return parse(concat(parts, total), options);
}

/** Decodes the file at `path`. */
export async function parseFile(path: string, options: ParseOptions = {}): Promise<EdnValue> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw EdnError.io(err);
  }
  return parse(bytes, options);
}
