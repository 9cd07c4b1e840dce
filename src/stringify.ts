/**
 * EDN value to text. Compact output separates elements with one space;
 * with `indent` set, each element goes on its own line and map entries keep
 * key and value together.
 */

import { writeSync } from 'node:fs';
import { EdnChar, EdnKeyword, EdnList, EdnSet, EdnSymbol, type EdnValue } from './ast.js';
import { EdnError, ErrorCode } from './errors.js';
import { fromNative } from './native.js';
import { ESCAPE } from './tables.js';

export interface StringifyOptions {
  /** Indent string for pretty-print (default: no indent, single line) */
  indent?: string;
  /** Newline (default "\n") */
  newline?: string;
  /** Max container nesting (default 1024) */
  maxDepth?: number;
}

/** Byte sink for `write`. */
export interface Sink {
  write(chunk: Uint8Array): void;
}

const DEFAULT_MAX_DEPTH = 1024;
const FLUSH_SIZE = 8192;

const MIN_INTEGER = -(2n ** 63n);
const MAX_INTEGER = 2n ** 64n - 1n;

function hex4(code: number): string {
  return code.toString(16).toUpperCase().padStart(4, '0');
}

function escapeFor(code: number): string {
  switch (code) {
    case 0x22:
      return '\\"';
    case 0x5c:
      return '\\\\';
    case 0x08:
      return '\\b';
    case 0x0c:
      return '\\f';
    case 0x0a:
      return '\\n';
    case 0x0d:
      return '\\r';
    case 0x09:
      return '\\t';
    default:
      return `\\u${hex4(code)}`;
  }
}

function quote(s: string): string {
  let out = '"';
  let start = 0;
  for (let i = 0; i < s.length; i++) {
    const code = s.charCodeAt(i);
    if (code >= 0x80 || ESCAPE[code] !== 1) continue;
    out += s.slice(start, i) + escapeFor(code);
    start = i + 1;
  }
  return out + s.slice(start) + '"';
}

function writeChar(c: EdnChar): string {
  switch (c.value) {
    case '\n':
      return '\\newline';
    case '\r':
      return '\\return';
    case '\t':
      return '\\tab';
    case ' ':
      return '\\space';
  }
  const cp = c.codePoint;
  if (cp < 0x20 || cp === 0x7f) return `\\u${hex4(cp)}`;
  return `\\${c.value}`;
}

/** Shortest round-trip form, always with a `.` or an exponent. */
function writeFloat(n: number): string {
  if (!Number.isFinite(n)) return 'nil';
  if (Object.is(n, -0)) return '-0.0';
  const s = String(n);
  return s.includes('.') || s.includes('e') ? s : `${s}.0`;
}

function writeInteger(n: bigint): string {
  return n < MIN_INTEGER || n > MAX_INTEGER ? `${n}N` : String(n);
}

class Emitter {
  private depth = 0;

  constructor(
    private readonly out: (chunk: string) => void,
    private readonly indent: string,
    private readonly newline: string,
    private readonly maxDepth: number
  ) {}

  value(v: EdnValue, level: number): void {
    if (v === null) return this.out('nil');
    switch (typeof v) {
      case 'boolean':
        return this.out(v ? 'true' : 'false');
      case 'bigint':
        return this.out(writeInteger(v));
      case 'number':
        return this.out(writeFloat(v));
      case 'string':
        return this.out(quote(v));
    }
    if (Array.isArray(v)) return this.seq('[', ']', v, level);
    if (v instanceof EdnChar) return this.out(writeChar(v));
    if (v instanceof EdnKeyword) return this.out(`:${v.name}`);
    if (v instanceof EdnSymbol) return this.out(v.name);
    if (v instanceof EdnList) return this.seq('(', ')', v.items, level);
    if (v instanceof EdnSet) return this.seq('#{', '}', Array.from(v), level);

    this.enter();
    this.out('{');
    let first = true;
    for (const [key, item] of v) {
      this.separator(first, level + 1);
      first = false;
      this.value(key, level + 1);
      this.out(' ');
      this.value(item, level + 1);
    }
    this.close('}', first, level);
  }

  private seq(open: string, close: string, items: EdnValue[], level: number): void {
    this.enter();
    this.out(open);
    items.forEach((item, i) => {
      this.separator(i === 0, level + 1);
      this.value(item, level + 1);
    });
    this.close(close, items.length === 0, level);
  }

  private separator(first: boolean, level: number): void {
    if (this.indent) this.out(this.newline + this.indent.repeat(level));
    else if (!first) this.out(' ');
  }

  private close(token: string, empty: boolean, level: number): void {
    if (this.indent && !empty) this.out(this.newline + this.indent.repeat(level));
    this.out(token);
    this.depth--;
  }

  private enter(): void {
    if (++this.depth > this.maxDepth) throw EdnError.of(ErrorCode.RecursionLimitExceeded);
  }
}

function emit(value: EdnValue, options: StringifyOptions, out: (chunk: string) => void): void {
  const emitter = new Emitter(
    out,
    options.indent ?? '',
    options.newline ?? '\n',
    options.maxDepth ?? DEFAULT_MAX_DEPTH
  );
  emitter.value(value, 0);
}

export function stringify(value: EdnValue, options: StringifyOptions = {}): string {
  const parts: string[] = [];
  emit(value, options, (chunk) => parts.push(chunk));
  return parts.join('');
}

/** UTF-8 encoded text of `value`. */
export function toBytes(value: EdnValue, options: StringifyOptions = {}): Uint8Array {
  return new TextEncoder().encode(stringify(value, options));
}

/** Writes `value` to `sink` in chunks. Sink failures are I/O errors. */
export function write(value: EdnValue, sink: Sink, options: StringifyOptions = {}): void {
  const encoder = new TextEncoder();
  let pending = '';
  const flush = (): void => {
    if (pending.length === 0) return;
    const chunk = encoder.encode(pending);
    pending = '';
    try {
      sink.write(chunk);
    } catch (err) {
      throw EdnError.io(err);
    }
  };
  emit(value, options, (chunk) => {
    pending += chunk;
    if (pending.length >= FLUSH_SIZE) flush();
  });
  flush();
}

/** Sink over a file descriptor, written synchronously. */
export function fdSink(fd: number): Sink {
  return {
    write(chunk) {
      let offset = 0;
      while (offset < chunk.length) offset += writeSync(fd, chunk, offset);
    },
  };
}

/** Text for plain JavaScript data, converted as `fromNative` does. */
export function serialize(input: unknown, options: StringifyOptions = {}): string {
  return stringify(fromNative(input), options);
}
