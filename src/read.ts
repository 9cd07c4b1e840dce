/**
 * Byte sources for the decoder. A source hands out one byte at a time
 * (`-1` at end of input) and knows how to turn an offset into a line and
 * column. Scanning primitives live on the base class and are written against
 * `peek`/`next`; the slice reader overrides the hot ones with index loops
 * that decode straight from the input without copying.
 */

import { readSync } from 'node:fs';
import type { SourcePosition } from './ast.js';
import { EdnError, EdnSyntaxError, ErrorCode } from './errors.js';
import { ESCAPE, HEX, SYMBOL_BODY, endsAtom } from './tables.js';

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const NEWLINE = 0x0a;

/** Decoded text and whether it was read straight from the input or assembled in scratch space. */
export interface Reference {
  kind: 'borrowed' | 'copied';
  value: string;
}

/** Growable byte buffer reused across tokens. */
export class Scratch {
  private buf = new Uint8Array(64);
  private len = 0;

  get length(): number {
    return this.len;
  }

  clear(): void {
    this.len = 0;
  }

  push(byte: number): void {
    if (this.len === this.buf.length) this.grow(this.len + 1);
    this.buf[this.len++] = byte;
  }

  append(bytes: Uint8Array): void {
    if (this.len + bytes.length > this.buf.length) this.grow(this.len + bytes.length);
    this.buf.set(bytes, this.len);
    this.len += bytes.length;
  }

  /** Appends the UTF-8 encoding of a code point. */
  pushCodePoint(cp: number): void {
    if (cp < 0x80) {
      this.push(cp);
    } else if (cp < 0x800) {
      this.push(0xc0 | (cp >> 6));
      this.push(0x80 | (cp & 0x3f));
    } else if (cp < 0x10000) {
      this.push(0xe0 | (cp >> 12));
      this.push(0x80 | ((cp >> 6) & 0x3f));
      this.push(0x80 | (cp & 0x3f));
    } else {
      this.push(0xf0 | (cp >> 18));
      this.push(0x80 | ((cp >> 12) & 0x3f));
      this.push(0x80 | ((cp >> 6) & 0x3f));
      this.push(0x80 | (cp & 0x3f));
    }
  }

  bytes(): Uint8Array {
    return this.buf.subarray(0, this.len);
  }

  private grow(min: number): void {
    let cap = this.buf.length * 2;
    while (cap < min) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf.subarray(0, this.len));
    this.buf = next;
  }
}

/** Deferred position of a byte, from `Read.markNext`. */
export type Mark = () => SourcePosition;

const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const lenientUtf8 = new TextDecoder('utf-8', { ignoreBOM: true });

export abstract class Read {
  /** Consumes and returns the next byte, or -1 at end of input. */
  abstract next(): number;

  /** Returns the next byte without consuming it, or -1 at end of input. */
  abstract peek(): number;

  /** Number of bytes consumed so far. */
  abstract byteOffset(): number;

  /**
   * Line and column after the first `index` bytes: the column is the number
   * of bytes since the last newline, so it names byte `index - 1` 1-based.
   */
  protected abstract positionOf(index: number): SourcePosition;

  /** Consumes a byte that was just peeked. */
  discard(): void {
    this.next();
  }

  /** Position of the last consumed byte. */
  position(): SourcePosition {
    return this.positionOf(this.byteOffset());
  }

  /** Position of the peeked byte, or of the last byte at end of input. */
  peekPosition(): SourcePosition {
    const offset = this.byteOffset();
    return this.positionOf(this.peek() < 0 ? offset : offset + 1);
  }

  /** Captures the next byte so its position can be reported after more input is consumed. */
  markNext(): Mark {
    const offset = this.byteOffset();
    return () => this.positionOf(offset + 1);
  }

  error(code: ErrorCode): EdnError {
    return EdnError.at(code, this.position());
  }

  peekError(code: ErrorCode): EdnError {
    return EdnError.at(code, this.peekPosition());
  }

  /** Reads a string body; the opening quote has been consumed. */
  parseStr(scratch: Scratch): Reference {
    scratch.clear();
    for (;;) {
      const b = this.next();
      if (b < 0) throw this.error(ErrorCode.EofWhileParsingString);
      if (b === QUOTE) return { kind: 'copied', value: this.decode(scratch.bytes()) };
      if (b === BACKSLASH) this.parseEscape(scratch);
      else if (b < 0x20) throw this.error(ErrorCode.ControlCharacterWhileParsingString);
      else scratch.push(b);
    }
  }

  /** Skips a string body, still rejecting bad escapes and control bytes. */
  ignoreStr(): void {
    for (;;) {
      const b = this.next();
      if (b < 0) throw this.error(ErrorCode.EofWhileParsingString);
      if (b === QUOTE) return;
      if (b === BACKSLASH) this.parseEscape(null);
      else if (b < 0x20) throw this.error(ErrorCode.ControlCharacterWhileParsingString);
    }
  }

  /**
   * Reads a symbol; the caller has peeked a valid first byte, or has just
   * consumed the ASCII `prefix` (a sign that turned out not to start a number).
   */
  parseSymbol(scratch: Scratch, prefix = ''): Reference {
    return this.scanAtom(scratch, ErrorCode.InvalidSymbol, prefix);
  }

  /** Reads a keyword name; the leading colon has been consumed. */
  parseKeyword(scratch: Scratch): Reference {
    const ref = this.scanAtom(scratch, ErrorCode.InvalidKeyword);
    if (ref.value.length === 0) throw this.peekError(ErrorCode.InvalidKeyword);
    return ref;
  }

  /**
   * Reads a symbol that may be the reserved word `reserved`. Returns null when
   * the token is exactly that word, so `true` is reserved while `truex` and
   * `tru` are symbols.
   */
  parseReservedOrSymbol(scratch: Scratch, reserved: string): Reference | null {
    const ref = this.parseSymbol(scratch);
    return ref.value === reserved ? null : ref;
  }

  /**
   * Reads a run of symbol-body bytes up to a delimiter or end of input.
   * Any other byte fails with `code` at that byte. `prefix` holds bytes
   * consumed just before the run that belong to the same token.
   */
  scanAtom(scratch: Scratch, code: ErrorCode, prefix = ''): Reference {
    scratch.clear();
    for (let i = 0; i < prefix.length; i++) scratch.push(prefix.charCodeAt(i));
    for (;;) {
      const b = this.peek();
      if (b >= 0 && SYMBOL_BODY[b] === 1) {
        this.discard();
        scratch.push(b);
      } else if (endsAtom(b)) {
        return { kind: 'copied', value: lenientUtf8.decode(scratch.bytes()) };
      } else {
        throw this.peekError(code);
      }
    }
  }

  /** Reads the four hex digits after `\u`. */
  decodeHexEscape(): number {
    let n = 0;
    for (let i = 0; i < 4; i++) {
      const b = this.next();
      if (b < 0) throw this.error(ErrorCode.EofWhileParsingString);
      const digit = HEX[b] ?? 255;
      if (digit === 255) throw this.error(ErrorCode.InvalidEscape);
      n = (n << 4) + digit;
    }
    return n;
  }

  /** Reads one UTF-8 encoded code point starting at the next byte. */
  readCodePoint(): number {
    const lead = this.next();
    let need: number;
    let cp: number;
    let min: number;
    if (lead >= 0 && lead < 0x80) return lead;
    if (lead >= 0xc2 && lead <= 0xdf) {
      need = 1;
      cp = lead & 0x1f;
      min = 0x80;
    } else if (lead >= 0xe0 && lead <= 0xef) {
      need = 2;
      cp = lead & 0x0f;
      min = 0x800;
    } else if (lead >= 0xf0 && lead <= 0xf4) {
      need = 3;
      cp = lead & 0x07;
      min = 0x10000;
    } else {
      throw this.error(lead < 0 ? ErrorCode.EofWhileParsingValue : ErrorCode.InvalidUnicodeCodePoint);
    }
    for (let i = 0; i < need; i++) {
      const b = this.next();
      if (b < 0) throw this.error(ErrorCode.EofWhileParsingValue);
      if ((b & 0xc0) !== 0x80) throw this.error(ErrorCode.InvalidUnicodeCodePoint);
      cp = (cp << 6) | (b & 0x3f);
    }
    if (cp < min || cp > 0x10ffff || (cp >= 0xd800 && cp <= 0xdfff)) {
      throw this.error(ErrorCode.InvalidUnicodeCodePoint);
    }
    return cp;
  }

  /** Decodes UTF-8 collected from the input. */
  protected decode(bytes: Uint8Array): string {
    try {
      return strictUtf8.decode(bytes);
    } catch (err) {
      throw new EdnSyntaxError(ErrorCode.InvalidUnicodeCodePoint, 'invalid unicode code point', {
        position: this.position(),
        cause: err,
      });
    }
  }

  /** Handles the byte after a backslash inside a string. */
  protected parseEscape(scratch: Scratch | null): void {
    const b = this.next();
    let out: number;
    switch (b) {
      case -1:
        throw this.error(ErrorCode.EofWhileParsingString);
      case QUOTE:
      case BACKSLASH:
      case 0x2f:
        out = b;
        break;
      case 0x62:
        out = 0x08;
        break;
      case 0x66:
        out = 0x0c;
        break;
      case 0x6e:
        out = 0x0a;
        break;
      case 0x72:
        out = 0x0d;
        break;
      case 0x74:
        out = 0x09;
        break;
      case 0x75:
        out = this.parseUnicodeEscape();
        break;
      default:
        throw this.error(ErrorCode.InvalidEscape);
    }
    scratch?.pushCodePoint(out);
  }

  private parseUnicodeEscape(): number {
    const n1 = this.decodeHexEscape();
    if (n1 >= 0xdc00 && n1 <= 0xdfff) throw this.error(ErrorCode.LoneLeadingSurrogateInHexEscape);
    if (n1 < 0xd800 || n1 > 0xdbff) return n1;
    // high surrogate: a low one must follow as another \u escape
    const slash = this.next();
    if (slash < 0) throw this.error(ErrorCode.EofWhileParsingString);
    if (slash !== BACKSLASH) throw this.error(ErrorCode.UnexpectedEndOfHexEscape);
    const u = this.next();
    if (u < 0) throw this.error(ErrorCode.EofWhileParsingString);
    if (u !== 0x75) throw this.error(ErrorCode.UnexpectedEndOfHexEscape);
    const n2 = this.decodeHexEscape();
    if (n2 < 0xdc00 || n2 > 0xdfff) throw this.error(ErrorCode.LoneLeadingSurrogateInHexEscape);
    return (((n1 - 0xd800) << 10) | (n2 - 0xdc00)) + 0x10000;
  }
}

/** Reads an in-memory byte slice. Unescaped strings and atoms are decoded in place. */
export class SliceRead extends Read {
  protected index = 0;

  constructor(protected readonly bytes: Uint8Array) {
    super();
  }

  next(): number {
    if (this.index >= this.bytes.length) return -1;
    return this.bytes[this.index++] ?? -1;
  }

  peek(): number {
    if (this.index >= this.bytes.length) return -1;
    return this.bytes[this.index] ?? -1;
  }

  override discard(): void {
    this.index++;
  }

  byteOffset(): number {
    return this.index;
  }

  protected positionOf(index: number): SourcePosition {
    let line = 1;
    let lineStart = 0;
    for (let i = 0; i < index; i++) {
      if (this.bytes[i] === NEWLINE) {
        line++;
        lineStart = i + 1;
      }
    }
    return { line, column: index - lineStart, offset: Math.max(0, index - 1) };
  }

  override parseStr(scratch: Scratch): Reference {
    scratch.clear();
    const bytes = this.bytes;
    let start = this.index;
    for (;;) {
      while (this.index < bytes.length && ESCAPE[bytes[this.index] ?? 0] === 0) this.index++;
      if (this.index === bytes.length) throw this.error(ErrorCode.EofWhileParsingString);
      const b = bytes[this.index];
      if (b === QUOTE) {
        const run = bytes.subarray(start, this.index);
        this.index++;
        if (scratch.length === 0) return { kind: 'borrowed', value: this.decode(run) };
        scratch.append(run);
        return { kind: 'copied', value: this.decode(scratch.bytes()) };
      }
      if (b === BACKSLASH) {
        scratch.append(bytes.subarray(start, this.index));
        this.index++;
        this.parseEscape(scratch);
        start = this.index;
      } else {
        this.index++;
        throw this.error(ErrorCode.ControlCharacterWhileParsingString);
      }
    }
  }

  override scanAtom(_scratch: Scratch, code: ErrorCode, prefix = ''): Reference {
    const bytes = this.bytes;
    const start = this.index - prefix.length;
    while (this.index < bytes.length && SYMBOL_BODY[bytes[this.index] ?? 0] === 1) this.index++;
    if (!endsAtom(this.peek())) throw this.peekError(code);
    return { kind: 'borrowed', value: lenientUtf8.decode(bytes.subarray(start, this.index)) };
  }
}

/** Reads a JavaScript string. The encoded input is known to be valid UTF-8, so decoding skips validation. */
export class StrRead extends SliceRead {
  constructor(text: string) {
    super(new TextEncoder().encode(text));
  }

  protected override decode(bytes: Uint8Array): string {
    return lenientUtf8.decode(bytes);
  }
}

/** Pull-based byte producer: fills `buffer` from the front and returns the count, 0 at end. */
export interface ByteSource {
  read(buffer: Uint8Array): number;
}

const IO_BUFFER_SIZE = 8192;

/** Reads from a blocking `ByteSource` through a fixed buffer. */
export class IoRead extends Read {
  private readonly buf: Uint8Array;
  private start = 0;
  private end = 0;
  /** Bytes that were in earlier fills of the buffer. */
  private consumed = 0;
  private done = false;
  /** Line of the next byte and the offset where that line starts. */
  private line = 1;
  private lineStart = 0;

  constructor(
    private readonly source: ByteSource,
    bufferSize: number = IO_BUFFER_SIZE
  ) {
    super();
    this.buf = new Uint8Array(bufferSize);
  }

  next(): number {
    const b = this.peek();
    if (b < 0) return b;
    this.start++;
    if (b === NEWLINE) {
      this.line++;
      this.lineStart = this.byteOffset();
    }
    return b;
  }

  peek(): number {
    if (this.start < this.end || this.fill()) return this.buf[this.start] ?? -1;
    return -1;
  }

  byteOffset(): number {
    return this.consumed + this.start;
  }

  /**
   * Resolves only the consumed offset and the one after it; earlier bytes
   * are reported through `markNext`.
   */
  protected positionOf(index: number): SourcePosition {
    let line = this.line;
    let lineStart = this.lineStart;
    const offset = this.byteOffset();
    if (index > offset && this.peek() === NEWLINE) {
      line++;
      lineStart = offset + 1;
    }
    return { line, column: index - lineStart, offset: Math.max(0, index - 1) };
  }

  /** The marked byte must not be a newline; callers mark the first byte of a token. */
  override markNext(): Mark {
    const offset = this.byteOffset();
    const line = this.line;
    const lineStart = this.lineStart;
    return () => ({ line, column: offset + 1 - lineStart, offset });
  }

  private fill(): boolean {
    if (this.done) return false;
    this.consumed += this.end;
    this.start = 0;
    this.end = 0;
    let n: number;
    try {
      n = this.source.read(this.buf);
    } catch (err) {
      throw EdnError.io(err);
    }
    if (n <= 0) {
      this.done = true;
      return false;
    }
    this.end = n;
    return true;
  }
}

/** Source over a file descriptor, read synchronously. */
export function fdSource(fd: number): ByteSource {
  return {
    read: (buffer) => readSync(fd, buffer, 0, buffer.length, null),
  };
}

/** Source over in-memory chunks; strings are UTF-8 encoded. */
export function chunkSource(chunks: Iterable<Uint8Array | string>): ByteSource {
  const encoder = new TextEncoder();
  const it = chunks[Symbol.iterator]();
  let pending: Uint8Array = new Uint8Array(0);
  return {
    read(buffer) {
      while (pending.length === 0) {
        const step = it.next();
        if (step.done) return 0;
        pending = typeof step.value === 'string' ? encoder.encode(step.value) : step.value;
      }
      const n = Math.min(buffer.length, pending.length);
      buffer.set(pending.subarray(0, n));
      pending = pending.subarray(n);
      return n;
    },
  };
}
