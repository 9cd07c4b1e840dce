/**
 * EDN text decoder. Dispatches on one peeked byte and drives the scanner in
 * read.ts. Two entry points share that dispatch: `parseValue` builds an
 * `EdnValue` directly, `deserializeAny` feeds a visitor without building one.
 */

import { EdnChar, EdnKeyword, EdnList, EdnMap, EdnSet, EdnSymbol, type EdnValue } from './ast.js';
import { EdnError, ErrorCode } from './errors.js';
import { IoRead, Scratch, SliceRead, StrRead, type ByteSource, type Mark, type Read } from './read.js';
import { SYMBOL_BODY, endsAtom, isDigit, isWhitespace } from './tables.js';
import type { MapAccess, SeqAccess, Visitor } from './visitor.js';

export interface ParseOptions {
  /** Max container nesting (default 128). `Infinity` disables the check. */
  maxDepth?: number;
  /** Log decoder progress to the console (default false). */
  debug?: boolean;
}

/** Text, UTF-8 bytes, or a pull-based byte source. */
export type Input = string | Uint8Array | ByteSource;

export const DEFAULT_MAX_DEPTH = 128;

const LPAREN = 0x28;
const RPAREN = 0x29;
const LBRACKET = 0x5b;
const RBRACKET = 0x5d;
const LBRACE = 0x7b;
const RBRACE = 0x7d;
const HASH = 0x23;
const QUOTE = 0x22;
const COLON = 0x3a;
const BACKSLASH = 0x5c;
const PLUS = 0x2b;
const MINUS = 0x2d;
const DOT = 0x2e;

const MIN_INTEGER = -(2n ** 63n);
const MAX_INTEGER = 2n ** 64n - 1n;

const RESERVED = new Map<number, [string, boolean | null]>([
  [0x74, ['true', true]],
  [0x66, ['false', false]],
  [0x6e, ['nil', null]],
]);

const NAMED_CHARS = new Map<string, string>([
  ['newline', '\n'],
  ['return', '\r'],
  ['tab', '\t'],
  ['space', ' '],
]);

type Atom = null | boolean | bigint | number | EdnSymbol;

export function readerFor(input: Input): Read {
  if (typeof input === 'string') return new StrRead(input);
  if (input instanceof Uint8Array) return new SliceRead(input);
  return new IoRead(input);
}

export class Deserializer {
  private readonly scratch = new Scratch();
  private readonly maxDepth: number;
  private readonly debug: boolean;
  private depth = 0;

  constructor(
    readonly read: Read,
    options: ParseOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.debug = options.debug ?? false;
  }

  /** Skips whitespace and commas; returns the next byte without consuming it. */
  skipWhitespace(): number {
    for (;;) {
      const b = this.read.peek();
      if (b < 0 || !isWhitespace(b)) return b;
      this.read.discard();
    }
  }

  /** Fails unless only whitespace remains. */
  end(): void {
    if (this.skipWhitespace() >= 0) throw this.read.peekError(ErrorCode.TrailingCharacters);
    this.log(`document complete at byte ${this.read.byteOffset()}`);
  }

  /**
   * Decodes a sequence of whitespace-separated top-level values. After each
   * yield `read.byteOffset()` is the offset just past that value.
   */
  *values(): Generator<EdnValue, void, undefined> {
    while (this.skipWhitespace() >= 0) {
      const value = this.parseValue();
      this.log(`stream value ends at byte ${this.read.byteOffset()}`);
      yield value;
    }
  }

  parseValue(): EdnValue {
    const b = this.skipWhitespace();
    switch (b) {
      case -1:
        throw this.read.peekError(ErrorCode.EofWhileParsingValue);
      case LPAREN:
        this.enter();
        return this.nested(() => new EdnList(this.parseItems(RPAREN, ErrorCode.EofWhileParsingList)));
      case LBRACKET:
        this.enter();
        return this.nested(() => this.parseItems(RBRACKET, ErrorCode.EofWhileParsingVector));
      case LBRACE:
        this.enter();
        return this.nested(() => this.parseEntries());
      case HASH:
        this.openSet();
        return this.nested(() => new EdnSet(this.parseItems(RBRACE, ErrorCode.EofWhileParsingSet)));
      case QUOTE:
        this.read.discard();
        return this.read.parseStr(this.scratch).value;
      case COLON:
        this.read.discard();
        return new EdnKeyword(this.read.parseKeyword(this.scratch).value);
      case BACKSLASH:
        this.read.discard();
        return new EdnChar(this.parseChar());
      default:
        return this.parseAtom(b);
    }
  }

  deserializeAny<T>(visitor: Visitor<T>): T {
    const ignore = visitor.visitIgnored;
    if (ignore) {
      this.ignoreValue();
      return this.visit(() => ignore.call(visitor));
    }
    const b = this.skipWhitespace();
    switch (b) {
      case -1:
        throw this.read.peekError(ErrorCode.EofWhileParsingValue);
      case LPAREN:
        this.enter();
        return this.nested(() => {
          const method = visitor.visitList;
          if (!method) throw this.invalidType(visitor, 'list');
          const seq = new SeqReader(this, RPAREN, ErrorCode.EofWhileParsingList);
          return this.visit(() => seq.visitWith(visitor, method));
        });
      case LBRACKET:
        this.enter();
        return this.nested(() => {
          const method = visitor.visitVector;
          if (!method) throw this.invalidType(visitor, 'vector');
          const seq = new SeqReader(this, RBRACKET, ErrorCode.EofWhileParsingVector);
          return this.visit(() => seq.visitWith(visitor, method));
        });
      case HASH:
        this.openSet();
        return this.nested(() => {
          const method = visitor.visitSet;
          if (!method) throw this.invalidType(visitor, 'set');
          const seq = new SeqReader(this, RBRACE, ErrorCode.EofWhileParsingSet);
          return this.visit(() => seq.visitWith(visitor, method));
        });
      case LBRACE:
        this.enter();
        return this.nested(() => {
          const method = visitor.visitMap;
          if (!method) throw this.invalidType(visitor, 'map');
          const map = new MapReader(this);
          return this.visit(() => map.visitWith(visitor, method));
        });
      case QUOTE: {
        this.read.discard();
        const s = this.read.parseStr(this.scratch).value;
        const method = visitor.visitString;
        if (!method) throw this.invalidType(visitor, `string ${JSON.stringify(s)}`);
        return this.visit(() => method.call(visitor, s));
      }
      case COLON: {
        this.read.discard();
        const name = this.read.parseKeyword(this.scratch).value;
        const method = visitor.visitKeyword;
        if (!method) throw this.invalidType(visitor, `keyword :${name}`);
        return this.visit(() => method.call(visitor, name));
      }
      case BACKSLASH: {
        this.read.discard();
        const c = this.parseChar();
        const method = visitor.visitChar;
        if (!method) throw this.invalidType(visitor, `char ${JSON.stringify(c)}`);
        return this.visit(() => method.call(visitor, c));
      }
      default:
        return this.visitAtom(visitor, this.parseAtom(b));
    }
  }

  /** Consumes one value of any kind, without decoding strings. */
  ignoreValue(): void {
    const b = this.skipWhitespace();
    switch (b) {
      case -1:
        throw this.read.peekError(ErrorCode.EofWhileParsingValue);
      case LPAREN:
        this.enter();
        this.nested(() => this.ignoreItems(RPAREN, ErrorCode.EofWhileParsingList));
        return;
      case LBRACKET:
        this.enter();
        this.nested(() => this.ignoreItems(RBRACKET, ErrorCode.EofWhileParsingVector));
        return;
      case HASH:
        this.openSet();
        this.nested(() => this.ignoreItems(RBRACE, ErrorCode.EofWhileParsingSet));
        return;
      case LBRACE:
        this.enter();
        this.nested(() => this.ignoreEntries());
        return;
      case QUOTE:
        this.read.discard();
        this.read.ignoreStr();
        return;
      case COLON:
        this.read.discard();
        this.read.parseKeyword(this.scratch);
        return;
      case BACKSLASH:
        this.read.discard();
        this.parseChar();
        return;
      default:
        this.parseAtom(b);
        return;
    }
  }

  /** Data error for a value the visitor has no method for. */
  invalidType(visitor: Visitor<unknown>, what: string): EdnError {
    return EdnError.data(`invalid type: ${what}, expected ${visitor.expecting}`, {
      position: this.read.position(),
    });
  }

  /** Error for a map whose last key, marked at its first byte, has no value. */
  missingValue(keyStart: Mark): EdnError {
    return EdnError.at(ErrorCode.MissingMapValue, keyStart());
  }

  /** Runs visitor code, attaching the current position to unpositioned errors. */
  private visit<T>(f: () => T): T {
    try {
      return f();
    } catch (err) {
      if (err instanceof EdnError) throw err.withPosition(this.read.position());
      throw err;
    }
  }

  private visitAtom<T>(visitor: Visitor<T>, atom: Atom): T {
    if (atom === null) {
      const method = visitor.visitNil;
      if (!method) throw this.invalidType(visitor, 'nil');
      return this.visit(() => method.call(visitor));
    }
    if (typeof atom === 'boolean') {
      const method = visitor.visitBool;
      if (!method) throw this.invalidType(visitor, `boolean ${atom}`);
      return this.visit(() => method.call(visitor, atom));
    }
    if (typeof atom === 'bigint') {
      const method = visitor.visitInteger;
      if (!method) throw this.invalidType(visitor, `integer ${atom}`);
      return this.visit(() => method.call(visitor, atom));
    }
    if (typeof atom === 'number') {
      const method = visitor.visitFloat;
      if (!method) throw this.invalidType(visitor, `float ${atom}`);
      return this.visit(() => method.call(visitor, atom));
    }
    const method = visitor.visitSymbol;
    if (!method) throw this.invalidType(visitor, `symbol ${atom.name}`);
    const name = atom.name;
    return this.visit(() => method.call(visitor, name));
  }

  /** Consumes an opening delimiter and checks the nesting limit. Pair with `nested`. */
  private enter(): void {
    this.read.discard();
    if (this.depth >= this.maxDepth) throw this.read.error(ErrorCode.RecursionLimitExceeded);
    this.depth++;
  }

  /** Runs the body of a container entered with `enter`. */
  private nested<T>(f: () => T): T {
    try {
      return f();
    } finally {
      this.depth--;
    }
  }

  /** Consumes `#{`. */
  private openSet(): void {
    this.read.discard();
    if (this.read.peek() !== LBRACE) throw this.read.peekError(ErrorCode.ExpectedSomeValue);
    this.enter();
  }

  private parseItems(close: number, eof: ErrorCode): EdnValue[] {
    const items: EdnValue[] = [];
    for (;;) {
      const b = this.skipWhitespace();
      if (b < 0) throw this.read.peekError(eof);
      if (b === close) {
        this.read.discard();
        return items;
      }
      items.push(this.parseValue());
    }
  }

  private parseEntries(): EdnMap {
    const map = new EdnMap();
    for (;;) {
      let b = this.skipWhitespace();
      if (b < 0) throw this.read.peekError(ErrorCode.EofWhileParsingMap);
      if (b === RBRACE) {
        this.read.discard();
        return map;
      }
      const keyStart = this.read.markNext();
      const key = this.parseValue();
      b = this.skipWhitespace();
      if (b < 0) throw this.read.peekError(ErrorCode.EofWhileParsingMap);
      if (b === RBRACE) throw this.missingValue(keyStart);
      map.set(key, this.parseValue());
    }
  }

  private ignoreItems(close: number, eof: ErrorCode): void {
    for (;;) {
      const b = this.skipWhitespace();
      if (b < 0) throw this.read.peekError(eof);
      if (b === close) {
        this.read.discard();
        return;
      }
      this.ignoreValue();
    }
  }

  private ignoreEntries(): void {
    for (;;) {
      let b = this.skipWhitespace();
      if (b < 0) throw this.read.peekError(ErrorCode.EofWhileParsingMap);
      if (b === RBRACE) {
        this.read.discard();
        return;
      }
      const keyStart = this.read.markNext();
      this.ignoreValue();
      b = this.skipWhitespace();
      if (b < 0) throw this.read.peekError(ErrorCode.EofWhileParsingMap);
      if (b === RBRACE) throw this.missingValue(keyStart);
      this.ignoreValue();
    }
  }

  /** Number, symbol or reserved word starting at the peeked byte `b`. */
  private parseAtom(b: number): Atom {
    if (isDigit(b)) return this.parseNumber(false);
    if (b === MINUS || b === PLUS) {
      this.read.discard();
      if (isDigit(this.read.peek())) return this.parseNumber(b === MINUS);
      return new EdnSymbol(this.read.parseSymbol(this.scratch, String.fromCharCode(b)).value);
    }
    if (b >= 0 && SYMBOL_BODY[b] === 1) {
      const reserved = RESERVED.get(b);
      if (reserved) {
        const ref = this.read.parseReservedOrSymbol(this.scratch, reserved[0]);
        return ref === null ? reserved[1] : new EdnSymbol(ref.value);
      }
      return new EdnSymbol(this.read.parseSymbol(this.scratch).value);
    }
    throw this.read.peekError(ErrorCode.ExpectedSomeValue);
  }

  /**
   * Integer or float; the sign, if any, has been consumed and a digit is next.
   * A trailing `N` marks an integer of arbitrary size.
   */
  private parseNumber(negative: boolean): bigint | number {
    let text = negative ? '-' : '';
    const first = this.read.next();
    text += String.fromCharCode(first);
    if (first === 0x30 && isDigit(this.read.peek())) throw this.read.peekError(ErrorCode.InvalidNumber);
    text += this.digits();
    let float = false;
    if (this.read.peek() === DOT) {
      this.read.discard();
      if (!isDigit(this.read.peek())) throw this.read.peekError(ErrorCode.InvalidNumber);
      text += '.' + this.digits();
      float = true;
    }
    const e = this.read.peek();
    if (e === 0x65 || e === 0x45) {
      this.read.discard();
      text += 'e';
      const sign = this.read.peek();
      if (sign === PLUS || sign === MINUS) {
        this.read.discard();
        text += String.fromCharCode(sign);
      }
      if (!isDigit(this.read.peek())) throw this.read.peekError(ErrorCode.InvalidNumber);
      text += this.digits();
      float = true;
    }
    let unbounded = false;
    if (!float && this.read.peek() === 0x4e) {
      this.read.discard();
      unbounded = true;
    }
    if (!endsAtom(this.read.peek())) throw this.read.peekError(ErrorCode.InvalidNumber);

    if (float) {
      const n = Number(text);
      if (!Number.isFinite(n)) throw this.read.error(ErrorCode.NumberOutOfRange);
      return n;
    }
    const n = BigInt(text);
    if (!unbounded && (n < MIN_INTEGER || n > MAX_INTEGER)) {
      throw this.read.error(ErrorCode.NumberOutOfRange);
    }
    return n;
  }

  private digits(): string {
    let s = '';
    while (isDigit(this.read.peek())) s += String.fromCharCode(this.read.next());
    return s;
  }

  /**
   * Char literal after the backslash. A symbol-body byte starts a name
   * (`\a`, `\newline`, `é`); any other code point is taken as is.
   */
  private parseChar(): string {
    const b = this.read.peek();
    if (b < 0) throw this.read.peekError(ErrorCode.EofWhileParsingValue);
    if (b >= 0x80) return String.fromCodePoint(this.read.readCodePoint());
    if (SYMBOL_BODY[b] !== 1) {
      this.read.discard();
      return String.fromCharCode(b);
    }
    const name = this.read.scanAtom(this.scratch, ErrorCode.InvalidCharacter).value;
    if (name.length === 1) return name;
    const named = NAMED_CHARS.get(name);
    if (named !== undefined) return named;
    if (/^u[0-9a-fA-F]{4}$/.test(name)) {
      const unit = parseInt(name.slice(1), 16);
      if (unit >= 0xd800 && unit <= 0xdfff) throw this.read.error(ErrorCode.InvalidUnicodeCodePoint);
      return String.fromCharCode(unit);
    }
    throw this.read.error(ErrorCode.InvalidCharacter);
  }

  private log(message: string): void {
    if (this.debug) console.log(`[Deserializer] ${message}`);
  }
}

class SeqReader implements SeqAccess {
  private done = false;

  constructor(
    private readonly de: Deserializer,
    private readonly close: number,
    private readonly eof: ErrorCode
  ) {}

  nextElement<U>(visitor: Visitor<U>): IteratorResult<U, undefined> {
    if (this.atEnd()) return { done: true, value: undefined };
    return { done: false, value: this.de.deserializeAny(visitor) };
  }

  skipElement(): boolean {
    if (this.atEnd()) return false;
    this.de.ignoreValue();
    return true;
  }

  /** Hands this sequence to `method` and checks it was read to the end. */
  visitWith<T>(visitor: Visitor<T>, method: (seq: SeqAccess) => T): T {
    const value = method.call(visitor, this);
    if (!this.atEnd()) throw this.de.read.peekError(ErrorCode.TrailingCharacters);
    return value;
  }

  private atEnd(): boolean {
    if (this.done) return true;
    const b = this.de.skipWhitespace();
    if (b < 0) throw this.de.read.peekError(this.eof);
    if (b !== this.close) return false;
    this.de.read.discard();
    this.done = true;
    return true;
  }
}

class MapReader implements MapAccess {
  private done = false;
  private pending = false;
  private keyStart: Mark = () => this.de.read.position();

  constructor(private readonly de: Deserializer) {}

  nextKey<U>(visitor: Visitor<U>): IteratorResult<U, undefined> {
    if (this.pending) this.skipValue();
    if (this.atEnd()) return { done: true, value: undefined };
    this.keyStart = this.de.read.markNext();
    const key = this.de.deserializeAny(visitor);
    this.pending = true;
    return { done: false, value: key };
  }

  nextValue<U>(visitor: Visitor<U>): U {
    this.expectValue();
    return this.de.deserializeAny(visitor);
  }

  skipValue(): void {
    this.expectValue();
    this.de.ignoreValue();
  }

  visitWith<T>(visitor: Visitor<T>, method: (map: MapAccess) => T): T {
    const value = method.call(visitor, this);
    if (this.pending) this.expectValue();
    if (!this.atEnd()) throw this.de.read.peekError(ErrorCode.TrailingCharacters);
    return value;
  }

  private expectValue(): void {
    if (!this.pending) throw EdnError.data('map value requested before its key');
    this.pending = false;
    const b = this.de.skipWhitespace();
    if (b < 0) throw this.de.read.peekError(ErrorCode.EofWhileParsingMap);
    if (b === RBRACE) throw this.de.missingValue(this.keyStart);
  }

  private atEnd(): boolean {
    if (this.done) return true;
    const b = this.de.skipWhitespace();
    if (b < 0) throw this.de.read.peekError(ErrorCode.EofWhileParsingMap);
    if (b !== RBRACE) return false;
    this.de.read.discard();
    this.done = true;
    return true;
  }
}

/** Decodes one document. */
export function parse(input: Input, options: ParseOptions = {}): EdnValue {
  const de = new Deserializer(readerFor(input), options);
  const value = de.parseValue();
  de.end();
  return value;
}

/** Decodes one document by driving `visitor`. */
export function parseWith<T>(input: Input, visitor: Visitor<T>, options: ParseOptions = {}): T {
  const de = new Deserializer(readerFor(input), options);
  const value = de.deserializeAny(visitor);
  de.end();
  return value;
}

/** Decodes every top-level value in `input`. */
export function* parseAll(input: Input, options: ParseOptions = {}): Generator<EdnValue, void, undefined> {
  yield* new Deserializer(readerFor(input), options).values();
}
