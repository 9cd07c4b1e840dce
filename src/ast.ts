/**
 * EDN value model and source positions.
 *
 * Scalars map onto JavaScript primitives where the mapping is unambiguous:
 * nil is `null`, integers are `bigint`, floats are `number`. Keywords,
 * symbols and chars are small immutable classes so that they never compare
 * equal to strings. Containers are ordered; maps and sets accept any value
 * as a key and compare keys structurally.
 */

import invariant from 'tiny-invariant';
import { SYMBOL_BODY, isDigit } from './tables.js';

export interface SourcePosition {
  /** 1-based line */
  line: number;
  /** 1-based byte column within the line */
  column: number;
  /** 0-based byte offset */
  offset: number;
}

export type EdnValue =
  | null
  | boolean
  | bigint
  | number
  | string
  | EdnChar
  | EdnKeyword
  | EdnSymbol
  | EdnVector
  | EdnList
  | EdnSet
  | EdnMap;

export type EdnVector = EdnValue[];

export type Kind =
  | 'nil'
  | 'bool'
  | 'integer'
  | 'float'
  | 'string'
  | 'char'
  | 'keyword'
  | 'symbol'
  | 'vector'
  | 'list'
  | 'set'
  | 'map';

const RESERVED_WORDS = new Set(['nil', 'true', 'false']);

function isBody(name: string): boolean {
  if (name.length === 0) return false;
  for (let i = 0; i < name.length; i++) {
    if (SYMBOL_BODY[name.charCodeAt(i)] !== 1) return false;
  }
  return true;
}

/** True when `:name` reads back as a keyword with this name. */
export function isKeywordName(name: string): boolean {
  return isBody(name);
}

/** True when `name` reads back as a symbol: not a number, not a reserved word. */
export function isSymbolName(name: string): boolean {
  if (!isBody(name) || RESERVED_WORDS.has(name)) return false;
  const first = name.charCodeAt(0);
  if (isDigit(first)) return false;
  return !((first === 0x2b || first === 0x2d) && isDigit(name.charCodeAt(1)));
}

export class EdnKeyword {
  readonly kind = 'keyword' as const;
  /** Name without the leading colon. */
  readonly name: string;

  constructor(name: string) {
    invariant(isKeywordName(name), `invalid keyword name ${JSON.stringify(name)}`);
    this.name = name;
  }

  toString(): string {
    return `:${this.name}`;
  }
}

export class EdnSymbol {
  readonly kind = 'symbol' as const;
  readonly name: string;

  constructor(name: string) {
    invariant(isSymbolName(name), `invalid symbol name ${JSON.stringify(name)}`);
    this.name = name;
  }

  toString(): string {
    return this.name;
  }
}

export class EdnChar {
  readonly kind = 'char' as const;
  readonly value: string;

  constructor(value: string) {
    invariant(Array.from(value).length === 1, `char must hold one code point, got ${JSON.stringify(value)}`);
    this.value = value;
  }

  get codePoint(): number {
    return this.value.codePointAt(0) ?? 0;
  }

  toString(): string {
    return this.value;
  }
}

export class EdnList implements Iterable<EdnValue> {
  readonly items: EdnValue[];

  constructor(items: EdnValue[] = []) {
    this.items = items;
  }

  get length(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<EdnValue> {
    return this.items[Symbol.iterator]();
  }
}

/** Insertion-ordered set; structurally equal members are kept once. */
export class EdnSet implements Iterable<EdnValue> {
  private readonly members = new Map<string, EdnValue>();

  constructor(items?: Iterable<EdnValue>) {
    if (items) for (const item of items) this.add(item);
  }

  get size(): number {
    return this.members.size;
  }

  /** Returns false when an equal member was already present. */
  add(item: EdnValue): boolean {
    const key = hashKey(item);
    if (this.members.has(key)) return false;
    this.members.set(key, item);
    return true;
  }

  has(item: EdnValue): boolean {
    return this.members.has(hashKey(item));
  }

  delete(item: EdnValue): boolean {
    return this.members.delete(hashKey(item));
  }

  values(): IterableIterator<EdnValue> {
    return this.members.values();
  }

  [Symbol.iterator](): Iterator<EdnValue> {
    return this.members.values();
  }
}

/**
 * Insertion-ordered map with structural keys. Setting an existing key
 * replaces its value in place. Keys must not be mutated once inserted.
 */
export class EdnMap implements Iterable<[EdnValue, EdnValue]> {
  private readonly slots = new Map<string, [EdnValue, EdnValue]>();

  constructor(entries?: Iterable<readonly [EdnValue, EdnValue]>) {
    if (entries) for (const [k, v] of entries) this.set(k, v);
  }

  get size(): number {
    return this.slots.size;
  }

  get(key: EdnValue): EdnValue | undefined {
    return this.slots.get(hashKey(key))?.[1];
  }

  has(key: EdnValue): boolean {
    return this.slots.has(hashKey(key));
  }

  set(key: EdnValue, value: EdnValue): this {
    const hash = hashKey(key);
    const slot = this.slots.get(hash);
    if (slot) slot[1] = value;
    else this.slots.set(hash, [key, value]);
    return this;
  }

  delete(key: EdnValue): boolean {
    return this.slots.delete(hashKey(key));
  }

  *entries(): IterableIterator<[EdnValue, EdnValue]> {
    for (const [k, v] of this.slots.values()) yield [k, v];
  }

  *keys(): IterableIterator<EdnValue> {
    for (const slot of this.slots.values()) yield slot[0];
  }

  *values(): IterableIterator<EdnValue> {
    for (const slot of this.slots.values()) yield slot[1];
  }

  [Symbol.iterator](): Iterator<[EdnValue, EdnValue]> {
    return this.entries();
  }
}

export function keyword(name: string): EdnKeyword {
  return new EdnKeyword(name);
}

export function symbol(name: string): EdnSymbol {
  return new EdnSymbol(name);
}

export function char(value: string): EdnChar {
  return new EdnChar(value);
}

export function list(...items: EdnValue[]): EdnList {
  return new EdnList(items);
}

export function isNil(v: EdnValue): v is null {
  return v === null;
}

export function isBool(v: EdnValue): v is boolean {
  return typeof v === 'boolean';
}

export function isInteger(v: EdnValue): v is bigint {
  return typeof v === 'bigint';
}

export function isFloat(v: EdnValue): v is number {
  return typeof v === 'number';
}

export function isString(v: EdnValue): v is string {
  return typeof v === 'string';
}

export function isChar(v: EdnValue): v is EdnChar {
  return v instanceof EdnChar;
}

export function isKeyword(v: EdnValue): v is EdnKeyword {
  return v instanceof EdnKeyword;
}

export function isSymbol(v: EdnValue): v is EdnSymbol {
  return v instanceof EdnSymbol;
}

export function isVector(v: EdnValue): v is EdnVector {
  return Array.isArray(v);
}

export function isList(v: EdnValue): v is EdnList {
  return v instanceof EdnList;
}

export function isSet(v: EdnValue): v is EdnSet {
  return v instanceof EdnSet;
}

export function isMap(v: EdnValue): v is EdnMap {
  return v instanceof EdnMap;
}

export function kindOf(v: EdnValue): Kind {
  if (v === null) return 'nil';
  switch (typeof v) {
    case 'boolean':
      return 'bool';
    case 'bigint':
      return 'integer';
    case 'number':
      return 'float';
    case 'string':
      return 'string';
  }
  if (Array.isArray(v)) return 'vector';
  if (v instanceof EdnChar) return 'char';
  if (v instanceof EdnKeyword) return 'keyword';
  if (v instanceof EdnSymbol) return 'symbol';
  if (v instanceof EdnList) return 'list';
  if (v instanceof EdnSet) return 'set';
  return 'map';
}

/**
 * Canonical fingerprint: `equals(a, b)` exactly when the fingerprints match.
 * Set members and map entries are sorted so that order does not matter.
 */
export function hashKey(v: EdnValue): string {
  if (v === null) return 'n';
  switch (typeof v) {
    case 'boolean':
      return v ? 't' : 'f';
    case 'bigint':
      return `i${v}`;
    case 'number':
      // String() folds -0 into 0 and prints every NaN the same way
      return `d${String(v)}`;
    case 'string':
      return `s${JSON.stringify(v)}`;
  }
  if (Array.isArray(v)) return `[${v.map(hashKey).join(',')}]`;
  if (v instanceof EdnChar) return `c${JSON.stringify(v.value)}`;
  if (v instanceof EdnKeyword) return `k${JSON.stringify(v.name)}`;
  if (v instanceof EdnSymbol) return `y${JSON.stringify(v.name)}`;
  if (v instanceof EdnList) return `(${v.items.map(hashKey).join(',')})`;
  if (v instanceof EdnSet) return `#{${Array.from(v, hashKey).sort().join(',')}}`;
  const entries = Array.from(v, ([k, x]) => `${hashKey(k)}=${hashKey(x)}`);
  return `{${entries.sort().join(',')}}`;
}

/** Structural, tag-sensitive equality. */
export function equals(a: EdnValue, b: EdnValue): boolean {
  if (a === b) return true;
  if (typeof a === 'number' && typeof b === 'number') return Number.isNaN(a) && Number.isNaN(b);
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') return false;
  if (Array.isArray(a)) return Array.isArray(b) && sameItems(a, b);
  if (a instanceof EdnList) return b instanceof EdnList && sameItems(a.items, b.items);
  if (a instanceof EdnChar) return b instanceof EdnChar && a.value === b.value;
  if (a instanceof EdnKeyword) return b instanceof EdnKeyword && a.name === b.name;
  if (a instanceof EdnSymbol) return b instanceof EdnSymbol && a.name === b.name;
  if (a instanceof EdnSet) {
    if (!(b instanceof EdnSet) || a.size !== b.size) return false;
    for (const item of a) if (!b.has(item)) return false;
    return true;
  }
  if (!(b instanceof EdnMap) || a.size !== b.size) return false;
  for (const [k, v] of a) {
    const other = b.get(k);
    if (other === undefined || !equals(v, other)) return false;
  }
  return true;
}

function sameItems(a: EdnValue[], b: EdnValue[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!equals(a[i] ?? null, b[i] ?? null)) return false;
  }
  return true;
}

/** Deep copy of containers; scalars and atom objects are shared. */
export function clone<T extends EdnValue>(v: T): T;
export function clone(v: EdnValue): EdnValue {
  if (Array.isArray(v)) return v.map((x) => clone(x));
  if (v instanceof EdnList) return new EdnList(v.items.map((x) => clone(x)));
  if (v instanceof EdnSet) return new EdnSet(Array.from(v, (x) => clone(x)));
  if (v instanceof EdnMap) return new EdnMap(Array.from(v, ([k, x]): [EdnValue, EdnValue] => [clone(k), clone(x)]));
  return v;
}
