/**
 * Conversion between EDN values and plain JavaScript data.
 */

import { EdnChar, EdnKeyword, EdnList, EdnMap, EdnSet, EdnSymbol, isKeywordName, type EdnValue } from './ast.js';
import { EdnError } from './errors.js';
import { nativeInteger, type NativeValue } from './visitor.js';

/** Objects that choose their own EDN form. */
export interface EdnConvertible {
  toEdn(): unknown;
}

function isConvertible(input: object): input is EdnConvertible {
  return 'toEdn' in input && typeof input.toEdn === 'function';
}

function isName(key: EdnValue): key is string | EdnKeyword | EdnSymbol {
  return typeof key === 'string' || key instanceof EdnKeyword || key instanceof EdnSymbol;
}

/**
 * Plain data for a value: integers become numbers when they fit, names and
 * chars become strings, sets become `Set`. A map becomes an object when every
 * key is a string, keyword or symbol, otherwise a `Map`.
 */
export function toNative(value: EdnValue): NativeValue {
  if (value === null) return null;
  switch (typeof value) {
    case 'boolean':
    case 'number':
    case 'string':
      return value;
    case 'bigint':
      return nativeInteger(value);
  }
  if (Array.isArray(value)) return value.map(toNative);
  if (value instanceof EdnChar) return value.value;
  if (value instanceof EdnKeyword || value instanceof EdnSymbol) return value.name;
  if (value instanceof EdnList) return value.items.map(toNative);
  if (value instanceof EdnSet) return new Set(Array.from(value, toNative));
  const entries = Array.from(value);
  const named: [string, NativeValue][] = [];
  for (const [k, v] of entries) {
    if (!isName(k)) {
      return new Map(entries.map(([key, item]): [NativeValue, NativeValue] => [toNative(key), toNative(item)]));
    }
    named.push([typeof k === 'string' ? k : k.name, toNative(v)]);
  }
  return Object.fromEntries(named);
}

/**
 * EDN value for plain data. Safe integers become integers and other numbers
 * floats; object properties become keyword keys (string keys when the name
 * cannot be written as a keyword), skipping functions and undefined members.
 * Objects with a `toEdn()` method are converted through it.
 */
export function fromNative(input: unknown): EdnValue {
  return convert(input, new Set<object>());
}

function convert(input: unknown, seen: Set<object>): EdnValue {
  if (input === null || input === undefined) return null;
  switch (typeof input) {
    case 'boolean':
    case 'bigint':
    case 'string':
      return input;
    case 'number':
      return Number.isSafeInteger(input) && !Object.is(input, -0) ? BigInt(input) : input;
  }
  if (typeof input !== 'object') throw EdnError.data(`cannot convert ${typeof input} to EDN`);
  if (input instanceof EdnChar || input instanceof EdnKeyword || input instanceof EdnSymbol) return input;
  if (input instanceof EdnList || input instanceof EdnSet || input instanceof EdnMap) return input;
  if (input instanceof Date) return input.toISOString();
  if (seen.has(input)) throw EdnError.data('cannot convert a circular structure to EDN');
  seen.add(input);
  try {
    if (isConvertible(input)) return convert(input.toEdn(), seen);
    if (Array.isArray(input)) return input.map((item: unknown) => convert(item, seen));
    if (input instanceof Set) return new EdnSet(Array.from(input, (item: unknown) => convert(item, seen)));
    if (input instanceof Map) {
      const map = new EdnMap();
      for (const [k, v] of input) map.set(convert(k, seen), convert(v, seen));
      return map;
    }
    const map = new EdnMap();
    for (const [k, v] of Object.entries(input)) {
      if (v === undefined || typeof v === 'function') continue;
      map.set(isKeywordName(k) ? new EdnKeyword(k) : k, convert(v, seen));
    }
    return map;
  } finally {
    seen.delete(input);
  }
}
