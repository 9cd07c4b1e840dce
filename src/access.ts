/**
 * Lookup and in-place update of decoded values: soft indexing, path
 * pointers, insert-on-demand and move-out.
 */

import invariant from 'tiny-invariant';
import { EdnKeyword, EdnList, EdnMap, isKeywordName, kindOf, type EdnValue } from './ast.js';

/** Values usable as map keys through `get`; numbers and strings have their own meaning. */
export type EdnKey = Exclude<EdnValue, number | string>;

/**
 * A position (number) into a vector or list, a name (string) matching a
 * String or Keyword key of a map, or any other value as an exact map key.
 */
export type Index = number | string | EdnKey;

function itemsOf(value: EdnValue): EdnValue[] | undefined {
  if (Array.isArray(value)) return value;
  if (value instanceof EdnList) return value.items;
  return undefined;
}

/** The key actually stored for `index` in `map`: a String key wins over a Keyword of the same name. */
function resolveKey(map: EdnMap, index: string | EdnKey): EdnValue {
  if (typeof index !== 'string' || map.has(index) || !isKeywordName(index)) return index;
  const kw = new EdnKeyword(index);
  return map.has(kw) ? kw : index;
}

/** Soft lookup: undefined when the kind, position or key does not match. */
export function get(value: EdnValue, index: Index): EdnValue | undefined {
  if (typeof index === 'number') {
    const items = itemsOf(value);
    if (!items || !Number.isInteger(index) || index < 0) return undefined;
    return items[index];
  }
  if (!(value instanceof EdnMap)) return undefined;
  return value.get(resolveKey(value, index));
}

/** As `get`, with nil for anything missing. */
export function getOrNil(value: EdnValue, index: Index): EdnValue {
  return get(value, index) ?? null;
}

export function getIn(value: EdnValue, path: readonly Index[]): EdnValue | undefined {
  let current: EdnValue | undefined = value;
  for (const index of path) {
    if (current === undefined) return undefined;
    current = get(current, index);
  }
  return current;
}

function parseIndex(token: string): number | undefined {
  if (!/^(0|[1-9][0-9]*)$/.test(token)) return undefined;
  const n = Number(token);
  return Number.isSafeInteger(n) ? n : undefined;
}

/** Unescaped reference tokens of a non-empty pointer, or undefined when it does not start with `/`. */
function referenceTokens(path: string): string[] | undefined {
  if (!path.startsWith('/')) return undefined;
  return path
    .slice(1)
    .split('/')
    .map((raw) => raw.replace(/~1/g, '/').replace(/~0/g, '~'));
}

function step(target: EdnValue, token: string): EdnValue | undefined {
  const items = itemsOf(target);
  if (items) {
    const i = parseIndex(token);
    return i === undefined ? undefined : items[i];
  }
  if (target instanceof EdnMap) return target.get(resolveKey(target, token));
  return undefined;
}

/**
 * Looks up a slash-separated path such as `/users/0/name`. Tokens unescape
 * `~1` to `/` and `~0` to `~`; the empty pointer is the value itself.
 */
export function pointer(value: EdnValue, path: string): EdnValue | undefined {
  if (path === '') return value;
  const tokens = referenceTokens(path);
  if (!tokens) return undefined;
  let target: EdnValue | undefined = value;
  for (const token of tokens) {
    if (target === undefined) return undefined;
    target = step(target, token);
  }
  return target;
}

/**
 * Replaces the value a pointer addresses. Only existing slots are replaced:
 * returns undefined, leaving `root` untouched, when the pointer does not
 * resolve. Otherwise returns the root, which is `value` for the empty pointer.
 */
export function setPointer(root: EdnValue, path: string, value: EdnValue): EdnValue | undefined {
  if (path === '') return value;
  const tokens = referenceTokens(path);
  if (!tokens) return undefined;
  const last = tokens.pop() ?? '';
  let parent: EdnValue | undefined = root;
  for (const token of tokens) {
    if (parent === undefined) return undefined;
    parent = step(parent, token);
  }
  if (parent === undefined) return undefined;
  const items = itemsOf(parent);
  if (items) {
    const i = parseIndex(last);
    if (i === undefined || i >= items.length) return undefined;
    items[i] = value;
    return root;
  }
  if (!(parent instanceof EdnMap)) return undefined;
  const key = resolveKey(parent, last);
  if (!parent.has(key)) return undefined;
  parent.set(key, value);
  return root;
}

/**
 * Replaces the child at `index` with nil and returns the original child,
 * or undefined when there is no such child.
 */
export function take(parent: EdnValue, index: Index): EdnValue | undefined {
  if (typeof index === 'number') {
    const items = itemsOf(parent);
    if (!items || !Number.isInteger(index) || index < 0 || index >= items.length) return undefined;
    const old = items[index];
    items[index] = null;
    return old;
  }
  if (!(parent instanceof EdnMap)) return undefined;
  const key = resolveKey(parent, index);
  const old = parent.get(key);
  if (old !== undefined) parent.set(key, null);
  return old;
}

/**
 * Stores `value` at `path` below `root`, creating maps for nil slots and
 * missing keys along the way. Returns the root, which is a new map when
 * `root` was nil. Indexing a non-map by key, a non-sequence by position, or
 * a sequence past its end is an error.
 */
export function assocIn(root: EdnValue, path: readonly Index[], value: EdnValue): EdnValue {
  if (path.length === 0) return value;
  const [index, ...rest] = path;
  if (typeof index === 'number') {
    const items = itemsOf(root);
    invariant(items, `cannot index ${kindOf(root)} by position ${index}`);
    invariant(
      Number.isInteger(index) && index >= 0 && index < items.length,
      `index ${index} out of bounds for length ${items.length}`
    );
    items[index] = assocIn(items[index] ?? null, rest, value);
    return root;
  }
  const map = root ?? new EdnMap();
  invariant(map instanceof EdnMap, `cannot index ${kindOf(root)} by key`);
  const key = resolveKey(map, index);
  map.set(key, assocIn(map.get(key) ?? null, rest, value));
  return map;
}
