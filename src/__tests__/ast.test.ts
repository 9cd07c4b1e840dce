import { describe, expect, it } from 'vitest';
import {
  EdnChar,
  EdnList,
  EdnMap,
  EdnSet,
  char,
  clone,
  equals,
  hashKey,
  isKeyword,
  isKeywordName,
  isSymbolName,
  isVector,
  keyword,
  kindOf,
  list,
  symbol,
  type EdnValue,
} from '../ast.js';

describe('equality', () => {
  it('distinguishes tags that share a name', () => {
    expect(equals(keyword('a'), symbol('a'))).toBe(false);
    expect(equals(keyword('a'), 'a')).toBe(false);
    expect(equals(char('a'), 'a')).toBe(false);
    expect(equals([1n], list(1n))).toBe(false);
    expect(equals(1n, 1)).toBe(false);
  });

  it('compares containers structurally', () => {
    expect(equals([1n, [keyword('x')]], [1n, [keyword('x')]])).toBe(true);
    expect(equals(list(symbol('f'), 2n), list(symbol('f'), 2n))).toBe(true);
    expect(equals([1n, 2n], [1n])).toBe(false);
  });

  it('ignores order in sets and maps', () => {
    expect(equals(new EdnSet([1n, 2n, 3n]), new EdnSet([3n, 1n, 2n]))).toBe(true);
    const a = new EdnMap([
      [keyword('a'), 1n],
      [keyword('b'), 2n],
    ]);
    const b = new EdnMap([
      [keyword('b'), 2n],
      [keyword('a'), 1n],
    ]);
    expect(equals(a, b)).toBe(true);
    expect(hashKey(a)).toBe(hashKey(b));
    b.set(keyword('a'), 9n);
    expect(equals(a, b)).toBe(false);
  });

  it('treats NaN as equal to itself and zero as unsigned', () => {
    expect(equals(NaN, NaN)).toBe(true);
    expect(equals(0, -0)).toBe(true);
    expect(hashKey(0)).toBe(hashKey(-0));
  });
});

describe('hashKey', () => {
  it('encodes each kind with its own tag', () => {
    expect(hashKey(null)).toBe('n');
    expect(hashKey(true)).toBe('t');
    expect(hashKey(12n)).toBe('i12');
    expect(hashKey(1.5)).toBe('d1.5');
    expect(hashKey('a')).toBe('s"a"');
    expect(hashKey(keyword('a'))).toBe('k"a"');
    expect(hashKey(symbol('a'))).toBe('y"a"');
    expect(hashKey(char('a'))).toBe('c"a"');
    expect(hashKey([1n, list(null)])).toBe('[i1,(n)]');
    expect(hashKey(new EdnSet([2n, 1n]))).toBe('#{i1,i2}');
  });
});

describe('EdnSet', () => {
  it('keeps one of each structurally equal member', () => {
    const set = new EdnSet([[1n], [1n], keyword('k')]);
    expect(set.size).toBe(2);
    expect(set.add(keyword('k'))).toBe(false);
    expect(set.add(symbol('k'))).toBe(true);
    expect(set.has([1n])).toBe(true);
    expect(set.delete([1n])).toBe(true);
    expect(Array.from(set)).toStrictEqual([keyword('k'), symbol('k')]);
  });
});

describe('EdnMap', () => {
  it('keeps insertion order and replaces values in place', () => {
    const map = new EdnMap();
    map.set(keyword('b'), 1n).set(keyword('a'), 2n).set(keyword('b'), 3n);
    expect(Array.from(map.keys())).toStrictEqual([keyword('b'), keyword('a')]);
    expect(Array.from(map.values())).toStrictEqual([3n, 2n]);
    expect(map.get(keyword('b'))).toBe(3n);
  });

  it('looks up structured keys', () => {
    const map = new EdnMap([[[1n, 2n], 'pair']]);
    expect(map.get([1n, 2n])).toBe('pair');
    expect(map.has(list(1n, 2n))).toBe(false);
    expect(map.delete([1n, 2n])).toBe(true);
    expect(map.size).toBe(0);
  });
});

describe('EdnChar', () => {
  it('holds exactly one code point', () => {
    expect(new EdnChar('😀').codePoint).toBe(0x1f600);
    expect(() => new EdnChar('ab')).toThrow('char must hold one code point, got "ab"');
    expect(() => new EdnChar('')).toThrow('Invariant failed');
  });
});

describe('names', () => {
  it('accepts names that read back as the same kind', () => {
    for (const name of ['a', 'a.b', '-', '+', '-x', '.5', 'nilly', 'true?', '<=>']) {
      expect(isSymbolName(name)).toBe(true);
    }
    for (const name of ['1', 'true', 'a-b', '?']) expect(isKeywordName(name)).toBe(true);
  });

  it('rejects names the reader would split or read as something else', () => {
    for (const name of ['', 'true', 'false', 'nil', '1a', '-1', '+9', 'a b', 'user/id', 'é']) {
      expect(isSymbolName(name)).toBe(false);
    }
    for (const name of ['', 'a b', 'user/id', 'x:y', 'é']) expect(isKeywordName(name)).toBe(false);
  });

  it('enforces the rules on construction', () => {
    expect(() => symbol('true')).toThrow('invalid symbol name "true"');
    expect(() => symbol('-1')).toThrow('invalid symbol name "-1"');
    expect(() => keyword('')).toThrow('invalid keyword name ""');
    expect(() => keyword('a b c')).toThrow('invalid keyword name "a b c"');
  });
});

describe('kindOf', () => {
  it('names every kind', () => {
    const samples: [EdnValue, string][] = [
      [null, 'nil'],
      [false, 'bool'],
      [1n, 'integer'],
      [1, 'float'],
      ['s', 'string'],
      [char('c'), 'char'],
      [keyword('k'), 'keyword'],
      [symbol('s'), 'symbol'],
      [[], 'vector'],
      [new EdnList(), 'list'],
      [new EdnSet(), 'set'],
      [new EdnMap(), 'map'],
    ];
    for (const [value, kind] of samples) expect(kindOf(value)).toBe(kind);
  });

  it('narrows through the guards', () => {
    const value: EdnValue = [keyword('a')];
    expect(isVector(value) && isKeyword(value[0] ?? null)).toBe(true);
  });
});

describe('clone', () => {
  it('copies containers deeply', () => {
    const inner = [1n];
    const original = new EdnMap([[keyword('v'), inner]]);
    const copy = clone(original);
    expect(equals(copy, original)).toBe(true);
    inner.push(2n);
    expect(copy.get(keyword('v'))).toStrictEqual([1n]);
  });
});
