import { closeSync, mkdtempSync, openSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, describe, expect, it } from 'vitest';
import { EdnMap, EdnSet, char, equals, keyword, symbol, type EdnValue } from '../ast.js';
import { EdnIoError, ErrorCode } from '../errors.js';
import { parse } from '../parser.js';
import { fdSink, serialize, stringify, toBytes, write, type Sink } from '../stringify.js';
import { errorOf } from './helpers.js';

function nested(depth: number): EdnValue {
  let value: EdnValue = 0n;
  for (let i = 0; i < depth; i++) value = [value];
  return value;
}

describe('stringify', () => {
  it('writes compact text', () => {
    const text = '[1 2.5 "s" \\c :k sym (a b) #{1} {:a nil} true false]';
    expect(stringify(parse(text))).toBe(text);
  });

  it('reads back every keyword and symbol it writes', () => {
    const value = new EdnMap([
      [symbol('-'), symbol('+')],
      [symbol('true?'), symbol('.5')],
      [keyword('1'), keyword('nil')],
      [symbol('nilly'), symbol('-x')],
    ]);
    const text = stringify(value);
    expect(text).toBe('{- + true? .5 :1 :nil nilly -x}');
    expect(equals(parse(text), value)).toBe(true);
  });

  it('writes empty containers', () => {
    expect(stringify(parse('[[] () #{} {}]'))).toBe('[[] () #{} {}]');
  });

  it('round-trips nested documents', () => {
    const value = parse('{:a {[1 2] #{"x" \\y}} "s\\n" (nil 1e-7 -3) :neg -0.0}');
    expect(equals(parse(stringify(value)), value)).toBe(true);
    expect(equals(parse(stringify(value, { indent: '  ' })), value)).toBe(true);
  });

  it('writes floats with a fraction or exponent', () => {
    expect(stringify(42)).toBe('42.0');
    expect(stringify(-0)).toBe('-0.0');
    expect(stringify(0.1)).toBe('0.1');
    expect(stringify(1e21)).toBe('1e+21');
    expect(stringify(1.5e-7)).toBe('1.5e-7');
    expect(stringify([NaN, Infinity])).toBe('[nil nil]');
  });

  it('marks integers outside the 64-bit range', () => {
    expect(stringify(2n ** 64n - 1n)).toBe('18446744073709551615');
    expect(stringify(2n ** 64n)).toBe('18446744073709551616N');
    expect(stringify(-(2n ** 63n) - 1n)).toBe('-9223372036854775809N');
  });

  it('escapes strings', () => {
    expect(stringify('a"b\\c\n\u0001')).toBe('"a\\"b\\\\c\\n\\u0001"');
    expect(stringify('tab\there é')).toBe('"tab\\there é"');
  });

  it('writes chars by name or escape', () => {
    expect(stringify(char('\n'))).toBe('\\newline');
    expect(stringify(char(' '))).toBe('\\space');
    expect(stringify(char('\u0001'))).toBe('\\u0001');
    expect(stringify(char('\u007f'))).toBe('\\u007F');
    expect(stringify(char('é'))).toBe('\\é');
    expect(stringify(char('('))).toBe('\\(');
  });

  it('pretty-prints one element per line', () => {
    expect(stringify(parse('{:a [1 2] :b {}}'), { indent: '  ' })).toBe('{\n  :a [\n    1\n    2\n  ]\n  :b {}\n}');
    expect(stringify(parse('[1]'), { indent: '\t', newline: '\r\n' })).toBe('[\r\n\t1\r\n]');
    expect(stringify(new EdnSet([keyword('x')]), { indent: ' ' })).toBe('#{\n :x\n}');
  });

  it('limits nesting', () => {
    expect(stringify(nested(1024))).toBe('['.repeat(1024) + '0' + ']'.repeat(1024));
    const err = errorOf(() => stringify(nested(1025)));
    expect(err.code).toBe(ErrorCode.RecursionLimitExceeded);
    expect(err.message).toBe('recursion limit exceeded');
    expect(errorOf(() => stringify(nested(3), { maxDepth: 2 })).code).toBe(ErrorCode.RecursionLimitExceeded);
  });
});

describe('toBytes and write', () => {
  it('encodes UTF-8', () => {
    expect(Array.from(toBytes('é'))).toStrictEqual([0x22, 0xc3, 0xa9, 0x22]);
  });

  it('writes large values in several chunks', () => {
    const value = Array.from({ length: 5000 }, (_, i) => `item-${i}`);
    const chunks: Uint8Array[] = [];
    write(value, { write: (chunk) => chunks.push(chunk) });
    expect(chunks.length).toBeGreaterThan(1);
    const text = chunks.map((chunk) => new TextDecoder().decode(chunk)).join('');
    expect(text).toBe(stringify(value));
  });

  it('reports sink failures as I/O errors', () => {
    const failure = new Error('pipe closed');
    const sink: Sink = {
      write() {
        throw failure;
      },
    };
    const err = errorOf(() => write([1n], sink));
    expect(err).toBeInstanceOf(EdnIoError);
    expect(err.cause).toBe(failure);
    expect(err.message).toBe('I/O failure: pipe closed');
  });
});

describe('fdSink', () => {
  const dir = mkdtempSync(join(tmpdir(), 'edn-write-'));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes to a file descriptor', () => {
    const path = join(dir, 'out.edn');
    const fd = openSync(path, 'w');
    try {
      write(parse('{:port 8080}'), fdSink(fd), { indent: '  ' });
    } finally {
      closeSync(fd);
    }
    expect(readFileSync(path, 'utf8')).toBe('{\n  :port 8080\n}');
  });
});

describe('serialize', () => {
  it('writes plain data with keyword keys', () => {
    expect(serialize({ name: 'x', tags: ['a'], n: 3 })).toBe('{:name "x" :tags ["a"] :n 3}');
    expect(serialize({ ratio: 0.5, skip: undefined })).toBe('{:ratio 0.5}');
  });

  it('writes property names that are not keyword names as strings', () => {
    const text = serialize({ 'a b c': 1, 'user/id': 2, '': 3, ok: 4 });
    expect(text).toBe('{"a b c" 1 "user/id" 2 "" 3 :ok 4}');
    const value = parse(text);
    expect(equals(value, parse('{"a b c" 1 "user/id" 2 "" 3 :ok 4}'))).toBe(true);
    expect(value instanceof EdnMap && value.size).toBe(4);
  });
});
