import { describe, expect, it } from 'vitest';
import * as z from 'zod';
import { EdnDataError, ErrorCode } from '../errors.js';
import { parse } from '../parser.js';
import { fromValue, parseAs } from '../typed.js';
import { errorOf } from './helpers.js';

const Service = z.object({
  name: z.string(),
  port: z.number().int(),
  tags: z.array(z.string()).default([]),
});

describe('parseAs', () => {
  it('decodes into a validated shape', () => {
    expect(parseAs('{:name "api" :port 8080}', Service)).toStrictEqual({ name: 'api', port: 8080, tags: [] });
    expect(parseAs('{:name "api" :port 1 :tags ["a" "b"]}', Service).tags).toStrictEqual(['a', 'b']);
  });

  it('reports the path of each mismatch', () => {
    const err = errorOf(() => parseAs('{:name 1 :port 8080}', Service));
    expect(err).toBeInstanceOf(EdnDataError);
    expect(err.code).toBe(ErrorCode.Message);
    expect(err.message.startsWith('invalid data: name: ')).toBe(true);
    expect(err.cause).toBeInstanceOf(z.ZodError);
  });

  it('joins nested paths with dots', () => {
    const Cluster = z.object({ servers: z.array(z.object({ port: z.number() })) });
    const err = errorOf(() => parseAs('{:servers [{:port "x"}]}', Cluster));
    expect(err.message.startsWith('invalid data: servers.0.port: ')).toBe(true);
  });

  it('names the root when the whole document mismatches', () => {
    expect(errorOf(() => parseAs('[1]', z.string())).message.startsWith('invalid data: (root): ')).toBe(true);
  });

  it('keeps integers beyond the safe range as bigint', () => {
    expect(parseAs('18446744073709551615', z.bigint())).toBe(18446744073709551615n);
  });

  it('passes syntax errors and options through', () => {
    expect(errorOf(() => parseAs('{', Service)).code).toBe(ErrorCode.EofWhileParsingMap);
    expect(errorOf(() => parseAs('[[1]]', z.unknown(), { maxDepth: 1 })).code).toBe(
      ErrorCode.RecursionLimitExceeded
    );
  });
});

describe('fromValue', () => {
  it('validates a decoded value', () => {
    expect(fromValue(parse('#{1 2}'), z.set(z.number()))).toStrictEqual(new Set([1, 2]));
    expect(fromValue(parse('(:a :b)'), z.array(z.enum(['a', 'b'])))).toStrictEqual(['a', 'b']);
  });
});
