import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { afterAll, afterEach, describe, expect, it, vi } from 'vitest';
import { equals } from '../ast.js';
import { EdnError, EdnIoError, ErrorCode } from '../errors.js';
import { parseFile, parseStream } from '../parse-async.js';
import { parse } from '../parser.js';
import { utf8 } from './helpers.js';

async function* chunks(...parts: (string | Uint8Array)[]): AsyncGenerator<string | Uint8Array> {
  for (const part of parts) yield part;
}

async function rejection(promise: Promise<unknown>): Promise<EdnError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof EdnError) return err;
    throw err;
  }
  throw new Error('expected an EdnError');
}

describe('parseStream', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('decodes a document split across chunks', async () => {
    const bytes = utf8('"é"');
    const value = await parseStream(chunks('{:a [1 ', bytes.subarray(0, 2), bytes.subarray(2), ']}'));
    expect(equals(value, parse('{:a [1 "é"]}'))).toBe(true);
  });

  it('reads a Node.js stream', async () => {
    const value = await parseStream(Readable.from([Buffer.from('[1 2'), Buffer.from(' 3]')]));
    expect(value).toStrictEqual([1n, 2n, 3n]);
  });

  it('wraps iteration failures as I/O errors', async () => {
    const failure = new Error('socket reset');
    async function* broken(): AsyncGenerator<string> {
      yield '[1';
      throw failure;
    }
    const err = await rejection(parseStream(broken()));
    expect(err).toBeInstanceOf(EdnIoError);
    expect(err.cause).toBe(failure);
  });

  it('reports syntax errors with positions', async () => {
    const err = await rejection(parseStream(chunks('[1\n', ' )')));
    expect(err.code).toBe(ErrorCode.ExpectedSomeValue);
    expect(err.line).toBe(2);
    expect(err.column).toBe(2);
  });

  it('logs the collected size when debugging', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    await parseStream(chunks('[1', ']'), { debug: true });
    expect(log).toHaveBeenCalledWith('[parseStream] collected 2 chunks, 3 bytes');
  });
});

describe('parseFile', () => {
  const dir = mkdtempSync(join(tmpdir(), 'edn-file-'));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('decodes a file', async () => {
    const path = join(dir, 'config.edn');
    writeFileSync(path, '{:db {:host "localhost" :pool 4}}\n');
    expect(equals(await parseFile(path), parse('{:db {:host "localhost" :pool 4}}'))).toBe(true);
  });

  it('reports a missing file as an I/O error', async () => {
    const err = await rejection(parseFile(join(dir, 'missing.edn')));
    expect(err).toBeInstanceOf(EdnIoError);
    expect(err.message.startsWith('I/O failure: ENOENT')).toBe(true);
  });
});
