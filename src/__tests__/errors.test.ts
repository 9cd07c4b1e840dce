import { describe, expect, it } from 'vitest';
import {
  EdnDataError,
  EdnEofError,
  EdnError,
  EdnIoError,
  EdnSyntaxError,
  ErrorCode,
  categoryOf,
} from '../errors.js';
import { parse } from '../parser.js';
import { errorOf } from './helpers.js';

const at = { line: 2, column: 5, offset: 9 };

describe('EdnError', () => {
  it('formats positioned messages', () => {
    const err = EdnError.at(ErrorCode.InvalidNumber, at);
    expect(err).toBeInstanceOf(EdnSyntaxError);
    expect(err).toBeInstanceOf(EdnError);
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe('invalid number at line 2 column 5');
    expect(err.detail).toBe('invalid number');
    expect(err.location).toBe('line 2, column 5');
    expect(err.toString()).toBe('EdnSyntaxError: invalid number at line 2 column 5');
  });

  it('picks the subclass from the category', () => {
    expect(EdnError.at(ErrorCode.EofWhileParsingString, at)).toBeInstanceOf(EdnEofError);
    expect(EdnError.at(ErrorCode.Io, at)).toBeInstanceOf(EdnIoError);
    expect(EdnError.at(ErrorCode.Message, at)).toBeInstanceOf(EdnDataError);
  });

  it('reports zero line and column without a position', () => {
    const err = EdnError.of(ErrorCode.RecursionLimitExceeded);
    expect(err.line).toBe(0);
    expect(err.column).toBe(0);
    expect(err.location).toBe('');
    expect(err.message).toBe('recursion limit exceeded');
  });

  it('adds a position once', () => {
    const cause = new Error('inner');
    const err = EdnError.data('bad field', { cause });
    const placed = err.withPosition(at);
    expect(placed).toBeInstanceOf(EdnDataError);
    expect(placed.message).toBe('bad field at line 2 column 5');
    expect(placed.cause).toBe(cause);
    expect(placed.withPosition({ line: 9, column: 9, offset: 0 })).toBe(placed);
  });

  it('describes I/O failures by their cause', () => {
    expect(EdnError.io(new Error('no space')).message).toBe('I/O failure: no space');
    expect(EdnError.io('closed').message).toBe('I/O failure: closed');
  });
});

describe('categoryOf', () => {
  it('groups codes', () => {
    expect(categoryOf(ErrorCode.Io)).toBe('io');
    expect(categoryOf(ErrorCode.Message)).toBe('data');
    expect(categoryOf(ErrorCode.EofWhileParsingValue)).toBe('eof');
    expect(categoryOf(ErrorCode.TrailingCharacters)).toBe('syntax');
    expect(categoryOf(ErrorCode.RecursionLimitExceeded)).toBe('syntax');
  });

  it('classifies decoder failures', () => {
    const eof = errorOf(() => parse('[1'));
    expect(eof.isEof()).toBe(true);
    expect(eof.isSyntax()).toBe(false);
    expect(eof.category).toBe('eof');
    const syntax = errorOf(() => parse('1 2'));
    expect(syntax.isSyntax()).toBe(true);
    expect(syntax.isData()).toBe(false);
    expect(syntax.isIo()).toBe(false);
  });
});
