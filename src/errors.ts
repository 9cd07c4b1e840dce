/**
 * EDN errors: one code per failure, a category derived from the code, and a
 * 1-based line/column where the failure was detected.
 */

import type { SourcePosition } from './ast.js';

export enum ErrorCode {
  /** Free-form message raised by a visitor or a conversion. */
  Message = 'Message',
  Io = 'Io',
  EofWhileParsingList = 'EofWhileParsingList',
  EofWhileParsingVector = 'EofWhileParsingVector',
  EofWhileParsingSet = 'EofWhileParsingSet',
  EofWhileParsingMap = 'EofWhileParsingMap',
  EofWhileParsingString = 'EofWhileParsingString',
  EofWhileParsingValue = 'EofWhileParsingValue',
  ExpectedSomeValue = 'ExpectedSomeValue',
  MissingMapValue = 'MissingMapValue',
  InvalidEscape = 'InvalidEscape',
  InvalidNumber = 'InvalidNumber',
  NumberOutOfRange = 'NumberOutOfRange',
  InvalidKeyword = 'InvalidKeyword',
  InvalidSymbol = 'InvalidSymbol',
  InvalidCharacter = 'InvalidCharacter',
  InvalidUnicodeCodePoint = 'InvalidUnicodeCodePoint',
  ControlCharacterWhileParsingString = 'ControlCharacterWhileParsingString',
  LoneLeadingSurrogateInHexEscape = 'LoneLeadingSurrogateInHexEscape',
  UnexpectedEndOfHexEscape = 'UnexpectedEndOfHexEscape',
  TrailingCharacters = 'TrailingCharacters',
  RecursionLimitExceeded = 'RecursionLimitExceeded',
}

export type Category = 'io' | 'syntax' | 'eof' | 'data';

const MESSAGES: Readonly<Record<ErrorCode, string>> = {
  [ErrorCode.Message]: 'invalid data',
  [ErrorCode.Io]: 'I/O failure',
  [ErrorCode.EofWhileParsingList]: 'EOF while parsing a list',
  [ErrorCode.EofWhileParsingVector]: 'EOF while parsing a vector',
  [ErrorCode.EofWhileParsingSet]: 'EOF while parsing a set',
  [ErrorCode.EofWhileParsingMap]: 'EOF while parsing a map',
  [ErrorCode.EofWhileParsingString]: 'EOF while parsing a string',
  [ErrorCode.EofWhileParsingValue]: 'EOF while parsing a value',
  [ErrorCode.ExpectedSomeValue]: 'expected value',
  [ErrorCode.MissingMapValue]: 'map key has no value',
  [ErrorCode.InvalidEscape]: 'invalid escape',
  [ErrorCode.InvalidNumber]: 'invalid number',
  [ErrorCode.NumberOutOfRange]: 'number out of range',
  [ErrorCode.InvalidKeyword]: 'invalid keyword',
  [ErrorCode.InvalidSymbol]: 'invalid symbol',
  [ErrorCode.InvalidCharacter]: 'invalid character',
  [ErrorCode.InvalidUnicodeCodePoint]: 'invalid unicode code point',
  [ErrorCode.ControlCharacterWhileParsingString]:
    'control character (\\u0000-\\u001F) found while parsing a string',
  [ErrorCode.LoneLeadingSurrogateInHexEscape]: 'lone leading surrogate in hex escape',
  [ErrorCode.UnexpectedEndOfHexEscape]: 'unexpected end of hex escape',
  [ErrorCode.TrailingCharacters]: 'trailing characters',
  [ErrorCode.RecursionLimitExceeded]: 'recursion limit exceeded',
};

export function categoryOf(code: ErrorCode): Category {
  switch (code) {
    case ErrorCode.Message:
      return 'data';
    case ErrorCode.Io:
      return 'io';
    case ErrorCode.EofWhileParsingList:
    case ErrorCode.EofWhileParsingVector:
    case ErrorCode.EofWhileParsingSet:
    case ErrorCode.EofWhileParsingMap:
    case ErrorCode.EofWhileParsingString:
    case ErrorCode.EofWhileParsingValue:
      return 'eof';
    default:
      return 'syntax';
  }
}

type ConstructorOptions = { position?: SourcePosition; cause?: unknown };

export class EdnError extends Error {
  override readonly name: string = 'EdnError';
  readonly code: ErrorCode;
  /** Message without the location suffix. */
  readonly detail: string;
  readonly position?: SourcePosition;

  constructor(code: ErrorCode, detail: string, options?: ConstructorOptions) {
    const pos = options?.position;
    super(pos ? `${detail} at line ${pos.line} column ${pos.column}` : detail);
    this.code = code;
    this.detail = detail;
    this.position = pos;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, EdnError.prototype);
  }

  /** Syntax or EOF error for `code` at `position`. */
  static at(code: ErrorCode, position: SourcePosition): EdnError {
    return create(code, MESSAGES[code], { position });
  }

  /** Error for `code` with no source position, as raised while encoding. */
  static of(code: ErrorCode): EdnError {
    return create(code, MESSAGES[code], {});
  }

  static io(cause: unknown): EdnIoError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new EdnIoError(`${MESSAGES[ErrorCode.Io]}: ${reason}`, { cause });
  }

  static data(message: string, options?: ConstructorOptions): EdnDataError {
    return new EdnDataError(message, options);
  }

  /** Line number, or 0 when the error has no position. */
  get line(): number {
    return this.position?.line ?? 0;
  }

  /** Column number, or 0 when the error has no position. */
  get column(): number {
    return this.position?.column ?? 0;
  }

  get category(): Category {
    return categoryOf(this.code);
  }

  isIo(): boolean {
    return this.category === 'io';
  }

  isSyntax(): boolean {
    return this.category === 'syntax';
  }

  isEof(): boolean {
    return this.category === 'eof';
  }

  isData(): boolean {
    return this.category === 'data';
  }

  get location(): string {
    return this.position ? `line ${this.position.line}, column ${this.position.column}` : '';
  }

  /** Same error reported at `position`; returns `this` when already positioned. */
  withPosition(position: SourcePosition): EdnError {
    if (this.position) return this;
    return create(this.code, this.detail, { position, cause: this.cause });
  }

  override toString(): string {
    return `${this.name}: ${this.message}`;
  }
}

export class EdnSyntaxError extends EdnError {
  override readonly name = 'EdnSyntaxError';
  constructor(code: ErrorCode, detail: string, options?: ConstructorOptions) {
    super(code, detail, options);
    Object.setPrototypeOf(this, EdnSyntaxError.prototype);
  }
}

export class EdnEofError extends EdnError {
  override readonly name = 'EdnEofError';
  constructor(code: ErrorCode, detail: string, options?: ConstructorOptions) {
    super(code, detail, options);
    Object.setPrototypeOf(this, EdnEofError.prototype);
  }
}

export class EdnIoError extends EdnError {
  override readonly name = 'EdnIoError';
  constructor(detail: string, options?: ConstructorOptions) {
    super(ErrorCode.Io, detail, options);
    Object.setPrototypeOf(this, EdnIoError.prototype);
  }
}

export class EdnDataError extends EdnError {
  override readonly name = 'EdnDataError';
  constructor(detail: string, options?: ConstructorOptions) {
    super(ErrorCode.Message, detail, options);
    Object.setPrototypeOf(this, EdnDataError.prototype);
  }
}

function create(code: ErrorCode, detail: string, options: ConstructorOptions): EdnError {
  switch (categoryOf(code)) {
    case 'io':
      return new EdnIoError(detail, options);
    case 'data':
      return new EdnDataError(detail, options);
    case 'eof':
      return new EdnEofError(code, detail, options);
    default:
      return new EdnSyntaxError(code, detail, options);
  }
}
