/**
 * EDN reader and writer.
 */

export {
  EdnChar,
  EdnKeyword,
  EdnList,
  EdnMap,
  EdnSet,
  EdnSymbol,
  char,
  clone,
  equals,
  hashKey,
  isBool,
  isChar,
  isFloat,
  isKeywordName,
  isInteger,
  isKeyword,
  isList,
  isMap,
  isNil,
  isSet,
  isString,
  isSymbol,
  isSymbolName,
  isVector,
  keyword,
  kindOf,
  list,
  symbol,
} from './ast.js';
export type { EdnValue, EdnVector, Kind, SourcePosition } from './ast.js';
export { assocIn, get, getIn, getOrNil, pointer, setPointer, take } from './access.js';
export type { EdnKey, Index } from './access.js';
export {
  EdnDataError,
  EdnEofError,
  EdnError,
  EdnIoError,
  EdnSyntaxError,
  ErrorCode,
  categoryOf,
} from './errors.js';
export type { Category } from './errors.js';
export { fromNative, toNative } from './native.js';
export type { EdnConvertible } from './native.js';
export { DEFAULT_MAX_DEPTH, Deserializer, parse, parseAll, parseWith, readerFor } from './parser.js';
export type { Input, ParseOptions } from './parser.js';
export { parseFile, parseStream } from './parse-async.js';
export { IoRead, Read, Scratch, SliceRead, StrRead, chunkSource, fdSource } from './read.js';
export type { ByteSource, Mark, Reference } from './read.js';
export { fdSink, serialize, stringify, toBytes, write } from './stringify.js';
export type { Sink, StringifyOptions } from './stringify.js';
export { fromValue, parseAs } from './typed.js';
export { NativeVisitor, ValueVisitor, ignoredAny } from './visitor.js';
export type { MapAccess, NativeValue, SeqAccess, Visitor } from './visitor.js';
