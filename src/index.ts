export { parse, safeParse, type ParseOptions, type ParseResult } from './parser.js';
export {
  stringify,
  stringifyBytes,
  writeNumber,
  type StringifyOptions,
  type ArraySeparator,
  type EntrySeparator,
} from './stringify.js';
export {
  DsonDict,
  dictGet,
  dictKeys,
  dsonArray,
  dsonBoolean,
  dsonDictionary,
  dsonDouble,
  dsonNone,
  dsonString,
  free,
  fromPlain,
  isDsonArray,
  isDsonBoolean,
  isDsonDictionary,
  isDsonDouble,
  isDsonNone,
  isDsonString,
  toPlain,
  type DsonArray,
  type DsonBoolean,
  type DsonDictionary,
  type DsonDouble,
  type DsonKind,
  type DsonNone,
  type DsonString,
  type DsonValue,
  type PlainValue,
} from './ast.js';
export { DsonError, DsonParseError, DsonEncodeError, type DsonErrorKind } from './errors.js';
export { encodeCodepoint, encodedLength } from './utf8.js';
