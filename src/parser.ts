/**
 * DSON parser. Recursive descent straight over the input bytes, no token
 * array. Containers are only handed to their parent once fully built, so a
 * failure anywhere leaves nothing reachable from the caller.
 */

import { DsonDict, dsonArray, dsonDictionary } from './ast.js';
import type { DsonArray, DsonDictionary, DsonValue } from './ast.js';
import { Cursor, describeByte, show } from './cursor.js';
import { DsonParseError } from './errors.js';
import { parseBoolean, parseEmpty, parseNumber, parseString } from './primitives.js';

const enum Ch {
  Bang = 0x21,
  Quote = 0x22,
  Comma = 0x2c,
  Minus = 0x2d,
  Dot = 0x2e,
  Zero = 0x30,
  Seven = 0x37,
  Question = 0x3f,
  LowerA = 0x61,
  LowerE = 0x65,
  LowerM = 0x6d,
  LowerN = 0x6e,
  LowerO = 0x6f,
  LowerS = 0x73,
  LowerU = 0x75,
  LowerY = 0x79,
}

export interface ParseOptions {
  /** Allow the `\b` and `\u` string escapes (default false) */
  unsafe?: boolean;
  /** Max container nesting depth (default 256) */
  maxDepth?: number;
  /** Max payload length in bytes (default 16 MiB) */
  maxInputLength?: number;
  /**
   * Payload length in bytes (of the UTF-8 encoding for string input).
   * `input[length]` must be NUL unless `length` is the whole input.
   * Defaults to the whole input.
   */
  length?: number;
}

export type ParseResult =
  | { ok: true; value: DsonValue }
  | { ok: false; error: DsonParseError };

const DEFAULT_MAX_DEPTH = 256;
const DEFAULT_MAX_INPUT_LENGTH = 16 * 1024 * 1024;

/**
 * Parse one DSON value from `input`. Anything after the value is ignored.
 * Throws DsonParseError on malformed input.
 */
export function parse(input: Uint8Array | string, options: ParseOptions = {}): DsonValue {
  const bytes = typeof input === 'string' ? new TextEncoder().encode(input) : input;
  const length = options.length ?? bytes.length;
  if (!Number.isInteger(length) || length < 0 || length > bytes.length) {
    throw new DsonParseError('NotNulTerminated', `length ${length} does not fit a ${bytes.length}-byte buffer`, {
      byteOffset: bytes.length,
    });
  }
  if (length < bytes.length && bytes[length] !== 0) {
    throw new DsonParseError('NotNulTerminated', 'input was not NUL-terminated', { byteOffset: length });
  }

  const maxLen = options.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH;
  if (length > maxLen) {
    throw new DsonParseError('InputTooLarge', `Input exceeds maximum length (${length} > ${maxLen})`, {
      byteOffset: 0,
    });
  }

  const cursor = new Cursor(bytes, 0, length, {
    unsafe: options.unsafe ?? false,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
  });
  return parseValue(cursor);
}

/** Like parse(), but reports malformed input as a result instead of throwing. */
export function safeParse(input: Uint8Array | string, options: ParseOptions = {}): ParseResult {
  try {
    return { ok: true, value: parse(input, options) };
  } catch (error) {
    if (error instanceof DsonParseError) return { ok: false, error };
    throw error;
  }
}

/** Dispatch on the lookahead byte. Callers skip whitespace first. */
export function parseValue(c: Cursor): DsonValue {
  const lead = c.peek();
  if (lead === Ch.Quote) return parseString(c);
  if (lead === Ch.Minus || (lead >= Ch.Zero && lead <= Ch.Seven)) return parseNumber(c);
  if (lead === Ch.LowerY || lead === Ch.LowerN) return parseBoolean(c);
  if (lead === Ch.LowerE) return parseEmpty(c);
  if (lead === Ch.LowerS) {
    const second = c.peekAt(1);
    if (second === Ch.LowerO) return nested(c, parseArray);
    if (second === Ch.LowerU) return nested(c, parseDict);
  }
  c.fail('UnrecognizedValue', `unable to determine value type at ${describeByte(lead)}`);
}

function nested<T extends DsonValue>(c: Cursor, parseContainer: (c: Cursor) => T): T {
  c.enter();
  const value = parseContainer(c);
  c.leave();
  return value;
}

function expectWord(c: Cursor, word: string, context: string): void {
  const at = c.offset;
  const got = show(c.advance(word.length, context));
  if (got !== word) c.fail('MalformedKeyword', `expected "${word}", got "${got}"`, at);
}

/** so <value> [and|also <value>]... many */
export function parseArray(c: Cursor): DsonArray {
  expectWord(c, 'so', 'array');
  const items: DsonValue[] = [];

  c.skipWhitespace();
  if (c.peek() !== Ch.LowerM) {
    for (;;) {
      items.push(parseValue(c));

      c.skipWhitespace();
      if (c.peek() !== Ch.LowerA) break;
      const at = c.offset;
      const sep = show(c.advance(3, 'array (missing "many"?)'));
      if (sep === 'als') {
        const last = c.advanceByte('array (missing "many"?)');
        if (last !== Ch.LowerO) {
          c.fail('MalformedKeyword', `expected "also", got "als${String.fromCharCode(last)}"`, at);
        }
      } else if (sep !== 'and') {
        c.fail('MalformedKeyword', `expected "and" or "also", got "${sep}"`, at);
      }
      c.skipWhitespace();
    }
  }

  expectWord(c, 'many', 'array (missing "many"?)');
  return dsonArray(items);
}

function isEntrySeparator(b: number): boolean {
  return b === Ch.Comma || b === Ch.Dot || b === Ch.Bang || b === Ch.Question;
}

/** such "key" is <value> [,.!? "key" is <value>]... wow */
export function parseDict(c: Cursor): DsonDictionary {
  expectWord(c, 'such', 'dict');
  const dict = new DsonDict();

  for (;;) {
    c.skipWhitespace();
    const key = parseString(c);
    c.skipWhitespace();
    expectWord(c, 'is', 'dict (missing "wow"?)');
    c.skipWhitespace();
    dict.append(key, parseValue(c));

    c.skipWhitespace();
    if (!isEntrySeparator(c.peek())) break;
    c.advanceByte('dict');
  }

  expectWord(c, 'wow', 'dict (missing "wow"?)');
  return dsonDictionary(dict);
}
