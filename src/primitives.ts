/**
 * Leaf decoders: empty, booleans, octal numbers and quoted strings.
 * Each one starts at its first byte and leaves the cursor after its token.
 */

import { dsonBoolean, dsonDouble, dsonNone, dsonString } from './ast.js';
import type { DsonBoolean, DsonDouble, DsonNone, DsonString } from './ast.js';
import { describeByte, show, type Cursor } from './cursor.js';
import { encodeCodepoint } from './utf8.js';

const enum Ch {
  Quote = 0x22,
  Plus = 0x2b,
  Minus = 0x2d,
  Dot = 0x2e,
  Slash = 0x2f,
  Zero = 0x30,
  Seven = 0x37,
  UpperV = 0x56,
  Backslash = 0x5c,
  LowerB = 0x62,
  LowerE = 0x65,
  LowerF = 0x66,
  LowerN = 0x6e,
  LowerO = 0x6f,
  LowerR = 0x72,
  LowerS = 0x73,
  LowerT = 0x74,
  LowerU = 0x75,
  LowerV = 0x76,
  LowerY = 0x79,
}

/** Digits following `\u` */
const UNICODE_ESCAPE_DIGITS = 6;

export function isOctalDigit(c: number): boolean {
  return c >= Ch.Zero && c <= Ch.Seven;
}

export function parseEmpty(c: Cursor): DsonNone {
  const at = c.offset;
  const word = show(c.advance(5, 'empty'));
  if (word !== 'empty') c.fail('MalformedKeyword', `expected "empty", got "${word}"`, at);
  return dsonNone();
}

export function parseBoolean(c: Cursor): DsonBoolean {
  const at = c.offset;
  const head = c.advance(2, 'bool');
  if (head[0] === Ch.LowerY && head[1] === Ch.LowerE) {
    const last = c.advanceByte('bool');
    if (last !== Ch.LowerS) {
      c.fail('MalformedKeyword', `expected "yes", got "ye${String.fromCharCode(last)}"`, at);
    }
    return dsonBoolean(true);
  }
  if (head[0] === Ch.LowerN && head[1] === Ch.LowerO) return dsonBoolean(false);
  c.fail('MalformedKeyword', `expected bool, got "${show(head)}"`, at);
}

/** Maximal run of 0-7 as a base-8 integer; an empty run is 0. */
export function parseOctalRun(c: Cursor): number {
  let n = 0;
  while (isOctalDigit(c.peek())) {
    n = n * 8 + (c.advanceByte('number') - Ch.Zero);
  }
  return n;
}

/**
 * Number grammar:
 *   ['-'] ws* ('0' | octal-run) ws* ['.' digit octal-run ws*]
 *   ['very' ['+'|'-'] ws* digit octal-run]
 *
 * Fractional digits are weighted 1/8, 1/16, 1/32, ... (the divisor doubles
 * per digit); this is the format's observed behavior and is kept as-is.
 */
export function parseNumber(c: Cursor): DsonDouble {
  let negative = false;
  if (c.peek() === Ch.Minus) {
    negative = true;
    c.advanceByte('number');
  }

  c.skipWhitespace();
  let n = 0;
  if (c.peek() === Ch.Zero) c.advanceByte('number');
  else n = parseOctalRun(c);

  c.skipWhitespace();
  if (c.peek() === Ch.Dot) {
    c.advanceByte('number');
    if (!isOctalDigit(c.peek())) {
      c.fail('MalformedNumber', `bad octal character after '.': ${describeByte(c.peek())}`);
    }
    let divisor = 8;
    while (isOctalDigit(c.peek())) {
      n += (c.advanceByte('number') - Ch.Zero) / divisor;
      divisor *= 2;
    }
    c.skipWhitespace();
  }

  if (c.peek() === Ch.LowerV || c.peek() === Ch.UpperV) {
    const at = c.offset;
    const word = show(c.advance(4, 'number'));
    if (word.toLowerCase() !== 'very') {
      c.fail('MalformedKeyword', `expected "very", got "${word}"`, at);
    }
    let negativePower = false;
    if (c.peek() === Ch.Plus) {
      c.advanceByte('number');
    } else if (c.peek() === Ch.Minus) {
      negativePower = true;
      c.advanceByte('number');
    }
    c.skipWhitespace();
    if (!isOctalDigit(c.peek())) {
      c.fail('MalformedNumber', `bad octal character in exponent: ${describeByte(c.peek())}`);
    }
    const power = parseOctalRun(c);
    n *= 8 ** (negativePower ? -power : power);
  }

  return dsonDouble(negative ? -n : n);
}

/**
 * Quoted string. The first pass finds the closing quote (a backslash always
 * takes the next byte, `\u` takes six more); the second decodes escapes.
 * Unescaped bytes are copied through without UTF-8 validation.
 */
export function parseString(c: Cursor): DsonString {
  const start = c.offset;
  if (c.remaining === 0) c.fail('UnexpectedEndOfInput', 'expected string, got end of input');
  if (c.peek() !== Ch.Quote) {
    c.fail('UnrecognizedValue', `expected string, got ${describeByte(c.peek())}`);
  }
  c.advanceByte('string');

  const bodyStart = c.offset;
  let bodyEnd = bodyStart;
  for (;;) {
    if (c.remaining === 0) c.fail('UnterminatedString', `missing closing '"' on string`, start);
    const b = c.advanceByte('string');
    if (b === Ch.Quote) {
      bodyEnd = c.offset - 1;
      break;
    }
    if (b !== Ch.Backslash) continue;
    if (c.remaining === 0) c.fail('UnterminatedString', `missing closing '"' on string`, start);
    if (c.advanceByte('string') === Ch.LowerU) {
      if (c.remaining < UNICODE_ESCAPE_DIGITS) {
        c.fail('UnterminatedString', `missing closing '"' on string`, start);
      }
      c.advance(UNICODE_ESCAPE_DIGITS, 'string');
    }
  }

  const body = c.slice(bodyStart, bodyEnd);
  const out = new Uint8Array(body.length);
  let i = 0;
  for (let p = 0; p < body.length; p++) {
    const b = body[p] ?? 0;
    if (b !== Ch.Backslash) {
      out[i++] = b;
      continue;
    }
    const escapeAt = bodyStart + p;
    p++;
    const e = body[p] ?? 0;
    switch (e) {
      case Ch.Quote:
      case Ch.Backslash:
      case Ch.Slash:
        out[i++] = e;
        break;
      case Ch.LowerF:
        out[i++] = 0x0c;
        break;
      case Ch.LowerN:
        out[i++] = 0x0a;
        break;
      case Ch.LowerR:
        out[i++] = 0x0d;
        break;
      case Ch.LowerT:
        out[i++] = 0x09;
        break;
      case Ch.LowerB:
        if (!c.unsafe) c.fail('ForbiddenEscape', 'forbidden escape: \\b', escapeAt);
        out[i++] = 0x08;
        break;
      case Ch.LowerU: {
        if (!c.unsafe) c.fail('ForbiddenEscape', 'forbidden escape: \\u', escapeAt);
        const digits = body.subarray(p + 1, p + 1 + UNICODE_ESCAPE_DIGITS);
        p += UNICODE_ESCAPE_DIGITS;
        let cp = 0;
        for (const d of digits) {
          if (!isOctalDigit(d)) {
            c.fail('InvalidCodepoint', `malformed unicode escape: \\u${show(digits)}`, escapeAt);
          }
          cp = cp * 8 + (d - Ch.Zero);
        }
        const encoded = encodeCodepoint(cp);
        if (encoded === undefined) {
          c.fail('InvalidCodepoint', `codepoint out of range: \\u${show(digits)}`, escapeAt);
        }
        out.set(encoded, i);
        i += encoded.length;
        break;
      }
      default:
        c.fail('UnrecognizedEscape', `unrecognized escape: \\${String.fromCharCode(e)}`, escapeAt);
    }
  }

  return dsonString(out.slice(0, i));
}
