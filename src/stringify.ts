/**
 * DSON value to text. Output re-parses to the same tree.
 */

import type { DsonValue } from './ast.js';
import { DsonEncodeError } from './errors.js';

export type ArraySeparator = 'and' | 'also';
export type EntrySeparator = ',' | '.' | '!' | '?';

export interface StringifyOptions {
  /** Indent string for pretty-print (default: no indent, single line) */
  indent?: string;
  /** Newline (default "\n") */
  newline?: string;
  /** Word between array items (default "and") */
  arraySeparator?: ArraySeparator;
  /** Character between dictionary entries (default ",") */
  entrySeparator?: EntrySeparator;
  /** Max nesting depth (default 256) */
  maxDepth?: number;
}

const DEFAULT_MAX_DEPTH = 256;
const INITIAL = 256;

const enum Ch {
  Tab = 0x09,
  Newline = 0x0a,
  FormFeed = 0x0c,
  Return = 0x0d,
  Quote = 0x22,
  Backslash = 0x5c,
  LowerF = 0x66,
  LowerN = 0x6e,
  LowerR = 0x72,
  LowerT = 0x74,
}

/** Escape letter for bytes that cannot appear raw in a string body */
const ESCAPES = new Map<number, number>([
  [Ch.Quote, Ch.Quote],
  [Ch.Backslash, Ch.Backslash],
  [Ch.FormFeed, Ch.LowerF],
  [Ch.Newline, Ch.LowerN],
  [Ch.Return, Ch.LowerR],
  [Ch.Tab, Ch.LowerT],
]);

interface Layout {
  indent: Uint8Array;
  newline: Uint8Array;
  arraySeparator: Uint8Array;
  entrySeparator: EntrySeparator;
  maxDepth: number;
}

/** Below this a number is written as mantissa and negative exponent */
const SMALLEST_FRACTION = 1 / 8;

/**
 * Octal integer part, then fraction digits for the parser's weights: the
 * first digit counts 1/8 and every later one half the previous weight, so
 * after the first digit the expansion is binary. Magnitudes under 1/8 are
 * written as an octal integer times a power of 8 (`1very-2` is 1/64).
 */
export function writeNumber(n: number): string {
  if (!Number.isFinite(n)) {
    throw new DsonEncodeError(`Cannot encode non-finite number ${n}`);
  }
  const sign = n < 0 || Object.is(n, -0) ? '-' : '';
  const abs = Math.abs(n);
  const whole = Math.floor(abs);
  let frac = abs - whole;
  if (frac === 0) return sign + whole.toString(8);

  if (abs < SMALLEST_FRACTION) {
    let mantissa = abs;
    let power = 0;
    while (!Number.isInteger(mantissa)) {
      mantissa *= 8;
      power++;
    }
    return `${sign}${mantissa.toString(8)}very-${power.toString(8)}`;
  }

  const first = Math.floor(frac * 8);
  frac -= first / 8;
  let out = `${sign}${whole.toString(8)}.${first.toString(8)}`;
  let weight = 1 / 16;
  while (frac > 0) {
    if (frac >= weight) {
      out += '1';
      frac -= weight;
    } else {
      out += '0';
    }
    weight /= 2;
  }
  return out;
}

const ascii = new TextEncoder();

class ByteWriter {
  private buf = new Uint8Array(INITIAL);
  private off = 0;

  private ensure(n: number): void {
    if (this.off + n > this.buf.length) {
      const next = new Uint8Array(Math.max(this.buf.length * 2, this.off + n));
      next.set(this.buf.subarray(0, this.off));
      this.buf = next;
    }
  }

  write(b: Uint8Array): void {
    this.ensure(b.length);
    this.buf.set(b, this.off);
    this.off += b.length;
  }

  writeByte(x: number): void {
    this.ensure(1);
    this.buf[this.off++] = x;
  }

  text(s: string): void {
    this.write(ascii.encode(s));
  }

  /** Quoted string body; bytes other than the escaped ones go out as they are */
  quoted(bytes: Uint8Array): void {
    this.writeByte(Ch.Quote);
    for (const b of bytes) {
      const letter = ESCAPES.get(b);
      if (letter !== undefined) {
        this.writeByte(Ch.Backslash);
        this.writeByte(letter);
      } else {
        this.writeByte(b);
      }
    }
    this.writeByte(Ch.Quote);
  }

  finish(): Uint8Array {
    return this.buf.slice(0, this.off);
  }
}

function breakLine(out: ByteWriter, layout: Layout, level: number): void {
  if (layout.indent.length === 0) {
    out.text(' ');
    return;
  }
  out.write(layout.newline);
  for (let i = 0; i < level; i++) out.write(layout.indent);
}

function writeValue(out: ByteWriter, value: DsonValue, layout: Layout, level: number): void {
  if (level > layout.maxDepth) {
    throw new DsonEncodeError(`Maximum nesting depth exceeded (${layout.maxDepth})`);
  }

  switch (value.kind) {
    case 'none':
      out.text('empty');
      return;
    case 'boolean':
      out.text(value.value ? 'yes' : 'no');
      return;
    case 'double':
      out.text(writeNumber(value.value));
      return;
    case 'string':
      out.quoted(value.bytes);
      return;
    case 'array': {
      if (value.items.length === 0) {
        out.text('so many');
        return;
      }
      out.text('so');
      value.items.forEach((item, i) => {
        if (i > 0) {
          out.text(' ');
          out.write(layout.arraySeparator);
        }
        breakLine(out, layout, level + 1);
        writeValue(out, item, layout, level + 1);
      });
      breakLine(out, layout, level);
      out.text('many');
      return;
    }
    case 'dictionary': {
      if (value.dict.size === 0) {
        throw new DsonEncodeError('Cannot encode an empty dictionary');
      }
      out.text('such');
      let first = true;
      for (const [key, child] of value.dict.rawEntries()) {
        if (!first) out.text(layout.entrySeparator);
        first = false;
        breakLine(out, layout, level + 1);
        out.quoted(key.bytes);
        out.text(' is ');
        writeValue(out, child, layout, level + 1);
        // a '.' right after an integer would be read as its fraction point
        if (layout.entrySeparator === '.' && child.kind === 'double' && Number.isInteger(child.value)) {
          out.text('.0');
        }
      }
      breakLine(out, layout, level);
      out.text('wow');
      return;
    }
  }
}

/**
 * Serialize a DSON value to bytes. String and key bytes are written as they
 * are stored, so values that are not valid UTF-8 survive a round trip.
 */
export function stringifyBytes(value: DsonValue, options: StringifyOptions = {}): Uint8Array {
  const out = new ByteWriter();
  writeValue(
    out,
    value,
    {
      indent: ascii.encode(options.indent ?? ''),
      newline: ascii.encode(options.newline ?? '\n'),
      arraySeparator: ascii.encode(options.arraySeparator ?? 'and'),
      entrySeparator: options.entrySeparator ?? ',',
      maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    },
    0
  );
  return out.finish();
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Serialize a DSON value to text format. Throws DsonEncodeError when a
 * string or key holds bytes that are not UTF-8; use stringifyBytes() for those.
 */
export function stringify(value: DsonValue, options: StringifyOptions = {}): string {
  const bytes = stringifyBytes(value, options);
  try {
    return utf8.decode(bytes);
  } catch (cause) {
    throw new DsonEncodeError('Value holds bytes that are not valid UTF-8', { cause });
  }
}
