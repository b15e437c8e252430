/**
 * Forward-only scan position over a DSON input buffer.
 */

import { DsonParseError, type DsonErrorKind } from './errors.js';

export interface CursorOptions {
  /** Allow the `\b` and `\u` string escapes */
  unsafe: boolean;
  /** Max container nesting */
  maxDepth: number;
}

const SPACE = 0x20;
const TAB = 0x09;
const LF = 0x0a;
const VT = 0x0b;
const FF = 0x0c;
const CR = 0x0d;

export class Cursor {
  private pos: number;
  private depth = 0;
  readonly unsafe: boolean;
  private readonly maxDepth: number;

  constructor(
    private readonly input: Uint8Array,
    private readonly start: number,
    private readonly end: number,
    options: CursorOptions
  ) {
    this.pos = start;
    this.unsafe = options.unsafe;
    this.maxDepth = options.maxDepth;
  }

  /** Offset from the start of input, for error locations */
  get offset(): number {
    return this.pos - this.start;
  }

  get remaining(): number {
    return this.end - this.pos;
  }

  /** Current byte, or 0 at the end of input. */
  peek(): number {
    return this.peekAt(0);
  }

  peekAt(n: number): number {
    const at = this.pos + n;
    if (at >= this.end) return 0;
    return this.input[at] ?? 0;
  }

  /** Bytes between two offsets already passed over */
  slice(from: number, to: number): Uint8Array {
    return this.input.subarray(this.start + from, this.start + to);
  }

  advance(n: number, what: string): Uint8Array {
    if (this.pos + n > this.end) {
      this.fail('UnexpectedEndOfInput', `end of input while parsing ${what}`);
    }
    const bytes = this.input.subarray(this.pos, this.pos + n);
    this.pos += n;
    return bytes;
  }

  advanceByte(what: string): number {
    return this.advance(1, what)[0] ?? 0;
  }

  skipWhitespace(): void {
    for (;;) {
      const c = this.peek();
      if (c !== SPACE && c !== TAB && c !== LF && c !== CR && c !== VT && c !== FF) return;
      this.pos++;
    }
  }

  enter(): void {
    if (this.depth >= this.maxDepth) {
      this.fail('NestingTooDeep', `maximum nesting depth exceeded (${this.maxDepth})`);
    }
    this.depth++;
  }

  leave(): void {
    this.depth--;
  }

  fail(kind: DsonErrorKind, message: string, offset: number = this.offset): never {
    throw new DsonParseError(kind, message, { byteOffset: offset });
  }
}

export function describeByte(c: number): string {
  return c === 0 ? 'end of input' : `'${String.fromCharCode(c)}'`;
}

/** Render raw bytes for an error message, one char per byte */
export function show(bytes: Uint8Array): string {
  return String.fromCharCode(...bytes);
}
