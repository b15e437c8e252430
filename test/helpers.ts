import { parse, safeParse, type ParseOptions } from '../src/parser.js';
import type { DsonValue } from '../src/ast.js';
import type { DsonParseError } from '../src/errors.js';

/**
 * Parse and return the number, failing the test on any other kind.
 */
export function parseNumber(text: string): number {
  const value = parse(text);
  if (value.kind !== 'double') throw new Error(`expected a double, got ${value.kind}`);
  return value.value;
}

/**
 * Parse and return the decoded string bytes as a plain array.
 */
export function parseBytes(text: string, options: ParseOptions = {}): number[] {
  const value = parse(text, options);
  if (value.kind !== 'string') throw new Error(`expected a string, got ${value.kind}`);
  return [...value.bytes];
}

/**
 * Parse input that must fail and return the error.
 */
export function parseError(input: string | Uint8Array, options: ParseOptions = {}): DsonParseError {
  const result = safeParse(input, options);
  if (result.ok) throw new Error(`expected a parse failure, got ${result.value.kind}`);
  return result.error;
}

export function bytesOf(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function itemsOf(value: DsonValue): DsonValue[] {
  if (value.kind !== 'array') throw new Error(`expected an array, got ${value.kind}`);
  return value.items;
}
