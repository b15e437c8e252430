import { describe, it, expect } from 'vitest';
import { parseError, parseNumber } from './helpers.js';

describe('numbers', () => {
  describe('integers', () => {
    it('reads a single digit', () => {
      expect(parseNumber('7')).toBe(7);
    });

    it('negates with a leading minus', () => {
      expect(parseNumber('-7')).toBe(-7);
    });

    it('reads digits as octal', () => {
      expect(parseNumber('10')).toBe(8);
      expect(parseNumber('777')).toBe(511);
    });

    it('allows whitespace between the sign and the digits', () => {
      expect(parseNumber('- 7')).toBe(-7);
    });

    it('consumes a lone leading zero and stops', () => {
      expect(parseNumber('07')).toBe(0);
    });

    it('reads a bare minus as negative zero', () => {
      expect(parseNumber('-')).toBe(-0);
    });
  });

  describe('fractions', () => {
    it('weights the first fractional digit by 1/8', () => {
      expect(parseNumber('1.4')).toBe(1.5);
      expect(parseNumber('0.7')).toBe(0.875);
    });

    // The divisor doubles per digit (1/8, 1/16, 1/32...) instead of scaling
    // by eight. A base-8 fraction would read "1.44" as 1.5625.
    it('halves the weight of each further fractional digit', () => {
      expect(parseNumber('1.44')).toBe(1.75);
      expect(parseNumber('0.17')).toBe(0.5625);
      expect(parseNumber('0.111')).toBe(0.125 + 0.0625 + 0.03125);
    });

    it('allows whitespace before the point', () => {
      expect(parseNumber('7 .4')).toBe(7.5);
    });

    it('rejects a point with no digit after it', () => {
      const err = parseError('1.');
      expect(err.kind).toBe('MalformedNumber');
      expect(err.byteOffset).toBe(2);
    });

    it('rejects a non-octal digit after the point', () => {
      const err = parseError('1.8');
      expect(err.kind).toBe('MalformedNumber');
      expect(err.byteOffset).toBe(2);
    });

    it('rejects whitespace after the point', () => {
      expect(parseError('1. 4').kind).toBe('MalformedNumber');
    });
  });

  describe('exponents', () => {
    it('multiplies by powers of eight', () => {
      expect(parseNumber('2very2')).toBe(128);
      expect(parseNumber('1very+1')).toBe(8);
    });

    it('divides for a negative exponent', () => {
      expect(parseNumber('2very-1')).toBe(0.25);
    });

    it('matches the word case-insensitively', () => {
      expect(parseNumber('1VERY2')).toBe(64);
      expect(parseNumber('1Very1')).toBe(8);
    });

    it('allows whitespace around the word and after the sign', () => {
      expect(parseNumber('1 very 2')).toBe(64);
      expect(parseNumber('1very- 2')).toBe(0.015625);
    });

    it('reads the exponent as octal', () => {
      expect(parseNumber('1very10')).toBe(8 ** 8);
    });

    it('combines fraction, exponent and sign', () => {
      expect(parseNumber('-1.4very1')).toBe(-12);
    });

    it('requires digits after the word', () => {
      const err = parseError('1very');
      expect(err.kind).toBe('MalformedNumber');
      expect(err.byteOffset).toBe(5);
    });

    it('rejects a misspelled word', () => {
      const err = parseError('1vary2');
      expect(err.kind).toBe('MalformedKeyword');
      expect(err.byteOffset).toBe(1);
      expect(err.message).toBe('expected "very", got "vary"');
    });

    it('reports running out of input inside the word', () => {
      const err = parseError('1ver');
      expect(err.kind).toBe('UnexpectedEndOfInput');
      expect(err.byteOffset).toBe(1);
    });
  });

  it('does not start a number with 8 or 9', () => {
    expect(parseError('8').kind).toBe('UnrecognizedValue');
    expect(parseError('9').kind).toBe('UnrecognizedValue');
  });
});
