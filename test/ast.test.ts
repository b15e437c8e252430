import { describe, it, expect } from 'vitest';
import {
  DsonDict,
  dsonDouble,
  dsonString,
  free,
  fromPlain,
  isDsonArray,
  isDsonDictionary,
  isDsonString,
  toPlain,
  type DsonValue,
} from '../src/ast.js';
import { parse } from '../src/parser.js';
import { bytesOf } from './helpers.js';

describe('DsonDict', () => {
  it('keeps insertion order', () => {
    const dict = new DsonDict();
    dict.append('b', dsonDouble(1));
    dict.append('a', dsonDouble(2));
    expect(dict.keys()).toEqual(['b', 'a']);
    expect([...dict.entries()].map(([k]) => k)).toEqual(['b', 'a']);
  });

  it('returns the last value for a repeated key', () => {
    const dict = new DsonDict();
    dict.append('k', dsonDouble(1));
    dict.append('other', dsonDouble(2));
    dict.append('k', dsonDouble(3));
    expect(dict.get('k')).toEqual({ kind: 'double', value: 3 });
  });

  it('tells apart keys that differ only in invalid UTF-8 bytes', () => {
    const value = parse(Uint8Array.of(...bytesOf('such "'), 0xff, ...bytesOf('" is 1, "'), 0xfe, ...bytesOf('" is 2 wow')));
    if (!isDsonDictionary(value)) throw new Error('expected a dictionary');
    expect(value.dict.keyBytes()).toEqual([Uint8Array.of(0xff), Uint8Array.of(0xfe)]);
    expect(value.dict.get(Uint8Array.of(0xff))).toEqual({ kind: 'double', value: 1 });
    expect(value.dict.get(Uint8Array.of(0xfe))).toEqual({ kind: 'double', value: 2 });
    expect(value.dict.keys()).toEqual(['\ufffd', '\ufffd']);
  });

  it('matches text keys on their UTF-8 encoding', () => {
    const dict = new DsonDict();
    dict.append(dsonString(bytesOf('é')), dsonDouble(1));
    expect(dict.get('é')).toEqual({ kind: 'double', value: 1 });
    expect(dict.get(Uint8Array.of(0xc3, 0xa9))).toEqual({ kind: 'double', value: 1 });
    expect(dict.get('e')).toBeUndefined();
  });

  it('hands out copies of its key list', () => {
    const dict = new DsonDict();
    dict.append('k', dsonDouble(1));
    dict.keys().push('x');
    expect(dict.size).toBe(1);
  });
});

describe('free', () => {
  const tree = (): DsonValue =>
    parse('such "a" is so 1 and so "deep" many many, "b" is such "c" is yes wow wow');

  it('empties every container in the tree', () => {
    const root = tree();
    if (!isDsonDictionary(root)) throw new Error('expected a dictionary');
    const list = root.dict.get('a');
    const inner = root.dict.get('b');
    if (list === undefined || !isDsonArray(list)) throw new Error('expected an array');
    if (inner === undefined || !isDsonDictionary(inner)) throw new Error('expected a dictionary');
    const deep = list.items[1];
    if (deep === undefined || !isDsonArray(deep)) throw new Error('expected an array');

    expect(free(root)).toBeUndefined();
    expect(root.dict.size).toBe(0);
    expect(list.items).toEqual([]);
    expect(deep.items).toEqual([]);
    expect(inner.dict.size).toBe(0);
  });

  it('clears the handle and tolerates a second call', () => {
    let handle: DsonValue | undefined = tree();
    const kept = handle;
    handle = free(handle);
    expect(handle).toBeUndefined();
    expect(() => free(kept)).not.toThrow();
    expect(toPlain(kept)).toEqual({});
  });

  it('accepts missing values and leaves', () => {
    expect(free(undefined)).toBeUndefined();
    expect(free(null)).toBeUndefined();
    expect(free(dsonString('x'))).toBeUndefined();
  });
});

describe('plain conversion', () => {
  it('maps every kind', () => {
    const value = parse('so "s" and 7 and yes and empty and so many and such "k" is no wow many');
    expect(toPlain(value)).toEqual(['s', 7, true, null, [], { k: false }]);
  });

  it('keeps the last of repeated keys', () => {
    expect(toPlain(parse('such "a" is 1, "b" is 2, "a" is 3 wow'))).toEqual({ a: 3, b: 2 });
  });

  it('stores a "__proto__" key as data', () => {
    const plain = toPlain(parse('such "__proto__" is 1 wow'));
    expect(Object.keys(plain ?? {})).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(plain)).toBe(Object.prototype);
  });

  it('builds a tree from plain data', () => {
    const value = fromPlain({ name: 'doge', tags: ['such', 'wow'], age: 8, good: true, bad: null });
    if (!isDsonDictionary(value)) throw new Error('expected a dictionary');
    expect(value.dict.keys()).toEqual(['name', 'tags', 'age', 'good', 'bad']);
    const name = value.dict.get('name');
    expect(name !== undefined && isDsonString(name) && [...name.bytes]).toEqual([0x64, 0x6f, 0x67, 0x65]);
    expect(toPlain(value)).toEqual({ name: 'doge', tags: ['such', 'wow'], age: 8, good: true, bad: null });
  });
});
