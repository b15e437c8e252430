/**
 * DSON value model. A parse produces a strict tree of these; containers own
 * their children and nothing is shared between trees.
 */

export interface DsonString {
  readonly kind: 'string';
  /** Decoded bytes. Not validated as UTF-8 and may contain NUL. */
  readonly bytes: Uint8Array;
  /** `bytes` decoded as UTF-8, invalid sequences replaced with U+FFFD */
  readonly text: string;
}

export interface DsonDouble {
  readonly kind: 'double';
  readonly value: number;
}

export interface DsonBoolean {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface DsonNone {
  readonly kind: 'none';
}

export interface DsonArray {
  readonly kind: 'array';
  readonly items: DsonValue[];
}

export interface DsonDictionary {
  readonly kind: 'dictionary';
  readonly dict: DsonDict;
}

export type DsonValue =
  | DsonString
  | DsonDouble
  | DsonBoolean
  | DsonNone
  | DsonArray
  | DsonDictionary;

export type DsonKind = DsonValue['kind'];

/**
 * Insertion-ordered key/value pairs. Keys are not deduplicated; lookups
 * compare key bytes and return the last entry with a matching key.
 */
export class DsonDict {
  private readonly keyList: DsonString[] = [];
  private readonly valueList: DsonValue[] = [];

  get size(): number {
    return this.keyList.length;
  }

  append(key: DsonString | string, value: DsonValue): void {
    this.keyList.push(typeof key === 'string' ? dsonString(key) : key);
    this.valueList.push(value);
  }

  /** Keys as text, in insertion order */
  keys(): string[] {
    return this.keyList.map((k) => k.text);
  }

  /** Keys as their raw bytes, in insertion order */
  keyBytes(): Uint8Array[] {
    return this.keyList.map((k) => k.bytes);
  }

  values(): DsonValue[] {
    return [...this.valueList];
  }

  /** A string key is matched on its UTF-8 encoding. */
  get(key: string | Uint8Array): DsonValue | undefined {
    const wanted = typeof key === 'string' ? new TextEncoder().encode(key) : key;
    let found: DsonValue | undefined;
    for (let i = 0; i < this.keyList.length; i++) {
      const candidate = this.keyList[i];
      if (candidate !== undefined && sameBytes(candidate.bytes, wanted)) found = this.valueList[i];
    }
    return found;
  }

  *entries(): IterableIterator<[string, DsonValue]> {
    for (const [key, value] of this.rawEntries()) yield [key.text, value];
  }

  /** Entries with the full key value, bytes included */
  *rawEntries(): IterableIterator<[DsonString, DsonValue]> {
    for (let i = 0; i < this.keyList.length; i++) {
      const key = this.keyList[i];
      const value = this.valueList[i];
      if (key === undefined || value === undefined) return;
      yield [key, value];
    }
  }

  clear(): void {
    this.keyList.length = 0;
    this.valueList.length = 0;
  }
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

const utf8 = new TextDecoder('utf-8');

export function dsonString(bytes: Uint8Array | string): DsonString {
  if (typeof bytes === 'string') {
    return { kind: 'string', bytes: new TextEncoder().encode(bytes), text: bytes };
  }
  return { kind: 'string', bytes, text: utf8.decode(bytes) };
}

export function dsonDouble(value: number): DsonDouble {
  return { kind: 'double', value };
}

export function dsonBoolean(value: boolean): DsonBoolean {
  return { kind: 'boolean', value };
}

export function dsonNone(): DsonNone {
  return { kind: 'none' };
}

export function dsonArray(items: DsonValue[] = []): DsonArray {
  return { kind: 'array', items };
}

export function dsonDictionary(dict: DsonDict = new DsonDict()): DsonDictionary {
  return { kind: 'dictionary', dict };
}

export function isDsonString(v: DsonValue): v is DsonString {
  return v.kind === 'string';
}

export function isDsonDouble(v: DsonValue): v is DsonDouble {
  return v.kind === 'double';
}

export function isDsonBoolean(v: DsonValue): v is DsonBoolean {
  return v.kind === 'boolean';
}

export function isDsonNone(v: DsonValue): v is DsonNone {
  return v.kind === 'none';
}

export function isDsonArray(v: DsonValue): v is DsonArray {
  return v.kind === 'array';
}

export function isDsonDictionary(v: DsonValue): v is DsonDictionary {
  return v.kind === 'dictionary';
}

export function dictKeys(dict: DsonDict): string[] {
  return dict.keys();
}

export function dictGet(dict: DsonDict, key: string | Uint8Array): DsonValue | undefined {
  return dict.get(key);
}

/**
 * Release a value tree: every array and dictionary below `value` is emptied.
 * Returns `undefined` so callers can clear their handle in one step
 * (`v = free(v)`). Calling it again on the same tree is a no-op.
 */
export function free(value?: DsonValue | null): undefined {
  if (value === undefined || value === null) return undefined;
  if (value.kind === 'array') {
    for (const item of value.items) free(item);
    value.items.length = 0;
  } else if (value.kind === 'dictionary') {
    for (const child of value.dict.values()) free(child);
    value.dict.clear();
  }
  return undefined;
}

export type PlainValue =
  | string
  | number
  | boolean
  | null
  | PlainValue[]
  | { [key: string]: PlainValue };

/** Convert a tree to plain data. Repeated dictionary keys keep the last value. */
export function toPlain(value: DsonValue): PlainValue {
  switch (value.kind) {
    case 'string':
      return value.text;
    case 'double':
    case 'boolean':
      return value.value;
    case 'none':
      return null;
    case 'array':
      return value.items.map(toPlain);
    case 'dictionary': {
      const obj: { [key: string]: PlainValue } = {};
      for (const [key, child] of value.dict.entries()) {
        Object.defineProperty(obj, key, {
          value: toPlain(child),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return obj;
    }
  }
}

/** Build a tree from plain data; objects become dictionaries in key order. */
export function fromPlain(value: PlainValue): DsonValue {
  if (value === null) return dsonNone();
  if (typeof value === 'string') return dsonString(value);
  if (typeof value === 'number') return dsonDouble(value);
  if (typeof value === 'boolean') return dsonBoolean(value);
  if (Array.isArray(value)) return dsonArray(value.map(fromPlain));
  const dict = new DsonDict();
  for (const key of Object.keys(value)) {
    const child = value[key];
    if (child !== undefined) dict.append(key, fromPlain(child));
  }
  return dsonDictionary(dict);
}
