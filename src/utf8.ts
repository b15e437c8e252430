/**
 * Codepoint to UTF-8, packed by hand so the length table stays explicit.
 */

const ONE_BYTE_LIMIT = 0x80;
const TWO_BYTE_LIMIT = 0x800;
const THREE_BYTE_LIMIT = 0x10000;
const FOUR_BYTE_LIMIT = 0x110000;

/** Bytes needed to encode `cp`, or 0 when it cannot be encoded. */
export function encodedLength(cp: number): 0 | 1 | 2 | 3 | 4 {
  if (!Number.isInteger(cp) || cp < 0) return 0;
  if (cp < ONE_BYTE_LIMIT) return 1;
  if (cp < TWO_BYTE_LIMIT) return 2;
  if (cp < THREE_BYTE_LIMIT) return 3;
  if (cp < FOUR_BYTE_LIMIT) return 4;
  return 0;
}

/**
 * Encode a codepoint as UTF-8. Returns `undefined` for values outside
 * 0..0x10FFFF. Surrogate codepoints are encoded as-is.
 */
export function encodeCodepoint(cp: number): Uint8Array | undefined {
  switch (encodedLength(cp)) {
    case 1:
      return Uint8Array.of(cp & 0x7f);
    case 2:
      return Uint8Array.of(0xc0 | ((cp >> 6) & 0x1f), 0x80 | (cp & 0x3f));
    case 3:
      return Uint8Array.of(
        0xe0 | ((cp >> 12) & 0x0f),
        0x80 | ((cp >> 6) & 0x3f),
        0x80 | (cp & 0x3f)
      );
    case 4:
      return Uint8Array.of(
        0xf0 | ((cp >> 18) & 0x07),
        0x80 | ((cp >> 12) & 0x3f),
        0x80 | ((cp >> 6) & 0x3f),
        0x80 | (cp & 0x3f)
      );
    case 0:
      return undefined;
  }
}
