/**
 * One step of UTF-8 decoding. `codePoint` is -1 when the byte at the cursor does
 * not begin a well-formed sequence; `width` is then 1, the smallest unit to skip.
 */
export interface Decoded {
  codePoint: number;
  width: number;
}

const INVALID: Decoded = { codePoint: -1, width: 1 };

function isContinuation(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

export function decodeAt(bytes: Uint8Array, index: number): Decoded | null {
  if (index >= bytes.length) return null;
  const lead = bytes[index];

  if (lead < 0x80) return { codePoint: lead, width: 1 };

  let width: number;
  let codePoint: number;
  let min: number;
  if (lead >= 0xc2 && lead <= 0xdf) {
    width = 2; codePoint = lead & 0x1f; min = 0x80;
  } else if (lead >= 0xe0 && lead <= 0xef) {
    width = 3; codePoint = lead & 0x0f; min = 0x800;
  } else if (lead >= 0xf0 && lead <= 0xf4) {
    width = 4; codePoint = lead & 0x07; min = 0x10000;
  } else {
    return INVALID;
  }

  if (index + width > bytes.length) return INVALID;
  for (let i = 1; i < width; i++) {
    const next = bytes[index + i];
    if (!isContinuation(next)) return INVALID;
    codePoint = (codePoint << 6) | (next & 0x3f);
  }

  // overlong forms, UTF-16 surrogates, beyond U+10FFFF
  if (codePoint < min || (codePoint >= 0xd800 && codePoint <= 0xdfff) || codePoint > 0x10ffff) {
    return INVALID;
  }
  return { codePoint, width };
}
