// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Собирает Uint8Array из отдельных байтов
 */
export function fromBytes(...bytes: number[]): Uint8Array {
  return Uint8Array.from(bytes);
}

/**
 * Parses a hex dump such as "5C 00 20 6B 00 4B" (whitespace optional).
 * @param hex - hex string
 * @returns Uint8Array with the decoded bytes
 */
export function fromHex(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0 || /[^0-9a-fA-F]/.test(clean)) {
    throw new TypeError(`Invalid hex string: ${hex}`);
  }
  const result = new Uint8Array(clean.length / 2);
  for (let i = 0; i < result.length; i++) {
    result[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return result;
}

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Converts a Uint8Array to a space separated hex dump (optimized with lookup table).
 * @param uint8arr - The Uint8Array to convert.
 * @returns e.g. "5c 00 20"
 */
export function toHex(uint8arr: Uint8Array): string {
  const parts: string[] = [];
  for (const b of uint8arr) {
    parts.push(HEX_TABLE.charAt((b >> 4) & 0xf) + HEX_TABLE.charAt(b & 0xf));
  }
  return parts.join(' ');
}

/**
 * Creates a DataView over exactly the bytes of the given array.
 */
export function viewOf(arr: Uint8Array): DataView {
  return new DataView(arr.buffer, arr.byteOffset, arr.byteLength);
}
