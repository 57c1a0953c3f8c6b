// src/utils/checksum.ts

/**
 * Swaps the high and low nibble of a byte (0x5C -> 0xC5).
 */
export function swapNibbles(value: number): number {
  return ((value << 4) | (value >> 4)) & 0xff;
}

/**
 * XOR checksum of a frame span.
 *
 * The checksum byte must never equal the frame start marker, so a result equal
 * to `key` is replaced by `key` with its nibbles swapped.
 * @param buffer - bytes covered by the checksum
 * @param key - start marker of the frame being checked
 * @returns checksum byte
 */
export function calculateChecksum(buffer: Uint8Array, key: number): number {
  let result: number = 0;
  for (let i: number = 0; i < buffer.length; i++) {
    result ^= buffer[i];
  }

  if (result === key) {
    result = swapNibbles(key);
  }

  return result;
}
