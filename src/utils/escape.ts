// src/utils/escape.ts

/**
 * Byte-stuffs a frame: every occurrence of `key` after the first byte is doubled.
 * The first byte is the start marker and is copied as is.
 * @param data - raw frame
 * @param key - the frame's start marker
 * @returns stuffed frame
 */
export function escape(data: Uint8Array, key: number): Uint8Array {
  if (data.length === 0) return new Uint8Array(0);

  const out: number[] = [data[0]];
  for (let i = 1; i < data.length; i++) {
    const byte = data[i];
    if (byte === key) out.push(key);
    out.push(byte);
  }
  return Uint8Array.from(out);
}

/**
 * Reverses {@link escape}. A `key` byte is dropped and the byte after it is taken literally.
 * A stream that ends on a lone `key` byte stops there without error; the
 * frame length checks downstream reject the short result.
 * @param data - stuffed frame
 * @param key - the frame's start marker
 * @returns raw frame
 */
export function unescape(data: Uint8Array, key: number): Uint8Array {
  if (data.length === 0) return new Uint8Array(0);

  const out: number[] = [data[0]];
  let i = 1;
  while (i < data.length) {
    let byte = data[i];
    if (byte === key) {
      i++;
      if (i >= data.length) break;
      byte = data[i];
    }
    out.push(byte);
    i++;
  }
  return Uint8Array.from(out);
}
