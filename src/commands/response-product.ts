// src/commands/response-product.ts

import { NibeInvalidLengthError } from '../errors.js';
import { ResponseProduct } from '../types/nibe-types.js';
import { concatUint8Arrays } from '../utils/utils.js';

const PREFIX_SIZE = 3; // undocumented bytes before the product name

export function responseProduct(product: string, unknown: Uint8Array = new Uint8Array(PREFIX_SIZE)): ResponseProduct {
  if (unknown.length !== PREFIX_SIZE) {
    throw new NibeInvalidLengthError(unknown.length, PREFIX_SIZE, unknown, 'product prefix length');
  }
  return { kind: 'response-product', unknown: Uint8Array.from(unknown), product };
}

/**
 * Encodes the 3 prefix bytes followed by the product name, one byte per character (latin1)
 */
export function encodeResponseProduct(command: ResponseProduct): Uint8Array {
  if (command.unknown.length !== PREFIX_SIZE) {
    throw new NibeInvalidLengthError(command.unknown.length, PREFIX_SIZE, command.unknown, 'product prefix length');
  }
  return concatUint8Arrays([command.unknown, Buffer.from(command.product, 'latin1')]);
}

/**
 * Decodes a product identification payload
 * @throws NibeInvalidLengthError if shorter than the 3-byte prefix
 */
export function parseResponseProduct(payload: Uint8Array): ResponseProduct {
  if (payload.length < PREFIX_SIZE) {
    throw new NibeInvalidLengthError(payload.length, PREFIX_SIZE, payload, 'product response length');
  }
  return {
    kind: 'response-product',
    unknown: Uint8Array.from(payload.subarray(0, PREFIX_SIZE)),
    product: Buffer.from(payload.subarray(PREFIX_SIZE)).toString('latin1'),
  };
}
