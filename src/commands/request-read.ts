// src/commands/request-read.ts

import { NibeInvalidLengthError } from '../errors.js';
import { RequestRead, RequestReadNull } from '../types/nibe-types.js';
import { viewOf } from '../utils/utils.js';
import { validateRegister } from './validation.js';

const PAYLOAD_SIZE = 2; // register (2)

/**
 * Creates a read request for one register
 */
export function requestRead(register: number): RequestRead {
  validateRegister(register);
  return { kind: 'request-read', register };
}

/** Read request without payload */
export function requestReadNull(): RequestReadNull {
  return { kind: 'request-read-null' };
}

/**
 * Encodes a read request payload
 * @returns 2 bytes, register little-endian
 */
export function encodeRequestRead(command: RequestRead | RequestReadNull): Uint8Array {
  if (command.kind === 'request-read-null') return new Uint8Array(0);

  validateRegister(command.register);
  const payload = new Uint8Array(PAYLOAD_SIZE);
  viewOf(payload).setUint16(0, command.register, true);
  return payload;
}

/**
 * Decodes a read request payload. An empty payload is the null request the
 * master sends as a token.
 * @throws NibeInvalidLengthError if the payload is neither empty nor 2 bytes
 */
export function parseRequestRead(payload: Uint8Array): RequestRead | RequestReadNull {
  if (payload.length === 0) return { kind: 'request-read-null' };
  if (payload.length !== PAYLOAD_SIZE) {
    throw new NibeInvalidLengthError(payload.length, PAYLOAD_SIZE, payload, 'read request length');
  }
  return { kind: 'request-read', register: viewOf(payload).getUint16(0, true) };
}
