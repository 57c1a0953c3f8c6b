// src/commands/request-write.ts

import { NibeInvalidLengthError } from '../errors.js';
import { RequestWrite, RequestWriteNull } from '../types/nibe-types.js';
import { viewOf } from '../utils/utils.js';
import { validateRegister, validateValue } from './validation.js';

const PAYLOAD_SIZE = 6; // register (2) + value (4)

/**
 * Creates a write request
 * @param register - register id (0-65535)
 * @param value - unsigned 32-bit value
 */
export function requestWrite(register: number, value: number): RequestWrite {
  validateRegister(register);
  validateValue(value);
  return { kind: 'request-write', register, value };
}

export function requestWriteNull(): RequestWriteNull {
  return { kind: 'request-write-null' };
}

export function encodeRequestWrite(command: RequestWrite | RequestWriteNull): Uint8Array {
  if (command.kind === 'request-write-null') return new Uint8Array(0);

  validateRegister(command.register);
  validateValue(command.value);
  const payload = new Uint8Array(PAYLOAD_SIZE);
  const view = viewOf(payload);
  view.setUint16(0, command.register, true);
  view.setUint32(2, command.value, true);
  return payload;
}

/**
 * Decodes a write request payload; empty means the null request.
 * @throws NibeInvalidLengthError if the payload is neither empty nor 6 bytes
 */
export function parseRequestWrite(payload: Uint8Array): RequestWrite | RequestWriteNull {
  if (payload.length === 0) return { kind: 'request-write-null' };
  if (payload.length !== PAYLOAD_SIZE) {
    throw new NibeInvalidLengthError(payload.length, PAYLOAD_SIZE, payload, 'write request length');
  }
  const view = viewOf(payload);
  return {
    kind: 'request-write',
    register: view.getUint16(0, true),
    value: view.getUint32(2, true),
  };
}
