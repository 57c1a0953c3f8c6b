// src/commands/response-read.ts

import { NibeInvalidLengthError } from '../errors.js';
import { ResponseRead } from '../types/nibe-types.js';
import { viewOf } from '../utils/utils.js';
import { validateRegister, validateValue } from './validation.js';

const PAYLOAD_SIZE = 6; // register (2) + value (4)

export function responseRead(register: number, value: number): ResponseRead {
  validateRegister(register);
  validateValue(value);
  return { kind: 'response-read', register, value };
}

export function encodeResponseRead(command: ResponseRead): Uint8Array {
  validateRegister(command.register);
  validateValue(command.value);
  const payload = new Uint8Array(PAYLOAD_SIZE);
  const view = viewOf(payload);
  view.setUint16(0, command.register, true);
  view.setUint32(2, command.value, true);
  return payload;
}

/**
 * Разбирает ответ на чтение регистра
 * @throws NibeInvalidLengthError если payload не 6 байт
 */
export function parseResponseRead(payload: Uint8Array): ResponseRead {
  if (payload.length !== PAYLOAD_SIZE) {
    throw new NibeInvalidLengthError(payload.length, PAYLOAD_SIZE, payload, 'read response length');
  }
  const view = viewOf(payload);
  return {
    kind: 'response-read',
    register: view.getUint16(0, true),
    value: view.getUint32(2, true),
  };
}
