// src/commands/response-write.ts

import { NibeInvalidLengthError } from '../errors.js';
import { ResponseWrite } from '../types/nibe-types.js';
import { viewOf } from '../utils/utils.js';
import { validateRegister } from './validation.js';

const PAYLOAD_SIZE = 2;

export function responseWrite(register: number): ResponseWrite {
  validateRegister(register);
  return { kind: 'response-write', register };
}

export function encodeResponseWrite(command: ResponseWrite): Uint8Array {
  validateRegister(command.register);
  const payload = new Uint8Array(PAYLOAD_SIZE);
  viewOf(payload).setUint16(0, command.register, true);
  return payload;
}

export function parseResponseWrite(payload: Uint8Array): ResponseWrite {
  if (payload.length !== PAYLOAD_SIZE) {
    throw new NibeInvalidLengthError(payload.length, PAYLOAD_SIZE, payload, 'write response length');
  }
  return { kind: 'response-write', register: viewOf(payload).getUint16(0, true) };
}
