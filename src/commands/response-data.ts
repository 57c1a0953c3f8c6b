// src/commands/response-data.ts

import { REGISTER_SENTINEL } from '../constants/constants.js';
import { NibeInvalidLengthError } from '../errors.js';
import { ResponseData } from '../types/nibe-types.js';
import { viewOf } from '../utils/utils.js';
import { MAX_UINT16, validateRegister, validateValue } from './validation.js';

const GROUP_SIZE = 4; // register (2) + value (2)

/**
 * Creates a data response from register/value pairs
 */
export function responseData(
  parameters: ReadonlyMap<number, number> | Iterable<readonly [number, number]>
): ResponseData {
  return { kind: 'response-data', parameters: new Map<number, number>(parameters) };
}

/**
 * Encodes the parameters in map order. Sentinel registers are not written.
 */
export function encodeResponseData(command: ResponseData): Uint8Array {
  const entries = [...command.parameters].filter(([register]) => register !== REGISTER_SENTINEL);
  const payload = new Uint8Array(entries.length * GROUP_SIZE);
  const view = viewOf(payload);

  entries.forEach(([register, value], i) => {
    validateRegister(register);
    validateValue(value, MAX_UINT16);
    view.setUint16(i * GROUP_SIZE, register, true);
    view.setUint16(i * GROUP_SIZE + 2, value, true);
  });

  return payload;
}

/**
 * Decodes a telemetry payload of 4-byte groups.
 * Groups with register 0xFFFF are padding and are skipped.
 * @throws NibeInvalidLengthError if the length is not a multiple of 4
 */
export function parseResponseData(payload: Uint8Array): ResponseData {
  if (payload.length % GROUP_SIZE !== 0) {
    const expected = payload.length - (payload.length % GROUP_SIZE);
    throw new NibeInvalidLengthError(payload.length, expected, payload, 'data response length');
  }

  const view = viewOf(payload);
  const parameters = new Map<number, number>();
  for (let offset = 0; offset < payload.length; offset += GROUP_SIZE) {
    const register = view.getUint16(offset, true);
    if (register === REGISTER_SENTINEL) continue;
    parameters.set(register, view.getUint16(offset + 2, true));
  }

  return { kind: 'response-data', parameters };
}
