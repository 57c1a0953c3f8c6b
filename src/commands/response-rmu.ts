// src/commands/response-rmu.ts

import { ResponseRmu } from '../types/nibe-types.js';

// Payload of the room unit accessory; kept verbatim

export function responseRmu(data: Uint8Array): ResponseRmu {
  return { kind: 'response-rmu', data: Uint8Array.from(data) };
}

export function encodeResponseRmu(command: ResponseRmu): Uint8Array {
  return command.data;
}

export function parseResponseRmu(payload: Uint8Array): ResponseRmu {
  return { kind: 'response-rmu', data: Uint8Array.from(payload) };
}
