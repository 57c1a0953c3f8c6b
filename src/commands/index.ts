// src/commands/index.ts

import { COMMAND_CODES } from '../constants/constants.js';
import { NibeInvalidValueError } from '../errors.js';
import { Command, CommandUnknown } from '../types/nibe-types.js';
import { encodeRequestRead, parseRequestRead } from './request-read.js';
import { encodeRequestWrite, parseRequestWrite } from './request-write.js';
import { encodeResponseData, parseResponseData } from './response-data.js';
import { encodeResponseProduct, parseResponseProduct } from './response-product.js';
import { encodeResponseRead, parseResponseRead } from './response-read.js';
import { encodeResponseRmu, parseResponseRmu } from './response-rmu.js';
import { encodeResponseWrite, parseResponseWrite } from './response-write.js';

export { requestRead, requestReadNull } from './request-read.js';
export { requestWrite, requestWriteNull } from './request-write.js';
export { responseRead } from './response-read.js';
export { responseWrite } from './response-write.js';
export { responseData } from './response-data.js';
export { responseRmu } from './response-rmu.js';
export { responseProduct } from './response-product.js';

type PayloadParser = (payload: Uint8Array) => Command;

const PARSERS = new Map<number, PayloadParser>([
  [COMMAND_CODES.REQUEST_READ, parseRequestRead],
  [COMMAND_CODES.REQUEST_WRITE, parseRequestWrite],
  [COMMAND_CODES.RESPONSE_READ, parseResponseRead],
  [COMMAND_CODES.RESPONSE_WRITE, parseResponseWrite],
  [COMMAND_CODES.RESPONSE_DATA, parseResponseData],
  [COMMAND_CODES.RESPONSE_RMU, parseResponseRmu],
  [COMMAND_CODES.RESPONSE_PRODUCT, parseResponseProduct],
]);

export function commandUnknown(code: number, data: Uint8Array = new Uint8Array(0)): CommandUnknown {
  if (!Number.isInteger(code) || code < 0 || code > 0xff) {
    throw new NibeInvalidValueError(code, 0xff);
  }
  return { kind: 'unknown', code, data };
}

/**
 * Returns the wire code of a command
 */
export function commandCode(command: Command): number {
  switch (command.kind) {
    case 'request-read':
    case 'request-read-null':
      return COMMAND_CODES.REQUEST_READ;
    case 'request-write':
    case 'request-write-null':
      return COMMAND_CODES.REQUEST_WRITE;
    case 'response-read':
      return COMMAND_CODES.RESPONSE_READ;
    case 'response-write':
      return COMMAND_CODES.RESPONSE_WRITE;
    case 'response-data':
      return COMMAND_CODES.RESPONSE_DATA;
    case 'response-rmu':
      return COMMAND_CODES.RESPONSE_RMU;
    case 'response-product':
      return COMMAND_CODES.RESPONSE_PRODUCT;
    case 'unknown':
      return command.code;
  }
}

/**
 * Encodes the payload of a command (without code and length)
 */
export function encodeCommand(command: Command): Uint8Array {
  switch (command.kind) {
    case 'request-read':
    case 'request-read-null':
      return encodeRequestRead(command);
    case 'request-write':
    case 'request-write-null':
      return encodeRequestWrite(command);
    case 'response-read':
      return encodeResponseRead(command);
    case 'response-write':
      return encodeResponseWrite(command);
    case 'response-data':
      return encodeResponseData(command);
    case 'response-rmu':
      return encodeResponseRmu(command);
    case 'response-product':
      return encodeResponseProduct(command);
    case 'unknown':
      return command.data;
  }
}

/**
 * Decodes a payload by its command code. Codes without a parser become
 * `unknown` commands instead of failing.
 * @throws NibeInvalidLengthError if a known command has a malformed payload
 */
export function decodeCommand(code: number, payload: Uint8Array): Command {
  const parser = PARSERS.get(code);
  if (!parser) {
    return commandUnknown(code, Uint8Array.from(payload));
  }
  return parser(payload);
}
