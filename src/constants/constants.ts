// src/constants/constants.ts

/**
 * Frame start markers. The marker of a frame is also its byte-stuffing key.
 */
export const START_BYTES = {
  MASTER: 0x5c,
  SLAVE: 0xc0,
  ACK: 0x06,
  NAK: 0x15,
} as const; // as const: readonly literal types for keys/values

/**
 * Command codes carried in the command byte of master and slave frames
 */
export const COMMAND_CODES = {
  RESPONSE_RMU: 0x62,
  RESPONSE_DATA: 0x68,
  REQUEST_READ: 0x69,
  RESPONSE_READ: 0x6a,
  REQUEST_WRITE: 0x6b,
  RESPONSE_WRITE: 0x6c,
  RESPONSE_PRODUCT: 0x6d,
} as const;

export const COMMAND_NAMES: Record<number, string> = {
  [COMMAND_CODES.RESPONSE_RMU]: 'RESPONSE_RMU',
  [COMMAND_CODES.RESPONSE_DATA]: 'RESPONSE_DATA',
  [COMMAND_CODES.REQUEST_READ]: 'REQUEST_READ',
  [COMMAND_CODES.RESPONSE_READ]: 'RESPONSE_READ',
  [COMMAND_CODES.REQUEST_WRITE]: 'REQUEST_WRITE',
  [COMMAND_CODES.RESPONSE_WRITE]: 'RESPONSE_WRITE',
  [COMMAND_CODES.RESPONSE_PRODUCT]: 'RESPONSE_PRODUCT',
};

/** Register id used as padding inside data responses */
export const REGISTER_SENTINEL = 0xffff;

export const MASTER_HEADER_SIZE = 5; // start(1) + 0x00(1) + address(1) + cmd(1) + len(1)
export const SLAVE_HEADER_SIZE = 3; // start(1) + cmd(1) + len(1)
export const CHECKSUM_SIZE = 1;
export const MAX_PAYLOAD_SIZE = 0xff;

// Defaults for the transport session
export const DEFAULT_PORT_LISTEN = 9999;
export const DEFAULT_PORT_READ = 9999;
export const DEFAULT_PORT_WRITE = 10000;
export const DEFAULT_HOST_LISTEN = '0.0.0.0';

// Defaults for the poller and the CLI
export const DEFAULT_READ_TIMEOUT = 2000;
export const DEFAULT_POLL_INTERVAL = 1000;
