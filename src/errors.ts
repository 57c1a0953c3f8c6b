// src/errors.ts

import { toHex } from './utils/utils.js';

/**
 * Base class for all errors raised by this package
 */
export class NibeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NibeError';
  }
}

// --- Errors for Message Format ---

/**
 * Base class for frame and payload decoding failures.
 * Carries the offending bytes when they are known.
 */
export class NibeParseError extends NibeError {
  readonly data: Uint8Array | undefined;

  constructor(message: string, data?: Uint8Array) {
    super(message);
    this.name = 'NibeParseError';
    this.data = data;
  }
}

/**
 * Error class for an empty datagram
 */
export class NibeEmptyPacketError extends NibeParseError {
  constructor() {
    super('Empty packet');
    this.name = 'NibeEmptyPacketError';
  }
}

/**
 * Error class for invalid frame or payload length
 */
export class NibeInvalidLengthError extends NibeParseError {
  readonly received: number;
  readonly expected: number;

  constructor(received: number, expected: number, data?: Uint8Array, detail: string = 'length') {
    super(
      `Invalid ${detail}: received ${received}, expected ${expected}` +
        (data ? ` (${toHex(data)})` : ''),
      data
    );
    this.name = 'NibeInvalidLengthError';
    this.received = received;
    this.expected = expected;
  }
}

/**
 * Error class for checksum mismatch
 */
export class NibeChecksumError extends NibeParseError {
  readonly calculated: number;
  readonly received: number;

  constructor(calculated: number, received: number, data: Uint8Array) {
    super(
      `Checksum mismatch: calculated 0x${calculated.toString(16).padStart(2, '0')}, ` +
        `received 0x${received.toString(16).padStart(2, '0')} (${toHex(data)})`,
      data
    );
    this.name = 'NibeChecksumError';
    this.calculated = calculated;
    this.received = received;
  }
}

// --- Errors for Requests ---

/**
 * Error class for a read or write that got no matching reply in time
 */
export class NibeTimeoutError extends NibeError {
  constructor(message: string = 'Request timed out') {
    super(message);
    this.name = 'NibeTimeoutError';
  }
}

// --- Errors for Data Validation ---

/**
 * Error class for a register id outside 0x0000-0xFFFF
 */
export class NibeInvalidRegisterError extends NibeError {
  constructor(register: number) {
    super(`Invalid register: ${register}. Register must be an integer 0-65535.`);
    this.name = 'NibeInvalidRegisterError';
  }
}

/**
 * Error class for a value that does not fit its wire field
 */
export class NibeInvalidValueError extends NibeError {
  constructor(value: number, max: number) {
    super(`Invalid value: ${value}. Value must be an integer 0-${max}.`);
    this.name = 'NibeInvalidValueError';
  }
}

/**
 * Error class for invalid options
 */
export class NibeConfigError extends NibeError {
  constructor(message: string) {
    super(message);
    this.name = 'NibeConfigError';
  }
}

// --- Errors for Transport ---

/**
 * Base class for all Transport errors
 */
export class NibeTransportError extends NibeError {
  constructor(message: string) {
    super(message);
    this.name = 'NibeTransportError';
  }
}

/**
 * Error class for not connected
 */
export class NibeNotConnectedError extends NibeTransportError {
  constructor(message: string = 'Connection is not open') {
    super(message);
    this.name = 'NibeNotConnectedError';
  }
}

/**
 * Error class for already connected
 */
export class NibeAlreadyConnectedError extends NibeTransportError {
  constructor(message: string = 'Connection is already open') {
    super(message);
    this.name = 'NibeAlreadyConnectedError';
  }
}
