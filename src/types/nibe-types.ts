// src/types/nibe-types.ts

import type { MessageFramer } from '../framers/message-framer.js';

// !=============================================================================
// ! Commands
// !=============================================================================

/** Slave asks the master for one register */
export interface RequestRead {
  readonly kind: 'request-read';
  readonly register: number;
}

/** Read request without payload (token frames sent by the master) */
export interface RequestReadNull {
  readonly kind: 'request-read-null';
}

/** Slave asks the master to store a value */
export interface RequestWrite {
  readonly kind: 'request-write';
  readonly register: number;
  readonly value: number;
}

/** Write request without payload */
export interface RequestWriteNull {
  readonly kind: 'request-write-null';
}

export interface ResponseRead {
  readonly kind: 'response-read';
  readonly register: number;
  readonly value: number;
}

export interface ResponseWrite {
  readonly kind: 'response-write';
  readonly register: number;
}

/** Periodic telemetry: register -> 16-bit value */
export interface ResponseData {
  readonly kind: 'response-data';
  readonly parameters: ReadonlyMap<number, number>;
}

/** Opaque accessory (RMU) payload */
export interface ResponseRmu {
  readonly kind: 'response-rmu';
  readonly data: Uint8Array;
}

/** Product identification sent by the master */
export interface ResponseProduct {
  readonly kind: 'response-product';
  readonly unknown: Uint8Array;
  readonly product: string;
}

/** Any command code this package does not decode */
export interface CommandUnknown {
  readonly kind: 'unknown';
  readonly code: number;
  readonly data: Uint8Array;
}

export type Command =
  | RequestRead
  | RequestReadNull
  | RequestWrite
  | RequestWriteNull
  | ResponseRead
  | ResponseWrite
  | ResponseData
  | ResponseRmu
  | ResponseProduct
  | CommandUnknown;

export type CommandKind = Command['kind'];

/** Commands a slave may send to the master */
export type OutgoingCommand = RequestRead | RequestReadNull | RequestWrite | RequestWriteNull;

// !=============================================================================
// ! Messages
// !=============================================================================

/** Frame sent by the heat pump */
export interface MasterMessage {
  readonly kind: 'master';
  readonly address: number;
  readonly command: Command;
}

/** Frame sent by an accessory */
export interface SlaveMessage {
  readonly kind: 'slave';
  readonly command: Command;
}

export interface AckMessage {
  readonly kind: 'ack';
}

export interface NakMessage {
  readonly kind: 'nak';
}

/** Datagram with an unrecognised start byte, kept unparsed */
export interface UnknownMessage {
  readonly kind: 'unknown';
  readonly start: number;
  readonly data: Uint8Array;
}

export type Message = MasterMessage | SlaveMessage | AckMessage | NakMessage | UnknownMessage;

// !=============================================================================
// ! Transport
// !=============================================================================

export interface RemoteInfo {
  address: string;
  port: number;
}

/**
 * The subset of `dgram.Socket` the connection relies on.
 */
export interface DatagramSocket {
  bind(port: number, address: string, callback: () => void): void;
  send(
    msg: Uint8Array,
    port: number,
    address: string,
    callback: (error: Error | null, bytes: number) => void
  ): void;
  close(callback?: () => void): void;
  on(event: 'message', listener: (msg: Buffer, rinfo: RemoteInfo) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  removeAllListeners(event?: string): unknown;
}

export type SocketFactory = () => DatagramSocket;

/**
 * How the connection treats datagrams whose sender is not the configured host.
 * - `configured`: keep sending to the configured host, log foreign senders.
 * - `first-sender`: the first datagram's sender becomes the peer of record.
 */
export type PeerPolicy = 'configured' | 'first-sender';

export interface NodeUdpConnectionOptions {
  listenPort?: number;
  listenHost?: string;
  readPort?: number;
  writePort?: number;
  peerPolicy?: PeerPolicy;
  socketFactory?: SocketFactory;
  framer?: MessageFramer;
}

export interface ConnectionStats {
  datagramsReceived: number;
  messagesParsed: number;
  parseErrors: number;
  framesSent: number;
}

/**
 * What the controller needs from a transport session
 */
export interface Connection extends AsyncIterable<Message> {
  readonly isOpen: boolean;
  send(command: OutgoingCommand): Promise<void>;
}

// !=============================================================================
// ! Controller
// !=============================================================================

export type CommandListener = (command: Command) => void;

export interface RequestOptions {
  /** Milliseconds to wait for the reply before rejecting with NibeTimeoutError */
  timeout?: number;
  /** Aborting rejects the call with the signal's reason */
  signal?: AbortSignal;
}

/** Anything that can read a register; `NibeController` is one */
export interface RegisterReader {
  read(register: number, options?: RequestOptions): Promise<number>;
}

export interface PollingManagerOptions {
  registers: number[];
  interval?: number;
  timeout?: number;
  onValue?: (register: number, value: number) => void;
  onTimeout?: (register: number) => void;
  onError?: (register: number, error: Error) => void;
}

export interface PollingStats {
  passes: number;
  values: number;
  timeouts: number;
  errors: number;
  lastPassTime: number | null;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  logger?: string;
  address?: number;
  command?: number;
  register?: number;
  host?: string;
  port?: number;
  [key: string]: unknown;
}

export type LogField = 'timestamp' | 'level' | 'logger' | 'address' | 'command' | 'register' | 'host';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

export interface LoggerInstance {
  trace: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  setLevel: (level: LogLevel | 'none') => void;
  pause: () => void;
  resume: () => void;
}
