// src/index.ts

export {
  requestRead,
  requestReadNull,
  requestWrite,
  requestWriteNull,
  responseRead,
  responseWrite,
  responseData,
  responseRmu,
  responseProduct,
  commandUnknown,
  commandCode,
  encodeCommand,
  decodeCommand,
} from './commands/index.js';
export * from './constants/constants.js';
export * from './errors.js';
export type { MessageFramer } from './framers/message-framer.js';
export { NibeFramer, masterMessage, slaveMessage, parseMessage, encodeMessage } from './framers/nibe-framer.js';
export { Logger, rootLogger } from './logger.js';
export { NibeController } from './controller.js';
export { PollingManager } from './polling-manager.js';
export { NodeUdpConnection } from './transport/node-transports/node-udp-connection.js';
export { MessageQueue } from './transport/message-queue.js';
export { calculateChecksum, swapNibbles } from './utils/checksum.js';
export { escape, unescape } from './utils/escape.js';
export { ResponseFuture } from './utils/response-future.js';
export { fromHex, toHex } from './utils/utils.js';
export type * from './types/nibe-types.js';
