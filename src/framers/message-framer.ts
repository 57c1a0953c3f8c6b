// src/framers/message-framer.ts

import { Message } from '../types/nibe-types.js';

/**
 * Общий интерфейс для сборки и разбора датаграмм
 */
export interface MessageFramer {
  /**
   * Serializes a message into one wire frame, byte-stuffed
   */
  buildFrame(message: Message): Uint8Array;

  /**
   * Parses one datagram, validating length and checksum
   */
  parseFrame(data: Uint8Array): Message;
}
