// src/framers/nibe-framer.ts

import { commandCode, decodeCommand, encodeCommand } from '../commands/index.js';
import {
  CHECKSUM_SIZE,
  MASTER_HEADER_SIZE,
  MAX_PAYLOAD_SIZE,
  SLAVE_HEADER_SIZE,
  START_BYTES,
} from '../constants/constants.js';
import { NibeChecksumError, NibeEmptyPacketError, NibeInvalidLengthError, NibeInvalidValueError } from '../errors.js';
import { Command, MasterMessage, Message, SlaveMessage } from '../types/nibe-types.js';
import { calculateChecksum } from '../utils/checksum.js';
import { escape, unescape } from '../utils/escape.js';
import { concatUint8Arrays, fromBytes } from '../utils/utils.js';
import { MessageFramer } from './message-framer.js';

export function masterMessage(address: number, command: Command): MasterMessage {
  if (!Number.isInteger(address) || address < 0 || address > 0xff) {
    throw new NibeInvalidValueError(address, 0xff);
  }
  return { kind: 'master', address, command };
}

export function slaveMessage(command: Command): SlaveMessage {
  return { kind: 'slave', command };
}

/**
 * Frame codec for master (0x5C) and slave (0xC0) frames.
 *
 * Master: `5C 00 <addr> <cmd> <len> <payload> <checksum>`, checksum over addr..payload.
 * Slave:  `C0 <cmd> <len> <payload> <checksum>`, checksum over start..payload.
 * Both are byte-stuffed with their own start byte after the first byte.
 */
export class NibeFramer implements MessageFramer {
  public buildFrame(message: Message): Uint8Array {
    switch (message.kind) {
      case 'master':
        return this.buildMaster(message);
      case 'slave':
        return this.buildSlave(message);
      case 'ack':
        return fromBytes(START_BYTES.ACK);
      case 'nak':
        return fromBytes(START_BYTES.NAK);
      case 'unknown':
        return concatUint8Arrays([fromBytes(message.start), message.data]);
    }
  }

  public parseFrame(data: Uint8Array): Message {
    if (data.length === 0) {
      throw new NibeEmptyPacketError();
    }

    switch (data[0]) {
      case START_BYTES.MASTER:
        return this.parseMaster(data);
      case START_BYTES.SLAVE:
        return this.parseSlave(data);
      case START_BYTES.ACK:
        return { kind: 'ack' };
      case START_BYTES.NAK:
        return { kind: 'nak' };
      default:
        return { kind: 'unknown', start: data[0], data: Uint8Array.from(data.subarray(1)) };
    }
  }

  private encodePayload(command: Command): Uint8Array {
    const payload = encodeCommand(command);
    if (payload.length > MAX_PAYLOAD_SIZE) {
      throw new NibeInvalidLengthError(payload.length, MAX_PAYLOAD_SIZE, undefined, 'payload length');
    }
    return payload;
  }

  private buildMaster(message: MasterMessage): Uint8Array {
    const payload = this.encodePayload(message.command);
    const body = concatUint8Arrays([
      fromBytes(START_BYTES.MASTER, 0x00, message.address, commandCode(message.command), payload.length),
      payload,
    ]);
    const checksum = calculateChecksum(body.subarray(2), START_BYTES.MASTER);
    return escape(concatUint8Arrays([body, fromBytes(checksum)]), START_BYTES.MASTER);
  }

  private buildSlave(message: SlaveMessage): Uint8Array {
    const payload = this.encodePayload(message.command);
    const body = concatUint8Arrays([
      fromBytes(START_BYTES.SLAVE, commandCode(message.command), payload.length),
      payload,
    ]);
    const checksum = calculateChecksum(body, START_BYTES.SLAVE);
    return escape(concatUint8Arrays([body, fromBytes(checksum)]), START_BYTES.SLAVE);
  }

  private parseMaster(raw: Uint8Array): MasterMessage {
    const data = unescape(raw, START_BYTES.MASTER);
    if (data.length < MASTER_HEADER_SIZE) {
      throw new NibeInvalidLengthError(data.length, MASTER_HEADER_SIZE + CHECKSUM_SIZE, raw, 'packet length');
    }

    const length = data[4];
    const end = MASTER_HEADER_SIZE + length;
    if (data.length < end + CHECKSUM_SIZE) {
      throw new NibeInvalidLengthError(data.length, end + CHECKSUM_SIZE, raw, 'packet length');
    }

    // байты после контрольной суммы - хвост датаграммы, не часть кадра
    const received = data[end];
    const calculated = calculateChecksum(data.subarray(2, end), START_BYTES.MASTER);
    if (calculated !== received) {
      throw new NibeChecksumError(calculated, received, raw);
    }

    const command = decodeCommand(data[3], data.subarray(MASTER_HEADER_SIZE, end));
    return { kind: 'master', address: data[2], command };
  }

  private parseSlave(raw: Uint8Array): SlaveMessage {
    const data = unescape(raw, START_BYTES.SLAVE);
    if (data.length < SLAVE_HEADER_SIZE) {
      throw new NibeInvalidLengthError(data.length, SLAVE_HEADER_SIZE + CHECKSUM_SIZE, raw, 'packet length');
    }

    const length = data[2];
    const end = SLAVE_HEADER_SIZE + length;
    if (data.length < end + CHECKSUM_SIZE) {
      throw new NibeInvalidLengthError(data.length, end + CHECKSUM_SIZE, raw, 'packet length');
    }

    const received = data[end];
    const calculated = calculateChecksum(data.subarray(0, end), START_BYTES.SLAVE);
    if (calculated !== received) {
      throw new NibeChecksumError(calculated, received, raw);
    }

    const command = decodeCommand(data[1], data.subarray(SLAVE_HEADER_SIZE, end));
    return { kind: 'slave', command };
  }
}

const defaultFramer = new NibeFramer();

/**
 * Parses one datagram with the default framer
 * @throws NibeParseError on empty, short or corrupted frames
 */
export function parseMessage(data: Uint8Array): Message {
  return defaultFramer.parseFrame(data);
}

/**
 * Encodes a message with the default framer
 */
export function encodeMessage(message: Message): Uint8Array {
  return defaultFramer.buildFrame(message);
}
