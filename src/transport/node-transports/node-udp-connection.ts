// src/transport/node-transports/node-udp-connection.ts

import * as dgram from 'dgram';
import { Mutex } from 'async-mutex';
import {
  DEFAULT_HOST_LISTEN,
  DEFAULT_PORT_LISTEN,
  DEFAULT_PORT_READ,
  DEFAULT_PORT_WRITE,
} from '../../constants/constants.js';
import {
  NibeAlreadyConnectedError,
  NibeConfigError,
  NibeNotConnectedError,
  NibeParseError,
  NibeTransportError,
} from '../../errors.js';
import { MessageFramer } from '../../framers/message-framer.js';
import { NibeFramer, slaveMessage } from '../../framers/nibe-framer.js';
import { rootLogger } from '../../logger.js';
import {
  Connection,
  ConnectionStats,
  DatagramSocket,
  Message,
  NodeUdpConnectionOptions,
  OutgoingCommand,
  PeerPolicy,
  RemoteInfo,
  SocketFactory,
} from '../../types/nibe-types.js';
import { toHex } from '../../utils/utils.js';
import { MessageQueue } from '../message-queue.js';

const logger = rootLogger.createLogger('NodeUdpConnection');

interface ResolvedOptions {
  listenPort: number;
  listenHost: string;
  readPort: number;
  writePort: number;
  peerPolicy: PeerPolicy;
}

function validatePort(name: string, port: number, allowZero: boolean = false): void {
  const min = allowZero ? 0 : 1;
  if (!Number.isInteger(port) || port < min || port > 65535) {
    throw new NibeConfigError(`${name} must be an integer ${min}-65535, got ${port}`);
  }
}

/**
 * UDP session with the heat pump.
 *
 * Binds one local port for everything the pump broadcasts, sends read
 * requests to `readPort` and write requests to `writePort` on the peer host.
 * Iterating the connection yields every datagram that parses; malformed
 * datagrams are logged and skipped.
 */
export class NodeUdpConnection implements Connection {
  public isOpen: boolean = false;
  private host: string;
  private readonly configuredHost: string;
  private readonly options: ResolvedOptions;
  private readonly framer: MessageFramer;
  private readonly socketFactory: SocketFactory;
  private socket: DatagramSocket | null = null;
  private subscribers: Set<MessageQueue<Message>> = new Set();

  private _operationMutex: Mutex = new Mutex();
  private _peerAdopted: boolean = false;
  private _stats: ConnectionStats = {
    datagramsReceived: 0,
    messagesParsed: 0,
    parseErrors: 0,
    framesSent: 0,
  };

  constructor(host: string, options: NodeUdpConnectionOptions = {}) {
    if (!host) {
      throw new NibeConfigError('Peer host is required');
    }
    this.host = host;
    this.configuredHost = host;
    this.options = {
      listenPort: options.listenPort ?? DEFAULT_PORT_LISTEN,
      listenHost: options.listenHost ?? DEFAULT_HOST_LISTEN,
      readPort: options.readPort ?? DEFAULT_PORT_READ,
      writePort: options.writePort ?? DEFAULT_PORT_WRITE,
      peerPolicy: options.peerPolicy ?? 'configured',
    };
    validatePort('listenPort', this.options.listenPort, true);
    validatePort('readPort', this.options.readPort);
    validatePort('writePort', this.options.writePort);
    if (this.options.peerPolicy !== 'configured' && this.options.peerPolicy !== 'first-sender') {
      throw new NibeConfigError(`Unknown peer policy: ${String(this.options.peerPolicy)}`);
    }

    this.framer = options.framer ?? new NibeFramer();
    this.socketFactory = options.socketFactory ?? (() => dgram.createSocket('udp4'));
  }

  /** Host requests are sent to; differs from the configured host after adoption */
  public get peerHost(): string {
    return this.host;
  }

  public get stats(): Readonly<ConnectionStats> {
    return { ...this._stats };
  }

  public async connect(): Promise<void> {
    if (this.isOpen) throw new NibeAlreadyConnectedError();

    const socket = this.socketFactory();
    const { listenPort, listenHost } = this.options;
    logger.info(`Binding ${listenHost}:${listenPort}...`);

    try {
      await new Promise<void>((resolve, reject) => {
        let bound = false;
        socket.on('error', err => {
          if (!bound) {
            reject(new NibeTransportError(`Failed to bind ${listenHost}:${listenPort}: ${err.message}`));
            return;
          }
          this._onError(err);
        });
        socket.on('message', (msg, rinfo) => this._onMessage(msg, rinfo));
        socket.bind(listenPort, listenHost, () => {
          bound = true;
          resolve();
        });
      });
    } catch (err: unknown) {
      socket.removeAllListeners();
      try {
        socket.close();
      } catch (closeErr: unknown) {
        logger.debug('Socket close after failed bind:', closeErr);
      }
      throw err;
    }

    this.socket = socket;
    this.isOpen = true;
    this._peerAdopted = false;
    this.host = this.configuredHost;
    logger.info(`SUCCESS: Listening on ${listenHost}:${listenPort}`, {
      host: this.host,
      port: this.options.readPort,
    });
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.isOpen = false;

    for (const subscriber of [...this.subscribers]) {
      subscriber.close();
    }
    this.subscribers.clear();

    if (!socket) return;
    socket.removeAllListeners();
    await new Promise<void>(resolve => socket.close(() => resolve()));
    logger.info('Connection closed');
  }

  /**
   * Sends a request as a slave frame. Reads go to the read port, writes to the write port.
   * @throws NibeNotConnectedError if the socket is not bound
   * @throws NibeTransportError if the socket rejects the datagram
   */
  public async send(command: OutgoingCommand): Promise<void> {
    const data = this.framer.buildFrame(slaveMessage(command));
    const port = this._portFor(command);

    const release = await this._operationMutex.acquire();
    try {
      const socket = this.socket;
      if (!this.isOpen || !socket) throw new NibeNotConnectedError();

      const host = this.host;
      await new Promise<void>((resolve, reject) => {
        socket.send(data, port, host, err => {
          if (err) reject(new NibeTransportError(`Failed to send to ${host}:${port}: ${err.message}`));
          else resolve();
        });
      });
      this._stats.framesSent++;
      logger.debug(`TX: ${toHex(data)}`, { host, port });
    } finally {
      release();
    }
  }

  /**
   * Returns a fresh iterator over parsed messages. Each call subscribes
   * independently; the iterator ends when the connection closes.
   */
  public [Symbol.asyncIterator](): AsyncIterableIterator<Message> {
    const queue: MessageQueue<Message> = new MessageQueue<Message>(() => {
      this.subscribers.delete(queue);
    });
    if (!this.isOpen) {
      queue.close();
      return queue;
    }
    this.subscribers.add(queue);
    return queue;
  }

  private _portFor(command: OutgoingCommand): number {
    switch (command.kind) {
      case 'request-read':
      case 'request-read-null':
        return this.options.readPort;
      case 'request-write':
      case 'request-write-null':
        return this.options.writePort;
    }
  }

  private _checkPeer(rinfo: RemoteInfo): void {
    if (this.options.peerPolicy === 'first-sender' && !this._peerAdopted) {
      this._peerAdopted = true;
      if (rinfo.address !== this.host) {
        logger.info(`Adopting ${rinfo.address} as peer (configured ${this.configuredHost})`);
        this.host = rinfo.address;
      }
      return;
    }
    if (rinfo.address !== this.host) {
      logger.warn(`Data from unexpected host ${rinfo.address}`, { host: rinfo.address, port: rinfo.port });
    }
  }

  private _onMessage(msg: Buffer, rinfo: RemoteInfo): void {
    this._stats.datagramsReceived++;
    this._checkPeer(rinfo);

    const packet = new Uint8Array(msg);
    let message: Message;
    try {
      message = this.framer.parseFrame(packet);
    } catch (err: unknown) {
      this._stats.parseErrors++;
      const reason = err instanceof NibeParseError ? err.message : `unexpected ${String(err)}`;
      logger.error(`RX: ${toHex(packet)} -> ${reason}`, { host: rinfo.address, port: rinfo.port });
      return;
    }

    this._stats.messagesParsed++;
    logger.trace(`RX: ${toHex(packet)} -> ${message.kind}`, {
      host: rinfo.address,
      port: rinfo.port,
    });
    for (const subscriber of this.subscribers) {
      subscriber.push(message);
    }
  }

  private _onError(err: Error): void {
    logger.error(`Socket error: ${err.message}`);
  }
}
