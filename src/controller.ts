// src/controller.ts

import { requestRead, requestWrite, commandCode } from './commands/index.js';
import { NibeConfigError, NibeTimeoutError } from './errors.js';
import { rootLogger } from './logger.js';
import {
  Command,
  CommandListener,
  Connection,
  Message,
  RequestOptions,
  ResponseRead,
  ResponseWrite,
} from './types/nibe-types.js';
import { MessageQueue } from './transport/message-queue.js';
import { ResponseFuture } from './utils/response-future.js';

const logger = rootLogger.createLogger('NibeController');

/**
 * Request/response layer over a connection's message stream.
 *
 * The protocol has no transaction ids: a reply is matched to its request by
 * command kind and register only. Every read/write installs its own
 * listener for the duration of the call. One dispatch loop per controller
 * reads the connection and hands every inbound command to all listeners once;
 * it is started by `run()` or by iterating the controller.
 *
 * @example
 * const controller = new NibeController(connection);
 * void controller.run();
 * const value = await controller.read(40004, { timeout: 2000 });
 */
export class NibeController implements AsyncIterable<Command> {
  private readonly connection: Connection;
  private readonly listeners: Set<CommandListener> = new Set();
  private readonly consumers: Set<MessageQueue<Command>> = new Set();
  private loop: Promise<void> | null = null;
  private source: AsyncIterator<Message> | null = null;

  constructor(connection: Connection) {
    this.connection = connection;
  }

  /** Number of currently registered listeners */
  get listenerCount(): number {
    return this.listeners.size;
  }

  /**
   * Registers a listener. Returns the function that removes it.
   */
  listen(listener: CommandListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Runs `fn` with `listener` registered; the listener is removed on every exit path.
   */
  async listening<T>(listener: CommandListener, fn: () => Promise<T>): Promise<T> {
    const dispose = this.listen(listener);
    try {
      return await fn();
    } finally {
      dispose();
    }
  }

  /**
   * Reads a register.
   * @param register - register id
   * @param options - optional timeout and abort signal
   * @returns the register value from the matching read response
   * @throws NibeTimeoutError if `options.timeout` elapses first
   */
  async read(register: number, options: RequestOptions = {}): Promise<number> {
    validateOptions(options);
    const command = requestRead(register);
    const response = new ResponseFuture<ResponseRead>();

    const listener: CommandListener = reply => {
      if (reply.kind !== 'response-read' || reply.register !== register) return;
      response.set(reply);
    };

    const reply = await this.listening(listener, async () => {
      await this.connection.send(command);
      return this.awaitReply(response, options, `read of register ${register}`);
    });
    logger.debug(`Read ${register} = ${reply.value}`, { register });
    return reply.value;
  }

  /**
   * Writes a register and waits for the acknowledgement.
   * @throws NibeTimeoutError if `options.timeout` elapses first
   */
  async write(register: number, value: number, options: RequestOptions = {}): Promise<void> {
    validateOptions(options);
    const command = requestWrite(register, value);
    const response = new ResponseFuture<ResponseWrite>();

    const listener: CommandListener = reply => {
      if (reply.kind !== 'response-write' || reply.register !== register) return;
      response.set(reply);
    };

    await this.listening(listener, async () => {
      await this.connection.send(command);
      await this.awaitReply(response, options, `write of register ${register}`);
    });
    logger.debug(`Wrote ${register} = ${value}`, { register });
  }

  /**
   * Returns an iterator over inbound commands. Starts the dispatch loop if it
   * is not running; each iterator sees every command once and ends with the loop.
   */
  [Symbol.asyncIterator](): AsyncIterableIterator<Command> {
    const queue: MessageQueue<Command> = new MessageQueue<Command>(() => {
      this.consumers.delete(queue);
    });
    this.consumers.add(queue);
    void this.ensureLoop();
    return queue;
  }

  /**
   * Runs the dispatch loop until the connection closes or `signal` aborts.
   * Aborting stops the loop for every caller; a later `run()` starts a new one.
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    const loop = this.ensureLoop();
    if (!signal) return loop;

    const onAbort = (): void => this.stop();
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      await loop;
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  /** Whether the dispatch loop is reading the connection */
  get isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Stops the dispatch loop. Pending reads and writes keep waiting for their
   * timeout or signal.
   */
  stop(): void {
    const source = this.source;
    if (!source?.return) return;
    source.return().catch((err: unknown) => {
      logger.error('Failed to stop dispatch:', err);
    });
  }

  /**
   * Hands a command to every listener registered right now.
   * A listener removed while another one runs is not called for this command.
   */
  dispatch(command: Command): void {
    for (const listener of [...this.listeners]) {
      if (!this.listeners.has(listener)) continue;
      try {
        listener(command);
      } catch (err: unknown) {
        logger.error('Listener failed:', err, { command: commandCode(command) });
      }
    }
  }

  private ensureLoop(): Promise<void> {
    if (this.loop) return this.loop;

    const source = this.connection[Symbol.asyncIterator]();
    this.source = source;
    const loop: Promise<void> = this.pump(source).finally(() => {
      if (this.loop !== loop) return;
      this.loop = null;
      this.source = null;
      for (const consumer of [...this.consumers]) {
        consumer.close();
      }
    });
    this.loop = loop;
    return loop;
  }

  private async pump(source: AsyncIterator<Message>): Promise<void> {
    try {
      for (;;) {
        const result = await source.next();
        if (result.done) return;

        const command = commandOf(result.value);
        if (!command) {
          logger.trace(`Ignoring ${result.value.kind} message`);
          continue;
        }
        this.dispatch(command);
        for (const consumer of this.consumers) {
          consumer.push(command);
        }
      }
    } catch (err: unknown) {
      logger.error('Dispatch loop failed:', err);
    }
  }

  private awaitReply<T>(future: ResponseFuture<T>, options: RequestOptions, what: string): Promise<T> {
    const { timeout, signal } = options;
    if (signal?.aborted) {
      future.fail(signal.reason);
      return future.get();
    }

    let timer: NodeJS.Timeout | undefined;
    const onAbort = (): void => {
      future.fail(signal?.reason);
    };

    if (timeout !== undefined) {
      timer = setTimeout(() => {
        future.fail(new NibeTimeoutError(`Timeout after ${timeout}ms waiting for ${what}`));
      }, timeout);
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    return future.get().finally(() => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    });
  }
}

function validateOptions({ timeout }: RequestOptions): void {
  if (timeout !== undefined && (!Number.isFinite(timeout) || timeout < 0)) {
    throw new NibeConfigError(`Timeout must be a non-negative number, got ${timeout}`);
  }
}

function commandOf(message: Message): Command | null {
  switch (message.kind) {
    case 'master':
    case 'slave':
      return message.command;
    case 'ack':
    case 'nak':
    case 'unknown':
      return null;
  }
}
