// test/controller.test.ts
import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { responseData, responseRead, responseWrite } from '../src/commands/index.js';
import {
  NibeConfigError,
  NibeInvalidRegisterError,
  NibeInvalidValueError,
  NibeTimeoutError,
} from '../src/errors.js';
import { encodeMessage, masterMessage } from '../src/framers/nibe-framer.js';
import { NibeController } from '../src/controller.js';
import { rootLogger } from '../src/logger.js';
import { NodeUdpConnection } from '../src/transport/node-transports/node-udp-connection.js';
import { Command } from '../src/types/nibe-types.js';
import { fromHex } from '../src/utils/utils.js';
import { FakeSocket, flush } from './fake-socket.js';

const PUMP = '192.0.2.10';

function fromPump(command: Command): Uint8Array {
  return encodeMessage(masterMessage(0x20, command));
}

describe('NibeController', () => {
  let socket: FakeSocket;
  let connection: NodeUdpConnection;
  let controller: NibeController;
  let loop: Promise<void>;

  beforeAll(() => rootLogger.disable());
  afterAll(() => rootLogger.enable());

  beforeEach(async () => {
    socket = new FakeSocket();
    connection = new NodeUdpConnection(PUMP, { socketFactory: () => socket });
    await connection.connect();
    controller = new NibeController(connection);
    loop = controller.run();
  });

  afterEach(async () => {
    await connection.disconnect();
    await loop;
  });

  it('reads a register', async () => {
    socket.onSend = () => socket.deliver(fromHex('5C 00 20 6A 06 44 9C D7 00 00 00 43'), PUMP);
    await expect(controller.read(40004, { timeout: 1000 })).resolves.toBe(215);
    expect(socket.sent[0].data).toEqual(fromHex('C0 69 02 44 9C 73'));
    expect(controller.listenerCount).toBe(0);
  });

  it('writes a register', async () => {
    socket.onSend = () => socket.deliver(fromPump(responseWrite(40004)), PUMP);
    await expect(controller.write(40004, 1, { timeout: 1000 })).resolves.toBeUndefined();
    expect(socket.sent[0].port).toBe(10000);
    expect(controller.listenerCount).toBe(0);
  });

  it('matches interleaved replies to concurrent reads', async () => {
    const first = controller.read(40004, { timeout: 1000 });
    const second = controller.read(40008, { timeout: 1000 });
    await flush();
    expect(socket.sent).toHaveLength(2);

    socket.deliver(fromPump(responseRead(40008, 300)), PUMP);
    socket.deliver(fromPump(responseRead(40004, 215)), PUMP);

    await expect(first).resolves.toBe(215);
    await expect(second).resolves.toBe(300);
  });

  it('keeps waiting through unrelated traffic', async () => {
    let settled = false;
    const pending = controller.read(40004, { timeout: 1000 }).then(value => {
      settled = true;
      return value;
    });
    await flush();

    socket.deliver(fromPump(responseRead(40008, 1)), PUMP);
    socket.deliver(fromPump(responseWrite(40004)), PUMP);
    socket.deliver(fromPump(responseData([[40004, 9]])), PUMP);
    socket.deliver(fromHex('06'), PUMP);
    await flush();
    expect(settled).toBe(false);

    socket.deliver(fromPump(responseRead(40004, 7)), PUMP);
    await expect(pending).resolves.toBe(7);
  });

  it('takes the first matching reply', async () => {
    socket.onSend = () => {
      socket.deliver(fromPump(responseRead(40004, 1)), PUMP);
      socket.deliver(fromPump(responseRead(40004, 2)), PUMP);
    };
    await expect(controller.read(40004, { timeout: 1000 })).resolves.toBe(1);
  });

  it('times out and removes its listener', async () => {
    await expect(controller.read(40004, { timeout: 10 })).rejects.toThrow(NibeTimeoutError);
    expect(controller.listenerCount).toBe(0);
  });

  it('rejects with the abort reason and removes its listener', async () => {
    const abort = new AbortController();
    const pending = controller.read(40004, { signal: abort.signal });
    abort.abort(new Error('stopped'));
    await expect(pending).rejects.toThrow('stopped');
    expect(controller.listenerCount).toBe(0);
  });

  it('rejects a negative timeout before sending', async () => {
    await expect(controller.read(40004, { timeout: -1 })).rejects.toThrow(NibeConfigError);
    expect(socket.sent).toHaveLength(0);
  });

  it('keeps dispatching when a listener throws', async () => {
    controller.listen(() => {
      throw new Error('listener failure');
    });
    socket.onSend = () => socket.deliver(fromPump(responseRead(40004, 5)), PUMP);
    await expect(controller.read(40004, { timeout: 1000 })).resolves.toBe(5);
  });

  it('stops calling a listener once disposed', async () => {
    const seen: Command[] = [];
    const dispose = controller.listen(command => seen.push(command));

    socket.deliver(fromPump(responseWrite(1)), PUMP);
    await flush();
    dispose();
    socket.deliver(fromPump(responseWrite(2)), PUMP);
    await flush();

    expect(seen).toEqual([responseWrite(1)]);
  });

  it('removes the listener after listening() throws', async () => {
    await expect(
      controller.listening(
        () => undefined,
        async () => {
          throw new Error('inner');
        }
      )
    ).rejects.toThrow('inner');
    expect(controller.listenerCount).toBe(0);
  });

  it('yields commands and skips messages without one', async () => {
    const commands = controller[Symbol.asyncIterator]();
    const next = commands.next();
    socket.deliver(fromHex('06'), PUMP);
    socket.deliver(fromHex('5C 00 20 6B 00 4B'), PUMP);
    expect(await next).toEqual({ value: { kind: 'request-write-null' }, done: false });
    await commands.return?.();
  });

  it('calls each listener once per command while also iterated', async () => {
    let calls = 0;
    controller.listen(() => {
      calls++;
    });
    const first = controller[Symbol.asyncIterator]();
    const second = controller[Symbol.asyncIterator]();

    socket.deliver(fromPump(responseWrite(1)), PUMP);

    expect(await first.next()).toEqual({ value: responseWrite(1), done: false });
    expect(await second.next()).toEqual({ value: responseWrite(1), done: false });
    await flush();
    expect(calls).toBe(1);
    await first.return?.();
    await second.return?.();
  });

  it('ends iterators when the connection closes', async () => {
    const commands = controller[Symbol.asyncIterator]();
    const next = commands.next();
    await connection.disconnect();
    expect(await next).toEqual({ value: undefined, done: true });
  });

  it('stops run() on abort while the link is quiet', async () => {
    const abort = new AbortController();
    const running = controller.run(abort.signal);
    abort.abort();
    await expect(running).resolves.toBeUndefined();
    await expect(loop).resolves.toBeUndefined();
    expect(controller.isRunning).toBe(false);
  });

  it('returns at once for an aborted signal', async () => {
    const abort = new AbortController();
    abort.abort();
    await expect(controller.run(abort.signal)).resolves.toBeUndefined();
    expect(controller.isRunning).toBe(true);
  });

  it('dispatches again after a restart', async () => {
    const abort = new AbortController();
    const running = controller.run(abort.signal);
    abort.abort();
    await running;

    loop = controller.run();
    socket.onSend = () => socket.deliver(fromPump(responseRead(40004, 3)), PUMP);
    await expect(controller.read(40004, { timeout: 1000 })).resolves.toBe(3);
  });

  it('ends run() when the connection closes', async () => {
    await connection.disconnect();
    await expect(loop).resolves.toBeUndefined();
  });

  it('forwards send failures to the caller', async () => {
    await connection.disconnect();
    await expect(controller.read(40004)).rejects.toThrow('Connection is not open');
    expect(controller.listenerCount).toBe(0);
  });

  it('validates the request before sending', async () => {
    await expect(controller.read(-1)).rejects.toThrow(NibeInvalidRegisterError);
    await expect(controller.write(1, -1)).rejects.toThrow(NibeInvalidValueError);
    expect(socket.sent).toHaveLength(0);
  });
});
