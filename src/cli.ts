#!/usr/bin/env node
// src/cli.ts

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { commandCode } from './commands/index.js';
import { validateRegister } from './commands/validation.js';
import { DEFAULT_PORT_LISTEN, DEFAULT_PORT_READ, DEFAULT_PORT_WRITE } from './constants/constants.js';
import { NibeController } from './controller.js';
import { NibeConfigError, NibeError } from './errors.js';
import { Logger, rootLogger } from './logger.js';
import { PollingManager } from './polling-manager.js';
import { NodeUdpConnection } from './transport/node-transports/node-udp-connection.js';
import { LogLevel, PeerPolicy } from './types/nibe-types.js';

const logger = rootLogger.createLogger('cli');

export const USAGE = `Usage: nibe-udp monitor <host> [options]

Options:
  --registers <list>    comma separated registers to poll, e.g. 40004,40008
  --listen-port <n>     local port (default ${DEFAULT_PORT_LISTEN})
  --read-port <n>       pump port for read requests (default ${DEFAULT_PORT_READ})
  --write-port <n>      pump port for write requests (default ${DEFAULT_PORT_WRITE})
  --peer <policy>       configured | first-sender (default configured)
  --log-level <level>   trace | debug | info | warn | error (default info)`;

export interface CliOptions {
  command: 'monitor';
  host: string;
  registers: number[];
  listenPort: number;
  readPort: number;
  writePort: number;
  peerPolicy: PeerPolicy;
  logLevel: LogLevel;
}

function parseInteger(name: string, value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new NibeConfigError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return Number(value.trim());
}

function parsePort(name: string, value: string | undefined, fallback: number, min: number = 1): number {
  if (value === undefined) return fallback;
  const port = parseInteger(name, value);
  if (port < min || port > 65535) {
    throw new NibeConfigError(`${name} must be ${min}-65535, got ${port}`);
  }
  return port;
}

function parseRegisters(value: string | undefined): number[] {
  if (value === undefined || value.trim() === '') return [];
  return value.split(',').map(part => {
    const register = parseInteger('register', part);
    try {
      validateRegister(register);
    } catch (err: unknown) {
      throw new NibeConfigError(err instanceof Error ? err.message : String(err));
    }
    return register;
  });
}

function parseRaw(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        registers: { type: 'string' },
        'listen-port': { type: 'string' },
        'read-port': { type: 'string' },
        'write-port': { type: 'string' },
        peer: { type: 'string' },
        'log-level': { type: 'string' },
      },
    });
  } catch (err: unknown) {
    throw new NibeConfigError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Parses command line arguments (without the node executable and script path).
 * @throws NibeConfigError on unknown options, missing host or malformed values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseRaw(argv);
  const [command, host, ...rest] = positionals;
  if (command !== 'monitor') {
    throw new NibeConfigError(command ? `Unknown command: ${command}` : 'Command is required');
  }
  if (!host) {
    throw new NibeConfigError('Host is required');
  }
  if (rest.length > 0) {
    throw new NibeConfigError(`Unexpected argument: ${rest[0]}`);
  }

  const peer = values.peer ?? 'configured';
  if (peer !== 'configured' && peer !== 'first-sender') {
    throw new NibeConfigError(`Unknown peer policy: ${peer}`);
  }

  const logLevel = values['log-level'] ?? 'info';
  if (!Logger.isLevel(logLevel)) {
    throw new NibeConfigError(`Unknown log level: ${logLevel}`);
  }

  return {
    command,
    host,
    registers: parseRegisters(values.registers),
    // 0: ephemeral local port
    listenPort: parsePort('listen-port', values['listen-port'], DEFAULT_PORT_LISTEN, 0),
    readPort: parsePort('read-port', values['read-port'], DEFAULT_PORT_READ),
    writePort: parsePort('write-port', values['write-port'], DEFAULT_PORT_WRITE),
    peerPolicy: peer,
    logLevel,
  };
}

/**
 * Listens to the pump and prints polled registers once per second until `signal` aborts.
 */
export async function runMonitor(
  options: CliOptions,
  signal: AbortSignal,
  print: (line: string) => void = line => console.log(line)
): Promise<void> {
  rootLogger.setLevel(options.logLevel);

  const connection = new NodeUdpConnection(options.host, {
    listenPort: options.listenPort,
    readPort: options.readPort,
    writePort: options.writePort,
    peerPolicy: options.peerPolicy,
  });
  await connection.connect();

  const controller = new NibeController(connection);
  const stopListening = controller.listen(command => {
    logger.debug(`RX: ${command.kind}`, { command: commandCode(command) });
  });
  const loop = controller.run().catch((err: unknown) => logger.error('Dispatch loop failed:', err));

  const poller =
    options.registers.length > 0
      ? new PollingManager(controller, {
          registers: options.registers,
          onValue: (register, value) => print(`${register}: ${value}`),
          onTimeout: register => print(`${register}: TIMEOUT`),
        })
      : null;
  poller?.start();

  try {
    if (!signal.aborted) {
      await new Promise<void>(resolve => signal.addEventListener('abort', () => resolve(), { once: true }));
    }
  } finally {
    poller?.stop();
    stopListening();
    await connection.disconnect();
    await loop;
  }
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const abort = new AbortController();
  process.once('SIGINT', () => abort.abort());
  process.once('SIGTERM', () => abort.abort());

  try {
    await runMonitor(options, abort.signal);
  } catch (err: unknown) {
    logger.error(err instanceof NibeError ? err.message : 'Monitor failed:', err);
    process.exitCode = 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  void main();
}
