// test/cli.test.ts
import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../src/cli.js';
import { NibeConfigError } from '../src/errors.js';

describe('parseCliArgs', () => {
  it('fills in defaults', () => {
    expect(parseCliArgs(['monitor', '192.0.2.10'])).toEqual({
      command: 'monitor',
      host: '192.0.2.10',
      registers: [],
      listenPort: 9999,
      readPort: 9999,
      writePort: 10000,
      peerPolicy: 'configured',
      logLevel: 'info',
    });
  });

  it('reads every option', () => {
    const options = parseCliArgs([
      'monitor',
      'pump.local',
      '--registers',
      '40004, 40008',
      '--listen-port',
      '0',
      '--read-port',
      '9000',
      '--write-port=9001',
      '--peer',
      'first-sender',
      '--log-level',
      'debug',
    ]);
    expect(options).toEqual({
      command: 'monitor',
      host: 'pump.local',
      registers: [40004, 40008],
      listenPort: 0,
      readPort: 9000,
      writePort: 9001,
      peerPolicy: 'first-sender',
      logLevel: 'debug',
    });
  });

  it('requires the command and host', () => {
    expect(() => parseCliArgs([])).toThrow('Command is required');
    expect(() => parseCliArgs(['listen', 'pump.local'])).toThrow('Unknown command: listen');
    expect(() => parseCliArgs(['monitor'])).toThrow('Host is required');
    expect(() => parseCliArgs(['monitor', 'a', 'b'])).toThrow('Unexpected argument: b');
  });

  it('rejects malformed values', () => {
    expect(() => parseCliArgs(['monitor', 'h', '--registers', '40004,abc'])).toThrow(NibeConfigError);
    expect(() => parseCliArgs(['monitor', 'h', '--registers', '70000'])).toThrow(NibeConfigError);
    expect(() => parseCliArgs(['monitor', 'h', '--read-port', '70000'])).toThrow(NibeConfigError);
    expect(() => parseCliArgs(['monitor', 'h', '--read-port', '0'])).toThrow('read-port must be 1-65535, got 0');
    expect(() => parseCliArgs(['monitor', 'h', '--write-port', '0'])).toThrow('write-port must be 1-65535, got 0');
    expect(() => parseCliArgs(['monitor', 'h', '--peer', 'anyone'])).toThrow('Unknown peer policy: anyone');
    expect(() => parseCliArgs(['monitor', 'h', '--log-level', 'loud'])).toThrow('Unknown log level: loud');
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['monitor', 'h', '--verbose'])).toThrow(NibeConfigError);
  });
});
