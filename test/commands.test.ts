// test/commands.test.ts
import { describe, it, expect } from 'vitest';
import {
  commandCode,
  commandUnknown,
  decodeCommand,
  encodeCommand,
  requestRead,
  requestReadNull,
  requestWrite,
  requestWriteNull,
  responseData,
  responseProduct,
  responseRead,
  responseRmu,
  responseWrite,
} from '../src/commands/index.js';
import {
  NibeInvalidLengthError,
  NibeInvalidRegisterError,
  NibeInvalidValueError,
} from '../src/errors.js';
import { fromHex } from '../src/utils/utils.js';
import { boundaryCommands } from './boundary-commands.js';

describe('request-read', () => {
  it('encodes the register little-endian', () => {
    expect(encodeCommand(requestRead(0x1234))).toEqual(fromHex('34 12'));
  });

  it('decodes an empty payload as the null request', () => {
    expect(decodeCommand(0x69, new Uint8Array(0))).toEqual({ kind: 'request-read-null' });
    expect(encodeCommand(requestReadNull())).toEqual(new Uint8Array(0));
  });

  it('rejects a payload of the wrong length', () => {
    expect(() => decodeCommand(0x69, fromHex('01 02 03'))).toThrow(NibeInvalidLengthError);
  });

  it('validates the register', () => {
    expect(() => requestRead(-1)).toThrow(NibeInvalidRegisterError);
    expect(() => requestRead(0x10000)).toThrow(NibeInvalidRegisterError);
    expect(() => requestRead(1.5)).toThrow(NibeInvalidRegisterError);
  });
});

describe('request-write', () => {
  it('encodes register and 32-bit value', () => {
    expect(encodeCommand(requestWrite(12345, 987654))).toEqual(fromHex('39 30 06 12 0F 00'));
  });

  it('decodes register and value', () => {
    expect(decodeCommand(0x6b, fromHex('39 30 06 12 0F 00'))).toEqual({
      kind: 'request-write',
      register: 12345,
      value: 987654,
    });
  });

  it('has a null variant', () => {
    expect(decodeCommand(0x6b, new Uint8Array(0))).toEqual(requestWriteNull());
  });

  it('rejects values outside 32 bits', () => {
    expect(() => requestWrite(1, 2 ** 32)).toThrow(NibeInvalidValueError);
    expect(() => requestWrite(1, -1)).toThrow(NibeInvalidValueError);
  });

  it('rejects a 2-byte payload', () => {
    expect(() => decodeCommand(0x6b, fromHex('39 30'))).toThrow(NibeInvalidLengthError);
  });
});

describe('responses', () => {
  it('decodes a read response', () => {
    expect(decodeCommand(0x6a, fromHex('44 9C D7 00 00 00'))).toEqual(responseRead(40004, 215));
  });

  it('encodes a read response', () => {
    expect(encodeCommand(responseRead(40004, 0x01020304))).toEqual(fromHex('44 9C 04 03 02 01'));
  });

  it('rejects a short read response', () => {
    expect(() => decodeCommand(0x6a, fromHex('44 9C D7 00'))).toThrow(NibeInvalidLengthError);
  });

  it('round-trips a write response', () => {
    const encoded = encodeCommand(responseWrite(40008));
    expect(encoded).toEqual(fromHex('48 9C'));
    expect(decodeCommand(0x6c, encoded)).toEqual(responseWrite(40008));
  });

  it('keeps an RMU payload verbatim', () => {
    const data = fromHex('01 02 03 C0 5C');
    expect(decodeCommand(0x62, data)).toEqual(responseRmu(data));
    expect(encodeCommand(responseRmu(data))).toEqual(data);
  });

  it('splits a product response into prefix and name', () => {
    const payload = fromHex('03 00 01 48 50 2D 54 45 53 54');
    expect(decodeCommand(0x6d, payload)).toEqual({
      kind: 'response-product',
      unknown: fromHex('03 00 01'),
      product: 'HP-TEST',
    });
    expect(encodeCommand(responseProduct('HP-TEST', fromHex('03 00 01')))).toEqual(payload);
  });

  it('rejects a product response shorter than its prefix', () => {
    expect(() => decodeCommand(0x6d, fromHex('03 00'))).toThrow(NibeInvalidLengthError);
    expect(() => responseProduct('X', fromHex('01'))).toThrow(NibeInvalidLengthError);
  });
});

describe('response-data', () => {
  it('decodes register/value groups and drops the sentinel', () => {
    const command = decodeCommand(0x68, fromHex('44 9C D7 00 FF FF 00 00 48 9C 2C 01'));
    expect(command).toEqual(
      responseData([
        [40004, 215],
        [40008, 300],
      ])
    );
  });

  it('decodes an empty payload as no parameters', () => {
    expect(decodeCommand(0x68, new Uint8Array(0))).toEqual(responseData(new Map()));
  });

  it('rejects a length that is not a multiple of 4', () => {
    expect(() => decodeCommand(0x68, fromHex('44 9C D7 00 01'))).toThrow(NibeInvalidLengthError);
  });

  it('skips sentinel registers when encoding', () => {
    const command = responseData([
      [0xffff, 1],
      [40004, 215],
    ]);
    expect(encodeCommand(command)).toEqual(fromHex('44 9C D7 00'));
  });

  it('rejects values wider than 16 bits when encoding', () => {
    expect(() => encodeCommand(responseData([[40004, 0x10000]]))).toThrow(NibeInvalidValueError);
  });
});

describe('unknown commands', () => {
  it('decodes any unmapped code without failing', () => {
    expect(decodeCommand(0x60, fromHex('01 02'))).toEqual({
      kind: 'unknown',
      code: 0x60,
      data: fromHex('01 02'),
    });
  });

  it('re-encodes the raw payload under its own code', () => {
    const command = commandUnknown(0x60, fromHex('AA'));
    expect(commandCode(command)).toBe(0x60);
    expect(encodeCommand(command)).toEqual(fromHex('AA'));
  });

  it('rejects codes that do not fit a byte', () => {
    expect(() => commandUnknown(0x100)).toThrow(NibeInvalidValueError);
  });
});

describe('commandCode', () => {
  it('maps every kind to its wire code', () => {
    expect(commandCode(requestRead(1))).toBe(0x69);
    expect(commandCode(requestReadNull())).toBe(0x69);
    expect(commandCode(requestWrite(1, 1))).toBe(0x6b);
    expect(commandCode(requestWriteNull())).toBe(0x6b);
    expect(commandCode(responseRead(1, 1))).toBe(0x6a);
    expect(commandCode(responseWrite(1))).toBe(0x6c);
    expect(commandCode(responseData([]))).toBe(0x68);
    expect(commandCode(responseRmu(new Uint8Array(0)))).toBe(0x62);
    expect(commandCode(responseProduct('X'))).toBe(0x6d);
  });
});

describe('payload round trip', () => {
  it.each(boundaryCommands)('%s', (_name, command) => {
    expect(decodeCommand(commandCode(command), encodeCommand(command))).toEqual(command);
  });

  it('keeps non-ASCII product names', () => {
    const command = responseProduct('Wärme', fromHex('00 01 02'));
    const payload = encodeCommand(command);
    expect(payload).toEqual(fromHex('00 01 02 57 E4 72 6D 65'));
    expect(decodeCommand(0x6d, payload)).toEqual(command);
  });
});
