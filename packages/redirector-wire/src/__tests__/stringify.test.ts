import { describe, it, expect } from 'vitest';
import { stringifyTdf } from '../tdf/stringify.js';
import { TdfWriter } from '../tdf/writer.js';
import { TdfType } from '../tdf/types.js';
import { ErrorCode } from '../types/errors.js';
import { encodeInstanceDetails } from '../models/instance-details.js';
import { createInstanceNet } from '../models/instance-net.js';
import { bytesToHex, hexToBytes, isValidHex } from '../utils/hex.js';

describe('stringifyTdf', () => {
  it('renders instance details', () => {
    const bytes = encodeInstanceDetails({ net: createInstanceNet('10.0.0.5', 42127), secure: true });

    expect(stringifyTdf(bytes)).toBe(
      [
        'ADDR: union(0) VALU: {',
        '  IP: 167772165',
        '  PORT: 42127',
        '}',
        'SECU: 1',
        'XDNS: 0',
      ].join('\n')
    );
  });

  it('renders strings, unset unions and u32 values', () => {
    const writer = new TdfWriter();
    writer.tagStr('ENV', 'prod');
    writer.tagUnionUnset('FPID');
    writer.tagU32('LOC', 0x656e4e5a);

    expect(stringifyTdf(writer.toBytes())).toBe('ENV: "prod"\nFPID: union(unset)\nLOC: 1701727834');
  });

  it('renders collections', () => {
    const writer = new TdfWriter();
    writer.tag('NUMS', TdfType.LIST);
    writer.writeByte(TdfType.VAR_INT);
    writer.writeVarInt(3);
    writer.writeVarInt(1);
    writer.writeVarInt(2);
    writer.writeVarInt(3);
    writer.tag('KV', TdfType.MAP);
    writer.writeByte(TdfType.STRING);
    writer.writeByte(TdfType.VAR_INT);
    writer.writeVarInt(1);
    writer.writeStr('a');
    writer.writeVarInt(7);
    writer.tag('PR', TdfType.PAIR);
    writer.writeVarInt(1);
    writer.writeVarInt(2);
    writer.tagBlob('BL', Uint8Array.of(1, 255));
    writer.tagGroupStart('EMPT');
    writer.tagGroupEnd();

    expect(stringifyTdf(writer.toBytes())).toBe(
      ['NUMS: [1, 2, 3]', 'KV: {"a": 7}', 'PR: (1, 2)', 'BL: blob(01ff)', 'EMPT: {}'].join('\n')
    );
  });

  it('indents nested groups', () => {
    const writer = new TdfWriter();
    writer.tagGroupStart('OUT');
    writer.tagGroupStart('IN');
    writer.tagU8('A', 1);
    writer.tagGroupEnd();
    writer.tagGroupEnd();

    expect(stringifyTdf(writer.toBytes())).toBe(['OUT: {', '  IN: {', '    A: 1', '  }', '}'].join('\n'));
  });
});

describe('stringifyTdf on malformed input', () => {
  it('rejects bytes after a stray group terminator', () => {
    const writer = new TdfWriter();
    writer.tagBool('SECU', true);
    writer.tagGroupEnd();
    writer.tagBool('XDNS', true);

    expect(() => stringifyTdf(writer.toBytes())).toThrow('Unexpected group end at offset 5, 6 bytes unread');
    try {
      stringifyTdf(writer.toBytes());
    } catch (err) {
      expect(err).toHaveProperty('code', ErrorCode.ERR_TRAILING_DATA);
    }
  });

  it('rejects nesting past the configured depth', () => {
    const writer = new TdfWriter();
    writer.tagGroupStart('OUT');
    writer.tagGroupStart('IN');
    writer.tagGroupEnd();
    writer.tagGroupEnd();

    expect(stringifyTdf(writer.toBytes(), { maxDepth: 2 })).toBe('OUT: {\n  IN: {}\n}');
    expect(() => stringifyTdf(writer.toBytes(), { maxDepth: 1 })).toThrow('Nesting deeper than 1');
  });
});

describe('hex helpers', () => {
  it('accepts a prefix and whitespace', () => {
    expect(hexToBytes('0x01 ff\n0a')).toEqual(Uint8Array.of(1, 255, 10));
    expect(isValidHex('0xABcd')).toBe(true);
  });

  it('rejects malformed input', () => {
    expect(isValidHex('abc')).toBe(false);
    expect(() => hexToBytes('0g')).toThrow('Invalid hex character at position 1');
    expect(() => hexToBytes('abc')).toThrow('Invalid hex string: odd length');
  });

  it('joins bytes with a separator', () => {
    expect(bytesToHex(Uint8Array.of(0xc2, 0xfc, 0xb4), ' ')).toBe('c2 fc b4');
  });
});
