import { describe, it, expect } from 'vitest';
import { encodeTag, decodeTag, isValidTag } from '../tdf/tag.js';
import { encodeVarInt, decodeVarInt } from '../tdf/varint.js';
import { TdfWriter } from '../tdf/writer.js';
import { TdfReader } from '../tdf/reader.js';
import { TdfPrimitives, unionOf } from '../tdf/codec.js';
import { TdfType } from '../tdf/types.js';
import { ErrorCode, MissingTagError, TdfError } from '../types/errors.js';
import { bytesToHex } from '../utils/hex.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

describe('tag packing', () => {
  it('packs known tags', () => {
    expect(bytesToHex(encodeTag('PORT'))).toBe('c2fcb4');
    expect(bytesToHex(encodeTag('ADDR'))).toBe('864932');
    expect(bytesToHex(encodeTag('VALU'))).toBe('da1b35');
    expect(bytesToHex(encodeTag('SECU'))).toBe('ce58f5');
    expect(bytesToHex(encodeTag('HOST'))).toBe('a2fcf4');
  });

  it('zero pads short tags', () => {
    expect(bytesToHex(encodeTag('IP'))).toBe('a70000');
    expect(decodeTag(encodeTag('IP'))).toBe('IP');
    expect(decodeTag(encodeTag('ENV'))).toBe('ENV');
  });

  it('unpacks every redirector tag', () => {
    const tags = [
      'BSDK', 'BTIM', 'CLNT', 'CLTP', 'CSKU', 'CVER', 'DSDK', 'ENV', 'FPID',
      'LOC', 'NAME', 'PLAT', 'PROF', 'HOST', 'IP', 'PORT', 'ADDR', 'VALU', 'SECU', 'XDNS',
    ];
    for (const tag of tags) {
      expect(decodeTag(encodeTag(tag))).toBe(tag);
    }
  });

  it('rejects tags that cannot be packed', () => {
    expect(isValidTag('')).toBe(false);
    expect(isValidTag('TOOLONG')).toBe(false);
    expect(isValidTag('port')).toBe(false);
    const err = captureError(() => encodeTag('A1'));
    expect(err).toBeInstanceOf(TdfError);
    expect(err).toHaveProperty('code', ErrorCode.ERR_INVALID_TAG);
  });
});

describe('VarInt', () => {
  it('stores small values in one byte', () => {
    expect(Array.from(encodeVarInt(0))).toEqual([0x00]);
    expect(Array.from(encodeVarInt(63))).toEqual([0x3f]);
  });

  it('uses six bits in the first byte and seven after', () => {
    expect(Array.from(encodeVarInt(64))).toEqual([0x80, 0x01]);
    expect(Array.from(encodeVarInt(80))).toEqual([0x90, 0x01]);
    expect(Array.from(encodeVarInt(42127))).toEqual([0x8f, 0x92, 0x05]);
  });

  it('encodes the sign in the first byte', () => {
    expect(Array.from(encodeVarInt(-1))).toEqual([0x41]);
    expect(decodeVarInt(Uint8Array.of(0x41))).toEqual({ value: -1, bytesRead: 1 });
  });

  it('decodes values above 2^31', () => {
    const encoded = encodeVarInt(0xffffffff);
    expect(decodeVarInt(encoded)).toEqual({ value: 0xffffffff, bytesRead: encoded.length });
  });

  it('decodes from an offset', () => {
    expect(decodeVarInt(Uint8Array.of(0xff, 0x8f, 0x92, 0x05), 1)).toEqual({ value: 42127, bytesRead: 3 });
  });

  it('fails on a truncated value', () => {
    const err = captureError(() => decodeVarInt(Uint8Array.of(0x80)));
    expect(err).toHaveProperty('code', ErrorCode.ERR_UNEXPECTED_EOF);
  });

  it('rejects values that are not safe integers', () => {
    const err = captureError(() => encodeVarInt(1.5));
    expect(err).toHaveProperty('code', ErrorCode.ERR_VALUE_OUT_OF_RANGE);
  });
});

describe('TdfWriter', () => {
  it('writes a u16 field', () => {
    const writer = new TdfWriter();
    writer.tagU16('PORT', 80);
    expect(bytesToHex(writer.toBytes())).toBe('c2fcb4009001');
  });

  it('writes null-terminated strings', () => {
    const writer = new TdfWriter();
    writer.tagStr('HOST', 'ab');
    expect(bytesToHex(writer.toBytes())).toBe('a2fcf401' + '03' + '616200');
  });

  it('writes an unset union as 0x7f', () => {
    const writer = new TdfWriter();
    writer.tagUnionUnset('FPID');
    const bytes = writer.toBytes();
    expect(bytes[3]).toBe(TdfType.UNION);
    expect(bytes[4]).toBe(0x7f);
    expect(bytes.length).toBe(5);
  });

  it('rejects the unset marker as a discriminant', () => {
    const writer = new TdfWriter();
    const err = captureError(() => writer.tagUnionStart('ADDR', 0x7f));
    expect(err).toHaveProperty('code', ErrorCode.ERR_INVALID_UNION);
  });

  it('rejects values outside their width', () => {
    const writer = new TdfWriter();
    expect(captureError(() => writer.tagU16('PORT', 0x10000))).toHaveProperty(
      'code',
      ErrorCode.ERR_VALUE_OUT_OF_RANGE
    );
    expect(captureError(() => writer.writeU8(-1))).toHaveProperty('code', ErrorCode.ERR_VALUE_OUT_OF_RANGE);
  });

  it('rejects raw bytes outside 0..255 instead of truncating', () => {
    const writer = new TdfWriter();
    for (const value of [0x106, -1, 1.5]) {
      expect(captureError(() => writer.writeByte(value))).toHaveProperty(
        'code',
        ErrorCode.ERR_VALUE_OUT_OF_RANGE
      );
    }
    expect(writer.length).toBe(0);

    writer.writeByte(0xff);
    expect(Array.from(writer.toBytes())).toEqual([0xff]);
  });

  it('clears its buffer', () => {
    const writer = new TdfWriter();
    writer.tagBool('SECU', true);
    writer.clear();
    expect(writer.length).toBe(0);
  });
});

describe('TdfReader', () => {
  it('reads primitives written by the writer', () => {
    const writer = new TdfWriter();
    writer.tagU8('CLTP', 200);
    writer.tagU32('LOC', 0x656e4e5a);
    writer.tagStr('NAME', 'héllo');
    writer.tagBlob('DATA', Uint8Array.of(1, 2, 3));
    writer.tagBool('SECU', false);
    writer.tag('RATE', TdfType.FLOAT);
    writer.writeFloat(1.5);

    const reader = new TdfReader(writer.toBytes());
    expect(reader.tag('CLTP', TdfPrimitives.u8)).toBe(200);
    expect(reader.tag('LOC', TdfPrimitives.u32)).toBe(0x656e4e5a);
    expect(reader.tag('NAME', TdfPrimitives.str)).toBe('héllo');
    expect(reader.tag('DATA', TdfPrimitives.blob)).toEqual(Uint8Array.of(1, 2, 3));
    expect(reader.tag('SECU', TdfPrimitives.bool)).toBe(false);
    expect(reader.tag('RATE', TdfPrimitives.float)).toBe(1.5);
    expect(reader.remaining).toBe(0);
  });

  it('reports a missing tag with its expected type', () => {
    const writer = new TdfWriter();
    writer.tagBool('SECU', true);

    const err = captureError(() => new TdfReader(writer.toBytes()).tag('PORT', TdfPrimitives.u16));
    expect(err).toBeInstanceOf(MissingTagError);
    expect(err).toMatchObject({ tag: 'PORT', valueType: TdfType.VAR_INT, code: ErrorCode.ERR_MISSING_TAG });
    expect((err as Error).message).toBe('Missing tag PORT (VarInt)');
  });

  it('rewinds when an optional tag is absent', () => {
    const writer = new TdfWriter();
    writer.tagU16('PORT', 80);
    const reader = new TdfReader(writer.toBytes());

    expect(reader.tryTag('HOST', TdfPrimitives.str)).toBeUndefined();
    expect(reader.position).toBe(0);
    expect(reader.tag('PORT', TdfPrimitives.u16)).toBe(80);
  });

  it('rejects a tag with the wrong type', () => {
    const writer = new TdfWriter();
    writer.tagStr('SECU', 'yes');

    const err = captureError(() => new TdfReader(writer.toBytes()).tag('SECU', TdfPrimitives.bool));
    expect(err).toBeInstanceOf(TdfError);
    expect(err).toHaveProperty('code', ErrorCode.ERR_INVALID_TYPE);
  });

  it('rejects out-of-range integers', () => {
    const writer = new TdfWriter();
    writer.tagU32('PORT', 70000);

    const err = captureError(() => new TdfReader(writer.toBytes()).tag('PORT', TdfPrimitives.u16));
    expect(err).toHaveProperty('code', ErrorCode.ERR_VALUE_OUT_OF_RANGE);
  });

  it('enforces the configured maximum length', () => {
    const writer = new TdfWriter();
    writer.tagStr('HOST', 'abcdef');

    const reader = new TdfReader(writer.toBytes(), { maxLength: 4 });
    const err = captureError(() => reader.tag('HOST', TdfPrimitives.str));
    expect(err).toHaveProperty('code', ErrorCode.ERR_LENGTH_EXCEEDED);
  });

  it('reads a set union and its value', () => {
    const writer = new TdfWriter();
    writer.tagUnionStart('ADDR', 3);
    writer.tagStr('VALU', 'x');

    const union = new TdfReader(writer.toBytes()).tag('ADDR', unionOf(TdfPrimitives.str));
    expect(union).toEqual({ set: true, key: 3, value: 'x' });
  });

  it('round trips unions through the union codec', () => {
    const codec = unionOf(TdfPrimitives.u16);
    const writer = new TdfWriter();
    writer.tagValue('ADDR', codec, { set: true, key: 1, value: 9 });
    writer.tagValue('FPID', codec, { set: false });

    const reader = new TdfReader(writer.toBytes());
    expect(reader.tag('ADDR', codec)).toEqual({ set: true, key: 1, value: 9 });
    expect(reader.tag('FPID', codec)).toEqual({ set: false });
  });

  it('requires VALU inside a set union', () => {
    const writer = new TdfWriter();
    writer.tagUnionStart('ADDR', 0);
    writer.tagStr('HOST', 'x');

    const err = captureError(() => new TdfReader(writer.toBytes()).tag('ADDR', unionOf(TdfPrimitives.str)));
    expect(err).toHaveProperty('code', ErrorCode.ERR_INVALID_UNION);
  });
});
