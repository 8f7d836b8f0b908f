/**
 * Append-only TDF writer.
 */

import type { TdfCodec } from './codec.js';
import { encodeTag } from './tag.js';
import { encodeVarInt } from './varint.js';
import { TdfType, GROUP_END, UNION_UNSET } from './types.js';
import { ErrorCode, TdfError } from '../types/errors.js';

const textEncoder = new TextEncoder();

export class TdfWriter {
  private buffer: number[] = [];

  /**
   * Number of bytes written so far
   */
  get length(): number {
    return this.buffer.length;
  }

  writeByte(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new TdfError(ErrorCode.ERR_VALUE_OUT_OF_RANGE, `Value ${value} out of range for byte`);
    }
    this.buffer.push(value);
  }

  writeBytes(data: Uint8Array): void {
    for (const byte of data) {
      this.buffer.push(byte);
    }
  }

  writeVarInt(value: number): void {
    this.writeBytes(encodeVarInt(value));
  }

  writeU8(value: number): void {
    this.writeUnsigned(value, 0xff, 'u8');
  }

  writeU16(value: number): void {
    this.writeUnsigned(value, 0xffff, 'u16');
  }

  writeU32(value: number): void {
    this.writeUnsigned(value, 0xffffffff, 'u32');
  }

  writeBool(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  /**
   * Length-prefixed, null-terminated UTF-8 string. The length counts the
   * terminator.
   */
  writeStr(value: string): void {
    const encoded = textEncoder.encode(value);
    this.writeVarInt(encoded.length + 1);
    this.writeBytes(encoded);
    this.writeByte(0);
  }

  writeBlob(data: Uint8Array): void {
    this.writeVarInt(data.length);
    this.writeBytes(data);
  }

  /**
   * Discriminant of a set union. 0x7f is reserved for unset unions.
   */
  writeUnionKey(key: number): void {
    if (!Number.isInteger(key) || key < 0 || key > 0xff || key === UNION_UNSET) {
      throw new TdfError(ErrorCode.ERR_INVALID_UNION, `Invalid union discriminant: ${key}`);
    }
    this.writeByte(key);
  }

  writeFloat(value: number): void {
    const bytes = new Uint8Array(4);
    new DataView(bytes.buffer).setFloat32(0, value, false);
    this.writeBytes(bytes);
  }

  /**
   * Write a field header: packed tag followed by the value type
   */
  tag(tag: string, type: TdfType): void {
    this.writeBytes(encodeTag(tag));
    this.writeByte(type);
  }

  tagValue<T>(tag: string, codec: TdfCodec<T>, value: T): void {
    this.tag(tag, codec.type);
    codec.write(this, value);
  }

  tagU8(tag: string, value: number): void {
    this.tag(tag, TdfType.VAR_INT);
    this.writeU8(value);
  }

  tagU16(tag: string, value: number): void {
    this.tag(tag, TdfType.VAR_INT);
    this.writeU16(value);
  }

  tagU32(tag: string, value: number): void {
    this.tag(tag, TdfType.VAR_INT);
    this.writeU32(value);
  }

  tagBool(tag: string, value: boolean): void {
    this.tag(tag, TdfType.VAR_INT);
    this.writeBool(value);
  }

  tagStr(tag: string, value: string): void {
    this.tag(tag, TdfType.STRING);
    this.writeStr(value);
  }

  tagBlob(tag: string, value: Uint8Array): void {
    this.tag(tag, TdfType.BLOB);
    this.writeBlob(value);
  }

  /**
   * Open a union with the given discriminant. The caller writes the
   * value field next.
   */
  tagUnionStart(tag: string, key: number): void {
    this.tag(tag, TdfType.UNION);
    this.writeUnionKey(key);
  }

  tagUnionUnset(tag: string): void {
    this.tag(tag, TdfType.UNION);
    this.writeByte(UNION_UNSET);
  }

  tagGroupStart(tag: string): void {
    this.tag(tag, TdfType.GROUP);
  }

  tagGroupEnd(): void {
    this.writeByte(GROUP_END);
  }

  /**
   * Copy of everything written so far
   */
  toBytes(): Uint8Array {
    return Uint8Array.from(this.buffer);
  }

  clear(): void {
    this.buffer = [];
  }

  private writeUnsigned(value: number, max: number, name: string): void {
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new TdfError(ErrorCode.ERR_VALUE_OUT_OF_RANGE, `Value ${value} out of range for ${name}`);
    }
    this.writeVarInt(value);
  }
}
