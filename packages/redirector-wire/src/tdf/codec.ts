/**
 * Value codecs. A codec pairs a TDF value type with the functions that
 * write and read a value of that type once its field header is handled.
 */

import type { TdfReader } from './reader.js';
import type { TdfWriter } from './writer.js';
import { TdfType, UNION_UNSET } from './types.js';

export interface TdfCodec<T> {
  /** Value type written in the field header */
  readonly type: TdfType;

  /**
   * Writes the value body (no header)
   */
  write(writer: TdfWriter, value: T): void;

  /**
   * Reads the value body (no header)
   */
  read(reader: TdfReader): T;
}

/**
 * Built-in primitive codecs
 */
export class TdfPrimitives {
  static readonly u8: TdfCodec<number> = {
    type: TdfType.VAR_INT,
    write: (w, v) => w.writeU8(v),
    read: r => r.readU8(),
  };

  static readonly u16: TdfCodec<number> = {
    type: TdfType.VAR_INT,
    write: (w, v) => w.writeU16(v),
    read: r => r.readU16(),
  };

  static readonly u32: TdfCodec<number> = {
    type: TdfType.VAR_INT,
    write: (w, v) => w.writeU32(v),
    read: r => r.readU32(),
  };

  static readonly bool: TdfCodec<boolean> = {
    type: TdfType.VAR_INT,
    write: (w, v) => w.writeBool(v),
    read: r => r.readBool(),
  };

  static readonly str: TdfCodec<string> = {
    type: TdfType.STRING,
    write: (w, v) => w.writeStr(v),
    read: r => r.readStr(),
  };

  static readonly blob: TdfCodec<Uint8Array> = {
    type: TdfType.BLOB,
    write: (w, v) => w.writeBlob(v),
    read: r => r.readBlob(),
  };

  static readonly float: TdfCodec<number> = {
    type: TdfType.FLOAT,
    write: (w, v) => w.writeFloat(v),
    read: r => r.readFloat(),
  };
}

/** Tag of the value field inside a set union */
export const UNION_VALUE_TAG = 'VALU';

export type Union<T> =
  | { readonly set: false }
  | { readonly set: true; readonly key: number; readonly value: T };

/**
 * Codec for a union whose value, when set, is read with `codec`
 */
export function unionOf<T>(codec: TdfCodec<T>): TdfCodec<Union<T>> {
  return {
    type: TdfType.UNION,
    write(writer, union) {
      if (!union.set) {
        writer.writeByte(UNION_UNSET);
        return;
      }
      writer.writeUnionKey(union.key);
      writer.tagValue(UNION_VALUE_TAG, codec, union.value);
    },
    read(reader) {
      const key = reader.readByte();
      if (key === UNION_UNSET) {
        return { set: false };
      }
      reader.expectTag(UNION_VALUE_TAG, codec.type);
      return { set: true, key, value: codec.read(reader) };
    },
  };
}
