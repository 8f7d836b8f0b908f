/**
 * Cursor-based TDF reader.
 *
 * Tagged lookups scan forward from the current position and skip any field
 * with a different tag, so fields a newer peer adds are ignored. A lookup
 * never crosses the end of the enclosing group.
 */

import type { TdfCodec } from './codec.js';
import type { TdfField, TdfNode } from './node.js';
import { ENCODED_TAG_LENGTH, decodeTag } from './tag.js';
import { decodeVarInt } from './varint.js';
import {
  TdfType,
  GROUP_END,
  GROUP_START_MARKER,
  UNION_UNSET,
  getTypeName,
  isTdfType,
} from './types.js';
import { ErrorCode, MissingTagError, TdfError } from '../types/errors.js';

/** Default upper bound for string, blob and collection lengths (16 MB) */
export const DEFAULT_MAX_LENGTH = 16 * 1024 * 1024;

/** Default upper bound for nested groups, collections and unions */
export const DEFAULT_MAX_DEPTH = 64;

export interface TdfReaderOptions {
  /** Largest accepted string, blob or collection length */
  maxLength?: number;
  /** Deepest accepted nesting of generically read or skipped values */
  maxDepth?: number;
}

/**
 * Field header as found on the wire
 */
export interface TagHeader {
  readonly tag: string;
  readonly type: TdfType;
}

const textDecoder = new TextDecoder();

export class TdfReader {
  private cursor = 0;
  private depth = 0;
  private readonly maxLength: number;
  private readonly maxDepth: number;

  constructor(
    private readonly buffer: Uint8Array,
    options: TdfReaderOptions = {}
  ) {
    this.maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  get position(): number {
    return this.cursor;
  }

  get remaining(): number {
    return this.buffer.length - this.cursor;
  }

  peekByte(): number | undefined {
    return this.cursor < this.buffer.length ? this.buffer[this.cursor] : undefined;
  }

  readByte(): number {
    if (this.cursor >= this.buffer.length) {
      throw unexpectedEof(1, 0);
    }
    return this.buffer[this.cursor++];
  }

  readBytes(length: number): Uint8Array {
    if (this.remaining < length) {
      throw unexpectedEof(length, this.remaining);
    }
    const bytes = this.buffer.slice(this.cursor, this.cursor + length);
    this.cursor += length;
    return bytes;
  }

  readVarInt(): number {
    const { value, bytesRead } = decodeVarInt(this.buffer, this.cursor);
    this.cursor += bytesRead;
    return value;
  }

  readU8(): number {
    return this.readUnsigned(0xff, 'u8');
  }

  readU16(): number {
    return this.readUnsigned(0xffff, 'u16');
  }

  readU32(): number {
    return this.readUnsigned(0xffffffff, 'u32');
  }

  readBool(): boolean {
    return this.readVarInt() !== 0;
  }

  readStr(): string {
    const length = this.readLength();
    const bytes = this.readBytes(length);
    // Length includes the null terminator
    const end = length > 0 && bytes[length - 1] === 0 ? length - 1 : length;
    return textDecoder.decode(bytes.subarray(0, end));
  }

  readBlob(): Uint8Array {
    return this.readBytes(this.readLength());
  }

  readFloat(): number {
    const bytes = this.readBytes(4);
    return new DataView(bytes.buffer, bytes.byteOffset, 4).getFloat32(0, false);
  }

  readType(): TdfType {
    const value = this.readByte();
    if (!isTdfType(value)) {
      throw new TdfError(ErrorCode.ERR_UNKNOWN_TYPE, `Unknown value type: 0x${value.toString(16)}`);
    }
    return value;
  }

  readTagHeader(): TagHeader {
    if (this.remaining < ENCODED_TAG_LENGTH + 1) {
      throw unexpectedEof(ENCODED_TAG_LENGTH + 1, this.remaining);
    }
    const tag = decodeTag(this.buffer, this.cursor);
    this.cursor += ENCODED_TAG_LENGTH;
    return { tag, type: this.readType() };
  }

  /**
   * Read the next header and require it to be `tag` with value `type`
   */
  expectTag(tag: string, type: TdfType): void {
    const header = this.readTagHeader();
    if (header.tag !== tag) {
      throw new TdfError(ErrorCode.ERR_INVALID_UNION, `Expected tag ${tag} but found ${header.tag}`);
    }
    checkType(header, type);
  }

  /**
   * Advance to the field `tag`, leaving the cursor at its value
   */
  untilTag(tag: string, type: TdfType): void {
    for (;;) {
      const next = this.peekByte();
      if (next === undefined || next === GROUP_END) {
        throw new MissingTagError(tag, type);
      }

      const header = this.readTagHeader();
      if (header.tag !== tag) {
        this.skipType(header.type);
        continue;
      }

      checkType(header, type);
      return;
    }
  }

  /**
   * Read a required tagged value
   */
  tag<T>(tag: string, codec: TdfCodec<T>): T {
    this.untilTag(tag, codec.type);
    return codec.read(this);
  }

  /**
   * Read an optional tagged value. When the tag is absent the cursor is
   * restored and undefined is returned.
   */
  tryTag<T>(tag: string, codec: TdfCodec<T>): T | undefined {
    const start = this.cursor;
    try {
      this.untilTag(tag, codec.type);
    } catch (err) {
      if (err instanceof MissingTagError) {
        this.cursor = start;
        return undefined;
      }
      throw err;
    }
    return codec.read(this);
  }

  readGroupStart(): void {
    if (this.peekByte() === GROUP_START_MARKER) {
      this.cursor++;
    }
  }

  /**
   * Consume the group terminator, skipping any fields left unread before it
   */
  readGroupEnd(): void {
    for (;;) {
      const next = this.peekByte();
      if (next === undefined) {
        throw unexpectedEof(1, 0);
      }
      if (next === GROUP_END) {
        this.cursor++;
        return;
      }
      this.skipType(this.readTagHeader().type);
    }
  }

  skipType(type: TdfType): void {
    switch (type) {
      case TdfType.VAR_INT:
        this.readVarInt();
        return;

      case TdfType.STRING:
      case TdfType.BLOB:
        this.skip(this.readLength());
        return;

      case TdfType.GROUP:
        this.nested(() => {
          this.readGroupStart();
          this.readGroupEnd();
        });
        return;

      case TdfType.LIST:
        this.nested(() => {
          const elementType = this.readType();
          const count = this.readLength();
          for (let i = 0; i < count; i++) {
            this.skipType(elementType);
          }
        });
        return;

      case TdfType.MAP:
        this.nested(() => {
          const keyType = this.readType();
          const valueType = this.readType();
          const count = this.readLength();
          for (let i = 0; i < count; i++) {
            this.skipType(keyType);
            this.skipType(valueType);
          }
        });
        return;

      case TdfType.UNION:
        this.nested(() => {
          if (this.readByte() !== UNION_UNSET) {
            this.skipType(this.readTagHeader().type);
          }
        });
        return;

      case TdfType.VAR_INT_LIST: {
        const count = this.readLength();
        for (let i = 0; i < count; i++) {
          this.readVarInt();
        }
        return;
      }

      case TdfType.PAIR:
        this.readVarInt();
        this.readVarInt();
        return;

      case TdfType.TRIPLE:
        this.readVarInt();
        this.readVarInt();
        this.readVarInt();
        return;

      case TdfType.FLOAT:
        this.skip(4);
        return;
    }
  }

  /**
   * Read tagged fields up to the end of input or of the enclosing group.
   * The group terminator is not consumed.
   */
  readFields(): TdfField[] {
    const fields: TdfField[] = [];
    for (;;) {
      const next = this.peekByte();
      if (next === undefined || next === GROUP_END) {
        return fields;
      }
      const header = this.readTagHeader();
      fields.push({ tag: header.tag, node: this.readNode(header.type) });
    }
  }

  /**
   * Read any value into a generic tree
   */
  readNode(type: TdfType): TdfNode {
    switch (type) {
      case TdfType.VAR_INT:
        return { type, value: this.readVarInt() };

      case TdfType.STRING:
        return { type, value: this.readStr() };

      case TdfType.BLOB:
        return { type, value: this.readBlob() };

      case TdfType.GROUP:
        return this.nested((): TdfNode => {
          this.readGroupStart();
          const fields = this.readFields();
          this.readGroupEnd();
          return { type: TdfType.GROUP, fields };
        });

      case TdfType.LIST:
        return this.nested((): TdfNode => {
          const elementType = this.readType();
          const count = this.readLength();
          const items: TdfNode[] = [];
          for (let i = 0; i < count; i++) {
            items.push(this.readNode(elementType));
          }
          return { type: TdfType.LIST, elementType, items };
        });

      case TdfType.MAP:
        return this.nested((): TdfNode => {
          const keyType = this.readType();
          const valueType = this.readType();
          const count = this.readLength();
          const entries: (readonly [TdfNode, TdfNode])[] = [];
          for (let i = 0; i < count; i++) {
            const key = this.readNode(keyType);
            entries.push([key, this.readNode(valueType)]);
          }
          return { type: TdfType.MAP, keyType, valueType, entries };
        });

      case TdfType.UNION:
        return this.nested((): TdfNode => {
          const key = this.readByte();
          if (key === UNION_UNSET) {
            return { type: TdfType.UNION, key };
          }
          const header = this.readTagHeader();
          return { type: TdfType.UNION, key, value: { tag: header.tag, node: this.readNode(header.type) } };
        });

      case TdfType.VAR_INT_LIST: {
        const count = this.readLength();
        const values: number[] = [];
        for (let i = 0; i < count; i++) {
          values.push(this.readVarInt());
        }
        return { type, values };
      }

      case TdfType.PAIR: {
        const first = this.readVarInt();
        return { type, values: [first, this.readVarInt()] };
      }

      case TdfType.TRIPLE: {
        const first = this.readVarInt();
        const second = this.readVarInt();
        return { type, values: [first, second, this.readVarInt()] };
      }

      case TdfType.FLOAT:
        return { type, value: this.readFloat() };
    }
  }

  private nested<T>(read: () => T): T {
    if (this.depth >= this.maxDepth) {
      throw new TdfError(
        ErrorCode.ERR_DEPTH_EXCEEDED,
        `Nesting deeper than ${this.maxDepth} at offset ${this.cursor}`
      );
    }
    this.depth++;
    try {
      return read();
    } finally {
      this.depth--;
    }
  }

  private skip(length: number): void {
    if (this.remaining < length) {
      throw unexpectedEof(length, this.remaining);
    }
    this.cursor += length;
  }

  private readLength(): number {
    const length = this.readVarInt();
    if (length < 0 || length > this.maxLength) {
      throw new TdfError(
        ErrorCode.ERR_LENGTH_EXCEEDED,
        `Length ${length} outside 0..${this.maxLength}`
      );
    }
    return length;
  }

  private readUnsigned(max: number, name: string): number {
    const value = this.readVarInt();
    if (value < 0 || value > max) {
      throw new TdfError(ErrorCode.ERR_VALUE_OUT_OF_RANGE, `Value ${value} out of range for ${name}`);
    }
    return value;
  }
}

function checkType(header: TagHeader, type: TdfType): void {
  if (header.type !== type) {
    throw new TdfError(
      ErrorCode.ERR_INVALID_TYPE,
      `Expected ${header.tag} to be ${getTypeName(type)} but found ${getTypeName(header.type)}`
    );
  }
}

function unexpectedEof(wanted: number, available: number): TdfError {
  return new TdfError(
    ErrorCode.ERR_UNEXPECTED_EOF,
    `Unexpected end of input: wanted ${wanted} bytes, ${available} remaining`
  );
}
