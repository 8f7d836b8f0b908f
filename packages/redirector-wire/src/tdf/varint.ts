/**
 * TDF variable-length integers.
 *
 * The first byte holds a continuation flag (0x80), a sign flag (0x40) and
 * the low six bits of the magnitude. Every following byte holds seven more
 * bits with its own continuation flag.
 */

import { ErrorCode, TdfError } from '../types/errors.js';

const CONTINUE = 0x80;
const SIGN = 0x40;

/**
 * Encode a safe integer as a VarInt
 */
export function encodeVarInt(value: number): Uint8Array {
  if (!Number.isSafeInteger(value)) {
    throw new TdfError(ErrorCode.ERR_VALUE_OUT_OF_RANGE, `VarInt value must be a safe integer: ${value}`);
  }

  let remaining = Math.abs(value);
  let first = remaining % 0x40;
  if (value < 0) {
    first |= SIGN;
  }
  remaining = Math.floor(remaining / 0x40);

  if (remaining === 0) {
    return Uint8Array.of(first);
  }

  const bytes: number[] = [first | CONTINUE];
  while (remaining >= 0x80) {
    bytes.push((remaining % 0x80) | CONTINUE);
    remaining = Math.floor(remaining / 0x80);
  }
  bytes.push(remaining);

  return new Uint8Array(bytes);
}

/**
 * Decode a VarInt from buffer, returning value and bytes consumed
 */
export function decodeVarInt(data: Uint8Array, offset: number = 0): { value: number; bytesRead: number } {
  if (offset >= data.length) {
    throw new TdfError(ErrorCode.ERR_UNEXPECTED_EOF, 'Incomplete VarInt');
  }

  const first = data[offset];
  let value = first & 0x3f;
  let bytesRead = 1;

  if ((first & CONTINUE) !== 0) {
    let multiplier = 0x40;
    for (;;) {
      if (offset + bytesRead >= data.length) {
        throw new TdfError(ErrorCode.ERR_UNEXPECTED_EOF, 'Incomplete VarInt');
      }
      const byte = data[offset + bytesRead];
      bytesRead++;

      value += (byte & 0x7f) * multiplier;
      if (!Number.isSafeInteger(value)) {
        throw new TdfError(ErrorCode.ERR_VARINT_TOO_LARGE);
      }
      if ((byte & CONTINUE) === 0) {
        break;
      }
      multiplier *= 0x80;
    }
  }

  return {
    value: (first & SIGN) !== 0 ? 0 - value : value,
    bytesRead,
  };
}
