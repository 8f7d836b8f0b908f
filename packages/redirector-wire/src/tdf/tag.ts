/**
 * Tag packing. A tag of up to four uppercase ASCII letters is packed into
 * three bytes, six bits per character (bits 6, 4, 3, 2, 1, 0).
 */

import { ErrorCode, TdfError } from '../types/errors.js';

/** Packed tag size in bytes (excluding the type byte) */
export const ENCODED_TAG_LENGTH = 3;

const TAG_PATTERN = /^[A-Z]{1,4}$/;

export function isValidTag(tag: string): boolean {
  return TAG_PATTERN.test(tag);
}

/**
 * Pack a tag into its three wire bytes
 */
export function encodeTag(tag: string): Uint8Array {
  if (!isValidTag(tag)) {
    throw new TdfError(ErrorCode.ERR_INVALID_TAG, `Invalid tag: ${JSON.stringify(tag)}`);
  }

  const [c0, c1, c2, c3] = [0, 1, 2, 3].map(i => (i < tag.length ? tag.charCodeAt(i) : 0));

  const out = new Uint8Array(ENCODED_TAG_LENGTH);
  out[0] =
    ((c0 & 0x40) << 1) |
    ((c0 & 0x10) << 2) |
    ((c0 & 0x0f) << 2) |
    ((c1 & 0x40) >> 5) |
    ((c1 & 0x10) >> 4);
  out[1] =
    ((c1 & 0x0f) << 4) |
    ((c2 & 0x40) >> 3) |
    ((c2 & 0x10) >> 2) |
    ((c2 & 0x0c) >> 2);
  out[2] =
    ((c2 & 0x03) << 6) |
    ((c3 & 0x40) >> 1) |
    (c3 & 0x1f);
  return out;
}

/**
 * Unpack three tag bytes starting at `offset`
 */
export function decodeTag(data: Uint8Array, offset: number = 0): string {
  const b0 = data[offset];
  const b1 = data[offset + 1];
  const b2 = data[offset + 2];

  const chars = [
    ((b0 & 0x80) >> 1) | ((b0 & 0x40) >> 2) | ((b0 & 0x3c) >> 2),
    ((b0 & 0x02) << 5) | ((b0 & 0x01) << 4) | ((b1 & 0xf0) >> 4),
    ((b1 & 0x08) << 3) | ((b1 & 0x04) << 2) | ((b1 & 0x03) << 2) | ((b2 & 0xc0) >> 6),
    ((b2 & 0x20) << 1) | (b2 & 0x1f),
  ];

  // Short tags are zero padded
  return String.fromCharCode(...chars.filter(c => c !== 0));
}
