/**
 * Error codes for TDF encoding and decoding.
 */

import { TdfType, getTypeName } from '../tdf/types.js';

export enum ErrorCode {
  /** Generic/unspecified error */
  ERR_UNKNOWN = 1,

  /** Input ended in the middle of a value */
  ERR_UNEXPECTED_EOF = 2,

  /** A required tag was not present */
  ERR_MISSING_TAG = 3,

  /** A tag was present with a different value type */
  ERR_INVALID_TYPE = 4,

  /** A field header carried a type nibble outside the known types */
  ERR_UNKNOWN_TYPE = 5,

  /** Tag text cannot be packed */
  ERR_INVALID_TAG = 6,

  /** VarInt does not fit a safe integer */
  ERR_VARINT_TOO_LARGE = 7,

  /** Integer outside the range of its field */
  ERR_VALUE_OUT_OF_RANGE = 8,

  /** String, blob or collection length above the configured maximum */
  ERR_LENGTH_EXCEEDED = 9,

  /** Malformed union */
  ERR_INVALID_UNION = 10,

  /** Text is not a dotted-quad IPv4 address */
  ERR_INVALID_ADDRESS = 11,

  /** Groups, collections or unions nested above the configured maximum */
  ERR_DEPTH_EXCEEDED = 12,

  /** Bytes left over after the last top-level field */
  ERR_TRAILING_DATA = 13,
}

/**
 * Get human-readable description for error code
 */
export function getErrorMessage(code: ErrorCode): string {
  const messages: Record<ErrorCode, string> = {
    [ErrorCode.ERR_UNKNOWN]: 'Unknown error',
    [ErrorCode.ERR_UNEXPECTED_EOF]: 'Unexpected end of input',
    [ErrorCode.ERR_MISSING_TAG]: 'Missing tag',
    [ErrorCode.ERR_INVALID_TYPE]: 'Unexpected value type',
    [ErrorCode.ERR_UNKNOWN_TYPE]: 'Unknown value type',
    [ErrorCode.ERR_INVALID_TAG]: 'Invalid tag',
    [ErrorCode.ERR_VARINT_TOO_LARGE]: 'VarInt too large',
    [ErrorCode.ERR_VALUE_OUT_OF_RANGE]: 'Value out of range',
    [ErrorCode.ERR_LENGTH_EXCEEDED]: 'Length exceeds maximum',
    [ErrorCode.ERR_INVALID_UNION]: 'Invalid union',
    [ErrorCode.ERR_INVALID_ADDRESS]: 'Invalid IPv4 address',
    [ErrorCode.ERR_DEPTH_EXCEEDED]: 'Nesting too deep',
    [ErrorCode.ERR_TRAILING_DATA]: 'Trailing data',
  };
  return messages[code] ?? 'Unknown error';
}

/**
 * Error raised by the TDF codec and the redirector models
 */
export class TdfError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message?: string
  ) {
    super(message ?? getErrorMessage(code));
    this.name = 'TdfError';
  }
}

/**
 * A required field was absent. Carries the tag and the value type the
 * decoder expected under it.
 */
export class MissingTagError extends TdfError {
  constructor(
    public readonly tag: string,
    public readonly valueType: TdfType
  ) {
    super(ErrorCode.ERR_MISSING_TAG, `Missing tag ${tag} (${getTypeName(valueType)})`);
    this.name = 'MissingTagError';
  }
}
