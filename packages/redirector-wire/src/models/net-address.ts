/**
 * NetAddress value object: a 32-bit IPv4 address.
 *
 * On the wire the four octets are read as one big-endian unsigned 32-bit
 * integer and written as a VarInt field.
 *
 * @example
 * ```typescript
 * const addr = NetAddress.parse('10.0.0.5');
 * addr.value;      // 167772165
 * addr.toString(); // '10.0.0.5'
 * ```
 */

import type { TdfCodec } from '../tdf/codec.js';
import { TdfType } from '../tdf/types.js';
import { ErrorCode, TdfError } from '../types/errors.js';

export type Octets = readonly [number, number, number, number];

const DOTTED_QUAD = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

export class NetAddress {
  /** 127.0.0.1 */
  static readonly LOCALHOST = new NetAddress([127, 0, 0, 1]);

  private constructor(public readonly octets: Octets) {}

  /**
   * Parse a dotted-quad address. Octets may carry leading zeros.
   *
   * @throws {TdfError} ERR_INVALID_ADDRESS if the text is not an IPv4 literal
   */
  static parse(text: string): NetAddress {
    const address = NetAddress.tryParse(text);
    if (address === undefined) {
      throw new TdfError(ErrorCode.ERR_INVALID_ADDRESS, `Invalid IPv4 address: ${JSON.stringify(text)}`);
    }
    return address;
  }

  static tryParse(text: string): NetAddress | undefined {
    const match = DOTTED_QUAD.exec(text);
    if (match === null) {
      return undefined;
    }

    const octets = match.slice(1).map(part => parseInt(part, 10));
    if (octets.some(octet => octet > 255)) {
      return undefined;
    }

    const [a, b, c, d] = octets;
    return new NetAddress([a, b, c, d]);
  }

  /**
   * Build an address from its big-endian u32 value
   */
  static fromValue(value: number): NetAddress {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new RangeError(`IPv4 value must be an unsigned 32-bit integer: ${value}`);
    }
    return new NetAddress([
      (value >>> 24) & 0xff,
      (value >>> 16) & 0xff,
      (value >>> 8) & 0xff,
      value & 0xff,
    ]);
  }

  static default(): NetAddress {
    return NetAddress.LOCALHOST;
  }

  /**
   * Big-endian u32 value of the octets
   */
  get value(): number {
    const [a, b, c, d] = this.octets;
    return a * 0x1000000 + b * 0x10000 + c * 0x100 + d;
  }

  equals(other: NetAddress): boolean {
    return this.octets.every((octet, i) => octet === other.octets[i]);
  }

  toString(): string {
    return this.octets.join('.');
  }

  toJSON(): string {
    return this.toString();
  }

  // util.inspect shows the same dotted quad
  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return this.toString();
  }
}

export const netAddressCodec: TdfCodec<NetAddress> = {
  type: TdfType.VAR_INT,
  write: (writer, address) => writer.writeU32(address.value),
  read: reader => NetAddress.fromValue(reader.readU32()),
};
