/**
 * Details about an instance. The redirector encodes these when sending a
 * client on to its server; a relay decodes them from a received response.
 */

import { type InstanceNet, instanceNetCodec } from './instance-net.js';
import { NetworkAddressKind, networkAddressTypeValue } from './network-address-type.js';
import { TdfPrimitives, UNION_VALUE_TAG, unionOf } from '../tdf/codec.js';
import { TdfReader, type TdfReaderOptions } from '../tdf/reader.js';
import { TdfType } from '../tdf/types.js';
import { TdfWriter } from '../tdf/writer.js';
import { MissingTagError } from '../types/errors.js';

export interface InstanceDetails {
  /** The networking information for the instance */
  readonly net: InstanceNet;
  /** Whether the host requires a secure connection (SSLv3) */
  readonly secure: boolean;
}

export const ADDRESS_TAG = 'ADDR';
export const SECURE_TAG = 'SECU';
export const DNS_EXEMPT_TAG = 'XDNS';

const addressUnion = unionOf(instanceNetCodec);

export function writeInstanceDetails(writer: TdfWriter, details: InstanceDetails): void {
  writer.tagUnionStart(ADDRESS_TAG, networkAddressTypeValue(NetworkAddressKind.SERVER));
  writer.tagValue(UNION_VALUE_TAG, instanceNetCodec, details.net);

  writer.tagBool(SECURE_TAG, details.secure);
  // Always false; never read back
  writer.tagBool(DNS_EXEMPT_TAG, false);
}

/**
 * @throws {MissingTagError} when the ADDR union is unset
 */
export function readInstanceDetails(reader: TdfReader): InstanceDetails {
  const address = reader.tag(ADDRESS_TAG, addressUnion);
  if (!address.set) {
    throw new MissingTagError(ADDRESS_TAG, TdfType.UNION);
  }
  const secure = reader.tag(SECURE_TAG, TdfPrimitives.bool);
  return { net: address.value, secure };
}

export function encodeInstanceDetails(details: InstanceDetails): Uint8Array {
  const writer = new TdfWriter();
  writeInstanceDetails(writer, details);
  return writer.toBytes();
}

export function decodeInstanceDetails(data: Uint8Array, options?: TdfReaderOptions): InstanceDetails {
  return readInstanceDetails(new TdfReader(data, options));
}
