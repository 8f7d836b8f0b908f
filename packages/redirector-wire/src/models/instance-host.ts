/**
 * Host part of an instance address: either a hostname or an IPv4 address.
 */

import { NetAddress, netAddressCodec } from './net-address.js';
import { TdfPrimitives } from '../tdf/codec.js';
import type { TdfReader } from '../tdf/reader.js';
import type { TdfWriter } from '../tdf/writer.js';

export type InstanceHost =
  | { readonly kind: 'host'; readonly host: string }
  | { readonly kind: 'address'; readonly address: NetAddress };

export const HOST_TAG = 'HOST';
export const IP_TAG = 'IP';

/**
 * Choose the variant for a configured host. Text that parses as an IPv4
 * literal is always an address, never a hostname.
 */
export function parseInstanceHost(text: string): InstanceHost {
  const address = NetAddress.tryParse(text);
  if (address !== undefined) {
    return { kind: 'address', address };
  }
  return { kind: 'host', host: text };
}

/**
 * Text form used to connect: the hostname, or the canonical dotted quad
 */
export function formatInstanceHost(host: InstanceHost): string {
  return host.kind === 'host' ? host.host : host.address.toString();
}

export function instanceHostsEqual(a: InstanceHost, b: InstanceHost): boolean {
  if (a.kind === 'host') {
    return b.kind === 'host' && a.host === b.host;
  }
  return b.kind === 'address' && a.address.equals(b.address);
}

/**
 * Writes HOST or IP, never both
 */
export function writeInstanceHost(writer: TdfWriter, host: InstanceHost): void {
  if (host.kind === 'host') {
    writer.tagStr(HOST_TAG, host.host);
  } else {
    writer.tagValue(IP_TAG, netAddressCodec, host.address);
  }
}

/**
 * The presence of HOST decides the variant; without it IP is required
 */
export function readInstanceHost(reader: TdfReader): InstanceHost {
  const host = reader.tryTag(HOST_TAG, TdfPrimitives.str);
  if (host !== undefined) {
    return { kind: 'host', host };
  }
  return { kind: 'address', address: reader.tag(IP_TAG, netAddressCodec) };
}
