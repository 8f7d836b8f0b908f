/**
 * Discriminant of a network address union. Bytes without a named kind are
 * kept verbatim so codes introduced by a newer peer survive a round trip.
 */

export enum NetworkAddressKind {
  SERVER = 0x0,
  CLIENT = 0x1,
  PAIR = 0x2,
  IP_ADDRESS = 0x3,
  HOSTNAME_ADDRESS = 0x4,
}

export interface UnknownNetworkAddressType {
  readonly kind: 'unknown';
  readonly value: number;
}

export type NetworkAddressType = NetworkAddressKind | UnknownNetworkAddressType;

function isKnownKind(value: number): value is NetworkAddressKind {
  return value >= NetworkAddressKind.SERVER && value <= NetworkAddressKind.HOSTNAME_ADDRESS;
}

export function networkAddressTypeFromValue(value: number): NetworkAddressType {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new RangeError(`Network address type must be a byte: ${value}`);
  }
  return isKnownKind(value) ? value : { kind: 'unknown', value };
}

export function networkAddressTypeValue(type: NetworkAddressType): number {
  return typeof type === 'number' ? type : type.value;
}

export function formatNetworkAddressType(type: NetworkAddressType): string {
  if (typeof type === 'number') {
    return NetworkAddressKind[type];
  }
  return `UNKNOWN(0x${type.value.toString(16).padStart(2, '0')})`;
}
