/**
 * Redirector instance models
 */

export type { Octets } from './net-address.js';
export { NetAddress, netAddressCodec } from './net-address.js';

export type { NetworkAddressType, UnknownNetworkAddressType } from './network-address-type.js';
export {
  NetworkAddressKind,
  networkAddressTypeFromValue,
  networkAddressTypeValue,
  formatNetworkAddressType,
} from './network-address-type.js';

export type { InstanceHost } from './instance-host.js';
export {
  HOST_TAG,
  IP_TAG,
  parseInstanceHost,
  formatInstanceHost,
  instanceHostsEqual,
  writeInstanceHost,
  readInstanceHost,
} from './instance-host.js';

export type { InstanceNet, Port } from './instance-net.js';
export {
  PORT_TAG,
  createInstanceNet,
  instanceNetsEqual,
  instanceNetCodec,
} from './instance-net.js';

export type { InstanceDetails } from './instance-details.js';
export {
  ADDRESS_TAG,
  SECURE_TAG,
  DNS_EXEMPT_TAG,
  writeInstanceDetails,
  readInstanceDetails,
  encodeInstanceDetails,
  decodeInstanceDetails,
} from './instance-details.js';

export type { ClientProfile } from './instance-request.js';
export {
  SDK_VERSION_TAG,
  BUILD_TIME_TAG,
  CLIENT_TAG,
  CLIENT_TYPE_TAG,
  SKU_TAG,
  CLIENT_VERSION_TAG,
  DIRTY_SDK_VERSION_TAG,
  ENVIRONMENT_TAG,
  FINGERPRINT_TAG,
  LOCALE_TAG,
  NAME_TAG,
  PLATFORM_TAG,
  PROFILE_TAG,
  CLIENT_PROFILE,
  encodeLocale,
  decodeLocale,
  writeInstanceRequest,
  encodeInstanceRequest,
} from './instance-request.js';
