/**
 * Redirector GetServerInstance request: a constant client identity sent
 * to satisfy the peer's handshake.
 */

import { TdfWriter } from '../tdf/writer.js';

export const SDK_VERSION_TAG = 'BSDK';
export const BUILD_TIME_TAG = 'BTIM';
export const CLIENT_TAG = 'CLNT';
export const CLIENT_TYPE_TAG = 'CLTP';
export const SKU_TAG = 'CSKU';
export const CLIENT_VERSION_TAG = 'CVER';
export const DIRTY_SDK_VERSION_TAG = 'DSDK';
export const ENVIRONMENT_TAG = 'ENV';
export const FINGERPRINT_TAG = 'FPID';
export const LOCALE_TAG = 'LOC';
export const NAME_TAG = 'NAME';
export const PLATFORM_TAG = 'PLAT';
export const PROFILE_TAG = 'PROF';

export interface ClientProfile {
  readonly sdkVersion: string;
  readonly buildTime: string;
  readonly client: string;
  readonly clientType: number;
  readonly sku: string;
  readonly clientVersion: string;
  readonly dirtySdkVersion: string;
  readonly environment: string;
  readonly locale: number;
  readonly name: string;
  readonly platform: string;
  readonly profile: string;
}

/**
 * Pack a four character locale (e.g. "enNZ") into its u32 code
 */
export function encodeLocale(locale: string): number {
  if (!/^[\x20-\x7e]{4}$/.test(locale)) {
    throw new RangeError(`Locale must be four printable ASCII characters: ${JSON.stringify(locale)}`);
  }
  let value = 0;
  for (let i = 0; i < 4; i++) {
    value = value * 0x100 + locale.charCodeAt(i);
  }
  return value;
}

export function decodeLocale(value: number): string {
  return String.fromCharCode(
    (value >>> 24) & 0xff,
    (value >>> 16) & 0xff,
    (value >>> 8) & 0xff,
    value & 0xff
  );
}

export const CLIENT_PROFILE: ClientProfile = Object.freeze({
  sdkVersion: '3.15.6.0',
  buildTime: 'Dec 21 2012 12:47:10',
  client: 'MassEffect3-pc',
  clientType: 0,
  sku: '134845',
  clientVersion: '05427.124',
  dirtySdkVersion: '8.14.7.1',
  environment: 'prod',
  locale: encodeLocale('enNZ'),
  name: 'masseffect-3-pc',
  platform: 'Windows',
  profile: 'standardSecure_v3',
});

export function writeInstanceRequest(writer: TdfWriter): void {
  const profile = CLIENT_PROFILE;
  writer.tagStr(SDK_VERSION_TAG, profile.sdkVersion);
  writer.tagStr(BUILD_TIME_TAG, profile.buildTime);
  writer.tagStr(CLIENT_TAG, profile.client);
  writer.tagU8(CLIENT_TYPE_TAG, profile.clientType);
  writer.tagStr(SKU_TAG, profile.sku);
  writer.tagStr(CLIENT_VERSION_TAG, profile.clientVersion);
  writer.tagStr(DIRTY_SDK_VERSION_TAG, profile.dirtySdkVersion);
  writer.tagStr(ENVIRONMENT_TAG, profile.environment);
  // Allowed by the protocol, unused by this client
  writer.tagUnionUnset(FINGERPRINT_TAG);
  writer.tagU32(LOCALE_TAG, profile.locale);
  writer.tagStr(NAME_TAG, profile.name);
  writer.tagStr(PLATFORM_TAG, profile.platform);
  writer.tagStr(PROFILE_TAG, profile.profile);
}

export function encodeInstanceRequest(): Uint8Array {
  const writer = new TdfWriter();
  writeInstanceRequest(writer);
  return writer.toBytes();
}
