/**
 * Networking information for an instance: host and port, framed as a
 * TDF group.
 */

import {
  type InstanceHost,
  instanceHostsEqual,
  parseInstanceHost,
  readInstanceHost,
  writeInstanceHost,
} from './instance-host.js';
import { type TdfCodec, TdfPrimitives } from '../tdf/codec.js';
import { TdfType } from '../tdf/types.js';

/** Ports are always u16 */
export type Port = number;

export interface InstanceNet {
  readonly host: InstanceHost;
  readonly port: Port;
}

export const PORT_TAG = 'PORT';

/**
 * Create the networking information from a configured host and port
 */
export function createInstanceNet(host: string, port: Port): InstanceNet {
  if (!Number.isInteger(port) || port < 0 || port > 0xffff) {
    throw new RangeError(`Invalid port number: ${port}`);
  }
  return { host: parseInstanceHost(host), port };
}

export function instanceNetsEqual(a: InstanceNet, b: InstanceNet): boolean {
  return a.port === b.port && instanceHostsEqual(a.host, b.host);
}

export const instanceNetCodec: TdfCodec<InstanceNet> = {
  type: TdfType.GROUP,
  write(writer, net) {
    writeInstanceHost(writer, net.host);
    writer.tagU16(PORT_TAG, net.port);
    writer.tagGroupEnd();
  },
  read(reader) {
    reader.readGroupStart();
    const host = readInstanceHost(reader);
    const port = reader.tag(PORT_TAG, TdfPrimitives.u16);
    // Terminator always follows the port
    reader.readGroupEnd();
    return { host, port };
  },
};
