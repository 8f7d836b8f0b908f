/**
 * Output helpers shared by the commands
 */

import { type InstanceDetails, type Port, bytesToHex, formatInstanceHost } from 'redirector-wire';

export type OutputFormat = 'hex' | 'base64';

export function formatBytes(bytes: Uint8Array, format: OutputFormat): string {
  return format === 'base64' ? Buffer.from(bytes).toString('base64') : bytesToHex(bytes);
}

export function formatInstanceDetails(details: InstanceDetails): string {
  const { host, port } = details.net;
  const kind = host.kind === 'host' ? 'hostname' : 'address';
  return `${formatInstanceHost(host)}:${port} (${kind}, ${details.secure ? 'secure' : 'insecure'})`;
}

/**
 * Parse a port argument. Every u16 value is accepted, including 0.
 */
export function parsePort(text: string): Port | undefined {
  if (!/^\d+$/.test(text)) {
    return undefined;
  }
  const port = parseInt(text, 10);
  return port <= 0xffff ? port : undefined;
}

/**
 * Parse a non-negative decimal integer option
 */
export function parseCount(text: string): number | undefined {
  if (!/^\d+$/.test(text)) {
    return undefined;
  }
  const value = parseInt(text, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
