/**
 * Hex helpers for dumping and reading payloads.
 */

/**
 * Convert a byte array to a hex string, optionally with a separator
 * between bytes
 */
export function bytesToHex(bytes: Uint8Array, separator: string = ''): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join(separator);
}

/**
 * Normalize hex input: drops an optional 0x prefix and all whitespace
 */
export function normalizeHex(hex: string): string {
  return hex.replace(/\s+/g, '').replace(/^0x/i, '');
}

/**
 * Validate that a string is valid hex (after normalization)
 */
export function isValidHex(hex: string): boolean {
  const normalized = normalizeHex(hex);
  return normalized.length % 2 === 0 && /^[0-9a-fA-F]*$/.test(normalized);
}

/**
 * Convert a hex string to a byte array
 */
export function hexToBytes(hex: string): Uint8Array {
  const normalized = normalizeHex(hex);
  if (normalized.length % 2 !== 0) {
    throw new Error('Invalid hex string: odd length');
  }
  const invalid = normalized.search(/[^0-9a-fA-F]/);
  if (invalid !== -1) {
    throw new Error(`Invalid hex character at position ${invalid}`);
  }

  const bytes = new Uint8Array(normalized.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(normalized.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
