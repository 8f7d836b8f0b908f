/**
 * Text rendering of TDF payloads for logs and tooling.
 */

import type { TdfField, TdfNode } from './node.js';
import { TdfReader, type TdfReaderOptions } from './reader.js';
import { TdfType } from './types.js';
import { bytesToHex } from '../utils/hex.js';
import { ErrorCode, TdfError } from '../types/errors.js';

const INDENT = '  ';

/**
 * Render every top-level field of a payload, one per line. Groups nest
 * with two spaces of indentation. The whole payload must be consumed.
 */
export function stringifyTdf(data: Uint8Array, options?: TdfReaderOptions): string {
  const reader = new TdfReader(data, options);
  const fields = reader.readFields();
  // readFields stops early only at a stray group terminator
  if (reader.remaining > 0) {
    throw new TdfError(
      ErrorCode.ERR_TRAILING_DATA,
      `Unexpected group end at offset ${reader.position}, ${reader.remaining} bytes unread`
    );
  }
  return renderFields(fields, 0);
}

export function renderFields(fields: readonly TdfField[], depth: number): string {
  return fields
    .map(field => `${INDENT.repeat(depth)}${field.tag}: ${renderNode(field.node, depth)}`)
    .join('\n');
}

export function renderNode(node: TdfNode, depth: number): string {
  switch (node.type) {
    case TdfType.VAR_INT:
    case TdfType.FLOAT:
      return String(node.value);

    case TdfType.STRING:
      return JSON.stringify(node.value);

    case TdfType.BLOB:
      return `blob(${bytesToHex(node.value)})`;

    case TdfType.GROUP:
      if (node.fields.length === 0) {
        return '{}';
      }
      return `{\n${renderFields(node.fields, depth + 1)}\n${INDENT.repeat(depth)}}`;

    case TdfType.LIST:
      return `[${node.items.map(item => renderNode(item, depth)).join(', ')}]`;

    case TdfType.MAP:
      return `{${node.entries
        .map(([key, value]) => `${renderNode(key, depth)}: ${renderNode(value, depth)}`)
        .join(', ')}}`;

    case TdfType.UNION:
      if (node.value === undefined) {
        return 'union(unset)';
      }
      return `union(${node.key}) ${node.value.tag}: ${renderNode(node.value.node, depth)}`;

    case TdfType.VAR_INT_LIST:
      return `[${node.values.join(', ')}]`;

    case TdfType.PAIR:
    case TdfType.TRIPLE:
      return `(${node.values.join(', ')})`;
  }
}
