/**
 * TDF tag-value encoding
 */

export {
  TdfType,
  UNION_UNSET,
  GROUP_END,
  GROUP_START_MARKER,
  getTypeName,
  isTdfType,
} from './types.js';

export { ENCODED_TAG_LENGTH, isValidTag, encodeTag, decodeTag } from './tag.js';

export { encodeVarInt, decodeVarInt } from './varint.js';

export type { TdfCodec, Union } from './codec.js';
export { TdfPrimitives, UNION_VALUE_TAG, unionOf } from './codec.js';

export { TdfWriter } from './writer.js';

export type { TdfReaderOptions, TagHeader } from './reader.js';
export { TdfReader, DEFAULT_MAX_LENGTH, DEFAULT_MAX_DEPTH } from './reader.js';

export type { TdfField, TdfNode } from './node.js';

export { stringifyTdf, renderFields, renderNode } from './stringify.js';
