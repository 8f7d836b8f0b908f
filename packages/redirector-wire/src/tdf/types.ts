/**
 * TDF value types. The type is stored in the fourth byte of every field
 * header, after the three packed tag bytes.
 */
export enum TdfType {
  VAR_INT = 0x0,
  STRING = 0x1,
  BLOB = 0x2,
  GROUP = 0x3,
  LIST = 0x4,
  MAP = 0x5,
  UNION = 0x6,
  VAR_INT_LIST = 0x7,
  PAIR = 0x8,
  TRIPLE = 0x9,
  FLOAT = 0xa,
}

/** Union discriminant marking a union with no value */
export const UNION_UNSET = 0x7f;

/** Byte closing a group */
export const GROUP_END = 0x00;

/** Optional byte some peers place at the start of a group */
export const GROUP_START_MARKER = 0x02;

const TYPE_NAMES: Record<TdfType, string> = {
  [TdfType.VAR_INT]: 'VarInt',
  [TdfType.STRING]: 'String',
  [TdfType.BLOB]: 'Blob',
  [TdfType.GROUP]: 'Group',
  [TdfType.LIST]: 'List',
  [TdfType.MAP]: 'Map',
  [TdfType.UNION]: 'Union',
  [TdfType.VAR_INT_LIST]: 'VarIntList',
  [TdfType.PAIR]: 'Pair',
  [TdfType.TRIPLE]: 'Triple',
  [TdfType.FLOAT]: 'Float',
};

/**
 * Get the display name of a value type
 */
export function getTypeName(type: TdfType): string {
  return TYPE_NAMES[type];
}

export function isTdfType(value: number): value is TdfType {
  return Number.isInteger(value) && value >= TdfType.VAR_INT && value <= TdfType.FLOAT;
}
