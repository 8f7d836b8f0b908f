/**
 * Generic TDF value tree, produced by TdfReader.readNode for payloads
 * whose schema is not known up front.
 */

import type { TdfType } from './types.js';

export interface TdfField {
  readonly tag: string;
  readonly node: TdfNode;
}

export type TdfNode =
  | { readonly type: TdfType.VAR_INT; readonly value: number }
  | { readonly type: TdfType.STRING; readonly value: string }
  | { readonly type: TdfType.BLOB; readonly value: Uint8Array }
  | { readonly type: TdfType.GROUP; readonly fields: readonly TdfField[] }
  | { readonly type: TdfType.LIST; readonly elementType: TdfType; readonly items: readonly TdfNode[] }
  | {
      readonly type: TdfType.MAP;
      readonly keyType: TdfType;
      readonly valueType: TdfType;
      readonly entries: readonly (readonly [TdfNode, TdfNode])[];
    }
  | { readonly type: TdfType.UNION; readonly key: number; readonly value?: TdfField }
  | { readonly type: TdfType.VAR_INT_LIST; readonly values: readonly number[] }
  | { readonly type: TdfType.PAIR; readonly values: readonly [number, number] }
  | { readonly type: TdfType.TRIPLE; readonly values: readonly [number, number, number] }
  | { readonly type: TdfType.FLOAT; readonly value: number };
