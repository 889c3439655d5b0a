import type { FloatWidth, IntegerWidth, Mutability, PlainStruct } from '../surface/surfaceTypes.js';

/**
 * - `plain`: copyable data with identical layout on both sides
 * - `opaque`: a handle token, only passed back into native calls
 * - `address`: a raw pointer the consumer must not dereference safely
 */
export type TypeClass = 'plain' | 'opaque' | 'address' | 'void';

export type TargetType = {
  /** Spelling used in raw external declarations. */
  raw: string;
  /** Spelling used in safe wrapper signatures. */
  safe: string;
  class: TypeClass;
  copyable: boolean;
};

export type MapResult = { ok: true; type: TargetType } | { ok: false; reason: string };

/**
 * Spellings one target language uses for each native type shape. The
 * mapper owns recursion and validation; tables only spell.
 */
export interface TargetTypeTable {
  readonly language: string;
  integer(width: IntegerWidth, signed: boolean): { raw: string; safe: string };
  float(width: FloatWidth): { raw: string; safe: string };
  bool(): { raw: string; safe: string };
  void(): { raw: string; safe: string };
  /** Raw pointer to an already-mapped pointee. */
  pointer(to: TargetType, mutability: Mutability): { raw: string; safe: string };
  /** Pointer to `void` (no mapped pointee). */
  voidPointer(mutability: Mutability): { raw: string; safe: string };
  handle(tag: string, mutability: Mutability): { raw: string; safe: string };
  struct(def: PlainStruct): { raw: string; safe: string };
}

export type FieldLayout = {
  name: string;
  offset: number;
  size: number;
  align: number;
};

export type StructLayout = {
  size: number;
  align: number;
  fields: FieldLayout[];
};
