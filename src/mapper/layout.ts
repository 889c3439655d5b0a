import type { NativeType, PlainStruct } from '../surface/surfaceTypes.js';
import type { FieldLayout, StructLayout } from './mapperTypes.js';

type SizeAlign = { size: number; align: number };

function alignUp(n: number, align: number): number {
  return Math.ceil(n / align) * align;
}

/**
 * C layout of a struct whose fields all have a fixed width. Returns null when
 * any field is pointer-sized, since its size then depends on the target.
 */
export function computeLayout(
  name: string,
  lookup: (name: string) => PlainStruct | undefined,
): StructLayout | null {
  const def = lookup(name);
  if (!def) return null;

  const fields: FieldLayout[] = [];
  let offset = 0;
  let maxAlign = 1;

  for (const field of def.fields) {
    const sa = sizeAlignOf(field.type, lookup);
    if (!sa) return null;
    offset = alignUp(offset, sa.align);
    fields.push({ name: field.name, offset, size: sa.size, align: sa.align });
    offset += sa.size;
    maxAlign = Math.max(maxAlign, sa.align);
  }

  return { size: alignUp(offset, maxAlign), align: maxAlign, fields };
}

function sizeAlignOf(
  type: NativeType,
  lookup: (name: string) => PlainStruct | undefined,
): SizeAlign | null {
  switch (type.kind) {
    case 'integer':
      if (type.width === null || type.width === 'size') return null;
      return { size: type.width / 8, align: type.width / 8 };
    case 'float':
      if (type.width === null) return null;
      return { size: type.width / 8, align: type.width / 8 };
    case 'bool':
      return { size: 1, align: 1 };
    case 'struct': {
      const nested = computeLayout(type.name, lookup);
      return nested ? { size: nested.size, align: nested.align } : null;
    }
    default:
      return null;
  }
}
