import type { TargetTypeTable } from '../../mapper/mapperTypes.js';
import type { IntegerWidth } from '../../surface/surfaceTypes.js';
import { safeIdentifier, toPascal, toSnake } from '../../classify/naming.js';

export const RUST_RESERVED: ReadonlySet<string> = new Set([
  'as', 'async', 'await', 'box', 'break', 'const', 'continue', 'crate', 'dyn', 'else', 'enum',
  'extern', 'false', 'fn', 'for', 'if', 'impl', 'in', 'let', 'loop', 'match', 'mod', 'move',
  'mut', 'pub', 'ref', 'return', 'self', 'static', 'struct', 'super', 'trait', 'true', 'try',
  'type', 'unsafe', 'use', 'where', 'while', 'yield',
]);

function intName(width: IntegerWidth, signed: boolean): string {
  if (width === 'size') return signed ? 'isize' : 'usize';
  return `${signed ? 'i' : 'u'}${width}`;
}

/**
 * Raw spellings live inside `mod ffi`, where handle tags name the opaque
 * marker types; safe spellings are written at the crate level.
 */
export const rustTypes: TargetTypeTable = {
  language: 'rust',
  integer(width, signed) {
    const t = intName(width, signed);
    return { raw: t, safe: t };
  },
  float(width) {
    const t = `f${width}`;
    return { raw: t, safe: t };
  },
  bool() {
    return { raw: 'bool', safe: 'bool' };
  },
  void() {
    return { raw: '()', safe: '()' };
  },
  pointer(to, mutability) {
    const q = mutability === 'const' ? 'const' : 'mut';
    return { raw: `*${q} ${to.raw}`, safe: `*${q} ${to.safe}` };
  },
  voidPointer(mutability) {
    const t = `*${mutability === 'const' ? 'const' : 'mut'} c_void`;
    return { raw: t, safe: t };
  },
  handle(tag, mutability) {
    const q = mutability === 'const' ? 'const' : 'mut';
    return { raw: `*${q} ${tag}`, safe: `*${q} ffi::${tag}` };
  },
  struct(def) {
    return { raw: def.name, safe: def.name };
  },
};

export function rustIdent(name: string): string {
  return safeIdentifier(toSnake(name) || name, RUST_RESERVED);
}

/** Name of the owning wrapper for a handle tag. */
export function rustResourceName(tag: string): string {
  return toPascal(tag);
}
