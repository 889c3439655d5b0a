import type {
  FloatWidth,
  IntegerWidth,
  Mutability,
  NativeFunction,
  NativeParam,
  NativeType,
  Passing,
} from './surfaceTypes.js';

export const voidType: NativeType = { kind: 'void' };
export const boolType: NativeType = { kind: 'bool' };

export function int(width: IntegerWidth | null, signed = true, spelling?: string): NativeType {
  return spelling ? { kind: 'integer', width, signed, spelling } : { kind: 'integer', width, signed };
}

export function float(width: FloatWidth | null, spelling?: string): NativeType {
  return spelling ? { kind: 'float', width, spelling } : { kind: 'float', width };
}

export function pointer(to: NativeType, mutability: Mutability = 'mut'): NativeType {
  return { kind: 'pointer', to, mutability };
}

export function opaque(tag: string): NativeType {
  return { kind: 'opaque', tag };
}

export function struct(name: string): NativeType {
  return { kind: 'struct', name };
}

export function unsupported(spelling: string, reason: string): NativeType {
  return { kind: 'unsupported', spelling, reason };
}

export function param(name: string, type: NativeType, passing: Passing = 'value'): NativeParam {
  return { name, type, passing };
}

/**
 * Folds an outermost pointer into the parameter's passing mode, so that
 * `const Point* p` becomes `{ type: Point, passing: 'pointer' }`.
 */
export function paramFromType(name: string, type: NativeType): NativeParam {
  if (type.kind === 'pointer') {
    return { name, type: type.to, passing: type.mutability === 'const' ? 'pointer' : 'mut-pointer' };
  }
  return { name, type, passing: 'value' };
}

export function isScalar(type: NativeType): boolean {
  return type.kind === 'integer' || type.kind === 'float' || type.kind === 'bool';
}

/** Tag of the handle a parameter carries, if any. */
export function paramHandleTag(p: NativeParam): string | undefined {
  if (p.type.kind === 'opaque') return p.type.tag;
  return undefined;
}

/** Tag of the handle a type denotes when returned (`Calculator*` or a by-value handle). */
export function handleTagOfType(type: NativeType): string | undefined {
  if (type.kind === 'opaque') return type.tag;
  if (type.kind === 'pointer' && type.to.kind === 'opaque') return type.to.tag;
  return undefined;
}

export function returnsHandle(fn: NativeFunction, tag: string): boolean {
  return handleTagOfType(fn.returns) === tag;
}

export function typesEqual(a: NativeType, b: NativeType): boolean {
  return describeType(a) === describeType(b);
}

/** Largest count a fixed-width integer narrower than 64 bits holds; undefined when every length fits. */
export function lengthLimit(type: NativeType): number | undefined {
  if (type.kind !== 'integer' || typeof type.width !== 'number' || type.width === 64) return undefined;
  return 2 ** (type.signed ? type.width - 1 : type.width) - 1;
}

/** C-like spelling used in diagnostics and reports. */
export function describeType(type: NativeType): string {
  switch (type.kind) {
    case 'integer': {
      if (type.width === null) return type.spelling ?? (type.signed ? 'long' : 'unsigned long');
      if (type.width === 'size') return type.signed ? 'ptrdiff_t' : 'size_t';
      return `${type.signed ? '' : 'u'}int${type.width}_t`;
    }
    case 'float':
      if (type.width === null) return type.spelling ?? 'long double';
      return type.width === 32 ? 'float' : 'double';
    case 'bool':
      return 'bool';
    case 'pointer':
      return `${type.mutability === 'const' ? 'const ' : ''}${describeType(type.to)}*`;
    case 'opaque':
      return `${type.tag}`;
    case 'struct':
      return `struct ${type.name}`;
    case 'void':
      return 'void';
    case 'unsupported':
      return type.spelling;
  }
}

export function describeParam(p: NativeParam): string {
  const base = describeType(p.type);
  switch (p.passing) {
    case 'value':
      return `${base} ${p.name}`;
    case 'pointer':
      return `const ${base}* ${p.name}`;
    case 'mut-pointer':
      return `${base}* ${p.name}`;
  }
}

export function describeSignature(fn: NativeFunction): string {
  return `${describeType(fn.returns)} ${fn.name}(${fn.params.map(describeParam).join(', ')})`;
}
