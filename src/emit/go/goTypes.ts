import type { TargetTypeTable } from '../../mapper/mapperTypes.js';
import type { IntegerWidth, NativeParam, NativeType } from '../../surface/surfaceTypes.js';
import { safeIdentifier, splitWords, toCamel, toPascal } from '../../classify/naming.js';

// Keywords plus the predeclared names generated code relies on.
export const GO_RESERVED: ReadonlySet<string> = new Set([
  'break', 'case', 'chan', 'const', 'continue', 'default', 'defer', 'else', 'fallthrough', 'for',
  'func', 'go', 'goto', 'if', 'import', 'interface', 'map', 'package', 'range', 'return', 'select',
  'struct', 'switch', 'type', 'var',
  'append', 'bool', 'byte', 'cap', 'copy', 'error', 'false', 'float32', 'float64', 'int', 'int8',
  'int16', 'int32', 'int64', 'len', 'make', 'new', 'nil', 'panic', 'rune', 'string', 'true',
  'uint', 'uint8', 'uint16', 'uint32', 'uint64', 'uintptr', 'unsafe', 'runtime', 'sync', 'errors',
  'fmt', 'math', 'reflect', 'got', 'want', 'err', 't',
]);

const GO_KEYWORDS = new Set([
  'break', 'case', 'chan', 'const', 'continue', 'default', 'defer', 'else', 'fallthrough', 'for',
  'func', 'go', 'goto', 'if', 'import', 'interface', 'map', 'package', 'range', 'return', 'select',
  'struct', 'switch', 'type', 'var',
]);

function cIntName(width: IntegerWidth, signed: boolean): string {
  if (width === 'size') return signed ? 'ptrdiff_t' : 'size_t';
  return `${signed ? '' : 'u'}int${width}_t`;
}

function goIntName(width: IntegerWidth, signed: boolean): string {
  if (width === 'size') return signed ? 'int' : 'uint';
  return `${signed ? '' : 'u'}int${width}`;
}

export function goTypeName(name: string): string {
  return toPascal(name);
}

export function goIdent(name: string, extraReserved: Iterable<string> = []): string {
  const reserved = new Set([...GO_RESERVED, ...extraReserved]);
  return safeIdentifier(toCamel(name) || name, reserved);
}

/** Lower-case initial of a type name, the usual Go receiver. */
export function goReceiver(typeName: string): string {
  return typeName.charAt(0).toLowerCase();
}

/** cgo renames C fields that collide with Go keywords. */
export function cgoFieldName(name: string): string {
  return GO_KEYWORDS.has(name) ? `_${name}` : name;
}

export function goPackageName(library: string): string {
  const name = splitWords(library).join('');
  return /^[a-z]/.test(name) ? name : `lib${name}`;
}

/** C spelling used in the cgo preamble; structs are typedef'd to their name. */
export function cTypeName(type: NativeType): string {
  switch (type.kind) {
    case 'integer':
      return typeof type.width === 'number' || type.width === 'size'
        ? cIntName(type.width, type.signed)
        : (type.spelling ?? 'long');
    case 'float':
      return type.width === 32 ? 'float' : 'double';
    case 'bool':
      return 'bool';
    case 'void':
      return 'void';
    case 'opaque':
      return type.tag;
    case 'struct':
      return type.name;
    case 'pointer':
      return `${type.mutability === 'const' ? 'const ' : ''}${cTypeName(type.to)}*`;
    case 'unsupported':
      return type.spelling;
  }
}

export function cParam(p: NativeParam): string {
  const base = cTypeName(p.type);
  switch (p.passing) {
    case 'value':
      return `${base} ${p.name}`;
    case 'pointer':
      return `const ${base}* ${p.name}`;
    case 'mut-pointer':
      return `${base}* ${p.name}`;
  }
}

/** `raw` is the cgo spelling (`C.int32_t`), `safe` the Go spelling. */
export const goTypes: TargetTypeTable = {
  language: 'go',
  integer(width, signed) {
    return { raw: `C.${cIntName(width, signed)}`, safe: goIntName(width, signed) };
  },
  float(width) {
    return width === 32 ? { raw: 'C.float', safe: 'float32' } : { raw: 'C.double', safe: 'float64' };
  },
  bool() {
    return { raw: 'C.bool', safe: 'bool' };
  },
  void() {
    return { raw: '', safe: '' };
  },
  pointer(to) {
    return { raw: `*${to.raw}`, safe: 'unsafe.Pointer' };
  },
  voidPointer() {
    return { raw: 'unsafe.Pointer', safe: 'unsafe.Pointer' };
  },
  handle(tag) {
    return { raw: `*C.${tag}`, safe: 'unsafe.Pointer' };
  },
  struct(def) {
    return { raw: `C.${def.name}`, safe: goTypeName(def.name) };
  },
};

export function fromCName(typeName: string): string {
  const go = goTypeName(typeName);
  return `${go.charAt(0).toLowerCase()}${go.slice(1)}FromC`;
}

export function fromRawName(tag: string): string {
  return fromCName(tag).replace(/FromC$/, 'FromRaw');
}

export function goFactoryName(struct: string, name: string): string {
  return name === 'new' ? `New${goTypeName(struct)}` : `${goTypeName(struct)}${toPascal(name)}`;
}

export function goImports(code: string, candidates: string[]): string {
  const used = candidates.filter((pkg) => new RegExp(`\\b${pkg}\\.`).test(code));
  if (!used.length) return '';
  if (used.length === 1) return `import "${used[0]}"`;
  return ['import (', ...used.map((p) => `\t"${p}"`), ')'].join('\n');
}
