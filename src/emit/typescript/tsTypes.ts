import type { TargetTypeTable } from '../../mapper/mapperTypes.js';
import type { IntegerWidth, NativeType } from '../../surface/surfaceTypes.js';
import { safeIdentifier, toCamel, toPascal } from '../../classify/naming.js';

export const TS_RESERVED: ReadonlySet<string> = new Set([
  'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default', 'delete', 'do',
  'else', 'enum', 'export', 'extends', 'false', 'finally', 'for', 'function', 'if', 'import', 'in',
  'instanceof', 'new', 'null', 'return', 'super', 'switch', 'this', 'throw', 'true', 'try',
  'typeof', 'var', 'void', 'while', 'with', 'yield', 'let', 'static', 'implements', 'interface',
  'package', 'private', 'protected', 'public', 'await', 'arguments', 'eval',
  // names the generated module binds itself
  'native', 'lib', 'handle', 'self', 'expect',
]);

function koffiInt(width: IntegerWidth, signed: boolean): string {
  if (width === 'size') return signed ? 'intptr_t' : 'size_t';
  return `${signed ? '' : 'u'}int${width}_t`;
}

export function tsIdent(name: string): string {
  return safeIdentifier(toCamel(name) || name, TS_RESERVED);
}

export function tsResourceName(tag: string): string {
  return toPascal(tag);
}

/** Member name for a neutral wrapper name; constructors become `create`. */
export function tsMemberName(name: string): string {
  return name === 'new' ? 'create' : tsIdent(name);
}

/** Typed array that backs a sequence of `element`, or undefined when there is none. */
export function typedArrayName(element: NativeType): string | undefined {
  if (element.kind === 'float') return element.width === 32 ? 'Float32Array' : element.width === 64 ? 'Float64Array' : undefined;
  if (element.kind !== 'integer' || typeof element.width !== 'number') return undefined;
  const prefix = element.signed ? 'Int' : 'Uint';
  return element.width === 64 ? `Big${prefix}64Array` : `${prefix}${element.width}Array`;
}

/** `raw` is the koffi type name, `safe` the TypeScript type. */
export const tsTypes: TargetTypeTable = {
  language: 'typescript',
  integer(width, signed) {
    return { raw: koffiInt(width, signed), safe: width === 64 ? 'bigint' : 'number' };
  },
  float(width) {
    return { raw: width === 32 ? 'float' : 'double', safe: 'number' };
  },
  bool() {
    return { raw: 'bool', safe: 'boolean' };
  },
  void() {
    return { raw: 'void', safe: 'void' };
  },
  pointer(to) {
    return { raw: `${to.raw} *`, safe: 'RawPointer' };
  },
  voidPointer() {
    return { raw: 'void *', safe: 'RawPointer' };
  },
  handle(tag) {
    return { raw: `${tag} *`, safe: 'RawPointer' };
  },
  struct(def) {
    return { raw: def.name, safe: def.name };
  },
};
