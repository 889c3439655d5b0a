import type { NativeType } from '../surface/surfaceTypes.js';
import { boolType, float, int, pointer, unsupported, voidType } from '../surface/nativeType.js';

/** Names a source file declares, used to resolve identifiers in type spellings. */
export type DeclaredTypes = {
  structs: ReadonlySet<string>;
  opaque: ReadonlySet<string>;
  /** Alias name to its target spelling (same language as the source). */
  aliases: ReadonlyMap<string, string>;
};

const C_SCALARS: Record<string, NativeType> = {
  int8_t: int(8),
  uint8_t: int(8, false),
  int16_t: int(16),
  uint16_t: int(16, false),
  int32_t: int(32),
  uint32_t: int(32, false),
  int64_t: int(64),
  uint64_t: int(64, false),
  size_t: int('size', false),
  ssize_t: int('size', true),
  ptrdiff_t: int('size', true),
  intptr_t: int('size', true),
  uintptr_t: int('size', false),
  char: int(8, true, 'char'),
  'signed char': int(8),
  'unsigned char': int(8, false),
  short: int(16),
  'unsigned short': int(16, false),
  int: int(32),
  unsigned: int(32, false),
  'long long': int(64),
  'unsigned long long': int(64, false),
  long: int(null, true, 'long'),
  'unsigned long': int(null, false, 'unsigned long'),
  float: float(32),
  double: float(64),
  'long double': float(null, 'long double'),
  bool: boolType,
  _Bool: boolType,
  void: voidType,
};

const RUST_SCALARS: Record<string, NativeType> = {
  i8: int(8),
  u8: int(8, false),
  i16: int(16),
  u16: int(16, false),
  i32: int(32),
  u32: int(32, false),
  i64: int(64),
  u64: int(64, false),
  isize: int('size', true),
  usize: int('size', false),
  f32: float(32),
  f64: float(64),
  bool: boolType,
  c_char: int(8, true, 'c_char'),
  c_schar: int(8),
  c_uchar: int(8, false),
  c_short: int(16),
  c_ushort: int(16, false),
  c_int: int(32),
  c_uint: int(32, false),
  c_long: int(null, true, 'c_long'),
  c_ulong: int(null, false, 'c_ulong'),
  c_longlong: int(64),
  c_ulonglong: int(64, false),
  c_float: float(32),
  c_double: float(64),
  c_void: voidType,
};

const C_QUALIFIERS = new Set(['const', 'volatile', 'restrict', '__restrict', 'struct', 'class', 'static', 'extern', 'inline']);

/** `short int` is `short`, `signed int` is `int`, and so on. */
function normalizeCScalar(words: string[]): string {
  let w = words.filter((x) => x !== 'signed' || words.length === 1 || words.includes('char'));
  if (w.length > 1 && w[w.length - 1] === 'int') w = w.slice(0, -1);
  if (!w.length) return 'int';
  if (w.length === 1 && w[0] === 'signed') return 'int';
  return w.join(' ');
}

function resolveNamed(
  name: string,
  known: DeclaredTypes,
  parse: (spelling: string, seen: Set<string>) => NativeType,
  seen: Set<string>,
): NativeType | undefined {
  if (known.structs.has(name)) return { kind: 'struct', name };
  if (known.opaque.has(name)) return { kind: 'opaque', tag: name };
  const alias = known.aliases.get(name);
  if (alias === undefined || seen.has(name)) return undefined;
  return parse(alias, new Set([...seen, name]));
}

function unsupportedReason(spelling: string): string | undefined {
  if (spelling.includes('&')) return 'references have no C representation';
  if (spelling.includes('[')) return 'arrays must be passed as pointer and length';
  if (spelling.includes('(')) return 'function pointers are not supported';
  if (spelling.includes('<')) return 'templates have no C representation';
  return undefined;
}

/**
 * Parses a C or C++ type spelling with the declarator's pointers but without
 * its name: `const Point *`, `unsigned long long`, `void * const *`.
 */
export function parseCType(spelling: string, known: DeclaredTypes, seen: Set<string> = new Set()): NativeType {
  const t = spelling.replace(/\s+/g, ' ').trim();
  const problem = unsupportedReason(t);
  if (problem) return unsupported(t, problem);

  const firstStar = t.indexOf('*');
  const words = (firstStar === -1 ? t : t.slice(0, firstStar)).split(' ').filter(Boolean);
  if (words.includes('enum')) return unsupported(t, 'enum width is compiler-defined');
  if (words.includes('union')) return unsupported(t, 'unions are not supported');

  const core = words.filter((w) => !C_QUALIFIERS.has(w));
  let base: NativeType | undefined;
  if (core.length === 1 && core[0].includes('::')) {
    const [ns, ...rest] = core[0].split('::');
    const scalar = ns === 'std' && rest.length === 1 ? C_SCALARS[rest[0]] : undefined;
    if (!scalar) return unsupported(t, 'C++ library types have no C representation');
    base = scalar;
  } else {
    base = C_SCALARS[normalizeCScalar(core)];
    if (!base && core.length === 1) {
      base = resolveNamed(core[0], known, (s, next) => parseCType(s, known, next), seen);
    }
  }
  if (!base) return unsupported(t, `unknown type ${core.join(' ') || t}`);

  let type = base;
  let pointeeConst = words.includes('const');
  if (firstStar !== -1) {
    for (const after of t.slice(firstStar).split('*').slice(1)) {
      type = pointer(type, pointeeConst ? 'const' : 'mut');
      pointeeConst = /\bconst\b/.test(after);
    }
  }
  return type;
}

/** Parses a Rust type as written in an `extern "C"` signature. */
export function parseRustType(spelling: string, known: DeclaredTypes, seen: Set<string> = new Set()): NativeType {
  const t = spelling.replace(/\s+/g, ' ').trim();
  if (t === '()' || t === '') return voidType;

  const ptr = t.match(/^\*\s*(const|mut)\s+(.+)$/);
  if (ptr) return pointer(parseRustType(ptr[2], known, seen), ptr[1] === 'const' ? 'const' : 'mut');

  if (t.startsWith('&')) return unsupported(t, 'references have no C representation');
  if (t.startsWith('[')) return unsupported(t, 'arrays must be passed as pointer and length');
  if (t.startsWith('fn') || t.startsWith('extern')) return unsupported(t, 'function pointers are not supported');
  if (t.includes('<')) return unsupported(t, 'generic types have no C representation');
  if (t === '!') return unsupported(t, 'diverging functions cannot be bound');

  const name = t.split('::').pop() ?? t;
  const scalar = RUST_SCALARS[name];
  if (scalar) return scalar;
  const named = resolveNamed(name, known, (s, next) => parseRustType(s, known, next), seen);
  return named ?? unsupported(t, `unknown type ${t}`);
}
