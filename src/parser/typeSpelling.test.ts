import { describe, it, expect } from 'vitest';

import { boolType, float, int, opaque, pointer, struct, unsupported, voidType } from '../surface/nativeType.js';
import type { DeclaredTypes } from './typeSpelling.js';
import { parseCType, parseRustType } from './typeSpelling.js';

const known: DeclaredTypes = {
  structs: new Set(['Point']),
  opaque: new Set(['Db']),
  aliases: new Map([
    ['real_t', 'double'],
    ['PointRef', 'Point *'],
    ['loop_a', 'loop_b'],
    ['loop_b', 'loop_a'],
  ]),
};

describe('parseCType', () => {
  it('normalizes scalar spellings', () => {
    expect(parseCType('unsigned long long', known)).toEqual(int(64, false));
    expect(parseCType('short int', known)).toEqual(int(16));
    expect(parseCType('signed', known)).toEqual(int(32));
    expect(parseCType('unsigned  int', known)).toEqual(int(32, false));
    expect(parseCType('std::uint32_t', known)).toEqual(int(32, false));
    expect(parseCType('_Bool', known)).toEqual(boolType);
  });

  it('keeps platform-width types without a width', () => {
    expect(parseCType('long', known)).toEqual(int(null, true, 'long'));
    expect(parseCType('long double', known)).toEqual(float(null, 'long double'));
  });

  it('applies const to the pointee it follows', () => {
    expect(parseCType('const char *', known)).toEqual(pointer(int(8, true, 'char'), 'const'));
    expect(parseCType('void * const *', known)).toEqual(pointer(pointer(voidType, 'mut'), 'const'));
    expect(parseCType('struct Point*', known)).toEqual(pointer(struct('Point'), 'mut'));
    expect(parseCType('Db *', known)).toEqual(pointer(opaque('Db'), 'mut'));
  });

  it('resolves typedefs and stops on cycles', () => {
    expect(parseCType('real_t', known)).toEqual(float(64));
    expect(parseCType('PointRef', known)).toEqual(pointer(struct('Point'), 'mut'));
    expect(parseCType('loop_a', known)).toEqual(unsupported('loop_a', 'unknown type loop_a'));
  });

  it('marks what has no C-ABI form', () => {
    expect(parseCType('int &', known)).toEqual(unsupported('int &', 'references have no C representation'));
    expect(parseCType('enum color', known)).toEqual(unsupported('enum color', 'enum width is compiler-defined'));
    expect(parseCType('std::string', known)).toEqual(
      unsupported('std::string', 'C++ library types have no C representation'),
    );
    expect(parseCType('Widget', known)).toEqual(unsupported('Widget', 'unknown type Widget'));
  });
});

describe('parseRustType', () => {
  it('maps primitives and os::raw aliases', () => {
    expect(parseRustType('u64', known)).toEqual(int(64, false));
    expect(parseRustType('std::os::raw::c_int', known)).toEqual(int(32));
    expect(parseRustType('c_long', known)).toEqual(int(null, true, 'c_long'));
    expect(parseRustType('()', known)).toEqual(voidType);
  });

  it('nests raw pointers', () => {
    expect(parseRustType('*const c_char', known)).toEqual(pointer(int(8, true, 'c_char'), 'const'));
    expect(parseRustType('*mut *mut Db', known)).toEqual(pointer(pointer(opaque('Db'), 'mut'), 'mut'));
  });

  it('marks safe-Rust types as unsupported', () => {
    expect(parseRustType('&str', known)).toEqual(unsupported('&str', 'references have no C representation'));
    expect(parseRustType('Option<u8>', known)).toEqual(
      unsupported('Option<u8>', 'generic types have no C representation'),
    );
    expect(parseRustType('!', known)).toEqual(unsupported('!', 'diverging functions cannot be bound'));
  });
});
