import { fileURLToPath } from 'node:url';

import { describe, it, expect } from 'vitest';

import { UnsupportedSourceError } from '../errors.js';
import type { NativeFunction } from '../surface/surfaceTypes.js';
import { boolType, float, int, opaque, param, pointer, struct, voidType } from '../surface/nativeType.js';
import { exampleSurface } from '../testing/exampleSurface.js';
import { detectLanguage, parseNativeSource, parseNativeText } from './index.js';
import { inferVoidHandles } from './inferHandles.js';

const fixture = fileURLToPath(new URL('../../examples/ffi_example.cpp', import.meta.url));

function withoutLines(fn: NativeFunction): NativeFunction {
  const { sourceLine: _line, ...rest } = fn;
  return rest;
}

describe('detectLanguage', () => {
  it('maps extensions to grammars', () => {
    expect(detectLanguage('include/api.h')).toBe('c');
    expect(detectLanguage('Engine.HPP')).toBe('cpp');
    expect(detectLanguage('src/lib.rs')).toBe('rust');
  });

  it('rejects anything else', () => {
    expect(() => detectLanguage('tool.py')).toThrow('tool.py: cannot extract a surface from ".py" files');
    expect(() => detectLanguage('Makefile')).toThrow(UnsupportedSourceError);
  });
});

describe('parseNativeSource', () => {
  it('extracts the extern "C" surface of a C++ file', () => {
    const { surface, diagnostics } = parseNativeSource(fixture);
    expect(diagnostics).toEqual([]);
    expect(surface.source).toBe(fixture);
    expect({
      ...surface,
      source: undefined,
      functions: surface.functions.map(withoutLines),
      structs: surface.structs.map(({ sourceLine: _line, ...rest }) => rest),
    }).toEqual(exampleSurface());
  });

  it('records where each declaration starts', () => {
    const { surface } = parseNativeSource(fixture, { library: 'calc' });
    expect(surface.library).toBe('calc');
    expect(surface.functions[0].sourceLine).toBe(9);
    expect(surface.structs[0].sourceLine).toBe(20);
  });

  it('fails on a missing file', () => {
    expect(() => parseNativeSource('no-such-dir/missing.c')).toThrow('no-such-dir/missing.c: no such file');
  });
});

describe('parseNativeText', () => {
  it('reads C declarations, typedefs and annotations', () => {
    const source = [
      '#include <stdint.h>',
      '',
      'typedef struct Db Db;',
      '',
      'typedef struct {',
      '    int32_t id;',
      '    double score;',
      '} Row;',
      '',
      '// @example db_version() => 3',
      'int32_t db_version(void);',
      'Db* db_open(const char* path);',
      'void db_close(Db* db);',
      'int db_insert(Db* db, const Row* row);',
      'static int helper(int x) { return x; }',
      'int log_line(const char* fmt, ...);',
      'long db_count(const Db* db);',
      '// @rename bad-name',
      'void db_flush(Db* db);',
    ].join('\n');
    const { surface, diagnostics } = parseNativeText(source, 'c', { library: 'db' });

    expect(surface.library).toBe('db');
    expect(surface.opaqueTags).toEqual(['Db']);
    expect(surface.structs.map((s) => [s.name, s.fields])).toEqual([
      [
        'Row',
        [
          { name: 'id', type: int(32) },
          { name: 'score', type: float(64) },
        ],
      ],
    ]);
    expect(surface.functions.map((f) => f.name)).toEqual([
      'db_version',
      'db_open',
      'db_close',
      'db_insert',
      'db_count',
      'db_flush',
    ]);

    const [version, open, , insert, count] = surface.functions.map(withoutLines);
    expect(version).toEqual({
      name: 'db_version',
      params: [],
      returns: int(32),
      annotations: { examples: [{ callee: 'db_version', args: [], expect: 3 }] },
    });
    expect(open).toEqual({
      name: 'db_open',
      params: [param('path', int(8, true, 'char'), 'pointer')],
      returns: pointer(opaque('Db'), 'mut'),
    });
    expect(insert.params).toEqual([param('db', opaque('Db'), 'mut-pointer'), param('row', struct('Row'), 'pointer')]);
    expect(count.returns).toEqual(int(null, true, 'long'));

    expect(diagnostics.map((d) => [d.kind, d.subject, d.sourceLine, d.message])).toEqual([
      [
        'UnmappableType',
        { kind: 'function', name: 'log_line' },
        16,
        'log_line is variadic; its calling convention cannot be declared',
      ],
      [
        'InvalidAnnotation',
        { kind: 'function', name: 'db_flush' },
        19,
        '@rename: "bad-name" is not a snake_case identifier',
      ],
    ]);
  });

  it('reads exported Rust functions and repr(C) structs', () => {
    const source = [
      'use std::os::raw::c_int;',
      '',
      '#[repr(C)]',
      'pub struct Vec2 {',
      '    pub x: f32,',
      '    pub y: f32,',
      '}',
      '',
      'pub struct Engine {',
      '    frames: u64,',
      '}',
      '',
      '/// @example engine_version() => 2',
      '#[no_mangle]',
      'pub extern "C" fn engine_version() -> c_int {',
      '    2',
      '}',
      '',
      '#[no_mangle]',
      'pub extern "C" fn engine_new(capacity: usize) -> *mut Engine {',
      '    Box::into_raw(Box::new(Engine { frames: capacity as u64 }))',
      '}',
      '',
      '#[no_mangle]',
      'pub extern "C" fn engine_frames(engine: *const Engine) -> u64 {',
      '    unsafe { (*engine).frames }',
      '}',
      '',
      '#[no_mangle]',
      'pub extern "C" fn vec2_scale(v: *mut Vec2, by: f32) {}',
      '',
      'fn internal_helper() {}',
      '',
      'pub mod ffi {',
      '    #[no_mangle]',
      '    pub extern "C" fn ffi_tick(mut step: u32) -> bool {',
      '        step > 0',
      '    }',
      '}',
    ].join('\n');
    const { surface, diagnostics } = parseNativeText(source, 'rust');

    expect(diagnostics).toEqual([]);
    expect(surface.library).toBe('native');
    expect(surface.opaqueTags).toEqual(['Engine']);
    expect(surface.structs.map((s) => [s.name, s.fields])).toEqual([
      [
        'Vec2',
        [
          { name: 'x', type: float(32) },
          { name: 'y', type: float(32) },
        ],
      ],
    ]);
    expect(surface.functions.map(withoutLines)).toEqual([
      {
        name: 'engine_version',
        params: [],
        returns: int(32),
        annotations: { examples: [{ callee: 'engine_version', args: [], expect: 2 }] },
      },
      { name: 'engine_new', params: [param('capacity', int('size', false))], returns: pointer(opaque('Engine'), 'mut') },
      { name: 'engine_frames', params: [param('engine', opaque('Engine'), 'pointer')], returns: int(64, false) },
      {
        name: 'vec2_scale',
        params: [param('v', struct('Vec2'), 'mut-pointer'), param('by', float(32))],
        returns: voidType,
      },
      { name: 'ffi_tick', params: [param('step', int(32, false))], returns: boolType },
    ]);
  });
});

describe('inferVoidHandles', () => {
  const voidPtr = pointer(voidType, 'mut');
  const functions: NativeFunction[] = [
    { name: 'db_open', params: [param('path', int(8, true, 'char'), 'pointer')], returns: voidPtr },
    { name: 'db_cursor_open', params: [param('table', int(32))], returns: voidPtr },
    { name: 'db_cursor_next', params: [param('cursor', voidType, 'mut-pointer')], returns: int(32) },
    { name: 'db_close', params: [param('db', voidType, 'mut-pointer')], returns: voidType },
    { name: 'hash_bytes', params: [param('data', voidType, 'pointer'), param('len', int('size', false))], returns: int(64, false) },
  ];

  it('gives each void* family its own tag, longest prefix first', () => {
    const result = inferVoidHandles(functions, new Set(), []);
    expect(result.opaqueTags).toEqual(['Db', 'DbCursor']);
    expect(result.functions[0].returns).toEqual(pointer(opaque('Db'), 'mut'));
    expect(result.functions[1].returns).toEqual(pointer(opaque('DbCursor'), 'mut'));
    expect(result.functions[2].params).toEqual([param('cursor', opaque('DbCursor'), 'mut-pointer')]);
    expect(result.functions[3].params).toEqual([param('db', opaque('Db'), 'mut-pointer')]);
    expect(result.functions[4]).toBe(functions[4]);
  });

  it('leaves families that name a plain struct alone', () => {
    const result = inferVoidHandles(functions.slice(0, 1), new Set(['Db']), []);
    expect(result.functions[0]).toBe(functions[0]);
    expect(result.opaqueTags).toEqual([]);
  });
});
