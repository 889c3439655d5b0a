import { describe, it, expect } from 'vitest';

import type { NativeFunction, NativeSurface } from '../surface/surfaceTypes.js';
import { int, opaque, param, pointer, struct, voidType } from '../surface/nativeType.js';
import { exampleSurface } from '../testing/exampleSurface.js';
import { classifySurface } from './classifySurface.js';

function names(fns: NativeFunction[]): string[] {
  return fns.map((f) => f.name);
}

function surfaceOf(functions: NativeFunction[], opaqueTags: string[]): NativeSurface {
  return { library: 'test', functions, structs: [], opaqueTags };
}

describe('classifySurface', () => {
  const classification = classifySurface(exampleSurface());

  it('groups the handle functions into one resource class', () => {
    expect(classification.resources).toHaveLength(1);
    const [calc] = classification.resources;
    expect(calc.tag).toBe('Calculator');
    expect(calc.ctor.name).toBe('calculator_new');
    expect(calc.dtor.name).toBe('calculator_delete');
    expect(calc.dtorConfidence).toBe('convention');
    expect(calc.methods.map((m) => [m.name, m.access])).toEqual([
      ['get_value', 'shared'],
      ['set_value', 'exclusive'],
      ['add', 'exclusive'],
      ['multiply', 'exclusive'],
    ]);
  });

  it('attaches struct functions to their struct', () => {
    expect(classification.structFunctions).toHaveLength(1);
    const [point] = classification.structFunctions;
    expect(point.struct).toBe('Point');
    expect(point.factories.map((f) => [f.fn.name, f.name])).toEqual([['create_point', 'new']]);
    expect(point.methods.map((m) => [m.fn.name, m.name, m.access])).toEqual([['point_distance', 'distance', 'shared']]);
  });

  it('leaves the rest as free functions', () => {
    expect(names(classification.freeFunctions)).toEqual(['add', 'increment_array']);
    expect(classification.diagnostics).toEqual([]);
  });

  it('degrades a handle with two teardown candidates', () => {
    const buf = opaque('Buf');
    const result = classifySurface(
      surfaceOf(
        [
          { name: 'buf_open', params: [], returns: pointer(buf) },
          { name: 'buf_close', params: [param('b', buf, 'mut-pointer')], returns: voidType },
          { name: 'buf_free', params: [param('b', buf, 'mut-pointer')], returns: voidType },
        ],
        ['Buf'],
      ),
    );
    expect(result.resources).toEqual([]);
    expect(result.degradedTags).toEqual(['Buf']);
    expect(names(result.rawHandleFunctions)).toEqual(['buf_open', 'buf_close', 'buf_free']);
    expect(result.diagnostics).toEqual([
      {
        kind: 'AmbiguousLifetime',
        subject: { kind: 'handle', tag: 'Buf' },
        message: '2 destructor candidates for Buf (buf_close, buf_free)',
        hint: 'Expose exactly one void f(Handle*) teardown function; other zero-argument void functions need an extra parameter or a return value.',
      },
    ]);
  });

  it('degrades a handle nothing tears down', () => {
    const widget = opaque('Widget');
    const result = classifySurface(
      surfaceOf(
        [
          { name: 'widget_new', params: [], returns: pointer(widget) },
          { name: 'widget_get', params: [param('w', widget, 'pointer')], returns: int(32) },
          { name: 'widget_set', params: [param('w', widget, 'mut-pointer'), param('v', int(32))], returns: voidType },
        ],
        ['Widget'],
      ),
    );
    expect(result.resources).toEqual([]);
    expect(result.degradedTags).toEqual(['Widget']);
    expect(names(result.rawHandleFunctions)).toEqual(['widget_new', 'widget_get', 'widget_set']);
    expect(result.diagnostics).toEqual([
      {
        kind: 'AmbiguousLifetime',
        subject: { kind: 'handle', tag: 'Widget' },
        message: 'no destructor for Widget: no function takes only the handle and returns void',
        hint: 'Expose exactly one void f(Handle*) teardown function; other zero-argument void functions need an extra parameter or a return value.',
      },
    ]);
  });

  it('binds a mutating struct function as a method only when it returns void', () => {
    const counter = struct('Counter');
    const result = classifySurface({
      library: 'test',
      functions: [
        { name: 'counter_bump', params: [param('c', counter, 'mut-pointer')], returns: voidType },
        { name: 'counter_take', params: [param('c', counter, 'mut-pointer')], returns: int(32) },
        { name: 'counter_peek', params: [param('c', counter, 'pointer')], returns: int(32) },
      ],
      structs: [{ name: 'Counter', fields: [{ name: 'v', type: int(32) }] }],
      opaqueTags: [],
    });
    const [entry] = result.structFunctions;
    expect(entry.methods.map((m) => [m.fn.name, m.access])).toEqual([
      ['counter_bump', 'exclusive'],
      ['counter_peek', 'shared'],
    ]);
    expect(names(result.freeFunctions)).toEqual(['counter_take']);
  });

  it('degrades a handle nothing constructs', () => {
    const db = opaque('Db');
    const result = classifySurface(
      surfaceOf(
        [
          { name: 'db_close', params: [param('db', db, 'mut-pointer')], returns: voidType },
          { name: 'db_count', params: [param('db', db, 'pointer')], returns: int(32) },
        ],
        ['Db'],
      ),
    );
    expect(result.diagnostics.map((d) => d.message)).toEqual([
      'no constructor for Db: no function returns the handle without taking one',
    ]);
  });

  it('calls a teardown without a lifetime word structural', () => {
    const ring = opaque('Ring');
    const result = classifySurface(
      surfaceOf(
        [
          { name: 'ring_make', params: [param('capacity', int(32))], returns: pointer(ring) },
          { name: 'ring_done', params: [param('r', ring, 'mut-pointer')], returns: voidType },
        ],
        ['Ring'],
      ),
    );
    expect(result.resources[0]?.dtorConfidence).toBe('structural');
  });
});
