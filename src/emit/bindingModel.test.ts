import { describe, it, expect } from 'vitest';

import type { NativeFunction, NativeSurface } from '../surface/surfaceTypes.js';
import { int, opaque, param, pointer, struct, voidType } from '../surface/nativeType.js';
import { exampleSurface } from '../testing/exampleSurface.js';
import { modelFor } from '../testing/models.js';
import { rustBackend } from './rust/rustEmitter.js';

function withFunctions(extra: NativeFunction[]): NativeSurface {
  const surface = exampleSurface();
  return { ...surface, functions: [...surface.functions, ...extra] };
}

describe('buildBindingModel', () => {
  const model = modelFor(exampleSurface(), rustBackend);

  it('binds every function of a conforming surface', () => {
    expect(model.diagnostics).toEqual([]);
    expect(model.rawFunctions.map((r) => r.fn.name)).toEqual(exampleSurface().functions.map((f) => f.name));
    expect(model.opaqueTags).toEqual(['Calculator']);
  });

  it('folds pointer and length into one slice parameter', () => {
    const inc = model.freeFunctions.find((f) => f.fn.name === 'increment_array');
    expect(inc?.params).toHaveLength(1);
    const [slice] = inc?.params ?? [];
    expect(slice?.kind).toBe('slice');
    if (slice?.kind !== 'slice') return;
    expect(slice.name).toBe('array');
    expect(slice.mutable).toBe(true);
    expect(slice.element.safe).toBe('i32');
    expect(slice.length.native.name).toBe('length');
    expect(inc?.returnKind).toBe('void');
    expect(inc?.unsafe).toBe(false);
  });

  it('uses the rename for free functions', () => {
    expect(model.freeFunctions.map((f) => f.name)).toEqual(['add_numbers', 'increment_array']);
  });

  it('plans struct factories and methods', () => {
    const [point] = model.structs;
    expect(point.def.name).toBe('Point');
    expect(point.layout?.size).toBe(8);
    expect(point.factories.map((f) => f.name)).toEqual(['new']);
    expect(point.methods.map((m) => [m.name, m.receiver?.access, m.params.length])).toEqual([['distance', 'shared', 0]]);
  });

  it('plans resources with their receiver access', () => {
    const [calc] = model.resources;
    expect(calc.tag).toBe('Calculator');
    expect(calc.ctor.name).toBe('new');
    expect(calc.ctor.returnKind).toBe('raw');
    expect(calc.dtor.fn.name).toBe('calculator_delete');
    expect(calc.methods.map((m) => [m.name, m.receiver?.access, m.params.map((p) => p.kind)])).toEqual([
      ['get_value', 'shared', []],
      ['set_value', 'exclusive', ['value']],
      ['add', 'exclusive', ['value']],
      ['multiply', 'exclusive', ['value']],
    ]);
  });

  it('passes other instances of a resource as resource parameters', () => {
    const calc = opaque('Calculator');
    const m = modelFor(
      withFunctions([
        {
          name: 'calculator_copy_from',
          params: [param('dst', calc, 'mut-pointer'), param('src', calc, 'pointer')],
          returns: voidType,
        },
      ]),
      rustBackend,
    );
    const copy = m.resources[0].methods.find((x) => x.name === 'copy_from');
    expect(copy?.params).toMatchObject([{ kind: 'resource', name: 'src', tag: 'Calculator', mutable: false }]);
  });

  it('keeps unmatched pointers raw and marks the wrapper unsafe', () => {
    const m = modelFor(
      withFunctions([{ name: 'buf_fill', params: [param('data', int(8, false), 'mut-pointer')], returns: voidType }]),
      rustBackend,
    );
    const fill = m.freeFunctions.find((f) => f.fn.name === 'buf_fill');
    expect(fill?.params.map((p) => p.kind)).toEqual(['raw']);
    expect(fill?.unsafe).toBe(true);
  });

  it('skips functions with unmappable types and says why', () => {
    const m = modelFor(
      withFunctions([{ name: 'tally', params: [param('n', int(null, true, 'long'))], returns: int(32), sourceLine: 40 }]),
      rustBackend,
    );
    expect(m.rawFunctions.some((r) => r.fn.name === 'tally')).toBe(false);
    expect(m.diagnostics).toEqual([
      {
        kind: 'UnmappableType',
        subject: { kind: 'function', name: 'tally' },
        message: 'parameter n: long has no fixed width on the native ABI',
        hint: 'Change the native signature to C-compatible fixed-width types or extend the mapping table.',
        target: 'rust',
        sourceLine: 40,
      },
    ]);
  });

  it('drops a resource whose constructor cannot be mapped', () => {
    const sess = opaque('Session');
    const m = modelFor(
      withFunctions([
        { name: 'session_open', params: [param('flags', int(null, false, 'unsigned long'))], returns: pointer(sess) },
        { name: 'session_close', params: [param('s', sess, 'mut-pointer')], returns: voidType },
      ]),
      rustBackend,
    );
    expect(m.resources.map((r) => r.tag)).toEqual(['Calculator']);
    expect(m.diagnostics.map((d) => d.message)).toEqual([
      'parameter flags: unsigned long has no fixed width on the native ABI',
      'Session is not bound: its constructor cannot be mapped',
    ]);
  });

  it('skips a struct that points to an unbindable struct', () => {
    const m = modelFor(
      {
        library: 'test',
        functions: [],
        structs: [
          {
            name: 'Holder',
            fields: [
              { name: 'inner', type: pointer(struct('Bad')) },
              { name: 'x', type: int(32) },
            ],
          },
          { name: 'Bad', fields: [{ name: 'v', type: int(null, true, 'long') }] },
        ],
        opaqueTags: [],
      },
      rustBackend,
    );
    expect(m.structs).toEqual([]);
    expect(m.diagnostics.map((d) => [d.kind, d.subject, d.message])).toEqual([
      [
        'UnmappableType',
        { kind: 'struct', name: 'Holder' },
        'field Holder.inner: pointer to struct Bad: field Bad.v: long has no fixed width on the native ABI',
      ],
      ['UnmappableType', { kind: 'struct', name: 'Bad' }, 'field Bad.v: long has no fixed width on the native ABI'],
    ]);
  });
});
