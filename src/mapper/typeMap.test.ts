import { describe, it, expect } from 'vitest';

import type { NativeSurface } from '../surface/surfaceTypes.js';
import { float, int, opaque, param, pointer, struct, unsupported, voidType } from '../surface/nativeType.js';
import { rustTypes } from '../emit/rust/rustTypes.js';
import { goTypes } from '../emit/go/goTypes.js';
import { tsTypes } from '../emit/typescript/tsTypes.js';
import { createTypeMapper } from './typeMap.js';

function surfaceWith(structs: NativeSurface['structs']): NativeSurface {
  return { library: 'test', functions: [], structs, opaqueTags: [] };
}

const point = {
  name: 'Point',
  fields: [
    { name: 'x', type: float(32) },
    { name: 'y', type: float(32) },
  ],
};

describe('createTypeMapper', () => {
  const mapper = createTypeMapper(surfaceWith([point]));

  it('spells fixed-width scalars through the target table', () => {
    expect(mapper.map(int(32), rustTypes)).toEqual({
      ok: true,
      type: { raw: 'i32', safe: 'i32', class: 'plain', copyable: true },
    });
    expect(mapper.map(int('size', false), goTypes)).toEqual({
      ok: true,
      type: { raw: 'C.size_t', safe: 'uint', class: 'plain', copyable: true },
    });
    expect(mapper.map(int(64, false), tsTypes)).toEqual({
      ok: true,
      type: { raw: 'uint64_t', safe: 'bigint', class: 'plain', copyable: true },
    });
  });

  it('refuses integers without a fixed width', () => {
    expect(mapper.map(int(null, true, 'long'), rustTypes)).toEqual({
      ok: false,
      reason: 'long has no fixed width on the native ABI',
    });
    expect(mapper.map(float(null, 'long double'), goTypes)).toEqual({
      ok: false,
      reason: 'long double has no fixed width on the native ABI',
    });
  });

  it('maps handles as non-copyable opaque tokens', () => {
    expect(mapper.map(pointer(opaque('Calculator'), 'const'), rustTypes)).toEqual({
      ok: true,
      type: { raw: '*const Calculator', safe: '*const ffi::Calculator', class: 'opaque', copyable: false },
    });
  });

  it('maps data pointers as addresses', () => {
    const r = mapper.map(pointer(voidType), rustTypes);
    expect(r.ok && r.type).toEqual({ raw: '*mut c_void', safe: '*mut c_void', class: 'address', copyable: true });

    const p = mapper.map(pointer(int(32), 'const'), goTypes);
    expect(p.ok && p.type.raw).toBe('*C.int32_t');
  });

  it('carries the reason of an unsupported type', () => {
    const ref = unsupported('int&', 'references have no C representation');
    expect(mapper.map(ref, rustTypes)).toEqual({ ok: false, reason: 'int&: references have no C representation' });
    expect(mapper.map(pointer(ref), rustTypes)).toEqual({
      ok: false,
      reason: 'pointer to int&: int&: references have no C representation',
    });
  });

  it('maps parameters with their passing mode', () => {
    const r = mapper.mapParam(param('p', struct('Point'), 'pointer'), rustTypes);
    expect(r.ok && r.type.raw).toBe('*const Point');
    const t = mapper.mapParam(param('p', struct('Point'), 'mut-pointer'), tsTypes);
    expect(t.ok && t.type.raw).toBe('Point *');
  });

  it('maps structs whose fields all map', () => {
    const r = mapper.map(struct('Point'), goTypes);
    expect(r.ok && r.type).toEqual({ raw: 'C.Point', safe: 'Point', class: 'plain', copyable: true });
    expect(mapper.structProblem('Point')).toBeNull();
  });
});

describe('struct problems', () => {
  it('names the first field that cannot be mapped', () => {
    const mapper = createTypeMapper(
      surfaceWith([{ name: 'Stat', fields: [{ name: 'count', type: int(32) }, { name: 'n', type: int(null, true, 'long') }] }]),
    );
    expect(mapper.structProblem('Stat')).toBe('field Stat.n: long has no fixed width on the native ABI');
    expect(mapper.map(struct('Stat'), rustTypes)).toEqual({
      ok: false,
      reason: 'field Stat.n: long has no fixed width on the native ABI',
    });
  });

  it('rejects a struct that contains itself by value', () => {
    const mapper = createTypeMapper(surfaceWith([{ name: 'Node', fields: [{ name: 'next', type: struct('Node') }] }]));
    expect(mapper.structProblem('Node')).toBe('field Node.next: struct Node contains itself by value');
  });

  it('accepts a struct that points to itself', () => {
    const mapper = createTypeMapper(
      surfaceWith([{ name: 'Node', fields: [{ name: 'next', type: pointer(struct('Node')) }, { name: 'v', type: int(32) }] }]),
    );
    expect(mapper.structProblem('Node')).toBeNull();
    const r = mapper.map(pointer(struct('Node')), rustTypes);
    expect(r.ok && r.type.raw).toBe('*mut Node');
  });

  it('rejects a struct that points to an unbindable one', () => {
    const mapper = createTypeMapper(
      surfaceWith([
        { name: 'Holder', fields: [{ name: 'inner', type: pointer(struct('Bad')) }, { name: 'x', type: int(32) }] },
        { name: 'Bad', fields: [{ name: 'v', type: int(null, true, 'long') }] },
      ]),
    );
    const reason = 'field Holder.inner: pointer to struct Bad: field Bad.v: long has no fixed width on the native ABI';
    expect(mapper.structProblem('Holder')).toBe(reason);
    expect(mapper.map(struct('Holder'), rustTypes)).toEqual({ ok: false, reason });
  });

  it('judges pointer cycles the same in either order', () => {
    const structs = [
      { name: 'Child', fields: [{ name: 'parent', type: pointer(struct('Parent')) }, { name: 'n', type: int(null, true, 'long') }] },
      { name: 'Parent', fields: [{ name: 'child', type: pointer(struct('Child')) }] },
    ];
    const childFirst = createTypeMapper(surfaceWith(structs));
    expect(childFirst.structProblem('Child')).toBe('field Child.n: long has no fixed width on the native ABI');
    expect(childFirst.structProblem('Parent')).toBe(
      'field Parent.child: pointer to struct Child: field Child.n: long has no fixed width on the native ABI',
    );

    const parentFirst = createTypeMapper(surfaceWith(structs));
    expect(parentFirst.structProblem('Parent')).toBe(
      'field Parent.child: pointer to struct Child: field Child.n: long has no fixed width on the native ABI',
    );
  });

  it('accepts mutually pointing structs', () => {
    const mapper = createTypeMapper(
      surfaceWith([
        { name: 'Left', fields: [{ name: 'right', type: pointer(struct('Right')) }] },
        { name: 'Right', fields: [{ name: 'left', type: pointer(struct('Left')) }, { name: 'v', type: int(32) }] },
      ]),
    );
    expect(mapper.structProblem('Right')).toBeNull();
    expect(mapper.structProblem('Left')).toBeNull();
    const r = mapper.map(struct('Left'), rustTypes);
    expect(r.ok).toBe(true);
  });

  it('reports unknown structs', () => {
    const mapper = createTypeMapper(surfaceWith([]));
    expect(mapper.structProblem('Ghost')).toBe('unknown struct Ghost');
  });
});
