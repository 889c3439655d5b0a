import { describe, it, expect } from 'vitest';

import type { NativeSurface } from './surfaceTypes.js';
import { float, int, param, struct, voidType } from './nativeType.js';
import { validateSurface } from './validateSurface.js';
import { fingerprintSurface } from './fingerprint.js';
import { exampleSurface } from '../testing/exampleSurface.js';

const point = { name: 'Point', fields: [{ name: 'x', type: float(32) }] };

describe('validateSurface', () => {
  it('passes a conforming surface through unchanged', () => {
    const surface = exampleSurface();
    const result = validateSurface(surface);
    expect(result.diagnostics).toEqual([]);
    expect(result.surface.functions).toHaveLength(surface.functions.length);
  });

  it('keeps the first of two functions with the same name', () => {
    const surface: NativeSurface = {
      library: 'dup',
      functions: [
        { name: 'tick', params: [], returns: int(32), sourceLine: 3 },
        { name: 'tick', params: [param('n', int(32))], returns: int(32), sourceLine: 9 },
      ],
      structs: [],
      opaqueTags: [],
    };
    const result = validateSurface(surface);
    expect(result.surface.functions).toEqual([surface.functions[0]]);
    expect(result.diagnostics).toEqual([
      {
        kind: 'ConventionViolation',
        subject: { kind: 'function', name: 'tick' },
        message: 'duplicate symbol tick; only the first declaration is bound',
        hint: 'Exported C symbols must be unique per native artifact.',
        sourceLine: 9,
      },
    ]);
  });

  it('skips functions that mutate a struct and also return one', () => {
    const surface: NativeSurface = {
      library: 'geo',
      functions: [
        { name: 'point_scale', params: [param('p', struct('Point'), 'mut-pointer')], returns: struct('Point') },
        { name: 'point_reset', params: [param('p', struct('Point'), 'mut-pointer')], returns: voidType },
      ],
      structs: [point],
      opaqueTags: [],
    };
    const result = validateSurface(surface);
    expect(result.surface.functions.map((f) => f.name)).toEqual(['point_reset']);
    expect(result.diagnostics.map((d) => d.message)).toEqual([
      'point_scale takes a struct by mutable pointer and also returns a struct by value',
    ]);
  });

  it('keeps the first declaration of a struct', () => {
    const surface: NativeSurface = {
      library: 'geo',
      functions: [],
      structs: [point, { name: 'Point', fields: [] }],
      opaqueTags: [],
    };
    const result = validateSurface(surface);
    expect(result.surface.structs).toEqual([point]);
    expect(result.diagnostics[0].subject).toEqual({ kind: 'struct', name: 'Point' });
  });
});

describe('fingerprintSurface', () => {
  it('ignores source line numbers', () => {
    const a = exampleSurface();
    const b = exampleSurface();
    b.functions = b.functions.map((fn, i) => ({ ...fn, sourceLine: i * 10 }));
    expect(fingerprintSurface(a)).toBe(fingerprintSurface(b));
  });

  it('changes with the library name and with signatures', () => {
    const base = fingerprintSurface(exampleSurface());
    expect(fingerprintSurface({ ...exampleSurface(), library: 'other' })).not.toBe(base);

    const changed = exampleSurface();
    changed.functions[0] = { ...changed.functions[0], returns: int(64) };
    expect(fingerprintSurface(changed)).not.toBe(base);
  });

  it('is a sha256 hex digest', () => {
    expect(fingerprintSurface(exampleSurface())).toMatch(/^[0-9a-f]{64}$/);
  });
});
