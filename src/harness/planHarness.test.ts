import { describe, it, expect } from 'vitest';

import type { NativeSurface } from '../surface/surfaceTypes.js';
import { int, param, voidType } from '../surface/nativeType.js';
import { exampleSurface } from '../testing/exampleSurface.js';
import { modelFor } from '../testing/models.js';
import { rustBackend } from '../emit/rust/rustEmitter.js';
import type { HarnessCheck } from './harnessTypes.js';
import { planHarness } from './planHarness.js';

function checkNamed(checks: HarnessCheck[], name: string): HarnessCheck | undefined {
  return checks.find((c) => c.name === name);
}

function annotate(surface: NativeSurface, fnName: string, annotations: NativeSurface['functions'][number]['annotations']): NativeSurface {
  return {
    ...surface,
    functions: surface.functions.map((f) => (f.name === fnName ? { ...f, annotations } : f)),
  };
}

describe('planHarness', () => {
  const plan = planHarness(modelFor(exampleSurface(), rustBackend));

  it('plans one check per function plus the resource checks', () => {
    expect(plan.checks.map((c) => c.name)).toEqual([
      'add_numbers_example',
      'increment_array_example',
      'point_new_smoke',
      'point_distance_example',
      'calculator_rejects_null_handle',
      'calculator_get_value_smoke',
      'calculator_set_value_smoke',
      'calculator_add_smoke',
      'calculator_multiply_smoke',
      'calculator_scenario',
    ]);
    expect(plan.skipped).toEqual([]);
    expect(plan.diagnostics).toEqual([]);
  });

  it('turns @example into argument values and an expected result', () => {
    const check = checkNamed(plan.checks, 'add_numbers_example');
    if (check?.kind !== 'call') throw new Error('expected a call check');
    expect(check.origin).toBe('example');
    expect(check.args.map((a) => a.value)).toEqual([5, 3]);
    expect(check.expect).toEqual({ kind: 'returns', value: 8 });
  });

  it('compares the mutated sequence of a void function', () => {
    const check = checkNamed(plan.checks, 'increment_array_example');
    if (check?.kind !== 'call') throw new Error('expected a call check');
    expect(check.args.map((a) => a.value)).toEqual([[1, 2, 3, 4, 5]]);
    expect(check.expect).toEqual({ kind: 'mutates', target: 0, value: [2, 3, 4, 5, 6] });
  });

  it('takes the receiver of a struct method from the first example argument', () => {
    const check = checkNamed(plan.checks, 'point_distance_example');
    if (check?.kind !== 'call' || check.owner.kind !== 'struct') throw new Error('expected a struct call check');
    expect(check.owner.receiver).toEqual({ x: 3, y: 4 });
    expect(check.args).toEqual([]);
    expect(check.expect).toEqual({ kind: 'returns', value: 25 });
  });

  it('uses representative inputs for smoke checks', () => {
    const check = checkNamed(plan.checks, 'point_new_smoke');
    if (check?.kind !== 'call') throw new Error('expected a call check');
    expect(check.args.map((a) => a.value)).toEqual([1.5, 1.5]);
    expect(check.expect).toEqual({ kind: 'type' });
  });

  it('follows @scenario for the lifecycle check', () => {
    const check = checkNamed(plan.checks, 'calculator_scenario');
    if (check?.kind !== 'lifecycle') throw new Error('expected a lifecycle check');
    expect(check.origin).toBe('example');
    expect(check.ctorArgs.map((a) => a.value)).toEqual([10]);
    expect(check.steps.map((s) => [s.plan.name, s.args.map((a) => a.value), s.expect])).toEqual([
      ['get_value', [], { kind: 'returns', value: 10 }],
      ['add', [5], { kind: 'type' }],
      ['get_value', [], { kind: 'returns', value: 15 }],
      ['multiply', [2], { kind: 'type' }],
      ['get_value', [], { kind: 'returns', value: 30 }],
      ['set_value', [100], { kind: 'type' }],
      ['get_value', [], { kind: 'returns', value: 100 }],
    ]);
  });

  it('constructs method checks with the scenario constructor arguments', () => {
    const check = checkNamed(plan.checks, 'calculator_set_value_smoke');
    if (check?.kind !== 'call' || check.owner.kind !== 'resource') throw new Error('expected a resource call check');
    expect(check.owner.ctorArgs.map((a) => a.value)).toEqual([10]);
    expect(check.args.map((a) => a.value)).toEqual([2]);
  });

  it('reports an example with the wrong arity and falls back to a smoke check', () => {
    const surface = annotate(exampleSurface(), 'add', {
      rename: 'add_numbers',
      examples: [{ callee: 'add_numbers', args: [1], expect: 2 }],
    });
    const p = planHarness(modelFor(surface, rustBackend));
    expect(p.checks[0].name).toBe('add_numbers_smoke');
    expect(p.diagnostics).toEqual([
      {
        kind: 'InvalidAnnotation',
        subject: { kind: 'function', name: 'add' },
        message: 'add_numbers takes 2 argument(s), the annotation passes 1',
        hint: 'Fix the annotation; the function still gets a smoke check.',
        sourceLine: undefined,
      },
    ]);
  });

  it('rejects @example on resource methods', () => {
    const surface = annotate(exampleSurface(), 'calculator_add', {
      examples: [{ callee: 'add', args: [1] }],
    });
    const p = planHarness(modelFor(surface, rustBackend));
    expect(p.diagnostics.map((d) => d.message)).toEqual([
      '@example cannot construct a Calculator; use @scenario on calculator_new',
    ]);
    expect(checkNamed(p.checks, 'calculator_add_smoke')).toBeDefined();
  });

  it('falls back to a smoke lifecycle when the scenario does not start with the constructor', () => {
    const surface = annotate(exampleSurface(), 'calculator_new', {
      scenario: [{ callee: 'get_value', args: [] }],
    });
    const p = planHarness(modelFor(surface, rustBackend));
    expect(p.diagnostics.map((d) => d.message)).toEqual([
      '@scenario must start with calculator_new(...), not get_value',
    ]);
    const lifecycle = checkNamed(p.checks, 'calculator_lifecycle');
    if (lifecycle?.kind !== 'lifecycle') throw new Error('expected a lifecycle check');
    expect(lifecycle.origin).toBe('smoke');
    expect(lifecycle.ctorArgs.map((a) => a.value)).toEqual([2]);
    expect(lifecycle.steps.map((s) => s.plan.name)).toEqual(['get_value', 'set_value', 'add', 'multiply']);
  });

  it('lists functions that need raw addresses as skipped', () => {
    const surface = exampleSurface();
    surface.functions.push({ name: 'buf_fill', params: [param('data', int(8, false), 'mut-pointer')], returns: voidType });
    const p = planHarness(modelFor(surface, rustBackend));
    expect(p.skipped).toEqual([{ symbol: 'buf_fill', reason: 'parameter data needs a raw address' }]);
  });
});
