import type { NativeParam, NativeSurface, NativeType, PlainStruct } from '../surface/surfaceTypes.js';
import { describeType, pointer } from '../surface/nativeType.js';
import type { MapResult, StructLayout, TargetType, TargetTypeTable } from './mapperTypes.js';
import { computeLayout } from './layout.js';

export type TypeMapper = {
  map(type: NativeType, table: TargetTypeTable): MapResult;
  mapParam(p: NativeParam, table: TargetTypeTable): MapResult;
  /** `null` when the struct is bindable, otherwise the reason it is not. */
  structProblem(name: string): string | null;
  struct(name: string): PlainStruct | undefined;
  layoutOf(name: string): StructLayout | null;
};

function ok(spelling: { raw: string; safe: string }, cls: TargetType['class'], copyable: boolean): MapResult {
  return { ok: true, type: { ...spelling, class: cls, copyable } };
}

function fail(reason: string): MapResult {
  return { ok: false, reason };
}

export function createTypeMapper(surface: NativeSurface): TypeMapper {
  const structs = new Map(surface.structs.map((s) => [s.name, s] as const));
  const verdicts = new Map<string, string | null>();
  const stack: string[] = [];

  // `assumes` is the lowest stack index of an enclosing struct a clean verdict
  // took to be bindable; such a verdict is final only once that struct is.
  type Verdict = { problem: string | null; assumes: number };
  const clean: Verdict = { problem: null, assumes: Infinity };
  const bad = (problem: string): Verdict => ({ problem, assumes: Infinity });

  function check(name: string): Verdict {
    const cached = verdicts.get(name);
    if (cached !== undefined) return { problem: cached, assumes: Infinity };

    const def = structs.get(name);
    if (!def) return bad(`unknown struct ${name}`);
    if (stack.includes(name)) return bad(`struct ${name} contains itself by value`);

    const depth = stack.push(name) - 1;
    let problem: string | null = null;
    let assumes = Infinity;
    for (const field of def.fields) {
      const v = fieldCheck(field.type);
      if (v.problem) {
        problem = `field ${name}.${field.name}: ${v.problem}`;
        break;
      }
      assumes = Math.min(assumes, v.assumes);
    }
    stack.pop();

    if (problem || assumes >= depth) verdicts.set(name, problem);
    return problem ? bad(problem) : { problem: null, assumes };
  }

  function structProblem(name: string): string | null {
    return check(name).problem;
  }

  // Field validity does not depend on the target's spellings.
  function fieldCheck(type: NativeType): Verdict {
    switch (type.kind) {
      case 'integer':
        return type.width === null ? bad(noWidth(type)) : clean;
      case 'float':
        return type.width === null ? bad(noWidth(type)) : clean;
      case 'bool':
      case 'opaque':
        return clean;
      case 'void':
        return bad('void is not a field type');
      case 'unsupported':
        return bad(`${type.spelling}: ${type.reason}`);
      case 'struct':
        return check(type.name);
      case 'pointer': {
        const to = type.to;
        if (to.kind === 'void' || to.kind === 'opaque') return clean;
        if (to.kind !== 'struct') return fieldCheck(to);
        if (!structs.has(to.name)) return bad(`unknown struct ${to.name}`);
        // Behind a pointer a struct may refer to itself or to an enclosing struct.
        const index = stack.indexOf(to.name);
        if (index !== -1) return { problem: null, assumes: index };
        const v = check(to.name);
        return v.problem ? bad(`pointer to struct ${to.name}: ${v.problem}`) : v;
      }
    }
  }

  function map(type: NativeType, table: TargetTypeTable): MapResult {
    switch (type.kind) {
      case 'integer':
        if (type.width === null) return fail(noWidth(type));
        return ok(table.integer(type.width, type.signed), 'plain', true);
      case 'float':
        if (type.width === null) return fail(noWidth(type));
        return ok(table.float(type.width), 'plain', true);
      case 'bool':
        return ok(table.bool(), 'plain', true);
      case 'void':
        return ok(table.void(), 'void', true);
      case 'unsupported':
        return fail(`${type.spelling}: ${type.reason}`);
      case 'opaque':
        return ok(table.handle(type.tag, 'mut'), 'opaque', false);
      case 'struct': {
        const problem = structProblem(type.name);
        const def = structs.get(type.name);
        if (problem || !def) return fail(problem ?? `unknown struct ${type.name}`);
        return ok(table.struct(def), 'plain', true);
      }
      case 'pointer': {
        const to = type.to;
        if (to.kind === 'opaque') return ok(table.handle(to.tag, type.mutability), 'opaque', false);
        if (to.kind === 'void') return ok(table.voidPointer(type.mutability), 'address', true);
        const inner = map(to, table);
        if (!inner.ok) return fail(`pointer to ${describeType(to)}: ${inner.reason}`);
        return ok(table.pointer(inner.type, type.mutability), 'address', true);
      }
    }
  }

  function mapParam(p: NativeParam, table: TargetTypeTable): MapResult {
    if (p.passing === 'value') return map(p.type, table);
    return map(pointer(p.type, p.passing === 'pointer' ? 'const' : 'mut'), table);
  }

  function layoutOf(name: string): StructLayout | null {
    if (structProblem(name)) return null;
    return computeLayout(name, (n) => structs.get(n));
  }

  return {
    map,
    mapParam,
    structProblem,
    struct: (name) => structs.get(name),
    layoutOf,
  };
}

function noWidth(type: NativeType): string {
  return `${describeType(type)} has no fixed width on the native ABI`;
}
