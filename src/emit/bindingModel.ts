import type {
  NativeFunction,
  NativeParam,
  NativeSurface,
  NativeType,
  PlainStruct,
} from '../surface/surfaceTypes.js';
import type { MapResult, StructLayout, TargetType, TargetTypeTable } from '../mapper/mapperTypes.js';
import { createTypeMapper } from '../mapper/typeMap.js';
import type { Access, Classification } from '../classify/classifyTypes.js';
import { toSnake } from '../classify/naming.js';
import type { Diagnostic } from '../report/diagnostics.js';
import { functionSubject, handleSubject, structSubject } from '../report/diagnostics.js';
import type { TargetLanguage } from './emitTypes.js';

export type MappedParam = { native: NativeParam; type: TargetType };

export type RawFunction = {
  fn: NativeFunction;
  params: MappedParam[];
  returns: TargetType;
};

export type WrapperParam =
  | { kind: 'value'; name: string; param: MappedParam }
  | { kind: 'struct-ref'; name: string; param: MappedParam; struct: string; mutable: boolean }
  | {
      kind: 'slice';
      name: string;
      pointer: MappedParam;
      length: MappedParam;
      element: TargetType;
      elementNative: NativeType;
      mutable: boolean;
    }
  | { kind: 'resource'; name: string; param: MappedParam; tag: string; mutable: boolean }
  | { kind: 'raw'; name: string; param: MappedParam };

export type ReturnKind = 'void' | 'value' | 'raw';

export type WrapperPlan = {
  fn: NativeFunction;
  raw: RawFunction;
  /** Target-neutral snake_case name. */
  name: string;
  /** Present for methods: the first native parameter, bound to the instance. */
  receiver?: { param: MappedParam; access: Access };
  params: WrapperParam[];
  returns: TargetType;
  returnNative: NativeType;
  returnKind: ReturnKind;
  /** Some parameter is still a raw address or handle. */
  unsafe: boolean;
};

export type StructFieldPlan = { name: string; native: NativeType; type: TargetType };

export type StructPlan = {
  def: PlainStruct;
  type: TargetType;
  fields: StructFieldPlan[];
  layout: StructLayout | null;
  factories: WrapperPlan[];
  methods: WrapperPlan[];
};

export type ResourcePlan = {
  tag: string;
  ctor: WrapperPlan;
  dtor: RawFunction;
  dtorConfidence: 'convention' | 'structural';
  methods: WrapperPlan[];
};

export type BindingModel = {
  target: TargetLanguage;
  library: string;
  fingerprint: string;
  source?: string;
  /** Every bound native symbol, in declaration order. */
  rawFunctions: RawFunction[];
  structs: StructPlan[];
  resources: ResourcePlan[];
  /** Free functions, including unsafe ones over degraded handle tags. */
  freeFunctions: WrapperPlan[];
  opaqueTags: string[];
  diagnostics: Diagnostic[];
};

export type BuildModelInput = {
  surface: NativeSurface;
  classification: Classification;
  fingerprint: string;
  target: TargetLanguage;
  types: TargetTypeTable;
};

const LENGTH_NAME = /^(len|length|size|count|n|num[a-z0-9_]*|[a-z0-9_]+_(len|length|size|count)|[a-z0-9_]*[a-z0-9](Len|Length|Size|Count))$/;

function isSliceElement(type: NativeType): boolean {
  if (type.kind === 'integer') return typeof type.width === 'number';
  if (type.kind === 'float') return type.width !== null;
  return false;
}

function isLengthParam(p: NativeParam): boolean {
  return (
    p.passing === 'value' &&
    p.type.kind === 'integer' &&
    p.type.width !== null &&
    LENGTH_NAME.test(p.name)
  );
}

/** Orders structs so that every by-value field type precedes its container. */
function byDependency(plans: StructPlan[]): StructPlan[] {
  const byName = new Map(plans.map((p) => [p.def.name, p] as const));
  const seen = new Set<string>();
  const ordered: StructPlan[] = [];
  const visit = (p: StructPlan): void => {
    if (seen.has(p.def.name)) return;
    seen.add(p.def.name);
    for (const f of p.def.fields) {
      const dep = f.type.kind === 'struct' ? byName.get(f.type.name) : undefined;
      if (dep) visit(dep);
    }
    ordered.push(p);
  };
  plans.forEach(visit);
  return ordered;
}

function expectMapped(r: MapResult, what: string): TargetType {
  if (!r.ok) throw new Error(`internal: ${what} failed to map after validation: ${r.reason}`);
  return r.type;
}

/**
 * Plans the bindings for one target: maps every type through the target's
 * table, skips what cannot be mapped (with diagnostics), and shapes safe
 * wrapper signatures.
 */
export function buildBindingModel(input: BuildModelInput): BindingModel {
  const { surface, classification, target, types } = input;
  const mapper = createTypeMapper(surface);
  const diagnostics: Diagnostic[] = [];

  const structs: StructPlan[] = [];
  const structPlans = new Map<string, StructPlan>();
  for (const def of surface.structs) {
    const problem = mapper.structProblem(def.name);
    if (problem) {
      diagnostics.push({
        kind: 'UnmappableType',
        subject: structSubject(def.name),
        message: problem,
        hint: 'Use fixed-width field types (int32_t, uint64_t, float, ...) or extend the mapping table.',
        target,
        sourceLine: def.sourceLine,
      });
      continue;
    }
    const plan: StructPlan = {
      def,
      type: expectMapped(mapper.map({ kind: 'struct', name: def.name }, types), `struct ${def.name}`),
      fields: def.fields.map((f) => ({
        name: f.name,
        native: f.type,
        type: expectMapped(mapper.map(f.type, types), `field ${def.name}.${f.name}`),
      })),
      layout: mapper.layoutOf(def.name),
      factories: [],
      methods: [],
    };
    structs.push(plan);
    structPlans.set(def.name, plan);
  }
  structs.splice(0, structs.length, ...byDependency(structs));

  const rawByFn = new Map<NativeFunction, RawFunction>();
  function rawFor(fn: NativeFunction): RawFunction | undefined {
    const cached = rawByFn.get(fn);
    if (cached) return cached;

    const params: MappedParam[] = [];
    for (const p of fn.params) {
      const r = mapper.mapParam(p, types);
      if (!r.ok) return unmappable(fn, `parameter ${p.name}: ${r.reason}`);
      params.push({ native: p, type: r.type });
    }
    const ret = mapper.map(fn.returns, types);
    if (!ret.ok) return unmappable(fn, `return type: ${ret.reason}`);

    const raw: RawFunction = { fn, params, returns: ret.type };
    rawByFn.set(fn, raw);
    return raw;
  }

  const reported = new Set<NativeFunction>();
  function unmappable(fn: NativeFunction, reason: string): undefined {
    if (!reported.has(fn)) {
      reported.add(fn);
      diagnostics.push({
        kind: 'UnmappableType',
        subject: functionSubject(fn.name),
        message: reason,
        hint: 'Change the native signature to C-compatible fixed-width types or extend the mapping table.',
        target,
        sourceLine: fn.sourceLine,
      });
    }
    return undefined;
  }

  // A resource is only emitted when both ends of its lifetime can be bound.
  const viable = classification.resources.filter((r) => {
    const ctor = rawFor(r.ctor);
    const dtor = rawFor(r.dtor);
    if (ctor && dtor) return true;
    diagnostics.push({
      kind: 'UnmappableType',
      subject: handleSubject(r.tag),
      message: `${r.tag} is not bound: its ${ctor ? 'destructor' : 'constructor'} cannot be mapped`,
      target,
    });
    return false;
  });
  const resourceTags = new Set(viable.map((r) => r.tag));

  function plan(fn: NativeFunction, name: string, access?: Access): WrapperPlan | undefined {
    const raw = rawFor(fn);
    if (!raw) return undefined;

    const start = access ? 1 : 0;
    const params: WrapperParam[] = [];
    for (let i = start; i < raw.params.length; i++) {
      const mp = raw.params[i];
      const p = mp.native;
      const pname = toSnake(p.name) || `arg${i}`;

      if (p.type.kind === 'opaque') {
        if (resourceTags.has(p.type.tag)) {
          params.push({ kind: 'resource', name: pname, param: mp, tag: p.type.tag, mutable: p.passing !== 'pointer' });
        } else {
          params.push({ kind: 'raw', name: pname, param: mp });
        }
        continue;
      }

      if (p.passing !== 'value' && isSliceElement(p.type)) {
        const next = raw.params[i + 1];
        if (next && isLengthParam(next.native)) {
          params.push({
            kind: 'slice',
            name: pname,
            pointer: mp,
            length: next,
            element: expectMapped(mapper.map(p.type, types), `element of ${fn.name}.${p.name}`),
            elementNative: p.type,
            mutable: p.passing === 'mut-pointer',
          });
          i++;
          continue;
        }
      }

      if (p.passing !== 'value' && p.type.kind === 'struct' && structPlans.has(p.type.name)) {
        params.push({
          kind: 'struct-ref',
          name: pname,
          param: mp,
          struct: p.type.name,
          mutable: p.passing === 'mut-pointer',
        });
        continue;
      }

      if (p.passing === 'value' && p.type.kind !== 'pointer') {
        params.push({ kind: 'value', name: pname, param: mp });
        continue;
      }

      params.push({ kind: 'raw', name: pname, param: mp });
    }

    const ret = fn.returns;
    const returnKind: ReturnKind =
      ret.kind === 'void' ? 'void' : ret.kind === 'pointer' || ret.kind === 'opaque' ? 'raw' : 'value';

    return {
      fn,
      raw,
      name,
      receiver: access ? { param: raw.params[0], access } : undefined,
      params,
      returns: raw.returns,
      returnNative: ret,
      returnKind,
      unsafe: params.some((p) => p.kind === 'raw'),
    };
  }

  const resources: ResourcePlan[] = [];
  for (const r of viable) {
    const ctor = plan(r.ctor, 'new');
    const dtor = rawFor(r.dtor);
    if (!ctor || !dtor) continue;
    const methods: WrapperPlan[] = [];
    for (const m of r.methods) {
      const planned = plan(m.fn, m.name, m.access);
      if (planned) methods.push(planned);
    }
    resources.push({ tag: r.tag, ctor, dtor, dtorConfidence: r.dtorConfidence, methods });
  }

  for (const sf of classification.structFunctions) {
    const sp = structPlans.get(sf.struct);
    if (!sp) {
      for (const f of [...sf.factories, ...sf.methods]) {
        unmappable(f.fn, `struct ${sf.struct} cannot be bound`);
      }
      continue;
    }
    for (const f of sf.factories) {
      const planned = plan(f.fn, f.name);
      if (planned) sp.factories.push(planned);
    }
    for (const m of sf.methods) {
      const planned = plan(m.fn, m.name, m.access);
      if (planned) sp.methods.push(planned);
    }
  }

  const freeFunctions: WrapperPlan[] = [];
  const free = new Set([...classification.freeFunctions, ...classification.rawHandleFunctions]);
  for (const fn of surface.functions) {
    if (!free.has(fn)) continue;
    const planned = plan(fn, fn.annotations?.rename ?? toSnake(fn.name));
    if (planned) freeFunctions.push(planned);
  }

  const bound = new Set<NativeFunction>([
    ...resources.flatMap((r) => [r.ctor.fn, r.dtor.fn, ...r.methods.map((m) => m.fn)]),
    ...structs.flatMap((s) => [...s.factories, ...s.methods].map((p) => p.fn)),
    ...freeFunctions.map((p) => p.fn),
  ]);
  const rawFunctions = surface.functions
    .filter((fn) => bound.has(fn))
    .map((fn) => rawByFn.get(fn))
    .filter((r): r is RawFunction => r !== undefined);

  const opaqueTags: string[] = [];
  const collectTag = (t: NativeType): void => {
    if (t.kind === 'pointer') collectTag(t.to);
    else if (t.kind === 'opaque' && !opaqueTags.includes(t.tag)) opaqueTags.push(t.tag);
  };
  for (const raw of rawFunctions) {
    collectTag(raw.fn.returns);
    raw.fn.params.forEach((p) => collectTag(p.type));
  }
  for (const s of structs) s.fields.forEach((f) => collectTag(f.native));

  return {
    target,
    library: surface.library,
    fingerprint: input.fingerprint,
    source: surface.source,
    rawFunctions,
    structs,
    resources,
    freeFunctions,
    opaqueTags,
    diagnostics,
  };
}
