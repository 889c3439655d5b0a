import type { ExampleValue, NativeType } from '../../surface/surfaceTypes.js';
import type { BindingModel, ResourcePlan, WrapperPlan } from '../bindingModel.js';
import type { EmittedDecl } from '../emitTypes.js';
import type { CallCheck, Expectation, HarnessArg, HarnessPlan, LifecycleCheck, NullHandleCheck } from '../../harness/harnessTypes.js';
import { indent, joinBlocks } from '../sourceText.js';
import { tsIdent, tsMemberName, tsResourceName, typedArrayName } from './tsTypes.js';

const IND = '  ';

type Ctx = {
  model: BindingModel;
  /** Names imported from the generated module. */
  bindings: Set<string>;
  runtime: Set<string>;
  locals: Set<string>;
};

function local(ctx: Ctx, base: string): string {
  let name = tsIdent(base);
  for (let i = 2; ctx.locals.has(name); i++) name = `${tsIdent(base)}${i}`;
  ctx.locals.add(name);
  return name;
}

function literal(ctx: Ctx, type: NativeType, v: ExampleValue): string {
  if (type.kind === 'integer' && typeof v === 'number') return type.width === 64 ? `${v}n` : String(v);
  if (type.kind === 'float' && typeof v === 'number') return String(v);
  if (type.kind === 'bool' && typeof v === 'boolean') return String(v);
  if (type.kind === 'struct' && v !== null && typeof v === 'object' && !Array.isArray(v)) {
    const plan = ctx.model.structs.find((s) => s.def.name === type.name);
    if (plan) {
      const fields = plan.fields.map((f) => `${f.name}: ${literal(ctx, f.native, v[f.name])}`);
      return `{ ${fields.join(', ')} }`;
    }
  }
  throw new Error(`cannot render ${JSON.stringify(v)} as a TypeScript value`);
}

function arrayLiteral(ctx: Ctx, element: NativeType, v: ExampleValue): string {
  if (!Array.isArray(v)) throw new Error(`expected a sequence, got ${JSON.stringify(v)}`);
  return `[${v.map((x) => literal(ctx, element, x)).join(', ')}]`;
}

/** Appends `const` bindings for arguments the callee may write through; returns the call arguments. */
function bindArgs(ctx: Ctx, args: HarnessArg[], body: string[]): { args: string[]; names: Map<number, string> } {
  const names = new Map<number, string>();
  const rendered = args.map(({ param: p, value }, i) => {
    switch (p.kind) {
      case 'value':
        return literal(ctx, p.param.native.type, value);
      case 'struct-ref': {
        const n = local(ctx, p.name);
        names.set(i, n);
        body.push(`const ${n}: ${p.struct} = ${literal(ctx, { kind: 'struct', name: p.struct }, value)};`);
        ctx.bindings.add(p.struct);
        return n;
      }
      case 'slice': {
        const n = local(ctx, p.name);
        names.set(i, n);
        const array = typedArrayName(p.elementNative) ?? 'Array';
        body.push(`const ${n} = ${array}.from(${arrayLiteral(ctx, p.elementNative, value)});`);
        return n;
      }
      case 'resource':
      case 'raw':
        throw new Error(`parameter ${p.name} cannot be synthesised`);
    }
  });
  return { args: rendered, names };
}

function typeofName(type: NativeType): string | undefined {
  switch (type.kind) {
    case 'integer':
      return type.width === 64 ? 'bigint' : 'number';
    case 'float':
      return 'number';
    case 'bool':
      return 'boolean';
    case 'struct':
      return 'object';
    default:
      return undefined;
  }
}

function expectLines(
  ctx: Ctx,
  plan: WrapperPlan,
  call: string,
  expect: Expectation,
  names: Map<number, string>,
  receiverVar?: string,
): string[] {
  switch (expect.kind) {
    case 'type': {
      const t = plan.returnKind === 'value' ? typeofName(plan.returnNative) : undefined;
      return t ? [`expect(typeof ${call}).toBe('${t}');`] : [`${call};`];
    }
    case 'returns': {
      const ret = plan.returnNative;
      const lit = literal(ctx, ret, expect.value);
      if (ret.kind === 'float') return [`expect(${call}).toBeCloseTo(${lit}, ${ret.width === 32 ? 4 : 9});`];
      if (ret.kind === 'struct') return [`expect(${call}).toEqual(${lit});`];
      return [`expect(${call}).toBe(${lit});`];
    }
    case 'mutates': {
      if (expect.target === 'receiver') {
        const type = plan.receiver?.param.native.type ?? { kind: 'void' };
        return [`${call};`, `expect(${receiverVar ?? 'receiver'}).toEqual(${literal(ctx, type, expect.value)});`];
      }
      const p = plan.params[expect.target];
      const n = names.get(expect.target) ?? tsIdent(p.name);
      if (p.kind === 'slice') {
        return [`${call};`, `expect(Array.from(${n})).toEqual(${arrayLiteral(ctx, p.elementNative, expect.value)});`];
      }
      if (p.kind === 'struct-ref') {
        return [`${call};`, `expect(${n}).toEqual(${literal(ctx, { kind: 'struct', name: p.struct }, expect.value)});`];
      }
      throw new Error(`parameter ${p.name} cannot carry an expected state`);
    }
  }
}

function construct(ctx: Ctx, resource: ResourcePlan, ctorArgs: HarnessArg[], body: string[]): string {
  const name = tsResourceName(resource.tag);
  ctx.bindings.add(name);
  const { args } = bindArgs(ctx, ctorArgs, body);
  return `${name}.create(${args.join(', ')})`;
}

function callCheck(ctx: Ctx, c: CallCheck): string[] {
  const body: string[] = [];
  const plan = c.plan;

  if (c.owner.kind === 'resource') {
    const created = construct(ctx, c.owner.resource, c.owner.ctorArgs, body);
    const v = local(ctx, c.owner.resource.tag);
    const { args, names } = bindArgs(ctx, c.args, body);
    const call = `${v}.${tsMemberName(plan.name)}(${args.join(', ')})`;
    ctx.runtime.add('withResource');
    body.push(`withResource(${created}, (${v}) => {`, ...indent(expectLines(ctx, plan, call, c.expect, names), IND), '});');
    return testBlock(c.name, body);
  }

  let call: string;
  let receiverVar: string | undefined;
  if (c.owner.kind === 'free') {
    const { args, names } = bindArgs(ctx, c.args, body);
    const fn = tsIdent(plan.name);
    ctx.bindings.add(fn);
    call = `${fn}(${args.join(', ')})`;
    body.push(...expectLines(ctx, plan, call, c.expect, names));
    return testBlock(c.name, body);
  }

  const struct = c.owner.struct.def.name;
  ctx.bindings.add(struct);
  const callArgs: string[] = [];
  if (plan.receiver && c.owner.receiver !== undefined) {
    receiverVar = local(ctx, struct);
    body.push(`const ${receiverVar}: ${struct} = ${literal(ctx, plan.receiver.param.native.type, c.owner.receiver)};`);
    callArgs.push(receiverVar);
  }
  const { args, names } = bindArgs(ctx, c.args, body);
  call = `${struct}.${tsMemberName(plan.name)}(${[...callArgs, ...args].join(', ')})`;
  body.push(...expectLines(ctx, plan, call, c.expect, names, receiverVar));
  return testBlock(c.name, body);
}

function nullHandleCheck(ctx: Ctx, c: NullHandleCheck): string[] {
  const name = tsResourceName(c.resource.tag);
  ctx.bindings.add(name);
  ctx.runtime.add('ConstructionFailureError');
  return testBlock(c.name, [
    `expect(() => ${name}.fromRaw(null)).toThrow(ConstructionFailureError);`,
    `expect(() => ${name}.fromRaw(null)).toThrow('${c.resource.ctor.fn.name} returned a null handle');`,
  ]);
}

function lifecycleCheck(ctx: Ctx, c: LifecycleCheck): string[] {
  const body: string[] = [];
  const created = construct(ctx, c.resource, c.ctorArgs, body);
  const v = local(ctx, c.resource.tag);
  body.push(`const ${v} = ${created};`);

  const steps: string[] = [];
  const calls: string[] = [];
  for (const step of c.steps) {
    const { args, names } = bindArgs(ctx, step.args, body);
    const call = `${v}.${tsMemberName(step.plan.name)}(${args.join(', ')})`;
    calls.push(call);
    steps.push(...expectLines(ctx, step.plan, call, step.expect, names));
  }
  ctx.runtime.add('withResource');
  body.push(`withResource(${v}, () => {`, ...indent(steps, IND), '});');
  body.push(`expect(${v}.disposed).toBe(true);`, `${v}.dispose();`);

  if (calls[0]) {
    ctx.runtime.add('UseAfterDisposeError');
    body.push(`expect(() => ${calls[0]}).toThrow(UseAfterDisposeError);`);
  }
  return testBlock(c.name, body);
}

function testBlock(name: string, body: string[]): string[] {
  return [`it('${name}', () => {`, ...indent(body, IND), '});'];
}

function importLine(names: Set<string>, from: string): string {
  return `import { ${[...names].sort((a, b) => a.localeCompare(b)).join(', ')} } from '${from}';`;
}

export function renderTsTests(
  plan: HarnessPlan,
  model: BindingModel,
  runtimeImport: string,
): { file: string; tests: EmittedDecl[] } {
  const bindings = new Set<string>();
  const runtime = new Set<string>();
  const tests: EmittedDecl[] = plan.checks.map((c) => {
    const ctx: Ctx = { model, bindings, runtime, locals: new Set() };
    const lines =
      c.kind === 'call' ? callCheck(ctx, c) : c.kind === 'null-handle' ? nullHandleCheck(ctx, c) : lifecycleCheck(ctx, c);
    return { kind: 'test', symbol: c.name, code: lines.join('\n') };
  });
  if (!tests.length) return { file: '', tests };

  const imports = [
    `import { describe, expect, it } from 'vitest';`,
    ...(runtime.size ? [importLine(runtime, runtimeImport)] : []),
    ...(bindings.size ? [importLine(bindings, `./${model.library}.js`)] : []),
  ];
  const skipped = plan.skipped.map((s) => `// skipped ${s.symbol}: ${s.reason}`).join('\n');
  const suite = [
    `describe('${model.library}', () => {`,
    ...indent(tests.map((t) => t.code).join('\n\n').split('\n'), IND),
    '});',
  ];

  return {
    file: joinBlocks([`// Code generated by bindsmith. DO NOT EDIT.`, imports.join('\n'), skipped, suite.join('\n')]),
    tests,
  };
}
