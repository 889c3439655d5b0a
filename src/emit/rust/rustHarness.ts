import type { ExampleValue, NativeType } from '../../surface/surfaceTypes.js';
import type { BindingModel, WrapperPlan } from '../bindingModel.js';
import type { EmittedDecl } from '../emitTypes.js';
import type { CallCheck, Expectation, HarnessArg, HarnessPlan, LifecycleCheck, NullHandleCheck } from '../../harness/harnessTypes.js';
import { floatLiteral, indent } from '../sourceText.js';
import { rustIdent, rustResourceName } from './rustTypes.js';

const IND = '    ';

type Ctx = { model: BindingModel };

function literal(ctx: Ctx, type: NativeType, v: ExampleValue): string {
  if (type.kind === 'float' && typeof v === 'number') return floatLiteral(v);
  if (type.kind === 'integer' && typeof v === 'number') return String(v);
  if (type.kind === 'bool' && typeof v === 'boolean') return String(v);
  if (type.kind === 'struct' && v !== null && typeof v === 'object' && !Array.isArray(v)) {
    const plan = ctx.model.structs.find((s) => s.def.name === type.name);
    if (plan) {
      const fields = plan.fields.map((f) => `${rustIdent(f.name)}: ${literal(ctx, f.native, v[f.name])}`);
      return `${type.name} { ${fields.join(', ')} }`;
    }
  }
  throw new Error(`cannot render ${JSON.stringify(v)} as a Rust value`);
}

function arrayLiteral(ctx: Ctx, element: NativeType, v: ExampleValue): string {
  if (!Array.isArray(v)) throw new Error(`expected a sequence, got ${JSON.stringify(v)}`);
  return `[${v.map((x) => literal(ctx, element, x)).join(', ')}]`;
}

/** Appends `let` bindings for arguments that are passed by reference; returns the call arguments. */
function bindArgs(ctx: Ctx, args: HarnessArg[], body: string[]): string[] {
  return args.map(({ param: p, value }) => {
    switch (p.kind) {
      case 'value':
        return literal(ctx, p.param.native.type, value);
      case 'struct-ref': {
        const n = rustIdent(p.name);
        body.push(`let ${p.mutable ? 'mut ' : ''}${n} = ${literal(ctx, { kind: 'struct', name: p.struct }, value)};`);
        return `&${p.mutable ? 'mut ' : ''}${n}`;
      }
      case 'slice': {
        const n = rustIdent(p.name);
        const len = Array.isArray(value) ? value.length : 0;
        body.push(
          `let ${p.mutable ? 'mut ' : ''}${n}: [${p.element.safe}; ${len}] = ${arrayLiteral(ctx, p.elementNative, value)};`,
        );
        return `&${p.mutable ? 'mut ' : ''}${n}`;
      }
      case 'resource':
      case 'raw':
        throw new Error(`parameter ${p.name} cannot be synthesised`);
    }
  });
}

function expectLines(ctx: Ctx, plan: WrapperPlan, call: string, expect: Expectation, receiverVar?: string): string[] {
  switch (expect.kind) {
    case 'type':
      return plan.returnKind === 'void' ? [`${call};`] : [`let _: ${plan.returns.safe} = ${call};`];
    case 'returns': {
      const ret = plan.returnNative;
      if (ret.kind === 'float' && typeof expect.value === 'number') {
        const tolerance = ret.width === 32 ? '1e-4' : '1e-9';
        return [`assert!((${call} - ${floatLiteral(expect.value)}).abs() < ${tolerance});`];
      }
      return [`assert_eq!(${call}, ${literal(ctx, ret, expect.value)});`];
    }
    case 'mutates': {
      if (expect.target === 'receiver') {
        const type = plan.receiver?.param.native.type ?? { kind: 'void' };
        return [`${call};`, `assert_eq!(${receiverVar ?? 'receiver'}, ${literal(ctx, type, expect.value)});`];
      }
      const p = plan.params[expect.target];
      const n = rustIdent(p.name);
      if (p.kind === 'slice') return [`${call};`, `assert_eq!(${n}, ${arrayLiteral(ctx, p.elementNative, expect.value)});`];
      if (p.kind === 'struct-ref') {
        return [`${call};`, `assert_eq!(${n}, ${literal(ctx, { kind: 'struct', name: p.struct }, expect.value)});`];
      }
      throw new Error(`parameter ${p.name} cannot carry an expected state`);
    }
  }
}

function constructLine(ctx: Ctx, check: { resource: LifecycleCheck['resource']; ctorArgs: HarnessArg[] }, mutable: boolean, body: string[]): string {
  const r = check.resource;
  const v = rustIdent(r.tag);
  const args = bindArgs(ctx, check.ctorArgs, body);
  return `let ${mutable ? 'mut ' : ''}${v} = ${rustResourceName(r.tag)}::new(${args.join(', ')}).expect("${r.ctor.fn.name} returned a null handle");`;
}

function callCheck(ctx: Ctx, c: CallCheck): string[] {
  const body: string[] = [];
  const plan = c.plan;
  let target: string;
  let receiverVar: string | undefined;

  if (c.owner.kind === 'free') {
    target = rustIdent(plan.name);
  } else if (c.owner.kind === 'struct') {
    const struct = c.owner.struct.def.name;
    if (plan.receiver && c.owner.receiver !== undefined) {
      receiverVar = rustIdent(struct);
      const mutable = plan.receiver.param.native.passing === 'mut-pointer';
      body.push(`let ${mutable ? 'mut ' : ''}${receiverVar} = ${literal(ctx, plan.receiver.param.native.type, c.owner.receiver)};`);
      target = `${receiverVar}.${rustIdent(plan.name)}`;
    } else {
      target = `${struct}::${rustIdent(plan.name)}`;
    }
  } else {
    const mutable = plan.receiver?.access === 'exclusive';
    body.push(constructLine(ctx, c.owner, mutable, body));
    target = `${rustIdent(c.owner.resource.tag)}.${rustIdent(plan.name)}`;
  }

  const args = bindArgs(ctx, c.args, body);
  body.push(...expectLines(ctx, plan, `${target}(${args.join(', ')})`, c.expect, receiverVar));
  return testFn(c.name, body);
}

function nullHandleCheck(c: NullHandleCheck): string[] {
  const r = c.resource;
  return testFn(c.name, [
    `let adopted = unsafe { ${rustResourceName(r.tag)}::from_raw(std::ptr::null_mut()) };`,
    `assert_eq!(adopted.err(), Some(ConstructionFailure { constructor: "${r.ctor.fn.name}" }));`,
  ]);
}

function lifecycleCheck(ctx: Ctx, c: LifecycleCheck): string[] {
  const body: string[] = [];
  const v = rustIdent(c.resource.tag);
  const mutable = c.steps.some((s) => s.plan.receiver?.access === 'exclusive');
  body.push(constructLine(ctx, c, mutable, body));
  for (const step of c.steps) {
    const args = bindArgs(ctx, step.args, body);
    body.push(...expectLines(ctx, step.plan, `${v}.${rustIdent(step.plan.name)}(${args.join(', ')})`, step.expect));
  }
  body.push(`drop(${v});`);
  return testFn(c.name, body);
}

function testFn(name: string, body: string[]): string[] {
  return ['#[test]', `fn ${name}() {`, ...indent(body, IND), '}'];
}

export function renderRustTests(plan: HarnessPlan, model: BindingModel): { module: string; tests: EmittedDecl[] } {
  const ctx: Ctx = { model };
  const tests: EmittedDecl[] = plan.checks.map((c) => {
    const lines =
      c.kind === 'call' ? callCheck(ctx, c) : c.kind === 'null-handle' ? nullHandleCheck(c) : lifecycleCheck(ctx, c);
    return { kind: 'test', symbol: c.name, code: lines.join('\n') };
  });
  if (!tests.length && !plan.skipped.length) return { module: '', tests };

  const body: string[] = ['use super::*;'];
  if (plan.skipped.length) {
    body.push('', ...plan.skipped.map((s) => `// skipped ${s.symbol}: ${s.reason}`));
  }
  for (const t of tests) body.push('', ...t.code.split('\n'));

  return {
    module: ['#[cfg(test)]', 'mod tests {', ...indent(body, IND), '}'].join('\n'),
    tests,
  };
}
