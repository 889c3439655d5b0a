import type { ExampleValue, NativeType } from '../../surface/surfaceTypes.js';
import type { BindingModel, ResourcePlan, WrapperPlan } from '../bindingModel.js';
import type { EmittedDecl } from '../emitTypes.js';
import type { CallCheck, Expectation, HarnessArg, HarnessPlan, LifecycleCheck, NullHandleCheck } from '../../harness/harnessTypes.js';
import { indent, joinBlocks } from '../sourceText.js';
import { toPascal } from '../../classify/naming.js';
import { fromRawName, goFactoryName, goIdent, goImports, goTypeName } from './goTypes.js';

const TAB = '\t';

type Ctx = { model: BindingModel; declared: Set<string> };

function assign(ctx: Ctx, name: string): string {
  if (ctx.declared.has(name)) return `${name} =`;
  ctx.declared.add(name);
  return `${name} :=`;
}

function literal(ctx: Ctx, type: NativeType, v: ExampleValue): string {
  if ((type.kind === 'integer' || type.kind === 'float') && typeof v === 'number') return String(v);
  if (type.kind === 'bool' && typeof v === 'boolean') return String(v);
  if (type.kind === 'struct' && v !== null && typeof v === 'object' && !Array.isArray(v)) {
    const plan = ctx.model.structs.find((s) => s.def.name === type.name);
    if (plan) {
      const fields = plan.fields.map((f) => `${toPascal(f.name)}: ${literal(ctx, f.native, v[f.name])}`);
      return `${goTypeName(type.name)}{${fields.join(', ')}}`;
    }
  }
  throw new Error(`cannot render ${JSON.stringify(v)} as a Go value`);
}

function sliceLiteral(ctx: Ctx, element: NativeType, elementType: string, v: ExampleValue): string {
  if (!Array.isArray(v)) throw new Error(`expected a sequence, got ${JSON.stringify(v)}`);
  return `[]${elementType}{${v.map((x) => literal(ctx, element, x)).join(', ')}}`;
}

function bindArgs(ctx: Ctx, args: HarnessArg[], body: string[]): string[] {
  return args.map(({ param: p, value }) => {
    switch (p.kind) {
      case 'value':
        return literal(ctx, p.param.native.type, value);
      case 'struct-ref': {
        const n = goIdent(p.name);
        body.push(`${assign(ctx, n)} ${literal(ctx, { kind: 'struct', name: p.struct }, value)}`);
        return `&${n}`;
      }
      case 'slice': {
        const n = goIdent(p.name);
        body.push(`${assign(ctx, n)} ${sliceLiteral(ctx, p.elementNative, p.element.safe, value)}`);
        return n;
      }
      case 'resource':
      case 'raw':
        throw new Error(`parameter ${p.name} cannot be synthesised`);
    }
  });
}

function fatalOnError(head: string): string[] {
  return [`if ${head}; err != nil {`, `${TAB}t.Fatal(err)`, '}'];
}

function expectLines(ctx: Ctx, plan: WrapperPlan, call: string, expect: Expectation, errorful: boolean, receiverVar?: string): string[] {
  const hasResult = plan.returnKind !== 'void';

  if (expect.kind === 'type') {
    if (errorful) return fatalOnError(hasResult ? `_, err := ${call}` : `err := ${call}`);
    if (!hasResult) return [call];
    const t = plan.returns.safe;
    return [t.includes('.') ? `_ = ${call}` : `var _ ${t} = ${call}`];
  }

  if (expect.kind === 'returns') {
    const ret = plan.returnNative;
    const lit = literal(ctx, ret, expect.value);
    const cond =
      ret.kind === 'float'
        ? `math.Abs(float64(got)-${lit}) > ${ret.width === 32 ? '1e-4' : '1e-9'}`
        : `got != ${ret.kind === 'struct' ? `(${lit})` : lit}`;
    const report = `${TAB}t.Errorf("${call} = %v, want ${lit}", got)`;
    if (errorful) {
      return [`if got, err := ${call}; err != nil {`, `${TAB}t.Fatal(err)`, `} else if ${cond} {`, report, '}'];
    }
    return [`if got := ${call}; ${cond} {`, report, '}'];
  }

  const run = errorful ? fatalOnError(`err := ${call}`) : [call];
  let subject: string;
  let want: string;
  let compare: (subject: string) => string;
  if (expect.target === 'receiver') {
    subject = receiverVar ?? 'receiver';
    want = `(${literal(ctx, plan.receiver?.param.native.type ?? { kind: 'void' }, expect.value)})`;
    compare = (s) => `${s} != want`;
  } else {
    const p = plan.params[expect.target];
    subject = goIdent(p.name);
    if (p.kind === 'slice') {
      want = sliceLiteral(ctx, p.elementNative, p.element.safe, expect.value);
      compare = (s) => `!reflect.DeepEqual(${s}, want)`;
    } else if (p.kind === 'struct-ref') {
      want = `(${literal(ctx, { kind: 'struct', name: p.struct }, expect.value)})`;
      compare = (s) => `${s} != want`;
    } else {
      throw new Error(`parameter ${p.name} cannot carry an expected state`);
    }
  }
  return [
    ...run,
    `if want := ${want}; ${compare(subject)} {`,
    `${TAB}t.Errorf("${subject} = %v, want %v", ${subject}, want)`,
    '}',
  ];
}

function construct(ctx: Ctx, resource: ResourcePlan, ctorArgs: HarnessArg[], body: string[]): string {
  const v = goIdent(resource.tag);
  const args = bindArgs(ctx, ctorArgs, body);
  body.push(`${v}, err := New${goTypeName(resource.tag)}(${args.join(', ')})`, 'if err != nil {', `${TAB}t.Fatal(err)`, '}');
  return v;
}

function callCheck(ctx: Ctx, c: CallCheck): string[] {
  const body: string[] = [];
  const plan = c.plan;
  let target: string;
  let receiverVar: string | undefined;
  let errorful = false;

  if (c.owner.kind === 'free') {
    target = toPascal(plan.name);
  } else if (c.owner.kind === 'struct') {
    const struct = c.owner.struct.def.name;
    if (plan.receiver && c.owner.receiver !== undefined) {
      receiverVar = goIdent(struct);
      body.push(`${receiverVar} := ${literal(ctx, plan.receiver.param.native.type, c.owner.receiver)}`);
      target = `${receiverVar}.${toPascal(plan.name)}`;
    } else {
      target = goFactoryName(struct, plan.name);
    }
  } else {
    const v = construct(ctx, c.owner.resource, c.owner.ctorArgs, body);
    body.push(`defer ${v}.Close()`);
    target = `${v}.${toPascal(plan.name)}`;
    errorful = true;
  }

  const args = bindArgs(ctx, c.args, body);
  body.push(...expectLines(ctx, plan, `${target}(${args.join(', ')})`, c.expect, errorful, receiverVar));
  return testFunc(c.name, body);
}

function nullHandleCheck(c: NullHandleCheck): string[] {
  const v = goIdent(c.resource.tag);
  const adopt = fromRawName(c.resource.tag);
  return testFunc(c.name, [
    `${v}, err := ${adopt}(nil)`,
    'var failure *ConstructionFailure',
    `if ${v} != nil || !errors.As(err, &failure) {`,
    `${TAB}t.Fatalf("${adopt}(nil) = %v, %v; want a *ConstructionFailure", ${v}, err)`,
    '}',
    `if failure.Constructor != "${c.resource.ctor.fn.name}" {`,
    `${TAB}t.Errorf("Constructor = %q, want %q", failure.Constructor, "${c.resource.ctor.fn.name}")`,
    '}',
  ]);
}

function lifecycleCheck(ctx: Ctx, c: LifecycleCheck): string[] {
  const body: string[] = [];
  const v = construct(ctx, c.resource, c.ctorArgs, body);
  const calls: string[] = [];
  for (const step of c.steps) {
    const args = bindArgs(ctx, step.args, body);
    const call = `${v}.${toPascal(step.plan.name)}(${args.join(', ')})`;
    calls.push(call);
    body.push(...expectLines(ctx, step.plan, call, step.expect, true));
  }
  body.push(...fatalOnError(`err := ${v}.Close()`));
  body.push(`if err := ${v}.Close(); err != nil {`, `${TAB}t.Fatalf("second Close: %v", err)`, '}');

  const first = c.steps[0];
  if (first) {
    const head = first.plan.returnKind === 'void' ? `err := ${calls[0]}` : `_, err := ${calls[0]}`;
    body.push(
      `if ${head}; !errors.Is(err, ErrClosed) {`,
      `${TAB}t.Errorf("${calls[0]} after Close: err = %v, want ErrClosed", err)`,
      '}',
    );
  }
  return testFunc(c.name, body);
}

function testFunc(name: string, body: string[]): string[] {
  return [`func Test${toPascal(name)}(t *testing.T) {`, ...indent(body, TAB), '}'];
}

export function renderGoTests(plan: HarnessPlan, model: BindingModel, pkg: string): { file: string; tests: EmittedDecl[] } {
  const tests: EmittedDecl[] = plan.checks.map((c) => {
    const ctx: Ctx = { model, declared: new Set() };
    const lines =
      c.kind === 'call' ? callCheck(ctx, c) : c.kind === 'null-handle' ? nullHandleCheck(c) : lifecycleCheck(ctx, c);
    return { kind: 'test', symbol: c.name, code: lines.join('\n') };
  });
  if (!tests.length) return { file: '', tests };

  const code = tests.map((t) => t.code).join('\n\n');
  const imports = goImports(code, ['errors', 'math', 'reflect', 'testing']);
  const skipped = plan.skipped.map((s) => `// skipped ${s.symbol}: ${s.reason}`).join('\n');

  return {
    file: joinBlocks([
      `// Code generated by bindsmith. DO NOT EDIT.`,
      `package ${pkg}`,
      imports,
      skipped,
      ...tests.map((t) => t.code),
    ]),
    tests,
  };
}
