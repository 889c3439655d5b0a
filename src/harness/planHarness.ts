import type { ExampleCall, ExampleValue } from '../surface/surfaceTypes.js';
import type { Diagnostic } from '../report/diagnostics.js';
import { functionSubject } from '../report/diagnostics.js';
import { toSnake } from '../classify/naming.js';
import type {
  BindingModel,
  ResourcePlan,
  StructPlan,
  WrapperParam,
  WrapperPlan,
} from '../emit/bindingModel.js';
import type {
  CallOwner,
  Expectation,
  HarnessArg,
  HarnessCheck,
  HarnessPlan,
  LifecycleStep,
  SkippedCheck,
} from './harnessTypes.js';
import type { StructLookup } from './sampleValues.js';
import { argConforms, conforms, sampleArg, sampleValue } from './sampleValues.js';

class AnnotationProblem extends Error {
  override name = 'AnnotationProblem';
}

function blocker(plan: WrapperPlan): string | undefined {
  const p = plan.params.find((x) => x.kind === 'raw' || x.kind === 'resource');
  if (!p) return undefined;
  return p.kind === 'raw'
    ? `parameter ${p.name} needs a raw address`
    : `parameter ${p.name} needs a live ${p.tag}`;
}

function sampleArgs(params: WrapperParam[], structs: StructLookup): HarnessArg[] | undefined {
  const args: HarnessArg[] = [];
  for (const param of params) {
    const value = sampleArg(param, structs);
    if (value === undefined) return undefined;
    args.push({ param, value });
  }
  return args;
}

function exampleArgs(params: WrapperParam[], values: ExampleValue[], structs: StructLookup, callee: string): HarnessArg[] {
  if (values.length !== params.length) {
    throw new AnnotationProblem(`${callee} takes ${params.length} argument(s), the annotation passes ${values.length}`);
  }
  return params.map((param, i) => {
    const value = values[i];
    if (!argConforms(param, value, structs)) {
      throw new AnnotationProblem(`argument ${i + 1} of ${callee} does not fit parameter ${param.name}`);
    }
    return { param, value };
  });
}

function mutableTargets(plan: WrapperPlan): ('receiver' | number)[] {
  const out: ('receiver' | number)[] = [];
  if (plan.receiver?.access === 'exclusive' && plan.receiver.param.native.type.kind === 'struct') {
    out.push('receiver');
  }
  plan.params.forEach((p, i) => {
    if ((p.kind === 'slice' || p.kind === 'struct-ref') && p.mutable) out.push(i);
  });
  return out;
}

function expectation(plan: WrapperPlan, expect: ExampleValue | undefined, structs: StructLookup): Expectation {
  if (expect === undefined) return { kind: 'type' };

  if (plan.returnKind === 'void') {
    const targets = mutableTargets(plan);
    if (targets.length !== 1) {
      throw new AnnotationProblem(
        `${plan.fn.name} returns void; an expectation needs exactly one mutable sequence or record to compare`,
      );
    }
    const target = targets[0];
    const ok =
      target === 'receiver'
        ? conforms(plan.receiver?.param.native.type ?? { kind: 'void' }, expect, structs)
        : argConforms(plan.params[target], expect, structs);
    if (!ok) throw new AnnotationProblem(`expected state of ${plan.fn.name} does not fit its type`);
    return { kind: 'mutates', target, value: expect };
  }

  if (plan.returnKind === 'raw' || !conforms(plan.returnNative, expect, structs)) {
    throw new AnnotationProblem(`expected result of ${plan.fn.name} does not fit its return type`);
  }
  return { kind: 'returns', value: expect };
}

function calleeMatches(call: ExampleCall, plan: WrapperPlan): boolean {
  return call.callee === plan.fn.name || call.callee === plan.name;
}

/**
 * Decides which checks the verification harness contains. Rendering is left
 * to each backend; the plan only carries values and expectations.
 */
export function planHarness(model: BindingModel): HarnessPlan {
  const structs = new Map(model.structs.map((s) => [s.def.name, s] as const));
  const lookup: StructLookup = (name) => structs.get(name);

  const checks: HarnessCheck[] = [];
  const skipped: SkippedCheck[] = [];
  const diagnostics: Diagnostic[] = [];
  const usedNames = new Set<string>();

  function uniqueName(base: string): string {
    let name = base;
    for (let i = 2; usedNames.has(name); i++) name = `${base}_${i}`;
    usedNames.add(name);
    return name;
  }

  function invalid(plan: WrapperPlan, message: string): void {
    diagnostics.push({
      kind: 'InvalidAnnotation',
      subject: functionSubject(plan.fn.name),
      message,
      hint: 'Fix the annotation; the function still gets a smoke check.',
      sourceLine: plan.fn.sourceLine,
    });
  }

  function planCalls(plan: WrapperPlan, prefix: string, owner: CallOwner): void {
    const reason = blocker(plan);
    if (reason) {
      skipped.push({ symbol: plan.fn.name, reason });
      return;
    }
    const base = prefix ? `${prefix}_${plan.name}` : plan.name;

    let examples = 0;
    for (const call of plan.fn.annotations?.examples ?? []) {
      try {
        if (!calleeMatches(call, plan)) {
          throw new AnnotationProblem(`@example names ${call.callee}, expected ${plan.name} or ${plan.fn.name}`);
        }
        if (owner.kind === 'resource') {
          throw new AnnotationProblem(
            `@example cannot construct a ${owner.resource.tag}; use @scenario on ${owner.resource.ctor.fn.name}`,
          );
        }
        let values = call.args;
        let callOwner: CallOwner = owner;
        if (owner.kind === 'struct' && plan.receiver) {
          const [receiver, ...rest] = values;
          if (receiver === undefined || !conforms(plan.receiver.param.native.type, receiver, lookup)) {
            throw new AnnotationProblem(`first argument of ${call.callee} must be a ${owner.struct.def.name} record`);
          }
          callOwner = { ...owner, receiver };
          values = rest;
        }
        const args = exampleArgs(plan.params, values, lookup, call.callee);
        const expect = expectation(plan, call.expect, lookup);
        checks.push({
          kind: 'call',
          name: uniqueName(`${base}_example`),
          origin: 'example',
          plan,
          owner: callOwner,
          args,
          expect,
        });
        examples++;
      } catch (err) {
        if (!(err instanceof AnnotationProblem)) throw err;
        invalid(plan, err.message);
      }
    }
    if (examples) return;

    const args = sampleArgs(plan.params, lookup);
    let smokeOwner: CallOwner | undefined = owner;
    if (owner.kind === 'struct' && plan.receiver) {
      const receiver = sampleValue(plan.receiver.param.native.type, lookup);
      smokeOwner = receiver === undefined ? undefined : { ...owner, receiver };
    }
    if (!args || !smokeOwner) {
      skipped.push({ symbol: plan.fn.name, reason: 'no representative inputs' });
      return;
    }
    checks.push({
      kind: 'call',
      name: uniqueName(`${base}_smoke`),
      origin: 'smoke',
      plan,
      owner: smokeOwner,
      args,
      expect: { kind: 'type' },
    });
  }

  function scenarioSteps(resource: ResourcePlan, scenario: ExampleCall[]): { ctorArgs: HarnessArg[]; steps: LifecycleStep[] } {
    const [first, ...rest] = scenario;
    const ctor = resource.ctor;
    if (![ctor.fn.name, 'new', toSnake(resource.tag)].includes(first.callee)) {
      throw new AnnotationProblem(`@scenario must start with ${ctor.fn.name}(...), not ${first.callee}`);
    }
    const ctorArgs = exampleArgs(ctor.params, first.args, lookup, first.callee);
    const steps = rest.map((call): LifecycleStep => {
      const plan = resource.methods.find((m) => calleeMatches(call, m));
      if (!plan) throw new AnnotationProblem(`${resource.tag} has no method ${call.callee}`);
      const reason = blocker(plan);
      if (reason) throw new AnnotationProblem(`${call.callee}: ${reason}`);
      return {
        plan,
        args: exampleArgs(plan.params, call.args, lookup, call.callee),
        expect: expectation(plan, call.expect, lookup),
      };
    });
    return { ctorArgs, steps };
  }

  function planResource(resource: ResourcePlan): void {
    const prefix = toSnake(resource.tag);
    checks.push({ kind: 'null-handle', name: uniqueName(`${prefix}_rejects_null_handle`), resource });

    const ctorBlocker = blocker(resource.ctor);
    const defaultCtorArgs = ctorBlocker ? undefined : sampleArgs(resource.ctor.params, lookup);
    if (!defaultCtorArgs) {
      skipped.push({
        symbol: resource.ctor.fn.name,
        reason: ctorBlocker ?? 'no representative constructor inputs',
      });
      for (const m of resource.methods) {
        skipped.push({ symbol: m.fn.name, reason: `${resource.tag} cannot be constructed in a test` });
      }
      return;
    }

    let lifecycle: { ctorArgs: HarnessArg[]; steps: LifecycleStep[] } | undefined;
    const scenario = resource.ctor.fn.annotations?.scenario;
    if (scenario) {
      try {
        lifecycle = scenarioSteps(resource, scenario);
      } catch (err) {
        if (!(err instanceof AnnotationProblem)) throw err;
        invalid(resource.ctor, err.message);
      }
    }

    for (const m of resource.methods) {
      planCalls(m, prefix, { kind: 'resource', resource, ctorArgs: lifecycle?.ctorArgs ?? defaultCtorArgs });
    }

    if (lifecycle) {
      checks.push({ kind: 'lifecycle', name: uniqueName(`${prefix}_scenario`), origin: 'example', resource, ...lifecycle });
      return;
    }
    const steps: LifecycleStep[] = [];
    for (const plan of resource.methods) {
      const args = blocker(plan) ? undefined : sampleArgs(plan.params, lookup);
      if (args) steps.push({ plan, args, expect: { kind: 'type' } });
    }
    checks.push({
      kind: 'lifecycle',
      name: uniqueName(`${prefix}_lifecycle`),
      origin: 'smoke',
      resource,
      ctorArgs: defaultCtorArgs,
      steps,
    });
  }

  for (const plan of model.freeFunctions) planCalls(plan, '', { kind: 'free' });
  for (const struct of model.structs) planStruct(struct);
  for (const resource of model.resources) planResource(resource);

  function planStruct(struct: StructPlan): void {
    const prefix = toSnake(struct.def.name);
    for (const f of struct.factories) planCalls(f, prefix, { kind: 'struct', struct });
    for (const m of struct.methods) planCalls(m, prefix, { kind: 'struct', struct });
  }

  return { checks, skipped, diagnostics };
}
