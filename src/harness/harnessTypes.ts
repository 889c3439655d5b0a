import type { ExampleValue } from '../surface/surfaceTypes.js';
import type { Diagnostic } from '../report/diagnostics.js';
import type { ResourcePlan, StructPlan, WrapperParam, WrapperPlan } from '../emit/bindingModel.js';

export type HarnessArg = { param: WrapperParam; value: ExampleValue };

export type Expectation =
  | { kind: 'returns'; value: ExampleValue }
  /** State of a mutable sequence or record after the call. */
  | { kind: 'mutates'; target: 'receiver' | number; value: ExampleValue }
  /** Smoke call: the result only has to have the declared type. */
  | { kind: 'type' };

export type CheckOrigin = 'example' | 'smoke';

export type CallOwner =
  | { kind: 'free' }
  | { kind: 'struct'; struct: StructPlan; receiver?: ExampleValue }
  | { kind: 'resource'; resource: ResourcePlan; ctorArgs: HarnessArg[] };

export type CallCheck = {
  kind: 'call';
  /** snake_case, unique within the plan */
  name: string;
  origin: CheckOrigin;
  plan: WrapperPlan;
  owner: CallOwner;
  args: HarnessArg[];
  expect: Expectation;
};

export type NullHandleCheck = {
  kind: 'null-handle';
  name: string;
  resource: ResourcePlan;
};

export type LifecycleStep = {
  plan: WrapperPlan;
  args: HarnessArg[];
  expect: Expectation;
};

export type LifecycleCheck = {
  kind: 'lifecycle';
  name: string;
  origin: CheckOrigin;
  resource: ResourcePlan;
  ctorArgs: HarnessArg[];
  steps: LifecycleStep[];
};

export type HarnessCheck = CallCheck | NullHandleCheck | LifecycleCheck;

export type SkippedCheck = { symbol: string; reason: string };

export type HarnessPlan = {
  checks: HarnessCheck[];
  skipped: SkippedCheck[];
  diagnostics: Diagnostic[];
};
