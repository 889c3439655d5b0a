import type { ExampleValue, NativeType } from '../surface/surfaceTypes.js';
import type { StructPlan, WrapperParam } from '../emit/bindingModel.js';

export type StructLookup = (name: string) => StructPlan | undefined;

/** Representative input for a smoke call, or undefined when none can be made up. */
export function sampleValue(type: NativeType, structs: StructLookup): ExampleValue | undefined {
  switch (type.kind) {
    case 'integer':
      return 2;
    case 'float':
      return 1.5;
    case 'bool':
      return true;
    case 'struct': {
      const plan = structs(type.name);
      if (!plan) return undefined;
      const out: { [field: string]: ExampleValue } = {};
      for (const field of plan.def.fields) {
        const v = sampleValue(field.type, structs);
        if (v === undefined) return undefined;
        out[field.name] = v;
      }
      return out;
    }
    default:
      return undefined;
  }
}

export function sampleArg(param: WrapperParam, structs: StructLookup): ExampleValue | undefined {
  switch (param.kind) {
    case 'value':
      return sampleValue(param.param.native.type, structs);
    case 'struct-ref':
      return sampleValue({ kind: 'struct', name: param.struct }, structs);
    case 'slice':
      return param.elementNative.kind === 'float' ? [1.5, 2.5, 3.5] : [1, 2, 3];
    case 'resource':
    case 'raw':
      return undefined;
  }
}

function integerFits(type: Extract<NativeType, { kind: 'integer' }>, v: number): boolean {
  if (!Number.isInteger(v)) return false;
  if (!type.signed && v < 0) return false;
  if (typeof type.width !== 'number' || type.width === 64) return Number.isSafeInteger(v);
  const bits = type.signed ? type.width - 1 : type.width;
  const max = 2 ** bits - 1;
  const min = type.signed ? -(2 ** bits) : 0;
  return v >= min && v <= max;
}

/** Whether an annotation value can stand for `type`. */
export function conforms(type: NativeType, value: ExampleValue, structs: StructLookup): boolean {
  switch (type.kind) {
    case 'integer':
      return typeof value === 'number' && integerFits(type, value);
    case 'float':
      return typeof value === 'number';
    case 'bool':
      return typeof value === 'boolean';
    case 'struct': {
      const plan = structs(type.name);
      if (!plan || value === null || typeof value !== 'object' || Array.isArray(value)) return false;
      const keys = Object.keys(value);
      if (keys.length !== plan.def.fields.length) return false;
      return plan.fields.every((f) => {
        const v = value[f.name];
        return v !== undefined && conforms(f.native, v, structs);
      });
    }
    default:
      return false;
  }
}

export function argConforms(param: WrapperParam, value: ExampleValue, structs: StructLookup): boolean {
  switch (param.kind) {
    case 'value':
      return conforms(param.param.native.type, value, structs);
    case 'struct-ref':
      return conforms({ kind: 'struct', name: param.struct }, value, structs);
    case 'slice':
      return Array.isArray(value) && value.every((v) => conforms(param.elementNative, v, structs));
    case 'resource':
    case 'raw':
      return false;
  }
}
