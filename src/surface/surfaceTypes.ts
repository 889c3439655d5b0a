export type IntegerWidth = 8 | 16 | 32 | 64 | 'size';

export type FloatWidth = 32 | 64;

export type Mutability = 'const' | 'mut';

export type NativeType =
  | {
      kind: 'integer';
      /** `'size'` is pointer-sized; `null` means the native ABI leaves it undefined (e.g. `long`). */
      width: IntegerWidth | null;
      signed: boolean;
      spelling?: string;
    }
  | { kind: 'float'; width: FloatWidth | null; spelling?: string }
  | { kind: 'bool' }
  | { kind: 'pointer'; to: NativeType; mutability: Mutability }
  | { kind: 'opaque'; tag: string }
  | { kind: 'struct'; name: string }
  | { kind: 'void' }
  | { kind: 'unsupported'; spelling: string; reason: string };

export type NativeTypeKind = NativeType['kind'];

/** Outermost indirection of a parameter. `type` is the pointee for the pointer forms. */
export type Passing = 'value' | 'pointer' | 'mut-pointer';

export type NativeParam = {
  name: string;
  type: NativeType;
  passing: Passing;
};

export type ExampleValue =
  | number
  | boolean
  | null
  | ExampleValue[]
  | { [field: string]: ExampleValue };

export type ExampleCall = {
  /** Function or method name as written in the annotation. */
  callee: string;
  args: ExampleValue[];
  /** `undefined` when the call has no expectation. */
  expect?: ExampleValue;
};

export type FunctionAnnotations = {
  examples?: ExampleCall[];
  scenario?: ExampleCall[];
  rename?: string;
};

export type NativeFunction = {
  name: string;
  params: NativeParam[];
  returns: NativeType;
  sourceLine?: number;
  annotations?: FunctionAnnotations;
};

export type StructField = {
  name: string;
  type: NativeType;
};

export type PlainStruct = {
  name: string;
  fields: StructField[];
  sourceLine?: number;
};

export type NativeSurface = {
  /** Native artifact name, without platform prefix or extension (`ffi_example`). */
  library: string;
  functions: NativeFunction[];
  structs: PlainStruct[];
  opaqueTags: string[];
  source?: string;
};
