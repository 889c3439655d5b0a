import type { NativeFunction } from '../surface/surfaceTypes.js';
import type { Diagnostic } from '../report/diagnostics.js';

/** `shared` calls only read the resource; `exclusive` calls may modify it. */
export type Access = 'shared' | 'exclusive';

export type BoundMethod = {
  fn: NativeFunction;
  /** Target-neutral snake_case name, owner prefix removed. */
  name: string;
  access: Access;
};

export type ResourceClass = {
  tag: string;
  ctor: NativeFunction;
  dtor: NativeFunction;
  /** `convention` when the destructor's name also says so. */
  dtorConfidence: 'convention' | 'structural';
  methods: BoundMethod[];
};

export type StructFunctions = {
  struct: string;
  /** Functions returning the struct by value without taking it. */
  factories: { fn: NativeFunction; name: string }[];
  /** Functions whose first parameter is the struct. */
  methods: BoundMethod[];
};

export type Classification = {
  resources: ResourceClass[];
  structFunctions: StructFunctions[];
  freeFunctions: NativeFunction[];
  /** Functions of handle tags whose lifetime could not be classified. */
  rawHandleFunctions: NativeFunction[];
  degradedTags: string[];
  diagnostics: Diagnostic[];
};
