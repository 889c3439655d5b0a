import type { Diagnostic } from '../report/diagnostics.js';
import type { TargetTypeTable } from '../mapper/mapperTypes.js';
import type { BindingModel } from './bindingModel.js';

export type TargetLanguage = 'rust' | 'go' | 'typescript';

export const TARGET_LANGUAGES: readonly TargetLanguage[] = ['rust', 'go', 'typescript'];

export function isTargetLanguage(v: string): v is TargetLanguage {
  return TARGET_LANGUAGES.some((t) => t === v);
}

export type EmittedDeclKind =
  | 'raw-function'
  | 'raw-type'
  | 'function'
  | 'record'
  | 'resource'
  | 'support'
  | 'test';

export type EmittedDecl = {
  kind: EmittedDeclKind;
  /** Symbol the declaration introduces (native name for raw declarations). */
  symbol: string;
  code: string;
};

export type EmittedFile = {
  /** Path relative to the output directory. */
  path: string;
  contents: string;
};

export type BindingUnit = {
  target: TargetLanguage;
  library: string;
  rawDeclarations: EmittedDecl[];
  wrappers: EmittedDecl[];
  tests: EmittedDecl[];
  files: EmittedFile[];
  diagnostics: Diagnostic[];
};

export type EmitOptions = {
  /** Emit the verification harness. */
  tests: boolean;
  /** Module specifier the generated TypeScript imports its runtime from. */
  runtimeImport: string;
};

export type TargetBackend = {
  readonly target: TargetLanguage;
  readonly types: TargetTypeTable;
  emit(model: BindingModel, options: EmitOptions): BindingUnit;
};
