export { BACKENDS, DEFAULT_RUNTIME_IMPORT, generateBindings, resolveTargets } from './generateBindings.js';
export type { GenerateOptions, GenerationResult } from './generateBindings.js';
export { buildBindingModel } from './bindingModel.js';
export type { BindingModel, ResourcePlan, StructPlan, WrapperParam, WrapperPlan } from './bindingModel.js';
export { writeBindingUnit } from './writeBindings.js';
export { TARGET_LANGUAGES, isTargetLanguage } from './emitTypes.js';
export type { BindingUnit, EmitOptions, EmittedDecl, EmittedFile, TargetBackend, TargetLanguage } from './emitTypes.js';
