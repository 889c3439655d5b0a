export { parseNativeSource, parseNativeText, detectLanguage } from './parser/index.js';
export type { ExtractionResult, ExtractOptions, SourceLanguage } from './parser/index.js';

export { validateSurface } from './surface/validateSurface.js';
export { fingerprintSurface } from './surface/fingerprint.js';
export { parseAnnotations } from './surface/annotations.js';
export { describeSignature, describeType } from './surface/nativeType.js';
export type {
  ExampleCall,
  ExampleValue,
  FunctionAnnotations,
  NativeFunction,
  NativeParam,
  NativeSurface,
  NativeType,
  PlainStruct,
  StructField,
} from './surface/surfaceTypes.js';

export { classifySurface } from './classify/classifySurface.js';
export type { Access, BoundMethod, Classification, ResourceClass, StructFunctions } from './classify/classifyTypes.js';

export { createTypeMapper } from './mapper/typeMap.js';
export { planHarness } from './harness/planHarness.js';

export * from './emit/index.js';

export type { Diagnostic, DiagnosticKind, DiagnosticSubject } from './report/diagnostics.js';
export { formatDiagnostic, formatReport, mergeDiagnostics } from './report/formatReport.js';
export type { GenerationReport, UnitSummary } from './report/formatReport.js';
export { formatInspection, inspectSurface } from './report/inspectSurface.js';
export type { SurfaceInspection } from './report/inspectSurface.js';

export { loadOptionalConfig, validateConfig } from './dx/config.js';
export type { BindsmithConfig } from './dx/config.js';
export { setDebugEnabled } from './dx/logger.js';

export { BindsmithError, ConfigError, UnknownTargetError, UnsupportedSourceError, UsageError } from './errors.js';
export { runCli } from './runCli.js';
