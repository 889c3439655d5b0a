import type { NativeSurface } from '../surface/surfaceTypes.js';
import { validateSurface } from '../surface/validateSurface.js';
import { fingerprintSurface } from '../surface/fingerprint.js';
import { classifySurface } from '../classify/classifySurface.js';
import { UnknownTargetError } from '../errors.js';
import { warn } from '../dx/warnings.js';
import { traceDebug, traceInfo, traceTimed } from '../dx/trace.js';
import type { Diagnostic } from '../report/diagnostics.js';
import type { GenerationReport } from '../report/formatReport.js';
import { mergeDiagnostics, summarizeUnit } from '../report/formatReport.js';
import { buildBindingModel } from './bindingModel.js';
import type { BindingUnit, TargetBackend, TargetLanguage } from './emitTypes.js';
import { TARGET_LANGUAGES, isTargetLanguage } from './emitTypes.js';
import { rustBackend } from './rust/rustEmitter.js';
import { goBackend } from './go/goEmitter.js';
import { typescriptBackend } from './typescript/tsEmitter.js';

export const BACKENDS: Record<TargetLanguage, TargetBackend> = {
  rust: rustBackend,
  go: goBackend,
  typescript: typescriptBackend,
};

export const DEFAULT_RUNTIME_IMPORT = 'bindsmith/runtime';

export type GenerateOptions = {
  targets?: readonly TargetLanguage[];
  /** Emit verification harnesses (default true). */
  tests?: boolean;
  runtimeImport?: string;
  /** Safe-wrapper names by native symbol; wins over `@rename`. */
  rename?: Record<string, string>;
  /** Diagnostics raised while extracting the surface; merged into the report. */
  extractionDiagnostics?: readonly Diagnostic[];
};

export type GenerationResult = {
  units: BindingUnit[];
  report: GenerationReport;
};

/** Parses target names as given on the command line (`rust,go`). */
export function resolveTargets(names: readonly string[]): TargetLanguage[] {
  const targets: TargetLanguage[] = [];
  for (const raw of names) {
    const name = raw.trim().toLowerCase();
    const t = name === 'ts' ? 'typescript' : name;
    if (!isTargetLanguage(t)) throw new UnknownTargetError(raw);
    if (!targets.includes(t)) targets.push(t);
  }
  return targets;
}

function applyRenames(surface: NativeSurface, rename: Record<string, string> | undefined): NativeSurface {
  if (!rename) return surface;
  return {
    ...surface,
    functions: surface.functions.map((fn) => {
      const name = rename[fn.name];
      return name ? { ...fn, annotations: { ...fn.annotations, rename: name } } : fn;
    }),
  };
}

/**
 * Runs the whole pipeline for one surface: validation, classification, and
 * one BindingUnit per target. Diagnostics never abort the run. Output is a
 * pure function of the surface and options.
 */
export function generateBindings(input: NativeSurface, options: GenerateOptions = {}): GenerationResult {
  const targets = options.targets?.length ? [...options.targets] : [...TARGET_LANGUAGES];
  traceInfo('generate.start', { library: input.library, targets });

  const validated = validateSurface(applyRenames(input, options.rename));
  const surface = validated.surface;
  const classification = classifySurface(surface);
  const fingerprint = fingerprintSurface(surface);
  const shared = [...(options.extractionDiagnostics ?? []), ...validated.diagnostics, ...classification.diagnostics];

  const units = targets.map((target) => {
    const backend = BACKENDS[target];
    const model = buildBindingModel({ surface, classification, fingerprint, target, types: backend.types });
    const unit = traceTimed('generate.emit', { target }, () =>
      backend.emit(model, {
        tests: options.tests ?? true,
        runtimeImport: options.runtimeImport ?? DEFAULT_RUNTIME_IMPORT,
      }),
    );
    traceDebug('generate.unit', { target, files: unit.files.map((f) => f.path), diagnostics: unit.diagnostics.length });
    return { ...unit, diagnostics: mergeDiagnostics([shared, unit.diagnostics], [target]) };
  });

  const diagnostics = mergeDiagnostics([shared, ...units.map((u) => u.diagnostics)], targets);
  diagnostics.forEach(warn);

  traceInfo('generate.done', { library: surface.library, diagnostics: diagnostics.length });
  return {
    units,
    report: {
      library: surface.library,
      fingerprint,
      units: units.map(summarizeUnit),
      diagnostics,
    },
  };
}
