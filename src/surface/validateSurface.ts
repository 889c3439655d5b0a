import type { NativeFunction, NativeSurface, PlainStruct } from './surfaceTypes.js';
import type { Diagnostic } from '../report/diagnostics.js';
import { functionSubject, structSubject } from '../report/diagnostics.js';

export type SurfaceValidation = {
  surface: NativeSurface;
  diagnostics: Diagnostic[];
};

function mutatesStructAndReturnsStruct(fn: NativeFunction): boolean {
  if (fn.returns.kind !== 'struct') return false;
  return fn.params.some((p) => p.type.kind === 'struct' && p.passing === 'mut-pointer');
}

/**
 * Checks the native conventions generation relies on. Offending
 * declarations are dropped from the returned surface; nothing throws.
 */
export function validateSurface(surface: NativeSurface): SurfaceValidation {
  const diagnostics: Diagnostic[] = [];

  const seenFunctions = new Set<string>();
  const functions: NativeFunction[] = [];
  for (const fn of surface.functions) {
    if (seenFunctions.has(fn.name)) {
      diagnostics.push({
        kind: 'ConventionViolation',
        subject: functionSubject(fn.name),
        message: `duplicate symbol ${fn.name}; only the first declaration is bound`,
        hint: 'Exported C symbols must be unique per native artifact.',
        sourceLine: fn.sourceLine,
      });
      continue;
    }
    seenFunctions.add(fn.name);

    if (mutatesStructAndReturnsStruct(fn)) {
      diagnostics.push({
        kind: 'ConventionViolation',
        subject: functionSubject(fn.name),
        message: `${fn.name} takes a struct by mutable pointer and also returns a struct by value`,
        hint: 'Pass the struct by value or const pointer, or return void.',
        sourceLine: fn.sourceLine,
      });
      continue;
    }

    functions.push(fn);
  }

  const seenStructs = new Set<string>();
  const structs: PlainStruct[] = [];
  for (const s of surface.structs) {
    if (seenStructs.has(s.name)) {
      diagnostics.push({
        kind: 'ConventionViolation',
        subject: structSubject(s.name),
        message: `struct ${s.name} is declared more than once; only the first declaration is bound`,
        sourceLine: s.sourceLine,
      });
      continue;
    }
    seenStructs.add(s.name);
    structs.push(s);
  }

  return {
    surface: { ...surface, functions, structs },
    diagnostics,
  };
}
