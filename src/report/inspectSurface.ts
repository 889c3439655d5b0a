import type { NativeSurface } from '../surface/surfaceTypes.js';
import { describeSignature, describeType } from '../surface/nativeType.js';
import { validateSurface } from '../surface/validateSurface.js';
import { fingerprintSurface } from '../surface/fingerprint.js';
import { classifySurface } from '../classify/classifySurface.js';
import type { Diagnostic } from './diagnostics.js';
import { formatDiagnostic, mergeDiagnostics } from './formatReport.js';

export type ResourceSummary = {
  tag: string;
  ctor: string;
  dtor: string;
  dtorConfidence: 'convention' | 'structural';
  /** `name:access` pairs. */
  methods: string[];
};

/** What `bindsmith inspect` shows: the surface as bindsmith understands it. */
export type SurfaceInspection = {
  library: string;
  fingerprint: string;
  functions: string[];
  structs: { name: string; fields: string[] }[];
  resources: ResourceSummary[];
  degradedTags: string[];
  diagnostics: Diagnostic[];
};

export function inspectSurface(input: NativeSurface, extractionDiagnostics: readonly Diagnostic[] = []): SurfaceInspection {
  const { surface, diagnostics: validation } = validateSurface(input);
  const classification = classifySurface(surface);
  return {
    library: surface.library,
    fingerprint: fingerprintSurface(surface),
    functions: surface.functions.map(describeSignature),
    structs: surface.structs.map((s) => ({
      name: s.name,
      fields: s.fields.map((f) => `${f.name}: ${describeType(f.type)}`),
    })),
    resources: classification.resources.map((r) => ({
      tag: r.tag,
      ctor: r.ctor.name,
      dtor: r.dtor.name,
      dtorConfidence: r.dtorConfidence,
      methods: r.methods.map((m) => `${m.name}:${m.access}`),
    })),
    degradedTags: classification.degradedTags,
    diagnostics: mergeDiagnostics([[...extractionDiagnostics], validation, classification.diagnostics], []),
  };
}

export function formatInspection(i: SurfaceInspection): string {
  const lines = [`${i.library} (surface ${i.fingerprint.slice(0, 12)})`];

  lines.push(`functions (${i.functions.length}):`);
  for (const sig of i.functions) lines.push(`  ${sig}`);

  if (i.structs.length) {
    lines.push(`structs (${i.structs.length}):`);
    for (const s of i.structs) lines.push(`  ${s.name} { ${s.fields.join(', ')} }`);
  }

  if (i.resources.length) {
    lines.push(`resources (${i.resources.length}):`);
    for (const r of i.resources) {
      const methods = r.methods.length ? `; methods ${r.methods.join(', ')}` : '';
      lines.push(`  ${r.tag}: ${r.ctor} -> ${r.dtor} (${r.dtorConfidence})${methods}`);
    }
  }

  if (i.degradedTags.length) lines.push(`raw handles: ${i.degradedTags.join(', ')}`);

  if (i.diagnostics.length) {
    lines.push('', `${i.diagnostics.length} diagnostic${i.diagnostics.length === 1 ? '' : 's'}`);
    for (const d of i.diagnostics) lines.push(`  ${formatDiagnostic(d)}`);
  }
  return lines.join('\n');
}
