import type { BindingUnit, TargetLanguage } from '../emit/emitTypes.js';
import type { Diagnostic } from './diagnostics.js';
import { formatSubject, subjectKey } from './diagnostics.js';

export type UnitSummary = {
  target: TargetLanguage;
  files: string[];
  wrappers: number;
  tests: number;
};

export type GenerationReport = {
  library: string;
  fingerprint: string;
  units: UnitSummary[];
  diagnostics: Diagnostic[];
};

/**
 * Collapses repeated diagnostics. One reported for every target (or with no
 * target) is kept once, untargeted; otherwise one entry per target remains.
 * First-seen order is preserved.
 */
export function mergeDiagnostics(lists: Diagnostic[][], targets: readonly TargetLanguage[]): Diagnostic[] {
  const groups = new Map<string, { first: Diagnostic; targets: Set<TargetLanguage>; untargeted: boolean }>();
  for (const d of lists.flat()) {
    const key = `${d.kind}|${subjectKey(d.subject)}|${d.message}`;
    let group = groups.get(key);
    if (!group) {
      group = { first: d, targets: new Set(), untargeted: false };
      groups.set(key, group);
    }
    if (d.target) group.targets.add(d.target);
    else group.untargeted = true;
  }

  const merged: Diagnostic[] = [];
  for (const { first, targets: seen, untargeted } of groups.values()) {
    const everywhere = untargeted || (targets.length > 1 && targets.every((t) => seen.has(t)));
    if (everywhere) {
      const { target: _target, ...rest } = first;
      merged.push(rest);
      continue;
    }
    for (const t of targets) {
      if (seen.has(t)) merged.push({ ...first, target: t });
    }
  }
  return merged;
}

export function summarizeUnit(unit: BindingUnit): UnitSummary {
  return {
    target: unit.target,
    files: unit.files.map((f) => f.path),
    wrappers: unit.wrappers.length,
    tests: unit.tests.length,
  };
}

export function formatDiagnostic(d: Diagnostic): string {
  const target = d.target ? ` [${d.target}]` : '';
  const line = d.sourceLine !== undefined ? ` (line ${d.sourceLine})` : '';
  const head = `${d.kind}${target} ${formatSubject(d.subject)}${line}: ${d.message}`;
  return d.hint ? `${head}\n    hint: ${d.hint}` : head;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

export function formatReport(report: GenerationReport): string {
  const lines = [`${report.library} (surface ${report.fingerprint.slice(0, 12)})`];
  for (const u of report.units) {
    lines.push(`  ${u.target}: ${plural(u.wrappers, 'wrapper')}, ${plural(u.tests, 'check')} -> ${u.files.join(', ')}`);
  }
  if (report.diagnostics.length) {
    lines.push('', plural(report.diagnostics.length, 'diagnostic'));
    for (const d of report.diagnostics) lines.push(`  ${formatDiagnostic(d)}`);
  }
  return lines.join('\n');
}
