import type { TargetLanguage } from '../emit/emitTypes.js';

export type DiagnosticKind =
  | 'UnmappableType'
  | 'AmbiguousLifetime'
  | 'ConventionViolation'
  | 'InvalidAnnotation';

export type DiagnosticSubject =
  | { kind: 'function'; name: string }
  | { kind: 'struct'; name: string }
  | { kind: 'handle'; tag: string };

export type Diagnostic = {
  kind: DiagnosticKind;
  subject: DiagnosticSubject;
  message: string;
  /** What a human can change to remove the diagnostic. */
  hint?: string;
  /** Set when the diagnostic only applies to one target's BindingUnit. */
  target?: TargetLanguage;
  sourceLine?: number;
};

export function functionSubject(name: string): DiagnosticSubject {
  return { kind: 'function', name };
}

export function structSubject(name: string): DiagnosticSubject {
  return { kind: 'struct', name };
}

export function handleSubject(tag: string): DiagnosticSubject {
  return { kind: 'handle', tag };
}

export function formatSubject(subject: DiagnosticSubject): string {
  switch (subject.kind) {
    case 'function':
      return `function ${subject.name}`;
    case 'struct':
      return `struct ${subject.name}`;
    case 'handle':
      return `handle ${subject.tag}`;
  }
}

export function subjectKey(subject: DiagnosticSubject): string {
  return subject.kind === 'handle' ? `handle:${subject.tag}` : `${subject.kind}:${subject.name}`;
}
