import type { FunctionAnnotations } from '../surface/surfaceTypes.js';
import { commentBlockAbove, parseAnnotations } from '../surface/annotations.js';
import type { Diagnostic } from '../report/diagnostics.js';
import { functionSubject } from '../report/diagnostics.js';

/**
 * Reads the annotations in the comment block above a declaration. Malformed
 * ones are reported and left out.
 */
export function annotationsAbove(
  lines: string[],
  fnName: string,
  line: number,
  diagnostics: Diagnostic[],
): FunctionAnnotations | undefined {
  const parsed = parseAnnotations(commentBlockAbove(lines, line));
  for (const error of parsed.errors) {
    diagnostics.push({
      kind: 'InvalidAnnotation',
      subject: functionSubject(fnName),
      message: error,
      hint: 'See the annotation syntax: @example name(args) => result, @scenario ctor(args); method(args) => result, @rename name.',
      sourceLine: line,
    });
  }
  return parsed.annotations;
}
