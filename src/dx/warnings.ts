import type { Diagnostic } from '../report/diagnostics.js';
import { formatSubject } from '../report/diagnostics.js';
import { logWarn } from './logger.js';

/** Logs a non-fatal generation diagnostic; silent unless debug logging is on. */
export function warn(d: Diagnostic): void {
  const hint = d.hint ? ` Hint: ${d.hint}` : '';
  const target = d.target ? ` [${d.target}]` : '';
  logWarn(`warning(${d.kind})${target}: ${formatSubject(d.subject)}: ${d.message}${hint}`);
}
