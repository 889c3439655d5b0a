import type { ExampleCall, ExampleValue, FunctionAnnotations } from './surfaceTypes.js';

export type AnnotationParseResult = {
  annotations?: FunctionAnnotations;
  errors: string[];
};

const MAX_COMMENT_LINES = 20;

function isCommentLine(line: string): boolean {
  const t = line.trim();
  return t.startsWith('//') || t.startsWith('/*') || t.startsWith('*');
}

function isAttributeLine(line: string): boolean {
  return line.trim().startsWith('#[');
}

function stripCommentMarkers(line: string): string {
  return line
    .trim()
    .replace(/^\/\/\/?!?/, '')
    .replace(/^\/\*\*?/, '')
    .replace(/\*\/$/, '')
    .replace(/^\*/, '')
    .trim();
}

/**
 * Returns the comment block directly above `declarationLine` (1-based),
 * skipping Rust attribute lines. A blank line ends the block.
 */
export function commentBlockAbove(lines: string[], declarationLine: number): string[] {
  const out: string[] = [];
  for (let i = declarationLine - 2; i >= 0 && out.length < MAX_COMMENT_LINES; i--) {
    const line = lines[i] ?? '';
    if (isAttributeLine(line)) continue;
    if (!isCommentLine(line)) break;
    out.unshift(stripCommentMarkers(line));
  }
  return out;
}

function toExampleValue(v: unknown): ExampleValue | undefined {
  if (v === null || typeof v === 'number' || typeof v === 'boolean') return v;
  if (Array.isArray(v)) {
    const items: ExampleValue[] = [];
    for (const item of v) {
      const converted = toExampleValue(item);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  if (typeof v === 'object') {
    const out: { [field: string]: ExampleValue } = {};
    for (const [key, value] of Object.entries(v)) {
      const converted = toExampleValue(value);
      if (converted === undefined) return undefined;
      out[key] = converted;
    }
    return out;
  }
  return undefined;
}

function parseJson(text: string): ExampleValue | undefined {
  try {
    return toExampleValue(JSON.parse(text));
  } catch {
    return undefined;
  }
}

/** Parses `name(<json args>) [=> <json>]`. */
export function parseExampleCall(text: string): ExampleCall | string {
  const arrow = text.indexOf('=>');
  const callText = (arrow === -1 ? text : text.slice(0, arrow)).trim();
  const expectText = arrow === -1 ? undefined : text.slice(arrow + 2).trim();

  const m = callText.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*\(([\s\S]*)\)$/);
  if (!m) return `expected name(args), got "${callText}"`;

  const args = parseJson(`[${m[2]}]`);
  if (!Array.isArray(args)) return `arguments of ${m[1]} are not valid JSON values: (${m[2]})`;

  const call: ExampleCall = { callee: m[1], args };
  if (expectText !== undefined) {
    const expected = parseJson(expectText);
    if (expected === undefined) return `expectation of ${m[1]} is not a JSON value: ${expectText}`;
    call.expect = expected;
  }
  return call;
}

export function parseAnnotations(commentLines: string[]): AnnotationParseResult {
  const errors: string[] = [];
  const annotations: FunctionAnnotations = {};

  for (const line of commentLines) {
    const example = line.match(/^@example\s+(.+)$/);
    if (example) {
      const call = parseExampleCall(example[1]);
      if (typeof call === 'string') errors.push(`@example: ${call}`);
      else (annotations.examples ??= []).push(call);
      continue;
    }

    const scenario = line.match(/^@scenario\s+(.+)$/);
    if (scenario) {
      const steps: ExampleCall[] = [];
      let ok = true;
      for (const part of scenario[1].split(';')) {
        if (!part.trim()) continue;
        const call = parseExampleCall(part.trim());
        if (typeof call === 'string') {
          errors.push(`@scenario: ${call}`);
          ok = false;
          break;
        }
        steps.push(call);
      }
      if (ok && steps.length) annotations.scenario = steps;
      continue;
    }

    const rename = line.match(/^@rename\s+(\S+)\s*$/);
    if (rename) {
      if (/^[a-z_][a-z0-9_]*$/.test(rename[1])) annotations.rename = rename[1];
      else errors.push(`@rename: "${rename[1]}" is not a snake_case identifier`);
    }
  }

  const empty = !annotations.examples && !annotations.scenario && !annotations.rename;
  return empty ? { errors } : { annotations, errors };
}
