/** Indents every non-empty line of `lines` by `depth` units. */
export function indent(lines: string[], unit: string, depth = 1): string[] {
  const pad = unit.repeat(depth);
  return lines.map((l) => (l ? pad + l : l));
}

/** Joins blocks with one blank line between them; the file ends in a newline. */
export function joinBlocks(blocks: string[]): string {
  return blocks.filter((b) => b.length > 0).join('\n\n') + '\n';
}

/** Renders a numeric literal that the target parses as floating point. */
export function floatLiteral(v: number): string {
  const s = String(v);
  return /[.eE]/.test(s) ? s : `${s}.0`;
}

export function headerLines(comment: string, source: string | undefined, fingerprint: string): string[] {
  const from = source ? ` from ${source.split(/[\\/]/).pop()}` : '';
  return [
    `${comment} Code generated by bindsmith${from}. DO NOT EDIT.`,
    `${comment} surface ${fingerprint}`,
  ];
}
