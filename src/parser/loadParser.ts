import { createRequire } from 'node:module';

import Parser from 'tree-sitter';

export type SourceLanguage = 'c' | 'cpp' | 'rust';

const GRAMMARS: Record<SourceLanguage, string> = {
  c: 'tree-sitter-c',
  cpp: 'tree-sitter-cpp',
  rust: 'tree-sitter-rust',
};

// Grammar packages are CommonJS native modules.
const require = createRequire(import.meta.url);
const parsers = new Map<SourceLanguage, Parser>();

export function createParser(lang: SourceLanguage): Parser {
  const cached = parsers.get(lang);
  if (cached) return cached;

  const grammar: unknown = require(GRAMMARS[lang]);
  const parser = new Parser();
  parser.setLanguage(grammar);
  parsers.set(lang, parser);
  return parser;
}

export function parseTree(lang: SourceLanguage, source: string): Parser.Tree {
  // The default input buffer is too small for large sources.
  return createParser(lang).parse(source, undefined, { bufferSize: Math.max(32 * 1024, source.length * 2) });
}
