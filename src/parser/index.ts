import { existsSync, readFileSync } from 'node:fs';
import { basename, extname } from 'node:path';

import type { NativeSurface } from '../surface/surfaceTypes.js';
import { UnsupportedSourceError } from '../errors.js';
import { createLogger } from '../dx/logger.js';
import { traceInfo } from '../dx/trace.js';
import type { SourceLanguage } from './loadParser.js';
import { parseTree } from './loadParser.js';
import { extractC } from './parseC.js';
import { extractRust } from './parseRust.js';
import { inferVoidHandles } from './inferHandles.js';
import type { Extracted, ExtractionResult, ExtractOptions } from './parserTypes.js';

const log = createLogger('parser');

const EXTENSIONS: Record<string, SourceLanguage> = {
  '.c': 'c',
  '.h': 'c',
  '.cpp': 'cpp',
  '.cc': 'cpp',
  '.cxx': 'cpp',
  '.hpp': 'cpp',
  '.hh': 'cpp',
  '.hxx': 'cpp',
  '.rs': 'rust',
};

export function detectLanguage(file: string): SourceLanguage {
  const lang = EXTENSIONS[extname(file).toLowerCase()];
  if (!lang) throw new UnsupportedSourceError(file, `cannot extract a surface from "${extname(file) || 'no extension'}" files`);
  return lang;
}

/** Builds the C-ABI surface declared by one source text. */
export function parseNativeText(text: string, language: SourceLanguage, options: ExtractOptions = {}): ExtractionResult {
  const tree = parseTree(language, text);
  const extracted: Extracted =
    language === 'rust' ? extractRust(tree.rootNode, text) : extractC(tree.rootNode, text, language);

  const inferred = inferVoidHandles(
    extracted.functions,
    new Set(extracted.structs.map((s) => s.name)),
    extracted.opaqueTags,
  );

  const surface: NativeSurface = {
    library: options.library ?? 'native',
    functions: inferred.functions,
    structs: extracted.structs,
    opaqueTags: inferred.opaqueTags,
  };
  if (options.source) surface.source = options.source;

  traceInfo('parser.extract', {
    language,
    functions: surface.functions.length,
    structs: surface.structs.length,
    handles: surface.opaqueTags.length,
  });
  return { surface, diagnostics: extracted.diagnostics };
}

/** Reads and extracts a source file; the library name defaults to its base name. */
export function parseNativeSource(file: string, options: ExtractOptions = {}): ExtractionResult {
  const language = detectLanguage(file);
  if (!existsSync(file)) throw new UnsupportedSourceError(file, 'no such file');
  const text = readFileSync(file, 'utf8');
  log.debug('extract', file, 'as', language);
  return parseNativeText(text, language, {
    library: options.library ?? basename(file, extname(file)),
    source: options.source ?? file,
  });
}

export type { SourceLanguage } from './loadParser.js';
export type { ExtractionResult, ExtractOptions } from './parserTypes.js';
