import type Parser from 'tree-sitter';

import type { NativeFunction, NativeSurface, PlainStruct } from '../surface/surfaceTypes.js';
import type { Diagnostic } from '../report/diagnostics.js';

export type SyntaxNode = Parser.SyntaxNode;

/** What one grammar-specific pass finds in a source file. */
export type Extracted = {
  functions: NativeFunction[];
  structs: PlainStruct[];
  opaqueTags: string[];
  diagnostics: Diagnostic[];
};

export type ExtractionResult = {
  surface: NativeSurface;
  /** `InvalidAnnotation` and variadic-function diagnostics. */
  diagnostics: Diagnostic[];
};

export type ExtractOptions = {
  /** Native artifact name; defaults to the source file's base name. */
  library?: string;
  /** Path recorded in the surface and generated headers. */
  source?: string;
};
