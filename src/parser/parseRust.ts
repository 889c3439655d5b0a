import type { NativeFunction, NativeParam, PlainStruct } from '../surface/surfaceTypes.js';
import { paramFromType } from '../surface/nativeType.js';
import type { Diagnostic } from '../report/diagnostics.js';
import { functionSubject } from '../report/diagnostics.js';
import type { Extracted, SyntaxNode } from './parserTypes.js';
import type { DeclaredTypes } from './typeSpelling.js';
import { parseRustType } from './typeSpelling.js';
import { annotationsAbove } from './attachAnnotations.js';

function items(root: SyntaxNode): SyntaxNode[] {
  const out: SyntaxNode[] = [];
  for (const child of root.namedChildren) {
    if (child.type === 'mod_item') {
      const body = child.childForFieldName('body');
      if (body) out.push(...items(body));
    } else {
      out.push(child);
    }
  }
  return out;
}

function attributesOf(node: SyntaxNode): string[] {
  const attrs: string[] = [];
  let prev = node.previousNamedSibling;
  while (prev && (prev.type === 'attribute_item' || prev.type === 'line_comment' || prev.type === 'block_comment')) {
    if (prev.type === 'attribute_item') attrs.push(prev.text);
    prev = prev.previousNamedSibling;
  }
  return attrs;
}

function isReprC(node: SyntaxNode): boolean {
  return attributesOf(node).some((a) => /\brepr\s*\(\s*C\b/.test(a));
}

function isExportedCFunction(node: SyntaxNode): boolean {
  const pub = node.namedChildren.some((c) => c.type === 'visibility_modifier' && c.text.startsWith('pub'));
  const externC = node.namedChildren.some((c) => c.type === 'function_modifiers' && /extern\s+"C"/.test(c.text));
  return pub && externC;
}

function patternName(pattern: SyntaxNode | null, index: number): string {
  const name = pattern?.text.replace(/^mut\s+/, '').trim();
  return name && /^[A-Za-z][A-Za-z0-9_]*$/.test(name) ? name : `arg${index}`;
}

/**
 * Extracts `pub extern "C" fn` items. `#[repr(C)]` structs with named fields
 * are plain structs; every other struct is an opaque tag.
 */
export function extractRust(root: SyntaxNode, source: string): Extracted {
  const lines = source.split(/\r?\n/);
  const diagnostics: Diagnostic[] = [];
  const all = items(root);

  const plainNodes: SyntaxNode[] = [];
  const opaqueTags: string[] = [];
  const aliases = new Map<string, string>();
  for (const node of all) {
    if (node.type === 'struct_item') {
      const name = node.childForFieldName('name')?.text;
      if (!name) continue;
      const body = node.childForFieldName('body');
      if (isReprC(node) && body?.type === 'field_declaration_list') plainNodes.push(node);
      else if (!opaqueTags.includes(name)) opaqueTags.push(name);
    } else if (node.type === 'type_item') {
      const name = node.childForFieldName('name')?.text;
      const type = node.childForFieldName('type')?.text;
      if (name && type) aliases.set(name, type);
    }
  }

  const known: DeclaredTypes = {
    structs: new Set(plainNodes.map((n) => n.childForFieldName('name')?.text ?? '')),
    opaque: new Set(opaqueTags),
    aliases,
  };

  const structs: PlainStruct[] = plainNodes.map((node) => {
    const fields: PlainStruct['fields'] = [];
    for (const f of node.childForFieldName('body')?.namedChildren ?? []) {
      if (f.type !== 'field_declaration') continue;
      const name = f.childForFieldName('name')?.text;
      const type = f.childForFieldName('type')?.text;
      if (name && type) fields.push({ name, type: parseRustType(type, known) });
    }
    return { name: node.childForFieldName('name')?.text ?? '', fields, sourceLine: node.startPosition.row + 1 };
  });

  const functions: NativeFunction[] = [];
  for (const node of all) {
    if (node.type !== 'function_item' || !isExportedCFunction(node)) continue;
    const name = node.childForFieldName('name')?.text;
    const paramsNode = node.childForFieldName('parameters');
    if (!name || !paramsNode) continue;
    const sourceLine = node.startPosition.row + 1;

    if (paramsNode.namedChildren.some((p) => p.type === 'variadic_parameter')) {
      diagnostics.push({
        kind: 'UnmappableType',
        subject: functionSubject(name),
        message: `${name} is variadic; its calling convention cannot be declared`,
        hint: 'Export a fixed-signature wrapper function instead.',
        sourceLine,
      });
      continue;
    }

    const params: NativeParam[] = paramsNode.namedChildren
      .filter((p) => p.type === 'parameter')
      .map((p, i) =>
        paramFromType(patternName(p.childForFieldName('pattern'), i), parseRustType(p.childForFieldName('type')?.text ?? '', known)),
      );

    const fn: NativeFunction = {
      name,
      params,
      returns: parseRustType(node.childForFieldName('return_type')?.text ?? '()', known),
      sourceLine,
    };
    const annotations = annotationsAbove(lines, name, sourceLine, diagnostics);
    if (annotations) fn.annotations = annotations;
    functions.push(fn);
  }

  return { functions, structs, opaqueTags, diagnostics };
}
