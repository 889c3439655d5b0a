import type { NativeFunction, NativeParam, PlainStruct } from '../surface/surfaceTypes.js';
import { describeSignature, paramFromType, voidType } from '../surface/nativeType.js';
import type { Diagnostic } from '../report/diagnostics.js';
import { functionSubject } from '../report/diagnostics.js';
import { traceDebug } from '../dx/trace.js';
import type { Extracted, SyntaxNode } from './parserTypes.js';
import type { DeclaredTypes } from './typeSpelling.js';
import { parseCType } from './typeSpelling.js';
import { annotationsAbove } from './attachAnnotations.js';

const CONTAINERS = new Set([
  'translation_unit',
  'preproc_ifdef',
  'preproc_if',
  'preproc_else',
  'preproc_elif',
  'preproc_elifdef',
  'declaration_list',
]);

const NAME_NODES = new Set(['identifier', 'field_identifier', 'type_identifier']);

const DECLARATOR_NODES = new Set([
  'identifier',
  'field_identifier',
  'type_identifier',
  'pointer_declarator',
  'array_declarator',
  'function_declarator',
  'parenthesized_declarator',
  'reference_declarator',
  'init_declarator',
]);

// Children that say nothing about a declaration's type.
const NON_TYPE_NODES = new Set([
  'storage_class_specifier',
  'attribute_specifier',
  'attribute_declaration',
  'ms_declspec_modifier',
  'virtual',
  'comment',
  'typedef',
]);

function line(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

/** Text of `outer` with `inner` cut out: the declarator minus its name. */
function without(outer: SyntaxNode, inner: SyntaxNode | undefined): string {
  if (!inner) return outer.text;
  const start = inner.startIndex - outer.startIndex;
  const end = inner.endIndex - outer.startIndex;
  return outer.text.slice(0, start) + outer.text.slice(end);
}

function innermostName(node: SyntaxNode): SyntaxNode | undefined {
  if (NAME_NODES.has(node.type)) return node;
  const inner = node.childForFieldName('declarator');
  return inner ? innermostName(inner) : undefined;
}

/** Declaration specifiers written before `before` (or before the end). */
function specifierText(node: SyntaxNode, before?: SyntaxNode): string {
  return node.namedChildren
    .filter((c) => (!before || c.startIndex < before.startIndex) && !NON_TYPE_NODES.has(c.type))
    .map((c) => c.text)
    .join(' ');
}

function declaratorsOf(node: SyntaxNode): SyntaxNode[] {
  const type = node.childForFieldName('type');
  return node.namedChildren.filter((c) => c !== type && DECLARATOR_NODES.has(c.type));
}

function findFunctionDeclarator(node: SyntaxNode | null): SyntaxNode | undefined {
  let d = node;
  while (d) {
    if (d.type === 'function_declarator') return d;
    if (d.type !== 'pointer_declarator') return undefined;
    d = d.childForFieldName('declarator');
  }
  return undefined;
}

function isStatic(node: SyntaxNode): boolean {
  return node.children.some((c) => c.type === 'storage_class_specifier' && c.text === 'static');
}

function isPlainBody(body: SyntaxNode): boolean {
  return body.namedChildren.every((c) => {
    if (c.type === 'comment') return true;
    if (c.type !== 'field_declaration') return false;
    const type = c.childForFieldName('type');
    if (type?.childForFieldName('body')) return false;
    return c.namedChildren.every((d) => d.type !== 'bitfield_clause' && d.type !== 'function_declarator');
  });
}

type TypeScan = {
  plain: Map<string, { body: SyntaxNode; line: number }>;
  tags: string[];
  aliases: Map<string, string>;
};

function walk(node: SyntaxNode, externC: boolean, visit: (node: SyntaxNode, externC: boolean) => void): void {
  for (const child of node.namedChildren) {
    if (child.type === 'linkage_specification') {
      const isC = child.childForFieldName('value')?.text === '"C"';
      const body = child.childForFieldName('body');
      if (!body) continue;
      if (body.type === 'declaration_list') walk(body, isC, visit);
      else visit(body, isC);
    } else if (CONTAINERS.has(child.type)) {
      walk(child, externC, visit);
    } else {
      visit(child, externC);
    }
  }
}

function scanTypes(root: SyntaxNode): TypeScan {
  const scan: TypeScan = { plain: new Map(), tags: [], aliases: new Map() };
  const addTag = (name: string) => {
    if (!scan.tags.includes(name)) scan.tags.push(name);
  };

  const record = (spec: SyntaxNode, typedefName?: string): void => {
    if (spec.type !== 'struct_specifier' && spec.type !== 'class_specifier') return;
    const tagName = spec.childForFieldName('name')?.text;
    const body = spec.childForFieldName('body');
    const name = body && typedefName ? typedefName : (tagName ?? typedefName);
    if (!name) return;
    if (tagName && name !== tagName) scan.aliases.set(tagName, name);

    if (spec.type === 'struct_specifier' && body && isPlainBody(body)) {
      scan.plain.set(name, { body, line: line(spec) });
    } else {
      addTag(name);
    }
  };

  walk(root, false, (node) => {
    switch (node.type) {
      case 'struct_specifier':
      case 'class_specifier':
        record(node);
        return;
      case 'declaration': {
        const type = node.childForFieldName('type');
        if (type?.childForFieldName('body')) record(type);
        return;
      }
      case 'type_definition': {
        const type = node.childForFieldName('type');
        for (const decl of declaratorsOf(node)) {
          const name = innermostName(decl)?.text;
          if (!name) continue;
          if (type && decl.type === 'type_identifier' && type.childForFieldName('body')) {
            record(type, name);
            continue;
          }
          if (type) record(type);
          const target = `${specifierText(node, decl)} ${without(decl, innermostName(decl))}`;
          if (target.replace(/\b(struct|class)\b/g, '').trim() !== name) scan.aliases.set(name, target);
        }
        return;
      }
      default:
        return;
    }
  });

  scan.tags = scan.tags.filter((t) => !scan.plain.has(t));
  return scan;
}

function structFields(name: string, body: SyntaxNode, known: DeclaredTypes): PlainStruct['fields'] {
  const fields: PlainStruct['fields'] = [];
  for (const decl of body.namedChildren) {
    if (decl.type !== 'field_declaration') continue;
    for (const d of declaratorsOf(decl)) {
      const nameNode = innermostName(d);
      if (!nameNode) continue;
      const spelling = `${specifierText(decl, d)} ${without(d, nameNode)}`;
      fields.push({ name: nameNode.text, type: parseCType(spelling, known) });
    }
  }
  traceDebug('parser.struct', { name, fields: fields.length });
  return fields;
}

function isVariadic(params: SyntaxNode): boolean {
  return params.children.some(
    (c) => c.type === '...' || c.type === 'variadic_parameter' || c.type === 'variadic_parameter_declaration',
  );
}

function extractParams(params: SyntaxNode, known: DeclaredTypes): NativeParam[] {
  const out: NativeParam[] = [];
  params.namedChildren
    .filter((p) => p.type === 'parameter_declaration' || p.type === 'optional_parameter_declaration')
    .forEach((p, i) => {
      const declarator = p.childForFieldName('declarator');
      const nameNode = declarator ? innermostName(declarator) : undefined;
      const spelling = declarator
        ? `${specifierText(p, declarator)} ${without(declarator, nameNode)}`
        : specifierText(p);
      const type = parseCType(spelling, known);
      // `f(void)` declares no parameters.
      if (type.kind === 'void' && !declarator) return;
      out.push(paramFromType(nameNode?.text ?? `arg${i}`, type));
    });
  return out;
}

/**
 * Extracts the C-linkage surface from a C or C++ syntax tree. In C++ only
 * `extern "C"` declarations count; `static` functions never do.
 */
export function extractC(root: SyntaxNode, source: string, language: 'c' | 'cpp'): Extracted {
  const lines = source.split(/\r?\n/);
  const diagnostics: Diagnostic[] = [];
  const scan = scanTypes(root);
  const known: DeclaredTypes = {
    structs: new Set(scan.plain.keys()),
    opaque: new Set(scan.tags),
    aliases: scan.aliases,
  };

  const structs: PlainStruct[] = [...scan.plain].map(([name, { body, line: sourceLine }]) => ({
    name,
    fields: structFields(name, body, known),
    sourceLine,
  }));

  const functions: NativeFunction[] = [];
  const byName = new Map<string, NativeFunction>();

  walk(root, false, (node, externC) => {
    if (node.type !== 'function_definition' && node.type !== 'declaration') return;
    if (language === 'cpp' && !externC) return;
    if (isStatic(node)) return;

    const declarator = node.childForFieldName('declarator');
    const fnDecl = findFunctionDeclarator(declarator);
    const nameNode = fnDecl?.childForFieldName('declarator');
    const params = fnDecl?.childForFieldName('parameters');
    if (!declarator || !fnDecl || !params || nameNode?.type !== 'identifier') return;

    const name = nameNode.text;
    const sourceLine = line(node);
    if (isVariadic(params)) {
      diagnostics.push({
        kind: 'UnmappableType',
        subject: functionSubject(name),
        message: `${name} is variadic; its calling convention cannot be declared`,
        hint: 'Export a fixed-signature wrapper function instead.',
        sourceLine,
      });
      return;
    }

    const returns = parseCType(`${specifierText(node, declarator)} ${without(declarator, fnDecl)}`, known);
    const fn: NativeFunction = {
      name,
      params: extractParams(params, known),
      returns: returns.kind === 'void' ? voidType : returns,
      sourceLine,
    };
    const annotations = annotationsAbove(lines, name, sourceLine, diagnostics);
    if (annotations) fn.annotations = annotations;

    // A prototype and its definition describe one symbol.
    const prior = byName.get(name);
    if (prior && describeSignature(prior) === describeSignature(fn)) {
      if (!prior.annotations && fn.annotations) prior.annotations = fn.annotations;
      return;
    }
    byName.set(name, fn);
    functions.push(fn);
  });

  return { functions, structs, opaqueTags: scan.tags, diagnostics };
}
