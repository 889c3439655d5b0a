import { describeSignature, lengthLimit } from '../../surface/nativeType.js';
import type { BindingModel, RawFunction, ResourcePlan, StructPlan, WrapperParam, WrapperPlan } from '../bindingModel.js';
import type { BindingUnit, EmitOptions, EmittedDecl, TargetBackend } from '../emitTypes.js';
import { headerLines, indent, joinBlocks } from '../sourceText.js';
import { planHarness } from '../../harness/planHarness.js';
import { tsIdent, tsMemberName, tsResourceName, tsTypes, typedArrayName } from './tsTypes.js';
import { renderTsTests } from './tsHarness.js';

const IND = '  ';

const RUNTIME_VALUES = [
  'ConstructionFailureError',
  'OwnedHandle',
  'declareOpaque',
  'declareStruct',
  'inoutPointer',
  'loadLibrary',
  'sliceLength',
];

function rawParamSpec(raw: RawFunction, i: number): string {
  const p = raw.params[i];
  // Mutable struct pointers are copied back after the call.
  if (p.native.passing === 'mut-pointer' && p.native.type.kind === 'struct') {
    return `inoutPointer('${p.native.type.name}')`;
  }
  return `'${p.type.raw}'`;
}

function rawDeclaration(raw: RawFunction): string {
  const params = raw.params.map((_, i) => rawParamSpec(raw, i));
  return `${raw.fn.name}: lib.func('${raw.fn.name}', '${raw.returns.raw}', [${params.join(', ')}]),`;
}

function structDeclaration(s: StructPlan): string {
  const fields = s.fields.map((f) => `${f.name}: '${f.type.raw}'`).join(', ');
  if (!s.layout) return `declareStruct('${s.def.name}', { ${fields} });`;
  const offsets = s.layout.fields.map((f) => `${f.name}: ${f.offset}`).join(', ');
  return [
    `declareStruct(`,
    `${IND}'${s.def.name}',`,
    `${IND}{ ${fields} },`,
    `${IND}{ size: ${s.layout.size}, align: ${s.layout.align}, offsets: { ${offsets} } },`,
    `);`,
  ].join('\n');
}

function sliceType(p: Extract<WrapperParam, { kind: 'slice' }>): string {
  return typedArrayName(p.elementNative) ?? 'ArrayBufferView';
}

function paramDecl(p: WrapperParam): string {
  const n = tsIdent(p.name);
  switch (p.kind) {
    case 'value':
    case 'raw':
      return `${n}: ${p.param.type.safe}`;
    case 'struct-ref':
      return `${n}: ${p.struct}`;
    case 'slice':
      return `${n}: ${sliceType(p)}`;
    case 'resource':
      return `${n}: ${tsResourceName(p.tag)}`;
  }
}

function callArgs(p: WrapperParam): string[] {
  const n = tsIdent(p.name);
  switch (p.kind) {
    case 'value':
    case 'raw':
    case 'struct-ref':
      return [n];
    case 'slice': {
      const max = lengthLimit(p.length.native.type);
      if (max !== undefined) return [n, `sliceLength(${n}, ${max}, '${n}')`];
      return [n, p.length.type.safe === 'bigint' ? `BigInt(${n}.length)` : `${n}.length`];
    }
    case 'resource':
      return [`${n}Handle`];
  }
}

function borrow(owner: string, handle: string, expr: string, access: 'shared' | 'exclusive'): string {
  return `${owner}.withHandle((${handle}) => ${expr}, '${access}')`;
}

/** Native call for `plan`, borrowing every resource handle it needs. */
function callExpression(plan: WrapperPlan, receiver: 'struct' | 'resource' | undefined): string {
  const args = plan.params.flatMap(callArgs);
  if (receiver === 'struct') args.unshift('self');
  if (receiver === 'resource') args.unshift('handle');

  let expr = `native.${plan.fn.name}(${args.join(', ')})`;
  for (const p of [...plan.params].reverse()) {
    if (p.kind !== 'resource') continue;
    const n = tsIdent(p.name);
    expr = borrow(n, `${n}Handle`, expr, p.mutable ? 'exclusive' : 'shared');
  }
  if (receiver === 'resource' && plan.receiver) expr = borrow('this', 'handle', expr, plan.receiver.access);
  return plan.returns.safe === 'bigint' ? `BigInt(${expr})` : expr;
}

function docLine(plan: WrapperPlan): string {
  const note = plan.unsafe ? ' Raw pointers are passed through unchecked.' : '';
  return `/** Wraps \`${describeSignature(plan.fn)}\`.${note} */`;
}

function returnType(plan: WrapperPlan): string {
  return plan.returnKind === 'void' ? 'void' : plan.returns.safe;
}

function body(plan: WrapperPlan, expr: string): string {
  return plan.returnKind === 'void' ? `${expr};` : `return ${expr};`;
}

function freeFunction(plan: WrapperPlan): string[] {
  return [
    docLine(plan),
    `export function ${tsIdent(plan.name)}(${plan.params.map(paramDecl).join(', ')}): ${returnType(plan)} {`,
    `${IND}${body(plan, callExpression(plan, undefined))}`,
    '}',
  ];
}

function structBlock(s: StructPlan): string {
  const name = s.def.name;
  const lines = [
    `/** Mirrors the native \`${name}\` layout; passed by value. */`,
    `export interface ${name} {`,
    ...s.fields.map((f) => `${IND}${f.name}: ${f.type.safe};`),
    '}',
  ];

  const members: string[][] = [
    ...s.factories.map((f) => [
      docLine(f),
      `${tsMemberName(f.name)}(${f.params.map(paramDecl).join(', ')}): ${returnType(f)} {`,
      `${IND}${body(f, callExpression(f, undefined))}`,
      '},',
    ]),
    ...s.methods.map((m) => [
      docLine(m),
      `${tsMemberName(m.name)}(${[`self: ${name}`, ...m.params.map(paramDecl)].join(', ')}): ${returnType(m)} {`,
      `${IND}${body(m, callExpression(m, 'struct'))}`,
      '},',
    ]),
  ];
  if (members.length) {
    lines.push('', `export const ${name} = {`);
    members.forEach((m, i) => {
      if (i) lines.push('');
      lines.push(...indent(m, IND));
    });
    lines.push('};');
  }
  return lines.join('\n');
}

function resourceBlock(r: ResourcePlan): string {
  const name = tsResourceName(r.tag);
  const ctor = r.ctor;
  const ctorName = ctor.fn.name;

  const members: string[][] = [
    [
      'private constructor(handle: RawPointer) {',
      `${IND}super(handle, (raw) => native.${r.dtor.fn.name}(raw), '${name}');`,
      '}',
    ],
    [
      docLine(ctor),
      `static create(${ctor.params.map(paramDecl).join(', ')}): ${name} {`,
      `${IND}return ${name}.fromRaw(${callExpression(ctor, undefined)});`,
      '}',
    ],
    [
      `/** Takes ownership of a handle produced by \`${ctorName}\`. */`,
      `static fromRaw(handle: RawPointer): ${name} {`,
      `${IND}if (handle === null || handle === undefined) throw new ConstructionFailureError('${ctorName}');`,
      `${IND}return new ${name}(handle);`,
      '}',
    ],
    ...r.methods.map((m) => [
      docLine(m),
      `${tsMemberName(m.name)}(${m.params.map(paramDecl).join(', ')}): ${returnType(m)} {`,
      `${IND}${body(m, callExpression(m, 'resource'))}`,
      '}',
    ]),
  ];

  const lines = [
    `/** Sole owner of one native \`${r.tag}\`; \`dispose()\` calls \`${r.dtor.fn.name}\` once. */`,
    `export class ${name} extends OwnedHandle {`,
  ];
  members.forEach((m, i) => {
    if (i) lines.push('');
    lines.push(...indent(m, IND));
  });
  lines.push('}');
  return lines.join('\n');
}

function runtimeImports(code: string, from: string): string {
  const values = RUNTIME_VALUES.filter((n) => new RegExp(`\\b${n}\\b`).test(code));
  const lines = [`import {`, ...values.map((v) => `${IND}${v},`), `} from '${from}';`];
  if (/\bRawPointer\b/.test(code)) lines.push(`import type { RawPointer } from '${from}';`);
  return lines.join('\n');
}

export function emitTypescript(model: BindingModel, options: EmitOptions): BindingUnit {
  const rawDeclarations: EmittedDecl[] = [
    ...model.opaqueTags.map((tag): EmittedDecl => ({ kind: 'raw-type', symbol: tag, code: `declareOpaque('${tag}');` })),
    ...model.structs.map((s): EmittedDecl => ({ kind: 'raw-type', symbol: s.def.name, code: structDeclaration(s) })),
    ...model.rawFunctions.map((r): EmittedDecl => ({ kind: 'raw-function', symbol: r.fn.name, code: rawDeclaration(r) })),
  ];

  const wrappers: EmittedDecl[] = [];
  for (const s of model.structs) wrappers.push({ kind: 'record', symbol: s.def.name, code: structBlock(s) });
  for (const f of model.freeFunctions) {
    wrappers.push({ kind: 'function', symbol: f.fn.name, code: freeFunction(f).join('\n') });
  }
  for (const r of model.resources) wrappers.push({ kind: 'resource', symbol: r.tag, code: resourceBlock(r) });

  const nativeTable = [
    'const native = {',
    ...indent(rawDeclarations.filter((d) => d.kind === 'raw-function').map((d) => d.code), IND),
    '};',
  ].join('\n');

  const declarations = [
    `const lib = loadLibrary('${model.library}');`,
    rawDeclarations
      .filter((d) => d.kind === 'raw-type')
      .map((d) => d.code)
      .join('\n'),
    nativeTable,
    ...wrappers.map((w) => w.code),
  ];

  const contents = joinBlocks([
    headerLines('//', model.source, model.fingerprint).join('\n'),
    runtimeImports(declarations.join('\n'), options.runtimeImport),
    ...declarations,
  ]);

  const harness = options.tests ? planHarness(model) : undefined;
  const rendered = harness ? renderTsTests(harness, model, options.runtimeImport) : undefined;
  const tests = rendered?.tests ?? [];

  const files = [{ path: `typescript/${model.library}.ts`, contents }];
  if (rendered?.file) files.push({ path: `typescript/${model.library}.test.ts`, contents: rendered.file });

  return {
    target: 'typescript',
    library: model.library,
    rawDeclarations,
    wrappers,
    tests,
    files,
    diagnostics: [...model.diagnostics, ...(harness?.diagnostics ?? [])],
  };
}

export const typescriptBackend: TargetBackend = {
  target: 'typescript',
  types: tsTypes,
  emit: emitTypescript,
};
