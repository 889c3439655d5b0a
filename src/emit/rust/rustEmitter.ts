import { describeSignature, lengthLimit } from '../../surface/nativeType.js';
import type { BindingModel, RawFunction, ResourcePlan, StructPlan, WrapperParam, WrapperPlan } from '../bindingModel.js';
import type { BindingUnit, EmitOptions, EmittedDecl, TargetBackend } from '../emitTypes.js';
import { headerLines, indent, joinBlocks } from '../sourceText.js';
import { planHarness } from '../../harness/planHarness.js';
import { rustIdent, rustResourceName, rustTypes } from './rustTypes.js';
import { renderRustTests } from './rustHarness.js';

const IND = '    ';

function rawDeclaration(raw: RawFunction): string {
  const params = raw.params.map((p, i) => `${rustIdent(p.native.name) || `arg${i}`}: ${p.type.raw}`);
  const ret = raw.returns.class === 'void' ? '' : ` -> ${raw.returns.raw}`;
  return `pub fn ${raw.fn.name}(${params.join(', ')})${ret};`;
}

function opaqueMarker(tag: string): string {
  return [`#[repr(C)]`, `pub struct ${tag} {`, `${IND}_private: [u8; 0],`, `}`].join('\n');
}

function paramDecl(p: WrapperParam): string {
  const n = rustIdent(p.name);
  switch (p.kind) {
    case 'value':
    case 'raw':
      return `${n}: ${p.param.type.safe}`;
    case 'struct-ref':
      return `${n}: &${p.mutable ? 'mut ' : ''}${p.struct}`;
    case 'slice':
      return `${n}: &${p.mutable ? 'mut ' : ''}[${p.element.safe}]`;
    case 'resource':
      return `${n}: &${p.mutable ? 'mut ' : ''}${rustResourceName(p.tag)}`;
  }
}

function callArgs(p: WrapperParam): string[] {
  const n = rustIdent(p.name);
  switch (p.kind) {
    case 'value':
    case 'raw':
    case 'struct-ref':
      return [n];
    case 'slice': {
      const lenType = p.length.type.safe;
      let len = lenType === 'usize' ? `${n}.len()` : `${n}.len() as ${lenType}`;
      if (lengthLimit(p.length.native.type) !== undefined) {
        len = `${lenType}::try_from(${n}.len()).expect("${n} has more elements than ${lenType} can count")`;
      }
      return [p.mutable ? `${n}.as_mut_ptr()` : `${n}.as_ptr()`, len];
    }
    case 'resource':
      return [`${n}.raw`];
  }
}

type Receiver = { decl: string; arg: string };

function receiverOf(plan: WrapperPlan, owner: 'resource' | 'struct'): Receiver | undefined {
  const r = plan.receiver;
  if (!r) return undefined;
  if (owner === 'resource') {
    return { decl: r.access === 'shared' ? '&self' : '&mut self', arg: 'self.raw' };
  }
  switch (r.param.native.passing) {
    case 'value':
      return { decl: '&self', arg: '*self' };
    case 'pointer':
      return { decl: '&self', arg: 'self' };
    case 'mut-pointer':
      return { decl: '&mut self', arg: 'self' };
  }
}

function docLines(plan: WrapperPlan): string[] {
  const lines = [`/// Wraps \`${describeSignature(plan.fn)}\`.`];
  if (plan.unsafe) {
    const raw = plan.params.filter((p) => p.kind === 'raw').map((p) => `\`${rustIdent(p.name)}\``);
    lines.push(
      '///',
      '/// # Safety',
      '///',
      `/// ${raw.join(', ')} ${raw.length === 1 ? 'is' : 'are'} passed through unchecked and must satisfy the native contract.`,
    );
  }
  return lines;
}

function wrapperFunction(plan: WrapperPlan, name: string, receiver?: Receiver): string[] {
  const params = [...(receiver ? [receiver.decl] : []), ...plan.params.map(paramDecl)];
  const args = [...(receiver ? [receiver.arg] : []), ...plan.params.flatMap(callArgs)];
  const ret = plan.returnKind === 'void' ? '' : ` -> ${plan.returns.safe}`;
  const call = `ffi::${plan.fn.name}(${args.join(', ')})`;
  return [
    ...docLines(plan),
    `pub ${plan.unsafe ? 'unsafe ' : ''}fn ${name}(${params.join(', ')})${ret} {`,
    `${IND}${plan.unsafe ? call : `unsafe { ${call} }`}`,
    '}',
  ];
}

function structBlock(s: StructPlan): string {
  const name = s.def.name;
  const lines = [
    '#[repr(C)]',
    '#[derive(Debug, Clone, Copy, PartialEq)]',
    `pub struct ${name} {`,
    ...s.fields.map((f) => `${IND}pub ${rustIdent(f.name)}: ${f.type.safe},`),
    '}',
  ];

  if (s.layout) {
    lines.push(
      '',
      `const _: () = assert!(std::mem::size_of::<${name}>() == ${s.layout.size});`,
      `const _: () = assert!(std::mem::align_of::<${name}>() == ${s.layout.align});`,
    );
    for (const f of s.layout.fields) {
      lines.push(`const _: () = assert!(std::mem::offset_of!(${name}, ${rustIdent(f.name)}) == ${f.offset});`);
    }
  }

  const members = [
    ...s.factories.map((f) => wrapperFunction(f, rustIdent(f.name))),
    ...s.methods.map((m) => wrapperFunction(m, rustIdent(m.name), receiverOf(m, 'struct'))),
  ];
  if (members.length) {
    lines.push('', `impl ${name} {`);
    members.forEach((m, i) => {
      if (i) lines.push('');
      lines.push(...indent(m, IND));
    });
    lines.push('}');
  }
  return lines.join('\n');
}

function resourceBlock(r: ResourcePlan): string {
  const name = rustResourceName(r.tag);
  const ctor = r.ctor;
  const ctorName = ctor.fn.name;
  const castMut = ctor.returns.safe.startsWith('*const') ? '.cast_mut()' : '';
  const ctorCall = `ffi::${ctorName}(${ctor.params.flatMap(callArgs).join(', ')})${castMut}`;

  const ctorFn = [
    ...docLines(ctor),
    `pub ${ctor.unsafe ? 'unsafe ' : ''}fn new(${ctor.params.map(paramDecl).join(', ')}) -> Result<Self, ConstructionFailure> {`,
    ...(ctor.unsafe
      ? [`${IND}let raw = ${ctorCall};`, `${IND}Self::from_raw(raw)`]
      : [`${IND}let raw = unsafe { ${ctorCall} };`, `${IND}unsafe { Self::from_raw(raw) }`]),
    '}',
  ];

  const fromRaw = [
    `/// Takes ownership of a handle produced by \`${ctorName}\`.`,
    '///',
    '/// # Safety',
    '///',
    '/// `raw` must be null or a live handle that nothing else owns or releases.',
    `pub unsafe fn from_raw(raw: *mut ffi::${r.tag}) -> Result<Self, ConstructionFailure> {`,
    `${IND}if raw.is_null() {`,
    `${IND}${IND}Err(ConstructionFailure { constructor: "${ctorName}" })`,
    `${IND}} else {`,
    `${IND}${IND}Ok(${name} { raw })`,
    `${IND}}`,
    '}',
  ];

  const intoRaw = [
    `/// Gives up ownership; the caller becomes responsible for \`${r.dtor.fn.name}\`.`,
    `pub fn into_raw(self) -> *mut ffi::${r.tag} {`,
    `${IND}let raw = self.raw;`,
    `${IND}std::mem::forget(self);`,
    `${IND}raw`,
    '}',
  ];

  const members = [
    ctorFn,
    fromRaw,
    intoRaw,
    ...r.methods.map((m) => wrapperFunction(m, rustIdent(m.name), receiverOf(m, 'resource'))),
  ];

  const lines = [
    `/// Sole owner of one native \`${r.tag}\`; dropping it calls \`${r.dtor.fn.name}\` once.`,
    `pub struct ${name} {`,
    `${IND}raw: *mut ffi::${r.tag},`,
    '}',
    '',
    `impl ${name} {`,
  ];
  members.forEach((m, i) => {
    if (i) lines.push('');
    lines.push(...indent(m, IND));
  });
  lines.push(
    '}',
    '',
    `impl Drop for ${name} {`,
    `${IND}fn drop(&mut self) {`,
    `${IND}${IND}unsafe { ffi::${r.dtor.fn.name}(self.raw) }`,
    `${IND}}`,
    '}',
  );
  return lines.join('\n');
}

const CONSTRUCTION_FAILURE = [
  '/// A native constructor returned a null handle.',
  '#[derive(Debug, Clone, PartialEq, Eq)]',
  'pub struct ConstructionFailure {',
  `${IND}pub constructor: &'static str,`,
  '}',
  '',
  'impl fmt::Display for ConstructionFailure {',
  `${IND}fn fmt(&self, f: &mut fmt::Formatter<'_>) -> fmt::Result {`,
  `${IND}${IND}write!(f, "{} returned a null handle", self.constructor)`,
  `${IND}}`,
  '}',
  '',
  'impl std::error::Error for ConstructionFailure {}',
].join('\n');

export function emitRust(model: BindingModel, options: EmitOptions): BindingUnit {
  const usesCVoid = model.rawFunctions.some(
    (r) => r.returns.raw.includes('c_void') || r.params.some((p) => p.type.raw.includes('c_void')),
  ) || model.structs.some((s) => s.fields.some((f) => f.type.safe.includes('c_void')));

  const rawDeclarations: EmittedDecl[] = [
    ...model.opaqueTags.map((tag): EmittedDecl => ({ kind: 'raw-type', symbol: tag, code: opaqueMarker(tag) })),
    ...model.rawFunctions.map((r): EmittedDecl => ({ kind: 'raw-function', symbol: r.fn.name, code: rawDeclaration(r) })),
  ];

  const wrappers: EmittedDecl[] = [];
  if (model.resources.length) {
    wrappers.push({ kind: 'support', symbol: 'ConstructionFailure', code: CONSTRUCTION_FAILURE });
  }
  for (const s of model.structs) wrappers.push({ kind: 'record', symbol: s.def.name, code: structBlock(s) });
  for (const f of model.freeFunctions) {
    wrappers.push({ kind: 'function', symbol: f.fn.name, code: wrapperFunction(f, rustIdent(f.name)).join('\n') });
  }
  for (const r of model.resources) {
    wrappers.push({ kind: 'resource', symbol: r.tag, code: resourceBlock(r) });
  }

  const harness = options.tests ? planHarness(model) : undefined;
  const rendered = harness ? renderRustTests(harness, model) : undefined;
  const tests = rendered?.tests ?? [];

  const ffiBody: string[] = [];
  if (model.structs.length || usesCVoid) ffiBody.push('use super::*;', '');
  for (const d of rawDeclarations.filter((d) => d.kind === 'raw-type')) ffiBody.push(d.code, '');
  ffiBody.push(
    `#[link(name = "${model.library}")]`,
    'extern "C" {',
    ...indent(rawDeclarations.filter((d) => d.kind === 'raw-function').map((d) => d.code), IND),
    '}',
  );

  const imports = [
    ...(usesCVoid ? ['use std::ffi::c_void;'] : []),
    ...(model.resources.length ? ['use std::fmt;'] : []),
  ];

  const contents = joinBlocks([
    headerLines('//', model.source, model.fingerprint).join('\n'),
    imports.join('\n'),
    ['pub mod ffi {', ...indent(ffiBody.join('\n').split('\n'), IND), '}'].join('\n'),
    ...wrappers.map((w) => w.code),
    rendered?.module ?? '',
  ]);

  return {
    target: 'rust',
    library: model.library,
    rawDeclarations,
    wrappers,
    tests,
    files: [{ path: `rust/${model.library}.rs`, contents }],
    diagnostics: [...model.diagnostics, ...(harness?.diagnostics ?? [])],
  };
}

export const rustBackend: TargetBackend = {
  target: 'rust',
  types: rustTypes,
  emit: emitRust,
};
