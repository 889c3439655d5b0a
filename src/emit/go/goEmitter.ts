import { describeSignature, describeType, lengthLimit } from '../../surface/nativeType.js';
import type { NativeType } from '../../surface/surfaceTypes.js';
import type { TargetType } from '../../mapper/mapperTypes.js';
import type { BindingModel, ResourcePlan, StructPlan, WrapperParam, WrapperPlan } from '../bindingModel.js';
import type { BindingUnit, EmitOptions, EmittedDecl, TargetBackend } from '../emitTypes.js';
import { headerLines, indent, joinBlocks } from '../sourceText.js';
import { planHarness } from '../../harness/planHarness.js';
import { toPascal } from '../../classify/naming.js';
import {
  cParam,
  cTypeName,
  cgoFieldName,
  fromCName,
  fromRawName,
  goFactoryName,
  goIdent,
  goImports,
  goPackageName,
  goReceiver,
  goTypeName,
  goTypes,
} from './goTypes.js';
import { renderGoTests } from './goHarness.js';

const TAB = '\t';

function toC(native: NativeType, expr: string, tt: TargetType): string {
  if (tt.class === 'plain') return native.kind === 'struct' ? `${expr}.toC()` : `${tt.raw}(${expr})`;
  return tt.raw === 'unsafe.Pointer' ? expr : `(${tt.raw})(${expr})`;
}

function fromC(native: NativeType, expr: string, tt: TargetType): string {
  if (tt.class === 'plain') return native.kind === 'struct' ? `${fromCName(native.name)}(${expr})` : `${tt.safe}(${expr})`;
  return `unsafe.Pointer(${expr})`;
}

export function zeroValue(native: NativeType, tt: TargetType): string {
  if (tt.class !== 'plain') return 'nil';
  if (native.kind === 'struct') return `${goTypeName(native.name)}{}`;
  return native.kind === 'bool' ? 'false' : '0';
}

/** An instance a call holds its mutex on for the call's duration. */
type GoLock = { v: string; exclusive: boolean };

type Parts = { decl: string; pre: string[]; args: string[]; post: string[]; lock?: GoLock };

// Go panics on an out-of-range length, as it does on an out-of-range index.
function lengthGuard(p: Extract<WrapperParam, { kind: 'slice' }>, n: string): string[] {
  const max = lengthLimit(p.length.native.type);
  if (max === undefined) return [];
  return [
    `if uint64(len(${n})) > ${max} {`,
    `${TAB}panic("${n} has more elements than ${describeType(p.length.native.type)} can count")`,
    '}',
  ];
}

function paramParts(p: WrapperParam, n: string): Parts {
  switch (p.kind) {
    case 'value':
      return { decl: `${n} ${p.param.type.safe}`, pre: [], args: [toC(p.param.native.type, n, p.param.type)], post: [] };
    case 'raw':
      return { decl: `${n} unsafe.Pointer`, pre: [], args: [toC(p.param.native.type, n, p.param.type)], post: [] };
    case 'struct-ref':
      return {
        decl: `${n} *${goTypeName(p.struct)}`,
        pre: [`${n}C := ${n}.toC()`],
        args: [`&${n}C`],
        post: p.mutable ? [`*${n} = ${fromCName(p.struct)}(${n}C)`] : [],
      };
    case 'slice': {
      const ptr = `${n}Ptr`;
      return {
        decl: `${n} []${p.element.safe}`,
        pre: [
          ...lengthGuard(p, n),
          `var ${ptr} ${p.pointer.type.raw}`,
          `if len(${n}) > 0 {`,
          `${TAB}${ptr} = (${p.pointer.type.raw})(unsafe.Pointer(&${n}[0]))`,
          '}',
        ],
        args: [ptr, `${p.length.type.raw}(len(${n}))`],
        post: [],
      };
    }
    case 'resource':
      return {
        decl: `${n} *${goTypeName(p.tag)}`,
        pre: [],
        args: [`${n}.handle`],
        post: [],
        lock: { v: n, exclusive: p.mutable },
      };
  }
}

/**
 * Locks every instance a call touches, then rejects closed ones. Several
 * instances go through lockInOrder, which refuses aliases.
 */
function lockLines(locks: GoLock[], fail: (err: string) => string): string[] {
  if (!locks.length) return [];
  const closed = [
    `if ${locks.map((l) => `${l.v}.handle == nil`).join(' || ')} {`,
    `${TAB}${fail('ErrClosed')}`,
    '}',
  ];
  if (locks.length === 1) {
    const [{ v, exclusive }] = locks;
    return [`${v}.mu.${exclusive ? 'Lock' : 'RLock'}()`, `defer ${v}.mu.${exclusive ? 'Unlock' : 'RUnlock'}()`, ...closed];
  }
  return [
    'unlock, err := lockInOrder(',
    ...locks.map(({ v, exclusive }) => `${TAB}resourceLock{&${v}.mu, uintptr(unsafe.Pointer(${v})), ${exclusive}},`),
    ')',
    'if err != nil {',
    `${TAB}${fail('err')}`,
    '}',
    'defer unlock()',
    ...closed,
  ];
}

type GoReceiver = { decl: string; pre: string[]; arg: string; post: string[]; lock?: GoLock };

function docLines(plan: WrapperPlan, name: string): string[] {
  const lines = [`// ${name} wraps ${describeSignature(plan.fn)}.`];
  const raw = plan.params.filter((p) => p.kind === 'raw').map((p) => goIdent(p.name));
  if (raw.length) {
    lines.push('//', `// Unsafe: ${raw.join(', ')} ${raw.length === 1 ? 'is' : 'are'} passed to native code unchecked.`);
  }
  return lines;
}

function goFunction(plan: WrapperPlan, name: string, receiver?: GoReceiver & { name: string }, returnsError = false): string[] {
  const reserved = ['result', 'unlock', ...(receiver ? [receiver.name] : [])];
  const ret = plan.returnNative;
  const hasResult = plan.returnKind !== 'void';
  const resultType = hasResult ? plan.returns.safe : '';
  const fail = (err: string): string => (hasResult ? `return ${zeroValue(ret, plan.returns)}, ${err}` : `return ${err}`);
  const needsError = returnsError || plan.params.some((p) => p.kind === 'resource');

  const parts = plan.params.map((p) => paramParts(p, goIdent(p.name, reserved)));
  const locks = [receiver?.lock, ...parts.map((p) => p.lock)].filter((l): l is GoLock => l !== undefined);
  const pre = [...lockLines(locks, fail), ...(receiver?.pre ?? []), ...parts.flatMap((p) => p.pre)];
  const post = [...(receiver?.post ?? []), ...parts.flatMap((p) => p.post)];
  const args = [...(receiver ? [receiver.arg] : []), ...parts.flatMap((p) => p.args)];
  const call = `C.${plan.fn.name}(${args.join(', ')})`;

  const body = [...pre];
  if (!hasResult) {
    body.push(call, ...post);
    if (needsError) body.push('return nil');
  } else if (post.length) {
    body.push(`result := ${call}`, ...post, `return ${fromC(ret, 'result', plan.returns)}${needsError ? ', nil' : ''}`);
  } else {
    body.push(`return ${fromC(ret, call, plan.returns)}${needsError ? ', nil' : ''}`);
  }

  let results = '';
  if (hasResult && needsError) results = ` (${resultType}, error)`;
  else if (hasResult) results = ` ${resultType}`;
  else if (needsError) results = ' error';

  const recv = receiver ? `(${receiver.decl}) ` : '';
  return [
    ...docLines(plan, name),
    `func ${recv}${name}(${parts.map((p) => p.decl).join(', ')})${results} {`,
    ...indent(body, TAB),
    '}',
  ];
}

function structBlock(s: StructPlan): string {
  const go = goTypeName(s.def.name);
  const r = goReceiver(go);
  const fields = s.fields.map((f) => ({ f, go: toPascal(f.name), c: cgoFieldName(f.name) }));

  const lines = [
    `// ${go} mirrors the native ${s.def.name} layout.`,
    `type ${go} struct {`,
    ...fields.map(({ f, go: name }) => `${TAB}${name} ${f.type.safe}`),
    '}',
    '',
    `func (${r} ${go}) toC() C.${s.def.name} {`,
    `${TAB}return C.${s.def.name}{${fields.map(({ f, go: name, c }) => `${c}: ${toC(f.native, `${r}.${name}`, f.type)}`).join(', ')}}`,
    '}',
    '',
    `func ${fromCName(s.def.name)}(c C.${s.def.name}) ${go} {`,
    `${TAB}return ${go}{${fields.map(({ f, go: name, c }) => `${name}: ${fromC(f.native, `c.${c}`, f.type)}`).join(', ')}}`,
    '}',
  ];

  for (const f of s.factories) {
    lines.push('', ...goFunction(f, goFactoryName(s.def.name, f.name)));
  }
  for (const m of s.methods) {
    const passing = m.receiver?.param.native.passing ?? 'value';
    const receiver: GoReceiver & { name: string } =
      passing === 'value'
        ? { name: r, decl: `${r} ${go}`, pre: [], arg: `${r}.toC()`, post: [] }
        : {
            name: r,
            decl: passing === 'mut-pointer' ? `${r} *${go}` : `${r} ${go}`,
            pre: [`${r}C := ${r}.toC()`],
            arg: `&${r}C`,
            post: passing === 'mut-pointer' ? [`*${r} = ${fromCName(s.def.name)}(${r}C)`] : [],
          };
    lines.push('', ...goFunction(m, toPascal(m.name), receiver));
  }
  return lines.join('\n');
}

function layoutBlock(structs: StructPlan[]): string {
  const checks = structs.flatMap((s) => {
    if (!s.layout) return [];
    const c = `C.${s.def.name}{}`;
    const out = [
      `_ = unsafe.Sizeof(${c}) - ${s.layout.size}`,
      `_ = ${s.layout.size} - unsafe.Sizeof(${c})`,
      `_ = unsafe.Alignof(${c}) - ${s.layout.align}`,
      `_ = ${s.layout.align} - unsafe.Alignof(${c})`,
    ];
    for (const f of s.layout.fields) {
      const sel = `${c}.${cgoFieldName(f.name)}`;
      out.push(`_ = unsafe.Offsetof(${sel}) - ${f.offset}`, `_ = ${f.offset} - unsafe.Offsetof(${sel})`);
    }
    return out;
  });
  if (!checks.length) return '';
  return [
    '// Native layouts; a mismatch overflows one of these constants at compile time.',
    'const (',
    ...indent(checks, TAB),
    ')',
  ].join('\n');
}

function resourceBlock(r: ResourcePlan): string {
  const go = goTypeName(r.tag);
  const v = goReceiver(go);
  const ctorName = `New${go}`;
  // The constructor adopts the handle instead of converting it.
  const ctorParts = r.ctor.params.map((p) => paramParts(p, goIdent(p.name, ['result', 'unlock'])));
  const ctorCall = `C.${r.ctor.fn.name}(${ctorParts.flatMap((p) => p.args).join(', ')})`;
  const ctorPost = ctorParts.flatMap((p) => p.post);
  const ctorLocks = ctorParts.flatMap((p) => (p.lock ? [p.lock] : []));
  const ctorBody = [
    ...lockLines(ctorLocks, (err) => `return nil, ${err}`),
    ...ctorParts.flatMap((p) => p.pre),
    ...(ctorPost.length
      ? [`result := ${ctorCall}`, ...ctorPost, `return ${fromRawName(r.tag)}(result)`]
      : [`return ${fromRawName(r.tag)}(${ctorCall})`]),
  ];

  const lines = [
    `// ${go} owns one native ${r.tag} handle. Close releases it with`,
    `// ${r.dtor.fn.name}; a finalizer does so for instances that are never closed.`,
    `type ${go} struct {`,
    `${TAB}mu     sync.RWMutex`,
    `${TAB}handle *C.${r.tag}`,
    '}',
    '',
    ...docLines(r.ctor, ctorName),
    `func ${ctorName}(${ctorParts.map((p) => p.decl).join(', ')}) (*${go}, error) {`,
    ...indent(ctorBody, TAB),
    '}',
    '',
    `func ${fromRawName(r.tag)}(handle *C.${r.tag}) (*${go}, error) {`,
    `${TAB}if handle == nil {`,
    `${TAB}${TAB}return nil, &ConstructionFailure{Constructor: "${r.ctor.fn.name}"}`,
    `${TAB}}`,
    `${TAB}${v} := &${go}{handle: handle}`,
    `${TAB}runtime.SetFinalizer(${v}, (*${go}).Close)`,
    `${TAB}return ${v}, nil`,
    '}',
    '',
    '// Close releases the native handle. Later calls are no-ops.',
    `func (${v} *${go}) Close() error {`,
    `${TAB}${v}.mu.Lock()`,
    `${TAB}defer ${v}.mu.Unlock()`,
    `${TAB}if ${v}.handle == nil {`,
    `${TAB}${TAB}return nil`,
    `${TAB}}`,
    `${TAB}C.${r.dtor.fn.name}(${v}.handle)`,
    `${TAB}${v}.handle = nil`,
    `${TAB}runtime.SetFinalizer(${v}, nil)`,
    `${TAB}return nil`,
    '}',
  ];

  for (const m of r.methods) {
    const receiver: GoReceiver & { name: string } = {
      name: v,
      decl: `${v} *${go}`,
      pre: [],
      arg: `${v}.handle`,
      post: [],
      lock: { v, exclusive: m.receiver?.access !== 'shared' },
    };
    lines.push('', ...goFunction(m, toPascal(m.name), receiver, true));
  }
  return lines.join('\n');
}

function supportBlock(pkg: string): string {
  return [
    '// ErrClosed is returned by methods called after Close.',
    `var ErrClosed = errors.New("${pkg}: use of closed handle")`,
    '',
    '// ConstructionFailure reports a native constructor that returned a null handle.',
    'type ConstructionFailure struct {',
    `${TAB}Constructor string`,
    '}',
    '',
    'func (e *ConstructionFailure) Error() string {',
    `${TAB}return fmt.Sprintf("%s returned a null handle", e.Constructor)`,
    '}',
  ].join('\n');
}

function lockOrderBlock(pkg: string): string {
  return [
    '// ErrAliased is returned when one instance is passed to a call more than once.',
    `var ErrAliased = errors.New("${pkg}: instance passed more than once")`,
    '',
    'type resourceLock struct {',
    `${TAB}mu        *sync.RWMutex`,
    `${TAB}key       uintptr`,
    `${TAB}exclusive bool`,
    '}',
    '',
    '// lockInOrder locks instances in address order and returns the matching unlock.',
    'func lockInOrder(locks ...resourceLock) (func(), error) {',
    `${TAB}sort.Slice(locks, func(i, j int) bool { return locks[i].key < locks[j].key })`,
    `${TAB}for i := 1; i < len(locks); i++ {`,
    `${TAB}${TAB}if locks[i].key == locks[i-1].key {`,
    `${TAB}${TAB}${TAB}return nil, ErrAliased`,
    `${TAB}${TAB}}`,
    `${TAB}}`,
    `${TAB}for _, l := range locks {`,
    `${TAB}${TAB}if l.exclusive {`,
    `${TAB}${TAB}${TAB}l.mu.Lock()`,
    `${TAB}${TAB}} else {`,
    `${TAB}${TAB}${TAB}l.mu.RLock()`,
    `${TAB}${TAB}}`,
    `${TAB}}`,
    `${TAB}return func() {`,
    `${TAB}${TAB}for i := len(locks) - 1; i >= 0; i-- {`,
    `${TAB}${TAB}${TAB}if locks[i].exclusive {`,
    `${TAB}${TAB}${TAB}${TAB}locks[i].mu.Unlock()`,
    `${TAB}${TAB}${TAB}} else {`,
    `${TAB}${TAB}${TAB}${TAB}locks[i].mu.RUnlock()`,
    `${TAB}${TAB}${TAB}}`,
    `${TAB}${TAB}}`,
    `${TAB}}, nil`,
    '}',
  ].join('\n');
}

function preamble(model: BindingModel): string {
  const lines = [
    `#cgo LDFLAGS: -l${model.library}`,
    '#include <stdbool.h>',
    '#include <stddef.h>',
    '#include <stdint.h>',
  ];
  const typedefs = [
    ...model.opaqueTags.map((t) => `typedef struct ${t} ${t};`),
    ...model.structs.map((s) => `typedef struct ${s.def.name} ${s.def.name};`),
  ];
  if (typedefs.length) lines.push('', ...typedefs);
  for (const s of model.structs) {
    lines.push('', `struct ${s.def.name} {`, ...s.def.fields.map((f) => `${TAB}${cTypeName(f.type)} ${f.name};`), '};');
  }
  lines.push('');
  for (const raw of model.rawFunctions) {
    const params = raw.fn.params.length ? raw.fn.params.map(cParam).join(', ') : 'void';
    lines.push(`${cTypeName(raw.fn.returns)} ${raw.fn.name}(${params});`);
  }
  return ['/*', ...lines, '*/', 'import "C"'].join('\n');
}

const STD_IMPORTS = ['errors', 'fmt', 'runtime', 'sort', 'sync', 'unsafe'];

export function emitGo(model: BindingModel, options: EmitOptions): BindingUnit {
  const pkg = goPackageName(model.library);

  const rawDeclarations: EmittedDecl[] = [
    ...model.opaqueTags.map((t): EmittedDecl => ({ kind: 'raw-type', symbol: t, code: `typedef struct ${t} ${t};` })),
    ...model.rawFunctions.map((raw): EmittedDecl => ({
      kind: 'raw-function',
      symbol: raw.fn.name,
      code: `${cTypeName(raw.fn.returns)} ${raw.fn.name}(${raw.fn.params.length ? raw.fn.params.map(cParam).join(', ') : 'void'});`,
    })),
  ];

  const wrappers: EmittedDecl[] = [];
  if (model.resources.length) wrappers.push({ kind: 'support', symbol: 'ErrClosed', code: supportBlock(pkg) });
  const layout = layoutBlock(model.structs);
  if (layout) wrappers.push({ kind: 'support', symbol: 'layout', code: layout });
  for (const s of model.structs) wrappers.push({ kind: 'record', symbol: s.def.name, code: structBlock(s) });
  for (const f of model.freeFunctions) {
    wrappers.push({ kind: 'function', symbol: f.fn.name, code: goFunction(f, toPascal(f.name)).join('\n') });
  }
  for (const r of model.resources) wrappers.push({ kind: 'resource', symbol: r.tag, code: resourceBlock(r) });
  if (wrappers.some((w) => w.code.includes('lockInOrder('))) {
    wrappers.splice(1, 0, { kind: 'support', symbol: 'lockInOrder', code: lockOrderBlock(pkg) });
  }

  const body = wrappers.map((w) => w.code).join('\n\n');
  const contents = joinBlocks([
    headerLines('//', model.source, model.fingerprint).join('\n'),
    `package ${pkg}`,
    preamble(model),
    goImports(body, STD_IMPORTS),
    ...wrappers.map((w) => w.code),
  ]);

  const files = [{ path: `go/${model.library}.go`, contents }];
  const harness = options.tests ? planHarness(model) : undefined;
  let tests: EmittedDecl[] = [];
  if (harness) {
    const rendered = renderGoTests(harness, model, pkg);
    tests = rendered.tests;
    if (rendered.file) files.push({ path: `go/${model.library}_test.go`, contents: rendered.file });
  }

  return {
    target: 'go',
    library: model.library,
    rawDeclarations,
    wrappers,
    tests,
    files,
    diagnostics: [...model.diagnostics, ...(harness?.diagnostics ?? [])],
  };
}

export const goBackend: TargetBackend = {
  target: 'go',
  types: goTypes,
  emit: emitGo,
};
