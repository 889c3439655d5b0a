import type { NativeFunction, NativeSurface } from '../surface/surfaceTypes.js';
import { handleTagOfType, paramHandleTag, returnsHandle } from '../surface/nativeType.js';
import type { Diagnostic } from '../report/diagnostics.js';
import { handleSubject } from '../report/diagnostics.js';
import { traceDebug } from '../dx/trace.js';
import type {
  Access,
  BoundMethod,
  Classification,
  ResourceClass,
  StructFunctions,
} from './classifyTypes.js';
import { hasDestructorName, isFactoryWord, stripOwner } from './naming.js';

function groupTag(fn: NativeFunction): string | undefined {
  const first = fn.params[0];
  return (first && paramHandleTag(first)) ?? handleTagOfType(fn.returns);
}

function takesHandle(fn: NativeFunction, tag: string): boolean {
  return fn.params.some((p) => paramHandleTag(p) === tag);
}

function isDestructorCandidate(fn: NativeFunction, tag: string): boolean {
  return (
    fn.params.length === 1 &&
    paramHandleTag(fn.params[0]) === tag &&
    fn.returns.kind === 'void'
  );
}

function accessOf(fn: NativeFunction): Access {
  return fn.params[0]?.passing === 'pointer' ? 'shared' : 'exclusive';
}

function memberName(fn: NativeFunction, owner: string): string {
  return fn.annotations?.rename ?? stripOwner(fn.name, owner) ?? fn.name;
}

function factoryName(fn: NativeFunction, owner: string): string {
  if (fn.annotations?.rename) return fn.annotations.rename;
  const rest = stripOwner(fn.name, owner);
  if (rest === null || isFactoryWord(rest)) return 'new';
  return rest;
}

function names(fns: NativeFunction[]): string {
  return fns.map((f) => f.name).join(', ');
}

type GroupVerdict =
  | { kind: 'resource'; resource: ResourceClass; leftovers: NativeFunction[] }
  | { kind: 'degraded'; diagnostic: Diagnostic };

function classifyGroup(tag: string, group: NativeFunction[]): GroupVerdict {
  const ctors = group.filter((fn) => returnsHandle(fn, tag) && !takesHandle(fn, tag));
  const dtors = group.filter((fn) => isDestructorCandidate(fn, tag));

  if (dtors.length !== 1) {
    return {
      kind: 'degraded',
      diagnostic: {
        kind: 'AmbiguousLifetime',
        subject: handleSubject(tag),
        message: dtors.length
          ? `${dtors.length} destructor candidates for ${tag} (${names(dtors)})`
          : `no destructor for ${tag}: no function takes only the handle and returns void`,
        hint: 'Expose exactly one void f(Handle*) teardown function; other zero-argument void functions need an extra parameter or a return value.',
      },
    };
  }

  if (ctors.length !== 1) {
    return {
      kind: 'degraded',
      diagnostic: {
        kind: 'AmbiguousLifetime',
        subject: handleSubject(tag),
        message: ctors.length
          ? `${ctors.length} constructor candidates for ${tag} (${names(ctors)})`
          : `no constructor for ${tag}: no function returns the handle without taking one`,
        hint: 'Expose exactly one function that returns a new handle.',
      },
    };
  }

  const [ctor] = ctors;
  const [dtor] = dtors;
  const methods: BoundMethod[] = [];
  const leftovers: NativeFunction[] = [];

  for (const fn of group) {
    if (fn === ctor || fn === dtor) continue;
    if (fn.params[0] && paramHandleTag(fn.params[0]) === tag) {
      methods.push({ fn, name: memberName(fn, tag), access: accessOf(fn) });
    } else {
      leftovers.push(fn);
    }
  }

  return {
    kind: 'resource',
    resource: {
      tag,
      ctor,
      dtor,
      dtorConfidence: hasDestructorName(dtor.name) ? 'convention' : 'structural',
      methods,
    },
    leftovers,
  };
}

/**
 * Partitions a surface into resource classes, plain-struct functions and
 * free functions. Handle tags whose lifetime cannot be classified degrade to
 * raw emission with an `AmbiguousLifetime` diagnostic.
 */
export function classifySurface(surface: NativeSurface): Classification {
  const diagnostics: Diagnostic[] = [];
  const groups = new Map<string, NativeFunction[]>();
  const ungrouped: NativeFunction[] = [];

  for (const fn of surface.functions) {
    const tag = groupTag(fn);
    if (tag === undefined) {
      ungrouped.push(fn);
      continue;
    }
    const group = groups.get(tag);
    if (group) group.push(fn);
    else groups.set(tag, [fn]);
  }

  const resources: ResourceClass[] = [];
  const rawHandleFunctions: NativeFunction[] = [];
  const degradedTags: string[] = [];
  const extraFree = new Set<NativeFunction>();

  for (const [tag, group] of groups) {
    const verdict = classifyGroup(tag, group);
    if (verdict.kind === 'degraded') {
      diagnostics.push(verdict.diagnostic);
      degradedTags.push(tag);
      rawHandleFunctions.push(...group);
      continue;
    }
    resources.push(verdict.resource);
    for (const fn of verdict.leftovers) extraFree.add(fn);
    traceDebug('classify.resource', {
      tag,
      ctor: verdict.resource.ctor.name,
      dtor: verdict.resource.dtor.name,
      dtorConfidence: verdict.resource.dtorConfidence,
      methods: verdict.resource.methods.map((m) => `${m.name}:${m.access}`),
    });
  }

  const structNames = new Set(surface.structs.map((s) => s.name));
  const byStruct = new Map<string, StructFunctions>();
  const structEntry = (name: string): StructFunctions => {
    let entry = byStruct.get(name);
    if (!entry) {
      entry = { struct: name, factories: [], methods: [] };
      byStruct.set(name, entry);
    }
    return entry;
  };

  const freeFunctions: NativeFunction[] = [];
  for (const fn of surface.functions) {
    if (extraFree.has(fn)) {
      freeFunctions.push(fn);
      continue;
    }
    if (!ungrouped.includes(fn)) continue;

    const first = fn.params[0];
    if (
      first &&
      first.type.kind === 'struct' &&
      structNames.has(first.type.name) &&
      (first.passing !== 'mut-pointer' || fn.returns.kind === 'void')
    ) {
      structEntry(first.type.name).methods.push({
        fn,
        name: memberName(fn, first.type.name),
        access: first.passing === 'mut-pointer' ? 'exclusive' : 'shared',
      });
      continue;
    }

    const ret = fn.returns;
    if (
      ret.kind === 'struct' &&
      structNames.has(ret.name) &&
      !fn.params.some((p) => p.type.kind === 'struct' && p.type.name === ret.name)
    ) {
      structEntry(ret.name).factories.push({ fn, name: factoryName(fn, ret.name) });
      continue;
    }

    freeFunctions.push(fn);
  }

  const structFunctions = surface.structs
    .map((s) => byStruct.get(s.name))
    .filter((s): s is StructFunctions => s !== undefined);

  return { resources, structFunctions, freeFunctions, rawHandleFunctions, degradedTags, diagnostics };
}
