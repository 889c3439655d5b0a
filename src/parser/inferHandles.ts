import type { NativeFunction, NativeParam, NativeType } from '../surface/surfaceTypes.js';
import { opaque, pointer } from '../surface/nativeType.js';
import { isFactoryWord, splitWords, toPascal } from '../classify/naming.js';
import { createLogger } from '../dx/logger.js';

const log = createLogger('parser');

type Family = { words: string[]; tag: string };

function isVoidPointer(type: NativeType): boolean {
  return type.kind === 'pointer' && type.to.kind === 'void';
}

/** `calculator_new` returning `void*` makes `calculator` a handle family. */
function familyOf(fn: NativeFunction): string[] | undefined {
  if (!isVoidPointer(fn.returns)) return undefined;
  const words = splitWords(fn.name);
  const at = words.findIndex(isFactoryWord);
  return at > 0 ? words.slice(0, at) : undefined;
}

function hasPrefix(words: string[], prefix: string[]): boolean {
  return prefix.length < words.length && prefix.every((w, i) => words[i] === w);
}

/**
 * Turns untyped `void*` handles into opaque tags. Every `void*` in a
 * function named after a family becomes that family's handle.
 */
export function inferVoidHandles(
  functions: NativeFunction[],
  structNames: ReadonlySet<string>,
  opaqueTags: string[],
): { functions: NativeFunction[]; opaqueTags: string[] } {
  const families: Family[] = [];
  for (const fn of functions) {
    const words = familyOf(fn);
    if (!words) continue;
    const tag = toPascal(words.join('_'));
    if (structNames.has(tag) || families.some((f) => f.tag === tag)) continue;
    families.push({ words, tag });
  }
  if (!families.length) return { functions, opaqueTags };
  // Longest prefix wins when families nest (`db` and `db_cursor`).
  families.sort((a, b) => b.words.length - a.words.length);

  const tags = [...opaqueTags];
  const retyped = functions.map((fn) => {
    const words = splitWords(fn.name);
    const family = families.find((f) => hasPrefix(words, f.words));
    if (!family) return fn;

    const params = fn.params.map((p): NativeParam => (p.passing !== 'value' && p.type.kind === 'void' ? { ...p, type: opaque(family.tag) } : p));
    const returns =
      fn.returns.kind === 'pointer' && isVoidPointer(fn.returns) ? pointer(opaque(family.tag), fn.returns.mutability) : fn.returns;
    if (params.every((p, i) => p === fn.params[i]) && returns === fn.returns) return fn;

    if (!tags.includes(family.tag)) tags.push(family.tag);
    log.debug('void* handle', fn.name, '->', family.tag);
    return { ...fn, params, returns };
  });

  return { functions: retyped, opaqueTags: tags };
}
