export function splitWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .split(/[^A-Za-z0-9]+/)
    .filter(Boolean)
    .map((w) => w.toLowerCase());
}

export function toSnake(name: string): string {
  return splitWords(name).join('_');
}

export function toCamel(name: string): string {
  const words = splitWords(name);
  return words
    .map((w, i) => (i === 0 ? w : w[0].toUpperCase() + w.slice(1)))
    .join('');
}

export function toPascal(name: string): string {
  return splitWords(name)
    .map((w) => w[0].toUpperCase() + w.slice(1))
    .join('');
}

/**
 * Removes the first run of `owner`'s words from `fnName`:
 * `calculator_get_value` owned by `Calculator` is `get_value`.
 * Returns null when nothing would remain.
 */
export function stripOwner(fnName: string, owner: string): string | null {
  const words = splitWords(fnName);
  const ownerWords = splitWords(owner);
  if (!ownerWords.length) return words.join('_');

  for (let i = 0; i + ownerWords.length <= words.length; i++) {
    if (ownerWords.every((w, j) => words[i + j] === w)) {
      const rest = [...words.slice(0, i), ...words.slice(i + ownerWords.length)];
      return rest.length ? rest.join('_') : null;
    }
  }
  return words.join('_');
}

const DESTRUCTOR_WORDS = new Set([
  'delete',
  'destroy',
  'free',
  'release',
  'dispose',
  'drop',
  'close',
  'finalize',
]);

const FACTORY_WORDS = new Set(['new', 'create', 'make', 'init', 'alloc', 'open', 'construct']);

export function hasDestructorName(fnName: string): boolean {
  return splitWords(fnName).some((w) => DESTRUCTOR_WORDS.has(w));
}

export function isFactoryWord(word: string): boolean {
  return FACTORY_WORDS.has(word);
}

/** Appends `_` to identifiers a target reserves. */
export function safeIdentifier(name: string, reserved: ReadonlySet<string>): string {
  return reserved.has(name) ? `${name}_` : name;
}
