import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { ConfigError } from '../errors.js';
import type { TargetLanguage } from '../emit/emitTypes.js';
import { isTargetLanguage } from '../emit/emitTypes.js';
import { logDebug } from './logger.js';

export type BindsmithConfig = {
  /** Targets generated when `--target` is not given. */
  targets?: TargetLanguage[];
  /** Native artifact name, when it differs from the source file's base name. */
  library?: string;
  outDir?: string;
  /** Safe-wrapper names by native symbol; wins over `@rename`. */
  rename?: Record<string, string>;
  /** Emit verification harnesses (default true). */
  tests?: boolean;
  /** Enable debug logs without the env var. */
  debug?: boolean;
};

export const CONFIG_FILE = 'bindsmith.config.js';

let cached:
  | { loaded: true; config: BindsmithConfig | null }
  | { loaded: false } = { loaded: false };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function optionalString(raw: Record<string, unknown>, key: string): string | undefined {
  const v = raw[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'string' || !v) throw new ConfigError(`${CONFIG_FILE}: "${key}" must be a non-empty string`);
  return v;
}

function optionalBoolean(raw: Record<string, unknown>, key: string): boolean | undefined {
  const v = raw[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'boolean') throw new ConfigError(`${CONFIG_FILE}: "${key}" must be a boolean`);
  return v;
}

/** Checks the shape of a loaded config module's export. */
export function validateConfig(raw: unknown): BindsmithConfig {
  if (!isRecord(raw)) throw new ConfigError(`${CONFIG_FILE} must export an object`);

  const config: BindsmithConfig = {
    library: optionalString(raw, 'library'),
    outDir: optionalString(raw, 'outDir'),
    tests: optionalBoolean(raw, 'tests'),
    debug: optionalBoolean(raw, 'debug'),
  };

  if (raw.targets !== undefined) {
    if (!Array.isArray(raw.targets) || !raw.targets.length) {
      throw new ConfigError(`${CONFIG_FILE}: "targets" must be a non-empty array`);
    }
    const targets: TargetLanguage[] = [];
    for (const t of raw.targets) {
      if (typeof t !== 'string' || !isTargetLanguage(t)) {
        throw new ConfigError(`${CONFIG_FILE}: unknown target ${JSON.stringify(t)}`);
      }
      targets.push(t);
    }
    config.targets = targets;
  }

  if (raw.rename !== undefined) {
    if (!isRecord(raw.rename)) throw new ConfigError(`${CONFIG_FILE}: "rename" must map symbols to names`);
    const rename: Record<string, string> = {};
    for (const [symbol, name] of Object.entries(raw.rename)) {
      if (typeof name !== 'string' || !/^[a-z][a-z0-9_]*$/.test(name)) {
        throw new ConfigError(`${CONFIG_FILE}: rename.${symbol} must be a snake_case name`);
      }
      rename[symbol] = name;
    }
    config.rename = rename;
  }

  return config;
}

/**
 * Loads optional `bindsmith.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 */
export async function loadOptionalConfig(projectRoot: string = process.cwd()): Promise<BindsmithConfig | null> {
  if (cached.loaded) return cached.config;

  const p = join(projectRoot, CONFIG_FILE);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  // Dynamic import so there is zero cost when config isn't present.
  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const exported = isRecord(mod) && 'default' in mod ? mod.default : mod;
  const config = validateConfig(exported);
  cached = { loaded: true, config };
  logDebug('loaded config', { path: p });
  return config;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
