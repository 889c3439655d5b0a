import { UsageError } from './errors.js';

export type CliFlags = {
  targets?: string[];
  lib?: string;
  out?: string;
  /** `false` for `--no-tests`; unset leaves it to the config file. */
  tests?: boolean;
  json: boolean;
  strict: boolean;
  verbose: boolean;
};

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'generate' | 'inspect'; source: string; flags: CliFlags };

const VALUE_FLAGS = new Set(['--target', '--lib', '--out']);
const GENERATE_ONLY = new Set(['--target', '--out', '--no-tests']);

export const USAGE = `bindsmith

Usage:
  bindsmith generate <source> [--target rust,go,typescript] [--lib <name>] [--out <dir>] [--no-tests] [--json] [--strict]
  bindsmith inspect <source> [--lib <name>] [--json] [--strict]
  bindsmith --help | --version

Examples:
  bindsmith generate native/ffi_example.cpp --target rust,go --out bindings
  bindsmith inspect native/ffi_example.cpp

Notes:
  - Sources: .c .h .cpp .cc .cxx .hpp .hh .hxx .rs
  - Defaults come from bindsmith.config.js when present
  - --strict exits with 2 when any diagnostic is reported
  - --verbose (or BINDSMITH_DEBUG=1) prints debug logs
`;

function splitTargets(value: string): string[] {
  const targets = value
    .split(',')
    .map((t) => t.trim())
    .filter(Boolean);
  if (!targets.length) throw new UsageError('--target needs at least one target');
  return targets;
}

/** Parses `process.argv.slice(2)`. Throws UsageError on anything it does not understand. */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  if (!argv.length || argv.includes('--help') || argv.includes('-h')) return { kind: 'help' };
  if (argv.includes('--version') || argv.includes('-v')) return { kind: 'version' };

  const [cmd, ...rest] = argv;
  if (cmd !== 'generate' && cmd !== 'inspect') throw new UsageError(`Unknown command "${cmd}"`);

  const flags: CliFlags = { json: false, strict: false, verbose: false };
  let source: string | undefined;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('-')) {
      if (source !== undefined) throw new UsageError(`Unexpected argument "${arg}"`);
      source = arg;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (cmd === 'inspect' && GENERATE_ONLY.has(flag)) throw new UsageError(`${flag} only applies to generate`);

    if (VALUE_FLAGS.has(flag)) {
      const value = eq === -1 ? rest[++i] : arg.slice(eq + 1);
      if (value === undefined || value === '' || (eq === -1 && value.startsWith('-'))) {
        throw new UsageError(`${flag} needs a value`);
      }
      if (flag === '--target') flags.targets = splitTargets(value);
      else if (flag === '--lib') flags.lib = value;
      else flags.out = value;
      continue;
    }

    switch (arg) {
      case '--no-tests':
        flags.tests = false;
        break;
      case '--json':
        flags.json = true;
        break;
      case '--strict':
        flags.strict = true;
        break;
      case '--verbose':
        flags.verbose = true;
        break;
      default:
        throw new UsageError(`Unknown option "${arg}"`);
    }
  }

  if (source === undefined) throw new UsageError(`${cmd} needs a source file`);
  return { kind: cmd, source, flags };
}
