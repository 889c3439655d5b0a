import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { BindsmithError, UsageError } from './errors.js';
import type { CliCommand, CliFlags } from './cliArgs.js';
import { USAGE, parseCliArgs } from './cliArgs.js';
import type { BindsmithConfig } from './dx/config.js';
import { loadOptionalConfig } from './dx/config.js';
import { logDebug, setDebugEnabled } from './dx/logger.js';
import { traceError } from './dx/trace.js';
import { parseNativeSource } from './parser/index.js';
import { TARGET_LANGUAGES } from './emit/emitTypes.js';
import { generateBindings, resolveTargets } from './emit/generateBindings.js';
import { writeBindingUnit } from './emit/writeBindings.js';
import { formatReport } from './report/formatReport.js';
import { formatInspection, inspectSurface } from './report/inspectSurface.js';

export type CliIo = {
  out(text: string): void;
  err(text: string): void;
};

const consoleIo: CliIo = {
  // eslint-disable-next-line no-console
  out: (text) => console.log(text),
  // eslint-disable-next-line no-console
  err: (text) => console.error(text),
};

export const DEFAULT_OUT_DIR = 'bindings';

function packageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  return typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string'
    ? raw.version
    : '0.0.0';
}

function exitCode(flags: CliFlags, diagnostics: number): number {
  return flags.strict && diagnostics > 0 ? 2 : 0;
}

function run(command: Extract<CliCommand, { source: string }>, config: BindsmithConfig | null, io: CliIo, cwd: string): number {
  const { flags } = command;
  const extraction = parseNativeSource(resolve(cwd, command.source), {
    library: flags.lib ?? config?.library,
    source: command.source,
  });

  if (command.kind === 'inspect') {
    const inspection = inspectSurface(extraction.surface, extraction.diagnostics);
    io.out(flags.json ? JSON.stringify(inspection, null, 2) : formatInspection(inspection));
    return exitCode(flags, inspection.diagnostics.length);
  }

  const targets = resolveTargets(flags.targets ?? config?.targets ?? TARGET_LANGUAGES);
  const result = generateBindings(extraction.surface, {
    targets,
    tests: flags.tests ?? config?.tests ?? true,
    rename: config?.rename,
    extractionDiagnostics: extraction.diagnostics,
  });

  const outDir = resolve(cwd, flags.out ?? config?.outDir ?? DEFAULT_OUT_DIR);
  const written = result.units.flatMap((unit) => writeBindingUnit(unit, outDir));
  logDebug('generated', written.length, 'files in', outDir);

  if (flags.json) {
    io.out(JSON.stringify({ report: result.report, written }, null, 2));
  } else {
    io.out(formatReport(result.report));
    io.out(`\nWrote ${written.length} file${written.length === 1 ? '' : 's'} to ${outDir}`);
  }
  return exitCode(flags, result.report.diagnostics.length);
}

/** Runs one CLI invocation and returns its exit code. */
export async function runCli(argv: readonly string[], io: CliIo = consoleIo, cwd: string = process.cwd()): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.err(err.message);
    io.err(USAGE);
    return 1;
  }

  if (command.kind === 'help') {
    io.out(USAGE);
    return 0;
  }
  if (command.kind === 'version') {
    io.out(packageVersion());
    return 0;
  }

  try {
    const config = await loadOptionalConfig(cwd);
    if (command.flags.verbose || config?.debug) setDebugEnabled(true);
    return run(command, config, io, cwd);
  } catch (err) {
    if (!(err instanceof BindsmithError)) throw err;
    traceError('cli.fatal', { name: err.name, message: err.message });
    io.err(`${err.name}: ${err.message}`);
    return 1;
  }
}
