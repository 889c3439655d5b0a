export type Logger = {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
};

let enabled = false;

export function isDebugEnabled(): boolean {
  return enabled || process.env.BINDSMITH_DEBUG === '1';
}

/**
 * Enable/disable bindsmith debug logging programmatically.
 *
 * The CLI calls this for `--verbose` and for `debug: true` in the config file.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

// stdout carries reports and `--json` output; logs stay on stderr.
function write(level: 'debug' | 'warn', prefix: string, args: unknown[]): void {
  if (!isDebugEnabled()) return;
  if (level === 'warn') {
    // eslint-disable-next-line no-console
    console.warn(prefix, ...args);
  } else {
    // eslint-disable-next-line no-console
    console.error(prefix, ...args);
  }
}

/** Logger whose lines carry `[bindsmith:<scope>]`. */
export function createLogger(scope: string): Logger {
  const prefix = `[bindsmith:${scope}]`;
  return {
    debug: (...args) => write('debug', prefix, args),
    warn: (...args) => write('warn', prefix, args),
  };
}

export function logDebug(...args: unknown[]) {
  write('debug', '[bindsmith]', args);
}

export function logWarn(...args: unknown[]) {
  write('warn', '[bindsmith]', args);
}
