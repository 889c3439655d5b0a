/** Fatal generation errors. Diagnostics are not errors; they end up in the report. */
export class BindsmithError extends Error {
  override name = 'BindsmithError';
}

export class UnsupportedSourceError extends BindsmithError {
  override name = 'UnsupportedSourceError';

  constructor(readonly file: string, reason: string) {
    super(`${file}: ${reason}`);
  }
}

export class ConfigError extends BindsmithError {
  override name = 'ConfigError';
}

export class UnknownTargetError extends BindsmithError {
  override name = 'UnknownTargetError';

  constructor(readonly target: string) {
    super(`Unknown target "${target}" (expected rust, go or typescript)`);
  }
}

/** Bad command-line arguments. */
export class UsageError extends BindsmithError {
  override name = 'UsageError';
}
