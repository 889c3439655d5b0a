import { performance } from 'node:perf_hooks';

export type TraceLevel = 'error' | 'warn' | 'info' | 'debug';

const ORDER: Record<TraceLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/** Most verbose level `BINDSMITH_TRACE_LEVEL` admits, or null while tracing is off. */
function threshold(): TraceLevel | null {
  const on = process.env.BINDSMITH_TRACE;
  if (on !== '1' && on !== 'true' && on !== 'yes') return null;
  const v = (process.env.BINDSMITH_TRACE_LEVEL ?? '').toLowerCase();
  return v === 'error' || v === 'warn' || v === 'info' || v === 'debug' ? v : 'info';
}

export function shouldTrace(level: TraceLevel): boolean {
  const max = threshold();
  return max !== null && ORDER[level] <= ORDER[max];
}

/** Writes one JSON trace line to stderr. */
export function trace(level: TraceLevel, event: string, data?: Record<string, unknown>) {
  if (!shouldTrace(level)) return;

  const payload: Record<string, unknown> = {
    t: Number(performance.now().toFixed(3)),
    level,
    event,
  };
  if (data !== undefined) payload.data = data;
  process.stderr.write(`[bindsmith:trace] ${JSON.stringify(payload)}\n`);
}

export function traceError(event: string, data?: Record<string, unknown>) {
  trace('error', event, data);
}

export function traceInfo(event: string, data?: Record<string, unknown>) {
  trace('info', event, data);
}

export function traceDebug(event: string, data?: Record<string, unknown>) {
  trace('debug', event, data);
}

/**
 * Runs `fn` and, when info tracing is on, records how long it took as `ms`
 * in the event's data. The event is written even if `fn` throws.
 */
export function traceTimed<T>(event: string, data: Record<string, unknown>, fn: () => T): T {
  if (!shouldTrace('info')) return fn();
  const start = performance.now();
  try {
    return fn();
  } finally {
    trace('info', event, { ...data, ms: Number((performance.now() - start).toFixed(3)) });
  }
}
