import { logWarn } from '../dx/logger.js';
import { traceDebug } from '../dx/trace.js';
import type { RawPointer } from './nativeLibrary.js';
import { ReentrantAccessError, UseAfterDisposeError } from './runtimeErrors.js';

export type Access = 'shared' | 'exclusive';

export type ReleaseFn = (handle: RawPointer) => void;

export interface Releasable {
  readonly disposed: boolean;
  dispose(): void;
}

type Held = { handle: RawPointer; release: ReleaseFn; typeName: string };

// Fallback for owners that are never disposed explicitly. The held value must
// not reference the owner, or it would never become unreachable.
const finalizer = new FinalizationRegistry<Held>((held) => {
  traceDebug('handle.finalize', { type: held.typeName });
  try {
    held.release(held.handle);
  } catch (err) {
    logWarn(`release of a collected ${held.typeName} failed:`, err);
  }
});

/**
 * Sole owner of one native handle. The release function runs exactly once:
 * on `dispose()`, or when the owner is garbage collected undisposed.
 *
 * Calls borrow the handle through `withHandle`. Shared borrows may nest;
 * an exclusive borrow excludes every other borrow. A `dispose()` issued while
 * a borrow is outstanding takes effect when the last borrow ends.
 */
export abstract class OwnedHandle implements Releasable {
  private _handle: RawPointer;
  private readonly _release: ReleaseFn;
  private readonly _typeName: string;
  private _disposed = false;
  private _releasePending = false;
  private _shared = 0;
  private _exclusive = false;
  private readonly _token = {};

  protected constructor(handle: RawPointer, release: ReleaseFn, typeName: string) {
    this._handle = handle;
    this._release = release;
    this._typeName = typeName;
    finalizer.register(this, { handle, release, typeName }, this._token);
  }

  get disposed(): boolean {
    return this._disposed;
  }

  /** Runs `fn` with the live handle under the requested access mode. */
  withHandle<T>(fn: (handle: RawPointer) => T, access: Access = 'shared'): T {
    if (this._disposed) throw new UseAfterDisposeError(this._typeName);
    if (this._exclusive || (access === 'exclusive' && this._shared > 0)) {
      throw new ReentrantAccessError(this._typeName, access);
    }

    if (access === 'exclusive') this._exclusive = true;
    else this._shared++;
    try {
      return fn(this._handle);
    } finally {
      if (access === 'exclusive') this._exclusive = false;
      else this._shared--;
      if (this._releasePending && !this._exclusive && this._shared === 0) this.releaseNow();
    }
  }

  /** Releases the native handle. Further calls are no-ops. */
  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    finalizer.unregister(this._token);
    if (this._exclusive || this._shared > 0) {
      this._releasePending = true;
      return;
    }
    this.releaseNow();
  }

  private releaseNow(): void {
    this._releasePending = false;
    const handle = this._handle;
    this._handle = null;
    traceDebug('handle.release', { type: this._typeName });
    this._release(handle);
  }
}

/**
 * Scoped use of a resource: `resource` is disposed once `body` is done with
 * it. A promise-returning body keeps it alive until the promise settles.
 */
export function withResource<R extends Releasable, T>(resource: R, body: (resource: R) => Promise<T>): Promise<T>;
export function withResource<R extends Releasable, T>(resource: R, body: (resource: R) => T): T;
export function withResource<R extends Releasable, T>(
  resource: R,
  body: (resource: R) => T | Promise<T>,
): T | Promise<T> {
  let result: T | Promise<T>;
  try {
    result = body(resource);
  } catch (err) {
    resource.dispose();
    throw err;
  }
  if (result instanceof Promise) {
    return result.finally(() => resource.dispose());
  }
  resource.dispose();
  return result;
}
