import { describe, it, expect, vi } from 'vitest';

import type { RawPointer } from './nativeLibrary.js';
import type { ReleaseFn } from './OwnedHandle.js';
import { OwnedHandle, withResource } from './OwnedHandle.js';
import { ReentrantAccessError, UseAfterDisposeError } from './runtimeErrors.js';

class Counter extends OwnedHandle {
  constructor(handle: RawPointer, release: ReleaseFn) {
    super(handle, release, 'Counter');
  }
}

describe('OwnedHandle', () => {
  it('releases exactly once', () => {
    const release = vi.fn();
    const counter = new Counter(42, release);
    counter.dispose();
    counter.dispose();
    expect(release).toHaveBeenCalledTimes(1);
    expect(release).toHaveBeenCalledWith(42);
    expect(counter.disposed).toBe(true);
  });

  it('rejects use after dispose', () => {
    const counter = new Counter(1, () => {});
    counter.dispose();
    expect(() => counter.withHandle((h) => h)).toThrow(UseAfterDisposeError);
    expect(() => counter.withHandle((h) => h)).toThrow('Counter was already disposed');
  });

  it('lets shared borrows nest', () => {
    const counter = new Counter(7, () => {});
    const seen = counter.withHandle((outer) => counter.withHandle((inner) => [outer, inner]));
    expect(seen).toEqual([7, 7]);
  });

  it('keeps exclusive borrows exclusive', () => {
    const counter = new Counter(7, () => {});
    expect(() => counter.withHandle(() => counter.withHandle((h) => h, 'exclusive'))).toThrow(
      'Counter is already borrowed; exclusive access would alias it',
    );
    expect(() => counter.withHandle(() => counter.withHandle((h) => h), 'exclusive')).toThrow(ReentrantAccessError);
    // Both borrows ended, so the handle is usable again.
    expect(counter.withHandle((h) => h, 'exclusive')).toBe(7);
  });

  it('defers release until the last borrow ends', () => {
    const release = vi.fn();
    const counter = new Counter(3, release);
    counter.withHandle(() => {
      counter.dispose();
      expect(release).not.toHaveBeenCalled();
    });
    expect(release).toHaveBeenCalledWith(3);
  });
});

describe('withResource', () => {
  it('disposes after the body returns', () => {
    const release = vi.fn();
    const result = withResource(new Counter(5, release), (c) => c.withHandle((h) => h));
    expect(result).toBe(5);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('disposes when the body throws', () => {
    const release = vi.fn();
    expect(() =>
      withResource(new Counter(5, release), () => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('waits for a returned promise', async () => {
    const release = vi.fn();
    const pending = withResource(new Counter(5, release), async (c) => {
      await Promise.resolve();
      expect(release).not.toHaveBeenCalled();
      return c.disposed;
    });
    await expect(pending).resolves.toBe(false);
    expect(release).toHaveBeenCalledTimes(1);
  });
});
