export class NativeBindingError extends Error {
  override name = 'NativeBindingError';
}

/** A native constructor returned a null handle. */
export class ConstructionFailureError extends NativeBindingError {
  override name = 'ConstructionFailureError';

  constructor(readonly constructorName: string) {
    super(`${constructorName} returned a null handle`);
  }
}

export class UseAfterDisposeError extends NativeBindingError {
  override name = 'UseAfterDisposeError';

  constructor(readonly typeName: string) {
    super(`${typeName} was already disposed`);
  }
}

/**
 * A call re-entered a resource while it was borrowed in a conflicting mode,
 * typically from a native callback.
 */
export class ReentrantAccessError extends NativeBindingError {
  override name = 'ReentrantAccessError';

  constructor(
    readonly typeName: string,
    readonly requested: 'shared' | 'exclusive',
  ) {
    super(`${typeName} is already borrowed; ${requested} access would alias it`);
  }
}

export class LayoutMismatchError extends NativeBindingError {
  override name = 'LayoutMismatchError';

  constructor(
    readonly structName: string,
    detail: string,
  ) {
    super(`${structName} layout differs from the generated declaration: ${detail}`);
  }
}

export class LibraryLoadError extends NativeBindingError {
  override name = 'LibraryLoadError';

  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to load native library: ${path}`, options);
  }
}

/** A sequence is longer than the native length parameter can express. */
export class SliceLengthError extends NativeBindingError {
  override name = 'SliceLengthError';

  constructor(
    readonly parameter: string,
    readonly length: number,
    readonly max: number,
  ) {
    super(`${parameter} has ${length} elements; the native length parameter holds at most ${max}`);
  }
}
