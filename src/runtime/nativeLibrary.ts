import path from 'node:path';

import koffi from 'koffi';

import { createLogger } from '../dx/logger.js';
import { LayoutMismatchError, LibraryLoadError, SliceLengthError } from './runtimeErrors.js';

const log = createLogger('runtime');

export type NativeLibrary = ReturnType<typeof koffi.load>;

/** Opaque native address as koffi hands it out (`null` for NULL). */
export type RawPointer = unknown;

export type LoadLibraryOptions = {
  /** Directory holding the artifact; defaults to `BINDSMITH_LIBRARY_PATH`, then the loader's search path. */
  dir?: string;
  platform?: NodeJS.Platform;
};

export function sharedLibraryFileName(name: string, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'win32') return `${name}.dll`;
  if (platform === 'darwin') return `lib${name}.dylib`;
  return `lib${name}.so`;
}

export function resolveLibraryPath(name: string, options: LoadLibraryOptions = {}): string {
  // An explicit file is used as given.
  if (name.includes('/') || name.includes('\\') || path.extname(name)) return name;
  const file = sharedLibraryFileName(name, options.platform);
  const dir = options.dir ?? process.env.BINDSMITH_LIBRARY_PATH;
  return dir ? path.join(dir, file) : file;
}

export function loadLibrary(name: string, options: LoadLibraryOptions = {}): NativeLibrary {
  const libPath = resolveLibraryPath(name, options);
  log.debug('load library', libPath);
  try {
    return koffi.load(libPath);
  } catch (err) {
    throw new LibraryLoadError(libPath, { cause: err });
  }
}

export type ExpectedLayout = {
  size: number;
  align: number;
  offsets: Record<string, number>;
};

export type ObservedLayout = {
  size: number;
  align: number;
  offsetOf(field: string): number;
};

/** Throws when the loader's view of a struct disagrees with the generated one. */
export function checkLayout(name: string, observed: ObservedLayout, expected: ExpectedLayout): void {
  if (observed.size !== expected.size) {
    throw new LayoutMismatchError(name, `size is ${observed.size}, expected ${expected.size}`);
  }
  if (observed.align !== expected.align) {
    throw new LayoutMismatchError(name, `alignment is ${observed.align}, expected ${expected.align}`);
  }
  for (const [field, offset] of Object.entries(expected.offsets)) {
    const actual = observed.offsetOf(field);
    if (actual !== offset) {
      throw new LayoutMismatchError(name, `${field} is at offset ${actual}, expected ${offset}`);
    }
  }
}

/**
 * Declares a plain struct with koffi and verifies its layout against the
 * one computed at generation time.
 */
export function declareStruct(name: string, fields: Record<string, string>, expected?: ExpectedLayout) {
  const type = koffi.struct(name, fields);
  if (expected) {
    checkLayout(
      name,
      {
        size: koffi.sizeof(type),
        align: koffi.alignof(type),
        offsetOf: (field) => koffi.offsetof(type, field),
      },
      expected,
    );
  }
  return type;
}

export function declareOpaque(name: string) {
  return koffi.opaque(name);
}

/** Pointer parameter whose pointee is copied in before the call and back out after it. */
export function inoutPointer(typeName: string) {
  return koffi.inout(koffi.pointer(typeName));
}

/** Length of `view` for a native length parameter that holds at most `max`. */
export function sliceLength(view: { readonly length: number }, max: number, parameter: string): number {
  if (view.length > max) throw new SliceLengthError(parameter, view.length, max);
  return view.length;
}
