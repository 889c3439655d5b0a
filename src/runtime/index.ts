export { OwnedHandle, withResource } from './OwnedHandle.js';
export type { Access, Releasable, ReleaseFn } from './OwnedHandle.js';
export {
  checkLayout,
  declareOpaque,
  declareStruct,
  inoutPointer,
  loadLibrary,
  resolveLibraryPath,
  sharedLibraryFileName,
  sliceLength,
} from './nativeLibrary.js';
export type { ExpectedLayout, LoadLibraryOptions, NativeLibrary, ObservedLayout, RawPointer } from './nativeLibrary.js';
export {
  ConstructionFailureError,
  LayoutMismatchError,
  LibraryLoadError,
  NativeBindingError,
  ReentrantAccessError,
  SliceLengthError,
  UseAfterDisposeError,
} from './runtimeErrors.js';
