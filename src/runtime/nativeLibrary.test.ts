import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { describe, it, expect } from 'vitest';

import {
  checkLayout,
  declareStruct,
  loadLibrary,
  resolveLibraryPath,
  sharedLibraryFileName,
  sliceLength,
} from './nativeLibrary.js';
import { LayoutMismatchError, LibraryLoadError, SliceLengthError } from './runtimeErrors.js';

describe('library paths', () => {
  it('uses each platform naming convention', () => {
    expect(sharedLibraryFileName('ffi_example', 'linux')).toBe('libffi_example.so');
    expect(sharedLibraryFileName('ffi_example', 'darwin')).toBe('libffi_example.dylib');
    expect(sharedLibraryFileName('ffi_example', 'win32')).toBe('ffi_example.dll');
  });

  it('joins the configured directory', () => {
    expect(resolveLibraryPath('ffi_example', { dir: '/opt/native', platform: 'linux' })).toBe(
      join('/opt/native', 'libffi_example.so'),
    );
    expect(resolveLibraryPath('./build/custom.so', { dir: '/opt/native' })).toBe('./build/custom.so');
  });

  it('wraps loader failures', () => {
    const dir = join(tmpdir(), 'bindsmith-no-such-dir');
    expect(() => loadLibrary('missing', { dir })).toThrow(LibraryLoadError);
  });
});

describe('checkLayout', () => {
  const expected = { size: 16, align: 8, offsets: { id: 0, score: 8 } };
  const observed = (size: number, align: number, offsets: Record<string, number>) => ({
    size,
    align,
    offsetOf: (field: string) => offsets[field] ?? -1,
  });

  it('accepts a matching layout', () => {
    expect(() => checkLayout('Row', observed(16, 8, { id: 0, score: 8 }), expected)).not.toThrow();
  });

  it('names the first difference', () => {
    expect(() => checkLayout('Row', observed(12, 4, { id: 0, score: 4 }), expected)).toThrow(
      'Row layout differs from the generated declaration: size is 12, expected 16',
    );
    expect(() => checkLayout('Row', observed(16, 8, { id: 0, score: 4 }), expected)).toThrow(
      'Row layout differs from the generated declaration: score is at offset 4, expected 8',
    );
  });

  it('checks koffi declarations against the computed layout', () => {
    expect(() =>
      declareStruct('ScoreRecord', { id: 'int32_t', score: 'double' }, expected),
    ).not.toThrow();
    expect(() =>
      declareStruct('ShiftedScoreRecord', { id: 'int32_t', score: 'double' }, { ...expected, offsets: { id: 0, score: 4 } }),
    ).toThrow(LayoutMismatchError);
  });
});

describe('sliceLength', () => {
  it('passes lengths the native parameter can hold', () => {
    expect(sliceLength(new Int32Array(3), 127, 'values')).toBe(3);
    expect(sliceLength(new Uint8Array(127), 127, 'values')).toBe(127);
  });

  it('rejects longer sequences', () => {
    expect(() => sliceLength(new Uint8Array(128), 127, 'values')).toThrow(SliceLengthError);
    expect(() => sliceLength(new Uint8Array(128), 127, 'values')).toThrow(
      'values has 128 elements; the native length parameter holds at most 127',
    );
  });
});
