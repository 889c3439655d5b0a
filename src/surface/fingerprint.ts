import crypto from 'node:crypto';

import type { NativeSurface } from './surfaceTypes.js';

/**
 * Content hash of a surface. Source line numbers are excluded so that
 * moving declarations around a file does not change generated headers.
 */
export function fingerprintSurface(surface: NativeSurface): string {
  const hash = crypto.createHash('sha256');
  hash.update(surface.library);
  hash.update(
    JSON.stringify({
      functions: surface.functions.map(({ sourceLine: _line, ...fn }) => fn),
      structs: surface.structs.map(({ sourceLine: _line, ...s }) => s),
      opaqueTags: surface.opaqueTags,
    }),
  );
  return hash.digest('hex');
}
