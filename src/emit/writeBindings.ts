import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';

import { createLogger } from '../dx/logger.js';
import type { BindingUnit } from './emitTypes.js';

const log = createLogger('write');

/** Writes every rendered file of `unit` under `outDir`; returns the written paths. */
export function writeBindingUnit(unit: BindingUnit, outDir: string): string[] {
  return unit.files.map((file) => {
    const target = join(outDir, file.path);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, file.contents, 'utf8');
    log.debug('wrote', target);
    return target;
  });
}
