import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ConfigError } from '../errors.js';
import { __resetConfigCacheForTests, loadOptionalConfig, validateConfig } from './config.js';

describe('config loader', () => {
  afterEach(() => {
    __resetConfigCacheForTests();
  });

  it('returns null when config file is missing', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'bindsmith-cfg-'));
    const cfg = await loadOptionalConfig(dir);
    expect(cfg).toBe(null);
  });

  it('loads bindsmith.config.js (default export)', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'bindsmith-cfg-'));
    writeFileSync(
      join(dir, 'bindsmith.config.js'),
      `export default { targets: ["go"], outDir: "gen", rename: { add: "add_numbers" }, tests: false };\n`,
      'utf8',
    );

    const cfg = await loadOptionalConfig(dir);
    expect(cfg?.targets).toEqual(['go']);
    expect(cfg?.outDir).toBe('gen');
    expect(cfg?.rename).toEqual({ add: 'add_numbers' });
    expect(cfg?.tests).toBe(false);
  });

  it('reads the file once per process', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'bindsmith-cfg-'));
    const file = join(dir, 'bindsmith.config.js');
    writeFileSync(file, `export default { library: "first" };\n`, 'utf8');
    expect((await loadOptionalConfig(dir))?.library).toBe('first');

    writeFileSync(file, `export default { library: "second" };\n`, 'utf8');
    expect((await loadOptionalConfig(dir))?.library).toBe('first');
  });
});

describe('validateConfig', () => {
  it('rejects unknown targets', () => {
    expect(() => validateConfig({ targets: ['rust', 'cobol'] })).toThrow(ConfigError);
    expect(() => validateConfig({ targets: ['rust', 'cobol'] })).toThrow('unknown target "cobol"');
  });

  it('rejects renames that are not snake_case', () => {
    expect(() => validateConfig({ rename: { add: 'addNumbers' } })).toThrow('rename.add must be a snake_case name');
  });

  it('rejects a non-object export', () => {
    expect(() => validateConfig(42)).toThrow('bindsmith.config.js must export an object');
  });

  it('accepts an empty object', () => {
    expect(validateConfig({})).toEqual({
      library: undefined,
      outDir: undefined,
      tests: undefined,
      debug: undefined,
    });
  });
});
