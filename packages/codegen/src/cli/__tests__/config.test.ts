import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ConfigError } from '@tabula/core';

import { applyDefaults, defineConfig, loadConfig, validateConfig } from '../config';

describe('CLI config', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'tabula-config-'));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it('should return defaults without a config file', async () => {
    expect(await loadConfig({ cwd })).toEqual({
      generate: { input: undefined, output: './gen', recursive: false, modelDir: 'model' },
      dialect: 'mysql',
      modules: ['@tabula/core', 'tabula'],
    });
  });

  it('should read tabula.config.json from the working directory', async () => {
    await writeFile(
      join(cwd, 'tabula.config.json'),
      JSON.stringify({
        generate: { input: './schema', recursive: true },
        dialect: 'postgres',
        modules: ['./dsl'],
      }),
    );

    expect(await loadConfig({ cwd })).toEqual({
      generate: { input: './schema', output: './gen', recursive: true, modelDir: 'model' },
      dialect: 'postgresql',
      modules: ['./dsl'],
      path: join(cwd, 'tabula.config.json'),
    });
  });

  it('should read an explicit config path', async () => {
    await writeFile(join(cwd, 'custom.json'), JSON.stringify({ dialect: 'sqlserver' }));
    const config = await loadConfig({ cwd, path: 'custom.json' });
    expect(config.dialect).toBe('sqlserver');
  });

  it('should fail on a missing explicit config path', async () => {
    await expect(loadConfig({ cwd, path: 'missing.json' })).rejects.toThrow(
      `Configuration file not found: ${join(cwd, 'missing.json')}`,
    );
  });

  it('should fail on invalid JSON', async () => {
    await writeFile(join(cwd, 'tabula.config.json'), '{ "dialect": ');
    await expect(loadConfig({ cwd })).rejects.toBeInstanceOf(ConfigError);
  });

  describe('validateConfig', () => {
    it('should accept a complete config', () => {
      expect(() =>
        validateConfig({
          generate: { input: 'a', output: 'b', recursive: false, modelDir: 'rows' },
          dialect: 'oracle',
          modules: ['@tabula/core'],
        }),
      ).not.toThrow();
    });

    it('should reject values of the wrong type', () => {
      expect(() => validateConfig([])).toThrow('Configuration must be an object');
      expect(() => validateConfig({ generate: 'x' })).toThrow('"generate" must be an object');
      expect(() => validateConfig({ generate: { recursive: 'yes' } })).toThrow(
        'generate.recursive must be a boolean',
      );
      expect(() => validateConfig({ generate: { output: '' } })).toThrow(
        'generate.output must be a non-empty string',
      );
      expect(() => validateConfig({ modules: [] })).toThrow(
        'modules must be a non-empty array of module names',
      );
    });

    it('should reject unknown dialects', () => {
      expect(() => validateConfig({ dialect: 'db2' })).toThrow(
        expect.objectContaining({ name: 'ConfigError', field: 'dialect' }),
      );
    });
  });

  it('should keep typed configs unchanged', () => {
    const config = defineConfig({ dialect: 'sqlite' });
    expect(config).toEqual({ dialect: 'sqlite' });
    expect(applyDefaults(config).dialect).toBe('sqlite');
  });
});
