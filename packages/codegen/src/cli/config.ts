/**
 * CLI Configuration
 * Load and validate tabula.config.json
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import {
  CONFIG_FILES,
  ConfigError,
  DSL_MODULES,
  GENERATE_DEFAULTS,
  parseDialect,
  type DialectName,
} from '@tabula/core';

export interface TabulaConfig {
  /** Code generation settings */
  generate?: {
    /** Schema file or directory */
    input?: string;
    /** Directory generated modules are written to */
    output?: string;
    /** Walk input directories recursively */
    recursive?: boolean;
    /** Sub-directory of the output holding row interfaces */
    modelDir?: string;
  };

  /** Dialect for `tabula ddl` (aliases such as `postgres` are accepted) */
  dialect?: string;

  /** Module specifiers that provide the schema DSL */
  modules?: string[];
}

export interface ResolvedConfig {
  generate: {
    input?: string;
    output: string;
    recursive: boolean;
    modelDir: string;
  };
  dialect: DialectName;
  modules: string[];
  /** File the configuration was read from, if any */
  path?: string;
}

/**
 * Define configuration helper
 */
export function defineConfig(config: TabulaConfig): TabulaConfig {
  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertOptionalString(value: unknown, field: string): void {
  if (value !== undefined && (typeof value !== 'string' || value.trim() === '')) {
    throw new ConfigError(`${field} must be a non-empty string`, field);
  }
}

/**
 * Validate configuration
 */
export function validateConfig(config: unknown): asserts config is TabulaConfig {
  if (!isRecord(config)) {
    throw new ConfigError('Configuration must be an object');
  }

  const generate = config['generate'];
  if (generate !== undefined) {
    if (!isRecord(generate)) {
      throw new ConfigError('"generate" must be an object', 'generate');
    }
    assertOptionalString(generate['input'], 'generate.input');
    assertOptionalString(generate['output'], 'generate.output');
    assertOptionalString(generate['modelDir'], 'generate.modelDir');
    const recursive = generate['recursive'];
    if (recursive !== undefined && typeof recursive !== 'boolean') {
      throw new ConfigError('generate.recursive must be a boolean', 'generate.recursive');
    }
  }

  const dialect = config['dialect'];
  if (dialect !== undefined) {
    if (typeof dialect !== 'string') {
      throw new ConfigError('dialect must be a string', 'dialect');
    }
    parseDialect(dialect);
  }

  const modules = config['modules'];
  if (modules !== undefined) {
    if (
      !Array.isArray(modules) ||
      modules.length === 0 ||
      !modules.every((entry) => typeof entry === 'string' && entry !== '')
    ) {
      throw new ConfigError('modules must be a non-empty array of module names', 'modules');
    }
  }
}

/**
 * Apply default values
 */
export function applyDefaults(config: TabulaConfig): ResolvedConfig {
  return {
    generate: {
      input: config.generate?.input,
      output: config.generate?.output ?? GENERATE_DEFAULTS.OUTPUT_DIR,
      recursive: config.generate?.recursive ?? GENERATE_DEFAULTS.RECURSIVE,
      modelDir: config.generate?.modelDir ?? GENERATE_DEFAULTS.MODEL_DIR,
    },
    dialect: parseDialect(config.dialect ?? GENERATE_DEFAULTS.DIALECT),
    modules: config.modules ?? [...DSL_MODULES],
  };
}

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config file; must exist */
  path?: string;
}

/**
 * Load configuration from file. Without an explicit path and without a
 * config file in `cwd`, the defaults are returned.
 *
 * @throws ConfigError on a missing explicit file, invalid JSON or invalid values
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedConfig> {
  const cwd = options.cwd ?? process.cwd();
  let configPath: string | undefined;

  if (options.path) {
    configPath = resolve(cwd, options.path);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Configuration file not found: ${configPath}`, 'path');
    }
  } else {
    configPath = CONFIG_FILES.map((filename) => resolve(cwd, filename)).find((fullPath) =>
      existsSync(fullPath),
    );
  }

  if (!configPath) {
    return applyDefaults({});
  }

  let config: unknown;
  try {
    config = JSON.parse(await readFile(configPath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Failed to load config from ${configPath}: ${message}`,
      'path',
      error instanceof Error ? error : undefined,
    );
  }

  validateConfig(config);
  return { ...applyDefaults(config), path: configPath };
}
