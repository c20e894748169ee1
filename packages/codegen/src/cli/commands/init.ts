/**
 * init Command
 * Scaffold an example schema and tabula.config.json
 */

import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { CONFIG_FILES, GENERATE_DEFAULTS } from '@tabula/core';

import { success, error, errorMessage, warn } from '../utils';

import type { TabulaConfig } from '../config';

export interface InitCommandOptions {
  /** Project directory to scaffold into */
  output?: string;
  cwd?: string;
}

const SCHEMA_DIR = 'schema';

export function getSchemaTemplate(): string {
  return `import {
  table,
  int,
  varchar,
  boolean,
  timestamp,
  withAutoIncrement,
  withDefault,
  withLength,
} from '@tabula/core';

export const UserSchema = table({
  name: 'users',
  columns: [
    int('id', withAutoIncrement(true)),
    varchar('email', withLength(255)),
    boolean('is_active', withDefault(true)),
    timestamp('created_at'),
  ],
});
`;
}

export function getConfigTemplate(): string {
  const config: TabulaConfig = {
    generate: {
      input: `./${SCHEMA_DIR}`,
      output: GENERATE_DEFAULTS.OUTPUT_DIR,
      recursive: true,
    },
    dialect: GENERATE_DEFAULTS.DIALECT,
  };
  return `${JSON.stringify(config, null, 2)}\n`;
}

async function writeIfMissing(path: string, contents: string): Promise<boolean> {
  if (existsSync(path)) {
    warn(`Skipped existing file: ${path}`);
    return false;
  }
  await writeFile(path, contents, 'utf8');
  success(`Created ${path}`);
  return true;
}

/**
 * @returns process exit code
 */
export async function initCommand(options: InitCommandOptions = {}): Promise<number> {
  const directory = resolve(options.cwd ?? process.cwd(), options.output ?? '.');

  try {
    await mkdir(join(directory, SCHEMA_DIR), { recursive: true });
    await writeIfMissing(join(directory, SCHEMA_DIR, 'user.ts'), getSchemaTemplate());
    await writeIfMissing(join(directory, CONFIG_FILES[0]), getConfigTemplate());
    return 0;
  } catch (error_) {
    error(errorMessage(error_));
    return 1;
  }
}
