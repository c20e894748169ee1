/**
 * ddl Command
 * Print CREATE TABLE statements for a schema file
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { DdlBuilder, parseDialect, type DialectName, type EntityDescriptor } from '@tabula/core';

import { SchemaExtractor } from '../../extractor';
import { loadConfig } from '../config';
import { error, errorMessage, warn } from '../utils';

export interface DdlCommandOptions {
  input?: string;
  /** Overrides the configured dialect */
  dialect?: string;
  config?: string;
  cwd?: string;
}

/**
 * Statements for every entity, separated by blank lines
 */
export function renderDdl(entities: readonly EntityDescriptor[], dialect: DialectName): string {
  const builder = new DdlBuilder(dialect);
  return entities.map((entity) => `${builder.createTable(entity)};`).join('\n\n');
}

/**
 * @returns process exit code
 */
export async function ddlCommand(options: DdlCommandOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();

  try {
    if (!options.input) {
      error('Schema file is required: tabula ddl --input <file>');
      return 1;
    }

    const config = await loadConfig({ cwd, path: options.config });
    const dialect = options.dialect ? parseDialect(options.dialect) : config.dialect;
    const file = resolve(cwd, options.input);

    const source = await readFile(file, 'utf8');
    const { entities, diagnostics } = new SchemaExtractor({ modules: config.modules }).extract(
      source,
      file,
    );
    for (const diagnostic of diagnostics) {
      warn(`${diagnostic.line}:${diagnostic.column} ${diagnostic.message}`);
    }

    if (entities.length > 0) {
      console.log(renderDdl(entities, dialect));
    }
    return 0;
  } catch (error_) {
    error(errorMessage(error_));
    return 1;
  }
}
