/**
 * Code Synthesizer
 *
 * Renders typed accessor modules from extracted entities. Output is a pure
 * function of the entities and options: no timestamps, no I/O.
 */

import { posix } from 'node:path';

import {
  GENERATED_HEADER,
  GENERATE_DEFAULTS,
  GenerationError,
  typeKey,
  type ColumnDeclaration,
  type ColumnDefault,
  type EntityDescriptor,
} from '@tabula/core';

import { isIdentifier, propertyAccess, propertyKey, quote } from './source-text';
import { tsTypeOf } from './type-map';

import type { GeneratedFile, SynthesizeOptions } from './types';

const RUNTIME_MODULE = '@tabula/core';

interface RenderedColumn {
  column: ColumnDeclaration;
  key: string;
  tsType: string;
}

function defaultLiteral(value: ColumnDefault): string {
  return value.kind === 'string' ? quote(value.value) : String(value.value);
}

function metaLines(column: ColumnDeclaration): string[] {
  const lines = [`name: ${quote(column.name)},`, `typeKey: ${quote(typeKey(column.abstractType))},`];
  if (column.explicitType !== undefined && column.explicitType !== '') {
    lines.push(`explicitType: ${quote(column.explicitType)},`);
  }
  lines.push(`autoIncrement: ${column.autoIncrement},`, `hasDefault: ${column.hasDefault},`);
  if (column.defaultValue) {
    lines.push(`defaultValue: ${defaultLiteral(column.defaultValue)},`);
  }
  if (column.length !== undefined) {
    lines.push(`length: ${column.length},`);
  }
  if (column.precision !== undefined) {
    lines.push(`precision: ${column.precision},`);
  }
  if (column.scale !== undefined) {
    lines.push(`scale: ${column.scale},`);
  }
  return lines;
}

export class CodeSynthesizer {
  private readonly modelDir: string;
  private readonly runtimeModule: string;

  constructor(options: SynthesizeOptions = {}) {
    const modelDir = posix.normalize(options.modelDir ?? GENERATE_DEFAULTS.MODEL_DIR).replace(/\/+$/, '');
    if (modelDir === '.' || modelDir.startsWith('..') || posix.isAbsolute(modelDir)) {
      throw new GenerationError(`Model directory must be inside the output directory: ${modelDir}`);
    }
    this.modelDir = modelDir;
    this.runtimeModule = options.runtimeModule ?? RUNTIME_MODULE;
  }

  /**
   * Render the accessor module and row interface of every entity.
   *
   * @throws GenerationError when an entity name is not an identifier, two
   * columns map to the same property, or two entities share an output path
   */
  synthesize(entities: readonly EntityDescriptor[]): GeneratedFile[] {
    const files: GeneratedFile[] = [];
    const owners = new Map<string, string>();

    for (const entity of entities) {
      for (const file of this.synthesizeEntity(entity)) {
        const owner = owners.get(file.path);
        if (owner !== undefined) {
          throw new GenerationError(
            `Entities ${owner} and ${entity.name} would both be written to ${file.path}`,
            file.path,
          );
        }
        owners.set(file.path, entity.name);
        files.push(file);
      }
    }

    return files;
  }

  private synthesizeEntity(entity: EntityDescriptor): GeneratedFile[] {
    if (!isIdentifier(entity.name)) {
      throw new GenerationError(`Entity name ${entity.name} is not a valid identifier`);
    }

    const columns = this.renderColumns(entity);
    const fileName = entity.name.toLowerCase();
    const entityPath = `${fileName}.ts`;
    const modelPath = posix.join(this.modelDir, `${fileName}.ts`);

    let modelImport = posix.relative(posix.dirname(entityPath), modelPath.replace(/\.ts$/, ''));
    if (!modelImport.startsWith('.')) {
      modelImport = `./${modelImport}`;
    }

    return [
      {
        path: entityPath,
        contents: this.entityModule(entity, columns, modelImport),
        entity: entity.name,
      },
      {
        path: modelPath,
        contents: this.modelModule(entity, columns),
        entity: entity.name,
      },
    ];
  }

  private renderColumns(entity: EntityDescriptor): RenderedColumn[] {
    const byKey = new Map<string, string>();
    return entity.columns.map((column) => {
      const key = propertyKey(column.name);
      const previous = byKey.get(key);
      if (previous !== undefined) {
        throw new GenerationError(
          `Columns ${previous} and ${column.name} of entity ${entity.name} map to the same property ${key}`,
        );
      }
      byKey.set(key, column.name);
      return { column, key, tsType: tsTypeOf(column.abstractType) };
    });
  }

  private entityModule(
    entity: EntityDescriptor,
    columns: readonly RenderedColumn[],
    modelImport: string,
  ): string {
    const aliased = `${entity.name}Aliased`;
    const lines: string[] = [
      GENERATED_HEADER,
      '',
      `import { defineColumn } from ${quote(this.runtimeModule)};`,
      '',
      `export type { ${entity.name} } from ${quote(modelImport)};`,
      '',
      `export const TABLE_NAME = ${quote(entity.tableName)};`,
      '',
      'export const Schema = Object.freeze({',
    ];

    for (const { column, key, tsType } of columns) {
      lines.push(`  ${key}: defineColumn<${tsType}>(TABLE_NAME, {`);
      for (const line of metaLines(column)) {
        lines.push(`    ${line}`);
      }
      lines.push('  }),');
    }
    lines.push('});', '');

    // Table-qualified names
    lines.push('export const Columns = Object.freeze({');
    for (const { key } of columns) {
      lines.push(`  ${key}: String(Schema${propertyAccess(key)}),`);
    }
    lines.push('});', '');

    lines.push(`export interface ${aliased} {`);
    for (const { key } of columns) {
      lines.push(`  readonly ${key}: string;`);
    }
    lines.push('  toString(): string;', '}', '');

    lines.push(`export function as(alias: string): ${aliased} {`, '  return {');
    for (const { key } of columns) {
      lines.push(`    ${key}: String(Schema${propertyAccess(key)}.withAlias(alias)),`);
    }
    lines.push('    toString: () => `${TABLE_NAME} AS ${alias}`,', '  };', '}', '');

    return lines.join('\n');
  }

  private modelModule(entity: EntityDescriptor, columns: readonly RenderedColumn[]): string {
    const lines: string[] = [GENERATED_HEADER, '', `export interface ${entity.name} {`];

    for (const { column, key, tsType } of columns) {
      if (key !== column.name) {
        lines.push(`  /** Column ${column.name} */`);
      }
      lines.push(`  ${key}: ${tsType};`);
    }
    lines.push('}', '');

    return lines.join('\n');
  }
}

/**
 * Render generated files for a set of entities
 *
 * @example
 * ```typescript
 * const files = synthesize(entities);
 * files.map((file) => file.path); // ['user.ts', 'model/user.ts']
 * ```
 */
export function synthesize(
  entities: readonly EntityDescriptor[],
  options: SynthesizeOptions = {},
): GeneratedFile[] {
  return new CodeSynthesizer(options).synthesize(entities);
}
