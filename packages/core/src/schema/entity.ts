/**
 * Entity construction helpers shared by the runtime DSL and the extractor
 */

import { ENTITY_NAME_SUFFIXES } from '../constants';
import { ValidationError } from '../errors';
import { nameOf } from '../registry/type-names';

import type { AbstractColumnType, SharedColumnKind } from '../registry/column-types';
import type {
  ColumnDeclaration,
  ColumnDeclarationInput,
  ColumnDefaultKind,
  EntityDescriptor,
} from './types';

const INTEGER: readonly ColumnDefaultKind[] = ['integer'];
const NUMBER: readonly ColumnDefaultKind[] = ['integer', 'float'];
const EXACT_NUMBER: readonly ColumnDefaultKind[] = ['integer', 'float', 'string'];
const STRING: readonly ColumnDefaultKind[] = ['string'];
const BOOLEAN: readonly ColumnDefaultKind[] = ['boolean'];

/** Default literal kinds each shared column kind accepts */
const DEFAULT_KINDS: Record<SharedColumnKind, readonly ColumnDefaultKind[]> = {
  varchar: STRING,
  char: STRING,
  text: STRING,
  xml: STRING,
  uuid: STRING,
  json: STRING,
  tinyInt: INTEGER,
  smallInt: INTEGER,
  int: INTEGER,
  bigInt: INTEGER,
  bit: INTEGER,
  real: NUMBER,
  double: NUMBER,
  decimal: EXACT_NUMBER,
  money: EXACT_NUMBER,
  boolean: BOOLEAN,
  date: STRING,
  time: STRING,
  dateTime: STRING,
  timestamp: STRING,
  blob: STRING,
  binary: STRING,
  varbinary: STRING,
};

/**
 * Whether a default literal of the given kind fits the column type.
 * Dialect-specific types accept any literal.
 */
export function acceptsDefault(type: AbstractColumnType, kind: ColumnDefaultKind): boolean {
  return type.scope === 'dialect' || DEFAULT_KINDS[type.kind].includes(kind);
}

/**
 * Derive an entity name from a schema variable name by removing the first
 * matching suffix of `Schema`, `Definition`, `Table`.
 *
 * @example
 * ```typescript
 * deriveEntityName('UserSchema');      // 'User'
 * deriveEntityName('OrderTableTable'); // 'OrderTable'
 * deriveEntityName('Audit');           // 'Audit'
 * ```
 */
export function deriveEntityName(variableName: string): string {
  for (const suffix of ENTITY_NAME_SUFFIXES) {
    if (variableName.endsWith(suffix) && variableName.length > suffix.length) {
      return variableName.slice(0, -suffix.length);
    }
  }
  return variableName;
}

/**
 * @throws ValidationError when the default does not fit the column type
 */
export function createColumnDeclaration(input: ColumnDeclarationInput): ColumnDeclaration {
  if (input.defaultValue && !acceptsDefault(input.abstractType, input.defaultValue.kind)) {
    throw new ValidationError(
      `Default of kind ${input.defaultValue.kind} does not fit ${nameOf(input.abstractType)} column ${input.name}`,
      'default',
    );
  }
  const column: ColumnDeclaration = {
    name: input.name,
    abstractType: input.abstractType,
    explicitType: input.explicitType,
    hasDefault: input.defaultValue !== undefined,
    defaultValue: input.defaultValue && Object.freeze({ ...input.defaultValue }),
    autoIncrement: input.autoIncrement ?? false,
    length: input.length,
    precision: input.precision,
    scale: input.scale,
  };
  return Object.freeze(column);
}

/**
 * Build a frozen entity.
 *
 * @throws ValidationError on an empty or duplicated column name
 */
export function createEntity(
  name: string,
  tableName: string,
  columns: readonly ColumnDeclaration[],
): EntityDescriptor {
  const seen = new Set<string>();
  for (const column of columns) {
    if (column.name === '') {
      throw new ValidationError(`Table ${tableName} has a column with an empty name`, 'name');
    }
    if (seen.has(column.name)) {
      throw new ValidationError(`Duplicate column ${column.name} in table ${tableName}`, 'name');
    }
    seen.add(column.name);
  }

  return Object.freeze({
    name,
    tableName,
    columns: Object.freeze([...columns]),
  });
}
