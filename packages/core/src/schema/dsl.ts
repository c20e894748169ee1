/**
 * Schema DSL
 *
 * Functions schema files are written with. The same calls are read
 * statically by the extractor, so every option is a plain call with literal
 * arguments.
 *
 * @example
 * ```typescript
 * import { table, int, varchar, withAutoIncrement, withLength } from '@tabula/core';
 *
 * export const UserSchema = table({
 *   name: 'users',
 *   columns: [int('id', withAutoIncrement(true)), varchar('email', withLength(120))],
 * });
 * ```
 */

import { ValidationError } from '../errors';
import { nameOf } from '../registry/type-names';
import { sharedType, type AbstractColumnType, type SharedColumnKind } from '../registry/column-types';
import { createColumnDeclaration, createEntity, deriveEntityName } from './entity';

import type {
  ColumnDeclaration,
  ColumnDeclarationInput,
  ColumnDefault,
  EntityDescriptor,
} from './types';

export interface TypeOption {
  readonly option: 'type';
  readonly type: AbstractColumnType | string;
}

/** Literal a default can be written with */
export type DefaultLiteral = number | string | boolean;

/**
 * Default value option. `T` is the literal it was built from, so a column
 * factory only accepts defaults of its own value type.
 */
export interface DefaultOption<T extends DefaultLiteral = DefaultLiteral> {
  readonly option: 'default';
  readonly literal: T;
  readonly value: ColumnDefault;
}

export interface AutoIncrementOption {
  readonly option: 'autoIncrement';
  readonly enabled: boolean;
}

export interface LengthOption {
  readonly option: 'length';
  readonly length: number;
}

export interface PrecisionOption {
  readonly option: 'precision';
  readonly precision: number;
  readonly scale: number;
}

/** Options accepted by a column factory whose values are `T` */
export type ColumnOption<T extends DefaultLiteral = DefaultLiteral> =
  | TypeOption
  | DefaultOption<T>
  | LengthOption
  | PrecisionOption;

/** Options accepted by numeric column factories */
export type NumericColumnOption = ColumnOption<number> | AutoIncrementOption;

export interface Table {
  name: string;
  columns: readonly ColumnDeclaration[];
}

// ============================================
// Options
// ============================================

/**
 * Override the column type, either with a raw SQL string or another
 * abstract type
 */
export function withType(type: AbstractColumnType | string): TypeOption {
  return { option: 'type', type };
}

/**
 * Set the default value. Integral numbers become integer defaults.
 *
 * @example
 * ```typescript
 * int('count', withDefault(0));
 * int('count', withDefault('0')); // compile error
 * ```
 */
export function withDefault<T extends DefaultLiteral>(literal: T): DefaultOption<T> {
  return { option: 'default', literal, value: toColumnDefault(literal) };
}

function toColumnDefault(literal: DefaultLiteral): ColumnDefault {
  if (typeof literal === 'number') {
    if (!Number.isFinite(literal)) {
      throw new ValidationError(`Default value must be a finite number, got ${literal}`, 'default');
    }
    return Number.isInteger(literal)
      ? { kind: 'integer', value: literal }
      : { kind: 'float', value: literal };
  }
  if (typeof literal === 'string') {
    return { kind: 'string', value: literal };
  }
  return { kind: 'boolean', value: literal };
}

export function withAutoIncrement(enabled: boolean): AutoIncrementOption {
  return { option: 'autoIncrement', enabled };
}

export function withLength(length: number): LengthOption {
  return { option: 'length', length };
}

export function withPrecision(precision: number, scale: number): PrecisionOption {
  return { option: 'precision', precision, scale };
}

// ============================================
// Columns
// ============================================

function applyOptions(
  name: string,
  abstractType: AbstractColumnType,
  options: readonly (ColumnOption | AutoIncrementOption)[],
): ColumnDeclaration {
  const input: ColumnDeclarationInput = { name, abstractType };
  for (const entry of options) {
    switch (entry.option) {
      case 'type': {
        if (typeof entry.type === 'string') {
          input.explicitType = entry.type;
        } else {
          input.explicitType = nameOf(entry.type);
          input.abstractType = entry.type;
        }
        break;
      }
      case 'default': {
        input.defaultValue = entry.value;
        break;
      }
      case 'autoIncrement': {
        input.autoIncrement = entry.enabled;
        break;
      }
      case 'length': {
        input.length = entry.length;
        break;
      }
      case 'precision': {
        input.precision = entry.precision;
        input.scale = entry.scale;
        break;
      }
    }
  }
  return createColumnDeclaration(input);
}

type ColumnFactory<T extends DefaultLiteral> = (
  name: string,
  ...options: ColumnOption<T>[]
) => ColumnDeclaration;
type NumericColumnFactory = (name: string, ...options: NumericColumnOption[]) => ColumnDeclaration;

/**
 * @throws ValidationError from the built column, e.g. a float default on an
 * integer column
 */
function factory<T extends DefaultLiteral>(kind: SharedColumnKind): ColumnFactory<T> {
  const type = sharedType(kind);
  return (name, ...options) => applyOptions(name, type, options);
}

function numericFactory(kind: SharedColumnKind): NumericColumnFactory {
  const type = sharedType(kind);
  return (name, ...options) => applyOptions(name, type, options);
}

export const varchar = factory<string>('varchar');
export const char = factory<string>('char');
export const text = factory<string>('text');
export const tinyInt = numericFactory('tinyInt');
export const smallInt = numericFactory('smallInt');
export const int = numericFactory('int');
export const bigInt = numericFactory('bigInt');
export const boolean = factory<boolean>('boolean');
export const real = numericFactory('real');
export const double = numericFactory('double');
export const decimal = factory<number | string>('decimal');
export const date = factory<string>('date');
export const time = factory<string>('time');
export const dateTime = factory<string>('dateTime');
export const timestamp = factory<string>('timestamp');
export const blob = factory<string>('blob');
export const json = factory<string>('json');
export const uuid = factory<string>('uuid');
export const bit = numericFactory('bit');
export const binary = factory<string>('binary');
export const varbinary = factory<string>('varbinary');
export const money = factory<number | string>('money');
export const xml = factory<string>('xml');

// ============================================
// Tables
// ============================================

/**
 * Declare a table. Column names must be non-empty and unique.
 *
 * @throws ValidationError on an empty table name or a bad column name
 */
export function table(definition: Table): Table {
  if (definition.name.trim() === '') {
    throw new ValidationError('Table name must be a non-empty string', 'name');
  }
  createEntity(definition.name, definition.name, definition.columns);
  return Object.freeze({ name: definition.name, columns: Object.freeze([...definition.columns]) });
}

/**
 * Build the entity for a table declared at run time, named the way the
 * extractor names the declaring variable
 */
export function entityFromTable(variableName: string, definition: Table): EntityDescriptor {
  return createEntity(deriveEntityName(variableName), definition.name, definition.columns);
}
