/**
 * Type Name Registry
 *
 * Display names of every abstract column type. Generated code embeds these
 * names as literals, so an entry must never change once published.
 */

import typeNamesData from '../data/type-names.json';
import { UNKNOWN_TYPE_NAME } from '../constants';
import { DIALECT_NAMES, type DialectName } from '../dialect/dialects';
import { TypeMappingError } from '../errors';
import {
  DIALECT_COLUMN_KINDS,
  SHARED_COLUMN_KINDS,
  typeKey,
  type AbstractColumnType,
} from './column-types';

export interface TypeNameDefinition {
  shared: Record<string, string>;
  dialects: Partial<Record<DialectName, Record<string, string>>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertNameRow(
  row: unknown,
  expected: readonly string[],
  owner: string,
): asserts row is Record<string, string> {
  if (!isRecord(row)) {
    throw new TypeMappingError(`Type names for ${owner} must be an object`);
  }
  for (const kind of expected) {
    const name = row[kind];
    if (typeof name !== 'string' || name.trim() === '') {
      throw new TypeMappingError(`Missing display name for ${owner} type ${kind}`);
    }
  }
  for (const kind of Object.keys(row)) {
    if (!expected.includes(kind)) {
      throw new TypeMappingError(`Unknown ${owner} type ${kind} in type names`);
    }
  }
}

/**
 * Validate raw type-name data. Every shared and dialect kind needs exactly one
 * non-empty display name.
 */
export function assertTypeNameDefinition(data: unknown): asserts data is TypeNameDefinition {
  if (!isRecord(data)) {
    throw new TypeMappingError('Type names must be an object');
  }
  assertNameRow(data['shared'], SHARED_COLUMN_KINDS, 'shared');

  const dialects = data['dialects'];
  if (!isRecord(dialects)) {
    throw new TypeMappingError('Type names must contain a dialects object');
  }
  for (const dialect of DIALECT_NAMES) {
    assertNameRow(dialects[dialect] ?? {}, DIALECT_COLUMN_KINDS[dialect], dialect);
  }
  for (const key of Object.keys(dialects)) {
    if (!DIALECT_NAMES.some((dialect) => dialect === key)) {
      throw new TypeMappingError(`Unknown dialect ${key} in type names`);
    }
  }
}

function buildNameIndex(data: unknown): ReadonlyMap<string, string> {
  assertTypeNameDefinition(data);
  const names = new Map<string, string>();
  for (const [kind, name] of Object.entries(data.shared)) {
    names.set(`shared:${kind}`, name);
  }
  for (const dialect of DIALECT_NAMES) {
    for (const [kind, name] of Object.entries(data.dialects[dialect] ?? {})) {
      names.set(`${dialect}:${kind}`, name);
    }
  }
  return names;
}

const NAMES_BY_KEY = buildNameIndex(typeNamesData);

/**
 * Display name of an abstract column type, or `UNKNOWN` for a value outside
 * the known shared kinds and dialect extensions.
 *
 * @example
 * ```typescript
 * nameOf(ColumnType.Varchar);                   // 'VARCHAR'
 * nameOf(dialectType('postgresql', 'pgLsn'));   // 'PG_LSN'
 * ```
 */
export function nameOf(type: AbstractColumnType): string {
  return NAMES_BY_KEY.get(typeKey(type)) ?? UNKNOWN_TYPE_NAME;
}
