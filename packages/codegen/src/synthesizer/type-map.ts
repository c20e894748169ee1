/**
 * Abstract column type to TypeScript row type
 */

import { isSharedType, type AbstractColumnType, type SharedColumnKind } from '@tabula/core';

const TS_TYPE_MAP: Record<SharedColumnKind, string> = {
  // Strings
  varchar: 'string',
  char: 'string',
  text: 'string',
  xml: 'string',
  uuid: 'string',

  // Integers
  tinyInt: 'number',
  smallInt: 'number',
  int: 'number',
  bigInt: 'number',
  bit: 'number',

  // Floats
  real: 'number',
  double: 'number',

  // Exact numerics keep their digits
  decimal: 'string',
  money: 'string',

  boolean: 'boolean',

  // Date/Time
  date: 'Date',
  dateTime: 'Date',
  timestamp: 'Date',
  time: 'string',

  // Binary
  blob: 'Buffer',
  binary: 'Buffer',
  varbinary: 'Buffer',

  json: 'Record<string, unknown>',
};

/**
 * Row type of a column. Dialect-specific types have no portable
 * representation and map to `unknown`.
 */
export function tsTypeOf(type: AbstractColumnType): string {
  return isSharedType(type) ? TS_TYPE_MAP[type.kind] : 'unknown';
}
