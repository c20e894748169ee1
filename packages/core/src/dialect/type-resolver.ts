/**
 * Type Resolver
 *
 * Turns a column declaration into the concrete SQL type for one dialect.
 * Pure: the only failures are an unmapped type and a multi-bit field on a
 * single-bit dialect.
 */

import { DECIMAL_DEFAULTS, LENGTH_DEFAULTS, MONEY_TYPE_MARKER } from '../constants';
import { UnsupportedCombinationError, UnsupportedMultiBitFieldError } from '../errors';
import { typeKey, type SharedColumnKind } from '../registry/column-types';
import { nameOf } from '../registry/type-names';
import { defaultTypeMappingTable, type DialectTypeMappingTable } from './type-mapping-table';

import type { ColumnDeclaration } from '../schema/types';
import type { DialectName } from './dialects';

const DEFAULT_LENGTHS: Partial<Record<SharedColumnKind, number>> = {
  varchar: LENGTH_DEFAULTS.VARIABLE,
  varbinary: LENGTH_DEFAULTS.VARIABLE,
  char: LENGTH_DEFAULTS.FIXED,
  binary: LENGTH_DEFAULTS.FIXED,
  bit: LENGTH_DEFAULTS.FIXED,
};

/**
 * Declared length, or the kind's default when absent or zero
 */
function effectiveLength(column: ColumnDeclaration, fallback: number): number {
  return column.length === undefined || column.length === 0 ? fallback : column.length;
}

export class TypeResolver {
  constructor(private readonly table: DialectTypeMappingTable = defaultTypeMappingTable()) {}

  get mappingTable(): DialectTypeMappingTable {
    return this.table;
  }

  /**
   * Resolve the SQL type of a column for a dialect.
   *
   * @throws UnsupportedCombinationError when the dialect has no mapping
   * @throws UnsupportedMultiBitFieldError for a bit field longer than one bit
   * on a single-bit dialect
   *
   * @example
   * ```typescript
   * resolver.resolve('mysql', column);      // 'VARCHAR(255)'
   * resolver.resolve('postgresql', money);  // 'MONEY'
   * ```
   */
  resolve(dialect: DialectName, column: ColumnDeclaration): string {
    if (column.explicitType !== undefined && column.explicitType !== '') {
      return column.explicitType;
    }

    const type = column.abstractType;
    const base = this.table.baseType(dialect, type);
    if (base === undefined) {
      throw new UnsupportedCombinationError(dialect, typeKey(type), nameOf(type));
    }

    if (type.scope === 'dialect') {
      return base;
    }

    switch (type.kind) {
      case 'varchar':
      case 'varbinary':
      case 'char':
      case 'binary': {
        return this.resolveLength(dialect, type.kind, base, column);
      }
      case 'bit': {
        return this.resolveBitField(dialect, base, column);
      }
      case 'decimal': {
        return this.resolveDecimal(base, column, DECIMAL_DEFAULTS.DECIMAL);
      }
      case 'money': {
        return this.resolveDecimal(base, column, DECIMAL_DEFAULTS.MONEY);
      }
      default: {
        return base;
      }
    }
  }

  private resolveLength(
    dialect: DialectName,
    kind: SharedColumnKind,
    base: string,
    column: ColumnDeclaration,
  ): string {
    if (!this.table.takesLength(dialect, kind)) {
      return base;
    }
    const length = effectiveLength(column, DEFAULT_LENGTHS[kind] ?? LENGTH_DEFAULTS.FIXED);
    return length > 0 ? `${base}(${length})` : base;
  }

  private resolveBitField(dialect: DialectName, base: string, column: ColumnDeclaration): string {
    const length = effectiveLength(column, LENGTH_DEFAULTS.FIXED);
    if (length <= 0) {
      return base;
    }
    const rule = this.table.bitFieldRule(dialect);

    switch (rule.mode) {
      case 'parameterized': {
        return `${base}(${length})`;
      }
      case 'remap': {
        return `${rule.baseType}(${length})`;
      }
      case 'single': {
        if (length > 1) {
          throw new UnsupportedMultiBitFieldError(dialect, length);
        }
        return base;
      }
    }
  }

  private resolveDecimal(
    base: string,
    column: ColumnDeclaration,
    defaults: { precision: number; scale: number },
  ): string {
    if (base.toUpperCase().includes(MONEY_TYPE_MARKER)) {
      return base;
    }
    const precision = column.precision ?? defaults.precision;
    const scale = column.scale ?? defaults.scale;
    return `${base}(${precision},${scale})`;
  }
}

let defaultResolver: TypeResolver | undefined;

/**
 * Resolve a column type with the built-in mapping table
 */
export function resolveColumnType(dialect: DialectName, column: ColumnDeclaration): string {
  defaultResolver ??= new TypeResolver();
  return defaultResolver.resolve(dialect, column);
}
