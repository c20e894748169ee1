/**
 * DDL Builder
 * CREATE TABLE statements from entities and resolved column types
 */

import { DIALECT_CONFIGS, quoteIdentifier, type DialectName } from '../dialect/dialects';
import { TypeResolver } from '../dialect/type-resolver';
import { isNumericType } from '../registry/column-types';

import type { ColumnDeclaration, ColumnDefault, EntityDescriptor } from './types';

export class DdlBuilder {
  constructor(
    readonly dialect: DialectName,
    private readonly resolver: TypeResolver = new TypeResolver(),
  ) {}

  quoteIdentifier(name: string): string {
    return quoteIdentifier(this.dialect, name);
  }

  /**
   * Render a default value as a SQL literal
   */
  quoteValue(value: ColumnDefault): string {
    switch (value.kind) {
      case 'boolean': {
        const literals = DIALECT_CONFIGS[this.dialect].booleanLiterals;
        return value.value ? literals.true : literals.false;
      }
      case 'integer':
      case 'float': {
        return String(value.value);
      }
      case 'string': {
        return `'${value.value.replaceAll("'", "''")}'`;
      }
    }
  }

  /**
   * Column clause: name, resolved type, auto-increment and default
   */
  columnToSQL(column: ColumnDeclaration): string {
    let sql = `${this.quoteIdentifier(column.name)} ${this.resolver.resolve(this.dialect, column)}`;

    const autoIncrement = DIALECT_CONFIGS[this.dialect].autoIncrementClause;
    if (column.autoIncrement && autoIncrement && isNumericType(column.abstractType)) {
      sql += ` ${autoIncrement}`;
    }

    if (column.hasDefault && column.defaultValue) {
      sql += ` DEFAULT ${this.quoteValue(column.defaultValue)}`;
    }

    return sql;
  }

  /**
   * Generate CREATE TABLE statement
   *
   * @throws UnsupportedCombinationError or UnsupportedMultiBitFieldError from
   * type resolution
   */
  createTable(entity: EntityDescriptor): string {
    const parts = entity.columns.map((column) => this.columnToSQL(column));
    return `CREATE TABLE ${this.quoteIdentifier(entity.tableName)} (\n  ${parts.join(',\n  ')}\n)`;
  }
}

export function createTable(
  entity: EntityDescriptor,
  dialect: DialectName,
  resolver?: TypeResolver,
): string {
  return new DdlBuilder(dialect, resolver).createTable(entity);
}
