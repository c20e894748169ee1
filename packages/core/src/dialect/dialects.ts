/**
 * Supported Dialects
 *
 * The closed set of database backends Tabula renders types for, together with
 * the per-dialect syntax rules the DDL layer needs: identifier quoting,
 * boolean literals and the auto-increment clause.
 */

import { ConfigError } from '../errors';

export const DIALECT_NAMES = [
  'mysql',
  'postgresql',
  'sqlite',
  'sqlserver',
  'cql',
  'clickhouse',
  'presto',
  'oracle',
  'informix',
] as const;

export type DialectName = (typeof DIALECT_NAMES)[number];

export type IdentifierQuoting = 'backtick' | 'double-quote' | 'bracket' | 'none';

export interface DialectConfig {
  /** Human readable name used in messages */
  displayName: string;
  /** How identifiers (table/column names) are quoted */
  identifierQuoting: IdentifierQuoting;
  /** Boolean literal values used for defaults */
  booleanLiterals: { true: string; false: string };
  /** Column clause appended for auto-increment columns, if the dialect has one */
  autoIncrementClause?: string;
}

export const DIALECT_CONFIGS: Readonly<Record<DialectName, DialectConfig>> = {
  mysql: {
    displayName: 'MySQL',
    identifierQuoting: 'backtick',
    booleanLiterals: { true: '1', false: '0' },
    autoIncrementClause: 'AUTO_INCREMENT',
  },
  postgresql: {
    displayName: 'PostgreSQL',
    identifierQuoting: 'double-quote',
    booleanLiterals: { true: 'TRUE', false: 'FALSE' },
    autoIncrementClause: 'GENERATED BY DEFAULT AS IDENTITY',
  },
  sqlite: {
    displayName: 'SQLite',
    identifierQuoting: 'double-quote',
    booleanLiterals: { true: '1', false: '0' },
    autoIncrementClause: 'PRIMARY KEY AUTOINCREMENT',
  },
  sqlserver: {
    displayName: 'SQLServer',
    identifierQuoting: 'bracket',
    booleanLiterals: { true: '1', false: '0' },
    autoIncrementClause: 'IDENTITY(1,1)',
  },
  cql: {
    displayName: 'CQL',
    identifierQuoting: 'none',
    booleanLiterals: { true: 'true', false: 'false' },
  },
  clickhouse: {
    displayName: 'ClickHouse',
    identifierQuoting: 'double-quote',
    booleanLiterals: { true: 'true', false: 'false' },
  },
  presto: {
    displayName: 'Presto',
    identifierQuoting: 'double-quote',
    booleanLiterals: { true: 'TRUE', false: 'FALSE' },
  },
  oracle: {
    displayName: 'Oracle',
    identifierQuoting: 'double-quote',
    booleanLiterals: { true: '1', false: '0' },
    autoIncrementClause: 'GENERATED BY DEFAULT AS IDENTITY',
  },
  informix: {
    displayName: 'Informix',
    identifierQuoting: 'double-quote',
    booleanLiterals: { true: "'t'", false: "'f'" },
  },
};

const DIALECT_ALIASES: ReadonlyMap<string, DialectName> = new Map<string, DialectName>([
  ['postgres', 'postgresql'],
  ['mssql', 'sqlserver'],
  ['cassandra', 'cql'],
  ['mariadb', 'mysql'],
]);

/**
 * Check if a string names a supported dialect (aliases excluded)
 */
export function isDialectName(value: string): value is DialectName {
  const names: readonly string[] = DIALECT_NAMES;
  return names.includes(value);
}

/**
 * Parse a dialect name, accepting aliases in any letter case
 */
export function parseDialect(value: string): DialectName {
  const normalized = value.trim().toLowerCase();
  if (isDialectName(normalized)) {
    return normalized;
  }
  const alias = DIALECT_ALIASES.get(normalized);
  if (alias) {
    return alias;
  }
  throw new ConfigError(
    `Unsupported database dialect: ${value}. Expected one of: ${DIALECT_NAMES.join(', ')}`,
    'dialect',
  );
}

/**
 * Quote an identifier (table/column name) for a dialect
 */
export function quoteIdentifier(dialect: DialectName, identifier: string): string {
  switch (DIALECT_CONFIGS[dialect].identifierQuoting) {
    case 'backtick': {
      return `\`${identifier.replaceAll('`', '``')}\``;
    }
    case 'double-quote': {
      return `"${identifier.replaceAll('"', '""')}"`;
    }
    case 'bracket': {
      return `[${identifier.replaceAll(']', ']]')}]`;
    }
    case 'none': {
      return identifier;
    }
  }
}
