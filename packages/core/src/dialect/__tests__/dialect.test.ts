import { describe, it, expect } from 'vitest';

import { ConfigError } from '../../errors';
import { DIALECT_CONFIGS, DIALECT_NAMES, isDialectName, parseDialect, quoteIdentifier } from '../dialects';

describe('dialects', () => {
  describe('parseDialect', () => {
    it('should accept canonical names', () => {
      for (const dialect of DIALECT_NAMES) {
        expect(parseDialect(dialect)).toBe(dialect);
      }
    });

    it('should ignore case and surrounding whitespace', () => {
      expect(parseDialect('  PostgreSQL ')).toBe('postgresql');
      expect(parseDialect('MySQL')).toBe('mysql');
    });

    it('should resolve aliases', () => {
      expect(parseDialect('postgres')).toBe('postgresql');
      expect(parseDialect('MSSQL')).toBe('sqlserver');
      expect(parseDialect('cassandra')).toBe('cql');
      expect(parseDialect('mariadb')).toBe('mysql');
    });

    it('should throw ConfigError for unknown dialects', () => {
      expect(() => parseDialect('db2')).toThrow(ConfigError);
      expect(() => parseDialect('db2')).toThrow('Unsupported database dialect: db2');
    });
  });

  describe('isDialectName', () => {
    it('should not treat aliases as dialect names', () => {
      expect(isDialectName('sqlite')).toBe(true);
      expect(isDialectName('postgres')).toBe(false);
    });
  });

  describe('quoteIdentifier', () => {
    it('should use backticks for MySQL', () => {
      expect(quoteIdentifier('mysql', 'users')).toBe('`users`');
      expect(quoteIdentifier('mysql', 'we`ird')).toBe('`we``ird`');
    });

    it('should use double quotes for PostgreSQL', () => {
      expect(quoteIdentifier('postgresql', 'users')).toBe('"users"');
      expect(quoteIdentifier('postgresql', 'a"b')).toBe('"a""b"');
    });

    it('should use brackets for SQL Server', () => {
      expect(quoteIdentifier('sqlserver', 'users')).toBe('[users]');
      expect(quoteIdentifier('sqlserver', 'a]b')).toBe('[a]]b]');
    });

    it('should leave CQL identifiers bare', () => {
      expect(quoteIdentifier('cql', 'users')).toBe('users');
    });
  });

  it('should have a config for every dialect', () => {
    for (const dialect of DIALECT_NAMES) {
      expect(DIALECT_CONFIGS[dialect].displayName).not.toBe('');
    }
  });
});
