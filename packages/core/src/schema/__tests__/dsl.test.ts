import { describe, it, expect } from 'vitest';

import { ValidationError } from '../../errors';
import { ColumnType, dialectType } from '../../registry/column-types';
import {
  bigInt,
  boolean,
  decimal,
  double,
  entityFromTable,
  int,
  json,
  table,
  varchar,
  withAutoIncrement,
  withDefault,
  withLength,
  withPrecision,
  withType,
} from '../dsl';
import { createColumnDeclaration, deriveEntityName } from '../entity';

describe('Schema DSL', () => {
  describe('column factories', () => {
    it('should build a bare column', () => {
      expect(varchar('email')).toEqual({
        name: 'email',
        abstractType: ColumnType.Varchar,
        explicitType: undefined,
        hasDefault: false,
        defaultValue: undefined,
        autoIncrement: false,
        length: undefined,
        precision: undefined,
        scale: undefined,
      });
    });

    it('should apply options in order', () => {
      const column = decimal('price', withPrecision(12, 4), withDefault(0));
      expect(column.precision).toBe(12);
      expect(column.scale).toBe(4);
      expect(column.hasDefault).toBe(true);
      expect(column.defaultValue).toEqual({ kind: 'integer', value: 0 });
    });

    it('should set auto-increment on numeric columns', () => {
      expect(int('id', withAutoIncrement(true)).autoIncrement).toBe(true);
      expect(bigInt('id', withAutoIncrement(false)).autoIncrement).toBe(false);
    });

    it('should set length', () => {
      expect(varchar('code', withLength(3)).length).toBe(3);
    });

    it('should freeze columns', () => {
      expect(Object.isFrozen(varchar('email'))).toBe(true);
    });
  });

  describe('withDefault', () => {
    it('should keep zero, empty and false as real defaults', () => {
      expect(int('count', withDefault(0)).defaultValue).toEqual({ kind: 'integer', value: 0 });
      expect(varchar('note', withDefault('')).defaultValue).toEqual({ kind: 'string', value: '' });
      expect(boolean('active', withDefault(false)).defaultValue).toEqual({
        kind: 'boolean',
        value: false,
      });
    });

    it('should separate integers from floats', () => {
      expect(double('ratio', withDefault(0.5)).defaultValue).toEqual({ kind: 'float', value: 0.5 });
    });

    it('should reject non-finite numbers', () => {
      expect(() => withDefault(Number.NaN)).toThrow(ValidationError);
    });

    it('should keep the literal it was built from', () => {
      expect(withDefault('none').literal).toBe('none');
    });

    it('should accept numbers and strings on exact numeric columns', () => {
      expect(decimal('price', withDefault('9.99')).defaultValue).toEqual({
        kind: 'string',
        value: '9.99',
      });
      expect(decimal('price', withDefault(1.5)).defaultValue).toEqual({ kind: 'float', value: 1.5 });
    });

    it('should reject a float default on an integer column', () => {
      expect(() => int('count', withDefault(1.5))).toThrow(
        'Default of kind float does not fit INT column count',
      );
    });

    it('should check the default against the overriding type', () => {
      expect(() => varchar('count', withDefault('abc'), withType(ColumnType.Int))).toThrow(
        ValidationError,
      );
    });

    it('should accept any default on dialect-specific types', () => {
      const column = createColumnDeclaration({
        name: 'flags',
        abstractType: dialectType('postgresql', 'varbit'),
        defaultValue: { kind: 'boolean', value: true },
      });
      expect(column.defaultValue).toEqual({ kind: 'boolean', value: true });
    });

    it('should reject a mismatched default on declarations built directly', () => {
      expect(() =>
        createColumnDeclaration({
          name: 'n',
          abstractType: ColumnType.Int,
          defaultValue: { kind: 'string', value: 'abc' },
        }),
      ).toThrow('Default of kind string does not fit INT column n');
    });
  });

  describe('withType', () => {
    it('should keep raw SQL verbatim', () => {
      const column = varchar('tags', withType('TEXT[]'));
      expect(column.explicitType).toBe('TEXT[]');
      expect(column.abstractType).toEqual(ColumnType.Varchar);
    });

    it('should switch the abstract type and record its name', () => {
      const column = json('payload', withType(dialectType('postgresql', 'jsonb')));
      expect(column.explicitType).toBe('JSONB');
      expect(column.abstractType).toEqual({ scope: 'dialect', dialect: 'postgresql', kind: 'jsonb' });
    });
  });

  describe('table', () => {
    it('should reject an empty name', () => {
      expect(() => table({ name: ' ', columns: [] })).toThrow('Table name must be a non-empty string');
    });

    it('should reject duplicate columns', () => {
      expect(() => table({ name: 'users', columns: [int('id'), varchar('id')] })).toThrow(
        'Duplicate column id in table users',
      );
    });

    it('should reject empty column names', () => {
      expect(() => table({ name: 'users', columns: [int('')] })).toThrow(ValidationError);
    });
  });

  describe('entityFromTable', () => {
    it('should derive the entity name and keep column order', () => {
      const OrderSchema = table({
        name: 'orders',
        columns: [int('id'), varchar('reference'), decimal('total'), boolean('paid')],
      });
      const entity = entityFromTable('OrderSchema', OrderSchema);

      expect(entity.name).toBe('Order');
      expect(entity.tableName).toBe('orders');
      expect(entity.columns.map((column) => column.name)).toEqual(['id', 'reference', 'total', 'paid']);
      expect(Object.isFrozen(entity)).toBe(true);
      expect(Object.isFrozen(entity.columns)).toBe(true);
    });
  });

  describe('deriveEntityName', () => {
    it('should strip exactly one known suffix', () => {
      expect(deriveEntityName('UserSchema')).toBe('User');
      expect(deriveEntityName('ProductDefinition')).toBe('Product');
      expect(deriveEntityName('AuditTable')).toBe('Audit');
      expect(deriveEntityName('UserTableSchema')).toBe('UserTable');
      expect(deriveEntityName('OrderTableTable')).toBe('OrderTable');
    });

    it('should try suffixes in order', () => {
      expect(deriveEntityName('TableSchema')).toBe('Table');
      expect(deriveEntityName('SchemaTable')).toBe('Schema');
    });

    it('should leave other names unchanged', () => {
      expect(deriveEntityName('Customer')).toBe('Customer');
      expect(deriveEntityName('Schemas')).toBe('Schemas');
    });

    it('should keep a name that is only a suffix', () => {
      expect(deriveEntityName('Schema')).toBe('Schema');
      expect(deriveEntityName('Definition')).toBe('Definition');
      expect(deriveEntityName('Table')).toBe('Table');
    });

    it('should keep a bare suffix as the entity name', () => {
      const entity = entityFromTable('Schema', table({ name: 'schemas', columns: [int('id')] }));
      expect(entity.name).toBe('Schema');
    });
  });
});
