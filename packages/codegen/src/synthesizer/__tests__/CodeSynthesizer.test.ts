import { describe, it, expect } from 'vitest';

import {
  GenerationError,
  boolean,
  dateTime,
  decimal,
  dialectType,
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
} from '@tabula/core';

import { CodeSynthesizer, synthesize } from '../CodeSynthesizer';
import { propertyKey, quote, toCamelCase } from '../source-text';
import { tsTypeOf } from '../type-map';

const user = entityFromTable(
  'UserSchema',
  table({
    name: 'users',
    columns: [
      int('id', withAutoIncrement(true)),
      varchar('email', withLength(120)),
      boolean('is_active', withDefault(true)),
    ],
  }),
);

describe('CodeSynthesizer', () => {
  describe('accessor module', () => {
    it('should render the schema, columns and alias helper', () => {
      const [entityFile] = synthesize([user]);

      expect(entityFile?.path).toBe('user.ts');
      expect(entityFile?.entity).toBe('User');
      expect(entityFile?.contents).toBe(
        [
          '// Code generated by tabula. DO NOT EDIT.',
          '',
          "import { defineColumn } from '@tabula/core';",
          '',
          "export type { User } from './model/user';",
          '',
          "export const TABLE_NAME = 'users';",
          '',
          'export const Schema = Object.freeze({',
          '  id: defineColumn<number>(TABLE_NAME, {',
          "    name: 'id',",
          "    typeKey: 'shared:int',",
          '    autoIncrement: true,',
          '    hasDefault: false,',
          '  }),',
          '  email: defineColumn<string>(TABLE_NAME, {',
          "    name: 'email',",
          "    typeKey: 'shared:varchar',",
          '    autoIncrement: false,',
          '    hasDefault: false,',
          '    length: 120,',
          '  }),',
          '  isActive: defineColumn<boolean>(TABLE_NAME, {',
          "    name: 'is_active',",
          "    typeKey: 'shared:boolean',",
          '    autoIncrement: false,',
          '    hasDefault: true,',
          '    defaultValue: true,',
          '  }),',
          '});',
          '',
          'export const Columns = Object.freeze({',
          '  id: String(Schema.id),',
          '  email: String(Schema.email),',
          '  isActive: String(Schema.isActive),',
          '});',
          '',
          'export interface UserAliased {',
          '  readonly id: string;',
          '  readonly email: string;',
          '  readonly isActive: string;',
          '  toString(): string;',
          '}',
          '',
          'export function as(alias: string): UserAliased {',
          '  return {',
          '    id: String(Schema.id.withAlias(alias)),',
          '    email: String(Schema.email.withAlias(alias)),',
          '    isActive: String(Schema.isActive.withAlias(alias)),',
          '    toString: () => `${TABLE_NAME} AS ${alias}`,',
          '  };',
          '}',
          '',
        ].join('\n'),
      );
    });

    it('should render overrides, precision and escaped defaults', () => {
      const invoice = entityFromTable(
        'Invoice',
        table({
          name: 'invoices',
          columns: [
            decimal('total', withPrecision(12, 2), withDefault(0.5)),
            varchar('note', withType('CITEXT'), withDefault("it's")),
          ],
        }),
      );

      const [entityFile] = synthesize([invoice]);
      const contents = entityFile?.contents ?? '';

      expect(contents).toContain(
        [
          '  total: defineColumn<string>(TABLE_NAME, {',
          "    name: 'total',",
          "    typeKey: 'shared:decimal',",
          '    autoIncrement: false,',
          '    hasDefault: true,',
          '    defaultValue: 0.5,',
          '    precision: 12,',
          '    scale: 2,',
          '  }),',
        ].join('\n'),
      );
      expect(contents).toContain("    explicitType: 'CITEXT',\n");
      expect(contents).toContain("    defaultValue: 'it\\'s',\n");
    });

    it('should quote keys that are not identifiers', () => {
      const odd = entityFromTable(
        'OddTable',
        table({ name: 'odd', columns: [int('2fa'), varchar('first-name')] }),
      );

      const [entityFile, modelFile] = synthesize([odd]);

      expect(entityFile?.contents).toContain("  '2fa': String(Schema['2fa']),");
      expect(entityFile?.contents).toContain(
        "    'first-name': String(Schema['first-name'].withAlias(alias)),",
      );
      expect(modelFile?.contents).toContain("  /** Column first-name */\n  'first-name': string;");
    });

    it('should honour the runtime module option', () => {
      const [entityFile] = new CodeSynthesizer({ runtimeModule: 'tabula' }).synthesize([user]);
      expect(entityFile?.contents).toContain("import { defineColumn } from 'tabula';");
    });
  });

  describe('model module', () => {
    it('should render the row interface', () => {
      const [, modelFile] = synthesize([user]);

      expect(modelFile?.path).toBe('model/user.ts');
      expect(modelFile?.contents).toBe(
        [
          '// Code generated by tabula. DO NOT EDIT.',
          '',
          'export interface User {',
          '  id: number;',
          '  email: string;',
          '  /** Column is_active */',
          '  isActive: boolean;',
          '}',
          '',
        ].join('\n'),
      );
    });

    it('should place models in a custom directory', () => {
      const files = synthesize([user], { modelDir: 'types/rows/' });

      expect(files.map((file) => file.path)).toEqual(['user.ts', 'types/rows/user.ts']);
      expect(files[0]?.contents).toContain("export type { User } from './types/rows/user';");
    });

    it('should keep models inside the output directory', () => {
      expect(() => synthesize([user], { modelDir: '../model' })).toThrow(
        'Model directory must be inside the output directory: ../model',
      );
      expect(() => synthesize([user], { modelDir: './' })).toThrow(GenerationError);
    });
  });

  describe('determinism', () => {
    it('should render identical output for identical input', () => {
      const audit = entityFromTable(
        'AuditDefinition',
        table({ name: 'audit', columns: [dateTime('at'), json('payload')] }),
      );
      expect(synthesize([user, audit])).toEqual(synthesize([user, audit]));
    });

    it('should follow entity order', () => {
      const audit = entityFromTable('Audit', table({ name: 'audit', columns: [] }));
      expect(synthesize([audit, user]).map((file) => file.path)).toEqual([
        'audit.ts',
        'model/audit.ts',
        'user.ts',
        'model/user.ts',
      ]);
    });
  });

  describe('failures', () => {
    it('should reject entities sharing an output path', () => {
      const shout = entityFromTable('USER', table({ name: 'shout', columns: [] }));
      expect(() => synthesize([user, shout])).toThrow(
        new GenerationError('Entities User and USER would both be written to user.ts', 'user.ts'),
      );
    });

    it('should reject columns that map to the same property', () => {
      const clash = entityFromTable(
        'Clash',
        table({ name: 'clash', columns: [int('user_id'), int('userId')] }),
      );
      expect(() => synthesize([clash])).toThrow(
        'Columns user_id and userId of entity Clash map to the same property userId',
      );
    });

    it('should reject entity names that are not identifiers', () => {
      const bad = entityFromTable('my-table', table({ name: 'bad', columns: [] }));
      expect(() => synthesize([bad])).toThrow(GenerationError);
    });
  });
});

describe('source text helpers', () => {
  it('should escape single-quoted strings', () => {
    expect(quote("O'Brien")).toBe("'O\\'Brien'");
    expect(quote('a\\b')).toBe("'a\\\\b'");
    expect(quote('line\nbreak')).toBe("'line\\nbreak'");
  });

  it('should camel-case snake names', () => {
    expect(toCamelCase('created_at')).toBe('createdAt');
    expect(toCamelCase('id')).toBe('id');
    expect(propertyKey('user_2')).toBe('user_2');
    expect(propertyKey('first-name')).toBe("'first-name'");
  });
});

describe('tsTypeOf', () => {
  it('should map abstract types to row types', () => {
    expect(tsTypeOf(int('n').abstractType)).toBe('number');
    expect(tsTypeOf(decimal('n').abstractType)).toBe('string');
    expect(tsTypeOf(dateTime('n').abstractType)).toBe('Date');
    expect(tsTypeOf(json('n').abstractType)).toBe('Record<string, unknown>');
    expect(tsTypeOf(dialectType('postgresql', 'jsonb'))).toBe('unknown');
  });
});
