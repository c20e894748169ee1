/**
 * Schema Module
 * Entity model, schema DSL, column accessors and DDL generation
 */

export * from './dsl';
export { acceptsDefault, createColumnDeclaration, createEntity, deriveEntityName } from './entity';
export { ColumnRef, defineColumn, type ColumnMeta } from './ColumnAccessor';
export { DdlBuilder, createTable } from './DdlBuilder';

export type {
  ColumnDeclaration,
  ColumnDeclarationInput,
  ColumnDefault,
  ColumnDefaultKind,
  EntityDescriptor,
} from './types';
