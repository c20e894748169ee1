/**
 * Schema Model Types
 * Canonical, dialect-agnostic description of tables and columns
 */

import type { AbstractColumnType } from '../registry/column-types';

/**
 * Typed default value. Presence is tracked separately on the column so that
 * `0`, `''` and `false` remain real defaults.
 */
export type ColumnDefault =
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'boolean'; value: boolean };

export type ColumnDefaultKind = ColumnDefault['kind'];

export interface ColumnDeclaration {
  readonly name: string;
  readonly abstractType: AbstractColumnType;
  /** Raw SQL type that bypasses all mapping */
  readonly explicitType?: string;
  readonly hasDefault: boolean;
  readonly defaultValue?: ColumnDefault;
  readonly autoIncrement: boolean;
  readonly length?: number;
  readonly precision?: number;
  readonly scale?: number;
}

export interface ColumnDeclarationInput {
  name: string;
  abstractType: AbstractColumnType;
  explicitType?: string;
  defaultValue?: ColumnDefault;
  autoIncrement?: boolean;
  length?: number;
  precision?: number;
  scale?: number;
}

export interface EntityDescriptor {
  /** Entity name derived from the declaring variable */
  readonly name: string;
  /** Literal table name the database sees */
  readonly tableName: string;
  /** Columns in declaration order */
  readonly columns: readonly ColumnDeclaration[];
}
