/**
 * Column Accessor
 * Runtime values behind generated schema modules
 */

export interface ColumnMeta {
  /** Column name as declared */
  name: string;
  /** Stable abstract type key, e.g. `shared:varchar` */
  typeKey: string;
  /** Raw SQL type override, if any */
  explicitType?: string;
  autoIncrement: boolean;
  hasDefault: boolean;
  defaultValue?: string | number | boolean;
  length?: number;
  precision?: number;
  scale?: number;
}

/**
 * Reference to a table column. `T` is the column's value type in rows.
 *
 * @example
 * ```typescript
 * `${Schema.email}`;               // 'users.email'
 * `${Schema.email.withAlias('u')}`; // 'u.email'
 * ```
 */
export class ColumnRef<T = unknown> {
  constructor(
    readonly parentAlias: string,
    readonly meta: Readonly<ColumnMeta>,
  ) {}

  get name(): string {
    return this.meta.name;
  }

  /**
   * Same column qualified by another table alias
   */
  withAlias(alias: string): ColumnRef<T> {
    return new ColumnRef<T>(alias, this.meta);
  }

  toString(): string {
    return `${this.parentAlias}.${this.meta.name}`;
  }
}

export function defineColumn<T>(parentAlias: string, meta: ColumnMeta): ColumnRef<T> {
  return new ColumnRef<T>(parentAlias, Object.freeze({ ...meta }));
}
