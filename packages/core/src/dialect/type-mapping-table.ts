/**
 * Dialect Type-Mapping Table
 *
 * Immutable lookup from abstract column type to a dialect's base SQL type.
 * All structural checks run once in the constructor; lookups never throw.
 */

import mappingData from '../data/dialect-type-mappings.json';
import {
  DIALECT_COLUMN_KINDS,
  SHARED_COLUMN_KINDS,
  typeKey,
  type AbstractColumnType,
  type SharedColumnKind,
} from '../registry/column-types';
import { TypeMappingError } from '../errors';
import {
  DIALECT_CONFIGS,
  DIALECT_NAMES,
  isDialectName,
  type DialectName,
  type IdentifierQuoting,
} from './dialects';

/** Shared kinds that may take a `(N)` length suffix */
export const LENGTH_PARAMETERIZED_KINDS = ['varchar', 'char', 'binary', 'varbinary'] as const;

export type LengthParameterizedKind = (typeof LENGTH_PARAMETERIZED_KINDS)[number];

/**
 * How a dialect renders a bit column with a length.
 * - `parameterized`: `BIT(N)`
 * - `single`: only one bit; longer fields are rejected
 * - `remap`: the base type is replaced, e.g. `VARBIT(N)`
 */
export type BitFieldRule =
  | { mode: 'parameterized' }
  | { mode: 'single' }
  | { mode: 'remap'; baseType: string };

export interface DialectTypeRow {
  /** Base type of every shared kind */
  types: Record<string, string>;
  /** Base types of the dialect's own extension kinds */
  extensions?: Record<string, string>;
  /** Length-bearing kinds whose base type takes a `(N)` suffix */
  lengthParameterized?: readonly string[];
  bitField?: BitFieldRule;
}

export type DialectTypeMappingDefinition = Partial<Record<DialectName, DialectTypeRow>>;

export interface DialectTypeMappingOptions {
  /** Reject a definition that lacks a row for any supported dialect */
  requireAllDialects?: boolean;
}

interface CompiledRow {
  baseTypes: ReadonlyMap<string, string>;
  lengthParameterized: ReadonlySet<string>;
  bitField: BitFieldRule;
}

const SINGLE_BIT: BitFieldRule = { mode: 'single' };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertStringRecord(
  value: unknown,
  field: string,
  dialect: string,
): asserts value is Record<string, string> {
  if (!isRecord(value)) {
    throw new TypeMappingError(`${field} of dialect ${dialect} must be an object`, dialect);
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new TypeMappingError(`${field}.${key} of dialect ${dialect} must be a string`, dialect);
    }
  }
}

function assertBitFieldRule(value: unknown, dialect: string): asserts value is BitFieldRule {
  if (!isRecord(value)) {
    throw new TypeMappingError(`bitField of dialect ${dialect} must be an object`, dialect);
  }
  const mode = value['mode'];
  if (mode === 'parameterized' || mode === 'single') {
    return;
  }
  if (mode === 'remap') {
    const baseType = value['baseType'];
    if (typeof baseType !== 'string') {
      throw new TypeMappingError(`bitField.baseType of dialect ${dialect} must be a string`, dialect);
    }
    return;
  }
  throw new TypeMappingError(`Invalid bitField mode for dialect ${dialect}: ${String(mode)}`, dialect);
}

function assertDialectTypeRow(value: unknown, dialect: string): asserts value is DialectTypeRow {
  if (!isRecord(value)) {
    throw new TypeMappingError(`Mapping row of dialect ${dialect} must be an object`, dialect);
  }
  assertStringRecord(value['types'], 'types', dialect);
  if (value['extensions'] !== undefined) {
    assertStringRecord(value['extensions'], 'extensions', dialect);
  }
  const lengthParameterized = value['lengthParameterized'];
  if (
    lengthParameterized !== undefined &&
    !(Array.isArray(lengthParameterized) && lengthParameterized.every((kind) => typeof kind === 'string'))
  ) {
    throw new TypeMappingError(
      `lengthParameterized of dialect ${dialect} must be an array of strings`,
      dialect,
    );
  }
  if (value['bitField'] !== undefined) {
    assertBitFieldRule(value['bitField'], dialect);
  }
}

/**
 * Validate the shape of raw mapping data (e.g. parsed JSON)
 */
export function assertMappingDefinition(data: unknown): asserts data is DialectTypeMappingDefinition {
  if (!isRecord(data)) {
    throw new TypeMappingError('Type mapping definition must be an object');
  }
  for (const [dialect, row] of Object.entries(data)) {
    if (!isDialectName(dialect)) {
      throw new TypeMappingError(`Unknown dialect in type mappings: ${dialect}`);
    }
    assertDialectTypeRow(row, dialect);
  }
}

function requireEntry(dialect: DialectName, kind: string, baseType: string | undefined): string {
  if (baseType === undefined) {
    throw new TypeMappingError(`Dialect ${dialect} has no mapping for shared type ${kind}`, dialect);
  }
  if (baseType.trim() === '') {
    throw new TypeMappingError(`Dialect ${dialect} maps type ${kind} to an empty string`, dialect);
  }
  return baseType;
}

function compileRow(dialect: DialectName, row: DialectTypeRow): CompiledRow {
  const baseTypes = new Map<string, string>();
  const sharedKinds: readonly string[] = SHARED_COLUMN_KINDS;
  const ownKinds: readonly string[] = DIALECT_COLUMN_KINDS[dialect];

  for (const kind of SHARED_COLUMN_KINDS) {
    baseTypes.set(`shared:${kind}`, requireEntry(dialect, kind, row.types[kind]));
  }
  for (const kind of Object.keys(row.types)) {
    if (!sharedKinds.includes(kind)) {
      throw new TypeMappingError(`Dialect ${dialect} maps unknown shared type ${kind}`, dialect);
    }
  }

  for (const [kind, baseType] of Object.entries(row.extensions ?? {})) {
    if (!ownKinds.includes(kind)) {
      throw new TypeMappingError(
        `Dialect ${dialect} maps ${kind}, which is not one of its own types`,
        dialect,
      );
    }
    baseTypes.set(`${dialect}:${kind}`, requireEntry(dialect, kind, baseType));
  }

  const lengthKinds: readonly string[] = LENGTH_PARAMETERIZED_KINDS;
  const lengthParameterized = new Set<string>();
  for (const kind of row.lengthParameterized ?? []) {
    if (!lengthKinds.includes(kind)) {
      throw new TypeMappingError(
        `Dialect ${dialect} lists ${kind} as length-parameterized, expected one of ${LENGTH_PARAMETERIZED_KINDS.join(', ')}`,
        dialect,
      );
    }
    lengthParameterized.add(kind);
  }

  const bitField = row.bitField ?? SINGLE_BIT;
  if (bitField.mode === 'remap' && bitField.baseType.trim() === '') {
    throw new TypeMappingError(`Dialect ${dialect} remaps bit fields to an empty type`, dialect);
  }

  return { baseTypes, lengthParameterized, bitField };
}

export class DialectTypeMappingTable {
  private readonly rows = new Map<DialectName, CompiledRow>();

  /**
   * @throws TypeMappingError when a row misses a shared type, maps another
   * dialect's type, or holds an empty entry
   */
  constructor(definition: DialectTypeMappingDefinition, options: DialectTypeMappingOptions = {}) {
    for (const dialect of DIALECT_NAMES) {
      const row = definition[dialect];
      if (row) {
        this.rows.set(dialect, compileRow(dialect, row));
      } else if (options.requireAllDialects) {
        throw new TypeMappingError(`Missing type mappings for dialect ${dialect}`, dialect);
      }
    }
  }

  /**
   * Build a table from untyped data such as a parsed JSON file
   */
  static fromJSON(data: unknown, options: DialectTypeMappingOptions = {}): DialectTypeMappingTable {
    assertMappingDefinition(data);
    return new DialectTypeMappingTable(data, options);
  }

  /** Dialects that have a mapping row */
  get dialects(): DialectName[] {
    return [...this.rows.keys()];
  }

  hasDialect(dialect: DialectName): boolean {
    return this.rows.has(dialect);
  }

  /**
   * Base SQL type for a column type, or `undefined` for an unsupported
   * combination
   */
  baseType(dialect: DialectName, type: AbstractColumnType): string | undefined {
    return this.rows.get(dialect)?.baseTypes.get(typeKey(type));
  }

  /** Whether the dialect appends `(N)` to this length-bearing kind */
  takesLength(dialect: DialectName, kind: SharedColumnKind): boolean {
    return this.rows.get(dialect)?.lengthParameterized.has(kind) ?? false;
  }

  bitFieldRule(dialect: DialectName): BitFieldRule {
    return this.rows.get(dialect)?.bitField ?? SINGLE_BIT;
  }

  identifierQuoting(dialect: DialectName): IdentifierQuoting {
    return DIALECT_CONFIGS[dialect].identifierQuoting;
  }
}

let defaultTable: DialectTypeMappingTable | undefined;

/**
 * The built-in table covering every supported dialect, loaded once
 */
export function defaultTypeMappingTable(): DialectTypeMappingTable {
  defaultTable ??= DialectTypeMappingTable.fromJSON(mappingData, { requireAllDialects: true });
  return defaultTable;
}
