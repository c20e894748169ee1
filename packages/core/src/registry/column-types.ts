/**
 * Abstract Column Types
 *
 * A column type is either one of the shared kinds every dialect maps, or an
 * extension owned by a single dialect. Extensions are keyed by their owning
 * dialect rather than by a numeric range, so adding one never shifts another.
 */

import { DIALECT_NAMES, type DialectName } from '../dialect/dialects';

export const SHARED_COLUMN_KINDS = [
  'varchar',
  'char',
  'text',
  'tinyInt',
  'smallInt',
  'int',
  'bigInt',
  'boolean',
  'real',
  'double',
  'decimal',
  'date',
  'time',
  'dateTime',
  'timestamp',
  'blob',
  'json',
  'uuid',
  'bit',
  'binary',
  'varbinary',
  'money',
  'xml',
] as const;

export type SharedColumnKind = (typeof SHARED_COLUMN_KINDS)[number];

export const DIALECT_COLUMN_KINDS = {
  mysql: [
    'set',
    'enum',
    'point',
    'tinyText',
    'mediumText',
    'longText',
    'tinyBlob',
    'mediumBlob',
    'longBlob',
    'year',
    'geometry',
    'lineString',
    'polygon',
    'multiPoint',
    'multiLineString',
    'multiPolygon',
    'geometryCollection',
  ],
  postgresql: [
    'jsonb',
    'hstore',
    'tsVector',
    'money',
    'interval',
    'inet',
    'macaddr',
    'macaddr8',
    'bit',
    'varbit',
    'box',
    'circle',
    'line',
    'lseg',
    'path',
    'polygon',
    'tsQuery',
    'jsonPath',
    'xml',
    'array',
    'range',
    'multirange',
    'pgLsn',
    'pgSnapshot',
  ],
  sqlite: [],
  sqlserver: [
    'xml',
    'geography',
    'geometry',
    'hierarchyId',
    'uniqueIdentifier',
    'image',
    'nText',
    'sqlVariant',
    'timestamp',
    'money',
    'smallMoney',
    'dateTime2',
    'dateTimeOffset',
    'smallDateTime',
  ],
  cql: ['counter', 'duration', 'inet', 'list', 'map', 'set', 'tuple', 'vector'],
  clickhouse: [
    'lowCardinality',
    'nullable',
    'array',
    'map',
    'tuple',
    'nested',
    'enum8',
    'enum16',
    'date32',
    'dateTime64',
    'ipv4',
    'ipv6',
    'objectJson',
    'decimal32',
    'decimal64',
    'decimal128',
    'decimal256',
    'aggregateFunction',
    'simpleAggregateFunction',
  ],
  presto: [
    'row',
    'array',
    'map',
    'intervalYearToMonth',
    'intervalDayToSecond',
    'ipAddress',
    'geometry',
    'bingTile',
    'hyperLogLog',
    'p4HyperLogLog',
    'qDigest',
    'tDigest',
    'barcode',
    'timeWithTimeZone',
    'timestampWithTimeZone',
  ],
  oracle: [
    'nclob',
    'raw',
    'binaryFloat',
    'binaryDouble',
    'intervalYearToMonth',
    'intervalDayToSecond',
    'urowid',
    'anyData',
    'anyType',
    'anyDataSet',
    'xmlType',
    'uriType',
    'dbUriType',
    'xdbUriType',
    'httpUriType',
    'sdoGeometry',
    'sdoTopoGeometry',
    'sdoGeoRaster',
  ],
  informix: [
    'lvarchar',
    'byte',
    'money',
    'serial',
    'serial8',
    'bigSerial',
    'clob',
    'interval',
    'list',
    'multiset',
    'set',
    'row',
  ],
} as const satisfies Record<DialectName, readonly string[]>;

export type DialectColumnKind<D extends DialectName = DialectName> =
  (typeof DIALECT_COLUMN_KINDS)[D][number];

export interface SharedColumnType {
  readonly scope: 'shared';
  readonly kind: SharedColumnKind;
}

export interface DialectColumnType {
  readonly scope: 'dialect';
  readonly dialect: DialectName;
  readonly kind: DialectColumnKind;
}

export type AbstractColumnType = SharedColumnType | DialectColumnType;

/** Shared kinds whose values are numbers and may auto-increment */
const NUMERIC_SHARED_KINDS: ReadonlySet<SharedColumnKind> = new Set<SharedColumnKind>([
  'tinyInt',
  'smallInt',
  'int',
  'bigInt',
  'real',
  'double',
  'bit',
]);

const NUMERIC_DIALECT_KEYS: ReadonlySet<string> = new Set([
  'cql:counter',
  'informix:serial',
  'informix:serial8',
  'informix:bigSerial',
]);

export function isSharedColumnKind(kind: string): kind is SharedColumnKind {
  const kinds: readonly string[] = SHARED_COLUMN_KINDS;
  return kinds.includes(kind);
}

export function isDialectColumnKind(dialect: DialectName, kind: string): kind is DialectColumnKind {
  const kinds: readonly string[] = DIALECT_COLUMN_KINDS[dialect];
  return kinds.includes(kind);
}

export function sharedType(kind: SharedColumnKind): SharedColumnType {
  const type: SharedColumnType = { scope: 'shared', kind };
  return Object.freeze(type);
}

/**
 * Build a dialect-specific column type. The kind is checked against the
 * owning dialect's extensions at compile time.
 *
 * @example
 * ```typescript
 * withType(dialectType('postgresql', 'jsonb'));
 * ```
 */
export function dialectType<D extends DialectName>(
  dialect: D,
  kind: DialectColumnKind<D>,
): DialectColumnType {
  const type: DialectColumnType = { scope: 'dialect', dialect, kind };
  return Object.freeze(type);
}

/**
 * Stable string key of a column type, e.g. `shared:varchar` or `postgresql:jsonb`
 */
export function typeKey(type: AbstractColumnType): string {
  return type.scope === 'shared' ? `shared:${type.kind}` : `${type.dialect}:${type.kind}`;
}

export function isSharedType(type: AbstractColumnType): type is SharedColumnType {
  return type.scope === 'shared';
}

export function isNumericType(type: AbstractColumnType): boolean {
  if (type.scope === 'shared') {
    return NUMERIC_SHARED_KINDS.has(type.kind);
  }
  return NUMERIC_DIALECT_KEYS.has(typeKey(type));
}

export function sameType(left: AbstractColumnType, right: AbstractColumnType): boolean {
  return typeKey(left) === typeKey(right);
}

function collectColumnTypes(): AbstractColumnType[] {
  const types: AbstractColumnType[] = SHARED_COLUMN_KINDS.map((kind) => sharedType(kind));
  for (const dialect of DIALECT_NAMES) {
    const kinds: readonly DialectColumnKind[] = DIALECT_COLUMN_KINDS[dialect];
    for (const kind of kinds) {
      types.push(dialectType(dialect, kind));
    }
  }
  return types;
}

/** Every known column type, shared kinds first, then each dialect's extensions */
export const ALL_COLUMN_TYPES: readonly AbstractColumnType[] = Object.freeze(collectColumnTypes());

const TYPES_BY_KEY: ReadonlyMap<string, AbstractColumnType> = new Map(
  ALL_COLUMN_TYPES.map((type) => [typeKey(type), type] as const),
);

/**
 * Look up a column type by its stable key
 */
export function columnTypeByKey(key: string): AbstractColumnType | undefined {
  return TYPES_BY_KEY.get(key);
}

/**
 * Shared column types by member name, as written in schema files
 * (`withType(ColumnType.Json)`)
 */
export const ColumnType = Object.freeze({
  Varchar: sharedType('varchar'),
  Char: sharedType('char'),
  Text: sharedType('text'),
  TinyInt: sharedType('tinyInt'),
  SmallInt: sharedType('smallInt'),
  Int: sharedType('int'),
  BigInt: sharedType('bigInt'),
  Boolean: sharedType('boolean'),
  Real: sharedType('real'),
  Double: sharedType('double'),
  Decimal: sharedType('decimal'),
  Date: sharedType('date'),
  Time: sharedType('time'),
  DateTime: sharedType('dateTime'),
  Timestamp: sharedType('timestamp'),
  Blob: sharedType('blob'),
  Json: sharedType('json'),
  Uuid: sharedType('uuid'),
  Bit: sharedType('bit'),
  Binary: sharedType('binary'),
  Varbinary: sharedType('varbinary'),
  Money: sharedType('money'),
  Xml: sharedType('xml'),
});

export type ColumnTypeMember = keyof typeof ColumnType;

export function isColumnTypeMember(name: string): name is ColumnTypeMember {
  return Object.prototype.hasOwnProperty.call(ColumnType, name);
}

const MEMBERS_BY_KIND: ReadonlyMap<SharedColumnKind, string> = new Map(
  Object.entries(ColumnType).map(([member, type]) => [type.kind, member] as const),
);

/**
 * Member name of a shared type in the `ColumnType` constant
 */
export function columnTypeMemberOf(kind: SharedColumnKind): string {
  return MEMBERS_BY_KIND.get(kind) ?? kind;
}
