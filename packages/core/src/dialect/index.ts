/**
 * Dialects and Type Resolution
 *
 * Supported database dialects, their type-mapping table and the resolver
 * that turns column declarations into dialect SQL types.
 *
 * @module dialect
 */

export {
  DIALECT_NAMES,
  DIALECT_CONFIGS,
  isDialectName,
  parseDialect,
  quoteIdentifier,
  type DialectName,
  type DialectConfig,
  type IdentifierQuoting,
} from './dialects';
export {
  DialectTypeMappingTable,
  LENGTH_PARAMETERIZED_KINDS,
  assertMappingDefinition,
  defaultTypeMappingTable,
  type BitFieldRule,
  type DialectTypeRow,
  type DialectTypeMappingDefinition,
  type DialectTypeMappingOptions,
  type LengthParameterizedKind,
} from './type-mapping-table';
export { TypeResolver, resolveColumnType } from './type-resolver';
