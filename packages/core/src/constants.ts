/**
 * Constants
 *
 * Centralized defaults used by type resolution, extraction and code generation.
 */

// ============ Type Resolution Defaults ============

export const LENGTH_DEFAULTS = {
  /** Variable-length strings and binaries (varchar, varbinary) */
  VARIABLE: 255,
  /** Fixed-length strings, binaries and bit fields (char, binary, bit) */
  FIXED: 1,
} as const;

export const DECIMAL_DEFAULTS = {
  /** Fixed-point decimal: DECIMAL(10,2) */
  DECIMAL: { precision: 10, scale: 2 },
  /** Currency: DECIMAL(19,4) where the dialect has no MONEY type */
  MONEY: { precision: 19, scale: 4 },
} as const;

/** Base type names containing this marker take no precision or scale */
export const MONEY_TYPE_MARKER = 'MONEY';

/** Display name for a value outside the known column types */
export const UNKNOWN_TYPE_NAME = 'UNKNOWN';

// ============ Extraction Defaults ============

/**
 * Suffixes stripped from schema variable names to derive entity names.
 * Only the first match is removed.
 */
export const ENTITY_NAME_SUFFIXES = ['Schema', 'Definition', 'Table'] as const;

/** Module specifiers whose imports make the schema DSL available */
export const DSL_MODULES = ['@tabula/core', 'tabula'] as const;

// ============ Code Generation Defaults ============

export const GENERATED_HEADER = '// Code generated by tabula. DO NOT EDIT.';

export const GENERATE_DEFAULTS = {
  /** Output directory for generated modules */
  OUTPUT_DIR: './gen',
  /** Walk input directories recursively */
  RECURSIVE: false,
  /** Sub-directory holding row interfaces */
  MODEL_DIR: 'model',
  /** Dialect used when none is configured */
  DIALECT: 'mysql',
} as const;

export const CONFIG_FILES = ['tabula.config.json'] as const;
