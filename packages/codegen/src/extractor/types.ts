import type { EntityDescriptor } from '@tabula/core';

/**
 * A recognized schema construct that could not be read completely.
 * Extraction keeps going; the affected attribute, column or entity is left out.
 */
export interface ExtractionDiagnostic {
  severity: 'warning';
  message: string;
  fileName: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  /** Entity the construct belongs to, when known */
  entity?: string;
}

export interface ExtractionResult {
  entities: EntityDescriptor[];
  diagnostics: ExtractionDiagnostic[];
}

export interface SchemaExtractorOptions {
  /** Module specifiers that provide the schema DSL */
  modules?: readonly string[];
}
