export { SchemaExtractor, extract, extractWithDiagnostics } from './SchemaExtractor';
export { parseDecimalLiteral, parseIntegerLiteral } from './literals';
export type { ExtractionDiagnostic, ExtractionResult, SchemaExtractorOptions } from './types';
