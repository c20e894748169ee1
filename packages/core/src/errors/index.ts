import type { DialectName } from '../dialect/dialects';

export class TabulaError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'TabulaError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class UnsupportedCombinationError extends TabulaError {
  constructor(
    public dialect: DialectName,
    public typeKey: string,
    typeName: string,
  ) {
    super(
      `Abstract type ${typeName} (${typeKey}) has no mapping for dialect ${dialect}`,
      'UNSUPPORTED_COMBINATION',
    );
    this.name = 'UnsupportedCombinationError';
  }
}

export class UnsupportedMultiBitFieldError extends TabulaError {
  constructor(public dialect: DialectName, public length: number) {
    super(
      `Multi-bit fields are not supported for dialect ${dialect} (requested length ${length})`,
      'UNSUPPORTED_MULTI_BIT_FIELD',
    );
    this.name = 'UnsupportedMultiBitFieldError';
  }
}

export interface SyntaxProblem {
  message: string;
  line: number;
  column: number;
}

export class ParseFailureError extends TabulaError {
  constructor(public fileName: string, public problems: SyntaxProblem[], cause?: Error) {
    const first = problems[0];
    const location = first ? `${fileName}:${first.line}:${first.column}` : fileName;
    super(
      `Failed to parse ${location}: ${first?.message ?? 'invalid source'}`,
      'PARSE_FAILURE',
      cause,
    );
    this.name = 'ParseFailureError';
  }
}

export class TypeMappingError extends TabulaError {
  constructor(message: string, public dialect?: string) {
    super(message, 'TYPE_MAPPING_ERROR');
    this.name = 'TypeMappingError';
  }
}

export class ValidationError extends TabulaError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends TabulaError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class GenerationError extends TabulaError {
  constructor(message: string, public path?: string, cause?: Error) {
    super(message, 'GENERATION_ERROR', cause);
    this.name = 'GenerationError';
  }
}
