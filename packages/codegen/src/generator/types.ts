import type { Logger } from '@tabula/core';

import type { ExtractionDiagnostic } from '../extractor';
import type { SynthesizeOptions } from '../synthesizer';

export interface GeneratorOptions extends SynthesizeOptions {
  /** Directory generated modules are written to */
  outputDir?: string;
  /** Walk input directories recursively */
  recursive?: boolean;
  /** Module specifiers that provide the schema DSL */
  modules?: readonly string[];
  logger?: Logger;
}

export interface GeneratorEvents {
  entity: (name: string, file: string) => void;
  warning: (diagnostic: ExtractionDiagnostic) => void;
  fileError: (file: string, error: Error) => void;
}

export interface FileFailure {
  file: string;
  error: Error;
}

export interface GenerationSummary {
  /** Written entity names, in file order */
  entities: string[];
  /** Input files that were processed */
  files: string[];
  failures: FileFailure[];
}
