export { Generator } from './Generator';
export type { FileFailure, GenerationSummary, GeneratorEvents, GeneratorOptions } from './types';
