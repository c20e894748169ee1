export { CodeSynthesizer, synthesize } from './CodeSynthesizer';
export { writeGeneratedFiles } from './writer';
export { tsTypeOf } from './type-map';
export type { GeneratedFile, SynthesizeOptions } from './types';
