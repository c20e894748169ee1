export interface GeneratedFile {
  /** Path relative to the output directory, always with `/` separators */
  path: string;
  contents: string;
  /** Entity the file was generated for */
  entity: string;
}

export interface SynthesizeOptions {
  /** Directory for row interfaces, relative to the output directory */
  modelDir?: string;
  /** Module generated code imports the column runtime from */
  runtimeModule?: string;
}
