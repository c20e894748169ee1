/**
 * Generator
 *
 * Runs extraction, synthesis and writing over schema files. Files are read
 * and extracted concurrently; writes happen one file at a time in sorted
 * order. A failing file is reported and the rest of the batch continues.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { join, relative, resolve } from 'node:path';

import { EventEmitter } from 'eventemitter3';

import {
  GENERATE_DEFAULTS,
  GenerationError,
  type EntityDescriptor,
  type Logger,
} from '@tabula/core';

import { SchemaExtractor, type ExtractionResult } from '../extractor';
import { CodeSynthesizer, writeGeneratedFiles } from '../synthesizer';

import type { FileFailure, GenerationSummary, GeneratorEvents, GeneratorOptions } from './types';

const SKIPPED_DIRECTORIES = new Set(['node_modules']);

type Extracted = { file: string; result: ExtractionResult } | FileFailure;

function isFailure(extracted: Extracted): extracted is FileFailure {
  return 'error' in extracted;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isSchemaFile(name: string): boolean {
  return name.endsWith('.ts') && !name.endsWith('.d.ts');
}

export class Generator extends EventEmitter<GeneratorEvents> {
  readonly outputDir: string;
  private readonly recursive: boolean;
  private readonly extractor: SchemaExtractor;
  private readonly synthesizer: CodeSynthesizer;
  private readonly logger?: Logger;

  constructor(options: GeneratorOptions = {}) {
    super();
    this.outputDir = options.outputDir ?? GENERATE_DEFAULTS.OUTPUT_DIR;
    this.recursive = options.recursive ?? GENERATE_DEFAULTS.RECURSIVE;
    this.extractor = new SchemaExtractor({ modules: options.modules });
    this.synthesizer = new CodeSynthesizer({
      modelDir: options.modelDir,
      runtimeModule: options.runtimeModule,
    });
    if (options.logger) {
      this.logger = options.logger;
    }
  }

  /**
   * Generate from a file or a directory of schema files
   *
   * @throws GenerationError when the input does not exist
   */
  async generate(input: string): Promise<GenerationSummary> {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(input)).isDirectory();
    } catch (error) {
      throw new GenerationError(`Input not found: ${input}`, input, toError(error));
    }

    if (isDirectory) {
      return this.generateFromDirectory(input);
    }
    return this.processFiles([input]);
  }

  /**
   * Generate from a single schema file.
   *
   * @returns written entity names
   * @throws ParseFailureError or GenerationError for this file
   */
  async generateFromFile(file: string): Promise<string[]> {
    const summary = await this.processFiles([file]);
    const [failure] = summary.failures;
    if (failure) {
      throw failure.error;
    }
    return summary.entities;
  }

  /**
   * Generate from every schema file in a directory, skipping declaration
   * files, `node_modules` and the output directory
   */
  async generateFromDirectory(directory: string): Promise<GenerationSummary> {
    const files = await this.collectFiles(directory);
    this.logger?.debug(`Found ${files.length} schema file(s) in ${directory}`);
    return this.processFiles(files);
  }

  private async collectFiles(directory: string): Promise<string[]> {
    const output = resolve(this.outputDir);
    const files: string[] = [];

    const walk = async (current: string): Promise<void> => {
      const entries = await readdir(current, { withFileTypes: true });
      for (const entry of entries) {
        const path = join(current, entry.name);
        if (entry.isDirectory()) {
          if (this.recursive && !SKIPPED_DIRECTORIES.has(entry.name) && resolve(path) !== output) {
            await walk(path);
          }
        } else if (entry.isFile() && isSchemaFile(entry.name)) {
          files.push(path);
        }
      }
    };

    await walk(directory);
    return files.sort();
  }

  private async extractFile(file: string): Promise<Extracted> {
    let source: string;
    try {
      source = await readFile(file, 'utf8');
    } catch (error) {
      return { file, error: new GenerationError(`Failed to read ${file}`, file, toError(error)) };
    }

    try {
      return { file, result: this.extractor.extract(source, file) };
    } catch (error) {
      return { file, error: toError(error) };
    }
  }

  private async processFiles(files: readonly string[]): Promise<GenerationSummary> {
    const extracted = await Promise.all(files.map((file) => this.extractFile(file)));
    const summary: GenerationSummary = { entities: [], files: [], failures: [] };
    const definedIn = new Map<string, string>();
    const writtenPaths = new Map<string, string>();

    for (const item of extracted) {
      if (isFailure(item)) {
        this.fail(summary, item.file, item.error);
        continue;
      }

      const { file, result } = item;
      for (const diagnostic of result.diagnostics) {
        this.logger?.warn(`${diagnostic.fileName}:${diagnostic.line}:${diagnostic.column} ${diagnostic.message}`);
        this.emit('warning', diagnostic);
      }

      try {
        const written = await this.writeEntities(file, result.entities, definedIn, writtenPaths);
        for (const name of written) {
          summary.entities.push(name);
          this.emit('entity', name, file);
        }
        summary.files.push(file);
        this.logger?.debug(`Generated ${written.length} entit${written.length === 1 ? 'y' : 'ies'} from ${file}`);
      } catch (error) {
        this.fail(summary, file, toError(error));
      }
    }

    return summary;
  }

  private async writeEntities(
    file: string,
    entities: readonly EntityDescriptor[],
    definedIn: Map<string, string>,
    writtenPaths: Map<string, string>,
  ): Promise<string[]> {
    for (const entity of entities) {
      const previous = definedIn.get(entity.name);
      if (previous !== undefined) {
        throw new GenerationError(`Entity ${entity.name} in ${file} is already defined in ${previous}`, file);
      }
    }

    const generated = this.synthesizer.synthesize(entities);
    for (const output of generated) {
      const owner = writtenPaths.get(output.path);
      if (owner !== undefined) {
        throw new GenerationError(
          `Entities ${owner} and ${output.entity} would both be written to ${output.path}`,
          output.path,
        );
      }
    }

    const written = await writeGeneratedFiles(this.outputDir, generated);
    for (const entity of entities) {
      definedIn.set(entity.name, file);
    }
    for (const output of generated) {
      writtenPaths.set(output.path, output.entity);
    }
    return written;
  }

  private fail(summary: GenerationSummary, file: string, error: Error): void {
    this.logger?.error(`${relative(process.cwd(), file) || file}: ${error.message}`);
    summary.failures.push({ file, error });
    this.emit('fileError', file, error);
  }
}
