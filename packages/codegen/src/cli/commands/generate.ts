/**
 * generate Command
 * Generate typed accessor modules from schema files
 */

import { relative, resolve } from 'node:path';

import { consoleLogger, silentLogger } from '@tabula/core';

import { Generator } from '../../generator';
import { loadConfig } from '../config';
import { success, error, errorMessage, info, warn } from '../utils';

export interface GenerateCommandOptions {
  /** Schema file or directory; overrides generate.input */
  input?: string;
  /** Output directory; overrides generate.output */
  output?: string;
  recursive?: boolean;
  /** Config file path */
  config?: string;
  /** Log per-file progress */
  verbose?: boolean;
  cwd?: string;
}

/**
 * @returns process exit code
 */
export async function generateCommand(options: GenerateCommandOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();

  try {
    const config = await loadConfig({ cwd, path: options.config });
    const input = options.input ?? config.generate.input;
    if (!input) {
      error('No input given. Pass --input or set generate.input in tabula.config.json');
      return 1;
    }

    const outputDir = resolve(cwd, options.output ?? config.generate.output);
    const generator = new Generator({
      outputDir,
      recursive: options.recursive || config.generate.recursive,
      modelDir: config.generate.modelDir,
      modules: config.modules,
      logger: options.verbose ? { ...silentLogger, debug: consoleLogger.debug } : undefined,
    });

    generator.on('entity', (name, file) => success(`${name} (${relative(cwd, file)})`));
    generator.on('warning', (diagnostic) =>
      warn(`${relative(cwd, diagnostic.fileName)}:${diagnostic.line}:${diagnostic.column} ${diagnostic.message}`),
    );
    generator.on('fileError', (file, fileError) => error(`${relative(cwd, file)}: ${fileError.message}`));

    info(`Generating from ${input}...`);
    console.log('');

    const summary = await generator.generate(resolve(cwd, input));

    console.log('');
    const count = summary.entities.length;
    info(
      `Generated ${count} ${count === 1 ? 'entity' : 'entities'} from ${summary.files.length} file(s) into ${relative(cwd, outputDir) || '.'}`,
    );

    if (summary.failures.length > 0) {
      error(`${summary.failures.length} file(s) failed`);
      return 1;
    }
    return 0;
  } catch (error_) {
    error(errorMessage(error_));
    return 1;
  }
}
