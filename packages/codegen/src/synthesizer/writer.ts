/**
 * Generated File Writer
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve } from 'node:path';

import { GenerationError } from '@tabula/core';

import type { GeneratedFile } from './types';

function targetPath(outputDir: string, file: GeneratedFile): string {
  const root = resolve(outputDir);
  const target = resolve(root, file.path);
  const fromRoot = relative(root, target);
  if (fromRoot === '' || fromRoot.startsWith('..') || isAbsolute(fromRoot)) {
    throw new GenerationError(`Generated path ${file.path} is outside ${outputDir}`, file.path);
  }
  return target;
}

/**
 * Write generated files one at a time, in order.
 *
 * @returns entity names, in first-written order
 * @throws GenerationError on a path outside the output directory or a failed write
 */
export async function writeGeneratedFiles(
  outputDir: string,
  files: readonly GeneratedFile[],
): Promise<string[]> {
  const entities: string[] = [];

  for (const file of files) {
    const target = targetPath(outputDir, file);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, file.contents, 'utf8');
    } catch (error) {
      throw new GenerationError(
        `Failed to write ${join(outputDir, file.path)}`,
        file.path,
        error instanceof Error ? error : undefined,
      );
    }
    if (!entities.includes(file.entity)) {
      entities.push(file.entity);
    }
  }

  return entities;
}
