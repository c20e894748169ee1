import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { GenerationError, ParseFailureError, silentLogger } from '@tabula/core';

import { Generator } from '../Generator';

const USER_SCHEMA = `import { table, int, varchar, withAutoIncrement } from '@tabula/core';

export const UserSchema = table({
  name: 'users',
  columns: [int('id', withAutoIncrement(true)), varchar('email')],
});
`;

const POST_SCHEMA = `import { table, int, text } from '@tabula/core';

export const PostDefinition = table({ name: 'posts', columns: [int('id'), text('body')] });
`;

describe('Generator', () => {
  let root: string;
  let inputDir: string;
  let outputDir: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'tabula-generator-'));
    inputDir = join(root, 'schema');
    outputDir = join(root, 'gen');
    await mkdir(inputDir);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function schemaFile(name: string, contents: string): Promise<string> {
    const path = join(inputDir, name);
    await mkdir(join(path, '..'), { recursive: true });
    await writeFile(path, contents);
    return path;
  }

  describe('generateFromFile', () => {
    it('should write the accessor and model modules', async () => {
      const file = await schemaFile('user.ts', USER_SCHEMA);
      const generator = new Generator({ outputDir });
      const onEntity = vi.fn();
      generator.on('entity', onEntity);

      const written = await generator.generateFromFile(file);

      expect(written).toEqual(['User']);
      expect(onEntity).toHaveBeenCalledWith('User', file);
      const accessor = await readFile(join(outputDir, 'user.ts'), 'utf8');
      expect(accessor).toContain("export const TABLE_NAME = 'users';");
      const model = await readFile(join(outputDir, 'model', 'user.ts'), 'utf8');
      expect(model).toContain('export interface User {\n  id: number;\n  email: string;\n}');
    });

    it('should throw the parse failure of the file', async () => {
      const file = await schemaFile('broken.ts', 'export const = table(');
      const generator = new Generator({ outputDir });

      await expect(generator.generateFromFile(file)).rejects.toThrow(ParseFailureError);
    });

    it('should report unreadable files as generation errors', async () => {
      const generator = new Generator({ outputDir });
      await expect(generator.generateFromFile(join(inputDir, 'missing.ts'))).rejects.toThrow(
        `Failed to read ${join(inputDir, 'missing.ts')}`,
      );
    });
  });

  describe('generateFromDirectory', () => {
    it('should process top-level schema files in sorted order', async () => {
      await schemaFile('b-user.ts', USER_SCHEMA);
      await schemaFile('a-post.ts', POST_SCHEMA);
      await schemaFile('types.d.ts', 'export declare const x: number;');
      await schemaFile('nested/comment.ts', POST_SCHEMA.replace('PostDefinition', 'CommentDefinition'));

      const summary = await new Generator({ outputDir }).generateFromDirectory(inputDir);

      expect(summary.entities).toEqual(['Post', 'User']);
      expect(summary.files).toEqual([join(inputDir, 'a-post.ts'), join(inputDir, 'b-user.ts')]);
      expect(summary.failures).toEqual([]);
    });

    it('should walk sub-directories when recursive', async () => {
      await schemaFile('user.ts', USER_SCHEMA);
      await schemaFile('nested/comment.ts', POST_SCHEMA.replace('PostDefinition', 'CommentDefinition'));
      await schemaFile('node_modules/pkg/post.ts', POST_SCHEMA);

      const summary = await new Generator({ outputDir, recursive: true }).generateFromDirectory(inputDir);

      expect(summary.entities).toEqual(['Comment', 'User']);
    });

    it('should skip the output directory', async () => {
      await schemaFile('user.ts', USER_SCHEMA);
      await schemaFile('gen/post.ts', POST_SCHEMA);

      const generator = new Generator({ outputDir: join(inputDir, 'gen'), recursive: true });
      const summary = await generator.generateFromDirectory(inputDir);

      expect(summary.entities).toEqual(['User']);
    });

    it('should keep going after a failing file', async () => {
      await schemaFile('a-broken.ts', 'export const = table(');
      await schemaFile('b-user.ts', USER_SCHEMA);
      const generator = new Generator({ outputDir });
      const onFileError = vi.fn();
      generator.on('fileError', onFileError);

      const summary = await generator.generateFromDirectory(inputDir);

      expect(summary.entities).toEqual(['User']);
      expect(summary.failures).toHaveLength(1);
      expect(summary.failures[0]?.file).toBe(join(inputDir, 'a-broken.ts'));
      expect(summary.failures[0]?.error).toBeInstanceOf(ParseFailureError);
      expect(onFileError).toHaveBeenCalledTimes(1);
    });

    it('should fail a later file that redefines an entity', async () => {
      await schemaFile('a.ts', USER_SCHEMA);
      await schemaFile('b.ts', USER_SCHEMA.replace("'users'", "'members'"));

      const summary = await new Generator({ outputDir }).generateFromDirectory(inputDir);

      expect(summary.entities).toEqual(['User']);
      expect(summary.failures.map((failure) => failure.error.message)).toEqual([
        `Entity User in ${join(inputDir, 'b.ts')} is already defined in ${join(inputDir, 'a.ts')}`,
      ]);
      expect(await readFile(join(outputDir, 'user.ts'), 'utf8')).toContain(
        "export const TABLE_NAME = 'users';",
      );
    });

    it('should forward extraction warnings', async () => {
      await schemaFile(
        'code.ts',
        `import { table, varchar, withLength } from '@tabula/core';
export const CodeSchema = table({ name: 'codes', columns: [varchar('code', withLength(size))] });
`,
      );
      const logger = { ...silentLogger, warn: vi.fn() };
      const generator = new Generator({ outputDir, logger });
      const onWarning = vi.fn();
      generator.on('warning', onWarning);

      await generator.generateFromDirectory(inputDir);

      expect(onWarning).toHaveBeenCalledWith(
        expect.objectContaining({
          message: 'Invalid length: expected an integer literal',
          entity: 'Code',
          line: 2,
        }),
      );
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('generate', () => {
    it('should accept a single file', async () => {
      const file = await schemaFile('user.ts', USER_SCHEMA);
      const summary = await new Generator({ outputDir }).generate(file);
      expect(summary).toEqual({ entities: ['User'], files: [file], failures: [] });
    });

    it('should reject a missing input', async () => {
      await expect(new Generator({ outputDir }).generate(join(root, 'nope'))).rejects.toThrow(
        GenerationError,
      );
    });
  });
});
