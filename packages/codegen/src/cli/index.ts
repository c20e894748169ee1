#!/usr/bin/env node
/**
 * tabula CLI
 * Command-line interface for code generation and DDL output
 */

import { parseArgs } from 'node:util';

import { ddlCommand, generateCommand, initCommand } from './commands';
import { errorMessage } from './utils';

const VERSION = '0.1.0';

const HELP = `
tabula - Schema-driven code generation

Usage:
  tabula <command> [options]

Commands:
  generate                Generate typed accessor modules from schema files
  init                    Create an example schema and tabula.config.json
  ddl                     Print CREATE TABLE statements for a schema file

Options:
  --help, -h              Show this help message
  --version, -v           Show version number
  --input, -i <path>      Schema file or directory
  --output, -o <dir>      Output directory (generate, init)
  --recursive, -r         Walk input directories recursively (generate)
  --dialect, -d <name>    SQL dialect (ddl)
  --config, -c <file>     Config file (default: tabula.config.json)
  --verbose               Log per-file progress

Examples:
  tabula init
  tabula generate --input ./schema --output ./gen --recursive
  tabula ddl --input ./schema/user.ts --dialect postgresql
`;

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    options: {
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o' },
      recursive: { type: 'boolean', short: 'r' },
      dialect: { type: 'string', short: 'd' },
      config: { type: 'string', short: 'c' },
      verbose: { type: 'boolean' },
    },
    allowPositionals: true,
  });

  const command = positionals[0] ?? '';

  if (values.version) {
    console.log(`tabula v${VERSION}`);
    return 0;
  }

  if (values.help || command === 'help' || !command) {
    console.log(HELP);
    return 0;
  }

  switch (command) {
    case 'generate': {
      return generateCommand({
        input: values.input ?? positionals[1],
        output: values.output,
        recursive: values.recursive,
        config: values.config,
        verbose: values.verbose,
      });
    }

    case 'init': {
      return initCommand({ output: values.output });
    }

    case 'ddl': {
      return ddlCommand({
        input: values.input ?? positionals[1],
        dialect: values.dialect,
        config: values.config,
      });
    }

    default: {
      console.error(`Unknown command: ${command}`);
      console.log('Run "tabula --help" for usage information.');
      return 1;
    }
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
