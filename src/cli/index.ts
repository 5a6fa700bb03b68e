#!/usr/bin/env node

/**
 * authz-codegen CLI
 *
 * Usage:
 *   authz-codegen schema.zed out/            Generate out/<package>.gen.ts
 *   authz-codegen generate -s schema.zed     Same, with flags
 *   authz-codegen check schema.zed [--json]  Report diagnostics without generating
 */

import { Command } from 'commander';
import { nodeFileSystem } from '../io.js';
import { runCheck, runGenerate, type CheckCommandOptions, type CliIO, type GenerateCommandOptions } from './run.js';

const io: CliIO = { fs: nodeFileSystem, console };

const program = new Command();

program
  .name('authz-codegen')
  .description('Compile authorization schemas into typed TypeScript client code')
  .version('0.1.0');

program
  .command('generate', { isDefault: true })
  .description('Generate <package><ext> from a schema file or a directory of .zed files')
  .argument('[schema]', 'Schema file or directory')
  .argument('[output]', 'Output directory')
  .option('-s, --schema <path>', 'Schema file or directory (required unless given positionally)')
  .option('-o, --output <dir>', 'Output directory (default: ".")')
  .option('-p, --package <name>', 'Package for definitions without a prefix (default: "authz")')
  .option('--ext <extension>', 'Output file extension (default: ".gen.ts")')
  .option('--no-format', 'Emit the generated source without formatting')
  .option('-v, --verbose', 'Log each compiler stage')
  .action((schema: string | undefined, output: string | undefined, options: GenerateCommandOptions) => {
    const positional = [schema, output].filter((arg): arg is string => arg !== undefined);
    const code = runGenerate(positional, options, io);
    if (code !== 0) process.exit(code);
  });

program
  .command('check')
  .description('Parse and validate a schema, reporting every diagnostic')
  .argument('<schema>', 'Schema file or directory')
  .option('--json', 'Print the diagnostics as JSON')
  .action((schema: string, options: CheckCommandOptions) => {
    const code = runCheck(schema, options, io);
    if (code !== 0) process.exit(code);
  });

program.parse();
