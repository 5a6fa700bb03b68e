/**
 * CLI command bodies, kept apart from commander wiring so they can be driven
 * with a fake file system and console. Each returns the process exit code.
 */

import { compileToDirectory } from '../compiler.js';
import { ConfigError, resolveConfig, type GenerateConfig, type GenerateConfigInput } from '../config.js';
import { buildResult, formatDiagnosticCLI, hashSource, wrapError, type Diagnostic } from '../diagnostics.js';
import { SchemaParseError, SchemaValidationError } from '../parser/errors.js';
import { parseSource, sourceLineAt } from '../parser/index.js';
import type { DefinitionNode } from '../parser/types.js';
import { diagnose } from '../validator/index.js';
import { readSchemaInput, type FileSystem } from '../io.js';
import { createConsoleLogger } from '../logger.js';

export interface CliIO {
  fs: FileSystem;
  console: Pick<Console, 'log' | 'error'>;
}

export interface GenerateCommandOptions {
  schema?: string;
  output?: string;
  package?: string;
  ext?: string;
  format?: boolean;
  verbose?: boolean;
}

export const USAGE = 'Usage: authz-codegen [generate] [options] <schema-file|schema-dir> [output-dir]';

/**
 * The first positional is the schema unless `--schema` is given; a second
 * positional is always the output directory and wins over `--output`.
 */
export function toConfigInput(positional: string[], options: GenerateCommandOptions): Partial<GenerateConfigInput> {
  const schema = options.schema ?? positional[0];
  const output = positional[1] ?? options.output;
  return {
    schema,
    output,
    defaultPackage: options.package,
    extension: options.ext,
    format: options.format,
    verbose: options.verbose,
  };
}

export function runGenerate(positional: string[], options: GenerateCommandOptions, io: CliIO): number {
  const out = io.console;
  out.log(`\n  ⚡ authz-codegen generate\n`);

  let config: GenerateConfig;
  try {
    config = resolveConfig(toConfigInput(positional, options));
  } catch (err) {
    if (err instanceof ConfigError) {
      for (const issue of err.issues) out.error(`  ERROR: ${issue}`);
      out.error(`  ${USAGE}\n`);
      return 1;
    }
    throw err;
  }

  const logger = createConsoleLogger({ verbose: config.verbose, console: out });

  try {
    const result = compileToDirectory(config, { fs: io.fs, logger });
    const verb = result.status === 'written' ? 'Generated' : 'Unchanged';
    out.log(`  ✅ ${verb} ${result.outputPath}`);
    out.log(`     → package ${result.packageName}, ${result.stats.definitions} definitions, ${result.stats.outputLines} lines${result.formatted ? '' : ' (unformatted)'}`);
    out.log('');
    return 0;
  } catch (err) {
    reportFailure(err, out);
    return 1;
  }
}

export interface CheckCommandOptions {
  json?: boolean;
}

export function runCheck(path: string, options: CheckCommandOptions, io: CliIO): number {
  const out = io.console;

  let source: string;
  try {
    source = readSchemaInput(path, io.fs).source;
  } catch (err) {
    reportFailure(err, out);
    return 1;
  }

  const diagnostics = checkSource(source);
  const result = buildResult(diagnostics, hashSource(source));

  if (options.json) {
    out.log(JSON.stringify(result, null, 2));
    return result.valid ? 0 : 1;
  }

  out.log(`\n  ⚡ authz-codegen check\n`);
  for (const d of result.diagnostics) {
    out.log(formatDiagnosticCLI(d));
    out.log('');
  }
  if (result.valid) {
    out.log(`  ✅ ${path} is valid (${result.summary.warnings} warnings)\n`);
    return 0;
  }
  out.log(`  FAIL: ${path} has ${result.summary.errors} error(s)\n`);
  return 1;
}

/** Every diagnostic for a source text: the parse error alone, or all validator findings. */
export function checkSource(source: string): Diagnostic[] {
  let definitions: DefinitionNode[];
  try {
    definitions = parseSource(source);
  } catch (err) {
    if (err instanceof SchemaParseError) return [wrapError(err)];
    throw err;
  }

  return diagnose(definitions).map(d => {
    if (!d.location) return d;
    const sourceLine = sourceLineAt(source, d.location.line);
    return sourceLine === undefined ? d : { ...d, location: { ...d.location, sourceLine } };
  });
}

function reportFailure(err: unknown, out: Pick<Console, 'error'>): void {
  if (err instanceof SchemaParseError || err instanceof SchemaValidationError) {
    out.error(formatDiagnosticCLI(wrapError(err)));
    out.error('');
    return;
  }
  out.error(`  ERROR: ${err instanceof Error ? err.message : String(err)}\n`);
}
