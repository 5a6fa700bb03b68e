/**
 * Schema Compiler — Orchestrator
 *
 * compile(): Lex → Parse → Validate → Extract → Generate, pure and synchronous.
 * compileToDirectory(): reads the schema, compiles, and writes
 * `<output>/<package><extension>` through an injected FileSystem.
 *
 * Any stage failure short-circuits the rest; the artifact is only written
 * after generation succeeds.
 */

import { join } from 'path';
import { tokenize, type Token } from './parser/lexer.js';
import type { DefinitionNode } from './parser/types.js';
import { parse, sourceLineAt } from './parser/index.js';
import { SchemaParseError, SchemaValidationError } from './parser/errors.js';
import { validate } from './validator/index.js';
import { extract } from './extractor/index.js';
import type { Schema } from './extractor/types.js';
import { generate, type FormatResult } from './generator/index.js';
import type { Diagnostic } from './diagnostics.js';
import { DiagnosticCodes, createDiagnostic } from './diagnostics.js';
import type { GenerateConfig } from './config.js';
import type { FileSystem, WriteStatus } from './io.js';
import { readSchemaInput, writeArtifact } from './io.js';
import type { Logger } from './logger.js';

export interface CompileOptions {
  /** Package for unprefixed definitions (default: 'authz') */
  defaultPackage?: string;
  /** Format the generated source (default: true) */
  format?: boolean;
  /** Replaces the TypeScript printer */
  formatter?: (text: string) => FormatResult;
  /** Checked between stages */
  signal?: AbortSignal;
}

export interface CompileStats {
  tokens: number;
  definitions: number;
  relations: number;
  permissions: number;
  outputLines: number;
  timing: {
    lexMs: number;
    parseMs: number;
    extractMs: number;
    generateMs: number;
    totalMs: number;
  };
}

export interface CompileResult {
  packageName: string;
  schema: Schema;
  content: string;
  formatted: boolean;
  /** Non-fatal findings: validator warnings and formatting failures */
  diagnostics: Diagnostic[];
  stats: CompileStats;
}

export function compile(source: string, options: CompileOptions = {}): CompileResult {
  const { signal } = options;
  const t0 = performance.now();

  signal?.throwIfAborted();
  const tokens = tokenize(source);
  const t1 = performance.now();

  signal?.throwIfAborted();
  const checked = parseAndValidate(tokens, source);
  const definitions = checked.definitions;
  let diagnostics = checked.diagnostics;
  const t2 = performance.now();

  signal?.throwIfAborted();
  const schema = extract(definitions, { defaultPackage: options.defaultPackage });
  const t3 = performance.now();

  signal?.throwIfAborted();
  const output = generate(schema, { format: options.format, formatter: options.formatter });
  const t4 = performance.now();

  if (output.formatError !== undefined) {
    diagnostics = [
      ...diagnostics,
      createDiagnostic(DiagnosticCodes.FORMAT_FAILED, 'warning', `Generated source could not be formatted; emitted unformatted: ${output.formatError}`, 'generation'),
    ];
  }

  return {
    packageName: schema.packageName,
    schema,
    content: output.content,
    formatted: output.formatted,
    diagnostics,
    stats: {
      tokens: tokens.length,
      definitions: schema.definitions.length,
      relations: schema.definitions.reduce((n, d) => n + d.relations.length, 0),
      permissions: schema.definitions.reduce((n, d) => n + d.permissions.length, 0),
      outputLines: output.content.split('\n').length,
      timing: {
        lexMs: round(t1 - t0),
        parseMs: round(t2 - t1),
        extractMs: round(t3 - t2),
        generateMs: round(t4 - t3),
        totalMs: round(t4 - t0),
      },
    },
  };
}

function parseAndValidate(tokens: Token[], source: string): { definitions: DefinitionNode[]; diagnostics: Diagnostic[] } {
  try {
    const definitions = parse(tokens);
    return { definitions, diagnostics: validate(definitions) };
  } catch (err) {
    if (err instanceof SchemaParseError || err instanceof SchemaValidationError) {
      err.sourceLine = sourceLineAt(source, err.line);
    }
    throw err;
  }
}

function round(ms: number): number {
  return Math.round(ms * 100) / 100;
}

// ---- Orchestration ----

export interface CompileDeps {
  fs: FileSystem;
  logger: Logger;
  signal?: AbortSignal;
}

export interface CompileToDirectoryResult extends CompileResult {
  outputPath: string;
  status: WriteStatus;
}

export function compileToDirectory(config: GenerateConfig, deps: CompileDeps): CompileToDirectoryResult {
  const { fs, logger } = deps;

  logger.debug('Reading schema', { path: config.schema });
  const input = readSchemaInput(config.schema, fs);
  logger.debug('Schema read', { files: input.files.length, chars: input.source.length });

  const result = compile(input.source, {
    defaultPackage: config.defaultPackage,
    format: config.format,
    signal: deps.signal,
  });
  logger.debug('Schema compiled', {
    tokens: result.stats.tokens,
    definitions: result.stats.definitions,
    relations: result.stats.relations,
    permissions: result.stats.permissions,
    ms: result.stats.timing.totalMs,
  });

  for (const d of result.diagnostics) {
    logger.warn(`${d.code}: ${d.message}`, { line: d.location?.line });
  }

  const outputPath = join(config.output, `${result.packageName}${config.extension}`);
  const status = writeArtifact(outputPath, result.content, fs);
  logger.debug(status === 'written' ? 'Artifact written' : 'Artifact unchanged', {
    package: result.packageName,
    output: outputPath,
  });

  return { ...result, outputPath, status };
}
