/**
 * authz-codegen — authorization schema compiler
 *
 * Parses relationship-based authorization schemas (`definition` blocks with
 * relations and permissions) and generates typed TypeScript client code.
 */

export { tokenize, Lexer } from './parser/lexer.js';
export type { Token, TokenKind } from './parser/lexer.js';
export { parse, parseSource } from './parser/index.js';
export { printRelationExpr, printPermissionExpr } from './parser/printer.js';
export { SchemaParseError, SchemaValidationError } from './parser/errors.js';
export type {
  DefinitionNode,
  RelationNode,
  PermissionNode,
  RelationExpr,
  SingleRelation,
  UnionRelation,
  PermissionExpr,
  IdentifierExpr,
  BinaryOpExpr,
  PermissionOperator,
  ObjectTypeRef,
  SourcePosition,
} from './parser/types.js';
export { validate, diagnose } from './validator/index.js';
export { extract, DEFAULT_PACKAGE } from './extractor/index.js';
export type { Schema, Definition, Relation, Permission } from './extractor/index.js';
export { generate, render, sortDefinitions, formatSource, GenerateError, defaultHelpers } from './generator/index.js';
export type { GenerateOptions, GenerateResult, TemplateHelpers } from './generator/index.js';
export { compile, compileToDirectory } from './compiler.js';
export type { CompileOptions, CompileResult, CompileStats } from './compiler.js';
export { resolveConfig, ConfigError, GenerateConfigSchema } from './config.js';
export type { GenerateConfig } from './config.js';
export { nodeFileSystem, SchemaIOError } from './io.js';
export type { FileSystem } from './io.js';
export { createConsoleLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export type { Diagnostic, DiagnosticResult } from './diagnostics.js';
export { buildResult, hashSource, wrapError, sortDiagnostics, formatDiagnosticCLI, DiagnosticCodes, SCHEMA_VERSION } from './diagnostics.js';
