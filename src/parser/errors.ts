/**
 * Schema Parser Error Types
 *
 * Structured errors with exact line/col info for user-facing diagnostics.
 */

import type { TokenKind } from './lexer.js';

export interface SchemaErrorContext {
  line: number;
  col: number;
  sourceLine?: string;
  token?: string;
}

export interface SchemaParseErrorContext extends SchemaErrorContext {
  expected: TokenKind;
  actual: TokenKind;
}

export class SchemaParseError extends Error {
  readonly line: number;
  readonly col: number;
  readonly expected: TokenKind;
  readonly actual: TokenKind;
  readonly token?: string;
  sourceLine?: string;

  constructor(message: string, ctx: SchemaParseErrorContext) {
    super(`[Schema Parse Error] Line ${ctx.line}:${ctx.col}: ${message}`);
    this.name = 'SchemaParseError';
    this.line = ctx.line;
    this.col = ctx.col;
    this.expected = ctx.expected;
    this.actual = ctx.actual;
    this.token = ctx.token;
    this.sourceLine = ctx.sourceLine;
  }
}

/** Validation error codes and messages come from the validator's diagnostics. */
export class SchemaValidationError extends Error {
  readonly code: string;
  readonly line: number;
  readonly col: number;
  sourceLine?: string;

  constructor(code: string, message: string, ctx: SchemaErrorContext) {
    super(`[Schema Validation Error] Line ${ctx.line}:${ctx.col}: ${message}`);
    this.name = 'SchemaValidationError';
    this.code = code;
    this.line = ctx.line;
    this.col = ctx.col;
    this.sourceLine = ctx.sourceLine;
  }
}

/** Strip the `[Schema ... Error] Line L:C: ` prefix. */
export function coreMessage(err: SchemaParseError | SchemaValidationError): string {
  return err.message.replace(/^\[Schema [A-Za-z]+ Error\] Line \d+:\d+: /, '');
}
