/**
 * Structured Diagnostics — machine-readable diagnostic types and utilities
 * shared by the validator, the compiler and the CLI.
 *
 * Schema version: 1.0
 */

import { createHash } from 'crypto';
import { SchemaParseError, SchemaValidationError, coreMessage } from './parser/errors.js';
import { tokenLabel } from './parser/parsers.js';

// ---- Types ----

export interface DiagnosticLocation {
  line: number;
  col: number;
  sourceLine?: string;
}

export interface DiagnosticFix {
  description: string;
}

export type DiagnosticSeverity = 'error' | 'warning' | 'info';
export type DiagnosticCategory = 'syntax' | 'semantic' | 'generation';

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  location?: DiagnosticLocation;
  /** Object type the diagnostic belongs to, e.g. `tenant/document` */
  definition?: string;
  fix?: DiagnosticFix;
  category: DiagnosticCategory;
}

export interface DiagnosticResult {
  valid: boolean;
  diagnostics: Diagnostic[];
  summary: { errors: number; warnings: number; info: number };
  source_hash: string;
  schema_version: string;
}

// ---- Constants ----

export const SCHEMA_VERSION = '1.0';

export const DiagnosticCodes = {
  SYNTAX: 'AZ-P001',
  UNEXPECTED_EOF: 'AZ-P002',
  ILLEGAL_CHARACTER: 'AZ-P003',
  DUPLICATE_DEFINITION: 'AZ-S001',
  DUPLICATE_MEMBER: 'AZ-S002',
  UNKNOWN_REFERENCE: 'AZ-W001',
  FORMAT_FAILED: 'AZ-G001',
} as const;

// ---- Factory ----

export function createDiagnostic(
  code: string,
  severity: DiagnosticSeverity,
  message: string,
  category: DiagnosticCategory,
  opts?: {
    location?: DiagnosticLocation;
    definition?: string;
    fix?: DiagnosticFix;
  },
): Diagnostic {
  const d: Diagnostic = { code, severity, message, category };
  if (opts?.location) d.location = opts.location;
  if (opts?.definition) d.definition = opts.definition;
  if (opts?.fix) d.fix = opts.fix;
  return d;
}

// ---- Error Wrapping ----

export function wrapError(err: SchemaParseError | SchemaValidationError): Diagnostic {
  const message = coreMessage(err);
  const location: DiagnosticLocation = { line: err.line, col: err.col };
  if (err.sourceLine !== undefined) location.sourceLine = err.sourceLine;

  if (err instanceof SchemaValidationError) {
    return createDiagnostic(err.code, 'error', message, 'semantic', { location });
  }

  let code: string = DiagnosticCodes.SYNTAX;
  const fix: DiagnosticFix = { description: `Insert ${tokenLabel(err.expected)} at this location` };

  if (err.actual === 'eof') {
    code = DiagnosticCodes.UNEXPECTED_EOF;
    fix.description = 'The schema ends early; close every open definition block';
  } else if (err.actual === 'illegal') {
    code = DiagnosticCodes.ILLEGAL_CHARACTER;
    fix.description = `Remove '${err.token ?? ''}'; names use letters, digits and underscores`;
  }

  return createDiagnostic(code, 'error', message, 'syntax', { location, fix });
}

// ---- Sorting ----

const SEVERITY_ORDER: Record<DiagnosticSeverity, number> = { error: 0, warning: 1, info: 2 };

export function sortDiagnostics(diagnostics: Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort((a, b) => {
    const sevDiff = SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity];
    if (sevDiff !== 0) return sevDiff;
    // diagnostics without a line go last
    const aLine = a.location?.line ?? Infinity;
    const bLine = b.location?.line ?? Infinity;
    if (aLine !== bLine) return aLine - bLine;
    return a.code.localeCompare(b.code);
  });
}

// ---- Result Builder ----

export function buildResult(diagnostics: Diagnostic[], sourceHash: string): DiagnosticResult {
  const sorted = sortDiagnostics(diagnostics);
  const errors = sorted.filter(d => d.severity === 'error').length;
  const warnings = sorted.filter(d => d.severity === 'warning').length;
  const info = sorted.filter(d => d.severity === 'info').length;

  return {
    valid: errors === 0,
    diagnostics: sorted,
    summary: { errors, warnings, info },
    source_hash: sourceHash,
    schema_version: SCHEMA_VERSION,
  };
}

export function hashSource(source: string): string {
  return createHash('sha256').update(source).digest('hex');
}

// ---- CLI Formatter ----

export function formatDiagnosticCLI(d: Diagnostic): string {
  const lines: string[] = [];
  lines.push(`${d.severity}[${d.code}]: ${d.message}`);

  if (d.location) {
    lines.push(`  --> line ${d.location.line}:${d.location.col}`);

    if (d.location.sourceLine !== undefined) {
      lines.push(`    |`);
      lines.push(`${String(d.location.line).padStart(3)} | ${d.location.sourceLine}`);
      lines.push(`    | ${' '.repeat(Math.max(0, d.location.col - 1))}^`);
    }
  } else if (d.definition) {
    lines.push(`  --> ${d.definition}`);
  }

  if (d.fix) {
    lines.push(`  = fix: ${d.fix.description}`);
  }

  return lines.join('\n');
}
