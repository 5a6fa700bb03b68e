/**
 * Code Generator — Orchestrator
 *
 * Schema → template → (optional) canonical formatting.
 *
 * Pure function — no file I/O.
 */

import type { Definition, Schema } from '../extractor/types.js';
import { formatSource, type FormatResult } from './format.js';
import { defaultHelpers, type TemplateHelpers } from './helpers.js';
import { renderTemplate } from './template.js';

export { formatSource, type FormatResult } from './format.js';
export { GenerateError } from './errors.js';
export { camelcase, extractType, splitSubject, defaultHelpers, type TemplateHelpers } from './helpers.js';

export interface GenerateOptions {
  /** Run the output through the formatter (default: true) */
  format?: boolean;
  helpers?: TemplateHelpers;
  formatter?: (text: string) => FormatResult;
}

export interface GenerateResult {
  content: string;
  formatted: boolean;
  /** Set when formatting was attempted and failed; content is then the raw render */
  formatError?: string;
}

/** Name order (code units), package as tie-break; the input is left untouched. */
export function sortDefinitions(definitions: readonly Definition[]): Definition[] {
  return [...definitions].sort((a, b) => compare(a.name, b.name) || compare(a.package, b.package));
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function render(schema: Schema, helpers: TemplateHelpers = defaultHelpers): string {
  return renderTemplate(
    { packageName: schema.packageName, definitions: sortDefinitions(schema.definitions) },
    helpers,
  );
}

export function generate(schema: Schema, options: GenerateOptions = {}): GenerateResult {
  const raw = render(schema, options.helpers);
  if (options.format === false) {
    return { content: raw, formatted: false };
  }

  const result = (options.formatter ?? formatSource)(raw);
  if (!result.ok) {
    return { content: raw, formatted: false, formatError: result.error };
  }
  return { content: result.text, formatted: true };
}
