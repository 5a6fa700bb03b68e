/**
 * Schema Parser
 *
 * Parses a token stream into definition nodes.
 * Architecture: Tokenizer → Token Stream → Recursive Descent → AST
 */

import { SchemaParseError } from './errors.js';
import { tokenize, type Token } from './lexer.js';
import { TokenStream, parseDefinition } from './parsers.js';
import type { DefinitionNode } from './types.js';

/** document := definition* EOF */
export function parse(tokens: readonly Token[]): DefinitionNode[] {
  const s = new TokenStream(tokens);
  const definitions: DefinitionNode[] = [];
  while (!s.isEof()) {
    definitions.push(parseDefinition(s));
  }
  return definitions;
}

/** Tokenize and parse; parse errors get the offending source line attached. */
export function parseSource(source: string): DefinitionNode[] {
  try {
    return parse(tokenize(source));
  } catch (err) {
    if (err instanceof SchemaParseError) {
      err.sourceLine = sourceLineAt(source, err.line);
    }
    throw err;
  }
}

export function sourceLineAt(source: string, line: number): string | undefined {
  return source.split('\n')[line - 1]?.replace(/\r$/, '');
}
