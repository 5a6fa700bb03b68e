/**
 * Schema Declaration Parsers — recursive-descent parsers for definitions,
 * relations and permissions.
 *
 * One token of lookahead. The first error aborts the parse; no partial AST
 * is returned.
 */

import type { Token, TokenKind } from './lexer.js';
import { SchemaParseError } from './errors.js';
import type {
  DefinitionNode,
  ObjectTypeRef,
  PermissionExpr,
  PermissionNode,
  RelationExpr,
  RelationNode,
  SingleRelation,
} from './types.js';
import { objectTypeName } from './types.js';

const TOKEN_LABELS: Record<TokenKind, string> = {
  eof: 'end of input',
  illegal: 'illegal character',
  identifier: 'identifier',
  definition: "'definition'",
  relation: "'relation'",
  permission: "'permission'",
  equal: "'='",
  plus: "'+'",
  minus: "'-'",
  pipe: "'|'",
  wildcard: "'*'",
  open_brace: "'{'",
  close_brace: "'}'",
  colon: "':'",
  slash: "'/'",
  hash: "'#'",
  arrow: "'->'",
};

export function tokenLabel(kind: TokenKind): string {
  return TOKEN_LABELS[kind];
}

/** Human description of an actual token, with its literal where that adds anything. */
export function describeToken(t: Token): string {
  if (t.kind === 'identifier' || t.kind === 'illegal') {
    return `${TOKEN_LABELS[t.kind]} '${t.value}'`;
  }
  return TOKEN_LABELS[t.kind];
}

function mismatchContext(expected: TokenKind, actual: TokenKind): string {
  if (actual === 'eof' && expected !== 'eof') return 'unexpected end of input';
  if (actual === 'illegal') return 'illegal character';
  if (expected === 'open_brace' && actual === 'identifier') return 'missing opening brace';
  if (expected === 'slash' && actual === 'identifier') return 'missing slash in prefixed object type';
  if (expected === 'close_brace') return 'missing closing brace';
  return 'token mismatch';
}

// ---- Token Stream ----

export class TokenStream {
  private tokens: readonly Token[];
  private pos = 0;

  constructor(tokens: readonly Token[]) {
    const last = tokens[tokens.length - 1];
    if (last && last.kind === 'eof') {
      this.tokens = tokens;
    } else {
      this.tokens = [
        ...tokens,
        { kind: 'eof', value: '', line: last?.line ?? 1, col: last ? last.col + last.value.length : 1 },
      ];
    }
  }

  peek(offset = 0): Token {
    const idx = this.pos + offset;
    if (idx >= this.tokens.length) return this.tokens[this.tokens.length - 1];
    return this.tokens[idx];
  }

  current(): Token {
    return this.peek();
  }

  advance(): Token {
    const t = this.tokens[this.pos];
    if (this.pos < this.tokens.length - 1) this.pos++;
    return t;
  }

  /** Consume a token of `kind` or throw; `where` is appended to the expectation, e.g. "after relation name 'r'". */
  expect(kind: TokenKind, where?: string): Token {
    if (this.is(kind)) return this.advance();
    const target = where ? `${TOKEN_LABELS[kind]} ${where}` : TOKEN_LABELS[kind];
    throw this.error(kind, `expected ${target}, got ${describeToken(this.current())}`);
  }

  match(kind: TokenKind): boolean {
    if (this.is(kind)) {
      this.advance();
      return true;
    }
    return false;
  }

  is(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  isEof(): boolean {
    return this.is('eof');
  }

  error(expected: TokenKind, detail: string): SchemaParseError {
    const t = this.current();
    return new SchemaParseError(`${mismatchContext(expected, t.kind)}: ${detail}`, {
      line: t.line,
      col: t.col,
      expected,
      actual: t.kind,
      token: t.value,
    });
  }
}

// ---- Definitions ----

export function parseDefinition(s: TokenStream): DefinitionNode {
  const keyword = s.expect('definition', 'at top level');
  const objectType = parseObjectType(s);
  const typeName = objectTypeName(objectType);

  s.expect('open_brace', `after object type '${typeName}'`);

  const def: DefinitionNode = {
    kind: 'definition',
    objectType,
    relations: [],
    permissions: [],
    position: { line: keyword.line, col: keyword.col },
  };

  for (;;) {
    if (s.is('relation')) {
      def.relations.push(parseRelation(s));
    } else if (s.is('permission')) {
      def.permissions.push(parsePermission(s));
    } else {
      break;
    }
  }

  s.expect('close_brace', `to close definition '${typeName}'`);
  return def;
}

function parseObjectType(s: TokenStream): ObjectTypeRef {
  const first = s.expect('identifier', "after 'definition'");

  if (s.is('slash')) {
    s.advance();
    const name = s.expect('identifier', `after '${first.value}/'`);
    return { name: name.value, prefix: first.value };
  }

  if (s.is('open_brace')) {
    return { name: first.value, prefix: '' };
  }

  throw s.error(
    'open_brace',
    `expected '/' (prefix/name form) or '{' (bare form) after identifier '${first.value}', got ${describeToken(s.current())}`,
  );
}

// ---- Relations ----

export function parseRelation(s: TokenStream): RelationNode {
  const keyword = s.expect('relation');
  const name = s.expect('identifier', "after 'relation'").value;
  s.expect('colon', `after relation name '${name}'`);
  const expression = parseRelationExpr(s, name);
  return { kind: 'relation', name, expression, position: { line: keyword.line, col: keyword.col } };
}

export function parseRelationExpr(s: TokenStream, relationName: string): RelationExpr {
  let left: RelationExpr = parseSingleRelation(s, relationName);
  while (s.match('pipe')) {
    const right = parseSingleRelation(s, relationName);
    left = { kind: 'union', left, right };
  }
  return left;
}

function parseSingleRelation(s: TokenStream, relationName: string): SingleRelation {
  let typeValue = s.expect('identifier', `as subject type of relation '${relationName}'`).value;

  if (s.match('slash')) {
    const name = s.expect('identifier', `after '${typeValue}/'`);
    typeValue += '/' + name.value;
  }

  if (s.match('hash')) {
    const fragment = s.expect('identifier', `after '${typeValue}#'`);
    return { kind: 'single', typeValue, subjectFragment: fragment.value };
  }

  return { kind: 'single', typeValue };
}

// ---- Permissions ----

export function parsePermission(s: TokenStream): PermissionNode {
  const keyword = s.expect('permission');
  const name = s.expect('identifier', "after 'permission'").value;
  s.expect('equal', `after permission name '${name}'`);
  const expression = parsePermissionExpr(s, name);
  return { kind: 'permission', name, expression, position: { line: keyword.line, col: keyword.col } };
}

/** permExpr := primary ("+" primary)* */
export function parsePermissionExpr(s: TokenStream, permissionName: string): PermissionExpr {
  let left = parsePrimary(s, permissionName);
  while (s.is('plus')) {
    s.advance();
    const right = parsePrimary(s, permissionName);
    left = { kind: 'binary', operator: '+', left, right };
  }
  return left;
}

/** primary := IDENT ("->" IDENT)* */
function parsePrimary(s: TokenStream, permissionName: string): PermissionExpr {
  const first = s.expect('identifier', `in permission '${permissionName}'`);
  let left: PermissionExpr = { kind: 'identifier', name: first.value };
  while (s.is('arrow')) {
    s.advance();
    const right = s.expect('identifier', `after '->' in permission '${permissionName}'`);
    left = { kind: 'binary', operator: '->', left, right: { kind: 'identifier', name: right.value } };
  }
  return left;
}
