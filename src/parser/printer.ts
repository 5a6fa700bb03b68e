/**
 * Canonical text for expression trees.
 *
 * Operators are surrounded by single spaces and printed left to right with no
 * parentheses; the grammar's precedence makes the result re-parse to the
 * same tree.
 */

import type { PermissionExpr, RelationExpr, SingleRelation } from './types.js';

export function printSubjectType(node: SingleRelation): string {
  return node.subjectFragment ? `${node.typeValue}#${node.subjectFragment}` : node.typeValue;
}

export function printRelationExpr(expr: RelationExpr): string {
  switch (expr.kind) {
    case 'single':
      return printSubjectType(expr);
    case 'union':
      return `${printRelationExpr(expr.left)} | ${printRelationExpr(expr.right)}`;
    default:
      return assertNever(expr);
  }
}

export function printPermissionExpr(expr: PermissionExpr): string {
  switch (expr.kind) {
    case 'identifier':
      return expr.name;
    case 'binary':
      return `${printPermissionExpr(expr.left)} ${expr.operator} ${printPermissionExpr(expr.right)}`;
    default:
      return assertNever(expr);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled node: ${JSON.stringify(value)}`);
}
