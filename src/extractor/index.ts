/**
 * Extract the semantic Schema from parsed definitions.
 * Walks every definition once and flattens expressions for the code generator.
 */

import type { DefinitionNode, RelationExpr } from '../parser/types.js';
import { objectTypeName } from '../parser/types.js';
import { assertNever, printPermissionExpr, printSubjectType } from '../parser/printer.js';
import type { Definition, Relation, Schema } from './types.js';

export type { Definition, Permission, Relation, Schema } from './types.js';

export const DEFAULT_PACKAGE = 'authz';

export interface ExtractOptions {
  /** Package for definitions without a prefix (default: 'authz') */
  defaultPackage?: string;
}

export function extract(definitions: readonly DefinitionNode[], options: ExtractOptions = {}): Schema {
  const defaultPackage = options.defaultPackage ?? DEFAULT_PACKAGE;
  const extracted = definitions.map(def => extractDefinition(def, defaultPackage));

  // One package per generated unit, named after the first definition only
  const packageName = extracted.length > 0 ? extracted[0].package : defaultPackage;

  return { packageName, definitions: extracted };
}

function extractDefinition(def: DefinitionNode, defaultPackage: string): Definition {
  return {
    name: def.objectType.name,
    package: def.objectType.prefix || defaultPackage,
    objectType: objectTypeName(def.objectType),
    relations: def.relations.map(rel => {
      const types = flattenRelationTypes(rel.expression);
      const relation: Relation = { name: rel.name, types, isUnion: types.length > 1 };
      return relation;
    }),
    permissions: def.permissions.map(perm => ({
      name: perm.name,
      expressionText: printPermissionExpr(perm.expression),
    })),
  };
}

/** Left-to-right leaves of a union chain. */
export function flattenRelationTypes(expr: RelationExpr): string[] {
  switch (expr.kind) {
    case 'single':
      return [printSubjectType(expr)];
    case 'union':
      return [...flattenRelationTypes(expr.left), ...flattenRelationTypes(expr.right)];
    default:
      return assertNever(expr);
  }
}
