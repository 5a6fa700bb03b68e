/**
 * Schema Abstract Syntax Tree type definitions
 */

export interface SourcePosition {
  line: number;
  col: number;
}

// ---- Object Types ----

/** `user` has an empty prefix; `tenant/user` has prefix `tenant`. */
export interface ObjectTypeRef {
  name: string;
  prefix: string;
}

// ---- Relation Expressions ----

export type RelationExpr = SingleRelation | UnionRelation;

export interface SingleRelation {
  kind: 'single';
  /** Subject type, including its prefix when present (`tenant/user`) */
  typeValue: string;
  /** Subject relation after `#`, e.g. `member` in `group#member` */
  subjectFragment?: string;
}

export interface UnionRelation {
  kind: 'union';
  left: RelationExpr;
  right: RelationExpr;
}

// ---- Permission Expressions ----

export type PermissionOperator = '+' | '->';

export type PermissionExpr = IdentifierExpr | BinaryOpExpr;

export interface IdentifierExpr {
  kind: 'identifier';
  name: string;
}

/** `+` unions both sides; `->` walks the left relation, then evaluates the right on its targets. */
export interface BinaryOpExpr {
  kind: 'binary';
  operator: PermissionOperator;
  left: PermissionExpr;
  right: PermissionExpr;
}

// ---- Declarations ----

export interface RelationNode {
  kind: 'relation';
  name: string;
  expression: RelationExpr;
  position: SourcePosition;
}

export interface PermissionNode {
  kind: 'permission';
  name: string;
  expression: PermissionExpr;
  position: SourcePosition;
}

export interface DefinitionNode {
  kind: 'definition';
  objectType: ObjectTypeRef;
  relations: RelationNode[];
  permissions: PermissionNode[];
  position: SourcePosition;
}

export function objectTypeName(ref: ObjectTypeRef): string {
  return ref.prefix ? `${ref.prefix}/${ref.name}` : ref.name;
}
