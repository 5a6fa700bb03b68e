/**
 * Semantic model — the flat, generator-facing view of a compiled schema.
 */

export interface Relation {
  name: string;
  /** Flattened subject types in source order, each `type` or `type#fragment` */
  types: string[];
  isUnion: boolean;
}

export interface Permission {
  name: string;
  expressionText: string;
}

export interface Definition {
  name: string;
  package: string;
  /** Full object type as written: `prefix/name` or `name` */
  objectType: string;
  relations: Relation[];
  permissions: Permission[];
}

export interface Schema {
  /** Package of the first definition; shared by every definition in the unit */
  packageName: string;
  definitions: Definition[];
}
