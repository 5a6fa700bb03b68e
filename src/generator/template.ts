/**
 * Code Template
 *
 * Renders the whole schema into one TypeScript module: the client contract
 * shared by every resource, then one subject alias per relation and one
 * resource class per definition.
 *
 * Output is unformatted; see format.ts.
 */

import type { Definition, Permission, Relation } from '../extractor/types.js';
import { GenerateError } from './errors.js';
import type { TemplateHelpers } from './helpers.js';

export interface TemplateData {
  packageName: string;
  /** Already in output order */
  definitions: readonly Definition[];
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

const PRELUDE_NAMES = [
  'PACKAGE',
  'ObjectRef',
  'SubjectRef',
  'RelationshipTuple',
  'RelationshipFilter',
  'AuthzClient',
  'Promise',
];

const PRELUDE = `export interface ObjectRef<T extends string = string> {
  objectType: T;
  objectId: string;
}

export interface SubjectRef<T extends string = string, R extends string | undefined = string | undefined> {
  object: ObjectRef<T>;
  optionalRelation: R;
}

export interface RelationshipTuple {
  resource: ObjectRef;
  relation: string;
  subject: SubjectRef;
}

export interface RelationshipFilter {
  resourceType: string;
  resourceId?: string;
  relation?: string;
}

/** Transport to the permission service; implement over the client library in use. */
export interface AuthzClient {
  writeRelationships(tuples: RelationshipTuple[]): Promise<void>;
  deleteRelationships(tuples: RelationshipTuple[]): Promise<void>;
  readRelationships(filter: RelationshipFilter): Promise<RelationshipTuple[]>;
  checkPermission(resource: ObjectRef, permission: string, subject: SubjectRef): Promise<boolean>;
  lookupResources(resourceType: string, permission: string, subject: SubjectRef): Promise<string[]>;
}`;

/** Tracks generated identifiers so collisions fail loudly instead of emitting code that cannot compile. */
class NameScope {
  private names = new Map<string, string>();

  constructor(private readonly scope: string) {}

  claim(name: string, owner: string, definition?: string): string {
    if (!IDENTIFIER.test(name)) {
      throw new GenerateError(`${owner} produces invalid identifier '${name}' in ${this.scope}`, definition);
    }
    const previous = this.names.get(name);
    if (previous !== undefined) {
      throw new GenerateError(`${owner} and ${previous} both produce '${name}' in ${this.scope}`, definition);
    }
    this.names.set(name, owner);
    return name;
  }
}

export function renderTemplate(data: TemplateData, helpers: TemplateHelpers): string {
  const lines: string[] = [];
  const moduleScope = new NameScope('module scope');
  for (const name of PRELUDE_NAMES) moduleScope.claim(name, `built-in '${name}'`);

  lines.push('// Code generated by authz-codegen. DO NOT EDIT.');
  lines.push(`// Package: ${data.packageName}`);
  lines.push('');
  lines.push(`export const PACKAGE = ${quote(data.packageName)};`);
  lines.push('');
  lines.push(PRELUDE);

  const shared = sharedClassNames(data.definitions, helpers);
  for (const def of data.definitions) {
    lines.push('');
    renderDefinition(def, lines, moduleScope, shared, helpers);
  }

  lines.push('');
  return lines.join('\n');
}

/** Bare class names that more than one definition would produce. */
function sharedClassNames(definitions: readonly Definition[], h: TemplateHelpers): Set<string> {
  const counts = new Map<string, number>();
  for (const def of definitions) {
    const name = h.camelcase(h.extractType(def.objectType));
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return new Set([...counts].filter(([, n]) => n > 1).map(([name]) => name));
}

/** `User`, or `AcmeUser` for `acme/user` when another definition also yields `User`. */
function classNameFor(def: Definition, shared: Set<string>, h: TemplateHelpers): string {
  const bare = h.camelcase(h.extractType(def.objectType));
  const slash = def.objectType.indexOf('/');
  if (!shared.has(bare) || slash === -1) return bare;
  return h.camelcase(def.objectType.slice(0, slash)) + bare;
}

function renderDefinition(
  def: Definition,
  lines: string[],
  moduleScope: NameScope,
  shared: Set<string>,
  h: TemplateHelpers,
): void {
  const owner = `definition '${def.objectType}'`;
  const className = moduleScope.claim(classNameFor(def, shared, h), owner, def.objectType);
  const typeLiteral = quote(def.objectType);
  const members = new NameScope(`class ${className}`);

  // Subject aliases come first so the class body can name them
  const subjectAliases = new Map<Relation, string>();
  for (const rel of def.relations) {
    const alias = moduleScope.claim(`${className}${h.camelcase(rel.name)}Subject`, `relation '${def.objectType}#${rel.name}'`, def.objectType);
    subjectAliases.set(rel, alias);
    const subjects = rel.types.map(type => {
      const { objectType, relation } = h.splitSubject(type);
      return `SubjectRef<${quote(objectType)}, ${relation === undefined ? 'undefined' : quote(relation)}>`;
    });
    lines.push(`/** Subjects allowed on ${def.objectType}#${rel.name}: ${rel.types.join(' | ')} */`);
    lines.push(`export type ${alias} = ${subjects.join(' | ')};`);
    lines.push('');
  }

  lines.push('/**');
  lines.push(` * ${def.objectType}`);
  if (def.relations.length > 0 || def.permissions.length > 0) {
    lines.push(' *');
    for (const rel of def.relations) lines.push(` * relation ${rel.name}: ${rel.types.join(' | ')}`);
    for (const perm of def.permissions) lines.push(` * permission ${perm.name} = ${perm.expressionText}`);
  }
  lines.push(' */');
  lines.push(`export class ${className} {`);
  lines.push(`  static readonly objectType = ${typeLiteral};`);
  lines.push('');
  lines.push('  constructor(readonly id: string) {}');
  lines.push('');
  lines.push(`  static of(id: string): ${className} {`);
  lines.push(`    return new ${className}(id);`);
  lines.push('  }');
  lines.push('');
  lines.push(`  ref(): ObjectRef<${typeLiteral}> {`);
  lines.push(`    return { objectType: ${className}.objectType, objectId: this.id };`);
  lines.push('  }');
  lines.push('');
  lines.push(`  asSubject(): SubjectRef<${typeLiteral}, undefined> {`);
  lines.push('    return { object: this.ref(), optionalRelation: undefined };');
  lines.push('  }');
  lines.push('');
  lines.push(`  subjectSet<R extends string>(relation: R): SubjectRef<${typeLiteral}, R> {`);
  lines.push('    return { object: this.ref(), optionalRelation: relation };');
  lines.push('  }');

  for (const rel of def.relations) {
    const alias = subjectAliases.get(rel) ?? 'SubjectRef';
    renderRelation(rel, alias, className, def, lines, members, h);
  }
  for (const perm of def.permissions) {
    renderPermission(perm, className, def, lines, members, h);
  }

  lines.push('}');
}

function renderRelation(
  rel: Relation,
  subjectType: string,
  className: string,
  def: Definition,
  lines: string[],
  members: NameScope,
  h: TemplateHelpers,
): void {
  const owner = `relation '${rel.name}'`;
  const suffix = h.camelcase(rel.name);
  const name = quote(rel.name);

  lines.push('');
  lines.push(`  // relation ${rel.name}: ${rel.types.join(' | ')}`);
  lines.push('');
  lines.push(`  async ${members.claim(`write${suffix}`, owner, def.objectType)}(client: AuthzClient, subject: ${subjectType}): Promise<void> {`);
  lines.push(`    await client.writeRelationships([{ resource: this.ref(), relation: ${name}, subject }]);`);
  lines.push('  }');
  lines.push('');
  lines.push(`  async ${members.claim(`delete${suffix}`, owner, def.objectType)}(client: AuthzClient, subject: ${subjectType}): Promise<void> {`);
  lines.push(`    await client.deleteRelationships([{ resource: this.ref(), relation: ${name}, subject }]);`);
  lines.push('  }');
  lines.push('');
  lines.push(`  async ${members.claim(`read${suffix}`, owner, def.objectType)}(client: AuthzClient): Promise<RelationshipTuple[]> {`);
  lines.push(`    return client.readRelationships({ resourceType: ${className}.objectType, resourceId: this.id, relation: ${name} });`);
  lines.push('  }');
  lines.push('');
  lines.push(`  async ${members.claim(`has${suffix}`, owner, def.objectType)}(client: AuthzClient, subject: ${subjectType}): Promise<boolean> {`);
  lines.push(`    return client.checkPermission(this.ref(), ${name}, subject);`);
  lines.push('  }');
}

function renderPermission(
  perm: Permission,
  className: string,
  def: Definition,
  lines: string[],
  members: NameScope,
  h: TemplateHelpers,
): void {
  const owner = `permission '${perm.name}'`;
  const suffix = h.camelcase(perm.name);
  const name = quote(perm.name);

  lines.push('');
  lines.push(`  // permission ${perm.name} = ${perm.expressionText}`);
  lines.push('');
  lines.push(`  async ${members.claim(`check${suffix}`, owner, def.objectType)}(client: AuthzClient, subject: SubjectRef): Promise<boolean> {`);
  lines.push(`    return client.checkPermission(this.ref(), ${name}, subject);`);
  lines.push('  }');
  lines.push('');
  lines.push(`  static async ${members.claim(`lookup${suffix}`, owner, def.objectType)}(client: AuthzClient, subject: SubjectRef): Promise<${className}[]> {`);
  lines.push(`    const ids = await client.lookupResources(${className}.objectType, ${name}, subject);`);
  lines.push(`    return ids.map((id) => new ${className}(id));`);
  lines.push('  }');
}

function quote(s: string): string {
  return `'${s.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}
