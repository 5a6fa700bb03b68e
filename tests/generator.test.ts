import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { parseSource } from '../src/parser/index.js';
import { extract } from '../src/extractor/index.js';
import type { Schema } from '../src/extractor/types.js';
import {
  generate,
  render,
  sortDefinitions,
  formatSource,
  GenerateError,
  camelcase,
  extractType,
  splitSubject,
  defaultHelpers,
} from '../src/generator/index.js';

function fixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf-8');
}

function schemaOf(source: string): Schema {
  return extract(parseSource(source));
}

const DOC_SCHEMA = 'definition t/doc { relation viewer: t/user | t/group#member permission view = viewer }';

// ---- Helpers ----

describe('template helpers', () => {
  it('camelcase title-cases each word', () => {
    expect(camelcase('parent_folder')).toBe('ParentFolder');
    expect(camelcase('can-view')).toBe('CanView');
    expect(camelcase('two words')).toBe('TwoWords');
    expect(camelcase('VIEW')).toBe('View');
    expect(camelcase('fooBar')).toBe('Foobar');
    expect(camelcase('__')).toBe('');
  });

  it('extractType drops prefix and fragment', () => {
    expect(extractType('tenant/user#member')).toBe('user');
    expect(extractType('tenant/user')).toBe('user');
    expect(extractType('group#member')).toBe('group');
    expect(extractType('user')).toBe('user');
  });

  it('splitSubject separates the subject relation', () => {
    expect(splitSubject('tenant/group#member')).toEqual({ objectType: 'tenant/group', relation: 'member' });
    expect(splitSubject('user')).toEqual({ objectType: 'user' });
  });
});

// ---- Rendering ----

describe('render', () => {
  it('emits the header and package constant', () => {
    const lines = render(schemaOf(DOC_SCHEMA)).split('\n');
    expect(lines.slice(0, 4)).toEqual([
      '// Code generated by authz-codegen. DO NOT EDIT.',
      '// Package: t',
      '',
      "export const PACKAGE = 't';",
    ]);
  });

  it('emits the client contract once', () => {
    const text = render(schemaOf(fixture('docs.zed')));
    expect(text.match(/^export interface AuthzClient \{$/gm)).toHaveLength(1);
    expect(text).toContain('export interface RelationshipTuple {');
  });

  it('emits a subject alias per relation', () => {
    const lines = render(schemaOf(DOC_SCHEMA)).split('\n');
    expect(lines).toContain("export type DocViewerSubject = SubjectRef<'t/user', undefined> | SubjectRef<'t/group', 'member'>;");
  });

  it('emits a resource class with identity members', () => {
    const lines = render(schemaOf(DOC_SCHEMA)).split('\n');
    expect(lines).toContain('export class Doc {');
    expect(lines).toContain("  static readonly objectType = 't/doc';");
    expect(lines).toContain('  constructor(readonly id: string) {}');
    expect(lines).toContain('  static of(id: string): Doc {');
    expect(lines).toContain("  ref(): ObjectRef<'t/doc'> {");
    expect(lines).toContain("  asSubject(): SubjectRef<'t/doc', undefined> {");
    expect(lines).toContain("  subjectSet<R extends string>(relation: R): SubjectRef<'t/doc', R> {");
  });

  it('emits tuple methods per relation', () => {
    const lines = render(schemaOf(DOC_SCHEMA)).split('\n');
    expect(lines).toContain('  async writeViewer(client: AuthzClient, subject: DocViewerSubject): Promise<void> {');
    expect(lines).toContain("    await client.writeRelationships([{ resource: this.ref(), relation: 'viewer', subject }]);");
    expect(lines).toContain('  async deleteViewer(client: AuthzClient, subject: DocViewerSubject): Promise<void> {');
    expect(lines).toContain('  async readViewer(client: AuthzClient): Promise<RelationshipTuple[]> {');
    expect(lines).toContain('  async hasViewer(client: AuthzClient, subject: DocViewerSubject): Promise<boolean> {');
  });

  it('emits check and lookup per permission', () => {
    const lines = render(schemaOf(DOC_SCHEMA)).split('\n');
    expect(lines).toContain('  // permission view = viewer');
    expect(lines).toContain('  async checkView(client: AuthzClient, subject: SubjectRef): Promise<boolean> {');
    expect(lines).toContain("    return client.checkPermission(this.ref(), 'view', subject);");
    expect(lines).toContain('  static async lookupView(client: AuthzClient, subject: SubjectRef): Promise<Doc[]> {');
    expect(lines).toContain("    const ids = await client.lookupResources(Doc.objectType, 'view', subject);");
  });

  it('names classes after camel-cased definition names', () => {
    const text = render(schemaOf('definition org/team_member { relation parent_org: org/org }'));
    expect(text).toContain('export class TeamMember {');
    expect(text).toContain('  async writeParentOrg(client: AuthzClient, subject: TeamMemberParentOrgSubject): Promise<void> {');
  });

  it('documents each class with its declarations', () => {
    const lines = render(schemaOf(fixture('docs.zed'))).split('\n');
    expect(lines).toContain(' * relation viewer: user | group#member');
    expect(lines).toContain(' * permission view = viewer + edit + parent -> view');
  });

  it('uses the supplied helpers', () => {
    const text = render(schemaOf('definition doc {}'), { ...defaultHelpers, camelcase: s => s.toUpperCase() });
    expect(text).toContain('export class DOC {');
  });
});

// ---- Ordering ----

describe('definition ordering', () => {
  it('is byte-identical regardless of input order', () => {
    const forward = render(schemaOf('definition alpha {}\ndefinition beta { relation r: alpha }'));
    const reverse = render(schemaOf('definition beta { relation r: alpha }\ndefinition alpha {}'));
    expect(forward).toBe(reverse);
    expect(forward.indexOf('export class Alpha {')).toBeLessThan(forward.indexOf('export class Beta {'));
  });

  it('qualifies classes that share a name across prefixes', () => {
    const text = render(schemaOf('definition billing/user {}\ndefinition acme/user { relation owner: billing/user }'));
    expect(text).toContain('export class AcmeUser {');
    expect(text).toContain('export class BillingUser {');
    expect(text).toContain("export type AcmeUserOwnerSubject = SubjectRef<'billing/user', undefined>;");
    expect(text).not.toContain('export class User {');
    expect(text.indexOf('export class AcmeUser {')).toBeLessThan(text.indexOf('export class BillingUser {'));
  });

  it('keeps the bare name for an unprefixed definition beside prefixed ones', () => {
    const text = render(schemaOf('definition acme/user {}\ndefinition user {}'));
    expect(text).toContain('export class User {');
    expect(text).toContain('export class AcmeUser {');
  });

  it('leaves unique names unqualified', () => {
    const text = render(schemaOf('definition acme/user {}\ndefinition acme/repo {}'));
    expect(text).toContain('export class User {');
    expect(text).toContain('export class Repo {');
  });

  it('sorts by code unit, then package, without touching the input', () => {
    const defs = [
      { name: 'b', package: 'p', objectType: 'p/b', relations: [], permissions: [] },
      { name: 'a', package: 'z', objectType: 'z/a', relations: [], permissions: [] },
      { name: 'a', package: 'y', objectType: 'y/a', relations: [], permissions: [] },
      { name: 'B', package: 'p', objectType: 'p/B', relations: [], permissions: [] },
    ];
    expect(sortDefinitions(defs).map(d => d.objectType)).toEqual(['p/B', 'y/a', 'z/a', 'p/b']);
    expect(defs.map(d => d.objectType)).toEqual(['p/b', 'z/a', 'y/a', 'p/B']);
  });
});

// ---- Generation errors ----

describe('generation errors', () => {
  it('rejects definitions that still produce the same class', () => {
    const schema = schemaOf('definition doc {}\ndefinition DOC {}');
    expect(() => render(schema)).toThrow(GenerateError);
    expect(() => render(schema)).toThrow("[Generate Error] definition 'doc' and definition 'DOC' both produce 'Doc' in module scope");
  });

  it('rejects relations that produce the same members', () => {
    expect(() => render(schemaOf('definition doc { relation foo_bar: user relation foo__bar: user }'))).toThrow(
      /relation 'doc#foo__bar' and relation 'doc#foo_bar' both produce 'DocFooBarSubject'/,
    );
  });

  it('rejects names that shadow the client contract', () => {
    expect(() => render(schemaOf('definition promise {}'))).toThrow(/both produce 'Promise'/);
  });

  it('rejects names that produce no identifier', () => {
    expect(() => render(schemaOf('definition __ {}'))).toThrow("[Generate Error] definition '__' produces invalid identifier '' in module scope");
  });

  it('records the failing definition', () => {
    try {
      render(schemaOf('definition promise {}'));
    } catch (err) {
      expect(err).toBeInstanceOf(GenerateError);
      if (err instanceof GenerateError) expect(err.definition).toBe('promise');
    }
  });
});

// ---- Formatting ----

describe('formatSource', () => {
  it('reprints valid source', () => {
    expect(formatSource('export const x  =   1')).toEqual({ text: 'export const x = 1;\n', ok: true });
  });

  it('returns invalid source unchanged with the error', () => {
    const result = formatSource('export const broken = ;');
    expect(result.ok).toBe(false);
    expect(result.text).toBe('export const broken = ;');
    expect(result.error).toMatch(/^generated\.ts:1:\d+: /);
  });
});

describe('generate', () => {
  it('formats the rendered source by default', () => {
    const result = generate(schemaOf(fixture('docs.zed')));
    expect(result.formatted).toBe(true);
    expect(result.formatError).toBeUndefined();
    expect(result.content).toMatch(/export class Document \{/);
    expect(result.content).toMatch(/export type DocumentViewerSubject = /);
  });

  it('skips formatting when disabled', () => {
    const schema = schemaOf(DOC_SCHEMA);
    expect(generate(schema, { format: false })).toEqual({ content: render(schema), formatted: false });
  });

  it('falls back to the raw render when formatting fails', () => {
    const schema = schemaOf(DOC_SCHEMA);
    const result = generate(schema, { formatter: text => ({ text, ok: false, error: 'formatter unavailable' }) });
    expect(result).toEqual({ content: render(schema), formatted: false, formatError: 'formatter unavailable' });
  });
});
