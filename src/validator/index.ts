/**
 * Schema Validator
 *
 * Checks parsed definitions for problems the grammar cannot express:
 * duplicate declarations (errors) and permission operands that name nothing
 * in their definition (warnings). Arrow targets live on other object types
 * and are not checked.
 */

import type { DefinitionNode, PermissionExpr } from '../parser/types.js';
import { objectTypeName } from '../parser/types.js';
import { SchemaValidationError } from '../parser/errors.js';
import { assertNever } from '../parser/printer.js';
import type { Diagnostic } from '../diagnostics.js';
import { DiagnosticCodes, createDiagnostic, sortDiagnostics } from '../diagnostics.js';

/**
 * Produce structured diagnostics for a parsed document, in source order.
 */
export function diagnose(definitions: readonly DefinitionNode[]): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const seenDefinitions = new Set<string>();

  for (const def of definitions) {
    const typeName = objectTypeName(def.objectType);

    // S001: duplicate definition
    if (seenDefinitions.has(typeName)) {
      diagnostics.push(createDiagnostic(DiagnosticCodes.DUPLICATE_DEFINITION, 'error', `Duplicate definition '${typeName}'`, 'semantic', {
        location: def.position,
        definition: typeName,
        fix: { description: `Merge the two '${typeName}' blocks or rename one of them` },
      }));
    }
    seenDefinitions.add(typeName);

    // S002: relations and permissions share one namespace per definition
    const members = new Set<string>();
    const declarations = [...def.relations, ...def.permissions].sort(
      (a, b) => a.position.line - b.position.line || a.position.col - b.position.col,
    );
    for (const decl of declarations) {
      if (members.has(decl.name)) {
        diagnostics.push(createDiagnostic(DiagnosticCodes.DUPLICATE_MEMBER, 'error', `Duplicate ${decl.kind} '${decl.name}' in definition '${typeName}'`, 'semantic', {
          location: decl.position,
          definition: typeName,
          fix: { description: `Rename or remove the second '${decl.name}'` },
        }));
      }
      members.add(decl.name);
    }

    // W001: permission operand not declared in this definition
    for (const perm of def.permissions) {
      for (const name of localReferences(perm.expression)) {
        if (!members.has(name)) {
          diagnostics.push(createDiagnostic(DiagnosticCodes.UNKNOWN_REFERENCE, 'warning', `Permission '${perm.name}' references '${name}', which is not a relation or permission of '${typeName}'`, 'semantic', {
            location: perm.position,
            definition: typeName,
            fix: { description: `Declare 'relation ${name}: ...' in '${typeName}' or fix the name` },
          }));
        }
      }
    }
  }

  return diagnostics;
}

/** Names an expression resolves on its own definition: plain operands and the start of each arrow chain. */
export function localReferences(expr: PermissionExpr): string[] {
  switch (expr.kind) {
    case 'identifier':
      return [expr.name];
    case 'binary':
      if (expr.operator === '->') return localReferences(expr.left);
      return [...localReferences(expr.left), ...localReferences(expr.right)];
    default:
      return assertNever(expr);
  }
}

/**
 * Run diagnose() and throw the earliest error as a SchemaValidationError.
 * Returns the remaining (warning and info) diagnostics.
 */
export function validate(definitions: readonly DefinitionNode[]): Diagnostic[] {
  const diagnostics = sortDiagnostics(diagnose(definitions));
  const firstError = diagnostics.find(d => d.severity === 'error');
  if (firstError) {
    throw new SchemaValidationError(firstError.code, firstError.message, {
      line: firstError.location?.line ?? 1,
      col: firstError.location?.col ?? 1,
    });
  }
  return diagnostics;
}
