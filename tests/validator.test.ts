import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { parseSource } from '../src/parser/index.js';
import { SchemaValidationError } from '../src/parser/errors.js';
import { diagnose, localReferences, validate } from '../src/validator/index.js';

function fixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf-8');
}

describe('Schema Validator', () => {
  it('should accept the fixtures without diagnostics', () => {
    expect(diagnose(parseSource(fixture('docs.zed')))).toEqual([]);
    expect(diagnose(parseSource(fixture('tenant.zed')))).toEqual([]);
  });

  describe('AZ-S001 duplicate definition', () => {
    it('should flag the second definition of an object type', () => {
      const diags = diagnose(parseSource('definition a {}\ndefinition a {}'));
      expect(diags).toHaveLength(1);
      expect(diags[0]).toMatchObject({
        code: 'AZ-S001',
        severity: 'error',
        category: 'semantic',
        message: "Duplicate definition 'a'",
        location: { line: 2, col: 1 },
        definition: 'a',
      });
    });

    it('should treat prefixes as part of the identity', () => {
      expect(diagnose(parseSource('definition t/a {}\ndefinition a {}\ndefinition u/a {}'))).toEqual([]);
    });
  });

  describe('AZ-S002 duplicate member', () => {
    it('should flag a permission reusing a relation name', () => {
      const diags = diagnose(parseSource('definition d { relation r: user permission r = r }'));
      expect(diags).toHaveLength(1);
      expect(diags[0]).toMatchObject({
        code: 'AZ-S002',
        severity: 'error',
        message: "Duplicate permission 'r' in definition 'd'",
        location: { line: 1, col: 33 },
      });
    });

    it('should flag whichever declaration comes second in the source', () => {
      const diags = diagnose(parseSource('definition d {\n  permission r = x\n  relation x: user\n  relation r: user\n}'));
      expect(diags.map(d => [d.code, d.message, d.location?.line])).toEqual([
        ['AZ-S002', "Duplicate relation 'r' in definition 'd'", 4],
      ]);
    });
  });

  describe('AZ-W001 unknown reference', () => {
    it('should warn on operands that are not declared locally', () => {
      const diags = diagnose(parseSource('definition d { relation r: user permission p = r + missing -> x }'));
      expect(diags).toEqual([
        {
          code: 'AZ-W001',
          severity: 'warning',
          category: 'semantic',
          message: "Permission 'p' references 'missing', which is not a relation or permission of 'd'",
          location: { line: 1, col: 33 },
          definition: 'd',
          fix: { description: "Declare 'relation missing: ...' in 'd' or fix the name" },
        },
      ]);
    });

    it('should resolve references declared later in the block', () => {
      expect(diagnose(parseSource('definition d { permission a = b permission b = c relation c: user }'))).toEqual([]);
    });

    it('should not check arrow targets', () => {
      expect(localReferences(parseSource('definition d { permission p = parent -> view -> edit }')[0].permissions[0].expression)).toEqual(['parent']);
    });

    it('should collect every operand of a plus chain', () => {
      const [def] = parseSource('definition d { permission p = a + b -> c + d }');
      expect(localReferences(def.permissions[0].expression)).toEqual(['a', 'b', 'd']);
    });
  });

  describe('validate()', () => {
    it('should throw the earliest error as a SchemaValidationError', () => {
      const defs = parseSource('definition a { relation r: user relation r: user }\ndefinition a {}');
      expect(() => validate(defs)).toThrow(SchemaValidationError);
      try {
        validate(defs);
      } catch (err) {
        expect(err).toBeInstanceOf(SchemaValidationError);
        if (err instanceof SchemaValidationError) {
          expect(err.code).toBe('AZ-S002');
          expect(err.line).toBe(1);
          expect(err.message).toBe("[Schema Validation Error] Line 1:33: Duplicate relation 'r' in definition 'a'");
        }
      }
    });

    it('should return warnings when there are no errors', () => {
      const warnings = validate(parseSource('definition d { permission p = nope }'));
      expect(warnings.map(d => d.code)).toEqual(['AZ-W001']);
    });
  });
});
