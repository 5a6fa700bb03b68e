/**
 * Generator configuration — validated and defaulted with zod.
 */

import { z } from 'zod';
import { DEFAULT_PACKAGE } from './extractor/index.js';

export const GenerateConfigSchema = z.object({
  schema: z.string({ required_error: 'schema file is required' }).min(1, 'schema file is required'),
  output: z.string().min(1).default('.'),
  defaultPackage: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'package must be a plain identifier')
    .default(DEFAULT_PACKAGE),
  extension: z
    .string()
    .regex(/^\.[A-Za-z0-9.]+$/, "extension must start with '.'")
    .default('.gen.ts'),
  format: z.boolean().default(true),
  verbose: z.boolean().default(false),
});

export type GenerateConfig = z.infer<typeof GenerateConfigSchema>;
export type GenerateConfigInput = z.input<typeof GenerateConfigSchema>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function resolveConfig(input: Partial<GenerateConfigInput>): GenerateConfig {
  const result = GenerateConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)),
    );
  }
  return result.data;
}
