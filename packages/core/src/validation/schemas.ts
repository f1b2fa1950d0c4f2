/**
 * Zod schemas for validating configuration and annotation input
 */

import { z } from 'zod';

/** Built-in naming policy names */
export const namingPolicyNameSchema = z.enum(['identity', 'snake_case', 'kebab-case', 'SCREAMING_SNAKE_CASE']);

/** Named policy or custom `(name: string) => string` transform */
export const namingPolicySchema = z.union([
  namingPolicyNameSchema,
  z.function().args(z.string()).returns(z.string()),
]);

/** Discriminator field names must be usable as JSON object keys */
export const discriminatorFieldSchema = z.string().min(1).max(128);

export const configurationInputSchema = z
  .object({
    naming: namingPolicySchema.optional(),
    discriminator: discriminatorFieldSchema.optional(),
    discriminatorValue: namingPolicySchema.optional(),
  })
  .strict();

const validatorKinds = [
  'min',
  'max',
  'pattern',
  'minLength',
  'maxLength',
  'minSize',
  'maxSize',
  'enumeration',
  'custom',
  'mapped',
  'all',
  'any',
  'each',
] as const;

/** Shallow check: the validator constructors build the full structure */
export const validatorShapeSchema = z
  .object({ kind: z.enum(validatorKinds) })
  .passthrough();

export const schemaDefaultSchema = z
  .object({
    value: z.unknown(),
    encoded: z.unknown().optional(),
  })
  .strict();

export const annotationsSchema = z
  .object({
    encodedName: z.string().min(1).optional(),
    description: z.string().optional(),
    default: schemaDefaultSchema.optional(),
    encodedExample: z.unknown().optional(),
    format: z.string().min(1).optional(),
    deprecated: z.boolean().optional(),
    hidden: z.boolean().optional(),
    validator: validatorShapeSchema.optional(),
  })
  .strict();

/** Export types from schemas */
export type NamingPolicyNameInput = z.infer<typeof namingPolicyNameSchema>;
export type AnnotationsInput = z.input<typeof annotationsSchema>;
