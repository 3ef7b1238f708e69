/**
 * Schema for contract files.
 */
import { z } from 'zod';
import { TYPE_TAGS } from '../types/value-types.js';

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.date(), z.null()]);

const BoundSchema = z.union([z.number(), z.string(), z.date()]);

/** One column's constraints as written in a contract file. */
export const FieldDefinitionSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(TYPE_TAGS).optional(),
    required: z.boolean().default(false),
    unique: z.boolean().default(false),
    min: BoundSchema.optional(),
    max: BoundSchema.optional(),
    allowed: z.array(ScalarSchema).min(1).optional(),
    pattern: z.string().optional(),
    description: z.string().optional(),
  })
  .strict();

/** A whole contract file. */
export const ContractFileSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  fields: z.array(FieldDefinitionSchema).min(1),
});

export type FieldDefinition = z.infer<typeof FieldDefinitionSchema>;
export type ContractFile = z.infer<typeof ContractFileSchema>;
