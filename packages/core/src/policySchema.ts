import { z } from 'zod';
import { MASK_KINDS } from './mask';
import { STORAGE_TIERS, isSelectableTier } from './storageTiers';

export const maskDefinitionSchema = z.object({
  name: z.string(),
  pattern: z.string().min(1, 'Mask pattern cannot be empty'),
  kind: z.enum(MASK_KINDS),
  caseSensitive: z.boolean()
});

export const targetTierSchema = z
  .enum(STORAGE_TIERS)
  .refine(isSelectableTier, { message: 'Target tier must be a selectable migration target' });

export const migrationPolicySchema = z.object({
  id: z.string().uuid(),
  bucket: z.string().min(1),
  mask: maskDefinitionSchema,
  targetTier: targetTierSchema,
  scheduled: z.boolean(),
  schedule: z.string().min(1).nullable(),
  createdAt: z.string().datetime({ message: 'createdAt must be an ISO-8601 timestamp' })
});

export type MigrationPolicy = z.infer<typeof migrationPolicySchema>;

export const newPolicyInputSchema = z.object({
  bucket: z.string().min(1),
  mask: maskDefinitionSchema,
  targetTier: targetTierSchema,
  scheduled: z.boolean().default(false),
  schedule: z.string().min(1).nullable().default(null)
});

export type NewPolicyInput = z.input<typeof newPolicyInputSchema>;

export const POLICY_FILE_VERSION = 1;

export const policyFileSchema = z.object({
  version: z.literal(POLICY_FILE_VERSION),
  policies: z.array(migrationPolicySchema)
});

export type PolicyFile = z.infer<typeof policyFileSchema>;
