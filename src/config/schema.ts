/**
 * Configuration schema, applied to the merged (defaults + user file) config
 */

import { z } from 'zod';
import { PersonaSchema, VariantSchema } from '../engine/roster';
import { TECH_CATEGORIES } from '../engine/types';
import { StackreachConfig } from './types';

const positive = z.number().positive();
const nonNegative = z.number().min(0);

export const ConfigSchema: z.ZodType<StackreachConfig> = z.object({
  version: z.string(),
  catalog: z.object({
    signaturesPath: z.string().min(1),
    outreachPath: z.string().min(1),
  }),
  scoring: z.object({
    combine: z.enum(['product', 'sum']),
    defaultSpecialization: nonNegative,
    specialization: z.record(z.enum(TECH_CATEGORIES), nonNegative),
    technologyOverrides: z.record(z.string(), nonNegative),
  }),
  outreach: z.object({
    maxSupportingTechs: z.number().int().min(0),
    personas: z.array(PersonaSchema).optional(),
    variants: z.array(VariantSchema).optional(),
  }),
  rotation: z.object({
    windowHours: nonNegative,
  }),
  dedup: z.object({
    rescanAfterHours: nonNegative,
  }),
  fetch: z.object({
    timeout: positive,
    retries: z.number().int().min(0),
    retryDelay: nonNegative,
    requestsPerMinute: positive,
    userAgent: z.string().optional(),
    emailPatterns: z.array(z.string()),
  }),
  outbox: z.object({
    format: z.enum(['csv', 'json', 'both']),
    directory: z.string().min(1),
    filenamePattern: z.string().min(1),
  }),
  pipeline: z.object({
    batchSize: z.number().int().positive(),
    maxDomainsPerRun: z.number().int().positive(),
    parallelism: z.number().int().positive(),
  }),
});
