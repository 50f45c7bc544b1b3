/**
 * Signature catalog
 * Loads technology signatures from JSON, validates them and freezes the result.
 * A malformed catalog is fatal for the run.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CatalogLoadError } from '../lib/errors';
import { logger } from '../lib/logger';
import { DetectionRule, SignatureCatalog, TECH_CATEGORIES, TechnologySignature } from './types';

export const DEFAULT_CATALOG_PATH = path.join(__dirname, '..', '..', 'data', 'signatures.json');

const RuleSchema: z.ZodType<DetectionRule> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('html'), contains: z.string().min(1) }),
  z.object({ type: z.literal('regex'), pattern: z.string().min(1), flags: z.string().regex(/^[imsu]*$/).optional() }),
  z.object({ type: z.literal('script'), contains: z.string().min(1) }),
  z.object({ type: z.literal('header'), name: z.string().min(1), pattern: z.string().min(1).optional() }),
  z.object({ type: z.literal('cookie'), name: z.string().min(1) }),
]);

const SignatureSchema = z.object({
  name: z.string().min(1),
  category: z.enum(TECH_CATEGORIES),
  rules: z.array(RuleSchema).min(1),
  enterpriseWeight: z.number().positive(),
  talkingPoint: z.string().min(1),
  accountIdPattern: z.string().min(1).optional(),
});

const CatalogSchema = z.object({
  version: z.string(),
  signatures: z.array(SignatureSchema).min(1),
});

function assertCompiles(source: string, pattern: string, flags?: string): void {
  try {
    new RegExp(pattern, flags);
  } catch (error) {
    throw new CatalogLoadError(source, `invalid pattern /${pattern}/: ${String(error)}`);
  }
}

function freezeSignature(signature: TechnologySignature): TechnologySignature {
  for (const rule of signature.rules) {
    Object.freeze(rule);
  }
  Object.freeze(signature.rules);
  return Object.freeze(signature);
}

// Validate an already-parsed catalog document
export function parseCatalog(raw: unknown, source = 'signature catalog'): SignatureCatalog {
  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CatalogLoadError(source, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }

  const seen = new Set<string>();
  for (const signature of parsed.data.signatures) {
    const key = signature.name.toLowerCase();
    if (seen.has(key)) {
      throw new CatalogLoadError(source, `duplicate signature "${signature.name}"`);
    }
    seen.add(key);

    for (const rule of signature.rules) {
      if (rule.type === 'regex') assertCompiles(source, rule.pattern, rule.flags);
      if (rule.type === 'header' && rule.pattern) assertCompiles(source, rule.pattern, 'i');
    }
    if (signature.accountIdPattern) assertCompiles(source, signature.accountIdPattern);
  }

  return Object.freeze({
    version: parsed.data.version,
    signatures: Object.freeze(parsed.data.signatures.map(freezeSignature)),
  });
}

export function loadCatalog(catalogPath: string = DEFAULT_CATALOG_PATH): SignatureCatalog {
  if (!fs.existsSync(catalogPath)) {
    throw new CatalogLoadError(catalogPath, 'file not found');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(catalogPath, 'utf-8'));
  } catch (error) {
    throw new CatalogLoadError(catalogPath, `invalid JSON: ${String(error)}`);
  }

  const catalog = parseCatalog(raw, catalogPath);
  logger.info(`Loaded signature catalog`, {
    path: catalogPath,
    version: catalog.version,
    signatures: catalog.signatures.length,
  });
  return catalog;
}

export function findSignature(catalog: SignatureCatalog, name: string): TechnologySignature | undefined {
  const wanted = name.toLowerCase();
  return catalog.signatures.find((s) => s.name.toLowerCase() === wanted);
}
