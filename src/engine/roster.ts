/**
 * Outreach library: persona roster and message variants
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CatalogLoadError } from '../lib/errors';
import { logger } from '../lib/logger';
import { MessageVariant, Persona, TECH_CATEGORIES } from './types';

export const DEFAULT_OUTREACH_PATH = path.join(__dirname, '..', '..', 'data', 'outreach.json');

export interface OutreachLibrary {
  personas: readonly Persona[];
  variants: readonly MessageVariant[];
}

export const PersonaSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  email: z.string().email(),
  role: z.string().min(1),
  tone: z.string().min(1),
  categories: z.array(z.enum(TECH_CATEGORIES)).optional(),
});

export const VariantSchema = z.object({
  id: z.string().min(1),
  category: z.enum(TECH_CATEGORIES),
  subject: z.string().min(1),
  body: z.string().min(1),
});

const LibrarySchema = z.object({
  personas: z.array(PersonaSchema),
  variants: z.array(VariantSchema),
});

function assertUniqueIds(source: string, kind: string, ids: string[]): void {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      throw new CatalogLoadError(source, `duplicate ${kind} id "${id}"`);
    }
    seen.add(id);
  }
}

export function parseOutreachLibrary(raw: unknown, source = 'outreach library'): OutreachLibrary {
  const parsed = LibrarySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CatalogLoadError(source, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }

  assertUniqueIds(source, 'persona', parsed.data.personas.map((p) => p.id));
  assertUniqueIds(source, 'variant', parsed.data.variants.map((v) => v.id));

  return Object.freeze({
    personas: Object.freeze(parsed.data.personas.map((p) => Object.freeze(p))),
    variants: Object.freeze(parsed.data.variants.map((v) => Object.freeze(v))),
  });
}

export function loadOutreachLibrary(libraryPath: string = DEFAULT_OUTREACH_PATH): OutreachLibrary {
  if (!fs.existsSync(libraryPath)) {
    throw new CatalogLoadError(libraryPath, 'file not found');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(libraryPath, 'utf-8'));
  } catch (error) {
    throw new CatalogLoadError(libraryPath, `invalid JSON: ${String(error)}`);
  }

  const library = parseOutreachLibrary(raw, libraryPath);
  logger.info('Loaded outreach library', {
    path: libraryPath,
    personas: library.personas.length,
    variants: library.variants.length,
  });
  return library;
}
