/**
 * Persona/variant selector
 * Least-recently-used persona and least-used variant for the top technology's category.
 */

import { NoPersonaAvailableError, NoVariantAvailableError } from '../lib/errors';
import { RotationLedger, RotationStore } from './rotation';
import { MessageVariant, Persona, Selection, TechCategory, TechnologySignature } from './types';

export function personasFor(category: TechCategory, personas: readonly Persona[]): Persona[] {
  return personas.filter((p) => !p.categories || p.categories.length === 0 || p.categories.includes(category));
}

export function variantsFor(category: TechCategory, variants: readonly MessageVariant[]): MessageVariant[] {
  return variants.filter((v) => v.category === category);
}

// Never-used personas first, then oldest use; ties keep roster order
export function pickPersona(category: TechCategory, candidates: Persona[], ledger: RotationLedger): Persona {
  let best = candidates[0];
  let bestSeq = ledger.lastUsed('persona', category, best.id) ?? 0;

  for (const persona of candidates.slice(1)) {
    const seq = ledger.lastUsed('persona', category, persona.id) ?? 0;
    if (seq < bestSeq) {
      best = persona;
      bestSeq = seq;
    }
  }
  return best;
}

// Lowest usage count; ties keep insertion order
export function pickVariant(category: TechCategory, candidates: MessageVariant[], ledger: RotationLedger): MessageVariant {
  let best = candidates[0];
  let bestCount = ledger.usage('variant', category, best.id);

  for (const variant of candidates.slice(1)) {
    const count = ledger.usage('variant', category, variant.id);
    if (count < bestCount) {
      best = variant;
      bestCount = count;
    }
  }
  return best;
}

// `use` runs inside the rotation critical section; usage is recorded only if it returns
export async function selectWith<T>(
  top: Pick<TechnologySignature, 'category'>,
  personas: readonly Persona[],
  variants: readonly MessageVariant[],
  rotation: RotationStore,
  use: (selection: Selection) => T
): Promise<T> {
  const category = top.category;
  const personaPool = personasFor(category, personas);
  if (personaPool.length === 0) {
    throw new NoPersonaAvailableError(category);
  }
  const variantPool = variantsFor(category, variants);
  if (variantPool.length === 0) {
    throw new NoVariantAvailableError(category);
  }

  return rotation.transaction((ledger) => {
    const persona = pickPersona(category, personaPool, ledger);
    const variant = pickVariant(category, variantPool, ledger);
    const result = use({ persona, variant });
    ledger.recordUse(category, persona.id, variant.id);
    return result;
  });
}

export async function select(
  top: Pick<TechnologySignature, 'category'>,
  personas: readonly Persona[],
  variants: readonly MessageVariant[],
  rotation: RotationStore
): Promise<Selection> {
  return selectWith(top, personas, variants, rotation, (selection) => selection);
}
