/**
 * Technology scorer
 * Ranks detections by sales value: combine(enterpriseWeight, specializationWeight),
 * then enterpriseWeight, then name.
 */

import {
  DetectedTechnology,
  ScoredTechnology,
  ScoredTechnologySummary,
  TechCategory,
  TechnologySummary,
} from './types';

export type CombineMode = 'product' | 'sum';

export interface SpecializationWeights {
  combine: CombineMode;
  defaultSpecialization: number;
  specialization: Partial<Record<TechCategory, number>>;
  technologyOverrides: Record<string, number>;
}

export const DEFAULT_WEIGHTS: SpecializationWeights = {
  combine: 'product',
  defaultSpecialization: 1,
  specialization: {},
  technologyOverrides: {},
};

export function specializationFor(detected: DetectedTechnology, weights: SpecializationWeights): number {
  const { name, category } = detected.signature;
  const override = weights.technologyOverrides[name];
  if (override !== undefined) return override;
  return weights.specialization[category] ?? weights.defaultSpecialization;
}

export function combineWeights(enterprise: number, specialization: number, mode: CombineMode): number {
  return mode === 'sum' ? enterprise + specialization : enterprise * specialization;
}

function compareScored(a: ScoredTechnology, b: ScoredTechnology): number {
  if (a.score !== b.score) return b.score - a.score;
  const ea = a.signature.enterpriseWeight;
  const eb = b.signature.enterpriseWeight;
  if (ea !== eb) return eb - ea;
  const na = a.signature.name;
  const nb = b.signature.name;
  return na < nb ? -1 : na > nb ? 1 : 0;
}

export function score(
  detected: readonly DetectedTechnology[],
  weights: SpecializationWeights = DEFAULT_WEIGHTS
): ScoredTechnology[] {
  const scored = detected.map((tech): ScoredTechnology => {
    const specializationWeight = specializationFor(tech, weights);
    return {
      ...tech,
      specializationWeight,
      score: combineWeights(tech.signature.enterpriseWeight, specializationWeight, weights.combine),
      rank: 0,
    };
  });

  scored.sort(compareScored);
  return scored.map((tech, index) => ({ ...tech, rank: index + 1 }));
}

// null means no signal: outreach is skipped for this domain
export function topTechnology(scored: readonly ScoredTechnology[]): ScoredTechnology | null {
  return scored[0] ?? null;
}

export function summarizeDetected(tech: DetectedTechnology): TechnologySummary {
  return {
    name: tech.signature.name,
    category: tech.signature.category,
    matchedSignals: [...tech.matchedSignals],
    accountIds: [...tech.accountIds],
  };
}

export function summarizeScored(tech: ScoredTechnology): ScoredTechnologySummary {
  return {
    ...summarizeDetected(tech),
    enterpriseWeight: tech.signature.enterpriseWeight,
    specializationWeight: tech.specializationWeight,
    score: tech.score,
    rank: tech.rank,
  };
}
