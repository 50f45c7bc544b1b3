/**
 * Unit tests for the technology scorer
 */

import { describe, test, expect } from '@jest/globals';
import { DEFAULT_WEIGHTS, score, specializationFor, topTechnology } from '../../src/engine/scorer';
import { SpecializationWeights } from '../../src/engine/scorer';
import { detected, signature } from '../fixtures';

const hubspot = detected(signature('HubSpot', 'crm', 8));
const shopify = detected(signature('Shopify', 'ecommerce', 6));
const stripe = detected(signature('Stripe', 'payments', 6));

function weights(overrides: Partial<SpecializationWeights>): SpecializationWeights {
  return { ...DEFAULT_WEIGHTS, ...overrides };
}

describe('Technology scorer', () => {
  describe('score()', () => {
    test('should multiply enterprise weight by the default specialization', () => {
      const result = score([shopify, hubspot]);
      expect(result.map((t) => [t.signature.name, t.score, t.rank])).toEqual([
        ['HubSpot', 8, 1],
        ['Shopify', 6, 2],
      ]);
      expect(result[0].specializationWeight).toBe(1);
    });

    test('should apply per-category specialization', () => {
      const result = score([hubspot, shopify], weights({ specialization: { ecommerce: 2 } }));
      expect(result.map((t) => [t.signature.name, t.score])).toEqual([
        ['Shopify', 12],
        ['HubSpot', 8],
      ]);
    });

    test('should prefer a per-technology override over the category weight', () => {
      const config = weights({ specialization: { crm: 3 }, technologyOverrides: { HubSpot: 0.5 } });
      expect(specializationFor(hubspot, config)).toBe(0.5);
      expect(score([hubspot, shopify], config).map((t) => t.signature.name)).toEqual(['Shopify', 'HubSpot']);
    });

    test('should add weights in sum mode', () => {
      const result = score([hubspot, shopify], weights({ combine: 'sum', defaultSpecialization: 2 }));
      expect(result.map((t) => t.score)).toEqual([10, 8]);
    });

    test('should break score ties by enterprise weight', () => {
      const small = detected(signature('Small', 'crm', 4));
      const big = detected(signature('Big', 'ecommerce', 8));
      const result = score([small, big], weights({ specialization: { crm: 2 } }));
      expect(result.map((t) => [t.signature.name, t.score])).toEqual([
        ['Big', 8],
        ['Small', 8],
      ]);
    });

    test('should break full ties by name in code-unit order', () => {
      const lower = detected(signature('alpha', 'crm', 5));
      const upper = detected(signature('Zeta', 'crm', 5));
      expect(score([lower, upper]).map((t) => t.signature.name)).toEqual(['Zeta', 'alpha']);
    });

    test('should order equal entries the same way regardless of input order', () => {
      expect(score([stripe, shopify]).map((t) => t.signature.name)).toEqual(['Shopify', 'Stripe']);
      expect(score([shopify, stripe]).map((t) => t.signature.name)).toEqual(['Shopify', 'Stripe']);
    });

    test('should not mutate its input', () => {
      const input = [shopify, hubspot];
      score(input);
      expect(input.map((t) => t.signature.name)).toEqual(['Shopify', 'HubSpot']);
    });
  });

  describe('topTechnology()', () => {
    test('should return the first ranked technology', () => {
      expect(topTechnology(score([shopify, hubspot]))?.signature.name).toBe('HubSpot');
    });

    test('should return null when nothing was detected', () => {
      expect(topTechnology(score([]))).toBeNull();
    });
  });
});
