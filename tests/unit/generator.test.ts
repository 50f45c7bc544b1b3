/**
 * Unit tests for the email generator
 */

import { describe, test, expect } from '@jest/globals';
import { joinNames, personaLabel, render } from '../../src/engine/generator';
import { findSignature, loadCatalog } from '../../src/engine/catalog';
import { loadOutreachLibrary } from '../../src/engine/roster';
import { TemplateRenderError } from '../../src/lib/errors';
import { MessageVariant, Persona, TechnologySignature } from '../../src/engine/types';
import { variant } from '../fixtures';

const catalog = loadCatalog();
const library = loadOutreachLibrary();

function tech(name: string): TechnologySignature {
  const found = findSignature(catalog, name);
  if (!found) throw new Error(`missing signature ${name}`);
  return found;
}

function personaById(id: string): Persona {
  const found = library.personas.find((p) => p.id === id);
  if (!found) throw new Error(`missing persona ${id}`);
  return found;
}

function variantById(id: string): MessageVariant {
  const found = library.variants.find((v) => v.id === id);
  if (!found) throw new Error(`missing variant ${id}`);
  return found;
}

const jordan = personaById('jordan');
const crmAudit = variantById('crm-audit');

describe('Email generator', () => {
  describe('render()', () => {
    test('should render the full email for a HubSpot + Shopify stack', () => {
      const email = render(tech('HubSpot'), [tech('Shopify')], jordan, crmAudit, { domain: 'acme.com' });

      expect(email.subject).toBe('Quick question about your HubSpot setup');
      expect(email.body).toBe(
        'Hi there,\n\n' +
          "I was looking at acme.com and saw you're running HubSpot. " +
          'HubSpot portals tend to pile up stale workflows and duplicate contact properties, ' +
          'which quietly drags down lead routing and reporting.\n\n' +
          'I also noticed Shopify in your stack, so anything we suggest would fit around what you already run.\n\n' +
          'Would a short audit of your CRM be useful? Happy to share what we usually find.\n\n' +
          'Jordan\n' +
          'Partnerships | jordan@stackreach.test'
      );
      expect(email.mainTech).toBe('HubSpot');
      expect(email.supportingTechs).toEqual(['Shopify']);
      expect(email.personaId).toBe('jordan');
      expect(email.personaEmail).toBe('jordan@stackreach.test');
      expect(email.variantId).toBe('crm-audit');
    });

    test('should collapse the gap left by an empty supporting line', () => {
      const email = render(tech('HubSpot'), [], jordan, crmAudit, { domain: 'acme.com' });
      expect(email.supportingTechs).toEqual([]);
      expect(email.body).toContain('lead routing and reporting.\n\nWould a short audit of your CRM be useful?');
      expect(email.body).not.toMatch(/\n{3,}/);
    });

    test('should cap supporting technologies at two by default', () => {
      const email = render(tech('HubSpot'), [tech('Shopify'), tech('Stripe'), tech('Klaviyo')], jordan, crmAudit, {
        domain: 'acme.com',
      });
      expect(email.supportingTechs).toEqual(['Shopify', 'Stripe']);
      expect(email.body).toContain(
        'I also noticed Shopify and Stripe in your stack, so anything we suggest would fit around what you already run.'
      );
    });

    test('should honour a larger supporting limit', () => {
      const email = render(tech('HubSpot'), [tech('Shopify'), tech('Stripe'), tech('Klaviyo')], jordan, crmAudit, {
        domain: 'acme.com',
        maxSupporting: 3,
      });
      expect(email.body).toContain('I also noticed Shopify, Stripe and Klaviyo in your stack');
    });

    test('should never list the main technology as supporting', () => {
      const email = render(tech('HubSpot'), [tech('HubSpot'), tech('Shopify')], jordan, crmAudit, {
        domain: 'acme.com',
      });
      expect(email.supportingTechs).toEqual(['Shopify']);
    });

    test('should fail when the domain binding is needed but missing', () => {
      expect(() => render(tech('HubSpot'), [], jordan, crmAudit)).toThrow(
        'Variant crm-audit has unbound placeholders: {{domain}}'
      );
    });

    test('should report unknown and malformed placeholders together', () => {
      const broken = variant('broken', 'crm', {
        subject: 'Hi {{first_name}}',
        body: '{{main_tech}} and {{ weird token }}',
      });

      let caught: unknown;
      try {
        render(tech('HubSpot'), [], jordan, broken, { domain: 'acme.com' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(TemplateRenderError);
      expect(caught instanceof TemplateRenderError && caught.placeholders).toEqual(['first_name', 'weird token']);
    });

    test('should return a frozen email', () => {
      const email = render(tech('HubSpot'), [tech('Shopify')], jordan, crmAudit, { domain: 'acme.com' });
      expect(Object.isFrozen(email)).toBe(true);
      expect(Object.isFrozen(email.supportingTechs)).toBe(true);
    });

    test('should be deterministic', () => {
      const first = render(tech('HubSpot'), [tech('Shopify')], jordan, crmAudit, { domain: 'acme.com' });
      const second = render(tech('HubSpot'), [tech('Shopify')], jordan, crmAudit, { domain: 'acme.com' });
      expect(second).toEqual(first);
    });

    test('should fill persona bindings', () => {
      const email = render(tech('Shopify'), [], personaById('casey'), variantById('ecom-retention'));
      expect(email.subject).toBe('Repeat orders on Shopify');
      expect(email.body.endsWith('Worth a quick chat?\n\nCasey Morgan\nGrowth Strategist')).toBe(true);
    });
  });

  describe('helpers', () => {
    test('joinNames() should read naturally', () => {
      expect(joinNames([])).toBe('');
      expect(joinNames(['Shopify'])).toBe('Shopify');
      expect(joinNames(['Shopify', 'Stripe'])).toBe('Shopify and Stripe');
      expect(joinNames(['Shopify', 'Stripe', 'Klaviyo'])).toBe('Shopify, Stripe and Klaviyo');
    });

    test('personaLabel() should use the first name and role', () => {
      expect(personaLabel(jordan)).toBe('Jordan (Partnerships)');
    });
  });
});
