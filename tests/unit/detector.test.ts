/**
 * Unit tests for the technology detector
 */

import { describe, test, expect } from '@jest/globals';
import { detect, describeRule } from '../../src/engine/detector';
import { loadCatalog } from '../../src/engine/catalog';
import { ACME_PAGE, catalogOf, signature } from '../fixtures';

const catalog = loadCatalog();

function names(content: string, headers: Record<string, string | string[]> = {}): string[] {
  return detect(content, headers, catalog).map((d) => d.signature.name);
}

describe('Technology detector', () => {
  describe('detect()', () => {
    test('should detect HubSpot and Shopify from script URLs', () => {
      const result = detect(ACME_PAGE, {}, catalog);

      expect(result.map((d) => d.signature.name)).toEqual(['HubSpot', 'Shopify']);
      expect(result[0].matchedSignals).toEqual(['script:js.hs-scripts.com']);
      expect(result[0].accountIds).toEqual(['1234567']);
      expect(result[1].matchedSignals).toEqual(['script:cdn.shopify.com']);
      expect(result[1].accountIds).toEqual([]);
    });

    test('should return nothing for empty content, even with telling headers', () => {
      expect(detect('', { 'x-hs-hub-id': '42', 'cf-ray': 'abc' }, catalog)).toEqual([]);
    });

    test('should return nothing when no signature matches', () => {
      expect(names('<html><body>Plain page</body></html>')).toEqual([]);
    });

    test('should look headers up case-insensitively', () => {
      const result = detect('<html></html>', { 'X-HS-Hub-ID': '42' }, catalog);
      expect(result.map((d) => d.signature.name)).toEqual(['HubSpot']);
      expect(result[0].matchedSignals).toEqual(['header:x-hs-hub-id']);
    });

    test('should match header values against the rule pattern', () => {
      const result = detect('<html></html>', { 'X-Pingback': 'https://site.test/xmlrpc.php' }, catalog);
      expect(result.map((d) => d.signature.name)).toEqual(['WordPress']);
      expect(result[0].matchedSignals).toEqual(['header:x-pingback~xmlrpc\\.php']);

      expect(names('<html></html>', { 'X-Pingback': 'https://site.test/other' })).toEqual([]);
    });

    test('should read cookie names from Set-Cookie headers', () => {
      const result = detect('<html></html>', { 'set-cookie': ['hubspotutk=abc; Path=/', 'other=1'] }, catalog);
      expect(result[0].signature.name).toBe('HubSpot');
      expect(result[0].matchedSignals).toEqual(['cookie:hubspotutk']);
    });

    test('should read every cookie from a folded Set-Cookie value', () => {
      const result = detect('<html></html>', { 'Set-Cookie': 'sid=1; Path=/, hubspotutk=abc; Path=/' }, catalog);
      expect(result.map((d) => d.signature.name)).toEqual(['HubSpot']);
      expect(result[0].matchedSignals).toEqual(['cookie:hubspotutk']);
    });

    test('should not split a folded Set-Cookie value inside an Expires date', () => {
      const folded = 'sid=1; Expires=Wed, 21 Oct 2026 07:28:00 GMT; Path=/, _shopify_y=abc; Path=/';
      const result = detect('<html></html>', { 'set-cookie': folded }, catalog);
      expect(result.map((d) => d.signature.name)).toEqual(['Shopify']);
      expect(result[0].matchedSignals).toEqual(['cookie:_shopify_y']);
    });

    test('should find cookie names written by inline tracking code', () => {
      const page = "<script>if (document.cookie.indexOf('hubspotutk') > -1) {}</script>";
      expect(names(page)).toEqual(['HubSpot']);
    });

    test('should not match a cookie name embedded in a longer word', () => {
      expect(names('<p>my_hubspotutk_backup</p>')).toEqual([]);
    });

    test('should honour regex flags', () => {
      const result = detect('<a href="/CHECKOUTS/ABC123">Cart</a>', {}, catalog);
      expect(result.map((d) => d.signature.name)).toEqual(['Shopify']);
      expect(result[0].matchedSignals).toEqual(['regex:checkout\\.shopify\\.com|/checkouts/[a-z0-9]+']);
    });

    test('should record every rule that fired, in rule order', () => {
      const page = '<script src="https://js.hsforms.net/forms/v2.js"></script><script src="https://js.hs-scripts.com/99.js"></script>';
      const result = detect(page, { 'x-hs-hub-id': '99' }, catalog);
      expect(result[0].matchedSignals).toEqual([
        'script:js.hs-scripts.com',
        'script:js.hsforms.net',
        'header:x-hs-hub-id',
      ]);
    });

    test('should follow catalog order, not page order', () => {
      const small = catalogOf([signature('Beta', 'crm', 1), signature('Alpha', 'crm', 1)]);
      const result = detect('alpha then beta', {}, small);
      expect(result.map((d) => d.signature.name)).toEqual(['Beta', 'Alpha']);
    });

    test('should be deterministic', () => {
      expect(detect(ACME_PAGE, {}, catalog)).toEqual(detect(ACME_PAGE, {}, catalog));
    });
  });

  describe('describeRule()', () => {
    test('should label each rule kind', () => {
      expect(describeRule({ type: 'html', contains: 'Shopify.theme' })).toBe('html:Shopify.theme');
      expect(describeRule({ type: 'cookie', name: '_ga' })).toBe('cookie:_ga');
      expect(describeRule({ type: 'header', name: 'CF-Ray' })).toBe('header:cf-ray');
      expect(describeRule({ type: 'header', name: 'Server', pattern: '^cloudflare$' })).toBe('header:server~^cloudflare$');
    });
  });
});
