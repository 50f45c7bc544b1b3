/**
 * Shared test data
 */

import { parseCatalog } from '../src/engine/catalog';
import { DetectedTechnology, MessageVariant, Persona, SignatureCatalog, TechCategory, TechnologySignature } from '../src/engine/types';
import { HeaderMap } from '../src/engine/detector';
import { Fetcher, FetchResult } from '../src/stages/scan/fetcher';
import { FetchError } from '../src/lib/errors';

export const ACME_PAGE = [
  '<html><head>',
  '<script src="https://js.hs-scripts.com/1234567.js"></script>',
  '<script src="https://cdn.shopify.com/s/files/theme.js"></script>',
  '</head><body>Contact us at sales@acme.com</body></html>',
].join('\n');

// HubSpot only through its tracking cookie, Shopify only through the checkout script
export const ACME_CHECKOUT_PAGE = {
  content: [
    '<html><head>',
    '<script src="https://checkout.shopify.com/2048/checkouts/a1b2c3.js"></script>',
    '</head><body>Contact us at sales@acme.com</body></html>',
  ].join('\n'),
  headers: { 'Set-Cookie': 'sid=1; Path=/, hubspotutk=5f1e; Path=/; HttpOnly' },
};

export const GLOBEX_PAGE = '<script src="https://service.force.com/embeddedservice/5.0/esw.min.js"></script>';
export const SHOP_PAGE = '<script src="https://cdn.shopify.com/s/files/app.js"></script><p>orders@shop.test</p>';

export function signature(
  name: string,
  category: TechCategory,
  enterpriseWeight: number,
  overrides: Partial<TechnologySignature> = {}
): TechnologySignature {
  return {
    name,
    category,
    enterpriseWeight,
    talkingPoint: `${name} talking point`,
    rules: [{ type: 'html', contains: name.toLowerCase() }],
    ...overrides,
  };
}

export function detected(sig: TechnologySignature): DetectedTechnology {
  return { signature: sig, matchedSignals: [`html:${sig.name.toLowerCase()}`], accountIds: [] };
}

export function catalogOf(signatures: TechnologySignature[]): SignatureCatalog {
  return parseCatalog({ version: 'test', signatures }, 'test catalog');
}

export function persona(id: string, overrides: Partial<Persona> = {}): Persona {
  return {
    id,
    name: `${id.charAt(0).toUpperCase()}${id.slice(1)} Tester`,
    email: `${id}@stackreach.test`,
    role: 'Sales',
    tone: 'plain',
    ...overrides,
  };
}

export function variant(id: string, category: TechCategory, overrides: Partial<MessageVariant> = {}): MessageVariant {
  return {
    id,
    category,
    subject: 'About {{main_tech}}',
    body: '{{talking_point}}.\n\n{{persona_name}}',
    ...overrides,
  };
}

export interface StubPage {
  content: string;
  headers: HeaderMap;
}

export class StubFetcher implements Fetcher {
  readonly calls: string[] = [];
  private readonly pages: Record<string, string | StubPage>;

  constructor(pages: Record<string, string | StubPage>) {
    this.pages = pages;
  }

  async fetch(domain: string): Promise<FetchResult> {
    this.calls.push(domain);
    const page = this.pages[domain];
    if (page === undefined) {
      return { content: '', headers: {}, error: new FetchError(domain, 'dns_error') };
    }
    return typeof page === 'string' ? { content: page, headers: {} } : { content: page.content, headers: page.headers };
  }
}
