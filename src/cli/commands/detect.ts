/**
 * Detect command - fetch one domain and show what the engine would do, without persisting anything
 */

import { HttpFetcher } from '../../stages/scan/fetcher';
import { createEngine } from '../../engine/factory';
import { getConfig } from '../../config';
import { normalizeDomain } from '../../lib/utils';
import { formatEmail, formatTechnologyTable } from '../format';

export interface DetectOptions {
  draft?: boolean;
}

export async function runDetect(domainInput: string, options: DetectOptions): Promise<void> {
  const config = getConfig();
  const domain = normalizeDomain(domainInput);
  if (!domain) {
    throw new Error(`Not a domain: ${domainInput}`);
  }

  const page = await new HttpFetcher(config.fetch).fetch(domain);
  if (page.error) {
    throw page.error;
  }

  const engine = createEngine(config);
  const analysis = engine.analyze(page.content, page.headers);

  console.log(`\n=== ${domain} ===`);
  console.log(formatTechnologyTable(analysis.scored));

  if (options.draft !== false && analysis.top) {
    const email = await engine.compose(analysis.scored, domain);
    if (email) {
      console.log('\n--- Draft ---');
      console.log(formatEmail(email));
    }
  }
  console.log('');
}
