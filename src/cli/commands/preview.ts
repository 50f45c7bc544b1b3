/**
 * Preview command - render an email for a hand-picked stack, no network
 */

import { createEngine } from '../../engine/factory';
import { findSignature } from '../../engine/catalog';
import { score } from '../../engine/scorer';
import { DetectedTechnology } from '../../engine/types';
import { getConfig } from '../../config';
import { normalizeDomain } from '../../lib/utils';
import { formatEmail, formatTechnologyTable } from '../format';

export interface PreviewOptions {
  tech: string[];
  domain: string;
}

export async function runPreview(options: PreviewOptions): Promise<void> {
  const config = getConfig();
  const engine = createEngine(config);

  const detected: DetectedTechnology[] = [];
  const unknown: string[] = [];
  for (const name of options.tech) {
    const signature = findSignature(engine.catalog, name);
    if (!signature) {
      unknown.push(name);
    } else if (!detected.some((d) => d.signature.name === signature.name)) {
      detected.push({ signature, matchedSignals: ['manual'], accountIds: [] });
    }
  }
  if (unknown.length > 0) {
    throw new Error(`Unknown technologies: ${unknown.join(', ')}`);
  }

  const scored = score(detected, config.scoring);
  const email = await engine.compose(scored, normalizeDomain(options.domain));

  console.log(formatTechnologyTable(scored));
  if (email) {
    console.log('');
    console.log(formatEmail(email));
  }
  console.log('');
}
