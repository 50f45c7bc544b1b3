/**
 * Scan target lists: one domain per line, optionally "domain,category"
 */

import * as fs from 'fs';
import { normalizeDomain } from '../../lib/utils';

export interface ScanTarget {
  domain: string;
  category?: string;
}

export function parseTargets(content: string): ScanTarget[] {
  const targets: ScanTarget[] = [];
  const seen = new Set<string>();

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const [domainPart, ...rest] = line.split(',');
    const domain = normalizeDomain(domainPart.replace(/^"|"$/g, ''));
    // Header row
    if (!domain || domain === 'domain') continue;
    if (seen.has(domain)) continue;
    seen.add(domain);

    const category = rest.join(',').trim().replace(/^"|"$/g, '');
    targets.push(category ? { domain, category } : { domain });
  }

  return targets;
}

export function readTargets(filePath: string): ScanTarget[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Domain list not found: ${filePath}`);
  }
  return parseTargets(fs.readFileSync(filePath, 'utf-8'));
}
