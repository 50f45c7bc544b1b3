/**
 * Technology detector
 * Pure function of (page content, headers, catalog). Output order follows catalog order.
 */

import { DetectedTechnology, DetectionRule, SignatureCatalog, TechnologySignature } from './types';

export type HeaderMap = Record<string, string | string[] | undefined>;

// Pre-digested page, built once per detect() call and shared by every rule
export interface PageSignals {
  body: string;
  bodyLower: string;
  headers: Map<string, string[]>;
  scriptUrls: string[];
  cookieNames: Set<string>;
}

const SCRIPT_SRC_REGEX = /<script\b[^>]*\bsrc\s*=\s*["']([^"']+)["']/gi;

// Folded Set-Cookie values join cookies with ", "; an Expires date's comma is never followed by "name="
const SET_COOKIE_SEPARATOR = /\n|,\s*(?=[^;=\s]+=)/;

function normalizeHeaders(headers: HeaderMap): Map<string, string[]> {
  const map = new Map<string, string[]>();
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const key = name.toLowerCase();
    const values = Array.isArray(value) ? value : [value];
    map.set(key, [...(map.get(key) ?? []), ...values]);
  }
  return map;
}

function extractScriptUrls(body: string): string[] {
  const urls: string[] = [];
  let match: RegExpExecArray | null;
  const regex = new RegExp(SCRIPT_SRC_REGEX.source, SCRIPT_SRC_REGEX.flags);
  while ((match = regex.exec(body)) !== null) {
    urls.push(match[1].toLowerCase());
  }
  return urls;
}

function extractCookieNames(headers: Map<string, string[]>): Set<string> {
  const names = new Set<string>();

  // Set-Cookie: name before the first "=" of each cookie
  for (const value of headers.get('set-cookie') ?? []) {
    for (const line of value.split(SET_COOKIE_SEPARATOR)) {
      const name = line.split('=')[0].trim();
      if (name) names.add(name.toLowerCase());
    }
  }

  // Cookie: "a=1; b=2"
  for (const value of headers.get('cookie') ?? []) {
    for (const pair of value.split(';')) {
      const name = pair.split('=')[0].trim();
      if (name) names.add(name.toLowerCase());
    }
  }

  return names;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function buildPageSignals(pageContent: string, headers: HeaderMap): PageSignals {
  const headerMap = normalizeHeaders(headers);
  return {
    body: pageContent,
    bodyLower: pageContent.toLowerCase(),
    headers: headerMap,
    scriptUrls: extractScriptUrls(pageContent),
    cookieNames: extractCookieNames(headerMap),
  };
}

// Human-readable audit label for a rule
export function describeRule(rule: DetectionRule): string {
  switch (rule.type) {
    case 'html':
      return `html:${rule.contains}`;
    case 'regex':
      return `regex:${rule.pattern}`;
    case 'script':
      return `script:${rule.contains}`;
    case 'header':
      return rule.pattern ? `header:${rule.name.toLowerCase()}~${rule.pattern}` : `header:${rule.name.toLowerCase()}`;
    case 'cookie':
      return `cookie:${rule.name}`;
  }
}

export function matchRule(rule: DetectionRule, page: PageSignals): boolean {
  switch (rule.type) {
    case 'html':
      return page.bodyLower.includes(rule.contains.toLowerCase());

    case 'regex':
      return new RegExp(rule.pattern, rule.flags).test(page.body);

    case 'script': {
      const needle = rule.contains.toLowerCase();
      return page.scriptUrls.some((url) => url.includes(needle));
    }

    case 'header': {
      const values = page.headers.get(rule.name.toLowerCase());
      if (!values) return false;
      if (!rule.pattern) return true;
      const regex = new RegExp(rule.pattern, 'i');
      return values.some((value) => regex.test(value));
    }

    case 'cookie': {
      const name = rule.name.toLowerCase();
      if (page.cookieNames.has(name)) return true;
      // Inline tracking code names the cookie in the page itself
      return new RegExp(`(^|[^\\w])${escapeRegExp(name)}(?![\\w])`).test(page.bodyLower);
    }
  }
}

function extractAccountIds(signature: TechnologySignature, page: PageSignals): string[] {
  if (!signature.accountIdPattern) return [];

  const ids: string[] = [];
  const regex = new RegExp(signature.accountIdPattern, 'g');
  let match: RegExpExecArray | null;
  while ((match = regex.exec(page.body)) !== null) {
    const id = match[1] ?? match[0];
    if (!ids.includes(id)) ids.push(id);
    if (match[0].length === 0) regex.lastIndex++;
  }
  return ids;
}

export function detectSignature(signature: TechnologySignature, page: PageSignals): DetectedTechnology | null {
  const matchedSignals = signature.rules.filter((rule) => matchRule(rule, page)).map(describeRule);
  if (matchedSignals.length === 0) return null;

  return {
    signature,
    matchedSignals,
    accountIds: extractAccountIds(signature, page),
  };
}

export function detect(
  pageContent: string,
  headers: HeaderMap,
  catalog: SignatureCatalog
): DetectedTechnology[] {
  // A failed fetch yields an empty body; headers alone never count as a scan
  if (!pageContent) return [];

  const page = buildPageSignals(pageContent, headers);
  const detected: DetectedTechnology[] = [];
  const seen = new Set<string>();

  for (const signature of catalog.signatures) {
    if (seen.has(signature.name)) continue;
    const hit = detectSignature(signature, page);
    if (hit) {
      detected.push(hit);
      seen.add(signature.name);
    }
  }

  return detected;
}
