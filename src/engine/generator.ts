/**
 * Email generator
 * Renders a variant's subject/body with {{placeholder}} bindings. Any placeholder
 * without a binding fails the whole render; there are no partial emails.
 */

import { TemplateRenderError } from '../lib/errors';
import { GeneratedEmail, MessageVariant, Persona, TechCategory, TechnologySignature } from './types';

export const DEFAULT_MAX_SUPPORTING = 2;

const PLACEHOLDER_REGEX = /\{\{\s*([a-zA-Z0-9_]+)\s*\}\}/g;
const LEFTOVER_REGEX = /\{\{[^{}]*\}\}/g;

const CATEGORY_LABELS: Record<TechCategory, string> = {
  'crm': 'CRM',
  'ecommerce': 'ecommerce',
  'payments': 'payments',
  'email-marketing': 'email marketing',
  'analytics': 'analytics',
  'cdp-testing': 'data and testing',
  'cms-hosting': 'website platform',
  'other': 'tooling',
};

export type TechRef = Pick<TechnologySignature, 'name' | 'category' | 'talkingPoint'>;

export interface RenderOptions {
  maxSupporting?: number;
  domain?: string;
}

export function joinNames(names: string[]): string {
  if (names.length <= 1) return names.join('');
  if (names.length === 2) return `${names[0]} and ${names[1]}`;
  return `${names.slice(0, -1).join(', ')} and ${names[names.length - 1]}`;
}

export function firstName(persona: Pick<Persona, 'name'>): string {
  return persona.name.trim().split(/\s+/)[0];
}

// Short sender label, e.g. "Jordan (Partnerships)"
export function personaLabel(persona: Pick<Persona, 'name' | 'role'>): string {
  return `${firstName(persona)} (${persona.role})`;
}

export function pickSupporting(main: TechRef, supporting: readonly TechRef[], max: number): string[] {
  const names: string[] = [];
  for (const tech of supporting) {
    if (names.length >= max) break;
    if (tech.name === main.name || names.includes(tech.name)) continue;
    names.push(tech.name);
  }
  return names;
}

export function buildBindings(
  main: TechRef,
  supportingNames: string[],
  persona: Persona,
  options: RenderOptions
): Record<string, string> {
  const supportingList = joinNames(supportingNames);
  const bindings: Record<string, string> = {
    main_tech: main.name,
    main_category: CATEGORY_LABELS[main.category],
    talking_point: main.talkingPoint,
    supporting_techs: supportingList,
    supporting_line: supportingList
      ? `I also noticed ${supportingList} in your stack, so anything we suggest would fit around what you already run.`
      : '',
    persona_name: persona.name,
    persona_first_name: firstName(persona),
    persona_role: persona.role,
    persona_email: persona.email,
    persona_tone: persona.tone,
  };
  if (options.domain) {
    bindings.domain = options.domain;
  }
  return bindings;
}

function substitute(template: string, bindings: Record<string, string>, missing: Set<string>): string {
  return template.replace(PLACEHOLDER_REGEX, (token: string, name: string) => {
    const value = bindings[name];
    if (value === undefined) {
      missing.add(name);
      return token;
    }
    return value;
  });
}

function tidy(text: string): string {
  return text
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function render(
  main: TechRef,
  supporting: readonly TechRef[],
  persona: Persona,
  variant: MessageVariant,
  options: RenderOptions = {}
): GeneratedEmail {
  const supportingNames = pickSupporting(main, supporting, options.maxSupporting ?? DEFAULT_MAX_SUPPORTING);
  const bindings = buildBindings(main, supportingNames, persona, options);

  const missing = new Set<string>();
  const subject = tidy(substitute(variant.subject, bindings, missing)).replace(/\s+/g, ' ');
  const body = tidy(substitute(variant.body, bindings, missing));

  // Malformed tokens such as "{{ main tech }}" survive substitution
  for (const text of [subject, body]) {
    for (const leftover of text.match(LEFTOVER_REGEX) ?? []) {
      missing.add(leftover.slice(2, -2).trim());
    }
  }
  if (missing.size > 0) {
    throw new TemplateRenderError(variant.id, [...missing].sort());
  }

  return Object.freeze({
    subject,
    body,
    mainTech: main.name,
    supportingTechs: Object.freeze(supportingNames),
    personaId: persona.id,
    personaName: persona.name,
    personaEmail: persona.email,
    personaRole: persona.role,
    variantId: variant.id,
  });
}
