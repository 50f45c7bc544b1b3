/**
 * Core engine types: signatures, detections, scores, personas, variants, emails
 */

export const TECH_CATEGORIES = [
  'crm',
  'ecommerce',
  'payments',
  'email-marketing',
  'analytics',
  'cdp-testing',
  'cms-hosting',
  'other',
] as const;

export type TechCategory = (typeof TECH_CATEGORIES)[number];

// Detection rules, evaluated in order; any match detects the signature
export type DetectionRule =
  | { type: 'html'; contains: string }
  | { type: 'regex'; pattern: string; flags?: string }
  | { type: 'script'; contains: string }
  | { type: 'header'; name: string; pattern?: string }
  | { type: 'cookie'; name: string };

export interface TechnologySignature {
  name: string;
  category: TechCategory;
  rules: DetectionRule[];
  enterpriseWeight: number;
  talkingPoint: string;
  accountIdPattern?: string;   // first capture group is the account/portal id
}

export interface SignatureCatalog {
  version: string;
  signatures: readonly TechnologySignature[];
}

export interface DetectedTechnology {
  signature: TechnologySignature;
  matchedSignals: string[];
  accountIds: string[];
}

export interface ScoredTechnology extends DetectedTechnology {
  specializationWeight: number;
  score: number;
  rank: number;
}

export interface Persona {
  id: string;
  name: string;
  email: string;
  role: string;
  tone: string;
  categories?: TechCategory[];
}

export interface MessageVariant {
  id: string;
  category: TechCategory;
  subject: string;
  body: string;
}

export interface GeneratedEmail {
  subject: string;
  body: string;
  mainTech: string;
  supportingTechs: readonly string[];
  personaId: string;
  personaName: string;
  personaEmail: string;
  personaRole: string;
  variantId: string;
}

export interface Selection {
  persona: Persona;
  variant: MessageVariant;
}

// Flattened view of a detection, as persisted on a scan row
export interface TechnologySummary {
  name: string;
  category: TechCategory;
  matchedSignals: string[];
  accountIds: string[];
}

export interface ScoredTechnologySummary extends TechnologySummary {
  enterpriseWeight: number;
  specializationWeight: number;
  score: number;
  rank: number;
}

export interface DomainRecord {
  domain: string;
  category?: string;
  firstSeen: number;       // Unix ms
  lastScanned: number;     // Unix ms
  timesScanned: number;
}
