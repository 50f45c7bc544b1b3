/**
 * Configuration type definitions
 * All weights, cadences and limits are defined here
 */

import { CombineMode } from '../engine/scorer';
import { MessageVariant, Persona, TechCategory } from '../engine/types';

// Where the static engine data lives
export interface CatalogConfig {
  signaturesPath: string;
  outreachPath: string;
}

// Scoring weight configuration; specialization is the agency's focus per category
export interface ScoringConfig {
  combine: CombineMode;
  defaultSpecialization: number;
  specialization: Partial<Record<TechCategory, number>>;
  technologyOverrides: Record<string, number>;
}

// Outreach rendering; personas/variants here replace the library's when set
export interface OutreachConfig {
  maxSupportingTechs: number;
  personas?: Persona[];
  variants?: MessageVariant[];
}

// Variant/persona usage window; 0 keeps lifetime counters
export interface RotationConfig {
  windowHours: number;
}

export interface DedupConfig {
  rescanAfterHours: number;
}

// Page fetching
export interface FetchConfig {
  timeout: number;          // ms
  retries: number;
  retryDelay: number;       // ms
  requestsPerMinute: number;
  userAgent?: string;
  emailPatterns: string[];  // regex patterns for emails
}

// Outbox configuration
export interface OutboxConfig {
  format: 'csv' | 'json' | 'both';
  directory: string;
  filenamePattern: string;  // supports {date}, {count}
}

// Main configuration interface
export interface StackreachConfig {
  version: string;
  catalog: CatalogConfig;
  scoring: ScoringConfig;
  outreach: OutreachConfig;
  rotation: RotationConfig;
  dedup: DedupConfig;
  fetch: FetchConfig;
  outbox: OutboxConfig;
  pipeline: {
    batchSize: number;
    maxDomainsPerRun: number;
    parallelism: number;
  };
}
