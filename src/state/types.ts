/**
 * Persistent record types for Stackreach
 */

import { GeneratedEmail, ScoredTechnologySummary, TechnologySummary } from '../engine/types';

export type { DomainRecord } from '../engine/types';

// One row per processing attempt; never overwritten except for the emailed stamp
export interface ScanResult {
  id?: number;
  domain: string;
  technologies: TechnologySummary[];
  scoredTechnologies: ScoredTechnologySummary[];
  topTechnology: string | null;
  emails: string[];
  generatedEmail: GeneratedEmail | null;
  category?: string;
  error: string | null;
  emailed: boolean;
  emailedAt?: number;          // Unix ms
  runId?: string;
  createdAt: number;           // Unix ms
}

// Run status
export type RunStatus = 'running' | 'completed' | 'failed' | 'cancelled';

// Pipeline stage names
export type StageName = 'scan' | 'send';

// Run metadata
export interface RunMetadata {
  config?: Record<string, unknown>;
  source?: string;
  errors?: string[];
}

// Pipeline run record
export interface Run {
  runId: string;
  stage: StageName;
  startedAt: number;
  completedAt?: number;
  status: RunStatus;
  domainsProcessed: number;
  domainsPassed: number;
  domainsFailed: number;
  errorMessage?: string;
  metadata?: RunMetadata;
}
