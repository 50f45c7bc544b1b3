/**
 * Scan service - append-only scan history in tech_scans
 * Owns the emailed flag, which is the "never email the same business twice" gate
 */

import { getDatabase, DatabaseWrapper, Row, readJson, readNumber, readString } from './database';
import { ScanResult } from './types';
import {
  GeneratedEmail,
  ScoredTechnologySummary,
  TECH_CATEGORIES,
  TechCategory,
  TechnologySummary,
} from '../engine/types';
import { logger } from '../lib/logger';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isCategory(value: unknown): value is TechCategory {
  return TECH_CATEGORIES.some((c) => c === value);
}

function isTechnologySummary(value: unknown): value is TechnologySummary {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    isCategory(value.category) &&
    isStringArray(value.matchedSignals) &&
    isStringArray(value.accountIds)
  );
}

function isTechnologySummaries(value: unknown): value is TechnologySummary[] {
  return Array.isArray(value) && value.every(isTechnologySummary);
}

function isScoredSummaries(value: unknown): value is ScoredTechnologySummary[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item) =>
        isTechnologySummary(item) &&
        isRecord(item) &&
        typeof item.score === 'number' &&
        typeof item.rank === 'number' &&
        typeof item.enterpriseWeight === 'number' &&
        typeof item.specializationWeight === 'number'
    )
  );
}

function isGeneratedEmail(value: unknown): value is GeneratedEmail | null {
  if (value === null) return true;
  return (
    isRecord(value) &&
    ['subject', 'body', 'mainTech', 'personaId', 'personaName', 'personaEmail', 'personaRole', 'variantId'].every(
      (key) => typeof value[key] === 'string'
    ) &&
    isStringArray(value.supportingTechs)
  );
}

function rowToScanResult(row: Row): ScanResult {
  return {
    id: readNumber(row, 'id'),
    domain: readString(row, 'domain') ?? '',
    technologies: readJson(row, 'technologies', [], isTechnologySummaries),
    scoredTechnologies: readJson(row, 'scored_technologies', [], isScoredSummaries),
    topTechnology: readString(row, 'top_technology') ?? null,
    emails: readJson(row, 'emails', [], isStringArray),
    generatedEmail: readJson(row, 'generated_email', null, isGeneratedEmail),
    category: readString(row, 'category'),
    error: readString(row, 'error') ?? null,
    emailed: readNumber(row, 'emailed') === 1,
    emailedAt: readNumber(row, 'emailed_at'),
    runId: readString(row, 'run_id'),
    createdAt: readNumber(row, 'created_at') ?? 0,
  };
}

export interface ScanStats {
  total: number;
  withEmail: number;
  emailed: number;
  errors: number;
  noSignal: number;
  byTopTechnology: Record<string, number>;
  byVariant: Record<string, number>;
  byPersona: Record<string, number>;
}

export class ScanService {
  private getDb(): DatabaseWrapper {
    return new DatabaseWrapper(getDatabase());
  }

  append(result: ScanResult): ScanResult {
    if (result.generatedEmail && result.generatedEmail.mainTech !== result.topTechnology) {
      throw new Error(
        `Generated email main tech ${result.generatedEmail.mainTech} does not match top technology ${result.topTechnology}`
      );
    }

    const db = this.getDb();
    const stmt = db.prepare(`
      INSERT INTO tech_scans (
        domain, technologies, scored_technologies, top_technology, emails,
        generated_email, category, error, emailed, emailed_at, run_id, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const { lastInsertRowid } = stmt.run(
      result.domain,
      JSON.stringify(result.technologies),
      JSON.stringify(result.scoredTechnologies),
      result.topTechnology,
      JSON.stringify(result.emails),
      result.generatedEmail ? JSON.stringify(result.generatedEmail) : null,
      result.category,
      result.error,
      result.emailed,
      result.emailedAt,
      result.runId,
      result.createdAt
    );

    logger.debug(`Stored scan for ${result.domain}`, { id: lastInsertRowid, top: result.topTechnology });
    return { ...result, id: lastInsertRowid };
  }

  getById(id: number): ScanResult | null {
    const row = this.getDb().prepare('SELECT * FROM tech_scans WHERE id = ?').get(id);
    return row ? rowToScanResult(row) : null;
  }

  getByDomain(domain: string): ScanResult[] {
    const rows = this.getDb()
      .prepare('SELECT * FROM tech_scans WHERE domain = ? ORDER BY created_at ASC, id ASC')
      .all(domain);
    return rows.map(rowToScanResult);
  }

  hasBeenEmailed(domain: string): boolean {
    const row = this.getDb()
      .prepare('SELECT COUNT(*) as count FROM tech_scans WHERE domain = ? AND emailed = 1')
      .get(domain);
    return (row ? readNumber(row, 'count') ?? 0 : 0) > 0;
  }

  // Latest unsent email per domain, for domains never emailed before
  getPendingSends(limit?: number): ScanResult[] {
    const sql = `
      SELECT s.* FROM tech_scans s
      WHERE s.generated_email IS NOT NULL
        AND s.emailed = 0
        AND s.emails != '[]'
        AND s.id = (SELECT MAX(id) FROM tech_scans l WHERE l.domain = s.domain AND l.generated_email IS NOT NULL)
        AND NOT EXISTS (SELECT 1 FROM tech_scans e WHERE e.domain = s.domain AND e.emailed = 1)
      ORDER BY s.created_at ASC, s.id ASC
      ${limit ? 'LIMIT ?' : ''}
    `;
    const stmt = this.getDb().prepare(sql);
    const rows = limit ? stmt.all(limit) : stmt.all();
    return rows.map(rowToScanResult);
  }

  markEmailed(id: number, emailedAt: number = Date.now()): void {
    this.getDb()
      .prepare('UPDATE tech_scans SET emailed = 1, emailed_at = ? WHERE id = ?')
      .run(emailedAt, id);
  }

  getStats(): ScanStats {
    const rows = this.getDb().prepare('SELECT * FROM tech_scans').all().map(rowToScanResult);
    const stats: ScanStats = {
      total: rows.length,
      withEmail: 0,
      emailed: 0,
      errors: 0,
      noSignal: 0,
      byTopTechnology: {},
      byVariant: {},
      byPersona: {},
    };

    const bump = (bucket: Record<string, number>, key: string): void => {
      bucket[key] = (bucket[key] ?? 0) + 1;
    };

    for (const scan of rows) {
      if (scan.error) stats.errors++;
      if (!scan.topTechnology && !scan.error) stats.noSignal++;
      if (scan.topTechnology) bump(stats.byTopTechnology, scan.topTechnology);
      if (scan.emailed) stats.emailed++;
      if (scan.generatedEmail) {
        stats.withEmail++;
        bump(stats.byVariant, scan.generatedEmail.variantId);
        bump(stats.byPersona, scan.generatedEmail.personaName);
      }
    }

    return stats;
  }
}

export const scanService = new ScanService();
