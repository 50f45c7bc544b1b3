/**
 * Run service - track pipeline execution runs
 */

import * as crypto from 'crypto';
import { getDatabase, DatabaseWrapper, Row, readNumber, readString } from './database';
import { Run, RunStatus, StageName, RunMetadata } from './types';
import { logger } from '../lib/logger';

const STAGES: readonly StageName[] = ['scan', 'send'];
const STATUSES: readonly RunStatus[] = ['running', 'completed', 'failed', 'cancelled'];

function generateRunId(): string {
  const timestamp = Date.now().toString(36);
  const random = crypto.randomBytes(4).toString('hex');
  return `run_${timestamp}_${random}`;
}

function isRunMetadata(value: unknown): value is RunMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rowToRun(row: Row): Run {
  const stage = STAGES.find((s) => s === readString(row, 'stage')) ?? 'scan';
  const status = STATUSES.find((s) => s === readString(row, 'status')) ?? 'failed';
  const rawMetadata = readString(row, 'metadata');
  const metadata: unknown = rawMetadata ? JSON.parse(rawMetadata) : undefined;

  return {
    runId: readString(row, 'run_id') ?? '',
    stage,
    startedAt: readNumber(row, 'started_at') ?? 0,
    completedAt: readNumber(row, 'completed_at'),
    status,
    domainsProcessed: readNumber(row, 'domains_processed') ?? 0,
    domainsPassed: readNumber(row, 'domains_passed') ?? 0,
    domainsFailed: readNumber(row, 'domains_failed') ?? 0,
    errorMessage: readString(row, 'error_message'),
    metadata: isRunMetadata(metadata) ? metadata : undefined,
  };
}

export class RunService {
  private getDb(): DatabaseWrapper {
    return new DatabaseWrapper(getDatabase());
  }

  // Start a new run
  start(stage: StageName, metadata?: RunMetadata): Run {
    const run: Run = {
      runId: generateRunId(),
      stage,
      startedAt: Date.now(),
      status: 'running',
      domainsProcessed: 0,
      domainsPassed: 0,
      domainsFailed: 0,
      metadata,
    };

    const db = this.getDb();
    const stmt = db.prepare(`
      INSERT INTO runs (run_id, stage, started_at, status, domains_processed, domains_passed, domains_failed, metadata)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      run.runId,
      run.stage,
      run.startedAt,
      run.status,
      run.domainsProcessed,
      run.domainsPassed,
      run.domainsFailed,
      run.metadata ? JSON.stringify(run.metadata) : null
    );

    logger.setContext(stage, run.runId);
    logger.info(`Started ${stage} run`, { runId: run.runId });

    return run;
  }

  // Complete a run successfully
  complete(runId: string, processed: number, passed: number, failed: number): void {
    const db = this.getDb();
    const stmt = db.prepare(`
      UPDATE runs SET
        completed_at = ?,
        status = ?,
        domains_processed = ?,
        domains_passed = ?,
        domains_failed = ?
      WHERE run_id = ?
    `);

    stmt.run(Date.now(), 'completed', processed, passed, failed, runId);
    logger.info(`Completed run`, { runId, processed, passed, failed });
  }

  // Fail a run
  fail(runId: string, errorMessage: string, processed?: number): void {
    const db = this.getDb();
    const stmt = db.prepare(`
      UPDATE runs SET
        completed_at = ?,
        status = ?,
        error_message = ?,
        domains_processed = COALESCE(?, domains_processed)
      WHERE run_id = ?
    `);

    stmt.run(Date.now(), 'failed', errorMessage, processed, runId);
    logger.error(`Run failed`, { runId, errorMessage });
  }

  // Update progress
  updateProgress(runId: string, processed: number, passed: number, failed: number): void {
    const db = this.getDb();
    const stmt = db.prepare(`
      UPDATE runs SET
        domains_processed = ?,
        domains_passed = ?,
        domains_failed = ?
      WHERE run_id = ?
    `);

    stmt.run(processed, passed, failed, runId);
  }

  // Get run by ID
  getById(runId: string): Run | null {
    const db = this.getDb();
    const row = db.prepare('SELECT * FROM runs WHERE run_id = ?').get(runId);
    return row ? rowToRun(row) : null;
  }

  // Get recent runs across all stages
  getRecent(limit: number = 10): Run[] {
    const db = this.getDb();
    const rows = db.prepare('SELECT * FROM runs ORDER BY started_at DESC LIMIT ?').all(limit);
    return rows.map(rowToRun);
  }

  // Get statistics
  getStats(): Record<string, { total: number; completed: number; failed: number }> {
    const db = this.getDb();
    const rows = db.prepare(`
      SELECT stage, status, COUNT(*) as count
      FROM runs
      GROUP BY stage, status
    `).all();

    const stats: Record<string, { total: number; completed: number; failed: number }> = {};

    for (const row of rows) {
      const stage = readString(row, 'stage') ?? 'unknown';
      const status = readString(row, 'status');
      const count = readNumber(row, 'count') ?? 0;
      if (!stats[stage]) {
        stats[stage] = { total: 0, completed: 0, failed: 0 };
      }
      stats[stage].total += count;
      if (status === 'completed') {
        stats[stage].completed += count;
      } else if (status === 'failed') {
        stats[stage].failed += count;
      }
    }

    return stats;
  }
}

export const runService = new RunService();
