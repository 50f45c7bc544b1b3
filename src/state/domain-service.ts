/**
 * Domain service - domains_seen table, the persistent side of the dedup tracker
 */

import { getDatabase, DatabaseWrapper, Row, readNumber, readString } from './database';
import { DomainRecord } from './types';
import { DomainRecordStore } from '../engine/dedup';
import { logger } from '../lib/logger';

function rowToDomainRecord(row: Row): DomainRecord {
  return {
    domain: readString(row, 'domain') ?? '',
    category: readString(row, 'category'),
    firstSeen: readNumber(row, 'first_seen') ?? 0,
    lastScanned: readNumber(row, 'last_scanned') ?? 0,
    timesScanned: readNumber(row, 'times_scanned') ?? 0,
  };
}

export class DomainService implements DomainRecordStore {
  private getDb(): DatabaseWrapper {
    return new DatabaseWrapper(getDatabase());
  }

  get(domain: string): DomainRecord | null {
    const db = this.getDb();
    const row = db.prepare('SELECT * FROM domains_seen WHERE domain = ?').get(domain);
    return row ? rowToDomainRecord(row) : null;
  }

  // Upsert keyed by domain
  put(record: DomainRecord): void {
    const db = this.getDb();
    const stmt = db.prepare(`
      INSERT INTO domains_seen (domain, category, first_seen, last_scanned, times_scanned)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(domain) DO UPDATE SET
        category = excluded.category,
        last_scanned = excluded.last_scanned,
        times_scanned = excluded.times_scanned
    `);

    stmt.run(record.domain, record.category, record.firstSeen, record.lastScanned, record.timesScanned);
    logger.debug(`Recorded domain: ${record.domain}`, { timesScanned: record.timesScanned });
  }

  count(category?: string): number {
    const db = this.getDb();
    const row = category
      ? db.prepare('SELECT COUNT(*) as count FROM domains_seen WHERE category = ?').get(category)
      : db.prepare('SELECT COUNT(*) as count FROM domains_seen').get();
    return row ? readNumber(row, 'count') ?? 0 : 0;
  }

  getStatsByCategory(): Record<string, number> {
    const db = this.getDb();
    const rows = db.prepare(`
      SELECT COALESCE(category, 'uncategorized') as category, COUNT(*) as count
      FROM domains_seen GROUP BY category
    `).all();

    const stats: Record<string, number> = {};
    for (const row of rows) {
      stats[readString(row, 'category') ?? 'uncategorized'] = readNumber(row, 'count') ?? 0;
    }
    return stats;
  }
}

export const domainService = new DomainService();
