/**
 * Rotation service - persists rotation store snapshots between runs
 */

import { getDatabase, DatabaseWrapper, readNumber, readString } from './database';
import { RotationEntry, RotationSnapshot, UsageKind } from '../engine/rotation';
import { logger } from '../lib/logger';

function toKind(value: string | undefined): UsageKind | null {
  return value === 'persona' || value === 'variant' ? value : null;
}

export class RotationService {
  private getDb(): DatabaseWrapper {
    return new DatabaseWrapper(getDatabase());
  }

  // null when no run has saved rotation state yet
  load(): RotationSnapshot | null {
    const db = this.getDb();
    const state = db.prepare('SELECT * FROM rotation_state WHERE id = 1').get();
    if (!state) return null;

    const entries: RotationEntry[] = [];
    for (const row of db.prepare('SELECT * FROM rotation_usage ORDER BY kind, scope, key').all()) {
      const kind = toKind(readString(row, 'kind'));
      if (!kind) continue;
      entries.push({
        kind,
        scope: readString(row, 'scope') ?? '',
        key: readString(row, 'key') ?? '',
        count: readNumber(row, 'count') ?? 0,
        lastUsedSeq: readNumber(row, 'last_used_seq') ?? 0,
      });
    }

    return {
      windowStartedAt: readNumber(state, 'window_started_at') ?? Date.now(),
      sequence: readNumber(state, 'sequence') ?? 0,
      entries,
    };
  }

  // Replaces stored state with the snapshot; a window reset clears rows too
  save(snapshot: RotationSnapshot): void {
    const db = this.getDb();
    db.transaction(() => {
      db.prepare('DELETE FROM rotation_usage').run();
      const insert = db.prepare(`
        INSERT INTO rotation_usage (kind, scope, key, count, last_used_seq) VALUES (?, ?, ?, ?, ?)
      `);
      for (const entry of snapshot.entries) {
        insert.run(entry.kind, entry.scope, entry.key, entry.count, entry.lastUsedSeq);
      }
      db.prepare(`
        INSERT INTO rotation_state (id, window_started_at, sequence) VALUES (1, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          window_started_at = excluded.window_started_at,
          sequence = excluded.sequence
      `).run(snapshot.windowStartedAt, snapshot.sequence);
    });

    logger.debug('Saved rotation state', { entries: snapshot.entries.length, sequence: snapshot.sequence });
  }

  // Per-category usage counts, for stats output
  getUsage(kind: UsageKind): Array<{ scope: string; key: string; count: number }> {
    const rows = this.getDb()
      .prepare('SELECT scope, key, count FROM rotation_usage WHERE kind = ? ORDER BY scope, count DESC, key')
      .all(kind);
    return rows.map((row) => ({
      scope: readString(row, 'scope') ?? '',
      key: readString(row, 'key') ?? '',
      count: readNumber(row, 'count') ?? 0,
    }));
  }
}

export const rotationService = new RotationService();
