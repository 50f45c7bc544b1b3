/**
 * Deduplication tracker
 * Gates re-scanning by last scan time. It does not decide whether a business
 * gets emailed; the scan store's emailed flag does that.
 */

import { Mutex, normalizeDomain } from '../lib/utils';
import { DomainRecord } from './types';

export const HOUR_MS = 60 * 60 * 1000;

export interface DomainRecordStore {
  get(domain: string): DomainRecord | null;
  put(record: DomainRecord): void;
}

export class InMemoryDomainRecordStore implements DomainRecordStore {
  private records = new Map<string, DomainRecord>();

  get(domain: string): DomainRecord | null {
    const record = this.records.get(domain);
    return record ? { ...record } : null;
  }

  put(record: DomainRecord): void {
    this.records.set(record.domain, { ...record });
  }

  size(): number {
    return this.records.size;
  }
}

export class DedupTracker {
  private readonly mutex = new Mutex();
  private readonly inFlight = new Set<string>();
  private readonly store: DomainRecordStore;
  private readonly now: () => number;

  constructor(store: DomainRecordStore, now: () => number = Date.now) {
    this.store = store;
    this.now = now;
  }

  // true claims the domain for the caller until record() or release()
  async shouldProcess(domain: string, rescanAfterMs: number): Promise<boolean> {
    const key = normalizeDomain(domain);
    if (!key) return false;

    return this.mutex.runExclusive(() => {
      if (this.inFlight.has(key)) return false;

      const existing = this.store.get(key);
      if (existing && existing.lastScanned > this.now() - rescanAfterMs) {
        return false;
      }

      this.inFlight.add(key);
      return true;
    });
  }

  async record(domain: string, category?: string): Promise<DomainRecord> {
    const key = normalizeDomain(domain);

    return this.mutex.runExclusive(() => {
      const now = this.now();
      const existing = this.store.get(key);
      const record: DomainRecord = existing
        ? {
            ...existing,
            category: category ?? existing.category,
            lastScanned: now,
            timesScanned: existing.timesScanned + 1,
          }
        : {
            domain: key,
            category,
            firstSeen: now,
            lastScanned: now,
            timesScanned: 1,
          };

      this.store.put(record);
      this.inFlight.delete(key);
      return record;
    });
  }

  release(domain: string): void {
    this.inFlight.delete(normalizeDomain(domain));
  }

  isInFlight(domain: string): boolean {
    return this.inFlight.has(normalizeDomain(domain));
  }
}
