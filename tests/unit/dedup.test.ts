/**
 * Unit tests for the deduplication tracker
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import { DedupTracker, HOUR_MS, InMemoryDomainRecordStore } from '../../src/engine/dedup';

const DAY_MS = 24 * HOUR_MS;
const T0 = 1_700_000_000_000;

describe('Deduplication tracker', () => {
  let now: number;
  let store: InMemoryDomainRecordStore;
  let tracker: DedupTracker;

  beforeEach(() => {
    now = T0;
    store = new InMemoryDomainRecordStore();
    tracker = new DedupTracker(store, () => now);
  });

  test('should let a new domain through and claim it', async () => {
    expect(await tracker.shouldProcess('https://www.Acme.com/about', DAY_MS)).toBe(true);
    expect(tracker.isInFlight('acme.com')).toBe(true);
  });

  test('should create a record on first scan', async () => {
    await tracker.shouldProcess('acme.com', DAY_MS);
    const record = await tracker.record('acme.com', 'retail');

    expect(record).toEqual({
      domain: 'acme.com',
      category: 'retail',
      firstSeen: T0,
      lastScanned: T0,
      timesScanned: 1,
    });
    expect(tracker.isInFlight('acme.com')).toBe(false);
    expect(store.size()).toBe(1);
  });

  test('should skip a domain scanned within the rescan window', async () => {
    await tracker.shouldProcess('acme.com', DAY_MS);
    await tracker.record('acme.com');

    now = T0 + HOUR_MS;
    expect(await tracker.shouldProcess('acme.com', DAY_MS)).toBe(false);
    expect(await tracker.shouldProcess('WWW.ACME.COM', DAY_MS)).toBe(false);
  });

  test('should allow a rescan once the window has passed', async () => {
    await tracker.shouldProcess('acme.com', DAY_MS);
    await tracker.record('acme.com', 'retail');

    now = T0 + DAY_MS;
    expect(await tracker.shouldProcess('acme.com', DAY_MS)).toBe(true);
    now = T0 + DAY_MS + 5;
    const record = await tracker.record('acme.com');

    expect(record.timesScanned).toBe(2);
    expect(record.firstSeen).toBe(T0);
    expect(record.lastScanned).toBe(T0 + DAY_MS + 5);
    expect(record.category).toBe('retail');
  });

  test('should let exactly one of several concurrent checks through', async () => {
    const results = await Promise.all(
      Array.from({ length: 5 }, () => tracker.shouldProcess('acme.com', DAY_MS))
    );
    expect(results.filter(Boolean)).toHaveLength(1);
  });

  test('should free the claim on release', async () => {
    expect(await tracker.shouldProcess('acme.com', DAY_MS)).toBe(true);
    expect(await tracker.shouldProcess('acme.com', DAY_MS)).toBe(false);
    tracker.release('acme.com');
    expect(await tracker.shouldProcess('acme.com', DAY_MS)).toBe(true);
  });

  test('should reject an empty domain', async () => {
    expect(await tracker.shouldProcess('   ', DAY_MS)).toBe(false);
  });
});
