/**
 * Rotation store
 * Owns persona and variant usage history. Every read-modify-write goes through
 * transaction(), which is serialized by a mutex so concurrent batch workers
 * never observe the same least-used state.
 */

import { Mutex } from '../lib/utils';

export type UsageKind = 'persona' | 'variant';

export interface RotationEntry {
  kind: UsageKind;
  scope: string;       // technology category
  key: string;         // persona id or variant id
  count: number;
  lastUsedSeq: number;
}

export interface RotationSnapshot {
  windowStartedAt: number;
  sequence: number;
  entries: RotationEntry[];
}

export interface RotationLedger {
  usage(kind: UsageKind, scope: string, key: string): number;
  lastUsed(kind: UsageKind, scope: string, key: string): number | undefined;
  recordUse(scope: string, personaId: string, variantId: string): void;
}

export interface RotationOptions {
  windowMs?: number;           // 0 = counters live for the store's lifetime
  now?: () => number;
  snapshot?: RotationSnapshot;
}

function entryKey(kind: UsageKind, scope: string, key: string): string {
  return `${kind}|${scope}|${key}`;
}

export class RotationStore {
  private readonly mutex = new Mutex();
  private readonly windowMs: number;
  private readonly now: () => number;
  private entries = new Map<string, RotationEntry>();
  private sequence = 0;
  private windowStartedAt: number;

  constructor(options: RotationOptions = {}) {
    this.windowMs = options.windowMs ?? 0;
    this.now = options.now ?? Date.now;
    this.windowStartedAt = this.now();

    if (options.snapshot) {
      this.windowStartedAt = options.snapshot.windowStartedAt;
      this.sequence = options.snapshot.sequence;
      for (const entry of options.snapshot.entries) {
        this.entries.set(entryKey(entry.kind, entry.scope, entry.key), { ...entry });
      }
    }
  }

  async transaction<T>(fn: (ledger: RotationLedger) => T): Promise<T> {
    return this.mutex.runExclusive(() => {
      this.rollWindowIfDue();
      return fn(this.ledger());
    });
  }

  usage(kind: UsageKind, scope: string, key: string): number {
    return this.entries.get(entryKey(kind, scope, key))?.count ?? 0;
  }

  snapshot(): RotationSnapshot {
    return {
      windowStartedAt: this.windowStartedAt,
      sequence: this.sequence,
      entries: [...this.entries.values()].map((entry) => ({ ...entry })),
    };
  }

  private rollWindowIfDue(): void {
    if (this.windowMs <= 0) return;
    const now = this.now();
    if (now - this.windowStartedAt >= this.windowMs) {
      this.entries.clear();
      this.windowStartedAt = now;
    }
  }

  private bump(kind: UsageKind, scope: string, key: string, seq: number): void {
    const id = entryKey(kind, scope, key);
    const entry = this.entries.get(id) ?? { kind, scope, key, count: 0, lastUsedSeq: 0 };
    entry.count += 1;
    entry.lastUsedSeq = seq;
    this.entries.set(id, entry);
  }

  private ledger(): RotationLedger {
    return {
      usage: (kind, scope, key) => this.usage(kind, scope, key),
      lastUsed: (kind, scope, key) => this.entries.get(entryKey(kind, scope, key))?.lastUsedSeq,
      recordUse: (scope, personaId, variantId) => {
        const seq = ++this.sequence;
        this.bump('persona', scope, personaId, seq);
        this.bump('variant', scope, variantId, seq);
      },
    };
  }
}
