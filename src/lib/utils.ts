/**
 * Utility functions for Stackreach
 */

// Sleep for specified milliseconds
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Retry a function with exponential backoff
export async function retry<T>(
  fn: () => Promise<T>,
  maxRetries: number,
  baseDelay: number = 1000
): Promise<T> {
  let lastError = new Error('retry: no attempts made');

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (attempt < maxRetries) {
        const delay = baseDelay * Math.pow(2, attempt);
        await sleep(delay);
      }
    }
  }

  throw lastError;
}

// Chunk an array into smaller arrays
export function chunk<T>(array: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}

// Normalize email
export function normalizeEmail(email: string): string {
  return email.toLowerCase().trim();
}

// Reduce a URL or hostname to its bare domain: "https://www.Acme.com/shop" -> "acme.com"
export function normalizeDomain(input: string): string {
  const trimmed = input.trim().toLowerCase();
  if (!trimmed) return '';
  try {
    const parsed = new URL(/^https?:\/\//.test(trimmed) ? trimmed : `https://${trimmed}`);
    return parsed.hostname.replace(/^www\./, '').replace(/\.$/, '');
  } catch {
    return trimmed.replace(/^www\./, '').split('/')[0];
  }
}

// Normalize URL
export function normalizeUrl(url: string): string {
  if (!url) return '';
  let normalized = url.toLowerCase().trim();
  if (!normalized.startsWith('http://') && !normalized.startsWith('https://')) {
    normalized = `https://${normalized}`;
  }
  normalized = normalized.replace(/\/+$/, '');
  return normalized;
}

// Format date for display
export function formatDate(timestamp: number): string {
  return new Date(timestamp).toISOString().split('T')[0];
}

// Extract emails from text
export function extractEmails(text: string, patterns: string[]): string[] {
  const emails: Set<string> = new Set();

  for (const pattern of patterns) {
    const regex = new RegExp(pattern, 'gi');
    const matches = text.match(regex);
    if (matches) {
      for (const match of matches) {
        const normalized = normalizeEmail(match);
        // Filter out common false positives
        if (
          !normalized.includes('example.com') &&
          !normalized.includes('domain.com') &&
          !normalized.endsWith('.png') &&
          !normalized.endsWith('.jpg') &&
          !normalized.endsWith('.gif') &&
          !normalized.endsWith('.webp') &&
          !normalized.endsWith('.svg')
        ) {
          emails.add(normalized);
        }
      }
    }
  }

  return Array.from(emails);
}

// Rate limiter helper
export class RateLimiter {
  private queue: number[] = [];
  private readonly maxRequests: number;
  private readonly windowMs: number;

  constructor(maxRequests: number, windowMs: number) {
    this.maxRequests = maxRequests;
    this.windowMs = windowMs;
  }

  async acquire(): Promise<void> {
    const now = Date.now();

    // Remove old entries
    this.queue = this.queue.filter((time) => now - time < this.windowMs);

    if (this.queue.length >= this.maxRequests) {
      // Wait until oldest request expires
      const oldestTime = this.queue[0];
      const waitTime = this.windowMs - (now - oldestTime) + 100; // +100ms buffer
      await sleep(waitTime);
      return this.acquire();
    }

    this.queue.push(now);
  }
}

// FIFO async mutex; critical sections queued behind the holder run in arrival order
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

// Map over items with at most `limit` promises in flight, preserving input order in the result
export async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let cursor = 0;

  async function worker(): Promise<void> {
    while (cursor < items.length) {
      const index = cursor++;
      results[index] = await fn(items[index], index);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}
