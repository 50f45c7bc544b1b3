/**
 * Page fetcher
 * Failures come back as a FetchError on the result; fetch() never throws.
 */

import { FetchError } from '../../lib/errors';
import { normalizeUrl, RateLimiter, retry } from '../../lib/utils';
import { FetchConfig } from '../../config/types';
import { HeaderMap } from '../../engine/detector';

export interface FetchResult {
  content: string;
  headers: HeaderMap;
  error?: FetchError;
}

export interface Fetcher {
  fetch(domain: string): Promise<FetchResult>;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// Failure types worth another attempt
const RETRYABLE = new Set(['site_timeout', 'unknown', 'http_error']);

export function classifyFetchFailure(message: string): string {
  if (message.includes('ENOTFOUND') || message.includes('getaddrinfo')) return 'dns_error';
  if (message.includes('CERT') || message.includes('SSL')) return 'ssl_error';
  if (message.includes('abort') || message.includes('timeout')) return 'site_timeout';
  return 'unknown';
}

export class HttpFetcher implements Fetcher {
  private readonly config: FetchConfig;
  private readonly rateLimiter: RateLimiter;

  constructor(config: FetchConfig) {
    this.config = config;
    this.rateLimiter = new RateLimiter(config.requestsPerMinute, 60000);
  }

  async fetch(domain: string): Promise<FetchResult> {
    try {
      return await retry(() => this.attempt(domain), this.config.retries, this.config.retryDelay);
    } catch (error) {
      const fetchError = error instanceof FetchError
        ? error
        : new FetchError(domain, 'unknown', String(error));
      return { content: '', headers: {}, error: fetchError };
    }
  }

  // Throws only retryable failures; terminal ones come back as results
  private async attempt(domain: string): Promise<FetchResult> {
    await this.rateLimiter.acquire();
    const result = await this.fetchPage(domain);
    if (result.error && RETRYABLE.has(result.error.failureType)) {
      throw result.error;
    }
    return result;
  }

  private async fetchPage(domain: string): Promise<FetchResult> {
    const url = normalizeUrl(domain);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        redirect: 'follow',
        headers: {
          'User-Agent': this.config.userAgent || DEFAULT_USER_AGENT,
          'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
        },
      });

      const headers: HeaderMap = {};
      response.headers.forEach((value, name) => {
        headers[name] = value;
      });
      const cookies = response.headers.getSetCookie();
      if (cookies.length > 0) {
        headers['set-cookie'] = cookies;
      }

      if (!response.ok) {
        if (response.status === 404) {
          return { content: '', headers, error: new FetchError(domain, 'page_not_found') };
        }
        if (response.status === 403 || response.status === 429) {
          return { content: '', headers, error: new FetchError(domain, 'rate_limited', `HTTP ${response.status}`) };
        }
        return { content: '', headers, error: new FetchError(domain, 'http_error', `HTTP ${response.status}`) };
      }

      return { content: await response.text(), headers };
    } catch (error) {
      const message = error instanceof Error ? `${error.message} ${String(error.cause ?? '')}` : String(error);
      return { content: '', headers: {}, error: new FetchError(domain, classifyFetchFailure(message), message.trim()) };
    } finally {
      clearTimeout(timeout);
    }
  }
}
