/**
 * Outbox sender
 * Queues drafted emails and writes them to campaign-ready CSV/JSON files on flush
 */

import * as fs from 'fs';
import * as path from 'path';
import { OutboxConfig } from '../../config/types';
import { logger } from '../../lib/logger';
import { formatDate } from '../../lib/utils';

export interface OutboundMessage {
  scanId: number;
  domain: string;
  to: string;
  fromName: string;
  fromEmail: string;
  personaId: string;
  variantId: string;
  mainTech: string;
  subject: string;
  body: string;
}

export interface SendOutcome {
  success: boolean;
  error?: string;
}

export interface EmailSender {
  send(message: OutboundMessage): Promise<SendOutcome>;
  // Returns the files (or other sinks) written
  flush(): Promise<string[]>;
}

export const OUTBOX_FIELDS: ReadonlyArray<keyof OutboundMessage> = [
  'domain',
  'to',
  'fromName',
  'fromEmail',
  'subject',
  'body',
  'mainTech',
  'variantId',
  'personaId',
];

const RECIPIENT_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function escapeCsvValue(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = String(value);

  // Escape if contains comma, quote, or newline
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

export function toCsv(messages: readonly OutboundMessage[]): string {
  const rows: string[] = [OUTBOX_FIELDS.join(',')];
  for (const message of messages) {
    rows.push(OUTBOX_FIELDS.map((field) => escapeCsvValue(message[field])).join(','));
  }
  return rows.join('\n');
}

export class OutboxSender implements EmailSender {
  private readonly config: OutboxConfig;
  private readonly now: () => number;
  private queue: OutboundMessage[] = [];

  constructor(config: OutboxConfig, now: () => number = Date.now) {
    this.config = config;
    this.now = now;
  }

  async send(message: OutboundMessage): Promise<SendOutcome> {
    if (!RECIPIENT_PATTERN.test(message.to)) {
      return { success: false, error: `Invalid recipient address: ${message.to}` };
    }
    this.queue.push(message);
    return { success: true };
  }

  pending(): number {
    return this.queue.length;
  }

  async flush(): Promise<string[]> {
    if (this.queue.length === 0) {
      return [];
    }

    const messages = this.queue;
    const outputDir = this.config.directory;
    if (!fs.existsSync(outputDir)) {
      fs.mkdirSync(outputDir, { recursive: true });
    }

    const filenameBase = this.config.filenamePattern
      .replace('{date}', formatDate(this.now()))
      .replace('{count}', String(messages.length));

    const files: string[] = [];

    if (this.config.format === 'csv' || this.config.format === 'both') {
      const csvPath = path.join(outputDir, `${filenameBase}.csv`);
      fs.writeFileSync(csvPath, toCsv(messages), 'utf-8');
      logger.info(`Wrote CSV: ${csvPath}`, { rows: messages.length });
      files.push(csvPath);
    }

    if (this.config.format === 'json' || this.config.format === 'both') {
      const jsonPath = path.join(outputDir, `${filenameBase}.json`);
      const output = {
        metadata: {
          exportedAt: new Date(this.now()).toISOString(),
          count: messages.length,
        },
        messages,
      };
      fs.writeFileSync(jsonPath, JSON.stringify(output, null, 2), 'utf-8');
      logger.info(`Wrote JSON: ${jsonPath}`, { messages: messages.length });
      files.push(jsonPath);
    }

    this.queue = [];
    return files;
  }
}
