/**
 * SEND Stage
 * Goal: Hand drafted emails to the sender and stamp them as emailed
 */

import { BaseStage } from '../base-stage';
import { ScanResult } from '../../state/types';
import { scanService } from '../../state/scan-service';
import { StackreachConfig } from '../../config';
import { logger } from '../../lib/logger';
import { EmailSender, OutboundMessage } from './outbox-sender';

export function toOutboundMessage(scan: ScanResult): OutboundMessage | null {
  const email = scan.generatedEmail;
  if (scan.id === undefined || !email || scan.emails.length === 0) {
    return null;
  }

  return {
    scanId: scan.id,
    domain: scan.domain,
    to: scan.emails[0],
    fromName: email.personaName,
    fromEmail: email.personaEmail,
    personaId: email.personaId,
    variantId: email.variantId,
    mainTech: email.mainTech,
    subject: email.subject,
    body: email.body,
  };
}

export class SendStage extends BaseStage {
  private readonly sender: EmailSender;
  private readonly limit: number;
  private readonly now: () => number;
  private files: string[] = [];

  constructor(sender: EmailSender, limit?: number, config?: StackreachConfig, now: () => number = Date.now) {
    super('send', config);
    this.sender = sender;
    this.limit = limit || this.config.pipeline.maxDomainsPerRun;
    this.now = now;
  }

  getFiles(): string[] {
    return this.files;
  }

  protected async execute(): Promise<void> {
    const pending = scanService.getPendingSends(this.limit);

    if (pending.length === 0) {
      logger.info('No drafted emails to send');
      return;
    }

    logger.info(`Sending ${pending.length} emails`);

    const accepted: number[] = [];
    const claimed = new Set<string>();

    for (const scan of pending) {
      this.processed++;

      // One email per business, even if two drafts slipped through
      if (claimed.has(scan.domain) || scanService.hasBeenEmailed(scan.domain)) {
        this.skipped++;
        continue;
      }

      const message = toOutboundMessage(scan);
      if (!message) {
        this.skipped++;
        continue;
      }

      const outcome = await this.sender.send(message);
      if (outcome.success) {
        claimed.add(scan.domain);
        accepted.push(message.scanId);
      } else {
        this.recordError(`${scan.domain}: ${outcome.error ?? 'send failed'}`);
      }
    }

    this.files = await this.sender.flush();

    const sentAt = this.now();
    for (const id of accepted) {
      scanService.markEmailed(id, sentAt);
      this.passed++;
    }

    logger.info('Send complete', {
      sent: this.passed,
      failed: this.failed,
      files: this.files,
    });
  }
}

export { SendStage as default };
