/**
 * Send command
 */

import { SendStage } from '../../stages/send';
import { OutboxSender } from '../../stages/send/outbox-sender';
import { StageResult } from '../../stages/base-stage';
import { getConfig } from '../../config';
import { logger } from '../../lib/logger';

export interface SendOptions {
  limit?: number;
  format?: 'csv' | 'json' | 'both';
}

export async function runSend(options: SendOptions): Promise<StageResult> {
  logger.info('Starting SEND stage', { options });

  const config = getConfig();
  const outbox = { ...config.outbox, format: options.format || config.outbox.format };
  const stage = new SendStage(new OutboxSender(outbox), options.limit, config);
  const result = await stage.runStage();

  if (!result.success) {
    throw new Error(`Send failed: ${result.errors.join(', ')}`);
  }

  logger.info('SEND complete', {
    processed: result.processed,
    sent: result.passed,
    failed: result.failed,
    files: stage.getFiles(),
  });
  return result;
}
