/**
 * Run command - scan then send
 */

import { logger } from '../../lib/logger';
import { runScan, ScanOptions } from './scan';
import { runSend } from './send';

export interface RunOptions extends ScanOptions {
  skipSend?: boolean;
}

export async function runAll(options: RunOptions): Promise<void> {
  logger.info('Starting full run', { options });

  logger.info('=== Stage 1: SCAN ===');
  await runScan(options);

  if (!options.skipSend) {
    logger.info('=== Stage 2: SEND ===');
    await runSend({ limit: options.limit });
  } else {
    logger.info('Skipping SEND stage');
  }

  logger.info('Run completed successfully');
}
