/**
 * Scan command
 */

import { ScanStage } from '../../stages/scan';
import { HttpFetcher } from '../../stages/scan/fetcher';
import { parseTargets, readTargets } from '../../stages/scan/targets';
import { StageResult } from '../../stages/base-stage';
import { createEngine } from '../../engine/factory';
import { rotationService } from '../../state/rotation-service';
import { getConfig } from '../../config';
import { logger } from '../../lib/logger';

export interface ScanOptions {
  file?: string;
  domain?: string[];
  limit?: number;
}

export async function runScan(options: ScanOptions): Promise<StageResult> {
  logger.info('Starting SCAN stage', { options });

  const config = getConfig();

  let targets = options.file ? readTargets(options.file) : [];
  const listed = new Set(targets.map((t) => t.domain));
  targets = [...targets, ...parseTargets((options.domain ?? []).join('\n')).filter((t) => !listed.has(t.domain))];
  if (options.limit) {
    targets = targets.slice(0, options.limit);
  }
  if (targets.length === 0) {
    throw new Error('No domains given; pass --file or --domain');
  }

  const engine = createEngine(config, { snapshot: rotationService.load() });
  const stage = new ScanStage(targets, { engine, fetcher: new HttpFetcher(config.fetch) }, config);
  const result = await stage.runStage({ source: options.file ?? 'cli' });

  if (!result.success) {
    throw new Error(`Scan failed: ${result.errors.join(', ')}`);
  }

  logger.info('SCAN complete', {
    processed: result.processed,
    generated: result.passed,
    failed: result.failed,
    skipped: result.skipped,
  });
  return result;
}
