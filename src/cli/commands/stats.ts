/**
 * Stats command - show scan, rotation and run statistics
 */

import { domainService, rotationService, runService, scanService } from '../../state';
import { logger } from '../../lib/logger';

export async function showStats(): Promise<void> {
  logger.info('Gathering statistics...');

  // Domain statistics
  console.log('\n=== Domains ===');
  console.log(`Domains seen: ${domainService.count()}`);
  for (const [category, count] of Object.entries(domainService.getStatsByCategory())) {
    console.log(`  ${category}: ${count}`);
  }

  // Scan statistics
  const scanStats = scanService.getStats();
  console.log('\n=== Scans ===');
  console.log(`Total scans: ${scanStats.total}`);
  console.log(`  drafted: ${scanStats.withEmail}`);
  console.log(`  emailed: ${scanStats.emailed}`);
  console.log(`  no signal: ${scanStats.noSignal}`);
  console.log(`  errors: ${scanStats.errors}`);

  console.log('\n=== Top Technologies ===');
  const byTech = Object.entries(scanStats.byTopTechnology).sort((a, b) => b[1] - a[1]);
  for (const [tech, count] of byTech) {
    console.log(`  ${tech}: ${count}`);
  }

  // Rotation spread
  console.log('\n=== Variant Usage ===');
  for (const usage of rotationService.getUsage('variant')) {
    console.log(`  [${usage.scope}] ${usage.key}: ${usage.count}`);
  }
  console.log('\n=== Persona Usage ===');
  for (const usage of rotationService.getUsage('persona')) {
    console.log(`  [${usage.scope}] ${usage.key}: ${usage.count}`);
  }

  // Run statistics
  const runStats = runService.getStats();
  console.log('\n=== Run Statistics by Stage ===');
  for (const [stage, stats] of Object.entries(runStats)) {
    console.log(`${stage}:`);
    console.log(`  Total runs: ${stats.total}`);
    console.log(`  Completed: ${stats.completed}`);
    console.log(`  Failed: ${stats.failed}`);
  }

  // Recent runs
  const recentRuns = runService.getRecent(5);
  console.log('\n=== Recent Runs ===');
  for (const run of recentRuns) {
    const status = run.status === 'completed' ? '✓' : run.status === 'failed' ? '✗' : '...';
    const date = new Date(run.startedAt).toISOString();
    console.log(
      `[${status}] ${run.stage} @ ${date} - ${run.domainsProcessed} processed, ${run.domainsPassed} passed`
    );
  }

  console.log('');
}
