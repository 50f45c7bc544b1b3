#!/usr/bin/env node
/**
 * Stackreach CLI
 * Entry point for running pipeline stages
 */

import { Command } from 'commander';
import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { getConfig, reloadConfig } from '../config';
import { closeDatabase, initDatabase } from '../state/database';

// Import stage runners
import { runScan } from './commands/scan';
import { runSend } from './commands/send';
import { runAll } from './commands/run';
import { runDetect } from './commands/detect';
import { runPreview } from './commands/preview';
import { showStats } from './commands/stats';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name('stackreach')
  .description('Technology-aware outreach drafting for business domains')
  .version('1.0.0');

// Scan stage
program
  .command('scan')
  .description('Detect technologies on each domain and draft one email per new business')
  .option('-f, --file <path>', 'Domain list (one per line, or "domain,category")')
  .option('-d, --domain <domain>', 'Domain to scan (repeatable)', collect, [])
  .option('-l, --limit <number>', 'Maximum domains to scan', parseInt)
  .action(async (options) => {
    try {
      await initDatabase();
      await runScan(options);
    } catch (error) {
      logger.error('Scan failed', { error: errorMessage(error) });
      process.exit(1);
    } finally {
      closeDatabase();
    }
  });

// Send stage
program
  .command('send')
  .description('Write drafted emails to the outbox and mark them as sent')
  .option('-l, --limit <number>', 'Maximum emails to send', parseInt)
  .option('--format <format>', 'Outbox format (csv, json, both)')
  .action(async (options) => {
    try {
      await initDatabase();
      await runSend(options);
    } catch (error) {
      logger.error('Send failed', { error: errorMessage(error) });
      process.exit(1);
    } finally {
      closeDatabase();
    }
  });

// Full run
program
  .command('run')
  .description('Run scan → send')
  .option('-f, --file <path>', 'Domain list (one per line, or "domain,category")')
  .option('-d, --domain <domain>', 'Domain to scan (repeatable)', collect, [])
  .option('-l, --limit <number>', 'Maximum domains per stage', parseInt)
  .option('--skip-send', 'Draft only, do not send')
  .action(async (options) => {
    try {
      await initDatabase();
      await runAll(options);
    } catch (error) {
      logger.error('Run failed', { error: errorMessage(error) });
      process.exit(1);
    } finally {
      closeDatabase();
    }
  });

// One-off detection, nothing persisted
program
  .command('detect <domain>')
  .description('Show detected technologies and a draft email for one domain')
  .option('--no-draft', 'Only show detected technologies')
  .action(async (domain: string, options) => {
    try {
      await runDetect(domain, options);
    } catch (error) {
      logger.error('Detect failed', { error: errorMessage(error) });
      process.exit(1);
    }
  });

// Offline render
program
  .command('preview')
  .description('Render the email a given stack would get, without fetching anything')
  .requiredOption('-t, --tech <names...>', 'Technology names from the catalog')
  .option('-d, --domain <domain>', 'Domain to address', 'yourcompany.com')
  .action(async (options) => {
    try {
      await runPreview(options);
    } catch (error) {
      logger.error('Preview failed', { error: errorMessage(error) });
      process.exit(1);
    }
  });

// Stats command
program
  .command('stats')
  .description('Show scan, rotation and run statistics')
  .action(async () => {
    try {
      await initDatabase();
      await showStats();
    } catch (error) {
      logger.error('Stats failed', { error: errorMessage(error) });
      process.exit(1);
    } finally {
      closeDatabase();
    }
  });

// Config command
program
  .command('config')
  .description('Show current configuration')
  .action(() => {
    try {
      const config = getConfig();
      console.log(JSON.stringify(config, null, 2));
    } catch (error) {
      logger.error('Config failed', { error: errorMessage(error) });
      process.exit(1);
    }
  });

// Reload config
program
  .command('reload-config')
  .description('Reload configuration from disk')
  .action(() => {
    try {
      reloadConfig();
      logger.info('Configuration reloaded');
    } catch (error) {
      logger.error('Config reload failed', { error: errorMessage(error) });
      process.exit(1);
    }
  });

program.parse();
