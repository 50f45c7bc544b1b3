/**
 * SCAN Stage
 * Goal: Detect each domain's stack and draft one outreach email per new business
 *
 * Per domain: dedup gate → fetch → detect/score → already-emailed gate →
 * select persona + variant → render → record domain → append scan result.
 * Failures stop at the domain boundary; the batch keeps going.
 */

import { BaseStage } from '../base-stage';
import { ScanResult } from '../../state/types';
import { scanService } from '../../state/scan-service';
import { domainService } from '../../state/domain-service';
import { rotationService } from '../../state/rotation-service';
import { OutreachEngine } from '../../engine';
import { DedupTracker, HOUR_MS } from '../../engine/dedup';
import { summarizeDetected, summarizeScored } from '../../engine/scorer';
import { StackreachConfig } from '../../config';
import { logger } from '../../lib/logger';
import { chunk, extractEmails, mapWithConcurrency, normalizeDomain } from '../../lib/utils';
import { errorMessage, NoSignalError, StackreachError } from '../../lib/errors';
import { Fetcher } from './fetcher';
import { ScanTarget } from './targets';

export type DomainOutcome = 'generated' | 'no_signal' | 'already_emailed' | 'error' | 'skipped';

export interface ScanStageDeps {
  engine: OutreachEngine;
  fetcher: Fetcher;
  tracker?: DedupTracker;
  now?: () => number;
}

export class ScanStage extends BaseStage {
  private readonly targets: ScanTarget[];
  private readonly engine: OutreachEngine;
  private readonly fetcher: Fetcher;
  private readonly tracker: DedupTracker;
  private readonly now: () => number;
  private readonly outcomes = new Map<string, DomainOutcome>();

  constructor(targets: ScanTarget[], deps: ScanStageDeps, config?: StackreachConfig) {
    super('scan', config);
    this.targets = targets.slice(0, this.config.pipeline.maxDomainsPerRun);
    this.engine = deps.engine;
    this.fetcher = deps.fetcher;
    this.now = deps.now ?? Date.now;
    this.tracker = deps.tracker ?? new DedupTracker(domainService, this.now);
  }

  getOutcomes(): ReadonlyMap<string, DomainOutcome> {
    return this.outcomes;
  }

  protected async execute(): Promise<void> {
    if (this.targets.length === 0) {
      logger.info('No domains to scan');
      return;
    }

    logger.info(`Scanning ${this.targets.length} domains`, {
      parallelism: this.config.pipeline.parallelism,
    });

    for (const batch of chunk(this.targets, this.config.pipeline.batchSize)) {
      const outcomes = await mapWithConcurrency(batch, this.config.pipeline.parallelism, (target) =>
        this.processDomain(target)
      );
      batch.forEach((target, i) => {
        const domain = normalizeDomain(target.domain);
        // A repeated entry never hides what happened to the first one
        if (outcomes[i] === 'skipped' && this.outcomes.has(domain)) return;
        this.outcomes.set(domain, outcomes[i]);
      });

      rotationService.save(this.engine.rotation.snapshot());
      this.updateProgress();
    }

    logger.info('Scan complete', {
      processed: this.processed,
      generated: this.passed,
      failed: this.failed,
      skipped: this.skipped,
    });
  }

  private async processDomain(target: ScanTarget): Promise<DomainOutcome> {
    const domain = normalizeDomain(target.domain);
    const rescanAfterMs = this.config.dedup.rescanAfterHours * HOUR_MS;

    if (!(await this.tracker.shouldProcess(domain, rescanAfterMs))) {
      logger.debug(`Skipping recently scanned domain ${domain}`);
      this.skipped++;
      return 'skipped';
    }

    this.processed++;

    const result: ScanResult = {
      domain,
      technologies: [],
      scoredTechnologies: [],
      topTechnology: null,
      emails: [],
      generatedEmail: null,
      category: target.category,
      error: null,
      emailed: false,
      runId: this.getRunId(),
      createdAt: this.now(),
    };
    let outcome: DomainOutcome;

    try {
      const page = await this.fetcher.fetch(domain);
      if (page.error) {
        throw page.error;
      }

      const analysis = this.engine.analyze(page.content, page.headers);
      result.technologies = analysis.detected.map(summarizeDetected);
      result.scoredTechnologies = analysis.scored.map(summarizeScored);
      result.topTechnology = analysis.top?.signature.name ?? null;
      result.emails = extractEmails(page.content, this.config.fetch.emailPatterns);

      if (!analysis.top) {
        throw new NoSignalError(domain);
      }

      if (scanService.hasBeenEmailed(domain)) {
        logger.debug(`${domain} was already emailed, not drafting another`);
        outcome = 'already_emailed';
      } else {
        result.generatedEmail = await this.engine.compose(analysis.scored, domain);
        outcome = 'generated';
      }
    } catch (error) {
      if (error instanceof NoSignalError) {
        logger.debug(error.message);
        outcome = 'no_signal';
      } else {
        result.error = errorMessage(error);
        const code = error instanceof StackreachError ? error.code : 'UNEXPECTED';
        logger.logDomainFailure(domain, code, result.error);
        outcome = 'error';
      }
    }

    try {
      await this.tracker.record(domain, target.category);
      scanService.append(result);
    } catch (error) {
      this.tracker.release(domain);
      this.recordError(error);
      return 'error';
    }

    if (outcome === 'generated') {
      this.passed++;
    } else if (outcome === 'error' && result.error) {
      this.failed++;
      this.errors.push(`${domain}: ${result.error}`);
    }

    return outcome;
  }
}

export { ScanStage as default };
