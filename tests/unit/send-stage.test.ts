/**
 * Tests for the send stage and the file outbox
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { closeDatabase, initDatabase } from '../../src/state/database';
import { scanService } from '../../src/state/scan-service';
import { rotationService } from '../../src/state/rotation-service';
import { ScanStage } from '../../src/stages/scan';
import { SendStage, toOutboundMessage } from '../../src/stages/send';
import { escapeCsvValue, OUTBOX_FIELDS, OutboxSender } from '../../src/stages/send/outbox-sender';
import { createEngine } from '../../src/engine/factory';
import { DEFAULT_CONFIG } from '../../src/config/loader';
import { OutboxConfig } from '../../src/config/types';
import { MEMORY_DB } from '../../src/lib/env';
import { ACME_PAGE, GLOBEX_PAGE, StubFetcher } from '../fixtures';

const T0 = 1_700_000_000_000;

let outbox: OutboxConfig;

async function scanDomains(domains: string[]): Promise<void> {
  const engine = createEngine(DEFAULT_CONFIG, { snapshot: rotationService.load(), now: () => T0 });
  const fetcher = new StubFetcher({ 'acme.com': ACME_PAGE, 'globex.test': GLOBEX_PAGE });
  await new ScanStage(domains.map((domain) => ({ domain })), { engine, fetcher, now: () => T0 }, DEFAULT_CONFIG).runStage();
}

beforeEach(async () => {
  closeDatabase();
  await initDatabase(MEMORY_DB);
  outbox = {
    format: 'both',
    directory: fs.mkdtempSync(path.join(os.tmpdir(), 'stackreach-outbox-')),
    filenamePattern: 'outbox_{date}_{count}',
  };
});

describe('Outbox sender', () => {
  test('should escape CSV values', () => {
    expect(escapeCsvValue('plain')).toBe('plain');
    expect(escapeCsvValue('a,b')).toBe('"a,b"');
    expect(escapeCsvValue('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvValue(undefined)).toBe('');
  });

  test('should reject a malformed recipient', async () => {
    const sender = new OutboxSender(outbox, () => T0);
    const outcome = await sender.send({
      scanId: 1,
      domain: 'acme.com',
      to: 'nobody',
      fromName: 'Jordan Reyes',
      fromEmail: 'jordan@stackreach.test',
      personaId: 'jordan',
      variantId: 'crm-audit',
      mainTech: 'HubSpot',
      subject: 'Hi',
      body: 'Hello',
    });

    expect(outcome).toEqual({ success: false, error: 'Invalid recipient address: nobody' });
    expect(sender.pending()).toBe(0);
    expect(await sender.flush()).toEqual([]);
  });
});

describe('Send stage', () => {
  test('should write the outbox and mark the scan as emailed', async () => {
    await scanDomains(['acme.com']);

    const stage = new SendStage(new OutboxSender(outbox, () => T0), undefined, DEFAULT_CONFIG, () => T0 + 1);
    const result = await stage.runStage();

    expect(result.success).toBe(true);
    expect(result.passed).toBe(1);
    expect(stage.getFiles()).toEqual([
      path.join(outbox.directory, 'outbox_2023-11-14_1.csv'),
      path.join(outbox.directory, 'outbox_2023-11-14_1.json'),
    ]);

    const csv = fs.readFileSync(stage.getFiles()[0], 'utf-8');
    expect(csv.split('\n')[0]).toBe(OUTBOX_FIELDS.join(','));
    expect(csv.split('\n')[1]).toBe(
      'acme.com,sales@acme.com,Jordan Reyes,jordan@stackreach.test,Quick question about your HubSpot setup,"Hi there,'
    );

    const json = JSON.parse(fs.readFileSync(stage.getFiles()[1], 'utf-8'));
    expect(json.metadata.count).toBe(1);
    expect(json.messages[0].to).toBe('sales@acme.com');
    expect(json.messages[0].variantId).toBe('crm-audit');

    expect(scanService.hasBeenEmailed('acme.com')).toBe(true);
    expect(scanService.getByDomain('acme.com')[0].emailedAt).toBe(T0 + 1);
    expect(scanService.getPendingSends()).toEqual([]);
  });

  test('should have nothing to do on a second run', async () => {
    await scanDomains(['acme.com']);
    await new SendStage(new OutboxSender(outbox, () => T0), undefined, DEFAULT_CONFIG).runStage();

    const again = new SendStage(new OutboxSender(outbox, () => T0), undefined, DEFAULT_CONFIG);
    const result = await again.runStage();

    expect(result.processed).toBe(0);
    expect(again.getFiles()).toEqual([]);
  });

  test('should skip drafts without a recipient', async () => {
    await scanDomains(['globex.test']);

    const [globex] = scanService.getByDomain('globex.test');
    expect(globex.generatedEmail?.mainTech).toBe('Salesforce');
    expect(globex.emails).toEqual([]);
    expect(toOutboundMessage(globex)).toBeNull();

    const result = await new SendStage(new OutboxSender(outbox), undefined, DEFAULT_CONFIG).runStage();
    expect(result.processed).toBe(0);
    expect(scanService.hasBeenEmailed('globex.test')).toBe(false);
  });

  test('should leave failed sends unmarked', async () => {
    scanService.append({
      domain: 'typo.test',
      technologies: [],
      scoredTechnologies: [],
      topTechnology: 'HubSpot',
      emails: ['info-at-typo.test'],
      generatedEmail: {
        subject: 'Hi',
        body: 'Hello',
        mainTech: 'HubSpot',
        supportingTechs: [],
        personaId: 'jordan',
        personaName: 'Jordan Reyes',
        personaEmail: 'jordan@stackreach.test',
        personaRole: 'Partnerships',
        variantId: 'crm-audit',
      },
      error: null,
      emailed: false,
      createdAt: T0,
    });

    const result = await new SendStage(new OutboxSender(outbox), undefined, DEFAULT_CONFIG).runStage();

    expect(result.failed).toBe(1);
    expect(result.errors).toEqual(['typo.test: Invalid recipient address: info-at-typo.test']);
    expect(scanService.hasBeenEmailed('typo.test')).toBe(false);
  });
});
