/**
 * Builds an OutreachEngine from configuration
 */

import { StackreachConfig } from '../config/types';
import { loadCatalog } from './catalog';
import { loadOutreachLibrary, parseOutreachLibrary } from './roster';
import { RotationSnapshot, RotationStore } from './rotation';
import { HOUR_MS } from './dedup';
import { OutreachEngine } from './index';

export interface EngineFactoryOptions {
  snapshot?: RotationSnapshot | null;
  now?: () => number;
}

export function createEngine(config: StackreachConfig, options: EngineFactoryOptions = {}): OutreachEngine {
  const catalog = loadCatalog(config.catalog.signaturesPath);

  let library = loadOutreachLibrary(config.catalog.outreachPath);
  // Inline personas/variants replace the file's, and get the same validation
  if (config.outreach.personas || config.outreach.variants) {
    library = parseOutreachLibrary(
      {
        personas: config.outreach.personas ?? library.personas,
        variants: config.outreach.variants ?? library.variants,
      },
      'config outreach section'
    );
  }

  const rotation = new RotationStore({
    windowMs: config.rotation.windowHours * HOUR_MS,
    now: options.now,
    snapshot: options.snapshot ?? undefined,
  });

  return new OutreachEngine({
    catalog,
    library,
    weights: config.scoring,
    rotation,
    maxSupporting: config.outreach.maxSupportingTechs,
  });
}
