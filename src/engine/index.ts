/**
 * Outreach engine
 * Composes detector → scorer → selector → generator over a loaded catalog and library.
 * Detection and rendering are pure; selection goes through the shared rotation store.
 */

import { detect, HeaderMap } from './detector';
import { score, SpecializationWeights, topTechnology } from './scorer';
import { selectWith } from './selector';
import { render } from './generator';
import { RotationStore } from './rotation';
import { OutreachLibrary } from './roster';
import { DetectedTechnology, GeneratedEmail, ScoredTechnology, SignatureCatalog } from './types';

export interface EngineOptions {
  catalog: SignatureCatalog;
  library: OutreachLibrary;
  weights: SpecializationWeights;
  rotation: RotationStore;
  maxSupporting: number;
}

export interface Analysis {
  detected: DetectedTechnology[];
  scored: ScoredTechnology[];
  top: ScoredTechnology | null;
}

export class OutreachEngine {
  readonly catalog: SignatureCatalog;
  readonly library: OutreachLibrary;
  readonly rotation: RotationStore;
  private readonly weights: SpecializationWeights;
  private readonly maxSupporting: number;

  constructor(options: EngineOptions) {
    this.catalog = options.catalog;
    this.library = options.library;
    this.weights = options.weights;
    this.rotation = options.rotation;
    this.maxSupporting = options.maxSupporting;
  }

  analyze(pageContent: string, headers: HeaderMap): Analysis {
    const detected = detect(pageContent, headers, this.catalog);
    const scored = score(detected, this.weights);
    return { detected, scored, top: topTechnology(scored) };
  }

  // Throws NoPersonaAvailableError, NoVariantAvailableError or TemplateRenderError
  async compose(scored: ScoredTechnology[], domain?: string): Promise<GeneratedEmail | null> {
    const top = topTechnology(scored);
    if (!top) return null;

    // Rotation only counts drafts that actually rendered
    return selectWith(top.signature, this.library.personas, this.library.variants, this.rotation, ({ persona, variant }) =>
      render(
        top.signature,
        scored.slice(1).map((tech) => tech.signature),
        persona,
        variant,
        { maxSupporting: this.maxSupporting, domain }
      )
    );
  }
}

export * from './types';
export { detect } from './detector';
export type { HeaderMap } from './detector';
export { score, topTechnology } from './scorer';
export type { SpecializationWeights } from './scorer';
export { select, selectWith } from './selector';
export { render } from './generator';
export { RotationStore } from './rotation';
export { DedupTracker, InMemoryDomainRecordStore } from './dedup';
export { loadCatalog } from './catalog';
export { loadOutreachLibrary } from './roster';
export type { OutreachLibrary } from './roster';
