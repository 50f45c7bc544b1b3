/**
 * Error taxonomy for the outreach engine
 * Per-domain errors are caught at the domain pipeline boundary; load errors are fatal
 */

export type ErrorCode =
  | 'FETCH'
  | 'NO_SIGNAL'
  | 'NO_PERSONA'
  | 'NO_VARIANT'
  | 'TEMPLATE_RENDER'
  | 'CATALOG_LOAD'
  | 'CONFIG';

export class StackreachError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class FetchError extends StackreachError {
  readonly domain: string;
  readonly failureType: string;

  constructor(domain: string, failureType: string, detail?: string) {
    super('FETCH', `Fetch failed for ${domain}: ${failureType}${detail ? ` (${detail})` : ''}`);
    this.domain = domain;
    this.failureType = failureType;
  }
}

// Not a failure: the page carried no catalog signal, so there is nothing to pitch
export class NoSignalError extends StackreachError {
  constructor(domain: string) {
    super('NO_SIGNAL', `No technology detected for ${domain}`);
  }
}

export class NoPersonaAvailableError extends StackreachError {
  readonly category: string;

  constructor(category: string) {
    super('NO_PERSONA', `No persona configured for category "${category}"`);
    this.category = category;
  }
}

export class NoVariantAvailableError extends StackreachError {
  readonly category: string;

  constructor(category: string) {
    super('NO_VARIANT', `No message variant configured for category "${category}"`);
    this.category = category;
  }
}

export class TemplateRenderError extends StackreachError {
  readonly variantId: string;
  readonly placeholders: string[];

  constructor(variantId: string, placeholders: string[]) {
    super(
      'TEMPLATE_RENDER',
      `Variant ${variantId} has unbound placeholders: ${placeholders.map((p) => `{{${p}}}`).join(', ')}`
    );
    this.variantId = variantId;
    this.placeholders = placeholders;
  }
}

export class CatalogLoadError extends StackreachError {
  constructor(source: string, detail: string) {
    super('CATALOG_LOAD', `Failed to load ${source}: ${detail}`);
  }
}

export class ConfigError extends StackreachError {
  constructor(detail: string) {
    super('CONFIG', `Invalid configuration: ${detail}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
