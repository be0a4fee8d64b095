/**
 * Run-fatal error hierarchy for the registry pipeline.
 *
 * Only conditions that abort a run live here. Per-file and per-literal
 * problems are reported as result values by the extractors, and the
 * best-effort network stages return outcomes instead of throwing.
 */

export interface ErrorOptions {
  cause?: Error;
  suggestion?: string | null;
}

export class RegistryError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;
  readonly suggestion: string | null;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error,
    suggestion?: string | null,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'RegistryError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date().toISOString();
    this.suggestion = suggestion ?? null;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    if (this.suggestion !== null) {
      obj.suggestion = this.suggestion;
    }
    return obj;
  }
}

export class ConfigNotFoundError extends RegistryError {
  constructor(configPath: string, options?: ErrorOptions) {
    super(
      'CONFIG_NOT_FOUND',
      `Configuration file not found: ${configPath}`,
      { configPath },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigError extends RegistryError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, {}, options?.cause, options?.suggestion);
    this.name = 'ConfigError';
  }
}

export class TemplateMissingError extends RegistryError {
  constructor(basePath: string, options?: ErrorOptions) {
    super(
      'TEMPLATE_MISSING',
      `Failed to extract base metadata from ${basePath}`,
      { basePath },
      options?.cause,
      options?.suggestion ?? 'Check that the base class still assigns self.metadata to a dict literal in __init__',
    );
    this.name = 'TemplateMissingError';
  }
}

export class EmptyRegistryError extends RegistryError {
  constructor(details?: Record<string, unknown>, options?: ErrorOptions) {
    super('EMPTY_REGISTRY', 'No agents found', details, options?.cause, options?.suggestion);
    this.name = 'EmptyRegistryError';
  }
}

export class LocalPublishError extends RegistryError {
  constructor(outputPath: string, options?: ErrorOptions) {
    super(
      'LOCAL_PUBLISH_FAILED',
      `Failed to write metadata locally: ${outputPath}`,
      { outputPath },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'LocalPublishError';
  }
}

export class DocumentationWriteError extends RegistryError {
  constructor(documentPath: string, options?: ErrorOptions) {
    super(
      'DOCS_WRITE_FAILED',
      `Failed to update agent table in ${documentPath}`,
      { documentPath },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'DocumentationWriteError';
  }
}

/**
 * All registry error codes as constants.
 */
export const ErrorCodes = Object.freeze({
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
  TEMPLATE_MISSING: 'TEMPLATE_MISSING',
  EMPTY_REGISTRY: 'EMPTY_REGISTRY',
  LOCAL_PUBLISH_FAILED: 'LOCAL_PUBLISH_FAILED',
  DOCS_WRITE_FAILED: 'DOCS_WRITE_FAILED',
  UNEXPECTED: 'UNEXPECTED',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Wrap anything thrown into a `RegistryError` so the run outcome has one shape. */
export function toRegistryError(error: unknown): RegistryError {
  if (error instanceof RegistryError) return error;
  const cause = error instanceof Error ? error : new Error(String(error));
  return new RegistryError(ErrorCodes.UNEXPECTED, cause.message, {}, cause);
}
