/**
 * Custom Error Classes
 *
 * Every failure surfaces as a PublisherError so the CLI can name the stage
 * that failed and exit non-zero.
 */

export type PublishStage = 'resolver' | 'updater' | 'packager' | 'uploader' | 'config';

/**
 * Base error class for all publisher errors
 */
export class PublisherError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    exitCode: number = 1,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PublisherError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Manifest or metadata source unreachable, or its response malformed
 */
export class FetchError extends PublisherError {
  constructor(url: string, message: string, status?: number) {
    super(
      `Failed to fetch ${url}: ${message}`,
      'FETCH_ERROR',
      1,
      { url, status }
    );
    this.name = 'FetchError';
  }
}

/**
 * Selection policy cannot be satisfied from the manifest
 */
export class ResolutionError extends PublisherError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RESOLUTION_ERROR', 1, details);
    this.name = 'ResolutionError';
  }
}

/**
 * A selected version has no discoverable pack format
 */
export class LookupError extends PublisherError {
  public readonly versionId: string;

  constructor(versionId: string, reason: string) {
    super(
      `No pack format for version ${versionId}: ${reason}`,
      'LOOKUP_ERROR',
      1,
      { versionId, reason }
    );
    this.name = 'LookupError';
    this.versionId = versionId;
  }
}

/**
 * External collaborator (updater, packager, uploader) failed
 */
export class ExternalToolError extends PublisherError {
  public readonly stage: PublishStage;
  public readonly toolExitCode: number | null;
  public readonly output: string;

  constructor(
    stage: PublishStage,
    message: string,
    toolExitCode: number | null = null,
    output: string = ''
  ) {
    super(
      toolExitCode === null ? message : `${message} (exit code ${toolExitCode})`,
      'EXTERNAL_TOOL_ERROR',
      1,
      { stage, exitCode: toolExitCode, output: output.substring(0, 1000) }
    );
    this.name = 'ExternalToolError';
    this.stage = stage;
    this.toolExitCode = toolExitCode;
    this.output = output.substring(0, 1000);
  }
}

/**
 * Invalid or missing configuration
 */
export class ConfigError extends PublisherError {
  constructor(message: string, issues: string[] = []) {
    super(
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
      'CONFIG_ERROR',
      2,
      { issues }
    );
    this.name = 'ConfigError';
  }
}

/**
 * Validation error for invalid files or inputs
 */
export class ValidationError extends PublisherError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      1,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

const STAGE_BY_CODE: Record<string, PublishStage> = {
  FETCH_ERROR: 'resolver',
  RESOLUTION_ERROR: 'resolver',
  LOOKUP_ERROR: 'resolver',
  CONFIG_ERROR: 'config',
};

/**
 * Stage a failure belongs to, when it can be told
 */
export function stageOf(error: unknown): PublishStage | undefined {
  if (error instanceof ExternalToolError) return error.stage;
  if (error instanceof PublisherError) return STAGE_BY_CODE[error.code];
  return undefined;
}

/**
 * One-line diagnostic: `[stage] message`
 */
export function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const stage = stageOf(error);
  if (stage) return `[${stage}] ${message}`;
  if (error instanceof PublisherError) return `[${error.code.toLowerCase()}] ${message}`;
  return message;
}
