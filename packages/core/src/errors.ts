import type { ErrorCode, StagedArtifactFile } from './contracts.js';

export class BundleKeeperError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, opts: { code: ErrorCode; details?: Record<string, unknown>; cause?: unknown }) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'BundleKeeperError';
    this.code = opts.code;
    this.details = opts.details;
  }
}

export class UnsupportedPlatformError extends BundleKeeperError {
  readonly target: string;

  constructor(target: string) {
    super(`Cannot determine bundle platform for unsupported build target ${target}`, {
      code: 'UNSUPPORTED_PLATFORM',
      details: { target }
    });
    this.name = 'UnsupportedPlatformError';
    this.target = target;
  }
}

export class InvalidArtifactNameError extends BundleKeeperError {
  readonly artifactName: string;

  constructor(artifactName: string, reason: string) {
    super(`Invalid artifact name "${artifactName}": ${reason}`, {
      code: 'INVALID_ARTIFACT_NAME',
      details: { name: artifactName, reason }
    });
    this.name = 'InvalidArtifactNameError';
    this.artifactName = artifactName;
  }
}

export class MalformedArtifactNameError extends BundleKeeperError {
  readonly fileName: string;

  constructor(fileName: string, reason: string) {
    super(`Malformed artifact file name "${fileName}": ${reason}`, {
      code: 'MALFORMED_ARTIFACT_NAME',
      details: { fileName, reason }
    });
    this.name = 'MalformedArtifactNameError';
    this.fileName = fileName;
  }
}

export class InvalidHashError extends BundleKeeperError {
  readonly artifactName: string;
  readonly platform: string;

  constructor(artifactName: string, platform: string, value: unknown) {
    super(`Invalid hash ${JSON.stringify(value)} found in bundle ${artifactName} for platform ${platform}`, {
      code: 'INVALID_HASH',
      details: { name: artifactName, platform, value }
    });
    this.name = 'InvalidHashError';
    this.artifactName = artifactName;
    this.platform = platform;
  }
}

export class UnknownPlatformError extends BundleKeeperError {
  readonly artifactName: string;
  readonly platform: string;

  constructor(artifactName: string, platform: string) {
    super(`Could not parse unknown platform ${platform} in bundle ${artifactName}`, {
      code: 'UNKNOWN_PLATFORM',
      details: { name: artifactName, platform }
    });
    this.name = 'UnknownPlatformError';
    this.artifactName = artifactName;
    this.platform = platform;
  }
}

export class MalformedDescriptionError extends BundleKeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: 'MALFORMED_DESCRIPTION', details });
    this.name = 'MalformedDescriptionError';
  }
}

export class ProbeIndeterminateError extends BundleKeeperError {
  readonly file: StagedArtifactFile;
  readonly attempts: number;

  constructor(file: StagedArtifactFile, attempts: number, lastReason: string) {
    super(`Could not determine whether ${file.fileName} is published after ${attempts} attempt(s): ${lastReason}`, {
      code: 'PROBE_INDETERMINATE',
      details: { fileName: file.fileName, attempts, reason: lastReason }
    });
    this.name = 'ProbeIndeterminateError';
    this.file = file;
    this.attempts = attempts;
  }
}

export class ManifestLoadError extends BundleKeeperError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: 'MANIFEST_LOAD_ERROR', details, cause });
    this.name = 'ManifestLoadError';
  }
}

export class StagingError extends BundleKeeperError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: 'STAGING_ERROR', details, cause });
    this.name = 'StagingError';
  }
}

export class ConfigLoadError extends BundleKeeperError {
  constructor(message: string, opts: { code: 'CONFIG_PARSE_ERROR' | 'CONFIG_SCHEMA_INVALID'; details?: Record<string, unknown> }) {
    super(message, opts);
    this.name = 'ConfigLoadError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface ErrorSummary {
  total: number;
  /** Error count per code; errors that are not BundleKeeperErrors count as `UNKNOWN`. */
  byCode: Record<string, number>;
  lines: string[];
}

/** Builds a per-failure summary from a collected error list, without re-running anything. */
export function summarizeErrors(errors: readonly Error[]): ErrorSummary {
  const byCode: Record<string, number> = {};
  const lines: string[] = [];

  for (const err of errors) {
    const code = err instanceof BundleKeeperError ? err.code : 'UNKNOWN';
    byCode[code] = (byCode[code] ?? 0) + 1;
    lines.push(`[${code}] ${err.message}`);
  }

  return { total: errors.length, byCode, lines };
}
