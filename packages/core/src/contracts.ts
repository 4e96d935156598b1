/**
 * bundlekeeper shared contracts.
 *
 * These are the stable shapes shared by the engine modules and the CLI's JSON outputs.
 */

/**
 * Canonical platform keys, in canonical order.
 *
 * The order is load-bearing: description hashing, encoding and manifest merging all
 * iterate platforms in this order instead of map insertion order.
 */
export const PLATFORM_KEYS = ['WindowsPlayer', 'OSXPlayer', 'LinuxPlayer', 'Android', 'IPhonePlayer', 'WebGLPlayer'] as const;

export type PlatformKey = (typeof PLATFORM_KEYS)[number];

/** Opaque content hash of one artifact build, as produced by a {@link HashParser}. */
export type ContentHash = string;

/** Parses a hash string, returning the normalized hash or `undefined` when malformed. */
export type HashParser = (raw: string) => ContentHash | undefined;

/**
 * Stable, machine-readable error codes.
 *
 * Additive only: the CLI prints these and tests assert on them.
 */
export const ErrorCodes = [
  'UNSUPPORTED_PLATFORM',
  'INVALID_ARTIFACT_NAME',
  'MALFORMED_ARTIFACT_NAME',
  'INVALID_HASH',
  'UNKNOWN_PLATFORM',
  'MALFORMED_DESCRIPTION',
  'PROBE_INDETERMINATE',
  'MANIFEST_LOAD_ERROR',
  'STAGING_ERROR',
  'CONFIG_PARSE_ERROR',
  'CONFIG_SCHEMA_INVALID'
] as const;

export type ErrorCode = (typeof ErrorCodes)[number];

/** Interchange record for one artifact description. */
export interface DescriptionRecord {
  name: string;
  /** Platform key -> hash string; only platforms the artifact was built for. */
  hashes: Partial<Record<PlatformKey, string>>;
  /** Order-irrelevant, no duplicates. */
  dependencies: string[];
}

/** A local, already-built artifact file identified by its canonical file name. */
export interface StagedArtifactFile {
  name: string;
  platform: PlatformKey;
  hash: ContentHash;
  fileName: string;
  /** Absolute or project-relative path of the staged file. */
  path: string;
}

/** Per-platform build output, as reported by the artifact compiler. */
export interface BuildManifest {
  artifactNames(): string[];
  hashOf(name: string): ContentHash;
  directDependenciesOf(name: string): string[];
}

export interface BuildManyResult {
  manifests: Map<PlatformKey, BuildManifest>;
  /** Targets that could not be built (unsupported or unreadable), keyed by raw target. */
  failures: Array<{ target: string; error: Error }>;
}

/** Stand-in for the engine-specific build pipeline. */
export interface ArtifactCompiler {
  build(target: string): Promise<BuildManifest>;
  buildMany(targets: string[]): Promise<BuildManyResult>;
}

export type ProbeOutcome =
  | { status: 'found' }
  | { status: 'not-found' }
  | { status: 'indeterminate'; reason: string };

/** HEAD-style existence check against the remote store. Must tolerate concurrent calls. */
export interface ExistenceProbe {
  probe(fileName: string, opts?: { signal?: AbortSignal }): Promise<ProbeOutcome>;
}
