import fs from 'node:fs/promises';
import path from 'node:path';

import {
  copyEmbeddedArtifacts,
  copyToUploadArea,
  encodeDescriptions,
  getLogger,
  HttpExistenceProbe,
  listStagedArtifacts,
  ManifestDirectoryCompiler,
  mergeManifests,
  normalizePlatform,
  parseArtifactFileName,
  reconcile,
  stageArtifacts,
  stringifyDescriptions,
  summarizeErrors,
  type ArtifactIdentity,
  type BundleKeeperConfig,
  type DependencyDivergence,
  type DescriptionRecord,
  type ErrorSummary,
  type PlatformKey,
  type ReconcileProgress
} from '@bundlekeeper/core';

/** Outcome of one command: a JSON-serializable report plus the process exit code. */
export interface CommandResult<T> {
  report: T;
  exitCode: number;
}

/** Invocation problem (nothing to do, missing setting); the CLI exits with 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function resolveTargets(targets: readonly string[], config: BundleKeeperConfig): string[] {
  const chosen = targets.length > 0 ? [...targets] : config.platforms;
  if (chosen.length === 0) {
    throw new UsageError('No build targets given and none configured under "platforms"');
  }
  return chosen;
}

export interface MergeCommandReport {
  platforms: PlatformKey[];
  descriptions: DescriptionRecord[];
  divergences: DependencyDivergence[];
  errors: ErrorSummary;
}

export async function runMerge(config: BundleKeeperConfig, targets: readonly string[]): Promise<CommandResult<MergeCommandReport>> {
  const compiler = new ManifestDirectoryCompiler({ buildDir: config.buildDir });
  const { manifests, failures } = await compiler.buildMany(resolveTargets(targets, config));
  const { descriptions, divergences, errors: hashErrors } = mergeManifests(manifests);
  const errors = summarizeErrors([...failures.map((f) => f.error), ...hashErrors]);

  return {
    report: { platforms: [...manifests.keys()], descriptions: encodeDescriptions(descriptions), divergences, errors },
    exitCode: errors.total > 0 ? 1 : 0
  };
}

export interface StageCommandReport {
  platforms: PlatformKey[];
  staged: Array<{ name: string; platform: PlatformKey; fileName: string }>;
  descriptionsFile: string;
  /** False when a target failed; the previous descriptions file is left as it was. */
  descriptionsWritten: boolean;
  artifacts: number;
  divergences: DependencyDivergence[];
  errors: ErrorSummary;
}

/**
 * Loads the build of every target, stages the outputs under their canonical names and
 * writes the merged descriptions file. When any target fails, staging adds to the
 * existing files instead of clearing them and the descriptions file is not replaced, so
 * the failed platform keeps its last good hashes.
 */
export async function runStage(config: BundleKeeperConfig, targets: readonly string[]): Promise<CommandResult<StageCommandReport>> {
  const compiler = new ManifestDirectoryCompiler({ buildDir: config.buildDir });
  const { manifests, failures } = await compiler.buildMany(resolveTargets(targets, config));
  const { descriptions, divergences, errors: hashErrors } = mergeManifests(manifests);
  const complete = failures.length === 0 && hashErrors.length === 0;

  const { staged, errors: stagingErrors } = await stageArtifacts({
    buildDir: config.buildDir,
    stagingDir: config.stagingDir,
    manifests,
    extension: config.extension,
    reset: complete
  });

  if (complete) {
    await fs.mkdir(path.dirname(config.descriptionsFile), { recursive: true });
    await fs.writeFile(config.descriptionsFile, stringifyDescriptions(descriptions), 'utf8');
  } else {
    getLogger('cli').warn(`Keeping ${config.descriptionsFile}: not every target built`);
  }

  const errors = summarizeErrors([...failures.map((f) => f.error), ...hashErrors, ...stagingErrors]);
  return {
    report: {
      platforms: [...manifests.keys()],
      staged: staged.map((s) => ({ name: s.name, platform: s.platform, fileName: s.fileName })),
      descriptionsFile: config.descriptionsFile,
      descriptionsWritten: complete,
      artifacts: descriptions.length,
      divergences,
      errors
    },
    exitCode: errors.total > 0 ? 1 : 0
  };
}

export interface ReconcileCommandOptions {
  baseUrl?: string;
  concurrency?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  signal?: AbortSignal;
  onProgress?: (progress: ReconcileProgress) => void;
}

export interface ReconcileCommandReport {
  baseUrl: string;
  total: number;
  published: string[];
  needsUpload: string[];
  uploadDir: string;
  indeterminate: string[];
  cancelled: string[];
  malformed: string[];
  attempts: number;
}

/**
 * Probes every staged file against the remote store and copies the files confirmed
 * missing into the upload area. Waits for every probe and retry before returning.
 */
export async function runReconcile(config: BundleKeeperConfig, opts: ReconcileCommandOptions = {}): Promise<CommandResult<ReconcileCommandReport>> {
  const baseUrl = opts.baseUrl ?? config.remote.baseUrl;
  if (!baseUrl) {
    throw new UsageError('No remote base URL: pass --base-url or set remote.base_url');
  }

  const probe = new HttpExistenceProbe({ baseUrl, timeoutMs: config.remote.timeoutMs });
  const listing = await listStagedArtifacts(config.stagingDir, { extension: config.extension });

  const result = await reconcile(listing.files, probe, {
    concurrency: opts.concurrency ?? config.remote.concurrency,
    maxRetries: opts.maxRetries ?? config.remote.maxRetries,
    retryDelayMs: opts.retryDelayMs ?? config.remote.retryDelayMs,
    signal: opts.signal,
    onProgress: opts.onProgress
  });

  await copyToUploadArea(result.needsUpload, config.uploadDir);

  return {
    report: {
      baseUrl,
      total: listing.files.length,
      published: result.published.map((f) => f.fileName),
      needsUpload: result.needsUpload.map((f) => f.fileName),
      uploadDir: config.uploadDir,
      indeterminate: result.errors.map((e) => e.message),
      cancelled: result.cancelled.map((f) => f.fileName),
      malformed: listing.errors.map((e) => e.message),
      attempts: result.attempts
    },
    exitCode: result.errors.length > 0 || result.cancelled.length > 0 ? 1 : 0
  };
}

export interface EmbedCommandReport {
  platform: PlatformKey;
  embeddedDir: string;
  copied: string[];
  skipped: Array<{ name: string; reason: 'unknown' | 'not-built' }>;
}

/** Copies one platform's named artifacts into the directory shipped inside the player. */
export async function runEmbed(config: BundleKeeperConfig, target: string, names: readonly string[]): Promise<CommandResult<EmbedCommandReport>> {
  const platform = normalizePlatform(target);
  const chosen = names.length > 0 ? [...names] : config.embedded;
  if (chosen.length === 0) {
    throw new UsageError('No bundle names given and none configured under "embedded"');
  }

  const manifest = await new ManifestDirectoryCompiler({ buildDir: config.buildDir }).build(platform);
  const report = await copyEmbeddedArtifacts({
    buildDir: config.buildDir,
    embeddedDir: config.embeddedDir,
    platform,
    names: chosen,
    knownNames: new Set(manifest.artifactNames())
  });

  return {
    report: { platform, embeddedDir: config.embeddedDir, copied: report.copied.map((p) => path.basename(p)), skipped: report.skipped },
    exitCode: 0
  };
}

export function runInspect(config: BundleKeeperConfig, fileName: string): CommandResult<ArtifactIdentity> {
  return { report: parseArtifactFileName(path.basename(fileName), { extension: config.extension }), exitCode: 0 };
}
