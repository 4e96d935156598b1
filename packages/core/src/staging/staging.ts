import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import type { BuildManifest, PlatformKey, StagedArtifactFile } from '../contracts.js';
import { BundleKeeperError, errorMessage, MalformedArtifactNameError, StagingError } from '../errors.js';
import { platformBuildDir } from '../compiler/manifestCompiler.js';
import { artifactFileName, tryParseArtifactFileName, type IdentityCodecOptions } from '../identity/fileName.js';
import { getLogger } from '../logging/logger.js';
import { comparePlatformKeys } from '../platform/platform.js';
import { compareUtf8 } from '../utils/hash.js';

/** Ensures a directory exists and is empty. */
export async function resetDirectory(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
  await fs.mkdir(dir, { recursive: true });
}

async function fileExists(p: string): Promise<boolean> {
  const stat = await fs.stat(p).catch(() => null);
  return Boolean(stat?.isFile());
}

export interface StageOptions extends IdentityCodecOptions {
  buildDir: string;
  stagingDir: string;
  manifests: ReadonlyMap<PlatformKey, BuildManifest>;
  /** Clear the staging directory first (default true), so it never accumulates old builds. */
  reset?: boolean;
}

export interface StageReport {
  staged: StagedArtifactFile[];
  errors: BundleKeeperError[];
}

/**
 * Copies every built artifact into the staging directory under its canonical file name.
 * A missing output or an unnameable artifact is reported and the rest still stage.
 */
export async function stageArtifacts(opts: StageOptions): Promise<StageReport> {
  const logger = getLogger('staging');
  if (opts.reset ?? true) {
    await resetDirectory(opts.stagingDir);
  } else {
    await fs.mkdir(opts.stagingDir, { recursive: true });
  }

  const staged: StagedArtifactFile[] = [];
  const errors: BundleKeeperError[] = [];
  const platforms = [...opts.manifests.keys()].sort(comparePlatformKeys);

  for (const platform of platforms) {
    const manifest = opts.manifests.get(platform);
    if (!manifest) continue;
    const sourceDir = platformBuildDir(opts.buildDir, platform);

    for (const name of [...manifest.artifactNames()].sort(compareUtf8)) {
      const hash = manifest.hashOf(name);
      let fileName: string;
      try {
        fileName = artifactFileName(name, platform, hash, opts);
      } catch (err) {
        if (!(err instanceof BundleKeeperError)) throw err;
        errors.push(err);
        continue;
      }

      const source = path.join(sourceDir, name);
      const dest = path.join(opts.stagingDir, fileName);
      try {
        await fs.copyFile(source, dest);
      } catch (err) {
        errors.push(new StagingError(`Failed to stage ${name} for ${platform}: ${errorMessage(err)}`, { name, platform, source }, err));
        continue;
      }

      staged.push({ name, platform, hash, fileName, path: dest });
    }
  }

  logger.info('Staged artifacts', { stagingDir: opts.stagingDir, staged: staged.length, errors: errors.length });
  return { staged, errors };
}

export interface StagedListing {
  files: StagedArtifactFile[];
  errors: MalformedArtifactNameError[];
}

/** Reads the staging directory back, identifying each file by its canonical name. */
export async function listStagedArtifacts(stagingDir: string, opts: IdentityCodecOptions = {}): Promise<StagedListing> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(stagingDir, { withFileTypes: true });
  } catch (err) {
    throw new StagingError(`Failed to read staging directory ${stagingDir}: ${errorMessage(err)}`, { stagingDir }, err);
  }
  const files: StagedArtifactFile[] = [];
  const errors: MalformedArtifactNameError[] = [];

  for (const fileName of entries
    .filter((e) => e.isFile())
    .map((e) => e.name)
    .sort(compareUtf8)) {
    const parsed = tryParseArtifactFileName(fileName, opts);
    if (parsed.ok) {
      files.push({ ...parsed.identity, fileName, path: path.join(stagingDir, fileName) });
    } else {
      errors.push(parsed.error);
    }
  }

  return { files, errors };
}

/** Resets the upload directory and copies the given staged files into it. */
export async function copyToUploadArea(files: readonly StagedArtifactFile[], uploadDir: string): Promise<string[]> {
  await resetDirectory(uploadDir);
  const copied: string[] = [];
  for (const file of files) {
    const dest = path.join(uploadDir, file.fileName);
    await fs.copyFile(file.path, dest);
    copied.push(dest);
  }
  return copied;
}

export interface EmbedOptions {
  buildDir: string;
  embeddedDir: string;
  platform: PlatformKey;
  names: readonly string[];
  /** Artifact names defined by the project; names outside it are skipped with a warning. */
  knownNames?: ReadonlySet<string>;
}

export interface EmbedReport {
  copied: string[];
  skipped: Array<{ name: string; reason: 'unknown' | 'not-built' }>;
}

/**
 * Copies one platform's built artifacts (under their plain names) into the directory a
 * player build ships with. The directory is reset each time so bundles of another
 * platform never linger in it.
 */
export async function copyEmbeddedArtifacts(opts: EmbedOptions): Promise<EmbedReport> {
  const logger = getLogger('staging');
  const sourceDir = platformBuildDir(opts.buildDir, opts.platform);
  await resetDirectory(opts.embeddedDir);

  const report: EmbedReport = { copied: [], skipped: [] };
  for (const name of opts.names) {
    if (opts.knownNames && !opts.knownNames.has(name)) {
      logger.warn(`Unable to copy unknown embedded bundle ${name}`);
      report.skipped.push({ name, reason: 'unknown' });
      continue;
    }

    const source = path.join(sourceDir, name);
    if (!(await fileExists(source))) {
      logger.warn(`Bundle ${name} has not been built for ${opts.platform}; build bundles before embedding them`);
      report.skipped.push({ name, reason: 'not-built' });
      continue;
    }

    const dest = path.join(opts.embeddedDir, name);
    await fs.copyFile(source, dest);
    report.copied.push(dest);
  }

  return report;
}
