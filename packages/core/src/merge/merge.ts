import type { BuildManifest, ContentHash, HashParser, PlatformKey } from '../contracts.js';
import { ArtifactDescription, compareDescriptionsByName } from '../description/description.js';
import { InvalidHashError } from '../errors.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { comparePlatformKeys } from '../platform/platform.js';
import { compareUtf8, parseHash128 } from '../utils/hash.js';

/** Two platforms computed different direct dependencies for the same artifact. */
export interface DependencyDivergence {
  name: string;
  /** Platform whose dependency set was kept (first in canonical order). */
  basePlatform: PlatformKey;
  baseDependencies: string[];
  platform: PlatformKey;
  dependencies: string[];
}

export interface MergeReport {
  /** Sorted by artifact name. */
  descriptions: ArtifactDescription[];
  divergences: DependencyDivergence[];
  /** Platform builds left out of the merge because their hash did not parse. */
  errors: InvalidHashError[];
}

export interface MergeOptions {
  /** Normalizes each reported hash; defaults to {@link parseHash128}. */
  hashParser?: HashParser;
  logger?: Logger;
}

interface Accumulator {
  hashes: Map<PlatformKey, ContentHash>;
  dependencies: Set<string>;
  basePlatform: PlatformKey;
}

function sameSet(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const item of a) {
    if (!b.has(item)) return false;
  }
  return true;
}

function sorted(values: Iterable<string>): string[] {
  return [...values].sort(compareUtf8);
}

/**
 * Folds per-platform manifests into one description per artifact.
 *
 * Manifests are walked in canonical platform order, never map insertion order. The
 * dependency set of an artifact comes from the first platform that built it; later
 * platforms that disagree are kept out of the description and reported as divergences.
 * Hashes are normalized through the hash parser, so the descriptions encode and decode
 * back to themselves; a platform whose hash does not parse is reported and skipped.
 */
export function mergeManifests(manifests: ReadonlyMap<PlatformKey, BuildManifest>, opts: MergeOptions = {}): MergeReport {
  const logger = opts.logger ?? getLogger('merge');
  const accumulators = new Map<string, Accumulator>();
  const parseHash = opts.hashParser ?? parseHash128;
  const divergences: DependencyDivergence[] = [];
  const errors: InvalidHashError[] = [];

  const platforms = [...manifests.keys()].sort(comparePlatformKeys);
  for (const platform of platforms) {
    const manifest = manifests.get(platform);
    if (!manifest) continue;

    for (const name of new Set(manifest.artifactNames())) {
      const rawHash = manifest.hashOf(name);
      const hash = parseHash(rawHash);
      if (hash === undefined) {
        const error = new InvalidHashError(name, platform, rawHash);
        errors.push(error);
        logger.warn(`${error.message}; leaving ${platform} out of ${name}`);
        continue;
      }

      const dependencies = new Set(manifest.directDependenciesOf(name));
      let acc = accumulators.get(name);

      if (!acc) {
        acc = { hashes: new Map(), dependencies, basePlatform: platform };
        accumulators.set(name, acc);
      } else if (!sameSet(acc.dependencies, dependencies)) {
        const divergence: DependencyDivergence = {
          name,
          basePlatform: acc.basePlatform,
          baseDependencies: sorted(acc.dependencies),
          platform,
          dependencies: sorted(dependencies)
        };
        divergences.push(divergence);
        logger.warn(`Dependencies of ${name} differ between ${acc.basePlatform} and ${platform}; keeping ${acc.basePlatform}`, {
          ...divergence
        });
      }

      acc.hashes.set(platform, hash);
    }
  }

  const descriptions = [...accumulators.entries()]
    .map(([name, acc]) => new ArtifactDescription(name, acc.hashes, acc.dependencies))
    .sort(compareDescriptionsByName);

  logger.debug('Merged platform manifests', {
    platforms,
    artifacts: descriptions.length,
    divergences: divergences.length,
    errors: errors.length
  });

  return { descriptions, divergences, errors };
}

export function mergePlatformManifests(manifests: ReadonlyMap<PlatformKey, BuildManifest>, opts: MergeOptions = {}): ArtifactDescription[] {
  return mergeManifests(manifests, opts).descriptions;
}
