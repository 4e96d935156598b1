import fs from 'node:fs/promises';
import path from 'node:path';

import type { ArtifactCompiler, BuildManifest, BuildManyResult, ContentHash, HashParser, PlatformKey } from '../contracts.js';
import { BundleKeeperError, errorMessage, ManifestLoadError } from '../errors.js';
import { getLogger } from '../logging/logger.js';
import { normalizePlatform, normalizePlatforms } from '../platform/platform.js';
import { parseHash128 } from '../utils/hash.js';

export const DEFAULT_MANIFEST_FILENAME = 'build-manifest.json';

interface ManifestEntry {
  hash: ContentHash;
  dependencies: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/**
 * BuildManifest over the JSON a build step leaves next to its outputs:
 *
 *   { "platform": "Android", "artifacts": { "<name>": { "hash": "<hex>", "dependencies": ["..."] } } }
 */
export class JsonBuildManifest implements BuildManifest {
  private constructor(
    readonly platform: PlatformKey,
    private readonly entries: ReadonlyMap<string, ManifestEntry>
  ) {}

  static fromRecord(platform: PlatformKey, value: unknown, opts: { hashParser?: HashParser; source?: string } = {}): JsonBuildManifest {
    const parseHash = opts.hashParser ?? parseHash128;
    const source = opts.source ?? platform;

    if (!isRecord(value) || !isRecord(value.artifacts)) {
      throw new ManifestLoadError(`Build manifest ${source} must be an object with an "artifacts" object`, { source });
    }

    if (value.platform !== undefined) {
      const declared = typeof value.platform === 'string' ? value.platform : String(value.platform);
      if (normalizePlatform(declared) !== platform) {
        throw new ManifestLoadError(`Build manifest ${source} was built for ${declared}, expected ${platform}`, { source, declared });
      }
    }

    const entries = new Map<string, ManifestEntry>();
    for (const [name, raw] of Object.entries(value.artifacts)) {
      if (!isRecord(raw) || typeof raw.hash !== 'string') {
        throw new ManifestLoadError(`Artifact ${name} in ${source} has no hash`, { source, name });
      }
      const hash = parseHash(raw.hash);
      if (hash === undefined) {
        throw new ManifestLoadError(`Artifact ${name} in ${source} has invalid hash ${raw.hash}`, { source, name });
      }

      const deps = raw.dependencies ?? [];
      if (!Array.isArray(deps) || deps.some((d) => typeof d !== 'string')) {
        throw new ManifestLoadError(`Artifact ${name} in ${source} has invalid dependencies`, { source, name });
      }

      entries.set(name, { hash, dependencies: deps.filter((d): d is string => typeof d === 'string') });
    }

    return new JsonBuildManifest(platform, entries);
  }

  artifactNames(): string[] {
    return [...this.entries.keys()];
  }

  hashOf(name: string): ContentHash {
    return this.entry(name).hash;
  }

  directDependenciesOf(name: string): string[] {
    return [...this.entry(name).dependencies];
  }

  private entry(name: string): ManifestEntry {
    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Artifact ${name} is not part of the ${this.platform} build`);
    return entry;
  }
}

export interface ManifestDirectoryCompilerOptions {
  /** Per-platform outputs live in `{buildDir}/{PlatformKey}/`. */
  buildDir: string;
  manifestFileName?: string;
  hashParser?: HashParser;
}

export function platformBuildDir(buildDir: string, platform: PlatformKey): string {
  return path.join(buildDir, platform);
}

/**
 * Artifact compiler stand-in: "building" a target loads the manifest the engine's build
 * pipeline wrote for it.
 */
export class ManifestDirectoryCompiler implements ArtifactCompiler {
  private readonly manifestFileName: string;

  constructor(private readonly opts: ManifestDirectoryCompilerOptions) {
    this.manifestFileName = opts.manifestFileName ?? DEFAULT_MANIFEST_FILENAME;
  }

  async build(target: string): Promise<JsonBuildManifest> {
    const platform = normalizePlatform(target);
    const manifestPath = path.join(platformBuildDir(this.opts.buildDir, platform), this.manifestFileName);

    let raw: string;
    try {
      raw = await fs.readFile(manifestPath, 'utf8');
    } catch (err) {
      throw new ManifestLoadError(`Failed to read build manifest: ${manifestPath}`, { path: manifestPath, error: errorMessage(err) }, err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw) as unknown;
    } catch (err) {
      throw new ManifestLoadError(`Failed to parse build manifest: ${manifestPath}`, { path: manifestPath, error: errorMessage(err) }, err);
    }

    return JsonBuildManifest.fromRecord(platform, parsed, { hashParser: this.opts.hashParser, source: manifestPath });
  }

  /**
   * Builds every target once per canonical platform. A target that is unsupported or
   * fails to load is reported in `failures` and the rest still build.
   */
  async buildMany(targets: string[]): Promise<BuildManyResult> {
    const logger = getLogger('compiler');
    const { platforms, errors } = normalizePlatforms(targets);
    const failures: BuildManyResult['failures'] = errors.map((error) => ({ target: error.target, error }));
    const manifests = new Map<PlatformKey, BuildManifest>();

    for (const platform of platforms) {
      try {
        manifests.set(platform, await this.build(platform));
      } catch (err) {
        if (!(err instanceof BundleKeeperError)) throw err;
        failures.push({ target: platform, error: err });
      }
    }

    for (const failure of failures) {
      logger.warn(`Skipping target ${failure.target}: ${failure.error.message}`);
    }

    return { manifests, failures };
  }
}
