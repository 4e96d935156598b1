import { PLATFORM_KEYS, type ContentHash, type PlatformKey } from '../contracts.js';
import { InvalidArtifactNameError, InvalidHashError } from '../errors.js';
import { artifactFileName, type IdentityCodecOptions } from '../identity/fileName.js';
import { canonicalJsonStringify } from '../utils/canonicalJson.js';
import { compareUtf8, sha256Hex } from '../utils/hash.js';

type HashEntries = ReadonlyMap<PlatformKey, ContentHash> | Iterable<readonly [PlatformKey, ContentHash]>;

/**
 * Cross-platform record of one artifact: its hash on every platform it was built for,
 * and the names of the artifacts it needs at load time.
 *
 * Immutable. A rebuild produces a new description via {@link withHash} rather than
 * changing this one.
 */
export class ArtifactDescription {
  readonly name: string;
  readonly hashes: ReadonlyMap<PlatformKey, ContentHash>;
  readonly dependencies: ReadonlySet<string>;

  constructor(name: string, hashes: HashEntries = [], dependencies: Iterable<string> = []) {
    if (name.length === 0) {
      throw new InvalidArtifactNameError(name, 'name must not be empty');
    }
    this.name = name;
    this.hashes = new Map(hashes);
    for (const [platform, hash] of this.hashes) {
      if (hash.length === 0) throw new InvalidHashError(name, platform, hash);
    }
    this.dependencies = new Set(dependencies);
    Object.freeze(this);
  }

  hashFor(platform: PlatformKey): ContentHash | undefined {
    return this.hashes.get(platform);
  }

  /** Platforms this artifact was built for, in canonical order. */
  supportedPlatforms(): PlatformKey[] {
    return PLATFORM_KEYS.filter((p) => this.hashes.has(p));
  }

  /** Staged file name for one platform, or `undefined` when not built for it. */
  fileNameFor(platform: PlatformKey, opts?: IdentityCodecOptions): string | undefined {
    const hash = this.hashes.get(platform);
    return hash === undefined ? undefined : artifactFileName(this.name, platform, hash, opts);
  }

  withHash(platform: PlatformKey, hash: ContentHash): ArtifactDescription {
    const next = new Map(this.hashes);
    next.set(platform, hash);
    return new ArtifactDescription(this.name, next, this.dependencies);
  }

  withoutPlatform(platform: PlatformKey): ArtifactDescription {
    const next = new Map(this.hashes);
    next.delete(platform);
    return new ArtifactDescription(this.name, next, this.dependencies);
  }

  equals(other: ArtifactDescription): boolean {
    if (this === other) return true;
    if (this.name !== other.name) return false;
    if (this.hashes.size !== other.hashes.size) return false;
    if (this.dependencies.size !== other.dependencies.size) return false;

    for (const [platform, hash] of this.hashes) {
      if (other.hashes.get(platform) !== hash) return false;
    }
    for (const dep of this.dependencies) {
      if (!other.dependencies.has(dep)) return false;
    }
    return true;
  }

  /**
   * SHA-256 over a canonical form. Platforms are walked in canonical order and
   * dependencies sorted, so equal descriptions hash identically whatever order their
   * maps and sets were filled in.
   */
  canonicalHash(): string {
    return sha256Hex(
      canonicalJsonStringify({
        name: this.name,
        hashes: this.supportedPlatforms().map((p) => [p, this.hashes.get(p)]),
        dependencies: [...this.dependencies].sort(compareUtf8)
      })
    );
  }

  toString(): string {
    const platforms = this.supportedPlatforms()
      .map((p) => `${p}=${this.hashes.get(p)}`)
      .join(', ');
    return `${this.name} [${platforms}] deps: ${[...this.dependencies].sort(compareUtf8).join(', ')}`;
  }
}

export function compareDescriptionsByName(a: ArtifactDescription, b: ArtifactDescription): number {
  return compareUtf8(a.name, b.name);
}

export function descriptionListsEqual(a: readonly ArtifactDescription[], b: readonly ArtifactDescription[]): boolean {
  return a.length === b.length && a.every((d, i) => d.equals(b[i]));
}
