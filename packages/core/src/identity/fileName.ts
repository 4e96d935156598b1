import type { ContentHash, HashParser, PlatformKey } from '../contracts.js';
import { InvalidArtifactNameError, InvalidHashError, MalformedArtifactNameError } from '../errors.js';
import { parsePlatformKey } from '../platform/platform.js';
import { parseHash128 } from '../utils/hash.js';

/**
 * Staged artifact naming: `{name}_{platform}_{hash}.{ext}`.
 *
 * The platform field lets every platform variant of an artifact share one flat
 * directory; the hash field lets every historical build coexist, so a remote store can
 * hold the published and in-flight versions side by side.
 */
export const FIELD_SEPARATOR = '_';
export const DEFAULT_ARTIFACT_EXTENSION = 'bundle';

export interface IdentityCodecOptions {
  /** File extension without the leading dot. */
  extension?: string;
  hashParser?: HashParser;
}

export interface ArtifactIdentity {
  name: string;
  platform: PlatformKey;
  hash: ContentHash;
}

export function validateArtifactName(name: string): void {
  if (name.length === 0) {
    throw new InvalidArtifactNameError(name, 'name must not be empty');
  }
  if (name.includes(FIELD_SEPARATOR)) {
    throw new InvalidArtifactNameError(name, `name must not contain "${FIELD_SEPARATOR}"`);
  }
  if (name.includes('/') || name.includes('\\')) {
    throw new InvalidArtifactNameError(name, 'name must not contain a path separator');
  }
}

export function artifactFileName(name: string, platform: PlatformKey, hash: ContentHash, opts: IdentityCodecOptions = {}): string {
  validateArtifactName(name);
  if ((opts.hashParser ?? parseHash128)(hash) !== hash) {
    throw new InvalidHashError(name, platform, hash);
  }
  const extension = opts.extension ?? DEFAULT_ARTIFACT_EXTENSION;
  return `${name}${FIELD_SEPARATOR}${platform}${FIELD_SEPARATOR}${hash}.${extension}`;
}

export function parseArtifactFileName(fileName: string, opts: IdentityCodecOptions = {}): ArtifactIdentity {
  const suffix = `.${opts.extension ?? DEFAULT_ARTIFACT_EXTENSION}`;
  if (!fileName.endsWith(suffix)) {
    throw new MalformedArtifactNameError(fileName, `expected extension ${suffix}`);
  }

  const fields = fileName.slice(0, -suffix.length).split(FIELD_SEPARATOR);
  if (fields.length !== 3) {
    throw new MalformedArtifactNameError(fileName, `expected 3 fields separated by "${FIELD_SEPARATOR}", found ${fields.length}`);
  }

  const [name, rawPlatform, rawHash] = fields;
  if (name.length === 0) {
    throw new MalformedArtifactNameError(fileName, 'artifact name is empty');
  }

  const platform = parsePlatformKey(rawPlatform);
  if (!platform) {
    throw new MalformedArtifactNameError(fileName, `unknown platform ${rawPlatform}`);
  }

  const hash = (opts.hashParser ?? parseHash128)(rawHash);
  if (hash === undefined || hash !== rawHash) {
    throw new MalformedArtifactNameError(fileName, `invalid hash ${rawHash}`);
  }

  return { name, platform, hash };
}

export type ParseFileNameResult = { ok: true; identity: ArtifactIdentity } | { ok: false; error: MalformedArtifactNameError };

export function tryParseArtifactFileName(fileName: string, opts: IdentityCodecOptions = {}): ParseFileNameResult {
  try {
    return { ok: true, identity: parseArtifactFileName(fileName, opts) };
  } catch (err) {
    if (err instanceof MalformedArtifactNameError) return { ok: false, error: err };
    throw err;
  }
}
