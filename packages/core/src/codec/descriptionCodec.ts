import type { ContentHash, DescriptionRecord, HashParser, PlatformKey } from '../contracts.js';
import { ArtifactDescription } from '../description/description.js';
import { BundleKeeperError, InvalidHashError, MalformedDescriptionError, UnknownPlatformError } from '../errors.js';
import { parsePlatformKey } from '../platform/platform.js';
import { compareUtf8, parseHash128 } from '../utils/hash.js';

export interface DecodeOptions {
  hashParser?: HashParser;
  /**
   * Where the record (or record list) lives inside a larger document: a dotted path
   * such as `"assets.bundles"` or a segment array. Omit for the document root.
   */
  path?: string | readonly string[];
}

export interface DecodeReport {
  descriptions: ArtifactDescription[];
  errors: BundleKeeperError[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function encodeDescription(description: ArtifactDescription): DescriptionRecord {
  const hashes: Partial<Record<PlatformKey, string>> = {};
  for (const platform of description.supportedPlatforms()) {
    hashes[platform] = description.hashes.get(platform);
  }

  return {
    name: description.name,
    hashes,
    dependencies: [...description.dependencies].sort(compareUtf8)
  };
}

export function encodeDescriptions(descriptions: readonly ArtifactDescription[]): DescriptionRecord[] {
  return descriptions.map(encodeDescription);
}

export function stringifyDescriptions(descriptions: readonly ArtifactDescription[]): string {
  return JSON.stringify(encodeDescriptions(descriptions), null, 2) + '\n';
}

function pathSegments(path: DecodeOptions['path']): string[] {
  if (path === undefined) return [];
  if (typeof path === 'string') return path.split('.').filter((segment) => segment.length > 0);
  return [...path];
}

function resolvePath(document: unknown, path: DecodeOptions['path']): unknown {
  let current = document;
  const walked: string[] = [];
  for (const segment of pathSegments(path)) {
    walked.push(segment);
    if (!isRecord(current) || !(segment in current)) {
      throw new MalformedDescriptionError(`Path ${walked.join('.')} not found in document`, { path: walked.join('.') });
    }
    current = current[segment];
  }
  return current;
}

function decodeRecord(value: unknown, parseHash: HashParser): ArtifactDescription {
  if (!isRecord(value)) {
    throw new MalformedDescriptionError('Bundle description must be an object');
  }

  const name = value.name;
  if (typeof name !== 'string' || name.length === 0) {
    throw new MalformedDescriptionError('Bundle description has no name', { name });
  }

  // Fields other than name/hashes/dependencies belong to the caller and are ignored.
  const rawHashes = value.hashes;
  if (!isRecord(rawHashes)) {
    throw new MalformedDescriptionError(`Bundle ${name} has no hashes object`, { name });
  }

  const hashes = new Map<PlatformKey, ContentHash>();
  for (const [key, raw] of Object.entries(rawHashes)) {
    const platform = parsePlatformKey(key);
    if (!platform) throw new UnknownPlatformError(name, key);

    const hash = typeof raw === 'string' ? parseHash(raw) : undefined;
    if (hash === undefined) throw new InvalidHashError(name, platform, raw);

    hashes.set(platform, hash);
  }

  const rawDependencies = value.dependencies;
  if (!Array.isArray(rawDependencies)) {
    throw new MalformedDescriptionError(`Bundle ${name} has no dependencies list`, { name });
  }

  const dependencies = new Set<string>();
  for (const dep of rawDependencies) {
    if (typeof dep !== 'string' || dep.length === 0) {
      throw new MalformedDescriptionError(`Bundle ${name} has an invalid dependency ${JSON.stringify(dep)}`, { name, dependency: dep });
    }
    dependencies.add(dep);
  }

  return new ArtifactDescription(name, hashes, dependencies);
}

/** Decodes one record, which may sit beside caller fields or under `opts.path`. */
export function decodeDescription(document: unknown, opts: DecodeOptions = {}): ArtifactDescription {
  return decodeRecord(resolvePath(document, opts.path), opts.hashParser ?? parseHash128);
}

function resolveList(document: unknown, opts: DecodeOptions): unknown[] {
  const list = resolvePath(document, opts.path);
  if (!Array.isArray(list)) {
    throw new MalformedDescriptionError('Expected a list of bundle descriptions', {
      path: pathSegments(opts.path).join('.')
    });
  }
  return list;
}

/** Decodes a list of records, failing on the first bad record. */
export function decodeDescriptions(document: unknown, opts: DecodeOptions = {}): ArtifactDescription[] {
  const parseHash = opts.hashParser ?? parseHash128;
  return resolveList(document, opts).map((record) => decodeRecord(record, parseHash));
}

/**
 * Decodes a list of records, skipping bad ones. Skipped records are reported in
 * `errors`; a record is never half-decoded.
 */
export function decodeDescriptionsPartial(document: unknown, opts: DecodeOptions = {}): DecodeReport {
  const parseHash = opts.hashParser ?? parseHash128;
  const descriptions: ArtifactDescription[] = [];
  const errors: BundleKeeperError[] = [];

  for (const record of resolveList(document, opts)) {
    try {
      descriptions.push(decodeRecord(record, parseHash));
    } catch (err) {
      if (!(err instanceof BundleKeeperError)) throw err;
      errors.push(err);
    }
  }

  return { descriptions, errors };
}

export function parseDescriptionsJson(json: string, opts: DecodeOptions = {}): ArtifactDescription[] {
  let document: unknown;
  try {
    document = JSON.parse(json) as unknown;
  } catch (err) {
    throw new MalformedDescriptionError('Failed to parse bundle descriptions JSON', {
      error: err instanceof Error ? err.message : String(err)
    });
  }
  return decodeDescriptions(document, opts);
}
