import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';

import { ConfigLoadError, errorMessage } from '../errors.js';
import { DEFAULT_ARTIFACT_EXTENSION } from '../identity/fileName.js';
import { DEFAULT_PROBE_TIMEOUT_MS } from '../probe/httpProbe.js';
import { DEFAULT_MAX_RETRIES, DEFAULT_RECONCILE_CONCURRENCY, DEFAULT_RETRY_DELAY_MS } from '../reconcile/reconcile.js';

export const CONFIG_FILENAME = 'bundlekeeper.yaml';

export interface RemoteConfig {
  baseUrl?: string;
  concurrency: number;
  maxRetries: number;
  retryDelayMs: number;
  timeoutMs: number;
}

/** Resolved project configuration; every path is absolute. */
export interface BundleKeeperConfig {
  rootDir: string;
  buildDir: string;
  stagingDir: string;
  uploadDir: string;
  embeddedDir: string;
  /** Interchange file the merged descriptions are written to. */
  descriptionsFile: string;
  extension: string;
  /** Raw build targets built when a command names none. */
  platforms: string[];
  /** Artifact names copied by `embed` when none are given. */
  embedded: string[];
  remote: RemoteConfig;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function invalid(message: string, details?: Record<string, unknown>): ConfigLoadError {
  return new ConfigLoadError(message, { code: 'CONFIG_SCHEMA_INVALID', details });
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.length === 0) throw invalid(`${key} must be a non-empty string`, { [key]: value });
  return value;
}

function optionalStringList(obj: Record<string, unknown>, key: string): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || value.some((v) => typeof v !== 'string')) {
    throw invalid(`${key} must be a list of strings`, { [key]: value });
  }
  return value.filter((v): v is string => typeof v === 'string');
}

function optionalInteger(obj: Record<string, unknown>, key: string, min: number): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw invalid(`${key} must be an integer >= ${min}`, { [key]: value });
  }
  return value;
}

export function defaultConfig(rootDir: string): BundleKeeperConfig {
  const root = path.resolve(rootDir);
  const buildDir = path.join(root, 'AssetBundles');
  return {
    rootDir: root,
    buildDir,
    stagingDir: path.join(buildDir, 'Staging'),
    uploadDir: path.join(buildDir, 'Upload'),
    embeddedDir: path.join(root, 'Assets', 'StreamingAssets', 'EmbeddedAssetBundles'),
    descriptionsFile: path.join(buildDir, 'bundles.json'),
    extension: DEFAULT_ARTIFACT_EXTENSION,
    platforms: [],
    embedded: [],
    remote: {
      baseUrl: undefined,
      concurrency: DEFAULT_RECONCILE_CONCURRENCY,
      maxRetries: DEFAULT_MAX_RETRIES,
      retryDelayMs: DEFAULT_RETRY_DELAY_MS,
      timeoutMs: DEFAULT_PROBE_TIMEOUT_MS
    }
  };
}

/**
 * Parses `bundlekeeper.yaml`. Relative paths resolve against `rootDir`; the staging and
 * upload directories default to subdirectories of the build directory.
 */
export function parseConfig(rawYaml: string, rootDir: string, env: NodeJS.ProcessEnv = process.env): BundleKeeperConfig {
  let parsed: unknown;
  try {
    parsed = YAML.parse(rawYaml) as unknown;
  } catch (err) {
    throw new ConfigLoadError('Failed to parse config YAML', {
      code: 'CONFIG_PARSE_ERROR',
      details: { error: errorMessage(err) }
    });
  }

  const defaults = defaultConfig(rootDir);
  // An empty file parses to null and means "all defaults".
  if (parsed === null || parsed === undefined) return applyEnv(defaults, env);
  if (!isRecord(parsed)) throw invalid('Config YAML must be a mapping/object');

  const resolve = (p: string | undefined): string | undefined => (p === undefined ? undefined : path.resolve(defaults.rootDir, p));

  const buildDir = resolve(optionalString(parsed, 'build_dir')) ?? defaults.buildDir;
  const extension = optionalString(parsed, 'extension') ?? defaults.extension;
  if (extension.startsWith('.') || /[\\/]/.test(extension)) {
    throw invalid('extension must not start with "." or contain a path separator', { extension });
  }

  const remoteValue = parsed.remote;
  if (remoteValue !== undefined && remoteValue !== null && !isRecord(remoteValue)) {
    throw invalid('remote must be a mapping/object');
  }
  const remote = isRecord(remoteValue) ? remoteValue : {};

  const config: BundleKeeperConfig = {
    rootDir: defaults.rootDir,
    buildDir,
    stagingDir: resolve(optionalString(parsed, 'staging_dir')) ?? path.join(buildDir, 'Staging'),
    uploadDir: resolve(optionalString(parsed, 'upload_dir')) ?? path.join(buildDir, 'Upload'),
    embeddedDir: resolve(optionalString(parsed, 'embedded_dir')) ?? defaults.embeddedDir,
    descriptionsFile: resolve(optionalString(parsed, 'descriptions_file')) ?? path.join(buildDir, 'bundles.json'),
    extension,
    platforms: optionalStringList(parsed, 'platforms') ?? defaults.platforms,
    embedded: optionalStringList(parsed, 'embedded') ?? defaults.embedded,
    remote: {
      baseUrl: optionalString(remote, 'base_url'),
      concurrency: optionalInteger(remote, 'concurrency', 1) ?? defaults.remote.concurrency,
      maxRetries: optionalInteger(remote, 'max_retries', 0) ?? defaults.remote.maxRetries,
      retryDelayMs: optionalInteger(remote, 'retry_delay_ms', 0) ?? defaults.remote.retryDelayMs,
      timeoutMs: optionalInteger(remote, 'timeout_ms', 1) ?? defaults.remote.timeoutMs
    }
  };

  return applyEnv(config, env);
}

function applyEnv(config: BundleKeeperConfig, env: NodeJS.ProcessEnv): BundleKeeperConfig {
  const baseUrl = env.BUNDLEKEEPER_REMOTE_BASE_URL;
  if (!baseUrl) return config;
  return { ...config, remote: { ...config.remote, baseUrl } };
}

/** Loads `{rootDir}/bundlekeeper.yaml` (or `configPath`); a missing default file means defaults. */
export async function loadConfig(rootDir: string, configPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<BundleKeeperConfig> {
  const file = configPath ? path.resolve(rootDir, configPath) : path.join(rootDir, CONFIG_FILENAME);

  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (err) {
    if (!configPath && isMissingFile(err)) return applyEnv(defaultConfig(rootDir), env);
    throw new ConfigLoadError(`Failed to read config file: ${file}`, {
      code: 'CONFIG_PARSE_ERROR',
      details: { error: errorMessage(err) }
    });
  }

  return parseConfig(raw, rootDir, env);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
