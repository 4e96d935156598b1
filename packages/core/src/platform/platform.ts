import { PLATFORM_KEYS, type PlatformKey } from '../contracts.js';
import { UnsupportedPlatformError } from '../errors.js';

/**
 * Raw build targets and runtime platforms that share one set of bundles.
 *
 * 32/64-bit and universal variants of a desktop OS collapse to that OS, and editor
 * variants collapse to the matching player, since the editor loads the player's bundles.
 * Every canonical key maps to itself, which keeps normalization idempotent.
 */
const PLATFORM_ALIASES: Readonly<Record<string, PlatformKey>> = {
  StandaloneWindows: 'WindowsPlayer',
  StandaloneWindows64: 'WindowsPlayer',
  WindowsEditor: 'WindowsPlayer',
  WindowsPlayer: 'WindowsPlayer',

  StandaloneOSX: 'OSXPlayer',
  StandaloneOSXIntel: 'OSXPlayer',
  StandaloneOSXIntel64: 'OSXPlayer',
  StandaloneOSXUniversal: 'OSXPlayer',
  OSXEditor: 'OSXPlayer',
  OSXPlayer: 'OSXPlayer',

  StandaloneLinux: 'LinuxPlayer',
  StandaloneLinux64: 'LinuxPlayer',
  StandaloneLinuxUniversal: 'LinuxPlayer',
  LinuxEditor: 'LinuxPlayer',
  LinuxPlayer: 'LinuxPlayer',

  Android: 'Android',

  iOS: 'IPhonePlayer',
  IPhonePlayer: 'IPhonePlayer',

  WebGL: 'WebGLPlayer',
  WebGLPlayer: 'WebGLPlayer'
};

export function isPlatformKey(value: string): value is PlatformKey {
  return PLATFORM_KEYS.some((key) => key === value);
}

/** Accepts only an exact canonical key (no aliases). */
export function parsePlatformKey(value: string): PlatformKey | undefined {
  return isPlatformKey(value) ? value : undefined;
}

export function normalizePlatform(rawTarget: string): PlatformKey {
  const platform = Object.prototype.hasOwnProperty.call(PLATFORM_ALIASES, rawTarget) ? PLATFORM_ALIASES[rawTarget] : undefined;
  if (!platform) throw new UnsupportedPlatformError(rawTarget);
  return platform;
}

export type NormalizeResult = { ok: true; platform: PlatformKey } | { ok: false; error: UnsupportedPlatformError };

export function tryNormalizePlatform(rawTarget: string): NormalizeResult {
  try {
    return { ok: true, platform: normalizePlatform(rawTarget) };
  } catch (err) {
    if (err instanceof UnsupportedPlatformError) return { ok: false, error: err };
    throw err;
  }
}

export function comparePlatformKeys(a: PlatformKey, b: PlatformKey): number {
  return PLATFORM_KEYS.indexOf(a) - PLATFORM_KEYS.indexOf(b);
}

/**
 * Normalizes a target list, dropping duplicates (e.g. StandaloneWindows and
 * StandaloneWindows64 build once) and reporting unsupported targets without aborting.
 */
export function normalizePlatforms(rawTargets: readonly string[]): {
  platforms: PlatformKey[];
  errors: UnsupportedPlatformError[];
} {
  const seen = new Set<PlatformKey>();
  const errors: UnsupportedPlatformError[] = [];

  for (const raw of rawTargets) {
    const result = tryNormalizePlatform(raw);
    if (result.ok) {
      seen.add(result.platform);
    } else {
      errors.push(result.error);
    }
  }

  return { platforms: [...seen].sort(comparePlatformKeys), errors };
}

/** All raw identifiers the normalizer accepts. */
export function knownPlatformAliases(): string[] {
  return Object.keys(PLATFORM_ALIASES);
}
