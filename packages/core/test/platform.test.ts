import { describe, expect, it } from 'vitest';

import { PLATFORM_KEYS } from '../src/contracts.js';
import { UnsupportedPlatformError } from '../src/errors.js';
import {
  comparePlatformKeys,
  knownPlatformAliases,
  normalizePlatform,
  normalizePlatforms,
  parsePlatformKey,
  tryNormalizePlatform
} from '../src/platform/platform.js';

describe('platform normalization', () => {
  it('collapses 32/64-bit and universal desktop variants to one key', () => {
    expect(normalizePlatform('StandaloneWindows')).toBe('WindowsPlayer');
    expect(normalizePlatform('StandaloneWindows64')).toBe('WindowsPlayer');
    expect(normalizePlatform('StandaloneLinux64')).toBe('LinuxPlayer');
    expect(normalizePlatform('StandaloneLinuxUniversal')).toBe('LinuxPlayer');
    expect(normalizePlatform('StandaloneOSX')).toBe('OSXPlayer');
  });

  it('maps editor variants to the matching player', () => {
    expect(normalizePlatform('WindowsEditor')).toBe('WindowsPlayer');
    expect(normalizePlatform('OSXEditor')).toBe('OSXPlayer');
    expect(normalizePlatform('LinuxEditor')).toBe('LinuxPlayer');
  });

  it('maps mobile and web build targets to their runtime keys', () => {
    expect(normalizePlatform('iOS')).toBe('IPhonePlayer');
    expect(normalizePlatform('WebGL')).toBe('WebGLPlayer');
    expect(normalizePlatform('Android')).toBe('Android');
  });

  it('is idempotent for every accepted identifier', () => {
    for (const raw of knownPlatformAliases()) {
      const once = normalizePlatform(raw);
      expect(normalizePlatform(once)).toBe(once);
    }
  });

  it('reports unsupported targets as UnsupportedPlatformError', () => {
    expect(() => normalizePlatform('PS5')).toThrow(UnsupportedPlatformError);

    const result = tryNormalizePlatform('Switch');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('UNSUPPORTED_PLATFORM');
      expect(result.error.target).toBe('Switch');
    }
  });

  it('does not treat inherited object keys as platforms', () => {
    expect(() => normalizePlatform('toString')).toThrow(UnsupportedPlatformError);
    expect(() => normalizePlatform('__proto__')).toThrow(UnsupportedPlatformError);
  });

  it('normalizes a target list, dropping duplicates and collecting unsupported targets', () => {
    const result = normalizePlatforms(['StandaloneWindows64', 'Android', 'PS5', 'StandaloneWindows', 'WindowsEditor']);

    expect(result.platforms).toEqual(['WindowsPlayer', 'Android']);
    expect(result.errors.map((e) => e.target)).toEqual(['PS5']);
  });

  it('orders platforms canonically and parses only exact keys', () => {
    expect([...PLATFORM_KEYS].reverse().sort(comparePlatformKeys)).toEqual([...PLATFORM_KEYS]);
    expect(parsePlatformKey('Android')).toBe('Android');
    expect(parsePlatformKey('StandaloneWindows')).toBeUndefined();
  });
});
