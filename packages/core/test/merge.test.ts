import { describe, expect, it } from 'vitest';

import type { BuildManifest, PlatformKey } from '../src/contracts.js';
import { ArtifactDescription, descriptionListsEqual } from '../src/description/description.js';
import { decodeDescription, encodeDescription } from '../src/codec/descriptionCodec.js';
import { InvalidHashError } from '../src/errors.js';
import { mergeManifests, mergePlatformManifests } from '../src/merge/merge.js';
import { captureLogger, FakeManifest, hash } from './helpers/fakes.js';

const windows = new FakeManifest({
  'bundle-1': { hash: hash('1') },
  'cool-stuff': { hash: hash('2'), dependencies: ['bundle-1'] }
});

const android = new FakeManifest({
  'bundle-1': { hash: hash('3') },
  'cool-stuff': { hash: hash('4'), dependencies: ['bundle-1'] },
  'android-only': { hash: hash('5') }
});

describe('manifest merge', () => {
  it('builds one description per artifact with a hash per platform', () => {
    const { logger } = captureLogger();
    const merged = mergePlatformManifests(
      new Map<PlatformKey, BuildManifest>([
        ['WindowsPlayer', windows],
        ['Android', android]
      ]),
      { logger }
    );

    expect(merged.map((d) => d.name)).toEqual(['android-only', 'bundle-1', 'cool-stuff']);
    expect(
      merged[2].equals(
        new ArtifactDescription(
          'cool-stuff',
          [
            ['WindowsPlayer', hash('2')],
            ['Android', hash('4')]
          ],
          ['bundle-1']
        )
      )
    ).toBe(true);
    expect(merged[0].supportedPlatforms()).toEqual(['Android']);
  });

  it('does not depend on map insertion order', () => {
    const { logger } = captureLogger();
    const first = mergePlatformManifests(
      new Map<PlatformKey, BuildManifest>([
        ['WindowsPlayer', windows],
        ['Android', android]
      ]),
      { logger }
    );
    const second = mergePlatformManifests(
      new Map<PlatformKey, BuildManifest>([
        ['Android', android],
        ['WindowsPlayer', windows]
      ]),
      { logger }
    );

    expect(descriptionListsEqual(first, second)).toBe(true);
  });

  it('keeps the dependencies of the first platform in canonical order and reports divergence', () => {
    const { logger, entries } = captureLogger('merge');
    const win = new FakeManifest({ ui: { hash: hash('1'), dependencies: ['fonts'] } });
    const ios = new FakeManifest({ ui: { hash: hash('2'), dependencies: ['fonts', 'icons'] } });

    const report = mergeManifests(
      new Map<PlatformKey, BuildManifest>([
        ['IPhonePlayer', ios],
        ['WindowsPlayer', win]
      ]),
      { logger }
    );

    expect([...report.descriptions[0].dependencies]).toEqual(['fonts']);
    expect(report.divergences).toEqual([
      {
        name: 'ui',
        basePlatform: 'WindowsPlayer',
        baseDependencies: ['fonts'],
        platform: 'IPhonePlayer',
        dependencies: ['fonts', 'icons']
      }
    ]);

    const warnings = entries.filter((e) => e.level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toBe('Dependencies of ui differ between WindowsPlayer and IPhonePlayer; keeping WindowsPlayer');
    expect(warnings[0].component).toBe('merge');
  });

  it('treats dependency lists with a different order as the same set', () => {
    const { logger } = captureLogger();
    const a = new FakeManifest({ ui: { hash: hash('1'), dependencies: ['a', 'b'] } });
    const b = new FakeManifest({ ui: { hash: hash('2'), dependencies: ['b', 'a'] } });

    const report = mergeManifests(
      new Map<PlatformKey, BuildManifest>([
        ['Android', a],
        ['WebGLPlayer', b]
      ]),
      { logger }
    );

    expect(report.divergences).toEqual([]);
  });

  it('returns nothing for no manifests', () => {
    const { logger } = captureLogger();
    expect(mergeManifests(new Map(), { logger })).toEqual({ descriptions: [], divergences: [], errors: [] });
  });

  it('normalizes reported hashes so merged descriptions survive an encode and decode', () => {
    const { logger } = captureLogger();
    const upper = 'AB'.repeat(16);

    const [merged] = mergePlatformManifests(new Map<PlatformKey, BuildManifest>([['Android', new FakeManifest({ a: { hash: upper } })]]), {
      logger
    });

    expect(merged.hashFor('Android')).toBe('ab'.repeat(16));
    expect(decodeDescription(encodeDescription(merged)).equals(merged)).toBe(true);
  });

  it('leaves out a platform whose hash does not parse and reports it', () => {
    const { logger, entries } = captureLogger('merge');
    const win = new FakeManifest({ ui: { hash: '', dependencies: ['fonts'] } });
    const android = new FakeManifest({ ui: { hash: hash('2'), dependencies: ['icons'] } });

    const report = mergeManifests(
      new Map<PlatformKey, BuildManifest>([
        ['WindowsPlayer', win],
        ['Android', android]
      ]),
      { logger }
    );

    expect(report.descriptions).toHaveLength(1);
    expect(report.descriptions[0].supportedPlatforms()).toEqual(['Android']);
    expect([...report.descriptions[0].dependencies]).toEqual(['icons']);
    expect(report.divergences).toEqual([]);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0]).toBeInstanceOf(InvalidHashError);
    expect(report.errors[0].message).toBe('Invalid hash "" found in bundle ui for platform WindowsPlayer');
    expect(entries.filter((e) => e.level === 'warn').map((e) => e.message)).toEqual([
      'Invalid hash "" found in bundle ui for platform WindowsPlayer; leaving WindowsPlayer out of ui'
    ]);
  });
});
