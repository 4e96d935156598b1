import { describe, expect, it } from 'vitest';

import {
  decodeDescription,
  decodeDescriptions,
  decodeDescriptionsPartial,
  encodeDescriptions,
  parseDescriptionsJson,
  stringifyDescriptions
} from '../src/codec/descriptionCodec.js';
import { ArtifactDescription, descriptionListsEqual } from '../src/description/description.js';
import { InvalidHashError, MalformedDescriptionError, UnknownPlatformError } from '../src/errors.js';
import { parseSha256 } from '../src/utils/hash.js';

const HASH_A = '9f86d081884c7d659a2feaa0c55ad015';
const HASH_B = '60303ae22b998861bce3b28f33eec1be';
const HASH_C = 'fd61a03af4f77d870fc21e05e7e80678';

const SAMPLE_JSON = `[
  {
    "name": "bundle-1",
    "hashes": { "Android": "${HASH_A}", "WindowsPlayer": "${HASH_B}" },
    "dependencies": []
  },
  {
    "name": "cool-stuff",
    "hashes": { "Android": "${HASH_C}" },
    "dependencies": ["bundle-1"]
  }
]`;

const SAMPLE_DESCRIPTIONS = [
  new ArtifactDescription('bundle-1', [
    ['Android', HASH_A],
    ['WindowsPlayer', HASH_B]
  ]),
  new ArtifactDescription('cool-stuff', [['Android', HASH_C]], ['bundle-1'])
];

describe('description codec', () => {
  it('encodes the interchange shape with canonical platform order and sorted dependencies', () => {
    const encoded = encodeDescriptions([new ArtifactDescription('ui', [['Android', HASH_A], ['WindowsPlayer', HASH_B]], ['b', 'a'])]);

    expect(encoded).toEqual([{ name: 'ui', hashes: { WindowsPlayer: HASH_B, Android: HASH_A }, dependencies: ['a', 'b'] }]);
    expect(Object.keys(encoded[0].hashes)).toEqual(['WindowsPlayer', 'Android']);
  });

  it('decodes the interchange file', () => {
    expect(descriptionListsEqual(parseDescriptionsJson(SAMPLE_JSON), SAMPLE_DESCRIPTIONS)).toBe(true);
  });

  it('round-trips through JSON, including empty lists and platform-less artifacts', () => {
    const lists = [SAMPLE_DESCRIPTIONS, [], [new ArtifactDescription('orphan')]];

    for (const list of lists) {
      expect(descriptionListsEqual(parseDescriptionsJson(stringifyDescriptions(list)), list)).toBe(true);
    }
  });

  it('reads a record that sits beside caller metadata', () => {
    const record = {
      name: 'bundle-1',
      hashes: { Android: HASH_A },
      dependencies: [],
      metadata: 'Some extra fields over here'
    };

    expect(decodeDescription(record).equals(new ArtifactDescription('bundle-1', [['Android', HASH_A]]))).toBe(true);
  });

  it('reads a nested record exactly like the equivalent bare list', () => {
    const record = { name: 'bundle-1', hashes: { Android: HASH_A, WindowsPlayer: HASH_B }, dependencies: [] };
    const document = { metadata: 'Some extra fields over here', bundle: record };

    const nested = decodeDescription(document, { path: 'bundle' });
    const [bare] = decodeDescriptions([record]);

    expect(nested.equals(bare)).toBe(true);
  });

  it('reads a nested list through a segment path', () => {
    const document = { release: { bundles: JSON.parse(SAMPLE_JSON) as unknown } };

    expect(descriptionListsEqual(decodeDescriptions(document, { path: ['release', 'bundles'] }), SAMPLE_DESCRIPTIONS)).toBe(true);
  });

  it('fails with MalformedDescriptionError when the path does not resolve', () => {
    expect(() => decodeDescriptions({ release: {} }, { path: 'release.bundles' })).toThrow('Path release.bundles not found in document');
  });

  it('fails with InvalidHashError naming the artifact and platform', () => {
    const doc = [{ name: 'bundle-1', hashes: { Android: 'nope' }, dependencies: [] }];

    try {
      decodeDescriptions(doc);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidHashError);
      if (err instanceof InvalidHashError) {
        expect(err.artifactName).toBe('bundle-1');
        expect(err.platform).toBe('Android');
        expect(err.message).toBe('Invalid hash "nope" found in bundle bundle-1 for platform Android');
      }
    }
  });

  it('rejects the all-zero hash and non-string hashes', () => {
    expect(() => decodeDescriptions([{ name: 'a', hashes: { Android: '0'.repeat(32) }, dependencies: [] }])).toThrow(InvalidHashError);
    expect(() => decodeDescriptions([{ name: 'a', hashes: { Android: 42 }, dependencies: [] }])).toThrow(InvalidHashError);
  });

  it('fails with UnknownPlatformError instead of dropping the platform', () => {
    const doc = [{ name: 'bundle-1', hashes: { Android: HASH_A, Dreamcast: HASH_B }, dependencies: [] }];

    expect(() => decodeDescriptions(doc)).toThrow(UnknownPlatformError);
    expect(() => decodeDescriptions(doc)).toThrow('Could not parse unknown platform Dreamcast in bundle bundle-1');
  });

  it('uses the pluggable hash parser', () => {
    const sha = 'ab'.repeat(32);
    const doc = [{ name: 'maps', hashes: { Android: sha.toUpperCase() }, dependencies: [] }];

    expect(() => decodeDescriptions(doc)).toThrow(InvalidHashError);
    expect(decodeDescriptions(doc, { hashParser: parseSha256 })[0].hashFor('Android')).toBe(sha);
  });

  it('rejects structurally broken records', () => {
    expect(() => decodeDescriptions([{ hashes: {}, dependencies: [] }])).toThrow(MalformedDescriptionError);
    expect(() => decodeDescriptions([{ name: 'a', dependencies: [] }])).toThrow('Bundle a has no hashes object');
    expect(() => decodeDescriptions([{ name: 'a', hashes: {} }])).toThrow('Bundle a has no dependencies list');
    expect(() => decodeDescriptions([{ name: 'a', hashes: {}, dependencies: [3] }])).toThrow(MalformedDescriptionError);
    expect(() => decodeDescriptions({ name: 'a' })).toThrow('Expected a list of bundle descriptions');
    expect(() => parseDescriptionsJson('{not json')).toThrow('Failed to parse bundle descriptions JSON');
  });

  it('skips and reports bad records in partial mode', () => {
    const doc = [
      { name: 'good', hashes: { Android: HASH_A }, dependencies: [] },
      { name: 'bad-hash', hashes: { Android: 'zz' }, dependencies: [] },
      { name: 'bad-platform', hashes: { Saturn: HASH_A }, dependencies: [] },
      { name: 'also-good', hashes: {}, dependencies: ['good'] }
    ];

    const report = decodeDescriptionsPartial(doc);

    expect(report.descriptions.map((d) => d.name)).toEqual(['good', 'also-good']);
    expect(report.errors.map((e) => e.code)).toEqual(['INVALID_HASH', 'UNKNOWN_PLATFORM']);
  });
});
