import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { JsonBuildManifest, ManifestDirectoryCompiler } from '../src/compiler/manifestCompiler.js';
import type { BuildManifest, PlatformKey } from '../src/contracts.js';
import { ManifestLoadError, StagingError } from '../src/errors.js';
import { copyEmbeddedArtifacts, copyToUploadArea, listStagedArtifacts, resetDirectory, stageArtifacts } from '../src/staging/staging.js';
import { hash } from './helpers/fakes.js';

async function writeBuild(buildDir: string, platform: PlatformKey, artifacts: Record<string, { hash: string; dependencies?: string[] }>): Promise<void> {
  const dir = path.join(buildDir, platform);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(path.join(dir, 'build-manifest.json'), JSON.stringify({ platform, artifacts }), 'utf8');
  for (const name of Object.keys(artifacts)) {
    await fs.writeFile(path.join(dir, name), `${platform}:${name}`, 'utf8');
  }
}

describe('manifest directory compiler', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'bundlekeeper-compiler-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('loads the manifest of the normalized platform', async () => {
    await writeBuild(root, 'WindowsPlayer', { 'bundle-1': { hash: hash('1') }, ui: { hash: hash('2'), dependencies: ['bundle-1'] } });
    const compiler = new ManifestDirectoryCompiler({ buildDir: root });

    const manifest = await compiler.build('StandaloneWindows64');

    expect(manifest.platform).toBe('WindowsPlayer');
    expect(manifest.artifactNames()).toEqual(['bundle-1', 'ui']);
    expect(manifest.hashOf('ui')).toBe(hash('2'));
    expect(manifest.directDependenciesOf('ui')).toEqual(['bundle-1']);
  });

  it('builds each canonical platform once and keeps going past failures', async () => {
    await writeBuild(root, 'Android', { a: { hash: hash('1') } });
    const compiler = new ManifestDirectoryCompiler({ buildDir: root });

    const result = await compiler.buildMany(['Android', 'PS5', 'WebGL']);

    expect([...result.manifests.keys()]).toEqual(['Android']);
    expect(result.failures.map((f) => f.target)).toEqual(['PS5', 'WebGLPlayer']);
    expect(result.failures[0].error.name).toBe('UnsupportedPlatformError');
    expect(result.failures[1].error).toBeInstanceOf(ManifestLoadError);
  });

  it('rejects manifests with invalid hashes or a mismatched platform', () => {
    expect(() => JsonBuildManifest.fromRecord('Android', { artifacts: { a: { hash: 'xyz' } } })).toThrow(
      'Artifact a in Android has invalid hash xyz'
    );
    expect(() => JsonBuildManifest.fromRecord('Android', { platform: 'iOS', artifacts: {} })).toThrow(
      'Build manifest Android was built for iOS, expected Android'
    );
    expect(() => JsonBuildManifest.fromRecord('Android', [])).toThrow(ManifestLoadError);
  });
});

describe('staging', () => {
  let root: string;
  let buildDir: string;
  let stagingDir: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'bundlekeeper-staging-'));
    buildDir = path.join(root, 'AssetBundles');
    stagingDir = path.join(buildDir, 'Staging');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('copies built artifacts under canonical names and lists them back', async () => {
    await writeBuild(buildDir, 'Android', { 'bundle-1': { hash: hash('1') } });
    await writeBuild(buildDir, 'WindowsPlayer', { 'bundle-1': { hash: hash('2') } });
    const compiler = new ManifestDirectoryCompiler({ buildDir });
    const { manifests } = await compiler.buildMany(['Android', 'StandaloneWindows']);

    await fs.mkdir(stagingDir, { recursive: true });
    await fs.writeFile(path.join(stagingDir, 'stale.bundle'), 'old', 'utf8');

    const report = await stageArtifacts({ buildDir, stagingDir, manifests });

    expect(report.errors).toEqual([]);
    expect(report.staged.map((f) => f.fileName)).toEqual([`bundle-1_WindowsPlayer_${hash('2')}.bundle`, `bundle-1_Android_${hash('1')}.bundle`]);

    const stagedBytes = await fs.readFile(path.join(stagingDir, `bundle-1_Android_${hash('1')}.bundle`), 'utf8');
    expect(stagedBytes).toBe('Android:bundle-1');

    const listing = await listStagedArtifacts(stagingDir);
    expect(listing.errors).toEqual([]);
    expect(listing.files.map((f) => [f.name, f.platform, f.hash])).toEqual([
      ['bundle-1', 'Android', hash('1')],
      ['bundle-1', 'WindowsPlayer', hash('2')]
    ]);
  });

  it('reports artifacts that cannot be staged without stopping the rest', async () => {
    await writeBuild(buildDir, 'Android', { good: { hash: hash('1') } });
    const manifests = new Map<PlatformKey, BuildManifest>([
      [
        'Android',
        JsonBuildManifest.fromRecord('Android', {
          artifacts: { good: { hash: hash('1') }, missing: { hash: hash('2') }, bad_name: { hash: hash('3') } }
        })
      ]
    ]);

    const report = await stageArtifacts({ buildDir, stagingDir, manifests });

    expect(report.staged.map((f) => f.name)).toEqual(['good']);
    expect(report.errors.map((e) => e.code).sort()).toEqual(['INVALID_ARTIFACT_NAME', 'STAGING_ERROR']);
  });

  it('reports foreign files in the staging directory', async () => {
    await fs.mkdir(stagingDir, { recursive: true });
    await fs.writeFile(path.join(stagingDir, 'notes.txt'), 'hi', 'utf8');

    const listing = await listStagedArtifacts(stagingDir);

    expect(listing.files).toEqual([]);
    expect(listing.errors.map((e) => e.fileName)).toEqual(['notes.txt']);
  });

  it('reports a missing staging directory as a staging error', async () => {
    const missing = path.join(buildDir, 'NotStaged');

    await expect(listStagedArtifacts(missing)).rejects.toBeInstanceOf(StagingError);
    await expect(listStagedArtifacts(missing)).rejects.toMatchObject({ code: 'STAGING_ERROR', details: { stagingDir: missing } });
  });

  it('resets the upload area and copies only the given files', async () => {
    const uploadDir = path.join(buildDir, 'Upload');
    await resetDirectory(stagingDir);
    await fs.mkdir(uploadDir, { recursive: true });
    await fs.writeFile(path.join(uploadDir, 'old.bundle'), 'old', 'utf8');
    const fileName = `ui_Android_${hash('4')}.bundle`;
    await fs.writeFile(path.join(stagingDir, fileName), 'ui', 'utf8');

    const { files } = await listStagedArtifacts(stagingDir);
    await copyToUploadArea(files, uploadDir);

    expect(await fs.readdir(uploadDir)).toEqual([fileName]);
  });

  it('embeds one platform, skipping unknown and unbuilt artifacts', async () => {
    await writeBuild(buildDir, 'IPhonePlayer', { core: { hash: hash('1') } });
    const embeddedDir = path.join(root, 'Embedded');

    const report = await copyEmbeddedArtifacts({
      buildDir,
      embeddedDir,
      platform: 'IPhonePlayer',
      names: ['core', 'mystery', 'levels'],
      knownNames: new Set(['core', 'levels'])
    });

    expect(report.copied).toEqual([path.join(embeddedDir, 'core')]);
    expect(report.skipped).toEqual([
      { name: 'mystery', reason: 'unknown' },
      { name: 'levels', reason: 'not-built' }
    ]);
    expect(await fs.readFile(path.join(embeddedDir, 'core'), 'utf8')).toBe('IPhonePlayer:core');
  });
});
