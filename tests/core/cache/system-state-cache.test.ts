import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import type { HostformDirectories } from '../../../src/types/index.js';
import { CachedPackageInstaller, SystemStateCache } from '../../../src/core/cache/system-state-cache.js';
import { createTempDir, FakeInstaller, removeTempDir, testDirectories, writeFiles } from '../../test-helpers.js';

const HOUR = 60 * 60 * 1000;

let root: string;
let directories: HostformDirectories;
let clock: number;
const now = (): number => clock;

describe('SystemStateCache', () => {
  beforeEach(async () => {
    root = await createTempDir('system-state');
    directories = testDirectories(root);
    clock = Date.parse('2026-03-01T12:00:00.000Z');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('answers from entries within the TTL and forgets older ones', () => {
    const cache = new SystemStateCache(directories, { now });
    cache.set('apt', 'git', true);

    clock += HOUR;
    assert.equal(cache.get('apt', 'git'), true);

    clock += 1;
    assert.equal(cache.get('apt', 'git'), undefined);
  });

  it('keeps managers apart', () => {
    const cache = new SystemStateCache(directories, { now });
    cache.set('snap', 'code', true);
    assert.equal(cache.get('apt', 'code'), undefined);
  });

  it('persists entries across instances', async () => {
    const first = new SystemStateCache(directories, { now });
    first.set('flatpak', 'org.gimp.GIMP', false);
    await first.flush();

    const second = new SystemStateCache(directories, { now });
    await second.load();

    assert.equal(second.get('flatpak', 'org.gimp.GIMP'), false);
  });

  it('writes nothing when no entry changed', async () => {
    await new SystemStateCache(directories, { now }).flush();
    await assert.rejects(fs.access(join(directories.cache, 'system_state.json')));
  });

  it('loads an unreadable record as empty', async () => {
    await writeFiles(directories.cache, { 'system_state.json': '{"version":"1.0","packages":' });

    const cache = new SystemStateCache(directories, { now });
    await cache.load();

    assert.equal(cache.get('apt', 'git'), undefined);
  });

  it('ignores records from another format version', async () => {
    await writeFiles(directories.cache, {
      'system_state.json': JSON.stringify({
        version: '0.9',
        lastChecked: new Date(clock).toISOString(),
        packages: { apt: { git: { installed: true, lastChecked: new Date(clock).toISOString() } } }
      })
    });

    const cache = new SystemStateCache(directories, { now });
    await cache.load();

    assert.equal(cache.get('apt', 'git'), undefined);
  });
});

describe('CachedPackageInstaller', () => {
  beforeEach(async () => {
    root = await createTempDir('cached-installer');
    directories = testDirectories(root);
    clock = Date.parse('2026-03-01T12:00:00.000Z');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('skips the live probe for a fresh "installed" entry', async () => {
    const inner = new FakeInstaller('apt', ['git']);
    const cache = new SystemStateCache(directories, { now });
    const installer = new CachedPackageInstaller(inner, cache);

    assert.equal(await installer.isInstalled('git'), true);
    assert.equal(await installer.isInstalled('git'), true);

    assert.deepEqual(inner.probes, ['git']);
  });

  it('always re-probes packages last seen as missing', async () => {
    const inner = new FakeInstaller('apt');
    const installer = new CachedPackageInstaller(inner, new SystemStateCache(directories, { now }));

    assert.equal(await installer.isInstalled('htop'), false);
    inner.installed.add('htop');
    assert.equal(await installer.isInstalled('htop'), true);

    assert.deepEqual(inner.probes, ['htop', 'htop']);
  });

  it('records installs and removals', async () => {
    const inner = new FakeInstaller('snap');
    const cache = new SystemStateCache(directories, { now });
    const installer = new CachedPackageInstaller(inner, cache);

    await installer.install(['code'], ['--classic']);
    assert.equal(cache.get('snap', 'code'), true);
    assert.equal(installer.manager, 'snap');

    await installer.remove(['code']);
    assert.equal(cache.get('snap', 'code'), false);
    assert.deepEqual(inner.installCalls, [{ names: ['code'], flags: ['--classic'] }]);
    assert.deepEqual(inner.removeCalls, [['code']]);
  });
});
