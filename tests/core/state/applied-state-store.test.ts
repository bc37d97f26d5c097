import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import type { AppliedState } from '../../../src/types/index.js';
import {
  AppliedStateStore,
  createEmptyAppliedState,
  sanitizeAppliedState
} from '../../../src/core/state/applied-state-store.js';
import { StateLoadError } from '../../../src/utils/errors.js';
import { createTempDir, removeTempDir, testDirectories, writeFiles } from '../../test-helpers.js';

const sampleState: AppliedState = {
  version: '1.0',
  lastUpdated: '2026-03-01T12:00:00.000Z',
  managedPackages: { apt: ['git', 'htop'], flatpak: [], snap: ['code'] },
  managedFiles: [
    { name: 'bashrc', destinationPath: '/home/dev/.bashrc', deploymentKind: 'link', backupPath: '/home/dev/.bashrc.bak' }
  ],
  managedBinaries: [
    { name: 'jq', destinationPath: '/home/dev/bin/jq', deploymentKind: 'copy', source: 'https://example.test/jq' }
  ]
};

describe('AppliedStateStore', () => {
  let root: string;
  let store: AppliedStateStore;

  beforeEach(async () => {
    root = await createTempDir('applied-state');
    store = new AppliedStateStore(testDirectories(root));
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('keeps its record under the config directory', () => {
    assert.equal(store.statePath, join(root, 'state', 'state.json'));
  });

  it('loads an empty state when no record exists', async () => {
    assert.deepEqual(await store.load(), createEmptyAppliedState());
  });

  it('round-trips a saved state', async () => {
    await store.save(sampleState);
    assert.deepEqual(await store.load(), sampleState);
  });

  it('leaves no temporary files beside the record', async () => {
    await store.save(sampleState);
    assert.deepEqual(await fs.readdir(join(root, 'state')), ['state.json']);
  });

  it('treats a corrupt record as empty', async () => {
    await writeFiles(root, { 'state/state.json': '{"version": "1.0", "managedFiles": [' });
    assert.deepEqual(await store.load(), createEmptyAppliedState());
  });

  it('treats a malformed entry as empty', async () => {
    await writeFiles(root, {
      'state/state.json': JSON.stringify({ ...sampleState, managedFiles: [{ name: 'bashrc' }] })
    });
    assert.deepEqual(await store.load(), createEmptyAppliedState());
  });
});

describe('sanitizeAppliedState', () => {
  it('fills in missing managers and lists', () => {
    const state = sanitizeAppliedState({
      version: '1.0',
      lastUpdated: '2026-03-01T12:00:00.000Z',
      managedPackages: { apt: ['git'] }
    });

    assert.deepEqual(state.managedPackages, { apt: ['git'], flatpak: [], snap: [] });
    assert.deepEqual(state.managedFiles, []);
    assert.deepEqual(state.managedBinaries, []);
  });

  it('drops unknown fields', () => {
    const state = sanitizeAppliedState({
      ...sampleState,
      extra: true,
      managedFiles: [{ name: 'vimrc', destinationPath: '/home/dev/.vimrc', deploymentKind: 'copy', source: 'x' }]
    });

    assert.deepEqual(state.managedFiles, [
      { name: 'vimrc', destinationPath: '/home/dev/.vimrc', deploymentKind: 'copy' }
    ]);
    assert.equal(Object.prototype.hasOwnProperty.call(state, 'extra'), false);
  });

  it('rejects an unknown deployment kind', () => {
    assert.throws(
      () =>
        sanitizeAppliedState({
          ...sampleState,
          managedBinaries: [{ name: 'jq', destinationPath: '/usr/local/bin/jq', deploymentKind: 'hardlink' }]
        }),
      StateLoadError
    );
  });

  it('rejects a record without a version', () => {
    assert.throws(() => sanitizeAppliedState({ lastUpdated: 'now' }), StateLoadError);
  });
});
