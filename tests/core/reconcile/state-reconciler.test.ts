import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { AppliedState, FileEntry, LogicalConfig } from '../../../src/types/index.js';
import { diff, diffPackages } from '../../../src/core/reconcile/state-reconciler.js';
import { createEmptyAppliedState } from '../../../src/core/state/applied-state-store.js';

function fileEntry(source: string, destination: string): FileEntry {
  return { source, destination, sourceDir: '/repo', copy: false, backup: true, interactive: false };
}

function emptyConfig(): LogicalConfig {
  return {
    version: '1.0',
    packageDefaults: {},
    packages: { apt: [], flatpak: [], snap: [] },
    files: {},
    binaries: {},
    dconf: { settings: {} }
  };
}

describe('diffPackages', () => {
  it('splits names into install, remove and unchanged', () => {
    assert.deepEqual(diffPackages(['git', 'htop', 'curl'], ['htop', 'vim']), {
      toInstall: ['git', 'curl'],
      toRemove: ['vim'],
      unchanged: ['htop']
    });
  });

  it('collapses duplicates and keeps first-seen order', () => {
    assert.deepEqual(diffPackages(['b', 'a', 'b'], ['c', 'c']), {
      toInstall: ['b', 'a'],
      toRemove: ['c'],
      unchanged: []
    });
  });
});

describe('diff', () => {
  it('plans every desired resource and removes only undeclared ones', () => {
    const desired = emptyConfig();
    desired.packages.apt = [{ name: 'git', flags: [] }];
    desired.packages.snap = [{ name: 'code', flags: ['--classic'] }];
    desired.files = { bashrc: fileEntry('bashrc', '~/.bashrc') };

    const applied: AppliedState = {
      ...createEmptyAppliedState(),
      managedPackages: { apt: ['git', 'htop'], flatpak: ['org.gimp.GIMP'], snap: [] },
      managedFiles: [
        { name: 'bashrc', destinationPath: '/home/dev/.bashrc', deploymentKind: 'link' },
        { name: 'vimrc', destinationPath: '/home/dev/.vimrc', deploymentKind: 'link' }
      ],
      managedBinaries: [{ name: 'jq', destinationPath: '/home/dev/bin/jq', deploymentKind: 'copy' }]
    };

    const plan = diff(desired, applied);

    assert.deepEqual(plan.packages.apt, { toInstall: [], toRemove: ['htop'], unchanged: ['git'] });
    assert.deepEqual(plan.packages.flatpak, { toInstall: [], toRemove: ['org.gimp.GIMP'], unchanged: [] });
    assert.deepEqual(plan.packages.snap, { toInstall: ['code'], toRemove: [], unchanged: [] });
    assert.deepEqual(
      plan.files.toDeploy.map(({ name }) => name),
      ['bashrc']
    );
    assert.deepEqual(
      plan.files.toRemove.map(({ name }) => name),
      ['vimrc']
    );
    assert.deepEqual(plan.binaries.toDeploy, []);
    assert.deepEqual(
      plan.binaries.toRemove.map(({ name }) => name),
      ['jq']
    );
  });

  it('does not treat inherited object keys as declared entries', () => {
    const applied: AppliedState = {
      ...createEmptyAppliedState(),
      managedFiles: [{ name: 'toString', destinationPath: '/home/dev/.tostring', deploymentKind: 'copy' }]
    };

    const plan = diff(emptyConfig(), applied);

    assert.deepEqual(
      plan.files.toRemove.map(({ name }) => name),
      ['toString']
    );
  });

  it('plans nothing when desired and applied are both empty', () => {
    const plan = diff(emptyConfig(), createEmptyAppliedState());
    assert.deepEqual(plan.packages.apt, { toInstall: [], toRemove: [], unchanged: [] });
    assert.deepEqual(plan.files, { toDeploy: [], toRemove: [] });
    assert.deepEqual(plan.binaries, { toDeploy: [], toRemove: [] });
  });
});
