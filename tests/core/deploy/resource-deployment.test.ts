import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import type { BinaryEntry, FileEntry } from '../../../src/types/index.js';
import { ConflictResolver } from '../../../src/core/conflict/conflict-resolver.js';
import { LocalResourceDeployer } from '../../../src/core/deploy/resource-deployer.js';
import { BinaryFetcher } from '../../../src/core/deploy/binary-fetcher.js';
import {
  deployBinary,
  deployFile,
  removeResource,
  type DeploymentContext
} from '../../../src/core/deploy/resource-deployment.js';
import { DeploymentError, UserCancellationError } from '../../../src/utils/errors.js';
import { createTempDir, removeTempDir, ScriptedPrompt, writeFiles } from '../../test-helpers.js';

const fixedDate = new Date(2026, 2, 1, 9, 5, 7);

describe('resource deployment', () => {
  let root: string;
  let home: string;
  let fetched: string[];

  const fetchImpl = async (url: string): Promise<Response> => {
    fetched.push(url);
    if (url.endsWith('/missing')) {
      return new Response('not found', { status: 404 });
    }
    return new Response('#!/bin/sh\necho tool\n');
  };

  function createContext(overrides: Partial<DeploymentContext> = {}, prompt?: ScriptedPrompt): DeploymentContext {
    const deployer = new LocalResourceDeployer();
    return {
      deployer,
      resolver: new ConflictResolver({
        deployer,
        ...(prompt && { prompt }),
        now: () => fixedDate,
        diffRenderer: async () => ''
      }),
      fetcher: new BinaryFetcher({ downloadsDir: join(root, 'cache/downloads'), fetchImpl }),
      ...(prompt && { prompt }),
      interactiveRun: false,
      dryRun: false,
      homeDir: home,
      cwd: root,
      ...overrides
    };
  }

  function fileEntry(overrides: Partial<FileEntry> = {}): FileEntry {
    return {
      source: 'bashrc',
      destination: '~/.bashrc',
      sourceDir: join(root, 'repo'),
      copy: false,
      backup: true,
      interactive: false,
      ...overrides
    };
  }

  function binaryEntry(overrides: Partial<BinaryEntry> = {}): BinaryEntry {
    return {
      source: 'https://downloads.example.test/tool',
      destination: '~/bin/tool',
      sourceDir: join(root, 'repo'),
      backup: false,
      interactive: false,
      ...overrides
    };
  }

  beforeEach(async () => {
    root = await createTempDir('deploy');
    home = join(root, 'home');
    fetched = [];
    await writeFiles(root, { 'repo/bashrc': 'export EDITOR=vim\n', 'repo/tool.sh': '#!/bin/sh\necho local\n' });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('deployFile', () => {
    it('links a file into the home directory', async () => {
      const outcome = await deployFile('bashrc', fileEntry(), createContext());

      assert.equal(outcome.status, 'deployed');
      assert.deepEqual(outcome.managed, {
        name: 'bashrc',
        destinationPath: join(home, '.bashrc'),
        deploymentKind: 'link'
      });
      assert.equal(await fs.readlink(join(home, '.bashrc')), join(root, 'repo/bashrc'));
    });

    it('resolves relative destinations against the working directory', async () => {
      const outcome = await deployFile('bashrc', fileEntry({ destination: 'out/bashrc' }), createContext());
      assert.equal(outcome.destination, join(root, 'out/bashrc'));
    });

    it('copies with the declared mode', async () => {
      await deployFile('bashrc', fileEntry({ copy: true, mode: '600' }), createContext());

      const stats = await fs.stat(join(home, '.bashrc'));
      assert.equal(stats.mode & 0o777, 0o600);
      assert.equal(await fs.readFile(join(home, '.bashrc'), 'utf8'), 'export EDITOR=vim\n');
    });

    it('reports an existing link as unchanged and keeps the recorded backup', async () => {
      const context = createContext();
      await deployFile('bashrc', fileEntry(), context);

      const previous = {
        name: 'bashrc',
        destinationPath: join(home, '.bashrc'),
        deploymentKind: 'link' as const,
        backupPath: join(home, '.bashrc.backup.20250101-000000')
      };
      const outcome = await deployFile('bashrc', fileEntry(), context, previous);

      assert.equal(outcome.status, 'unchanged');
      assert.deepEqual(outcome.managed, previous);
    });

    it('backs up a conflicting file and records the backup', async () => {
      await writeFiles(home, { '.bashrc': 'export EDITOR=nano\n' });
      const backupPath = `${join(home, '.bashrc')}.backup.20260301-090507`;

      const outcome = await deployFile('bashrc', fileEntry(), createContext());

      assert.equal(outcome.status, 'deployed');
      assert.equal(outcome.managed?.backupPath, backupPath);
      assert.equal(await fs.readFile(backupPath, 'utf8'), 'export EDITOR=nano\n');
    });

    it('plans without touching the destination in a dry run', async () => {
      await writeFiles(home, { '.bashrc': 'export EDITOR=nano\n' });

      const outcome = await deployFile('bashrc', fileEntry(), createContext({ dryRun: true }));

      assert.equal(outcome.status, 'planned');
      assert.deepEqual(outcome.decision, { type: 'backup', backupPath: `${join(home, '.bashrc')}.backup.20260301-090507` });
      assert.equal(await fs.readFile(join(home, '.bashrc'), 'utf8'), 'export EDITOR=nano\n');
    });

    it('does not prompt in an interactive dry run', async () => {
      await writeFiles(home, { '.bashrc': 'export EDITOR=nano\n' });
      const prompt = new ScriptedPrompt([]);

      const outcome = await deployFile(
        'bashrc',
        fileEntry({ interactive: true }),
        createContext({ dryRun: true, interactiveRun: true }, prompt)
      );

      assert.equal(outcome.status, 'planned');
      assert.deepEqual(prompt.asked, []);
      assert.deepEqual(outcome.decision, { type: 'backup', backupPath: `${join(home, '.bashrc')}.backup.20260301-090507` });
      assert.equal(await fs.readFile(join(home, '.bashrc'), 'utf8'), 'export EDITOR=nano\n');
    });

    it('keeps the previous record when the user skips', async () => {
      await writeFiles(home, { '.bashrc': 'export EDITOR=nano\n' });
      const prompt = new ScriptedPrompt(['skip']);

      const outcome = await deployFile('bashrc', fileEntry({ interactive: true }), createContext({}, prompt));

      assert.equal(outcome.status, 'skipped');
      assert.equal(outcome.managed, undefined);
      assert.equal(await fs.readFile(join(home, '.bashrc'), 'utf8'), 'export EDITOR=nano\n');
    });

    it('prompts for every entry in an interactive run', async () => {
      await writeFiles(home, { '.bashrc': 'export EDITOR=nano\n' });
      const prompt = new ScriptedPrompt(['overwrite']);

      const outcome = await deployFile('bashrc', fileEntry(), createContext({ interactiveRun: true }, prompt));

      assert.equal(outcome.status, 'deployed');
      assert.equal(prompt.asked.length, 1);
      assert.equal(outcome.managed?.backupPath, undefined);
    });

    it('stops the run when the user quits', async () => {
      await writeFiles(home, { '.bashrc': 'export EDITOR=nano\n' });
      const prompt = new ScriptedPrompt(['quit']);

      await assert.rejects(
        deployFile('bashrc', fileEntry({ interactive: true }), createContext({}, prompt)),
        UserCancellationError
      );
    });

    it('sets the declared owner and group on the placed link', async () => {
      const calls: string[][] = [];
      const deployer = new LocalResourceDeployer(async (command, args) => {
        calls.push([command, ...args]);
        return { exitCode: 0, stdout: '', stderr: '' };
      });

      const outcome = await deployFile(
        'bashrc',
        fileEntry({ owner: 'app', group: 'staff' }),
        createContext({ deployer })
      );

      assert.equal(outcome.status, 'deployed');
      assert.deepEqual(calls, [['chown', '-h', 'app:staff', join(home, '.bashrc')]]);
    });

    it('leaves ownership alone when none is declared', async () => {
      const calls: string[][] = [];
      const deployer = new LocalResourceDeployer(async (command, args) => {
        calls.push([command, ...args]);
        return { exitCode: 0, stdout: '', stderr: '' };
      });

      await deployFile('bashrc', fileEntry({ copy: true }), createContext({ deployer }));

      assert.deepEqual(calls, []);
    });

    it('fails the deployment when ownership cannot be set', async () => {
      const deployer = new LocalResourceDeployer(async () => ({ exitCode: 1, stdout: '', stderr: "chown: invalid user: 'app'\n" }));

      await assert.rejects(
        deployFile('bashrc', fileEntry({ owner: 'app' }), createContext({ deployer })),
        (error: unknown) => {
          assert.ok(error instanceof DeploymentError);
          assert.match(error.message, /chown app .* failed: chown: invalid user: 'app'/);
          return true;
        }
      );
    });

    it('wraps placement failures in a DeploymentError', async () => {
      await assert.rejects(
        deployFile('bashrc', fileEntry({ source: 'missing', copy: true }), createContext()),
        DeploymentError
      );
    });
  });

  describe('deployBinary', () => {
    it('downloads a remote binary and installs it executable', async () => {
      const outcome = await deployBinary('tool', binaryEntry(), createContext());
      const destination = join(home, 'bin/tool');

      assert.equal(outcome.status, 'deployed');
      assert.deepEqual(outcome.managed, {
        name: 'tool',
        destinationPath: destination,
        deploymentKind: 'copy',
        source: 'https://downloads.example.test/tool'
      });
      assert.equal(await fs.readFile(destination, 'utf8'), '#!/bin/sh\necho tool\n');
      assert.equal((await fs.stat(destination)).mode & 0o777, 0o755);
      assert.deepEqual(await fs.readdir(join(root, 'cache/downloads')), []);
    });

    it('copies a local binary with its declared mode', async () => {
      const outcome = await deployBinary('tool', binaryEntry({ source: 'tool.sh', mode: '700' }), createContext());

      assert.equal(outcome.managed?.source, 'tool.sh');
      assert.equal((await fs.stat(join(home, 'bin/tool'))).mode & 0o777, 0o700);
      assert.deepEqual(fetched, []);
    });

    it('sets the declared group on a copied binary', async () => {
      const calls: string[][] = [];
      const deployer = new LocalResourceDeployer(async (command, args) => {
        calls.push([command, ...args]);
        return { exitCode: 0, stdout: '', stderr: '' };
      });

      await deployBinary('tool', binaryEntry({ source: 'tool.sh', group: 'staff' }), createContext({ deployer }));

      assert.deepEqual(calls, [['chown', ':staff', join(home, 'bin/tool')]]);
    });

    it('does not download anything in a dry run', async () => {
      const outcome = await deployBinary('tool', binaryEntry(), createContext({ dryRun: true }));

      assert.equal(outcome.status, 'planned');
      assert.deepEqual(fetched, []);
      await assert.rejects(fs.access(join(home, 'bin/tool')));
    });

    it('fails on an HTTP error', async () => {
      await assert.rejects(
        deployBinary('tool', binaryEntry({ source: 'https://downloads.example.test/missing' }), createContext()),
        DeploymentError
      );
    });
  });

  describe('removeResource', () => {
    it('removes a managed link', async () => {
      const context = createContext();
      const { managed } = await deployFile('bashrc', fileEntry(), context);
      assert.ok(managed);

      const outcome = await removeResource(managed, 'file', context);

      assert.deepEqual(outcome, {
        name: 'bashrc',
        destination: join(home, '.bashrc'),
        restoredBackup: false,
        status: 'removed'
      });
      await assert.rejects(fs.lstat(join(home, '.bashrc')));
    });

    it('restores the backup when the user agrees', async () => {
      await writeFiles(home, { '.bashrc': 'export EDITOR=nano\n' });
      const prompt = new ScriptedPrompt([], true);
      const context = createContext({}, prompt);
      const { managed } = await deployFile('bashrc', fileEntry(), context);
      assert.ok(managed);

      const outcome = await removeResource(managed, 'file', context);

      assert.equal(outcome.restoredBackup, true);
      assert.equal(prompt.restores.length, 1);
      assert.equal(await fs.readFile(join(home, '.bashrc'), 'utf8'), 'export EDITOR=nano\n');
    });

    it('reports a destination that is already gone', async () => {
      const outcome = await removeResource(
        { name: 'vimrc', destinationPath: join(home, '.vimrc'), deploymentKind: 'link' },
        'file',
        createContext()
      );
      assert.equal(outcome.status, 'absent');
    });

    it('refuses to remove a copy that may have been edited', async () => {
      const context = createContext({ safety: { now: () => Date.now() + 60 * 60 * 1000 } });
      const { managed } = await deployFile('bashrc', fileEntry({ copy: true }), context);
      assert.ok(managed);

      const outcome = await removeResource(managed, 'file', context);

      assert.equal(outcome.status, 'refused');
      assert.match(outcome.reason ?? '', /may have been modified/);
      assert.equal(await fs.readFile(join(home, '.bashrc'), 'utf8'), 'export EDITOR=vim\n');
    });

    it('leaves the destination in place in a dry run', async () => {
      const { managed } = await deployFile('bashrc', fileEntry(), createContext());
      assert.ok(managed);

      const outcome = await removeResource(managed, 'file', createContext({ dryRun: true }));

      assert.equal(outcome.status, 'planned');
      assert.equal(await fs.readlink(join(home, '.bashrc')), join(root, 'repo/bashrc'));
    });
  });
});
