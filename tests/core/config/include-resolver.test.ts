import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { IncludeResolver, findDocumentFile, matchGlob } from '../../../src/core/config/include-resolver.js';
import { IncludeError } from '../../../src/utils/errors.js';
import { createTempDir, fixedFacts, removeTempDir, writeFiles } from '../../test-helpers.js';

let root: string;

async function setup(): Promise<void> {
  root = await createTempDir('include-resolver');
}

async function cleanup(): Promise<void> {
  await removeTempDir(root);
}

function resolver(): IncludeResolver {
  return new IncludeResolver({ facts: fixedFacts(), homeDir: join(root, 'home') });
}

describe('IncludeResolver', () => {
  beforeEach(setup);
  afterEach(cleanup);

  it('returns the root alone when it has no includes', async () => {
    await writeFiles(root, { 'root.yaml': 'packages:\n  apt: [git]\n' });

    const result = await resolver().resolve(join(root, 'root.yaml'));

    assert.deepEqual(result.paths, [join(root, 'root.yaml')]);
    assert.equal(result.documents.length, 1);
    assert.ok(result.visited.has(join(root, 'root.yaml')));
  });

  it('orders documents depth-first, pre-order', async () => {
    await writeFiles(root, {
      'root.yaml': 'includes:\n  - a.yaml\n  - b.yaml\n',
      'a.yaml': 'includes:\n  - c.yaml\n',
      'b.yaml': '',
      'c.yaml': ''
    });

    const result = await resolver().resolve(join(root, 'root.yaml'));

    assert.deepEqual(result.paths, [
      join(root, 'root.yaml'),
      join(root, 'a.yaml'),
      join(root, 'c.yaml'),
      join(root, 'b.yaml')
    ]);
  });

  it('includes a diamond-shared document exactly once', async () => {
    await writeFiles(root, {
      'root.yaml': 'includes:\n  - a.yaml\n  - b.yaml\n',
      'a.yaml': 'includes:\n  - d.yaml\n',
      'b.yaml': 'includes:\n  - d.yaml\n',
      'd.yaml': 'packages:\n  apt: [curl]\n'
    });

    const result = await resolver().resolve(join(root, 'root.yaml'));

    assert.deepEqual(result.paths, [
      join(root, 'root.yaml'),
      join(root, 'a.yaml'),
      join(root, 'd.yaml'),
      join(root, 'b.yaml')
    ]);
  });

  it('terminates on a self-include', async () => {
    await writeFiles(root, { 'root.yaml': 'includes:\n  - root.yaml\n' });

    const result = await resolver().resolve(join(root, 'root.yaml'));

    assert.deepEqual(result.paths, [join(root, 'root.yaml')]);
  });

  it('terminates on a cycle between two documents', async () => {
    await writeFiles(root, {
      'root.yaml': 'includes:\n  - a.yaml\n',
      'a.yaml': 'includes:\n  - b.yaml\n',
      'b.yaml': 'includes:\n  - a.yaml\n  - root.yaml\n'
    });

    const result = await resolver().resolve(join(root, 'root.yaml'));

    assert.deepEqual(result.paths, [join(root, 'root.yaml'), join(root, 'a.yaml'), join(root, 'b.yaml')]);
  });

  it('resolves the same tree identically twice', async () => {
    await writeFiles(root, {
      'root.yaml': 'includes:\n  - a.yaml\n  - "parts/*.yaml"\n',
      'a.yaml': '',
      'parts/x.yaml': '',
      'parts/y.yaml': ''
    });

    const first = await resolver().resolve(join(root, 'root.yaml'));
    const second = await resolver().resolve(join(root, 'root.yaml'));

    assert.deepEqual(second.paths, first.paths);
  });

  it('maps a directory include to its default.yaml and an extensionless one to .yaml', async () => {
    await writeFiles(root, {
      'root.yaml': 'includes:\n  - desktop\n  - shell\n',
      'desktop/default.yaml': '',
      'shell.yaml': ''
    });

    const result = await resolver().resolve(join(root, 'root.yaml'));

    assert.deepEqual(result.paths, [
      join(root, 'root.yaml'),
      join(root, 'desktop', 'default.yaml'),
      join(root, 'shell.yaml')
    ]);
  });

  it('resolves relative includes against the including document', async () => {
    await writeFiles(root, {
      'root.yaml': 'includes:\n  - nested/a.yaml\n',
      'nested/a.yaml': 'includes:\n  - b.yaml\n',
      'nested/b.yaml': ''
    });

    const result = await resolver().resolve(join(root, 'root.yaml'));

    assert.deepEqual(result.paths, [
      join(root, 'root.yaml'),
      join(root, 'nested', 'a.yaml'),
      join(root, 'nested', 'b.yaml')
    ]);
  });

  it('expands ~ in include paths', async () => {
    await writeFiles(root, {
      'root.yaml': 'includes:\n  - ~/personal.yaml\n',
      'home/personal.yaml': ''
    });

    const result = await resolver().resolve(join(root, 'root.yaml'));

    assert.deepEqual(result.paths, [join(root, 'root.yaml'), join(root, 'home', 'personal.yaml')]);
  });

  it('fails with NotFound for a missing required include', async () => {
    await writeFiles(root, { 'root.yaml': 'includes:\n  - missing.yaml\n' });

    await assert.rejects(resolver().resolve(join(root, 'root.yaml')), (error: unknown) => {
      assert.ok(error instanceof IncludeError);
      assert.equal(error.kind, 'NotFound');
      assert.equal(
        error.message,
        `Include error (NotFound): ${join(root, 'root.yaml')}: include 'missing.yaml' not found ` +
          `(looked at ${join(root, 'missing.yaml')})`
      );
      return true;
    });
  });

  it('skips a missing optional include', async () => {
    await writeFiles(root, { 'root.yaml': 'includes:\n  - path: missing.yaml\n    optional: true\n' });

    const result = await resolver().resolve(join(root, 'root.yaml'));

    assert.deepEqual(result.paths, [join(root, 'root.yaml')]);
  });

  it('skips an include whose conditions do not hold, even when the target is missing', async () => {
    await writeFiles(root, {
      'root.yaml':
        'includes:\n' +
        '  - path: darwin.yaml\n' +
        '    conditions:\n' +
        '      - type: os\n' +
        '        value: darwin\n' +
        '  - path: linux.yaml\n' +
        '    conditions:\n' +
        '      - type: os\n' +
        '        value: linux\n',
      'linux.yaml': ''
    });

    const result = await resolver().resolve(join(root, 'root.yaml'));

    assert.deepEqual(result.paths, [join(root, 'root.yaml'), join(root, 'linux.yaml')]);
  });

  it('expands globs in sorted order, using default.yaml for matched directories', async () => {
    await writeFiles(root, {
      'root.yaml': 'includes:\n  - glob: "hosts/*"\n',
      'hosts/zeta.yaml': '',
      'hosts/alpha.yaml': '',
      'hosts/laptop/default.yaml': '',
      'hosts/empty/other.yaml': '',
      'hosts/notes.txt': 'not configuration'
    });

    const result = await resolver().resolve(join(root, 'root.yaml'));

    assert.deepEqual(result.paths, [
      join(root, 'root.yaml'),
      join(root, 'hosts', 'alpha.yaml'),
      join(root, 'hosts', 'laptop', 'default.yaml'),
      join(root, 'hosts', 'zeta.yaml')
    ]);
  });

  it('fails with UnresolvedGlob when a required glob matches nothing', async () => {
    await writeFiles(root, { 'root.yaml': 'includes:\n  - "hosts/*.yaml"\n' });

    await assert.rejects(resolver().resolve(join(root, 'root.yaml')), (error: unknown) => {
      assert.ok(error instanceof IncludeError);
      assert.equal(error.kind, 'UnresolvedGlob');
      assert.equal(
        error.message,
        `Include error (UnresolvedGlob): ${join(root, 'root.yaml')}: no configuration files match 'hosts/*.yaml'`
      );
      return true;
    });
  });

  it('accepts an optional glob that matches nothing', async () => {
    await writeFiles(root, { 'root.yaml': 'includes:\n  - glob: "hosts/*.yaml"\n    optional: true\n' });

    const result = await resolver().resolve(join(root, 'root.yaml'));

    assert.deepEqual(result.paths, [join(root, 'root.yaml')]);
  });
});

describe('findDocumentFile', () => {
  beforeEach(setup);
  afterEach(cleanup);

  it('returns null for a directory without default.yaml', async () => {
    await writeFiles(root, { 'dir/other.yaml': '' });
    assert.equal(await findDocumentFile(join(root, 'dir')), null);
  });

  it('does not append .yaml to a path that already has a YAML extension', async () => {
    await writeFiles(root, { 'base.yml.yaml': '' });
    assert.equal(await findDocumentFile(join(root, 'base.yml')), null);
  });
});

describe('matchGlob', () => {
  beforeEach(setup);
  afterEach(cleanup);

  it('returns nothing when the glob base does not exist', async () => {
    assert.deepEqual(await matchGlob(join(root, 'absent', '*.yaml')), []);
  });

  it('matches recursively with **', async () => {
    await writeFiles(root, { 'a/b/c.yaml': '', 'a/d.yaml': '' });
    assert.deepEqual(await matchGlob(join(root, 'a', '**', '*.yaml')), [
      join(root, 'a', 'b', 'c.yaml'),
      join(root, 'a', 'd.yaml')
    ]);
  });

  it('matches a single level with *', async () => {
    await writeFiles(root, { 'hosts/laptop.yaml': '', 'hosts/sub/x.yaml': '', 'hosts/sub/deeper/y.yaml': '' });
    assert.deepEqual(await matchGlob(join(root, 'hosts', '*.yaml')), [join(root, 'hosts', 'laptop.yaml')]);
    assert.deepEqual(await matchGlob(join(root, 'hosts', '*', '*.yaml')), [join(root, 'hosts', 'sub', 'x.yaml')]);
  });

  it('treats an unreadable directory as matching nothing', async () => {
    await writeFiles(root, { 'a/d.yaml': '', 'a/locked/e.yaml': '' });
    const locked = join(root, 'a', 'locked');
    await fs.chmod(locked, 0o000);
    try {
      const matches = await matchGlob(join(root, 'a', '**', '*.yaml'));
      assert.ok(matches.includes(join(root, 'a', 'd.yaml')));
    } finally {
      await fs.chmod(locked, 0o755);
    }
  });
});
