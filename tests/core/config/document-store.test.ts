import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { FileDocumentStore, parseDocument } from '../../../src/core/config/document-store.js';
import { ConfigError, IncludeError } from '../../../src/utils/errors.js';
import { createTempDir, removeTempDir, writeFiles } from '../../test-helpers.js';

describe('parseDocument', () => {
  it('parses a mapping and its includes', () => {
    const document = parseDocument('/cfg/root.yaml', 'includes:\n  - base\n  - path: extras/\n    optional: true\nversion: "2.0"\n');

    assert.equal(document.path, '/cfg/root.yaml');
    assert.equal(document.dir, '/cfg');
    assert.equal(document.data.version, '2.0');
    assert.deepEqual(document.includes, [
      { kind: 'path', path: 'base', optional: false, conditions: [] },
      { kind: 'path', path: 'extras/', optional: true, conditions: [] }
    ]);
  });

  it('treats an empty file as an empty document', () => {
    const document = parseDocument('/cfg/empty.yaml', '');
    assert.deepEqual(document.data, {});
    assert.deepEqual(document.includes, []);
  });

  it('rejects a top level that is not a mapping', () => {
    assert.throws(() => parseDocument('/cfg/list.yaml', '- a\n- b\n'), {
      name: 'ConfigError',
      message: '/cfg/list.yaml: top level must be a mapping'
    });
  });

  it('reports YAML syntax errors as ConfigError', () => {
    assert.throws(() => parseDocument('/cfg/bad.yaml', 'files: [unclosed\n'), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.ok(error.message.startsWith('Failed to parse /cfg/bad.yaml: '));
      return true;
    });
  });

  it('turns a string include with glob characters into a glob directive', () => {
    const document = parseDocument('/cfg/root.yaml', 'includes:\n  - "hosts/*.yaml"\n');
    assert.deepEqual(document.includes, [{ kind: 'glob', pattern: 'hosts/*.yaml', optional: false, conditions: [] }]);
  });

  it('rejects an include entry declaring both path and glob', () => {
    assert.throws(
      () => parseDocument('/cfg/root.yaml', 'includes:\n  - path: a\n    glob: "b/*"\n'),
      (error: unknown) => {
        assert.ok(error instanceof IncludeError);
        assert.equal(error.kind, 'InvalidDirective');
        assert.equal(
          error.message,
          "Include error (InvalidDirective): /cfg/root.yaml: include #1 must declare exactly one of 'path' or 'glob'"
        );
        return true;
      }
    );
  });

  it('rejects an unknown condition type', () => {
    assert.throws(
      () => parseDocument('/cfg/root.yaml', 'includes:\n  - path: a\n    conditions:\n      - type: weekday\n        value: monday\n'),
      { name: 'IncludeError' }
    );
  });

  it('defaults the condition operator to equals', () => {
    const document = parseDocument(
      '/cfg/root.yaml',
      'includes:\n  - path: gnome\n    conditions:\n      - type: env\n        value: XDG_CURRENT_DESKTOP=GNOME\n'
    );
    assert.deepEqual(document.includes[0].conditions, [
      { type: 'env', operator: 'equals', value: 'XDG_CURRENT_DESKTOP=GNOME' }
    ]);
  });
});

describe('FileDocumentStore', () => {
  let root: string;

  before(async () => {
    root = await createTempDir('document-store');
    await writeFiles(root, { 'root.yaml': 'packages:\n  apt: [git]\n' });
  });

  after(async () => {
    await removeTempDir(root);
  });

  it('loads a document with its raw text', async () => {
    const document = await new FileDocumentStore().load(join(root, 'root.yaml'));
    assert.equal(document.path, join(root, 'root.yaml'));
    assert.equal(document.raw, 'packages:\n  apt: [git]\n');
    assert.deepEqual(document.data, { packages: { apt: ['git'] } });
  });

  it('raises NotFound for a missing file', async () => {
    const missing = join(root, 'missing.yaml');
    await assert.rejects(new FileDocumentStore().load(missing), (error: unknown) => {
      assert.ok(error instanceof IncludeError);
      assert.equal(error.kind, 'NotFound');
      assert.equal(error.message, `Include error (NotFound): configuration file not found: ${missing}`);
      return true;
    });
  });
});
