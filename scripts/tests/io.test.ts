import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'node:path';
import test from 'node:test';

import { getRunOptions, listXmlFiles, toPosixRelative, writeTextFile } from '../lib/io.js';
import { readFixtureFile, withTempRoot, writeFixtureFile } from './test_fs.js';

test('getRunOptions separates bare flags from option pairs', () => {
  assert.deepEqual(getRunOptions(['--check', '--target', 'Languages/Test', '--yes']), {
    check: true,
    yes: true,
    rest: ['--target', 'Languages/Test']
  });
  assert.deepEqual(getRunOptions([]), { check: false, yes: false, rest: [] });
});

test('toPosixRelative uses forward slashes', () => {
  assert.equal(
    toPosixRelative(path.join('/work', 'Languages', 'Test', 'Keyed', 'Misc.xml'), '/work'),
    'Languages/Test/Keyed/Misc.xml'
  );
});

test('writeTextFile writes only when the content changes', async () => {
  await withTempRoot('langdata-io-', async (root) => {
    const filePath = path.join(root, 'nested/out.txt');

    assert.deepEqual(await writeTextFile(filePath, 'hello', { check: true }), {
      changed: true,
      wrote: false
    });
    assert.equal(await fs.pathExists(filePath), false);

    assert.deepEqual(await writeTextFile(filePath, 'hello', { check: false }), {
      changed: true,
      wrote: true
    });
    assert.equal(await readFixtureFile(root, 'nested/out.txt'), 'hello\n');

    assert.deepEqual(await writeTextFile(filePath, 'hello\n', { check: false }), {
      changed: false,
      wrote: false
    });
    assert.deepEqual(await fs.readdir(path.join(root, 'nested')), ['out.txt']);
  });
});

test('listXmlFiles lists XML files below a directory in path order', async () => {
  await withTempRoot('langdata-io-', async (root) => {
    await writeFixtureFile(root, 'tree/b/z.xml', '<LanguageData/>');
    await writeFixtureFile(root, 'tree/a.xml', '<LanguageData/>');
    await writeFixtureFile(root, 'tree/b/a.xml', '<LanguageData/>');
    await writeFixtureFile(root, 'tree/b/notes.txt', 'ignored');

    assert.deepEqual(await listXmlFiles(path.join(root, 'tree')), ['a.xml', 'b/a.xml', 'b/z.xml']);
    assert.deepEqual(await listXmlFiles(path.join(root, 'missing')), []);
  });
});
