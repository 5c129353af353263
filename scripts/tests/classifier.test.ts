import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'node:path';
import test from 'node:test';

import { classifyDirectory, selectMode } from '../lib/merge/classifier.js';
import { ConfigurationError } from '../lib/merge/errors.js';
import { withTempRoot, writeFixtureFile } from './test_fs.js';

test('classifyDirectory needs at least one XML file below the directory', async () => {
  await withTempRoot('langdata-classify-', async (root) => {
    assert.equal(await classifyDirectory(path.join(root, 'Missing')), 'absent');

    await fs.ensureDir(path.join(root, 'Empty'));
    assert.equal(await classifyDirectory(path.join(root, 'Empty')), 'absent');

    await writeFixtureFile(root, 'Notes/readme.txt', 'not a resource');
    assert.equal(await classifyDirectory(path.join(root, 'Notes')), 'absent');

    await writeFixtureFile(root, 'Lang/DefInjected/ThingDef/Weapons.xml', '<LanguageData/>');
    assert.equal(await classifyDirectory(path.join(root, 'Lang')), 'present');

    assert.equal(await classifyDirectory(path.join(root, 'Notes/readme.txt')), 'absent');
  });
});

test('selectMode fails without a source tree', () => {
  assert.throws(
    () => selectMode({ source: 'absent', target: 'present', policy: 'merge', sourcePath: 'Languages/English' }),
    {
      name: 'ConfigurationError',
      message: 'Languages/English: source tree has no XML files'
    }
  );
});

test('selectMode starts fresh when the target is absent, whatever the policy', () => {
  for (const policy of ['new', 'merge', 'incremental', 'rebuild'] as const) {
    assert.equal(selectMode({ source: 'present', target: 'absent', policy }), 'new');
  }
});

test('selectMode refuses to overwrite an existing target with policy new', () => {
  assert.throws(
    () => selectMode({ source: 'present', target: 'present', policy: 'new' }),
    ConfigurationError
  );
});

test('selectMode applies the policy when both trees exist', () => {
  assert.equal(selectMode({ source: 'present', target: 'present', policy: 'merge' }), 'merge');
  assert.equal(
    selectMode({ source: 'present', target: 'present', policy: 'incremental' }),
    'incremental'
  );
  assert.equal(selectMode({ source: 'present', target: 'present', policy: 'rebuild' }), 'rebuild');
});
