import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'node:path';
import test from 'node:test';

import { parseResourceXml } from '../lib/merge/resource_parser.js';
import {
  applyEntriesToResource,
  groupByFile,
  renderResourceFile,
  replaceEntryTexts,
  writeResourceFiles
} from '../lib/merge/serializer.js';
import type { MergedEntry } from '../lib/merge/types.js';
import { lines, readFixtureFile, withTempRoot, writeFixtureFile } from './test_fs.js';

const DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';
const NYMPH_HISTORY =
  "previous translation: '健谈的仙女'; previous source: 'Chatty Nymph' -> new source: 'Talkative Nymph'; updated 2026-01-02";

const RACES_XML = lines(
  DECLARATION,
  '<LanguageData>',
  '  <!-- EN: Chatty Nymph -->',
  '  <Nymph.label>健谈的仙女</Nymph.label>',
  '  <!-- EN: A forest spirit. -->',
  '  <Nymph.description>森林之灵。</Nymph.description>',
  '</LanguageData>'
);

const NYMPH_UPDATED: MergedEntry = {
  key: 'Nymph.label',
  translatedText: '健谈的仙女',
  tag: 'ThingDef.label',
  originFile: 'ThingDef/Races.xml',
  sourceSnapshot: 'Talkative Nymph',
  historyNote: NYMPH_HISTORY,
  action: 'updated'
};

/** Joins lines with CRLF, as files saved on Windows are. */
function crlf(...parts: string[]): string {
  return `${parts.join('\r\n')}\r\n`;
}

function addedEntry(key: string, text: string, originFile: string, historyNote?: string): MergedEntry {
  const entry: MergedEntry = {
    key,
    translatedText: text,
    tag: key,
    originFile,
    sourceSnapshot: text,
    action: 'added'
  };
  if (historyNote !== undefined) {
    entry.historyNote = historyNote;
  }
  return entry;
}

test('an updated entry gets a new history and snapshot pair and keeps its text', () => {
  const output = applyEntriesToResource(RACES_XML, 'DefInjected/ThingDef/Races.xml', [NYMPH_UPDATED]);

  assert.equal(
    output,
    lines(
      DECLARATION,
      '<LanguageData>',
      `  <!-- HISTORY: ${NYMPH_HISTORY} -->`,
      '  <!-- EN: Talkative Nymph -->',
      '  <Nymph.label>健谈的仙女</Nymph.label>',
      '  <!-- EN: A forest spirit. -->',
      '  <Nymph.description>森林之灵。</Nymph.description>',
      '</LanguageData>'
    )
  );
});

test('an earlier history note is replaced, not stacked', () => {
  const raw = lines(
    DECLARATION,
    '<LanguageData>',
    "  <!-- HISTORY: added 'Chatty Nymph' on 2025-12-01 -->",
    '  <!-- EN: Chatty Nymph -->',
    '  <Nymph.label>健谈的仙女</Nymph.label>',
    '</LanguageData>'
  );

  const output = applyEntriesToResource(raw, 'DefInjected/ThingDef/Races.xml', [NYMPH_UPDATED]);

  assert.equal(
    output,
    lines(
      DECLARATION,
      '<LanguageData>',
      `  <!-- HISTORY: ${NYMPH_HISTORY} -->`,
      '  <!-- EN: Talkative Nymph -->',
      '  <Nymph.label>健谈的仙女</Nymph.label>',
      '</LanguageData>'
    )
  );
});

test('added entries are appended in key order with the file indentation', () => {
  const raw = lines(
    DECLARATION,
    '<LanguageData>',
    '    <!-- EN: Old -->',
    '    <a.title>旧</a.title>',
    '</LanguageData>'
  );

  const output = applyEntriesToResource(raw, 'Keyed/Misc.xml', [
    addedEntry('c.title', 'Third', 'Misc.xml', "added 'Third' on 2026-01-02"),
    addedEntry('b.title', 'New Item', 'Misc.xml', "added 'New Item' on 2026-01-02")
  ]);

  assert.equal(
    output,
    lines(
      DECLARATION,
      '<LanguageData>',
      '    <!-- EN: Old -->',
      '    <a.title>旧</a.title>',
      "    <!-- HISTORY: added 'New Item' on 2026-01-02 -->",
      '    <!-- EN: New Item -->',
      '    <b.title>New Item</b.title>',
      "    <!-- HISTORY: added 'Third' on 2026-01-02 -->",
      '    <!-- EN: Third -->',
      '    <c.title>Third</c.title>',
      '</LanguageData>'
    )
  );
});

test('unchanged entries leave the file byte-identical', () => {
  const unchanged: MergedEntry = { ...NYMPH_UPDATED, sourceSnapshot: 'Chatty Nymph', action: 'unchanged' };
  assert.equal(applyEntriesToResource(RACES_XML, 'DefInjected/ThingDef/Races.xml', [unchanged]), RACES_XML);
});

test('renderResourceFile writes a new file sorted by key', () => {
  const output = renderResourceFile([
    addedEntry('Axe.label', 'Axe', 'ThingDef/Weapons.xml'),
    addedEntry('Axe.description', 'Sharp.', 'ThingDef/Weapons.xml')
  ]);

  assert.equal(
    output,
    lines(
      DECLARATION,
      '<LanguageData>',
      '  <!-- EN: Sharp. -->',
      '  <Axe.description>Sharp.</Axe.description>',
      '  <!-- EN: Axe -->',
      '  <Axe.label>Axe</Axe.label>',
      '</LanguageData>'
    )
  );
});

test('text and snapshots with markup characters read back unchanged', () => {
  const output = renderResourceFile([addedEntry('a.title', 'Salt & Pepper -- mild', 'Misc.xml')]);

  assert.equal(
    output,
    lines(
      DECLARATION,
      '<LanguageData>',
      '  <!-- EN: Salt & Pepper -&#45; mild -->',
      '  <a.title>Salt &amp; Pepper -- mild</a.title>',
      '</LanguageData>'
    )
  );

  const parsed = parseResourceXml(output, 'Keyed/Misc.xml');
  assert.equal(parsed.entries[0].value, 'Salt & Pepper -- mild');
  assert.equal(parsed.entries[0].sourceSnapshot, 'Salt & Pepper -- mild');
});

test('groupByFile groups entries by file in path order', () => {
  const groups = groupByFile([
    addedEntry('b', 'B', 'Second.xml'),
    addedEntry('a', 'A', 'First.xml'),
    addedEntry('c', 'C', 'Second.xml')
  ]);

  assert.deepEqual([...groups.keys()], ['First.xml', 'Second.xml']);
  assert.deepEqual(
    groups.get('Second.xml')?.map((entry) => entry.key),
    ['b', 'c']
  );
});

test('writeResourceFiles writes changed files only and reports broken ones', async () => {
  await withTempRoot('langdata-serialize-', async (root) => {
    const weapons = lines(DECLARATION, '<LanguageData>', '  <!-- EN: Axe -->', '  <Axe.label>斧头</Axe.label>', '</LanguageData>');
    await writeFixtureFile(root, 'DefInjected/ThingDef/Races.xml', RACES_XML);
    await writeFixtureFile(root, 'DefInjected/ThingDef/Weapons.xml', weapons);
    await writeFixtureFile(root, 'DefInjected/ThingDef/Broken.xml', '<Defs/>');

    const outcome = await writeResourceFiles(
      path.join(root, 'DefInjected'),
      groupByFile([
        NYMPH_UPDATED,
        { ...addedEntry('Axe.label', 'Axe', 'ThingDef/Weapons.xml'), sourceSnapshot: 'Axe', action: 'unchanged' },
        addedEntry('Club.label', 'Club', 'ThingDef/Broken.xml'),
        addedEntry('Spear.label', 'Spear', 'ThingDef/ThingDef.xml')
      ]),
      { check: false }
    );

    assert.deepEqual(outcome.files, ['ThingDef/Races.xml', 'ThingDef/ThingDef.xml']);
    assert.deepEqual(outcome.failures, [
      { path: 'DefInjected/ThingDef/Broken.xml', reason: 'root element must be <LanguageData>' }
    ]);

    assert.equal(await readFixtureFile(root, 'DefInjected/ThingDef/Weapons.xml'), weapons);
    assert.equal(await readFixtureFile(root, 'DefInjected/ThingDef/Broken.xml'), '<Defs/>\n');
    assert.equal(
      await readFixtureFile(root, 'DefInjected/ThingDef/ThingDef.xml'),
      lines(
        DECLARATION,
        '<LanguageData>',
        '  <!-- EN: Spear -->',
        '  <Spear.label>Spear</Spear.label>',
        '</LanguageData>'
      )
    );
    assert.match(
      await readFixtureFile(root, 'DefInjected/ThingDef/Races.xml'),
      /<!-- EN: Talkative Nymph -->/
    );

    const leftovers = (await fs.readdir(path.join(root, 'DefInjected/ThingDef'))).filter((name) =>
      name.endsWith('.tmp')
    );
    assert.deepEqual(leftovers, []);
  });
});

test('writeResourceFiles in check mode reports changes without writing', async () => {
  await withTempRoot('langdata-serialize-', async (root) => {
    await writeFixtureFile(root, 'DefInjected/ThingDef/Races.xml', RACES_XML);

    const outcome = await writeResourceFiles(
      path.join(root, 'DefInjected'),
      groupByFile([NYMPH_UPDATED, addedEntry('Spear.label', 'Spear', 'ThingDef/ThingDef.xml')]),
      { check: true }
    );

    assert.deepEqual(outcome.files, ['ThingDef/Races.xml', 'ThingDef/ThingDef.xml']);
    assert.equal(await readFixtureFile(root, 'DefInjected/ThingDef/Races.xml'), RACES_XML);
    assert.equal(await fs.pathExists(path.join(root, 'DefInjected/ThingDef/ThingDef.xml')), false);
  });
});

test('updating one key keeps the BOM, CRLF endings and untouched neighbours byte for byte', () => {
  const raw = crlf(
    `\uFEFF${DECLARATION}`,
    '<LanguageData>',
    '  <!-- EN: Chatty Nymph -->',
    '  <Nymph.label>健谈的仙女</Nymph.label>',
    '  <!-- EN: A > B -->',
    `  <Other.label>甲 > 乙 "引" '单'</Other.label>`,
    '</LanguageData>'
  );

  const output = applyEntriesToResource(raw, 'DefInjected/ThingDef/Races.xml', [
    NYMPH_UPDATED,
    addedEntry('Zebra.label', 'Zebra', 'ThingDef/Races.xml')
  ]);

  assert.equal(
    output,
    crlf(
      `\uFEFF${DECLARATION}`,
      '<LanguageData>',
      `  <!-- HISTORY: ${NYMPH_HISTORY} -->`,
      '  <!-- EN: Talkative Nymph -->',
      '  <Nymph.label>健谈的仙女</Nymph.label>',
      '  <!-- EN: A > B -->',
      `  <Other.label>甲 > 乙 "引" '单'</Other.label>`,
      '  <!-- EN: Zebra -->',
      '  <Zebra.label>Zebra</Zebra.label>',
      '</LanguageData>'
    )
  );
});

test('a header before the root element is kept and a second pass changes nothing', () => {
  const header = [DECLARATION, '', '<!-- file note -->'];
  const raw = lines(
    ...header,
    '<LanguageData>',
    '  <!-- EN: Chatty Nymph -->',
    '  <Nymph.label>健谈的仙女</Nymph.label>',
    '  <Empty.label />',
    '</LanguageData>'
  );

  const first = applyEntriesToResource(raw, 'DefInjected/ThingDef/Races.xml', [NYMPH_UPDATED]);
  const second = applyEntriesToResource(first, 'DefInjected/ThingDef/Races.xml', [NYMPH_UPDATED]);

  assert.equal(
    first,
    lines(
      ...header,
      '<LanguageData>',
      `  <!-- HISTORY: ${NYMPH_HISTORY} -->`,
      '  <!-- EN: Talkative Nymph -->',
      '  <Nymph.label>健谈的仙女</Nymph.label>',
      '  <Empty.label />',
      '</LanguageData>'
    )
  );
  assert.equal(second, first);
});

test('entries added to a self-closing root open it up', () => {
  const output = applyEntriesToResource(lines(DECLARATION, '<LanguageData />'), 'Keyed/Misc.xml', [
    addedEntry('b.title', 'New Item', 'Misc.xml')
  ]);

  assert.equal(
    output,
    lines(
      DECLARATION,
      '<LanguageData>',
      '  <!-- EN: New Item -->',
      '  <b.title>New Item</b.title>',
      '</LanguageData>'
    )
  );
});

test('a text entry is never written over a list element of the same name', () => {
  const raw = lines(DECLARATION, '<LanguageData>', '  <Foo.rules>', '    <li>x</li>', '  </Foo.rules>', '</LanguageData>');

  assert.throws(() => applyEntriesToResource(raw, 'Keyed/Rules.xml', [addedEntry('Foo.rules', 'Rules', 'Rules.xml')]), {
    name: 'SerializationError',
    message: 'Keyed/Rules.xml: <Foo.rules> holds a list and cannot take a text value'
  });
});

test('replaceEntryTexts swaps element text and leaves annotations alone', () => {
  const raw = lines(
    DECLARATION,
    '<LanguageData>',
    '  <!-- EN: Axe -->',
    '  <Axe.label>斧头</Axe.label>',
    '  <Axe.tools>',
    '    <li>柄</li>',
    '  </Axe.tools>',
    '  <Club.label/>',
    '</LanguageData>'
  );

  const replaced = replaceEntryTexts(
    raw,
    'DefInjected/ThingDef/Weapons.xml',
    new Map([
      ['Axe.label', '战斧 & 盾'],
      ['Club.label', '棍'],
      ['Axe.tools', 'x'],
      ['Spear.label', '矛']
    ])
  );

  assert.equal(
    replaced.content,
    lines(
      DECLARATION,
      '<LanguageData>',
      '  <!-- EN: Axe -->',
      '  <Axe.label>战斧 &amp; 盾</Axe.label>',
      '  <Axe.tools>',
      '    <li>柄</li>',
      '  </Axe.tools>',
      '  <Club.label>棍</Club.label>',
      '</LanguageData>'
    )
  );
  assert.deepEqual(replaced.missing, ['Axe.tools', 'Spear.label']);
});

test('writeResourceFiles with fresh ignores what is on disk', async () => {
  await withTempRoot('langdata-serialize-', async (root) => {
    await writeFixtureFile(root, 'DefInjected/ThingDef/Races.xml', RACES_XML);

    const outcome = await writeResourceFiles(
      path.join(root, 'DefInjected'),
      groupByFile([addedEntry('Nymph.label', 'Talkative Nymph', 'ThingDef/Races.xml')]),
      { check: false, fresh: true }
    );

    assert.deepEqual(outcome, { files: ['ThingDef/Races.xml'], failures: [] });
    assert.equal(
      await readFixtureFile(root, 'DefInjected/ThingDef/Races.xml'),
      lines(
        DECLARATION,
        '<LanguageData>',
        '  <!-- EN: Talkative Nymph -->',
        '  <Nymph.label>Talkative Nymph</Nymph.label>',
        '</LanguageData>'
      )
    );
  });
});
