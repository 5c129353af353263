import fs from 'fs-extra';
import path from 'node:path';

import { writeTextFile, type RunOptions } from '../io.js';
import { historyCommentData, readAnnotation, snapshotCommentData } from './annotations.js';
import { ReconcileError, SerializationError, describeError } from './errors.js';
import { scanResourceLayout, isBlank, type RawNode, type ResourceLayout } from './raw_layout.js';
import { ROOT_TAG, parseResourceXml, resourceDisplayPath } from './resource_parser.js';
import type { MergedEntry, RunFailure } from './types.js';

export const DEFAULT_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

const EMPTY_RESOURCE = `${DEFAULT_DECLARATION}\n<${ROOT_TAG}>\n</${ROOT_TAG}>\n`;

export interface WriteResourceOptions extends RunOptions {
  /** Ignore existing files and write each one from scratch, as a rebuild does. */
  fresh?: boolean;
}

export interface WriteOutcome {
  /** Files, relative to the namespace directory, that changed (or would change under --check). */
  files: string[];
  failures: RunFailure[];
}

export interface TextReplacement {
  content: string;
  /** Keys with no text element in the file. */
  missing: string[];
}

interface Edit {
  start: number;
  end: number;
  text: string;
}

function byKey(a: MergedEntry, b: MergedEntry): number {
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

export function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function applyEdits(raw: string, edits: Edit[]): string {
  let out = raw;
  for (const edit of [...edits].sort((a, b) => b.start - a.start)) {
    out = out.slice(0, edit.start) + edit.text + out.slice(edit.end);
  }
  return out;
}

function annotationText(entry: MergedEntry, separator: string): string {
  const comments: string[] = [];
  if (entry.historyNote !== undefined) {
    comments.push(`<!--${historyCommentData(entry.historyNote)}-->`);
  }
  comments.push(`<!--${snapshotCommentData(entry.sourceSnapshot)}-->`);
  return comments.map((comment) => `${comment}${separator}`).join('');
}

/** Ranges of the annotation comments leading up to `children[index]`, each with the blank text before it. */
function annotationRanges(children: RawNode[], index: number): Edit[] {
  const edits: Edit[] = [];
  for (let cursor = index - 1; cursor >= 0; cursor -= 1) {
    const node = children[cursor];
    if (node.kind === 'element' || (node.kind === 'text' && !isBlank(node))) {
      break;
    }
    if (node.kind === 'comment' && readAnnotation(node.data)) {
      const before = cursor > 0 ? children[cursor - 1] : undefined;
      if (before && isBlank(before)) {
        edits.push({ start: before.start, end: node.end, text: '' });
        cursor -= 1;
      } else {
        edits.push({ start: node.start, end: node.end, text: '' });
      }
    }
  }
  return edits;
}

function appendEdit(raw: string, layout: ResourceLayout, entries: MergedEntry[]): Edit | null {
  if (entries.length === 0) {
    return null;
  }

  const separator = `${layout.lineEnding}${layout.indent}`;
  const block = [...entries]
    .sort(byKey)
    .map(
      (entry) =>
        `${separator}${annotationText(entry, separator)}<${entry.key}>${escapeText(entry.translatedText)}</${entry.key}>`
    )
    .join('');

  if (layout.rootCloseStart === null) {
    const openTag = raw.slice(layout.rootStart, layout.rootOpenEnd).replace(/\s*\/>$/, '>');
    return {
      start: layout.rootStart,
      end: layout.rootOpenEnd,
      text: `${openTag}${block}${layout.lineEnding}</${layout.rootName}>`
    };
  }

  const last = layout.children.at(-1);
  if (last && isBlank(last)) {
    return { start: last.start, end: last.start, text: block };
  }
  return {
    start: layout.rootCloseStart,
    end: layout.rootCloseStart,
    text: `${block}${layout.lineEnding}`
  };
}

/**
 * Applies updated and added entries to an existing file. Updated entries get
 * a fresh history/snapshot pair in front of their element; added entries are
 * appended before `</LanguageData>`. Every other byte of the file is kept,
 * and inserted lines follow its line endings and indentation.
 */
export function applyEntriesToResource(
  raw: string,
  filePath: string,
  entries: MergedEntry[]
): string {
  const parsed = parseResourceXml(raw, filePath);
  const layout = scanResourceLayout(raw, filePath);
  const separator = `${layout.lineEnding}${layout.indent}`;

  const textElements = new Map<string, number>();
  layout.children.forEach((node, index) => {
    if (node.kind === 'element' && !node.nested && !textElements.has(node.name)) {
      textElements.set(node.name, index);
    }
  });

  const edits: Edit[] = [];
  const appended: MergedEntry[] = [];

  for (const entry of entries) {
    if (entry.action === 'unchanged') {
      continue;
    }

    const index = textElements.get(entry.key);
    if (index !== undefined && entry.action === 'updated') {
      edits.push(...annotationRanges(layout.children, index));
      const start = layout.children[index].start;
      edits.push({ start, end: start, text: annotationText(entry, separator) });
      continue;
    }

    if (parsed.listKeys.includes(entry.key)) {
      throw new SerializationError(filePath, `<${entry.key}> holds a list and cannot take a text value`);
    }
    if (index !== undefined) {
      throw new SerializationError(filePath, `<${entry.key}> is already in this file`);
    }
    appended.push(entry);
  }

  const append = appendEdit(raw, layout, appended);
  if (append) {
    edits.push(append);
  }
  return applyEdits(raw, edits);
}

/** A new file holding `entries`, sorted by key. */
export function renderResourceFile(entries: MergedEntry[]): string {
  const layout = scanResourceLayout(EMPTY_RESOURCE, '');
  const append = appendEdit(EMPTY_RESOURCE, layout, entries);
  return append ? applyEdits(EMPTY_RESOURCE, [append]) : EMPTY_RESOURCE;
}

/**
 * Replaces the text of the named elements and leaves their annotations and
 * everything else in the file alone.
 */
export function replaceEntryTexts(
  raw: string,
  filePath: string,
  texts: ReadonlyMap<string, string>
): TextReplacement {
  // Rejects anything that is not a well-formed LanguageData document.
  parseResourceXml(raw, filePath);
  const layout = scanResourceLayout(raw, filePath);
  const edits: Edit[] = [];
  const found = new Set<string>();

  for (const node of layout.children) {
    if (node.kind !== 'element' || node.nested || found.has(node.name)) {
      continue;
    }
    const text = texts.get(node.name);
    if (text === undefined) {
      continue;
    }
    found.add(node.name);
    const escaped = escapeText(text);
    edits.push(
      node.content
        ? { start: node.content.start, end: node.content.end, text: escaped }
        : { start: node.start, end: node.end, text: `<${node.name}>${escaped}</${node.name}>` }
    );
  }

  return {
    content: applyEdits(raw, edits),
    missing: [...texts.keys()].filter((key) => !found.has(key))
  };
}

export function groupByFile(entries: MergedEntry[]): Map<string, MergedEntry[]> {
  const groups = new Map<string, MergedEntry[]>();
  for (const entry of entries) {
    const group = groups.get(entry.originFile);
    if (group) {
      group.push(entry);
    } else {
      groups.set(entry.originFile, [entry]);
    }
  }
  return new Map([...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

function hasChanges(entries: MergedEntry[]): boolean {
  return entries.some((entry) => entry.action !== 'unchanged');
}

async function writeResourceFile(
  namespaceDir: string,
  relativePath: string,
  entries: MergedEntry[],
  options: WriteResourceOptions
): Promise<boolean> {
  const filePath = path.join(namespaceDir, ...relativePath.split('/'));
  const displayPath = resourceDisplayPath(namespaceDir, relativePath);

  let next: string;
  if (!options.fresh && (await fs.pathExists(filePath))) {
    const raw = await fs.readFile(filePath, 'utf8');
    next = applyEntriesToResource(raw, displayPath, entries);
  } else {
    next = renderResourceFile(entries.filter((entry) => entry.action !== 'unchanged'));
  }

  const result = await writeTextFile(filePath, next, { check: options.check });
  if (result.changed) {
    const count = entries.filter((entry) => entry.action !== 'unchanged').length;
    console.log(`${options.check ? 'Would update' : 'Updated'} ${displayPath} (${count} entries)`);
  }
  return result.changed;
}

/**
 * Writes every file group that carries a change. Each file is written on its
 * own; a failing file is reported and the others are still committed.
 */
export async function writeResourceFiles(
  namespaceDir: string,
  groups: Map<string, MergedEntry[]>,
  options: WriteResourceOptions
): Promise<WriteOutcome> {
  const pending = [...groups.entries()].filter(([, entries]) => hasChanges(entries));

  const results = await Promise.all(
    pending.map(async ([relativePath, entries]) => {
      try {
        const changed = await writeResourceFile(namespaceDir, relativePath, entries, options);
        return { relativePath, changed };
      } catch (error) {
        const failure = new SerializationError(
          resourceDisplayPath(namespaceDir, relativePath),
          error instanceof ReconcileError ? error.reason : describeError(error)
        );
        return { relativePath, changed: false, failure: failure.toFailure() };
      }
    })
  );

  const files: string[] = [];
  const failures: RunFailure[] = [];
  for (const result of results) {
    if (result.failure) {
      failures.push(result.failure);
    } else if (result.changed) {
      files.push(result.relativePath);
    }
  }

  return { files, failures };
}
