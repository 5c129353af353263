import { DOMParser } from '@xmldom/xmldom';
import fs from 'fs-extra';
import path from 'node:path';

import { listXmlFiles } from '../io.js';
import { readAnnotation } from './annotations.js';
import { ParseError, describeError } from './errors.js';
import { typedTag } from './keys.js';
import type { Namespace, RunFailure, TargetEntry } from './types.js';

export const ROOT_TAG = 'LanguageData';

const ELEMENT_NODE = 1;
const COMMENT_NODE = 8;

const DECLARATION_PATTERN = /^\uFEFF?\s*(<\?xml[\s\S]*?\?>)/;

export interface ParsedEntry {
  key: string;
  value: string;
  sourceSnapshot: string;
  hasSnapshot: boolean;
  historyNote?: string;
}

export interface ParsedResource {
  declaration: string | null;
  entries: ParsedEntry[];
  /** Keys of elements that hold child elements rather than text. */
  listKeys: string[];
}

export interface LoadedTree {
  entries: TargetEntry[];
  failures: RunFailure[];
  fileCount: number;
  /** List-valued keys mapped to the file holding them. */
  listKeys: Map<string, string>;
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isComment(node: Node): node is Comment {
  return node.nodeType === COMMENT_NODE;
}

function childNodesOf(node: Node): Node[] {
  const out: Node[] = [];
  for (let index = 0; index < node.childNodes.length; index += 1) {
    const child = node.childNodes.item(index);
    if (child) {
      out.push(child);
    }
  }
  return out;
}

function hasElementChildren(element: Element): boolean {
  return childNodesOf(element).some(isElement);
}

export function parseXmlDocument(raw: string, filePath: string): Document {
  const problems: string[] = [];
  const record = (message: unknown): void => {
    problems.push(String(message).trim());
  };

  let document: Document;
  try {
    document = new DOMParser({
      errorHandler: {
        warning: () => undefined,
        error: record,
        fatalError: record
      }
    }).parseFromString(raw.replace(/^\uFEFF/, ''), 'text/xml');
  } catch (error) {
    throw new ParseError(filePath, `is not well-formed XML: ${describeError(error)}`);
  }

  if (problems.length > 0) {
    throw new ParseError(filePath, `is not well-formed XML: ${problems[0]}`);
  }

  return document;
}

/**
 * Reads one LanguageData document. Comments seen since the previous entry
 * annotate the next leaf element: the last `EN:` comment is its snapshot,
 * the last `HISTORY:` comment its history note.
 */
export function parseResourceXml(raw: string, filePath: string): ParsedResource {
  const document = parseXmlDocument(raw, filePath);
  const root = document.documentElement;
  if (!root || root.tagName !== ROOT_TAG) {
    throw new ParseError(filePath, `root element must be <${ROOT_TAG}>`);
  }

  const declaration = raw.match(DECLARATION_PATTERN)?.[1] ?? null;
  const entries: ParsedEntry[] = [];
  const listKeys: string[] = [];

  let snapshot: string | null = null;
  let history: string | null = null;

  for (const node of childNodesOf(root)) {
    if (isComment(node)) {
      const annotation = readAnnotation(node.data);
      if (annotation?.kind === 'snapshot') {
        snapshot = annotation.text;
      } else if (annotation?.kind === 'history') {
        history = annotation.text;
      }
      continue;
    }

    if (!isElement(node)) {
      continue;
    }

    if (!hasElementChildren(node)) {
      const entry: ParsedEntry = {
        key: node.tagName,
        value: node.textContent ?? '',
        sourceSnapshot: snapshot ?? '',
        hasSnapshot: snapshot !== null
      };
      if (history !== null) {
        entry.historyNote = history;
      }
      entries.push(entry);
    } else {
      listKeys.push(node.tagName);
    }

    snapshot = null;
    history = null;
  }

  return { declaration, entries, listKeys };
}

function defTypeOf(namespace: Namespace, originFile: string): string | undefined {
  if (namespace !== 'typed') {
    return undefined;
  }
  const segments = originFile.split('/');
  return segments.length > 1 ? segments[0] : undefined;
}

export function toTargetEntries(
  namespace: Namespace,
  originFile: string,
  parsed: ParsedResource
): TargetEntry[] {
  const defType = defTypeOf(namespace, originFile);

  return parsed.entries.map((entry) => {
    const target: TargetEntry = {
      key: entry.key,
      translatedText: entry.value,
      tag: namespace === 'typed' ? typedTag(defType, entry.key) : entry.key,
      originFile,
      sourceSnapshot: entry.sourceSnapshot
    };
    if (entry.historyNote !== undefined) {
      target.historyNote = entry.historyNote;
    }
    return target;
  });
}

/** `DefInjected/ThingDef/Weapons.xml`: the file as named in failures and progress lines. */
export function resourceDisplayPath(namespaceDir: string, originFile: string): string {
  return `${path.basename(namespaceDir)}/${originFile}`;
}

interface LoadedFile {
  entries: TargetEntry[];
  listKeys: string[];
}

async function loadResourceFile(
  namespace: Namespace,
  namespaceDir: string,
  originFile: string
): Promise<LoadedFile> {
  const filePath = path.join(namespaceDir, ...originFile.split('/'));
  const displayPath = resourceDisplayPath(namespaceDir, originFile);
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ParseError(displayPath, `cannot be read: ${describeError(error)}`);
  }

  const parsed = parseResourceXml(raw, displayPath);
  return { entries: toTargetEntries(namespace, originFile, parsed), listKeys: parsed.listKeys };
}

/** Loads every `*.xml` file under a namespace directory; unreadable files are reported and skipped. */
export async function loadResourceTree(
  namespace: Namespace,
  namespaceDir: string
): Promise<LoadedTree> {
  const files = await listXmlFiles(namespaceDir);

  const results = await Promise.all(
    files.map(async (originFile) => {
      try {
        return { originFile, loaded: await loadResourceFile(namespace, namespaceDir, originFile) };
      } catch (error) {
        if (error instanceof ParseError) {
          return { originFile, failure: error.toFailure() };
        }
        throw error;
      }
    })
  );

  const entries: TargetEntry[] = [];
  const failures: RunFailure[] = [];
  const listKeys = new Map<string, string>();
  for (const result of results) {
    if (result.failure) {
      failures.push(result.failure);
    } else if (result.loaded) {
      entries.push(...result.loaded.entries);
      for (const key of result.loaded.listKeys) {
        if (!listKeys.has(key)) {
          listKeys.set(key, result.originFile);
        }
      }
    }
  }

  return { entries, failures, fileCount: files.length, listKeys };
}
