import fs from 'fs-extra';
import path from 'node:path';

import { ConfigurationError, describeError } from './errors.js';
import { parseCsv } from './exchange_csv.js';
import { loadResourceTree } from './resource_parser.js';
import { NAMESPACE_DIRS, type Namespace, type RunFailure, type SourceSnapshot } from './types.js';

export const SOURCE_CSV_HEADER = ['key', 'text', 'tag', 'originFile'];

export interface ReferenceSnapshot {
  snapshot: SourceSnapshot;
  failures: RunFailure[];
  fileCount: number;
}

/** Source entries read from the source-language tree, e.g. `Languages/English`. */
export async function readReferenceSnapshot(
  namespace: Namespace,
  languageDir: string
): Promise<ReferenceSnapshot> {
  const tree = await loadResourceTree(namespace, path.join(languageDir, NAMESPACE_DIRS[namespace]));

  return {
    snapshot: {
      namespace,
      origin: 'reference',
      entries: tree.entries.map((entry) => ({
        key: entry.key,
        text: entry.translatedText,
        tag: entry.tag,
        originFile: entry.originFile
      }))
    },
    failures: tree.failures,
    fileCount: tree.fileCount
  };
}

function isHeaderRow(row: string[]): boolean {
  return (
    row.length === SOURCE_CSV_HEADER.length &&
    row.every((cell, index) => cell.trim().toLowerCase() === SOURCE_CSV_HEADER[index].toLowerCase())
  );
}

/** Raw-data export `key,text,tag,originFile`; always describes the typed namespace. */
export async function readSourceCsv(filePath: string): Promise<SourceSnapshot> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(filePath, `cannot read source CSV: ${describeError(error)}`);
  }

  const rows = parseCsv(raw, filePath);
  const body = rows.length > 0 && isHeaderRow(rows[0]) ? rows.slice(1) : rows;
  const offset = rows.length - body.length;

  const entries = body
    .map((row, index) => ({ row, rowNumber: index + offset + 1 }))
    .filter(({ row }) => !(row.length === 1 && row[0].trim() === ''))
    .map(({ row, rowNumber }) => {
      if (row.length !== SOURCE_CSV_HEADER.length) {
        throw new ConfigurationError(
          filePath,
          `row ${rowNumber}: expected ${SOURCE_CSV_HEADER.length} columns, got ${row.length}`
        );
      }
      const [key, text, tag, originFile] = row;
      return { key, text, tag, originFile: originFile.trim() };
    });

  return { namespace: 'typed', origin: 'raw', entries };
}
