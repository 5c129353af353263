import path from 'node:path';

import { ConfigurationError } from './errors.js';
import { loadResourceTree } from './resource_parser.js';
import {
  NAMESPACE_DIRS,
  type MergedEntry,
  type Namespace,
  type RunFailure,
  type TargetEntry
} from './types.js';

export const TARGET_CSV_HEADER = ['key', 'translatedText', 'tag', 'originFile', 'sourceSnapshot'];
export const MERGED_CSV_HEADER = [...TARGET_CSV_HEADER, 'historyNote'];

function quoteField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsv(rows: string[][]): string {
  return rows.map((row) => row.map(quoteField).join(',')).join('\n') + '\n';
}

/** RFC 4180 reader. Accepts LF or CRLF; a trailing newline does not add a row. */
export function parseCsv(text: string, filePath = ''): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  let index = 0;
  const source = text.replace(/^\uFEFF/, '');

  const endField = (): void => {
    row.push(field);
    field = '';
  };
  const endRow = (): void => {
    endField();
    rows.push(row);
    row = [];
  };

  while (index < source.length) {
    const char = source[index];

    if (quoted) {
      if (char === '"') {
        if (source[index + 1] === '"') {
          field += '"';
          index += 2;
          continue;
        }
        quoted = false;
      } else {
        field += char;
      }
      index += 1;
      continue;
    }

    if (char === '"' && field === '') {
      quoted = true;
    } else if (char === ',') {
      endField();
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r') {
      if (source[index + 1] !== '\n') {
        endRow();
      }
    } else {
      field += char;
    }
    index += 1;
  }

  if (quoted) {
    throw new ConfigurationError(filePath, 'CSV ends inside a quoted field');
  }
  if (field !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}

export function targetEntriesToCsv(entries: TargetEntry[]): string {
  const rows = entries.map((entry) => [
    entry.key,
    entry.translatedText,
    entry.tag,
    entry.originFile,
    entry.sourceSnapshot
  ]);
  return formatCsv([TARGET_CSV_HEADER, ...rows]);
}

export function mergedEntriesToCsv(entries: MergedEntry[]): string {
  const rows = entries.map((entry) => [
    entry.key,
    entry.translatedText,
    entry.tag,
    entry.originFile,
    entry.sourceSnapshot,
    entry.historyNote ?? ''
  ]);
  return formatCsv([MERGED_CSV_HEADER, ...rows]);
}

export interface TargetTreeExport {
  csv: string;
  entryCount: number;
  failures: RunFailure[];
}

/** Five-column export of the translations under a target-language tree. */
export async function exportTargetTree(
  languageDir: string,
  namespaces: Namespace[]
): Promise<TargetTreeExport> {
  const trees = await Promise.all(
    namespaces.map((namespace) =>
      loadResourceTree(namespace, path.join(languageDir, NAMESPACE_DIRS[namespace]))
    )
  );

  const entries = trees.flatMap((tree) => tree.entries);
  return {
    csv: targetEntriesToCsv(entries),
    entryCount: entries.length,
    failures: trees.flatMap((tree) => tree.failures)
  };
}
