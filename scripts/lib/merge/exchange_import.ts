import fs from 'fs-extra';
import path from 'node:path';

import { writeTextFile, type RunOptions } from '../io.js';
import { ConfigurationError, ReconcileError, SerializationError, describeError } from './errors.js';
import { MERGED_CSV_HEADER, TARGET_CSV_HEADER, parseCsv } from './exchange_csv.js';
import { loadResourceTree, resourceDisplayPath } from './resource_parser.js';
import { replaceEntryTexts } from './serializer.js';
import { NAMESPACE_DIRS, type Namespace, type RunFailure, type TargetEntry } from './types.js';

export interface ExchangeRow {
  /** 1-based, header included. */
  row: number;
  key: string;
  translatedText: string;
  originFile: string;
}

export interface ImportReport {
  /** Files that changed (or would change under --check), as `DefInjected/...` or `Keyed/...`. */
  files: string[];
  updated: number;
  failures: RunFailure[];
}

interface FileTexts {
  namespace: Namespace;
  originFile: string;
  texts: Map<string, string>;
}

function isHeader(fields: string[]): boolean {
  return fields[0] === TARGET_CSV_HEADER[0] && fields[1] === TARGET_CSV_HEADER[1];
}

/** Reads a five- or six-column exchange CSV; the header row is optional. */
export function readExchangeRows(text: string, filePath: string): ExchangeRow[] {
  const rows: ExchangeRow[] = [];

  parseCsv(text, filePath).forEach((fields, index) => {
    if ((index === 0 && isHeader(fields)) || (fields.length === 1 && fields[0] === '')) {
      return;
    }
    if (fields.length !== TARGET_CSV_HEADER.length && fields.length !== MERGED_CSV_HEADER.length) {
      throw new ConfigurationError(
        filePath,
        `row ${index + 1} has ${fields.length} columns, expected ${TARGET_CSV_HEADER.length} or ${MERGED_CSV_HEADER.length}`
      );
    }
    const [key, translatedText, , originFile] = fields;
    rows.push({ row: index + 1, key, translatedText, originFile });
  });

  return rows;
}

/**
 * Writes translated text from an exchange CSV back into a target-language
 * tree. Rows are matched by key and file; annotations are left as they are.
 */
export async function importExchangeCsv(
  languageDir: string,
  csvPath: string,
  namespaces: Namespace[],
  options: RunOptions
): Promise<ImportReport> {
  const csvName = path.basename(csvPath);
  const rows = readExchangeRows(await fs.readFile(csvPath, 'utf8'), csvName);

  const trees = await Promise.all(
    namespaces.map(async (namespace) => {
      const tree = await loadResourceTree(namespace, path.join(languageDir, NAMESPACE_DIRS[namespace]));
      return { namespace, tree, index: new Map(tree.entries.map((entry) => [entry.key, entry])) };
    })
  );
  const failures: RunFailure[] = trees.flatMap(({ tree }) => tree.failures);

  const groups = new Map<string, FileTexts>();
  const seen = new Map<string, number>();

  for (const row of rows) {
    const rowKey = `${row.originFile}\n${row.key}`;
    const first = seen.get(rowKey);
    if (first !== undefined) {
      failures.push({ path: csvName, reason: `row ${row.row}: key '${row.key}' repeats row ${first}` });
      continue;
    }
    seen.set(rowKey, row.row);

    const matches = trees.flatMap(({ namespace, index }) => {
      const entry: TargetEntry | undefined = index.get(row.key);
      return entry && entry.originFile === row.originFile ? [{ namespace, entry }] : [];
    });
    if (matches.length === 0) {
      failures.push({
        path: csvName,
        reason: `row ${row.row}: no text element '${row.key}' in ${row.originFile}`
      });
      continue;
    }

    for (const { namespace, entry } of matches) {
      if (entry.translatedText === row.translatedText) {
        continue;
      }
      const groupKey = `${namespace}\n${entry.originFile}`;
      const group = groups.get(groupKey) ?? {
        namespace,
        originFile: entry.originFile,
        texts: new Map<string, string>()
      };
      group.texts.set(entry.key, row.translatedText);
      groups.set(groupKey, group);
    }
  }

  const results = await Promise.all(
    [...groups.values()].map(async (group) => {
      const namespaceDir = path.join(languageDir, NAMESPACE_DIRS[group.namespace]);
      const displayPath = resourceDisplayPath(namespaceDir, group.originFile);
      try {
        const filePath = path.join(namespaceDir, ...group.originFile.split('/'));
        const replaced = replaceEntryTexts(await fs.readFile(filePath, 'utf8'), displayPath, group.texts);
        const result = await writeTextFile(filePath, replaced.content, options);
        const count = group.texts.size - replaced.missing.length;
        if (result.changed) {
          console.log(`${options.check ? 'Would update' : 'Updated'} ${displayPath} (${count} entries)`);
        }
        return {
          displayPath,
          changed: result.changed,
          count,
          failures: replaced.missing.map((key) => ({
            path: displayPath,
            reason: `no text element '${key}' to update`
          }))
        };
      } catch (error) {
        const failure = new SerializationError(
          displayPath,
          error instanceof ReconcileError ? error.reason : describeError(error)
        );
        return { displayPath, changed: false, count: 0, failures: [failure.toFailure()] };
      }
    })
  );

  const files: string[] = [];
  let updated = 0;
  for (const result of results) {
    failures.push(...result.failures);
    if (result.changed) {
      files.push(result.displayPath);
      updated += result.count;
    }
  }

  return { files: files.sort(), updated, failures };
}
