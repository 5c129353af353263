import path from 'node:path';

import { getRunOptions, toPosixRelative, writeTextFile } from './lib/io.js';
import { parseCliOptionMap } from './lib/merge/cli.js';
import { formatFailure } from './lib/merge/errors.js';
import { exportTargetTree } from './lib/merge/exchange_csv.js';
import { NAMESPACE_SELECTIONS, isOneOf, namespacesFor } from './lib/merge/types.js';

const EXPORT_OPTIONS: ReadonlySet<string> = new Set(['target', 'out', 'namespaces']);

async function main(): Promise<void> {
  const flags = getRunOptions(process.argv.slice(2));
  const options = parseCliOptionMap(flags.rest, EXPORT_OPTIONS);

  const target = options.get('target');
  const out = options.get('out');
  if (!target || !out) {
    throw new Error('Usage: export_exchange_csv.ts --target <languageDir> --out <file.csv> [--namespaces typed|flat|both] [--check]');
  }

  const selection = options.get('namespaces') ?? 'both';
  if (!isOneOf(NAMESPACE_SELECTIONS, selection)) {
    throw new Error(`--namespaces must be one of ${NAMESPACE_SELECTIONS.join(', ')}`);
  }

  const exported = await exportTargetTree(path.resolve(target), namespacesFor(selection));
  for (const failure of exported.failures) {
    console.error(formatFailure(failure));
  }

  const outFile = path.resolve(out);
  const result = await writeTextFile(outFile, exported.csv, { check: flags.check });

  if (flags.check) {
    if (result.changed) {
      console.error(`\n${toPosixRelative(outFile)} would be updated by export_exchange_csv.ts`);
      process.exit(1);
    }
    console.log('export_exchange_csv.ts check passed.');
    return;
  }

  if (result.changed) {
    console.log(`Updated ${toPosixRelative(outFile)} (${exported.entryCount} entries)`);
  }
  if (exported.failures.length > 0) {
    process.exit(1);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
