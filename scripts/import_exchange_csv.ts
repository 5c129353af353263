import path from 'node:path';

import { getRunOptions } from './lib/io.js';
import { parseCliOptionMap } from './lib/merge/cli.js';
import { formatFailure } from './lib/merge/errors.js';
import { importExchangeCsv } from './lib/merge/exchange_import.js';
import { NAMESPACE_SELECTIONS, isOneOf, namespacesFor } from './lib/merge/types.js';

const IMPORT_OPTIONS: ReadonlySet<string> = new Set(['target', 'csv', 'namespaces']);

async function main(): Promise<void> {
  const flags = getRunOptions(process.argv.slice(2));
  const options = parseCliOptionMap(flags.rest, IMPORT_OPTIONS);

  const target = options.get('target');
  const csv = options.get('csv');
  if (!target || !csv) {
    throw new Error('Usage: import_exchange_csv.ts --target <languageDir> --csv <file.csv> [--namespaces typed|flat|both] [--check]');
  }

  const selection = options.get('namespaces') ?? 'both';
  if (!isOneOf(NAMESPACE_SELECTIONS, selection)) {
    throw new Error(`--namespaces must be one of ${NAMESPACE_SELECTIONS.join(', ')}`);
  }

  const report = await importExchangeCsv(
    path.resolve(target),
    path.resolve(csv),
    namespacesFor(selection),
    { check: flags.check }
  );

  for (const failure of report.failures) {
    console.error(formatFailure(failure));
  }
  if (report.failures.length > 0) {
    console.error(`\n${report.failures.length} problem(s) reported by import_exchange_csv.ts`);
    process.exit(1);
  }

  if (flags.check) {
    if (report.files.length > 0) {
      console.error(`\n${report.files.length} file(s) would be updated by import_exchange_csv.ts`);
      process.exit(1);
    }
    console.log('import_exchange_csv.ts check passed.');
    return;
  }

  console.log(`\nDone. ${report.updated} translation(s) in ${report.files.length} file(s) updated by import_exchange_csv.ts.`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
