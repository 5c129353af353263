import path from 'node:path';

import {
  choosePolicy,
  chooseStrategy,
  confirmRebuild,
  interactivePromptAdapter,
  type PromptAdapter
} from '../cli_prompts.js';
import { getRunOptions } from '../io.js';
import { classifyDirectory } from './classifier.js';
import { loadConfig, type ReconcileConfig } from './config.js';
import { ConfigurationError, formatFailure } from './errors.js';
import { runReconciliation, type ReconcileOptions, type ReconcileReport } from './reconcile.js';
import { defaultStrategy } from './router.js';
import {
  CONFLICT_POLICIES,
  LAYOUT_STRATEGIES,
  NAMESPACE_SELECTIONS,
  isOneOf,
  namespacesFor,
  type ConflictPolicy,
  type LayoutStrategy,
  type SnapshotOrigin
} from './types.js';

export const MERGE_OPTIONS: ReadonlySet<string> = new Set([
  'source',
  'target',
  'source-csv',
  'namespaces',
  'policy',
  'strategy',
  'include-unchanged',
  'today',
  'csv',
  'config'
]);

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function parseCliOptionMap(
  args: string[],
  known: ReadonlySet<string> = MERGE_OPTIONS
): Map<string, string> {
  const options = new Map<string, string>();

  for (let index = 0; index < args.length; index += 1) {
    const keyToken = args[index];
    if (!keyToken.startsWith('--')) {
      throw new ConfigurationError('', `Unexpected argument '${keyToken}'. Expected --key value pairs`);
    }

    const key = keyToken.slice(2).trim();
    if (!key || !known.has(key)) {
      throw new ConfigurationError('', `Unknown option '${keyToken}'`);
    }

    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError('', `Missing value for option '--${key}'`);
    }

    options.set(key, value);
    index += 1;
  }

  return options;
}

export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

function parseChoice<T extends string>(values: readonly T[], option: string, value: string): T {
  if (!isOneOf(values, value)) {
    throw new ConfigurationError('', `--${option} must be one of ${values.join(', ')}`);
  }
  return value;
}

function parseYesNo(option: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'yes') {
    return true;
  }
  if (normalized === 'no') {
    return false;
  }
  throw new ConfigurationError('', `--${option} must be yes or no`);
}

/** CLI flags win over the config file; paths given on the command line resolve against `cwd`. */
export function applyCliOverrides(
  config: ReconcileConfig,
  options: Map<string, string>,
  cwd: string
): ReconcileConfig {
  const next = { ...config };
  const resolvePath = (key: string): string | undefined => {
    const value = options.get(key);
    return value === undefined ? undefined : path.resolve(cwd, value);
  };

  next.sourceDir = resolvePath('source') ?? next.sourceDir;
  next.targetDir = resolvePath('target') ?? next.targetDir;
  next.sourceCsv = resolvePath('source-csv') ?? next.sourceCsv;
  next.csvOut = resolvePath('csv') ?? next.csvOut;

  const namespaces = options.get('namespaces');
  if (namespaces !== undefined) {
    next.namespaces = parseChoice(NAMESPACE_SELECTIONS, 'namespaces', namespaces);
  }
  const strategy = options.get('strategy');
  if (strategy !== undefined) {
    next.strategy = parseChoice(LAYOUT_STRATEGIES, 'strategy', strategy);
  }
  const includeUnchanged = options.get('include-unchanged');
  if (includeUnchanged !== undefined) {
    next.includeUnchanged = parseYesNo('include-unchanged', includeUnchanged);
  }

  return next;
}

export interface MergeCliContext {
  prompt: PromptAdapter;
  cwd: string;
  now: () => Date;
}

function printReport(report: ReconcileReport, check: boolean): number {
  let changes = 0;
  for (const item of report.namespaces) {
    const { stats } = item;
    changes += item.filesWritten.length;
    console.log(
      `merge: ${item.namespace} mode=${report.mode} strategy=${item.strategy} ` +
        `unchanged=${stats.unchanged} updated=${stats.updated} added=${stats.added} ` +
        `rejected=${stats.rejected} files=${item.filesWritten.length}`
    );
  }

  for (const failure of report.failures) {
    console.error(formatFailure(failure));
  }

  if (report.failures.length > 0) {
    console.error(`\n${report.failures.length} problem(s) reported by merge_translations.ts`);
    return 1;
  }

  if (check) {
    if (changes > 0) {
      console.error(`\n${changes} file(s) would be updated by merge_translations.ts`);
      return 1;
    }
    console.log('merge_translations.ts check passed.');
    return 0;
  }

  console.log(`\nDone. ${changes} file(s) updated by merge_translations.ts.`);
  return 0;
}

/** Returns the process exit code. Configuration problems are thrown. */
export async function runMergeCli(
  argv: string[] = process.argv.slice(2),
  context: Partial<MergeCliContext> = {}
): Promise<number> {
  const prompt = context.prompt ?? interactivePromptAdapter;
  const cwd = context.cwd ?? process.cwd();
  const now = context.now ?? (() => new Date());

  const flags = getRunOptions(argv);
  const cliOptions = parseCliOptionMap(flags.rest);
  const { config: fileConfig } = await loadConfig({ configPath: cliOptions.get('config'), cwd });
  const config = applyCliOverrides(fileConfig, cliOptions, cwd);

  const targetDir = config.targetDir;
  if (!targetDir) {
    throw new ConfigurationError('', 'Missing target tree. Pass --target <dir> or set targetDir');
  }
  if (!config.sourceDir && !config.sourceCsv) {
    throw new ConfigurationError(
      '',
      'Missing source. Pass --source <dir> or --source-csv <file>, or set sourceDir'
    );
  }

  const today = cliOptions.get('today') ?? formatDate(now());
  if (!DATE_PATTERN.test(today)) {
    throw new ConfigurationError('', '--today must be YYYY-MM-DD');
  }

  const namespaces = namespacesFor(config.namespaces);
  const targetState = await classifyDirectory(targetDir);

  const policyOption = cliOptions.get('policy');
  let policy: ConflictPolicy;
  if (policyOption !== undefined) {
    policy = parseChoice(CONFLICT_POLICIES, 'policy', policyOption);
  } else if (targetState === 'present') {
    policy = await choosePolicy(prompt, targetDir);
  } else {
    policy = 'new';
  }

  const placesEverything = targetState === 'absent' || policy === 'rebuild';
  const origin: SnapshotOrigin =
    config.sourceCsv && namespaces.includes('typed') ? 'raw' : 'reference';

  let strategy: LayoutStrategy | null = config.strategy;
  if (!strategy && placesEverything && namespaces.includes('typed')) {
    strategy = await chooseStrategy(prompt, origin, defaultStrategy(origin));
  }

  if (targetState === 'present' && policy === 'rebuild' && !flags.yes && !flags.check) {
    const confirmed = await confirmRebuild(prompt, targetDir);
    if (!confirmed) {
      console.log('Rebuild cancelled.');
      return 0;
    }
  }

  const options: ReconcileOptions = {
    sourceDir: config.sourceDir,
    sourceCsv: config.sourceCsv,
    targetDir,
    namespaces,
    policy,
    strategy,
    includeUnchanged: config.includeUnchanged,
    today,
    csvOut: config.csvOut,
    check: flags.check
  };

  const report = await runReconciliation(options);
  return printReport(report, flags.check);
}
