import fs from 'fs-extra';
import path from 'node:path';

import { writeTextFile } from '../io.js';
import { classifyDirectory, selectMode } from './classifier.js';
import { ConfigurationError } from './errors.js';
import { mergedEntriesToCsv } from './exchange_csv.js';
import { assertNoCrossNamespaceConflicts, freshEntries, planMerge } from './planner.js';
import { loadResourceTree } from './resource_parser.js';
import { defaultStrategy, routeEntry, validateStrategy } from './router.js';
import { groupByFile, writeResourceFiles } from './serializer.js';
import { readReferenceSnapshot, readSourceCsv } from './snapshot.js';
import {
  NAMESPACE_DIRS,
  type ConflictPolicy,
  type DirectoryState,
  type LayoutStrategy,
  type MergePlan,
  type MergeStats,
  type MergedEntry,
  type Namespace,
  type OperationMode,
  type RunFailure,
  type SourceSnapshot
} from './types.js';

export interface ReconcileOptions {
  /** Source-language tree holding `DefInjected` and `Keyed`. */
  sourceDir: string | null;
  /** Raw-data CSV; replaces `sourceDir` for the typed namespace. */
  sourceCsv?: string | null;
  targetDir: string;
  namespaces: Namespace[];
  policy: ConflictPolicy;
  strategy?: LayoutStrategy | null;
  includeUnchanged?: boolean;
  today: string;
  csvOut?: string | null;
  check?: boolean;
}

export interface NamespaceReport {
  namespace: Namespace;
  strategy: LayoutStrategy;
  stats: MergeStats;
  filesWritten: string[];
}

export interface ReconcileReport {
  mode: OperationMode;
  namespaces: NamespaceReport[];
  failures: RunFailure[];
}

interface LoadedSource {
  snapshot: SourceSnapshot;
  failures: RunFailure[];
}

interface PlannedNamespace {
  plan: MergePlan;
  strategy: LayoutStrategy;
  failures: RunFailure[];
}

export function namespaceDir(languageDir: string, namespace: Namespace): string {
  return path.join(languageDir, NAMESPACE_DIRS[namespace]);
}

/** Source side is present when any selected provider has something to read. */
export async function classifySource(options: ReconcileOptions): Promise<DirectoryState> {
  const usesCsv = Boolean(options.sourceCsv) && options.namespaces.includes('typed');
  if (usesCsv && options.sourceCsv && (await fs.pathExists(options.sourceCsv))) {
    return 'present';
  }

  const usesDir = options.namespaces.some((namespace) => namespace === 'flat' || !usesCsv);
  if (usesDir && options.sourceDir) {
    return classifyDirectory(options.sourceDir);
  }
  return 'absent';
}

async function loadSource(options: ReconcileOptions, namespace: Namespace): Promise<LoadedSource> {
  if (namespace === 'typed' && options.sourceCsv) {
    return { snapshot: await readSourceCsv(options.sourceCsv), failures: [] };
  }

  if (!options.sourceDir) {
    throw new ConfigurationError('', `no source tree given for the ${namespace} namespace`);
  }
  return readReferenceSnapshot(namespace, options.sourceDir);
}

function placeEntries(
  namespace: Namespace,
  entries: MergedEntry[],
  strategy: LayoutStrategy,
  routeAll: boolean
): MergedEntry[] {
  return entries.map((entry) =>
    routeAll || entry.action === 'added'
      ? { ...entry, originFile: routeEntry(namespace, entry, strategy) }
      : entry
  );
}

async function planNamespace(
  options: ReconcileOptions,
  mode: OperationMode,
  source: LoadedSource
): Promise<PlannedNamespace> {
  const { namespace, origin, entries: sources } = source.snapshot;
  const strategy = options.strategy ?? defaultStrategy(origin);
  validateStrategy(namespace, strategy, origin);

  if (mode === 'new') {
    const plan = freshEntries(namespace, sources);
    plan.entries = placeEntries(namespace, plan.entries, strategy, true);
    return { plan, strategy, failures: [] };
  }

  if (mode === 'rebuild') {
    const plan = planMerge(namespace, sources, [], { includeUnchanged: false, today: options.today });
    plan.entries = placeEntries(namespace, plan.entries, strategy, true);
    return { plan, strategy, failures: [] };
  }

  const tree = await loadResourceTree(namespace, namespaceDir(options.targetDir, namespace));
  const plan = planMerge(namespace, sources, tree.entries, {
    includeUnchanged: mode === 'merge' && Boolean(options.includeUnchanged),
    today: options.today,
    listKeys: tree.listKeys
  });
  if (mode === 'incremental') {
    // Updated entries stay as they are on disk.
    plan.entries = plan.entries.filter((entry) => entry.action === 'added');
    plan.stats = {
      ...plan.stats,
      unchanged: plan.stats.unchanged + plan.stats.updated,
      updated: 0
    };
  }
  plan.entries = placeEntries(namespace, plan.entries, strategy, false);
  return { plan, strategy, failures: tree.failures };
}

/**
 * One reconciliation run. Every plan is complete before the first write, so a
 * configuration problem leaves the target tree untouched.
 */
export async function runReconciliation(options: ReconcileOptions): Promise<ReconcileReport> {
  if (options.namespaces.length === 0) {
    throw new ConfigurationError('', 'no namespace selected');
  }

  const [sourceState, targetState] = await Promise.all([
    classifySource(options),
    classifyDirectory(options.targetDir)
  ]);
  const mode = selectMode({
    source: sourceState,
    target: targetState,
    policy: options.policy,
    sourcePath: options.sourceCsv ?? options.sourceDir ?? '',
    targetPath: options.targetDir
  });

  const sources = await Promise.all(
    options.namespaces.map((namespace) => loadSource(options, namespace))
  );

  const typed = sources.find((source) => source.snapshot.namespace === 'typed');
  const flat = sources.find((source) => source.snapshot.namespace === 'flat');
  if (typed && flat) {
    assertNoCrossNamespaceConflicts(typed.snapshot.entries, flat.snapshot.entries);
  }

  const planned = await Promise.all(sources.map((source) => planNamespace(options, mode, source)));

  const check = Boolean(options.check);
  if (mode === 'rebuild' && !check) {
    await Promise.all(
      options.namespaces.map((namespace) => fs.remove(namespaceDir(options.targetDir, namespace)))
    );
  }

  const failures: RunFailure[] = sources.flatMap((source) => source.failures);
  const reports: NamespaceReport[] = [];

  for (const item of planned) {
    failures.push(...item.failures, ...item.plan.rejected);
    const outcome = await writeResourceFiles(
      namespaceDir(options.targetDir, item.plan.namespace),
      groupByFile(item.plan.entries),
      { check, fresh: mode === 'rebuild' }
    );
    failures.push(...outcome.failures);
    reports.push({
      namespace: item.plan.namespace,
      strategy: item.strategy,
      stats: item.plan.stats,
      filesWritten: outcome.files
    });
  }

  if (options.csvOut) {
    const entries = planned.flatMap((item) => item.plan.entries);
    await writeTextFile(options.csvOut, mergedEntriesToCsv(entries), { check });
  }

  return { mode, namespaces: reports, failures };
}
