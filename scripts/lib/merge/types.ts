export const NAMESPACES = ['typed', 'flat'] as const;

export type Namespace = (typeof NAMESPACES)[number];

export const NAMESPACE_DIRS: Record<Namespace, string> = {
  typed: 'DefInjected',
  flat: 'Keyed'
};

export const NAMESPACE_SELECTIONS = ['typed', 'flat', 'both'] as const;

export type NamespaceSelection = (typeof NAMESPACE_SELECTIONS)[number];

export const MERGE_ACTIONS = ['unchanged', 'updated', 'added'] as const;

export type MergeAction = (typeof MERGE_ACTIONS)[number];

export const CONFLICT_POLICIES = ['new', 'merge', 'incremental', 'rebuild'] as const;

export type ConflictPolicy = (typeof CONFLICT_POLICIES)[number];

export type OperationMode = ConflictPolicy;

export const LAYOUT_STRATEGIES = ['mirror-reference', 'group-by-type', 'mirror-source'] as const;

export type LayoutStrategy = (typeof LAYOUT_STRATEGIES)[number];

/** Where a source snapshot was read from: the source-language tree, or a raw-data export. */
export type SnapshotOrigin = 'reference' | 'raw';

export type DirectoryState = 'absent' | 'present';

export interface SourceEntry {
  key: string;
  text: string;
  tag: string;
  originFile: string;
}

export interface SourceSnapshot {
  namespace: Namespace;
  origin: SnapshotOrigin;
  entries: SourceEntry[];
}

export interface TargetEntry {
  key: string;
  translatedText: string;
  tag: string;
  /** File the entry lives in, relative to the namespace directory. */
  originFile: string;
  /** Source text the translation was last validated against; '' when never recorded. */
  sourceSnapshot: string;
  historyNote?: string;
}

export interface MergedEntry extends TargetEntry {
  action: MergeAction;
}

export interface RunFailure {
  path: string;
  reason: string;
}

export interface MergeStats {
  sources: number;
  targets: number;
  unchanged: number;
  updated: number;
  added: number;
  rejected: number;
}

export interface MergePlan {
  namespace: Namespace;
  entries: MergedEntry[];
  rejected: RunFailure[];
  stats: MergeStats;
}

export function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  const candidates: readonly string[] = values;
  return candidates.includes(value);
}

export function namespacesFor(selection: NamespaceSelection): Namespace[] {
  if (selection === 'both') {
    return [...NAMESPACES];
  }
  return [selection];
}
