import { addedHistoryNote, updatedHistoryNote } from './annotations.js';
import { ConfigurationError } from './errors.js';
import { normalizeKey, resolveSourceTag } from './keys.js';
import type {
  MergePlan,
  MergeStats,
  MergedEntry,
  Namespace,
  RunFailure,
  SourceEntry,
  TargetEntry
} from './types.js';

export interface PlanOptions {
  includeUnchanged: boolean;
  /** Date stamped into history notes, `YYYY-MM-DD`. */
  today: string;
  /** List-valued target keys and their files; a text entry cannot be added over one. */
  listKeys?: ReadonlyMap<string, string>;
}

interface AcceptedSources {
  entries: Map<string, SourceEntry>;
  rejected: RunFailure[];
}

function emptyStats(): MergeStats {
  return { sources: 0, targets: 0, unchanged: 0, updated: 0, added: 0, rejected: 0 };
}

function acceptSources(namespace: Namespace, sources: SourceEntry[]): AcceptedSources {
  const entries = new Map<string, SourceEntry>();
  const rejected: RunFailure[] = [];

  for (const source of sources) {
    const check = normalizeKey(namespace, source.key);
    if (!check.ok) {
      rejected.push({ path: source.originFile, reason: check.reason });
      continue;
    }

    const existing = entries.get(check.key);
    if (existing) {
      throw new ConfigurationError(
        source.originFile,
        `duplicate ${namespace} source key '${check.key}' (first seen in ${existing.originFile})`
      );
    }

    entries.set(check.key, {
      key: check.key,
      text: source.text,
      tag: resolveSourceTag(namespace, source.tag, check.key, check.defType),
      originFile: source.originFile
    });
  }

  return { entries, rejected };
}

function indexTargets(namespace: Namespace, targets: TargetEntry[]): Map<string, TargetEntry> {
  const index = new Map<string, TargetEntry>();
  for (const target of targets) {
    const existing = index.get(target.key);
    if (existing) {
      throw new ConfigurationError(
        target.originFile,
        `duplicate ${namespace} target key '${target.key}' (first seen in ${existing.originFile})`
      );
    }
    index.set(target.key, target);
  }
  return index;
}

function addedEntry(source: SourceEntry, historyNote?: string): MergedEntry {
  const entry: MergedEntry = {
    key: source.key,
    translatedText: source.text,
    tag: source.tag,
    originFile: source.originFile,
    sourceSnapshot: source.text,
    action: 'added'
  };
  if (historyNote !== undefined) {
    entry.historyNote = historyNote;
  }
  return entry;
}

/**
 * Three-way reconciliation of one namespace. Keys only in the target pass
 * through as unchanged; nothing is ever deleted.
 */
export function planMerge(
  namespace: Namespace,
  sources: SourceEntry[],
  targets: TargetEntry[],
  options: PlanOptions
): MergePlan {
  const accepted = acceptSources(namespace, sources);
  const targetIndex = indexTargets(namespace, targets);
  const stats = emptyStats();
  stats.sources = accepted.entries.size;
  stats.targets = targetIndex.size;
  stats.rejected = accepted.rejected.length;

  const entries: MergedEntry[] = [];
  const rejected = [...accepted.rejected];
  const keep = (entry: MergedEntry): void => {
    stats[entry.action] += 1;
    if (entry.action !== 'unchanged' || options.includeUnchanged) {
      entries.push(entry);
    }
  };

  for (const source of accepted.entries.values()) {
    const target = targetIndex.get(source.key);

    if (!target) {
      const listFile = options.listKeys?.get(source.key);
      if (listFile !== undefined) {
        rejected.push({
          path: listFile,
          reason: `key '${source.key}' is a list element in the target; its text entry was not added`
        });
        stats.rejected += 1;
        continue;
      }
      keep(addedEntry(source, addedHistoryNote(source.text, options.today)));
      continue;
    }

    if (source.text === target.sourceSnapshot) {
      keep({ ...target, action: 'unchanged' });
      continue;
    }

    keep({
      key: target.key,
      translatedText: target.translatedText,
      tag: source.tag,
      originFile: target.originFile,
      sourceSnapshot: source.text,
      historyNote: updatedHistoryNote(
        target.translatedText,
        target.sourceSnapshot,
        source.text,
        options.today
      ),
      action: 'updated'
    });
  }

  for (const target of targetIndex.values()) {
    if (!accepted.entries.has(target.key)) {
      keep({ ...target, action: 'unchanged' });
    }
  }

  return { namespace, entries, rejected, stats };
}

/** Entries for a target tree that does not exist yet: every key added, no history. */
export function freshEntries(namespace: Namespace, sources: SourceEntry[]): MergePlan {
  const accepted = acceptSources(namespace, sources);
  const entries = Array.from(accepted.entries.values(), (source) => addedEntry(source));

  const stats = emptyStats();
  stats.sources = entries.length;
  stats.added = entries.length;
  stats.rejected = accepted.rejected.length;

  return { namespace, entries, rejected: accepted.rejected, stats };
}

export function assertNoCrossNamespaceConflicts(
  typed: SourceEntry[],
  flat: SourceEntry[]
): void {
  const typedText = new Map<string, SourceEntry>();
  for (const entry of typed) {
    const check = normalizeKey('typed', entry.key);
    if (check.ok && !typedText.has(check.key)) {
      typedText.set(check.key, entry);
    }
  }

  for (const entry of flat) {
    const check = normalizeKey('flat', entry.key);
    if (!check.ok) {
      continue;
    }
    const other = typedText.get(check.key);
    if (other && other.text !== entry.text) {
      throw new ConfigurationError(
        entry.originFile,
        `key '${check.key}' has different text in typed (${other.originFile}) and flat sources`
      );
    }
  }
}
