import path from 'node:path';

import { ConfigurationError } from './errors.js';
import { typeDiscriminant } from './keys.js';
import type { LayoutStrategy, MergedEntry, Namespace, SnapshotOrigin } from './types.js';

export const FALLBACK_TYPE = 'Misc';

const REQUIRED_ORIGIN: Partial<Record<LayoutStrategy, SnapshotOrigin>> = {
  'mirror-reference': 'reference',
  'mirror-source': 'raw'
};

export function defaultStrategy(origin: SnapshotOrigin): LayoutStrategy {
  return origin === 'reference' ? 'mirror-reference' : 'mirror-source';
}

export function validateStrategy(
  namespace: Namespace,
  strategy: LayoutStrategy,
  origin: SnapshotOrigin
): void {
  if (namespace === 'flat') {
    return;
  }

  const required = REQUIRED_ORIGIN[strategy];
  if (required && required !== origin) {
    throw new ConfigurationError(
      '',
      `strategy '${strategy}' needs a ${required} source snapshot, got ${origin}`
    );
  }
}

/** Rejects paths that would land outside the namespace directory. */
export function assertSafeResourcePath(filePath: string): string {
  const normalized = filePath.replace(/\\/g, '/');
  if (!normalized || normalized.startsWith('/') || /^[A-Za-z]:/.test(normalized)) {
    throw new ConfigurationError(filePath, 'resource path must be relative');
  }

  const collapsed = path.posix.normalize(normalized);
  if (collapsed === '..' || collapsed.startsWith('../') || collapsed.split('/').includes('..')) {
    throw new ConfigurationError(filePath, 'resource path escapes the language tree');
  }

  if (!collapsed.toLowerCase().endsWith('.xml')) {
    throw new ConfigurationError(filePath, 'resource path must end in .xml');
  }

  return collapsed;
}

export function routeEntry(
  namespace: Namespace,
  entry: MergedEntry,
  strategy: LayoutStrategy
): string {
  if (namespace === 'flat' || strategy !== 'group-by-type') {
    return assertSafeResourcePath(entry.originFile);
  }

  const type = typeDiscriminant(entry.tag) || FALLBACK_TYPE;
  return assertSafeResourcePath(`${type}/${type}.xml`);
}
