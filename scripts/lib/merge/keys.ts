import type { Namespace } from './types.js';

export const TYPE_SEPARATOR = '/';

const ELEMENT_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*(?:\.[A-Za-z0-9_-]+)*$/;

export type KeyCheck =
  | { ok: true; key: string; defType?: string }
  | { ok: false; reason: string };

/**
 * Validates a key for its namespace. Typed keys may carry one leading
 * `DefType/` prefix, which is stripped and returned as `defType`.
 */
export function normalizeKey(namespace: Namespace, rawKey: string): KeyCheck {
  const trimmed = rawKey.trim();
  if (!trimmed) {
    return { ok: false, reason: 'key is empty' };
  }

  let key = trimmed;
  let defType: string | undefined;

  if (trimmed.includes(TYPE_SEPARATOR)) {
    if (namespace === 'flat') {
      return { ok: false, reason: `key '${trimmed}' must not contain '${TYPE_SEPARATOR}'` };
    }

    const parts = trimmed.split(TYPE_SEPARATOR);
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      return {
        ok: false,
        reason: `key '${trimmed}' must have the form 'DefType${TYPE_SEPARATOR}defName.field'`
      };
    }

    defType = parts[0];
    key = parts[1];
  }

  if (!ELEMENT_KEY_PATTERN.test(key)) {
    return { ok: false, reason: `key '${trimmed}' is not a valid element name` };
  }

  return defType ? { ok: true, key, defType } : { ok: true, key };
}

export function fieldOf(key: string): string {
  const index = key.lastIndexOf('.');
  return index === -1 ? key : key.slice(index + 1);
}

export function typedTag(defType: string | undefined, key: string): string {
  const field = fieldOf(key);
  return defType ? `${defType}.${field}` : field;
}

/**
 * Tag of a typed source entry. A tag that already names its type is kept;
 * otherwise the type from the key prefix is filled in.
 */
export function resolveSourceTag(
  namespace: Namespace,
  tag: string,
  key: string,
  defType?: string
): string {
  if (namespace === 'flat') {
    return tag.trim() || key;
  }

  const trimmed = tag.trim();
  if (trimmed.includes('.')) {
    return trimmed;
  }
  if (!defType) {
    return trimmed || fieldOf(key);
  }
  return `${defType}.${trimmed || fieldOf(key)}`;
}

/** Type discriminant carried by a typed tag, or '' when the tag names none. */
export function typeDiscriminant(tag: string): string {
  const index = tag.indexOf('.');
  return index <= 0 ? '' : tag.slice(0, index);
}
