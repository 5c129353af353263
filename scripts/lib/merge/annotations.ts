export const SNAPSHOT_MARKER = 'EN:';
export const HISTORY_MARKER = 'HISTORY:';

export type Annotation =
  | { kind: 'snapshot'; text: string }
  | { kind: 'history'; text: string };

const SNAPSHOT_PATTERN = /^\s*EN:\s?([\s\S]*?)\s?$/;
const HISTORY_PATTERN = /^\s*HISTORY:\s?([\s\S]*?)\s?$/;

/**
 * Comment payloads cannot contain `--`. `&#` is escaped first so that the
 * `&#45;` produced for dashes never collides with text that was already there.
 */
export function encodeCommentText(text: string): string {
  return text.replace(/&#/g, '&#38;#').replace(/--/g, '-&#45;');
}

export function decodeCommentText(payload: string): string {
  return payload.replace(/&#(38|45);/g, (_match, code: string) => (code === '38' ? '&' : '-'));
}

export function snapshotCommentData(text: string): string {
  return ` ${SNAPSHOT_MARKER} ${encodeCommentText(text)} `;
}

export function historyCommentData(note: string): string {
  return ` ${HISTORY_MARKER} ${encodeCommentText(note)} `;
}

export function readAnnotation(commentData: string): Annotation | null {
  const history = commentData.match(HISTORY_PATTERN);
  if (history) {
    return { kind: 'history', text: decodeCommentText(history[1]) };
  }

  const snapshot = commentData.match(SNAPSHOT_PATTERN);
  if (snapshot) {
    return { kind: 'snapshot', text: decodeCommentText(snapshot[1]) };
  }

  return null;
}

export function updatedHistoryNote(
  previousText: string,
  previousSnapshot: string,
  newSource: string,
  today: string
): string {
  return `previous translation: '${previousText}'; previous source: '${previousSnapshot}' -> new source: '${newSource}'; updated ${today}`;
}

export function addedHistoryNote(text: string, today: string): string {
  return `added '${text}' on ${today}`;
}
