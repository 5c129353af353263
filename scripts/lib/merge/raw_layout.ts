import { ParseError } from './errors.js';

export type RawNode =
  | {
      kind: 'element';
      start: number;
      end: number;
      name: string;
      /** Range between the start and end tags; null for `<Key/>`. */
      content: { start: number; end: number } | null;
      nested: boolean;
    }
  | { kind: 'comment'; start: number; end: number; data: string }
  | { kind: 'text'; start: number; end: number; data: string }
  | { kind: 'other'; start: number; end: number };

/** Offsets of the root element and its direct children in the raw file text. */
export interface ResourceLayout {
  rootName: string;
  rootStart: number;
  rootOpenEnd: number;
  /** Offset of the root end tag; null when the root is written self-closing. */
  rootCloseStart: number | null;
  children: RawNode[];
  lineEnding: '\n' | '\r\n';
  indent: string;
}

type MarkupKind = 'comment' | 'cdata' | 'pi' | 'doctype' | 'open' | 'close' | 'empty';

interface Markup {
  kind: MarkupKind;
  end: number;
  name: string;
}

const TAG_NAME_PATTERN = /^<\/?([^\s/>]+)/;
const DEFAULT_INDENT = '  ';

function skipPast(raw: string, from: number, terminator: string, filePath: string): number {
  const index = raw.indexOf(terminator, from);
  if (index < 0) {
    throw new ParseError(filePath, `unterminated markup at offset ${from}`);
  }
  return index + terminator.length;
}

function tagEnd(raw: string, from: number, filePath: string): number {
  let quote: string | null = null;
  for (let index = from; index < raw.length; index += 1) {
    const char = raw[index];
    if (quote) {
      if (char === quote) {
        quote = null;
      }
    } else if (char === '"' || char === "'") {
      quote = char;
    } else if (char === '>') {
      return index + 1;
    }
  }
  throw new ParseError(filePath, `unterminated tag at offset ${from - 1}`);
}

function readMarkup(raw: string, at: number, filePath: string): Markup {
  if (raw.startsWith('<!--', at)) {
    return { kind: 'comment', end: skipPast(raw, at + 4, '-->', filePath), name: '' };
  }
  if (raw.startsWith('<![CDATA[', at)) {
    return { kind: 'cdata', end: skipPast(raw, at + 9, ']]>', filePath), name: '' };
  }
  if (raw.startsWith('<?', at)) {
    return { kind: 'pi', end: skipPast(raw, at + 2, '?>', filePath), name: '' };
  }
  if (raw.startsWith('<!', at)) {
    const subset = raw.indexOf('[', at);
    const close = raw.indexOf('>', at);
    if (subset >= 0 && subset < close) {
      const subsetEnd = skipPast(raw, subset, ']', filePath);
      return { kind: 'doctype', end: skipPast(raw, subsetEnd, '>', filePath), name: '' };
    }
    return { kind: 'doctype', end: skipPast(raw, at + 2, '>', filePath), name: '' };
  }

  const end = tagEnd(raw, at + 1, filePath);
  const name = TAG_NAME_PATTERN.exec(raw.slice(at, end))?.[1] ?? '';
  if (raw[at + 1] === '/') {
    return { kind: 'close', end, name };
  }
  return { kind: raw[end - 2] === '/' ? 'empty' : 'open', end, name };
}

export function isBlank(node: RawNode | undefined): boolean {
  return node?.kind === 'text' && node.data.trim() === '';
}

function detectIndent(children: RawNode[]): string {
  for (const node of children) {
    if (node.kind === 'text' && isBlank(node) && node.data.includes('\n')) {
      const indent = node.data.slice(node.data.lastIndexOf('\n') + 1);
      if (indent) {
        return indent;
      }
    }
  }
  return DEFAULT_INDENT;
}

function findRoot(raw: string, filePath: string): { markup: Markup; start: number } {
  let index = 0;
  for (;;) {
    const at = raw.indexOf('<', index);
    if (at < 0) {
      throw new ParseError(filePath, 'has no root element');
    }
    const markup = readMarkup(raw, at, filePath);
    if (markup.kind === 'open' || markup.kind === 'empty') {
      return { markup, start: at };
    }
    index = markup.end;
  }
}

/**
 * Scans a document that already parsed as XML and records where the root's
 * direct children sit, so edits can be spliced into the original text.
 */
export function scanResourceLayout(raw: string, filePath: string): ResourceLayout {
  const lineEnding: ResourceLayout['lineEnding'] = raw.includes('\r\n') ? '\r\n' : '\n';
  const { markup: root, start: rootStart } = findRoot(raw, filePath);
  let index = root.end;

  const base = { rootName: root.name, rootStart, rootOpenEnd: root.end, lineEnding };
  if (root.kind === 'empty') {
    return { ...base, rootCloseStart: null, children: [], indent: DEFAULT_INDENT };
  }

  const children: RawNode[] = [];
  let depth = 0;
  let open: { start: number; name: string; contentStart: number; nested: boolean } | null = null;

  for (;;) {
    const at = raw.indexOf('<', index);
    if (at < 0) {
      throw new ParseError(filePath, `<${root.name}> is never closed`);
    }
    if (depth === 0 && at > index) {
      children.push({ kind: 'text', start: index, end: at, data: raw.slice(index, at) });
    }

    const markup = readMarkup(raw, at, filePath);
    index = markup.end;

    if (open) {
      if (markup.kind === 'open') {
        depth += 1;
        open.nested = true;
      } else if (markup.kind === 'empty') {
        open.nested = true;
      } else if (markup.kind === 'close') {
        depth -= 1;
        if (depth === 0) {
          children.push({
            kind: 'element',
            start: open.start,
            end: markup.end,
            name: open.name,
            content: { start: open.contentStart, end: at },
            nested: open.nested
          });
          open = null;
        }
      }
      continue;
    }

    switch (markup.kind) {
      case 'close':
        return { ...base, rootCloseStart: at, children, indent: detectIndent(children) };
      case 'open':
        depth = 1;
        open = { start: at, name: markup.name, contentStart: markup.end, nested: false };
        break;
      case 'empty':
        children.push({
          kind: 'element',
          start: at,
          end: markup.end,
          name: markup.name,
          content: null,
          nested: false
        });
        break;
      case 'comment':
        children.push({ kind: 'comment', start: at, end: markup.end, data: raw.slice(at + 4, markup.end - 3) });
        break;
      default:
        children.push({ kind: 'other', start: at, end: markup.end });
    }
  }
}
