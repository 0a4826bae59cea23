import he from 'he';
import { ViewerError } from '../lib/errors.js';
import { parsePageHref } from './pageId.js';
import {
  CellFlag,
  COLORS,
  DEFAULT_STYLE,
  type CellStyle,
  type Color,
  type DecodedHeader,
  type DecodedStream,
  type HeaderLink,
  type Token,
} from './types.js';

const PRE_OPEN_PATTERN = /<pre\b/i;
const PRE_CLOSE_PATTERN = /<\/pre\s*>/i;
const TITLE_PATTERN = /<big\b[^>]*>([\s\S]*?)<\/big\s*>/i;
const PARAGRAPH_PATTERN = /<p\b[^>]*>([\s\S]*?)<\/p\s*>/i;
const ANCHOR_PATTERN = /<a\b([^>]*)>([\s\S]*?)<\/a\s*>/gi;
const TAG_NAME_PATTERN = /^\/?\s*([a-zA-Z][a-zA-Z0-9]*)/;
const ATTRIBUTE_PATTERN = /([a-zA-Z_:][-a-zA-Z0-9_:.]*)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/g;
const ANY_TAG_PATTERN = /<[^>]*>/g;
const SUBPAGE_FRACTION_PATTERN = /(?<!\d)(\d{1,4})\s*\/\s*(\d{1,4})(?!\d)/g;
const REFERENCE_PATTERN = /&(?:#([xX])?([0-9a-zA-Z]*)(;?)|([a-zA-Z][a-zA-Z0-9]*)(;?))?/g;
const DECIMAL_PATTERN = /^\d+$/;
const HEX_PATTERN = /^[0-9a-fA-F]+$/;
const NBSP_PATTERN = /\u00a0/g;

const STYLE_TAGS = new Set(['font', 'span', 'b', 'strong', 'blink', 'big']);

const HEX_COLORS: Record<string, Color> = {
  '#000000': 'black',
  '#ff0000': 'red',
  '#00ff00': 'green',
  '#ffff00': 'yellow',
  '#0000ff': 'blue',
  '#ff00ff': 'magenta',
  '#00ffff': 'cyan',
  '#ffffff': 'white',
};

const utf8 = new TextDecoder('utf-8', { fatal: true });

interface MarkupTag {
  name: string;
  closing: boolean;
  attributes: Map<string, string>;
}

interface StyleFrame {
  name: string;
  style: CellStyle;
}

export interface DecodeOptions {
  /** Page number the document was fetched for; anchors to it name subpages. */
  pageNumber?: number;
}

interface DocumentParts {
  prelude: string;
  body: string;
  trailer: string;
}

/**
 * Decodes a teletext page document into body tokens and header fields.
 *
 * The body is the `<pre>` block when the document has one, otherwise the whole
 * document. Tokens keep source order: a style or link token applies to the text
 * that follows it.
 */
export function decodeMarkup(raw: Uint8Array | string, options: DecodeOptions = {}): DecodedStream {
  const source = typeof raw === 'string' ? raw : decodeUtf8(raw);
  const parts = splitDocument(source);
  return {
    header: decodeHeader(parts, options.pageNumber),
    tokens: tokenizeBody(parts.body),
  };
}

/**
 * Resolves character references. An `&` that starts no reference is text, so
 * `AT&T` survives; a numeric reference without digits or `;`, or a known name
 * without `;`, is malformed.
 */
export function decodeEntities(raw: string): string {
  const text = raw.replace(
    REFERENCE_PATTERN,
    (
      match: string,
      hex: string | undefined,
      digits: string | undefined,
      numericEnd: string | undefined,
      name: string | undefined,
      namedEnd: string | undefined,
    ) => {
      if (digits !== undefined) {
        const valid = hex ? HEX_PATTERN.test(digits) : DECIMAL_PATTERN.test(digits);
        if (!valid || numericEnd !== ';') {
          throw new ViewerError('malformed_encoding', `invalid character reference near "${snippet(match)}"`);
        }
        return he.decode(match);
      }
      if (name === undefined) {
        return match;
      }
      if (namedEnd === ';') {
        return he.decode(match);
      }
      if (isKnownEntity(name)) {
        throw new ViewerError('malformed_encoding', `character reference "&${name}" is missing ";"`);
      }
      return match;
    },
  );
  return text.replace(NBSP_PATTERN, ' ');
}

function isKnownEntity(name: string): boolean {
  const reference = `&${name};`;
  return he.decode(reference) !== reference;
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new ViewerError('malformed_encoding', 'page payload is not valid UTF-8', { cause: error });
  }
}

function splitDocument(source: string): DocumentParts {
  const open = PRE_OPEN_PATTERN.exec(source);
  if (!open) {
    return { prelude: '', body: source, trailer: '' };
  }
  const openEnd = source.indexOf('>', open.index);
  if (openEnd === -1) {
    throw new ViewerError('malformed_encoding', 'unterminated <pre> tag');
  }
  const rest = source.slice(openEnd + 1);
  const close = PRE_CLOSE_PATTERN.exec(rest);
  if (!close) {
    throw new ViewerError('malformed_encoding', 'missing </pre> for page body');
  }
  let body = rest.slice(0, close.index);
  // a newline right after <pre> is not content
  if (body.startsWith('\r\n')) {
    body = body.slice(2);
  } else if (body.startsWith('\n') || body.startsWith('\r')) {
    body = body.slice(1);
  }
  return {
    prelude: source.slice(0, open.index),
    body,
    trailer: rest.slice(close.index + close[0].length),
  };
}

function decodeHeader(parts: DocumentParts, pageNumber: number | undefined): DecodedHeader {
  const titleMatch = TITLE_PATTERN.exec(parts.prelude);
  const title = titleMatch ? plainText(titleMatch[1]) : '';

  let subpageCount: number | null = null;
  let sections = collectAnchors(parts.trailer);
  const paragraph = PARAGRAPH_PATTERN.exec(parts.trailer);
  if (paragraph) {
    const anchors = collectAnchors(paragraph[1]);
    subpageCount = readSubpageCount(paragraph[1], anchors, pageNumber);
    if (subpageCount !== null) {
      const rest = collectAnchors(parts.trailer.slice(paragraph.index + paragraph[0].length));
      sections = [...anchors.filter((link) => link.target.number !== pageNumber), ...rest];
    }
  }

  return {
    title: title.length > 0 ? title : null,
    navigation: collectAnchors(parts.prelude),
    subpageCount,
    sections,
  };
}

/**
 * Subpages are named by anchors back to the same page, or by an `n/m` counter.
 * Other numbers in the paragraph (times, section labels) do not count.
 */
function readSubpageCount(fragment: string, anchors: HeaderLink[], pageNumber: number | undefined): number | null {
  let max = 0;
  for (const link of anchors) {
    if (link.target.number === pageNumber) {
      max = Math.max(max, link.target.subpage);
    }
  }
  for (const match of plainText(fragment).matchAll(SUBPAGE_FRACTION_PATTERN)) {
    const current = Number.parseInt(match[1], 10);
    const total = Number.parseInt(match[2], 10);
    if (current >= 1 && current <= total) {
      max = Math.max(max, total);
    }
  }
  return max > 0 ? max : null;
}

function collectAnchors(fragment: string): HeaderLink[] {
  const links: HeaderLink[] = [];
  for (const match of fragment.matchAll(ANCHOR_PATTERN)) {
    const href = readAttributes(match[1]).get('href');
    const target = href ? parsePageHref(href) : null;
    if (!target) {
      continue;
    }
    links.push({ label: plainText(match[2]), target });
  }
  return links;
}

function plainText(fragment: string): string {
  return decodeEntities(fragment.replace(ANY_TAG_PATTERN, '')).trim();
}

function tokenizeBody(body: string): Token[] {
  const tokens: Token[] = [];
  const styles: StyleFrame[] = [];
  const anchors: boolean[] = [];
  let current: CellStyle = DEFAULT_STYLE;
  let pending = '';

  const flushText = () => {
    if (pending.length === 0) {
      return;
    }
    const text = decodeEntities(pending);
    pending = '';
    if (text.length > 0) {
      tokens.push({ type: 'text', text });
    }
  };

  const applyStyle = (next: CellStyle) => {
    if (sameStyle(current, next)) {
      return;
    }
    current = next;
    tokens.push({ type: 'style', style: next });
  };

  const handleTag = (tag: MarkupTag) => {
    if (tag.name === 'br') {
      tokens.push({ type: 'line_break' });
      return;
    }
    if (tag.name === 'a') {
      if (tag.closing) {
        if (anchors.pop()) {
          tokens.push({ type: 'link_end' });
        }
        return;
      }
      const href = tag.attributes.get('href');
      const target = href ? parsePageHref(href) : null;
      anchors.push(target !== null);
      if (target) {
        tokens.push({ type: 'link_start', target });
      }
      return;
    }
    if (!STYLE_TAGS.has(tag.name)) {
      return;
    }
    if (!tag.closing) {
      const next = deriveStyle(current, tag);
      styles.push({ name: tag.name, style: next });
      applyStyle(next);
      return;
    }
    let frameIndex = -1;
    for (let index = styles.length - 1; index >= 0; index -= 1) {
      if (styles[index].name === tag.name) {
        frameIndex = index;
        break;
      }
    }
    if (frameIndex === -1) {
      return;
    }
    styles.splice(frameIndex);
    applyStyle(styles.length > 0 ? styles[styles.length - 1].style : DEFAULT_STYLE);
  };

  let index = 0;
  while (index < body.length) {
    const char = body[index];
    if (char === '<' && startsTag(body, index)) {
      flushText();
      const end = body.indexOf('>', index);
      if (end === -1) {
        throw new ViewerError('malformed_encoding', `unterminated tag near "${snippet(body.slice(index))}"`);
      }
      const tag = readTag(body.slice(index + 1, end));
      if (tag) {
        handleTag(tag);
      }
      index = end + 1;
      continue;
    }
    if (char === '\r' || char === '\n') {
      flushText();
      tokens.push({ type: 'line_break' });
      index += char === '\r' && body[index + 1] === '\n' ? 2 : 1;
      continue;
    }
    pending += char;
    index += 1;
  }
  flushText();
  if (anchors.some(Boolean)) {
    tokens.push({ type: 'link_end' });
  }
  return tokens;
}

function startsTag(source: string, index: number): boolean {
  const next = source[index + 1];
  return next !== undefined && /[a-zA-Z/!?]/.test(next);
}

function readTag(inner: string): MarkupTag | null {
  if (inner.startsWith('!') || inner.startsWith('?')) {
    return null;
  }
  const nameMatch = TAG_NAME_PATTERN.exec(inner);
  if (!nameMatch) {
    return null;
  }
  return {
    name: nameMatch[1].toLowerCase(),
    closing: inner.trimStart().startsWith('/'),
    attributes: readAttributes(inner.slice(nameMatch[0].length)),
  };
}

function readAttributes(source: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of source.matchAll(ATTRIBUTE_PATTERN)) {
    const value = match[2] ?? match[3] ?? match[4] ?? '';
    attributes.set(match[1].toLowerCase(), he.decode(value, { isAttributeValue: true }));
  }
  return attributes;
}

function deriveStyle(base: CellStyle, tag: MarkupTag): CellStyle {
  let { fg, bg, flags } = base;
  switch (tag.name) {
    case 'font': {
      fg = parseColor(tag.attributes.get('color')) ?? fg;
      bg = parseColor(tag.attributes.get('bgcolor')) ?? bg;
      break;
    }
    case 'span': {
      const classes = (tag.attributes.get('class') ?? '').split(/\s+/).filter(Boolean);
      for (const name of classes) {
        if (name.startsWith('fg-')) {
          fg = parseColor(name.slice(3)) ?? fg;
        } else if (name.startsWith('bg-')) {
          bg = parseColor(name.slice(3)) ?? bg;
        } else if (name === 'bold') {
          flags |= CellFlag.Bold;
        } else if (name === 'blink') {
          flags |= CellFlag.Blink;
        } else if (name === 'double-height') {
          flags |= CellFlag.DoubleHeight;
        }
      }
      break;
    }
    case 'b':
    case 'strong':
      flags |= CellFlag.Bold;
      break;
    case 'blink':
      flags |= CellFlag.Blink;
      break;
    case 'big':
      flags |= CellFlag.DoubleHeight;
      break;
    default:
      break;
  }
  return { fg, bg, flags };
}

export function parseColor(value: string | undefined): Color | null {
  if (!value) {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  const named = COLORS.find((color) => color === normalized);
  if (named) {
    return named;
  }
  return HEX_COLORS[normalized] ?? null;
}

function sameStyle(a: CellStyle, b: CellStyle): boolean {
  return a.fg === b.fg && a.bg === b.bg && a.flags === b.flags;
}

function snippet(text: string): string {
  return text.length > 24 ? `${text.slice(0, 24)}…` : text;
}
