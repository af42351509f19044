/**
 * Line scanner for the Markdown subset. Every line yields a Blank token, or an
 * optional list-marker token followed by an optional content token.
 */

import type { SourcePosition } from './ast.js';
import { findUnescaped } from './escape.js';
import { GrammarError, IndentationError } from './errors.js';

export enum TokenKind {
  OrderedItem = 'OrderedItem',
  UnorderedItem = 'UnorderedItem',
  Link = 'Link',
  PlainText = 'PlainText',
  Blank = 'Blank',
}

interface TokenBase {
  /** Leading spaces of the line the token sits on. */
  indent: number;
  start: SourcePosition;
}

export interface OrderedItemToken extends TokenBase {
  kind: TokenKind.OrderedItem;
}

export interface UnorderedItemToken extends TokenBase {
  kind: TokenKind.UnorderedItem;
}

export interface LinkToken extends TokenBase {
  kind: TokenKind.Link;
  label: string;
  uri: string;
}

export interface PlainTextToken extends TokenBase {
  kind: TokenKind.PlainText;
  text: string;
}

export interface BlankToken extends TokenBase {
  kind: TokenKind.Blank;
}

export type Token = OrderedItemToken | UnorderedItemToken | LinkToken | PlainTextToken | BlankToken;

export type ItemToken = OrderedItemToken | UnorderedItemToken;
export type ContentToken = LinkToken | PlainTextToken;

export interface LexerOptions {
  /** Max input length in characters (default 10_000_000) */
  maxInputLength?: number;
}

export const DEFAULT_MAX_INPUT_LENGTH = 10_000_000;
/** Spaces per list nesting level. */
export const DEFAULT_INDENT_WIDTH = 4;

const ORDERED_MARKER = /^[0-9]{1,9}\.(?= |$)/;
const UNORDERED_MARKER = /^\*(?= |$)/;
const OTHER_BULLET = /^[-+](?= |$)/;
const PAREN_MARKER = /^[0-9]{1,9}\)(?= |$)/;

function pos(line: number, column: number, offset: number): SourcePosition {
  return { line, column, offset };
}

/** Rejects block constructs the grammar does not carry. */
function checkBlockSyntax(content: string, fail: (message: string) => never): void {
  if (/^#{1,6}(?: |$)/.test(content)) fail('Headings are not supported');
  if (content.startsWith('```') || content.startsWith('~~~')) fail('Code fences are not supported');
  if (content.startsWith('>')) fail('Block quotes are not supported');
  if (content.startsWith('|')) fail('Tables are not supported');
  if (content.startsWith('![')) fail('Images are not supported');
  if (/^(?:-{3,}|_{3,}|={3,})$/.test(content)) fail('Thematic breaks and setext headings are not supported');
}

/**
 * Lazily scan `input` into line tokens. Indentation alignment against the
 * enclosing list is checked by the parser; only tabs are rejected here.
 */
export function* scan(input: string, options: LexerOptions = {}): Generator<Token, void, undefined> {
  const maxLen = options.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH;
  if (input.length > maxLen) {
    throw new GrammarError(`Input exceeds maximum length (${input.length} > ${maxLen})`, {
      position: pos(1, 1, 0),
    });
  }

  let offset = 0;
  let lineNo = 0;
  while (offset <= input.length) {
    lineNo++;
    const newline = input.indexOf('\n', offset);
    const lineEnd = newline === -1 ? input.length : newline;
    let text = input.slice(offset, lineEnd);
    if (text.endsWith('\r')) text = text.slice(0, -1);
    const lineOffset = offset;
    offset = lineEnd + 1;
    if (newline === -1 && text === '') break;

    const at = (column: number): SourcePosition => pos(lineNo, column + 1, lineOffset + column);
    let column = 0;
    const fail = (message: string): never => {
      throw new GrammarError(message, { position: at(column) });
    };

    while (text.charAt(column) === ' ') column++;
    const indent = column;
    if (text.slice(column).trim() === '') {
      yield { kind: TokenKind.Blank, indent, start: at(0) };
      continue;
    }
    if (text.charAt(column) === '\t') {
      throw new IndentationError('Tabs are not allowed in indentation', { position: at(column) });
    }

    let rest = text.slice(column);
    const ordered = ORDERED_MARKER.exec(rest);
    const unordered = UNORDERED_MARKER.exec(rest);
    if (ordered) {
      yield { kind: TokenKind.OrderedItem, indent, start: at(column) };
      column += ordered[0].length;
    } else if (unordered) {
      yield { kind: TokenKind.UnorderedItem, indent, start: at(column) };
      column += unordered[0].length;
    } else if (OTHER_BULLET.test(rest)) {
      fail('Only "*" bullets are supported in unordered lists');
    } else if (PAREN_MARKER.test(rest)) {
      fail('Only "N." markers are supported in ordered lists');
    }

    while (text.charAt(column) === ' ' || text.charAt(column) === '\t') column++;
    rest = text.slice(column).replace(/[ \t]+$/, '');
    if (rest === '') continue;

    checkBlockSyntax(rest, fail);
    if (rest.startsWith('[')) {
      yield readLink(rest, indent, at(column), (message, delta) => {
        column += delta;
        return fail(message);
      });
    } else {
      const markup = findUnescaped(rest, '*_`[]<');
      if (markup !== -1) {
        column += markup;
        fail(`Unsupported inline markup ${JSON.stringify(rest.charAt(markup))} in text`);
      }
      yield { kind: TokenKind.PlainText, indent, text: rest, start: at(column) };
    }
  }
}

function readLink(
  content: string,
  indent: number,
  start: SourcePosition,
  fail: (message: string, delta: number) => never
): LinkToken {
  const close = findUnescaped(content, '[]', 1);
  if (close === -1) fail('Unterminated link label', 0);
  if (content.charAt(close) === '[') fail('Nested brackets in link label', close);
  const label = content.slice(1, close);
  const markup = findUnescaped(label, '*`<');
  if (markup !== -1) {
    fail(`Unsupported inline markup ${JSON.stringify(label.charAt(markup))} in link label`, markup + 1);
  }

  const open = close + 1;
  if (content.charAt(open) === '[') fail('Reference links are not supported', open);
  if (content.charAt(open) !== '(') fail('Expected "(" after link label', open);
  const end = content.indexOf(')', open);
  if (end === -1) fail('Unterminated link destination', open);
  const uri = content.slice(open + 1, end);
  const bad = uri.search(/[\s(<>]/);
  if (bad !== -1) fail('Invalid character in link destination', open + 1 + bad);
  if (end !== content.length - 1) fail('Unexpected text after link', end + 1);

  return { kind: TokenKind.Link, indent, label, uri, start };
}

/** Scan the whole input eagerly. */
export function tokenize(input: string, options: LexerOptions = {}): Token[] {
  return [...scan(input, options)];
}
