/**
 * Builds the node tree from scanner tokens. Nesting is tracked on an explicit
 * stack of open lists, so document depth is bounded only by `maxDepth`.
 */

import { linkNode, listNode, textNode, type ListNode, type MdNode, type SourcePosition } from './ast.js';
import { DepthExceededError, GrammarError, IndentationError } from './errors.js';
import {
  DEFAULT_INDENT_WIDTH,
  TokenKind,
  scan,
  type ContentToken,
  type ItemToken,
  type Token,
} from './lexer.js';

export interface ParseDocumentOptions {
  /** Max list nesting depth (default 256) */
  maxDepth?: number;
  /** Max input length in characters. Passed to the scanner. */
  maxInputLength?: number;
  /** Spaces per nesting level (default 4) */
  indentWidth?: number;
}

/** Nesting limit shared by the parser, decoder, encoder and JSON bridge. */
export const DEFAULT_MAX_DEPTH = 256;

interface Line {
  item?: ItemToken;
  content?: ContentToken;
  indent: number;
  start: SourcePosition;
}

interface OpenList {
  list: ListNode;
  level: number;
}

/** Groups the token stream into one record per non-blank line. */
function* lines(tokens: Iterable<Token>): Generator<Line, void, undefined> {
  let current: Line | undefined;
  for (const token of tokens) {
    switch (token.kind) {
      case TokenKind.Blank:
        if (current) yield current;
        current = undefined;
        break;
      case TokenKind.OrderedItem:
      case TokenKind.UnorderedItem:
        if (current) yield current;
        current = { item: token, indent: token.indent, start: token.start };
        break;
      case TokenKind.Link:
      case TokenKind.PlainText:
        if (current?.item && current.item.start.line === token.start.line) {
          current.content = token;
          yield current;
        } else {
          if (current) yield current;
          yield { content: token, indent: token.indent, start: token.start };
        }
        current = undefined;
        break;
    }
  }
  if (current) yield current;
}

function contentNode(token: ContentToken): MdNode {
  return token.kind === TokenKind.Link
    ? linkNode(token.label, token.uri, token.start)
    : textNode(token.text, token.start);
}

/**
 * Parse a document into its root node: a bare link, a bare text line, or a
 * list starting at indentation 0.
 */
export function parseDocument(text: string, options: ParseDocumentOptions = {}): MdNode {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const unit = options.indentWidth ?? DEFAULT_INDENT_WIDTH;
  if (!Number.isInteger(unit) || unit < 1) {
    throw new RangeError(`indentWidth must be a positive integer, got ${unit}`);
  }
  const source = lines(scan(text, { maxInputLength: options.maxInputLength }));

  const first = source.next();
  if (first.done) throw new GrammarError('Empty document', { position: { line: 1, column: 1, offset: 0 } });
  const head = first.value;
  if (head.indent !== 0) {
    throw new IndentationError('Document must start at indentation 0', { position: head.start });
  }

  if (!head.item) {
    if (!head.content) throw new GrammarError('Empty document', { position: head.start });
    const root = contentNode(head.content);
    const extra = source.next();
    if (!extra.done) {
      throw new GrammarError('Unexpected content after root value', { position: extra.value.start });
    }
    return root;
  }

  const rootList = listNode(head.item.kind === TokenKind.OrderedItem, [], head.start);
  const stack: OpenList[] = [{ list: rootList, level: 0 }];
  // An empty item waits for the list nested under it.
  let awaiting: { parent: OpenList; start: SourcePosition } | undefined;

  for (let step: IteratorResult<Line, void> = { done: false, value: head }; !step.done; step = source.next()) {
    const line = step.value;
    if (line.indent % unit !== 0) {
      throw new IndentationError(`Indentation must be a multiple of ${unit} spaces`, {
        position: line.start,
      });
    }
    if (!line.item) {
      throw new GrammarError('Expected a list item', { position: line.start });
    }
    const ordered = line.item.kind === TokenKind.OrderedItem;
    const level = line.indent / unit;

    if (awaiting) {
      if (level <= awaiting.parent.level) {
        throw new GrammarError('Empty list item must own a nested list', { position: awaiting.start });
      }
      if (level !== awaiting.parent.level + 1) {
        throw new IndentationError(`Nested list must be indented by exactly ${unit} spaces`, {
          position: line.start,
        });
      }
      if (stack.length >= maxDepth) {
        throw new DepthExceededError(`Maximum nesting depth exceeded (${maxDepth})`, {
          position: line.start,
        });
      }
      const nested = listNode(ordered, [], line.start);
      awaiting.parent.list.items.push(nested);
      stack.push({ list: nested, level });
      awaiting = undefined;
    } else {
      let open = stack[stack.length - 1];
      if (open && level > open.level) {
        throw new IndentationError('Unexpected indentation; only an empty item may own a nested list', {
          position: line.start,
        });
      }
      while (open && level < open.level) {
        stack.pop();
        open = stack[stack.length - 1];
      }
      if (open && open.list.ordered !== ordered) {
        throw new GrammarError('List mixes ordered and unordered items', { position: line.start });
      }
    }

    const top = stack[stack.length - 1];
    if (!top) throw new GrammarError('Unexpected content after root value', { position: line.start });
    if (line.content) {
      top.list.items.push(contentNode(line.content));
    } else {
      awaiting = { parent: top, start: line.start };
    }
  }

  if (awaiting) {
    throw new GrammarError('Empty list item must own a nested list', { position: awaiting.start });
  }
  return rootList;
}
