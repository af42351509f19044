/**
 * Node tree to text. Ordered items are numbered from 0 so that the marker
 * item of a composite reads `0.`.
 */

import { isListNode, type MdNode } from './ast.js';
import { DEFAULT_INDENT_WIDTH } from './lexer.js';

export interface StringifyDocumentOptions {
  /** Spaces per nesting level (default 4) */
  indentWidth?: number;
  /** Newline (default "\n") */
  newline?: string;
}

function writeLeaf(node: MdNode): string {
  switch (node.kind) {
    case 'link':
      return `[${node.label}](${node.uri})`;
    case 'text':
      return node.text;
    case 'list':
      return '';
  }
}

interface Pending {
  node: MdNode;
  level: number;
  bullet: string;
}

/**
 * Serialize a node tree. Labels and text are written as they are; escaping
 * is the encoder's job.
 */
export function stringifyDocument(root: MdNode, options: StringifyDocumentOptions = {}): string {
  const unit = options.indentWidth ?? DEFAULT_INDENT_WIDTH;
  const newline = options.newline ?? '\n';
  if (root.kind !== 'list') return writeLeaf(root) + newline;

  const out: string[] = [];
  const pushItems = (stack: Pending[], items: readonly MdNode[], ordered: boolean, level: number): void => {
    for (let i = items.length - 1; i >= 0; i--) {
      const node = items[i];
      if (node) stack.push({ node, level, bullet: ordered ? `${i}.` : '*' });
    }
  };

  const stack: Pending[] = [];
  pushItems(stack, root.items, root.ordered, 0);
  for (let next = stack.pop(); next !== undefined; next = stack.pop()) {
    const prefix = ' '.repeat(next.level * unit) + next.bullet;
    if (isListNode(next.node)) {
      out.push(prefix);
      pushItems(stack, next.node.items, next.node.ordered, next.level + 1);
    } else {
      out.push(`${prefix} ${writeLeaf(next.node)}`);
    }
  }
  return out.map((line) => line + newline).join('');
}
