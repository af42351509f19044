/**
 * Markdown node tree: the intermediate form between text and values.
 * Labels and text are kept exactly as written on the wire (still escaped).
 */

export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

/** `[label](uri)`: a primitive value or the marker item of a composite. */
export interface LinkNode {
  kind: 'link';
  label: string;
  uri: string;
  position?: SourcePosition;
}

/** Untyped literal text. */
export interface TextNode {
  kind: 'text';
  text: string;
  position?: SourcePosition;
}

/** An ordered (`0.`) or unordered (`*`) list; item order is significant. */
export interface ListNode {
  kind: 'list';
  ordered: boolean;
  items: MdNode[];
  position?: SourcePosition;
}

export type MdNode = LinkNode | TextNode | ListNode;

export function linkNode(label: string, uri: string, position?: SourcePosition): LinkNode {
  return position ? { kind: 'link', label, uri, position } : { kind: 'link', label, uri };
}

export function textNode(text: string, position?: SourcePosition): TextNode {
  return position ? { kind: 'text', text, position } : { kind: 'text', text };
}

export function listNode(ordered: boolean, items: MdNode[] = [], position?: SourcePosition): ListNode {
  return position ? { kind: 'list', ordered, items, position } : { kind: 'list', ordered, items };
}

export function isLinkNode(node: MdNode): node is LinkNode {
  return node.kind === 'link';
}

export function isTextNode(node: MdNode): node is TextNode {
  return node.kind === 'text';
}

export function isListNode(node: MdNode): node is ListNode {
  return node.kind === 'list';
}
