/**
 * Value to node tree. Work items sit on an explicit stack; each composite
 * creates its list up front and its children append into it in order.
 */

import { linkNode, listNode, type ListNode, type MdNode } from './ast.js';
import { encodeBase64Url, escapeText, hasLoneSurrogate } from './escape.js';
import { ArityError, DepthExceededError, ValueError, type NodePath } from './errors.js';
import { DEFAULT_MAX_DEPTH } from './parser.js';
import { formatTypeUri, markerLabel, type CompositeTag, type TypeTag } from './type-uri.js';
import { integerRange, type Value } from './value.js';

export interface EncodeOptions {
  /** Max value nesting depth (default 256) */
  maxDepth?: number;
}

type Work =
  | { kind: 'value'; value: Value; into: MdNode[]; path: NodePath; depth: number }
  | { kind: 'entry'; key: Value | string; value: Value; into: MdNode[]; path: NodePath; depth: number };

function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  if (Object.is(value, -0)) return '-0';
  return String(value);
}

function leaf(tag: TypeTag, label: string): MdNode {
  return linkNode(label, formatTypeUri(tag));
}

function marked(tag: CompositeTag, ordered: boolean): { list: ListNode; items: MdNode[] } {
  const items: MdNode[] = [linkNode(escapeText(markerLabel(tag) ?? ''), formatTypeUri(tag))];
  return { list: listNode(ordered, items), items };
}

function checkLength(kind: string, declared: number, actual: number, path: NodePath): void {
  if (declared !== actual) {
    throw new ArityError(`${kind} declares ${declared} element${declared === 1 ? '' : 's'}, has ${actual}`, { path });
  }
}

function fieldLabel(name: string, path: NodePath): MdNode {
  if (hasLoneSurrogate(name)) throw new ValueError('Field name contains a lone surrogate', { path });
  return leaf({ kind: 'string' }, escapeText(name));
}

/**
 * Encode a single non-composite value, or return undefined for composites.
 */
function encodeLeaf(value: Value, path: NodePath): MdNode | undefined {
  switch (value.kind) {
    case 'bool':
      return leaf({ kind: 'bool' }, String(value.value));
    case 'integer': {
      const { min, max } = integerRange(value.width, value.signed);
      if (value.value < min || value.value > max) {
        throw new ValueError(
          `${value.value} is out of range for ${value.signed ? 'i' : 'u'}${value.width}`,
          { path }
        );
      }
      return leaf({ kind: 'integer', width: value.width, signed: value.signed }, value.value.toString());
    }
    case 'float': {
      const n = value.width === 32 ? Math.fround(value.value) : value.value;
      return leaf({ kind: 'float', width: value.width }, formatFloat(n));
    }
    case 'char': {
      const chars = [...value.value];
      if (chars.length !== 1 || hasLoneSurrogate(value.value)) {
        throw new ValueError(`Char must be a single Unicode scalar value, got ${JSON.stringify(value.value)}`, {
          path,
        });
      }
      return leaf({ kind: 'char' }, escapeText(value.value));
    }
    case 'string':
      if (hasLoneSurrogate(value.value)) throw new ValueError('String contains a lone surrogate', { path });
      return leaf({ kind: 'string' }, escapeText(value.value));
    case 'bytes':
      return leaf({ kind: 'bytes' }, encodeBase64Url(value.value));
    case 'unit':
      return leaf({ kind: 'unit' }, escapeText('()'));
    case 'option':
      return value.value === null ? leaf({ kind: 'none' }, 'None') : undefined;
    case 'unit_struct': {
      const tag: TypeTag = { kind: 'unit_struct', name: value.name };
      return leaf(tag, escapeText(markerLabel(tag) ?? ''));
    }
    case 'unit_variant': {
      const tag: TypeTag = { kind: 'unit_variant', name: value.name, variant: value.variant };
      return leaf(tag, escapeText(markerLabel(tag) ?? ''));
    }
    default:
      return undefined;
  }
}

/**
 * Encode a value into a node tree. Declared lengths must match the element
 * counts; names must be valid type URI segments.
 */
export function encode(root: Value, options: EncodeOptions = {}): MdNode {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const out: MdNode[] = [];
  const stack: Work[] = [{ kind: 'value', value: root, into: out, path: [], depth: 0 }];

  const pushValues = (values: readonly Value[], into: MdNode[], path: NodePath, depth: number): void => {
    for (let i = values.length - 1; i >= 0; i--) {
      const value = values[i];
      if (value !== undefined) stack.push({ kind: 'value', value, into, path: [...path, i + 1], depth });
    }
  };
  const pushEntries = (
    entries: ReadonlyArray<readonly [Value | string, Value]>,
    into: MdNode[],
    path: NodePath,
    depth: number
  ): void => {
    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      if (entry !== undefined) {
        stack.push({ kind: 'entry', key: entry[0], value: entry[1], into, path: [...path, i + 1], depth });
      }
    }
  };

  for (let work = stack.pop(); work !== undefined; work = stack.pop()) {
    if (work.kind === 'entry') {
      const pair: MdNode[] = [];
      work.into.push(listNode(true, pair));
      stack.push({ kind: 'value', value: work.value, into: pair, path: [...work.path, 1], depth: work.depth });
      if (typeof work.key === 'string') pair.push(fieldLabel(work.key, [...work.path, 0]));
      else stack.push({ kind: 'value', value: work.key, into: pair, path: [...work.path, 0], depth: work.depth });
      continue;
    }

    const { value, into, path, depth } = work;
    const single = encodeLeaf(value, path);
    if (single) {
      into.push(single);
      continue;
    }

    // `depth` composites enclose this one.
    const inner = depth + 1;
    if (inner > maxDepth) {
      throw new DepthExceededError(`Maximum nesting depth exceeded (${maxDepth})`, { path });
    }
    switch (value.kind) {
      case 'option':
      case 'newtype_struct':
      case 'newtype_variant': {
        const tag: CompositeTag =
          value.kind === 'option'
            ? { kind: 'some' }
            : value.kind === 'newtype_struct'
              ? { kind: 'newtype_struct', name: value.name }
              : { kind: 'newtype_variant', name: value.name, variant: value.variant };
        const { list, items } = marked(tag, true);
        into.push(list);
        if (value.value !== null) pushValues([value.value], items, path, inner);
        break;
      }
      case 'seq': {
        if (value.length !== undefined) checkLength('seq', value.length, value.items.length, path);
        const tag: CompositeTag = value.length === undefined ? { kind: 'seq' } : { kind: 'seq', length: value.length };
        const { list, items } = marked(tag, true);
        into.push(list);
        pushValues(value.items, items, path, inner);
        break;
      }
      case 'tuple':
      case 'tuple_struct':
      case 'tuple_variant': {
        checkLength(value.kind, value.length, value.items.length, path);
        const tag: CompositeTag =
          value.kind === 'tuple'
            ? { kind: 'tuple', length: value.length }
            : value.kind === 'tuple_struct'
              ? { kind: 'tuple_struct', name: value.name, length: value.length }
              : { kind: 'tuple_variant', name: value.name, variant: value.variant, length: value.length };
        const { list, items } = marked(tag, true);
        into.push(list);
        pushValues(value.items, items, path, inner);
        break;
      }
      case 'map': {
        if (value.length !== undefined) checkLength('map', value.length, value.entries.length, path);
        const tag: CompositeTag = value.length === undefined ? { kind: 'map' } : { kind: 'map', length: value.length };
        const { list, items } = marked(tag, false);
        into.push(list);
        pushEntries(value.entries, items, path, inner);
        break;
      }
      case 'struct':
      case 'struct_variant': {
        checkLength(value.kind, value.length, value.fields.length, path);
        const tag: CompositeTag =
          value.kind === 'struct'
            ? { kind: 'struct', name: value.name, length: value.length }
            : { kind: 'struct_variant', name: value.name, variant: value.variant, length: value.length };
        const { list, items } = marked(tag, false);
        into.push(list);
        pushEntries(value.fields, items, path, inner);
        break;
      }
      default:
        throw new ValueError(`Cannot encode value of kind ${JSON.stringify(value.kind)}`, { path });
    }
  }

  const [node] = out;
  if (node === undefined) throw new ValueError('Nothing was encoded');
  return node;
}
