/**
 * Node tree to value. Composite nodes become frames on an explicit stack; a
 * frame collects its decoded children and is closed into a value once all of
 * them are in.
 */

import { isLinkNode, isTextNode, type LinkNode, type ListNode, type MdNode } from './ast.js';
import { decodeBase64Url, unescapeText } from './escape.js';
import {
  ArityError,
  DepthExceededError,
  SchemeError,
  StructureError,
  ValueError,
  type NodePath,
} from './errors.js';
import { DEFAULT_MAX_DEPTH } from './parser.js';
import {
  interpretTypeUri,
  isLeafTag,
  isUnorderedTag,
  markerLabel,
  tagMatches,
  type CompositeTag,
  type LeafTag,
  type TypeTag,
} from './type-uri.js';
import { integerRange, type Value } from './value.js';

export interface DecodeOptions {
  /** Max value nesting depth (default 256) */
  maxDepth?: number;
  /**
   * Require marker labels to match the type URI (default true). The `Some`
   * marker is checked either way.
   */
  strictMarkers?: boolean;
  /**
   * Type URI the root must carry. Segments it leaves out (the length of
   * `serde://seq`, say) are not compared.
   */
  expectedUri?: string;
}

interface Child {
  node: MdNode;
  path: NodePath;
}

interface Location {
  position?: MdNode['position'];
  path: NodePath;
}

class Frame {
  readonly results: Value[] = [];
  constructor(
    readonly where: Location,
    readonly children: readonly Child[],
    readonly close: (results: readonly Value[]) => Value
  ) {}
}

function located(node: MdNode, path: NodePath): Location {
  return node.position ? { position: node.position, path } : { path };
}

function tagOf(link: LinkNode, path: NodePath): TypeTag {
  try {
    return interpretTypeUri(link.uri);
  } catch (err) {
    if (err instanceof SchemeError) throw new SchemeError(err.message, { ...located(link, path), cause: err });
    throw err;
  }
}

function unescapeAt(raw: string, node: MdNode, path: NodePath): string {
  try {
    return unescapeText(raw);
  } catch (err) {
    if (err instanceof ValueError) throw new ValueError(err.message, { ...located(node, path), cause: err });
    throw err;
  }
}

const INTEGER_TEXT = /^[+-]?[0-9]+$/;
const FLOAT_TEXT = /^[+-]?(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;

function parseFloatText(text: string): number | undefined {
  const lower = text.toLowerCase();
  const unsigned = lower.replace(/^[+-]/, '');
  const negative = lower.startsWith('-');
  if (unsigned === 'inf' || unsigned === 'infinity') return negative ? -Infinity : Infinity;
  if (unsigned === 'nan') return NaN;
  if (!FLOAT_TEXT.test(text)) return undefined;
  return Number(text);
}

function decodeLeaf(tag: LeafTag, node: LinkNode, path: NodePath, strict: boolean): Value {
  const where = located(node, path);
  const text = unescapeAt(node.label, node, path);
  const expectLabel = (): void => {
    const label = markerLabel(tag);
    if (strict && label !== undefined && text !== label) {
      throw new StructureError(`Expected label ${JSON.stringify(label)}, got ${JSON.stringify(text)}`, where);
    }
  };

  switch (tag.kind) {
    case 'bool':
      if (text === 'true') return { kind: 'bool', value: true };
      if (text === 'false') return { kind: 'bool', value: false };
      throw new ValueError(`Invalid bool ${JSON.stringify(text)}`, where);
    case 'integer': {
      const type = `${tag.signed ? 'i' : 'u'}${tag.width}`;
      if (!INTEGER_TEXT.test(text) || (!tag.signed && text.startsWith('-'))) {
        throw new ValueError(`Invalid ${type} ${JSON.stringify(text)}`, where);
      }
      const value = BigInt(text);
      const { min, max } = integerRange(tag.width, tag.signed);
      if (value < min || value > max) {
        throw new ValueError(`${text} is out of range for ${type}`, where);
      }
      return { kind: 'integer', width: tag.width, signed: tag.signed, value };
    }
    case 'float': {
      const value = parseFloatText(text);
      if (value === undefined) throw new ValueError(`Invalid f${tag.width} ${JSON.stringify(text)}`, where);
      return { kind: 'float', width: tag.width, value: tag.width === 32 ? Math.fround(value) : value };
    }
    case 'char': {
      const count = [...text].length;
      if (count !== 1) throw new ValueError(`Expected exactly one character, got ${count}`, where);
      return { kind: 'char', value: text };
    }
    case 'string':
      return { kind: 'string', value: text };
    case 'bytes':
      try {
        return { kind: 'bytes', value: decodeBase64Url(text) };
      } catch (err) {
        if (err instanceof ValueError) throw new ValueError(err.message, { ...where, cause: err });
        throw err;
      }
    case 'unit':
      if (text !== '()') throw new ValueError(`Expected unit marker "()", got ${JSON.stringify(text)}`, where);
      return { kind: 'unit' };
    case 'none':
      expectLabel();
      return { kind: 'option', value: null };
    case 'unit_struct':
      expectLabel();
      return { kind: 'unit_struct', name: tag.name };
    case 'unit_variant':
      expectLabel();
      return { kind: 'unit_variant', name: tag.name, variant: tag.variant };
  }
}

/** Field names are plain text or `serde://string` links. */
function fieldName(node: MdNode, path: NodePath): string {
  if (isTextNode(node)) return unescapeAt(node.text, node, path);
  if (isLinkNode(node) && tagOf(node, path).kind === 'string') return unescapeAt(node.label, node, path);
  throw new StructureError('Field name must be text or a string link', located(node, path));
}

function expectArity(tag: CompositeTag, declared: number | undefined, actual: number, list: ListNode, path: NodePath): void {
  if (declared !== undefined && declared !== actual) {
    throw new ArityError(
      `${tag.kind} declares ${declared} element${declared === 1 ? '' : 's'}, found ${actual}`,
      located(list, path)
    );
  }
}

function openComposite(tag: CompositeTag, list: ListNode, marker: LinkNode, path: NodePath, strict: boolean): Frame {
  const where = located(list, path);
  const markerPath = [...path, 0];
  const label = unescapeAt(marker.label, marker, markerPath);
  const expected = markerLabel(tag);
  if ((strict || tag.kind === 'some') && expected !== undefined && label !== expected) {
    throw new StructureError(
      `Expected marker label ${JSON.stringify(expected)}, got ${JSON.stringify(label)}`,
      located(marker, markerPath)
    );
  }
  const wantOrdered = !isUnorderedTag(tag);
  if (list.ordered !== wantOrdered) {
    throw new StructureError(`${tag.kind} requires an ${wantOrdered ? 'ordered' : 'unordered'} list`, where);
  }

  const elements: Child[] = list.items.slice(1).map((node, i) => ({ node, path: [...path, i + 1] }));

  switch (tag.kind) {
    case 'some':
    case 'newtype_struct':
    case 'newtype_variant': {
      const t = tag;
      if (elements.length !== 1) {
        throw new StructureError(`${t.kind} must own exactly two items, found ${list.items.length}`, where);
      }
      return new Frame(where, elements, ([inner]) => {
        if (inner === undefined) throw new StructureError(`${t.kind} is missing its inner value`, where);
        switch (t.kind) {
          case 'some':
            return { kind: 'option', value: inner };
          case 'newtype_struct':
            return { kind: 'newtype_struct', name: t.name, value: inner };
          case 'newtype_variant':
            return { kind: 'newtype_variant', name: t.name, variant: t.variant, value: inner };
        }
      });
    }
    case 'seq':
    case 'tuple':
    case 'tuple_struct':
    case 'tuple_variant': {
      const t = tag;
      expectArity(t, t.length, elements.length, list, path);
      return new Frame(where, elements, (results) => {
        const items = [...results];
        switch (t.kind) {
          case 'seq':
            return t.length === undefined ? { kind: 'seq', items } : { kind: 'seq', length: t.length, items };
          case 'tuple':
            return { kind: 'tuple', length: t.length, items };
          case 'tuple_struct':
            return { kind: 'tuple_struct', name: t.name, length: t.length, items };
          case 'tuple_variant':
            return { kind: 'tuple_variant', name: t.name, variant: t.variant, length: t.length, items };
        }
      });
    }
    case 'map':
    case 'struct':
    case 'struct_variant': {
      const t = tag;
      expectArity(t, t.length, elements.length, list, path);
      const pairs = elements.map(({ node, path: entryPath }) => {
        const [key, value] = node.kind === 'list' && node.ordered && node.items.length === 2 ? node.items : [];
        if (key === undefined || value === undefined) {
          throw new StructureError('Entry must be a two-item ordered list', located(node, entryPath));
        }
        return { key: { node: key, path: [...entryPath, 0] }, value: { node: value, path: [...entryPath, 1] } };
      });

      if (t.kind === 'map') {
        const length = t.length;
        return new Frame(
          where,
          pairs.flatMap(({ key, value }) => [key, value]),
          (results) => {
            const entries: Array<[Value, Value]> = [];
            for (let i = 0; i + 1 < results.length; i += 2) {
              const k = results[i];
              const v = results[i + 1];
              if (k !== undefined && v !== undefined) entries.push([k, v]);
            }
            return length === undefined ? { kind: 'map', entries } : { kind: 'map', length, entries };
          }
        );
      }

      const s = t;
      const names = pairs.map(({ key }) => fieldName(key.node, key.path));
      return new Frame(
        where,
        pairs.map(({ value }) => value),
        (results) => {
          const fields: Array<[string, Value]> = [];
          results.forEach((v, i) => {
            const n = names[i];
            if (n !== undefined) fields.push([n, v]);
          });
          return s.kind === 'struct'
            ? { kind: 'struct', name: s.name, length: s.length, fields }
            : { kind: 'struct_variant', name: s.name, variant: s.variant, length: s.length, fields };
        }
      );
    }
  }
}

/** Either a finished value or a frame still waiting for its children. */
function open(node: MdNode, path: NodePath, strict: boolean): Value | Frame {
  switch (node.kind) {
    case 'text':
      throw new StructureError('Untyped text where a value was expected', located(node, path));
    case 'link': {
      const tag = tagOf(node, path);
      if (!isLeafTag(tag)) {
        throw new StructureError(`${tag.kind} must be written as a list with a marker item`, located(node, path));
      }
      return decodeLeaf(tag, node, path, strict);
    }
    case 'list': {
      const [marker] = node.items;
      if (marker === undefined || !isLinkNode(marker)) {
        throw new StructureError('List is missing its marker item', located(node, path));
      }
      const tag = tagOf(marker, [...path, 0]);
      if (isLeafTag(tag)) {
        throw new StructureError(`${tag.kind} cannot own a list`, located(marker, [...path, 0]));
      }
      return openComposite(tag, node, marker, path, strict);
    }
  }
}

function checkRoot(root: MdNode, expectedUri: string): void {
  const expected = interpretTypeUri(expectedUri);
  const link = isLinkNode(root) ? root : root.kind === 'list' ? root.items[0] : undefined;
  if (link === undefined || !isLinkNode(link)) return;
  const path = root === link ? [] : [0];
  if (!tagMatches(expected, tagOf(link, path))) {
    throw new StructureError(`Expected ${expectedUri}, found ${link.uri}`, located(link, path));
  }
}

/**
 * Decode a node tree into a value. The first structural or value error
 * aborts the whole decode.
 */
export function decode(root: MdNode, options: DecodeOptions = {}): Value {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const strict = options.strictMarkers ?? true;
  const stack: Frame[] = [];
  if (options.expectedUri !== undefined) checkRoot(root, options.expectedUri);

  let step = open(root, [], strict);
  for (;;) {
    let top: Frame | undefined;
    if (step instanceof Frame) {
      if (stack.length >= maxDepth) {
        throw new DepthExceededError(`Maximum nesting depth exceeded (${maxDepth})`, step.where);
      }
      stack.push(step);
      top = step;
    } else {
      top = stack[stack.length - 1];
      if (!top) return step;
      top.results.push(step);
    }

    const next = top.children[top.results.length];
    if (next) {
      step = open(next.node, next.path, strict);
    } else {
      stack.pop();
      step = top.close(top.results);
    }
  }
}
