/**
 * JSON bridge: maps JSON documents onto the data model and back, and
 * transcodes between JSON text and Markdown text.
 */

import { stringify, parse, type ParseOptions, type StringifyOptions } from './codec.js';
import { DepthExceededError, ValueError } from './errors.js';
import { DEFAULT_MAX_DEPTH } from './parser.js';
import { Value } from './value.js';

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export interface JsonOptions {
  /** Max nesting depth (default 256) */
  maxDepth?: number;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && Array.isArray(v) === false;
}

/**
 * JSON to value: null is unit, safe integers are u64 (non-negative) or i64,
 * other numbers f64, arrays sequences and objects string-keyed maps, all with
 * declared lengths.
 */
export function fromJson(json: unknown, options: JsonOptions = {}): Value {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  // Arrays and objects count against the limit the way decoded composites do.
  const open = (depth: number): number => {
    if (depth + 1 > maxDepth) throw new DepthExceededError(`Maximum nesting depth exceeded (${maxDepth})`);
    return depth + 1;
  };

  function convert(v: unknown, depth: number): Value {
    if (v === null) return Value.unit();
    if (typeof v === 'boolean') return Value.bool(v);
    if (typeof v === 'number') {
      if (Number.isSafeInteger(v)) return v >= 0 ? Value.u64(v) : Value.i64(v);
      return Value.f64(v);
    }
    if (typeof v === 'string') return Value.string(v);
    if (Array.isArray(v)) {
      const inner = open(depth);
      return Value.seq(v.map((item) => convert(item, inner)));
    }
    if (isPlainObject(v)) {
      const inner = open(depth);
      return Value.map(Object.keys(v).map((k): [Value, Value] => [Value.string(k), convert(v[k], inner)]));
    }
    throw new ValueError(`Not a JSON value: ${typeof v}`);
  }

  return convert(json, 0);
}

function jsonKey(key: Value): string {
  switch (key.kind) {
    case 'string':
    case 'char':
      return key.value;
    case 'bool':
      return String(key.value);
    case 'integer':
      return key.value.toString();
    case 'unit_variant':
      return key.variant;
    default:
      throw new ValueError(`Map key of kind ${key.kind} has no JSON form`);
  }
}

/**
 * Value to JSON. Unit-like values become null, enum variants an object keyed
 * by the variant name; duplicate map keys collapse (last one wins).
 */
export function toJson(value: Value, options: JsonOptions = {}): JsonValue {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  function object(fields: ReadonlyArray<readonly [string, Value]>, depth: number): { [key: string]: JsonValue } {
    const out: { [key: string]: JsonValue } = {};
    for (const [k, v] of fields) {
      // defineProperty keeps a "__proto__" key an own property.
      Object.defineProperty(out, k, { value: convert(v, depth + 1), enumerable: true, writable: true, configurable: true });
    }
    return out;
  }

  function convert(v: Value, depth: number): JsonValue {
    if (depth > maxDepth) throw new DepthExceededError(`Maximum nesting depth exceeded (${maxDepth})`);
    switch (v.kind) {
      case 'bool':
      case 'char':
      case 'string':
        return v.value;
      case 'integer': {
        const n = Number(v.value);
        if (!Number.isSafeInteger(n)) throw new ValueError(`Integer ${v.value} has no exact JSON number form`);
        return n;
      }
      case 'float':
        return Number.isFinite(v.value) ? v.value : null;
      case 'bytes':
        return Array.from(v.value);
      case 'unit':
      case 'unit_struct':
        return null;
      case 'option':
        return v.value === null ? null : convert(v.value, depth + 1);
      case 'unit_variant':
        return v.variant;
      case 'newtype_struct':
        return convert(v.value, depth + 1);
      case 'newtype_variant':
        return { [v.variant]: convert(v.value, depth + 1) };
      case 'seq':
      case 'tuple':
      case 'tuple_struct':
        return v.items.map((item) => convert(item, depth + 1));
      case 'tuple_variant':
        return { [v.variant]: v.items.map((item) => convert(item, depth + 1)) };
      case 'map':
        return object(
          v.entries.map(([k, val]): [string, Value] => [jsonKey(k), val]),
          depth
        );
      case 'struct':
        return object(v.fields, depth);
      case 'struct_variant':
        return { [v.variant]: object(v.fields, depth) };
    }
  }

  return convert(value, 0);
}

export interface MarkdownToJsonOptions extends ParseOptions {
  /** JSON indentation (default 2; 0 for a single line) */
  indent?: number;
}

export function jsonToMarkdown(text: string, options: StringifyOptions = {}): string {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ValueError(`Invalid JSON input: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  return stringify(fromJson(json, { maxDepth: options.maxDepth }), options);
}

export function markdownToJson(text: string, options: MarkdownToJsonOptions = {}): string {
  const value = parse(text, options);
  return JSON.stringify(toJson(value, { maxDepth: options.maxDepth }), null, options.indent ?? 2) + '\n';
}
