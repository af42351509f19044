/**
 * Text-level entry points: Markdown text to value and back.
 */

import { decode, type DecodeOptions } from './decoder.js';
import { encode, type EncodeOptions } from './encoder.js';
import { DEFAULT_MAX_DEPTH, parseDocument } from './parser.js';
import { stringifyDocument } from './stringify.js';
import type { Value } from './value.js';

export interface ParseOptions extends DecodeOptions {
  /** Max input length in characters (default 10_000_000) */
  maxInputLength?: number;
  /** Spaces per nesting level (default 4) */
  indentWidth?: number;
}

export interface StringifyOptions extends EncodeOptions {
  /** Spaces per nesting level (default 4) */
  indentWidth?: number;
  /** Newline (default "\n") */
  newline?: string;
}

/**
 * Parse a document into a value. A map entry nests two lists deep, so the
 * list depth allowed to the parser is twice the value depth.
 */
export function parse(text: string, options: ParseOptions = {}): Value {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const root = parseDocument(text, {
    maxDepth: maxDepth * 2,
    maxInputLength: options.maxInputLength,
    indentWidth: options.indentWidth,
  });
  return decode(root, { maxDepth, strictMarkers: options.strictMarkers, expectedUri: options.expectedUri });
}

export function stringify(value: Value, options: StringifyOptions = {}): string {
  const root = encode(value, { maxDepth: options.maxDepth });
  return stringifyDocument(root, { indentWidth: options.indentWidth, newline: options.newline });
}
