/**
 * Codec errors with line/column position and node path.
 */

import type { SourcePosition } from './ast.js';

/** Item indexes from the document root down to the failing node. */
export type NodePath = readonly number[];

type ConstructorOptions = { position?: SourcePosition; path?: NodePath; cause?: unknown };

export function formatPath(path: NodePath): string {
  return '$' + path.map((i) => `[${i}]`).join('');
}

export class CodecError extends Error {
  override readonly name: string = 'CodecError';
  readonly position?: SourcePosition;
  readonly path?: NodePath;

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.position = options?.position;
    this.path = options?.path;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, CodecError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    const parts: string[] = [];
    if (this.position) {
      parts.push(`line ${this.position.line}, column ${this.position.column}`);
    }
    if (this.path !== undefined) {
      parts.push(`at ${formatPath(this.path)}`);
    }
    return parts.join(', ');
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.name}: ${this.message} (${loc})` : `${this.name}: ${this.message}`;
  }
}

/** Input uses Markdown outside the supported subset. */
export class GrammarError extends CodecError {
  override readonly name = 'GrammarError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, GrammarError.prototype);
  }
}

export class IndentationError extends CodecError {
  override readonly name = 'IndentationError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, IndentationError.prototype);
  }
}

/** Malformed or unknown type URI, or a name that cannot appear in one. */
export class SchemeError extends CodecError {
  override readonly name = 'SchemeError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, SchemeError.prototype);
  }
}

/** Node shape does not match what its type URI requires. */
export class StructureError extends CodecError {
  override readonly name = 'StructureError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, StructureError.prototype);
  }
}

/** Declared length disagrees with the number of elements present. */
export class ArityError extends CodecError {
  override readonly name = 'ArityError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, ArityError.prototype);
  }
}

/** Leaf content does not parse as (or cannot be written as) its primitive type. */
export class ValueError extends CodecError {
  override readonly name = 'ValueError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, ValueError.prototype);
  }
}

export class DepthExceededError extends CodecError {
  override readonly name = 'DepthExceededError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, DepthExceededError.prototype);
  }
}
