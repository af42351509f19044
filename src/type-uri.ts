/**
 * Type URIs: `serde://DOMAIN/SEG1/SEG2/...`. Resolution only splits; the
 * interpretation step maps a domain and its segments onto a type tag.
 */

import { SchemeError } from './errors.js';
import type { FloatWidth, IntegerWidth } from './value.js';

export const SCHEME = 'serde://';

export interface ResolvedTypeUri {
  domain: string;
  segments: string[];
}

export type TypeTag =
  | { kind: 'bool' }
  | { kind: 'integer'; width: IntegerWidth; signed: boolean }
  | { kind: 'float'; width: FloatWidth }
  | { kind: 'char' }
  | { kind: 'string' }
  | { kind: 'bytes' }
  | { kind: 'unit' }
  | { kind: 'none' }
  | { kind: 'some' }
  | { kind: 'unit_struct'; name: string }
  | { kind: 'unit_variant'; name: string; variant: string }
  | { kind: 'newtype_struct'; name: string }
  | { kind: 'newtype_variant'; name: string; variant: string }
  | { kind: 'seq'; length?: number }
  | { kind: 'tuple'; length: number }
  | { kind: 'tuple_struct'; name: string; length: number }
  | { kind: 'tuple_variant'; name: string; variant: string; length: number }
  | { kind: 'map'; length?: number }
  | { kind: 'struct'; name: string; length: number }
  | { kind: 'struct_variant'; name: string; variant: string; length: number };

export type TypeTagKind = TypeTag['kind'];

/** Tags written as a single link rather than a list with a marker item. */
export type LeafTag = Extract<
  TypeTag,
  { kind: 'bool' | 'integer' | 'float' | 'char' | 'string' | 'bytes' | 'unit' | 'none' | 'unit_struct' | 'unit_variant' }
>;
export type CompositeTag = Exclude<TypeTag, LeafTag>;

const LEAF_KINDS: ReadonlySet<TypeTagKind> = new Set<TypeTagKind>([
  'bool',
  'integer',
  'float',
  'char',
  'string',
  'bytes',
  'unit',
  'none',
  'unit_struct',
  'unit_variant',
]);

export function isLeafTag(tag: TypeTag): tag is LeafTag {
  return LEAF_KINDS.has(tag.kind);
}

/** Maps, structs and struct variants use unordered lists; every other composite is ordered. */
export function isUnorderedTag(tag: CompositeTag): boolean {
  return tag.kind === 'map' || tag.kind === 'struct' || tag.kind === 'struct_variant';
}

export function resolveTypeUri(uri: string): ResolvedTypeUri {
  if (!uri.startsWith(SCHEME)) {
    throw new SchemeError(`Type URI must start with ${JSON.stringify(SCHEME)}: ${JSON.stringify(uri)}`);
  }
  const [domain = '', ...segments] = uri.slice(SCHEME.length).split('/');
  if (domain === '') {
    throw new SchemeError(`Type URI has no domain: ${JSON.stringify(uri)}`);
  }
  return { domain, segments };
}

const INTEGER_DOMAIN = /^([iu])(8|16|32|64|128)$/;

function parseWidth(text: string): IntegerWidth {
  switch (text) {
    case '8':
      return 8;
    case '16':
      return 16;
    case '32':
      return 32;
    case '64':
      return 64;
    default:
      return 128;
  }
}

export function interpretTypeUri(uri: string): TypeTag {
  const { domain, segments } = resolveTypeUri(uri);

  const fail = (message: string): never => {
    throw new SchemeError(`${message}: ${JSON.stringify(uri)}`);
  };
  const arity = (expected: number): string[] => {
    if (segments.length !== expected) {
      fail(`Domain "${domain}" takes ${expected} path segment${expected === 1 ? '' : 's'}, got ${segments.length}`);
    }
    return segments;
  };
  const name = (segment: string | undefined): string => {
    if (segment === undefined || segment === '') return fail('Empty name segment');
    return segment;
  };
  const length = (segment: string | undefined): number => {
    if (segment === undefined || !/^[0-9]+$/.test(segment)) return fail('Length segment must be a decimal number');
    const n = Number(segment);
    if (!Number.isSafeInteger(n)) return fail('Length segment is too large');
    return n;
  };
  const optionalLength = (): number | undefined => {
    if (segments.length > 1) fail(`Domain "${domain}" takes at most 1 path segment, got ${segments.length}`);
    const [segment] = segments;
    return segment === undefined || segment === '' ? undefined : length(segment);
  };

  const integer = INTEGER_DOMAIN.exec(domain);
  if (integer) {
    arity(0);
    return { kind: 'integer', signed: integer[1] === 'i', width: parseWidth(integer[2] ?? '') };
  }

  switch (domain) {
    case 'bool':
    case 'char':
    case 'string':
    case 'unit':
      arity(0);
      return { kind: domain };
    case 'f32':
      arity(0);
      return { kind: 'float', width: 32 };
    case 'f64':
      arity(0);
      return { kind: 'float', width: 64 };
    case 'blob':
    case 'bytes':
      arity(0);
      return { kind: 'bytes' };
    case 'none':
      arity(0);
      return { kind: 'none' };
    case 'option': {
      const [which] = arity(1);
      if (which === 'none') return { kind: 'none' };
      if (which === 'some') return { kind: 'some' };
      return fail(`Unknown option form ${JSON.stringify(which)}`);
    }
    case 'unit_struct': {
      const [n] = arity(1);
      return { kind: 'unit_struct', name: name(n) };
    }
    case 'unit_variant': {
      const [n, v] = arity(2);
      return { kind: 'unit_variant', name: name(n), variant: name(v) };
    }
    case 'newtype_struct': {
      const [n] = arity(1);
      return { kind: 'newtype_struct', name: name(n) };
    }
    case 'newtype_variant': {
      const [n, v] = arity(2);
      return { kind: 'newtype_variant', name: name(n), variant: name(v) };
    }
    case 'seq': {
      const len = optionalLength();
      return len === undefined ? { kind: 'seq' } : { kind: 'seq', length: len };
    }
    case 'tuple': {
      const [l] = arity(1);
      return { kind: 'tuple', length: length(l) };
    }
    case 'tuple_struct': {
      const [n, l] = arity(2);
      return { kind: 'tuple_struct', name: name(n), length: length(l) };
    }
    case 'tuple_variant': {
      const [n, v, l] = arity(3);
      return { kind: 'tuple_variant', name: name(n), variant: name(v), length: length(l) };
    }
    case 'map': {
      const len = optionalLength();
      return len === undefined ? { kind: 'map' } : { kind: 'map', length: len };
    }
    case 'struct': {
      const [n, l] = arity(2);
      return { kind: 'struct', name: name(n), length: length(l) };
    }
    case 'struct_variant': {
      const [n, v, l] = arity(3);
      return { kind: 'struct_variant', name: name(n), variant: name(v), length: length(l) };
    }
    default:
      return fail(`Unknown domain "${domain}"`);
  }
}

/**
 * True when `actual` carries every field `expected` does. A tag read from
 * `serde://seq` has no length and so matches a sequence of any length.
 */
export function tagMatches(expected: TypeTag, actual: TypeTag): boolean {
  const fields = new Map(Object.entries<unknown>(actual));
  return Object.entries<unknown>(expected).every(([key, value]) => fields.get(key) === value);
}

const INVALID_NAME = /[\s/\\()[\]<>]/;

/** Names must survive a trip through a link destination unchanged. */
export function assertName(name: string): string {
  if (name === '') throw new SchemeError('Names must not be empty');
  if (INVALID_NAME.test(name)) {
    throw new SchemeError(`Name ${JSON.stringify(name)} cannot appear in a type URI`);
  }
  return name;
}

export function formatTypeUri(tag: TypeTag): string {
  const path = (...segments: Array<string | number>): string => SCHEME + segments.join('/');
  switch (tag.kind) {
    case 'bool':
    case 'char':
    case 'string':
    case 'unit':
      return path(tag.kind);
    case 'integer':
      return path(`${tag.signed ? 'i' : 'u'}${tag.width}`);
    case 'float':
      return path(`f${tag.width}`);
    case 'bytes':
      return path('blob');
    case 'none':
      return path('option', 'none');
    case 'some':
      return path('option', 'some');
    case 'unit_struct':
    case 'newtype_struct':
      return path(tag.kind, assertName(tag.name));
    case 'unit_variant':
    case 'newtype_variant':
      return path(tag.kind, assertName(tag.name), assertName(tag.variant));
    case 'seq':
    case 'map':
      return tag.length === undefined ? path(tag.kind) : path(tag.kind, tag.length);
    case 'tuple':
      return path(tag.kind, tag.length);
    case 'tuple_struct':
    case 'struct':
      return path(tag.kind, assertName(tag.name), tag.length);
    case 'tuple_variant':
    case 'struct_variant':
      return path(tag.kind, assertName(tag.name), assertName(tag.variant), tag.length);
  }
}

/** Human-readable label the writer puts on a type's marker (or leaf) link. */
export function markerLabel(tag: TypeTag): string | undefined {
  switch (tag.kind) {
    case 'none':
      return 'None';
    case 'some':
      return 'Some';
    case 'unit':
      return '()';
    case 'unit_struct':
    case 'newtype_struct':
      return tag.name;
    case 'unit_variant':
    case 'newtype_variant':
      return `${tag.name}::${tag.variant}`;
    case 'seq':
      return tag.length === undefined ? 'Seq of unknown length' : `Seq of length ${tag.length}`;
    case 'tuple':
      return `Tuple of length ${tag.length}`;
    case 'tuple_struct':
      return `Tuple struct ${tag.name} of length ${tag.length}`;
    case 'tuple_variant':
      return `Tuple variant ${tag.name}::${tag.variant} of length ${tag.length}`;
    case 'map':
      return tag.length === undefined ? 'Map of unknown length' : `Map of length ${tag.length}`;
    case 'struct':
      return `Struct ${tag.name} of length ${tag.length}`;
    case 'struct_variant':
      return `Struct variant ${tag.name}::${tag.variant} of length ${tag.length}`;
    default:
      return undefined;
  }
}
