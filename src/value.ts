/**
 * Serialization data model. A closed tagged union: every value is exactly one
 * of the shapes below and owns its children outright.
 */

export type IntegerWidth = 8 | 16 | 32 | 64 | 128;
export type FloatWidth = 32 | 64;

export interface BoolValue {
  kind: 'bool';
  value: boolean;
}

export interface IntegerValue {
  kind: 'integer';
  width: IntegerWidth;
  signed: boolean;
  value: bigint;
}

export interface FloatValue {
  kind: 'float';
  width: FloatWidth;
  value: number;
}

/** A single Unicode scalar value. */
export interface CharValue {
  kind: 'char';
  value: string;
}

export interface StringValue {
  kind: 'string';
  value: string;
}

export interface BytesValue {
  kind: 'bytes';
  value: Uint8Array;
}

export interface UnitValue {
  kind: 'unit';
}

/** `value` is null for `None`. */
export interface OptionValue {
  kind: 'option';
  value: Value | null;
}

export interface UnitStructValue {
  kind: 'unit_struct';
  name: string;
}

export interface UnitVariantValue {
  kind: 'unit_variant';
  name: string;
  variant: string;
}

export interface NewtypeStructValue {
  kind: 'newtype_struct';
  name: string;
  value: Value;
}

export interface NewtypeVariantValue {
  kind: 'newtype_variant';
  name: string;
  variant: string;
  value: Value;
}

/** `length` is undefined when the sequence length is not declared. */
export interface SeqValue {
  kind: 'seq';
  length?: number;
  items: Value[];
}

export interface TupleValue {
  kind: 'tuple';
  length: number;
  items: Value[];
}

export interface TupleStructValue {
  kind: 'tuple_struct';
  name: string;
  length: number;
  items: Value[];
}

export interface TupleVariantValue {
  kind: 'tuple_variant';
  name: string;
  variant: string;
  length: number;
  items: Value[];
}

/** Entries keep wire order; keys may repeat. */
export interface MapValue {
  kind: 'map';
  length?: number;
  entries: Array<[Value, Value]>;
}

export interface StructValue {
  kind: 'struct';
  name: string;
  length: number;
  fields: Array<[string, Value]>;
}

export interface StructVariantValue {
  kind: 'struct_variant';
  name: string;
  variant: string;
  length: number;
  fields: Array<[string, Value]>;
}

export type Value =
  | BoolValue
  | IntegerValue
  | FloatValue
  | CharValue
  | StringValue
  | BytesValue
  | UnitValue
  | OptionValue
  | UnitStructValue
  | UnitVariantValue
  | NewtypeStructValue
  | NewtypeVariantValue
  | SeqValue
  | TupleValue
  | TupleStructValue
  | TupleVariantValue
  | MapValue
  | StructValue
  | StructVariantValue;

export function integerRange(width: IntegerWidth, signed: boolean): { min: bigint; max: bigint } {
  const bits = BigInt(width);
  if (signed) {
    return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << bits) - 1n };
}

function int(width: IntegerWidth, signed: boolean, value: bigint | number): IntegerValue {
  return { kind: 'integer', width, signed, value: BigInt(value) };
}

/**
 * Builders. Declared lengths are taken from the element count; use the
 * object literal form directly to state a different one.
 */
export const Value = {
  bool: (value: boolean): BoolValue => ({ kind: 'bool', value }),
  integer: int,
  i8: (value: bigint | number) => int(8, true, value),
  i16: (value: bigint | number) => int(16, true, value),
  i32: (value: bigint | number) => int(32, true, value),
  i64: (value: bigint | number) => int(64, true, value),
  i128: (value: bigint | number) => int(128, true, value),
  u8: (value: bigint | number) => int(8, false, value),
  u16: (value: bigint | number) => int(16, false, value),
  u32: (value: bigint | number) => int(32, false, value),
  u64: (value: bigint | number) => int(64, false, value),
  u128: (value: bigint | number) => int(128, false, value),
  f32: (value: number): FloatValue => ({ kind: 'float', width: 32, value: Math.fround(value) }),
  f64: (value: number): FloatValue => ({ kind: 'float', width: 64, value }),
  char: (value: string): CharValue => ({ kind: 'char', value }),
  string: (value: string): StringValue => ({ kind: 'string', value }),
  bytes: (value: Uint8Array): BytesValue => ({ kind: 'bytes', value }),
  unit: (): UnitValue => ({ kind: 'unit' }),
  none: (): OptionValue => ({ kind: 'option', value: null }),
  some: (value: Value): OptionValue => ({ kind: 'option', value }),
  unitStruct: (name: string): UnitStructValue => ({ kind: 'unit_struct', name }),
  unitVariant: (name: string, variant: string): UnitVariantValue => ({
    kind: 'unit_variant',
    name,
    variant,
  }),
  newtypeStruct: (name: string, value: Value): NewtypeStructValue => ({
    kind: 'newtype_struct',
    name,
    value,
  }),
  newtypeVariant: (name: string, variant: string, value: Value): NewtypeVariantValue => ({
    kind: 'newtype_variant',
    name,
    variant,
    value,
  }),
  /** Pass `declared: false` for a sequence of unknown length. */
  seq: (items: Value[], declared = true): SeqValue =>
    declared ? { kind: 'seq', length: items.length, items } : { kind: 'seq', items },
  tuple: (items: Value[]): TupleValue => ({ kind: 'tuple', length: items.length, items }),
  tupleStruct: (name: string, items: Value[]): TupleStructValue => ({
    kind: 'tuple_struct',
    name,
    length: items.length,
    items,
  }),
  tupleVariant: (name: string, variant: string, items: Value[]): TupleVariantValue => ({
    kind: 'tuple_variant',
    name,
    variant,
    length: items.length,
    items,
  }),
  map: (entries: Array<[Value, Value]>, declared = true): MapValue =>
    declared ? { kind: 'map', length: entries.length, entries } : { kind: 'map', entries },
  struct: (name: string, fields: Array<[string, Value]>): StructValue => ({
    kind: 'struct',
    name,
    length: fields.length,
    fields,
  }),
  structVariant: (name: string, variant: string, fields: Array<[string, Value]>): StructVariantValue => ({
    kind: 'struct_variant',
    name,
    variant,
    length: fields.length,
    fields,
  }),
};

function sameNumber(a: number, b: number): boolean {
  return Object.is(a, b);
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Structural equality: shape, names, declared lengths and scalars all match,
 * entry order included. NaN equals NaN; -0 and 0 differ.
 */
export function valueEquals(left: Value, right: Value): boolean {
  const pending: Array<[Value, Value]> = [[left, right]];
  const pushAll = (xs: readonly Value[], ys: readonly Value[]): boolean => {
    if (xs.length !== ys.length) return false;
    xs.forEach((x, i) => {
      const y = ys[i];
      if (y !== undefined) pending.push([x, y]);
    });
    return true;
  };
  const pushFields = (xs: ReadonlyArray<[string, Value]>, ys: ReadonlyArray<[string, Value]>): boolean => {
    if (xs.length !== ys.length) return false;
    for (let i = 0; i < xs.length; i++) {
      const x = xs[i];
      const y = ys[i];
      if (x === undefined || y === undefined || x[0] !== y[0]) return false;
      pending.push([x[1], y[1]]);
    }
    return true;
  };

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    const [a, b] = next;
    let same = false;
    switch (a.kind) {
      case 'bool':
        same = b.kind === 'bool' && b.value === a.value;
        break;
      case 'char':
        same = b.kind === 'char' && b.value === a.value;
        break;
      case 'string':
        same = b.kind === 'string' && b.value === a.value;
        break;
      case 'integer':
        same = b.kind === 'integer' && b.width === a.width && b.signed === a.signed && b.value === a.value;
        break;
      case 'float':
        same = b.kind === 'float' && b.width === a.width && sameNumber(a.value, b.value);
        break;
      case 'bytes':
        same = b.kind === 'bytes' && sameBytes(a.value, b.value);
        break;
      case 'unit':
        same = b.kind === 'unit';
        break;
      case 'option':
        if (b.kind !== 'option') same = false;
        else if (a.value === null || b.value === null) same = a.value === b.value;
        else {
          pending.push([a.value, b.value]);
          same = true;
        }
        break;
      case 'unit_struct':
        same = b.kind === 'unit_struct' && b.name === a.name;
        break;
      case 'unit_variant':
        same = b.kind === 'unit_variant' && b.name === a.name && b.variant === a.variant;
        break;
      case 'newtype_struct':
        same = b.kind === 'newtype_struct' && b.name === a.name;
        if (same && b.kind === 'newtype_struct') pending.push([a.value, b.value]);
        break;
      case 'newtype_variant':
        same = b.kind === 'newtype_variant' && b.name === a.name && b.variant === a.variant;
        if (same && b.kind === 'newtype_variant') pending.push([a.value, b.value]);
        break;
      case 'seq':
        same = b.kind === 'seq' && b.length === a.length && pushAll(a.items, b.items);
        break;
      case 'tuple':
        same = b.kind === 'tuple' && b.length === a.length && pushAll(a.items, b.items);
        break;
      case 'tuple_struct':
        same =
          b.kind === 'tuple_struct' && b.name === a.name && b.length === a.length && pushAll(a.items, b.items);
        break;
      case 'tuple_variant':
        same =
          b.kind === 'tuple_variant' &&
          b.name === a.name &&
          b.variant === a.variant &&
          b.length === a.length &&
          pushAll(a.items, b.items);
        break;
      case 'map':
        same =
          b.kind === 'map' &&
          b.length === a.length &&
          pushAll(
            a.entries.flatMap(([k, v]) => [k, v]),
            b.entries.flatMap(([k, v]) => [k, v])
          );
        break;
      case 'struct':
        same = b.kind === 'struct' && b.name === a.name && b.length === a.length && pushFields(a.fields, b.fields);
        break;
      case 'struct_variant':
        same =
          b.kind === 'struct_variant' &&
          b.name === a.name &&
          b.variant === a.variant &&
          b.length === a.length &&
          pushFields(a.fields, b.fields);
        break;
    }
    if (!same) return false;
  }
  return true;
}
