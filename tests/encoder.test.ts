import { describe, expect, it } from 'vitest';
import { linkNode, listNode } from '../src/ast.js';
import { encode } from '../src/encoder.js';
import { ArityError, DepthExceededError, SchemeError, ValueError } from '../src/errors.js';
import { Value } from '../src/value.js';

function nestedSeq(levels: number): Value {
  let value: Value = Value.bool(true);
  for (let i = 0; i < levels; i++) value = Value.seq([value]);
  return value;
}

describe('encode leaves', () => {
  it('writes primitives as a single link', () => {
    expect(encode(Value.u8(7))).toEqual(linkNode('7', 'serde://u8'));
    expect(encode(Value.i128(-(2n ** 127n)))).toEqual(
      linkNode('-170141183460469231731687303715884105728', 'serde://i128')
    );
    expect(encode(Value.bool(false))).toEqual(linkNode('false', 'serde://bool'));
    expect(encode(Value.string('baz *wow*'))).toEqual(linkNode('baz \\*wow\\*', 'serde://string'));
    expect(encode(Value.char('['))).toEqual(linkNode('\\[', 'serde://char'));
    expect(encode(Value.unit())).toEqual(linkNode('\\(\\)', 'serde://unit'));
    expect(encode(Value.none())).toEqual(linkNode('None', 'serde://option/none'));
    expect(encode(Value.unitStruct('Marker'))).toEqual(linkNode('Marker', 'serde://unit_struct/Marker'));
    expect(encode(Value.unitVariant('E', 'V'))).toEqual(linkNode('E\\:\\:V', 'serde://unit_variant/E/V'));
  });

  it('writes float specials in a readable form', () => {
    expect(encode(Value.f64(NaN))).toEqual(linkNode('NaN', 'serde://f64'));
    expect(encode(Value.f64(-Infinity))).toEqual(linkNode('-inf', 'serde://f64'));
    expect(encode(Value.f64(-0))).toEqual(linkNode('-0', 'serde://f64'));
    expect(encode(Value.f64(1.5))).toEqual(linkNode('1.5', 'serde://f64'));
    expect(encode(Value.f32(0.5))).toEqual(linkNode('0.5', 'serde://f32'));
  });

  it('writes bytes as padded URL-safe base64', () => {
    const bytes = new TextEncoder().encode('what did you just say about me?');
    expect(encode(Value.bytes(bytes))).toEqual(
      linkNode('d2hhdCBkaWQgeW91IGp1c3Qgc2F5IGFib3V0IG1lPw==', 'serde://blob')
    );
  });
});

describe('encode composites', () => {
  it('puts the marker link first in an ordered list', () => {
    expect(encode(Value.tuple([Value.bool(true), Value.string('a.b')]))).toEqual(
      listNode(true, [
        linkNode('Tuple of length 2', 'serde://tuple/2'),
        linkNode('true', 'serde://bool'),
        linkNode('a\\.b', 'serde://string'),
      ])
    );
  });

  it('writes Some and newtypes as two-item lists', () => {
    expect(encode(Value.some(Value.u64(8)))).toEqual(
      listNode(true, [linkNode('Some', 'serde://option/some'), linkNode('8', 'serde://u64')])
    );
    expect(encode(Value.newtypeVariant('E', 'V', Value.unit()))).toEqual(
      listNode(true, [linkNode('E\\:\\:V', 'serde://newtype_variant/E/V'), linkNode('\\(\\)', 'serde://unit')])
    );
  });

  it('omits the length of an unknown-length sequence', () => {
    expect(encode(Value.seq([], false))).toEqual(
      listNode(true, [linkNode('Seq of unknown length', 'serde://seq')])
    );
  });

  it('writes struct fields as key/value pairs in an unordered list', () => {
    expect(encode(Value.struct('P', [['x', Value.i32(1)]]))).toEqual(
      listNode(false, [
        linkNode('Struct P of length 1', 'serde://struct/P/1'),
        listNode(true, [linkNode('x', 'serde://string'), linkNode('1', 'serde://i32')]),
      ])
    );
  });

  it('keeps map entry order and encodes composite keys', () => {
    const map = Value.map([
      [Value.tuple([Value.u8(1)]), Value.string('one')],
      [Value.string('b'), Value.none()],
    ]);
    expect(encode(map)).toEqual(
      listNode(false, [
        linkNode('Map of length 2', 'serde://map/2'),
        listNode(true, [
          listNode(true, [linkNode('Tuple of length 1', 'serde://tuple/1'), linkNode('1', 'serde://u8')]),
          linkNode('one', 'serde://string'),
        ]),
        listNode(true, [linkNode('b', 'serde://string'), linkNode('None', 'serde://option/none')]),
      ])
    );
  });
});

describe('encode errors', () => {
  it('rejects a declared length that disagrees with the items', () => {
    const bad: Value = { kind: 'tuple', length: 3, items: [Value.u8(1), Value.u8(2)] };
    expect(() => encode(bad)).toThrow(ArityError);
    expect(() => encode(bad)).toThrow('tuple declares 3 elements, has 2');
    const badMap: Value = { kind: 'map', length: 1, entries: [] };
    expect(() => encode(badMap)).toThrow(ArityError);
  });

  it('reports the path of a nested failure', () => {
    try {
      encode(Value.seq([Value.u8(1), Value.seq([Value.u8(300)])]));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValueError);
      expect(err).toMatchObject({ path: [2, 1] });
      expect(String(err)).toBe('ValueError: 300 is out of range for u8 (at $[2][1])');
    }
  });

  it('rejects values with no faithful wire form', () => {
    expect(() => encode(Value.char('ab'))).toThrow(ValueError);
    expect(() => encode(Value.char(''))).toThrow(ValueError);
    expect(() => encode(Value.string('\uD800'))).toThrow(ValueError);
    expect(() => encode(Value.struct('P', [['\uDC00', Value.unit()]]))).toThrow(ValueError);
  });

  it('rejects names that cannot sit in a URI', () => {
    expect(() => encode(Value.unitStruct('a/b'))).toThrow(SchemeError);
    expect(() => encode(Value.struct('has space', []))).toThrow(SchemeError);
  });

  it('enforces the depth limit', () => {
    expect(() => encode(nestedSeq(3), { maxDepth: 2 })).toThrow(DepthExceededError);
    expect(encode(nestedSeq(3), { maxDepth: 3 })).toMatchObject({ kind: 'list' });
  });

  it('counts only composites against the depth limit', () => {
    expect(() => encode(Value.seq([Value.seq([])]), { maxDepth: 1 })).toThrow(DepthExceededError);
    expect(encode(Value.seq([Value.u8(1)]), { maxDepth: 1 })).toMatchObject({ kind: 'list' });
    expect(() => encode(Value.some(Value.none()), { maxDepth: 0 })).toThrow(DepthExceededError);
    expect(encode(Value.none(), { maxDepth: 0 })).toEqual(linkNode('None', 'serde://option/none'));
  });

  it('encodes deeply nested values without recursion', () => {
    expect(encode(nestedSeq(2000), { maxDepth: 2000 })).toMatchObject({ kind: 'list', ordered: true });
  });
});
