import { describe, expect, it } from 'vitest';
import {
  decodeBase64Url,
  encodeBase64Url,
  escapeText,
  findUnescaped,
  hasLoneSurrogate,
  unescapeText,
} from '../src/escape.js';
import { ValueError } from '../src/errors.js';

describe('escapeText', () => {
  it('puts a backslash before ASCII punctuation', () => {
    expect(escapeText('baz *wow*')).toBe('baz \\*wow\\*');
    expect(escapeText('[a](b)')).toBe('\\[a\\]\\(b\\)');
    expect(escapeText('E::V')).toBe('E\\:\\:V');
    expect(escapeText('a\\b')).toBe('a\\\\b');
  });

  it('leaves letters, digits, spaces and non-ASCII text alone', () => {
    expect(escapeText('Seq of length 2')).toBe('Seq of length 2');
    expect(escapeText('héllo wörld 😀')).toBe('héllo wörld 😀');
  });

  it('writes control characters as decimal character references', () => {
    expect(escapeText('a\tb\n')).toBe('a&#9;b&#10;');
    expect(escapeText('\u007f')).toBe('&#127;');
  });
});

describe('unescapeText', () => {
  it('inverts escapeText', () => {
    for (const text of ['baz *wow*', '&#9;', 'a\\b', '_x_ `y` <z>', 'tab\there', '']) {
      expect(unescapeText(escapeText(text))).toBe(text);
    }
  });

  it('keeps a backslash that escapes nothing', () => {
    expect(unescapeText('a\\b')).toBe('a\\b');
    expect(unescapeText('end\\')).toBe('end\\');
  });

  it('accepts decimal and hexadecimal character references', () => {
    expect(unescapeText('&#65;&#x42;&#X43;')).toBe('ABC');
    expect(unescapeText('&#x1F600;')).toBe('😀');
  });

  it('leaves an ampersand without a reference untouched', () => {
    expect(unescapeText('a & b &#;')).toBe('a & b &#;');
  });

  it('rejects surrogate and out-of-range references', () => {
    expect(() => unescapeText('&#xD800;')).toThrow(ValueError);
    expect(() => unescapeText('&#1114112;')).toThrow(ValueError);
  });
});

describe('findUnescaped', () => {
  it('skips escaped characters', () => {
    expect(findUnescaped('a\\*b*', '*')).toBe(4);
    expect(findUnescaped('a\\*b', '*')).toBe(-1);
  });

  it('starts at the given index', () => {
    expect(findUnescaped('[a]', '[]', 1)).toBe(2);
  });
});

describe('hasLoneSurrogate', () => {
  it('detects unpaired surrogates only', () => {
    expect(hasLoneSurrogate('😀')).toBe(false);
    expect(hasLoneSurrogate('\uD83D')).toBe(true);
    expect(hasLoneSurrogate('x\uDE00')).toBe(true);
  });
});

describe('base64', () => {
  const phrase = new TextEncoder().encode('what did you just say about me?');

  it('encodes with the URL-safe alphabet and padding', () => {
    expect(encodeBase64Url(phrase)).toBe('d2hhdCBkaWQgeW91IGp1c3Qgc2F5IGFib3V0IG1lPw==');
    expect(encodeBase64Url(new Uint8Array([0xfb, 0xff]))).toBe('-_8=');
    expect(encodeBase64Url(new Uint8Array(0))).toBe('');
  });

  it('encodes a view into a larger buffer', () => {
    const backing = new Uint8Array([0, 1, 2, 3]);
    expect(encodeBase64Url(backing.subarray(1, 3))).toBe('AQI=');
  });

  it('decodes what it encodes', () => {
    expect(decodeBase64Url('d2hhdCBkaWQgeW91IGp1c3Qgc2F5IGFib3V0IG1lPw==')).toEqual(phrase);
    expect(decodeBase64Url('-_8=')).toEqual(new Uint8Array([0xfb, 0xff]));
    expect(decodeBase64Url('')).toEqual(new Uint8Array(0));
  });

  it('rejects malformed input', () => {
    expect(() => decodeBase64Url('abc')).toThrow(ValueError);
    expect(() => decodeBase64Url('+/8=')).toThrow(ValueError);
    expect(() => decodeBase64Url('ab=c')).toThrow(ValueError);
  });

  it('rejects stray bits before the padding', () => {
    expect(() => decodeBase64Url('-_9=')).toThrow(/Non-canonical/);
    expect(() => decodeBase64Url('QR==')).toThrow(/Non-canonical/);
  });
});
