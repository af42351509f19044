/**
 * Markdown escaping for link labels and URL-safe base64 for byte blobs.
 */

import { ValueError } from './errors.js';

const ASCII_PUNCTUATION = /[!-/:-@[-`{-~]/;

function isAsciiPunctuation(c: string): boolean {
  return c.length === 1 && ASCII_PUNCTUATION.test(c);
}

function isControl(code: number): boolean {
  return code <= 0x1f || code === 0x7f;
}

/**
 * Escape text for use inside a link label: a backslash before every ASCII
 * punctuation character, a decimal character reference for control characters.
 */
export function escapeText(text: string): string {
  let out = '';
  for (const c of text) {
    const code = c.codePointAt(0) ?? 0;
    if (isAsciiPunctuation(c)) out += '\\' + c;
    else if (isControl(code)) out += `&#${code};`;
    else out += c;
  }
  return out;
}

const CHAR_REFERENCE = /^&#(?:([0-9]{1,7})|[xX]([0-9a-fA-F]{1,6}));/;

/** Inverse of {@link escapeText}; also accepts hexadecimal character references. */
export function unescapeText(text: string): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    const c = text.charAt(i);
    if (c === '\\') {
      const next = text.charAt(i + 1);
      if (isAsciiPunctuation(next)) {
        out += next;
        i += 2;
        continue;
      }
    } else if (c === '&') {
      const m = CHAR_REFERENCE.exec(text.slice(i));
      if (m) {
        const code = m[1] !== undefined ? parseInt(m[1], 10) : parseInt(m[2] ?? '', 16);
        if (!Number.isInteger(code) || code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) {
          throw new ValueError(`Invalid character reference ${JSON.stringify(m[0])}`);
        }
        out += String.fromCodePoint(code);
        i += m[0].length;
        continue;
      }
    }
    out += c;
    i++;
  }
  return out;
}

/**
 * Index of the first occurrence of one of `chars` not preceded by an escaping
 * backslash, starting at `from`; -1 when absent.
 */
export function findUnescaped(text: string, chars: string, from = 0): number {
  for (let i = from; i < text.length; i++) {
    const c = text.charAt(i);
    if (c === '\\' && isAsciiPunctuation(text.charAt(i + 1))) {
      i++;
      continue;
    }
    if (chars.includes(c)) return i;
  }
  return -1;
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function hasLoneSurrogate(text: string): boolean {
  return LONE_SURROGATE.test(text);
}

const BASE64_URL = /^(?:[A-Za-z0-9_-]{4})*(?:[A-Za-z0-9_-]{2}==|[A-Za-z0-9_-]{3}=)?$/;
const BASE64_URL_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

/** URL-safe base64 with `=` padding. */
export function encodeBase64Url(bytes: Uint8Array): string {
  const base64 = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
  return base64.replace(/\+/g, '-').replace(/\//g, '_');
}

export function decodeBase64Url(text: string): Uint8Array {
  if (!BASE64_URL.test(text)) {
    throw new ValueError(`Invalid URL-safe base64: ${JSON.stringify(text)}`);
  }
  // The last symbol before the padding must not carry stray bits.
  const padding = text.endsWith('==') ? 2 : text.endsWith('=') ? 1 : 0;
  if (padding > 0) {
    const last = BASE64_URL_ALPHABET.indexOf(text.charAt(text.length - padding - 1));
    const mask = padding === 2 ? 0x0f : 0x03;
    if ((last & mask) !== 0) {
      throw new ValueError(`Non-canonical base64 padding: ${JSON.stringify(text)}`);
    }
  }
  return Uint8Array.from(Buffer.from(text, 'base64url'));
}
