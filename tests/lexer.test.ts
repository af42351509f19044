import { describe, expect, it } from 'vitest';
import { GrammarError, IndentationError } from '../src/errors.js';
import { TokenKind, scan, tokenize } from '../src/lexer.js';

describe('tokenize', () => {
  it('splits an item line into a marker and its link', () => {
    expect(tokenize('0. [x](serde://bool)\n')).toEqual([
      { kind: TokenKind.OrderedItem, indent: 0, start: { line: 1, column: 1, offset: 0 } },
      {
        kind: TokenKind.Link,
        indent: 0,
        label: 'x',
        uri: 'serde://bool',
        start: { line: 1, column: 4, offset: 3 },
      },
    ]);
  });

  it('records indentation and positions on later lines', () => {
    const tokens = tokenize('*\n    12. plain words');
    expect(tokens).toEqual([
      { kind: TokenKind.UnorderedItem, indent: 0, start: { line: 1, column: 1, offset: 0 } },
      { kind: TokenKind.OrderedItem, indent: 4, start: { line: 2, column: 5, offset: 6 } },
      { kind: TokenKind.PlainText, indent: 4, text: 'plain words', start: { line: 2, column: 9, offset: 10 } },
    ]);
  });

  it('emits blank tokens for empty lines', () => {
    expect(tokenize('\n').map((t) => t.kind)).toEqual([TokenKind.Blank]);
    expect(tokenize('')).toEqual([]);
  });

  it('accepts CRLF line endings', () => {
    const tokens = tokenize('* [a](serde://string)\r\n');
    expect(tokens.map((t) => t.kind)).toEqual([TokenKind.UnorderedItem, TokenKind.Link]);
    expect(tokens[1]).toMatchObject({ uri: 'serde://string' });
  });

  it('keeps escapes in labels as written', () => {
    const [link] = tokenize('[a\\]b \\*c\\*](serde://string)');
    expect(link).toMatchObject({ kind: TokenKind.Link, label: 'a\\]b \\*c\\*' });
  });

  it('scans lazily', () => {
    const tokens = scan('[a](serde://bool)\n- nope\n');
    expect(tokens.next().value).toMatchObject({ kind: TokenKind.Link });
    expect(() => tokens.next()).toThrow(GrammarError);
  });
});

describe('tokenize errors', () => {
  it.each([
    ['- [x](serde://bool)', /Only "\*" bullets/],
    ['+ [x](serde://bool)', /Only "\*" bullets/],
    ['1) [x](serde://bool)', /Only "N\." markers/],
    ['# Title', /Headings/],
    ['```', /Code fences/],
    ['> quoted', /Block quotes/],
    ['| a | b |', /Tables/],
    ['![alt](serde://blob)', /Images/],
    ['---', /Thematic breaks/],
    ['[a](serde://bool) tail', /Unexpected text after link/],
    ['[a][ref]', /Reference links/],
    ['[a] (serde://bool)', /Expected "\("/],
    ['[a(serde://bool)', /Unterminated link label/],
    ['[a [b]](serde://bool)', /Nested brackets/],
    ['[a *b*](serde://string)', /inline markup "\*" in link label/],
    ['[a](serde://bool', /Unterminated link destination/],
    ['[a](serde://bo ol)', /Invalid character in link destination/],
    ['hello *world*', /inline markup "\*" in text/],
    ['snake_case', /inline markup "_" in text/],
  ])('rejects %j', (input, message) => {
    expect(() => tokenize(input)).toThrow(GrammarError);
    expect(() => tokenize(input)).toThrow(message);
  });

  it('reports the column of the offending character', () => {
    try {
      tokenize('* hello *world*');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(GrammarError);
      expect(err).toMatchObject({ position: { line: 1, column: 9, offset: 8 } });
    }
  });

  it('rejects tabs in indentation', () => {
    expect(() => tokenize('\t* [x](serde://bool)')).toThrow(IndentationError);
  });

  it('enforces the input length limit', () => {
    expect(() => tokenize('[a](serde://bool)', { maxInputLength: 4 })).toThrow(/exceeds maximum length/);
  });
});
