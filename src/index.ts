export * from './ast.js';
export * from './errors.js';
export * from './value.js';
export { escapeText, unescapeText, encodeBase64Url, decodeBase64Url } from './escape.js';
export { scan, tokenize, TokenKind, type Token, type LexerOptions } from './lexer.js';
export { DEFAULT_MAX_DEPTH, parseDocument, type ParseDocumentOptions } from './parser.js';
export { stringifyDocument, type StringifyDocumentOptions } from './stringify.js';
export {
  SCHEME,
  resolveTypeUri,
  interpretTypeUri,
  formatTypeUri,
  markerLabel,
  tagMatches,
  type ResolvedTypeUri,
  type TypeTag,
} from './type-uri.js';
export { decode, type DecodeOptions } from './decoder.js';
export { encode, type EncodeOptions } from './encoder.js';
export { parse, stringify, type ParseOptions, type StringifyOptions } from './codec.js';
export { fromJson, toJson, jsonToMarkdown, markdownToJson, type JsonValue } from './json.js';
