/**
 * Mork snapshot reader
 * Main entry point for the Mork database file parser
 */

export { MorkParser, parse, load, loads } from './parser';
export { MorkLexer, describeToken } from './lexer';
export type { MorkToken, TokenKind } from './lexer';
export { MorkContext } from './context';
export { SourceText } from './source';
export type { SourcePosition } from './source';
export {
  MorkError,
  LexicalError,
  MorkSyntaxError,
  UnresolvedReferenceError,
  InvalidIdentifierError,
  GroupMismatchError,
} from './errors';
export type { MorkErrorKind, SourceLocation } from './errors';
export { decodeLiteral, coalesceOid, toObject } from './values';
export * from './types';

// Default export for convenience
export { load as default } from './parser';
