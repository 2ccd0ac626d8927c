/**
 * Lexical analysis module.
 * Scans source code into a flat array of tokens.
 */

export { type Lexeme, LexError, type LexErrorCode, lex, Scanner } from './scanner.ts'
export { type TokenizeOptions, type TokenizeResult, tokenize } from './tokenizer.ts'
