/**
 * Lexer Module
 */

export { nextToken, tokenize } from './tokenizer.js';
export { JackTokenizer, type TokenSource } from './token-source.js';
