export { Deque } from './deque';
export { Stack } from './stack';
export { Trie } from './trie/trie';
export { Tokenizer } from './tokenizer/tokenizer';
export { TokenizerError } from './tokenizer/tokenizerError';
export type { CharValidator, TokenizerOptions } from './tokenizer/tokenizerOptions';
export { isAlphanumeric, notPunctuation } from './tokenizer/validators';
