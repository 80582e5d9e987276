import type { CharValidator } from './tokenizerOptions';

/** Keep letters and digits from any script */
export const isAlphanumeric: CharValidator = char => /^[\p{L}\p{N}]$/u.test(char);

/** Drop punctuation, keep everything else */
export const notPunctuation: CharValidator = char => !/^\p{P}$/u.test(char);
