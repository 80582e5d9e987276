export type CharValidator = (char: string) => boolean;

export interface TokenizerOptions {
  /**
   * called once per character (code point) of each whitespace-separated word; characters
   * for which it returns false are dropped (default: keep every character)
   */
  validator?: CharValidator;
}
