export class TokenizerError extends Error {
  /**
   * @param message what went wrong
   * @param filename the file being tokenized, if any
   */
  constructor(message: string, readonly filename?: string) {
    super(message);
    this.name = 'TokenizerError';
    Object.setPrototypeOf(this, TokenizerError.prototype);
  }
}
