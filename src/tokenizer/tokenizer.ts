import { FileHandle, open } from 'fs/promises';
import { createInterface } from 'readline';

import { Deque } from '../deque';
import { TokenizerError } from './tokenizerError';
import type { CharValidator, TokenizerOptions } from './tokenizerOptions';

const PREFIX = '[linked-deque Tokenizer]';

const keepAll: CharValidator = () => true;

function reason(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

/** Split text into whitespace-separated tokens */
export class Tokenizer {
  private readonly validator: CharValidator;

  constructor(options: TokenizerOptions = {}) {
    if (typeof options !== 'object' || options === null) {
      console.warn(
        `${PREFIX} A Tokenizer was created with invalid options; using defaults.`
      );
      options = {};
    }

    if (options.validator !== undefined && typeof options.validator !== 'function') {
      throw new TokenizerError(`${PREFIX} Invalid TokenizerOptions: validator must be a function.`);
    }

    this.validator = options.validator || keepAll;
  }

  /** Tokens of a single line; a token left with no valid characters is dropped */
  tokenize(line: string): string[] {
    const tokens: string[] = [];
    for (const word of line.split(/\s+/)) {
      let token = '';
      for (const char of word) {
        if (this.validator(char)) {
          token += char;
        }
      }
      if (token) {
        tokens.push(token);
      }
    }
    return tokens;
  }

  /** Tokens of every line of `text`, in reading order */
  fromString(text: string) {
    const tokens = new Deque<string>();
    for (const line of text.split(/\r?\n/)) {
      for (const token of this.tokenize(line)) {
        tokens.pushBack(token);
      }
    }
    return tokens;
  }

  /** Read a stream line by line, yielding its tokens */
  async *fromStream(input: NodeJS.ReadableStream): AsyncIterableIterator<string> {
    const lines = createInterface({ input, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        yield* this.tokenize(line);
      }
    } finally {
      lines.close();
    }
  }

  /**
   * Open `filename` and read its tokens. The file stays open until the returned iterable
   * is exhausted or its loop exits, so iterate it.
   * @throws TokenizerError if the file cannot be opened or read
   */
  async fromFile(filename: string): Promise<AsyncIterableIterator<string>> {
    let handle: FileHandle;
    try {
      handle = await open(filename, 'r');
    } catch (err) {
      throw new TokenizerError(`${PREFIX} cannot open ${filename}: ${reason(err)}`, filename);
    }
    return this.readFile(handle, filename);
  }

  private async *readFile(handle: FileHandle, filename: string): AsyncIterableIterator<string> {
    const input = handle.createReadStream({ autoClose: false });
    try {
      yield* this.fromStream(input);
    } catch (err) {
      throw new TokenizerError(`${PREFIX} cannot read ${filename}: ${reason(err)}`, filename);
    } finally {
      input.destroy();
      await handle.close();
    }
  }
}
