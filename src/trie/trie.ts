import { TrieNode } from './trieNode';

/** Prefix tree of words, keyed by code point */
export class Trie {
  private readonly root = new TrieNode();

  /** Build a trie from a sequence of tokens (a Deque or a Tokenizer result, for example) */
  static from(tokens: Iterable<string>) {
    const trie = new Trie();
    for (const token of tokens) {
      trie.insert(token);
    }
    return trie;
  }

  /** The number of nodes in the trie, not counting the root */
  get size() { return this.root.size; }

  insert(token: string) {
    if (!token) { return; }

    let node = this.root;
    for (const char of token) {
      let child = node.children.get(char);
      if (!child) {
        child = new TrieNode();
        node.children.set(char, child);
      }
      node = child;
    }
    node.endOfWord = true;
  }

  contains(token: string) {
    if (!token) { return false; }

    let node: TrieNode | undefined = this.root;
    for (const char of token) {
      node = node.children.get(char);
      if (!node) { return false; }
    }
    return node.endOfWord;
  }
}
