/** One character position in a Trie */
export class TrieNode {
  /** true if the path from the root to this node spells an inserted word */
  endOfWord = false;
  readonly children = new Map<string, TrieNode>();

  /** Number of nodes below this one */
  get size() {
    let count = 0;
    const pending: TrieNode[] = [this];
    let node: TrieNode | undefined;
    while ((node = pending.pop())) {
      count += node.children.size;
      for (const child of node.children.values()) {
        pending.push(child);
      }
    }
    return count;
  }
}
