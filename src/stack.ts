interface StackNode<T> {
  value: T;
  next: StackNode<T> | undefined;
}

/** Singly-linked LIFO stack. Iterating a stack pops it empty. */
export class Stack<T> {
  private _length = 0;
  private head: StackNode<T> | undefined = undefined;

  get length() { return this._length; }

  clear() {
    let node = this.head;
    while (node) {
      const next = node.next;
      node.next = undefined;
      node = next;
    }
    this.head = undefined;
    this._length = 0;
  }

  push(value: T) {
    this.head = { value, next: this.head };
    this._length++;
  }

  pop(): T | undefined {
    const node = this.detachHead();
    return node ? node.value : undefined;
  }

  peek(): T | undefined {
    return this.head ? this.head.value : undefined;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    let node: StackNode<T> | undefined;
    while ((node = this.detachHead())) {
      yield node.value;
    }
  }

  private detachHead() {
    const node = this.head;
    if (!node) { return undefined; }
    this.head = node.next;
    node.next = undefined;
    this._length--;
    return node;
  }
}
