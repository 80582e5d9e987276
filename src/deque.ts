interface Node<T> {
  value: T;
  /** toward the head; navigation only, cleared before the node leaves the chain */
  prev: Node<T> | undefined;
  /** toward the tail */
  next: Node<T> | undefined;
}

/**
 * Double-ended queue backed by a doubly-linked chain of nodes.
 *
 * Popping from an empty deque returns `undefined` instead of throwing. Iterating a
 * deque (forward with `for...of`, backward with `reversed()`) consumes it.
 */
export class Deque<T> {
  private _length = 0;
  private head: Node<T> | undefined = undefined;
  private tail: Node<T> | undefined = undefined;

  /** Build a deque holding the values in iteration order */
  static from<T>(values: Iterable<T>) {
    const d = new Deque<T>();
    for (const value of values) {
      d.pushBack(value);
    }
    return d;
  }

  get length() { return this._length; }

  /** Unlink every node, one at a time, front to back */
  clear() {
    let node = this.head;
    while (node) {
      const next = node.next;
      node.prev = node.next = undefined;
      node = next;
    }
    this.head = this.tail = undefined;
    this._length = 0;
  }

  pushFront(value: T) {
    const newNode: Node<T> = {
      value,
      prev: undefined,
      next: this.head
    };

    if (this.head) {
      this.head.prev = newNode;
      this.head = newNode;
    } else {
      this.head = this.tail = newNode;
    }
    this._length++;
  }

  popFront(): T | undefined {
    const node = this.detachHead();
    return node ? node.value : undefined;
  }

  pushBack(value: T) {
    const newNode: Node<T> = {
      value,
      prev: this.tail,
      next: undefined
    };

    if (this.tail) {
      this.tail.next = newNode;
      this.tail = newNode;
    } else {
      this.head = this.tail = newNode;
    }
    this._length++;
  }

  popBack(): T | undefined {
    const node = this.detachTail();
    return node ? node.value : undefined;
  }

  peekFront(): T | undefined {
    return this.head ? this.head.value : undefined;
  }

  peekBack(): T | undefined {
    return this.tail ? this.tail.value : undefined;
  }

  /** Drain the deque front to back */
  *[Symbol.iterator](): IterableIterator<T> {
    let node: Node<T> | undefined;
    while ((node = this.detachHead())) {
      yield node.value;
    }
  }

  /** Drain the deque back to front */
  *reversed(): IterableIterator<T> {
    let node: Node<T> | undefined;
    while ((node = this.detachTail())) {
      yield node.value;
    }
  }

  private detachHead() {
    const node = this.head;
    if (!node) { return undefined; }

    this.head = node.next;
    if (this.head) {
      this.head.prev = undefined;
    } else {
      // that was the last node
      this.tail = undefined;
    }

    node.next = undefined;
    this._length--;
    return node;
  }

  private detachTail() {
    const node = this.tail;
    if (!node) { return undefined; }

    this.tail = node.prev;
    if (this.tail) {
      this.tail.next = undefined;
    } else {
      this.head = undefined;
    }

    node.prev = undefined;
    this._length--;
    return node;
  }
}
