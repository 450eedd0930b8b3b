// =============================================================================
// Recency List — doubly linked list of cache nodes, oldest → newest
// =============================================================================
// The head is the least-recently-used node (next eviction victim), the tail
// the most-recently-used. Every operation is O(1); callers hold node
// handles (via the cache index) so nothing is ever searched for.
// =============================================================================

export interface RecencyNode<K, V> {
  readonly key: K;
  value: V;
  prev: RecencyNode<K, V> | null;
  next: RecencyNode<K, V> | null;
}

export class RecencyList<K, V> {
  private head: RecencyNode<K, V> | null = null;
  private tail: RecencyNode<K, V> | null = null;
  private count = 0;

  get length(): number {
    return this.count;
  }

  /** Create a node for `key` and link it at the most-recent end. */
  append(key: K, value: V): RecencyNode<K, V> {
    const node: RecencyNode<K, V> = { key, value, prev: null, next: null };
    this.linkAtTail(node);
    return node;
  }

  /** Move an already-linked node to the most-recent end. */
  moveToTail(node: RecencyNode<K, V>): void {
    if (this.tail === node) return;
    this.unlink(node);
    this.linkAtTail(node);
  }

  /** Unlink and return the least-recently-used node. */
  shift(): RecencyNode<K, V> | null {
    const node = this.head;
    if (node) this.unlink(node);
    return node;
  }

  /** Detach a node from the list. The node must belong to this list. */
  unlink(node: RecencyNode<K, V>): void {
    if (node.prev) {
      node.prev.next = node.next;
    } else {
      this.head = node.next;
    }

    if (node.next) {
      node.next.prev = node.prev;
    } else {
      this.tail = node.prev;
    }

    node.prev = null;
    node.next = null;
    this.count--;
  }

  clear(): void {
    this.head = null;
    this.tail = null;
    this.count = 0;
  }

  /**
   * Walk nodes oldest → newest. The successor is read before each yield,
   * so unlinking the current node mid-walk does not end the walk early.
   */
  *[Symbol.iterator](): IterableIterator<RecencyNode<K, V>> {
    let node = this.head;
    while (node) {
      const next = node.next;
      yield node;
      node = next;
    }
  }

  private linkAtTail(node: RecencyNode<K, V>): void {
    node.prev = this.tail;
    node.next = null;
    if (this.tail) {
      this.tail.next = node;
    } else {
      this.head = node;
    }
    this.tail = node;
    this.count++;
  }
}
