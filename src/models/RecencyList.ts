// =============================================================================
// RecencyList — arena-backed doubly linked list of cache entries
// =============================================================================
// Nodes live in parallel arrays and are addressed by their slot number
// (`NodeId`). Links are slot numbers too, so the list holds no object cycles.
// Released slots go on a free list and are reused by the next push.
//
//   head ─► [most recent] ◄─► … ◄─► [least recent] ◄─ tail
// =============================================================================
import type { Entry } from '../types';

/** Stable handle of a node for as long as it stays in the list */
export type NodeId = number;

/** Sentinel link meaning "no node" */
export const NIL: NodeId = -1;

export class RecencyList<K, V> {
  private entries: Array<Entry<K, V> | undefined> = [];
  private prev: NodeId[] = [];
  private next: NodeId[] = [];
  private free: NodeId[] = [];
  private head: NodeId = NIL;
  private tail: NodeId = NIL;
  private length = 0;

  get size(): number {
    return this.length;
  }

  /** Most recently used node, or `NIL` when empty */
  front(): NodeId {
    return this.head;
  }

  /** Least recently used node (the eviction candidate), or `NIL` when empty */
  back(): NodeId {
    return this.tail;
  }

  entry(id: NodeId): Entry<K, V> {
    const entry = this.entries[id];
    if (!entry) {
      throw new Error(`RecencyList: node ${id} is not in the list`);
    }
    return entry;
  }

  /** Slot after `id` towards the back, or `NIL` */
  nextOf(id: NodeId): NodeId {
    this.entry(id);
    return this.next[id];
  }

  /** Store `entry` in a fresh node at the front and return its handle. */
  pushFront(entry: Entry<K, V>): NodeId {
    const id = this.allocate(entry);
    this.linkFront(id);
    this.length++;
    return id;
  }

  moveToFront(id: NodeId): void {
    this.entry(id);
    if (this.head === id) return;
    this.unlink(id);
    this.linkFront(id);
  }

  /** Unlink the node, free its slot and hand back the entry it held. */
  remove(id: NodeId): Entry<K, V> {
    const entry = this.entry(id);
    this.unlink(id);
    this.entries[id] = undefined;
    this.free.push(id);
    this.length--;
    return entry;
  }

  /** Drop every node and the arena itself. */
  reset(): void {
    this.entries = [];
    this.prev = [];
    this.next = [];
    this.free = [];
    this.head = NIL;
    this.tail = NIL;
    this.length = 0;
  }

  /** Node handles front to back. Do not mutate the list while iterating. */
  *ids(): IterableIterator<NodeId> {
    for (let id = this.head; id !== NIL; id = this.next[id]) {
      yield id;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  private allocate(entry: Entry<K, V>): NodeId {
    const reused = this.free.pop();
    if (reused !== undefined) {
      this.entries[reused] = entry;
      this.prev[reused] = NIL;
      this.next[reused] = NIL;
      return reused;
    }
    this.entries.push(entry);
    this.prev.push(NIL);
    this.next.push(NIL);
    return this.entries.length - 1;
  }

  private linkFront(id: NodeId): void {
    this.prev[id] = NIL;
    this.next[id] = this.head;
    if (this.head !== NIL) {
      this.prev[this.head] = id;
    }
    this.head = id;
    if (this.tail === NIL) {
      this.tail = id;
    }
  }

  private unlink(id: NodeId): void {
    const before = this.prev[id];
    const after = this.next[id];

    if (before !== NIL) {
      this.next[before] = after;
    } else {
      this.head = after;
    }

    if (after !== NIL) {
      this.prev[after] = before;
    } else {
      this.tail = before;
    }

    this.prev[id] = NIL;
    this.next[id] = NIL;
  }
}
