export type Handle = number;

const NO_INDEX = -1;

// Arena-backed doubly-linked recency list. Handles are stable slot indices;
// freed slots are recycled through a LIFO free-list. Front = most recent.
export class RecencyIndex<T extends object> {
  private items: (T | undefined)[] = [];
  private next: number[] = [];
  private prev: number[] = [];
  private live: boolean[] = [];
  private free: number[] = [];
  private head = NO_INDEX;
  private tail = NO_INDEX;
  private count = 0;

  get length(): number {
    return this.count;
  }

  pushFront(item: T): Handle {
    const idx = this.free.length > 0 ? this.popFree() : this.items.length;
    this.items[idx] = item;
    this.live[idx] = true;
    this.linkFront(idx);
    this.count += 1;
    return idx;
  }

  moveToFront(h: Handle) {
    this.assertLive(h);
    if (h === this.head) return;
    this.unlink(h);
    this.linkFront(h);
  }

  remove(h: Handle): T {
    const item = this.get(h);
    this.unlink(h);
    this.items[h] = undefined;
    this.live[h] = false;
    this.free.push(h);
    this.count -= 1;
    return item;
  }

  get(h: Handle): T {
    this.assertLive(h);
    const item = this.items[h];
    if (item === undefined) throw new Error(`RecencyIndex: empty slot ${h}`);
    return item;
  }

  front(): Handle | null {
    return this.head === NO_INDEX ? null : this.head;
  }

  back(): Handle | null {
    return this.tail === NO_INDEX ? null : this.tail;
  }

  // Towards the front (more recent).
  prevOf(h: Handle): Handle | null {
    this.assertLive(h);
    const p = this.prev[h];
    return p === NO_INDEX ? null : p;
  }

  // Towards the back (older).
  nextOf(h: Handle): Handle | null {
    this.assertLive(h);
    const n = this.next[h];
    return n === NO_INDEX ? null : n;
  }

  *frontToBack(): IterableIterator<T> {
    for (let cur = this.head; cur !== NO_INDEX; cur = this.next[cur]) {
      yield this.get(cur);
    }
  }

  *backToFront(): IterableIterator<T> {
    for (let cur = this.tail; cur !== NO_INDEX; cur = this.prev[cur]) {
      yield this.get(cur);
    }
  }

  clear() {
    this.items = [];
    this.next = [];
    this.prev = [];
    this.live = [];
    this.free = [];
    this.head = NO_INDEX;
    this.tail = NO_INDEX;
    this.count = 0;
  }

  private popFree(): number {
    const idx = this.free.pop();
    if (idx === undefined) throw new Error("RecencyIndex: free-list underflow");
    return idx;
  }

  private linkFront(idx: number) {
    this.prev[idx] = NO_INDEX;
    this.next[idx] = this.head;
    if (this.head !== NO_INDEX) this.prev[this.head] = idx;
    this.head = idx;
    if (this.tail === NO_INDEX) this.tail = idx;
  }

  private unlink(idx: number) {
    const p = this.prev[idx];
    const n = this.next[idx];
    if (p !== NO_INDEX) this.next[p] = n;
    else this.head = n;
    if (n !== NO_INDEX) this.prev[n] = p;
    else this.tail = p;
    this.prev[idx] = NO_INDEX;
    this.next[idx] = NO_INDEX;
  }

  private assertLive(h: Handle) {
    if (!Number.isInteger(h) || h < 0 || h >= this.live.length || !this.live[h]) {
      throw new Error(`RecencyIndex: stale or unknown handle ${h}`);
    }
  }
}
