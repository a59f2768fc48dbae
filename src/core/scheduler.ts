interface QueueEntry {
  id: string;
  priority: number;
  enqueuedAt: number;
  seq: number;
}

function before(a: QueueEntry, b: QueueEntry): boolean {
  if (a.priority !== b.priority) return a.priority < b.priority;
  if (a.enqueuedAt !== b.enqueuedAt) return a.enqueuedAt < b.enqueuedAt;
  return a.seq < b.seq;
}

/** Binary min-heap ordered by (priority, enqueuedAt, seq). */
class EntryHeap {
  private items: QueueEntry[] = [];

  push(entry: QueueEntry): void {
    const items = this.items;
    items.push(entry);
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(items[i], items[parent])) break;
      [items[i], items[parent]] = [items[parent], items[i]];
      i = parent;
    }
  }

  pop(): QueueEntry | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (top === undefined || last === undefined || items.length === 0) return top;
    items[0] = last;
    let i = 0;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < items.length && before(items[left], items[smallest])) smallest = left;
      if (right < items.length && before(items[right], items[smallest])) smallest = right;
      if (smallest === i) break;
      [items[i], items[smallest]] = [items[smallest], items[i]];
      i = smallest;
    }
    return top;
  }

  get size(): number {
    return this.items.length;
  }

  /** Drops entries failing `keep`; a sorted array is a valid heap. */
  retain(keep: (entry: QueueEntry) => boolean): void {
    this.items = this.items.filter(keep).sort((a, b) => (before(a, b) ? -1 : 1));
  }

  clear(): void {
    this.items = [];
  }
}

interface Waiter {
  resolve: (id: string | undefined) => void;
  timer: NodeJS.Timeout;
  detach: () => void;
}

/**
 * In-memory ready queue of job ids. It only orders ids; job state lives in
 * the store, so a stale id handed out here simply loses its claim.
 */
export class JobScheduler {
  private readonly heap = new EntryHeap();
  /** id -> seq of its live heap entry; older entries for the id are stale */
  private readonly live = new Map<string, number>();
  private readonly delayed = new Map<string, NodeJS.Timeout>();
  private waiters: Waiter[] = [];
  private seq = 0;
  private closed = false;

  constructor(private readonly clock: () => number = () => Date.now()) {}

  /** Number of ids ready to be handed out. */
  get size(): number {
    return this.live.size;
  }

  get delayedCount(): number {
    return this.delayed.size;
  }

  has(id: string): boolean {
    return this.live.has(id) || this.delayed.has(id);
  }

  /**
   * Adds an id. With `readyAt` in the future the id is held back until then
   * and enters the queue with that time as its enqueuedAt.
   */
  enqueue(id: string, priority: number, enqueuedAt: number, readyAt?: number): void {
    if (this.closed || this.has(id)) return;

    const wait = readyAt === undefined ? 0 : readyAt - this.clock();
    if (wait > 0) {
      const timer = setTimeout(() => {
        this.delayed.delete(id);
        this.enqueue(id, priority, readyAt ?? enqueuedAt);
      }, wait);
      timer.unref();
      this.delayed.set(id, timer);
      return;
    }

    const entry: QueueEntry = { id, priority, enqueuedAt, seq: this.seq++ };
    this.heap.push(entry);
    this.live.set(id, entry.seq);
    this.handOff();
  }

  dequeue(): string | undefined {
    for (;;) {
      const entry = this.heap.pop();
      if (!entry) return undefined;
      if (this.live.get(entry.id) !== entry.seq) continue;
      this.live.delete(entry.id);
      return entry.id;
    }
  }

  /**
   * Waits up to `timeoutMs` for an id. Resolves undefined on timeout, abort
   * or close.
   */
  take(timeoutMs: number, signal?: AbortSignal): Promise<string | undefined> {
    const ready = this.dequeue();
    if (ready !== undefined || this.closed || signal?.aborted) return Promise.resolve(ready);

    return new Promise((resolve) => {
      const onAbort = () => settle(undefined);
      const waiter: Waiter = {
        resolve: (id) => settle(id),
        timer: setTimeout(() => settle(undefined), timeoutMs),
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      const settle = (id: string | undefined) => {
        clearTimeout(waiter.timer);
        waiter.detach();
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(id);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  remove(id: string): boolean {
    const timer = this.delayed.get(id);
    if (timer) {
      clearTimeout(timer);
      this.delayed.delete(id);
      return true;
    }
    if (!this.live.delete(id)) return false;
    // removed ids leave stale heap entries behind until popped
    if (this.heap.size - this.live.size > this.live.size) {
      this.heap.retain((entry) => this.live.get(entry.id) === entry.seq);
    }
    return true;
  }

  /** Heap entries held, stale ones included. */
  get heapSize(): number {
    return this.heap.size;
  }

  /** Drops every id and releases all waiters. */
  close(): void {
    this.closed = true;
    for (const timer of this.delayed.values()) clearTimeout(timer);
    this.delayed.clear();
    this.live.clear();
    this.heap.clear();
    for (const waiter of [...this.waiters]) waiter.resolve(undefined);
  }

  private handOff(): void {
    while (this.waiters.length > 0) {
      const id = this.dequeue();
      if (id === undefined) return;
      const [waiter] = this.waiters;
      waiter.resolve(id);
    }
  }
}
