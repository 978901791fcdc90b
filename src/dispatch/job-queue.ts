import type { ScrapeJob } from "./types";

interface QueueEntry {
  job: ScrapeJob;
  seq: number;
}

const before = (a: QueueEntry, b: QueueEntry): boolean =>
  a.job.priority !== b.job.priority ? a.job.priority > b.job.priority : a.seq < b.seq;

/**
 * Priority heap, FIFO within equal priority. `take()` suspends until a job
 * arrives or the queue is closed (then resolves `null`).
 */
export class JobQueue {
  private readonly heap: QueueEntry[] = [];
  private readonly takers: Array<(job: ScrapeJob | null) => void> = [];
  private sequence = 0;
  private closed = false;

  public get size(): number {
    return this.heap.length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false once the queue is closed. */
  public push(job: ScrapeJob): boolean {
    if (this.closed) return false;
    const taker = this.takers.shift();
    if (taker) {
      taker(job);
      return true;
    }

    this.heap.push({ job, seq: ++this.sequence });
    this.siftUp(this.heap.length - 1);
    return true;
  }

  public async take(): Promise<ScrapeJob | null> {
    if (this.closed) return null;
    const next = this.pop();
    if (next) return next;
    return new Promise((resolve) => {
      this.takers.push(resolve);
    });
  }

  public close(): void {
    this.closed = true;
    for (const taker of this.takers.splice(0)) taker(null);
  }

  private pop(): ScrapeJob | null {
    const top = this.heap[0];
    if (!top) return null;
    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top.job;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!before(this.heap[child], this.heap[parent])) return;
      [this.heap[child], this.heap[parent]] = [this.heap[parent], this.heap[child]];
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let best = parent;
      if (left < this.heap.length && before(this.heap[left], this.heap[best])) best = left;
      if (right < this.heap.length && before(this.heap[right], this.heap[best])) best = right;
      if (best === parent) return;
      [this.heap[parent], this.heap[best]] = [this.heap[best], this.heap[parent]];
      parent = best;
    }
  }
}
