/**
 * In-process FIFO handing task ids from ingress to the worker pool.
 * An id already waiting is not queued twice.
 */
export class TaskQueue {
  private items: string[] = [];
  private waiting: Set<string> = new Set();
  private closed = false;
  private listeners: Set<() => void> = new Set();
  private maxSize: number;

  constructor(maxSize: number = Number.POSITIVE_INFINITY) {
    this.maxSize = maxSize;
  }

  /**
   * Add a task id. Returns false when the queue is closed or full; a duplicate
   * of a waiting id counts as accepted.
   */
  enqueue(taskId: string): boolean {
    if (this.closed) {
      return false;
    }
    if (this.waiting.has(taskId)) {
      return true;
    }
    if (this.items.length >= this.maxSize) {
      return false;
    }

    this.items.push(taskId);
    this.waiting.add(taskId);
    for (const listener of this.listeners) {
      listener();
    }
    return true;
  }

  dequeue(): string | undefined {
    const taskId = this.items.shift();
    if (taskId !== undefined) {
      this.waiting.delete(taskId);
    }
    return taskId;
  }

  peek(): string | undefined {
    return this.items[0];
  }

  size(): number {
    return this.items.length;
  }

  /** Refuse further enqueues. Ids already waiting are still handed out. */
  close(): void {
    this.closed = true;
  }

  open(): void {
    this.closed = false;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Register a callback fired after every accepted enqueue.
   */
  onEnqueue(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}
