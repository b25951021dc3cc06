/**
 * Background Dispatcher
 *
 * A bounded queue of entry ids drained by a fixed pool of workers.
 *
 * Invariants:
 * - At most one extraction per entry id is in flight
 * - Enqueuing an id that is already queued is a no-op
 * - Enqueuing an id that is in flight schedules exactly one rerun after it
 * - Tasks never reject; handler failures are logged
 */

import { logWarning } from '@/utils/logger';

export type ExtractionHandler = (entryId: string, signal: AbortSignal) => Promise<void>;

export interface DispatcherOptions {
  /** Workers running at once */
  concurrency: number;
  /** Entries waiting beyond the running ones */
  maxQueueSize: number;
}

export class ExtractionDispatcher {
  private readonly queue: string[] = [];
  private readonly queued = new Set<string>();
  private readonly inFlight = new Map<string, AbortController>();
  private readonly reruns = new Set<string>();
  private readonly running = new Set<Promise<void>>();
  private closed = false;

  constructor(
    private readonly handler: ExtractionHandler,
    private readonly options: DispatcherOptions
  ) {}

  /** Entries waiting for a worker. */
  get pending(): number {
    return this.queue.length;
  }

  /** Entries being extracted right now. */
  get active(): number {
    return this.inFlight.size;
  }

  isInFlight(entryId: string): boolean {
    return this.inFlight.has(entryId);
  }

  /**
   * Schedule extraction for an entry.
   * Returns false when the queue is full or the dispatcher is shut down.
   */
  enqueue(entryId: string): boolean {
    if (this.closed) return false;
    if (this.queued.has(entryId)) return true;
    if (this.inFlight.has(entryId)) {
      this.reruns.add(entryId);
      return true;
    }
    if (this.queue.length >= this.options.maxQueueSize) return false;

    this.queue.push(entryId);
    this.queued.add(entryId);
    this.pump();
    return true;
  }

  private pump(): void {
    while (!this.closed && this.inFlight.size < this.options.concurrency) {
      const entryId = this.queue.shift();
      if (entryId === undefined) return;
      this.queued.delete(entryId);

      const controller = new AbortController();
      this.inFlight.set(entryId, controller);
      const task: Promise<void> = this.execute(entryId, controller).finally(() => {
        this.running.delete(task);
      });
      this.running.add(task);
    }
  }

  private async execute(entryId: string, controller: AbortController): Promise<void> {
    try {
      await this.handler(entryId, controller.signal);
    } catch (error) {
      logWarning(`Extraction task for ${entryId} failed:`, error);
    } finally {
      this.inFlight.delete(entryId);
      if (this.reruns.delete(entryId) && !this.closed) {
        this.queue.push(entryId);
        this.queued.add(entryId);
      }
      this.pump();
    }
  }

  /**
   * Resolve once the queue is empty and no task is running.
   */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  /**
   * Stop accepting work, abort in-flight extractions and wait for them to
   * settle. Returns the ids that were still queued and never started.
   */
  async shutdown(): Promise<string[]> {
    this.closed = true;
    const dropped = this.queue.splice(0);
    this.queued.clear();
    this.reruns.clear();
    for (const controller of this.inFlight.values()) {
      controller.abort();
    }
    await this.drain();
    return dropped;
  }
}
