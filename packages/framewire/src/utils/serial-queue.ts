/**
 * Runs async tasks one at a time, in submission order.
 *
 * The receive pipeline routes decoder create/decode/invalidate calls through
 * one queue per peer, so a renegotiation never invalidates a session while a
 * decode that uses it is still running.
 */

export type Task = () => Promise<void> | void;

export interface SerialQueueOptions {
  /** Called when a task throws; tasks are expected to handle their own errors */
  onError?: (error: unknown) => void;
}

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private closed: boolean = false;
  private pending: number = 0;
  private onError: (error: unknown) => void;

  constructor(options: SerialQueueOptions = {}) {
    this.onError = options.onError ?? (() => {});
  }

  /**
   * Queue a task. Returns false once the queue is closed.
   */
  push(task: Task): boolean {
    if (this.closed) {
      return false;
    }

    this.pending++;
    this.tail = this.tail.then(async () => {
      try {
        // Closed while waiting: drop without running
        if (!this.closed) {
          await task();
        }
      } catch (err) {
        this.onError(err);
      } finally {
        this.pending--;
      }
    });
    return true;
  }

  /**
   * Refuse new tasks and cancel the ones not yet started, then run `finalTask`
   * once the task in flight (if any) has settled. Takes effect synchronously.
   */
  close(finalTask?: Task): Promise<void> {
    if (this.closed) {
      return this.tail;
    }
    this.closed = true;

    if (finalTask) {
      this.tail = this.tail.then(async () => {
        try {
          await finalTask();
        } catch (err) {
          this.onError(err);
        }
      });
    }
    return this.tail;
  }

  /**
   * Resolves when every task queued so far has settled
   */
  idle(): Promise<void> {
    return this.tail;
  }

  get size(): number {
    return this.pending;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
