/**
 * FIFO queue of tasks shared by all workers
 *
 * next() and drain() are synchronous, so no two workers ever receive the
 * same task.
 */

import type { ScrapeTask } from "@/core/domain/ScrapeTask";

export class WorkQueue {
  private readonly items: ScrapeTask[];

  constructor(tasks: readonly ScrapeTask[]) {
    this.items = [...tasks];
  }

  next(): ScrapeTask | undefined {
    return this.items.shift();
  }

  /**
   * Remove and return every queued task
   */
  drain(): ScrapeTask[] {
    return this.items.splice(0, this.items.length);
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }
}
