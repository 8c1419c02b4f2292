/**
 * Result aggregator
 *
 * One outcome slot per task, indexed by task id. record() is synchronous
 * and never awaits, so concurrent workers cannot interleave inside it.
 */

import type { ScrapeTask } from "@/core/domain/ScrapeTask";
import type { TaskOutcome } from "@/core/domain/TaskOutcome";
import type { RunResult } from "@/core/domain/RunResult";
import { AggregatorConsistencyError } from "@/core/interfaces/ScrapeErrorType";

export interface AggregatorProgress {
  recorded: number;
  total: number;
}

export interface ResultAggregatorOptions {
  onRecord?: (outcome: TaskOutcome, progress: AggregatorProgress) => void;
}

export class ResultAggregator {
  private readonly slots: Array<TaskOutcome | undefined>;
  private recorded = 0;
  private sealed = false;

  constructor(
    private readonly tasks: readonly ScrapeTask[],
    private readonly options: ResultAggregatorOptions = {},
  ) {
    tasks.forEach((task, index) => {
      if (task.id !== index) {
        throw new AggregatorConsistencyError(
          `Task at position ${index} has id ${task.id}`,
        );
      }
    });
    this.slots = new Array<TaskOutcome | undefined>(tasks.length).fill(
      undefined,
    );
  }

  /**
   * Store the outcome of one task
   * @returns false when the aggregator is sealed (nothing stored)
   * @throws AggregatorConsistencyError on an unknown id or a second outcome
   */
  record(outcome: TaskOutcome): boolean {
    if (this.sealed) return false;

    const { taskId } = outcome;
    if (!Number.isInteger(taskId) || taskId < 0 || taskId >= this.slots.length) {
      throw new AggregatorConsistencyError(`Unknown task id ${taskId}`);
    }
    if (this.slots[taskId] !== undefined) {
      throw new AggregatorConsistencyError(
        `Task ${taskId} already has an outcome`,
      );
    }

    this.slots[taskId] = outcome;
    this.recorded++;
    this.options.onRecord?.(outcome, {
      recorded: this.recorded,
      total: this.slots.length,
    });
    return true;
  }

  /**
   * Tasks still without an outcome, in input order
   */
  pendingTasks(): ScrapeTask[] {
    return this.tasks.filter((task) => this.slots[task.id] === undefined);
  }

  /**
   * Stop accepting outcomes
   */
  seal(): void {
    this.sealed = true;
  }

  get recordedCount(): number {
    return this.recorded;
  }

  /**
   * @throws AggregatorConsistencyError if any task lacks an outcome
   */
  finalize(): RunResult {
    const outcomes: TaskOutcome[] = [];
    let successCount = 0;

    this.slots.forEach((outcome, index) => {
      if (outcome === undefined) {
        throw new AggregatorConsistencyError(`Task ${index} has no outcome`);
      }
      outcomes.push(outcome);
      if (outcome.kind === "success") successCount++;
    });

    this.sealed = true;
    return Object.freeze({
      outcomes: Object.freeze(outcomes),
      successCount,
      failureCount: outcomes.length - successCount,
    });
  }
}
