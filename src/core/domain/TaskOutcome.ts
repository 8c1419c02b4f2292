import type { ProductRecord } from "@/core/domain/ProductRecord";
import type { ScrapeTask } from "@/core/domain/ScrapeTask";
import type { TaskErrorKind } from "@/core/interfaces/ScrapeErrorType";

export interface SuccessOutcome {
  readonly kind: "success";
  readonly taskId: number;
  readonly record: ProductRecord;
}

export interface FailureOutcome {
  readonly kind: "failure";
  readonly taskId: number;
  readonly url: string;
  readonly error: TaskErrorKind;
  readonly message: string;
  /** Fetch attempts made before giving up (0 when never started) */
  readonly attempts: number;
}

/**
 * Final result recorded for a task
 */
export type TaskOutcome = SuccessOutcome | FailureOutcome;

export function successOutcome(
  task: ScrapeTask,
  record: ProductRecord,
): SuccessOutcome {
  return { kind: "success", taskId: task.id, record };
}

export function failureOutcome(
  task: ScrapeTask,
  error: TaskErrorKind,
  message: string,
  attempts = 0,
): FailureOutcome {
  return {
    kind: "failure",
    taskId: task.id,
    url: task.url,
    error,
    message,
    attempts,
  };
}
