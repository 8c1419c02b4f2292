import type { TaskOutcome } from "@/core/domain/TaskOutcome";

/**
 * Aggregated outcomes of a run, in input order
 */
export interface RunResult {
  readonly outcomes: readonly TaskOutcome[];
  readonly successCount: number;
  readonly failureCount: number;
}
