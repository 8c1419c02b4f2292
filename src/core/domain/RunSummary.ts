import type { TaskErrorKind } from "@/core/interfaces/ScrapeErrorType";
import type { SinkReport } from "@/core/domain/SinkReport";

export interface RunSummary {
  runId: string;
  total: number;
  successCount: number;
  failureCount: number;
  failuresByKind: Partial<Record<TaskErrorKind, number>>;
  /** The deadline expired or stop() was called */
  cancelled: boolean;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  sink: SinkReport;
}
