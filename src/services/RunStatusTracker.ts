/**
 * Run status tracker
 *
 * Keeps the state and progress of the current run, refreshes a heartbeat
 * and optionally mirrors every change to a JSON status file.
 */

import { STATUS_CONFIG } from "@/config/constants";
import { logger as rootLogger, Logger } from "@/config/logger";
import type { TaskOutcome } from "@/core/domain/TaskOutcome";
import { errorMessage } from "@/core/interfaces/ScrapeErrorType";
import { JsonResultWriter } from "@/sink/JsonResultWriter";
import { getTimestampWithTimezone } from "@/utils/timestamp";

export type RunState = "idle" | "running" | "completed" | "failed" | "stopped";

export interface RunStatus {
  state: RunState;
  runId: string | null;
  total: number;
  processed: number;
  succeeded: number;
  failed: number;
  startedAt: string | null;
  finishedAt: string | null;
  heartbeat: string | null;
  lastError: string | null;
}

export interface RunStatusTrackerOptions {
  statusPath?: string;
  heartbeatIntervalMs?: number;
}

const IDLE_STATUS: RunStatus = {
  state: "idle",
  runId: null,
  total: 0,
  processed: 0,
  succeeded: 0,
  failed: 0,
  startedAt: null,
  finishedAt: null,
  heartbeat: null,
  lastError: null,
};

export class RunStatusTracker {
  private status: RunStatus = { ...IDLE_STATUS };
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private pendingWrite: Promise<void> = Promise.resolve();
  private readonly writer: JsonResultWriter;

  constructor(
    private readonly options: RunStatusTrackerOptions = {},
    private readonly logger: Logger = rootLogger,
  ) {
    // Status rewrites are frequent; only problems are worth logging
    this.writer = new JsonResultWriter(
      logger.child({ component: "status" }, { level: "warn" }),
    );
  }

  getStatus(): RunStatus {
    return { ...this.status };
  }

  start(runId: string, total: number): void {
    this.status = {
      ...IDLE_STATUS,
      state: "running",
      runId,
      total,
      startedAt: getTimestampWithTimezone(),
    };
    this.touch();
    this.startHeartbeat();
  }

  recordOutcome(outcome: TaskOutcome): void {
    this.status.processed++;
    if (outcome.kind === "success") this.status.succeeded++;
    else this.status.failed++;
    this.touch();
  }

  finish(state: Exclude<RunState, "idle" | "running">, error?: unknown): void {
    this.stopHeartbeat();
    this.status.state = state;
    this.status.finishedAt = getTimestampWithTimezone();
    if (error !== undefined) this.status.lastError = errorMessage(error);
    this.touch();
  }

  /**
   * Resolves once every queued status write has completed
   */
  flush(): Promise<void> {
    return this.pendingWrite;
  }

  private touch(): void {
    this.status.heartbeat = getTimestampWithTimezone();
    const statusPath = this.options.statusPath;
    if (!statusPath) return;

    const snapshot = this.getStatus();
    this.pendingWrite = this.pendingWrite.then(() =>
      this.persist(snapshot, statusPath),
    );
  }

  private async persist(snapshot: RunStatus, statusPath: string): Promise<void> {
    try {
      await this.writer.write(snapshot, statusPath);
    } catch (error) {
      this.logger.error(
        { error: errorMessage(error), statusPath },
        "Status file update failed",
      );
    }
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    const interval =
      this.options.heartbeatIntervalMs ?? STATUS_CONFIG.HEARTBEAT_INTERVAL_MS;
    this.heartbeatTimer = setInterval(() => this.touch(), interval);
    this.heartbeatTimer.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}
