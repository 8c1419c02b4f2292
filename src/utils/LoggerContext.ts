/**
 * Logger context helpers
 *
 * Child loggers carrying run and task identifiers
 */

import { logger, Logger } from "@/config/logger";

/**
 * Logger for one pipeline run
 * @param runId - run identifier (UUID)
 */
export function createRunLogger(runId: string, parent: Logger = logger): Logger {
  return parent.child({ run_id: runId });
}

/**
 * Logger for one scrape task
 * @param taskId - index of the URL in the input list
 */
export function createTaskLogger(
  parent: Logger,
  taskId: number,
  url: string,
): Logger {
  return parent.child({ task_id: taskId, url });
}

/**
 * Milestone log line (highlighted on the pretty console)
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}
