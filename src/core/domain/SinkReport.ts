import type { SinkError } from "@/core/interfaces/ScrapeErrorType";

/**
 * What the sink managed to deliver
 *
 * jsonWritten=true with apiAccepted=false is a partial success.
 */
export interface SinkReport {
  outputPath: string;
  jsonWritten: boolean;
  apiAccepted: boolean;
  /** The API was not called (no endpoint, or the file write failed) */
  apiSkipped: boolean;
  /** HTTP requests made, retries included */
  apiAttempts: number;
  errors: SinkError[];
}
