/**
 * JSON Result Writer
 *
 * Atomic write: the document goes to a temporary file next to the target,
 * is synced to disk and then renamed over the target. Readers never see a
 * partial file. On failure the temporary file is removed and the target is
 * left untouched.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";
import { logger as rootLogger, Logger } from "@/config/logger";
import {
  errorMessage,
  ScrapeErrorType,
  SinkError,
} from "@/core/interfaces/ScrapeErrorType";

export interface WriteResult {
  outputPath: string;
  bytes: number;
}

export class JsonResultWriter {
  constructor(private readonly logger: Logger = rootLogger) {}

  /**
   * Temporary file name: <name>.<pid>.<random>.tmp in the target directory
   */
  static tempPathFor(target: string): string {
    return path.join(
      path.dirname(target),
      `${path.basename(target)}.${process.pid}.${uuidv4().slice(0, 8)}.tmp`,
    );
  }

  /**
   * @throws SinkError (WRITE_FAILED)
   */
  async write(document: unknown, outputPath: string): Promise<WriteResult> {
    const target = path.resolve(outputPath);
    const tempPath = JsonResultWriter.tempPathFor(target);

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });

      let bytes = 0;
      const handle = await fs.open(tempPath, "w");
      try {
        const content = JSON.stringify(document, null, 2) + "\n";
        bytes = Buffer.byteLength(content, "utf-8");
        await handle.writeFile(content, "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }

      await fs.rename(tempPath, target);
      this.logger.info({ filePath: target, bytes }, "Output file written");
      return { outputPath: target, bytes };
    } catch (error) {
      await this.removeTemp(tempPath);
      this.logger.error(
        { error: errorMessage(error), filePath: target },
        "Output file write failed",
      );
      throw new SinkError(
        ScrapeErrorType.WRITE_FAILED,
        `Failed to write ${target}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (error) {
      this.logger.warn(
        { error: errorMessage(error), filePath: tempPath },
        "Temporary file cleanup failed",
      );
    }
  }
}
