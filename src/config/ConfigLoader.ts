/**
 * Pipeline configuration loader
 *
 * Layers (later wins):
 * 1. schema defaults
 * 2. YAML file
 * 3. environment (ENV_CONFIG)
 * 4. explicit overrides (CLI flags)
 *
 * Objects merge key by key; arrays and scalars replace.
 */

import * as fs from "fs";
import * as yaml from "js-yaml";
import {
  PipelineConfig,
  PipelineConfigSchema,
} from "@/core/domain/PipelineConfig";
import { ConfigError, errorMessage } from "@/core/interfaces/ScrapeErrorType";
import { ENV_CONFIG, EnvConfig } from "./constants";
import { logger } from "./logger";

type RawConfig = Record<string, unknown>;

export interface LoadConfigOptions {
  filePath?: string;
  overrides?: RawConfig;
  env?: EnvConfig;
}

function isPlainObject(value: unknown): value is RawConfig {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value)
  );
}

/**
 * Drops undefined leaves so unset env values never mask file values
 */
function compact(value: RawConfig): RawConfig {
  const result: RawConfig = {};
  for (const [key, child] of Object.entries(value)) {
    if (child === undefined) continue;
    if (isPlainObject(child)) {
      const nested = compact(child);
      if (Object.keys(nested).length > 0) result[key] = nested;
    } else {
      result[key] = child;
    }
  }
  return result;
}

export function mergeConfig(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] =
      isPlainObject(current) && isPlainObject(value)
        ? mergeConfig(current, value)
        : value;
  }
  return result;
}

export class ConfigLoader {
  /**
   * Load, merge and validate the configuration
   * @throws ConfigError when the file is unreadable or validation fails
   */
  static load(options: LoadConfigOptions = {}): PipelineConfig {
    const env = options.env ?? ENV_CONFIG;
    const filePath = options.filePath ?? env.CONFIG_PATH;

    let merged: RawConfig = {};
    if (filePath) {
      merged = mergeConfig(merged, ConfigLoader.readFile(filePath));
    }
    merged = mergeConfig(merged, ConfigLoader.fromEnv(env));
    if (options.overrides) {
      merged = mergeConfig(merged, compact(options.overrides));
    }

    const parsed = PipelineConfigSchema.safeParse(merged);
    if (!parsed.success) {
      throw new ConfigError(
        "Invalid configuration",
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
        ),
      );
    }

    logger.debug(
      {
        config_file: filePath,
        concurrency: parsed.data.concurrency,
        output_path: parsed.data.output.path,
        api_enabled: parsed.data.api.endpoint !== undefined,
      },
      "Configuration loaded",
    );

    return parsed.data;
  }

  /**
   * YAML file content as a raw object
   */
  static readFile(filePath: string): RawConfig {
    let content: string;
    try {
      content = fs.readFileSync(filePath, "utf8");
    } catch (error) {
      throw new ConfigError(
        `Config file not readable: ${filePath} (${errorMessage(error)})`,
      );
    }

    let document: unknown;
    try {
      document = yaml.load(content);
    } catch (error) {
      throw new ConfigError(
        `Config file is not valid YAML: ${filePath} (${errorMessage(error)})`,
      );
    }

    if (document === undefined || document === null) return {};
    if (!isPlainObject(document)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return document;
  }

  /**
   * Environment values mapped onto the config shape
   */
  static fromEnv(env: EnvConfig): RawConfig {
    return compact({
      concurrency: env.CONCURRENCY,
      limit: env.LIMIT,
      runDeadlineMs: env.RUN_DEADLINE_MS,
      browser: {
        sessions: env.BROWSER_SESSIONS,
        headless: env.BROWSER_HEADLESS,
        navigationTimeoutMs: env.FETCH_TIMEOUT_MS,
      },
      retry: {
        maxRetries: env.FETCH_MAX_RETRIES,
      },
      output: {
        path: env.OUTPUT_PATH,
        statusPath: env.STATUS_PATH,
      },
      api: {
        endpoint: env.API_ENDPOINT,
        authToken: env.API_AUTH_TOKEN,
        mode: env.API_MODE,
        maxAttempts: env.API_MAX_ATTEMPTS,
      },
    });
  }
}
