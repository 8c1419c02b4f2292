/**
 * Environment-derived settings
 * Read once at module load; ConfigLoader layers them over file values.
 */

/**
 * Number, or the raw string when it is not numeric so that validation
 * reports it
 */
export function readInt(name: string): number | string | undefined {
  const raw = readString(name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : raw;
}

function readString(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw.trim() === "" ? undefined : raw.trim();
}

export function readBoolean(name: string): boolean | string | undefined {
  const raw = readString(name);
  if (raw === undefined) return undefined;
  const normalized = raw.toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return raw;
}

/**
 * Pipeline settings from the environment (undefined = not set)
 */
export const ENV_CONFIG = {
  CONCURRENCY: readInt("SCRAPER_CONCURRENCY"),
  LIMIT: readInt("SCRAPER_LIMIT"),
  RUN_DEADLINE_MS: readInt("RUN_DEADLINE_MS"),
  BROWSER_SESSIONS: readInt("BROWSER_SESSIONS"),
  BROWSER_HEADLESS: readBoolean("BROWSER_HEADLESS"),
  FETCH_TIMEOUT_MS: readInt("FETCH_TIMEOUT_MS"),
  FETCH_MAX_RETRIES: readInt("FETCH_MAX_RETRIES"),
  OUTPUT_PATH: readString("OUTPUT_PATH"),
  STATUS_PATH: readString("STATUS_PATH"),
  API_ENDPOINT: readString("API_ENDPOINT"),
  API_AUTH_TOKEN: readString("API_AUTH_TOKEN"),
  API_MODE: readString("API_MODE"),
  API_MAX_ATTEMPTS: readInt("API_MAX_ATTEMPTS"),
  CONFIG_PATH: readString("SCRAPER_CONFIG"),
};

export type EnvConfig = typeof ENV_CONFIG;

/**
 * Run status heartbeat
 */
export const STATUS_CONFIG = {
  HEARTBEAT_INTERVAL_MS: 30_000,
};

/**
 * Page titles treated as not-found / access-denied pages (lower-case)
 */
export const BLOCKED_TITLE_MARKERS = [
  "404",
  "not found",
  "access denied",
  "страница не найдена",
  "доступ запрещен",
];
