/**
 * Command line arguments
 *
 * Flags map onto config overrides, which win over file and environment.
 */

import { ConfigError } from "@/core/interfaces/ScrapeErrorType";

export interface CliOptions {
  help: boolean;
  inputPath?: string;
  configPath?: string;
  overrides: Record<string, unknown>;
}

export const USAGE = `Usage: product-harvest --input <file> [options]

Options:
  -i, --input <file>          URL list (.json array or text, one URL per line)
  -c, --config <file>         YAML configuration file
  -o, --output <path>         Output JSON file
      --concurrency <n>       Parallel workers
      --limit <n>             Process only the first n URLs (0 = all)
      --deadline <ms>         Global run deadline
      --api-endpoint <url>    Downstream API endpoint
      --api-mode <mode>       "document" or "per-record"
      --headed                Show the browser windows
  -h, --help                  Show this help
`;

function readInteger(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${flag} expects an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * @param argv - arguments after the script name
 * @throws ConfigError on unknown flags or missing values
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { help: false, overrides: {} };
  const browser: Record<string, unknown> = {};
  const output: Record<string, unknown> = {};
  const api: Record<string, unknown> = {};

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const takeValue = (): string => {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new ConfigError(`${flag} requires a value`);
      }
      i++;
      return value;
    };

    switch (flag) {
      case "-h":
      case "--help":
        options.help = true;
        break;
      case "-i":
      case "--input":
        options.inputPath = takeValue();
        break;
      case "-c":
      case "--config":
        options.configPath = takeValue();
        break;
      case "-o":
      case "--output":
        output.path = takeValue();
        break;
      case "--concurrency":
        options.overrides.concurrency = readInteger(flag, takeValue());
        break;
      case "--limit":
        options.overrides.limit = readInteger(flag, takeValue());
        break;
      case "--deadline":
        options.overrides.runDeadlineMs = readInteger(flag, takeValue());
        break;
      case "--api-endpoint":
        api.endpoint = takeValue();
        break;
      case "--api-mode":
        api.mode = takeValue();
        break;
      case "--headed":
        browser.headless = false;
        break;
      default:
        throw new ConfigError(`Unknown argument: ${flag}`);
    }
  }

  if (Object.keys(browser).length > 0) options.overrides.browser = browser;
  if (Object.keys(output).length > 0) options.overrides.output = output;
  if (Object.keys(api).length > 0) options.overrides.api = api;

  if (!options.help && !options.inputPath) {
    throw new ConfigError("--input is required");
  }
  return options;
}
