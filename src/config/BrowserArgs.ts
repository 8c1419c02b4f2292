/**
 * Browser launch arguments
 *
 * Chromium flags grouped by purpose so launch profiles can combine them.
 */

import type { BrowserConfig } from "@/core/domain/PipelineConfig";

export const BROWSER_ARGS = {
  /**
   * Memory-lean flags for long-running scraping sessions
   */
  MEMORY_OPTIMIZED: [
    "--disable-dev-shm-usage",
    "--disable-gpu",
    "--disable-software-rasterizer",
    "--disable-extensions",
    "--disable-background-networking",
    "--disable-default-apps",
    "--no-first-run",
    "--no-zygote",
  ],

  /**
   * Hide the automation marker from page scripts
   */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /**
   * Required inside containers
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  /**
   * Container + memory + stealth
   */
  get DEFAULT(): string[] {
    return [...this.SANDBOX, ...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },

  /**
   * Local development (keeps the sandbox)
   */
  get LOCAL_DEV(): string[] {
    return [...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },
};

/**
 * Launch flags for a session: configured args win, otherwise the container
 * profile when headless and the local one when headed
 */
export function resolveLaunchArgs(
  browser: Pick<BrowserConfig, "headless" | "args">,
): string[] {
  if (browser.args) return [...browser.args];
  return browser.headless ? BROWSER_ARGS.DEFAULT : BROWSER_ARGS.LOCAL_DEV;
}
