/**
 * Browser launcher
 *
 * Chromium through playwright-extra with the stealth plugin applied.
 */

import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import type { Browser } from "playwright-core";

chromium.use(StealthPlugin());

export interface LaunchOptions {
  headless: boolean;
  args: string[];
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<Browser>;

export const launchStealthChromium: BrowserLauncher = (options) =>
  chromium.launch({ headless: options.headless, args: options.args });
