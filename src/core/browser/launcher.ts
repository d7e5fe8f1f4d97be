/**
 * Browser launching and configuration
 */

import { type Browser, chromium } from "playwright";
import type { BrowserSessionConfig } from "../types/index";
import { optimizePage } from "./optimization";
import { type CrawlSessionFactory, playwrightCrawlPage } from "./page";

// hides navigator.webdriver from the listing pages' bot checks
const STEALTH_SCRIPT = `
  Object.defineProperty(navigator, 'webdriver', {
    get: () => undefined,
  });
`;

/**
 * Launches a Chromium browser instance with optimized settings
 */
export async function launchBrowser(config: BrowserSessionConfig): Promise<Browser> {
  return await chromium.launch({
    headless: config.headless,
    args: [
      "--disable-blink-features=AutomationControlled",
      "--disable-dev-shm-usage",
      "--no-sandbox",
      "--disable-features=VizDisplayCompositor",
      `--user-agent=${config.userAgent}`,
    ],
  });
}

/**
 * Session factory for the listing crawler: one browser, one context with a
 * Finnish desktop identity, one page
 */
export function playwrightSessionFactory(
  config: BrowserSessionConfig,
): CrawlSessionFactory {
  return async () => {
    const browser = await launchBrowser(config);
    try {
      const context = await browser.newContext({
        userAgent: config.userAgent,
        viewport: config.viewport,
        locale: config.locale,
        timezoneId: config.timezoneId,
      });
      await context.addInitScript(STEALTH_SCRIPT);
      const page = await context.newPage();
      if (config.blockHeavyResources) await optimizePage(page);

      return {
        page: playwrightCrawlPage(page),
        close: () => browser.close(),
      };
    } catch (error) {
      await browser.close();
      throw error;
    }
  };
}
