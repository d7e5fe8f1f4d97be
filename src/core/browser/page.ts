/**
 * The slice of a browser page the listing crawler drives
 */

import type { Page } from "playwright";
import type { NavigationWaitUntil } from "../types/index";

export interface LinkHandle {
  getAttribute(name: string): Promise<string | null>;
}

export interface CrawlPage {
  goto(
    url: string,
    options: { waitUntil: NavigationWaitUntil; timeout: number },
  ): Promise<unknown>;
  waitForSelector(
    selector: string,
    options: { timeout: number; state?: "attached" | "visible" },
  ): Promise<unknown>;
  queryAll(selector: string): Promise<LinkHandle[]>;
}

/** One browser (or stand-in) owned by a single crawl invocation */
export interface CrawlSession {
  page: CrawlPage;
  close(): Promise<void>;
}

export type CrawlSessionFactory = () => Promise<CrawlSession>;

/**
 * Wraps a Playwright page
 */
export function playwrightCrawlPage(page: Page): CrawlPage {
  return {
    goto: (url, options) => page.goto(url, options),
    waitForSelector: (selector, options) => page.waitForSelector(selector, options),
    queryAll: (selector) => page.$$(selector),
  };
}
