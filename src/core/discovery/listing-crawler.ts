/**
 * Collects product URLs from paginated category listings
 */

import { isTransientNavigationError } from "../browser/errors";
import type { CrawlPage, CrawlSessionFactory } from "../browser/page";
import type { ListingCrawlerConfig } from "../types/index";
import { Logger } from "../utils/logger";
import { RetryError, type Sleep, sleep, withRetry } from "../utils/retry";
import { listingPageUrl, resolveLocation } from "../utils/url";

export class ListingCrawler {
  private readonly sleep: Sleep;

  constructor(
    private readonly config: ListingCrawlerConfig,
    private readonly createSession: CrawlSessionFactory,
  ) {
    this.sleep = config.sleep ?? sleep;
  }

  /**
   * Visits listing pages 1..maxPages in order and returns the de-duplicated
   * product URLs found. Stops early after `maxConsecutiveEmptyPages` empty
   * pages in a row.
   * @throws when the browser session cannot be created
   */
  async crawlCategory(categoryUrl: string, maxPages: number): Promise<string[]> {
    if (maxPages <= 0) return [];

    const session = await this.createSession();
    const all = new Set<string>();
    let emptyPages = 0;

    try {
      for (let pageNumber = 1; pageNumber <= maxPages; pageNumber++) {
        if (pageNumber > 1) await this.sleep(this.config.pageDelayMs);

        const url = listingPageUrl(categoryUrl, pageNumber);
        Logger.info(`Crawling page ${pageNumber}: ${url}`, { url, page: pageNumber });
        const urls = await this.crawlPage(session.page, url);

        if (urls.length === 0) {
          emptyPages++;
          Logger.info(`No URLs found on page ${pageNumber} (empty count: ${emptyPages})`, {
            page: pageNumber,
            count: emptyPages,
          });
          if (emptyPages >= this.config.maxConsecutiveEmptyPages) {
            Logger.info(`${emptyPages} consecutive empty pages found, stopping`);
            break;
          }
          continue;
        }

        emptyPages = 0;
        for (const u of urls) all.add(u);
        Logger.pageCrawled(url, pageNumber, urls.length, all.size);
      }
    } catch (error) {
      Logger.error("Error during crawling", error, { category: categoryUrl });
    } finally {
      try {
        await session.close();
      } catch (error) {
        Logger.error("Error closing browser session", error, { category: categoryUrl });
      }
    }

    return [...all];
  }

  /**
   * One listing page with retries; failures end as an empty result
   */
  async crawlPage(page: CrawlPage, url: string): Promise<string[]> {
    try {
      return await withRetry(() => this.extractProductUrls(page, url), {
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.retryBaseDelayMs,
        backoffMultiplier: 2,
        jitterMs: 0,
        sleep: this.sleep,
        retryCondition: isTransientNavigationError,
        onRetry: (error, attempt, delayMs) =>
          Logger.warn(
            `Network error (attempt ${attempt}/${this.config.maxRetries + 1}), retrying in ${delayMs}ms`,
            { url, attempt, error: error.message },
          ),
      });
    } catch (error) {
      if (error instanceof RetryError) {
        Logger.error(
          `Max retries (${this.config.maxRetries}) reached for ${url}`,
          error.originalError,
          { url },
        );
      } else {
        Logger.error(`Non-network error for ${url}`, error, { url });
      }
      return [];
    }
  }

  private async extractProductUrls(page: CrawlPage, url: string): Promise<string[]> {
    const { site } = this.config;

    await page.goto(url, {
      waitUntil: this.config.navigationWaitUntil,
      timeout: this.config.navigationTimeoutMs,
    });

    await this.waitForProducts(page);
    await this.sleep(this.config.settleDelayMs);

    const links = await page.queryAll(site.listing.productLinkSelector);
    const urls = new Set<string>();
    for (const link of links) {
      try {
        const href = await link.getAttribute("href");
        if (!href || !href.includes(site.productPathMarker)) continue;
        const abs = resolveLocation(site.baseUrl, href);
        if (abs) urls.add(abs);
      } catch (error) {
        Logger.debug("Error extracting href", {
          url,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    Logger.debug(`Extracted ${urls.size} unique product URLs`, { url, count: urls.size });
    return [...urls];
  }

  // A timed-out wait is not a failure: the links are collected from
  // whatever rendered.
  private async waitForProducts(page: CrawlPage): Promise<void> {
    const { listing } = this.config.site;
    const timeout = this.config.selectorTimeoutMs;
    try {
      await page.waitForSelector(listing.productLinkSelector, { timeout, state: "visible" });
      return;
    } catch (error) {
      Logger.warn("Product links not found, trying alternative selectors", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    try {
      await page.waitForSelector(listing.fallbackContainerSelector, { timeout });
    } catch (error) {
      Logger.warn("No specific selectors found, proceeding with page scrape", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
