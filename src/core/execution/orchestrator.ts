/**
 * Category crawl: listing URLs -> product records -> sink
 */

import type { ListingCrawler } from "../discovery/listing-crawler";
import { isBlurayFormat } from "../extraction/fields";
import type { ProductParser } from "../product/parser";
import type { ProductSink } from "../types/index";
import { Logger } from "../utils/logger";
import { type Sleep, sleep } from "../utils/retry";

export interface OrchestratorOptions {
  /** Pause after each product page, in ms */
  itemDelayMs?: number;
  sleep?: Sleep;
  /** Log a progress line every n saved records */
  progressEvery?: number;
}

export class CrawlOrchestrator {
  private readonly sleep: Sleep;

  constructor(
    private readonly crawler: Pick<ListingCrawler, "crawlCategory">,
    private readonly parser: Pick<ProductParser, "parseProductPage">,
    private readonly sink: ProductSink,
    private readonly options: OrchestratorOptions = {},
  ) {
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Crawls one category and stores its Blu-ray and 4K Blu-ray products
   * @returns Number of records the sink accepted
   * @throws only when the listing crawler cannot start its browser session
   */
  async crawlCategory(categoryUrl: string, maxPages: number): Promise<number> {
    const started = Date.now();
    Logger.info(`Starting crawl of ${categoryUrl}`, { category: categoryUrl, maxPages });

    const urls = await this.crawler.crawlCategory(categoryUrl, maxPages);
    if (urls.length === 0) {
      Logger.warn("No product URLs found", { category: categoryUrl });
      return 0;
    }
    Logger.info(`Found ${urls.length} product URLs`, { category: categoryUrl, count: urls.length });

    const { itemDelayMs = 0, progressEvery = 10 } = this.options;
    let saved = 0;

    for (const [i, url] of urls.entries()) {
      try {
        Logger.debug(`Processing ${i + 1}/${urls.length}: ${url}`, { url });
        const record = await this.parser.parseProductPage(url);

        if (!record) {
          Logger.debug("Skipped: parsing failed", { url });
        } else if (!isBlurayFormat(record.format)) {
          Logger.debug(`Skipped: ${record.format}`, { url, format: record.format });
        } else if (await this.sink.save(record)) {
          saved++;
          Logger.info(`Saved (${saved}): ${record.title} - €${record.price}`, { url });
          if (saved % progressEvery === 0) {
            Logger.info(`Progress: ${saved} movies saved so far`, { count: saved });
          }
        } else {
          Logger.warn(`Failed to save: ${record.title}`, { url });
        }
      } catch (error) {
        Logger.error(`Error processing ${url}`, error, { url });
      }

      if (itemDelayMs > 0 && i < urls.length - 1) await this.sleep(itemDelayMs);
    }

    Logger.crawlComplete(categoryUrl, saved, Date.now() - started);
    return saved;
  }
}
