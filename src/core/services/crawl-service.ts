/**
 * Crawl Service - reusable crawl and watchlist-check runs
 * Can be used from the CLI, BullMQ workers, or any other context
 */

import { DEFAULT_SITE, registry, resolveCategories } from "../../sites/registry";
import { playwrightSessionFactory } from "../browser/launcher";
import type { CrawlSessionFactory } from "../browser/page";
import { AppConfig } from "../config/app-config";
import { browserConfigFromEnv, crawlerConfigFromEnv, parserConfigFromEnv } from "../config/pipeline";
import { closeDb, openDb } from "../database/connection";
import { MovieRepository } from "../database/repository";
import { MovieStore } from "../database/store";
import { ListingCrawler } from "../discovery/listing-crawler";
import { CrawlOrchestrator } from "../execution/orchestrator";
import { ProductParser } from "../product/parser";
import type { SiteAdapter } from "../types/index";
import { Logger } from "../utils/logger";
import type { Sleep } from "../utils/retry";
import { type MonitorResult, PriceMonitor } from "./monitor";
import { NotificationService } from "./notifications";
import { TmdbService } from "./tmdb";

export interface CrawlServiceOptions {
  /** "bluray", "4k" or "all" */
  category?: string;
  maxPages?: number;
  siteKey?: string;
  dbPath?: string;
  itemDelayMs?: number;
  createSession?: CrawlSessionFactory;
  /** Metadata lookups; defaults to TMDB when an API key is configured */
  tmdb?: TmdbService;
  sleep?: Sleep;
}

export interface CrawlResult {
  category: string;
  url: string;
  success: boolean;
  saved: number;
  error?: string;
}

export function createTmdbService(): TmdbService | undefined {
  if (!AppConfig.TMDB_API_KEY) return undefined;
  return new TmdbService({ apiKey: AppConfig.TMDB_API_KEY, posterDir: AppConfig.POSTER_DIR });
}

function siteFor(siteKey?: string): SiteAdapter {
  if (!siteKey) return DEFAULT_SITE;
  const site = registry.get(siteKey);
  if (!site) throw new Error(`Unknown site: ${siteKey}`);
  return site;
}

/** Listing page ceiling: a non-negative integer, 0 crawls nothing */
export function isPageCeiling(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Crawls each requested category into the database. A category whose
 * browser session cannot start is reported as failed; the others still run.
 */
export async function runCrawl(options: CrawlServiceOptions = {}): Promise<CrawlResult[]> {
  const {
    category = "all",
    maxPages = AppConfig.MAX_PAGES_PER_CATEGORY,
    dbPath = AppConfig.DB_PATH,
    itemDelayMs = AppConfig.itemDelayMs(),
  } = options;
  const site = siteFor(options.siteKey);
  const categories = resolveCategories(category, site);
  if (categories.length === 0) throw new Error(`Unknown category: ${category}`);
  if (!isPageCeiling(maxPages)) throw new Error(`Invalid page ceiling: ${maxPages}`);

  const handles = openDb(dbPath);
  const parser = new ProductParser(parserConfigFromEnv(site));
  const crawler = new ListingCrawler(
    crawlerConfigFromEnv(site, options.sleep ? { sleep: options.sleep } : {}),
    options.createSession ?? playwrightSessionFactory(browserConfigFromEnv()),
  );
  const store = new MovieStore(new MovieRepository(handles.db), options.tmdb ?? createTmdbService());
  const orchestrator = new CrawlOrchestrator(crawler, parser, store, {
    itemDelayMs,
    sleep: options.sleep,
  });

  const results: CrawlResult[] = [];
  try {
    for (const [key, url] of categories) {
      Logger.info(`\n=== Starting category: ${key} ===`, { category: key });
      try {
        const saved = await orchestrator.crawlCategory(url, maxPages);
        results.push({ category: key, url, success: true, saved });
      } catch (error) {
        Logger.error(`Category ${key} failed`, error, { category: key });
        results.push({
          category: key,
          url,
          success: false,
          saved: 0,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  } finally {
    parser.close();
    closeDb(handles);
  }

  const total = results.reduce((sum, r) => sum + r.saved, 0);
  Logger.info(`Crawl finished: ${total} movies saved`, { count: total });
  return results;
}

/**
 * Re-checks every watchlist item and sends the resulting alerts
 */
export async function runWatchlistCheck(
  options: Pick<CrawlServiceOptions, "dbPath" | "siteKey" | "tmdb" | "sleep" | "itemDelayMs"> & {
    discordWebhook?: string;
  } = {},
): Promise<MonitorResult> {
  const handles = openDb(options.dbPath ?? AppConfig.DB_PATH);
  const parser = new ProductParser(parserConfigFromEnv(siteFor(options.siteKey)));
  try {
    const repository = new MovieRepository(handles.db);
    const monitor = new PriceMonitor(
      repository,
      parser,
      new MovieStore(repository, options.tmdb ?? createTmdbService()),
      new NotificationService(options.discordWebhook ?? AppConfig.DISCORD_WEBHOOK),
      { itemDelayMs: options.itemDelayMs, sleep: options.sleep },
    );
    return await monitor.checkWatchlistPrices();
  } finally {
    parser.close();
    closeDb(handles);
  }
}
