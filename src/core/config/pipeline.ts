/**
 * Builders for the explicit configuration values the crawler and parser take
 */

import { DEFAULT_SITE } from "../../sites/registry";
import { BROWSER_CONSTANTS, CRAWL_CONSTANTS, PARSER_CONSTANTS } from "../constants/index";
import type {
  BrowserSessionConfig,
  ListingCrawlerConfig,
  ProductParserConfig,
  SiteAdapter,
} from "../types/index";
import { envBool, envInt } from "./env";

export function crawlerConfigFromEnv(
  site: SiteAdapter = DEFAULT_SITE,
  overrides: Partial<ListingCrawlerConfig> = {},
): ListingCrawlerConfig {
  return {
    site,
    navigationTimeoutMs: envInt("NAV_TIMEOUT_MS", CRAWL_CONSTANTS.NAVIGATION_TIMEOUT_MS),
    navigationWaitUntil: "networkidle",
    selectorTimeoutMs: envInt("SELECTOR_TIMEOUT_MS", CRAWL_CONSTANTS.SELECTOR_TIMEOUT_MS),
    settleDelayMs: CRAWL_CONSTANTS.SETTLE_DELAY_MS,
    pageDelayMs: envInt("PAGE_DELAY_MS", CRAWL_CONSTANTS.PAGE_DELAY_MS),
    maxRetries: CRAWL_CONSTANTS.MAX_RETRIES,
    retryBaseDelayMs: CRAWL_CONSTANTS.RETRY_BASE_DELAY_MS,
    maxConsecutiveEmptyPages: CRAWL_CONSTANTS.MAX_CONSECUTIVE_EMPTY_PAGES,
    ...overrides,
  };
}

export function parserConfigFromEnv(
  site: SiteAdapter = DEFAULT_SITE,
  overrides: Partial<ProductParserConfig> = {},
): ProductParserConfig {
  return {
    site,
    timeoutMs: envInt("PRODUCT_TIMEOUT_MS", PARSER_CONSTANTS.TIMEOUT_MS),
    headers: {
      "User-Agent": BROWSER_CONSTANTS.PRODUCT_USER_AGENT,
      Accept: BROWSER_CONSTANTS.ACCEPT_HEADER,
      "Accept-Language": BROWSER_CONSTANTS.ACCEPT_LANGUAGE,
      "Accept-Encoding": BROWSER_CONSTANTS.ACCEPT_ENCODING,
      DNT: "1",
      Connection: "keep-alive",
    },
    minPrice: PARSER_CONSTANTS.MIN_PRICE,
    defaultAvailability: PARSER_CONSTANTS.DEFAULT_AVAILABILITY,
    ...overrides,
  };
}

export function browserConfigFromEnv(): BrowserSessionConfig {
  return {
    headless: envBool("HEADLESS", true),
    userAgent: BROWSER_CONSTANTS.LISTING_USER_AGENT,
    viewport: { ...BROWSER_CONSTANTS.VIEWPORT },
    locale: BROWSER_CONSTANTS.LOCALE,
    timezoneId: BROWSER_CONSTANTS.TIMEZONE_ID,
    blockHeavyResources: envBool("BLOCK_HEAVY_RESOURCES", true),
  };
}
