/**
 * Application constants
 */

// Database constants
export const DB_CONSTANTS = {
  CACHE_SIZE: -200000,
  MMAP_SIZE: 268435456,
  JOURNAL_MODE: "WAL",
  SYNCHRONOUS: "NORMAL",
} as const;

// Listing crawl constants
export const CRAWL_CONSTANTS = {
  NAVIGATION_TIMEOUT_MS: 20000,
  SELECTOR_TIMEOUT_MS: 15000,
  SETTLE_DELAY_MS: 1000,
  PAGE_DELAY_MS: 2000,
  MAX_RETRIES: 3,
  RETRY_BASE_DELAY_MS: 2000, // 2s, 4s, 8s
  MAX_CONSECUTIVE_EMPTY_PAGES: 3,
  DEFAULT_MAX_PAGES: 10,
} as const;

// Product page constants
export const PARSER_CONSTANTS = {
  TIMEOUT_MS: 10000,
  MIN_PRICE: 5.0,
  DEFAULT_AVAILABILITY: "In Stock",
} as const;

// Item delay per scan mode, in seconds
export const SCAN_DELAYS = {
  fast: 2,
  moderate: 180,
  slow: 1800,
} as const;

export type ScanMode = keyof typeof SCAN_DELAYS;

// Browser constants
export const BROWSER_CONSTANTS = {
  LISTING_USER_AGENT:
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36",
  PRODUCT_USER_AGENT:
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36",
  ACCEPT_HEADER:
    "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
  ACCEPT_LANGUAGE: "fi-FI,fi;q=0.8,en;q=0.6",
  ACCEPT_ENCODING: "gzip, deflate, br",
  VIEWPORT: { width: 1920, height: 1080 },
  LOCALE: "fi-FI",
  TIMEZONE_ID: "Europe/Helsinki",
} as const;

// Metadata service constants
export const TMDB_CONSTANTS = {
  BASE_URL: "https://api.themoviedb.org/3",
  IMAGE_BASE_URL: "https://image.tmdb.org/t/p/w500",
  MIN_REQUEST_INTERVAL_MS: 20,
  TIMEOUT_MS: 10000,
} as const;

// Discord embed colors
export const NOTIFY_CONSTANTS = {
  PRICE_DROP_COLOR: 0x00ff00,
  DEFAULT_COLOR: 0x0099ff,
  TIMEOUT_MS: 10000,
} as const;

// Monitor constants
export const MONITOR_CONSTANTS = {
  ITEM_DELAY_MS: 2000,
} as const;
