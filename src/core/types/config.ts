/**
 * Configuration-related types
 */

import type { Sleep } from "../utils/retry";

/** SiteAdapter – everything the pipeline knows about the target store */
export interface SiteAdapter {
  key: string;
  displayName: string;
  baseUrl: string;
  baseHost: string;

  /** Path segment every product URL contains */
  productPathMarker: string;

  listing: {
    productLinkSelector: string;
    /** Waited on when product links do not become visible */
    fallbackContainerSelector: string;
  };

  /** Selectors tried in order per field */
  selectors: {
    title: string[];
    price: string[];
    original: string[];
    availability: string[];
    image: string[];
  };

  /** Separator between product name and shop name in <title> */
  documentTitleSeparator: string;
  promoPhrases: RegExp[];
  shippingKeywords: string[];
  productionYearLabels: string[];

  categories: Record<string, string>;
}

export type NavigationWaitUntil = "load" | "domcontentloaded" | "networkidle";

/** Explicit configuration for the listing crawler */
export interface ListingCrawlerConfig {
  site: SiteAdapter;
  navigationTimeoutMs: number;
  navigationWaitUntil: NavigationWaitUntil;
  selectorTimeoutMs: number;
  /** Pause after the wait so late-rendered cards are in the DOM */
  settleDelayMs: number;
  /** Pause between two page fetches */
  pageDelayMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  maxConsecutiveEmptyPages: number;
  sleep?: Sleep;
}

/** Explicit configuration for the product page parser */
export interface ProductParserConfig {
  site: SiteAdapter;
  timeoutMs: number;
  headers: Record<string, string>;
  /** Candidates at or below this value are fees, not prices */
  minPrice: number;
  defaultAvailability: string;
}

/** Browser launch settings for the listing crawler session */
export interface BrowserSessionConfig {
  headless: boolean;
  userAgent: string;
  viewport: { width: number; height: number };
  locale: string;
  timezoneId: string;
  /** Abort image, font and media requests on listing pages */
  blockHeavyResources: boolean;
}
