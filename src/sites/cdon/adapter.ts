// src/sites/cdon/adapter.ts
import { PROMO_PHRASES } from "../../core/extraction/title-validator";
import type { SiteAdapter } from "../../core/types/index";

const BASE_URL = "https://cdon.fi";

export const adapter: SiteAdapter = {
  key: "cdon",
  displayName: "CDON.fi",
  baseUrl: BASE_URL,
  baseHost: "cdon.fi",

  productPathMarker: "/tuote/",

  listing: {
    productLinkSelector: 'a[href*="/tuote/"]',
    fallbackContainerSelector: 'main, [data-testid="product-grid"], .products',
  },

  selectors: {
    // product pages put the name in h1 and the price in h2
    title: ["h1", "h2", '[data-testid*="title"]', ".product-title", ".title"],
    price: [
      "h2",
      '[class*="price"]',
      ".price",
      '[data-testid*="price"]',
      '[class*="product-price"]',
    ],
    original: [
      ".original-price",
      ".old-price",
      '[class*="original"]',
      "del",
      "s",
      '[style*="line-through"]',
    ],
    availability: [
      ".availability",
      ".stock-status",
      '[class*="availability"]',
      '[class*="stock"]',
    ],
    image: [
      ".product-image img",
      ".product-photo img",
      '[class*="product"] img',
      "main img",
    ],
  },

  documentTitleSeparator: " | ",

  promoPhrases: PROMO_PHRASES,
  shippingKeywords: ["toimitus", "shipping"],
  productionYearLabels: ["nauhoitusvuosi"],

  categories: {
    bluray: `${BASE_URL}/elokuvat/?facets=property_preset_media_format%3Ablu-ray&q=`,
    "4k": `${BASE_URL}/elokuvat/?facets=property_preset_media_format%3A4k%20ultra%20hd&q=`,
  },
};
