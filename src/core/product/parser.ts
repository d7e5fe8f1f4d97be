/**
 * Product page parser: one plain HTTP fetch per URL, fields resolved from the
 * static HTML with ordered fallback strategies
 */

import { type CheerioAPI, load as loadHtml } from "cheerio";
import {
  determineFormat,
  extractPriceFromText,
  extractProductId,
  extractProductionYear,
} from "../extraction/fields";
import { type NamedStrategy, firstOf, resolveField } from "../extraction/strategy";
import { isValidTitle } from "../extraction/title-validator";
import type { ProductParserConfig, ProductRecord } from "../types/index";
import { Logger } from "../utils/logger";
import { isOnHost, resolveLocation } from "../utils/url";

const CURRENCY_MARKER = /€|\bEUR\b/;
const CURRENCY_AMOUNT = /\d+[,.]?\d*\s*€/;

const collapse = (s: string): string => s.replace(/\s+/g, " ").trim();

export class ProductParser {
  // cookies set by the site, replayed on later requests of this parser
  private readonly cookies = new Map<string, string>();

  constructor(private readonly config: ProductParserConfig) {}

  /**
   * True for http(s) URLs on the site's host whose path has the product
   * marker
   */
  isProductUrl(url: string): boolean {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }
    const { site } = this.config;
    return (
      (parsed.protocol === "http:" || parsed.protocol === "https:") &&
      isOnHost(parsed.hostname, site.baseHost) &&
      parsed.pathname.includes(site.productPathMarker)
    );
  }

  /**
   * Fetches and parses one product page. Every failure (foreign URL, HTTP
   * error, missing title or price) yields null and is logged.
   */
  async parseProductPage(url: string): Promise<ProductRecord | null> {
    if (!this.isProductUrl(url)) {
      Logger.warn(`Not a product URL, skipping: ${url}`, { url });
      return null;
    }

    let html: string;
    try {
      Logger.debug(`Fetching product page: ${url}`, { url });
      const res = await fetch(url, {
        headers: this.requestHeaders(),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      this.storeCookies(res.headers);
      if (!res.ok) {
        Logger.warn(`HTTP ${res.status} fetching ${url}`, { url, status: res.status });
        return null;
      }
      html = await res.text();
    } catch (error) {
      Logger.error(`HTTP error fetching ${url}`, error, { url });
      return null;
    }

    return this.parseHtml(html, url);
  }

  /**
   * Builds a record from already fetched HTML
   */
  parseHtml(html: string, url: string): ProductRecord | null {
    try {
      const $ = loadHtml(html);

      const title = this.extractTitle($);
      if (!title) {
        Logger.warn(`No title found for ${url}`, { url });
        return null;
      }

      const price = this.extractPrice($);
      if (price === null) {
        Logger.warn(`No price found for ${url}`, { url });
        return null;
      }

      const record: ProductRecord = {
        title,
        price,
        originalPrice: this.extractOriginalPrice($),
        url,
        format: determineFormat(title),
        availability: this.extractAvailability($),
        imageUrl: this.extractImageUrl($),
        productId: extractProductId(url),
        productionYear: extractProductionYear($, this.config.site.productionYearLabels),
      };
      Logger.productParsed(url, record.title, record.price);
      return record;
    } catch (error) {
      Logger.error(`Error parsing ${url}`, error, { url });
      return null;
    }
  }

  /** Forgets cookies collected so far */
  close(): void {
    this.cookies.clear();
  }

  extractTitle($: CheerioAPI): string | null {
    const { site } = this.config;
    const valid = (s: string) => isValidTitle(s, site.promoPhrases);

    const strategies: NamedStrategy<string>[] = site.selectors.title.map((sel) => ({
      name: sel,
      run: () => {
        for (const el of $(sel).toArray()) {
          const text = collapse($(el).text());
          if (valid(text)) return text;
        }
        return null;
      },
    }));
    strategies.push({
      name: "<title>",
      run: () => {
        const text = collapse($("title").first().text());
        if (!text.includes(site.documentTitleSeparator)) return null;
        const candidate = text.split(site.documentTitleSeparator)[0].trim();
        return valid(candidate) ? candidate : null;
      },
    });

    const hit = resolveField(strategies);
    if (hit) Logger.debug(`Found title with ${hit.strategy}: ${hit.value}`);
    return hit ? hit.value : null;
  }

  /**
   * Accepts text as the product price when it carries a currency marker,
   * the amount is above the fee floor and no shipping keyword occurs
   */
  acceptPrice(text: string): number | null {
    if (!CURRENCY_MARKER.test(text)) return null;
    const price = extractPriceFromText(text);
    if (price === null || price <= this.config.minPrice) return null;
    const lower = text.toLowerCase();
    if (this.config.site.shippingKeywords.some((k) => lower.includes(k))) return null;
    return price;
  }

  extractPrice($: CheerioAPI): number | null {
    const bySelectors = this.config.site.selectors.price.map((sel) => () => {
      for (const el of $(sel).toArray()) {
        const price = this.acceptPrice(collapse($(el).text()));
        if (price !== null) return price;
      }
      return null;
    });

    return firstOf<number>([
      ...bySelectors,
      () => {
        for (const text of textNodes($)) {
          if (!CURRENCY_AMOUNT.test(text)) continue;
          const price = this.acceptPrice(text);
          if (price !== null) return price;
        }
        return null;
      },
    ]);
  }

  extractOriginalPrice($: CheerioAPI): number | null {
    for (const sel of this.config.site.selectors.original) {
      for (const el of $(sel).toArray()) {
        const price = extractPriceFromText(collapse($(el).text()));
        if (price !== null) return price;
      }
    }
    return null;
  }

  extractAvailability($: CheerioAPI): string {
    for (const sel of this.config.site.selectors.availability) {
      const text = collapse($(sel).first().text());
      if (text) return text;
    }
    return this.config.defaultAvailability;
  }

  extractImageUrl($: CheerioAPI): string | null {
    for (const sel of this.config.site.selectors.image) {
      const img = $(sel).first();
      if (!img.length) continue;
      const src = img.attr("src") || img.attr("data-src");
      if (src) return resolveLocation(this.config.site.baseUrl, src);
    }
    return null;
  }

  private requestHeaders(): Record<string, string> {
    const headers = { ...this.config.headers };
    if (this.cookies.size > 0) {
      headers.Cookie = [...this.cookies].map(([k, v]) => `${k}=${v}`).join("; ");
    }
    return headers;
  }

  private storeCookies(headers: Headers): void {
    for (const line of headers.getSetCookie()) {
      const pair = line.split(";")[0];
      const eq = pair.indexOf("=");
      if (eq > 0) this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
  }
}

/**
 * Text of every text node outside script and style, elements in document
 * order
 */
function textNodes($: CheerioAPI): string[] {
  const out: string[] = [];
  for (const el of $("*").not("script, style, noscript").toArray()) {
    for (const node of $(el).contents().toArray()) {
      if (node.nodeType !== 3) continue;
      const text = collapse($(node).text());
      if (text) out.push(text);
    }
  }
  return out;
}
