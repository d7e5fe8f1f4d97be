/**
 * Pure field extractors for product data
 */

import type { CheerioAPI } from "cheerio";
import type { MediaFormat } from "../types/index";
import { firstOf } from "./strategy";

export const MIN_YEAR = 1900;
export const MAX_YEAR = 2030;

/**
 * Extracts a euro amount from free text such as "Price: 24,99 €".
 * Currency markers and all whitespace are removed and "," is read as the
 * decimal separator before the first number is taken.
 * @returns The amount, or null when the text holds no number
 */
export function extractPriceFromText(text: string): number | null {
  const cleaned = text
    .replace(/€/g, "")
    .replace(/EUR/g, "")
    .replace(/\s/g, "")
    .replace(/,/g, ".");
  const m = cleaned.match(/(\d+\.?\d*)/);
  if (!m) return null;
  const value = parseFloat(m[1]);
  return Number.isFinite(value) ? value : null;
}

const FOUR_K_MARKERS = ["4k", "uhd", "ultra hd"];
const BLURAY_MARKERS = ["blu-ray", "bluray", "bd"];

/**
 * Classifies a title; 4K markers win over Blu-ray markers, DVD is the
 * fallback when neither occurs.
 */
export function determineFormat(title: string): MediaFormat {
  const t = title.toLowerCase();
  if (FOUR_K_MARKERS.some((m) => t.includes(m))) return "4K Blu-ray";
  if (BLURAY_MARKERS.some((m) => t.includes(m))) return "Blu-ray";
  return "DVD";
}

export function isBlurayFormat(format: MediaFormat): boolean {
  return format === "Blu-ray" || format === "4K Blu-ray";
}

const OUT_OF_STOCK = [
  /\bloppu/i,
  /\bei\s+(saatavilla|varastossa)\b/i,
  /\bout\s+of\s+stock\b/i,
  /\bsold\s+out\b/i,
  /\bunavailable\b/i,
];

/**
 * Reads the free-text availability line; anything not marked as sold out
 * counts as purchasable.
 */
export function isInStock(availability: string): boolean {
  return !OUT_OF_STOCK.some((re) => re.test(availability));
}

/**
 * Product id from a product URL: the hex token after the last hyphen of
 * the slug, else a trailing run of at least 8 hex characters.
 * @example extractProductId("https://cdon.fi/tuote/batman-1989-5cb24b79a41d59c4/") // "5cb24b79a41d59c4"
 */
export function extractProductId(url: string): string | null {
  const slug = url.match(/\/tuote\/[^/]+-([a-f0-9]+)\/?$/);
  if (slug) return slug[1];

  const trailing = url.replace(/\/+$/, "").match(/([a-f0-9]{8,})$/);
  return trailing ? trailing[1] : null;
}

/**
 * Takes the first standalone 4-digit run and accepts it when it lies in
 * [1900, 2030]. Later runs are not considered.
 */
export function extractValidYear(text: string): number | null {
  const m = text.match(/(?<!\d)(\d{4})(?!\d)/);
  if (!m) return null;
  const year = parseInt(m[1], 10);
  return year >= MIN_YEAR && year <= MAX_YEAR ? year : null;
}

/**
 * Year written in parentheses in a title, e.g. "Batman (1989)"
 */
export function extractYearFromTitle(title: string): number | null {
  const m = title.match(/\((\d{4})\)/);
  return m ? parseInt(m[1], 10) : null;
}

const collapse = (s: string): string => s.replace(/\s+/g, " ").trim();

// label cell -> value cell pairs that product spec tables use
const LABEL_VALUE_PAIRS: ReadonlyArray<[string, string]> = [
  ["p", "p"],
  ["dt", "dd"],
  ["th", "td"],
];

/**
 * Label element whose next element sibling holds the year, e.g.
 * `<p>Nauhoitusvuosi</p><p>1989</p>`
 */
export function yearFromLabelSibling(
  $: CheerioAPI,
  labels: readonly string[],
): number | null {
  const terms = labels.map((l) => l.toLowerCase());
  for (const [labelTag, valueTag] of LABEL_VALUE_PAIRS) {
    const cells = $(labelTag).toArray();
    for (const cell of cells) {
      const label = collapse($(cell).text()).toLowerCase();
      if (!terms.some((t) => label.includes(t))) continue;

      const next = $(cell).next();
      if (!next.length || !next.is(valueTag)) continue;
      const year = extractValidYear(collapse(next.text()));
      if (year !== null) return year;
    }
  }
  return null;
}

const CONTAINER_TAGS = "div, li, section, span";

/**
 * Container whose text holds the label followed by the year, e.g.
 * `<div>Nauhoitusvuosi: 1989</div>`. Only the text after the label is
 * searched; containers are visited in document order.
 */
export function yearFromContainerText(
  $: CheerioAPI,
  labels: readonly string[],
): number | null {
  const terms = labels.map((l) => l.toLowerCase());
  for (const el of $(CONTAINER_TAGS).toArray()) {
    const text = collapse($(el).text());
    const lower = text.toLowerCase();
    for (const term of terms) {
      const at = lower.indexOf(term);
      if (at < 0) continue;
      const year = extractValidYear(text.slice(at + term.length));
      if (year !== null) return year;
    }
  }
  return null;
}

/**
 * Production ("recording") year from a product page's detail fields
 * @param labels - Label texts naming the field, matched case-insensitively
 */
export function extractProductionYear(
  $: CheerioAPI,
  labels: readonly string[],
): number | null {
  return firstOf<number>([
    () => yearFromLabelSibling($, labels),
    () => yearFromContainerText($, labels),
  ]);
}
