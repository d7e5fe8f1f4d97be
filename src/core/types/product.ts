/**
 * Product-related types
 */

export const MEDIA_FORMATS = ["4K Blu-ray", "Blu-ray", "DVD"] as const;

/** Physical media classification derived from the title */
export type MediaFormat = (typeof MEDIA_FORMATS)[number];

/** Result of parsing one product page */
export interface ProductRecord {
  title: string;
  price: number; // euros, > 0
  originalPrice: number | null; // strikethrough / "was" price
  url: string; // absolute
  format: MediaFormat;
  availability: string; // free text, "In Stock" when the page has no signal
  imageUrl: string | null;
  productId: string | null; // derived from url
  productionYear: number | null; // 1900..2030
}

/** Persistence boundary used by the crawl orchestrator */
export interface ProductSink {
  save(record: ProductRecord): Promise<boolean>;
}
