/**
 * Row shapes returned by the movie repository
 */

import type { MediaFormat } from "./product";

export type AlertType = "price_drop" | "target_reached" | "back_in_stock";

export type ContentType = "movie" | "tv";

/** Metadata attached when a record is first stored */
export interface Enrichment {
  tmdbId: number | null;
  posterPath: string | null;
  contentType: ContentType;
}

export interface MovieWithPricing {
  id: number;
  productId: string | null;
  title: string;
  format: MediaFormat;
  url: string;
  imageUrl: string | null;
  productionYear: number | null;
  tmdbId: number | null;
  contentType: string;
  available: boolean;
  firstSeen: string;
  lastUpdated: string;
  currentPrice: number | null;
  lowestPrice: number | null;
  highestPrice: number | null;
}

export interface DealMovie extends MovieWithPricing {
  previousPrice: number;
  priceChange: number;
}

export interface WatchlistMovie extends MovieWithPricing {
  targetPrice: number;
  notifyOnAvailability: boolean;
}

export interface PriceAlertWithTitle {
  id: number;
  movieId: number;
  productId: string | null;
  oldPrice: number;
  newPrice: number;
  alertType: AlertType;
  createdAt: string;
  notified: boolean;
  title: string;
  url: string;
}

export interface StatsData {
  totalMovies: number;
  priceDropsToday: number;
  watchlistCount: number;
  lastUpdate: string | null;
}
