/**
 * Movie, price history, watchlist and alert queries
 */

import {
  and,
  asc,
  count,
  desc,
  eq,
  inArray,
  isNotNull,
  like,
  lt,
  notInArray,
  notLike,
  type SQL,
  sql,
} from "drizzle-orm";
import {
  ignoredMovies,
  movies,
  priceAlerts,
  priceHistory,
  watchlist,
} from "../../../schema";
import type {
  AlertType,
  DealMovie,
  Enrichment,
  MovieWithPricing,
  PriceAlertWithTitle,
  ProductRecord,
  StatsData,
  WatchlistMovie,
} from "../types/index";
import { isInStock } from "../extraction/fields";
import { Logger } from "../utils/logger";
import type { MovieDb } from "./connection";

// Correlated price subqueries; history ids grow with time so the newest row
// has the highest id. The outer id is table-qualified: drizzle leaves columns
// bare in single-table selects, which would bind to ph.id here.
const outerMovieId = sql`${sql.identifier("movies")}.${sql.identifier("id")}`;
const currentPrice = sql<number | null>`(SELECT ph.price FROM price_history ph WHERE ph.movie_id = ${outerMovieId} ORDER BY ph.id DESC LIMIT 1)`;
const previousPrice = sql<number | null>`(SELECT ph.price FROM price_history ph WHERE ph.movie_id = ${outerMovieId} ORDER BY ph.id DESC LIMIT 1 OFFSET 1)`;
const lowestPrice = sql<number | null>`(SELECT MIN(ph.price) FROM price_history ph WHERE ph.movie_id = ${outerMovieId})`;
const highestPrice = sql<number | null>`(SELECT MAX(ph.price) FROM price_history ph WHERE ph.movie_id = ${outerMovieId})`;
const priceChange = sql<number>`ROUND(${previousPrice} - ${currentPrice}, 2)`;

const pricingColumns = {
  id: movies.id,
  productId: movies.productId,
  title: movies.title,
  format: movies.format,
  url: movies.url,
  imageUrl: movies.imageUrl,
  productionYear: movies.productionYear,
  tmdbId: movies.tmdbId,
  contentType: movies.contentType,
  available: movies.available,
  firstSeen: movies.firstSeen,
  lastUpdated: movies.lastUpdated,
  currentPrice,
  lowestPrice,
  highestPrice,
};

type MovieKey = Pick<ProductRecord, "productId" | "title" | "format">;

const movieMatch = (record: MovieKey): SQL | undefined =>
  record.productId
    ? eq(movies.productId, record.productId)
    : and(eq(movies.title, record.title), eq(movies.format, record.format));

export interface RepositoryOptions {
  now?: () => Date;
}

export class MovieRepository {
  private readonly now: () => Date;

  constructor(
    private readonly db: MovieDb,
    options: RepositoryOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Id of the stored movie matching the record: by product id when the
   * record has one, otherwise by title and format
   */
  findMovieId(record: MovieKey): number | null {
    const row = this.db.select({ id: movies.id }).from(movies).where(movieMatch(record)).get();
    return row?.id ?? null;
  }

  /**
   * Upserts the movie, appends a price observation and raises alerts, in one
   * transaction. A known movie only gets its timestamp refreshed and a
   * production year filled in when it had none, and its stock flag follows
   * the latest availability text.
   */
  saveRecord(record: ProductRecord, enrichment?: Enrichment): boolean {
    const now = this.now().toISOString();
    const inStock = isInStock(record.availability);

    const alerts = this.db.transaction((tx) => {
      const existing = tx
        .select({ id: movies.id, available: movies.available })
        .from(movies)
        .where(movieMatch(record))
        .get();
      let movieId: number;

      if (!existing) {
        const [inserted] = tx
          .insert(movies)
          .values({
            productId: record.productId,
            title: record.title,
            format: record.format,
            url: record.url,
            imageUrl: enrichment?.posterPath ?? record.imageUrl,
            productionYear: record.productionYear,
            tmdbId: enrichment?.tmdbId ?? null,
            contentType: enrichment?.contentType ?? "movie",
            available: inStock,
            firstSeen: now,
            lastUpdated: now,
          })
          .returning({ id: movies.id })
          .all();
        movieId = inserted.id;
      } else {
        movieId = existing.id;
        tx.update(movies)
          .set({
            lastUpdated: now,
            available: inStock,
            productionYear: sql`COALESCE(${movies.productionYear}, ${record.productionYear})`,
          })
          .where(eq(movies.id, movieId))
          .run();
      }

      tx.insert(priceHistory)
        .values({
          movieId,
          productId: record.productId,
          price: record.price,
          availability: record.availability,
          checkedAt: now,
        })
        .run();

      const raised: Array<{ type: AlertType; oldPrice: number }> = [];

      const previous = tx
        .select({ price: priceHistory.price })
        .from(priceHistory)
        .where(eq(priceHistory.movieId, movieId))
        .orderBy(desc(priceHistory.id))
        .limit(1)
        .offset(1)
        .get();
      if (previous && record.price < previous.price) {
        raised.push({ type: "price_drop", oldPrice: previous.price });
      }

      const target = tx
        .select({
          targetPrice: watchlist.targetPrice,
          notifyOnAvailability: watchlist.notifyOnAvailability,
        })
        .from(watchlist)
        .where(eq(watchlist.movieId, movieId))
        .get();
      if (target && record.price <= target.targetPrice) {
        raised.push({ type: "target_reached", oldPrice: record.price });
      }
      if (existing && !existing.available && inStock && target?.notifyOnAvailability) {
        raised.push({ type: "back_in_stock", oldPrice: previous?.price ?? record.price });
      }

      for (const alert of raised) {
        tx.insert(priceAlerts)
          .values({
            movieId,
            productId: record.productId,
            oldPrice: alert.oldPrice,
            newPrice: record.price,
            alertType: alert.type,
            createdAt: now,
          })
          .run();
      }
      return raised.map((a) => ({ ...a, movieId }));
    });

    for (const a of alerts) {
      Logger.alertRaised(a.type, a.movieId, a.oldPrice, record.price);
    }
    return true;
  }

  /**
   * Adds the movie to the watchlist or updates its target price
   * @returns false when no movie has this product id
   */
  addToWatchlist(productId: string, targetPrice: number, notifyOnAvailability = true): boolean {
    const movie = this.movieByProductId(productId);
    if (!movie) return false;

    const now = this.now().toISOString();
    this.db
      .insert(watchlist)
      .values({ movieId: movie.id, productId, targetPrice, notifyOnAvailability, createdAt: now })
      .onConflictDoUpdate({
        target: watchlist.movieId,
        set: { targetPrice, notifyOnAvailability, createdAt: now },
      })
      .run();
    return true;
  }

  /** Removing an entry that does not exist still succeeds */
  removeFromWatchlist(productId: string): boolean {
    this.db.delete(watchlist).where(eq(watchlist.productId, productId)).run();
    return true;
  }

  getWatchlist(): WatchlistMovie[] {
    return this.db
      .select({
        ...pricingColumns,
        targetPrice: watchlist.targetPrice,
        notifyOnAvailability: watchlist.notifyOnAvailability,
      })
      .from(watchlist)
      .innerJoin(movies, eq(watchlist.movieId, movies.id))
      .orderBy(asc(movies.title))
      .all();
  }

  searchMovies(query: string, limit = 20): MovieWithPricing[] {
    const q = query.trim();
    if (!q) return [];
    return this.db
      .select(pricingColumns)
      .from(movies)
      .where(like(movies.title, `%${q}%`))
      .orderBy(asc(movies.title))
      .limit(limit)
      .all();
  }

  /**
   * Movies whose latest price is below the one before it, biggest drop first
   * @param minDrop - Smallest drop in euros worth listing
   */
  getDeals(limit = 12, minDrop = 0): DealMovie[] {
    const rows = this.db
      .select({ ...pricingColumns, previousPrice, priceChange })
      .from(movies)
      .where(
        and(
          isNotNull(currentPrice),
          isNotNull(previousPrice),
          lt(currentPrice, previousPrice),
          sql`${priceChange} >= ${minDrop}`,
        ),
      )
      .orderBy(desc(priceChange), asc(movies.title))
      .limit(limit)
      .all();

    const deals: DealMovie[] = [];
    for (const row of rows) {
      if (row.previousPrice !== null) deals.push({ ...row, previousPrice: row.previousPrice });
    }
    return deals;
  }

  /** Cheapest plain Blu-rays not ignored and not already watched */
  getCheapestBlurays(limit = 21): MovieWithPricing[] {
    return this.cheapest(
      and(like(movies.format, "%Blu-ray%"), notLike(movies.format, "%4K%")),
      limit,
    );
  }

  getCheapest4kBlurays(limit = 21): MovieWithPricing[] {
    return this.cheapest(like(movies.format, "%4K%"), limit);
  }

  /**
   * Hides the movie from the cheapest lists
   * @returns false when no movie has this product id
   */
  ignoreMovie(productId: string): boolean {
    const movie = this.movieByProductId(productId);
    if (!movie) return false;
    this.db
      .insert(ignoredMovies)
      .values({ movieId: movie.id, productId, ignoredAt: this.now().toISOString() })
      .onConflictDoNothing()
      .run();
    return true;
  }

  /** Alerts not yet sent, newest first */
  getUnnotifiedAlerts(limit?: number): PriceAlertWithTitle[] {
    const query = this.db
      .select({
        id: priceAlerts.id,
        movieId: priceAlerts.movieId,
        productId: priceAlerts.productId,
        oldPrice: priceAlerts.oldPrice,
        newPrice: priceAlerts.newPrice,
        alertType: priceAlerts.alertType,
        createdAt: priceAlerts.createdAt,
        notified: priceAlerts.notified,
        title: movies.title,
        url: movies.url,
      })
      .from(priceAlerts)
      .innerJoin(movies, eq(priceAlerts.movieId, movies.id))
      .where(eq(priceAlerts.notified, false))
      .orderBy(desc(priceAlerts.createdAt), desc(priceAlerts.id));
    return limit === undefined ? query.all() : query.limit(limit).all();
  }

  markAlertsNotified(ids: number[]): void {
    if (ids.length === 0) return;
    this.db
      .update(priceAlerts)
      .set({ notified: true })
      .where(inArray(priceAlerts.id, ids))
      .run();
  }

  getStats(): StatsData {
    const today = this.now().toISOString().slice(0, 10);
    const total = this.db.select({ n: count() }).from(movies).get();
    const alertsToday = this.db
      .select({ n: count() })
      .from(priceAlerts)
      .where(sql`substr(${priceAlerts.createdAt}, 1, 10) = ${today}`)
      .get();
    const watched = this.db.select({ n: count() }).from(watchlist).get();
    const last = this.db
      .select({ lastUpdated: movies.lastUpdated })
      .from(movies)
      .orderBy(desc(movies.lastUpdated))
      .limit(1)
      .get();

    return {
      totalMovies: total?.n ?? 0,
      priceDropsToday: alertsToday?.n ?? 0,
      watchlistCount: watched?.n ?? 0,
      lastUpdate: last?.lastUpdated ?? null,
    };
  }

  private movieByProductId(productId: string) {
    return this.db
      .select({ id: movies.id })
      .from(movies)
      .where(eq(movies.productId, productId))
      .get();
  }

  private cheapest(formatFilter: SQL | undefined, limit: number): MovieWithPricing[] {
    return this.db
      .select(pricingColumns)
      .from(movies)
      .where(
        and(
          formatFilter,
          notInArray(movies.id, this.db.select({ id: ignoredMovies.movieId }).from(ignoredMovies)),
          notInArray(movies.id, this.db.select({ id: watchlist.movieId }).from(watchlist)),
          isNotNull(currentPrice),
        ),
      )
      .orderBy(asc(currentPrice), asc(movies.title))
      .limit(limit)
      .all();
  }
}
