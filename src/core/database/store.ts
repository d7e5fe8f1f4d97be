/**
 * ProductSink backed by the movie repository, with optional TMDB enrichment
 * of movies seen for the first time
 */

import { extractYearFromTitle } from "../extraction/fields";
import { isTvSeries, type TmdbService } from "../services/tmdb";
import type { Enrichment, ProductRecord, ProductSink } from "../types/index";
import { Logger } from "../utils/logger";
import { DB_RETRY_OPTIONS, type RetryOptions, withRetry } from "../utils/retry";
import type { MovieRepository } from "./repository";

export class MovieStore implements ProductSink {
  constructor(
    private readonly repository: Pick<MovieRepository, "findMovieId" | "saveRecord">,
    private readonly tmdb?: Pick<TmdbService, "getMovieDataAndPoster">,
    private readonly retry: RetryOptions = DB_RETRY_OPTIONS,
  ) {}

  async save(record: ProductRecord): Promise<boolean> {
    try {
      const enrichment = await this.enrich(record);
      return await withRetry(async () => this.repository.saveRecord(record, enrichment), {
        ...this.retry,
        onRetry: (error, attempt, delayMs) =>
          Logger.warn(`Database busy saving ${record.title}, retry ${attempt} in ${delayMs}ms`, {
            url: record.url,
            attempt,
            error: error.message,
          }),
      });
    } catch (error) {
      Logger.error(`Error saving movie ${record.title}`, error, { url: record.url });
      return false;
    }
  }

  /**
   * Metadata for a movie not stored yet; known movies keep what they have
   */
  private async enrich(record: ProductRecord): Promise<Enrichment | undefined> {
    if (this.repository.findMovieId(record) !== null) return undefined;

    const fallback: Enrichment = {
      tmdbId: null,
      posterPath: null,
      contentType: isTvSeries(record.title) ? "tv" : "movie",
    };
    if (!this.tmdb) return fallback;

    const year = record.productionYear ?? extractYearFromTitle(record.title);
    return (await this.tmdb.getMovieDataAndPoster(record.title, year)) ?? fallback;
  }
}
