/**
 * TMDB lookups: match a product title to a movie or TV series and cache its
 * poster on disk
 */

import { promises as fs } from "fs";
import path from "node:path";
import { z } from "zod";
import { TMDB_CONSTANTS } from "../constants/index";
import type { Enrichment } from "../types/index";
import { Logger } from "../utils/logger";
import { type Sleep, sleep } from "../utils/retry";

const TV_INDICATORS = [
  /\bSeason\s+\d+/i,
  /\bSeries\s+\d+/i,
  /\bComplete\s+Series/i,
  /\bTV\s+Series/i,
  /\bS\d+\b/i,
  /\bEpisode\s+\d+/i,
  /\bComplete\s+Collection/i,
  /\bComplete\s+Seasons/i,
];

const SearchResult = z.object({
  id: z.number(),
  poster_path: z.string().nullish(),
  title: z.string().optional(),
  name: z.string().optional(),
  release_date: z.string().optional(),
  first_air_date: z.string().optional(),
});
export type SearchResult = z.infer<typeof SearchResult>;

const SearchResponse = z.object({
  results: z.array(SearchResult).default([]),
});

export interface TmdbServiceOptions {
  apiKey: string;
  posterDir: string;
  /** URL prefix under which the web server exposes the poster directory */
  posterUrlPrefix?: string;
  baseUrl?: string;
  imageBaseUrl?: string;
  minRequestIntervalMs?: number;
  sleep?: Sleep;
}

export function isTvSeries(title: string): boolean {
  return TV_INDICATORS.some((re) => re.test(title));
}

/**
 * Strips edition, disc and format noise so the title searches well
 */
export function cleanTitleForSearch(title: string, isTv = false): string {
  let cleaned = title
    .replace(/\(\d+\s+disc\)/gi, "")
    .replace(/\(Import\)/gi, "")
    .replace(/\([^)]*\b(Blu-ray|DVD|4K|UHD|Ultra|3D)\b[^)]*\)/gi, "");

  if (isTv) {
    cleaned = cleaned
      .replace(/\s*[-–—:]*\s*The\s+Complete\s+Collection\b/gi, "")
      .replace(/\s*[-–—:]*\s*Complete\s+Collection\b/gi, "")
      .replace(/\s*[-–—:]*\s*The\s+Complete\s+Series\b/gi, "")
      .replace(/\s*[-–—:]*\s*Complete\s+Series\b/gi, "")
      .replace(/\s*[-–—:]*\s*Season\s+\d+[-–]?\d*/gi, "")
      .replace(/\s*[-–—:]*\s*Series\s+\d+/gi, "");
  }

  return cleaned
    .replace(/\bUltimate\s+Collector's\s+Edition\b/gi, "")
    .replace(/\bDirector's\s+Cut\b/gi, "")
    .replace(
      /\b(Blu-ray|DVD|4K|UHD|Ultra|Ultimate|Collector's|Special|Edition|Extended|Cut|Collection)\b/gi,
      "",
    )
    .replace(/\(\s*[+&-]+\s*\)/g, "")
    .replace(/\s*\(\d{4}\)/g, "")
    .replace(/\s*\(\s*\)/g, "")
    .replace(/[:\-–—]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export class TmdbService {
  private lastRequestAt = 0;
  private readonly sleep: Sleep;

  constructor(private readonly options: TmdbServiceOptions) {
    this.sleep = options.sleep ?? sleep;
  }

  async searchMovie(title: string, year?: number | null): Promise<SearchResult | null> {
    return this.search("movie", title, year);
  }

  async searchTv(title: string, year?: number | null): Promise<SearchResult | null> {
    return this.search("tv", title, year);
  }

  /**
   * Saves the poster as `<tmdbId>.jpg` unless it is already there
   * @returns URL path of the poster, or null when the download failed
   */
  async downloadPoster(posterPath: string, tmdbId: number): Promise<string | null> {
    const filename = `${tmdbId}.jpg`;
    const target = path.join(this.options.posterDir, filename);
    const publicPath = `${this.options.posterUrlPrefix ?? "/posters"}/${filename}`;

    if (await fileExists(target)) {
      Logger.debug(`Poster already exists for TMDB ID ${tmdbId}`);
      return publicPath;
    }

    const imageBase = this.options.imageBaseUrl ?? TMDB_CONSTANTS.IMAGE_BASE_URL;
    try {
      await this.rateLimit();
      const res = await fetch(`${imageBase}${posterPath}`, {
        signal: AbortSignal.timeout(TMDB_CONSTANTS.TIMEOUT_MS),
      });
      if (!res.ok) throw new Error(`HTTP ${res.status}`);
      await fs.mkdir(this.options.posterDir, { recursive: true });
      await fs.writeFile(target, Buffer.from(await res.arrayBuffer()));
      Logger.info(`Downloaded poster for TMDB ID ${tmdbId}: ${filename}`);
      return publicPath;
    } catch (error) {
      Logger.error(`Error downloading poster for TMDB ID ${tmdbId}`, error);
      return null;
    }
  }

  /**
   * Finds the title on TMDB and fetches its poster. Titles that look like TV
   * series try the TV search first; a movie miss falls back to TV.
   * @returns null when neither search matches
   */
  async getMovieDataAndPoster(title: string, year?: number | null): Promise<Enrichment | null> {
    const tvLike = isTvSeries(title);

    if (tvLike) {
      Logger.debug(`Detected TV series, trying TV search first: ${title}`);
      const tv = await this.searchTv(title, year);
      if (tv) return this.withPoster(tv, "tv");
    }

    const movie = await this.searchMovie(title, year);
    if (movie) return this.withPoster(movie, "movie");

    if (!tvLike) {
      Logger.debug(`Movie search failed, trying TV search as fallback: ${title}`);
      const tv = await this.searchTv(title, year);
      if (tv) return this.withPoster(tv, "tv");
    }
    return null;
  }

  private async withPoster(hit: SearchResult, contentType: Enrichment["contentType"]): Promise<Enrichment> {
    const posterPath = hit.poster_path ? await this.downloadPoster(hit.poster_path, hit.id) : null;
    return { tmdbId: hit.id, posterPath, contentType };
  }

  private async search(kind: "movie" | "tv", title: string, year?: number | null): Promise<SearchResult | null> {
    const params = new URLSearchParams({
      api_key: this.options.apiKey,
      query: cleanTitleForSearch(title, kind === "tv"),
      include_adult: "false",
      language: "en-US",
      page: "1",
    });
    if (year) params.set(kind === "tv" ? "first_air_date_year" : "year", String(year));

    const baseUrl = this.options.baseUrl ?? TMDB_CONSTANTS.BASE_URL;
    try {
      await this.rateLimit();
      const res = await fetch(`${baseUrl}/search/${kind}?${params}`, {
        headers: { accept: "application/json" },
        signal: AbortSignal.timeout(TMDB_CONSTANTS.TIMEOUT_MS),
      });
      if (!res.ok) throw new Error(`HTTP ${res.status}`);

      const { results } = SearchResponse.parse(await res.json());
      const best = results[0];
      if (!best) {
        Logger.info(`No TMDB ${kind} results found for: ${title}`);
        return null;
      }
      const date = (kind === "tv" ? best.first_air_date : best.release_date) ?? "";
      Logger.info(`Found TMDB ${kind} match for '${title}': ${best.title ?? best.name} (${date.slice(0, 4) || "N/A"})`);
      return best;
    } catch (error) {
      Logger.error(`Error searching TMDB ${kind} for '${title}'`, error);
      return null;
    }
  }

  private async rateLimit(): Promise<void> {
    const interval = this.options.minRequestIntervalMs ?? TMDB_CONSTANTS.MIN_REQUEST_INTERVAL_MS;
    const wait = this.lastRequestAt + interval - Date.now();
    if (wait > 0) await this.sleep(wait);
    this.lastRequestAt = Date.now();
  }
}

async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
