import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Enrichment, ProductRecord } from "../types/index";
import { closeDb, type DbHandles, openDb } from "./connection";
import { MovieRepository } from "./repository";
import { MovieStore } from "./store";

const record = (overrides: Partial<ProductRecord> = {}): ProductRecord => ({
  title: "Batman (1989) (4K Ultra HD + Blu-ray)",
  price: 13.95,
  originalPrice: null,
  url: "https://cdon.fi/tuote/batman-1989-4k-ultra-hd-blu-ray-5cb24b79a41d59c4/",
  format: "4K Blu-ray",
  availability: "In Stock",
  imageUrl: "https://cdon.fi/images/batman.jpg",
  productId: "5cb24b79a41d59c4",
  productionYear: null,
  ...overrides,
});

describe("MovieStore.save", () => {
  let handles: DbHandles;
  let repo: MovieRepository;

  beforeEach(() => {
    handles = openDb(":memory:");
    repo = new MovieRepository(handles.db);
  });

  afterEach(() => {
    if (handles.sqlite.open) closeDb(handles);
  });

  it("looks up metadata only for movies it has not stored yet", async () => {
    const lookup = vi.fn(
      async (): Promise<Enrichment | null> => ({ tmdbId: 268, posterPath: "/posters/268.jpg", contentType: "movie" }),
    );
    const store = new MovieStore(repo, { getMovieDataAndPoster: lookup });

    expect(await store.save(record())).toBe(true);
    expect(await store.save(record({ price: 12.95 }))).toBe(true);

    expect(lookup).toHaveBeenCalledTimes(1);
    expect(lookup).toHaveBeenCalledWith("Batman (1989) (4K Ultra HD + Blu-ray)", 1989);
    expect(repo.searchMovies("batman")[0]).toMatchObject({
      tmdbId: 268,
      imageUrl: "/posters/268.jpg",
      currentPrice: 12.95,
    });
  });

  it("prefers the page's production year over the title year", async () => {
    const lookup = vi.fn(async (): Promise<Enrichment | null> => null);
    const store = new MovieStore(repo, { getMovieDataAndPoster: lookup });

    await store.save(record({ productionYear: 1988 }));

    expect(lookup).toHaveBeenCalledWith("Batman (1989) (4K Ultra HD + Blu-ray)", 1988);
  });

  it("keeps the listing image and marks series without metadata", async () => {
    const store = new MovieStore(repo);

    await store.save(
      record({ productId: "0f0f0f0f", title: "Dexter: Complete Seasons 1-8 (Blu-ray)", format: "Blu-ray" }),
    );

    expect(repo.searchMovies("dexter")[0]).toMatchObject({
      contentType: "tv",
      tmdbId: null,
      imageUrl: "https://cdon.fi/images/batman.jpg",
    });
  });

  it("retries while the database is busy", async () => {
    const saveRecord = vi
      .fn<(r: ProductRecord) => boolean>()
      .mockImplementationOnce(() => {
        throw new Error("SQLITE_BUSY: database is locked");
      })
      .mockImplementation(() => true);
    const store = new MovieStore(
      { findMovieId: () => 1, saveRecord },
      undefined,
      { maxRetries: 2, baseDelayMs: 1, jitterMs: 0, retryCondition: (e) => e.message.includes("locked"), sleep: async () => {} },
    );

    expect(await store.save(record())).toBe(true);
    expect(saveRecord).toHaveBeenCalledTimes(2);
  });

  it("returns false when the database fails", async () => {
    const store = new MovieStore(repo);
    closeDb(handles);

    expect(await store.save(record())).toBe(false);
  });
});
