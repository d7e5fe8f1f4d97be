import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ProductRecord } from "../types/index";
import { closeDb, type DbHandles, openDb } from "./connection";
import { MovieRepository } from "./repository";

const NOW = "2026-03-01T10:00:00.000Z";

function record(overrides: Partial<ProductRecord> = {}): ProductRecord {
  return {
    title: "Alien (1979) (Blu-ray)",
    price: 24.95,
    originalPrice: null,
    url: "https://cdon.fi/tuote/alien-1979-blu-ray-a1b2c3d4/",
    format: "Blu-ray",
    availability: "In Stock",
    imageUrl: "https://cdon.fi/images/alien.jpg",
    productId: "a1b2c3d4",
    productionYear: null,
    ...overrides,
  };
}

describe("MovieRepository", () => {
  let handles: DbHandles;
  let repo: MovieRepository;

  beforeEach(() => {
    handles = openDb(":memory:");
    repo = new MovieRepository(handles.db, { now: () => new Date(NOW) });
  });

  afterEach(() => {
    closeDb(handles);
  });

  describe("saveRecord", () => {
    it("stores a new movie with its first price", () => {
      expect(repo.saveRecord(record())).toBe(true);

      const [movie] = repo.searchMovies("alien");
      expect(movie).toMatchObject({
        productId: "a1b2c3d4",
        title: "Alien (1979) (Blu-ray)",
        format: "Blu-ray",
        imageUrl: "https://cdon.fi/images/alien.jpg",
        contentType: "movie",
        tmdbId: null,
        firstSeen: NOW,
        lastUpdated: NOW,
        currentPrice: 24.95,
        lowestPrice: 24.95,
        highestPrice: 24.95,
      });
      expect(repo.getUnnotifiedAlerts()).toEqual([]);
    });

    it("raises a price drop alert when the price falls", () => {
      repo.saveRecord(record({ price: 24.95 }));
      repo.saveRecord(record({ price: 19.95 }));

      const alerts = repo.getUnnotifiedAlerts();
      expect(alerts).toHaveLength(1);
      expect(alerts[0]).toMatchObject({
        productId: "a1b2c3d4",
        oldPrice: 24.95,
        newPrice: 19.95,
        alertType: "price_drop",
        notified: false,
        title: "Alien (1979) (Blu-ray)",
        url: "https://cdon.fi/tuote/alien-1979-blu-ray-a1b2c3d4/",
      });
    });

    it("does not alert on an unchanged or higher price", () => {
      repo.saveRecord(record({ price: 19.95 }));
      repo.saveRecord(record({ price: 19.95 }));
      repo.saveRecord(record({ price: 22.5 }));

      expect(repo.getUnnotifiedAlerts()).toEqual([]);
      expect(repo.searchMovies("alien")[0]).toMatchObject({
        currentPrice: 22.5,
        lowestPrice: 19.95,
        highestPrice: 22.5,
      });
    });

    it("matches records without a product id by title and format", () => {
      const noId = record({ productId: null, url: "https://cdon.fi/tuote/alien/" });
      repo.saveRecord(noId);
      repo.saveRecord({ ...noId, price: 20 });
      repo.saveRecord({ ...noId, format: "4K Blu-ray", title: "Alien (1979) (Blu-ray)" });

      expect(repo.getStats().totalMovies).toBe(2);
      expect(repo.findMovieId(noId)).not.toBeNull();
    });

    it("fills in the production year once and keeps it", () => {
      repo.saveRecord(record({ productionYear: null }));
      repo.saveRecord(record({ productionYear: 1979 }));
      repo.saveRecord(record({ productionYear: 2003 }));

      expect(repo.searchMovies("alien")[0].productionYear).toBe(1979);
    });

    it("applies enrichment to new movies", () => {
      repo.saveRecord(record(), { tmdbId: 348, posterPath: "/posters/348.jpg", contentType: "movie" });

      expect(repo.searchMovies("alien")[0]).toMatchObject({
        tmdbId: 348,
        imageUrl: "/posters/348.jpg",
      });
    });
  });

  describe("price columns", () => {
    beforeEach(() => {
      repo.saveRecord(record({ price: 20 }));
      repo.saveRecord(
        record({
          productId: "e1f2a3b4",
          title: "Heat (1995) (Blu-ray)",
          url: "https://cdon.fi/tuote/heat-1995-blu-ray-e1f2a3b4/",
          price: 30,
        }),
      );
      repo.saveRecord(record({ price: 15 }));
    });

    it("reads each movie's own history when histories interleave", () => {
      expect(repo.searchMovies("alien")[0]).toMatchObject({
        currentPrice: 15,
        lowestPrice: 15,
        highestPrice: 20,
      });
      expect(repo.searchMovies("heat")[0]).toMatchObject({
        currentPrice: 30,
        lowestPrice: 30,
        highestPrice: 30,
      });
    });

    it("computes deals and cheapest lists from the right rows", () => {
      expect(repo.getDeals().map((d) => [d.productId, d.previousPrice, d.currentPrice, d.priceChange])).toEqual([
        ["a1b2c3d4", 20, 15, 5],
      ]);
      expect(repo.getCheapestBlurays().map((m) => [m.productId, m.currentPrice])).toEqual([
        ["a1b2c3d4", 15],
        ["e1f2a3b4", 30],
      ]);
    });
  });

  describe("stock tracking", () => {
    const soldOut = (price: number) => record({ price, availability: "Loppu varastosta" });

    it("follows the latest availability text", () => {
      repo.saveRecord(soldOut(20));
      expect(repo.searchMovies("alien")[0].available).toBe(false);
      repo.saveRecord(record({ price: 20 }));
      expect(repo.searchMovies("alien")[0].available).toBe(true);
    });

    it("raises back_in_stock for a watched movie that returns", () => {
      repo.saveRecord(record({ price: 20 }));
      repo.addToWatchlist("a1b2c3d4", 10);
      repo.saveRecord(soldOut(20));
      expect(repo.getUnnotifiedAlerts()).toEqual([]);

      repo.saveRecord(record({ price: 18 }));
      const types = repo.getUnnotifiedAlerts().map((a) => [a.alertType, a.oldPrice, a.newPrice]);
      expect(types).toEqual([
        ["back_in_stock", 20, 18],
        ["price_drop", 20, 18],
      ]);
    });

    it("stays quiet when the watcher opted out or the movie is not watched", () => {
      repo.saveRecord(record({ price: 20 }));
      repo.addToWatchlist("a1b2c3d4", 10, false);
      repo.saveRecord(soldOut(20));
      repo.saveRecord(record({ price: 20 }));
      expect(repo.getWatchlist()[0].notifyOnAvailability).toBe(false);

      repo.saveRecord(
        record({ productId: "e1f2a3b4", title: "Heat (1995) (Blu-ray)", availability: "Out of stock" }),
      );
      repo.saveRecord(record({ productId: "e1f2a3b4", title: "Heat (1995) (Blu-ray)" }));

      expect(repo.getUnnotifiedAlerts()).toEqual([]);
    });
  });

  describe("watchlist", () => {
    it("refuses unknown product ids", () => {
      expect(repo.addToWatchlist("missing", 10)).toBe(false);
      expect(repo.getWatchlist()).toEqual([]);
    });

    it("adds, updates and removes entries", () => {
      repo.saveRecord(record());

      expect(repo.addToWatchlist("a1b2c3d4", 15)).toBe(true);
      expect(repo.addToWatchlist("a1b2c3d4", 12.5)).toBe(true);

      const list = repo.getWatchlist();
      expect(list).toHaveLength(1);
      expect(list[0]).toMatchObject({ productId: "a1b2c3d4", targetPrice: 12.5, currentPrice: 24.95 });

      expect(repo.removeFromWatchlist("a1b2c3d4")).toBe(true);
      expect(repo.getWatchlist()).toEqual([]);
      expect(repo.removeFromWatchlist("a1b2c3d4")).toBe(true);
    });

    it("raises target_reached when the price meets the target", () => {
      repo.saveRecord(record({ price: 24.95 }));
      repo.addToWatchlist("a1b2c3d4", 20);
      repo.saveRecord(record({ price: 20 }));

      const types = repo.getUnnotifiedAlerts().map((a) => [a.alertType, a.oldPrice, a.newPrice]);
      expect(types).toEqual([
        ["target_reached", 20, 20],
        ["price_drop", 24.95, 20],
      ]);
    });
  });

  describe("getDeals", () => {
    beforeEach(() => {
      const movie = (id: string, title: string, prices: number[]) => {
        for (const price of prices) {
          repo.saveRecord(record({ productId: id, title, price, url: `https://cdon.fi/tuote/${id}/` }));
        }
      };
      movie("aaaa0001", "Alien (Blu-ray)", [30, 20]);
      movie("bbbb0002", "Brazil (Blu-ray)", [25, 20]);
      movie("cccc0003", "Casino (Blu-ray)", [20, 25]);
      movie("dddd0004", "Dune (Blu-ray)", [18]);
    });

    it("lists price drops, biggest first", () => {
      const deals = repo.getDeals();
      expect(deals.map((d) => [d.productId, d.previousPrice, d.currentPrice, d.priceChange])).toEqual([
        ["aaaa0001", 30, 20, 10],
        ["bbbb0002", 25, 20, 5],
      ]);
    });

    it("honours the limit and minimum drop", () => {
      expect(repo.getDeals(1).map((d) => d.productId)).toEqual(["aaaa0001"]);
      expect(repo.getDeals(12, 6).map((d) => d.productId)).toEqual(["aaaa0001"]);
    });
  });

  describe("cheapest lists", () => {
    beforeEach(() => {
      repo.saveRecord(record({ productId: "b1", title: "Heat (Blu-ray)", price: 15, format: "Blu-ray" }));
      repo.saveRecord(record({ productId: "b2", title: "Ran (Blu-ray)", price: 10, format: "Blu-ray" }));
      repo.saveRecord(record({ productId: "k1", title: "Dune (4K Ultra HD)", price: 20, format: "4K Blu-ray" }));
      repo.saveRecord(record({ productId: "k2", title: "Alien (4K Ultra HD)", price: 28, format: "4K Blu-ray" }));
    });

    it("orders plain Blu-rays by current price and leaves out 4K", () => {
      expect(repo.getCheapestBlurays().map((m) => m.productId)).toEqual(["b2", "b1"]);
      expect(repo.getCheapest4kBlurays().map((m) => m.productId)).toEqual(["k1", "k2"]);
    });

    it("excludes ignored and watchlisted movies", () => {
      expect(repo.ignoreMovie("b2")).toBe(true);
      expect(repo.ignoreMovie("b2")).toBe(true);
      repo.addToWatchlist("k1", 15);

      expect(repo.getCheapestBlurays().map((m) => m.productId)).toEqual(["b1"]);
      expect(repo.getCheapest4kBlurays().map((m) => m.productId)).toEqual(["k2"]);
    });

    it("refuses to ignore unknown product ids", () => {
      expect(repo.ignoreMovie("nope")).toBe(false);
    });
  });

  describe("searchMovies", () => {
    it("returns nothing for a blank query", () => {
      repo.saveRecord(record());
      expect(repo.searchMovies("")).toEqual([]);
      expect(repo.searchMovies("   ")).toEqual([]);
    });

    it("matches case-insensitively, ordered by title", () => {
      repo.saveRecord(record({ productId: "x2", title: "Aliens (1986) (Blu-ray)" }));
      repo.saveRecord(record({ productId: "x1", title: "Alien (1979) (Blu-ray)" }));
      repo.saveRecord(record({ productId: "x3", title: "Heat (1995) (Blu-ray)" }));

      expect(repo.searchMovies("ALIEN").map((m) => m.title)).toEqual([
        "Alien (1979) (Blu-ray)",
        "Aliens (1986) (Blu-ray)",
      ]);
      expect(repo.searchMovies("alien", 1)).toHaveLength(1);
    });
  });

  describe("alerts and stats", () => {
    it("marks alerts as notified", () => {
      repo.saveRecord(record({ price: 24.95 }));
      repo.saveRecord(record({ price: 19.95 }));
      const ids = repo.getUnnotifiedAlerts().map((a) => a.id);

      repo.markAlertsNotified(ids);

      expect(repo.getUnnotifiedAlerts()).toEqual([]);
    });

    it("returns newest alerts first up to the limit", () => {
      repo.saveRecord(record({ price: 30 }));
      repo.saveRecord(record({ price: 25 }));
      repo.saveRecord(record({ price: 20 }));

      expect(repo.getUnnotifiedAlerts().map((a) => a.newPrice)).toEqual([20, 25]);
      expect(repo.getUnnotifiedAlerts(1).map((a) => a.newPrice)).toEqual([20]);
    });

    it("summarises the database", () => {
      expect(repo.getStats()).toEqual({
        totalMovies: 0,
        priceDropsToday: 0,
        watchlistCount: 0,
        lastUpdate: null,
      });

      repo.saveRecord(record({ price: 24.95 }));
      repo.saveRecord(record({ price: 19.95 }));
      repo.saveRecord(record({ productId: "e5f6a7b8", title: "Heat (1995) (Blu-ray)" }));
      repo.addToWatchlist("e5f6a7b8", 10);

      expect(repo.getStats()).toEqual({
        totalMovies: 2,
        priceDropsToday: 1,
        watchlistCount: 1,
        lastUpdate: NOW,
      });
    });

    it("counts only alerts created today", () => {
      let now = "2026-02-28T23:00:00.000Z";
      const dated = new MovieRepository(handles.db, { now: () => new Date(now) });
      dated.saveRecord(record({ price: 24.95 }));
      dated.saveRecord(record({ price: 19.95 }));
      now = NOW;

      expect(dated.getStats().priceDropsToday).toBe(0);
    });
  });
});
