import { describe, expect, it, vi } from "vitest";
import type { PriceAlertWithTitle, ProductRecord, WatchlistMovie } from "../types/index";
import { PriceMonitor } from "./monitor";

const watched = (productId: string, title: string): WatchlistMovie => ({
  id: 1,
  productId,
  title,
  format: "Blu-ray",
  url: `https://cdon.fi/tuote/${productId}/`,
  imageUrl: null,
  productionYear: null,
  tmdbId: null,
  contentType: "movie",
  available: true,
  firstSeen: "2026-03-01T10:00:00.000Z",
  lastUpdated: "2026-03-01T10:00:00.000Z",
  currentPrice: 20,
  lowestPrice: 20,
  highestPrice: 20,
  targetPrice: 15,
  notifyOnAvailability: true,
});

const parsed = (url: string): ProductRecord => ({
  title: "Watched movie (Blu-ray)",
  price: 14.95,
  originalPrice: null,
  url,
  format: "Blu-ray",
  availability: "In Stock",
  imageUrl: null,
  productId: null,
  productionYear: null,
});

const alert: PriceAlertWithTitle = {
  id: 41,
  movieId: 1,
  productId: "aaaa1111",
  oldPrice: 14.95,
  newPrice: 14.95,
  alertType: "target_reached",
  createdAt: "2026-03-01T10:00:00.000Z",
  notified: false,
  title: "Watched movie (Blu-ray)",
  url: "https://cdon.fi/tuote/aaaa1111/",
};

function setup(items: WatchlistMovie[], alerts: PriceAlertWithTitle[], parse: (url: string) => Promise<ProductRecord | null> = async (url: string) => parsed(url)) {
  const repository = {
    getWatchlist: vi.fn(() => items),
    getUnnotifiedAlerts: vi.fn(() => alerts),
    markAlertsNotified: vi.fn((_ids: number[]) => {}),
  };
  const parser = { parseProductPage: vi.fn(parse) };
  const sink = { save: vi.fn(async (_r: ProductRecord) => true) };
  const notifier = { sendNotifications: vi.fn(async (_a: PriceAlertWithTitle[]) => {}) };
  const sleeps: number[] = [];
  const monitor = new PriceMonitor(repository, parser, sink, notifier, {
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { monitor, repository, parser, sink, notifier, sleeps };
}

describe("PriceMonitor.checkWatchlistPrices", () => {
  it("re-parses every watched product and sends the raised alerts", async () => {
    const { monitor, parser, sink, notifier, repository, sleeps } = setup(
      [watched("aaaa1111", "First"), watched("bbbb2222", "Second")],
      [alert],
    );

    expect(await monitor.checkWatchlistPrices()).toEqual({ checked: 2, alertsSent: 1 });
    expect(parser.parseProductPage.mock.calls.map(([u]) => u)).toEqual([
      "https://cdon.fi/tuote/aaaa1111/",
      "https://cdon.fi/tuote/bbbb2222/",
    ]);
    expect(sink.save).toHaveBeenCalledTimes(2);
    expect(notifier.sendNotifications).toHaveBeenCalledWith([alert]);
    expect(repository.markAlertsNotified).toHaveBeenCalledWith([41]);
    expect(sleeps).toEqual([2000, 2000]);
  });

  it("stops early with an empty watchlist", async () => {
    const { monitor, parser, repository } = setup([], [alert]);

    expect(await monitor.checkWatchlistPrices()).toEqual({ checked: 0, alertsSent: 0 });
    expect(parser.parseProductPage).not.toHaveBeenCalled();
    expect(repository.getUnnotifiedAlerts).not.toHaveBeenCalled();
  });

  it("keeps going when a product fails and skips notification without alerts", async () => {
    const { monitor, sink, notifier, repository } = setup(
      [watched("aaaa1111", "Broken"), watched("bbbb2222", "Gone"), watched("cccc3333", "Fine")],
      [],
      async (url) => {
        if (url.includes("aaaa1111")) throw new Error("boom");
        if (url.includes("bbbb2222")) return null;
        return parsed(url);
      },
    );

    expect(await monitor.checkWatchlistPrices()).toEqual({ checked: 1, alertsSent: 0 });
    expect(sink.save).toHaveBeenCalledTimes(1);
    expect(notifier.sendNotifications).not.toHaveBeenCalled();
    expect(repository.markAlertsNotified).not.toHaveBeenCalled();
  });
});
