import { describe, expect, it, vi } from "vitest";
import { type JobHandlers, processPriceWatchJob } from "./queue";

function handlers(overrides: Partial<JobHandlers> = {}): JobHandlers {
  return {
    crawl: vi.fn(async () => [
      { category: "bluray", url: "https://cdon.fi/elokuvat/?q=", success: true, saved: 4 },
    ]),
    checkWatchlist: vi.fn(async () => ({ checked: 2, alertsSent: 1 })),
    ...overrides,
  };
}

describe("processPriceWatchJob", () => {
  it("runs a crawl with the job data", async () => {
    const h = handlers();
    const result = await processPriceWatchJob(
      { id: "1", name: "crawl", data: { category: "bluray", maxPages: 3 } },
      h,
    );

    expect(h.crawl).toHaveBeenCalledWith({ category: "bluray", maxPages: 3 });
    expect(result).toEqual([{ category: "bluray", url: "https://cdon.fi/elokuvat/?q=", success: true, saved: 4 }]);
  });

  it("runs the watchlist check", async () => {
    const h = handlers();
    expect(await processPriceWatchJob({ id: "2", name: "check-watchlist", data: {} }, h)).toEqual({
      checked: 2,
      alertsSent: 1,
    });
    expect(h.crawl).not.toHaveBeenCalled();
  });

  it("fails the job when every category failed", async () => {
    const h = handlers({
      crawl: async () => [
        { category: "bluray", url: "u1", success: false, saved: 0, error: "launch failed" },
        { category: "4k", url: "u2", success: false, saved: 0, error: "launch failed" },
      ],
    });
    await expect(processPriceWatchJob({ id: "3", name: "crawl", data: {} }, h)).rejects.toThrow(
      "All 2 categories failed",
    );
  });

  it("rejects unknown job names", async () => {
    await expect(processPriceWatchJob({ id: "4", name: "reindex", data: {} }, handlers())).rejects.toThrow(
      "Unknown job name: reindex",
    );
  });
});
