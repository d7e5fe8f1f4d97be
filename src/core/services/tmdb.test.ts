import { promises as fs } from "fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TmdbService, cleanTitleForSearch, isTvSeries } from "./tmdb";

const fetchMock = vi.fn<typeof fetch>();

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

const requested = (i: number): URL => new URL(String(fetchMock.mock.calls[i][0]));

describe("isTvSeries", () => {
  it.each([
    ["Dexter: Complete Seasons 1-8 (Blu-ray)", true],
    ["Friends S01 (Blu-ray)", true],
    ["The Wire - Season 2 (Blu-ray)", true],
    ["Alien (1979) (Blu-ray)", false],
    ["Seven Samurai (Blu-ray)", false],
  ])("%s -> %s", (title, expected) => {
    expect(isTvSeries(title)).toBe(expected);
  });
});

describe("cleanTitleForSearch", () => {
  it.each([
    ["Batman (1989) (4K Ultra HD + Blu-ray)", false, "Batman"],
    ["Alien (Director's Cut) (Blu-ray)", false, "Alien"],
    ["Blade Runner 2049 (2 disc) (Import)", false, "Blade Runner 2049"],
    ["Breaking Bad: The Complete Series (Blu-ray)", true, "Breaking Bad"],
    ["The Wire - Season 2 (Blu-ray)", true, "The Wire"],
  ])("%s", (title, tv, expected) => {
    expect(cleanTitleForSearch(title, tv)).toBe(expected);
  });
});

describe("TmdbService", () => {
  let posterDir: string;
  let service: TmdbService;

  beforeEach(async () => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    posterDir = await fs.mkdtemp(path.join(os.tmpdir(), "posters-"));
    service = new TmdbService({ apiKey: "test-key", posterDir, minRequestIntervalMs: 0 });
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.rm(posterDir, { recursive: true, force: true });
  });

  it("finds a movie and downloads its poster", async () => {
    fetchMock.mockImplementation(async (input) => {
      const url = String(input);
      if (url.includes("/search/movie")) {
        return json({ results: [{ id: 348, title: "Alien", release_date: "1979-05-25", poster_path: "/alien.jpg" }] });
      }
      return new Response(new Uint8Array([0xff, 0xd8, 0xff]), { status: 200 });
    });

    const result = await service.getMovieDataAndPoster("Alien (1979) (Blu-ray)", 1979);

    expect(result).toEqual({ tmdbId: 348, posterPath: "/posters/348.jpg", contentType: "movie" });

    const search = requested(0);
    expect(search.pathname).toBe("/3/search/movie");
    expect(search.searchParams.get("query")).toBe("Alien");
    expect(search.searchParams.get("year")).toBe("1979");
    expect(search.searchParams.get("api_key")).toBe("test-key");
    expect(search.searchParams.get("include_adult")).toBe("false");
    expect(String(fetchMock.mock.calls[1][0])).toBe("https://image.tmdb.org/t/p/w500/alien.jpg");

    const saved = await fs.readFile(path.join(posterDir, "348.jpg"));
    expect([...saved]).toEqual([0xff, 0xd8, 0xff]);
  });

  it("does not download a poster that is already on disk", async () => {
    await fs.writeFile(path.join(posterDir, "348.jpg"), "cached");
    fetchMock.mockResolvedValue(json({ results: [{ id: 348, poster_path: "/alien.jpg" }] }));

    expect(await service.downloadPoster("/alien.jpg", 348)).toBe("/posters/348.jpg");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("falls back to TV search when no movie matches", async () => {
    fetchMock.mockImplementation(async (input) =>
      String(input).includes("/search/movie")
        ? json({ results: [] })
        : json({ results: [{ id: 1396, name: "Breaking Bad", first_air_date: "2008-01-20", poster_path: null }] }),
    );

    const result = await service.getMovieDataAndPoster("Breaking Bad (Blu-ray)", 2008);

    expect(result).toEqual({ tmdbId: 1396, posterPath: null, contentType: "tv" });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(requested(1).pathname).toBe("/3/search/tv");
    expect(requested(1).searchParams.get("first_air_date_year")).toBe("2008");
  });

  it("searches TV first for series titles", async () => {
    fetchMock.mockResolvedValue(json({ results: [{ id: 1438, name: "The Wire" }] }));

    const result = await service.getMovieDataAndPoster("The Wire - Season 2 (Blu-ray)", null);

    expect(result).toEqual({ tmdbId: 1438, posterPath: null, contentType: "tv" });
    expect(requested(0).pathname).toBe("/3/search/tv");
    expect(requested(0).searchParams.get("query")).toBe("The Wire");
    expect(requested(0).searchParams.has("first_air_date_year")).toBe(false);
  });

  it("returns null when the API fails", async () => {
    fetchMock.mockImplementation(async () => json({ status_message: "Invalid API key" }, 401));

    expect(await service.getMovieDataAndPoster("Alien (Blu-ray)", null)).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("returns null for a malformed response", async () => {
    fetchMock.mockImplementation(async () => json({ results: [{ title: "no id" }] }));
    expect(await service.searchMovie("Alien")).toBeNull();
  });

  it("spaces requests by the minimum interval", async () => {
    const sleeps: number[] = [];
    const spaced = new TmdbService({
      apiKey: "test-key",
      posterDir,
      minRequestIntervalMs: 60_000,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
    fetchMock.mockImplementation(async () => json({ results: [] }));

    await spaced.searchMovie("Alien");
    await spaced.searchMovie("Heat");

    expect(sleeps).toHaveLength(1);
    expect(sleeps[0]).toBeGreaterThan(59_000);
  });
});
