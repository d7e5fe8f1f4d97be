/**
 * Dashboard API: JSON views over the movie database
 */

import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { z } from "zod";
import type { MovieRepository } from "../core/database/repository";
import { Logger } from "../core/utils/logger";

export interface WebOptions {
  posterDir: string;
  /** Smallest price drop, in euros, listed under deals */
  minDealDiff?: number;
}

const watchlistRequestSchema = z.object({
  product_id: z.string().trim().min(1),
  target_price: z.coerce.number().positive(),
  notify_on_availability: z.boolean().optional(),
});

const ignoreRequestSchema = z.object({
  product_id: z.string().trim().min(1),
});

const POSTER_FILENAME = /^[\w-]+\.(jpg|jpeg|png|webp)$/i;

export function createApp(repository: MovieRepository, options: WebOptions): Express {
  const app = express();
  app.use(express.json());

  app.use((req, _res, next) => {
    Logger.debug(`${req.method} ${req.path}`);
    next();
  });

  app.get("/healthz", (_req, res) => {
    res.type("text/plain").send("ok");
  });

  app.get("/api/stats", (_req, res) => {
    res.json(repository.getStats());
  });

  app.get("/api/alerts", (_req, res) => {
    res.json(repository.getUnnotifiedAlerts(10));
  });

  app.get("/api/deals", (_req, res) => {
    res.json(repository.getDeals(12, options.minDealDiff ?? 0));
  });

  app.get("/api/watchlist", (_req, res) => {
    res.json(repository.getWatchlist());
  });

  app.post("/api/watchlist", (req, res) => {
    const parsed = watchlistRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "product_id and a positive target_price are required" });
    }
    const { product_id, target_price, notify_on_availability } = parsed.data;
    if (!repository.addToWatchlist(product_id, target_price, notify_on_availability)) {
      return res.status(404).json({ error: `Unknown product: ${product_id}` });
    }
    return res.json({ success: true, message: "Added to watchlist" });
  });

  app.delete("/api/watchlist/:productId", (req, res) => {
    repository.removeFromWatchlist(req.params.productId);
    res.json({ success: true, message: "Removed from watchlist" });
  });

  app.get("/api/search", (req, res) => {
    const q = typeof req.query.q === "string" ? req.query.q : "";
    res.json(repository.searchMovies(q, 20));
  });

  app.get("/api/cheapest-blurays", (_req, res) => {
    res.json(repository.getCheapestBlurays(21));
  });

  app.get("/api/cheapest-4k-blurays", (_req, res) => {
    res.json(repository.getCheapest4kBlurays(21));
  });

  app.post("/api/ignore-movie", (req, res) => {
    const parsed = ignoreRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "product_id is required" });
    }
    if (!repository.ignoreMovie(parsed.data.product_id)) {
      return res.status(404).json({ error: `Unknown product: ${parsed.data.product_id}` });
    }
    return res.json({ success: true, message: "Movie ignored" });
  });

  app.get("/posters/:filename", (req, res, next) => {
    const { filename } = req.params;
    if (!POSTER_FILENAME.test(filename)) {
      res.status(404).json({ error: "Poster not found" });
      return;
    }
    res.sendFile(filename, { root: options.posterDir }, (err) => {
      if (!err) return;
      if (res.headersSent) {
        next(err);
        return;
      }
      res.status(404).json({ error: "Poster not found" });
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    Logger.error(`Unhandled error on ${req.method} ${req.path}`, err);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
