import {
  index,
  integer,
  real,
  sqliteTable,
  text,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";
import { MEDIA_FORMATS } from "./src/core/types/index";

// Timestamps are ISO-8601 strings written by the application.

export const movies = sqliteTable(
  "movies",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    productId: text("product_id"),
    title: text("title").notNull(),
    format: text("format", { enum: MEDIA_FORMATS }).notNull(),
    url: text("url").notNull(),
    imageUrl: text("image_url"),
    productionYear: integer("production_year"),
    tmdbId: integer("tmdb_id"),
    contentType: text("content_type", { enum: ["movie", "tv"] })
      .notNull()
      .default("movie"),
    available: integer("available", { mode: "boolean" }).notNull().default(true),
    firstSeen: text("first_seen").notNull(),
    lastUpdated: text("last_updated").notNull(),
  },
  (table) => ({
    uniqueProductId: uniqueIndex("ux_movies_product_id").on(table.productId),
    titleFormatIndex: index("idx_movies_title_format").on(
      table.title,
      table.format,
    ),
  }),
);

export const priceHistory = sqliteTable(
  "price_history",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    movieId: integer("movie_id")
      .references(() => movies.id)
      .notNull(),
    productId: text("product_id"),
    price: real("price").notNull(),
    availability: text("availability"),
    checkedAt: text("checked_at").notNull(),
  },
  (table) => ({
    movieIndex: index("idx_price_history_movie").on(table.movieId),
  }),
);

export const watchlist = sqliteTable("watchlist", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  movieId: integer("movie_id")
    .references(() => movies.id)
    .unique()
    .notNull(),
  productId: text("product_id"),
  targetPrice: real("target_price").notNull(),
  notifyOnAvailability: integer("notify_on_availability", { mode: "boolean" })
    .notNull()
    .default(true),
  createdAt: text("created_at").notNull(),
});

export const priceAlerts = sqliteTable(
  "price_alerts",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    movieId: integer("movie_id")
      .references(() => movies.id)
      .notNull(),
    productId: text("product_id"),
    oldPrice: real("old_price").notNull(),
    newPrice: real("new_price").notNull(),
    alertType: text("alert_type", {
      enum: ["price_drop", "target_reached", "back_in_stock"],
    }).notNull(),
    createdAt: text("created_at").notNull(),
    notified: integer("notified", { mode: "boolean" }).notNull().default(false),
  },
  (table) => ({
    notifiedIndex: index("idx_price_alerts_notified").on(table.notified),
  }),
);

export const ignoredMovies = sqliteTable("ignored_movies", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  movieId: integer("movie_id")
    .references(() => movies.id)
    .unique()
    .notNull(),
  productId: text("product_id"),
  ignoredAt: text("ignored_at").notNull(),
});
