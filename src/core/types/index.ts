export type { MediaFormat, ProductRecord, ProductSink } from "./product";
export { MEDIA_FORMATS } from "./product";
export type {
  BrowserSessionConfig,
  ListingCrawlerConfig,
  NavigationWaitUntil,
  ProductParserConfig,
  SiteAdapter,
} from "./config";
export type {
  AlertType,
  ContentType,
  DealMovie,
  Enrichment,
  MovieWithPricing,
  PriceAlertWithTitle,
  StatsData,
  WatchlistMovie,
} from "./database";
