/**
 * Centralized application configuration
 */

import { SCAN_DELAYS, type ScanMode } from "../constants/index";
import { envBool, envFloat, envInt, envOpt, envStr } from "./env";

function scanMode(raw: string): ScanMode {
  return raw === "moderate" || raw === "slow" ? raw : "fast";
}

/**
 * Read once at import; entry points load dotenv before importing this.
 */
export class AppConfig {
  // Storage configuration
  static readonly DB_PATH = envStr("DB_PATH", "./data/cdon_movies.db");
  static readonly POSTER_DIR = envStr("POSTER_DIR", "./data/posters");

  // Crawl configuration
  static readonly HEADLESS = envBool("HEADLESS", true);
  static readonly MAX_PAGES_PER_CATEGORY = envInt("MAX_PAGES_PER_CATEGORY", 10);
  static readonly SCAN_MODE: ScanMode = scanMode(envStr("SCAN_MODE", "fast"));
  static readonly CRAWL_CRON = envStr("CRAWL_CRON", "0 3 * * *");
  static readonly CHECK_INTERVAL_HOURS = envInt("CHECK_INTERVAL_HOURS", 6);

  // Enrichment and notifications
  static readonly TMDB_API_KEY = envOpt("TMDB_API_KEY");
  static readonly DISCORD_WEBHOOK = envOpt("DISCORD_WEBHOOK");

  // Dashboard API
  static readonly API_HOST = envStr("API_HOST", "0.0.0.0");
  static readonly API_PORT = envInt("API_PORT", 8080);
  static readonly MIN_DEAL_DIFF = envFloat("MIN_DEAL_DIFF", 5.0);

  // Queue
  static readonly REDIS_HOST = envStr("REDIS_HOST", "localhost");
  static readonly REDIS_PORT = envInt("REDIS_PORT", 6379);
  static readonly REDIS_PASSWORD = envOpt("REDIS_PASSWORD");
  static readonly HEALTH_PORT = envInt("HEALTH_PORT", 8081);

  /**
   * Delay between product pages for the configured scan mode, in ms
   */
  static itemDelayMs(mode: ScanMode = AppConfig.SCAN_MODE): number {
    const seconds = {
      fast: envInt("FAST_SCAN_DELAY", SCAN_DELAYS.fast),
      moderate: envInt("MODERATE_SCAN_DELAY", SCAN_DELAYS.moderate),
      slow: envInt("SLOW_SCAN_DELAY", SCAN_DELAYS.slow),
    }[mode];
    return seconds * 1000;
  }
}
