/**
 * Main Entry Point
 * Upserts the recurring crawl and watchlist-check jobs and starts the worker
 * This is the primary way to run the application in queue mode
 */

import "dotenv/config";
import { AppConfig } from "./core/config/app-config";
import {
  closeConnection,
  createPriceWatchQueue,
  createPriceWatchWorker,
  scheduleRecurringCrawl,
  scheduleWatchlistCheck,
} from "./core/services/queue";
import { closeServer, onShutdown, startHealthServer } from "./core/utils/health";
import { Logger } from "./core/utils/logger";

async function main() {
  Logger.info("Starting Blu-ray price watcher");

  const server = startHealthServer(AppConfig.HEALTH_PORT);
  const queue = createPriceWatchQueue();

  Logger.info("Setting up recurring schedules");
  await scheduleRecurringCrawl(queue, { category: "all", cron: AppConfig.CRAWL_CRON });
  await scheduleWatchlistCheck(queue, AppConfig.CHECK_INTERVAL_HOURS);

  const worker = createPriceWatchWorker();

  onShutdown(async () => {
    await worker.close();
    await queue.close();
    await closeConnection();
    await closeServer(server);
    Logger.info("Health server closed");
  });

  Logger.info("Application is ready and listening for jobs");
}

main().catch((e: unknown) => {
  Logger.error("Startup failed", e);
  process.exit(1);
});
