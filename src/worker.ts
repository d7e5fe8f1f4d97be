/**
 * BullMQ Worker Entry Point
 * Processes crawl and watchlist-check jobs from the queue without scheduling
 */

import "dotenv/config";
import { AppConfig } from "./core/config/app-config";
import { closeConnection, createPriceWatchWorker } from "./core/services/queue";
import { closeServer, onShutdown, startHealthServer } from "./core/utils/health";
import { Logger } from "./core/utils/logger";

function main() {
  Logger.info("Starting BullMQ worker for price-watch jobs");

  const server = startHealthServer(AppConfig.HEALTH_PORT);
  const worker = createPriceWatchWorker();

  onShutdown(async () => {
    await worker.close();
    await closeConnection();
    await closeServer(server);
  });

  Logger.info("Worker is ready and listening for jobs");
}

main();
