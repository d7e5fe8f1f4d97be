/**
 * Scheduler Entry Point
 * Upserts the recurring jobs, optionally enqueues a crawl now, then exits
 */

import "dotenv/config";
import { getCategoryKeys } from "./sites/registry";
import { AppConfig } from "./core/config/app-config";
import {
  closeConnection,
  createPriceWatchQueue,
  scheduleOneTimeCrawl,
  scheduleRecurringCrawl,
  scheduleWatchlistCheck,
} from "./core/services/queue";
import { Logger } from "./core/utils/logger";

const HELP = `
Scheduler - Configure recurring crawl and watchlist-check jobs

Usage:
  npm run scheduler
  npm run scheduler -- --category 4k --cron "0 4 * * *"
  npm run scheduler -- --now

Options:
  --category <key>   Category to crawl: ${[...getCategoryKeys(), "all"].join(", ")} (default: all)
  --cron <pattern>   Crawl cron pattern (default: CRAWL_CRON or "${AppConfig.CRAWL_CRON}")
  --every <hours>    Watchlist check interval (default: CHECK_INTERVAL_HOURS or ${AppConfig.CHECK_INTERVAL_HOURS})
  --now              Also enqueue a one-time crawl immediately

Environment Variables:
  REDIS_HOST         Redis host (default: localhost)
  REDIS_PORT         Redis port (default: 6379)
  REDIS_PASSWORD     Redis password (optional)
`;

async function main() {
  const argv = process.argv.slice(2);
  const getArg = (flag: string) => {
    const i = argv.indexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };

  if (argv.includes("--help") || argv.includes("-h")) {
    Logger.info(HELP);
    return;
  }

  const category = getArg("--category") ?? "all";
  if (category !== "all" && !getCategoryKeys().includes(category)) {
    throw new Error(`Unknown category: ${category}`);
  }
  const cron = getArg("--cron") ?? AppConfig.CRAWL_CRON;
  const everyHours = Number(getArg("--every") ?? AppConfig.CHECK_INTERVAL_HOURS);
  if (!Number.isFinite(everyHours) || everyHours <= 0) {
    throw new Error(`Invalid --every value: ${getArg("--every")}`);
  }

  const queue = createPriceWatchQueue();
  try {
    await scheduleRecurringCrawl(queue, { category, cron });
    await scheduleWatchlistCheck(queue, everyHours);
    if (argv.includes("--now")) {
      await scheduleOneTimeCrawl(queue, { category });
    }

    const scheduled = await queue.getJobSchedulers();
    Logger.info(`Total scheduled jobs: ${scheduled.length}`);
    for (const scheduler of scheduled) {
      Logger.info(`  - ${scheduler.key}: ${scheduler.pattern ?? `every ${scheduler.every}ms`}`);
    }
  } finally {
    await queue.close();
    await closeConnection();
  }
  Logger.info("Scheduler completed");
}

main().catch((e: unknown) => {
  Logger.error("Scheduler failed", e);
  process.exit(1);
});
