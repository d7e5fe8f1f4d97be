/**
 * BullMQ Queue Configuration
 * Handles scheduling and processing of crawl and watchlist-check jobs
 */

import { type Job, Queue, Worker } from "bullmq";
import Redis from "ioredis";
import { AppConfig } from "../config/app-config";
import { Logger } from "../utils/logger";
import { type CrawlResult, runCrawl, runWatchlistCheck } from "./crawl-service";
import type { MonitorResult } from "./monitor";

export const QUEUE_NAMES = {
  PRICE_WATCH: "price-watch-jobs",
} as const;

export const JOB_NAMES = {
  CRAWL: "crawl",
  CHECK_WATCHLIST: "check-watchlist",
} as const;

export interface CrawlJobData {
  category?: string;
  maxPages?: number;
}

export type PriceWatchJobData = CrawlJobData;
export type PriceWatchJobResult = CrawlResult[] | MonitorResult;

export interface JobHandlers {
  crawl: (data: CrawlJobData) => Promise<CrawlResult[]>;
  checkWatchlist: () => Promise<MonitorResult>;
}

const defaultHandlers: JobHandlers = {
  crawl: (data) => runCrawl(data),
  checkWatchlist: () => runWatchlistCheck(),
};

let connection: Redis | undefined;

/**
 * Shared Redis connection, opened on first use
 */
export function getConnection(): Redis {
  connection ??= new Redis({
    host: AppConfig.REDIS_HOST,
    port: AppConfig.REDIS_PORT,
    password: AppConfig.REDIS_PASSWORD,
    maxRetriesPerRequest: null, // Required for BullMQ
  });
  return connection;
}

export async function closeConnection(): Promise<void> {
  if (!connection) return;
  await connection.quit();
  connection = undefined;
}

export function createPriceWatchQueue(): Queue<PriceWatchJobData, PriceWatchJobResult> {
  return new Queue<PriceWatchJobData, PriceWatchJobResult>(QUEUE_NAMES.PRICE_WATCH, {
    connection: getConnection(),
  });
}

/**
 * Dispatches a job to its handler by job name
 */
export async function processPriceWatchJob(
  job: Pick<Job<PriceWatchJobData>, "id" | "name" | "data">,
  handlers: JobHandlers = defaultHandlers,
): Promise<PriceWatchJobResult> {
  Logger.info(`Processing job ${job.id} (${job.name})`, { data: job.data });

  try {
    switch (job.name) {
      case JOB_NAMES.CRAWL: {
        const results = await handlers.crawl(job.data);
        const failCount = results.filter((r) => !r.success).length;
        if (results.length > 0 && failCount === results.length) {
          throw new Error(`All ${failCount} categories failed`);
        }
        Logger.info(`Job ${job.id} completed`, {
          successCount: results.length - failCount,
          failCount,
        });
        return results;
      }
      case JOB_NAMES.CHECK_WATCHLIST: {
        const result = await handlers.checkWatchlist();
        Logger.info(`Job ${job.id} completed`, { ...result });
        return result;
      }
      default:
        throw new Error(`Unknown job name: ${job.name}`);
    }
  } catch (error) {
    Logger.error(`Job ${job.id} failed`, error);
    throw error;
  }
}

/**
 * Setup default event handlers for a worker
 */
export function setupWorkerEventHandlers(worker: Worker<PriceWatchJobData, PriceWatchJobResult>): void {
  worker.on("completed", (job) => {
    Logger.info(`Job ${job.id} completed successfully`);
  });

  worker.on("failed", (job, err) => {
    Logger.error(`Job ${job?.id} failed: ${err.message}`);
  });

  worker.on("error", (err) => {
    Logger.error(`Worker error: ${err.message}`);
  });
}

export function createPriceWatchWorker(
  handlers: JobHandlers = defaultHandlers,
  setupEvents = true,
): Worker<PriceWatchJobData, PriceWatchJobResult> {
  const worker = new Worker<PriceWatchJobData, PriceWatchJobResult>(
    QUEUE_NAMES.PRICE_WATCH,
    (job) => processPriceWatchJob(job, handlers),
    {
      connection: getConnection(),
      concurrency: 1, // one crawl or check at a time; both share the database
    },
  );

  if (setupEvents) {
    setupWorkerEventHandlers(worker);
  }

  return worker;
}

const RETENTION = {
  removeOnComplete: {
    age: 24 * 3600, // Keep completed jobs for 24 hours
    count: 1000,
  },
  removeOnFail: {
    age: 7 * 24 * 3600, // Keep failed jobs for 7 days
  },
};

/**
 * Creates or updates the recurring crawl job
 */
export async function scheduleRecurringCrawl(
  queue: Queue<PriceWatchJobData, PriceWatchJobResult>,
  options: { category?: string; maxPages?: number; cron?: string } = {},
): Promise<void> {
  const { category = "all", maxPages, cron = AppConfig.CRAWL_CRON } = options;

  await queue.upsertJobScheduler(
    `${JOB_NAMES.CRAWL}-${category}`,
    { pattern: cron },
    {
      name: JOB_NAMES.CRAWL,
      data: { category, maxPages },
      opts: RETENTION,
    },
  );

  Logger.info(`Scheduled recurring crawl for category: ${category}`, { cron });
}

/**
 * Creates or updates the recurring watchlist check
 */
export async function scheduleWatchlistCheck(
  queue: Queue<PriceWatchJobData, PriceWatchJobResult>,
  everyHours: number = AppConfig.CHECK_INTERVAL_HOURS,
): Promise<void> {
  await queue.upsertJobScheduler(
    JOB_NAMES.CHECK_WATCHLIST,
    { every: everyHours * 3600 * 1000 },
    {
      name: JOB_NAMES.CHECK_WATCHLIST,
      data: {},
      opts: RETENTION,
    },
  );

  Logger.info(`Scheduled watchlist check every ${everyHours}h`);
}

/**
 * Enqueues a crawl to run once, now or after `delay` ms
 */
export async function scheduleOneTimeCrawl(
  queue: Queue<PriceWatchJobData, PriceWatchJobResult>,
  data: CrawlJobData,
  options: { delay?: number } = {},
): Promise<Job<PriceWatchJobData, PriceWatchJobResult>> {
  const job = await queue.add(JOB_NAMES.CRAWL, data, {
    delay: options.delay,
    attempts: 3,
    backoff: {
      type: "exponential",
      delay: 60000, // 1 minute
    },
  });

  Logger.info(`Scheduled one-time crawl job: ${job.id}`, { data });

  return job;
}
