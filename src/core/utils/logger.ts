import pino from 'pino';

const usePretty =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

// Set log level via env LOG_LEVEL (default: info)
const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: usePretty
    ? {
        target: 'pino-pretty',
        options: { colorize: true },
      }
    : undefined,
});

export interface LogMeta {
  category?: string;
  url?: string;
  page?: number;
  attempt?: number;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

/**
 * Normalizes anything thrown into an Error so it can be logged with a stack
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: unknown, meta?: LogMeta): void {
    const err = error === undefined ? undefined : toError(error);
    const errorMeta = {
      ...meta,
      error: err?.message,
      stack: err?.stack,
    };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static pageCrawled(url: string, page: number, found: number, total: number): void {
    this.info(`Found ${found} URLs on page ${page}, total: ${total}`, {
      url,
      page,
      found,
      total,
    });
  }
  static productParsed(url: string, title: string, price: number): void {
    this.debug(`Parsed: ${title}`, { url, title, price });
  }
  static crawlComplete(category: string, saved: number, duration: number): void {
    this.info(`Crawl complete: saved ${saved} Blu-ray movies`, {
      category,
      count: saved,
      duration,
    });
  }
  static alertRaised(kind: string, movieId: number, oldPrice: number, newPrice: number): void {
    this.info(`Price alert (${kind}) for movie ${movieId}: €${oldPrice} -> €${newPrice}`, {
      kind,
      movieId,
      oldPrice,
      newPrice,
    });
  }
}
