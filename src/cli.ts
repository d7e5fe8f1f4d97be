import "dotenv/config";
import { getCategoryKeys, getSiteKeys } from "./sites/registry";
import { AppConfig } from "./core/config/app-config";
import { closeDb, openDb } from "./core/database/connection";
import { MovieRepository } from "./core/database/repository";
import { isPageCeiling, runCrawl, runWatchlistCheck } from "./core/services/crawl-service";
import { closeServer, onShutdown } from "./core/utils/health";
import { Logger } from "./core/utils/logger";
import { sleep } from "./core/utils/retry";
import { createApp } from "./web/server";

const HELP = `Usage:
  npm run cli -- crawl [--category bluray|4k|all] [--max-pages N]
  npm run cli -- monitor [--once]
  npm run cli -- web
  npm run cli -- watch <productId> <targetPrice>
  npm run cli -- unwatch <productId>
  npm run cli -- search <query>
  npm run cli -- --list

CLI Mode - runs directly, bypassing the queue

Commands:
  crawl      Crawl listing pages and store Blu-ray prices
  monitor    Re-check watchlist prices every CHECK_INTERVAL_HOURS (--once: one pass)
  web        Serve the dashboard API on API_HOST:API_PORT
  watch      Add a movie to the watchlist with a target price
  unwatch    Remove a movie from the watchlist
  search     Search stored movies by title

Note: For queue-based processing, use: npm start`;

function withRepository<T>(fn: (repo: MovieRepository) => T): T {
  const handles = openDb(AppConfig.DB_PATH);
  try {
    return fn(new MovieRepository(handles.db));
  } finally {
    closeDb(handles);
  }
}

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };

  if (argv.length === 0 || hasFlag("--help")) {
    Logger.info(HELP);
    return 0;
  }

  if (hasFlag("--list")) {
    Logger.info(`Available sites: ${getSiteKeys().join(", ")}`);
    Logger.info(`Available categories: ${[...getCategoryKeys(), "all"].join(", ")}`);
    return 0;
  }

  const [command, ...rest] = argv;

  switch (command) {
    case "crawl": {
      const maxPagesArg = getArg("--max-pages");
      const maxPages = maxPagesArg === undefined ? undefined : Number(maxPagesArg);
      if (maxPages !== undefined && !isPageCeiling(maxPages)) {
        Logger.error(`Invalid --max-pages value: ${maxPagesArg}`);
        return 1;
      }
      const results = await runCrawl({ category: getArg("--category") ?? "all", maxPages });
      const failCount = results.filter((r) => !r.success).length;
      const saved = results.reduce((sum, r) => sum + r.saved, 0);
      Logger.info(`Crawl completed: ${saved} movies saved, ${failCount} categories failed`);
      return failCount === results.length ? 1 : 0;
    }

    case "monitor": {
      const intervalMs = AppConfig.CHECK_INTERVAL_HOURS * 3600 * 1000;
      for (;;) {
        const { checked, alertsSent } = await runWatchlistCheck();
        Logger.info(`Watchlist check done: ${checked} checked, ${alertsSent} alerts sent`);
        if (hasFlag("--once")) return 0;
        Logger.info(`Next check in ${AppConfig.CHECK_INTERVAL_HOURS}h`);
        await sleep(intervalMs);
      }
    }

    case "web": {
      const handles = openDb(AppConfig.DB_PATH);
      const app = createApp(new MovieRepository(handles.db), {
        posterDir: AppConfig.POSTER_DIR,
        minDealDiff: AppConfig.MIN_DEAL_DIFF,
      });
      const server = app.listen(AppConfig.API_PORT, AppConfig.API_HOST, () => {
        Logger.info(`Dashboard API listening on http://${AppConfig.API_HOST}:${AppConfig.API_PORT}`);
      });
      onShutdown(async () => {
        await closeServer(server);
        closeDb(handles);
      });
      return -1;
    }

    case "watch": {
      const [productId, target] = rest;
      const targetPrice = Number(target);
      if (!productId || !(targetPrice > 0)) {
        Logger.error("Usage: watch <productId> <targetPrice>");
        return 1;
      }
      if (!withRepository((repo) => repo.addToWatchlist(productId, targetPrice))) {
        Logger.error(`No movie with product id ${productId}`);
        return 1;
      }
      Logger.info(`Watching ${productId} for €${targetPrice} or less`);
      return 0;
    }

    case "unwatch": {
      const [productId] = rest;
      if (!productId) {
        Logger.error("Usage: unwatch <productId>");
        return 1;
      }
      withRepository((repo) => repo.removeFromWatchlist(productId));
      Logger.info(`Removed ${productId} from the watchlist`);
      return 0;
    }

    case "search": {
      const query = rest.join(" ");
      const movies = withRepository((repo) => repo.searchMovies(query));
      if (movies.length === 0) Logger.info(`No movies match "${query}"`);
      for (const m of movies) {
        Logger.info(`${m.productId ?? "-"}  €${m.currentPrice ?? "?"}  ${m.title}`);
      }
      return 0;
    }

    default:
      Logger.error(`Unknown command: ${command}`);
      Logger.info(HELP);
      return 1;
  }
}

main().then(
  (code) => {
    // -1: long-running server, keep the process alive
    if (code >= 0) process.exit(code);
  },
  (e: unknown) => {
    Logger.error("Command failed", e);
    process.exit(1);
  },
);
