import http from "http";
import { Logger } from "./logger";

/**
 * Plain-text liveness endpoint on /healthz for process supervisors
 */
export function startHealthServer(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === "/healthz") {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("ok");
    } else {
      res.writeHead(404);
      res.end();
    }
  });
  server.listen(port, () => {
    Logger.info(`Health check endpoint listening on :${port}/healthz`);
  });
  return server;
}

/**
 * Runs `cleanup` on SIGINT/SIGTERM, then exits; forces exit after 5s
 */
export function onShutdown(cleanup: () => Promise<void>): void {
  const shutdown = () => {
    Logger.info("Graceful shutdown initiated");
    setTimeout(() => {
      Logger.warn("Forced exit after 5s");
      process.exit(1);
    }, 5000).unref();
    cleanup().then(
      () => process.exit(0),
      (error: unknown) => {
        Logger.error("Shutdown failed", error);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
