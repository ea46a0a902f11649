import { collectDefaultMetrics } from "prom-client";

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { listen } from "./http/server.js";
import { createLogger } from "./logger.js";

const config = loadConfig();
const logger = createLogger(config.logLevel);
const app = createApp(config, logger);

if (config.metricsEnabled) {
  collectDefaultMetrics({ register: app.metrics.registry, prefix: "message_search_" });
}

const port = await listen(app.server, config.port);
logger.info({ port }, "listening");

// the server answers 503 on /search until the first cycle publishes
app.refresher
  .start({ immediate: config.refresh.onStart })
  .then((outcome) => {
    if (outcome?.status === "failed") logger.warn("initial refresh failed, retrying on the next interval");
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, "initial refresh hit a bug");
    process.exit(1);
  });

function shutdown(signal: string): void {
  logger.info({ signal }, "shutting down");
  app.refresher.stop();
  app.server.close(() => process.exit(0));
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
