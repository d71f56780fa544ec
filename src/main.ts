// Copyright (c) 2025 [Your Name]
// SPDX-License-Identifier: MIT

import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { createPipeline } from "./pipeline.js";
import { createApp } from "./server.js";
import { FileSystemBundleStore } from "./store.js";

const config = loadConfig();
const logger = createLogger(config.server.logLevel);

// ---------- Production Safety Checks ----------
if (config.server.nodeEnv === "production") {
  if (config.server.allowedOrigins.length === 0) {
    logger.fatal({ at: "startup", error: "PRODUCTION without ALLOWED_ORIGINS is unsafe" });
    process.exit(1);
  }
  if (config.server.allowedFetchHosts.length === 0) {
    logger.fatal({ at: "startup", error: "PRODUCTION without ALLOWED_FETCH_HOSTS is unsafe" });
    process.exit(1);
  }
}

const store = new FileSystemBundleStore(config.server.outputDir);
const pipeline = createPipeline(config.pipeline, { store, logger });
const app = createApp({ pipeline, store, config: config.server, logger });

// ---------- Graceful Shutdown ----------
const server = app.listen(config.server.port, () => {
  logger.info({
    at: "startup",
    env: config.server.nodeEnv,
    port: config.server.port,
    outputDir: config.server.outputDir,
    frameBackend: config.pipeline.frameBackend,
    concurrency: config.pipeline.concurrency,
    maxConcurrent: config.server.maxInflight,
    pipelineVersion: pipeline.pipelineVersion
  });
});

function shutdown(signal: string) {
  logger.info({ at: "shutdown", signal });

  server.close(() => {
    logger.info({ at: "shutdown_complete" });
    process.exit(0);
  });

  setTimeout(() => {
    logger.warn({ at: "shutdown_timeout", msg: "Forcing exit" });
    process.exit(1);
  }, 10_000).unref();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

process.on("unhandledRejection", reason => {
  logger.error({ at: "unhandled_rejection", reason: errorMessage(reason) });
});

process.on("uncaughtException", error => {
  logger.fatal({ at: "uncaught_exception", error: error.message });
  process.exit(1);
});
