import type sql from "mssql";
import { createHealthService } from "./application/services/health.service.js";
import { createMonitorService } from "./application/services/monitor.service.js";
import { createReadingService } from "./application/services/reading.service.js";
import type { ReadingRepository } from "./core/ports/reading.repository.js";
import type { Scheduler } from "./core/ports/scheduler.js";
import { createNoopNotifier, createSlackNotifier } from "./infrastructure/alerting/slack.js";
import { loadConfig } from "./infrastructure/config/config.js";
import { createInMemoryReadingRepository } from "./infrastructure/database/in-memory-reading.repository.js";
import { createMssqlReadingRepository, mssqlMigrateUp, openMssqlPool } from "./infrastructure/database/mssql/index.js";
import { createLogger } from "./infrastructure/logging/logger.js";
import { createIntervalScheduler } from "./infrastructure/scheduler/interval-scheduler.js";
import { createRouter } from "./presentation/routes/router.js";
import { createServer } from "./presentation/server.js";
import { printShutdown, printStartupBanner } from "./shared/cli.js";

const VERSION = "1.0.0";

/**
 * Bootstrap: compose the dependency graph, then start the server and the monitor.
 * Single entry point, fail-fast on misconfiguration.
 */
const bootstrap = async (): Promise<void> => {
  const bootStart = performance.now();

  // 1. Config (validated, fails fast)
  const config = loadConfig();

  // 2. Logging
  const logger = createLogger(config.log.level, {}, config.log.format);

  // 3. Storage: SQL Server when configured, in-memory otherwise
  let pool: sql.ConnectionPool | null = null;
  let readingRepo: ReadingRepository;
  if (config.database.connectionString) {
    pool = await openMssqlPool(config.database.connectionString, logger.child({ service: "database" }));
    if (config.database.migrate) {
      await mssqlMigrateUp(pool, logger.child({ service: "migrate" }));
    }
    readingRepo = createMssqlReadingRepository(pool);
  } else {
    logger.warn("SQL_CONNECTION_STRING not set, readings are kept in memory");
    readingRepo = createInMemoryReadingRepository();
  }

  // 4. Alerting: Slack webhook (or log-only when no URL is configured)
  const notifier = config.slack.webhookUrl
    ? createSlackNotifier({
        url: config.slack.webhookUrl,
        timeoutMs: config.slack.timeoutMs,
        maxRetries: config.slack.maxRetries,
        logger: logger.child({ service: "slack" }),
      })
    : createNoopNotifier();

  // 5. Application services
  const readingService = createReadingService({
    readingRepo,
    logger: logger.child({ service: "reading" }),
  });

  const monitor = createMonitorService({
    readingRepo,
    notifier,
    thresholds: config.thresholds,
    windowMs: config.monitor.windowMs,
    logger: logger.child({ service: "monitor" }),
  });

  // 6. Timer trigger: a failed check is already logged by the monitor
  let scheduler: Scheduler | undefined;
  if (config.monitor.enabled) {
    scheduler = createIntervalScheduler({
      name: "fridge-monitor",
      intervalMs: config.monitor.intervalMs,
      runOnStart: config.monitor.runOnStart,
      task: async () => {
        await monitor.check();
      },
      logger: logger.child({ service: "scheduler" }),
    });
  }

  const healthService = createHealthService({
    logger: logger.child({ service: "health" }),
    version: VERSION,
    readingRepo,
    scheduler,
    slackConfigured: notifier.enabled,
  });

  // 7. Presentation
  const router = createRouter({
    readingService,
    healthService,
    defaultWindowMs: config.monitor.windowMs,
    logger,
  });
  const srv = createServer({ config, logger, router });

  // 8. Start
  const instance = await srv.start();
  scheduler?.start();

  // 9. Startup banner
  printStartupBanner({
    config,
    bootTimeMs: performance.now() - bootStart,
    port: instance.port,
    storage: pool ? "mssql" : "memory",
  });

  // 10. Shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    printShutdown(signal);
    await scheduler?.stop();
    await instance.stop();
    if (pool) await pool.close();
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).then(
      () => process.exit(0),
      (e: unknown) => {
        logger.error("Shutdown failed", { error: e instanceof Error ? e.message : String(e) });
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));

  // 11. Unhandled rejection safety net
  process.on("unhandledRejection", (reason) => {
    logger.fatal("Unhandled promise rejection", {
      error: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });
};

bootstrap().catch((e: unknown) => {
  process.stderr.write(`Failed to start: ${e instanceof Error ? e.message : String(e)}\n`);
  process.exit(1);
});
