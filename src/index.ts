import { loadConfig } from "./config";
import { initLogger, logger } from "./logger";
import { ApiClient } from "./api/http-client";
import { ChmsClient } from "./api/chms-client";
import { ReconcileService } from "./reconcile/reconcile-service";
import { formatReport } from "./report/format-report";
import { startServer } from "./http/server";

async function main() {
  // 1. Configuration
  const config = loadConfig();

  // 2. Logger (must come after config)
  initLogger(config.logLevel);

  logger.info({ snapshotPath: config.snapshot.path }, "Starting Breeze profile reconciler");

  // 3. API client + reconciler
  const chms = new ChmsClient(new ApiClient(config.api));
  const reconciler = new ReconcileService(chms, {
    snapshotPath: config.snapshot.path,
    peopleLimit: config.people.limit,
  });

  // 4a. One-shot run
  if (!config.http.enabled) {
    const result = await reconciler.run();
    process.stdout.write(
      result.baseline ? "Baseline snapshot saved.\n" : `${formatReport(result.reports)}\n`
    );
    return;
  }

  // 4b. HTTP trigger server
  const server = await startServer({
    port: config.http.port,
    apiKey: config.http.apiKey,
    reconciler,
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Received shutdown signal");
    let exitCode = 0;
    try {
      await server.close();
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      exitCode = 1;
    }
    process.exit(exitCode);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
