/**
 * @file main.ts
 * @description Service entry point
 */

import { Server } from "http";
import { Logger } from "./utils/logger";
import { getEnvConfig } from "./utils/checkEnv";
import { AppContext, createApp, createContext } from "./server";

/**
 * Restores state, starts the workers and begins listening.
 */
async function start(context: AppContext): Promise<Server> {
  const { config } = context;
  await context.configStore.load();
  const restored = await context.store.load();
  Logger.info(`Restored ${restored} task(s) from ${context.snapshots.filePath}`);

  context.pool.start();

  const app = createApp(context);
  return app.listen(config.PORT, config.HOST, () => {
    Logger.info(`Server running at http://${config.HOST}:${config.PORT}`);
    Logger.info(`Environment: ${config.NODE_ENV}`);
    Logger.info(`Log level: ${config.LOG_LEVEL}`);
    Logger.info(`Downloads go to ${config.DOWNLOAD_DIR}`);
  });
}

/**
 * Stops accepting requests, lets running downloads finish, flushes state.
 */
async function shutdown(context: AppContext, server: Server): Promise<void> {
  Logger.info("Shutting down...");
  context.streamingService.closeAll();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await context.pool.stop();
  await context.service.settlePrefetches();
  await context.store.save();
  await context.snapshots.flush();
  await context.pushNotificationService.flush();
  Logger.success("Shutdown complete");
}

async function main(): Promise<void> {
  const context = createContext(getEnvConfig());
  const server = await start(context);

  let stopping = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    Logger.info(`Received ${signal}`);
    shutdown(context, server)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        Logger.error(`Shutdown error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  Logger.error(`Initialization error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
