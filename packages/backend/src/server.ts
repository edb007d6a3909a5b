import { appConfig } from "./config.js";
import { createApp } from "./app.js";
import { createAppContext } from "./runtime/appContext.js";
import { logger } from "./utils/logger.js";

const context = createAppContext(appConfig);
const app = createApp(context);

const server = app.listen(appConfig.PORT, () => {
  logger.info(`Knowledge base backend is running on http://localhost:${appConfig.PORT}`);
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ signal }, "Shutting down");

  server.close();
  try {
    await context.dispose();
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, "Shutdown failed");
    process.exit(1);
  }
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    void shutdown(signal);
  });
}
