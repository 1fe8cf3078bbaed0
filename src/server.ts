import { createApp } from "./app.js";
import { closeAppContext, createAppContext, startAppContext } from "./context.js";
import { env } from "./config/env.js";
import { logger } from "./config/logger.js";

const context = createAppContext(env);

const start = async (): Promise<void> => {
  await startAppContext(context);

  const app = createApp(context);
  const server = app.listen(env.PORT, () => {
    logger.info(`${env.SERVICE_NAME} listening on http://localhost:${env.PORT}`);
  });

  const shutdown = (): void => {
    logger.info(`Shutting down ${env.SERVICE_NAME}`);

    server.close((error) => {
      closeAppContext(context)
        .then(() => {
          if (error) {
            logger.error("Failed to close server cleanly", error);
            process.exit(1);
          }

          process.exit(0);
        })
        .catch((closeError: unknown) => {
          logger.error("Failed to release resources", closeError);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
};

start().catch((error: unknown) => {
  logger.error("Failed to start server", error);
  process.exit(1);
});
