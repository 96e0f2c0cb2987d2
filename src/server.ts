import { buildApp } from "./app.js";
import { env } from "./config/env.js";
import { logger } from "./infrastructure/logger.js";

const app = await buildApp();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, "shutdown failed");
        process.exit(1);
      }
    );
  });
}

try {
  await app.listen({ port: env.PORT, host: env.HOST });
} catch (error) {
  logger.fatal({ err: error }, "server failed to start");
  process.exit(1);
}
