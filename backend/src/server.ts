import { env } from "./config/env";
import { createApp } from "./app";
import { assertDatabaseConnection } from "./db/pool";
import { createDefaultDeps } from "./deps";
import { logger } from "./logger";

async function bootstrap() {
  await assertDatabaseConnection();
  const deps = createDefaultDeps();
  const app = createApp(deps);
  app.listen(env.PORT, () => {
    logger.info(
      { port: env.PORT, judgeConfigured: Boolean(env.JUDGE_API_KEY), storageConfigured: Boolean(deps.storage) },
      `Backend listening on http://localhost:${env.PORT}`
    );
  });
}

bootstrap().catch((error) => {
  logger.fatal({ err: error }, "Failed to start backend");
  process.exit(1);
});
