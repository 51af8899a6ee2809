import { pool } from "./pool";
import { runMigrations } from "./migrationRunner";
import { logger } from "../logger";

async function main(): Promise<void> {
  const applied = await runMigrations();
  if (applied.length === 0) {
    logger.info("No new migrations to apply.");
  } else {
    logger.info({ applied }, `Applied migrations: ${applied.join(", ")}`);
  }
}

main()
  .catch((error) => {
    logger.error({ err: error }, "Migration failed");
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
