import { pool } from "./pool";
import { PgRecordStore } from "./pgStore";
import { seedDemo } from "./seed";
import { logger } from "../logger";

seedDemo(new PgRecordStore(pool))
  .catch((error) => {
    logger.error({ err: error }, "Seed failed");
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
