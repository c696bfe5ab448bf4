import { config, requireDbUrl } from "./shared/config.js";
import { closePool, ensureSchema } from "./shared/db.js";
import { errorMessage } from "./shared/errors.js";
import { createLogger } from "./shared/logger.js";

const logger = createLogger(config.logLevel);

const run = async () => {
  await ensureSchema(requireDbUrl());
  await closePool();
  logger.info("Schema applied.");
};

run().catch((error) => {
  logger.error("Migration failed", { error: errorMessage(error) });
  process.exit(1);
});
