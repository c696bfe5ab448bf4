import { createBedrockAnswerGenerator } from "../answers/bedrock.js";
import { createFetcher } from "../collector/fetcher.js";
import { createPipeline } from "../collector/pipeline.js";
import { config, requireDbUrl } from "../shared/config.js";
import { ensureSchema, getPool } from "../shared/db.js";
import { errorMessage } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { createPgLetterStore } from "../store/letters.js";
import { createPgQuestionStore } from "../store/questions.js";
import { createApp } from "./app.js";

const logger = createLogger(config.logLevel);

const start = async () => {
  const dbUrl = requireDbUrl();
  await ensureSchema(dbUrl);
  const db = getPool(dbUrl);
  const letters = createPgLetterStore(db);

  const pipeline = createPipeline({
    fetcher: createFetcher({ ...config.fetch, logger: logger.child({ component: "fetcher" }) }),
    store: letters,
    rootUrl: config.upstreamBaseUrl,
    maxNewPages: config.ingest.maxNewPages,
    maxOlderPages: config.ingest.maxOlderPages,
    deadlineMs: config.ingest.deadlineMs,
    logger
  });

  const answers = createBedrockAnswerGenerator({
    ...config.answers,
    timeoutMs: config.fetch.timeoutMs,
    maxAttempts: config.fetch.maxAttempts,
    logger
  });

  const app = createApp({ pipeline, letters, questions: createPgQuestionStore(db), answers, logger });
  app.listen(config.port, () => {
    logger.info("API listening", {
      url: `http://localhost:${config.port}`,
      upstream: config.upstreamBaseUrl,
      deadlineMs: config.ingest.deadlineMs
    });
  });
};

start().catch((error) => {
  logger.error("Server failed to start", { error: errorMessage(error) });
  process.exit(1);
});
