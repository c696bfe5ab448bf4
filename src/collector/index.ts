import { config, envInfo, requireDbUrl } from "../shared/config.js";
import { closePool, ensureSchema, getPool } from "../shared/db.js";
import { errorMessage } from "../shared/errors.js";
import { createLogger } from "../shared/logger.js";
import { createPgLetterStore } from "../store/letters.js";
import { parseArgs } from "./args.js";
import { collectListPage, parseListPage } from "./extractor.js";
import { createFetcher } from "./fetcher.js";
import { createPipeline } from "./pipeline.js";
import { listPageUrl } from "./url.js";

const logger = createLogger(config.logLevel);

const run = async () => {
  const options = parseArgs(process.argv.slice(2));
  const fetcher = createFetcher({ ...config.fetch, logger: logger.child({ component: "fetcher" }) });

  if (options.dryRun) {
    const url = listPageUrl(config.upstreamBaseUrl, options.page);
    const markup = await fetcher.fetchText(url);
    const { records, errors } = collectListPage(parseListPage(markup, config.upstreamBaseUrl, url));
    logger.info("Dry run parsed list page", { url, records: records.length, errors: errors.length });
    for (const record of records) {
      logger.info("Entry", { ...record });
    }
    for (const error of errors) {
      logger.warn("Extraction error", { ...error });
    }
    return;
  }

  logger.info("Collecting letters", {
    direction: options.direction,
    upstream: config.upstreamBaseUrl,
    envFile: envInfo.envFileExists ? envInfo.envFile : null
  });

  const dbUrl = requireDbUrl();
  await ensureSchema(dbUrl);
  const pipeline = createPipeline({
    fetcher,
    store: createPgLetterStore(getPool(dbUrl)),
    rootUrl: config.upstreamBaseUrl,
    maxNewPages: config.ingest.maxNewPages,
    maxOlderPages: config.ingest.maxOlderPages,
    deadlineMs: config.ingest.deadlineMs,
    logger
  });

  try {
    for (let round = 1; round <= options.repeat; round += 1) {
      const outcome = options.direction === "new" ? await pipeline.fetchNew() : await pipeline.fetchMore();
      logger.info("Collection finished", { round, ...outcome });
      if (outcome.status !== "completed") {
        process.exitCode = 1;
        break;
      }
      if (!outcome.has_more) break;
    }
  } finally {
    await closePool();
  }
};

run().catch((error) => {
  logger.error("Collector failed", { error: errorMessage(error) });
  process.exitCode = 1;
});
