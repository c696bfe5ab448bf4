import { errorMessage, isDuplicateError } from "../shared/errors.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import type { IngestError, NormalizedRecord } from "../shared/record.js";
import type { LetterStore } from "../store/letters.js";

export type IngestResult = {
  attempted_count: number;
  inserted_count: number;
  skipped_duplicate_count: number;
  inserted_ids: number[];
  errors: IngestError[];
};

export const emptyIngestResult = (): IngestResult => ({
  attempted_count: 0,
  inserted_count: 0,
  skipped_duplicate_count: 0,
  inserted_ids: [],
  errors: []
});

// A duplicate raised by insert counts as skipped; the unique constraint decides races.
export const ingest = async (
  store: LetterStore,
  records: Iterable<NormalizedRecord>,
  options: { logger?: Logger; page?: number } = {}
): Promise<IngestResult> => {
  const logger = options.logger ?? silentLogger;
  const result = emptyIngestResult();

  for (const record of records) {
    result.attempted_count += 1;
    const url = record.canonical_url;
    try {
      if (await store.existsByUrl(url)) {
        result.skipped_duplicate_count += 1;
        logger.debug("Letter already stored", { url });
        continue;
      }
      const id = await store.insert(record);
      result.inserted_count += 1;
      result.inserted_ids.push(id);
      logger.info("Stored letter", { id, url, title: record.title });
    } catch (error) {
      if (isDuplicateError(error)) {
        result.skipped_duplicate_count += 1;
        logger.debug("Letter stored concurrently", { url });
        continue;
      }
      const message = errorMessage(error);
      result.errors.push({ stage: "storage", message, url, page: options.page });
      logger.error("Failed to store letter", { url, error: message });
    }
  }

  return result;
};
