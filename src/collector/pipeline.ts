import { startDeadline, type Deadline } from "../shared/async.js";
import { DeadlineExceededError, FetchError, errorMessage } from "../shared/errors.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import {
  extractionToIngestError,
  type Direction,
  type FetchFailure,
  type FetchOutcome,
  type FetchStatus,
  type IngestError,
  type NormalizedRecord,
  type PartialRecord
} from "../shared/record.js";
import type { LetterStore } from "../store/letters.js";
import { createPaginationCursor, type PaginationCursor } from "./cursor.js";
import { collectListPage, parseDetailPage, parseListPage } from "./extractor.js";
import type { Fetcher } from "./fetcher.js";
import { ingest, type IngestResult } from "./ingestor.js";
import { listPageUrl } from "./url.js";

export type PipelineOptions = {
  fetcher: Fetcher;
  store: LetterStore;
  rootUrl: string;
  maxNewPages: number;
  maxOlderPages: number;
  deadlineMs: number;
  cursor?: PaginationCursor;
  logger?: Logger;
};

export type Pipeline = {
  cursor: PaginationCursor;
  fetchNew: () => Promise<FetchOutcome>;
  fetchMore: () => Promise<FetchOutcome>;
};

type PageStep =
  | { kind: "empty" }
  | { kind: "unreadable"; url: string }
  | { kind: "ingested"; result: IngestResult };

type Tally = {
  attempted: number;
  inserted: number;
  skipped: number;
  pages: number;
  errors: IngestError[];
};

const NO_OLDER_LETTERS = "No older letters remain";

const plural = (count: number) => `${count} new letter${count === 1 ? "" : "s"}`;

const newTally = (): Tally => ({ attempted: 0, inserted: 0, skipped: 0, pages: 0, errors: [] });

const unreadableFailure = (url: string): FetchFailure => ({
  kind: "extraction",
  message: `No letters could be read from ${url}`,
  url
});

const summarize = (
  tally: Tally,
  hasMore: boolean,
  status: FetchStatus,
  idleMessage: string,
  failure?: FetchFailure
): FetchOutcome => {
  let message: string;
  if (status === "failed") {
    message = `${failure?.message ?? "Fetch failed"}; ${plural(tally.inserted)} kept`;
  } else if (status === "deadline_exceeded") {
    message = `Stopped at the deadline after adding ${plural(tally.inserted)}`;
  } else if (tally.inserted > 0) {
    message = `Added ${plural(tally.inserted)}`;
  } else {
    message = idleMessage;
  }

  const outcome: FetchOutcome = {
    status,
    attempted_count: tally.attempted,
    inserted_count: tally.inserted,
    skipped_duplicate_count: tally.skipped,
    has_more: hasMore,
    pages_scanned: tally.pages,
    errors: tally.errors,
    message
  };
  if (failure) outcome.failure = failure;
  return outcome;
};

export const createPipeline = (options: PipelineOptions): Pipeline => {
  const cursor = options.cursor ?? createPaginationCursor();
  const logger = (options.logger ?? silentLogger).child({ component: "pipeline" });
  const { fetcher, store, rootUrl } = options;

  // Stored letters skip the detail fetch and go to the ingestor as they are.
  const enrich = async (partial: PartialRecord, page: number, tally: Tally, deadline: Deadline) => {
    const fallback: NormalizedRecord = { ...partial, content: partial.summary ?? "" };
    try {
      if (await store.existsByUrl(partial.canonical_url)) return fallback;
    } catch (error) {
      logger.warn("Existence check failed before detail fetch", {
        url: partial.canonical_url,
        error: errorMessage(error)
      });
    }

    try {
      const detail = parseDetailPage(await fetcher.fetchText(partial.canonical_url, deadline.signal));
      if (detail.error) {
        logger.warn("Could not extract letter content", { url: partial.canonical_url, reason: detail.error });
        tally.errors.push({ stage: "detail", message: detail.error, url: partial.canonical_url, page });
        return fallback;
      }
      return { ...partial, content: detail.content };
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;
      logger.warn("Could not fetch letter content", { url: partial.canonical_url, kind: error.kind });
      tally.errors.push({ stage: "detail", message: error.message, url: partial.canonical_url, page });
      return fallback;
    }
  };

  const ingestPage = async (direction: Direction, page: number, records: NormalizedRecord[], tally: Tally) => {
    const result = await ingest(store, records, { logger, page });
    tally.attempted += result.attempted_count;
    tally.inserted += result.inserted_count;
    tally.skipped += result.skipped_duplicate_count;
    tally.errors.push(...result.errors);
    logger.info("Ingested list page", {
      direction,
      page,
      attempted: result.attempted_count,
      inserted: result.inserted_count,
      skipped: result.skipped_duplicate_count
    });
    return result;
  };

  const processPage = async (direction: Direction, page: number, tally: Tally, deadline: Deadline): Promise<PageStep> => {
    if (deadline.expired()) throw new DeadlineExceededError();
    const url = listPageUrl(rootUrl, page);
    logger.info("Fetching list page", { direction, page, url });

    const markup = await fetcher.fetchText(url, deadline.signal);
    tally.pages += 1;

    const collected = collectListPage(parseListPage(markup, rootUrl, url));
    for (const error of collected.errors) {
      logger.warn("Could not extract entry", { ...error, page });
      tally.errors.push(extractionToIngestError(error, page));
    }
    if (collected.empty) return { kind: "empty" };
    if (collected.records.length === 0) return { kind: "unreadable", url };

    const records: NormalizedRecord[] = [];
    for (const partial of collected.records) {
      try {
        records.push(await enrich(partial, page, tally, deadline));
      } catch (error) {
        if (!(error instanceof DeadlineExceededError)) throw error;
        // Keep what was already read; the page itself is retried next call.
        await ingestPage(direction, page, records, tally);
        throw error;
      }
    }

    return { kind: "ingested", result: await ingestPage(direction, page, records, tally) };
  };

  const fail = (error: unknown, tally: Tally, hasMore: boolean): FetchOutcome => {
    if (error instanceof DeadlineExceededError) {
      logger.warn("Ingestion deadline exceeded", { inserted: tally.inserted, pages: tally.pages });
      return summarize(tally, hasMore, "deadline_exceeded", "");
    }
    if (error instanceof FetchError) {
      logger.error("Upstream fetch failed", {
        url: error.url,
        kind: error.kind,
        status: error.status,
        attempts: error.attempts
      });
      return summarize(tally, hasMore, "failed", "", {
        kind: error.kind,
        message: error.message,
        url: error.url,
        ...(error.status !== undefined ? { status: error.status } : {})
      });
    }
    throw error;
  };

  const unreadable = (tally: Tally, url: string): FetchOutcome => {
    logger.error("List page held no readable letters", { url, errors: tally.errors.length });
    return summarize(tally, true, "failed", "", unreadableFailure(url));
  };

  // Scan from page 1 until a page holds an already stored letter.
  const fetchNew = async (): Promise<FetchOutcome> => {
    const tally = newTally();
    const deadline = startDeadline(options.deadlineMs);
    const firstPage = cursor.nextPageToken("newer");
    let hasMore = false;

    try {
      for (let scanned = 0; scanned < options.maxNewPages; scanned += 1) {
        const page = firstPage + scanned;
        const step = await processPage("newer", page, tally, deadline);
        if (step.kind === "unreadable") return unreadable(tally, step.url);
        if (step.kind === "empty") break;
        cursor.advance("newer", page);
        if (step.result.skipped_duplicate_count > 0) break;
        hasMore = scanned === options.maxNewPages - 1;
      }
      return summarize(tally, hasMore, "completed", "No new letters found");
    } catch (error) {
      return fail(error, tally, true);
    } finally {
      deadline.clear();
    }
  };

  // Continue the older cursor until a page yields at least one unseen letter.
  const fetchMore = async (): Promise<FetchOutcome> => {
    const tally = newTally();
    if (cursor.isExhausted("older")) {
      return summarize(tally, false, "completed", NO_OLDER_LETTERS);
    }

    const deadline = startDeadline(options.deadlineMs);
    try {
      for (let scanned = 0; scanned < options.maxOlderPages; scanned += 1) {
        const page = cursor.nextPageToken("older");
        let step: PageStep;
        try {
          step = await processPage("older", page, tally, deadline);
        } catch (error) {
          if (error instanceof FetchError && error.kind === "http_status" && error.status === 404) {
            step = { kind: "empty" };
          } else {
            throw error;
          }
        }
        if (step.kind === "empty") {
          logger.info("Reached the end of older letters", { page });
          cursor.markExhausted("older");
          break;
        }
        if (step.kind === "unreadable") return unreadable(tally, step.url);
        cursor.advance("older", page);
        if (step.result.inserted_count > 0) break;
      }
      const hasMore = !cursor.isExhausted("older");
      return summarize(
        tally,
        hasMore,
        "completed",
        hasMore ? `Checked ${tally.pages} page(s); every letter was already stored` : NO_OLDER_LETTERS
      );
    } catch (error) {
      return fail(error, tally, !cursor.isExhausted("older"));
    } finally {
      deadline.clear();
    }
  };

  return { cursor, fetchNew, fetchMore };
};
