import type { ExtractionError, FetchErrorKind } from "./errors.js";

export type PartialRecord = {
  title: string;
  canonical_url: string;
  publication_date: string | null; // YYYY-MM-DD, null when upstream gave nothing usable
  summary: string | null;
};

export type NormalizedRecord = PartialRecord & {
  content: string;
};

export type StoredRecord = NormalizedRecord & {
  id: number;
  created_at: string; // ISO timestamp
};

export type QuestionRecord = {
  id: number;
  letter_id: number;
  question: string;
  answer: string;
  created_at: string;
};

export type Direction = "newer" | "older";

export type PaginationState = {
  direction: Direction;
  cursor: number; // last page consulted in this direction
  exhausted: boolean;
};

export type IngestError = {
  stage: "extraction" | "detail" | "storage";
  message: string;
  url?: string;
  page?: number;
  entry_index?: number;
};

export type FetchFailure = {
  // "extraction": the list page was fetched but no entry on it could be read
  kind: FetchErrorKind | "extraction";
  message: string;
  url: string;
  status?: number;
};

export type FetchStatus = "completed" | "failed" | "deadline_exceeded";

export type FetchOutcome = {
  status: FetchStatus;
  attempted_count: number;
  inserted_count: number;
  skipped_duplicate_count: number;
  has_more: boolean;
  pages_scanned: number;
  errors: IngestError[];
  message: string;
  failure?: FetchFailure;
};

export const extractionToIngestError = (error: ExtractionError, page: number): IngestError => ({
  stage: "extraction",
  message: error.message,
  url: error.url ?? error.page_url,
  page,
  entry_index: error.entry_index
});
