export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type FetchErrorKind = "timeout" | "http_status" | "network";

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status: number | undefined;
  readonly retryable: boolean;
  attempts: number;

  constructor(
    kind: FetchErrorKind,
    message: string,
    details: { url: string; status?: number; retryable: boolean; attempts?: number; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.url = details.url;
    this.status = details.status;
    this.retryable = details.retryable;
    this.attempts = details.attempts ?? 1;
  }
}

export class DeadlineExceededError extends Error {
  constructor(message = "Ingestion deadline exceeded") {
    super(message);
    this.name = "DeadlineExceededError";
  }
}

export type ExtractionError = {
  scope: "entry" | "page";
  message: string;
  page_url: string;
  entry_index?: number;
  url?: string;
};

export class DuplicateError extends Error {
  readonly canonicalUrl: string;

  constructor(canonicalUrl: string) {
    super(`Letter already stored: ${canonicalUrl}`);
    this.name = "DuplicateError";
    this.canonicalUrl = canonicalUrl;
  }
}

export class StorageError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StorageError";
  }
}

export type GenerationErrorKind = "timeout" | "auth" | "rate_limit" | "invalid_response" | "unavailable";

export class GenerationError extends Error {
  readonly kind: GenerationErrorKind;

  constructor(kind: GenerationErrorKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "GenerationError";
    this.kind = kind;
  }
}

const PG_UNIQUE_VIOLATION = "23505";

const hasCode = (error: unknown): error is { code: unknown } =>
  typeof error === "object" && error !== null && "code" in error;

export const isDuplicateError = (error: unknown): boolean => {
  if (error instanceof DuplicateError) return true;
  return hasCode(error) && error.code === PG_UNIQUE_VIOLATION;
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
