import type { FetchSettings } from "../shared/config.js";
import { sleep as defaultSleep } from "../shared/async.js";
import { DeadlineExceededError, FetchError, errorMessage } from "../shared/errors.js";
import { silentLogger, type Logger } from "../shared/logger.js";

export type BackoffPolicy = Pick<FetchSettings, "backoffBaseMs" | "backoffMaxMs">;

export const backoffDelayMs = (attempt: number, policy: BackoffPolicy): number =>
  Math.min(policy.backoffBaseMs * 2 ** Math.max(0, attempt - 1), policy.backoffMaxMs);

const RETRYABLE_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ENOTFOUND",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT"
]);

export const isRetryableStatus = (status: number): boolean => status >= 500 || status === 429;

export const isRetryableFetchError = (error: FetchError): boolean => {
  if (error.kind === "timeout") return true;
  if (error.kind === "http_status") return error.status !== undefined && isRetryableStatus(error.status);
  return error.retryable;
};

const networkCode = (error: unknown): string | undefined => {
  const cause = error instanceof Error ? error.cause : undefined;
  if (typeof cause === "object" && cause !== null && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
};

export type FetcherOptions = FetchSettings & {
  logger?: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export interface Fetcher {
  fetchText: (url: string, signal?: AbortSignal) => Promise<string>;
}

export const createFetcher = (options: FetcherOptions): Fetcher => {
  const logger = options.logger ?? silentLogger;
  const pause = options.sleep ?? defaultSleep;

  const attemptOnce = async (url: string, signal: AbortSignal | undefined): Promise<string> => {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(url, {
        headers: {
          "User-Agent": options.userAgent,
          Accept: "text/html,application/xhtml+xml"
        },
        redirect: "follow",
        signal: controller.signal
      });
      if (!response.ok) {
        // Drain so the socket goes back to the pool.
        await response.arrayBuffer().catch(() => undefined);
        throw new FetchError("http_status", `Upstream responded ${response.status} for ${url}`, {
          url,
          status: response.status,
          retryable: isRetryableStatus(response.status)
        });
      }
      return await response.text();
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (signal?.aborted) throw new DeadlineExceededError();
      if (timedOut) {
        throw new FetchError("timeout", `Request timed out after ${options.timeoutMs}ms: ${url}`, {
          url,
          retryable: true,
          cause: error
        });
      }
      const code = networkCode(error);
      throw new FetchError("network", `Network error for ${url}: ${code ?? errorMessage(error)}`, {
        url,
        retryable: code === undefined || RETRYABLE_NETWORK_CODES.has(code),
        cause: error
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  };

  const fetchText = async (url: string, signal?: AbortSignal): Promise<string> => {
    try {
      new URL(url);
    } catch (error) {
      throw new FetchError("network", `Malformed URL: ${url}`, { url, retryable: false, cause: error });
    }

    for (let attempt = 1; ; attempt += 1) {
      if (signal?.aborted) throw new DeadlineExceededError();
      try {
        return await attemptOnce(url, signal);
      } catch (error) {
        if (!(error instanceof FetchError)) throw error;
        error.attempts = attempt;
        if (!isRetryableFetchError(error) || attempt >= options.maxAttempts) {
          throw error;
        }
        const delay = backoffDelayMs(attempt, options);
        logger.warn("Retrying upstream request", {
          url,
          attempt,
          kind: error.kind,
          status: error.status,
          delayMs: delay
        });
        await pause(delay, signal);
      }
    }
  };

  return { fetchText };
};
