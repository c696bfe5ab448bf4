import { DeadlineExceededError } from "./errors.js";

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DeadlineExceededError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new DeadlineExceededError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });

export type Deadline = {
  signal: AbortSignal;
  expired: () => boolean;
  clear: () => void;
};

/** Aborts its signal once `ms` have elapsed; `clear` must be called when the work finishes. */
export const startDeadline = (ms: number): Deadline => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), ms);
  return {
    signal: controller.signal,
    expired: () => controller.signal.aborted,
    clear: () => clearTimeout(timer)
  };
};
