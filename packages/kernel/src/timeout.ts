/**
 * Bounded waits and cancellation.
 *
 * Every external call (model turn, search, fetch) goes through `withTimeout`,
 * which hands the callee a signal that fires on whichever comes first: the
 * caller's signal or the deadline. The returned promise settles even when the
 * callee ignores its signal.
 *
 * @module @citeline/kernel/timeout
 */

import { TimeoutError } from "@citeline/shared";
import { Logger } from "./logger.js";

const log = Logger.for("Timeout");

export interface TimeoutOptions {
  /** Label used in the TimeoutError message */
  operation: string;
  timeoutMs: number;
  /** Parent cancellation (connection close, session clear) */
  signal?: AbortSignal;
}

export function createAbortError(message = "The operation was aborted"): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

function reasonOf(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : createAbortError();
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw reasonOf(signal);
  }
}

/**
 * Run `fn` with a deadline.
 *
 * @throws TimeoutError when the deadline passes first
 * @throws the parent signal's reason (or an AbortError) when cancelled
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions,
): Promise<T> {
  const { operation, timeoutMs, signal } = options;
  throwIfAborted(signal);

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const cancelled = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(operation, timeoutMs);
      reject(error);
      controller.abort(error);
    }, timeoutMs);

    if (signal) {
      onParentAbort = () => {
        const error = reasonOf(signal);
        reject(error);
        controller.abort(error);
      };
      signal.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  const work = fn(controller.signal);
  // Settles after the race was lost to the deadline or the parent signal.
  void work.catch((error: unknown) => {
    if (controller.signal.aborted) {
      log.debug({ operation, err: error }, "late rejection after cancellation");
    }
  });

  try {
    return await Promise.race([work, cancelled]);
  } finally {
    clearTimeout(timer);
    if (signal && onParentAbort) {
      signal.removeEventListener("abort", onParentAbort);
    }
  }
}

/**
 * Iterate an async source under one deadline covering the whole stream.
 *
 * Each pending `next()` is raced against the deadline and the parent signal,
 * so a source that ignores its signal still cannot hold the consumer. When the
 * consumer stops early the source is aborted and closed.
 */
export async function* withStreamTimeout<T>(
  source: (signal: AbortSignal) => AsyncIterable<T>,
  options: TimeoutOptions,
): AsyncGenerator<T, void, undefined> {
  const { operation, timeoutMs, signal } = options;
  throwIfAborted(signal);

  const controller = new AbortController();
  let rejectCancelled: (error: Error) => void = () => undefined;
  const cancelled = new Promise<never>((_, reject) => {
    rejectCancelled = reject;
  });
  const cancel = (error: Error): void => {
    rejectCancelled(error);
    controller.abort(error);
  };

  const timer = setTimeout(() => cancel(new TimeoutError(operation, timeoutMs)), timeoutMs);
  const onParentAbort = (): void => {
    if (signal) cancel(reasonOf(signal));
  };
  signal?.addEventListener("abort", onParentAbort, { once: true });

  const iterator = source(controller.signal)[Symbol.asyncIterator]();
  let finished = false;

  try {
    while (true) {
      const result = await Promise.race([iterator.next(), cancelled]);
      if (result.done) {
        finished = true;
        return;
      }
      yield result.value;
    }
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onParentAbort);
    if (!finished) {
      if (!controller.signal.aborted) {
        controller.abort(createAbortError("Stream consumer stopped"));
      }
      // Not awaited: a source stuck in next() would never finish closing.
      void iterator.return?.().catch((error: unknown) => {
        log.debug({ operation, err: error }, "stream close failed after cancellation");
      });
    }
  }
}
