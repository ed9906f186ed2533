/**
 * Stage deadlines. A stage that overruns is aborted through its signal and
 * the caller sees a TimeoutError for that stage.
 */

import { TimeoutError, type BuildStage } from "../shared/errors.js";

/**
 * Settle with `promise`, or reject with a TimeoutError after timeoutMs.
 * A timeoutMs of 0 or less disables the deadline.
 */
export async function raceTimeout<T>(
  promise: Promise<T>,
  stage: BuildStage,
  timeoutMs: number,
  onTimeout?: (error: TimeoutError) => void,
): Promise<T> {
  if (timeoutMs <= 0) return promise;

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(stage, timeoutMs);
      onTimeout?.(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/** Run a task with its own AbortSignal, aborted when the deadline passes. */
export async function withTimeout<T>(
  stage: BuildStage,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  return raceTimeout(task(controller.signal), stage, timeoutMs, (error) => controller.abort(error));
}
