import { StepTimeoutError } from "./errors";

/**
 * Runs `action` with an abort signal that fires when `timeoutMs` elapses.
 * A non-finite or non-positive timeout disables the bound.
 */
export const withTimeout = async <T>(
  label: string,
  timeoutMs: number,
  action: (signal: AbortSignal) => Promise<T>
): Promise<T> => {
  const controller = new AbortController();
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return action(controller.signal);
  }
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new StepTimeoutError(label, timeoutMs);
      // Reject before aborting so an action that settles on abort cannot win the race.
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });
  try {
    return await Promise.race([action(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
};

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
