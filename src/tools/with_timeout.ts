import { AnalysisTimeoutError } from "../core/errors/errors";

/** Node timers overflow past a signed 32-bit delay and fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

/**
 * Races an engine call against a wall-clock timer. The engine call itself is
 * not interrupted; its late result is discarded. `seconds <= 0` disables the
 * timer.
 */
export async function withTimeout<T>(seconds: number, run: () => Promise<T> | T): Promise<T> {
  if (seconds <= 0) {
    return run();
  }

  const delayMs = Math.min(seconds * 1000, MAX_TIMER_DELAY_MS);
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AnalysisTimeoutError(seconds)), delayMs);
  });
  try {
    return await Promise.race([Promise.resolve().then(run), expired]);
  } finally {
    clearTimeout(timer);
  }
}
