import { StageTimeoutError } from './errors.js';

/**
 * Run an abortable task with a time limit
 *
 * The task receives a signal that fires when the limit passes or when the
 * caller's own signal aborts. A limit of 0 disables the timer.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  outer?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const forward = () => controller.abort(outer?.reason);
  outer?.addEventListener('abort', forward, { once: true });
  if (outer?.aborted) {
    controller.abort(outer.reason);
  }

  let timer: NodeJS.Timeout | undefined;
  const racers: Array<Promise<T>> = [task(controller.signal)];

  if (timeoutMs > 0) {
    racers.push(
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          const error = new StageTimeoutError(label, timeoutMs);
          reject(error);
          controller.abort(error);
        }, timeoutMs);
      })
    );
  }

  try {
    return await Promise.race(racers);
  } finally {
    if (timer) clearTimeout(timer);
    outer?.removeEventListener('abort', forward);
  }
}
