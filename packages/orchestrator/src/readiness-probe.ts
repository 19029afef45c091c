import type { Clock } from './types.js';

/** A zero-argument query against external state. */
export type Predicate = () => boolean | Promise<boolean>;

export type ReadinessOutcome =
  | { ready: true; elapsedMs: number }
  | { ready: false; reason: 'timeout' | 'aborted'; elapsedMs: number };

export interface AwaitReadyOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  clock: Clock;
  signal?: AbortSignal;
  /** Call `onProgress` each time another `progressIntervalMs` of waiting has elapsed. */
  progressIntervalMs?: number;
  onProgress?: (elapsedMs: number) => void | Promise<void>;
}

async function evaluate(predicate: Predicate): Promise<boolean> {
  try {
    return await predicate();
  } catch {
    return false;
  }
}

/**
 * Poll `predicate` until it holds or `timeoutMs` elapses. A predicate that
 * throws counts as not ready. Returns no later than timeout + one poll.
 */
export async function awaitReady(predicate: Predicate, opts: AwaitReadyOptions): Promise<ReadinessOutcome> {
  const { clock, signal } = opts;
  const startedAt = clock.now();
  const elapsed = () => clock.now() - startedAt;
  let progressMark = 0;

  for (;;) {
    if (signal?.aborted) return { ready: false, reason: 'aborted', elapsedMs: elapsed() };
    if (await evaluate(predicate)) return { ready: true, elapsedMs: elapsed() };

    const waited = elapsed();
    if (waited >= opts.timeoutMs) return { ready: false, reason: 'timeout', elapsedMs: waited };

    await clock.sleep(Math.min(opts.pollIntervalMs, opts.timeoutMs - waited), signal);

    if (opts.onProgress && opts.progressIntervalMs && opts.progressIntervalMs > 0) {
      const mark = Math.floor(elapsed() / opts.progressIntervalMs);
      if (mark > progressMark) {
        progressMark = mark;
        await opts.onProgress(elapsed());
      }
    }
  }
}
