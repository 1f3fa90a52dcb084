import { performance } from 'perf_hooks';

/**
 * Two clocks: `monotonic` for every duration (immune to wall-clock
 * adjustments) and `wall` only for display and process creation times.
 */
export interface Clock {
  monotonic(): number;
  wall(): number;
}

export const systemClock: Clock = {
  monotonic: () => performance.now(),
  wall: () => Date.now(),
};

const pad = (n: number) => String(n).padStart(2, '0');

/** `01h 02m 03s`; negative input is clamped to zero. */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${pad(hours)}h ${pad(minutes)}m ${pad(seconds)}s`;
}

/** Local `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(wallMs: number): string {
  const d = new Date(wallMs);
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/** Longest delay a Node timer takes; anything above it fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  let remaining = ms;
  while (remaining > MAX_TIMER_DELAY_MS && !signal?.aborted) {
    await delay(MAX_TIMER_DELAY_MS, signal);
    remaining -= MAX_TIMER_DELAY_MS;
  }
  await delay(remaining, signal);
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
