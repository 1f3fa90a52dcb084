import { afterEach, describe, expect, it, vi } from "vitest";
import { formatElapsed, formatTimestamp, MAX_TIMER_DELAY_MS, sleep } from "../src/utils/time.js";

describe("formatElapsed", () => {
  it("formats hours, minutes and seconds with padding", () => {
    expect(formatElapsed(0)).toBe("00h 00m 00s");
    expect(formatElapsed(3_723_000)).toBe("01h 02m 03s");
    expect(formatElapsed(59_999)).toBe("00h 00m 59s");
  });

  it("does not wrap hours past a day", () => {
    expect(formatElapsed(100 * 3_600_000)).toBe("100h 00m 00s");
  });

  it("clamps negative durations", () => {
    expect(formatElapsed(-5000)).toBe("00h 00m 00s");
  });
});

describe("formatTimestamp", () => {
  it("formats local time", () => {
    const wall = new Date(2024, 0, 2, 3, 4, 5).getTime();
    expect(formatTimestamp(wall)).toBe("2024-01-02 03:04:05");
  });
});

describe("sleep", () => {
  it("resolves immediately for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();
    await sleep(10_000, controller.signal);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("resolves early when aborted", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();
  });

  describe("beyond the timer limit", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("waits the full duration", async () => {
      vi.useFakeTimers();
      let done = false;
      const pending = sleep(MAX_TIMER_DELAY_MS + 5000).then(() => { done = true; });

      await vi.advanceTimersByTimeAsync(1000);
      expect(done).toBe(false);

      await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS);
      expect(done).toBe(false);

      await vi.advanceTimersByTimeAsync(4000);
      await pending;
      expect(done).toBe(true);
    });

    it("stops waiting when aborted between chunks", async () => {
      vi.useFakeTimers();
      const controller = new AbortController();
      let done = false;
      const pending = sleep(3 * MAX_TIMER_DELAY_MS, controller.signal).then(() => { done = true; });

      await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS + 10);
      expect(done).toBe(false);

      controller.abort();
      await pending;
      expect(done).toBe(true);
    });
  });
});
