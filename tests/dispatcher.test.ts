import { describe, expect, it } from "vitest";
import { NotificationDispatcher } from "../src/notifications/dispatcher.js";
import type { ChatTransport, Notification } from "../src/notifications/types.js";

const note = (title: string): Notification => ({ title, body: `${title} body`, severity: "info" });

class RecordingTransport implements ChatTransport {
  delivered: string[] = [];
  signals: AbortSignal[] = [];
  failTitles = new Set<string>();
  hangTitles = new Set<string>();

  async deliver(notification: Notification, signal: AbortSignal): Promise<void> {
    this.signals.push(signal);
    if (this.failTitles.has(notification.title)) {
      throw new Error("channel_not_found");
    }
    if (this.hangTitles.has(notification.title)) {
      await new Promise<void>((_, reject) => {
        signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    }
    this.delivered.push(notification.title);
  }
}

describe("NotificationDispatcher", () => {
  it("delivers queued notifications in order", async () => {
    const transport = new RecordingTransport();
    const dispatcher = new NotificationDispatcher(transport, { capacity: 10, timeoutMs: 1000 });

    dispatcher.start();
    dispatcher.enqueue(note("one"));
    dispatcher.enqueue(note("two"));
    dispatcher.enqueue(note("three"));
    await dispatcher.stop();

    expect(transport.delivered).toEqual(["one", "two", "three"]);
    expect(dispatcher.stats).toEqual({ delivered: 3, failed: 0, dropped: 0, queued: 0 });
  });

  it("drops notifications beyond its capacity", () => {
    const dispatcher = new NotificationDispatcher(new RecordingTransport(), { capacity: 2, timeoutMs: 1000 });

    expect(dispatcher.enqueue(note("one"))).toBe(true);
    expect(dispatcher.enqueue(note("two"))).toBe(true);
    expect(dispatcher.enqueue(note("three"))).toBe(false);
    expect(dispatcher.stats).toEqual({ delivered: 0, failed: 0, dropped: 1, queued: 2 });
  });

  it("refuses notifications after stopping", async () => {
    const dispatcher = new NotificationDispatcher(new RecordingTransport(), { capacity: 2, timeoutMs: 1000 });
    await dispatcher.stop();

    expect(dispatcher.enqueue(note("late"))).toBe(false);
    expect(dispatcher.stats.dropped).toBe(1);
  });

  it("keeps sending after a failed delivery", async () => {
    const transport = new RecordingTransport();
    transport.failTitles.add("bad");
    const dispatcher = new NotificationDispatcher(transport, { capacity: 10, timeoutMs: 1000 });

    dispatcher.start();
    dispatcher.enqueue(note("bad"));
    dispatcher.enqueue(note("good"));
    await dispatcher.stop();

    expect(transport.delivered).toEqual(["good"]);
    expect(dispatcher.stats).toEqual({ delivered: 1, failed: 1, dropped: 0, queued: 0 });
  });

  it("aborts a delivery that takes longer than the timeout", async () => {
    const transport = new RecordingTransport();
    transport.hangTitles.add("slow");
    const dispatcher = new NotificationDispatcher(transport, { capacity: 10, timeoutMs: 20 });

    dispatcher.start();
    dispatcher.enqueue(note("slow"));
    dispatcher.enqueue(note("fast"));
    await dispatcher.stop({ drainTimeoutMs: 2000 });

    expect(transport.signals[0]?.aborted).toBe(true);
    expect(transport.delivered).toEqual(["fast"]);
    expect(dispatcher.stats).toEqual({ delivered: 1, failed: 1, dropped: 0, queued: 0 });
  });

  it("discards the backlog when draining takes too long", async () => {
    const transport = new RecordingTransport();
    transport.hangTitles.add("stuck");
    const dispatcher = new NotificationDispatcher(transport, { capacity: 10, timeoutMs: 10_000 });

    dispatcher.start();
    dispatcher.enqueue(note("stuck"));
    dispatcher.enqueue(note("queued-1"));
    dispatcher.enqueue(note("queued-2"));
    await dispatcher.stop({ drainTimeoutMs: 20 });

    expect(transport.delivered).toEqual([]);
    expect(dispatcher.stats).toEqual({ delivered: 0, failed: 1, dropped: 2, queued: 0 });
  });
});
