import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createRelayApp } from "../src/relay/server.js";
import { MemoryCommandQueue } from "../src/relay/queue.js";
import { TokenStore } from "../src/relay/tokens.js";
import { RelayCommandInbox, RelayTransport } from "../src/relay/client.js";
import { NotificationDeliveryError } from "../src/utils/errors.js";
import type { Notification } from "../src/notifications/types.js";

let dir: string;
let queue: MemoryCommandQueue;
let delivered: Array<{ userId: string; notification: Notification }>;
let relayFetch: typeof fetch;
let token: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-client-"));
  const tokens = new TokenStore(path.join(dir, "tokens.json"));
  token = tokens.issue("U1");
  queue = new MemoryCommandQueue();
  delivered = [];
  const app = createRelayApp({
    tokens,
    queue,
    deliver: async (userId, notification) => { delivered.push({ userId, notification }); },
    now: () => 99,
  });
  relayFetch = async (input, init) => app.request(input, init);
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

const options = (authToken = token) => ({ baseUrl: "http://relay.test/", userId: "U1", authToken, fetch: relayFetch });

describe("RelayTransport", () => {
  it("delivers notifications through the relay", async () => {
    const transport = new RelayTransport(options());
    await transport.deliver({ title: "DISCONNECT DETECTED", body: "line", severity: "error" }, new AbortController().signal);

    expect(delivered).toEqual([{ userId: "U1", notification: { title: "DISCONNECT DETECTED", body: "line", severity: "error" } }]);
  });

  it("sends the bearer token and JSON body", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response(JSON.stringify({ status: "success" }), { status: 200 }));
    const transport = new RelayTransport({ baseUrl: "http://relay.test//", userId: "U1", authToken: "test-secret", fetch: fetchMock });

    await transport.deliver({ title: "PONG", body: "Monitor is responsive.", severity: "info" }, new AbortController().signal);

    const call = fetchMock.mock.calls[0];
    if (!call) throw new Error("expected a request");
    const [url, init] = call;
    expect(url).toBe("http://relay.test/event");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual({
      user_id: "U1",
      title: "PONG",
      description: "Monitor is responsive.",
      color: "#00FFFF",
    });
  });

  it("fails when the relay refuses the event", async () => {
    const transport = new RelayTransport(options("test-secret"));
    await expect(
      transport.deliver({ title: "PONG", body: "", severity: "info" }, new AbortController().signal)
    ).rejects.toBeInstanceOf(NotificationDeliveryError);
  });
});

describe("RelayCommandInbox", () => {
  it("drains queued actions as remote commands", async () => {
    await queue.push("U1", { action: "kill", queued_at: 1 });
    await queue.push("U1", { action: "status", queued_at: 2 });
    const inbox = new RelayCommandInbox(options());

    expect(await inbox.drain()).toEqual([
      { command: { type: "kill" }, operatorId: "U1" },
      { command: { type: "status" }, operatorId: "U1" },
    ]);
    expect(await inbox.drain()).toEqual([]);
  });

  it("skips actions it does not know", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => Response.json({ commands: [{ action: "dance" }, { action: "ping" }] }));
    const inbox = new RelayCommandInbox({ ...options(), fetch: fetchMock });

    expect(await inbox.drain()).toEqual([{ command: { type: "ping" }, operatorId: "U1" }]);
  });

  it("returns nothing for a malformed poll response", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => Response.json({ queue: [] }));
    const inbox = new RelayCommandInbox({ ...options(), fetch: fetchMock });

    expect(await inbox.drain()).toEqual([]);
  });

  it("throws when the poll is refused", async () => {
    const inbox = new RelayCommandInbox(options("test-secret"));
    await expect(inbox.drain()).rejects.toThrow("Relay poll failed with status 401");
  });

  it("posts status reports back to the relay", async () => {
    const inbox = new RelayCommandInbox(options());
    await inbox.report({ title: "CLIENT STATUS", body: "running: false\nTime elapsed: N/A", severity: "info" });

    expect(await queue.takeStatus("U1")).toEqual({
      title: "CLIENT STATUS",
      description: "running: false\nTime elapsed: N/A",
      reported_at: 99,
    });
  });
});
