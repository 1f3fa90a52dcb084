import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createRelayApp } from "../src/relay/server.js";
import { MemoryCommandQueue } from "../src/relay/queue.js";
import { TokenStore } from "../src/relay/tokens.js";
import { bearerToken } from "../src/relay/protocol.js";
import type { Notification } from "../src/notifications/types.js";

let dir: string;
let tokens: TokenStore;
let queue: MemoryCommandQueue;
let delivered: Array<{ userId: string; notification: Notification }>;
let token: string;

function app(deliver?: (userId: string, notification: Notification) => Promise<void>) {
  return createRelayApp({
    tokens,
    queue,
    deliver: deliver ?? (async (userId, notification) => { delivered.push({ userId, notification }); }),
    now: () => 1234,
  });
}

function post(body: unknown, auth?: string): RequestInit {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (auth) headers.Authorization = `Bearer ${auth}`;
  return { method: "POST", headers, body: typeof body === "string" ? body : JSON.stringify(body) };
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-"));
  tokens = new TokenStore(path.join(dir, "tokens.json"));
  queue = new MemoryCommandQueue();
  delivered = [];
  token = tokens.issue("U1");
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("relay server", () => {
  it("reports health", async () => {
    const res = await app().request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  describe("POST /event", () => {
    it("forwards an authenticated event", async () => {
      const res = await app().request("/event", post({ user_id: "U1", title: "PROCESS ENDED", description: "gone", color: "#ffa500" }, token));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "success" });
      expect(delivered).toEqual([{ userId: "U1", notification: { title: "PROCESS ENDED", body: "gone", severity: "warning" } }]);
    });

    it("defaults to info for unknown or missing colors", async () => {
      await app().request("/event", post({ user_id: "U1", title: "PONG", color: "#123456" }, token));
      await app().request("/event", post({ user_id: "U1", title: "PONG" }, token));

      expect(delivered.map(d => d.notification)).toEqual([
        { title: "PONG", body: "", severity: "info" },
        { title: "PONG", body: "", severity: "info" },
      ]);
    });

    it("rejects a wrong token", async () => {
      const res = await app().request("/event", post({ user_id: "U1", title: "PONG" }, "test-secret"));
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "Unauthorized" });
      expect(delivered).toEqual([]);
    });

    it("rejects another user's token", async () => {
      const other = tokens.issue("U2");
      const res = await app().request("/event", post({ user_id: "U1", title: "PONG" }, other));
      expect(res.status).toBe(401);
    });

    it("rejects invalid JSON", async () => {
      const res = await app().request("/event", post("{not json", token));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid JSON" });
    });

    it("rejects a body without a title", async () => {
      const res = await app().request("/event", post({ user_id: "U1" }, token));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Missing user_id or title" });
    });

    it("answers 502 when the chat delivery fails", async () => {
      const failing = vi.fn(async () => { throw new Error("channel_not_found"); });
      const res = await app(failing).request("/event", post({ user_id: "U1", title: "PONG" }, token));
      expect(res.status).toBe(502);
    });
  });

  describe("GET /poll/:userId", () => {
    it("hands out queued commands once", async () => {
      await queue.push("U1", { action: "kill", queued_at: 1 });
      await queue.push("U1", { action: "status", queued_at: 2 });
      const init = { headers: { Authorization: `Bearer ${token}` } };

      const first = await app().request("/poll/U1", init);
      expect(await first.json()).toEqual({ commands: [{ action: "kill" }, { action: "status" }] });

      const second = await app().request("/poll/U1", init);
      expect(await second.json()).toEqual({ commands: [] });
    });

    it("requires the user's token", async () => {
      await queue.push("U1", { action: "kill", queued_at: 1 });
      const res = await app().request("/poll/U1");

      expect(res.status).toBe(401);
      expect(await queue.drain("U1")).toHaveLength(1);
    });
  });

  describe("POST /status/:userId", () => {
    it("stores the latest report", async () => {
      const res = await app().request("/status/U1", post({ title: "CLIENT STATUS", description: "running: true" }, token));

      expect(res.status).toBe(200);
      expect(await queue.takeStatus("U1")).toEqual({ title: "CLIENT STATUS", description: "running: true", reported_at: 1234 });
    });

    it("rejects a report without a description", async () => {
      const res = await app().request("/status/U1", post({ title: "CLIENT STATUS" }, token));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Missing description" });
    });

    it("requires the user's token", async () => {
      const res = await app().request("/status/U1", post({ description: "x" }));
      expect(res.status).toBe(401);
    });
  });

  describe("POST /kill", () => {
    it("queues a kill for the token's owner", async () => {
      const res = await app().request("/kill", post({ auth_token: token }));

      expect(res.status).toBe(200);
      expect(await queue.drain("U1")).toEqual([{ action: "kill", queued_at: 1234 }]);
    });

    it("rejects an unknown token", async () => {
      const res = await app().request("/kill", post({ auth_token: "test-secret" }));
      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({ error: "Invalid token" });
    });

    it("requires a token", async () => {
      const res = await app().request("/kill", post({}));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Missing auth_token" });
    });
  });
});

describe("TokenStore", () => {
  it("issues one token per user and persists it", () => {
    expect(tokens.issue("U1")).toBe(token);
    expect(token).toHaveLength(32);

    const reloaded = new TokenStore(path.join(dir, "tokens.json"));
    expect(reloaded.hasUser("U1")).toBe(true);
    expect(reloaded.verify("U1", token)).toBe(true);
    expect(reloaded.verify("U1", null)).toBe(false);
    expect(reloaded.userForToken(token)).toBe("U1");
    expect(reloaded.userForToken("test-secret")).toBeNull();
  });

  it("refuses a file that is not a token map", () => {
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, JSON.stringify({ U1: 42 }));
    expect(() => new TokenStore(file)).toThrow("Storage operation failed: loadTokens");
  });
});

describe("bearerToken", () => {
  it("extracts the token from an Authorization header", () => {
    expect(bearerToken("Bearer test-secret")).toBe("test-secret");
    expect(bearerToken("bearer   test-secret ")).toBe("test-secret");
    expect(bearerToken("Basic abc")).toBeNull();
    expect(bearerToken(undefined)).toBeNull();
  });
});
