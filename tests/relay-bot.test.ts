import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ChatPostMessageArguments } from "@slack/web-api";
import { createRelayMessageHandler, type RelayBotOptions } from "../src/relay/bot.js";
import { MemoryCommandQueue } from "../src/relay/queue.js";
import { TokenStore } from "../src/relay/tokens.js";
import { AuthService } from "../src/gateway/auth.js";
import type { SlackChatClient, SlackContext } from "../src/slack/types.js";

class FakeSlackClient implements SlackChatClient {
  posted: ChatPostMessageArguments[] = [];
  onPost: ((args: ChatPostMessageArguments) => Promise<void>) | null = null;

  conversations = {
    open: async (_args: { users: string }) => ({ ok: true, channel: { id: "D0USER" } }),
  };

  chat = {
    postMessage: async (args: ChatPostMessageArguments) => {
      this.posted.push(args);
      await this.onPost?.(args);
      return { ok: true, ts: "1.0" };
    },
    delete: async (_args: { channel: string; ts: string }) => ({ ok: true }),
  };

  texts(): Array<string | undefined> {
    return this.posted.map(p => p.text);
  }
}

let dir: string;
let tokens: TokenStore;
let queue: MemoryCommandQueue;
let client: FakeSlackClient;

const ctx = (userId = "U1"): SlackContext => ({ userId, channelId: "D0USER", messageTs: "1.0" });

function handler(overrides: Partial<RelayBotOptions> = {}) {
  return createRelayMessageHandler({
    tokens,
    queue,
    auth: new AuthService([], { allowAll: true }),
    footer: { footerText: "Relay", footerIcon: "" },
    statusWaitMs: 1000,
    statusPollMs: 5,
    ...overrides,
  });
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-bot-"));
  tokens = new TokenStore(path.join(dir, "tokens.json"));
  queue = new MemoryCommandQueue();
  client = new FakeSlackClient();
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("relay bot", () => {
  it("registers a user and shows the same token again", async () => {
    await handler()(ctx(), "!register", client);
    await handler()(ctx(), "!register", client);

    const token = tokens.issue("U1");
    const expected = `Your token is: \`${token}\`\nKeep it secret! Set it as RELAY_AUTH_TOKEN in your monitor's .env.`;
    expect(client.texts()).toEqual([expected, expected]);
  });

  it("asks unregistered users to register first", async () => {
    await handler()(ctx(), "!status", client);
    await handler()(ctx(), "!kill", client);

    const reply = "You are not registered. Use `!register` to get your client token.";
    expect(client.texts()).toEqual([reply, reply]);
    expect(await queue.drain("U1")).toEqual([]);
  });

  it("queues a kill", async () => {
    tokens.issue("U1");
    await handler({ now: () => 42 })(ctx(), "!kill", client);

    expect(client.texts()).toEqual(["Kill command queued for your client."]);
    expect(await queue.drain("U1")).toEqual([{ action: "kill", queued_at: 42 }]);
  });

  it("relays the client's status answer", async () => {
    tokens.issue("U1");
    client.onPost = async (args) => {
      if (args.text !== "Status command queued for your client.") return;
      expect(await queue.drain("U1")).toEqual([{ action: "status", queued_at: expect.any(Number) }]);
      await queue.setStatus("U1", { title: "CLIENT STATUS", description: "running: true\nTime elapsed: 00h 05m 00s" });
    };

    await handler()(ctx(), "!status", client);

    expect(client.posted[1]).toEqual({
      channel: "D0USER",
      text: "CLIENT STATUS",
      attachments: [{
        color: "#00FFFF",
        title: "CLIENT STATUS",
        text: "running: true\nTime elapsed: 00h 05m 00s",
        footer: "Relay",
        ts: expect.any(String),
      }],
    });
  });

  it("gives up when the client does not answer in time", async () => {
    tokens.issue("U1");
    await queue.setStatus("U1", { title: "CLIENT STATUS", description: "stale" });

    await handler({ statusWaitMs: 20 })(ctx(), "!status", client);

    expect(client.texts()).toEqual(["Status command queued for your client.", "No response from client."]);
  });

  it("shows help and answers unknown commands", async () => {
    await handler()(ctx(), "!help", client);
    await handler()(ctx(), "!dance", client);

    expect(client.texts()[0]?.split("\n")[0]).toBe("`!register` - Get (or show) your client token");
    expect(client.texts()[1]).toBe("Unknown command: `dance`. Use `!help` for the list of commands.");
  });

  it("ignores plain messages", async () => {
    await handler()(ctx(), "hi", client);
    expect(client.posted).toEqual([]);
  });

  it("refuses users outside the allowlist", async () => {
    await handler({ auth: new AuthService(["U1"]) })(ctx("U2"), "!register", client);

    expect(client.texts()).toEqual(["You are not authorized to use this bot."]);
    expect(tokens.hasUser("U2")).toBe(false);
  });
});
