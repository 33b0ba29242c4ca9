import { afterEach, describe, expect, it, vi } from "vitest";
import type { RelayCallOptions, RelayClient } from "../../orchestrator/types";
import type { InboundMessage, OutboundMessage } from "../adapters/channels/types";
import { OrchestratorClient } from "../../orchestrator/client";
import { BaseChannelPlugin } from "../adapters/channels/plugin";
import { RelayMessageHandler } from "./message-handler";

class FakeChannel extends BaseChannelPlugin {
  readonly id = "fake";
  readonly name = "Fake";
  readonly sent: Array<{ peerId: string; message: OutboundMessage }> = [];
  readonly typingStops = vi.fn(async () => {});
  readonly typingStarts = vi.fn(async (_peerId: string) => this.typingStops);
  sendImpl = vi.fn(async (_peerId: string, _message: OutboundMessage) => "900");

  async connect(): Promise<void> {
    this.setStatus("connected");
  }

  async disconnect(): Promise<void> {
    this.setStatus("disconnected");
  }

  async send(peerId: string, message: OutboundMessage): Promise<string> {
    this.sent.push({ peerId, message });
    return this.sendImpl(peerId, message);
  }

  async beginTyping(peerId: string): Promise<() => Promise<void>> {
    return this.typingStarts(peerId);
  }
}

function inbound(text: string, overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    id: "1",
    channel: "fake",
    peerId: "789",
    peerType: "dm",
    senderId: "101",
    senderKey: "tg_ada",
    text,
    timestamp: new Date(0),
    raw: null,
    ...overrides,
  };
}

function fakeClient(reply = "hello") {
  return {
    relay: vi.fn<RelayClient["relay"]>(async () => reply),
  };
}

describe("RelayMessageHandler", () => {
  it("relays once and sends exactly one reply", async () => {
    const channel = new FakeChannel();
    const client = fakeClient("hello");
    const handler = new RelayMessageHandler(client);

    const outcome = await handler.handle(channel, inbound("  hi  "));

    expect(outcome).toBe("relayed");
    expect(client.relay).toHaveBeenCalledTimes(1);
    expect(client.relay).toHaveBeenCalledWith("tg_ada", "hi", { signal: expect.any(AbortSignal) });
    expect(channel.sent).toEqual([{ peerId: "789", message: { text: "hello" } }]);
  });

  it("keeps each message independent", async () => {
    const channel = new FakeChannel();
    const client = fakeClient();
    client.relay.mockImplementation(async (userId, message) => `${userId}:${message}`);
    const handler = new RelayMessageHandler(client);
    const pairs = [
      ["tg_a", "first", "1"],
      ["tg_b", "second", "2"],
      ["tg_a", "third", "3"],
    ] as const;

    for (const [senderKey, text, peerId] of pairs) {
      await handler.handle(channel, inbound(text, { senderKey, peerId }));
    }

    expect(client.relay).toHaveBeenCalledTimes(3);
    expect(channel.sent).toEqual([
      { peerId: "1", message: { text: "tg_a:first" } },
      { peerId: "2", message: { text: "tg_b:second" } },
      { peerId: "3", message: { text: "tg_a:third" } },
    ]);
  });

  it("skips empty and whitespace-only text", async () => {
    const channel = new FakeChannel();
    const client = fakeClient();
    const handler = new RelayMessageHandler(client);

    await expect(handler.handle(channel, inbound(""))).resolves.toBe("skipped");
    await expect(handler.handle(channel, inbound(" \n\t "))).resolves.toBe("skipped");

    expect(client.relay).not.toHaveBeenCalled();
    expect(channel.sent).toHaveLength(0);
    expect(channel.typingStarts).not.toHaveBeenCalled();
  });

  it("shows typing while waiting and stops it afterwards", async () => {
    const channel = new FakeChannel();
    const handler = new RelayMessageHandler(fakeClient());

    await handler.handle(channel, inbound("hi"));

    expect(channel.typingStarts).toHaveBeenCalledWith("789");
    expect(channel.typingStops).toHaveBeenCalledTimes(1);
  });

  it("propagates send failures to the caller", async () => {
    const channel = new FakeChannel();
    channel.sendImpl.mockRejectedValueOnce(new Error("403: Forbidden"));
    const handler = new RelayMessageHandler(fakeClient());

    await expect(handler.handle(channel, inbound("hi"))).rejects.toThrow("403: Forbidden");
    expect(channel.typingStops).toHaveBeenCalledTimes(1);
  });

  it("drops the reply when shut down mid-call", async () => {
    const channel = new FakeChannel();
    const client = fakeClient();
    client.relay.mockImplementation(
      (_userId: string, _message: string, options?: RelayCallOptions) =>
        new Promise<string>((resolve) => {
          options?.signal?.addEventListener("abort", () => resolve("fallback"));
        }),
    );
    const handler = new RelayMessageHandler(client);

    const pending = handler.handle(channel, inbound("hi"));
    await vi.waitFor(() => expect(client.relay).toHaveBeenCalledTimes(1));
    handler.shutdown();

    await expect(pending).resolves.toBe("aborted");
    expect(channel.sent).toHaveLength(0);
    expect(channel.typingStops).toHaveBeenCalledTimes(1);
  });

  it("relays nothing after shutdown", async () => {
    const channel = new FakeChannel();
    const client = fakeClient();
    const handler = new RelayMessageHandler(client);

    handler.shutdown();

    await expect(handler.handle(channel, inbound("hi"))).resolves.toBe("aborted");
    expect(client.relay).not.toHaveBeenCalled();
  });

  describe("with the orchestrator client", () => {
    const originalFetch = globalThis.fetch;

    afterEach(() => {
      globalThis.fetch = originalFetch;
    });

    it("sends the fallback reply when the orchestrator fails", async () => {
      globalThis.fetch = vi.fn(
        async () => new Response("Internal Server Error", { status: 500 }),
      ) as unknown as typeof fetch;
      const channel = new FakeChannel();
      const handler = new RelayMessageHandler(
        new OrchestratorClient({
          baseUrl: "http://orchestrator.test",
          timeoutMs: 1_000,
          replyField: "response",
          fallbackReply: "Please try again later.",
        }),
      );

      await handler.handle(channel, inbound("hi"));

      expect(channel.sent).toEqual([
        { peerId: "789", message: { text: "Please try again later." } },
      ]);
    });
  });
});
