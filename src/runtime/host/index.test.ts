import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { RelayConfig } from "../../config";
import type { InboundMessage, OutboundMessage } from "../adapters/channels/types";
import { logger } from "../../logger";
import { RelayHost } from "./index";

const channels = vi.hoisted(() => ({ created: [] as unknown[] }));

vi.mock("../adapters/channels/telegram/plugin", async () => {
  const { BaseChannelPlugin } = await import("../adapters/channels/plugin");

  class FakeTelegramPlugin extends BaseChannelPlugin {
    readonly id = "telegram";
    readonly name = "Telegram";
    readonly sent: Array<{ peerId: string; message: OutboundMessage }> = [];
    readonly connectSpy = vi.fn(async () => {});
    readonly disconnectSpy = vi.fn(async () => {});

    constructor(readonly config: unknown) {
      super();
      channels.created.push(this);
    }

    async connect(): Promise<void> {
      await this.connectSpy();
      this.setStatus("connected");
    }

    async disconnect(): Promise<void> {
      await this.disconnectSpy();
      this.setStatus("disconnected");
    }

    async send(peerId: string, message: OutboundMessage): Promise<string> {
      this.sent.push({ peerId, message });
      return String(this.sent.length);
    }

    deliver(msg: InboundMessage): void {
      this.emitMessage(msg);
    }
  }

  return { TelegramPlugin: FakeTelegramPlugin };
});

interface FakeChannelHandle {
  config: unknown;
  sent: Array<{ peerId: string; message: OutboundMessage }>;
  connectSpy: ReturnType<typeof vi.fn>;
  disconnectSpy: ReturnType<typeof vi.fn>;
  deliver(msg: InboundMessage): void;
}

function lastChannel(): FakeChannelHandle {
  return channels.created[channels.created.length - 1] as FakeChannelHandle;
}

const config: RelayConfig = {
  telegram: { botToken: "test-token", allowedChats: ["789"], polling: { timeoutSeconds: 20 } },
  orchestrator: {
    baseUrl: "http://orchestrator.test",
    timeoutMs: 1_000,
    replyField: "response",
    fallbackReply: "Please try again later.",
  },
  logging: { level: "silent" },
};

function inbound(text: string, peerId = "789"): InboundMessage {
  return {
    id: text,
    channel: "telegram",
    peerId,
    peerType: "dm",
    senderId: "101",
    senderKey: "tg_ada",
    text,
    timestamp: new Date(0),
    raw: null,
  };
}

describe("RelayHost", () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    channels.created.length = 0;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it("builds the telegram channel from config and connects it", async () => {
    const host = new RelayHost(config);

    await host.start();

    expect(lastChannel().config).toEqual({
      botToken: "test-token",
      allowedChats: ["789"],
      polling: { timeoutSeconds: 20 },
    });
    expect(lastChannel().connectSpy).toHaveBeenCalledTimes(1);
    expect(host.getStatus()).toMatchObject({ running: true, inFlight: 0, channel: "connected" });

    await host.stop();
  });

  it("relays inbound messages to the orchestrator and replies in the same chat", async () => {
    const fetchMock = vi.fn(async (_input: unknown, _init?: RequestInit) =>
      new Response(JSON.stringify({ response: "hello" }), { status: 200 }),
    );
    globalThis.fetch = fetchMock as unknown as typeof fetch;
    const host = new RelayHost(config);
    await host.start();

    const infoSpy = vi.spyOn(logger, "info");

    lastChannel().deliver(inbound("hi"));

    await vi.waitFor(() => expect(lastChannel().sent).toHaveLength(1));
    expect(lastChannel().sent[0]).toEqual({ peerId: "789", message: { text: "hello" } });
    const textLogs = infoSpy.mock.calls.filter((call) => {
      const fields: unknown = call[0];
      return typeof fields === "object" && fields !== null && "text" in fields;
    });
    expect(textLogs).toHaveLength(1);
    infoSpy.mockRestore();
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toEqual({
      user_id: "tg_ada",
      message: "hi",
    });

    await host.stop();
  });

  it("aborts in-flight relays and disconnects on stop", async () => {
    globalThis.fetch = vi.fn(
      (_input: unknown, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    ) as unknown as typeof fetch;
    const host = new RelayHost(config);
    await host.start();

    lastChannel().deliver(inbound("hi"));
    await vi.waitFor(() => expect(globalThis.fetch).toHaveBeenCalledTimes(1));
    expect(host.getStatus().inFlight).toBe(1);

    await host.stop();

    expect(lastChannel().disconnectSpy).toHaveBeenCalledTimes(1);
    expect(lastChannel().sent).toHaveLength(0);
    expect(host.isRunning()).toBe(false);
    expect(host.getStatus().inFlight).toBe(0);
  });

  it("replies in one chat in the order the messages arrived", async () => {
    let releaseFirst: () => void = () => {};
    const fetchMock = vi.fn(async (_input: unknown, init?: RequestInit) => {
      const body: { message: string } = JSON.parse(String(init?.body));
      if (body.message === "first") {
        await new Promise<void>((resolve) => {
          releaseFirst = resolve;
        });
      }
      return new Response(JSON.stringify({ response: `re:${body.message}` }), { status: 200 });
    });
    globalThis.fetch = fetchMock as unknown as typeof fetch;
    const host = new RelayHost(config);
    await host.start();

    lastChannel().deliver(inbound("first"));
    lastChannel().deliver(inbound("second"));
    await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1));
    expect(host.getStatus().inFlight).toBe(2);

    releaseFirst();
    await vi.waitFor(() => expect(lastChannel().sent).toHaveLength(2));
    expect(lastChannel().sent.map((entry) => entry.message.text)).toEqual([
      "re:first",
      "re:second",
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);

    await host.stop();
  });

  it("does not hold other chats behind a slow reply", async () => {
    let releaseFirst: () => void = () => {};
    globalThis.fetch = vi.fn(async (_input: unknown, init?: RequestInit) => {
      const body: { message: string } = JSON.parse(String(init?.body));
      if (body.message === "first") {
        await new Promise<void>((resolve) => {
          releaseFirst = resolve;
        });
      }
      return new Response(JSON.stringify({ response: `re:${body.message}` }), { status: 200 });
    }) as unknown as typeof fetch;
    const host = new RelayHost(config);
    await host.start();

    lastChannel().deliver(inbound("first", "789"));
    lastChannel().deliver(inbound("other", "790"));

    await vi.waitFor(() => expect(lastChannel().sent).toHaveLength(1));
    expect(lastChannel().sent[0]).toEqual({ peerId: "790", message: { text: "re:other" } });

    releaseFirst();
    await vi.waitFor(() => expect(lastChannel().sent).toHaveLength(2));
    await host.stop();
  });

  it("starts only once", async () => {
    const host = new RelayHost(config);

    await host.start();
    await host.start();

    expect(channels.created).toHaveLength(1);
    await host.stop();
  });
});
