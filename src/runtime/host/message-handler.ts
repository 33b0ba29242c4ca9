import type { RelayClient } from "../../orchestrator/types";
import type { ChannelPlugin } from "../adapters/channels/plugin";
import type { InboundMessage } from "../adapters/channels/types";
import { logger } from "../../logger";

const LOG_TEXT_PREVIEW_CHARS = 50;

export type RelayOutcome = "relayed" | "skipped" | "aborted";

/**
 * Relays one inbound chat message: a single orchestrator call, then a single
 * reply into the chat the message came from. Holds no per-message state.
 */
export class RelayMessageHandler {
  private shutdownController = new AbortController();

  constructor(private readonly client: RelayClient) {}

  async handle(channel: ChannelPlugin, msg: InboundMessage): Promise<RelayOutcome> {
    const text = msg.text.trim();
    if (!text) {
      logger.debug(
        { channel: msg.channel, peerId: msg.peerId, messageId: msg.id },
        "Skipping empty inbound message",
      );
      return "skipped";
    }

    const signal = this.shutdownController.signal;
    if (signal.aborted) {
      return "aborted";
    }

    logger.info(
      { userId: msg.senderKey, peerId: msg.peerId, text: text.slice(0, LOG_TEXT_PREVIEW_CHARS) },
      "Relaying message to orchestrator",
    );

    const stopTyping = await this.startTyping(channel, msg.peerId);
    let reply: string;
    try {
      reply = await this.client.relay(msg.senderKey, text, { signal });
    } finally {
      await stopTyping?.();
    }

    if (signal.aborted) {
      logger.info(
        { peerId: msg.peerId, messageId: msg.id },
        "Relay aborted by shutdown; no reply sent",
      );
      return "aborted";
    }

    logger.info({ peerId: msg.peerId, replyLength: reply.length }, "Received orchestrator reply");
    const sentId = await channel.send(msg.peerId, { text: reply });
    logger.info({ peerId: msg.peerId, sentMessageId: sentId }, "Reply sent");
    return "relayed";
  }

  private async startTyping(
    channel: ChannelPlugin,
    peerId: string,
  ): Promise<(() => Promise<void> | void) | undefined> {
    if (typeof channel.beginTyping !== "function") {
      return undefined;
    }
    try {
      const stop = await channel.beginTyping(peerId);
      return typeof stop === "function" ? stop : undefined;
    } catch (error) {
      logger.warn({ peerId, err: error }, "Failed to start typing indicator");
      return undefined;
    }
  }

  /** Aborts in-flight orchestrator calls; later messages are not relayed. */
  shutdown(): void {
    this.shutdownController.abort();
  }
}
