import type { RelayConfig } from "../../config";
import type { ChannelPlugin } from "../adapters/channels/plugin";
import type { InboundMessage } from "../adapters/channels/types";
import { configureLogger, logger } from "../../logger";
import { OrchestratorClient } from "../../orchestrator/client";
import { TelegramPlugin } from "../adapters/channels/telegram/plugin";
import { formatTelegramError } from "../adapters/channels/telegram/network-errors";
import { RelayMessageHandler } from "./message-handler";

export class RelayHost {
  private running = false;
  private startedAt: Date | null = null;
  private channel: ChannelPlugin | null = null;
  private messageHandler: RelayMessageHandler | null = null;
  private inFlight = new Set<Promise<void>>();
  /** Tail of each chat's queue; a chat's messages are relayed one after another. */
  private chatQueues = new Map<string, Promise<void>>();

  constructor(private readonly config: RelayConfig) {}

  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    configureLogger(this.config.logging.level);
    logger.info(
      {
        orchestrator: this.config.orchestrator.baseUrl,
        timeoutMs: this.config.orchestrator.timeoutMs,
      },
      "Starting relay...",
    );

    const client = new OrchestratorClient(this.config.orchestrator);
    const messageHandler = new RelayMessageHandler(client);
    const telegram = new TelegramPlugin({
      botToken: this.config.telegram.botToken,
      allowedChats: this.config.telegram.allowedChats,
      polling: this.config.telegram.polling,
    });

    telegram.on("message", (msg: InboundMessage) => {
      this.track(this.enqueue(msg.peerId, () => this.dispatch(telegram, messageHandler, msg)));
    });
    telegram.on("error", (error: Error) => {
      logger.warn({ error: formatTelegramError(error) }, "Telegram channel reported an error");
    });

    this.messageHandler = messageHandler;
    this.channel = telegram;
    await telegram.connect();

    this.running = true;
    this.startedAt = new Date();
    logger.info(`Relay started (PID: ${process.pid})`);
  }

  private dispatch(
    channel: ChannelPlugin,
    messageHandler: RelayMessageHandler,
    msg: InboundMessage,
  ): Promise<void> {
    return messageHandler
      .handle(channel, msg)
      .then((outcome) => {
        logger.debug({ peerId: msg.peerId, messageId: msg.id, outcome }, "Inbound message handled");
      })
      .catch((err) => {
        logger.error(
          { err, peerId: msg.peerId, messageId: msg.id },
          "Error handling inbound message",
        );
      });
  }

  private enqueue(peerId: string, task: () => Promise<void>): Promise<void> {
    const previous = this.chatQueues.get(peerId) ?? Promise.resolve();
    const next = previous.then(task);
    this.chatQueues.set(peerId, next);
    void next.finally(() => {
      if (this.chatQueues.get(peerId) === next) {
        this.chatQueues.delete(peerId);
      }
    });
    return next;
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.finally(() => {
      this.inFlight.delete(task);
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): { running: boolean; startedAt: Date | null; inFlight: number; channel: string } {
    return {
      running: this.running,
      startedAt: this.startedAt,
      inFlight: this.inFlight.size,
      channel: this.channel?.getStatus() ?? "disconnected",
    };
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    logger.info("Shutting down...");

    // In-flight orchestrator calls are abandoned; their replies are not sent.
    this.messageHandler?.shutdown();

    if (this.channel) {
      try {
        await this.channel.disconnect();
      } catch (error) {
        logger.warn({ error: formatTelegramError(error) }, `Error disconnecting ${this.channel.id}`);
      }
    }

    await Promise.allSettled([...this.inFlight]);

    this.running = false;
    this.startedAt = null;
    logger.info("Relay stopped cleanly.");
  }
}
