import { run, sequentialize } from "@grammyjs/runner";
import { Bot, type Context } from "grammy";
import type { InboundMessage, OutboundMessage } from "../types";
import { logger } from "../../../../logger";
import { BaseChannelPlugin } from "../plugin";
import { isChatAllowed, isCommandText, normalizeChatIds } from "./access";
import { BOT_COMMANDS, HELP_MESSAGE, buildStartMessage } from "./commands";
import { resolveSenderKey } from "./identity";
import { formatTelegramError } from "./network-errors";
import { formatForTelegram, truncateForTelegram } from "./render";
import { TypingManager } from "./typing";

export interface TelegramPluginConfig {
  botToken: string;
  allowedChats?: Array<string | number>; // Optional whitelist
  polling?: {
    timeoutSeconds?: number;
  };
}

const DEFAULT_POLLING_TIMEOUT_SECONDS = 30;
const RUNNER_MAX_RETRY_TIME_MS = 60_000;

export class TelegramPlugin extends BaseChannelPlugin {
  readonly id = "telegram";
  readonly name = "Telegram";

  private bot: Bot;
  private allowedChats: string[];
  private pollingTimeoutSeconds: number;
  private runner: ReturnType<typeof run> | null = null;
  private botUsername: string | null = null;
  private typing: TypingManager;

  constructor(config: TelegramPluginConfig) {
    super();
    this.allowedChats = normalizeChatIds(config.allowedChats);
    this.pollingTimeoutSeconds =
      config.polling?.timeoutSeconds ?? DEFAULT_POLLING_TIMEOUT_SECONDS;
    this.bot = new Bot(config.botToken);
    this.typing = new TypingManager((peerId) => this.sendTypingAction(peerId));
    this.setupHandlers();
  }

  private setupHandlers(): void {
    // Commands and messages from one chat are taken in arrival order; the host
    // keeps relayed replies in that order.
    this.bot.use(sequentialize((ctx) => ctx.chat?.id.toString()));

    this.bot.command("start", (ctx) => this.handleStart(ctx));
    this.bot.command("help", (ctx) => this.handleHelp(ctx));

    this.bot.on("message:text", (ctx) => this.handleMessage(ctx));

    this.bot.catch((err) => {
      const error = err.error instanceof Error ? err.error : new Error(String(err.error));
      logger.error({ error: formatTelegramError(error) }, "Telegram bot error");
      this.emitError(error);
    });
  }

  private isAllowed(ctx: Context): boolean {
    const chatId = ctx.chat?.id.toString();
    if (!chatId || !isChatAllowed(this.allowedChats, chatId)) {
      logger.info({ chatId, senderId: ctx.from?.id }, "Telegram message dropped by allowedChats");
      return false;
    }
    return true;
  }

  private async handleStart(ctx: Context): Promise<void> {
    if (!this.isAllowed(ctx)) {
      return;
    }
    await ctx.reply(buildStartMessage(ctx.from?.first_name));
  }

  private async handleHelp(ctx: Context): Promise<void> {
    if (!this.isAllowed(ctx)) {
      return;
    }
    await ctx.reply(HELP_MESSAGE);
  }

  private async handleMessage(ctx: Context): Promise<void> {
    const msg = ctx.message;
    if (!msg || typeof msg.text !== "string") {
      return;
    }
    if (!this.isAllowed(ctx)) {
      return;
    }

    const chatId = msg.chat.id.toString();
    const senderId = msg.from?.id.toString() || "unknown";

    if (isCommandText(msg.text)) {
      logger.debug({ chatId, senderId }, "Telegram message dropped: unknown command");
      return;
    }

    const text = msg.text.trim();
    if (!text) {
      logger.debug({ chatId, senderId }, "Telegram message dropped: empty text");
      return;
    }

    const inbound: InboundMessage = {
      id: msg.message_id.toString(),
      channel: this.id,
      peerId: chatId,
      peerType: msg.chat.type === "private" ? "dm" : "group",
      senderId,
      senderKey: resolveSenderKey({
        username: msg.from?.username,
        userId: msg.from?.id,
        chatId: msg.chat.id,
      }),
      senderUsername: msg.from?.username || undefined,
      senderName: msg.from?.first_name || "Unknown",
      text,
      timestamp: new Date(msg.date * 1000),
      raw: msg,
    };

    this.emitMessage(inbound);
  }

  async connect(): Promise<void> {
    this.setStatus("connecting");
    try {
      const me = await this.bot.api.getMe();
      this.botUsername = me.username?.trim().toLowerCase() || null;

      await this.registerCommands();

      this.runner = run(this.bot, {
        runner: {
          fetch: {
            timeout: this.pollingTimeoutSeconds,
          },
          maxRetryTime: RUNNER_MAX_RETRY_TIME_MS,
          retryInterval: "exponential",
          silent: true,
        },
      });
      logger.info({ botUsername: this.botUsername }, "Telegram bot connected");
      this.setStatus("connected");
    } catch (error) {
      logger.error({ error: formatTelegramError(error) }, "Failed to connect Telegram bot");
      this.setStatus("error");
      throw error;
    }
  }

  private async registerCommands(): Promise<void> {
    try {
      await this.bot.api.setMyCommands(BOT_COMMANDS.map((entry) => ({ ...entry })));
      logger.info({ commandCount: BOT_COMMANDS.length }, "Telegram bot commands registered");
    } catch (error) {
      logger.warn({ error: formatTelegramError(error) }, "Failed to register Telegram bot commands");
    }
  }

  async disconnect(): Promise<void> {
    this.typing.stopAll();
    if (this.runner) {
      await this.runner.stop();
      this.runner = null;
    }
    logger.info("Telegram bot disconnected");
    this.setStatus("disconnected");
  }

  async send(peerId: string, message: OutboundMessage): Promise<string> {
    const text = truncateForTelegram(formatForTelegram(message.text));
    if (!text) {
      throw new Error("Refusing to send an empty Telegram message");
    }

    try {
      const sent = await this.bot.api.sendMessage(peerId, text);
      return sent.message_id.toString();
    } catch (error) {
      logger.error(
        { error: formatTelegramError(error), chatId: peerId },
        "Failed to send Telegram message",
      );
      throw error;
    }
  }

  async beginTyping(peerId: string): Promise<(() => Promise<void>) | void> {
    return this.typing.beginTyping(peerId, this.runner !== null);
  }

  private async sendTypingAction(peerId: string): Promise<void> {
    await this.bot.api.sendChatAction(peerId, "typing");
  }
}
