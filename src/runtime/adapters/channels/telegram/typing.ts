import { logger } from "../../../../logger";

const TYPING_INTERVAL_MS = 6_000;
const TYPING_TTL_MS = 2 * 60_000;

type ChatTyping = {
  /** One entry per pending reply in the chat. */
  holders: Set<number>;
  timer: ReturnType<typeof setTimeout> | null;
  expiresAt: number;
};

export interface TypingManagerOptions {
  intervalMs?: number;
  ttlMs?: number;
}

/**
 * Keeps the chat action alive while replies are pending. Telegram clears it
 * after about five seconds, so it is re-sent until every pending reply in the
 * chat has released it or the newest one has been waiting longer than the TTL.
 */
export class TypingManager {
  private chats = new Map<string, ChatTyping>();
  private nextHolder = 0;
  private readonly intervalMs: number;
  private readonly ttlMs: number;

  constructor(
    private readonly sendAction: (peerId: string) => Promise<void>,
    options: TypingManagerOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? TYPING_INTERVAL_MS;
    this.ttlMs = options.ttlMs ?? TYPING_TTL_MS;
  }

  async beginTyping(peerId: string, isConnected: boolean): Promise<(() => Promise<void>) | void> {
    if (!isConnected) {
      return;
    }

    const holder = this.nextHolder++;
    const expiresAt = Date.now() + this.ttlMs;
    const existing = this.chats.get(peerId);
    if (existing) {
      existing.holders.add(holder);
      existing.expiresAt = Math.max(existing.expiresAt, expiresAt);
      return async () => this.release(peerId, existing, holder);
    }

    // Registered before the first send so concurrent callers join this loop.
    const state: ChatTyping = { holders: new Set([holder]), timer: null, expiresAt };
    this.chats.set(peerId, state);

    await this.send(peerId);
    this.schedule(peerId, state);

    return async () => this.release(peerId, state, holder);
  }

  private schedule(peerId: string, state: ChatTyping): void {
    if (this.chats.get(peerId) !== state) {
      return;
    }
    state.timer = setTimeout(() => {
      state.timer = null;
      if (Date.now() >= state.expiresAt) {
        logger.debug({ peerId }, "Telegram typing indicator expired");
        this.clear(peerId, state);
        return;
      }
      void this.send(peerId).then(() => this.schedule(peerId, state));
    }, this.intervalMs);
  }

  private async send(peerId: string): Promise<void> {
    try {
      await this.sendAction(peerId);
    } catch (error) {
      logger.warn({ error, peerId }, "Failed to send Telegram typing indicator");
    }
  }

  private release(peerId: string, state: ChatTyping, holder: number): void {
    state.holders.delete(holder);
    if (state.holders.size === 0) {
      this.clear(peerId, state);
    }
  }

  private clear(peerId: string, state: ChatTyping): void {
    if (state.timer) {
      clearTimeout(state.timer);
      state.timer = null;
    }
    if (this.chats.get(peerId) === state) {
      this.chats.delete(peerId);
    }
  }

  activeCount(): number {
    return this.chats.size;
  }

  stopAll(): void {
    for (const [peerId, state] of this.chats) {
      this.clear(peerId, state);
    }
  }
}
