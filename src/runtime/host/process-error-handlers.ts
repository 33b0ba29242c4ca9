import { logger } from "../../logger";
import {
  formatTelegramError,
  isGetUpdatesConflict,
  isRecoverableTelegramNetworkError,
} from "../adapters/channels/telegram/network-errors";

declare global {
  // eslint-disable-next-line no-var
  var __relayProcessErrorHandlersRegistered: boolean | undefined;
}

export type ProcessErrorSeverity = "recoverable" | "fatal";

/**
 * Polling hiccups (DNS, resets, 5xx from Telegram, a second poller) heal on the
 * runner's next attempt; anything else is a bug worth a non-zero exit code.
 */
export function classifyProcessError(err: unknown): ProcessErrorSeverity {
  if (isGetUpdatesConflict(err) || isRecoverableTelegramNetworkError(err, { context: "polling" })) {
    return "recoverable";
  }
  return "fatal";
}

function report(source: "unhandledRejection" | "uncaughtException", err: unknown): void {
  const error = formatTelegramError(err);
  if (classifyProcessError(err) === "recoverable") {
    logger.warn({ error, source, recoverable: true }, "Suppressed recoverable process error");
    return;
  }
  if (source === "uncaughtException") {
    logger.fatal({ error, source }, "Uncaught exception");
    process.exitCode = 1;
    return;
  }
  logger.error({ error, source }, "Unhandled rejection");
}

export function registerProcessErrorHandlers(): void {
  if (globalThis.__relayProcessErrorHandlersRegistered) {
    return;
  }
  globalThis.__relayProcessErrorHandlersRegistered = true;

  process.on("unhandledRejection", (reason) => report("unhandledRejection", reason));
  process.on("uncaughtException", (error) => report("uncaughtException", error));
}
