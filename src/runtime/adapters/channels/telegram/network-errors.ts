export type TelegramNetworkErrorContext = "polling" | "startup" | "send" | "unknown";

const RECOVERABLE_ERROR_CODES = new Set([
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
  "ABORT_ERR",
]);

const RECOVERABLE_TEXT_RE =
  /enotfound|eai_again|timed?\s*out|econnreset|connection\s*reset|fetch failed|socket|temporar(?:y|ily)|network\s*error|getaddrinfo|service\s*unavailable|bad\s*gateway|gateway\s*timeout/i;

const RETRYABLE_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);

const BOT_TOKEN_RE = /bot\d+:[A-Za-z0-9_-]+/g;

type UnknownRecord = Record<string, unknown>;

function asRecord(value: unknown): UnknownRecord | null {
  return value !== null && typeof value === "object" ? (value as UnknownRecord) : null;
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function readNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/** Walks an error and the errors it wraps (grammY nests the fetch failure under `error`). */
function errorChain(err: unknown): UnknownRecord[] {
  const chain: UnknownRecord[] = [];
  const pending: unknown[] = [err];
  const seen = new Set<unknown>();

  while (pending.length > 0) {
    const item = pending.shift();
    const record = asRecord(item);
    if (!record || seen.has(record)) {
      continue;
    }
    seen.add(record);
    chain.push(record);
    pending.push(record.error, record.cause, record.err);
  }

  return chain;
}

export function redactBotToken(text: string): string {
  return text.replace(BOT_TOKEN_RE, "bot<redacted>");
}

export function formatTelegramError(err: unknown): string {
  if (err instanceof Error) {
    return redactBotToken(err.message);
  }
  if (typeof err === "string") {
    return redactBotToken(err);
  }
  try {
    return redactBotToken(JSON.stringify(err) ?? String(err));
  } catch {
    return redactBotToken(String(err));
  }
}

/** 409 from getUpdates: another process is polling with the same token. */
export function isGetUpdatesConflict(err: unknown): boolean {
  return errorChain(err).some((record) => {
    const errorCode = readNumber(record.error_code) ?? readNumber(record.errorCode);
    if (errorCode !== 409) {
      return false;
    }
    const haystack = [record.method, record.description, record.message]
      .map(readString)
      .filter((value): value is string => Boolean(value))
      .join(" ")
      .toLowerCase();
    return haystack.includes("getupdates");
  });
}

export function isRecoverableTelegramNetworkError(
  err: unknown,
  _opts: { context?: TelegramNetworkErrorContext } = {},
): boolean {
  for (const record of errorChain(err)) {
    const code = readString(record.code) ?? readString(record.errno);
    if (code && RECOVERABLE_ERROR_CODES.has(code.toUpperCase())) {
      return true;
    }

    const status =
      readNumber(record.status) ?? readNumber(record.error_code) ?? readNumber(record.errorCode);
    if (status !== undefined && RETRYABLE_STATUS.has(status)) {
      return true;
    }

    const message = [record.message, record.description]
      .map(readString)
      .filter((value): value is string => Boolean(value))
      .join(" ");
    if (message && RECOVERABLE_TEXT_RE.test(message)) {
      return true;
    }
  }

  return typeof err === "string" && RECOVERABLE_TEXT_RE.test(err);
}
