import { logger } from "../logger";
import { OrchestratorRequestError, isOrchestratorRequestError } from "./errors";
import type {
  ChatRequest,
  ChatResponse,
  OrchestratorClientOptions,
  RelayCallOptions,
  RelayClient,
} from "./types";

const ERROR_BODY_PREVIEW_CHARS = 200;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function buildChatUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/chat`;
}

export function extractReply(data: unknown, replyField: string): ChatResponse {
  if (!isRecord(data)) {
    throw new OrchestratorRequestError("missing-reply", "Orchestrator response is not a JSON object");
  }
  const reply = data[replyField];
  if (typeof reply !== "string" || !reply.trim()) {
    throw new OrchestratorRequestError(
      "missing-reply",
      `Orchestrator response has no "${replyField}" text`,
    );
  }
  const correlationId =
    typeof data.correlation_id === "string" ? data.correlation_id : undefined;
  return { reply, correlationId };
}

/**
 * Posts one chat message to the orchestrator and hands back its reply.
 * Holds only immutable options; every call owns its own abort controller.
 */
export class OrchestratorClient implements RelayClient {
  private readonly url: string;

  constructor(private readonly options: OrchestratorClientOptions) {
    if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
      throw new Error(`Orchestrator timeout must be a positive number (got ${options.timeoutMs})`);
    }
    this.url = buildChatUrl(options.baseUrl);
  }

  async chat(request: ChatRequest, callOptions: RelayCallOptions = {}): Promise<ChatResponse> {
    const { signal } = callOptions;
    if (signal?.aborted) {
      throw new OrchestratorRequestError("aborted", "Orchestrator call aborted before start");
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      let response: Response;
      let body: string;
      try {
        response = await fetch(this.url, {
          method: "POST",
          headers: {
            Accept: "application/json",
            "Content-Type": "application/json",
          },
          body: JSON.stringify(request),
          signal: controller.signal,
        });
        body = await response.text();
      } catch (error) {
        if (timedOut) {
          throw new OrchestratorRequestError(
            "timeout",
            `Orchestrator did not respond within ${this.options.timeoutMs}ms`,
            { cause: error },
          );
        }
        if (signal?.aborted) {
          throw new OrchestratorRequestError("aborted", "Orchestrator call aborted", {
            cause: error,
          });
        }
        throw new OrchestratorRequestError(
          "network",
          `Orchestrator request failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error },
        );
      }

      if (!response.ok) {
        throw new OrchestratorRequestError(
          "status",
          `Orchestrator API error (${response.status}): ${body.slice(0, ERROR_BODY_PREVIEW_CHARS)}`,
          { status: response.status },
        );
      }

      let data: unknown;
      try {
        data = JSON.parse(body);
      } catch (error) {
        throw new OrchestratorRequestError("invalid-json", "Orchestrator returned a non-JSON body", {
          status: response.status,
          cause: error,
        });
      }

      return extractReply(data, this.options.replyField);
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  /** Relays one message; every failure becomes the configured fallback reply. */
  async relay(userId: string, message: string, callOptions: RelayCallOptions = {}): Promise<string> {
    const startedAt = Date.now();
    try {
      const result = await this.chat({ user_id: userId, message }, callOptions);
      logger.debug(
        {
          userId,
          correlationId: result.correlationId,
          replyLength: result.reply.length,
          durationMs: Date.now() - startedAt,
        },
        "Orchestrator replied",
      );
      return result.reply;
    } catch (error) {
      if (isOrchestratorRequestError(error)) {
        const level = error.kind === "aborted" ? "info" : "error";
        logger[level](
          {
            userId,
            kind: error.kind,
            status: error.status,
            durationMs: Date.now() - startedAt,
            err: error,
          },
          "Orchestrator call failed; sending fallback reply",
        );
      } else {
        logger.error({ userId, err: error }, "Unexpected error calling orchestrator");
      }
      return this.options.fallbackReply;
    }
  }
}
