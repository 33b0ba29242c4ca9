/** Wire payload posted to `<baseUrl>/chat`. */
export interface ChatRequest {
  user_id: string;
  message: string;
}

export interface ChatResponse {
  reply: string;
  correlationId?: string;
}

export interface OrchestratorClientOptions {
  baseUrl: string;
  timeoutMs: number;
  /** JSON field of the response body that carries the reply text. */
  replyField: string;
  fallbackReply: string;
}

export interface RelayCallOptions {
  signal?: AbortSignal;
}

export interface RelayClient {
  relay(userId: string, message: string, options?: RelayCallOptions): Promise<string>;
}
