import { z } from "zod";

export const DEFAULT_ORCHESTRATOR_TIMEOUT_MS = 60_000;
export const DEFAULT_REPLY_FIELD = "response";
export const DEFAULT_FALLBACK_REPLY =
  "I couldn't reach the orchestrator right now. Please try again in a moment.";

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

const BaseUrlSchema = z
  .string({ required_error: "ORCHESTRATOR_BASE_URL is not set" })
  .trim()
  .min(1, "ORCHESTRATOR_BASE_URL is not set")
  .refine(isHttpUrl, "must be an absolute http(s) URL")
  .transform((value) => value.replace(/\/+$/, ""));

export const OrchestratorConfigSchema = z
  .object({
    baseUrl: BaseUrlSchema,
    timeoutMs: z.coerce
      .number()
      .int()
      .positive()
      .max(10 * 60_000)
      .default(DEFAULT_ORCHESTRATOR_TIMEOUT_MS),
    replyField: z.string().trim().min(1).default(DEFAULT_REPLY_FIELD),
    fallbackReply: z.string().trim().min(1).default(DEFAULT_FALLBACK_REPLY),
  })
  .strict();

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
