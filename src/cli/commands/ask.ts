import { loadConfig, type LoadConfigOptions } from "../../config";
import { OrchestratorClient } from "../../orchestrator/client";
import { isOrchestratorRequestError } from "../../orchestrator/errors";

export type AskOptions = LoadConfigOptions & {
  user?: string;
};

export const DEFAULT_ASK_USER = "cli_local";

/**
 * Sends one message straight to the orchestrator. Unlike the bot it reports
 * the failure instead of the fallback reply, which makes it a connectivity check.
 */
export async function askOrchestrator(
  message: string,
  options: AskOptions = {},
): Promise<number> {
  const text = message.trim();
  if (!text) {
    console.error("❌ Message must not be empty.");
    return 1;
  }

  const result = loadConfig(options);
  if (!result.success || !result.config) {
    console.error("❌ Config check failed:");
    for (const error of result.errors ?? []) {
      console.error(`- ${error}`);
    }
    return 1;
  }

  const client = new OrchestratorClient(result.config.orchestrator);
  try {
    const response = await client.chat({
      user_id: options.user ?? DEFAULT_ASK_USER,
      message: text,
    });
    console.log(response.reply);
    return 0;
  } catch (error) {
    if (isOrchestratorRequestError(error)) {
      console.error(`❌ Orchestrator call failed (${error.kind}): ${error.message}`);
      return 1;
    }
    throw error;
  }
}
