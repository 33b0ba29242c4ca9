import { loadConfig, type LoadConfigOptions } from "../../config";
import { logger } from "../../logger";
import { RelayHost } from "../../runtime/host";
import { registerProcessErrorHandlers } from "../../runtime/host/process-error-handlers";
import { APP_VERSION } from "../../version";

export type StartOptions = LoadConfigOptions;

export async function startRelay(options: StartOptions = {}): Promise<RelayHost> {
  const result = loadConfig(options);
  if (!result.success || !result.config) {
    logger.error({ errors: result.errors }, "Failed to load configuration");
    console.error("Error: failed to load configuration.");
    for (const error of result.errors ?? []) {
      console.error(`- ${error}`);
    }
    process.exit(1);
  }
  const config = result.config;

  logger.info(`
=========================================
   Orchestrator Relay v${APP_VERSION}
=========================================
   Orchestrator: ${config.orchestrator.baseUrl}
   Timeout: ${config.orchestrator.timeoutMs}ms
   Reply field: ${config.orchestrator.replyField}
=========================================
  `);

  registerProcessErrorHandlers();

  const host = new RelayHost(config);

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await host.stop();
    process.exit(0);
  };

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));

  await host.start();
  logger.info("Relay is running. Press Ctrl+C to stop.");
  return host;
}
