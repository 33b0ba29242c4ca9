import { logger } from "./logger";
import { startRelay } from "./cli/commands/start";

startRelay().catch((err) => {
  logger.error({ err }, "Fatal error during startup");
  process.exit(1);
});
