import { z } from "zod";
import { LoggingSchema } from "./logging";
import { OrchestratorConfigSchema } from "./orchestrator";
import { TelegramConfigSchema } from "./telegram";

export const RelayConfigSchema = z
  .object({
    telegram: TelegramConfigSchema,
    orchestrator: OrchestratorConfigSchema,
    logging: LoggingSchema.default({}),
  })
  .strict();

export type RelayConfig = z.infer<typeof RelayConfigSchema>;
