import { z } from "zod";

const IdListSchema = z
  .array(z.union([z.string(), z.number()]))
  .transform((items) => items.map((item) => item.toString().trim()).filter(Boolean));

const TelegramPollingConfigSchema = z
  .object({
    timeoutSeconds: z.coerce.number().int().positive().max(60).default(30),
  })
  .strict();

export const TelegramConfigSchema = z
  .object({
    botToken: z
      .string({ required_error: "TELEGRAM_BOT_TOKEN is not set" })
      .trim()
      .min(1, "TELEGRAM_BOT_TOKEN is not set"),
    allowedChats: IdListSchema.default([]),
    polling: TelegramPollingConfigSchema.default({}),
  })
  .strict();

export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;
