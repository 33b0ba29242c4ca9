import { config as loadDotEnv } from "dotenv";
import fs from "node:fs";
import path from "node:path";
import { RelayConfigSchema, type RelayConfig } from "./schema";

export interface ConfigLoadResult {
  success: boolean;
  config?: RelayConfig;
  errors?: string[];
  envPath?: string;
}

export interface LoadConfigOptions {
  /** Variables to read instead of `process.env`; no `.env` file is loaded then. */
  env?: Record<string, string | undefined>;
  /** `.env` file to read into `process.env` first; `false` skips it. */
  envFile?: string | false;
}

function readEnv(env: Record<string, string | undefined>, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readList(env: Record<string, string | undefined>, key: string): string[] | undefined {
  const value = readEnv(env, key);
  if (!value) {
    return undefined;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function resolveEnvPath(customPath?: string): string {
  return path.resolve(customPath ?? ".env");
}

function loadEnvFile(envPath: string): void {
  if (!fs.existsSync(envPath)) {
    return;
  }
  const result = loadDotEnv({ path: envPath, override: false, quiet: true });
  if (result.error) {
    throw result.error;
  }
}

/** Maps environment variables onto the raw config shape the schema validates. */
export function configFromEnv(env: Record<string, string | undefined>): unknown {
  return {
    telegram: {
      botToken: readEnv(env, "TELEGRAM_BOT_TOKEN"),
      allowedChats: readList(env, "TELEGRAM_ALLOWED_CHATS"),
      polling: {
        timeoutSeconds: readEnv(env, "TELEGRAM_POLLING_TIMEOUT_SECONDS"),
      },
    },
    orchestrator: {
      baseUrl: readEnv(env, "ORCHESTRATOR_BASE_URL"),
      timeoutMs: readEnv(env, "ORCHESTRATOR_TIMEOUT_MS"),
      replyField: readEnv(env, "ORCHESTRATOR_REPLY_FIELD"),
      fallbackReply: readEnv(env, "RELAY_FALLBACK_REPLY"),
    },
    logging: {
      level: readEnv(env, "RELAY_LOG_LEVEL")?.toLowerCase(),
    },
  };
}

export function loadConfig(options: LoadConfigOptions = {}): ConfigLoadResult {
  const envPath =
    options.env || options.envFile === false ? undefined : resolveEnvPath(options.envFile);

  try {
    if (envPath) {
      loadEnvFile(envPath);
    }
    const env = options.env ?? process.env;

    const result = RelayConfigSchema.safeParse(configFromEnv(env));
    if (!result.success) {
      const errors = result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      );
      return { success: false, errors, envPath };
    }

    return { success: true, config: result.data, envPath };
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      envPath,
    };
  }
}

/** Config view safe to print: the bot token is masked. */
export function redactConfig(config: RelayConfig): RelayConfig {
  const token = config.telegram.botToken;
  const masked = token.length > 8 ? `${token.slice(0, 4)}…${token.slice(-2)}` : "***";
  return {
    ...config,
    telegram: { ...config.telegram, botToken: masked },
  };
}
