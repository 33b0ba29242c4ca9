export {
  configFromEnv,
  loadConfig,
  redactConfig,
  resolveEnvPath,
  type ConfigLoadResult,
  type LoadConfigOptions,
} from "./loader";
export { RelayConfigSchema, type RelayConfig } from "./schema";
