import { loadConfig, redactConfig, type LoadConfigOptions } from "../../config";

export function validateConfig(options: LoadConfigOptions = {}): number {
  const result = loadConfig(options);
  if (result.success && result.config) {
    console.log("✅ Config check passed.");
    console.log(JSON.stringify(redactConfig(result.config), null, 2));
    return 0;
  }
  console.error("❌ Config check failed:");
  for (const error of result.errors ?? []) {
    console.error(`- ${error}`);
  }
  return 1;
}
