#!/usr/bin/env -S npx tsx
import { Command } from "commander";
import { APP_VERSION } from "../version";

const program = new Command()
  .name("orchestrator-relay")
  .description("Relay Telegram messages to an HTTP orchestrator")
  .version(APP_VERSION)
  .option("-e, --env-file <path>", "Env file to load before the environment", ".env");

function envFileOption(): string {
  const opts = program.opts<{ envFile: string }>();
  return opts.envFile;
}

program
  .command("start", { isDefault: true })
  .description("Start the Telegram relay bot")
  .action(async () => {
    const { startRelay } = await import("./commands/start");
    await startRelay({ envFile: envFileOption() });
  });

program
  .command("config")
  .description("Validate configuration and print it with secrets masked")
  .action(async () => {
    const { validateConfig } = await import("./commands/config");
    process.exitCode = validateConfig({ envFile: envFileOption() });
  });

program
  .command("ask")
  .description("Send one message to the orchestrator and print its reply")
  .argument("<message...>", "Message text")
  .option("-u, --user <id>", "user_id sent to the orchestrator")
  .action(async (message: string[], options: { user?: string }) => {
    const { askOrchestrator } = await import("./commands/ask");
    process.exitCode = await askOrchestrator(message.join(" "), {
      envFile: envFileOption(),
      user: options.user,
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
