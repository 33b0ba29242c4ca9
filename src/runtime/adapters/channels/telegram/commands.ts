export const BOT_COMMANDS = [
  { command: "start", description: "Start a conversation" },
  { command: "help", description: "Show what you can ask" },
] as const;

export function buildStartMessage(firstName?: string): string {
  const name = firstName?.trim() || "there";
  return (
    `Hi ${name}! I pass your messages on to our assistant and send back what it says.\n\n` +
    "Just write what you are looking for and I'll reply with its answer."
  );
}

export const HELP_MESSAGE =
  "You can send me any message, for example:\n" +
  '- "What exhibitions are on this weekend?"\n' +
  '- "I like sculpture but not video art"\n' +
  '- "Suggest something near the old town"\n\n' +
  "I'll forward it to the assistant and reply with its answer.";
