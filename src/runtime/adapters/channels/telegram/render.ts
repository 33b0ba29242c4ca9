/** Longest reply sent in one Telegram message; longer replies are cut with an ellipsis. */
export const TELEGRAM_REPLY_LIMIT = 4000;
const TRUNCATED_REPLY_CHARS = 3996;
const TRUNCATION_MARKER = "...";

const KEYCAP = "\uFE0F\u20E3";

const FIELD_DECORATIONS: Array<[RegExp, string]> = [
  [/(Why you[^:]*:)/g, "💡 $1"],
  [/(When:)/g, "📅 $1"],
  [/(Where:)/g, "📍 $1"],
  [/(Location:)/g, "📍 $1"],
  [/(Price:)/g, "💰 $1"],
  [/(More Info:)/g, "🔗 $1"],
];

/**
 * Turns the orchestrator's markdown-ish reply into plain text that reads well
 * in Telegram: bold runs become highlighted lines, known fields get an emoji,
 * numbered items become keycap emoji on their own paragraph.
 */
export function formatForTelegram(text: string): string {
  let result = text.replace(/\*\*([^*]+)\*\*/g, "🎨 $1");

  for (const [pattern, replacement] of FIELD_DECORATIONS) {
    result = result.replace(pattern, replacement);
  }

  result = result.replace(/^(\d+)\.\s+/gm, `\n$1${KEYCAP} `);
  result = result.replace(/\n{3,}/g, "\n\n");

  return result.trim();
}

/** Counts and cuts by code point so emoji are never split. */
export function truncateForTelegram(text: string): string {
  const chars = Array.from(text);
  if (chars.length <= TELEGRAM_REPLY_LIMIT) {
    return text;
  }
  return `${chars.slice(0, TRUNCATED_REPLY_CHARS).join("")}${TRUNCATION_MARKER}`;
}
