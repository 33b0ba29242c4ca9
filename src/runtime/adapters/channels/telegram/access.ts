export function normalizeChatIds(ids: Array<string | number> | undefined): string[] {
  return (ids ?? []).map((item) => item.toString().trim()).filter(Boolean);
}

/** An empty allowlist admits every chat. */
export function isChatAllowed(allowedChats: string[], chatId: string): boolean {
  if (allowedChats.length === 0) {
    return true;
  }
  return allowedChats.includes(chatId);
}

export function isCommandText(text: string): boolean {
  return text.trim().startsWith("/");
}
