export interface TelegramSenderIdentity {
  username?: string;
  userId?: number | string;
  chatId?: number | string;
}

/**
 * Stable orchestrator identity for a Telegram sender. The username wins so a
 * user keeps the same identity across devices; numeric ids cover accounts
 * without one.
 */
export function resolveSenderKey(identity: TelegramSenderIdentity): string {
  const username = identity.username?.trim();
  if (username) {
    return `tg_${username}`;
  }
  if (identity.userId !== undefined && identity.userId !== "" && identity.userId !== 0) {
    return `tg_id_${identity.userId}`;
  }
  if (identity.chatId !== undefined && identity.chatId !== "" && identity.chatId !== 0) {
    return `tg_chat_${identity.chatId}`;
  }
  return "tg_unknown";
}
