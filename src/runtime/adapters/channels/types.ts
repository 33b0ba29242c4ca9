// Normalized message format (platform-agnostic)
export interface InboundMessage {
  id: string;
  channel: string; // "telegram"
  peerId: string; // Chat ID
  peerType: "dm" | "group";
  senderId: string;
  /** Stable per-user identity forwarded to the orchestrator as `user_id`. */
  senderKey: string;
  senderUsername?: string;
  senderName?: string;
  text: string;
  timestamp: Date;
  raw: unknown; // Original platform message
}

export interface OutboundMessage {
  text: string;
}

export type ChannelStatus = "connected" | "connecting" | "disconnected" | "error";
