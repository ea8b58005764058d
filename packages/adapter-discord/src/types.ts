// Inbound chat message, reduced to what the advisor needs
export type InboundMessage = {
  id: string;
  channelId: string;
  guildId?: string;
  author: {
    id: string;
    username: string;
    bot: boolean;
  };
  text: string;
  timestamp: number;
};

// Result of posting a reply
export type SendResult = {
  success: boolean;
  messageId?: string;
  error?: string;
  timestamp: number;
};

// Adapter status snapshot
export type AdapterSnapshot = {
  running: boolean;
  connected: boolean;
  name?: string;
  lastConnectedAt?: number | null;
  lastDisconnectedAt?: number | null;
  lastError?: string | null;
  lastStopAt?: number | null;
  repliesSent: number;
};
