import {
  Client,
  GatewayIntentBits,
  type Message as DiscordMessage,
} from "discord.js";
import { createLogger, type Logger } from "@codeblock-advisor/core";
import { TypedEventEmitter } from "./events.js";
import type { CodeblockResponder } from "./responder.js";
import type { AdapterSnapshot, InboundMessage, SendResult } from "./types.js";

export { CodeblockResponder, type ResponderOptions } from "./responder.js";
export { BotConfigSchema, type BotConfig, getConfigPath, loadBotConfig, parseAdvisorSection } from "./config.js";
export { TypedEventEmitter, type AdapterEvents } from "./events.js";
export type { AdapterSnapshot, InboundMessage, SendResult } from "./types.js";

/** Posts `text` as a reply and reports the new message. */
export type ReplyFn = (text: string) => Promise<{ id: string; createdTimestamp: number }>;

export function toInboundMessage(discordMsg: DiscordMessage): InboundMessage {
  return {
    id: discordMsg.id,
    channelId: discordMsg.channelId,
    guildId: discordMsg.guildId ?? undefined,
    author: {
      id: discordMsg.author.id,
      username: discordMsg.author.username,
      bot: discordMsg.author.bot,
    },
    text: discordMsg.content,
    timestamp: discordMsg.createdTimestamp,
  };
}

/**
 * Watches Discord channels and replies with code block formatting
 * instructions when a message formats code badly.
 */
export class DiscordAdapter extends TypedEventEmitter {
  private client: Client | null = null;
  private responder: CodeblockResponder;
  private log: Logger;
  private _status: AdapterSnapshot = {
    running: false,
    connected: false,
    repliesSent: 0,
  };

  constructor(responder: CodeblockResponder, logger: Logger = createLogger("discord")) {
    super();
    this.responder = responder;
    this.log = logger;
  }

  async start(token: string | undefined, signal: AbortSignal): Promise<void> {
    if (!token) throw new Error("Discord botToken is required");

    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
      ],
    });

    this.updateStatus({ running: true });

    // Ready event
    this.client.once("ready", (readyClient) => {
      this.updateStatus({
        connected: true,
        lastConnectedAt: Date.now(),
        name: readyClient.user.tag,
        lastError: null,
      });
      this.emit("connected", this.getStatus());
      this.log.info(`Bot ready as ${readyClient.user.tag}`);
    });

    // Message handler
    this.client.on("messageCreate", (discordMsg: DiscordMessage) => {
      const msg = toInboundMessage(discordMsg);
      this.emit("message", msg);

      const reply: ReplyFn = (text) =>
        discordMsg.reply({ content: text, allowedMentions: { repliedUser: false } });

      this.handleInbound(msg, reply).catch((err: unknown) => {
        this.emit("error", err instanceof Error ? err : new Error(String(err)), "messageCreate");
      });
    });

    // Error handling
    this.client.on("error", (err) => {
      this.emit("error", err, "client");
      this.updateStatus({ lastError: err.message });
    });

    // Disconnect handling
    this.client.on("shardDisconnect", () => {
      if (!signal.aborted) {
        this.updateStatus({ connected: false, lastDisconnectedAt: Date.now() });
        this.emit("disconnected", this.getStatus(), "shard disconnected");
      }
    });

    this.client.on("shardReconnecting", () => {
      this.log.info("Reconnecting...");
    });

    // Abort signal
    signal.addEventListener("abort", () => {
      this.client?.destroy().catch((err: unknown) => {
        this.log.error("Failed to destroy client", err);
      });
    });

    await this.client.login(token);
  }

  async stop(): Promise<void> {
    if (this.client) {
      await this.client.destroy();
      this.client = null;
    }
    this.updateStatus({ running: false, connected: false, lastStopAt: Date.now() });
    this.emit("disconnected", this.getStatus(), "stopped");
  }

  /**
   * Run the responder on `msg` and post its instructions through `reply`.
   * Returns null when the message needs no reply.
   */
  async handleInbound(msg: InboundMessage, reply: ReplyFn): Promise<SendResult | null> {
    const instructions = this.responder.handle(msg);
    if (instructions === null) return null;

    let result: SendResult;
    try {
      const sent = await reply(instructions);
      result = { success: true, messageId: sent.id, timestamp: sent.createdTimestamp };
      this.updateStatus({ repliesSent: this._status.repliesSent + 1 });
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      result = { success: false, error, timestamp: Date.now() };
      this.log.error(`Failed to reply to ${msg.id}: ${error}`);
      this.updateStatus({ lastError: error });
    }

    this.emit("reply", msg, result);
    return result;
  }

  getStatus(): AdapterSnapshot {
    return { ...this._status };
  }

  private updateStatus(patch: Partial<AdapterSnapshot>): void {
    this._status = { ...this._status, ...patch };
    this.emit("status", this._status);
  }
}

export default DiscordAdapter;
