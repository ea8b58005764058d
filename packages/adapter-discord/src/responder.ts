import type { CodeblockAdvisor, Logger } from "@codeblock-advisor/core";
import type { InboundMessage } from "./types.js";

export type ResponderOptions = {
  /** Channel IDs to answer in; empty means all */
  allowFrom?: readonly string[];
  ignoreBots?: boolean;
  logger: Logger;
};

/**
 * Decides whether an inbound chat message gets formatting instructions.
 */
export class CodeblockResponder {
  private advisor: CodeblockAdvisor;
  private allowFrom: ReadonlySet<string>;
  private ignoreBots: boolean;
  private log: Logger;

  constructor(advisor: CodeblockAdvisor, options: ResponderOptions) {
    this.advisor = advisor;
    this.allowFrom = new Set(options.allowFrom ?? []);
    this.ignoreBots = options.ignoreBots ?? true;
    this.log = options.logger;
  }

  /** Reply text for `msg`, or null when the message should be left alone. */
  handle(msg: InboundMessage): string | null {
    if (this.ignoreBots && msg.author.bot) return null;

    if (this.allowFrom.size > 0 && !this.allowFrom.has(msg.channelId)) {
      this.log.debug(`Ignoring message ${msg.id} in channel ${msg.channelId} (not in allowlist)`);
      return null;
    }

    if (!msg.text.trim()) return null;

    const instructions = this.advisor.getInstructions(msg.text);
    if (instructions !== null) {
      this.log.info(`Formatting instructions for ${msg.author.username} in ${msg.channelId}`);
    }
    return instructions;
  }
}
