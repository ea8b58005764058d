import { z } from "zod";
import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { AdvisorConfigSchema, type AdvisorConfigInput } from "@codeblock-advisor/core";

const DATA_DIR = join(homedir(), ".codeblock-advisor");
const CONFIG_FILE = join(DATA_DIR, "config.json");

// Discord bot config schema
export const BotConfigSchema = z.object({
  botToken: z.string().optional(),
  /** Channel IDs to watch; empty means every channel the bot can read */
  allowFrom: z.array(z.string()).default([]),
  /** Skip messages written by bots, including this one */
  ignoreBots: z.boolean().default(true),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  /** Passed to the advisor as is; validated when the advisor is built */
  advisor: z.record(z.string(), z.unknown()).default({}),
});

export type BotConfig = z.infer<typeof BotConfigSchema>;

export function getConfigPath(): string {
  return process.env.CODEBLOCK_ADVISOR_CONFIG ?? CONFIG_FILE;
}

/**
 * Load the bot config from `path`. A missing, unreadable or invalid file
 * yields the defaults. `DISCORD_BOT_TOKEN` overrides the file's token.
 */
export function loadBotConfig(
  path: string = getConfigPath(),
  env: NodeJS.ProcessEnv = process.env,
): BotConfig {
  let config = BotConfigSchema.parse({});

  if (existsSync(path)) {
    try {
      const raw = readFileSync(path, "utf-8");
      config = BotConfigSchema.parse(JSON.parse(raw));
    } catch (err) {
      console.warn(`[config] Ignoring ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  const token = env.DISCORD_BOT_TOKEN;
  return token ? { ...config, botToken: token } : config;
}

/**
 * Validate the advisor section of the bot config. The bot's log level applies
 * unless the section sets its own.
 */
export function parseAdvisorSection(config: BotConfig): AdvisorConfigInput {
  return AdvisorConfigSchema.parse({ logLevel: config.logLevel, ...config.advisor });
}
