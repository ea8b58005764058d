import { createAdvisor, createLogger } from "@codeblock-advisor/core";
import { getConfigPath, loadBotConfig, parseAdvisorSection } from "./config.js";
import { DiscordAdapter } from "./index.js";
import { CodeblockResponder } from "./responder.js";

async function main(): Promise<void> {
  const config = loadBotConfig();
  const log = createLogger("bot", config.logLevel);

  log.info("Starting code block advisor...");
  log.info(`Config: ${getConfigPath()}`);

  const advisor = createAdvisor(parseAdvisorSection(config));
  const responder = new CodeblockResponder(advisor, {
    allowFrom: config.allowFrom,
    ignoreBots: config.ignoreBots,
    logger: createLogger("responder", config.logLevel),
  });
  const adapter = new DiscordAdapter(responder, createLogger("discord", config.logLevel));

  adapter.on("error", (err, context) => {
    log.error(`Adapter error${context ? ` (${context})` : ""}`, err);
  });
  adapter.on("reply", (msg, result) => {
    if (!result.success) log.warn(`Reply to ${msg.id} failed: ${result.error ?? "unknown error"}`);
  });

  const controller = new AbortController();
  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down...`);
    controller.abort();
    adapter.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("Shutdown failed", err);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await adapter.start(config.botToken, controller.signal);
  log.info(`Watching ${config.allowFrom.length > 0 ? config.allowFrom.join(", ") : "all channels"}`);
}

main().catch((err: unknown) => {
  console.error("[bot] Fatal error:", err);
  process.exit(1);
});
