import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { BotConfigSchema, loadBotConfig, parseAdvisorSection } from "./config.js";

describe("loadBotConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "codeblock-advisor-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file is missing", () => {
    const config = loadBotConfig(path.join(dir, "missing.json"), {});
    expect(config).toEqual({ allowFrom: [], ignoreBots: true, logLevel: "info", advisor: {} });
  });

  it("reads the file", () => {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(
      file,
      JSON.stringify({ botToken: "test-token", allowFrom: ["c1"], advisor: { minimumLines: 4 } }),
    );

    const config = loadBotConfig(file, {});

    expect(config.botToken).toBe("test-token");
    expect(config.allowFrom).toEqual(["c1"]);
    expect(config.advisor).toEqual({ minimumLines: 4 });
  });

  it("lets the environment override the token", () => {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, JSON.stringify({ botToken: "file-token" }));

    expect(loadBotConfig(file, { DISCORD_BOT_TOKEN: "env-token" }).botToken).toBe("env-token");
  });

  it("falls back to defaults for an invalid file", () => {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, "{ not json");

    const config = loadBotConfig(file, {});
    expect(config).toEqual(BotConfigSchema.parse({}));
  });
});

describe("parseAdvisorSection", () => {
  it("inherits the bot's log level", () => {
    const config = BotConfigSchema.parse({ logLevel: "debug", advisor: { replThreshold: 2 } });
    expect(parseAdvisorSection(config)).toMatchObject({ logLevel: "debug", replThreshold: 2 });
  });

  it("rejects invalid advisor settings", () => {
    const config = BotConfigSchema.parse({ advisor: { minimumLines: 0 } });
    expect(() => parseAdvisorSection(config)).toThrow();
  });
});
