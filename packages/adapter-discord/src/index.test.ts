import { describe, it, expect, vi } from "vitest";
import { createAdvisor, silentLogger } from "@codeblock-advisor/core";
import { DiscordAdapter, type ReplyFn } from "./index.js";
import { CodeblockResponder } from "./responder.js";
import type { InboundMessage, SendResult } from "./types.js";

function makeAdapter(): DiscordAdapter {
  const advisor = createAdvisor({}, { logger: silentLogger });
  const responder = new CodeblockResponder(advisor, { logger: silentLogger });
  return new DiscordAdapter(responder, silentLogger);
}

const message: InboundMessage = {
  id: "m1",
  channelId: "c1",
  author: { id: "u1", username: "alice", bot: false },
  text: "~~~python\nprint(1)\n~~~",
  timestamp: 1_700_000_000_000,
};

describe("DiscordAdapter.handleInbound", () => {
  it("posts the instructions as a reply", async () => {
    const adapter = makeAdapter();
    const reply = vi.fn<ReplyFn>(async () => ({ id: "r1", createdTimestamp: 1_700_000_000_500 }));

    const result = await adapter.handleInbound(message, reply);

    expect(reply).toHaveBeenCalledTimes(1);
    expect(reply.mock.calls[0][0]).toContain("not `~~~`");
    expect(result).toEqual({ success: true, messageId: "r1", timestamp: 1_700_000_000_500 });
    expect(adapter.getStatus().repliesSent).toBe(1);
  });

  it("does not reply when nothing is wrong", async () => {
    const adapter = makeAdapter();
    const reply = vi.fn<ReplyFn>();

    const result = await adapter.handleInbound({ ...message, text: "hello everyone" }, reply);

    expect(result).toBeNull();
    expect(reply).not.toHaveBeenCalled();
  });

  it("reports a failed reply", async () => {
    const adapter = makeAdapter();
    const reply = vi.fn<ReplyFn>(async () => {
      throw new Error("Missing Permissions");
    });
    const replies: SendResult[] = [];
    adapter.on("reply", (_msg, result) => replies.push(result));

    const result = await adapter.handleInbound(message, reply);

    expect(result?.success).toBe(false);
    expect(result?.error).toBe("Missing Permissions");
    expect(replies).toHaveLength(1);
    expect(adapter.getStatus()).toMatchObject({ lastError: "Missing Permissions", repliesSent: 0 });
  });

  it("requires a token to start", async () => {
    const adapter = makeAdapter();
    await expect(adapter.start(undefined, new AbortController().signal)).rejects.toThrow(
      "Discord botToken is required",
    );
  });
});
