import { describe, it, expect } from "vitest";
import { exampleContent, getExample } from "./examples.js";

describe("exampleContent", () => {
  it("uses a runnable snippet for Python aliases", () => {
    expect(exampleContent("python")).toBe("python\nprint('Hello, world!')");
  });

  it("keeps the casing the user typed for Python aliases", () => {
    expect(exampleContent("PyThOn")).toBe("PyThOn\nprint('Hello, world!')");
    expect(exampleContent("PY")).toBe("PY\nprint('Hello, world!')");
  });

  it("uses a placeholder body for other languages", () => {
    expect(exampleContent("Ruby")).toBe("Ruby\n...");
  });

  it("has no language label when the language is empty", () => {
    expect(exampleContent("")).toBe("\nHello, world!");
  });

  it("accepts a custom alias list", () => {
    expect(exampleContent("snake", ["snake"])).toBe("snake\nprint('Hello, world!')");
    expect(exampleContent("python", ["snake"])).toBe("python\n...");
  });
});

describe("getExample", () => {
  it("renders the escaped source and the live block", () => {
    expect(getExample("py")).toBe(
      "\\`\\`\\`py\nprint('Hello, world!')\n\\`\\`\\`\n\n" +
        "**This will result in the following:**\n" +
        "```py\nprint('Hello, world!')```",
    );
  });

  it("renders a block without a language", () => {
    expect(getExample("")).toBe(
      "\\`\\`\\`\nHello, world!\n\\`\\`\\`\n\n" +
        "**This will result in the following:**\n" +
        "```\nHello, world!```",
    );
  });

  it("starts with the escaped fence followed by a foreign language as typed", () => {
    const example = getExample("TypeScript");
    expect(example.split("\n")[0]).toBe("\\`\\`\\`TypeScript");
    expect(example.split("\n")[1]).toBe("...");
  });

  it("tolerates fence characters inside the language", () => {
    const escaped = "\\`\\`\\`";
    const fence = "```";
    expect(getExample(fence)).toBe(
      `${escaped}${fence}\n...\n${escaped}\n\n` +
        "**This will result in the following:**\n" +
        `${fence}${fence}\n...${fence}`,
    );
  });
});
