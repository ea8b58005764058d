/**
 * Markdown code block scanner.
 *
 * Locates anything resembling a fenced code block, including fences made of
 * characters people confuse with the backtick (quotes, acute accents, tildes).
 * Only fenced blocks are recognized; the rest of the Markdown is ignored.
 */

import { BACKTICK, DEFAULT_FENCE_CHARACTERS, DEFAULT_PYTHON_ALIASES } from "./config.js";
import type { CodeBlock, LanguageTagIssue, ScanResult } from "./types.js";

export type ScanOptions = {
  /** The fence character of a valid block */
  canonicalFence?: string;
  fenceCharacters?: readonly string[];
  /** Blocks whose body has fewer lines are skipped */
  minimumLines?: number;
};

const ALL_VALID: ScanResult = { kind: "all-valid" };

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\-]/g, "\\$&");
}

/**
 * Build the block pattern for a set of fence characters.
 *
 * Groups: `ticks` (the opening fence), `tick` (its character), `lang` (tag
 * plus its newline, only when the newline directly follows) and `code`.
 */
function buildBlockPattern(fenceCharacters: readonly string[]): RegExp {
  const ticks = fenceCharacters.map(escapeRegExp).join("");
  return new RegExp(
    `(?<ticks>(?<tick>[${ticks}])\\k<tick>{2})` +
      `(?<lang>[A-Za-z0-9+\\-.]+\\n)?` +
      `(?<code>.+?)` +
      `\\k<ticks>`,
    "gs",
  );
}

const patternCache = new Map<string, RegExp>();

function blockPattern(fenceCharacters: readonly string[]): RegExp {
  const key = fenceCharacters.join("");
  let pattern = patternCache.get(key);
  if (!pattern) {
    pattern = buildBlockPattern(fenceCharacters);
    patternCache.set(key, pattern);
  }
  return pattern;
}

/**
 * True if `text` has at least `count` lines.
 * A trailing newline does not start an extra line.
 */
export function hasLines(text: string, count: number): boolean {
  const parts = text.split("\n");
  if (parts.length < count) return false;
  return parts.slice(count - 1).join("\n").length > 0;
}

/**
 * Find every Markdown code block in `message`.
 *
 * Returns `all-valid` as soon as one block uses the canonical fence and has a
 * language tag: the author already knows how to format code. Otherwise lists
 * the located blocks, which is empty when the message has no fences at all.
 */
export function findCodeBlocks(message: string, options: ScanOptions = {}): ScanResult {
  const canonicalFence = options.canonicalFence ?? BACKTICK;
  const fenceCharacters = options.fenceCharacters ?? DEFAULT_FENCE_CHARACTERS;
  const minimumLines = options.minimumLines ?? 1;

  const blocks: CodeBlock[] = [];
  for (const match of message.matchAll(blockPattern(fenceCharacters))) {
    const groups = match.groups ?? {};
    const tick = groups.tick ?? "";
    const language = (groups.lang ?? "").trim();
    const content = groups.code ?? "";

    if (tick === canonicalFence && language) {
      return ALL_VALID;
    }
    if (hasLines(content, minimumLines)) {
      blocks.push({ content, language, tick });
    }
  }

  return { kind: "blocks", blocks };
}

const languagePatternCache = new Map<string, RegExp>();

function languagePattern(aliases: readonly string[]): RegExp {
  const key = aliases.join("|");
  let pattern = languagePatternCache.get(key);
  if (!pattern) {
    const alternatives = [...aliases]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp)
      .join("|");
    pattern = new RegExp(
      `^(?<spaces>\\s+)?(?<lang>${alternatives})(?![A-Za-z0-9+\\-.])(?<newline>\\n)?`,
      "i",
    );
    languagePatternCache.set(key, pattern);
  }
  return pattern;
}

/**
 * Inspect the language tag line at the start of a block body.
 *
 * Returns null unless the body opens with a Python alias. Tags for other
 * languages are not checked.
 */
export function parseBadLanguage(
  content: string,
  aliases: readonly string[] = DEFAULT_PYTHON_ALIASES,
): LanguageTagIssue | null {
  const match = languagePattern(aliases).exec(content);
  if (!match?.groups?.lang) return null;

  return {
    language: match.groups.lang,
    hasLeadingWhitespace: match.groups.spaces !== undefined,
    hasTrailingNewline: match.groups.newline !== undefined,
  };
}
