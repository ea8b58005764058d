/**
 * Code block formatting instructions.
 *
 * Given a chat message, decides what (if anything) is wrong with the way it
 * formats code and writes one message explaining how to fix it. Checks run
 * as an ordered list of rules; the first rule that applies and produces text
 * wins.
 */

import { type AdvisorConfig, type AdvisorConfigInput, resolveConfig } from "./config.js";
import { appendFurthermore } from "./compose.js";
import { getExample } from "./examples.js";
import { type Logger, createLogger } from "./logger.js";
import { findCodeBlocks, parseBadLanguage } from "./parsing.js";
import { isPythonCode, isReplCode } from "./python.js";
import type { CodeBlock, LanguageTagIssue, ScanResult } from "./types.js";

// ─── Collaborators ──────────────────────────────────────────────────────────

/** The scanner, tag analyzer and classifier the advisor relies on. */
export type AdvisorCollaborators = {
  scan(text: string): ScanResult;
  analyzeTag(body: string): LanguageTagIssue | null;
  looksLikePythonSource(text: string): boolean;
  looksLikePythonRepl(text: string): boolean;
};

export function defaultCollaborators(config: AdvisorConfig): AdvisorCollaborators {
  return {
    scan: (text) =>
      findCodeBlocks(text, {
        canonicalFence: config.canonicalFence,
        fenceCharacters: config.fenceCharacters,
        minimumLines: config.minimumLines,
      }),
    analyzeTag: (body) => parseBadLanguage(body, config.pythonAliases),
    looksLikePythonSource: isPythonCode,
    looksLikePythonRepl: (text) => isReplCode(text, config.replThreshold),
  };
}

// ─── Rules ──────────────────────────────────────────────────────────────────

export type RuleName = "missing-fence" | "bad-fence" | "malformed-tag" | "missing-tag";

export type AdvisorContext = {
  readonly text: string;
  readonly blocks: readonly CodeBlock[];
};

export type AdvisorRule = {
  readonly name: RuleName;
  readonly applies: (ctx: AdvisorContext) => boolean;
  readonly handle: (ctx: AdvisorContext) => string | null;
};

export type AdvisorOptions = {
  collaborators?: Partial<AdvisorCollaborators>;
  logger?: Logger;
};

const EXAMPLE_HEADER = "**Here is an example of how it should look:**";
const METHOD_HEADER = "**To do this, use the following method:**";

export class CodeblockAdvisor {
  readonly config: AdvisorConfig;
  readonly rules: readonly AdvisorRule[];
  private collaborators: AdvisorCollaborators;
  private log: Logger;

  constructor(config: AdvisorConfigInput = {}, options: AdvisorOptions = {}) {
    this.config = resolveConfig(config);
    const defaults = defaultCollaborators(this.config);
    const custom = options.collaborators ?? {};
    this.collaborators = {
      scan: custom.scan ?? defaults.scan,
      analyzeTag: custom.analyzeTag ?? defaults.analyzeTag,
      looksLikePythonSource: custom.looksLikePythonSource ?? defaults.looksLikePythonSource,
      looksLikePythonRepl: custom.looksLikePythonRepl ?? defaults.looksLikePythonRepl,
    };
    this.log = options.logger ?? createLogger("advisor", this.config.logLevel);

    const rules: AdvisorRule[] = [
      {
        name: "missing-fence",
        applies: (ctx) => ctx.blocks.length === 0,
        handle: (ctx) => this.getNoTicksMessage(ctx.text),
      },
      {
        name: "bad-fence",
        applies: (ctx) => this.findBadTicks(ctx.blocks) !== undefined,
        handle: (ctx) => {
          const block = this.findBadTicks(ctx.blocks);
          return block ? this.getBadTicksMessage(block) : null;
        },
      },
      {
        name: "malformed-tag",
        applies: (ctx) => ctx.blocks.length > 0 && this.findBadTicks(ctx.blocks) === undefined,
        handle: (ctx) => this.getBadLanguageMessage(ctx.blocks[0].content),
      },
      {
        name: "missing-tag",
        applies: (ctx) =>
          ctx.blocks.length > 0 &&
          this.findBadTicks(ctx.blocks) === undefined &&
          !ctx.blocks[0].language,
        handle: (ctx) => this.getNoLanguageMessage(ctx.blocks[0].content),
      },
    ];
    this.rules = Object.freeze(rules);
  }

  /**
   * Return formatting instructions for `message`, or null when nothing is
   * wrong or the problem falls outside what can be diagnosed.
   */
  getInstructions(message: string): string | null {
    this.log.debug("Getting formatting instructions.");

    const result = this.collaborators.scan(message);
    if (result.kind === "all-valid") {
      this.log.debug("At least one valid code block found; no instructions to return.");
      return null;
    }

    const ctx: AdvisorContext = { text: message, blocks: result.blocks };
    for (const rule of this.rules) {
      if (!rule.applies(ctx)) continue;

      this.log.debug(`Rule ${rule.name} applies to ${result.blocks.length} block(s).`);
      const instructions = rule.handle(ctx);
      if (instructions !== null) return instructions;
    }

    this.log.debug("No rule produced instructions.");
    return null;
  }

  /** Example block for `language`, using the configured Python aliases. */
  getExample(language: string): string {
    return getExample(language, this.config.pythonAliases);
  }

  private findBadTicks(blocks: readonly CodeBlock[]): CodeBlock | undefined {
    return blocks.find((block) => block.tick !== this.config.canonicalFence);
  }

  private looksLikePython(text: string): boolean {
    return (
      this.collaborators.looksLikePythonRepl(text) ||
      this.collaborators.looksLikePythonSource(text)
    );
  }

  private getBadTicksMessage(block: CodeBlock): string {
    this.log.debug(`Creating instructions for incorrect code block ticks (${block.tick}).`);

    const validTicks = `\\${this.config.canonicalFence}`.repeat(3);
    const instructions =
      "It looks like you are trying to paste code into this channel.\n\n" +
      "You seem to be using the wrong symbols to indicate where the code block should start. " +
      `The correct symbols would be ${validTicks}, not \`${block.tick.repeat(3)}\`.`;

    let addition = this.getBadLanguageMessage(block.content);
    if (addition === null && !block.language) {
      addition = this.getNoLanguageMessage(block.content);
    }

    // The addition already carries its own example block
    if (addition !== null) {
      this.log.debug("Language specifier issue found; appending additional instructions.");
      return appendFurthermore(instructions, addition);
    }

    this.log.debug("No issues with the language specifier found.");
    return `${instructions}\n\n${EXAMPLE_HEADER}\n${this.getExample(block.language)}`;
  }

  private getNoTicksMessage(content: string): string | null {
    this.log.debug("Creating instructions for a missing code block.");

    if (!this.looksLikePython(content)) {
      this.log.debug("Aborting missing code block instructions: content is not Python code.");
      return null;
    }

    return (
      "It looks like you're trying to paste code into this channel.\n\n" +
      "Discord has support for Markdown, which allows you to post code with full " +
      "syntax highlighting. Please use these whenever you paste code, as this " +
      "helps improve the legibility and makes it easier for us to help you.\n\n" +
      `${METHOD_HEADER}\n${this.getExample("python")}`
    );
  }

  // The first paragraph break is where appendFurthermore joins the message
  private getBadLanguageMessage(content: string): string | null {
    this.log.debug("Creating instructions for a poorly specified language.");

    const issue = this.collaborators.analyzeTag(content);
    if (!issue) {
      this.log.debug("Aborting bad language instructions: language specified isn't Python.");
      return null;
    }

    const { language } = issue;
    const lines: string[] = [];

    if (issue.hasLeadingWhitespace) {
      lines.push(`Make sure there are no spaces between the back ticks and \`${language}\`.`);
    }
    if (!issue.hasTrailingNewline) {
      lines.push(
        `Make sure you put your code on a new line following \`${language}\`. ` +
          `There must not be any spaces after \`${language}\`.`,
      );
    }

    if (lines.length === 0) {
      this.log.debug("Nothing wrong with the language specifier; no instructions to return.");
      return null;
    }

    return (
      "It looks like you incorrectly specified a language for your code block.\n\n" +
      lines.join(" ") +
      `\n\n${EXAMPLE_HEADER}\n${this.getExample(language)}`
    );
  }

  private getNoLanguageMessage(content: string): string | null {
    this.log.debug("Creating instructions for a missing language.");

    if (!this.looksLikePython(content)) {
      this.log.debug("Aborting missing language instructions: content is not Python code.");
      return null;
    }

    return (
      "It looks like you pasted Python code without syntax highlighting.\n\n" +
      "Please use syntax highlighting to improve the legibility of your code and make " +
      "it easier for us to help you.\n\n" +
      `${METHOD_HEADER}\n${this.getExample("python")}`
    );
  }
}

// ─── Default Advisor ────────────────────────────────────────────────────────

let defaultAdvisor: CodeblockAdvisor | null = null;

/**
 * Build an advisor with its configuration validated once and closed over.
 */
export function createAdvisor(
  config: AdvisorConfigInput = {},
  options: AdvisorOptions = {},
): CodeblockAdvisor {
  return new CodeblockAdvisor(config, options);
}

/** Formatting instructions for `message` using the default configuration. */
export function getInstructions(message: string): string | null {
  if (!defaultAdvisor) defaultAdvisor = new CodeblockAdvisor();
  return defaultAdvisor.getInstructions(message);
}
