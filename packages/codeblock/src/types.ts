// A fenced block located by the scanner, possibly malformed
export type CodeBlock = {
  readonly content: string;
  readonly language: string;
  readonly tick: string;
};

// Result of scanning a message for code blocks.
// An empty `blocks` list means no fenced block was located at all.
export type ScanResult =
  | { readonly kind: "all-valid" }
  | { readonly kind: "blocks"; readonly blocks: readonly CodeBlock[] };

// Problems found on the language tag line of a Python code block
export type LanguageTagIssue = {
  readonly language: string;
  readonly hasLeadingWhitespace: boolean;
  readonly hasTrailingNewline: boolean;
};

export type LogLevel = "debug" | "info" | "warn" | "error";
