import { z } from "zod";

export const BACKTICK = "`";

// Order matters: longer aliases first so "py" never shadows "python"
export const DEFAULT_PYTHON_ALIASES = ["python3", "python", "pycon", "py"] as const;

// Characters people mistake for a backtick, plus the tilde fence
export const DEFAULT_FENCE_CHARACTERS = [
  BACKTICK,
  "'",
  '"',
  "´",
  "‘",
  "’",
  "“",
  "”",
  "~",
] as const;

const singleCharacter = z.string().length(1);

export const AdvisorConfigSchema = z
  .object({
    /** The fence character a valid code block must use */
    canonicalFence: singleCharacter.default(BACKTICK),
    /** Every character the scanner treats as an attempted fence */
    fenceCharacters: z.array(singleCharacter).min(1).default([...DEFAULT_FENCE_CHARACTERS]),
    /** Case-insensitive language tags accepted as Python */
    pythonAliases: z.array(z.string().min(1)).min(1).default([...DEFAULT_PYTHON_ALIASES]),
    /** Blocks whose body has fewer lines are ignored by the scanner */
    minimumLines: z.number().int().min(1).default(1),
    /** Prompt lines (">>> " or "... ") needed before text counts as a REPL session */
    replThreshold: z.number().int().min(1).default(3),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .refine((c) => c.fenceCharacters.includes(c.canonicalFence), {
    message: "fenceCharacters must include canonicalFence",
    path: ["fenceCharacters"],
  });

type ParsedConfig = z.infer<typeof AdvisorConfigSchema>;

export type AdvisorConfig = Readonly<
  Omit<ParsedConfig, "fenceCharacters" | "pythonAliases"> & {
    fenceCharacters: readonly string[];
    pythonAliases: readonly string[];
  }
>;
export type AdvisorConfigInput = z.input<typeof AdvisorConfigSchema>;

/**
 * Validate `input` and return a frozen configuration.
 * Aliases are lower-cased and sorted longest first.
 */
export function resolveConfig(input: AdvisorConfigInput = {}): AdvisorConfig {
  const parsed = AdvisorConfigSchema.parse(input);
  const aliases = [...new Set(parsed.pythonAliases.map((a) => a.toLowerCase()))]
    .sort((a, b) => b.length - a.length);

  return Object.freeze({
    ...parsed,
    fenceCharacters: Object.freeze([...parsed.fenceCharacters]),
    pythonAliases: Object.freeze(aliases),
  });
}
