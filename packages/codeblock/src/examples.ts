import { DEFAULT_PYTHON_ALIASES } from "./config.js";

// Markdown symbols in these bodies must stay escaped
const EXAMPLE_PY_BODY = "print('Hello, world!')";
const EXAMPLE_PLAIN_BODY = "Hello, world!";
const ESCAPED_FENCE = "\\`\\`\\`";
const LIVE_FENCE = "```";

/**
 * Pick the body of the example block for `language`.
 * Python aliases get a runnable snippet; other languages only a placeholder.
 */
export function exampleContent(
  language: string,
  pythonAliases: readonly string[] = DEFAULT_PYTHON_ALIASES,
): string {
  if (pythonAliases.includes(language.toLowerCase())) {
    return `${language}\n${EXAMPLE_PY_BODY}`;
  }
  if (language) {
    return `${language}\n...`;
  }
  return `\n${EXAMPLE_PLAIN_BODY}`;
}

/**
 * Render a correct code block for `language` twice: escaped, showing what to
 * type, then live, showing how Discord displays it.
 */
export function getExample(
  language: string,
  pythonAliases: readonly string[] = DEFAULT_PYTHON_ALIASES,
): string {
  const content = exampleContent(language, pythonAliases);
  return (
    `${ESCAPED_FENCE}${content}\n${ESCAPED_FENCE}\n\n` +
    "**This will result in the following:**\n" +
    `${LIVE_FENCE}${content}${LIVE_FENCE}`
  );
}
