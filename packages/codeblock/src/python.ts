/**
 * Heuristic Python detection.
 *
 * Decides whether a chunk of chat text is Python source or a Python REPL
 * session, without a Python runtime. The text is tokenized the way Python
 * tokenizes it, then each logical line is checked for a plausible shape.
 *
 * Text counts as source only if every line is plausible AND at least one line
 * does something (a statement, an assignment, a decorator or a call). A column
 * of bare words is valid Python, but it is not code anyone pasted.
 */

// ─── Tokenizer ──────────────────────────────────────────────────────────────

type TokenKind = "name" | "number" | "string" | "op" | "newline";

type Token = {
  kind: TokenKind;
  value: string;
  /** Whitespace separates this token from the one before it */
  spaced: boolean;
};

const OPERATORS = [
  "**=", "//=", ">>=", "<<=", "...",
  "->", ":=", "**", "//", "<<", ">>", "<=", ">=", "==", "!=",
  "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=", "@=",
  "+", "-", "*", "/", "%", "@", "&", "|", "^", "~", "<", ">",
  "(", ")", "[", "]", "{", "}", ",", ":", ".", ";", "=",
];

const CLOSING: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

const STRING_PREFIXES = new Set(["r", "u", "b", "f", "br", "rb", "fr", "rf"]);

const NUMBER_RE =
  /^(?:0[xX][0-9a-fA-F_]+|0[oO][0-7_]+|0[bB][01_]+|(?:\d[\d_]*\.?[\d_]*|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?[jJ]?)/;

const ID_START = /[\p{L}_]/u;
const ID_CONTINUE = /[\p{L}\p{N}_]/u;

function isQuote(ch: string | undefined): ch is "'" | '"' {
  return ch === "'" || ch === '"';
}

/**
 * Scan a string literal opening at `start`.
 * Returns the index just past the closing quote, or -1 if it never closes.
 */
function scanString(text: string, start: number): number {
  const quote = text[start];
  const triple = text.startsWith(quote.repeat(3), start);
  const delimiter = triple ? quote.repeat(3) : quote;

  let i = start + delimiter.length;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (!triple && ch === "\n") return -1;
    if (text.startsWith(delimiter, i)) return i + delimiter.length;
    i++;
  }
  return -1;
}

const WHITESPACE = new Set([" ", "\t", "\r", "\f", "\n"]);

/**
 * Tokenize `text` as Python. Returns null when Python's own tokenizer would
 * reject it: unknown characters, unterminated strings, unbalanced brackets,
 * an indented first line. Comments and blank lines produce no tokens.
 */
function tokenize(text: string): Token[] | null {
  const tokens: Token[] = [];
  const brackets: string[] = [];

  const pushNewline = () => {
    const last = tokens[tokens.length - 1];
    if (last && last.kind !== "newline") tokens.push({ kind: "newline", value: "\n", spaced: false });
  };

  // Returns false when the token opens the text on an indented line
  const push = (kind: TokenKind, start: number, end: number): boolean => {
    if (tokens.length === 0) {
      const lineStart = text.lastIndexOf("\n", start - 1) + 1;
      if (start > lineStart) return false;
    }
    const spaced = start > 0 && WHITESPACE.has(text[start - 1]);
    tokens.push({ kind, value: text.slice(start, end), spaced });
    return true;
  };

  let i = 0;
  while (i < text.length) {
    const ch = text[i];

    if (ch === "#") {
      while (i < text.length && text[i] !== "\n") i++;
      continue;
    }
    if (ch === "\\" && text[i + 1] === "\n") {
      i += 2;
      continue;
    }
    if (ch === "\n") {
      if (brackets.length === 0) pushNewline();
      i++;
      continue;
    }
    if (ch === " " || ch === "\t" || ch === "\r" || ch === "\f") {
      i++;
      continue;
    }

    if (isQuote(ch)) {
      const end = scanString(text, i);
      if (end < 0 || !push("string", i, end)) return null;
      i = end;
      continue;
    }

    const numberMatch = /\d/.test(ch) || (ch === "." && /\d/.test(text[i + 1] ?? ""))
      ? NUMBER_RE.exec(text.slice(i))
      : null;
    if (numberMatch) {
      const end = i + numberMatch[0].length;
      if (end < text.length && ID_CONTINUE.test(text[end])) return null;
      if (!push("number", i, end)) return null;
      i = end;
      continue;
    }

    if (ID_START.test(ch)) {
      let end = i + 1;
      while (end < text.length && ID_CONTINUE.test(text[end])) end++;
      const word = text.slice(i, end);

      if (isQuote(text[end]) && STRING_PREFIXES.has(word.toLowerCase())) {
        const stringEnd = scanString(text, end);
        if (stringEnd < 0 || !push("string", i, stringEnd)) return null;
        i = stringEnd;
        continue;
      }

      if (!push("name", i, end)) return null;
      i = end;
      continue;
    }

    const op = OPERATORS.find((candidate) => text.startsWith(candidate, i));
    if (!op) return null;

    if (op === "(" || op === "[" || op === "{") {
      brackets.push(op);
    } else if (op in CLOSING) {
      if (brackets.pop() !== CLOSING[op]) return null;
    }
    if (!push("op", i, i + op.length)) return null;
    i += op.length;
  }

  if (brackets.length > 0) return null;
  pushNewline();
  return tokens;
}

// ─── Line Shape ─────────────────────────────────────────────────────────────

const KEYWORDS = new Set([
  "and", "as", "assert", "async", "await", "break", "class", "continue",
  "def", "del", "elif", "else", "except", "finally", "for", "from", "global",
  "if", "import", "in", "is", "lambda", "nonlocal", "not", "or", "pass",
  "raise", "return", "try", "while", "with", "yield",
]);

// Keywords that make a line a statement on their own
const STATEMENT_KEYWORDS = new Set([
  "assert", "async", "break", "class", "continue", "def", "del", "elif",
  "else", "except", "finally", "for", "from", "global", "if", "import",
  "nonlocal", "pass", "raise", "return", "try", "while", "with", "yield",
]);

// Compound statement headers, which need a colon
const BLOCK_KEYWORDS = new Set([
  "async", "class", "def", "elif", "else", "except", "finally", "for", "if",
  "try", "while", "with",
]);

const SOFT_KEYWORDS = new Set(["match", "case"]);

const ASSIGNMENT_OPS = new Set([
  "=", ":=", "+=", "-=", "*=", "/=", "//=", "%=", "**=", ">>=", "<<=",
  "&=", "|=", "^=", "@=",
]);

// Operators that cannot end a line
const DANGLING_OPS = new Set([
  "+", "-", "*", "/", "//", "%", "**", "@", "&", "|", "^", "~", "<", ">",
  "<=", ">=", "==", "!=", "<<", ">>", ".", "->", ...ASSIGNMENT_OPS,
]);

// Operators that can open a line
const LEADING_OPS = new Set(["(", "[", "{", "-", "+", "~", "*", "**", "@", "..."]);

function isOperand(token: Token): boolean {
  if (token.kind === "number" || token.kind === "string") return true;
  return token.kind === "name" && !KEYWORDS.has(token.value);
}

function endsOperand(token: Token): boolean {
  return isOperand(token) || (token.kind === "op" && token.value in CLOSING);
}

function isName(token: Token | undefined, value?: string): boolean {
  return token?.kind === "name" && (value === undefined || token.value === value);
}

/**
 * True if the `(` after `tokens[index]` calls it: the paren touches the
 * callee, or the callee is an attribute (`os.getcwd ()`). "Thanks (again)"
 * is prose, not a call.
 */
function isCallee(tokens: Token[], index: number, paren: Token): boolean {
  const callee = tokens[index];
  if (!endsOperand(callee)) return false;
  if (!paren.spaced) return true;
  const before = tokens[index - 1];
  return callee.kind === "name" && before?.kind === "op" && before.value === ".";
}

function splitStatements(tokens: Token[]): Token[][] {
  const statements: Token[][] = [];
  let current: Token[] = [];
  let depth = 0;

  for (const token of tokens) {
    if (token.kind === "op") {
      if (token.value === "(" || token.value === "[" || token.value === "{") depth++;
      else if (token.value in CLOSING) depth--;
    }
    if (token.kind === "newline" || (token.kind === "op" && token.value === ";" && depth === 0)) {
      if (current.length > 0) statements.push(current);
      current = [];
      continue;
    }
    current.push(token);
  }
  if (current.length > 0) statements.push(current);
  return statements;
}

type StatementShape = "invalid" | "expression" | "statement";

function classifyStatement(tokens: Token[]): StatementShape {
  const first = tokens[0];
  const last = tokens[tokens.length - 1];

  if (first.kind === "op" && !LEADING_OPS.has(first.value)) return "invalid";
  if (last.kind === "op" && DANGLING_OPS.has(last.value)) return "invalid";

  // `match command:` and `case "x":` start with a name used as a keyword
  const softHeader = SOFT_KEYWORDS.has(first.value) && last.value === ":";

  let depth = 0;
  let hasColon = false;
  let hasAssignment = false;
  let hasCall = false;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const prev = tokens[i - 1];

    if (prev && endsOperand(prev) && isOperand(token)) {
      const concatenated = prev.kind === "string" && token.kind === "string";
      if (!concatenated && !(softHeader && i === 1)) return "invalid";
    }

    if (token.kind !== "op") continue;
    if (token.value === "(" || token.value === "[" || token.value === "{") {
      if (token.value === "(" && prev && isCallee(tokens, i - 1, token)) hasCall = true;
      depth++;
    } else if (token.value in CLOSING) {
      depth--;
    } else if (depth === 0 && token.value === ":") {
      hasColon = true;
    } else if (depth === 0 && ASSIGNMENT_OPS.has(token.value)) {
      hasAssignment = true;
    }
  }

  if (first.kind === "name" && STATEMENT_KEYWORDS.has(first.value)) {
    if (BLOCK_KEYWORDS.has(first.value) && !hasColon) return "invalid";
    if (first.value === "def" && !(isName(tokens[1]) && tokens[2]?.value === "(")) return "invalid";
    if (first.value === "class" && !isName(tokens[1])) return "invalid";
    if (first.value === "import" && !isName(tokens[1])) return "invalid";
    if (first.value === "from" && !tokens.some((t) => isName(t, "import"))) return "invalid";
    return "statement";
  }

  if (softHeader) return "statement";
  if (first.kind === "op" && first.value === "@" && isName(tokens[1])) return "statement";
  if (hasAssignment || hasCall) return "statement";
  return "expression";
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * True if `content` reads as Python source with at least one line that does
 * something beyond naming a value.
 */
export function isPythonCode(content: string): boolean {
  const tokens = tokenize(content.replace(/\0/g, ""));
  if (!tokens) return false;

  let substantive = false;
  for (const statement of splitStatements(tokens)) {
    const shape = classifyStatement(statement);
    if (shape === "invalid") return false;
    if (shape === "statement") substantive = true;
  }
  return substantive;
}

/**
 * True if `content` has at least `threshold` lines that start with a Python
 * REPL prompt (`>>> ` or `... `).
 */
export function isReplCode(content: string, threshold: number = 3): boolean {
  let replLines = 0;
  for (const line of content.split("\n")) {
    if (line.startsWith(">>> ") || line.startsWith("... ")) {
      replLines++;
      if (replLines >= threshold) return true;
    }
  }
  return false;
}
