const DOUBLE_QUOTE_ESCAPABLE = new Set(['"', "\\", "$", "`", "\n"]);

function isBlank(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

/**
 * Splits a command line into words using POSIX shell quoting rules.
 *
 * Single quotes are literal, double quotes honour backslash escapes of
 * `"`, `\`, `$`, backtick and newline, and a backslash outside quotes escapes
 * the next character. Returns null when a quote is left open or the line ends
 * in a lone backslash.
 */
export function tokenize(text: string): string[] | null {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;
  let escaped = false;

  for (const ch of text) {
    if (escaped) {
      if (quote === '"' && !DOUBLE_QUOTE_ESCAPABLE.has(ch)) {
        current += "\\";
      }
      current += ch;
      escaped = false;
      inWord = true;
      continue;
    }

    if (quote === "'") {
      if (ch === "'") {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "\\") {
      escaped = true;
      inWord = true;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
      continue;
    }

    if (isBlank(ch)) {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
      continue;
    }

    current += ch;
    inWord = true;
  }

  if (escaped || quote !== null) {
    return null;
  }
  if (inWord) {
    words.push(current);
  }
  return words;
}
