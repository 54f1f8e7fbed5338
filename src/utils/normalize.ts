const WORD_CHAR = String.raw`[\p{L}\p{N}_]`;

export const escapeRegExp = (s: string) =>
  s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Build a regex matching any of `words` only when it is not glued to another
 * letter, digit or underscore. Unlike `\b`, this also bounds non-ASCII letters
 * such as the trailing Ü in "USULÜ".
 */
export function wholeWord(words: readonly string[], flags = "g"): RegExp {
  const alt = words.map(escapeRegExp).join("|");
  return new RegExp(
    `(?<!${WORD_CHAR})(?:${alt})(?!${WORD_CHAR})`,
    `${flags}u`
  );
}

export const collapseSpaces = (s: string) => s.replace(/\s+/g, " ").trim();

/** Turkish-aware lowercase: İ→i and I→ı must happen before toLowerCase() */
export function normalizeTurkish(text: string): string {
  if (!text) return "";
  return text.replace(/İ/g, "i").replace(/I/g, "ı").toLowerCase();
}
