import { collapseSpaces, wholeWord } from "../utils/normalize";

/* ---------- EN ---------- */
// Known mistranslations, applied verbatim and in order before the word rules
const EN_FIXES: readonly [string, string][] = [
  ["SAUTEED OF SHRIMP", "Sauteed Shrimp"],
  ["ADANA STYLE KEBAP", "Adana Style Kebab"],
  ["ADANA STIL KEBAP", "Adana Style Kebab"],
];

// `i` does not fold I to ı or İ, so the Turkish spellings are listed
const EN_WORDS: readonly [RegExp, string][] = [
  [wholeWord(["STIL", "STıL", "STİL", "USULÜ", "USULU"], "gi"), "Style"],
  [wholeWord(["KEBAP"], "gi"), "Kebab"],
];

/* ---------- DE ---------- */
const DE_COMPOUNDS: readonly [string, string][] = [
  ["STILSUPPE", "SUPPE"],
  ["STILFILET", "FILET"],
  ["STILFRIKADELLE", "FRIKADELLE"],
];

// Two case-sensitive rules on purpose: "stil" and "sTIL" stay as they are
const DE_STANDALONE = [wholeWord(["STIL"]), wholeWord(["Stil"])];

export function improveEnglish(text: string): string {
  if (!text) return text;
  let out = EN_FIXES.reduce((s, [from, to]) => s.replaceAll(from, to), text);
  for (const [re, to] of EN_WORDS) out = out.replace(re, to);
  return out;
}

export function improveGerman(text: string): string {
  if (!text) return text;
  let out = DE_COMPOUNDS.reduce((s, [from, to]) => s.replaceAll(from, to), text);
  for (const re of DE_STANDALONE) out = out.replace(re, "");
  return collapseSpaces(out);
}

export function improveRussian(text: string): string {
  if (!text) return text;
  return collapseSpaces(text);
}
