import keywords from "../data/allergen-keywords.json";
import { normalizeTurkish, wholeWord } from "../utils/normalize";
import type { Allergen, AllergenFlags, Flag } from "../types";

export const ALLERGENS = ["gluten", "milk", "egg", "fish"] as const;

export const ALLERGEN_KEYWORDS: Readonly<Record<Allergen, readonly string[]>> =
  Object.freeze({
    gluten: Object.freeze([...keywords.gluten]),
    milk: Object.freeze([...keywords.milk]),
    egg: Object.freeze([...keywords.egg]),
    fish: Object.freeze([...keywords.fish]),
  });

/** Keywords this short only count as whole words ("un" vs "tuna") */
export const SHORT_KEYWORD_MAX = 2;

/** 1 if any keyword occurs in `text`, else 0 */
export function checkAllergen(text: string, words: readonly string[]): 0 | 1 {
  if (!text) return 0;
  const subject = normalizeTurkish(text);

  for (const word of words) {
    const kw = normalizeTurkish(word);
    if (!kw) continue;
    const hit =
      kw.length <= SHORT_KEYWORD_MAX
        ? wholeWord([kw], "").test(subject)
        : subject.includes(kw);
    if (hit) return 1;
  }
  return 0;
}

const toFlag = (hit: 0 | 1): Flag => (hit ? "1" : "0");

/** Flags for all four categories, inferred from the Turkish name only */
export function classifyAllergens(nameTr: string): AllergenFlags {
  const flag = (a: Allergen) => toFlag(checkAllergen(nameTr, ALLERGEN_KEYWORDS[a]));
  return {
    gluten: flag("gluten"),
    milk: flag("milk"),
    egg: flag("egg"),
    fish: flag("fish"),
  };
}
