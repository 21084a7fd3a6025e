// services/canonicalizeText.ts

/**
 * Deterministic cleanup for scraped and model-authored strings.
 * Every function here is pure and total: any string in, a string out.
 */

const COMBINING_MARKS = "[\\u0300-\\u036f]*";

export interface DiacriticVariant {
  // Spelling written into the catalog, e.g. "Açaí"
  canonical: string;
  // Word family without marks, e.g. "acai"
  base: string;
}

export interface WordForm {
  from: string;
  to: string;
}

export interface Vocabulary {
  diacriticVariants: DiacriticVariant[];
  wordForms: WordForm[];
}

export const EMPTY_VOCABULARY: Vocabulary = { diacriticVariants: [], wordForms: [] };

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function collapseDuplicateWords(text: string): string {
  const words = text.replace(/[/\\]/g, " ").split(/\s+/).filter(Boolean);

  const kept: string[] = [];
  for (const word of words) {
    const previous = kept[kept.length - 1];
    if (previous !== undefined && previous.toLowerCase() === word.toLowerCase()) continue;
    kept.push(word);
  }

  return kept.join(" ");
}

/**
 * Builds a pattern matching `word` with any combination of combining
 * diacritics after each letter. Intended for NFD text.
 */
export function variantPatternFor(word: string): RegExp {
  const letters = [...word.normalize("NFD").replace(/[\u0300-\u036f]/g, "")];
  const body = letters.map(ch => escapeRegExp(ch) + COMBINING_MARKS).join("");
  return new RegExp(`(?<![\\p{L}\\p{M}])${body}(?![\\p{L}\\p{M}])`, "giu");
}

export function foldDiacriticVariant(
  text: string,
  canonicalForm: string,
  variantPattern: RegExp
): string {
  const flags = new Set(variantPattern.flags);
  flags.add("g");
  flags.add("i");
  const pattern = new RegExp(variantPattern.source, [...flags].join(""));
  const replacement = canonicalForm.normalize("NFC");

  return text
    .normalize("NFD")
    .replace(pattern, () => replacement)
    .normalize("NFC");
}

export function stripDisallowedCharacters(text: string, allowedExtraPunctuation = ""): string {
  const extra = [...allowedExtraPunctuation]
    .map(ch => ch.replace(/[\\\]\[^-]/, "\\$&"))
    .join("");
  const disallowed = new RegExp(`[^\\p{L}\\p{M}\\p{N}\\s${extra}]`, "gu");

  return text.replace(disallowed, "").replace(/\s+/g, " ").trim();
}

export function stripTrailingPeriod(text: string): string {
  return text.replace(/\.$/, "");
}

export function repairPunctuationSpacing(text: string): string {
  const spaced = text
    .replace(/\s+([.,!?])/g, "$1")
    .replace(/([.,!?])\s+(?=[^\p{L}\p{N}\s])/gu, "$1")
    .replace(/[.,!?](?=[\p{L}\p{N}])/gu, (mark: string, offset: number, whole: string) => {
      // 3.5 and 1,000 stay intact
      const before = whole.charAt(offset - 1);
      const after = whole.charAt(offset + 1);
      if ((mark === "." || mark === ",") && /\d/.test(before) && /\d/.test(after)) {
        return mark;
      }
      return `${mark} `;
    })
    .trim();

  return stripTrailingPeriod(spaced);
}

export function capitalizeSecondToken(text: string): string {
  const tokens = text.split("-");
  if (tokens.length < 2) return text;

  const [first, second, ...rest] = tokens;
  return [first, second.charAt(0).toUpperCase() + second.slice(1), ...rest].join("-");
}

function isAllCaps(token: string): boolean {
  return token !== token.toLowerCase() && token === token.toUpperCase();
}

export function titlecaseAllCapsWords(text: string): string {
  return text
    .split(/(\s+)/)
    .map(token => (isAllCaps(token) ? token.charAt(0) + token.slice(1).toLowerCase() : token))
    .join("");
}

export function normalizeVocabulary(text: string, vocabulary: Vocabulary): string {
  let result = text;

  for (const variant of vocabulary.diacriticVariants) {
    result = foldDiacriticVariant(result, variant.canonical, variantPatternFor(variant.base));
  }

  for (const form of vocabulary.wordForms) {
    const pattern = new RegExp(
      `(?<![\\p{L}\\p{N}])${escapeRegExp(form.from)}(?![\\p{L}\\p{N}])`,
      "giu"
    );
    result = result.replace(pattern, () => form.to);
  }

  return result;
}
