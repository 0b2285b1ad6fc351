export type NormalizationMode = "search" | "display";

const ARABIC_DIACRITICS = /[\u064B-\u065F\u0670]/g;
const TATWEEL = /\u0640/g;
const ALEF_VARIANTS = /[\u0622\u0623\u0625\u0671]/g;
const ARABIC_INDIC_DIGITS = /[\u0660-\u0669]/g;
const EXTENDED_ARABIC_INDIC_DIGITS = /[\u06F0-\u06F9]/g;
const WESTERN_DIGITS = /[0-9]/g;

export const toWesternDigits = (text: string): string =>
  text
    .replace(ARABIC_INDIC_DIGITS, (digit) => String(digit.charCodeAt(0) - 0x0660))
    .replace(EXTENDED_ARABIC_INDIC_DIGITS, (digit) => String(digit.charCodeAt(0) - 0x06f0));

export const toArabicIndicDigits = (text: string): string =>
  text.replace(WESTERN_DIGITS, (digit) => String.fromCharCode(0x0660 + Number(digit)));

const normalizeForSearch = (text: string): string =>
  toWesternDigits(
    text
      .normalize("NFKC")
      .replace(ARABIC_DIACRITICS, "")
      .replace(TATWEEL, "")
      .replace(ALEF_VARIANTS, "ا")
      .replace(/ؤ/g, "و")
      .replace(/ئ/g, "ي")
      .replace(/ى/g, "ي")
      .replace(/ة/g, "ه")
  )
    .replace(/\s+/g, " ")
    .trim();

const normalizeForDisplay = (text: string): string =>
  toWesternDigits(text)
    .replace(/\r\n?/g, "\n")
    .replace(/[^\S\n]+/g, " ")
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();

/**
 * Canonicalizes Arabic legal text. `search` folds orthographic variants so that
 * lexical matching and hashing are stable; `display` only unifies digits and
 * whitespace so the text stays readable. Both modes are idempotent.
 */
export function normalizeText(text: string, mode: NormalizationMode): string {
  if (text.length === 0) {
    return "";
  }
  return mode === "search" ? normalizeForSearch(text) : normalizeForDisplay(text);
}

export interface NormalizedPages {
  text: string;
  pageBreakOffsets: number[] | null;
  pageCount: number;
}

export const isValidPageBreakOffsets = (offsets: readonly number[], textLength: number): boolean =>
  offsets.every(
    (offset, index) =>
      Number.isInteger(offset) &&
      offset >= 0 &&
      offset <= textLength &&
      (index === 0 || offset >= offsets[index - 1])
  );

/**
 * Display-normalizes each page separately and recomputes where every page after
 * the first starts in the normalized text.
 */
export function normalizePages(fullText: string, pageBreakOffsets: readonly number[] | null): NormalizedPages {
  if (!pageBreakOffsets || !isValidPageBreakOffsets(pageBreakOffsets, fullText.length)) {
    return { text: normalizeText(fullText, "display"), pageBreakOffsets: null, pageCount: 1 };
  }

  const boundaries = [0, ...pageBreakOffsets, fullText.length];
  let text = "";
  const offsets: number[] = [];

  for (let index = 0; index < boundaries.length - 1; index += 1) {
    const page = normalizeText(fullText.slice(boundaries[index], boundaries[index + 1]), "display");
    if (page.length > 0 && text.length > 0) {
      text += "\n\n";
    }
    if (index > 0) {
      offsets.push(text.length);
    }
    text += page;
  }

  return { text, pageBreakOffsets: offsets, pageCount: boundaries.length - 1 };
}

export const formatArticleLabel = (articleNumber: number | null): string =>
  articleNumber === null ? "تمهيد" : `مادة ${articleNumber}`;
