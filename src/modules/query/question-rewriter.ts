import type { Turn, TurnCitation } from "../sessions/types.js";
import { formatArticleLabel, normalizeText } from "../text/text-normalizer.js";

export const REFERRING_EXPRESSIONS = [
  "هذه المادة",
  "تلك المادة",
  "المادة السابقة",
  "المادة المذكورة",
  "نفس المادة",
  "المادة نفسها",
  "هذه المواد",
  "هذا النص",
  "هذا القانون",
  "ذلك القانون",
  "القانون المذكور",
  "نفس القانون",
  "this article",
  "that article",
  "the same article",
  "the previous article",
  "this law",
  "that law"
] as const;

const MAX_APPENDED_CITATIONS = 3;

const toComparable = (text: string): string =>
  ` ${normalizeText(text, "search").toLowerCase().replace(/[^\p{L}\p{N}]+/gu, " ").trim()} `;

const COMPARABLE_EXPRESSIONS = REFERRING_EXPRESSIONS.map(toComparable);

export const usesReferringExpression = (question: string): boolean => {
  const comparable = toComparable(question);
  return COMPARABLE_EXPRESSIONS.some((expression) => comparable.includes(expression));
};

const citationLabel = (citation: TurnCitation): string =>
  `${citation.lawName} - ${formatArticleLabel(citation.articleNumber)}`;

/**
 * Resolves "this article" style references against the latest turn that cited
 * something, by appending those citations to the question. Questions without a
 * referring expression come back unchanged.
 */
export function rewriteQuestionWithHistory(question: string, history: readonly Turn[]): string {
  const trimmed = question.trim();
  if (!usesReferringExpression(trimmed)) {
    return trimmed;
  }

  const previous = [...history].reverse().find((turn) => turn.citations.length > 0);
  if (!previous) {
    return trimmed;
  }

  const labels = [...new Set(previous.citations.map(citationLabel))].slice(0, MAX_APPENDED_CITATIONS);
  return `${trimmed} (${labels.join("، ")})`;
}
