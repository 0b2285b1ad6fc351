import { formatArticleLabel, toWesternDigits } from "../text/text-normalizer.js";
import type { Candidate, Chunk, SourceReference } from "./types.js";

export const CONTENT_PREVIEW_CHARS = 200;

export const buildCitationLabel = (chunk: Chunk): string => {
  const base = `${chunk.lawName} - ${formatArticleLabel(chunk.articleNumber)}`;
  return chunk.pageNumber === null ? base : `${base} (صفحة ${chunk.pageNumber})`;
};

export const buildContentPreview = (text: string): string =>
  text.length > CONTENT_PREVIEW_CHARS ? `${text.slice(0, CONTENT_PREVIEW_CHARS)}...` : text;

export const relevanceScoreOf = (candidate: Candidate): number => candidate.rerankScore ?? candidate.fusedScore;

/**
 * 1-based context numbers the answer cites as `[n]`, in order of first mention,
 * limited to the numbers that were supplied.
 */
export const extractCitedIndices = (answer: string, suppliedCount: number): number[] => {
  const cited: number[] = [];
  for (const match of toWesternDigits(answer).matchAll(/\[(\d{1,3})\]/g)) {
    const value = Number.parseInt(match[1] ?? "", 10);
    if (value >= 1 && value <= suppliedCount && !cited.includes(value)) {
      cited.push(value);
    }
  }
  return cited;
};

export const buildSources = (candidates: readonly Candidate[]): SourceReference[] =>
  candidates.map((candidate) => ({
    chunk_id: candidate.chunk.id,
    law_name: candidate.chunk.lawName,
    law_type: candidate.chunk.lawType,
    article_number: candidate.chunk.articleNumber,
    article_label: formatArticleLabel(candidate.chunk.articleNumber),
    page_number: candidate.chunk.pageNumber,
    chapter: candidate.chunk.chapter,
    relevance_score: relevanceScoreOf(candidate),
    content_preview: buildContentPreview(candidate.chunk.displayText),
    citation: buildCitationLabel(candidate.chunk)
  }));

/** The supplied candidates the answer actually cites; all of them when it cites none. */
export const selectCitedCandidates = (answer: string, supplied: readonly Candidate[]): Candidate[] => {
  const cited = extractCitedIndices(answer, supplied.length);
  if (cited.length === 0) {
    return [...supplied];
  }
  return cited.map((index) => supplied[index - 1]);
};
