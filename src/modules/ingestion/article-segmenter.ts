import { SegmentationAnomaly } from "../errors.js";
import { logWarn, type CorrelationContext } from "../../observability/logger.js";
import { toWesternDigits } from "../text/text-normalizer.js";

export interface ArticleSpan {
  /** Marker plus body, from the marker up to the next marker. */
  text: string;
  body: string;
  /** `null` for the preamble that precedes the first article. */
  articleNumber: number | null;
  marker: string | null;
  startOffset: number;
  patternName: ArticlePatternName | null;
}

export type ArticlePatternName =
  | "definite-bracketed"
  | "bracketed"
  | "definite-parenthesized"
  | "parenthesized"
  | "definite-arabic-indic"
  | "definite-western"
  | "arabic-indic"
  | "western";

export interface SegmentOptions {
  onAnomaly?: (anomaly: SegmentationAnomaly) => void;
  correlation?: CorrelationContext;
}

// The marker word also appears in PDF text as Arabic presentation forms.
const DEFINITE_MARKER = "(?:المادة|\\u0627\\uFEDF\\uFEE4\\uFE8E\\u062F\\u0629)";
const INDEFINITE_MARKER = "(?:مادة|\\uFEE3\\uFE8E\\u062F\\u0629)";
const ANY_DIGITS = "[0-9\\u0660-\\u0669\\u06F0-\\u06F9]+";
const EASTERN_DIGITS = "[\\u0660-\\u0669\\u06F0-\\u06F9]+";
const WESTERN_DIGITS = "[0-9]+";
const LEADING_SEPARATOR = "\\s*[-\\u2013\\u2014:]?\\s*";
const TRAILING_SEPARATOR = "(?:\\s*[-\\u2013\\u2014:])?";

const sticky = (source: string): RegExp => new RegExp(source, "uy");

const ARTICLE_PATTERNS: ReadonlyArray<{ name: ArticlePatternName; regex: RegExp }> = [
  { name: "definite-bracketed", regex: sticky(`${DEFINITE_MARKER}\\s*\\[\\s*(${ANY_DIGITS})\\s*\\]${TRAILING_SEPARATOR}`) },
  { name: "bracketed", regex: sticky(`${INDEFINITE_MARKER}\\s*\\[\\s*(${ANY_DIGITS})\\s*\\]${TRAILING_SEPARATOR}`) },
  { name: "definite-parenthesized", regex: sticky(`${DEFINITE_MARKER}\\s*\\(\\s*(${ANY_DIGITS})\\s*\\)${TRAILING_SEPARATOR}`) },
  { name: "parenthesized", regex: sticky(`${INDEFINITE_MARKER}\\s*\\(\\s*(${ANY_DIGITS})\\s*\\)${TRAILING_SEPARATOR}`) },
  { name: "definite-arabic-indic", regex: sticky(`${DEFINITE_MARKER}${LEADING_SEPARATOR}(${EASTERN_DIGITS})${TRAILING_SEPARATOR}`) },
  { name: "definite-western", regex: sticky(`${DEFINITE_MARKER}${LEADING_SEPARATOR}(${WESTERN_DIGITS})${TRAILING_SEPARATOR}`) },
  { name: "arabic-indic", regex: sticky(`${INDEFINITE_MARKER}${LEADING_SEPARATOR}(${EASTERN_DIGITS})${TRAILING_SEPARATOR}`) },
  { name: "western", regex: sticky(`${INDEFINITE_MARKER}${LEADING_SEPARATOR}(${WESTERN_DIGITS})${TRAILING_SEPARATOR}`) }
];

const MARKER_LOCATOR = new RegExp(`(?<![\\p{L}\\p{M}])(?:${DEFINITE_MARKER}|${INDEFINITE_MARKER})`, "gu");
const HAS_CONTENT = /[\p{L}\p{N}]/u;

interface MarkerMatch {
  offset: number;
  end: number;
  marker: string;
  articleNumber: number;
  patternName: ArticlePatternName;
}

const matchMarkerAt = (text: string, offset: number): MarkerMatch | null => {
  for (const pattern of ARTICLE_PATTERNS) {
    pattern.regex.lastIndex = offset;
    const match = pattern.regex.exec(text);
    if (!match) {
      continue;
    }
    const digits = match[1];
    if (digits === undefined) {
      continue;
    }
    return {
      offset,
      end: offset + match[0].length,
      marker: match[0].trim(),
      articleNumber: Number.parseInt(toWesternDigits(digits), 10),
      patternName: pattern.name
    };
  }
  return null;
};

const LINE_INDENT = /^[ \t\u200e\u200f]*$/u;
const MAX_SEQUENCE_GAP = 3;

interface MarkerCandidate extends MarkerMatch {
  atLineStart: boolean;
}

const scanCandidates = (text: string): MarkerCandidate[] => {
  const candidates: MarkerCandidate[] = [];
  const locator = new RegExp(MARKER_LOCATOR.source, MARKER_LOCATOR.flags);
  let candidate = locator.exec(text);
  while (candidate) {
    const match = matchMarkerAt(text, candidate.index);
    if (match) {
      const lineStart = text.lastIndexOf("\n", candidate.index - 1) + 1;
      candidates.push({ ...match, atLineStart: LINE_INDENT.test(text.slice(lineStart, candidate.index)) });
      locator.lastIndex = match.end;
    }
    candidate = locator.exec(text);
  }
  return candidates;
};

/** Markers numbered `start`, then each within `MAX_SEQUENCE_GAP` above the last one kept. */
const sequenceFrom = (candidates: readonly MarkerMatch[], start: number): MarkerMatch[] => {
  const sequence: MarkerMatch[] = [];
  let expected = start;
  for (const candidate of candidates) {
    if (candidate.articleNumber >= expected && candidate.articleNumber <= expected + MAX_SEQUENCE_GAP) {
      sequence.push(candidate);
      expected = candidate.articleNumber + 1;
    }
  }
  return sequence;
};

/**
 * Article headers in source order. When at least two markers open a line, only
 * line-opening markers are headers and the rest are references inside a body.
 * Otherwise the text has lost its line breaks, and the longest ascending chain
 * (from article 1 or from the lowest number found) is kept.
 */
export function findArticleMarkers(text: string): MarkerMatch[] {
  const candidates = scanCandidates(text);
  const lineOpening = candidates.filter((candidate) => candidate.atLineStart);
  if (lineOpening.length >= 2) {
    return lineOpening;
  }
  if (candidates.length === 0) {
    return [];
  }

  const lowest = Math.min(...candidates.map((candidate) => candidate.articleNumber));
  const fromFirst = sequenceFrom(candidates, 1);
  const fromLowest = lowest !== 1 ? sequenceFrom(candidates, lowest) : [];
  return fromLowest.length > fromFirst.length ? fromLowest : fromFirst;
}

export const countArticleMarkers = (text: string): number => findArticleMarkers(text).length;

const defaultAnomalyHandler =
  (correlation: CorrelationContext) =>
  (anomaly: SegmentationAnomaly): void => {
    logWarn("ingestion.segment.anomaly", correlation, {
      previous_article: anomaly.previousArticle,
      current_article: anomaly.currentArticle,
      offset: anomaly.offset
    });
  };

/**
 * Lazy, restartable sequence of article spans. Every iteration rescans the text
 * and yields the same spans in source order.
 */
export class ArticleSegments implements Iterable<ArticleSpan> {
  private readonly onAnomaly: (anomaly: SegmentationAnomaly) => void;

  constructor(
    private readonly text: string,
    options: SegmentOptions = {}
  ) {
    this.onAnomaly = options.onAnomaly ?? defaultAnomalyHandler(options.correlation ?? {});
  }

  *[Symbol.iterator](): Iterator<ArticleSpan> {
    const markers = findArticleMarkers(this.text);
    const firstOffset = markers[0]?.offset ?? this.text.length;
    const preamble = this.text.slice(0, firstOffset);

    if (HAS_CONTENT.test(preamble)) {
      const leading = preamble.length - preamble.trimStart().length;
      const trimmed = preamble.trim();
      yield {
        text: trimmed,
        body: trimmed,
        articleNumber: null,
        marker: null,
        startOffset: leading,
        patternName: null
      };
    }

    let previousArticle: number | null = null;
    for (let index = 0; index < markers.length; index += 1) {
      const current = markers[index];
      const nextOffset = markers[index + 1]?.offset ?? this.text.length;

      if (previousArticle !== null && current.articleNumber < previousArticle) {
        this.onAnomaly(new SegmentationAnomaly(previousArticle, current.articleNumber, current.offset));
      }
      previousArticle = current.articleNumber;

      yield {
        text: this.text.slice(current.offset, nextOffset).trimEnd(),
        body: this.text.slice(current.end, nextOffset).trim(),
        articleNumber: current.articleNumber,
        marker: current.marker,
        startOffset: current.offset,
        patternName: current.patternName
      };
    }
  }
}

export const segmentArticles = (text: string, options?: SegmentOptions): ArticleSegments =>
  new ArticleSegments(text, options);
