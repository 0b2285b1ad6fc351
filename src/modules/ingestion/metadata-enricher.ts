import { createHash } from "node:crypto";
import type { Country, LawType } from "../../constants/laws.js";
import { MetadataError } from "../errors.js";
import type { Chunk } from "../rag/types.js";
import { formatArticleLabel, normalizeText } from "../text/text-normalizer.js";
import type { ArticleSpan } from "./article-segmenter.js";

export interface EnrichmentContext {
  documentId: string;
  country: Country;
  lawName: string;
  lawType: LawType;
  sourceFile: string;
  lawNumber?: string | null;
  lawYear?: number | null;
  /** Offsets where pages 2..n start in the segmented text. */
  pageBreakOffsets: readonly number[] | null;
  chapter?: string | null;
}

export interface EnrichOptions {
  maxChunkChars: number;
}

export interface EnrichedDocument {
  chunks: Chunk[];
  articlesFound: number;
}

const CHAPTER_HEADING = /^[ \t]*((?:الباب|الفصل|القسم)[ \t]+(?:ال\S+|[0-9]+)[^\n]*)$/gmu;
const MAX_CHAPTER_CHARS = 120;
const PART_LOCATOR_CHARS = 30;

export const sha256Hex = (value: string): string => createHash("sha256").update(value, "utf8").digest("hex");

/** Formats the first 128 bits of a hex digest as an RFC 4122 name-based id. */
export const toUuid = (hex: string): string => {
  const variant = ((Number.parseInt(hex.charAt(16), 16) & 0x3) | 0x8).toString(16);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `5${hex.slice(13, 16)}`,
    `${variant}${hex.slice(17, 20)}`,
    hex.slice(20, 32)
  ].join("-");
};

export const computeChunkHash = (
  country: string,
  lawName: string,
  articleNumber: number | null,
  searchText: string
): string => sha256Hex(JSON.stringify([country, lawName.trim(), articleNumber, searchText]));

export const pageNumberAt = (offset: number, pageBreakOffsets: readonly number[] | null): number | null => {
  if (!pageBreakOffsets) {
    return null;
  }
  let page = 1;
  for (let index = 0; index < pageBreakOffsets.length; index += 1) {
    const current = pageBreakOffsets[index];
    if (!Number.isFinite(current) || (index > 0 && current < pageBreakOffsets[index - 1])) {
      return null;
    }
    if (current <= offset) {
      page += 1;
    }
  }
  return page;
};

const assertContext = (context: EnrichmentContext): void => {
  if (!context.country || context.country.trim().length === 0) {
    throw new MetadataError("Document context is missing a country");
  }
  if (!context.lawName || context.lawName.trim().length === 0) {
    throw new MetadataError("Document context is missing a law name");
  }
};

const buildChunk = (
  span: ArticleSpan,
  context: EnrichmentContext,
  displayText: string,
  offset: number,
  chunkPart: number,
  totalParts: number
): Chunk => {
  const searchText = normalizeText(displayText, "search");
  const contentHash = computeChunkHash(context.country, context.lawName, span.articleNumber, searchText);
  return {
    id: toUuid(contentHash),
    contentHash,
    documentId: context.documentId,
    country: context.country,
    lawName: context.lawName.trim(),
    lawType: context.lawType,
    sourceFile: context.sourceFile,
    lawNumber: context.lawNumber ?? null,
    lawYear: context.lawYear ?? null,
    articleNumber: span.articleNumber,
    articleMarker: span.marker,
    pageNumber: pageNumberAt(offset, context.pageBreakOffsets),
    chapter: context.chapter ?? null,
    chunkPart,
    totalParts,
    displayText,
    searchText
  };
};

/** Attaches identity and positional metadata to one span, as a single chunk. */
export function enrichSpan(span: ArticleSpan, context: EnrichmentContext): Chunk {
  assertContext(context);
  return buildChunk(span, context, span.text, span.startOffset, 1, 1);
}

const hardSplit = (piece: string, maxChars: number): string[] => {
  const pieces: string[] = [];
  let remaining = piece;
  while (remaining.length > maxChars) {
    let cut = remaining.lastIndexOf(" ", maxChars);
    if (cut <= maxChars / 2) {
      cut = maxChars;
    }
    pieces.push(remaining.slice(0, cut).trim());
    remaining = remaining.slice(cut).trim();
  }
  if (remaining.length > 0) {
    pieces.push(remaining);
  }
  return pieces;
};

/**
 * Packs paragraphs (or lines, when the text has a single paragraph) into parts of
 * at most `maxChars` characters. Oversized pieces are cut at a space.
 */
export function splitLongText(text: string, maxChars: number): string[] {
  if (text.length <= maxChars) {
    return [text];
  }

  const paragraphs = text.split(/\n\s*\n/).map((piece) => piece.trim()).filter(Boolean);
  const separator = paragraphs.length > 1 ? "\n\n" : "\n";
  const pieces =
    paragraphs.length > 1 ? paragraphs : text.split("\n").map((piece) => piece.trim()).filter(Boolean);

  const parts: string[] = [];
  let current = "";
  for (const piece of pieces) {
    const candidate = current ? `${current}${separator}${piece}` : piece;
    if (candidate.length <= maxChars) {
      current = candidate;
      continue;
    }
    if (current) {
      parts.push(current);
    }
    if (piece.length > maxChars) {
      const cut = hardSplit(piece, maxChars);
      current = cut.pop() ?? "";
      parts.push(...cut);
    } else {
      current = piece;
    }
  }
  if (current) {
    parts.push(current);
  }
  return parts;
}

const lastChapterHeading = (text: string): string | null => {
  let heading: string | null = null;
  for (const match of text.matchAll(CHAPTER_HEADING)) {
    const value = match[1]?.trim();
    if (value) {
      heading = value.slice(0, MAX_CHAPTER_CHARS);
    }
  }
  return heading;
};

const partHeader = (articleNumber: number | null, index: number, total: number): string =>
  `[${formatArticleLabel(articleNumber)} - جزء ${index} من ${total}]`;

/**
 * Enriches every span of a document. Articles longer than `maxChunkChars` become
 * numbered parts; parts after the first carry a header naming the article. A
 * chapter heading applies to the spans that follow it.
 */
export function enrichSpans(
  spans: Iterable<ArticleSpan>,
  context: EnrichmentContext,
  options: EnrichOptions
): EnrichedDocument {
  assertContext(context);
  const chunks: Chunk[] = [];
  let articlesFound = 0;
  let chapter = context.chapter ?? null;

  for (const span of spans) {
    if (span.articleNumber !== null) {
      articlesFound += 1;
    }
    const spanContext = { ...context, chapter };
    const parts = splitLongText(span.text, options.maxChunkChars);
    let cursor = 0;

    parts.forEach((part, index) => {
      const located = span.text.indexOf(part.slice(0, PART_LOCATOR_CHARS), cursor);
      const relative = located >= 0 ? located : cursor;
      cursor = relative;
      const displayText =
        index === 0 ? part : `${partHeader(span.articleNumber, index + 1, parts.length)}\n${part}`;
      chunks.push(
        buildChunk(span, spanContext, displayText, span.startOffset + relative, index + 1, parts.length)
      );
    });

    chapter = lastChapterHeading(span.text) ?? chapter;
  }

  return { chunks, articlesFound };
}

/** Keeps the first chunk for every id. */
export function dedupeChunks(chunks: readonly Chunk[]): { chunks: Chunk[]; duplicatesSkipped: number } {
  const seen = new Set<string>();
  const unique: Chunk[] = [];
  for (const chunk of chunks) {
    if (seen.has(chunk.id)) {
      continue;
    }
    seen.add(chunk.id);
    unique.push(chunk);
  }
  return { chunks: unique, duplicatesSkipped: chunks.length - unique.length };
}
