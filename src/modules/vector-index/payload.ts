import { z } from "zod";
import { LAW_TYPES, SUPPORTED_COUNTRIES } from "../../constants/laws.js";
import type { Chunk } from "../rag/types.js";

export const chunkPayloadSchema = z.object({
  chunk_id: z.string().min(1),
  content_hash: z.string().min(1),
  document_id: z.string().min(1),
  batch_id: z.string().min(1),
  country: z.enum(SUPPORTED_COUNTRIES),
  law_name: z.string().min(1),
  law_type: z.enum(LAW_TYPES),
  source_file: z.string(),
  law_number: z.string().nullable().default(null),
  law_year: z.number().int().nullable().default(null),
  article_number: z.number().int().nullable(),
  article_marker: z.string().nullable().default(null),
  page_number: z.number().int().nullable().default(null),
  chapter: z.string().nullable().default(null),
  chunk_part: z.number().int().positive().default(1),
  total_parts: z.number().int().positive().default(1),
  content: z.string(),
  search_text: z.string()
});

export type ChunkPayload = z.infer<typeof chunkPayloadSchema>;

export const toChunkPayload = (chunk: Chunk, batchId: string): ChunkPayload => ({
  chunk_id: chunk.id,
  content_hash: chunk.contentHash,
  document_id: chunk.documentId,
  batch_id: batchId,
  country: chunk.country,
  law_name: chunk.lawName,
  law_type: chunk.lawType,
  source_file: chunk.sourceFile,
  law_number: chunk.lawNumber,
  law_year: chunk.lawYear,
  article_number: chunk.articleNumber,
  article_marker: chunk.articleMarker,
  page_number: chunk.pageNumber,
  chapter: chunk.chapter,
  chunk_part: chunk.chunkPart,
  total_parts: chunk.totalParts,
  content: chunk.displayText,
  search_text: chunk.searchText
});

/** Returns `null` for payloads that do not describe a chunk. */
export const fromChunkPayload = (payload: unknown): Chunk | null => {
  const parsed = chunkPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  const data = parsed.data;
  return {
    id: data.chunk_id,
    contentHash: data.content_hash,
    documentId: data.document_id,
    country: data.country,
    lawName: data.law_name,
    lawType: data.law_type,
    sourceFile: data.source_file,
    lawNumber: data.law_number,
    lawYear: data.law_year,
    articleNumber: data.article_number,
    articleMarker: data.article_marker,
    pageNumber: data.page_number,
    chapter: data.chapter,
    chunkPart: data.chunk_part,
    totalParts: data.total_parts,
    displayText: data.content,
    searchText: data.search_text
  };
};
