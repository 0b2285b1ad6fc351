import type { Country, LawType } from "../../constants/laws.js";

export type SparseVector = {
  indices: number[];
  values: number[];
};

export type Chunk = {
  id: string;
  contentHash: string;
  documentId: string;
  country: Country;
  lawName: string;
  lawType: LawType;
  sourceFile: string;
  lawNumber: string | null;
  lawYear: number | null;
  articleNumber: number | null;
  articleMarker: string | null;
  pageNumber: number | null;
  chapter: string | null;
  chunkPart: number;
  totalParts: number;
  displayText: string;
  searchText: string;
};

export type EncodedChunk = Chunk & {
  denseVector: number[];
  sparseVector: SparseVector;
};

export type RankedChunk = {
  chunk: Chunk;
  /** 1-based position in the list it came from. */
  rank: number;
  score: number;
};

export type Candidate = {
  chunk: Chunk;
  denseRank: number | null;
  sparseRank: number | null;
  fusedScore: number;
  rerankScore: number | null;
};

export type RetrievalFilters = {
  country: Country;
  lawTypes?: LawType[];
};

export type SourceReference = {
  chunk_id: string;
  law_name: string;
  law_type: LawType;
  article_number: number | null;
  article_label: string;
  page_number: number | null;
  chapter: string | null;
  relevance_score: number;
  content_preview: string;
  citation: string;
};
