import type { Country, LawType } from "../../constants/laws.js";

export interface LawDocumentEntry {
  documentId: string;
  country: Country;
  lawName: string;
  lawType: LawType;
  sourceFile: string;
  lawNumber: string | null;
  lawYear: number | null;
  batchId: string;
  articlesFound: number;
  chunksCreated: number;
  pagesProcessed: number;
  ingestedAt: Date;
}

export type UpsertLawDocumentInput = Omit<LawDocumentEntry, "ingestedAt">;

export interface CountryLawStats {
  country: Country;
  documents: number;
  articles: number;
  chunks: number;
  lawTypes: Partial<Record<LawType, number>>;
}

export interface LawRegistryPort {
  /** One row per document id; a re-ingestion replaces the row. */
  upsert(input: UpsertLawDocumentInput): Promise<LawDocumentEntry>;
  listByCountry(country: Country): Promise<LawDocumentEntry[]>;
  countryStats(country: Country): Promise<CountryLawStats>;
  /** Resolves the number of rows removed. */
  deleteByCountry(country: Country): Promise<number>;
  /** Resolves true when a row existed. */
  deleteDocument(documentId: string): Promise<boolean>;
}
