import { getPostgresClient } from "../../clients/postgres.js";
import { type Country, isLawType, isSupportedCountry, type LawType } from "../../constants/laws.js";
import type { CountryLawStats, LawDocumentEntry, LawRegistryPort, UpsertLawDocumentInput } from "./types.js";

interface LawDocumentRow {
  document_id: string;
  country: string;
  law_name: string;
  law_type: string;
  source_file: string;
  law_number: string | null;
  law_year: number | null;
  batch_id: string;
  articles_found: number;
  chunks_created: number;
  pages_processed: number;
  ingested_at: Date;
}

interface LawTypeCountRow {
  law_type: string;
  documents: string;
  articles: string;
  chunks: string;
}

const SELECT_COLUMNS = `
  document_id,
  country,
  law_name,
  law_type,
  source_file,
  law_number,
  law_year,
  batch_id,
  articles_found,
  chunks_created,
  pages_processed,
  ingested_at
`;

const toLawDocumentEntry = (row: LawDocumentRow): LawDocumentEntry | null => {
  if (!isSupportedCountry(row.country) || !isLawType(row.law_type)) {
    return null;
  }
  return {
    documentId: row.document_id,
    country: row.country,
    lawName: row.law_name,
    lawType: row.law_type,
    sourceFile: row.source_file,
    lawNumber: row.law_number,
    lawYear: row.law_year,
    batchId: row.batch_id,
    articlesFound: row.articles_found,
    chunksCreated: row.chunks_created,
    pagesProcessed: row.pages_processed,
    ingestedAt: row.ingested_at
  };
};

/** Postgres catalogue of ingested laws (`law_documents`). */
export class LawRegistryRepository implements LawRegistryPort {
  async upsert(input: UpsertLawDocumentInput): Promise<LawDocumentEntry> {
    const { pool } = await getPostgresClient();
    const result = await pool.query<LawDocumentRow>(
      `
        INSERT INTO law_documents (
          document_id,
          country,
          law_name,
          law_type,
          source_file,
          law_number,
          law_year,
          batch_id,
          articles_found,
          chunks_created,
          pages_processed
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
        ON CONFLICT (document_id) DO UPDATE
        SET law_number = EXCLUDED.law_number,
            law_year = EXCLUDED.law_year,
            batch_id = EXCLUDED.batch_id,
            articles_found = EXCLUDED.articles_found,
            chunks_created = EXCLUDED.chunks_created,
            pages_processed = EXCLUDED.pages_processed,
            ingested_at = NOW(),
            updated_at = NOW()
        RETURNING ${SELECT_COLUMNS}
      `,
      [
        input.documentId,
        input.country,
        input.lawName.trim(),
        input.lawType,
        input.sourceFile,
        input.lawNumber,
        input.lawYear,
        input.batchId,
        input.articlesFound,
        input.chunksCreated,
        input.pagesProcessed
      ]
    );

    const row = result.rows[0];
    const entry = row ? toLawDocumentEntry(row) : null;
    if (!entry) {
      throw new Error(`law_documents upsert returned no usable row for ${input.documentId}`);
    }
    return entry;
  }

  async listByCountry(country: Country): Promise<LawDocumentEntry[]> {
    const { pool } = await getPostgresClient();
    const result = await pool.query<LawDocumentRow>(
      `
        SELECT ${SELECT_COLUMNS}
        FROM law_documents
        WHERE country = $1
        ORDER BY law_name ASC, document_id ASC
      `,
      [country]
    );
    return result.rows.flatMap((row) => toLawDocumentEntry(row) ?? []);
  }

  async countryStats(country: Country): Promise<CountryLawStats> {
    const { pool } = await getPostgresClient();
    const result = await pool.query<LawTypeCountRow>(
      `
        SELECT
          law_type,
          COUNT(*)::text AS documents,
          COALESCE(SUM(articles_found), 0)::text AS articles,
          COALESCE(SUM(chunks_created), 0)::text AS chunks
        FROM law_documents
        WHERE country = $1
        GROUP BY law_type
        ORDER BY law_type ASC
      `,
      [country]
    );

    const stats: CountryLawStats = { country, documents: 0, articles: 0, chunks: 0, lawTypes: {} };
    for (const row of result.rows) {
      const documents = Number.parseInt(row.documents, 10);
      stats.documents += documents;
      stats.articles += Number.parseInt(row.articles, 10);
      stats.chunks += Number.parseInt(row.chunks, 10);
      if (isLawType(row.law_type)) {
        const lawType: LawType = row.law_type;
        stats.lawTypes[lawType] = documents;
      }
    }
    return stats;
  }

  async deleteByCountry(country: Country): Promise<number> {
    const { pool } = await getPostgresClient();
    const result = await pool.query("DELETE FROM law_documents WHERE country = $1", [country]);
    return result.rowCount ?? 0;
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    const { pool } = await getPostgresClient();
    const result = await pool.query("DELETE FROM law_documents WHERE document_id = $1", [documentId]);
    return (result.rowCount ?? 0) > 0;
  }
}
