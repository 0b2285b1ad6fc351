import type { Country } from "../../constants/laws.js";
import type { CountryLawStats, LawDocumentEntry, LawRegistryPort, UpsertLawDocumentInput } from "./types.js";

export class InMemoryLawRegistry implements LawRegistryPort {
  private readonly entries = new Map<string, LawDocumentEntry>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async upsert(input: UpsertLawDocumentInput): Promise<LawDocumentEntry> {
    const entry: LawDocumentEntry = { ...input, lawName: input.lawName.trim(), ingestedAt: this.now() };
    this.entries.set(entry.documentId, entry);
    return { ...entry };
  }

  async listByCountry(country: Country): Promise<LawDocumentEntry[]> {
    return [...this.entries.values()]
      .filter((entry) => entry.country === country)
      .sort((a, b) =>
        a.lawName === b.lawName
          ? a.documentId.localeCompare(b.documentId)
          : a.lawName.localeCompare(b.lawName)
      )
      .map((entry) => ({ ...entry }));
  }

  async countryStats(country: Country): Promise<CountryLawStats> {
    const stats: CountryLawStats = { country, documents: 0, articles: 0, chunks: 0, lawTypes: {} };
    for (const entry of this.entries.values()) {
      if (entry.country !== country) {
        continue;
      }
      stats.documents += 1;
      stats.articles += entry.articlesFound;
      stats.chunks += entry.chunksCreated;
      stats.lawTypes[entry.lawType] = (stats.lawTypes[entry.lawType] ?? 0) + 1;
    }
    return stats;
  }

  async deleteByCountry(country: Country): Promise<number> {
    let removed = 0;
    for (const [documentId, entry] of this.entries) {
      if (entry.country === country) {
        this.entries.delete(documentId);
        removed += 1;
      }
    }
    return removed;
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    return this.entries.delete(documentId);
  }
}
