/**
 * Document Agent
 *
 * Document branch of the orchestrator: builds a search query from the
 * question (enriched with supervisor search terms and, in hybrid mode, the
 * filenames the SQL branch resolved) and returns the matching snippets.
 */

import type { DocumentSnippet, QueryRow } from "@shared/schema";
import type { VectorSearchService } from "./vectorSearch";
import type { RequestLogger } from "../utils/logger";

export type DocumentSearchInput = {
  question: string;
  tenantId: number;
  searchTerms: string[];
  /** Rows from a preceding SQL branch, if any. */
  sqlRows?: QueryRow[];
  logger?: RequestLogger;
};

export type DocumentSearchOutput = {
  query: string;
  snippets: DocumentSnippet[];
};

export function filenamesFromRows(rows: QueryRow[]): string[] {
  const names: string[] = [];
  for (const row of rows) {
    const value = row.filename;
    if (typeof value === "string" && value.trim() && !names.includes(value.trim())) {
      names.push(value.trim());
    }
  }
  return names;
}

export function buildDocumentQuery(question: string, searchTerms: string[], sqlRows: QueryRow[] = []): string {
  const parts = [question.trim()];
  const terms = searchTerms.map(t => t.trim()).filter(Boolean);
  if (terms.length > 0) parts.push(`Key terms: ${terms.join(", ")}`);
  const filenames = filenamesFromRows(sqlRows);
  if (filenames.length > 0) parts.push(`Documents: ${filenames.join(", ")}`);
  return parts.join("\n");
}

export class DocumentAgent {
  constructor(
    private readonly vectorSearch: VectorSearchService,
    private readonly options: { topK: number; similarityThreshold: number },
  ) {}

  async search(input: DocumentSearchInput): Promise<DocumentSearchOutput> {
    const query = buildDocumentQuery(input.question, input.searchTerms, input.sqlRows);
    const snippets = await this.vectorSearch.search({
      query,
      tenantId: input.tenantId,
      topK: this.options.topK,
      similarityThreshold: this.options.similarityThreshold,
    });
    input.logger?.info(`[DocumentAgent] ${snippets.length} snippet(s) found`, { snippets: snippets.length });
    return { query, snippets };
  }
}
