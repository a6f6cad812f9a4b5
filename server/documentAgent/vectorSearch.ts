/**
 * Vector Search
 *
 * Semantic search over embedded document chunks. The query is embedded with
 * OpenAI and compared against the pgvector `embedding` column by cosine
 * distance; similarity is reported as 1 - distance.
 */

import { and, cosineDistance, desc, eq, gte, sql } from "drizzle-orm";
import type { NeonHttpDatabase } from "drizzle-orm/neon-http";
import { documentChunks, type DocumentSnippet } from "@shared/schema";
import { getDb } from "../db";
import { getOpenAI } from "../llm/client";
import { ExternalServiceError } from "../utils/errorHandler";

export type VectorSearchRequest = {
  query: string;
  tenantId: number;
  topK: number;
  similarityThreshold: number;
};

export interface VectorSearchService {
  /** Snippets for the tenant, most similar first, at most topK, all at or above the threshold. */
  search(request: VectorSearchRequest): Promise<DocumentSnippet[]>;
}

export class PgVectorSearchService implements VectorSearchService {
  constructor(
    private readonly embeddingModel: string,
    private readonly getDatabase: () => NeonHttpDatabase = () => getDb(),
  ) {}

  private async embed(text: string): Promise<number[]> {
    const response = await getOpenAI().embeddings.create({
      model: this.embeddingModel,
      input: text,
    });
    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new ExternalServiceError("OpenAI", "embedding response contained no vectors");
    }
    return embedding;
  }

  async search(request: VectorSearchRequest): Promise<DocumentSnippet[]> {
    const embedding = await this.embed(request.query);
    const similarity = sql<number>`1 - (${cosineDistance(documentChunks.embedding, embedding)})`;

    const rows = await this.getDatabase()
      .select({
        documentId: documentChunks.documentId,
        filename: documentChunks.filename,
        content: documentChunks.content,
        similarity,
      })
      .from(documentChunks)
      .where(and(eq(documentChunks.companyId, request.tenantId), gte(similarity, request.similarityThreshold)))
      .orderBy(desc(similarity))
      .limit(request.topK);

    return rows.map(row => ({
      sourceId: row.filename,
      text: row.content,
      score: Number(row.similarity),
    }));
  }
}
