import { and, eq } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type {
  ChunkSearchQuery,
  FilingChunk,
  SearchHit,
  StoredChunk,
} from "../../core/entities/chunk";
import {
  isFilingCategory,
  isFilingType,
  type FilingType,
} from "../../core/entities/filing";
import type { FilingIndexStatusRecord } from "../../core/entities/indexStatus";
import type {
  IndexCompletion,
  IndexCounts,
  IndexStatusRepositoryPort,
  VectorStorePort,
} from "../../core/ports/outboundPorts";
import { filingIndexStatusTable } from "./schema";
import type { VectorSql } from "./vectorCodec";

type ChunkRow = {
  id: number;
  run_id: string;
  ticker: string;
  filing_type: string;
  filing_date: string;
  accession_no: string | null;
  section_name: string;
  item_code: string;
  category: string;
  topics: string[];
  text: string;
  token_count: number;
  is_table: boolean;
  chunk_index: number;
  similarity: number;
};

const toStoredChunk = (row: ChunkRow): StoredChunk | null => {
  if (!isFilingType(row.filing_type)) {
    return null;
  }

  return {
    id: row.id,
    runId: row.run_id,
    ticker: row.ticker,
    filingType: row.filing_type,
    filingDate: row.filing_date,
    ...(row.accession_no ? { accessionNo: row.accession_no } : {}),
    sectionName: row.section_name,
    itemCode: row.item_code,
    category: isFilingCategory(row.category) ? row.category : "general",
    topics: row.topics,
    text: row.text,
    tokenCount: row.token_count,
    isTable: row.is_table,
    chunkIndex: row.chunk_index,
  };
};

/**
 * pgvector-backed chunk store. Embeddings are bound through the registered
 * `vector` type; rows stay invisible to search until their run is committed.
 */
export class PgVectorStore implements VectorStorePort {
  constructor(private readonly sql: VectorSql) {}

  async insertChunks(runId: string, chunks: FilingChunk[]): Promise<void> {
    if (chunks.length === 0) return;

    await this.sql.begin(async (tx) => {
      for (const chunk of chunks) {
        await tx`
          INSERT INTO filing_chunks (
            run_id, ticker, filing_type, filing_date, accession_no,
            section_name, item_code, category, topics, text,
            token_count, is_table, chunk_index, embedding
          ) VALUES (
            ${runId}, ${chunk.ticker}, ${chunk.filingType}, ${chunk.filingDate}::date,
            ${chunk.accessionNo ?? null}, ${chunk.sectionName}, ${chunk.itemCode},
            ${chunk.category}, ${tx.json(chunk.topics)}, ${chunk.text},
            ${chunk.tokenCount}, ${chunk.isTable}, ${chunk.chunkIndex},
            ${tx.typed.vector(chunk.embedding)}
          )
        `;
      }
    });
  }

  /**
   * Swaps the ticker's visible chunk set to this run in one transaction.
   */
  async commitRun(ticker: string, runId: string): Promise<void> {
    await this.sql.begin(async (tx) => {
      await tx`
        DELETE FROM filing_chunks WHERE ticker = ${ticker} AND run_id <> ${runId}
      `;
      await tx`
        UPDATE filing_chunks SET committed = true
        WHERE ticker = ${ticker} AND run_id = ${runId}
      `;
    });
  }

  async discardRun(ticker: string, runId: string): Promise<void> {
    await this.sql`
      DELETE FROM filing_chunks
      WHERE ticker = ${ticker} AND run_id = ${runId} AND committed = false
    `;
  }

  async deleteTicker(ticker: string): Promise<void> {
    await this.sql`DELETE FROM filing_chunks WHERE ticker = ${ticker}`;
  }

  async countChunks(ticker: string): Promise<number> {
    const [row] = await this.sql<Array<{ count: number }>>`
      SELECT count(*)::int AS count
      FROM filing_chunks
      WHERE ticker = ${ticker} AND committed = true
    `;
    return row?.count ?? 0;
  }

  async filingTypeBreakdown(
    ticker: string,
  ): Promise<Partial<Record<FilingType, number>>> {
    const rows = await this.sql<Array<{ filing_type: string; filings: number }>>`
      SELECT filing_type,
        count(DISTINCT filing_date::text || ':' || coalesce(accession_no, ''))::int AS filings
      FROM filing_chunks
      WHERE ticker = ${ticker} AND committed = true
      GROUP BY filing_type
    `;

    const breakdown: Partial<Record<FilingType, number>> = {};
    for (const row of rows) {
      if (isFilingType(row.filing_type)) {
        breakdown[row.filing_type] = row.filings;
      }
    }
    return breakdown;
  }

  async search(query: ChunkSearchQuery): Promise<SearchHit[]> {
    const { sql } = this;
    const vector = sql.typed.vector(query.queryVector);

    const rows = await sql<ChunkRow[]>`
      SELECT id, run_id, ticker, filing_type, filing_date::text AS filing_date,
        accession_no, section_name, item_code, category, topics, text,
        token_count, is_table, chunk_index,
        1 - (embedding <=> ${vector}) AS similarity
      FROM filing_chunks
      WHERE ticker = ${query.ticker}
        AND committed = true
        ${query.filingTypes?.length ? sql`AND filing_type = ANY(${sql.array(query.filingTypes)})` : sql``}
        ${query.categories?.length ? sql`AND category = ANY(${sql.array(query.categories)})` : sql``}
        ${query.minFilingDate ? sql`AND filing_date >= ${query.minFilingDate}::date` : sql``}
      ORDER BY embedding <=> ${vector}, filing_date DESC, id ASC
      LIMIT ${query.limit}
    `;

    const hits: SearchHit[] = [];
    for (const row of rows) {
      const chunk = toStoredChunk(row);
      if (chunk) {
        hits.push({ chunk, similarity: row.similarity });
      }
    }
    return hits;
  }
}

/**
 * Status rows through drizzle. Every write after `markIndexing` is scoped to
 * the run that currently owns the row, so a superseded run cannot overwrite
 * its successor.
 */
export class PostgresIndexStatusRepository implements IndexStatusRepositoryPort {
  constructor(private readonly db: PostgresJsDatabase<Record<string, never>>) {}

  async get(ticker: string): Promise<FilingIndexStatusRecord | null> {
    const [row] = await this.db
      .select()
      .from(filingIndexStatusTable)
      .where(eq(filingIndexStatusTable.ticker, ticker))
      .limit(1);

    return row ?? null;
  }

  async markIndexing(ticker: string, runId: string): Promise<void> {
    const now = new Date();
    const reset = {
      status: "indexing" as const,
      filingsIndexed: 0,
      chunksTotal: 0,
      errorMessage: null,
      currentRunId: runId,
      updatedAt: now,
    };

    await this.db
      .insert(filingIndexStatusTable)
      .values({ ticker, createdAt: now, ...reset })
      .onConflictDoUpdate({ target: filingIndexStatusTable.ticker, set: reset });
  }

  async updateCounts(
    ticker: string,
    runId: string,
    counts: IndexCounts,
  ): Promise<void> {
    await this.db
      .update(filingIndexStatusTable)
      .set({ ...counts, updatedAt: new Date() })
      .where(this.ownedBy(ticker, runId));
  }

  async markReady(
    ticker: string,
    runId: string,
    completion: IndexCompletion,
  ): Promise<void> {
    await this.db
      .update(filingIndexStatusTable)
      .set({ status: "ready", ...completion, updatedAt: new Date() })
      .where(this.ownedBy(ticker, runId));
  }

  async markError(ticker: string, runId: string, message: string): Promise<void> {
    await this.db
      .update(filingIndexStatusTable)
      .set({ status: "error", errorMessage: message, updatedAt: new Date() })
      .where(this.ownedBy(ticker, runId));
  }

  async delete(ticker: string): Promise<void> {
    await this.db
      .delete(filingIndexStatusTable)
      .where(eq(filingIndexStatusTable.ticker, ticker));
  }

  private ownedBy(ticker: string, runId: string) {
    return and(
      eq(filingIndexStatusTable.ticker, ticker),
      eq(filingIndexStatusTable.currentRunId, runId),
    );
  }
}
