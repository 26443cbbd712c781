import type {
  ChunkSearchQuery,
  FilingChunk,
  SearchHit,
  StoredChunk,
} from "../../core/entities/chunk";
import type { FilingType } from "../../core/entities/filing";
import type { VectorStorePort } from "../../core/ports/outboundPorts";

type StoredRow = {
  chunk: StoredChunk;
  embedding: number[];
  committed: boolean;
};

export const cosineSimilarity = (left: number[], right: number[]): number => {
  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;

  for (let index = 0; index < left.length; index += 1) {
    const a = left[index] ?? 0;
    const b = right[index] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }

  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
};

/**
 * Process-local chunk store with the same staging and ordering rules as the
 * Postgres store. Used for local runs and tests.
 */
export class InMemoryVectorStore implements VectorStorePort {
  private rows: StoredRow[] = [];
  private nextId = 1;

  async insertChunks(runId: string, chunks: FilingChunk[]): Promise<void> {
    for (const { embedding, ...chunk } of chunks) {
      this.rows.push({
        chunk: { ...chunk, id: this.nextId, runId },
        embedding: [...embedding],
        committed: false,
      });
      this.nextId += 1;
    }
  }

  async commitRun(ticker: string, runId: string): Promise<void> {
    this.rows = this.rows.filter(
      (row) => row.chunk.ticker !== ticker || row.chunk.runId === runId,
    );
    for (const row of this.rows) {
      if (row.chunk.ticker === ticker) {
        row.committed = true;
      }
    }
  }

  async discardRun(ticker: string, runId: string): Promise<void> {
    this.rows = this.rows.filter(
      (row) =>
        row.chunk.ticker !== ticker ||
        row.chunk.runId !== runId ||
        row.committed,
    );
  }

  async deleteTicker(ticker: string): Promise<void> {
    this.rows = this.rows.filter((row) => row.chunk.ticker !== ticker);
  }

  async countChunks(ticker: string): Promise<number> {
    return this.visible(ticker).length;
  }

  async filingTypeBreakdown(
    ticker: string,
  ): Promise<Partial<Record<FilingType, number>>> {
    const filings = new Map<FilingType, Set<string>>();
    for (const { chunk } of this.visible(ticker)) {
      const keys = filings.get(chunk.filingType) ?? new Set<string>();
      keys.add(`${chunk.filingDate}:${chunk.accessionNo ?? ""}`);
      filings.set(chunk.filingType, keys);
    }

    const breakdown: Partial<Record<FilingType, number>> = {};
    for (const [filingType, keys] of filings) {
      breakdown[filingType] = keys.size;
    }
    return breakdown;
  }

  async search(query: ChunkSearchQuery): Promise<SearchHit[]> {
    const minDate = query.minFilingDate;

    return this.visible(query.ticker)
      .filter(
        ({ chunk }) =>
          (!query.filingTypes?.length ||
            query.filingTypes.includes(chunk.filingType)) &&
          (!query.categories?.length ||
            query.categories.includes(chunk.category)) &&
          (!minDate || chunk.filingDate >= minDate),
      )
      .map((row) => ({
        chunk: { ...row.chunk },
        similarity: cosineSimilarity(query.queryVector, row.embedding),
      }))
      .sort(
        (left, right) =>
          right.similarity - left.similarity ||
          right.chunk.filingDate.localeCompare(left.chunk.filingDate) ||
          left.chunk.id - right.chunk.id,
      )
      .slice(0, Math.max(query.limit, 0));
  }

  private visible(ticker: string): StoredRow[] {
    return this.rows.filter(
      (row) => row.chunk.ticker === ticker && row.committed,
    );
  }
}
