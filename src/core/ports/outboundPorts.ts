import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type {
  ChunkSearchQuery,
  FilingChunk,
  SearchHit,
} from "../entities/chunk";
import type {
  ChatMessage,
  ChatStreamEvent,
  ToolDefinition,
} from "../entities/chat";
import type {
  FilingDocument,
  FilingReference,
  FilingType,
} from "../entities/filing";
import type {
  FilingIndexStatusRecord,
  IndexingJob,
} from "../entities/indexStatus";

export interface DocumentSourcePort {
  listFilings(
    ticker: string,
    filingTypes: readonly FilingType[],
  ): Promise<Result<FilingReference[], AppBoundaryError>>;
  fetchDocument(
    reference: FilingReference,
  ): Promise<Result<FilingDocument, AppBoundaryError>>;
}

export interface EmbeddingPort {
  embedTexts(texts: string[]): Promise<Result<number[][], AppBoundaryError>>;
}

export interface LlmPort {
  complete(prompt: string): Promise<Result<string, AppBoundaryError>>;
}

export type ChatRequest = {
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  maxTokens?: number;
  signal?: AbortSignal;
};

export interface ChatModelPort {
  streamChat(request: ChatRequest): AsyncGenerator<ChatStreamEvent>;
}

/**
 * Token accounting against the embedding model's reference encoding.
 */
export interface TokenEstimatorPort {
  count(text: string): number;
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

/**
 * Chunk persistence. Writes are staged under a run id and become visible as
 * the ticker's chunk set only once the run is committed.
 */
export interface VectorStorePort {
  insertChunks(runId: string, chunks: FilingChunk[]): Promise<void>;
  commitRun(ticker: string, runId: string): Promise<void>;
  discardRun(ticker: string, runId: string): Promise<void>;
  deleteTicker(ticker: string): Promise<void>;
  countChunks(ticker: string): Promise<number>;
  filingTypeBreakdown(
    ticker: string,
  ): Promise<Partial<Record<FilingType, number>>>;
  search(query: ChunkSearchQuery): Promise<SearchHit[]>;
}

export type IndexCounts = {
  filingsIndexed: number;
  chunksTotal: number;
};

export type IndexCompletion = IndexCounts & {
  lastIndexedAt: Date;
  lastFilingDate: string | null;
  errorMessage: string | null;
};

/**
 * Durable status rows. Updates other than `markIndexing` only apply while the
 * row still belongs to the given run.
 */
export interface IndexStatusRepositoryPort {
  get(ticker: string): Promise<FilingIndexStatusRecord | null>;
  markIndexing(ticker: string, runId: string): Promise<void>;
  updateCounts(ticker: string, runId: string, counts: IndexCounts): Promise<void>;
  markReady(
    ticker: string,
    runId: string,
    completion: IndexCompletion,
  ): Promise<void>;
  markError(ticker: string, runId: string, message: string): Promise<void>;
  delete(ticker: string): Promise<void>;
}

export interface IndexSchedulerPort {
  /** Resolves false when the run is already scheduled and nothing was added. */
  schedule(job: IndexingJob): Promise<boolean>;
  /** True while the given run is queued or running. */
  isActive(ticker: string, runId: string): Promise<boolean>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}
