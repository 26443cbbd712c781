import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { SearchHit } from "../entities/chunk";
import type { AssistantEvent, ChatMessage } from "../entities/chat";
import type { FilingCategory, FilingType } from "../entities/filing";
import type { FilingIndexStatusView } from "../entities/indexStatus";

export type IndexRequestOutcome = {
  ticker: string;
  accepted: boolean;
  runId?: string;
};

export interface FilingIndexUseCase {
  requestIndexing(ticker: string): Promise<IndexRequestOutcome>;
  getStatus(ticker: string): Promise<FilingIndexStatusView>;
  deleteIndex(ticker: string): Promise<void>;
}

export type FilingSearchRequest = {
  ticker: string;
  query: string;
  filingTypes?: FilingType[];
  categories?: FilingCategory[];
  minFilingDate?: string;
  topK?: number;
  /** Tokens still available to the caller; defaults to the configured context budget. */
  tokenBudget?: number;
};

export type FilingSearchResult = {
  hits: SearchHit[];
  tokensUsed: number;
  candidatesConsidered: number;
};

export interface FilingSearchUseCase {
  search(
    request: FilingSearchRequest,
  ): Promise<Result<FilingSearchResult, AppBoundaryError>>;
}

export type AssistantTurnRequest = {
  ticker: string;
  messages: ChatMessage[];
  signal?: AbortSignal;
};

export interface AssistantChatUseCase {
  streamTurn(request: AssistantTurnRequest): AsyncGenerator<AssistantEvent>;
}
