import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { SearchHit } from "../../core/entities/chunk";
import { normalizeTicker } from "../../core/entities/filing";
import type {
  FilingSearchRequest,
  FilingSearchResult,
  FilingSearchUseCase,
} from "../../core/ports/inboundPorts";
import type {
  TokenEstimatorPort,
  VectorStorePort,
} from "../../core/ports/outboundPorts";
import { logger, type Logger } from "../../shared/logger/logger";
import type { EmbeddingService } from "./embeddingService";

export type FilingSearchOptions = {
  topK: number;
  maxContextTokens: number;
  /** Candidates fetched per requested result before budget trimming. */
  candidateMultiplier: number;
};

export const defaultFilingSearchOptions: FilingSearchOptions = {
  topK: 8,
  maxContextTokens: 8000,
  candidateMultiplier: 2,
};

/**
 * Ticker-scoped similarity search with greedy token budgeting: hits are taken
 * in similarity order and the first one that would overflow ends the result.
 */
export class FilingSearchService implements FilingSearchUseCase {
  constructor(
    private readonly embeddings: EmbeddingService,
    private readonly vectorStore: VectorStorePort,
    private readonly estimator: TokenEstimatorPort,
    private readonly options: FilingSearchOptions = defaultFilingSearchOptions,
    private readonly log: Logger = logger.child({ component: "filing-search" }),
  ) {}

  async search(
    request: FilingSearchRequest,
  ): Promise<Result<FilingSearchResult, AppBoundaryError>> {
    const ticker = normalizeTicker(request.ticker);
    const topK = request.topK ?? this.options.topK;
    const budget = Math.min(
      request.tokenBudget ?? this.options.maxContextTokens,
      this.options.maxContextTokens,
    );
    const query = request.query.trim();

    if (!query || topK <= 0 || budget <= 0) {
      return ok({ hits: [], tokensUsed: 0, candidatesConsidered: 0 });
    }

    const queryVector = await this.embeddings.embedQuery(query);
    if (queryVector.isErr()) {
      return err(queryVector.error);
    }

    const candidates = await this.vectorStore.search({
      queryVector: queryVector.value,
      ticker,
      filingTypes: request.filingTypes?.length ? request.filingTypes : undefined,
      categories: request.categories?.length ? request.categories : undefined,
      minFilingDate: request.minFilingDate,
      limit: topK * this.options.candidateMultiplier,
    });

    const hits: SearchHit[] = [];
    let tokensUsed = 0;

    for (const candidate of candidates) {
      const tokens = this.estimator.count(candidate.chunk.text);
      if (tokensUsed + tokens > budget) {
        break;
      }

      hits.push(candidate);
      tokensUsed += tokens;
      if (hits.length >= topK) {
        break;
      }
    }

    this.log.info(
      {
        ticker,
        query: query.slice(0, 60),
        candidates: candidates.length,
        results: hits.length,
        tokensUsed,
        topSimilarity: hits[0]?.similarity,
      },
      "Filing search completed",
    );

    return ok({ hits, tokensUsed, candidatesConsidered: candidates.length });
  }
}
