import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  EmbeddingPort,
  TokenEstimatorPort,
} from "../../core/ports/outboundPorts";
import { truncateToTokens } from "./tokenEstimator";

export type EmbeddingServiceOptions = {
  batchSize: number;
  /** Embedding requests are cut to this many tokens; stored chunk text is not. */
  maxInputTokens: number;
  dimensions: number;
};

export const defaultEmbeddingServiceOptions: EmbeddingServiceOptions = {
  batchSize: 128,
  maxInputTokens: 8191,
  dimensions: 1536,
};

/**
 * Turns chunk and query text into vectors in bounded batches so one filing
 * never becomes one oversized embedding request.
 */
export class EmbeddingService {
  constructor(
    private readonly embeddingPort: EmbeddingPort,
    private readonly estimator: TokenEstimatorPort,
    private readonly options: EmbeddingServiceOptions = defaultEmbeddingServiceOptions,
  ) {}

  /**
   * Returns one vector per input, in input order, or the first batch failure.
   */
  async embedTexts(
    texts: string[],
  ): Promise<Result<number[][], AppBoundaryError>> {
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.options.batchSize) {
      const batch = texts
        .slice(start, start + this.options.batchSize)
        .map((text) =>
          truncateToTokens(this.estimator, text, this.options.maxInputTokens),
        );

      const result = await this.embeddingPort.embedTexts(batch);
      if (result.isErr()) {
        return err(result.error);
      }

      const checked = this.checkBatch(result.value, batch.length, start);
      if (checked.isErr()) {
        return err(checked.error);
      }
      vectors.push(...checked.value);
    }

    return ok(vectors);
  }

  async embedQuery(text: string): Promise<Result<number[], AppBoundaryError>> {
    const result = await this.embedTexts([text]);
    if (result.isErr()) {
      return err(result.error);
    }

    const [vector] = result.value;
    if (!vector) {
      return err({
        source: "embedding",
        code: "malformed_response",
        provider: "embedding-service",
        message: "Embedding service returned no vector for the query.",
        retryable: false,
      });
    }

    return ok(vector);
  }

  private checkBatch(
    vectors: number[][],
    expected: number,
    offset: number,
  ): Result<number[][], AppBoundaryError> {
    if (vectors.length !== expected) {
      return err({
        source: "embedding",
        code: "malformed_response",
        provider: "embedding-service",
        message: `Embedding batch size mismatch. Expected ${expected}, got ${vectors.length}.`,
        retryable: false,
      });
    }

    const badIndex = vectors.findIndex(
      (vector) => vector.length !== this.options.dimensions,
    );
    if (badIndex !== -1) {
      return err({
        source: "embedding",
        code: "dimension_mismatch",
        provider: "embedding-service",
        message: `Embedding dimension mismatch for index ${offset + badIndex}. Expected ${this.options.dimensions}, got ${vectors[badIndex]?.length ?? 0}.`,
        retryable: false,
      });
    }

    return ok(vectors);
  }
}
