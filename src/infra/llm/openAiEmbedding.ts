import type { EmbeddingPort } from "../../core/ports/outboundPorts";
import type { AppBoundaryError } from "../../core/entities/appError";
import { err, ok, type Result } from "neverthrow";
import { HttpJsonClient } from "../http/httpJsonClient";
import { checkVectors, toBoundaryError } from "./boundaryErrors";

type OpenAiEmbeddingResponse = {
  data?: Array<{ index: number; embedding: number[] }>;
};

export class OpenAiEmbedding implements EmbeddingPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly model: string,
    private readonly expectedDimension: number,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async embedTexts(
    texts: string[],
  ): Promise<Result<number[][], AppBoundaryError>> {
    if (texts.length === 0) {
      return ok([]);
    }

    const response =
      await this.httpClient.requestJson<OpenAiEmbeddingResponse>({
        url: `${this.baseUrl}/embeddings`,
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.apiKey}`,
        },
        body: { model: this.model, input: texts },
        timeoutMs: this.timeoutMs,
        retries: 2,
        retryDelayMs: 500,
      });

    if (response.isErr()) {
      return err(toBoundaryError("embedding", "openai", response.error));
    }

    // Items carry their input index; order is not guaranteed.
    const vectors = [...(response.value.data ?? [])]
      .sort((left, right) => left.index - right.index)
      .map((item) => item.embedding);
    const failure = checkVectors(
      vectors,
      texts.length,
      this.expectedDimension,
      "openai",
    );

    return failure ? err(failure) : ok(vectors);
  }
}
