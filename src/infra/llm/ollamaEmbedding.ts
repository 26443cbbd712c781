import type { EmbeddingPort } from "../../core/ports/outboundPorts";
import type { AppBoundaryError } from "../../core/entities/appError";
import { err, ok, type Result } from "neverthrow";
import { HttpJsonClient } from "../http/httpJsonClient";
import { checkVectors, toBoundaryError } from "./boundaryErrors";

type OllamaEmbedResponse = {
  embeddings?: number[][];
};

/**
 * Embeds through Ollama's batch endpoint. The model must produce vectors of
 * the configured dimension or the whole batch is rejected.
 */
export class OllamaEmbedding implements EmbeddingPort {
  constructor(
    private readonly baseUrl: string,
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

    const response = await this.httpClient.requestJson<OllamaEmbedResponse>({
      url: `${this.baseUrl}/api/embed`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: { model: this.model, input: texts },
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 300,
    });

    if (response.isErr()) {
      return err(toBoundaryError("embedding", "ollama", response.error));
    }

    const vectors = response.value.embeddings ?? [];
    const failure = checkVectors(
      vectors,
      texts.length,
      this.expectedDimension,
      "ollama",
    );

    return failure ? err(failure) : ok(vectors);
  }
}
