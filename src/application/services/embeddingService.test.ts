import { err, ok } from "neverthrow";
import { describe, expect, it, vi } from "vitest";
import type { EmbeddingPort } from "../../core/ports/outboundPorts";
import { WordEstimator } from "../../__tests__/support/fakes";
import { EmbeddingService } from "./embeddingService";

const options = { batchSize: 2, maxInputTokens: 2, dimensions: 3 };

describe("EmbeddingService", () => {
  it("embeds in batches, truncating only the request text", async () => {
    const embedTexts = vi.fn<EmbeddingPort["embedTexts"]>(async (texts) =>
      ok(texts.map((_, index) => [index, 0, 1])),
    );
    const service = new EmbeddingService(
      { embedTexts },
      new WordEstimator(),
      options,
    );

    const result = await service.embedTexts(["a b c", "d", "e f"]);

    expect(result._unsafeUnwrap()).toEqual([
      [0, 0, 1],
      [1, 0, 1],
      [0, 0, 1],
    ]);
    expect(embedTexts.mock.calls.map(([texts]) => texts)).toEqual([
      ["a b", "d"],
      ["e f"],
    ]);
  });

  it("rejects vectors of the wrong dimension with the global index", async () => {
    let call = 0;
    const service = new EmbeddingService(
      {
        embedTexts: async (texts) => {
          call += 1;
          return ok(texts.map(() => (call === 2 ? [1, 0] : [1, 0, 0])));
        },
      },
      new WordEstimator(),
      options,
    );

    const error = (await service.embedTexts(["a", "b", "c"]))._unsafeUnwrapErr();

    expect(error.code).toBe("dimension_mismatch");
    expect(error.message).toBe(
      "Embedding dimension mismatch for index 2. Expected 3, got 2.",
    );
  });

  it("rejects a batch with the wrong number of vectors", async () => {
    const service = new EmbeddingService(
      { embedTexts: async () => ok([[1, 0, 0]]) },
      new WordEstimator(),
      options,
    );

    const error = (await service.embedTexts(["a", "b"]))._unsafeUnwrapErr();

    expect(error.code).toBe("malformed_response");
    expect(error.message).toBe("Embedding batch size mismatch. Expected 2, got 1.");
  });

  it("passes provider failures through for queries", async () => {
    const service = new EmbeddingService(
      {
        embedTexts: async () =>
          err({
            source: "embedding",
            code: "rate_limited",
            provider: "openai",
            message: "slow down",
            retryable: true,
          }),
      },
      new WordEstimator(),
      options,
    );

    const error = (await service.embedQuery("risk"))._unsafeUnwrapErr();

    expect(error.provider).toBe("openai");
    expect(error.code).toBe("rate_limited");
  });

  it("returns the single query vector", async () => {
    const service = new EmbeddingService(
      { embedTexts: async () => ok([[0, 1, 0]]) },
      new WordEstimator(),
      options,
    );

    expect((await service.embedQuery("risk"))._unsafeUnwrap()).toEqual([0, 1, 0]);
  });
});
