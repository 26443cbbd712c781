import type { LlmPort } from "../../core/ports/outboundPorts";
import type { AppBoundaryError } from "../../core/entities/appError";
import { err, ok, type Result } from "neverthrow";
import { HttpJsonClient } from "../http/httpJsonClient";
import { toBoundaryError } from "./boundaryErrors";

type OpenAiCompletionResponse = {
  choices?: Array<{ message?: { content?: string | null } }>;
};

/**
 * Non-streaming chat completion on the small model, used for topic tagging.
 */
export class OpenAiLlm implements LlmPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly model: string,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async complete(prompt: string): Promise<Result<string, AppBoundaryError>> {
    const response =
      await this.httpClient.requestJson<OpenAiCompletionResponse>({
        url: `${this.baseUrl}/chat/completions`,
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.apiKey}`,
        },
        body: {
          model: this.model,
          temperature: 0,
          messages: [{ role: "user", content: prompt }],
        },
        timeoutMs: this.timeoutMs,
        retries: 2,
        retryDelayMs: 500,
      });

    if (response.isErr()) {
      return err(toBoundaryError("llm", "openai", response.error));
    }

    const content = response.value.choices?.[0]?.message?.content?.trim();
    if (!content) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: "openai",
        message: "Completion payload did not contain choices[0].message.content.",
        retryable: false,
      });
    }

    return ok(content);
  }
}
