import type { LlmPort } from "../../core/ports/outboundPorts";
import type { AppBoundaryError } from "../../core/entities/appError";
import { err, ok, type Result } from "neverthrow";
import { HttpJsonClient } from "../http/httpJsonClient";
import { toBoundaryError } from "./boundaryErrors";

type OllamaChatResponse = {
  message?: { content?: string };
};

/**
 * Single-shot completion against a local Ollama server, used for topic tagging.
 */
export class OllamaLlm implements LlmPort {
  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async complete(prompt: string): Promise<Result<string, AppBoundaryError>> {
    const response = await this.httpClient.requestJson<OllamaChatResponse>({
      url: `${this.baseUrl}/api/chat`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: {
        model: this.model,
        stream: false,
        messages: [{ role: "user", content: prompt }],
      },
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 300,
    });

    if (response.isErr()) {
      return err(toBoundaryError("llm", "ollama", response.error));
    }

    const content = response.value.message?.content?.trim();
    if (!content) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: "ollama",
        message: "Ollama chat payload did not contain message.content.",
        retryable: false,
      });
    }

    return ok(content);
  }
}
