import { err, ok, type Result } from "neverthrow";

type HttpMethod = "GET" | "POST";

export type HttpJsonRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  /** Caller cancellation; never retried. */
  signal?: AbortSignal;
};

export type HttpClientErrorCode =
  | "timeout"
  | "aborted"
  | "transport_error"
  | "non_success_status"
  | "invalid_json";

export type HttpClientError = {
  code: HttpClientErrorCode;
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

type BodyReader<T> = (response: Response) => Promise<Result<T, HttpClientError>>;

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === "AbortError";

/**
 * Centralizes HTTP IO so adapters share one timeout/retry/status parsing policy.
 */
export class HttpJsonClient {
  /**
   * Executes JSON requests with bounded retries to avoid duplicated fetch policy across adapters.
   */
  async requestJson<T>(
    request: HttpJsonRequest,
  ): Promise<Result<T, HttpClientError>> {
    return this.withRetries(request, async (response) => {
      try {
        return ok((await response.json()) as T);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }
    });
  }

  /**
   * Reads the body as text, for documents such as filing HTML.
   */
  async requestText(
    request: HttpJsonRequest,
  ): Promise<Result<string, HttpClientError>> {
    return this.withRetries(request, async (response) =>
      ok(await response.text()),
    );
  }

  /**
   * Resolves once response headers arrive and hands the unread body to the
   * caller. The timeout covers the wait for headers; the caller's signal keeps
   * controlling the body afterwards.
   */
  async openStream(
    request: HttpJsonRequest,
  ): Promise<Result<Response, HttpClientError>> {
    return this.withRetries(request, async (response) => ok(response), false);
  }

  private async withRetries<T>(
    request: HttpJsonRequest,
    readBody: BodyReader<T>,
    timeoutCoversBody = true,
  ): Promise<Result<T, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(
        request,
        readBody,
        timeoutCoversBody,
      );
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
        return response;
      }

      await this.delay(request.retryDelayMs * attempt);
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  private async performRequest<T>(
    request: HttpJsonRequest,
    readBody: BodyReader<T>,
    timeoutCoversBody: boolean,
  ): Promise<Result<T, HttpClientError>> {
    if (request.signal?.aborted) {
      return err({
        code: "aborted",
        message: "HTTP request was cancelled.",
        retryable: false,
      });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, request.timeoutMs);
    const forwardAbort = () => controller.abort();
    request.signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!timeoutCoversBody) {
        clearTimeout(timeout);
      }

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      return await readBody(response);
    } catch (error) {
      if (isAbortError(error) && !timedOut) {
        return err({
          code: "aborted",
          message: "HTTP request was cancelled.",
          retryable: false,
          cause: error,
        });
      }

      if (isAbortError(error)) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
      if (timeoutCoversBody) {
        request.signal?.removeEventListener("abort", forwardAbort);
      }
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
