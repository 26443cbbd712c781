import type { AppBoundaryError } from "../../core/entities/appError";
import type { HttpClientError } from "../http/httpJsonClient";

const mapHttpCode = (failure: HttpClientError): AppBoundaryError["code"] => {
  if (failure.httpStatus === 429) {
    return "rate_limited";
  }

  if (failure.httpStatus === 401 || failure.httpStatus === 403) {
    return "auth_invalid";
  }

  if (failure.code === "timeout" || failure.code === "aborted") {
    return failure.code;
  }

  if (failure.code === "invalid_json") {
    return "invalid_json";
  }

  if (failure.code === "transport_error") {
    return "transport_error";
  }

  return "provider_error";
};

/**
 * Lifts an HTTP client failure into the boundary error shape shared by model adapters.
 */
export const toBoundaryError = (
  source: AppBoundaryError["source"],
  provider: string,
  failure: HttpClientError,
): AppBoundaryError => ({
  source,
  code: mapHttpCode(failure),
  provider,
  message: failure.message,
  retryable: failure.retryable,
  httpStatus: failure.httpStatus,
  cause: failure.cause,
});

/**
 * Shared shape check for embedding vectors coming back from any provider.
 */
export const checkVectors = (
  vectors: number[][] | undefined,
  expectedCount: number,
  expectedDimension: number,
  provider: string,
): AppBoundaryError | null => {
  const list = vectors ?? [];
  if (list.length !== expectedCount) {
    return {
      source: "embedding",
      code: "malformed_response",
      provider,
      message: `Embedding response size mismatch. Expected ${expectedCount}, got ${list.length}.`,
      retryable: false,
    };
  }

  for (const [index, vector] of list.entries()) {
    if (vector.length !== expectedDimension) {
      return {
        source: "embedding",
        code: "dimension_mismatch",
        provider,
        message: `Embedding dimension mismatch for index ${index}. Expected ${expectedDimension}, got ${vector.length}.`,
        retryable: false,
      };
    }

    if (vector.some((value) => !Number.isFinite(value))) {
      return {
        source: "embedding",
        code: "validation_error",
        provider,
        message: `Embedding vector contains non-finite values at index ${index}.`,
        retryable: false,
      };
    }
  }

  return null;
};
