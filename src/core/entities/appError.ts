/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "aborted"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "not_found"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json"
  | "unsupported_document"
  | "validation_error"
  | "dimension_mismatch";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: "filings" | "llm" | "embedding" | "chat";
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Renders a boundary failure as one diagnostic line for status rows and logs.
 */
export const describeBoundaryError = (error: AppBoundaryError): string =>
  `${error.source}/${error.provider} ${error.code}: ${error.message}`;
